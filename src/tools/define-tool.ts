// ============================================
// Tool factory — zod arguments in, disclosed JSON schema out
// ============================================

import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { ArgumentError, NoSessionError } from "../core/errors.js";
import type { EngineSession } from "../engine/types.js";
import type { Tool, ToolHandler } from "./types.js";

interface ToolOptions<S extends z.AnyZodObject, Session> {
  name: string;
  description: string;
  args: S;
  handler: ToolHandler<S, Session>;
}

/** Compile a zod object schema to the JSON schema disclosed to the model. */
export function toInputSchema(schema: z.AnyZodObject): Record<string, unknown> {
  const json: Record<string, unknown> = {
    ...zodToJsonSchema(schema, { $refStrategy: "none" }),
  };
  delete json.$schema;
  return json;
}

function parseArgs<S extends z.AnyZodObject>(
  tool: string,
  schema: S,
  input: Record<string, unknown>,
): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`)
      .join("; ");
    throw new ArgumentError(`Invalid arguments for ${tool}: ${issues}`);
  }
  return parsed.data;
}

/** A tool that operates on the current model and fails when none is open. */
export function defineTool<S extends z.AnyZodObject>(options: ToolOptions<S, EngineSession>): Tool {
  return {
    definition: {
      name: options.name,
      description: options.description,
      input_schema: toInputSchema(options.args),
    },

    async execute(input, { session }) {
      const args = parseArgs(options.name, options.args, input);
      if (!session) {
        throw new NoSessionError();
      }
      return options.handler(session, args);
    },
  };
}

/** A tool that can run with no model open, such as one that creates a model. */
export function defineStandaloneTool<S extends z.AnyZodObject>(
  options: ToolOptions<S, EngineSession | null>,
): Tool {
  return {
    definition: {
      name: options.name,
      description: options.description,
      input_schema: toInputSchema(options.args),
    },

    async execute(input, { session }) {
      return options.handler(session, parseArgs(options.name, options.args, input));
    },
  };
}

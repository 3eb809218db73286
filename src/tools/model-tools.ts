// ============================================
// Tools: create_model, load_model, save_model, set_parameter
// ============================================

import { z } from "zod";
import type { EngineClient } from "../engine/types.js";
import { defineStandaloneTool, defineTool } from "./define-tool.js";
import type { Tool } from "./types.js";

const DEFAULT_MODEL_NAME = "Untitled";

export function createModelTools(engine: EngineClient): Tool[] {
  const createModel = defineStandaloneTool({
    name: "create_model",
    description:
      "Start a fresh, empty model and switch to it. The current model stays open in the engine but is no longer edited.",
    args: z.object({
      name: z.string().min(1).optional().describe(`Name of the new model (default "${DEFAULT_MODEL_NAME}")`),
    }),
    async handler(_current, { name }) {
      const modelName = name ?? DEFAULT_MODEL_NAME;
      const session = await engine.createModel(modelName);
      return {
        message: `Created new model "${modelName}" (session ${session.id}).`,
        session,
      };
    },
  });

  const loadModel = defineStandaloneTool({
    name: "load_model",
    description: "Open a model file and switch to it.",
    args: z.object({
      path: z.string().min(1).describe("Path of the model file, e.g. 'pipe_flow.mph'"),
    }),
    async handler(_current, { path }) {
      const session = await engine.loadModel(path);
      const modelName = await session.name();
      return {
        message: `Loaded model "${modelName}" from "${path}" (session ${session.id}).`,
        session,
      };
    },
  });

  const saveModel = defineTool({
    name: "save_model",
    description: "Save the current model to disk.",
    args: z.object({
      path: z.string().min(1).describe("File path to save to, e.g. 'pipe_flow_v2.mph'"),
    }),
    async handler(session, { path }) {
      await session.save(path);
      return `Model saved to "${path}".`;
    },
  });

  const setParameter = defineTool({
    name: "set_parameter",
    description: "Set a global parameter, creating it if needed. Values are engine expressions such as '10[m/s]'.",
    args: z.object({
      name: z.string().min(1).describe("Parameter name"),
      value: z.string().min(1).describe("Value or expression, e.g. '10[m/s]'"),
      description: z.string().optional().describe("Optional description"),
    }),
    async handler(session, { name, value, description }) {
      const before = await session.parameters();
      await session.setParameter(name, value, description);
      const previous = before[name];
      return previous === undefined
        ? `Parameter "${name}" created with value "${value}".`
        : `Parameter "${name}" changed from "${previous}" to "${value}".`;
    },
  });

  return [createModel, loadModel, saveModel, setParameter];
}

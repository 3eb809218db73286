// ============================================
// Tool System — Type Definitions
// ============================================

import type { z } from "zod";
import type { EngineSession } from "../engine/types.js";

/** JSON Schema definition sent to the LLM so it knows how to call a tool. */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

/** A tool call request from the LLM. */
export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * What a handler returns. Most return text; handlers that open a new
 * top-level model return the session alongside the message so the loop
 * can switch to it.
 */
export type ToolOutcome = string | { message: string; session?: EngineSession };

/** Result returned to the LLM after executing a tool. */
export interface ToolResult {
  tool_use_id: string;
  content: string;
  is_error?: boolean;
  /** Session opened by the tool, not yet adopted by the loop. */
  session?: EngineSession;
}

export interface ToolContext {
  /** The current model, or null when none is open. */
  session: EngineSession | null;
}

/** Interface that each registered tool implements. */
export interface Tool {
  definition: ToolDefinition;
  execute(input: Record<string, unknown>, context: ToolContext): Promise<ToolOutcome>;
}

/** Handler signature for tools declared with a zod argument schema. */
export type ToolHandler<S extends z.ZodTypeAny, Session> = (
  session: Session,
  args: z.infer<S>,
) => Promise<ToolOutcome>;

// ============================================
// Tool Registry — static catalogue and dispatch
// ============================================

import { DuplicateToolError, UnknownToolError } from "../core/errors.js";
import { errorMessage } from "../types.js";
import type { Tool, ToolCall, ToolContext, ToolDefinition, ToolResult } from "./types.js";

const DEFAULT_MAX_RESULT_CHARS = 20_000;

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly maxResultChars: number;
  private frozen = false;

  constructor(options?: { maxResultChars?: number }) {
    this.maxResultChars = options?.maxResultChars ?? DEFAULT_MAX_RESULT_CHARS;
  }

  register(tool: Tool): void {
    const name = tool.definition.name;
    if (this.frozen) {
      throw new Error(`Cannot register "${name}": the tool registry is frozen`);
    }
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, tool);
  }

  /** Stop accepting registrations. Called once startup wiring is done. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  resolve(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, this.names());
    }
    return tool;
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Run one tool call. Never throws: unknown tools, bad arguments and
   * engine failures all come back as an `Error: ...` result.
   */
  async execute(call: ToolCall, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(call.name);

    if (!tool) {
      return {
        tool_use_id: call.id,
        content: `Error: ${new UnknownToolError(call.name, this.names()).message}`,
        is_error: true,
      };
    }

    try {
      const outcome = await tool.execute(call.input, context);
      if (typeof outcome === "string") {
        return { tool_use_id: call.id, content: this.truncate(outcome) };
      }
      return {
        tool_use_id: call.id,
        content: this.truncate(outcome.message),
        session: outcome.session,
      };
    } catch (err) {
      return {
        tool_use_id: call.id,
        content: this.truncate(`Error: ${errorMessage(err)}`),
        is_error: true,
      };
    }
  }

  private truncate(content: string): string {
    if (content.length <= this.maxResultChars) return content;
    return content.slice(0, this.maxResultChars) + "\n[truncated]";
  }
}

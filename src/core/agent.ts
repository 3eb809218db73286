// ============================================
// Model Agent — the orchestration loop
// ============================================
//
// user text → model call → plain reply (done)
//                        → tool batch → results → context refresh → model call
//
// Tool failures come back as error results and the loop keeps going.
// Model-call failures propagate and leave the transcript as built so far,
// so the same turn can be retried without duplicating the user message.
// ============================================

import type { ToolRegistry } from "../tools/tool-registry.js";
import type { ToolResult } from "../tools/types.js";
import { errorMessage } from "../types.js";
import { ContextSnapshotter } from "./context-snapshot.js";
import { Conversation, type ToolInvocation, type Turn } from "./conversation.js";
import { EngineUnstableError } from "./errors.js";
import type { LLMAdapter } from "./llm-adapter.js";
import type { EngineSessionHolder } from "./session-holder.js";
import { TurnLock } from "./turn-lock.js";

const LOG_PREVIEW_CHARS = 200;

export const SYSTEM_PROMPT_TEMPLATE = `You are an expert multiphysics modeling assistant. You control the open model through the tools provided.

Guidelines:
- Inspect the context below before changing anything; refer to nodes by the names it shows.
- When the user changes parameters or settings, offer to rebuild the geometry and mesh, solve, and save.
- If a tool returns an error, read it, correct the arguments and try again, or explain the problem.
- Keep replies short and report the values you obtained.

Current Model Context:
{context}`;

export function buildSystemPrompt(context: string): string {
  return SYSTEM_PROMPT_TEMPLATE.replace("{context}", context);
}

export interface ModelAgentOptions {
  llm: LLMAdapter;
  registry: ToolRegistry;
  holder: EngineSessionHolder;
  snapshotter?: ContextSnapshotter;
}

function preview(text: string): string {
  return text.length > LOG_PREVIEW_CHARS ? `${text.slice(0, LOG_PREVIEW_CHARS)}...` : text;
}

export class ModelAgent {
  private readonly llm: LLMAdapter;
  private readonly registry: ToolRegistry;
  private readonly holder: EngineSessionHolder;
  private readonly snapshotter: ContextSnapshotter;
  private readonly conversation: Conversation;
  private readonly lock = new TurnLock();

  private constructor(options: ModelAgentOptions, snapshotter: ContextSnapshotter, context: string) {
    this.llm = options.llm;
    this.registry = options.registry;
    this.holder = options.holder;
    this.snapshotter = snapshotter;
    this.conversation = new Conversation(buildSystemPrompt(context));
  }

  /** Build an agent whose system turn already carries the current context. */
  static async create(options: ModelAgentOptions): Promise<ModelAgent> {
    const snapshotter = options.snapshotter ?? new ContextSnapshotter();
    const context = await snapshotter.snapshot(options.holder.current());
    return new ModelAgent(options, snapshotter, context);
  }

  // --------------------------------------------------
  // Public API
  // --------------------------------------------------

  /**
   * Run one user turn to completion and return the assistant's reply.
   * If `text` is the user turn the transcript is still waiting on (a
   * previous attempt failed in the model call), the loop resumes instead
   * of appending it again.
   */
  async send(text: string): Promise<string> {
    return this.lock.run(async () => {
      if (this.conversation.pendingUserTurn()?.content !== text) {
        this.conversation.appendUser(text);
      } else {
        console.log("[Agent] Resuming pending turn");
      }
      return this.runLoop();
    });
  }

  /** Continue a turn that failed in the model call. */
  async resume(): Promise<string> {
    return this.lock.run(async () => {
      if (!this.conversation.pendingUserTurn()) {
        throw new Error("No pending user turn to resume");
      }
      return this.runLoop();
    });
  }

  /** Re-derive the context and overwrite the system turn. */
  async refreshContext(): Promise<void> {
    const context = await this.snapshotter.snapshot(this.holder.current());
    this.conversation.replaceSystem(buildSystemPrompt(context));
  }

  transcript(): Turn[] {
    return this.conversation.toJSON();
  }

  // --------------------------------------------------
  // Loop
  // --------------------------------------------------

  private async runLoop(): Promise<string> {
    const tools = this.registry.definitions();

    for (let iteration = 1; ; iteration++) {
      const response = await this.llm.complete(this.conversation.turns(), tools);
      const turn = response.turn;
      this.conversation.appendAssistant(turn);

      console.log(
        `[Agent] Model reply #${iteration} (${response.provider}/${response.model}` +
          `${response.tokensUsed !== undefined ? `, ${response.tokensUsed} tokens` : ""}): ` +
          `${turn.toolInvocations.length} tool call(s)`,
      );

      if (turn.toolInvocations.length === 0) {
        return turn.content;
      }

      for (const invocation of turn.toolInvocations) {
        const result = await this.execute(invocation);
        this.conversation.appendToolResult({
          role: "tool-result",
          toolInvocationId: invocation.id,
          content: result.content,
          isError: result.is_error === true,
        });
      }

      await this.refreshContext();
    }
  }

  private async execute(invocation: ToolInvocation): Promise<ToolResult> {
    console.log(
      `[Tool] ${invocation.toolName}(${preview(JSON.stringify(invocation.arguments))})`,
    );

    const result = await this.registry.execute(
      { id: invocation.id, name: invocation.toolName, input: invocation.arguments },
      { session: this.holder.current() },
    );

    if (result.session) {
      try {
        await this.holder.replace(result.session);
      } catch (err) {
        if (!(err instanceof EngineUnstableError)) throw err;
        console.warn(`[Engine] ${err.message}`);
        return { tool_use_id: result.tool_use_id, content: `Error: ${errorMessage(err)}`, is_error: true };
      }
    }

    const log = result.is_error ? console.warn : console.log;
    log(`[Tool] ${invocation.toolName} → ${preview(result.content)}`);
    return result;
  }
}

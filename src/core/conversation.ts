// ============================================
// Conversation State — the session transcript
// ============================================
//
// Append-only list of turns. Turn 0 is always the system turn; context
// refreshes overwrite its content in place. Tool-result turns must answer
// the latest assistant turn's invocations in order before the model is
// called again.
// ============================================

/** A tool invocation requested by the model. */
export interface ToolInvocation {
  id: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

export interface SystemTurn {
  role: "system";
  content: string;
}

export interface UserTurn {
  role: "user";
  content: string;
}

export interface AssistantTurn {
  role: "assistant";
  content: string;
  toolInvocations: ToolInvocation[];
}

export interface ToolResultTurn {
  role: "tool-result";
  toolInvocationId: string;
  content: string;
  isError: boolean;
}

export type Turn = SystemTurn | UserTurn | AssistantTurn | ToolResultTurn;

export class Conversation {
  private readonly log: Turn[];
  /** Invocations of the latest assistant turn still waiting for a result. */
  private outstanding: ToolInvocation[] = [];

  constructor(systemPrompt: string) {
    this.log = [{ role: "system", content: systemPrompt }];
  }

  get length(): number {
    return this.log.length;
  }

  get systemPrompt(): string {
    return this.log[0].content;
  }

  /** Overwrite turn 0's content. */
  replaceSystem(content: string): void {
    this.log[0] = { role: "system", content };
  }

  appendUser(content: string): UserTurn {
    this.assertNoOutstanding("a user turn");
    const turn: UserTurn = { role: "user", content };
    this.log.push(turn);
    return turn;
  }

  appendAssistant(turn: AssistantTurn): void {
    this.assertNoOutstanding("an assistant turn");
    this.log.push(turn);
    this.outstanding = [...turn.toolInvocations];
  }

  appendToolResult(turn: ToolResultTurn): void {
    const [next] = this.outstanding;
    if (!next) {
      throw new Error(`Tool result ${turn.toolInvocationId} answers no outstanding invocation`);
    }
    if (next.id !== turn.toolInvocationId) {
      throw new Error(
        `Tool result ${turn.toolInvocationId} is out of order; expected ${next.id}`,
      );
    }
    this.log.push(turn);
    this.outstanding = this.outstanding.slice(1);
  }

  /** True when every invocation has its result, so the model may be called. */
  get readyForModel(): boolean {
    return this.outstanding.length === 0;
  }

  /**
   * The user turn the model still owes a reply to, if any: the transcript
   * ends in that user turn or in tool results that followed it.
   */
  pendingUserTurn(): UserTurn | undefined {
    const last = this.log[this.log.length - 1];
    if (last.role === "system" || last.role === "assistant" || !this.readyForModel) {
      return undefined;
    }
    for (let i = this.log.length - 1; i > 0; i--) {
      const turn = this.log[i];
      if (turn.role === "user") return turn;
    }
    return undefined;
  }

  turns(): readonly Turn[] {
    return this.log;
  }

  /** Plain JSON-compatible copy of the transcript. */
  toJSON(): Turn[] {
    return this.log.map((turn) =>
      turn.role === "assistant"
        ? { ...turn, toolInvocations: turn.toolInvocations.map((inv) => ({ ...inv })) }
        : { ...turn },
    );
  }

  private assertNoOutstanding(what: string): void {
    if (this.outstanding.length > 0) {
      const ids = this.outstanding.map((inv) => inv.id).join(", ");
      throw new Error(`Cannot append ${what} while tool invocations are unanswered: ${ids}`);
    }
  }
}

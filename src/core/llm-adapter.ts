// ============================================
// LLM-Agnostic Adapter
// ============================================
//
// Provides a uniform interface for calling different LLM providers in
// tool-use mode: the full transcript and the tool schemas go in, one
// assistant turn comes out. Transport errors, HTTP errors and malformed
// responses all surface as ModelCallError.
// When no valid API key is provided, returns a placeholder reply so the
// rest of the pipeline can still run end-to-end.
// ============================================

import { z } from "zod";
import type { ToolDefinition } from "../tools/types.js";
import { errorMessage } from "../types.js";
import type { AssistantTurn, ToolInvocation, Turn } from "./conversation.js";
import { ModelCallError } from "./errors.js";

const MAX_TOKENS = 4096;

export interface LLMResponse {
  turn: AssistantTurn;
  provider: string;
  model: string;
  tokensUsed?: number;
}

// ---- Abstract base ----

export abstract class LLMAdapter {
  constructor(
    readonly provider: string,
    protected readonly apiKey: string,
    readonly model: string,
  ) {}

  /** Send the whole conversation with tool definitions (tool choice: auto). */
  abstract complete(turns: readonly Turn[], tools: ToolDefinition[]): Promise<LLMResponse>;

  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: Record<string, unknown>,
  ): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ModelCallError(`${this.provider} request failed: ${errorMessage(err)}`, undefined, err);
    }

    const text = await res.text();
    if (!res.ok) {
      throw new ModelCallError(`${this.provider} API error ${res.status}: ${text}`, res.status);
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ModelCallError(`${this.provider} returned invalid JSON`, res.status, err);
    }
  }

  protected parseResponse<T>(schema: z.ZodType<T>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ModelCallError(
        `${this.provider} returned a malformed response` +
          (issue ? ` (${issue.path.join(".")}: ${issue.message})` : ""),
      );
    }
    return parsed.data;
  }
}

function systemText(turns: readonly Turn[]): string {
  return turns
    .filter((t) => t.role === "system")
    .map((t) => t.content)
    .join("\n\n");
}

/** Merge consecutive messages of the same role by concatenating their parts. */
function mergeByRole<M extends { role: string }, P>(
  messages: M[],
  parts: (m: M) => P[],
  build: (role: M["role"], parts: P[]) => M,
): M[] {
  const out: M[] = [];
  for (const message of messages) {
    const previous = out[out.length - 1];
    if (previous && previous.role === message.role) {
      out[out.length - 1] = build(message.role, [...parts(previous), ...parts(message)]);
    } else {
      out.push(message);
    }
  }
  return out;
}

// ---- Anthropic adapter ----

type AnthropicBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicBlock[];
}

const anthropicResponseSchema = z.object({
  content: z.array(
    z.union([
      z.object({ type: z.literal("text"), text: z.string() }),
      z.object({
        type: z.literal("tool_use"),
        id: z.string(),
        name: z.string(),
        input: z.record(z.unknown()),
      }),
      z.object({ type: z.string() }),
    ]),
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

class AnthropicAdapter extends LLMAdapter {
  async complete(turns: readonly Turn[], tools: ToolDefinition[]): Promise<LLMResponse> {
    const messages: AnthropicMessage[] = [];
    for (const turn of turns) {
      switch (turn.role) {
        case "system":
          break;
        case "user":
          messages.push({ role: "user", content: [{ type: "text", text: turn.content }] });
          break;
        case "assistant": {
          const blocks: AnthropicBlock[] = [];
          if (turn.content) blocks.push({ type: "text", text: turn.content });
          for (const inv of turn.toolInvocations) {
            blocks.push({ type: "tool_use", id: inv.id, name: inv.toolName, input: inv.arguments });
          }
          if (blocks.length === 0) blocks.push({ type: "text", text: "(no content)" });
          messages.push({ role: "assistant", content: blocks });
          break;
        }
        case "tool-result":
          messages.push({
            role: "user",
            content: [
              {
                type: "tool_result",
                tool_use_id: turn.toolInvocationId,
                content: turn.content,
                is_error: turn.isError || undefined,
              },
            ],
          });
          break;
      }
    }

    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: MAX_TOKENS,
      system: systemText(turns),
      messages: mergeByRole(messages, (m) => m.content, (role, content) => ({ role, content })),
    };

    if (tools.length > 0) {
      body.tools = tools;
      body.tool_choice = { type: "auto" };
    }

    const raw = await this.postJson(
      "https://api.anthropic.com/v1/messages",
      { "x-api-key": this.apiKey, "anthropic-version": "2023-06-01" },
      body,
    );
    const data = this.parseResponse(anthropicResponseSchema, raw);

    const text: string[] = [];
    const toolInvocations: ToolInvocation[] = [];
    for (const block of data.content) {
      if ("text" in block) {
        text.push(block.text);
      } else if ("input" in block) {
        toolInvocations.push({ id: block.id, toolName: block.name, arguments: block.input });
      }
    }

    return {
      turn: { role: "assistant", content: text.join(""), toolInvocations },
      provider: "anthropic",
      model: this.model,
      tokensUsed: data.usage ? data.usage.input_tokens + data.usage.output_tokens : undefined,
    };
  }
}

// ---- OpenAI adapter ----

const openaiResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

const toolArgumentsSchema = z.record(z.unknown());

class OpenAIAdapter extends LLMAdapter {
  async complete(turns: readonly Turn[], tools: ToolDefinition[]): Promise<LLMResponse> {
    const openaiMessages: Array<Record<string, unknown>> = turns.map((turn) => {
      switch (turn.role) {
        case "system":
        case "user":
          return { role: turn.role, content: turn.content };
        case "assistant": {
          const assistantMsg: Record<string, unknown> = {
            role: "assistant",
            content: turn.content || null,
          };
          if (turn.toolInvocations.length > 0) {
            assistantMsg.tool_calls = turn.toolInvocations.map((inv) => ({
              id: inv.id,
              type: "function",
              function: { name: inv.toolName, arguments: JSON.stringify(inv.arguments) },
            }));
          }
          return assistantMsg;
        }
        case "tool-result":
          return { role: "tool", tool_call_id: turn.toolInvocationId, content: turn.content };
      }
    });

    const body: Record<string, unknown> = {
      model: this.model,
      messages: openaiMessages,
      max_tokens: MAX_TOKENS,
    };

    if (tools.length > 0) {
      body.tools = tools.map((t) => ({
        type: "function",
        function: {
          name: t.name,
          description: t.description,
          parameters: t.input_schema,
        },
      }));
      body.tool_choice = "auto";
    }

    const raw = await this.postJson(
      "https://api.openai.com/v1/chat/completions",
      { Authorization: `Bearer ${this.apiKey}` },
      body,
    );
    const data = this.parseResponse(openaiResponseSchema, raw);
    const message = data.choices[0].message;

    const toolInvocations = (message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      toolName: tc.function.name,
      arguments: this.parseArguments(tc.function.name, tc.function.arguments),
    }));

    return {
      turn: { role: "assistant", content: message.content ?? "", toolInvocations },
      provider: "openai",
      model: this.model,
      tokensUsed: data.usage?.total_tokens,
    };
  }

  private parseArguments(tool: string, raw: string): Record<string, unknown> {
    let value: unknown;
    try {
      value = raw.trim() ? JSON.parse(raw) : {};
    } catch {
      throw new ModelCallError(`openai returned malformed arguments for ${tool}: ${raw}`);
    }
    const parsed = toolArgumentsSchema.safeParse(value);
    if (!parsed.success) {
      throw new ModelCallError(`openai returned non-object arguments for ${tool}: ${raw}`);
    }
    return parsed.data;
  }
}

// ---- Google (Gemini) adapter ----

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: { content: string } } };

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.union([
                  z.object({ text: z.string() }),
                  z.object({
                    functionCall: z.object({
                      name: z.string(),
                      args: z.record(z.unknown()).optional(),
                    }),
                  }),
                ]),
              )
              .optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .min(1),
  usageMetadata: z.object({ totalTokenCount: z.number() }).optional(),
});

/** Gemini's schema dialect rejects these JSON Schema keywords. */
const GEMINI_UNSUPPORTED_KEYS = new Set(["$schema", "additionalProperties"]);

function toGeminiSchema(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toGeminiSchema);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (!GEMINI_UNSUPPORTED_KEYS.has(key)) out[key] = toGeminiSchema(child);
    }
    return out;
  }
  return value;
}

class GoogleAdapter extends LLMAdapter {
  async complete(turns: readonly Turn[], tools: ToolDefinition[]): Promise<LLMResponse> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent?key=${this.apiKey}`;

    // functionResponse parts are keyed by tool name, not invocation id
    const toolNames = new Map<string, string>();
    const contents: GeminiContent[] = [];

    for (const turn of turns) {
      switch (turn.role) {
        case "system":
          break;
        case "user":
          contents.push({ role: "user", parts: [{ text: turn.content }] });
          break;
        case "assistant": {
          const parts: GeminiPart[] = [];
          if (turn.content) parts.push({ text: turn.content });
          for (const inv of turn.toolInvocations) {
            toolNames.set(inv.id, inv.toolName);
            parts.push({ functionCall: { name: inv.toolName, args: inv.arguments } });
          }
          if (parts.length === 0) parts.push({ text: "(no content)" });
          contents.push({ role: "model", parts });
          break;
        }
        case "tool-result":
          contents.push({
            role: "user",
            parts: [
              {
                functionResponse: {
                  name: toolNames.get(turn.toolInvocationId) ?? "tool",
                  response: { content: turn.content },
                },
              },
            ],
          });
          break;
      }
    }

    const body: Record<string, unknown> = {
      systemInstruction: { parts: [{ text: systemText(turns) }] },
      contents: mergeByRole(contents, (c) => c.parts, (role, parts) => ({ role, parts })),
      generationConfig: { maxOutputTokens: MAX_TOKENS },
    };

    if (tools.length > 0) {
      body.tools = [
        {
          functionDeclarations: tools.map((t) => ({
            name: t.name,
            description: t.description,
            parameters: toGeminiSchema(t.input_schema),
          })),
        },
      ];
      body.toolConfig = { functionCallingConfig: { mode: "AUTO" } };
    }

    const data = this.parseResponse(geminiResponseSchema, await this.postJson(url, {}, body));

    const text: string[] = [];
    const toolInvocations: ToolInvocation[] = [];
    for (const part of data.candidates[0].content?.parts ?? []) {
      if ("text" in part) {
        text.push(part.text);
      } else {
        toolInvocations.push({
          id: `gemini_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`,
          toolName: part.functionCall.name,
          arguments: part.functionCall.args ?? {},
        });
      }
    }

    return {
      turn: { role: "assistant", content: text.join(""), toolInvocations },
      provider: "google",
      model: this.model,
      tokensUsed: data.usageMetadata?.totalTokenCount,
    };
  }
}

// ---- Placeholder adapter (no API key) ----

export const PLACEHOLDER_REPLY = "[LLM response placeholder -- configure LLM_API_KEY to enable]";

class PlaceholderAdapter extends LLMAdapter {
  async complete(turns: readonly Turn[], _tools: ToolDefinition[]): Promise<LLMResponse> {
    console.log("[LLM Placeholder] System:", systemText(turns).slice(0, 120), "...");
    console.log("[LLM Placeholder] Turns:", turns.length);
    return {
      turn: { role: "assistant", content: PLACEHOLDER_REPLY, toolInvocations: [] },
      provider: "placeholder",
      model: "none",
    };
  }
}

// ---- Factory ----

const PROVIDERS: Record<
  string,
  new (provider: string, apiKey: string, model: string) => LLMAdapter
> = {
  anthropic: AnthropicAdapter,
  openai: OpenAIAdapter,
  google: GoogleAdapter,
};

/**
 * Create the appropriate LLM adapter based on the provider name.
 * Falls back to a placeholder if no API key is supplied.
 */
export function createLLMAdapter(
  provider: string,
  apiKey: string,
  model: string,
): LLMAdapter {
  if (!apiKey) {
    console.warn("[ModelPilot] No LLM_API_KEY set — using placeholder adapter.");
    return new PlaceholderAdapter("placeholder", "", "none");
  }

  const Ctor = PROVIDERS[provider.toLowerCase()];
  if (!Ctor) {
    console.warn(
      `[ModelPilot] Unknown LLM provider "${provider}" — using placeholder adapter.`,
    );
    return new PlaceholderAdapter("placeholder", "", "none");
  }

  return new Ctor(provider.toLowerCase(), apiKey, model);
}

import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Turn } from "../src/core/conversation.js";
import { ModelCallError } from "../src/core/errors.js";
import { createLLMAdapter, PLACEHOLDER_REPLY } from "../src/core/llm-adapter.js";
import type { ToolDefinition } from "../src/tools/types.js";

const turns: Turn[] = [
  { role: "system", content: "S" },
  { role: "user", content: "hi" },
  {
    role: "assistant",
    content: "",
    toolInvocations: [
      { id: "a", toolName: "create_component", arguments: {} },
      { id: "b", toolName: "create_study", arguments: { name: "s" } },
    ],
  },
  { role: "tool-result", toolInvocationId: "a", content: "ok1", isError: false },
  { role: "tool-result", toolInvocationId: "b", content: "ok2", isError: true },
];

const tools: ToolDefinition[] = [
  {
    name: "create_study",
    description: "Add a study",
    input_schema: {
      type: "object",
      properties: { name: { type: "string" } },
      required: ["name"],
      additionalProperties: false,
    },
  },
];

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(typeof body === "string" ? body : JSON.stringify(body), { status }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): Record<string, unknown> {
  const init = fetchMock.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("createLLMAdapter", () => {
  it("falls back to the placeholder without a key", async () => {
    const adapter = createLLMAdapter("openai", "", "gpt-4o");
    expect(adapter.provider).toBe("placeholder");
    const response = await adapter.complete(turns, tools);
    expect(response.turn).toEqual({ role: "assistant", content: PLACEHOLDER_REPLY, toolInvocations: [] });
  });

  it("falls back to the placeholder for an unknown provider", () => {
    expect(createLLMAdapter("acme", "test-secret", "m").provider).toBe("placeholder");
  });
});

describe("OpenAI adapter", () => {
  const adapter = createLLMAdapter("OpenAI", "test-secret", "gpt-4o");

  it("sends the transcript as chat messages with tool choice auto", async () => {
    const fetchMock = stubFetch(200, { choices: [{ message: { content: "done" } }] });

    await adapter.complete(turns, tools);

    expect(fetchMock.mock.calls[0][0]).toBe("https://api.openai.com/v1/chat/completions");
    const body = sentBody(fetchMock);
    expect(body.messages).toEqual([
      { role: "system", content: "S" },
      { role: "user", content: "hi" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "a", type: "function", function: { name: "create_component", arguments: "{}" } },
          { id: "b", type: "function", function: { name: "create_study", arguments: '{"name":"s"}' } },
        ],
      },
      { role: "tool", tool_call_id: "a", content: "ok1" },
      { role: "tool", tool_call_id: "b", content: "ok2" },
    ]);
    expect(body.tool_choice).toBe("auto");
    expect(body.tools).toEqual([
      { type: "function", function: { name: "create_study", description: "Add a study", parameters: tools[0].input_schema } },
    ]);
  });

  it("parses tool calls", async () => {
    stubFetch(200, {
      choices: [
        {
          message: {
            content: null,
            tool_calls: [{ id: "call_1", type: "function", function: { name: "create_study", arguments: '{"name":"std1"}' } }],
          },
        },
      ],
      usage: { total_tokens: 42 },
    });

    const response = await adapter.complete(turns, tools);

    expect(response.turn).toEqual({
      role: "assistant",
      content: "",
      toolInvocations: [{ id: "call_1", toolName: "create_study", arguments: { name: "std1" } }],
    });
    expect(response.tokensUsed).toBe(42);
  });

  it("rejects malformed tool arguments", async () => {
    stubFetch(200, {
      choices: [{ message: { tool_calls: [{ id: "c", function: { name: "create_study", arguments: "{oops" } }] } }],
    });
    await expect(adapter.complete(turns, tools)).rejects.toThrow(
      "openai returned malformed arguments for create_study: {oops",
    );
  });

  it("surfaces HTTP errors with their status", async () => {
    stubFetch(500, "upstream failure");
    const failure = adapter.complete(turns, tools);
    await expect(failure).rejects.toBeInstanceOf(ModelCallError);
    await expect(failure).rejects.toMatchObject({ status: 500, message: "openai API error 500: upstream failure" });
  });

  it("surfaces network errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => Promise.reject(new Error("getaddrinfo ENOTFOUND"))),
    );
    await expect(adapter.complete(turns, tools)).rejects.toThrow("openai request failed: getaddrinfo ENOTFOUND");
  });

  it("rejects a response without choices", async () => {
    stubFetch(200, { choices: [] });
    await expect(adapter.complete(turns, tools)).rejects.toBeInstanceOf(ModelCallError);
  });
});

describe("Anthropic adapter", () => {
  const adapter = createLLMAdapter("anthropic", "test-secret", "claude-test");

  it("groups tool results into one user message", async () => {
    const fetchMock = stubFetch(200, { content: [{ type: "text", text: "ok" }] });

    await adapter.complete(turns, tools);

    const body = sentBody(fetchMock);
    expect(body.system).toBe("S");
    expect(body.tool_choice).toEqual({ type: "auto" });
    expect(body.tools).toEqual(tools);
    expect(body.messages).toEqual([
      { role: "user", content: [{ type: "text", text: "hi" }] },
      {
        role: "assistant",
        content: [
          { type: "tool_use", id: "a", name: "create_component", input: {} },
          { type: "tool_use", id: "b", name: "create_study", input: { name: "s" } },
        ],
      },
      {
        role: "user",
        content: [
          { type: "tool_result", tool_use_id: "a", content: "ok1" },
          { type: "tool_result", tool_use_id: "b", content: "ok2", is_error: true },
        ],
      },
    ]);
  });

  it("parses text and tool use blocks", async () => {
    stubFetch(200, {
      content: [
        { type: "text", text: "Creating it." },
        { type: "tool_use", id: "tu_1", name: "create_study", input: { name: "std1" } },
      ],
      usage: { input_tokens: 10, output_tokens: 5 },
    });

    const response = await adapter.complete(turns, tools);

    expect(response.turn).toEqual({
      role: "assistant",
      content: "Creating it.",
      toolInvocations: [{ id: "tu_1", toolName: "create_study", arguments: { name: "std1" } }],
    });
    expect(response.tokensUsed).toBe(15);
  });
});

describe("Google adapter", () => {
  const adapter = createLLMAdapter("google", "test-secret", "gemini-test");

  it("names function responses after the invoked tool", async () => {
    const fetchMock = stubFetch(200, { candidates: [{ content: { parts: [{ text: "ok" }] } }] });

    await adapter.complete(turns, tools);

    expect(String(fetchMock.mock.calls[0][0])).toContain("models/gemini-test:generateContent?key=test-secret");
    const body = sentBody(fetchMock);
    expect(body.systemInstruction).toEqual({ parts: [{ text: "S" }] });
    expect(body.toolConfig).toEqual({ functionCallingConfig: { mode: "AUTO" } });
    expect(body.contents).toEqual([
      { role: "user", parts: [{ text: "hi" }] },
      {
        role: "model",
        parts: [
          { functionCall: { name: "create_component", args: {} } },
          { functionCall: { name: "create_study", args: { name: "s" } } },
        ],
      },
      {
        role: "user",
        parts: [
          { functionResponse: { name: "create_component", response: { content: "ok1" } } },
          { functionResponse: { name: "create_study", response: { content: "ok2" } } },
        ],
      },
    ]);
    expect(body.tools).toEqual([
      {
        functionDeclarations: [
          {
            name: "create_study",
            description: "Add a study",
            parameters: { type: "object", properties: { name: { type: "string" } }, required: ["name"] },
          },
        ],
      },
    ]);
  });

  it("parses function calls", async () => {
    stubFetch(200, {
      candidates: [{ content: { parts: [{ functionCall: { name: "create_study", args: { name: "std1" } } }] } }],
    });

    const response = await adapter.complete(turns, tools);

    const [invocation] = response.turn.toolInvocations;
    expect(invocation.toolName).toBe("create_study");
    expect(invocation.arguments).toEqual({ name: "std1" });
    expect(invocation.id).toMatch(/^gemini_\d+_/);
  });
});

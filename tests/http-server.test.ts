import type http from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createHttpServer } from "../src/channels/http-server.js";
import type { Turn } from "../src/core/conversation.js";
import { ModelCallError } from "../src/core/errors.js";

const transcript: Turn[] = [
  { role: "system", content: "ctx" },
  { role: "user", content: "hi" },
  { role: "assistant", content: "echo: hi", toolInvocations: [] },
];

let server: http.Server;
let baseUrl: string;
const send = vi.fn(async (message: string) => `echo: ${message}`);

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  send.mockClear();
  server = createHttpServer({ send, transcript: () => transcript }, { maxBodyBytes: 64 });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function post(path: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("HTTP server", () => {
  it("answers a chat message", async () => {
    const res = await post("/api/chat", JSON.stringify({ message: "hi" }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ content: "echo: hi" });
    expect(send).toHaveBeenCalledWith("hi");
  });

  it("rejects a request without a message", async () => {
    const res = await post("/api/chat", JSON.stringify({ text: "hi" }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No message provided" });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await post("/api/chat", "message=hi");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("returns empty content for a blank message", async () => {
    const res = await post("/api/chat", JSON.stringify({ message: "   " }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ content: "" });
    expect(send).not.toHaveBeenCalled();
  });

  it("accepts a body at the size limit and rejects one past it", async () => {
    const atLimit = JSON.stringify({ message: "x".repeat(50) });
    expect(atLimit.length).toBe(64);
    const ok = await post("/api/chat", atLimit);
    expect(ok.status).toBe(200);
    expect(await ok.json()).toEqual({ content: `echo: ${"x".repeat(50)}` });

    send.mockClear();
    const tooLarge = await post("/api/chat", JSON.stringify({ message: "x".repeat(51) }));
    expect(tooLarge.status).toBe(413);
    expect(await tooLarge.json()).toEqual({ error: "Request body exceeds 64 bytes" });
    expect(send).not.toHaveBeenCalled();
  });

  it("reports a failed turn as a server error", async () => {
    send.mockRejectedValueOnce(new ModelCallError("network down"));
    const res = await post("/api/chat", JSON.stringify({ message: "hi" }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "network down" });
  });

  it("serves the transcript and health", async () => {
    expect(await (await fetch(`${baseUrl}/api/transcript`)).json()).toEqual({ turns: transcript });
    expect(await (await fetch(`${baseUrl}/health`)).json()).toEqual({ ok: true });
  });

  it("returns 404 for unknown routes", async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });
});

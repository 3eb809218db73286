// ============================================
// HTTP Chat Server
// ============================================
//
// POST /api/chat        {message} → {content} | {error}; 413 past the body limit
// GET  /api/transcript  the conversation so far
// GET  /health          liveness
//
// Turns are serialized by the agent's lock, so overlapping requests
// queue rather than interleave against the engine session.
// ============================================

import http from "node:http";
import { z } from "zod";
import type { ModelAgent } from "../core/agent.js";
import { errorMessage } from "../types.js";

export type ChatBackend = Pick<ModelAgent, "send" | "transcript">;

const chatRequestSchema = z.object({
  message: z.string().optional(),
});

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/** Largest accepted request body, in bytes. */
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface HttpServerOptions {
  maxBodyBytes?: number;
}

/**
 * Read the whole body. Past `limit` bytes the rest is drained and dropped,
 * and the result is undefined.
 */
async function readBody(req: http.IncomingMessage, limit: number): Promise<string | undefined> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= limit) chunks.push(buffer);
  }
  return size > limit ? undefined : Buffer.concat(chunks).toString("utf-8");
}

async function handleChat(
  agent: ChatBackend,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  maxBodyBytes: number,
): Promise<void> {
  const body = await readBody(req, maxBodyBytes);
  if (body === undefined) {
    sendJson(res, 413, { error: `Request body exceeds ${maxBodyBytes} bytes` });
    return;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    sendJson(res, 400, { error: "Invalid JSON body" });
    return;
  }

  const parsed = chatRequestSchema.safeParse(payload);
  if (!parsed.success || parsed.data.message === undefined) {
    sendJson(res, 400, { error: "No message provided" });
    return;
  }

  const message = parsed.data.message.trim();
  if (!message) {
    sendJson(res, 200, { content: "" });
    return;
  }

  try {
    const content = await agent.send(message);
    sendJson(res, 200, { content });
  } catch (err) {
    console.error("[HTTP] Chat turn failed:", errorMessage(err));
    sendJson(res, 500, { error: errorMessage(err) });
  }
}

export function createHttpServer(agent: ChatBackend, options: HttpServerOptions = {}): http.Server {
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  return http.createServer(async (req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/health" && req.method === "GET") {
      sendJson(res, 200, { ok: true });
      return;
    }

    if (url.pathname === "/api/transcript" && req.method === "GET") {
      sendJson(res, 200, { turns: agent.transcript() });
      return;
    }

    if (url.pathname === "/api/chat" && req.method === "POST") {
      await handleChat(agent, req, res, maxBodyBytes);
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  });
}

/** Start listening; resolves once the port is bound. */
export function startHttpServer(
  agent: ChatBackend,
  host: string,
  port: number,
  options: HttpServerOptions = {},
): Promise<http.Server> {
  const server = createHttpServer(agent, options);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      console.log(`[HTTP] Listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}

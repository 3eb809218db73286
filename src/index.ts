#!/usr/bin/env node
// ============================================
// ModelPilot — Entry Point
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { startHttpServer } from "./channels/http-server.js";
import { runTerminal } from "./channels/terminal.js";
import { loadConfig, type ModelPilotConfig } from "./config/config.js";
import { ModelAgent } from "./core/agent.js";
import { createLLMAdapter } from "./core/llm-adapter.js";
import { EngineSessionHolder } from "./core/session-holder.js";
import { EngineBridgeClient } from "./engine/bridge-client.js";
import { InMemoryEngine } from "./engine/memory-engine.js";
import type { EngineClient } from "./engine/types.js";
import { createToolRegistry } from "./tools/index.js";
import { errorMessage } from "./types.js";

// ---- Package info ----

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PKG_PATH = path.resolve(__dirname, "../package.json");

function getVersion(): string {
  try {
    const pkg = z.object({ version: z.string() }).safeParse(
      JSON.parse(fs.readFileSync(PKG_PATH, "utf-8")),
    );
    return pkg.success ? pkg.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

// ---- ASCII banner ----

const BANNER = `
  __  __           _      _ ____  _ _       _
 |  \\/  | ___   __| | ___| |  _ \\(_) | ___ | |_
 | |\\/| |/ _ \\ / _\` |/ _ \\ | |_) | | |/ _ \\| __|
 | |  | | (_) | (_| |  __/ |  __/| | | (_) | |_
 |_|  |_|\\___/ \\__,_|\\___|_|_|   |_|_|\\___/ \\__|
`;

function printBanner(): void {
  console.log(BANNER);
  console.log(`  Conversational driver for simulation models  v${getVersion()}`);
  console.log();
}

// ---- Wiring ----

function createEngine(config: ModelPilotConfig): EngineClient {
  if (config.engineUrl) {
    console.log(`[ModelPilot] Engine: bridge at ${config.engineUrl}`);
    return new EngineBridgeClient(config.engineUrl);
  }
  console.warn("[ModelPilot] No ENGINE_URL set — using the in-memory engine.");
  return new InMemoryEngine();
}

/** Open the startup model. A failure leaves the agent without a session. */
async function openInitialModel(
  engine: EngineClient,
  holder: EngineSessionHolder,
  config: ModelPilotConfig,
): Promise<void> {
  try {
    const session = config.modelPath
      ? await engine.loadModel(config.modelPath)
      : await engine.createModel(config.modelName);
    await holder.replace(session);
    console.log(
      `[ModelPilot] Model "${await session.name()}" ready` +
        (config.modelPath ? ` (loaded from ${config.modelPath})` : ""),
    );
  } catch (err) {
    console.error(`[ModelPilot] Could not open the startup model: ${errorMessage(err)}`);
  }
}

async function createAgent(config: ModelPilotConfig): Promise<ModelAgent> {
  console.log(`[ModelPilot] LLM: ${config.llmProvider} / ${config.llmModel}`);

  const engine = createEngine(config);
  const holder = new EngineSessionHolder();
  await openInitialModel(engine, holder, config);

  return ModelAgent.create({
    llm: createLLMAdapter(config.llmProvider, config.llmApiKey, config.llmModel),
    registry: createToolRegistry({ engine, maxResultChars: config.maxToolResultChars }),
    holder,
  });
}

// ---- Commands ----

async function runChat(): Promise<void> {
  dotenvConfig();
  printBanner();
  const agent = await createAgent(loadConfig());
  await runTerminal(agent);
  console.log("[ModelPilot] Bye.");
}

async function runServe(): Promise<void> {
  dotenvConfig();
  printBanner();
  const config = loadConfig();
  const agent = await createAgent(config);
  const server = await startHttpServer(agent, config.httpHost, config.httpPort, {
    maxBodyBytes: config.httpMaxBodyBytes,
  });

  const shutdown = () => {
    console.log("[ModelPilot] Shutting down...");
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function runTools(): void {
  printBanner();
  const registry = createToolRegistry({ engine: new InMemoryEngine() });
  const definitions = registry.definitions();
  console.log(`${definitions.length} tool(s):\n`);
  for (const def of definitions) {
    console.log(`  ${def.name}`);
    console.log(`    ${def.description}`);
  }
  console.log();
}

// ---- CLI dispatch ----

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0]?.toLowerCase();

  switch (command) {
    case undefined:
    case "chat":
      await runChat();
      break;

    case "serve":
      await runServe();
      break;

    case "tools":
      runTools();
      break;

    case "version":
    case "--version":
    case "-v":
      console.log(`modelpilot v${getVersion()}`);
      break;

    case "help":
    case "--help":
    case "-h":
      printBanner();
      console.log("Usage:");
      console.log("  modelpilot [chat]   Chat with the model in the terminal");
      console.log("  modelpilot serve    Serve the chat over HTTP");
      console.log("  modelpilot tools    List the available tools");
      console.log("  modelpilot version  Show version");
      console.log("  modelpilot help     Show this help message");
      console.log();
      break;

    default:
      console.error(`Unknown command "${command}". Run "modelpilot help".`);
      process.exitCode = 1;
      break;
  }
}

main().catch((err) => {
  console.error("[ModelPilot] Fatal error:", err);
  process.exit(1);
});

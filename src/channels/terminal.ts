// ============================================
// Terminal Chat — interactive REPL
// ============================================

import * as readline from "node:readline";
import type { ModelAgent } from "../core/agent.js";
import { errorMessage } from "../types.js";

export type TerminalBackend = Pick<ModelAgent, "send">;

export interface TerminalIO {
  input: NodeJS.ReadableStream;
  output: { write(text: string): unknown };
}

const EXIT_WORDS = new Set(["quit", "exit"]);
const PROMPT = "You: ";

/**
 * Read one line per cycle and print the reply. A failed turn prints
 * `Error: ...` and the prompt comes back. Resolves on quit/exit or EOF.
 */
export async function runTerminal(
  agent: TerminalBackend,
  io: TerminalIO = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const rl = readline.createInterface({ input: io.input, terminal: false });
  const println = (line: string) => io.output.write(`${line}\n`);

  println('Type "quit" or "exit" to leave.');
  io.output.write(PROMPT);

  try {
    for await (const line of rl) {
      const text = line.trim();
      if (EXIT_WORDS.has(text.toLowerCase())) break;

      if (text) {
        try {
          println(`Assistant: ${await agent.send(text)}`);
        } catch (err) {
          println(`Error: ${errorMessage(err)}`);
        }
      }
      io.output.write(PROMPT);
    }
  } finally {
    rl.close();
  }
}

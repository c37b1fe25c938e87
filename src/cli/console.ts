/**
 * @fileoverview Interactive console: one line in, one answer out, until
 * the user says goodbye or input ends.
 * @module src/cli/console
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { ResearchAgent } from "../agent/researchAgent.js";
import { config } from "../config/index.js";
import { logger, requestContextService } from "../utils/index.js";

const EXIT_COMMANDS = new Set(["quit", "exit", "bye"]);

const EXAMPLES = [
  "Show papers by Dr. Jane Doe",
  "Research papers of Dr. John Smith",
  "Get details for paper ID 37635766",
  "Tell me about paper 37635766",
  'Find the paper titled "Cavity architecture of enzyme complexes"',
];

export interface ConsoleOptions {
  input?: Readable;
  output?: Writable;
  prompt?: string;
}

export function isExitCommand(line: string): boolean {
  return EXIT_COMMANDS.has(line.trim().toLowerCase());
}

export function banner(mode: ResearchAgent["mode"]): string {
  return [
    `${config.appName} v${config.appVersion}`,
    "=".repeat(40),
    mode === "model"
      ? "Ask about PubMed papers in plain language."
      : "No language model configured; using built-in request patterns.",
    "Examples:",
    ...EXAMPLES.map((example) => `  - ${example}`),
    "",
    "Type 'quit' to exit.",
    "",
  ].join("\n");
}

/**
 * Runs the read-answer loop. Resolves with the number of answered turns
 * once an exit command is read or the input ends.
 */
export async function runConsole(
  agent: ResearchAgent,
  options: ConsoleOptions = {},
): Promise<number> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const prompt = options.prompt ?? "You: ";
  const context = requestContextService.createRequestContext({
    operation: "runConsole",
    mode: agent.mode,
  });

  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  output.write(`${banner(agent.mode)}\n${prompt}`);

  let turns = 0;
  try {
    for await (const line of rl) {
      if (isExitCommand(line)) {
        output.write("Goodbye!\n");
        break;
      }
      if (line.trim()) {
        const answer = await agent.handle(line);
        turns += 1;
        output.write(`\nAgent: ${answer}\n\n`);
      }
      output.write(prompt);
    }
  } finally {
    rl.close();
  }

  logger.info("Console session ended.", { ...context, turns });
  return turns;
}

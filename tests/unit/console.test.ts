import { Readable, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { ResearchAgent } from "../../src/agent/researchAgent.js";
import { banner, isExitCommand, runConsole } from "../../src/cli/console.js";
import { config } from "../../src/config/index.js";
import { ResultCache } from "../../src/services/cache/resultCache.js";
import { PubMedClient } from "../../src/services/pubmed/pubmedClient.js";
import { FakeEUtilities } from "../helpers/fakes.js";

class Collector extends Writable {
  public text = "";

  override _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += String(chunk);
    callback();
  }
}

function directAgent(): ResearchAgent {
  const eutils = new FakeEUtilities({}, { "37635766": { title: "Cavity paper" } });
  const client = new PubMedClient(eutils);
  return new ResearchAgent({ client, cache: new ResultCache({ maxEntries: 5, ttlMs: 0 }) });
}

describe("console", () => {
  it("recognizes exit commands regardless of case", () => {
    expect(isExitCommand(" QUIT ")).toBe(true);
    expect(isExitCommand("bye")).toBe(true);
    expect(isExitCommand("exit")).toBe(true);
    expect(isExitCommand("quit now")).toBe(false);
  });

  it("names the app and the mode in the banner", () => {
    const text = banner("direct");
    expect(text.startsWith(`${config.appName} v${config.appVersion}\n`)).toBe(true);
    expect(text).toContain("No language model configured; using built-in request patterns.");
  });

  it("answers each line and stops at an exit command", async () => {
    const output = new Collector();

    const turns = await runConsole(directAgent(), {
      input: Readable.from(["\n", "Tell me about paper 37635766\n", "bye\n", "papers by Nobody\n"]),
      output,
      prompt: "> ",
    });

    expect(turns).toBe(1);
    expect(output.text).toContain("\nAgent: Paper ID: 37635766\nTitle: Cavity paper\n\n> ");
    expect(output.text.endsWith("> Goodbye!\n")).toBe(true);
  });

  it("stops at the end of input", async () => {
    const output = new Collector();

    const turns = await runConsole(directAgent(), {
      input: Readable.from(["Tell me about paper 37635766\n"]),
      output,
    });

    expect(turns).toBe(1);
  });
});

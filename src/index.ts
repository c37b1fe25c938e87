#!/usr/bin/env node
/**
 * @fileoverview Entry point. Starts the interactive console by default, or
 * the MCP stdio server with `--mcp` / `AGENT_MODE=mcp`.
 * @module src/index
 */

import { ResearchAgent } from "./agent/researchAgent.js";
import { createChatModel } from "./agent/llm/llmClient.js";
import { runConsole } from "./cli/console.js";
import { config, environment } from "./config/index.js";
import { startMcpServer } from "./mcp-server/server.js";
import { ResultCache } from "./services/cache/resultCache.js";
import { PubMedClient } from "./services/pubmed/pubmedClient.js";
import { ErrorHandler, logger, requestContextService } from "./utils/index.js";

async function main(): Promise<void> {
  const mode = process.argv.includes("--mcp") ? "mcp" : config.agentMode;

  // Stdout belongs to the protocol in MCP mode; the console transport
  // otherwise only shows up when debugging.
  logger.initialize(config.logLevel, {
    console: mode === "console" && config.logLevel === "debug",
  });
  requestContextService.configure({
    appName: config.appName,
    appVersion: config.appVersion,
    environment,
  });

  const context = requestContextService.createRequestContext({
    operation: "main",
    mode,
  });
  logger.info(`Starting ${config.appName} v${config.appVersion}.`, context);

  if (mode === "mcp") {
    await startMcpServer();
    return;
  }

  const model = createChatModel();
  if (!model) {
    logger.warning(
      "No LLM_API_KEY or GROQ_API_KEY set; answering with built-in request patterns.",
      context,
    );
  }
  const agent = new ResearchAgent({
    client: new PubMedClient(),
    cache: new ResultCache(),
    model,
  });
  await runConsole(agent);
}

main().catch((error: unknown) => {
  ErrorHandler.handleError(error, {
    operation: "main",
    critical: true,
  });
  process.stderr.write(`Fatal: ${ErrorHandler.getErrorMessage(error)}\n`);
  process.exit(1);
});

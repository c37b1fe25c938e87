/**
 * @fileoverview MCP server mode: exposes the research lookups to MCP
 * clients over stdio.
 *
 * 1. Creates the `McpServer` with the package identity.
 * 2. Registers the lookup tools against a shared `ToolRouter`.
 * 3. Connects the stdio transport.
 * @module src/mcp-server/server
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { config } from "../config/index.js";
import { ToolRouter } from "../agent/tools/toolRouter.js";
import { ResultCache } from "../services/cache/resultCache.js";
import { PubMedClient } from "../services/pubmed/pubmedClient.js";
import { logger, requestContextService } from "../utils/index.js";
import { registerResearchTools } from "./tools/researchTools/index.js";
import { startStdioTransport } from "./transports/stdioTransport.js";

/**
 * A server with the lookup tools registered. Omitting `router` wires one
 * to the live NCBI service.
 */
export async function createMcpServerInstance(
  router: ToolRouter = new ToolRouter(new PubMedClient(), new ResultCache()),
): Promise<McpServer> {
  const context = requestContextService.createRequestContext({
    operation: "createMcpServerInstance",
  });
  logger.info("Initializing MCP server instance", context);

  const server = new McpServer(
    { name: config.appName, version: config.appVersion },
    { capabilities: { logging: {}, tools: { listChanged: true } } },
  );
  await registerResearchTools(server, router);
  return server;
}

export async function startMcpServer(): Promise<McpServer> {
  const context = requestContextService.createRequestContext({
    operation: "startMcpServer",
  });
  const server = await createMcpServerInstance();
  await startStdioTransport(server, context);
  logger.info("MCP server started.", context);
  return server;
}

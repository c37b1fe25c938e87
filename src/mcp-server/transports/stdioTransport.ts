/**
 * @fileoverview Connects an MCP server to stdin/stdout. Stdout carries
 * protocol messages only, so nothing else may write to it in this mode.
 * @module src/mcp-server/transports/stdioTransport
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BaseErrorCode } from "../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  type RequestContext,
} from "../../utils/index.js";

export async function startStdioTransport(
  server: McpServer,
  parentContext: RequestContext,
): Promise<void> {
  const context = { ...parentContext, operation: "startStdioTransport" };
  logger.debug("Connecting stdio transport.", context);

  await ErrorHandler.tryCatch(
    async () => {
      const transport = new StdioServerTransport();
      await server.connect(transport);
      logger.info("MCP server connected over stdio.", context);
    },
    {
      operation: "startStdioTransport",
      context,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}

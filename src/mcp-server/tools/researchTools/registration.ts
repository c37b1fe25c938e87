/**
 * @fileoverview Registers the three PubMed lookups with an MCP server. Each
 * handler delegates to the shared `ToolRouter`, so MCP clients and the
 * console agent see the same results, cache writes included.
 * @module src/mcp-server/tools/researchTools/registration
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import {
  GetPaperDetailsArgsSchema,
  SearchPaperByTitleArgsSchema,
  SearchPapersByAuthorArgsSchema,
  TOOL_SPECS,
  type ToolCall,
  type ToolName,
  ToolRouter,
} from "../../../agent/tools/toolRouter.js";
import { BaseErrorCode } from "../../../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";

function descriptionOf(name: ToolName): string {
  return TOOL_SPECS.find((spec) => spec.name === name)?.description ?? name;
}

/**
 * Runs one call and wraps the outcome as a tool result. Failures become
 * `isError` results carrying `{ error: { code, message, details } }`.
 */
export async function runToolForMcp(
  router: ToolRouter,
  call: ToolCall,
  parentContext: RequestContext,
): Promise<CallToolResult> {
  const context = requestContextService.createRequestContext({
    parentRequestId: parentContext.requestId,
    operation: "mcpToolHandler",
    toolName: call.name,
  });
  try {
    const result = await router.execute(call, context);
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
      isError: false,
    };
  } catch (error) {
    const handled = ErrorHandler.handleError(error, {
      operation: `mcpToolHandler:${call.name}`,
      context,
      input: call.args,
    });
    return {
      content: [
        {
          type: "text",
          text: JSON.stringify({
            error: {
              code: handled.code,
              message: handled.message,
              details: handled.details,
            },
          }),
        },
      ],
      isError: true,
    };
  }
}

export async function registerResearchTools(
  server: McpServer,
  router: ToolRouter,
): Promise<void> {
  const operation = "registerResearchTools";
  const context = requestContextService.createRequestContext({ operation });

  await ErrorHandler.tryCatch(
    () => {
      // Keep registrations in alphabetical order.
      server.registerTool(
        "get_paper_details",
        {
          title: "Get paper details",
          description: descriptionOf("get_paper_details"),
          inputSchema: GetPaperDetailsArgsSchema.shape,
        },
        (args) =>
          runToolForMcp(router, { name: "get_paper_details", args }, context),
      );
      server.registerTool(
        "search_paper_by_title",
        {
          title: "Search paper by title",
          description: descriptionOf("search_paper_by_title"),
          inputSchema: SearchPaperByTitleArgsSchema.shape,
        },
        (args) =>
          runToolForMcp(router, { name: "search_paper_by_title", args }, context),
      );
      server.registerTool(
        "search_papers_by_author",
        {
          title: "Search papers by author",
          description: descriptionOf("search_papers_by_author"),
          inputSchema: SearchPapersByAuthorArgsSchema.shape,
        },
        (args) =>
          runToolForMcp(router, { name: "search_papers_by_author", args }, context),
      );
      logger.notice("Research tools registered.", {
        ...context,
        tools: TOOL_SPECS.map((spec) => spec.name),
      });
    },
    {
      operation,
      context,
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
      critical: true,
    },
  );
}

/**
 * @fileoverview The closed set of lookup tools offered to the language model.
 *
 * A model-proposed call is parsed into the `ToolCall` union before anything
 * runs: names outside the set raise `UNRECOGNIZED_TOOL`, and arguments are
 * validated with the tool's Zod schema (`VALIDATION_ERROR`).
 * @module src/agent/tools/toolRouter
 */

import { z } from "zod";
import { config } from "../../config/index.js";
import { ResultCache } from "../../services/cache/resultCache.js";
import { PubMedClient } from "../../services/pubmed/pubmedClient.js";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import type {
  AuthorSearchResult,
  PaperRecord,
} from "../../types-global/paperRecord.js";
import {
  ErrorHandler,
  logger,
  measureToolExecution,
  normalizeAuthorName,
  type RequestContext,
  requestContextService,
} from "../../utils/index.js";

export const SearchPapersByAuthorArgsSchema = z.object({
  author_name: z
    .string()
    .trim()
    .min(1, "author_name must not be empty")
    .describe("Full name of the author, e.g. \"Jane Doe\". Titles such as Dr. are ignored."),
});

export const SearchPaperByTitleArgsSchema = z.object({
  title: z
    .string()
    .trim()
    .min(1, "title must not be empty")
    .describe("The paper title, or as much of it as is known."),
});

export const GetPaperDetailsArgsSchema = z.object({
  paper_id: z
    .string()
    .trim()
    .regex(/^\d+$/, "Paper IDs must be numeric.")
    .describe("Numeric PubMed identifier (PMID), e.g. \"37635766\"."),
});

export type ToolCall =
  | {
      name: "search_papers_by_author";
      args: z.infer<typeof SearchPapersByAuthorArgsSchema>;
    }
  | {
      name: "search_paper_by_title";
      args: z.infer<typeof SearchPaperByTitleArgsSchema>;
    }
  | {
      name: "get_paper_details";
      args: z.infer<typeof GetPaperDetailsArgsSchema>;
    };

export type ToolName = ToolCall["name"];

export type ToolResult =
  | ({
      tool: "search_papers_by_author";
      /** The normalized name searched for; also the result-cache key. */
      query: string;
    } & AuthorSearchResult)
  | { tool: "search_paper_by_title"; query: string; paper?: PaperRecord }
  | { tool: "get_paper_details"; paperId: string; paper?: PaperRecord };

/** Tool declaration handed to the language model. */
export interface ToolSpec {
  name: ToolName;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, { type: "string"; description: string }>;
    required: string[];
  };
}

function singleStringArgument(
  name: ToolName,
  description: string,
  schema: z.AnyZodObject,
): ToolSpec {
  const [argumentName, argumentSchema] = Object.entries(schema.shape)[0] ?? [];
  if (!argumentName || !(argumentSchema instanceof z.ZodType)) {
    throw new McpError(
      BaseErrorCode.INITIALIZATION_FAILED,
      `Tool '${name}' must declare exactly one argument.`,
    );
  }
  return {
    name,
    description,
    parameters: {
      type: "object",
      properties: {
        [argumentName]: {
          type: "string",
          description: argumentSchema.description ?? argumentName,
        },
      },
      required: [argumentName],
    },
  };
}

export const TOOL_SPECS: readonly ToolSpec[] = [
  singleStringArgument(
    "search_papers_by_author",
    "Search PubMed for papers written by a specific author. Returns the number of matches and the PubMed IDs of the most relevant papers.",
    SearchPapersByAuthorArgsSchema,
  ),
  singleStringArgument(
    "search_paper_by_title",
    "Find a single paper by its title and return its details (authors, journal, year, DOI, abstract).",
    SearchPaperByTitleArgsSchema,
  ),
  singleStringArgument(
    "get_paper_details",
    "Get details (title, authors, journal, year, DOI, abstract) of one paper by its numeric PubMed ID.",
    GetPaperDetailsArgsSchema,
  ),
];

function parseArguments(
  toolName: string,
  rawArguments: string | Record<string, unknown>,
): unknown {
  if (typeof rawArguments !== "string") {
    return rawArguments;
  }
  const trimmed = rawArguments.trim();
  if (!trimmed) {
    return {};
  }
  try {
    return JSON.parse(trimmed);
  } catch (error) {
    throw new McpError(
      BaseErrorCode.VALIDATION_ERROR,
      `Malformed arguments for tool '${toolName}'.`,
      { toolName, reason: ErrorHandler.getErrorMessage(error) },
    );
  }
}

function validate<T extends z.AnyZodObject>(
  schema: T,
  toolName: ToolName,
  args: unknown,
): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new McpError(
      BaseErrorCode.VALIDATION_ERROR,
      `Invalid arguments for tool '${toolName}': ${ErrorHandler.getErrorMessage(parsed.error)}`,
      { toolName },
    );
  }
  return parsed.data;
}

export interface ToolRouterOptions {
  maxAuthorResults?: number;
}

export class ToolRouter {
  private readonly maxAuthorResults: number;

  constructor(
    private readonly client: PubMedClient,
    private readonly cache: ResultCache,
    options: ToolRouterOptions = {},
  ) {
    this.maxAuthorResults = options.maxAuthorResults ?? config.agentMaxAuthorResults;
  }

  public listTools(): readonly ToolSpec[] {
    return TOOL_SPECS;
  }

  /**
   * Turns a proposed call (name plus JSON or object arguments) into a
   * validated `ToolCall`.
   * @throws {McpError} `UNRECOGNIZED_TOOL` or `VALIDATION_ERROR`.
   */
  public parseToolCall(
    name: string,
    rawArguments: string | Record<string, unknown>,
  ): ToolCall {
    const toolName = name.trim();
    switch (toolName) {
      case "search_papers_by_author":
        return {
          name: toolName,
          args: validate(
            SearchPapersByAuthorArgsSchema,
            toolName,
            parseArguments(toolName, rawArguments),
          ),
        };
      case "search_paper_by_title":
        return {
          name: toolName,
          args: validate(
            SearchPaperByTitleArgsSchema,
            toolName,
            parseArguments(toolName, rawArguments),
          ),
        };
      case "get_paper_details":
        return {
          name: toolName,
          args: validate(
            GetPaperDetailsArgsSchema,
            toolName,
            parseArguments(toolName, rawArguments),
          ),
        };
      default:
        throw new McpError(
          BaseErrorCode.UNRECOGNIZED_TOOL,
          `Unknown tool: ${toolName}`,
          { toolName },
        );
    }
  }

  /**
   * Runs a validated call. The author search is the only call with a side
   * effect: it stores the identifiers in the result cache.
   */
  public async execute(
    call: ToolCall,
    parentContext: RequestContext,
  ): Promise<ToolResult> {
    const context = {
      ...requestContextService.createRequestContext({
        parentRequestId: parentContext.requestId,
        operation: "ToolRouter.execute",
      }),
      toolName: call.name,
    };
    logger.info(`Executing tool ${call.name}`, { ...context, args: call.args });

    return measureToolExecution(() => this.dispatch(call, context), context);
  }

  /** `parseToolCall` followed by `execute`. */
  public async invoke(
    name: string,
    rawArguments: string | Record<string, unknown>,
    context: RequestContext,
  ): Promise<ToolResult> {
    return this.execute(this.parseToolCall(name, rawArguments), context);
  }

  private async dispatch(
    call: ToolCall,
    context: RequestContext,
  ): Promise<ToolResult> {
    switch (call.name) {
      case "search_papers_by_author": {
        const author = normalizeAuthorName(call.args.author_name);
        if (!author) {
          throw new McpError(
            BaseErrorCode.VALIDATION_ERROR,
            "Please provide an author name to search for.",
            { toolName: call.name },
          );
        }
        const result = await this.client.searchAuthor(
          author,
          context,
          this.maxAuthorResults,
        );
        this.cache.remember(author, result.ids);
        return { tool: call.name, query: author, ...result };
      }
      case "search_paper_by_title": {
        const paper = await this.client.searchByTitle(call.args.title, context);
        return { tool: call.name, query: call.args.title, paper };
      }
      case "get_paper_details": {
        const [paper] = await this.client.fetchDetails([call.args.paper_id], context);
        return { tool: call.name, paperId: call.args.paper_id, paper };
      }
    }
  }
}

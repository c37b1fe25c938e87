/**
 * @fileoverview The conversational loop. One user message in, one text
 * reply out; along the way the agent asks the language model (or, without
 * one, the rule-based classifier) which lookup to run, runs at most one,
 * and composes the answer.
 *
 * `handle` never rejects: every failure becomes a short message and the
 * agent returns to `Idle`.
 * @module src/agent/researchAgent
 */

import { config } from "../config/index.js";
import { ResultCache } from "../services/cache/resultCache.js";
import { PubMedClient } from "../services/pubmed/pubmedClient.js";
import { BaseErrorCode, McpError } from "../types-global/errors.js";
import {
  ErrorHandler,
  logger,
  normalizeAuthorName,
  type RequestContext,
  requestContextService,
} from "../utils/index.js";
import {
  classifyIntent,
  detectPaperIdRequest,
  parseMoreRequest,
} from "./intentClassifier.js";
import type { ChatMessage, ChatModel } from "./llm/llmClient.js";
import {
  formatErrorMessage,
  formatPaperList,
  formatToolResult,
  HELP_MESSAGE,
  NOT_UNDERSTOOD_MESSAGE,
  SEPARATOR,
} from "./responseFormatter.js";
import { type ToolResult, ToolRouter } from "./tools/toolRouter.js";

export type AgentState =
  | "Idle"
  | "AwaitingModelDecision"
  | "ExecutingTool"
  | "ComposingResponse";

export const EMPTY_INPUT_MESSAGE =
  "Please ask a question, for example \"Show papers by Jane Doe\".";

const SYSTEM_PROMPT = [
  "You are a research assistant with access to PubMed.",
  "Use search_papers_by_author to find papers by a person, search_paper_by_title to find a paper by its title, and get_paper_details for a numeric PubMed ID.",
  "Call at most one tool per message. Answer from the tool results only; do not invent papers, identifiers or DOIs.",
  "Keep answers short and list PubMed IDs when you mention papers.",
].join(" ");

export interface ResearchAgentOptions {
  client: PubMedClient;
  cache: ResultCache;
  router?: ToolRouter;
  /** Omit to run in direct mode. */
  model?: ChatModel;
  pageSize?: number;
  historyLimit?: number;
}

interface PagingCursor {
  authorKey: string;
  shown: number;
}

type ToolOutcome =
  | { ok: true; result: ToolResult; text: string }
  | { ok: false; error: McpError; text: string };

export class ResearchAgent {
  private readonly client: PubMedClient;
  private readonly cache: ResultCache;
  private readonly router: ToolRouter;
  private readonly model?: ChatModel;
  private readonly pageSize: number;
  private readonly historyLimit: number;

  private currentState: AgentState = "Idle";
  private history: ChatMessage[] = [];
  private cursor?: PagingCursor;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: ResearchAgentOptions) {
    this.client = options.client;
    this.cache = options.cache;
    this.router = options.router ?? new ToolRouter(options.client, options.cache);
    this.model = options.model;
    this.pageSize = Math.max(1, options.pageSize ?? config.agentPageSize);
    this.historyLimit = Math.max(0, options.historyLimit ?? config.agentHistoryLimit);
  }

  public get state(): AgentState {
    return this.currentState;
  }

  public get mode(): "model" | "direct" {
    return this.model ? "model" : "direct";
  }

  /** Answers one user message. Calls made while a turn is running wait for it. */
  public handle(userText: string): Promise<string> {
    const turn = this.pending.then(() => this.runTurn(userText));
    this.pending = turn;
    return turn;
  }

  private async runTurn(userText: string): Promise<string> {
    const text = userText.trim();
    if (!text) {
      return EMPTY_INPUT_MESSAGE;
    }

    const context = requestContextService.createRequestContext({
      operation: "ResearchAgent.handle",
      mode: this.mode,
    });
    logger.info("Handling user message.", { ...context, length: text.length });

    let reply: string;
    try {
      reply = await this.respond(text, context);
    } catch (error) {
      const handled = ErrorHandler.handleError(error, {
        operation: "ResearchAgent.handle",
        context,
        input: { text },
      });
      reply = formatErrorMessage(handled);
    } finally {
      this.transition("Idle", context);
    }

    this.appendHistory({ role: "user", content: text }, { role: "assistant", content: reply });
    return reply;
  }

  private async respond(text: string, context: RequestContext): Promise<string> {
    const paperId = detectPaperIdRequest(text);
    if (paperId) {
      logger.debug("Paper ID request detected.", { ...context, paperId });
      return this.runDirect("get_paper_details", { paper_id: paperId }, context);
    }

    const followUp = parseMoreRequest(text);
    if (followUp) {
      const page = await this.tryNextPage(followUp.author, context);
      if (page !== undefined) {
        return page;
      }
    }

    return this.model
      ? this.respondWithModel(this.model, text, context)
      : this.respondDirectly(text, context);
  }

  private async respondDirectly(text: string, context: RequestContext): Promise<string> {
    const intent = classifyIntent(text);
    if (!intent) {
      this.transition("ComposingResponse", context);
      return HELP_MESSAGE;
    }
    return this.runDirect(intent.name, intent.args, context);
  }

  private async runDirect(
    name: string,
    args: Record<string, unknown>,
    context: RequestContext,
  ): Promise<string> {
    this.transition("ExecutingTool", context);
    const outcome = await this.runTool(name, args, context);
    this.transition("ComposingResponse", context);
    return this.withFirstPage(outcome.text, outcome, context);
  }

  private async respondWithModel(
    model: ChatModel,
    text: string,
    context: RequestContext,
  ): Promise<string> {
    const tools = this.router.listTools();
    const messages: ChatMessage[] = [
      { role: "system", content: SYSTEM_PROMPT },
      ...this.history,
      { role: "user", content: text },
    ];

    this.transition("AwaitingModelDecision", context);
    const decision = await model.complete(messages, tools, context);
    const [toolCall, ...ignored] = decision.toolCalls;
    if (!toolCall) {
      this.transition("ComposingResponse", context);
      return decision.content?.trim() || NOT_UNDERSTOOD_MESSAGE;
    }
    if (ignored.length > 0) {
      logger.warning("Model proposed several tool calls; running only the first.", {
        ...context,
        ignored: ignored.map((call) => call.name),
      });
    }

    this.transition("ExecutingTool", context);
    const outcome = await this.runTool(toolCall.name, toolCall.arguments, context);
    if (!outcome.ok && outcome.error.code === BaseErrorCode.UNRECOGNIZED_TOOL) {
      this.transition("ComposingResponse", context);
      return outcome.text;
    }

    messages.push(
      { role: "assistant", content: decision.content, toolCalls: [toolCall] },
      {
        role: "tool",
        toolCallId: toolCall.id,
        content: outcome.ok ? JSON.stringify(outcome.result) : `Error: ${outcome.text}`,
      },
    );

    this.transition("AwaitingModelDecision", context);
    let composed: string | undefined;
    try {
      const final = await model.complete(messages, [], context);
      composed = final.content?.trim() || undefined;
    } catch (error) {
      ErrorHandler.handleError(error, {
        operation: "ResearchAgent.composeAnswer",
        context,
      });
    }

    this.transition("ComposingResponse", context);
    return this.withFirstPage(composed ?? outcome.text, outcome, context);
  }

  /**
   * Validates and runs one tool call. Failures come back as an outcome with
   * a user-facing message; nothing is thrown.
   */
  private async runTool(
    name: string,
    args: string | Record<string, unknown>,
    context: RequestContext,
  ): Promise<ToolOutcome> {
    try {
      const result = await this.router.invoke(name, args, context);
      return { ok: true, result, text: formatToolResult(result) };
    } catch (error) {
      const handled = ErrorHandler.handleError(error, {
        operation: `ResearchAgent.runTool:${name}`,
        context,
        input: args,
      });
      return { ok: false, error: handled, text: formatErrorMessage(handled) };
    }
  }

  /**
   * After a successful author search, starts a new paging cursor and
   * appends the first page of details to `summary`.
   */
  private async withFirstPage(
    summary: string,
    outcome: ToolOutcome,
    context: RequestContext,
  ): Promise<string> {
    if (!outcome.ok) {
      return summary;
    }
    const { result } = outcome;
    if (result.tool !== "search_papers_by_author") {
      return summary;
    }
    this.cursor = { authorKey: result.query, shown: 0 };
    if (result.ids.length === 0) {
      return summary;
    }
    try {
      return `${summary}\n\n${await this.nextPage(context)}`;
    } catch (error) {
      const handled = ErrorHandler.handleError(error, {
        operation: "ResearchAgent.firstPage",
        context,
      });
      return `${summary}\n\n${formatErrorMessage(handled)}`;
    }
  }

  /**
   * Serves a "more" request from the cache, or returns `undefined` when
   * there is nothing to page through.
   */
  private async tryNextPage(
    named: string | undefined,
    context: RequestContext,
  ): Promise<string | undefined> {
    if (named) {
      const authorKey = normalizeAuthorName(named);
      if (!this.cache.has(authorKey)) {
        return undefined;
      }
      if (this.cursor?.authorKey !== authorKey) {
        this.cursor = { authorKey, shown: 0 };
      }
    }
    if (!this.cursor) {
      return undefined;
    }
    this.transition("ExecutingTool", context);
    const page = await this.nextPage(context);
    this.transition("ComposingResponse", context);
    return page;
  }

  private async nextPage(context: RequestContext): Promise<string> {
    const cursor = this.cursor;
    if (!cursor) {
      return HELP_MESSAGE;
    }
    const ids = this.cache.recall(cursor.authorKey);
    if (ids.length === 0) {
      this.cursor = undefined;
      return `I no longer have results for ${cursor.authorKey}. Please search for the author again.`;
    }
    if (cursor.shown >= ids.length) {
      return `That's all ${ids.length} papers I found for ${cursor.authorKey}.`;
    }

    const start = cursor.shown;
    const pageIds = ids.slice(start, start + this.pageSize);
    logger.debug("Fetching a page of cached results.", {
      ...context,
      authorKey: cursor.authorKey,
      start,
      pageIds,
    });
    const papers = await this.client.fetchDetails(pageIds, context);
    cursor.shown = start + pageIds.length;

    const lines = [
      `Papers ${start + 1}-${cursor.shown} of ${ids.length} for ${cursor.authorKey}:`,
      SEPARATOR,
      papers.length > 0
        ? formatPaperList(papers, start)
        : "Details for these papers are not available.",
    ];
    if (cursor.shown < ids.length) {
      lines.push(SEPARATOR, 'Ask for "more" to see the next papers.');
    }
    return lines.join("\n");
  }

  private appendHistory(...messages: ChatMessage[]): void {
    if (this.historyLimit === 0) {
      return;
    }
    this.history = [...this.history, ...messages].slice(-this.historyLimit);
  }

  private transition(next: AgentState, context: RequestContext): void {
    if (this.currentState !== next) {
      logger.debug(`Agent state ${this.currentState} -> ${next}`, {
        requestId: context.requestId,
      });
      this.currentState = next;
    }
  }
}

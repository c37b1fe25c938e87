/**
 * @fileoverview Chat-completion client for any OpenAI-compatible endpoint
 * (Groq by default). One call per `complete`: conversation and tool
 * declarations in, text or tool calls out.
 * @module src/agent/llm/llmClient
 */

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { config } from "../../config/index.js";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../utils/index.js";
import type { ToolSpec } from "../tools/toolRouter.js";

export interface ModelToolCall {
  id: string;
  name: string;
  /** JSON-encoded arguments, exactly as the model produced them. */
  arguments: string;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; toolCalls?: ModelToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export interface ModelReply {
  content: string | null;
  toolCalls: ModelToolCall[];
  finishReason: string;
}

/** The language-model collaborator as the agent sees it. */
export interface ChatModel {
  readonly model: string;
  complete(
    messages: ChatMessage[],
    tools: readonly ToolSpec[],
    context: RequestContext,
  ): Promise<ModelReply>;
}

export interface LlmClientOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  temperature?: number;
}

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return {
        role: "assistant",
        content: message.content,
        ...(message.toolCalls && message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: "function" as const,
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : {}),
      };
    case "tool":
      return {
        role: "tool",
        tool_call_id: message.toolCallId,
        content: message.content,
      };
  }
}

function toOpenAiTool(spec: ToolSpec): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: spec.name,
      description: spec.description,
      parameters: { ...spec.parameters },
    },
  };
}

export class LlmClient implements ChatModel {
  private readonly client: OpenAI;
  public readonly model: string;
  private readonly temperature: number;

  constructor(options: LlmClientOptions) {
    this.model = options.model ?? config.llm.model;
    this.temperature = options.temperature ?? 0;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl ?? config.llm.baseUrl,
      timeout: options.timeoutMs ?? config.llm.timeoutMs,
      // A failed call produces one user-visible message; no retries.
      maxRetries: 0,
    });
  }

  /**
   * @throws {McpError} `SOURCE_UNAVAILABLE` when the endpoint fails or returns no choice.
   */
  async complete(
    messages: ChatMessage[],
    tools: readonly ToolSpec[],
    context: RequestContext,
  ): Promise<ModelReply> {
    const opContext = requestContextService.createRequestContext({
      parentRequestId: context.requestId,
      operation: "LlmClient.complete",
      model: this.model,
      messageCount: messages.length,
    });
    logger.debug("Requesting chat completion.", opContext);

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: messages.map(toOpenAiMessage),
        tools: tools.length > 0 ? tools.map(toOpenAiTool) : undefined,
        tool_choice: tools.length > 0 ? "auto" : undefined,
        temperature: this.temperature,
        stream: false,
      });
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Chat completion request failed.", { ...opContext, status, message });
      throw new McpError(
        BaseErrorCode.SOURCE_UNAVAILABLE,
        `Language model request failed: ${message}`,
        { status },
      );
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new McpError(
        BaseErrorCode.SOURCE_UNAVAILABLE,
        "Language model returned no choices.",
      );
    }

    const reply: ModelReply = {
      content: choice.message.content,
      toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
      finishReason: choice.finish_reason,
    };
    logger.debug("Chat completion received.", {
      ...opContext,
      finishReason: reply.finishReason,
      toolCalls: reply.toolCalls.map((call) => call.name),
      usage: response.usage,
    });
    return reply;
  }
}

/**
 * The configured model, or `undefined` when no API key is set (the agent
 * then runs in direct mode).
 */
export function createChatModel(): ChatModel | undefined {
  if (!config.llm.apiKey) {
    return undefined;
  }
  return new LlmClient({ apiKey: config.llm.apiKey });
}

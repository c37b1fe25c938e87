/**
 * @fileoverview Timing of tool runs: each run gets a trace span carrying the
 * tool name, its duration and, on failure, the error code.
 * @module src/utils/internal/performance
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import { config } from "../../config/index.js";
import { McpError } from "../../types-global/errors.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

const ATTR_TOOL_NAME = "research.tool.name";
const ATTR_TOOL_DURATION_MS = "research.tool.duration_ms";
const ATTR_TOOL_ERROR_CODE = "research.tool.error_code";

function errorCodeOf(error: unknown): string {
  return error instanceof McpError ? error.code : "UNHANDLED_ERROR";
}

/**
 * Runs `toolLogicFn` inside a span named after the tool. Errors are recorded
 * on the span and rethrown unchanged.
 */
export async function measureToolExecution<T>(
  toolLogicFn: () => Promise<T>,
  context: RequestContext & { toolName: string },
): Promise<T> {
  const tracer = trace.getTracer(config.appName, config.appVersion);
  const { toolName } = context;

  return tracer.startActiveSpan(`tool_execution:${toolName}`, async (span) => {
    span.setAttribute(ATTR_TOOL_NAME, toolName);
    const startTime = performance.now();
    let errorCode: string | undefined;

    try {
      const result = await toolLogicFn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      errorCode = errorCodeOf(error);
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorCode });
      span.setAttribute(ATTR_TOOL_ERROR_CODE, errorCode);
      throw error;
    } finally {
      const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
      span.setAttribute(ATTR_TOOL_DURATION_MS, durationMs);
      span.end();
      logger.info(`Tool ${toolName} finished in ${durationMs} ms.`, {
        ...context,
        durationMs,
        errorCode,
      });
    }
  });
}

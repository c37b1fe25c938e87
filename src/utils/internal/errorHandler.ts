/**
 * @fileoverview Central error handling: classifies unknown errors into
 * `BaseErrorCode`s, logs them with their context, and wraps async operations.
 * @module src/utils/internal/errorHandler
 */

import axios from "axios";
import { ZodError } from "zod";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import { sanitizeInputForLogging } from "../security/sanitization.js";
import { logger } from "./logger.js";
import type { RequestContext } from "./requestContext.js";

export interface ErrorHandlerOptions {
  operation: string;
  context?: RequestContext | Record<string, unknown>;
  input?: unknown;
  /** Throw the normalized error after logging. Defaults to false. */
  rethrow?: boolean;
  /** Code used when the error is not already an `McpError`. */
  errorCode?: BaseErrorCode;
  critical?: boolean;
}

const ERROR_PATTERNS: { pattern: RegExp; code: BaseErrorCode }[] = [
  {
    pattern: /ECONNREFUSED|ECONNRESET|ENOTFOUND|ETIMEDOUT|EAI_AGAIN|socket hang up|network|timeout/i,
    code: BaseErrorCode.SOURCE_UNAVAILABLE,
  },
  { pattern: /invalid|validation|required|malformed/i, code: BaseErrorCode.VALIDATION_ERROR },
];

export class ErrorHandler {
  public static determineErrorCode(error: unknown): BaseErrorCode {
    if (error instanceof McpError) {
      return error.code;
    }
    if (error instanceof ZodError) {
      return BaseErrorCode.VALIDATION_ERROR;
    }
    if (axios.isAxiosError(error)) {
      return BaseErrorCode.SOURCE_UNAVAILABLE;
    }
    const message = ErrorHandler.getErrorMessage(error);
    for (const { pattern, code } of ERROR_PATTERNS) {
      if (pattern.test(message)) {
        return code;
      }
    }
    return BaseErrorCode.INTERNAL_ERROR;
  }

  public static getErrorMessage(error: unknown): string {
    if (error instanceof ZodError) {
      return error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message,
        )
        .join("; ");
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Logs `error` and returns it as an `McpError`. Throws instead of returning
   * when `options.rethrow` is set.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): McpError {
    const { operation, context, input, rethrow = false, critical = false } =
      options;

    const normalized =
      error instanceof McpError
        ? error
        : new McpError(
            options.errorCode ?? ErrorHandler.determineErrorCode(error),
            `Error in ${operation}: ${ErrorHandler.getErrorMessage(error)}`,
            {
              originalErrorName: error instanceof Error ? error.name : typeof error,
            },
          );

    const logContext: Record<string, unknown> = {
      ...context,
      operation,
      errorCode: normalized.code,
      critical,
      input: input === undefined ? undefined : sanitizeInputForLogging(input),
    };

    if (critical) {
      logger.crit(normalized.message, normalized, logContext);
    } else {
      logger.error(normalized.message, normalized, logContext);
    }

    if (rethrow) {
      throw normalized;
    }
    return normalized;
  }

  /**
   * Runs `fn`, logging and rethrowing any failure as an `McpError`.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: Omit<ErrorHandlerOptions, "rethrow">,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw ErrorHandler.handleError(error, { ...options, rethrow: false });
    }
  }
}

/**
 * @fileoverview Error codes and the application error class shared by every layer.
 * @module src/types-global/errors
 */

/**
 * Standardized error codes. Tool boundaries and the agent loop map these to
 * short user-facing messages.
 */
export enum BaseErrorCode {
  /** The NCBI service or the language model could not be reached. */
  SOURCE_UNAVAILABLE = "SOURCE_UNAVAILABLE",
  /** NCBI answered, but reported an error in the response body. */
  NCBI_API_ERROR = "NCBI_API_ERROR",
  /** An NCBI response could not be parsed at all. */
  NCBI_PARSING_ERROR = "NCBI_PARSING_ERROR",
  /** A single record is missing required fields and was skipped. */
  MALFORMED_SOURCE_RECORD = "MALFORMED_SOURCE_RECORD",
  /** The language model proposed a tool outside the fixed set. */
  UNRECOGNIZED_TOOL = "UNRECOGNIZED_TOOL",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  INITIALIZATION_FAILED = "INITIALIZATION_FAILED",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export class McpError extends Error {
  public readonly code: BaseErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: BaseErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = "McpError";
    Object.setPrototypeOf(this, McpError.prototype);
  }
}

/**
 * @fileoverview Redaction of sensitive values before they reach the logs,
 * and cleanup of free text before it is embedded in an E-utilities query.
 * @module src/utils/security/sanitization
 */

const SENSITIVE_FIELDS = [
  "api_key",
  "apikey",
  "authorization",
  "email",
  "password",
  "secret",
  "token",
];

const MAX_DEPTH = 8;

function isSensitiveKey(key: string): boolean {
  const lowered = key.toLowerCase().replace(/[-_]/g, "");
  return SENSITIVE_FIELDS.some((field) =>
    lowered.includes(field.replace(/_/g, "")),
  );
}

function redact(value: unknown, depth: number): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (depth >= MAX_DEPTH) {
    return "[Truncated]";
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, depth + 1));
  }
  const output: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    output[key] = isSensitiveKey(key) ? "[REDACTED]" : redact(nested, depth + 1);
  }
  return output;
}

/**
 * Returns a copy of `input` with sensitive fields replaced by "[REDACTED]".
 * The original value is never modified.
 */
export function sanitizeInputForLogging(input: unknown): unknown {
  return redact(input, 0);
}

export const sanitization = {
  /**
   * Strips control characters and double quotes (which would end an
   * E-utilities phrase early) and collapses whitespace.
   */
  sanitizeQueryTerm(input: string): string {
    return input
      .replace(/[\u0000-\u001f\u007f]/g, " ")
      .replace(/"/g, "")
      .replace(/\s+/g, " ")
      .trim();
  },
};

/**
 * @fileoverview Canonicalization of free-text author names before they are
 * used as E-utilities search terms and result-cache keys.
 * @module src/utils/parsing/nameNormalizer
 */

/** Honorifics recognized at the start of a name, without trailing period. */
export const HONORIFICS = [
  "dr",
  "prof",
  "professor",
  "mr",
  "mrs",
  "ms",
  "miss",
] as const;

const LEADING_HONORIFIC = new RegExp(
  `^(?:${HONORIFICS.join("|")})\\.?(?:\\s+|$)`,
  "i",
);

/**
 * Strips leading honorifics (repeatedly, case-insensitive, with or without a
 * trailing period), collapses whitespace and trims.
 *
 * Never throws: empty input, or input made only of honorifics, yields "".
 *
 * @example
 * normalizeAuthorName("Dr. Jane Doe");        // "Jane Doe"
 * normalizeAuthorName("prof  John   Smith");  // "John Smith"
 */
export function normalizeAuthorName(input: string): string {
  if (typeof input !== "string") {
    return "";
  }
  let name = input.replace(/\s+/g, " ").trim();
  let previous: string;
  do {
    previous = name;
    name = name.replace(LEADING_HONORIFIC, "").trim();
  } while (name !== previous && name.length > 0);
  return name;
}

/**
 * @fileoverview Small accessors for fast-xml-parser output, where an element
 * may be a bare string, a `{ "#text": ... }` object, or absent.
 * @module src/services/NCBI/parsing/xmlGenericHelpers
 */

import { XMLParser } from "fast-xml-parser";

const inlineMarkupParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: false,
  htmlEntities: true,
});

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text content of an element, trimmed. Numbers and booleans are stringified.
 * Returns `defaultValue` when there is no text.
 */
export function getText(element: unknown, defaultValue = ""): string {
  if (typeof element === "string") {
    return element.trim();
  }
  if (typeof element === "number" || typeof element === "boolean") {
    return String(element);
  }
  if (isRecord(element) && element["#text"] !== undefined) {
    return getText(element["#text"], defaultValue);
  }
  return defaultValue;
}

function collectText(node: unknown): string {
  if (Array.isArray(node)) {
    return node.map(collectText).join("");
  }
  if (!isRecord(node)) {
    return "";
  }
  return Object.entries(node)
    .map(([key, value]) => {
      if (key === "#text") {
        return typeof value === "string" || typeof value === "number"
          ? String(value)
          : "";
      }
      return key === ":@" ? "" : collectText(value);
    })
    .join("");
}

/**
 * Text of an element kept as raw inner XML (a parser stop node), with
 * inline tags such as `<i>` and `<sup>` removed, entities decoded and
 * whitespace collapsed.
 */
export function getInlineText(element: unknown, defaultValue = ""): string {
  const raw = getText(element);
  if (!raw.includes("<") && !raw.includes("&")) {
    return raw.replace(/\s+/g, " ") || defaultValue;
  }
  const nodes: unknown = inlineMarkupParser.parse(`<inline>${raw}</inline>`);
  return collectText(nodes).replace(/\s+/g, " ").trim() || defaultValue;
}

/**
 * Value of attribute `attributeName` (without the "@_" prefix), or `defaultValue`.
 */
export function getAttribute(
  element: unknown,
  attributeName: string,
  defaultValue = "",
): string {
  if (!isRecord(element)) {
    return defaultValue;
  }
  const value = element[`@_${attributeName}`];
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return String(value);
  }
  return defaultValue;
}

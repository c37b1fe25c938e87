/**
 * @fileoverview Plain-text rendering of lookup results and errors for the
 * console. Absent fields are omitted rather than shown empty.
 * @module src/agent/responseFormatter
 */

import { BaseErrorCode, McpError } from "../types-global/errors.js";
import type {
  AuthorSearchResult,
  PaperRecord,
} from "../types-global/paperRecord.js";
import type { ToolResult } from "./tools/toolRouter.js";

export const SEPARATOR = "-".repeat(40);

const MAX_LISTED_IDS = 10;

export const NOT_UNDERSTOOD_MESSAGE =
  "I couldn't understand your request. Please try again with a clearer query.";

export const HELP_MESSAGE = [
  "I can look up biomedical literature on PubMed. Try:",
  '  - "Show papers by Dr. Jane Doe"',
  '  - "Find the paper titled "Deep learning for protein folding""',
  '  - "Tell me about paper 37635766"',
  'After an author search, ask for "more" to see further papers.',
].join("\n");

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatPaper(paper: PaperRecord): string {
  const lines = [`Paper ID: ${paper.id}`];
  if (paper.title) lines.push(`Title: ${paper.title}`);
  if (paper.authors.length > 0) lines.push(`Authors: ${paper.authors.join(", ")}`);
  if (paper.journal) {
    lines.push(`Journal: ${paper.journal}${paper.year ? ` (${paper.year})` : ""}`);
  } else if (paper.year) {
    lines.push(`Year: ${paper.year}`);
  }
  if (paper.doi) lines.push(`DOI: ${paper.doi}`);
  if (paper.abstract) lines.push("", "Abstract:", paper.abstract);
  return lines.join("\n");
}

/**
 * Numbered paper blocks; `startIndex` is the zero-based position of the
 * first paper in the full result list.
 */
export function formatPaperList(
  papers: readonly PaperRecord[],
  startIndex = 0,
): string {
  return papers
    .map((paper, i) => `[${startIndex + i + 1}]\n${formatPaper(paper)}`)
    .join(`\n${SEPARATOR}\n`);
}

export function formatAuthorSummary(result: AuthorSearchResult): string {
  if (result.count === 0 && result.ids.length === 0) {
    return `No papers found for ${result.author}.`;
  }
  const headline =
    result.matchedBy === "last_name"
      ? `No exact match for the full name. Found ${plural(result.count, "paper")} by authors with the last name ${result.author}.`
      : `Found ${plural(result.count, "paper")} by ${result.author}.`;
  if (result.ids.length === 0) {
    return headline;
  }
  const listed = result.ids.slice(0, MAX_LISTED_IDS);
  const rest = result.ids.length - listed.length;
  return `${headline}\nPaper IDs: ${listed.join(", ")}${rest > 0 ? ` (+${rest} more)` : ""}`;
}

export function formatToolResult(result: ToolResult): string {
  switch (result.tool) {
    case "search_papers_by_author":
      return formatAuthorSummary(result);
    case "search_paper_by_title":
      return result.paper
        ? formatPaper(result.paper)
        : `No papers found with the title "${result.query}". Try a shorter title or search by author.`;
    case "get_paper_details":
      return result.paper
        ? formatPaper(result.paper)
        : `No article found for ID ${result.paperId}.`;
  }
}

/** A short message for the user; internals stay in the logs. */
export function formatErrorMessage(error: McpError): string {
  switch (error.code) {
    case BaseErrorCode.SOURCE_UNAVAILABLE:
      return `Sorry, I couldn't reach an external service (${error.message}). Please try again later.`;
    case BaseErrorCode.UNRECOGNIZED_TOOL:
      return NOT_UNDERSTOOD_MESSAGE;
    case BaseErrorCode.VALIDATION_ERROR:
      return `I couldn't use that request: ${error.message}`;
    case BaseErrorCode.NCBI_API_ERROR:
    case BaseErrorCode.NCBI_PARSING_ERROR:
    case BaseErrorCode.MALFORMED_SOURCE_RECORD:
      return `PubMed returned a response I couldn't use (${error.message}). Please try again later.`;
    default:
      return `Something went wrong while handling your request: ${error.message}`;
  }
}

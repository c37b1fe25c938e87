/**
 * @fileoverview Rule-based reading of a user message: which lookup it asks
 * for and with what argument. Used when no language model is configured,
 * and for requests that name a PubMed ID outright.
 * @module src/agent/intentClassifier
 */

import type { ToolCall } from "./tools/toolRouter.js";

const PAPER_ID_IN_TEXT = /\b(\d{7,9})\b/;
const DETAILS_PHRASES = ["details", "paper id", "tell me about", "get"];

const BARE_PAPER_ID = /^(?:pmid:?\s*)?(\d{1,9})$/i;
const LABELED_PAPER_ID = /\b(?:pmid|paper(?:\s+id)?|article(?:\s+id)?|id)\s*:?\s*#?(\d{1,9})\b/i;

// Opening quote only at a word boundary, so apostrophes ("What's", "O'Brien") do not count.
const QUOTED_TITLE = /(?:^|\s)["“'‘]([^"”'’]{8,})["”'’](?=$|\s|[.,;:?!])/;
const TITLED = /\b(?:titled|title|called|named)\s*:?\s+(.{8,})$/i;

const AUTHOR_PATTERNS = [
  /\b(?:papers?|publications?|articles?|research(?:\s+papers?)?|works?|studies)\s+(?:written\s+|authored\s+|published\s+)?(?:by|of|from)\s+(?:by\s+)?(?:the\s+author\s+)?(.+)$/i,
  /\b(?:written|authored|published)\s+by\s+(.+)$/i,
  /\bauthor\s*:?\s+(.+)$/i,
  /\bby\s+(.+)$/i,
];

// Short follow-ups only ("more", "show me the next papers by Jane Doe"); a
// sentence that merely contains one of these words is not a follow-up.
const MORE_REQUEST =
  /^(?:please\s+)?(?:(?:show|give|get|list|fetch|display)\s+(?:me\s+)?)?(?:the\s+|some\s+)?(?:more|next|further|additional|remaining)(?:\s+(?:papers?|results?|articles?|publications?|ones|page))?(?:\s+(?:by|of|from|for)\s+(.+?))?(?:\s+please)?[\s.!?]*$/i;

export interface MoreRequest {
  /** Author named in the follow-up, if any, as written. */
  author?: string;
}

type ProposedCall = {
  [Name in ToolCall["name"]]: {
    name: Name;
    args: Extract<ToolCall, { name: Name }>["args"];
  };
}[ToolCall["name"]];

function cleanCapture(value: string): string {
  return value
    .replace(/^[\s"'“‘]+|[\s"'”’?!.,;:]+$/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * The PMID of a message like "Tell me about paper 37635766", which asks for
 * one paper's details by its identifier.
 */
export function detectPaperIdRequest(text: string): string | undefined {
  const match = PAPER_ID_IN_TEXT.exec(text);
  if (!match?.[1]) return undefined;
  const lowered = text.toLowerCase();
  return DETAILS_PHRASES.some((phrase) => lowered.includes(phrase))
    ? match[1]
    : undefined;
}

/**
 * Reads a request to continue through earlier results, or returns
 * `undefined` when the message is anything else.
 */
export function parseMoreRequest(text: string): MoreRequest | undefined {
  const match = MORE_REQUEST.exec(text.trim());
  if (!match) return undefined;
  const author = match[1] ? cleanCapture(match[1]) : "";
  return author ? { author } : {};
}

/** The author named in messages like "Show papers by Dr. Jane Doe". */
export function extractAuthorName(text: string): string | undefined {
  for (const pattern of AUTHOR_PATTERNS) {
    const captured = pattern.exec(text)?.[1];
    if (captured) {
      const name = cleanCapture(captured);
      if (name) return name;
    }
  }
  return undefined;
}

export function extractTitle(text: string): string | undefined {
  const captured = QUOTED_TITLE.exec(text)?.[1] ?? TITLED.exec(text)?.[1];
  if (!captured) return undefined;
  const title = cleanCapture(captured);
  return title || undefined;
}

/**
 * Picks a tool for `text` without a language model. Identifiers win over
 * titles, and titles over author names; `undefined` when nothing matches.
 */
export function classifyIntent(text: string): ProposedCall | undefined {
  const trimmed = text.trim();

  const paperId =
    detectPaperIdRequest(trimmed) ??
    BARE_PAPER_ID.exec(trimmed)?.[1] ??
    LABELED_PAPER_ID.exec(trimmed)?.[1];
  if (paperId) {
    return { name: "get_paper_details", args: { paper_id: paperId } };
  }

  const title = extractTitle(trimmed);
  if (title) {
    return { name: "search_paper_by_title", args: { title } };
  }

  const author = extractAuthorName(trimmed);
  if (author) {
    return { name: "search_papers_by_author", args: { author_name: author } };
  }

  return undefined;
}

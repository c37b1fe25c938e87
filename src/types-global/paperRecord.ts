/**
 * @fileoverview Application-level record of one PubMed article.
 * @module src/types-global/paperRecord
 */

/**
 * One PubMed article. `id` is always a non-empty numeric PMID. Optional
 * fields are left out when the source lacks them; they are never filled
 * with placeholder text.
 */
export interface PaperRecord {
  id: string;
  /** May be empty when the source omits the title. */
  title: string;
  /** In source order; may be empty. */
  authors: string[];
  /** May be empty. */
  journal: string;
  year?: string;
  doi?: string;
  /** Only set by a detail fetch. */
  abstract?: string;
}

/** Outcome of an author search. */
export interface AuthorSearchResult {
  /** The normalized name actually searched for. */
  author: string;
  /** Total matches reported by the source (may exceed `ids.length`). */
  count: number;
  /** Retrieved identifiers in source relevance order. */
  ids: string[];
  /** Whether the full name matched, or only the last name on fallback. */
  matchedBy: "full_name" | "last_name";
}

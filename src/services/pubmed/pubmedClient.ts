/**
 * @fileoverview PubMed lookups built on the two-stage E-utilities protocol:
 * ESearch returns identifiers only; EFetch returns details and is called
 * only for the identifiers a caller actually needs.
 * @module src/services/pubmed/pubmedClient
 */

import { config } from "../../config/index.js";
import type {
  AuthorSearchResult,
  PaperRecord,
} from "../../types-global/paperRecord.js";
import {
  logger,
  type RequestContext,
  requestContextService,
  sanitization,
} from "../../utils/index.js";
import { PUBMED_DB } from "../NCBI/core/ncbiConstants.js";
import { type EUtilities, getNcbiService } from "../NCBI/core/ncbiService.js";
import { parsePubMedArticleSet } from "../NCBI/parsing/index.js";

const PMID_PATTERN = /^\d+$/;
const TITLE_SEARCH_RETMAX = 5;

export interface PubMedClientOptions {
  /** Default `retmax` for author searches. */
  maxAuthorResults?: number;
}

export class PubMedClient {
  private readonly maxAuthorResults: number;

  constructor(
    private readonly eutils: EUtilities = getNcbiService(),
    options: PubMedClientOptions = {},
  ) {
    this.maxAuthorResults = options.maxAuthorResults ?? config.agentMaxAuthorResults;
  }

  /**
   * Searches by author. When the full name finds nothing and has more than
   * one word, retries once with the last name alone.
   * @throws {McpError} `SOURCE_UNAVAILABLE` if NCBI cannot be reached.
   */
  public async searchAuthor(
    normalizedName: string,
    context: RequestContext,
    maxResults: number = this.maxAuthorResults,
  ): Promise<AuthorSearchResult> {
    const opContext = requestContextService.createRequestContext({
      parentRequestId: context.requestId,
      operation: "PubMedClient.searchAuthor",
      author: normalizedName,
      maxResults,
    });
    const author = sanitization.sanitizeQueryTerm(normalizedName);

    const fullName = await this.eutils.eSearch(
      { db: PUBMED_DB, term: `${author}[Author]`, retmax: maxResults },
      opContext,
    );
    if (fullName.count > 0 || fullName.idList.length > 0) {
      return {
        author,
        count: fullName.count,
        ids: fullName.idList,
        matchedBy: "full_name",
      };
    }

    const parts = author.split(" ");
    const lastName = parts[parts.length - 1] ?? "";
    if (parts.length < 2 || !lastName) {
      return { author, count: 0, ids: [], matchedBy: "full_name" };
    }

    logger.info("No matches for full author name; retrying with last name.", {
      ...opContext,
      lastName,
    });
    const byLastName = await this.eutils.eSearch(
      { db: PUBMED_DB, term: `${lastName}[Author]`, retmax: maxResults },
      opContext,
    );
    if (byLastName.count === 0 && byLastName.idList.length === 0) {
      return { author, count: 0, ids: [], matchedBy: "full_name" };
    }
    return {
      author: lastName,
      count: byLastName.count,
      ids: byLastName.idList,
      matchedBy: "last_name",
    };
  }

  /**
   * Identifiers of papers by `normalizedName`, most relevant first. Empty
   * when nothing matches.
   */
  public async searchByAuthor(
    normalizedName: string,
    maxResults: number,
    context: RequestContext,
  ): Promise<string[]> {
    const result = await this.searchAuthor(normalizedName, context, maxResults);
    return result.ids;
  }

  /**
   * Details for `ids` in one batched EFetch. Identifiers the source does
   * not know are left out, so the result may be shorter than the request.
   */
  public async fetchDetails(
    ids: string[],
    context: RequestContext,
  ): Promise<PaperRecord[]> {
    const validIds = ids.map((id) => id.trim()).filter((id) => PMID_PATTERN.test(id));
    if (validIds.length === 0) {
      return [];
    }

    const opContext = requestContextService.createRequestContext({
      parentRequestId: context.requestId,
      operation: "PubMedClient.fetchDetails",
      requested: validIds.length,
    });

    const xml = await this.eutils.eFetch(
      { db: PUBMED_DB, id: validIds.join(","), retmode: "xml" },
      opContext,
    );
    const records = parsePubMedArticleSet(xml, opContext);

    if (records.length < validIds.length) {
      const returned = new Set(records.map((r) => r.id));
      logger.info("Some requested PMIDs were not returned by NCBI.", {
        ...opContext,
        missing: validIds.filter((id) => !returned.has(id)),
      });
    }
    return records;
  }

  /**
   * Finds a paper by title: exact phrase first, then an unquoted title
   * search. Details are fetched for the top match only.
   */
  public async searchByTitle(
    titleQuery: string,
    context: RequestContext,
  ): Promise<PaperRecord | undefined> {
    const opContext = requestContextService.createRequestContext({
      parentRequestId: context.requestId,
      operation: "PubMedClient.searchByTitle",
    });
    const title = sanitization.sanitizeQueryTerm(titleQuery);
    if (!title) {
      return undefined;
    }

    let result = await this.eutils.eSearch(
      { db: PUBMED_DB, term: `"${title}"[Title]`, retmax: TITLE_SEARCH_RETMAX },
      opContext,
    );
    if (result.idList.length === 0) {
      logger.debug("No exact title match; trying a partial title search.", opContext);
      result = await this.eutils.eSearch(
        { db: PUBMED_DB, term: `${title}[Title]`, retmax: TITLE_SEARCH_RETMAX },
        opContext,
      );
    }

    const topId = result.idList[0];
    if (!topId) {
      return undefined;
    }
    const [record] = await this.fetchDetails([topId], opContext);
    return record;
  }
}

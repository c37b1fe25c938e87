/**
 * @fileoverview Converts a parsed EFetch `PubmedArticleSet` into `PaperRecord`s.
 * Articles without a usable PMID are skipped with a warning.
 * @module src/services/NCBI/parsing/paperRecordParser
 */

import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import type { PaperRecord } from "../../../types-global/paperRecord.js";
import {
  XmlEFetchResponseSchema,
  XmlPubmedArticleSchema,
  type XmlPubmedArticle,
} from "../../../types-global/pubmedXml.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  extractAbstractText,
  extractAuthors,
  extractDoi,
  extractJournalTitle,
  extractPublicationYear,
  extractTitle,
} from "./pubmedArticleStructureParser.js";
import { getText } from "./xmlGenericHelpers.js";

const PMID_PATTERN = /^\d+$/;

function toPaperRecord(article: XmlPubmedArticle): PaperRecord | undefined {
  const citation = article.MedlineCitation;
  const id = getText(citation.PMID);
  if (!PMID_PATTERN.test(id)) {
    return undefined;
  }

  const details = citation.Article;
  const record: PaperRecord = {
    id,
    title: extractTitle(details),
    authors: extractAuthors(details?.AuthorList),
    journal: extractJournalTitle(details?.Journal),
  };

  const year = extractPublicationYear(details);
  if (year) record.year = year;
  const doi = extractDoi(details, article.PubmedData?.ArticleIdList?.ArticleId);
  if (doi) record.doi = doi;
  const abstract = extractAbstractText(details?.Abstract);
  if (abstract) record.abstract = abstract;

  return record;
}

/**
 * Extracts one `PaperRecord` per well-formed `PubmedArticle`, in source order.
 * An empty or missing article set yields `[]`.
 *
 * @throws {McpError} `NCBI_PARSING_ERROR` if `xmlData` is not an EFetch document at all.
 */
export function parsePubMedArticleSet(
  xmlData: unknown,
  parentContext: RequestContext,
): PaperRecord[] {
  const operationContext = requestContextService.createRequestContext({
    parentRequestId: parentContext.requestId,
    operation: "parsePubMedArticleSet",
  });

  const parsed = XmlEFetchResponseSchema.safeParse(xmlData);
  if (!parsed.success) {
    throw new McpError(
      BaseErrorCode.NCBI_PARSING_ERROR,
      "Unexpected structure for EFetch response.",
      { issues: parsed.error.issues.slice(0, 3) },
    );
  }

  const articles = parsed.data.PubmedArticleSet?.PubmedArticle ?? [];
  const records: PaperRecord[] = [];

  articles.forEach((rawArticle, index) => {
    const article = XmlPubmedArticleSchema.safeParse(rawArticle);
    const record = article.success ? toPaperRecord(article.data) : undefined;
    if (!record) {
      logger.warning("Skipping PubmedArticle without a usable PMID.", {
        ...operationContext,
        errorCode: BaseErrorCode.MALFORMED_SOURCE_RECORD,
        articleIndex: index,
      });
      return;
    }
    records.push(record);
  });

  logger.debug("Parsed PubmedArticleSet.", {
    ...operationContext,
    articlesInResponse: articles.length,
    recordsParsed: records.length,
  });
  return records;
}

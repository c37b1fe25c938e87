/**
 * @fileoverview Parses NCBI E-utility responses and extracts NCBI-specific
 * errors and warnings.
 *
 * Only top-level `ERROR` elements are fatal. `ErrorList`/`WarningList`
 * entries (phrase not found, PMID cannot be retrieved) describe a partial or
 * empty result and are logged as warnings.
 * @module src/services/NCBI/core/ncbiResponseHandler
 */

import type { AxiosResponse } from "axios";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import { getText, isRecord } from "../parsing/xmlGenericHelpers.js";

const ARRAY_TAG_SUFFIXES = [
  "IdList.Id",
  "PubmedArticleSet.PubmedArticle",
  "AuthorList.Author",
  "Abstract.AbstractText",
  "ArticleIdList.ArticleId",
  "Article.ELocationID",
  "Article.ArticleDate",
];

// Titles and abstracts carry inline markup (<i>, <sup>, <sub>, <b>); their
// inner XML is kept raw and flattened by the field extractors.
const INLINE_MARKUP_TAGS = ["*.ArticleTitle", "*.AbstractText"];

const FATAL_ERROR_PATHS = [
  "eSearchResult.ERROR",
  "eFetchResult.ERROR",
  "ERROR",
];

const WARNING_PATHS = [
  "eSearchResult.ErrorList.PhraseNotFound",
  "eSearchResult.ErrorList.FieldNotFound",
  "eSearchResult.WarningList.QuotedPhraseNotFound",
  "eSearchResult.WarningList.PhraseIgnored",
  "eSearchResult.WarningList.OutputMessage",
  "PubmedArticleSet.ErrorList.CannotRetrievePMID",
];

function valueAtPath(root: unknown, path: string): unknown {
  let current: unknown = root;
  for (const part of path.split(".")) {
    if (!isRecord(current) || !(part in current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function collectMessages(root: unknown, paths: string[]): string[] {
  const messages: string[] = [];
  for (const path of paths) {
    const source = valueAtPath(root, path);
    const items = Array.isArray(source) ? source : [source];
    for (const item of items) {
      const text = getText(item);
      if (text) messages.push(text);
    }
  }
  return messages;
}

export class NcbiResponseHandler {
  private readonly xmlParser: XMLParser;

  constructor() {
    this.xmlParser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: "@_",
      // PMIDs, years and counts stay strings; zod schemas coerce where needed.
      parseTagValue: false,
      parseAttributeValue: false,
      stopNodes: INLINE_MARKUP_TAGS,
      isArray: (_name, jpath) =>
        ARRAY_TAG_SUFFIXES.some((suffix) => jpath.endsWith(suffix)),
    });
  }

  /**
   * Parses the XML body of `response`.
   * @throws {McpError} `NCBI_PARSING_ERROR` for invalid XML, `NCBI_API_ERROR` when NCBI reports an error.
   */
  public parseAndHandleResponse(
    response: AxiosResponse<unknown>,
    endpoint: string,
    context: RequestContext,
  ): unknown {
    const responseData = response.data;
    const operationContext = requestContextService.createRequestContext({
      parentRequestId: context.requestId,
      operation: "NCBI_ParseResponse",
      endpoint,
    });

    if (
      typeof responseData !== "string" ||
      XMLValidator.validate(responseData) !== true
    ) {
      logger.error("Invalid or non-string XML response from NCBI", {
        ...operationContext,
        responseSnippet: String(responseData).substring(0, 500),
      });
      throw new McpError(
        BaseErrorCode.NCBI_PARSING_ERROR,
        "Received invalid XML from NCBI.",
        { endpoint, responseSnippet: String(responseData).substring(0, 200) },
      );
    }

    const parsedXml: unknown = this.xmlParser.parse(responseData);

    const errors = collectMessages(parsedXml, FATAL_ERROR_PATHS);
    if (errors.length > 0) {
      logger.error("NCBI API returned an error in XML response", {
        ...operationContext,
        errors,
      });
      throw new McpError(
        BaseErrorCode.NCBI_API_ERROR,
        `NCBI API Error: ${errors.join("; ")}`,
        { endpoint, ncbiErrors: errors },
      );
    }

    const warnings = collectMessages(parsedXml, WARNING_PATHS);
    if (warnings.length > 0) {
      logger.warning("NCBI reported warnings for the request.", {
        ...operationContext,
        warnings,
      });
    }

    logger.debug("Successfully parsed XML response.", operationContext);
    return parsedXml;
  }
}

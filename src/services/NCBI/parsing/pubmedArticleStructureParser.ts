/**
 * @fileoverview Field extractors for PubMed article XML from EFetch.
 * Each extractor accepts a possibly-missing element and returns `undefined`
 * (or an empty value where the record requires one) instead of throwing.
 * @module src/services/NCBI/parsing/pubmedArticleStructureParser
 */

import type {
  XmlAbstract,
  XmlArticle,
  XmlAuthorList,
  XmlJournal,
  XmlText,
} from "../../../types-global/pubmedXml.js";
import { getAttribute, getInlineText, getText } from "./xmlGenericHelpers.js";

/**
 * Author display names in source order: "ForeName LastName", or the
 * collective name for group authors. Entries with no name are skipped.
 */
export function extractAuthors(authorList?: XmlAuthorList): string[] {
  if (!authorList) return [];
  return authorList.Author.flatMap((author) => {
    const collectiveName = getText(author.CollectiveName);
    if (collectiveName) return [collectiveName];

    const foreName = getText(author.ForeName) || getText(author.Initials);
    const lastName = getText(author.LastName);
    const name = `${foreName} ${lastName}`.trim();
    return name ? [name] : [];
  });
}

/**
 * Full journal title, falling back to the ISO abbreviation, or "".
 */
export function extractJournalTitle(journal?: XmlJournal): string {
  if (!journal) return "";
  return getText(journal.Title) || getText(journal.ISOAbbreviation);
}

/**
 * Publication year from the journal issue's PubDate, then the first four
 * digits of a MedlineDate ("2000 Spring", "1999-2000"), then the first
 * electronic ArticleDate.
 */
export function extractPublicationYear(article?: XmlArticle): string | undefined {
  if (!article) return undefined;
  const pubDate = article.Journal?.JournalIssue?.PubDate;
  const year =
    getText(pubDate?.Year) ||
    getText(pubDate?.MedlineDate).match(/\d{4}/)?.[0] ||
    getText(article.ArticleDate[0]?.Year);
  return year || undefined;
}

/**
 * DOI from a valid ELocationID, then any DOI ELocationID, then the
 * PubmedData ArticleIdList.
 */
export function extractDoi(
  article?: XmlArticle,
  articleIds: XmlText[] = [],
): string | undefined {
  const eLocationIds = article?.ELocationID ?? [];

  const validDoi = eLocationIds.find(
    (eloc) =>
      getAttribute(eloc, "EIdType") === "doi" &&
      getAttribute(eloc, "ValidYN") !== "N" &&
      getText(eloc),
  );
  if (validDoi) return getText(validDoi);

  const anyDoi = eLocationIds.find(
    (eloc) => getAttribute(eloc, "EIdType") === "doi" && getText(eloc),
  );
  if (anyDoi) return getText(anyDoi);

  const listedDoi = articleIds.find(
    (aid) => getAttribute(aid, "IdType") === "doi" && getText(aid),
  );
  return listedDoi ? getText(listedDoi) : undefined;
}

/**
 * Abstract text. Structured abstracts are joined section by section, each
 * prefixed with its Label when present.
 */
export function extractAbstractText(abstract?: XmlAbstract): string | undefined {
  if (!abstract) return undefined;

  const sections = abstract.AbstractText.map((section) => {
    const text = getInlineText(section);
    const label = getAttribute(section, "Label").trim();
    return label && text ? `${label}: ${text}` : text;
  }).filter(Boolean);

  return sections.length > 0 ? sections.join("\n\n") : undefined;
}

export function extractTitle(article?: XmlArticle): string {
  return getInlineText(article?.ArticleTitle);
}

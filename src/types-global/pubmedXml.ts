/**
 * @fileoverview Zod schemas (and their inferred types) for the subset of
 * NCBI E-utilities XML this application reads: ESearch results and EFetch
 * `PubmedArticleSet` documents, as produced by fast-xml-parser with
 * attributes prefixed by "@_" and tag values kept as strings.
 *
 * PubMed records are loosely structured. Optional elements use `lenient`,
 * which turns an absent, empty or malformed element into `undefined`
 * instead of failing the whole record; lists use `listOf`, which drops
 * malformed entries.
 * @module src/types-global/pubmedXml
 */

import { z } from "zod";

const asArray = (value: unknown): unknown[] => {
  if (value === undefined || value === null || value === "") return [];
  return Array.isArray(value) ? value : [value];
};

const emptyToUndefined = (value: unknown): unknown =>
  value === "" || value === null ? undefined : value;

export function lenient<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(emptyToUndefined, schema.optional()).catch(undefined);
}

export function listOf<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(asArray, z.array(z.unknown())).transform((items) =>
    items.flatMap((item): z.output<T>[] => {
      const parsed = schema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    }),
  );
}

/** An element holding text: either a bare string or `{ "#text", "@_attr"... }`. */
export const XmlTextSchema = z.union([
  z.string(),
  z.object({ "#text": z.string().optional() }).passthrough(),
]);
export type XmlText = z.infer<typeof XmlTextSchema>;

// --- EFetch (PubmedArticleSet) ---

export const XmlAuthorSchema = z
  .object({
    LastName: lenient(XmlTextSchema),
    ForeName: lenient(XmlTextSchema),
    Initials: lenient(XmlTextSchema),
    CollectiveName: lenient(XmlTextSchema),
  })
  .passthrough();
export type XmlAuthor = z.infer<typeof XmlAuthorSchema>;

export const XmlAuthorListSchema = z
  .object({ Author: listOf(XmlAuthorSchema) })
  .passthrough();
export type XmlAuthorList = z.infer<typeof XmlAuthorListSchema>;

export const XmlAbstractSchema = z
  .object({ AbstractText: listOf(XmlTextSchema) })
  .passthrough();
export type XmlAbstract = z.infer<typeof XmlAbstractSchema>;

export const XmlPubDateSchema = z
  .object({
    Year: lenient(XmlTextSchema),
    MedlineDate: lenient(XmlTextSchema),
  })
  .passthrough();

export const XmlJournalSchema = z
  .object({
    Title: lenient(XmlTextSchema),
    ISOAbbreviation: lenient(XmlTextSchema),
    JournalIssue: lenient(
      z.object({ PubDate: lenient(XmlPubDateSchema) }).passthrough(),
    ),
  })
  .passthrough();
export type XmlJournal = z.infer<typeof XmlJournalSchema>;

export const XmlArticleIdListSchema = z
  .object({ ArticleId: listOf(XmlTextSchema) })
  .passthrough();

export const XmlArticleSchema = z
  .object({
    ArticleTitle: lenient(XmlTextSchema),
    Journal: lenient(XmlJournalSchema),
    Abstract: lenient(XmlAbstractSchema),
    AuthorList: lenient(XmlAuthorListSchema),
    ELocationID: listOf(XmlTextSchema),
    ArticleDate: listOf(
      z.object({ Year: lenient(XmlTextSchema) }).passthrough(),
    ),
  })
  .passthrough();
export type XmlArticle = z.infer<typeof XmlArticleSchema>;

export const XmlPubmedArticleSchema = z
  .object({
    MedlineCitation: z
      .object({
        PMID: XmlTextSchema,
        Article: lenient(XmlArticleSchema),
      })
      .passthrough(),
    PubmedData: lenient(
      z.object({ ArticleIdList: lenient(XmlArticleIdListSchema) }).passthrough(),
    ),
  })
  .passthrough();
export type XmlPubmedArticle = z.infer<typeof XmlPubmedArticleSchema>;

/** Top level of an EFetch response. Articles are validated one at a time. */
export const XmlEFetchResponseSchema = z
  .object({
    PubmedArticleSet: lenient(
      z.object({ PubmedArticle: listOf(z.unknown()) }).passthrough(),
    ),
  })
  .passthrough();

// --- ESearch ---

export const XmlESearchResponseSchema = z.object({
  eSearchResult: z
    .object({
      Count: z.coerce.number().int().nonnegative().catch(0),
      RetMax: z.coerce.number().int().nonnegative().catch(0),
      RetStart: z.coerce.number().int().nonnegative().catch(0),
      IdList: lenient(z.object({ Id: listOf(XmlTextSchema) }).passthrough()),
      QueryTranslation: lenient(XmlTextSchema),
    })
    .passthrough(),
});

/** Parsed and typed ESearch result. */
export interface ESearchResult {
  count: number;
  retmax: number;
  retstart: number;
  idList: string[];
  queryTranslation?: string;
}

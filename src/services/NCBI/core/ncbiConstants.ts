/**
 * @fileoverview Constants and shared type definitions for NCBI E-utility interactions.
 * @module src/services/NCBI/core/ncbiConstants
 */

export const NCBI_EUTILS_BASE_URL =
  "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

export const PUBMED_DB = "pubmed";

/** The E-utilities this application calls. */
export type NcbiEndpoint = "esearch" | "efetch";

/**
 * Common E-utility request parameters. Specific utilities add their own.
 */
export interface NcbiRequestParams {
  db: string;
  [key: string]: string | number | undefined;
}

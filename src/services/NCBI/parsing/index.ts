/**
 * @fileoverview Barrel file for NCBI XML parsing helpers.
 * @module src/services/NCBI/parsing/index
 */

export * from "./xmlGenericHelpers.js";
export * from "./pubmedArticleStructureParser.js";
export * from "./paperRecordParser.js";

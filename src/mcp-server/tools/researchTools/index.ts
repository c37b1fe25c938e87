/**
 * @fileoverview Barrel file for the research lookup tools.
 * @module src/mcp-server/tools/researchTools/index
 */

export { registerResearchTools, runToolForMcp } from "./registration.js";

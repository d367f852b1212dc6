/**
 * Pipeline modules export
 */

export { indexer, buildSiteIndex } from "./indexer";
export { validate, validateSite } from "./validator";
export { report } from "./report";

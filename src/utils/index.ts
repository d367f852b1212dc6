/**
 * Utility exports
 */

// URL utilities
export {
  classifyUrl,
  hrefUrl,
  imageUrl,
  normalizePath,
} from "./classify-url";
export { UrlSet } from "./url-set";

// Document utilities
export {
  scanDocument,
  createScanRules,
  serializeOpeningTag,
  DEFAULT_SCAN_RULES,
} from "./scan-document";

// Errors
export {
  MalformedUrlError,
  ScanError,
  IndexError,
  SiteRootError,
  InvalidSelectorError,
  describeError,
} from "./errors";
export type { ScanErrorOptions } from "./errors";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  loadPartialConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Classes
export { Logger } from "./logger";
export { CheckTracker, flattenFinding } from "./check-tracker";

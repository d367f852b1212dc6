/**
 * Central type exports
 */

// Configuration
export type {
  CheckConfig,
  PartialCheckConfig,
  InputConfig,
  ScannerConfig,
  ValidateConfig,
  IndexerConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export { CheckConfigSchema, PartialCheckConfigSchema } from "./config";

// URLs
export type {
  UrlKind,
  SiteUrl,
  InternalUrl,
  ExternalUrl,
  HrefUrl,
  ImageUrl,
} from "./urls";

// Documents & index
export type {
  ScannedDocument,
  ParsedDocument,
  SiteIndex,
  ScanRules,
} from "./documents";

// Findings
export type {
  Finding,
  FindingType,
  BrokenLinkFinding,
  BrokenImageFinding,
  BrokenFragmentFinding,
  DuplicateFragmentFinding,
} from "./findings";
export { FINDING_TYPES } from "./findings";

// Context
export type {
  CheckContext,
  CheckStats,
  ResourceIssue,
  ResourceIssueReason,
} from "./context";

// Tracker
export { CheckTracker } from "../utils/check-tracker";

/**
 * Check context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { CheckConfig } from "./config";
import type { ScanRules, SiteIndex } from "./documents";
import type { Finding } from "./findings";
import type { CheckTracker } from "../utils/check-tracker";
import type { Logger } from "../utils/logger";

// Re-export types from check-tracker
export type {
  ResourceIssue,
  ResourceIssueReason,
  CheckStats,
} from "../utils/check-tracker";

export interface CheckContext {
  // Input - provided at initialization
  config: CheckConfig;
  rules: ScanRules; // Built once from config.scanner

  // Unified tracking for stats, findings and issues
  tracker: CheckTracker;
  logger: Logger;

  index?: SiteIndex; // Written by indexer
  findings?: Finding[]; // Written by validator
  verbose?: boolean;
}

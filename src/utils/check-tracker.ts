/**
 * Check Tracker
 * Unified tracking for stats, findings and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { ZodError } from "zod";
import type { Finding, FindingType } from "../types/findings";
import type { SiteUrl } from "../types/urls";

// ============================================================================
// Types
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface CheckStats {
  // File counts
  scannedFiles: number;
  totalFiles: number;

  // Reference counts (unique per document)
  internalLinks: number;
  externalLinks: number;
  internalImages: number;
  externalImages: number;

  // Finding counts
  brokenLinks: number;
  brokenImages: number;
  brokenFragments: number;
  duplicateFragments: number;

  findings: Finding[];
  issues: ResourceIssue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length > 0 ? `${e.path.map(String).join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

// ============================================================================
// CheckTracker - Main tracker class
// ============================================================================

export class CheckTracker {
  private scannedFiles = 0;
  private totalFiles = 0;
  private internalLinks = 0;
  private externalLinks = 0;
  private internalImages = 0;
  private externalImages = 0;
  private findings: Finding[] = [];
  private issues: ResourceIssue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setFileCounts(scanned: number, total: number): void {
    this.scannedFiles = scanned;
    this.totalFiles = total;
  }

  countLinks(urls: Iterable<SiteUrl>): void {
    for (const url of urls) {
      if (url.external) this.externalLinks++;
      else this.internalLinks++;
    }
  }

  countImages(urls: Iterable<SiteUrl>): void {
    for (const url of urls) {
      if (url.external) this.externalImages++;
      else this.internalImages++;
    }
  }

  // ============================================================================
  // Findings & issues
  // ============================================================================

  addFindings(findings: readonly Finding[]): void {
    this.findings.push(...findings);
  }

  /**
   * Track a configuration or resource issue, auto-detecting the reason
   */
  trackError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getFindings(type?: FindingType): Finding[] {
    if (!type) return this.findings;
    return this.findings.filter((f) => f.type === type);
  }

  getIssues(): ResourceIssue[] {
    return this.issues;
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final check statistics
   */
  getStats(): CheckStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      scannedFiles: this.scannedFiles,
      totalFiles: this.totalFiles,
      internalLinks: this.internalLinks,
      externalLinks: this.externalLinks,
      internalImages: this.internalImages,
      externalImages: this.externalImages,
      brokenLinks: this.getFindings("broken-link").length,
      brokenImages: this.getFindings("broken-image").length,
      brokenFragments: this.getFindings("broken-fragment").length,
      duplicateFragments: this.getFindings("duplicate-fragment").length,
      findings: this.findings,
      issues: this.issues,
      duration,
    };
  }

  /**
   * Findings grouped by type, with URL values flattened to their raw text
   */
  groupFindingsByType(): Record<FindingType, Array<Record<string, string>>> {
    const grouped: Record<FindingType, Array<Record<string, string>>> = {
      "broken-link": [],
      "broken-image": [],
      "broken-fragment": [],
      "duplicate-fragment": [],
    };

    for (const finding of this.findings) {
      grouped[finding.type].push(flattenFinding(finding));
    }

    return grouped;
  }

  /**
   * Write the report as JSON
   */
  async exportReport(filePath: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        scannedFiles: stats.scannedFiles,
        totalFiles: stats.totalFiles,
        internalLinks: stats.internalLinks,
        externalLinks: stats.externalLinks,
        internalImages: stats.internalImages,
        externalImages: stats.externalImages,
        brokenLinks: stats.brokenLinks,
        brokenImages: stats.brokenImages,
        brokenFragments: stats.brokenFragments,
        duplicateFragments: stats.duplicateFragments,
        duration: stats.duration,
      },
      findings: this.groupFindingsByType(),
      issues: stats.issues,
    };

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(exported, null, 2), "utf-8");
  }
}

export function flattenFinding(finding: Finding): Record<string, string> {
  switch (finding.type) {
    case "broken-link":
    case "broken-image":
      return {
        file: finding.file,
        target: finding.target.raw,
        resolved: finding.resolved,
      };
    case "broken-fragment":
      return {
        file: finding.file,
        target: finding.target.raw,
        targetFile: finding.targetFile,
        fragment: finding.fragment,
      };
    case "duplicate-fragment":
      return { file: finding.file, fragment: finding.fragment };
  }
}

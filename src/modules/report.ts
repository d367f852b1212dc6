/**
 * Report Module
 * Displays check statistics and findings with formatting
 */

import chalk from "chalk";
import path from "node:path";
import type { CheckContext, CheckStats, Finding, ResourceIssue } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Section header
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

/**
 * One-line description of a finding, with paths relative to the site root
 *
 * @example
 * describeFinding({ type: "broken-fragment", file: "/site/a.html", ... }, "/site")
 * // => "a.html → b.html#missing"
 */
export function describeFinding(finding: Finding, root: string): string {
  const relative = (file: string) => path.posix.relative(root, file);

  switch (finding.type) {
    case "broken-link":
    case "broken-image":
      return `${relative(finding.file)} → ${finding.target.raw}`;
    case "broken-fragment":
      return `${relative(finding.file)} → ${relative(finding.targetFile)}${finding.fragment}`;
    case "duplicate-fragment":
      return `${relative(finding.file)} ${finding.fragment}`;
  }
}

/**
 * True when the run should fail
 * Duplicate ids only count in strict mode
 */
export function hasFailures(stats: CheckStats, strict = false): boolean {
  return (
    stats.brokenLinks > 0 ||
    stats.brokenImages > 0 ||
    stats.brokenFragments > 0 ||
    (strict && stats.duplicateFragments > 0)
  );
}

// ============================================================================
// Main Report Display
// ============================================================================

export interface ReportOptions {
  reportPath?: string;
  strict?: boolean;
}

/**
 * Export the JSON report (when requested) and display statistics to console
 */
export async function report(
  ctx: CheckContext,
  options: ReportOptions = {},
): Promise<CheckStats> {
  const { tracker, verbose, index } = ctx;

  if (options.reportPath) {
    await tracker.exportReport(options.reportPath);
  }

  const stats = tracker.getStats();
  const root = index?.root ?? "";
  const failed = hasFailures(stats, options.strict);
  const hasWarnings = stats.duplicateFragments > 0 || stats.issues.length > 0;

  console.log("");

  const statusIcon = failed
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Check Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayReferencesSection(stats);
  displayFindingsSection(stats, root, verbose);
  displayIssuesSection(stats.issues, verbose);

  console.log("");

  return stats;
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: CheckStats): void {
  console.log(sectionHeader("Files"));
  console.log(
    statRow(chalk.green("◉"), "Pages scanned", stats.scannedFiles, chalk.green),
  );
  console.log(
    statRow(chalk.cyan("◉"), "Files in site", stats.totalFiles, chalk.cyan),
  );
}

function displayReferencesSection(stats: CheckStats): void {
  console.log(sectionHeader("References"));
  console.log(statRow(chalk.green("◉"), "Internal links", stats.internalLinks));
  console.log(statRow(chalk.green("◉"), "Internal images", stats.internalImages));
  console.log(
    statRow(
      chalk.dim("◉"),
      "External (skipped)",
      stats.externalLinks + stats.externalImages,
      chalk.dim,
    ),
  );
}

function displayFindingsSection(
  stats: CheckStats,
  root: string,
  verbose?: boolean,
): void {
  if (stats.findings.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Findings")));

  const groups: Array<[Finding["type"], string, number, (s: string) => string]> = [
    ["broken-link", "Broken links", stats.brokenLinks, chalk.red],
    ["broken-image", "Broken images", stats.brokenImages, chalk.red],
    ["broken-fragment", "Broken fragments", stats.brokenFragments, chalk.red],
    ["duplicate-fragment", "Duplicate ids", stats.duplicateFragments, chalk.yellow],
  ];

  for (const [type, label, count, color] of groups) {
    if (count === 0) continue;

    console.log(statRow(color("✖"), label, count, color));
    if (verbose) {
      for (const finding of stats.findings.filter((f) => f.type === type)) {
        console.log(`      ${chalk.dim("·")} ${describeFinding(finding, root)}`);
      }
    }
  }
}

function displayIssuesSection(issues: ResourceIssue[], verbose?: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Configuration")));
  console.log(
    statRow(chalk.yellow("✖"), "Files skipped", issues.length, chalk.yellow),
  );

  for (const issue of issues) {
    console.log(`      ${chalk.dim("·")} ${issue.path}`);
    if (verbose && issue.details) {
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }
}

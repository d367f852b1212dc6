/**
 * Validator Module
 * Checks every internal link and image in the site index
 *
 * Unlike indexing, validation never stops early: every finding is collected.
 */

import { posix } from "node:path";
import type {
  CheckContext,
  Finding,
  InternalUrl,
  ParsedDocument,
  SiteIndex,
} from "../types";
import { FINDING_TYPES } from "../types";

export interface ValidateOptions {
  // Filename tried when a target is a directory
  directoryIndex?: string;
  checkDuplicateIds?: boolean;
}

// ============================================================================
// Path Resolution
// ============================================================================

/**
 * Resolve an internal URL to an absolute path
 * - Same-document references resolve to the document itself
 * - Rooted paths resolve against the site root
 * - Relative paths resolve against the document's directory
 */
export function resolveTarget(
  index: SiteIndex,
  from: string,
  url: InternalUrl,
): string {
  if (url.path === "" && !url.rooted) {
    return from;
  }
  const base = url.rooted ? index.root : posix.dirname(from);
  return posix.join(base, url.path);
}

/**
 * Find the file a resolved path refers to, falling back to the directory index
 */
export function locateTarget(
  index: SiteIndex,
  resolved: string,
  directoryIndex: string,
): string | null {
  if (index.files.has(resolved)) {
    return resolved;
  }
  const candidate = posix.join(resolved, directoryIndex);
  return index.files.has(candidate) ? candidate : null;
}

// ============================================================================
// Validation
// ============================================================================

function validateDocument(
  index: SiteIndex,
  document: ParsedDocument,
  options: Required<ValidateOptions>,
): Finding[] {
  const findings: Finding[] = [];
  const file = document.path;

  for (const target of document.links) {
    if (target.external) continue;

    const resolved = resolveTarget(index, file, target);
    const located = locateTarget(index, resolved, options.directoryIndex);

    if (located === null) {
      findings.push({ type: "broken-link", file, target, resolved });
      continue;
    }

    if (target.fragment === null) continue;

    // Only HTML documents in the index have known fragments
    const targetDocument = index.documents.get(located);
    if (targetDocument && !targetDocument.fragments.has(target.fragment)) {
      findings.push({
        type: "broken-fragment",
        file,
        target,
        targetFile: located,
        fragment: target.fragment,
      });
    }
  }

  for (const target of document.images) {
    if (target.external) continue;

    const resolved = resolveTarget(index, file, target);
    if (locateTarget(index, resolved, options.directoryIndex) === null) {
      findings.push({ type: "broken-image", file, target, resolved });
    }
  }

  if (options.checkDuplicateIds) {
    for (const fragment of document.duplicateFragments) {
      findings.push({ type: "duplicate-fragment", file, fragment });
    }
  }

  return findings;
}

function findingLabel(finding: Finding): string {
  switch (finding.type) {
    case "broken-link":
    case "broken-image":
    case "broken-fragment":
      return finding.target.raw;
    case "duplicate-fragment":
      return finding.fragment;
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order findings by file, then type, then target
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareStrings(a.file, b.file) ||
    FINDING_TYPES.indexOf(a.type) - FINDING_TYPES.indexOf(b.type) ||
    compareStrings(findingLabel(a), findingLabel(b))
  );
}

/**
 * Validate every document in the index
 */
export function validateSite(
  index: SiteIndex,
  options: ValidateOptions = {},
): Finding[] {
  const resolved: Required<ValidateOptions> = {
    directoryIndex: options.directoryIndex ?? "index.html",
    checkDuplicateIds: options.checkDuplicateIds ?? false,
  };

  const findings: Finding[] = [];
  for (const document of index.documents.values()) {
    findings.push(...validateDocument(index, document, resolved));
  }

  return findings.sort(compareFindings);
}

/**
 * Validates the indexed site and populates context
 *
 * Writes to context:
 * - findings: Sorted validation findings
 */
export async function validate(ctx: CheckContext): Promise<void> {
  if (!ctx.index) {
    throw new Error("Indexer must run before validator");
  }

  const { config, index, tracker } = ctx;

  for (const document of index.documents.values()) {
    tracker.countLinks(document.links);
    tracker.countImages(document.images);
  }

  const findings = validateSite(index, config.validate);
  tracker.addFindings(findings);
  ctx.findings = findings;
}

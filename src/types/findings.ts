/**
 * Validation finding types
 * Findings are collected and reported, never thrown
 */

import type { HrefUrl, ImageUrl } from "./urls";

export interface BrokenLinkFinding {
  type: "broken-link";
  file: string;
  target: HrefUrl;
  resolved: string; // Absolute path the link resolved to
}

export interface BrokenImageFinding {
  type: "broken-image";
  file: string;
  target: ImageUrl;
  resolved: string;
}

export interface BrokenFragmentFinding {
  type: "broken-fragment";
  file: string;
  target: HrefUrl;
  targetFile: string;
  fragment: string;
}

export interface DuplicateFragmentFinding {
  type: "duplicate-fragment";
  file: string;
  fragment: string;
}

export type Finding =
  | BrokenLinkFinding
  | BrokenImageFinding
  | BrokenFragmentFinding
  | DuplicateFragmentFinding;

export type FindingType = Finding["type"];

export const FINDING_TYPES = [
  "broken-link",
  "broken-image",
  "broken-fragment",
  "duplicate-fragment",
] as const satisfies readonly FindingType[];

/**
 * Index data types
 */

import type { CheerioAPI } from "cheerio";
import type { UrlSet } from "../utils/url-set";
import type { HrefUrl, ImageUrl } from "./urls";

/**
 * References and anchors extracted from a single HTML document
 */
export interface ScannedDocument {
  html: CheerioAPI;
  links: UrlSet<HrefUrl>;
  images: UrlSet<ImageUrl>;
  // Every `id` attribute, prefixed with "#" to match fragment notation
  fragments: ReadonlySet<string>;
  // Ids defined more than once in the document
  duplicateFragments: ReadonlySet<string>;
}

export interface ParsedDocument extends ScannedDocument {
  path: string; // Absolute path with forward slashes, unique index key
  content: string; // Original file text
}

export interface SiteIndex {
  root: string; // Absolute site root
  documents: ReadonlyMap<string, ParsedDocument>;
  // Every regular file under the root (HTML pages and assets)
  files: ReadonlySet<string>;
}

/**
 * Selectors used by the scanner, built once from configuration
 */
export interface ScanRules {
  readonly links: string;
  readonly images: string;
  readonly fragments: string;
}

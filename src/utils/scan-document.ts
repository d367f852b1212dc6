/**
 * Document Scanner
 * Extracts links, images and fragment ids from one HTML document
 */

import { load, type CheerioAPI } from "cheerio";
import { isTag, type Element } from "domhandler";
import type { ScannerConfig } from "../types/config";
import type { ScanRules, ScannedDocument } from "../types/documents";
import type { HrefUrl, ImageUrl, SiteUrl, UrlKind } from "../types/urls";
import { classifyUrl } from "./classify-url";
import { InvalidSelectorError, MalformedUrlError, ScanError } from "./errors";
import { UrlSet } from "./url-set";

/**
 * Build the selector set once from configuration
 * Each selector is run against an empty document so a bad one fails here,
 * before any page is read.
 *
 * @throws {InvalidSelectorError} naming the config key and selector
 */
export function createScanRules(config: ScannerConfig): ScanRules {
  const $ = load("");
  for (const [key, selector] of Object.entries(config)) {
    try {
      $(selector).toArray();
    } catch (error) {
      throw new InvalidSelectorError(key, selector, error);
    }
  }

  return Object.freeze({
    links: config.links,
    images: config.images,
    fragments: config.fragments,
  });
}

export const DEFAULT_SCAN_RULES: ScanRules = createScanRules({
  links: "[href]",
  images: "[src]",
  fragments: "[id]",
});

/**
 * Parse a document and collect its references and anchors
 *
 * The parser is lenient: unclosed tags and unknown attributes are accepted the
 * way browsers accept them. The first reference that cannot be classified
 * aborts the scan.
 *
 * @param file - Path used only to give errors context
 * @throws {ScanError} wrapping the classifier error and the offending element
 */
export function scanDocument(
  content: string,
  rules: ScanRules = DEFAULT_SCAN_RULES,
  file?: string,
): ScannedDocument {
  const $ = load(content);

  const links = new UrlSet<HrefUrl>(collectUrls($, rules.links, "href", file));
  const images = new UrlSet<ImageUrl>(collectUrls($, rules.images, "src", file));

  const fragments = new Set<string>();
  const duplicateFragments = new Set<string>();

  for (const element of $(rules.fragments).toArray()) {
    if (!isTag(element)) continue;
    const id = $(element).attr("id");
    if (id === undefined) continue;

    const fragment = `#${id}`;
    if (fragments.has(fragment)) {
      duplicateFragments.add(fragment);
    }
    fragments.add(fragment);
  }

  return { html: $, links, images, fragments, duplicateFragments };
}

function collectUrls<K extends UrlKind>(
  $: CheerioAPI,
  selector: string,
  attribute: K,
  file: string | undefined,
): Array<SiteUrl<K>> {
  const urls: Array<SiteUrl<K>> = [];

  for (const element of $(selector).toArray()) {
    if (!isTag(element)) continue;
    const value = $(element).attr(attribute);
    if (value === undefined) continue;

    try {
      urls.push(classifyUrl(value, attribute));
    } catch (error) {
      if (error instanceof MalformedUrlError) {
        throw new ScanError(error, {
          file,
          element: serializeOpeningTag(element),
          attribute,
        });
      }
      throw error;
    }
  }

  return urls;
}

/**
 * Serialize the opening tag of an element for diagnostics
 *
 * @example
 * serializeOpeningTag(<a class="nav" href="/x">...</a>)
 * // => '<a class="nav" href="/x">'
 */
export function serializeOpeningTag(element: Element): string {
  const attributes = Object.entries(element.attribs)
    .map(([name, value]) => ` ${name}="${value.replace(/"/g, "&quot;")}"`)
    .join("");
  return `<${element.tagName}${attributes}>`;
}

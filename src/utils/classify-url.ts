/**
 * URL Classifier
 * Turns raw `href`/`src` attribute values into typed, normalized URL values
 */

import type {
  ExternalUrl,
  HrefUrl,
  ImageUrl,
  InternalUrl,
  SiteUrl,
  UrlKind,
} from "../types/urls";
import { MalformedUrlError } from "./errors";

// ============================================================================
// Constants
// ============================================================================

/**
 * RFC 3986 scheme: ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )
 */
const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*$/;

/**
 * HTML strips leading and trailing ASCII whitespace from URL attributes
 */
const EDGE_WHITESPACE_PATTERN = /^[\t\n\f\r ]+|[\t\n\f\r ]+$/g;

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTER_PATTERN = /[\u0000-\u001f\u007f]/;

// Runs of "%XX" escapes, decoded together so multi-byte characters survive
const PERCENT_ESCAPES_PATTERN = /(?:%[0-9A-Fa-f]{2})+/g;

// Placeholder scheme used only to validate protocol-relative URLs
const PROTOCOL_RELATIVE_BASE = "https:";

// ============================================================================
// Functions
// ============================================================================

/**
 * Classify a raw attribute value as an internal or external URL
 *
 * External URLs are recognized by a scheme (`https:`, `mailto:`, `data:`)
 * or a protocol-relative authority (`//cdn.example.com/x`). Everything else is
 * an internal reference whose path is normalized so that different spellings
 * of the same target compare equal.
 *
 * @throws {MalformedUrlError} when the value cannot be classified
 *
 * @example
 * classifyUrl("./guide/../about/", "href")
 * // => { external: false, path: "about", rooted: false, fragment: null, ... }
 *
 * classifyUrl("/docs#setup", "href")
 * // => { external: false, path: "docs", rooted: true, fragment: "#setup", ... }
 *
 * classifyUrl("ht!tp://bad", "href")
 * // => throws MalformedUrlError (invalid scheme "ht!tp")
 */
export function classifyUrl<K extends UrlKind>(raw: string, kind: K): SiteUrl<K> {
  const value = raw.replace(EDGE_WHITESPACE_PATTERN, "");

  if (CONTROL_CHARACTER_PATTERN.test(value)) {
    throw new MalformedUrlError(raw, "contains control characters");
  }

  if (value.startsWith("//")) {
    return classifyExternal(raw, kind, value, true);
  }

  const scheme = extractScheme(value);
  if (scheme !== null) {
    if (!SCHEME_PATTERN.test(scheme)) {
      throw new MalformedUrlError(raw, `invalid scheme "${scheme}"`);
    }
    return classifyExternal(raw, kind, value, false);
  }

  return classifyInternal(raw, kind, value);
}

export function hrefUrl(raw: string): HrefUrl {
  return classifyUrl(raw, "href");
}

export function imageUrl(raw: string): ImageUrl {
  return classifyUrl(raw, "src");
}

/**
 * Normalize a URL path
 * - Collapses repeated slashes and removes "." segments
 * - Resolves ".." against the previous segment
 * - Keeps leading ".." of relative paths, drops ".." above the root of rooted paths
 * - Drops the trailing slash
 *
 * A relative path that collapses to nothing ("./", "docs/..") is returned as
 * "." so it stays distinct from a same-document reference.
 *
 * @example
 * normalizePath("./a//b/../c/")   // => { path: "a/c", rooted: false }
 * normalizePath("/../x")          // => { path: "x", rooted: true }
 * normalizePath("../../x")        // => { path: "../../x", rooted: false }
 */
export function normalizePath(path: string): { path: string; rooted: boolean } {
  const rooted = path.startsWith("/");
  const segments: string[] = [];

  for (const segment of path.split("/")) {
    if (segment === "" || segment === ".") continue;

    if (segment === "..") {
      const last = segments[segments.length - 1];
      if (last !== undefined && last !== "..") {
        segments.pop();
      } else if (!rooted) {
        segments.push("..");
      }
      continue;
    }

    segments.push(segment);
  }

  const normalized = segments.join("/");
  if (normalized === "" && !rooted && path !== "") {
    return { path: ".", rooted };
  }
  return { path: normalized, rooted };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Returns the scheme when a ":" appears before any "/", "?" or "#"
 */
function extractScheme(value: string): string | null {
  const match = /[:/?#]/.exec(value);
  if (!match || match[0] !== ":") {
    return null;
  }
  return value.slice(0, match.index);
}

function classifyExternal<K extends UrlKind>(
  raw: string,
  kind: K,
  value: string,
  protocolRelative: boolean,
): ExternalUrl<K> {
  let href: string;
  try {
    href = protocolRelative
      ? new URL(PROTOCOL_RELATIVE_BASE + value).href.slice(PROTOCOL_RELATIVE_BASE.length)
      : new URL(value).href;
  } catch {
    throw new MalformedUrlError(raw, "not a valid absolute URL");
  }

  const url: ExternalUrl<K> = {
    kind,
    raw,
    key: JSON.stringify([kind, "external", href]),
    external: true,
    href,
    path: null,
    fragment: null,
  };
  return Object.freeze(url);
}

function classifyInternal<K extends UrlKind>(
  raw: string,
  kind: K,
  value: string,
): InternalUrl<K> {
  const hashIndex = value.indexOf("#");
  const beforeHash = hashIndex === -1 ? value : value.slice(0, hashIndex);
  const fragmentPart = hashIndex === -1 ? "" : value.slice(hashIndex + 1);

  const queryIndex = beforeHash.indexOf("?");
  const pathPart = queryIndex === -1 ? beforeHash : beforeHash.slice(0, queryIndex);

  const { path, rooted } = normalizePath(decode(pathPart));
  const fragment = fragmentPart === "" ? null : `#${decode(fragmentPart)}`;

  const url: InternalUrl<K> = {
    kind,
    raw,
    key: JSON.stringify([kind, "internal", rooted, path, fragment]),
    external: false,
    path,
    rooted,
    fragment,
  };
  return Object.freeze(url);
}

/**
 * Percent-decode a path or fragment
 * A "%" that does not start a valid UTF-8 escape is kept as written ("50%.png").
 */
function decode(component: string): string {
  try {
    return decodeURIComponent(component);
  } catch {
    return component.replace(PERCENT_ESCAPES_PATTERN, (escapes) => {
      try {
        return decodeURIComponent(escapes);
      } catch {
        return escapes;
      }
    });
  }
}

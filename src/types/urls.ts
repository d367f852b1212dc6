/**
 * URL value types produced by the classifier
 */

/**
 * Which attribute a reference was read from.
 * Links come from `href`, images (and other embedded resources) from `src`.
 */
export type UrlKind = "href" | "src";

interface BaseUrl<K extends UrlKind> {
  kind: K;
  // Attribute value as written in the document (not part of identity)
  raw: string;
  // Structural identity: two values are equal iff their keys are equal
  key: string;
}

export interface InternalUrl<K extends UrlKind = UrlKind> extends BaseUrl<K> {
  external: false;
  path: string; // Normalized path, "" for a same-document reference
  rooted: boolean; // True when the path starts at the site root ("/about")
  fragment: string | null; // "#section", percent-decoded
}

export interface ExternalUrl<K extends UrlKind = UrlKind> extends BaseUrl<K> {
  external: true;
  href: string; // Serialized absolute URL
  path: null;
  fragment: null;
}

export type SiteUrl<K extends UrlKind = UrlKind> = InternalUrl<K> | ExternalUrl<K>;

export type HrefUrl = SiteUrl<"href">;
export type ImageUrl = SiteUrl<"src">;

/**
 * Set of URL values deduplicated by structural key
 */

import type { SiteUrl } from "../types/urls";

export class UrlSet<T extends SiteUrl> implements Iterable<T> {
  private readonly entries = new Map<string, T>();

  constructor(values: Iterable<T> = []) {
    for (const value of values) {
      this.add(value);
    }
  }

  /**
   * Add a URL, keeping the first value seen for a given key
   */
  add(url: T): this {
    if (!this.entries.has(url.key)) {
      this.entries.set(url.key, url);
    }
    return this;
  }

  has(url: T): boolean {
    return this.entries.has(url.key);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): IterableIterator<string> {
    return this.entries.keys();
  }

  values(): IterableIterator<T> {
    return this.entries.values();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.entries.values();
  }

  /**
   * True when both sets hold the same keys, regardless of insertion order
   */
  equals(other: UrlSet<T>): boolean {
    if (other.size !== this.size) return false;
    for (const key of this.entries.keys()) {
      if (!other.entries.has(key)) return false;
    }
    return true;
  }
}

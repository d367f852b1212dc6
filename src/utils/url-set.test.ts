import { describe, it, expect } from "vitest";
import { hrefUrl } from "./classify-url";
import { UrlSet } from "./url-set";

describe("UrlSet", () => {
  it("collapses values with the same key", () => {
    const set = new UrlSet([hrefUrl("b.html"), hrefUrl("./b.html"), hrefUrl("b.html")]);
    expect(set.size).toBe(1);
  });

  it("keeps the first value seen for a key", () => {
    const set = new UrlSet([hrefUrl("./b.html"), hrefUrl("b.html")]);
    expect([...set].map((url) => url.raw)).toEqual(["./b.html"]);
  });

  it("checks membership structurally", () => {
    const set = new UrlSet([hrefUrl("/docs/")]);
    expect(set.has(hrefUrl("/docs"))).toBe(true);
    expect(set.has(hrefUrl("docs"))).toBe(false);
  });

  it("compares sets regardless of insertion order", () => {
    const a = new UrlSet([hrefUrl("a.html"), hrefUrl("#x")]);
    const b = new UrlSet([hrefUrl("#x"), hrefUrl("a.html")]);
    const c = new UrlSet([hrefUrl("a.html")]);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
  });
});

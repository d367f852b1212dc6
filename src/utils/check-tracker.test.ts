import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { CheckTracker, flattenFinding } from "./check-tracker";
import { hrefUrl, imageUrl } from "./classify-url";
import { PartialCheckConfigSchema } from "../types/config";
import type { Finding } from "../types";

const brokenLink: Finding = {
  type: "broken-link",
  file: "/site/a.html",
  target: hrefUrl("c.html"),
  resolved: "/site/c.html",
};

const brokenFragment: Finding = {
  type: "broken-fragment",
  file: "/site/a.html",
  target: hrefUrl("b.html#missing"),
  targetFile: "/site/b.html",
  fragment: "#missing",
};

describe("CheckTracker", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("counts internal and external references separately", () => {
    const tracker = new CheckTracker();
    tracker.countLinks([hrefUrl("a.html"), hrefUrl("https://example.com"), hrefUrl("#x")]);
    tracker.countImages([imageUrl("logo.png")]);

    const stats = tracker.getStats();
    expect(stats.internalLinks).toBe(2);
    expect(stats.externalLinks).toBe(1);
    expect(stats.internalImages).toBe(1);
    expect(stats.externalImages).toBe(0);
  });

  it("counts findings by type", () => {
    const tracker = new CheckTracker();
    tracker.addFindings([brokenLink, brokenFragment]);

    const stats = tracker.getStats();
    expect(stats.brokenLinks).toBe(1);
    expect(stats.brokenFragments).toBe(1);
    expect(stats.brokenImages).toBe(0);
    expect(tracker.getFindings("broken-fragment")).toEqual([brokenFragment]);
  });

  it("maps schema errors to schema-validation issues", () => {
    const tracker = new CheckTracker();
    const result = PartialCheckConfigSchema.safeParse({ indexer: { concurrency: 0 } });
    expect(result.success).toBe(false);

    tracker.trackError("/etc/config.json", result.error);

    const [issue] = tracker.getIssues();
    expect(issue.reason).toBe("schema-validation");
    expect(issue.path).toBe("/etc/config.json");
    expect(issue.details).toMatch(/^indexer\.concurrency: /);
  });

  it("maps syntax errors to invalid-json issues", () => {
    const tracker = new CheckTracker();
    tracker.trackError("config.json", new SyntaxError("Unexpected token"));

    expect(tracker.getIssues()).toEqual([
      {
        type: "resource",
        path: "config.json",
        reason: "invalid-json",
        details: "Unexpected token",
      },
    ]);
  });

  it("flattens findings to their raw targets", () => {
    expect(flattenFinding(brokenLink)).toEqual({
      file: "/site/a.html",
      target: "c.html",
      resolved: "/site/c.html",
    });
    expect(flattenFinding(brokenFragment)).toEqual({
      file: "/site/a.html",
      target: "b.html#missing",
      targetFile: "/site/b.html",
      fragment: "#missing",
    });
  });

  it("exports a JSON report", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "site-xref-report-"));
    const reportPath = path.join(dir, "nested", "report.json");

    const tracker = new CheckTracker();
    tracker.setFileCounts(2, 5);
    tracker.addFindings([brokenLink]);
    await tracker.exportReport(reportPath);

    const exported = JSON.parse(await readFile(reportPath, "utf-8"));
    expect(exported.summary).toMatchObject({
      scannedFiles: 2,
      totalFiles: 5,
      brokenLinks: 1,
      brokenFragments: 0,
    });
    expect(exported.findings["broken-link"]).toEqual([
      { file: "/site/a.html", target: "c.html", resolved: "/site/c.html" },
    ]);
    expect(exported.findings["broken-image"]).toEqual([]);
    expect(exported.issues).toEqual([]);
  });
});

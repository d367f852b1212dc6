import { describe, it, expect, vi, afterEach } from "vitest";
import { describeFinding, formatDuration, hasFailures, report } from "./report";
import { CheckTracker, DEFAULT_SCAN_RULES, Logger, hrefUrl, imageUrl, loadDefaultConfig } from "../utils";
import type { CheckContext, CheckStats, Finding } from "../types";

function statsWith(overrides: Partial<CheckStats>): CheckStats {
  return {
    scannedFiles: 0,
    totalFiles: 0,
    internalLinks: 0,
    externalLinks: 0,
    internalImages: 0,
    externalImages: 0,
    brokenLinks: 0,
    brokenImages: 0,
    brokenFragments: 0,
    duplicateFragments: 0,
    findings: [],
    issues: [],
    duration: 0,
    ...overrides,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("formatDuration", () => {
  it("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(500)).toBe("500ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});

describe("describeFinding", () => {
  it("shows paths relative to the site root", () => {
    const fragment: Finding = {
      type: "broken-fragment",
      file: "/site/a.html",
      target: hrefUrl("b.html#missing"),
      targetFile: "/site/b.html",
      fragment: "#missing",
    };
    const image: Finding = {
      type: "broken-image",
      file: "/site/guide/page.html",
      target: imageUrl("../img/x.png"),
      resolved: "/site/img/x.png",
    };

    expect(describeFinding(fragment, "/site")).toBe("a.html → b.html#missing");
    expect(describeFinding(image, "/site")).toBe("guide/page.html → ../img/x.png");
    expect(
      describeFinding({ type: "duplicate-fragment", file: "/site/a.html", fragment: "#x" }, "/site"),
    ).toBe("a.html #x");
  });
});

describe("hasFailures", () => {
  it("fails on broken references", () => {
    expect(hasFailures(statsWith({}))).toBe(false);
    expect(hasFailures(statsWith({ brokenLinks: 1 }))).toBe(true);
    expect(hasFailures(statsWith({ brokenImages: 1 }))).toBe(true);
    expect(hasFailures(statsWith({ brokenFragments: 1 }))).toBe(true);
  });

  it("fails on duplicate ids only in strict mode", () => {
    expect(hasFailures(statsWith({ duplicateFragments: 1 }))).toBe(false);
    expect(hasFailures(statsWith({ duplicateFragments: 1 }), true)).toBe(true);
  });
});

describe("report", () => {
  it("prints the summary and returns the stats", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const tracker = new CheckTracker();
    tracker.setFileCounts(3, 7);

    const ctx: CheckContext = {
      config: loadDefaultConfig(),
      rules: DEFAULT_SCAN_RULES,
      tracker,
      logger: new Logger("error"),
    };

    const stats = await report(ctx);

    expect(stats.scannedFiles).toBe(3);
    expect(log.mock.calls.some(([line]) => String(line).includes("Check Complete"))).toBe(true);
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ZodError } from "zod";
import {
  loadConfig,
  loadDefaultConfig,
  loadPartialConfig,
  mergeConfig,
} from "./load-config";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "site-xref-config-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeConfig(name: string, content: string): Promise<string> {
  const configPath = path.join(dir, name);
  await writeFile(configPath, content, "utf-8");
  return configPath;
}

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", () => {
    const config = loadDefaultConfig();

    expect(config.input.pattern).toBe("**/*.html");
    expect(config.scanner).toEqual({
      links: "[href]",
      images: "[src]",
      fragments: "[id]",
    });
    expect(config.validate).toEqual({
      directoryIndex: "index.html",
      checkDuplicateIds: false,
    });
  });
});

describe("mergeConfig", () => {
  it("merges nested sections", () => {
    const merged = mergeConfig(loadDefaultConfig(), {
      input: { directory: "out", ignore: ["drafts/**"] },
      validate: { checkDuplicateIds: true },
    });

    expect(merged.input).toEqual({
      directory: "out",
      pattern: "**/*.html",
      ignore: ["drafts/**"],
      encoding: "utf-8",
    });
    expect(merged.validate).toEqual({
      directoryIndex: "index.html",
      checkDuplicateIds: true,
    });
  });

  it("accumulates ignore globs", () => {
    const base = mergeConfig(loadDefaultConfig(), { input: { ignore: ["a/**"] } });
    const merged = mergeConfig(base, { input: { ignore: ["b/**"] } });

    expect(merged.input.ignore).toEqual(["a/**", "b/**"]);
  });
});

describe("loadPartialConfig", () => {
  it("rejects values that fail the schema", async () => {
    const configPath = await writeConfig("bad.json", `{ "indexer": { "concurrency": 0 } }`);

    await expect(loadPartialConfig(configPath)).rejects.toBeInstanceOf(ZodError);
  });

  it("rejects invalid JSON", async () => {
    const configPath = await writeConfig("broken.json", `{ "indexer": `);

    await expect(loadPartialConfig(configPath)).rejects.toBeInstanceOf(SyntaxError);
  });

  it("rejects unknown encodings", async () => {
    const configPath = await writeConfig("enc.json", `{ "input": { "encoding": "klingon" } }`);

    await expect(loadPartialConfig(configPath)).rejects.toBeInstanceOf(ZodError);
  });
});

describe("loadConfig", () => {
  it("applies a custom config file", async () => {
    const configPath = await writeConfig(
      "custom.json",
      `{ "indexer": { "concurrency": 2 }, "logging": { "level": "debug" } }`,
    );

    const { config, errors } = await loadConfig(configPath);

    expect(config.indexer.concurrency).toBe(2);
    expect(config.logging.level).toBe("debug");
    expect(errors.map((e) => e.path)).not.toContain(configPath);
  });

  it("reports an invalid custom config and keeps going", async () => {
    const configPath = await writeConfig("bad.json", `{ "scanner": { "links": "" } }`);

    const { config, errors } = await loadConfig(configPath);

    expect(errors.map((e) => e.path)).toContain(configPath);
    expect(config.scanner.links.length).toBeGreaterThan(0);
  });
});

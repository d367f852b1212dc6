/**
 * Indexer Module
 * Discovers HTML files under the site root and scans each into the site index
 */

import glob from "fast-glob";
import { readFile, stat } from "fs/promises";
import path from "node:path";
import type {
  CheckContext,
  ParsedDocument,
  ScanRules,
  SiteIndex,
} from "../types";
import { IndexError, SiteRootError, scanDocument, type Logger } from "../utils";

export interface BuildIndexOptions {
  root: string;
  rules: ScanRules;
  pattern?: string;
  ignore?: string[];
  encoding?: BufferEncoding;
  concurrency?: number;
  logger?: Logger;
}

/**
 * Convert a platform path to the forward-slash form fast-glob returns
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

/**
 * Run `task` over `items` with at most `limit` tasks in flight
 *
 * Results keep the order of `items`. After the first rejection no further
 * items are started; tasks already running finish and their results are
 * dropped.
 */
export async function mapWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed && cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = await task(items[index]);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  const workers = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

/**
 * Reject a root that is missing or not a directory
 * An empty glob result would otherwise pass as a site with no pages.
 */
async function assertSiteRoot(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new SiteRootError(root, "does not exist");
    }
    throw error;
  }
  if (!isDirectory) {
    throw new SiteRootError(root, "is not a directory");
  }
}

/**
 * Build the site index
 *
 * Indexing is all-or-nothing: the first file that cannot be read or scanned
 * rejects with an IndexError naming that file, and no index is returned.
 */
export async function buildSiteIndex(
  options: BuildIndexOptions,
): Promise<SiteIndex> {
  const {
    rules,
    pattern = "**/*.html",
    ignore = [],
    encoding = "utf-8",
    concurrency = 8,
    logger,
  } = options;
  const root = toPosixPath(path.resolve(options.root));
  await assertSiteRoot(root);

  // onlyFiles drops directories and symlinks that do not point at a file
  const htmlFiles = await glob(pattern, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    ignore,
  });
  const allFiles = await glob("**/*", {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: true,
  });

  // Discovery order is irrelevant to the index, but sorted keys keep reports stable
  htmlFiles.sort();

  async function indexFile(file: string): Promise<ParsedDocument> {
    try {
      const content = await readFile(file, encoding);
      const scanned = scanDocument(content, rules, file);
      logger?.debug(
        `Scanned ${file} (${scanned.links.size} links, ${scanned.images.size} images, ${scanned.fragments.size} ids)`,
      );
      return { path: file, content, ...scanned };
    } catch (error) {
      throw new IndexError(file, error);
    }
  }

  const parsed = await mapWithLimit(htmlFiles, concurrency, indexFile);

  // Single collection point: records are inserted only after every scan succeeded
  const documents = new Map<string, ParsedDocument>();
  for (const document of parsed) {
    documents.set(document.path, document);
  }

  const files = new Set<string>([...allFiles, ...documents.keys()]);

  logger?.debug(`Indexed ${documents.size} documents (${files.size} files) under ${root}`);

  return { root, documents, files };
}

/**
 * Builds the site index and populates context
 *
 * Writes to context:
 * - index: Completed site index
 */
export async function indexer(ctx: CheckContext): Promise<void> {
  const { config, rules, tracker, logger } = ctx;

  const index = await buildSiteIndex({
    root: config.input.directory,
    pattern: config.input.pattern,
    ignore: config.input.ignore,
    encoding: config.input.encoding,
    concurrency: config.indexer.concurrency,
    rules,
    logger,
  });

  tracker.setFileCounts(index.documents.size, index.files.size);
  ctx.index = index;
}

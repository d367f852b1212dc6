/**
 * Error classes for the scan pipeline
 * Each layer wraps the error below it and adds its own context
 */

export class MalformedUrlError extends Error {
  public readonly code = "malformed-url";
  public readonly raw: string;
  public readonly reason: string;

  constructor(raw: string, reason: string) {
    super(`Malformed URL "${raw}": ${reason}`);
    this.name = "MalformedUrlError";
    this.raw = raw;
    this.reason = reason;
    Error.captureStackTrace(this, MalformedUrlError);
  }
}

export type ScanErrorOptions = {
  file?: string;
  element: string;
  attribute: string;
};

export class ScanError extends Error {
  public readonly code = "scan-error";
  public readonly file: string | undefined;
  public readonly element: string;
  public readonly attribute: string;
  public override readonly cause: MalformedUrlError;

  constructor(cause: MalformedUrlError, opts: ScanErrorOptions) {
    super(`Invalid ${opts.attribute} in element ${opts.element}: ${cause.message}`);
    this.name = "ScanError";
    this.file = opts.file;
    this.element = opts.element;
    this.attribute = opts.attribute;
    this.cause = cause;
    Error.captureStackTrace(this, ScanError);
  }
}

export class IndexError extends Error {
  public readonly code = "index-error";
  public readonly file: string;
  // A ScanError, or whatever reading the file threw
  public override readonly cause: unknown;

  constructor(file: string, cause: unknown) {
    super(`Error indexing file \`${file}\`: ${messageOf(cause)}`);
    this.name = "IndexError";
    this.file = file;
    this.cause = cause;
    Error.captureStackTrace(this, IndexError);
  }
}

export class SiteRootError extends Error {
  public readonly code = "site-root";
  public readonly root: string;

  constructor(root: string, reason: string) {
    super(`Site root \`${root}\` ${reason}`);
    this.name = "SiteRootError";
    this.root = root;
    Error.captureStackTrace(this, SiteRootError);
  }
}

export class InvalidSelectorError extends Error {
  public readonly code = "invalid-selector";
  // Config key under "scanner", e.g. "links"
  public readonly key: string;
  public readonly selector: string;

  constructor(key: string, selector: string, cause: unknown) {
    super(`Invalid selector for scanner.${key} "${selector}": ${messageOf(cause)}`);
    this.name = "InvalidSelectorError";
    this.key = key;
    this.selector = selector;
    Error.captureStackTrace(this, InvalidSelectorError);
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error chain as indented lines, outermost first
 *
 * @example
 * describeError(indexError)
 * // => "Error indexing file `/site/a.html`
 * //       in element <a href="ht!tp://bad">
 * //       Malformed URL "ht!tp://bad": invalid scheme "ht!tp""
 */
export function describeError(error: unknown): string {
  if (error instanceof IndexError) {
    return [`Error indexing file \`${error.file}\``, indent(describeError(error.cause))].join("\n");
  }
  if (error instanceof ScanError) {
    return [`in element ${error.element}`, describeError(error.cause)].join("\n");
  }
  return messageOf(error);
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}

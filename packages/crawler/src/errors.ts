import type { CrawlErrorEntry, CrawlResult, FetchErrorKind } from "./types.js";

export class CrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected options. Raised before any request is made. */
export class ConfigError extends CrawlerError {}

export class InvalidUrlError extends CrawlerError {
  readonly href: string;

  constructor(href: string, reason: string) {
    super(`Invalid URL "${href}": ${reason}`);
    this.href = href;
  }
}

export class FetchError extends CrawlerError {
  readonly url: string;
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(url: string, kind: FetchErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.url = url;
    this.kind = kind;
    this.status = options?.status;
  }

  toEntry(depth: number): CrawlErrorEntry {
    const entry: CrawlErrorEntry = { url: this.url, depth, kind: this.kind, message: this.message };
    if (this.status !== undefined) {
      entry.status = this.status;
    }
    return entry;
  }
}

/** The document could not be parsed at all. Recorded like a fetch failure. */
export class ParseError extends FetchError {
  constructor(url: string, message: string, cause?: unknown) {
    super(url, "parse", message, { cause });
  }
}

/** The seed itself could not be fetched, so there is nothing to crawl. */
export class CrawlFailedError extends CrawlerError {
  readonly result: CrawlResult;

  constructor(message: string, result: CrawlResult, cause?: unknown) {
    super(message, { cause });
    this.result = result;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

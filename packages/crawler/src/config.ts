import { ConfigError } from "./errors.js";
import type { CommentOptions, CommentTypeFilter, CrawlOptions, ResolvedCrawlOptions } from "./types.js";

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

const COMMENT_TYPE_FILTERS: readonly CommentTypeFilter[] = ["html", "javascript", "js_single", "js_multi"];

export function readPositiveInt(envVar: string, fallback: number): number {
  const raw = process.env[envVar];
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Like `readPositiveInt` but accepts 0. */
export function readNonNegativeInt(envVar: string, fallback: number): number {
  const raw = process.env[envVar];
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got ${value})`);
  }
  return value;
}

function resolveStartUrl(startUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(startUrl.trim());
  } catch {
    throw new ConfigError(`startUrl is not a valid absolute URL: "${startUrl}"`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`startUrl must use http or https (got ${parsed.protocol})`);
  }
  parsed.hash = "";
  return parsed.href;
}

function resolveComments(comments: CrawlOptions["comments"]): CommentOptions | null {
  if (!comments) {
    return null;
  }
  if (comments === true) {
    return {};
  }
  if (comments.type !== undefined && !COMMENT_TYPE_FILTERS.includes(comments.type)) {
    throw new ConfigError(`comments.type must be one of ${COMMENT_TYPE_FILTERS.join(", ")}`);
  }
  const minLength = comments.minLength ?? 0;
  requireInteger("comments.minLength", minLength, 0);
  return { type: comments.type, minLength };
}

/**
 * Validate caller options and fill in defaults. Defaults can be tuned through
 * the environment (CRAWL_MAX_DEPTH, CRAWL_MAX_PAGES, CRAWL_CONCURRENCY, ...).
 */
export function resolveCrawlOptions(options: CrawlOptions): ResolvedCrawlOptions {
  const maxConcurrency = readPositiveInt("MAX_CRAWL_CONCURRENCY", 10);
  const concurrency = requireInteger(
    "concurrency",
    options.concurrency ?? readPositiveInt("CRAWL_CONCURRENCY", 3),
    1
  );

  const headers: Record<string, string> = {
    "user-agent": process.env.CRAWL_USER_AGENT || DEFAULT_USER_AGENT,
  };
  for (const [name, value] of Object.entries(options.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }

  const resolved: ResolvedCrawlOptions = {
    startUrl: resolveStartUrl(options.startUrl),
    maxDepth: requireInteger("maxDepth", options.maxDepth ?? readNonNegativeInt("CRAWL_MAX_DEPTH", 2), 0),
    maxPages: requireInteger("maxPages", options.maxPages ?? readPositiveInt("CRAWL_MAX_PAGES", 50), 1),
    headers,
    followRule: options.followRule ?? "internal",
    includeSubdomains: options.includeSubdomains ?? false,
    allowDuplicates: options.allowDuplicates ?? false,
    concurrency: Math.min(concurrency, maxConcurrency),
    timeoutMs: requireInteger(
      "timeoutMs",
      options.timeoutMs ?? readPositiveInt("CRAWL_FETCH_TIMEOUT_MS", 30_000),
      1
    ),
    retries: requireInteger("retries", options.retries ?? readNonNegativeInt("CRAWL_PAGE_MAX_RETRIES", 0), 0),
    retryDelayMs: requireInteger(
      "retryDelayMs",
      options.retryDelayMs ?? readNonNegativeInt("CRAWL_RETRY_DELAY_MS", 1000),
      0
    ),
    renderJs: options.renderJs ?? false,
    nonCrawlableSchemes: options.nonCrawlableSchemes ?? "record",
    includeEmbeds: options.includeEmbeds ?? true,
    includeSrcset: options.includeSrcset ?? false,
    comments: resolveComments(options.comments),
  };

  if (resolved.followRule !== "internal" && resolved.followRule !== "all") {
    throw new ConfigError(`followRule must be "internal" or "all"`);
  }

  return Object.freeze(resolved);
}

/** Parse a JSON object of request headers, e.g. from a command-line flag. */
export function parseHeaders(json: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new ConfigError("Invalid JSON format for headers");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError("Headers must be a JSON object");
  }
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new ConfigError(`Header "${name}" must be a string`);
    }
    headers[name] = value;
  }
  return headers;
}

/** Split a comma-separated option value: `"pdf, .DOCX"` → `["pdf", "docx"]`. */
export function parseListOption(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase().replace(/^\./, ""))
    .filter(Boolean);
}

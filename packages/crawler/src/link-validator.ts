import { DEFAULT_USER_AGENT, readPositiveInt } from "./config.js";
import { errorMessage } from "./errors.js";
import { HttpFetcher, type Fetcher } from "./fetcher.js";
import { log } from "./logger.js";
import type { Link } from "./types.js";
import { isCrawlableScheme } from "./url-classifier.js";

export interface LinkValidation {
  /** HTTP status, "unreachable" when no response arrived, "skipped" for non-HTTP links. */
  status: number | "unreachable" | "skipped";
  accessible: boolean;
  error?: string;
}

export type ValidatedLink = Link & { validation: LinkValidation };

export interface ValidateOptions {
  fetcher?: Fetcher;
  headers?: Record<string, string>;
  timeoutMs?: number;
  concurrency?: number;
}

/**
 * Annotate every link with a reachability check. Each distinct URL is probed
 * once; links are never dropped and a failed probe is recorded, not thrown.
 */
export async function validateLinks(links: readonly Link[], options: ValidateOptions = {}): Promise<ValidatedLink[]> {
  const fetcher = options.fetcher ?? new HttpFetcher();
  const headers = { "user-agent": DEFAULT_USER_AGENT, ...options.headers };
  const timeoutMs = options.timeoutMs ?? readPositiveInt("CRAWL_VALIDATE_TIMEOUT_MS", 10_000);
  const concurrency = Math.max(1, options.concurrency ?? readPositiveInt("CRAWL_VALIDATE_CONCURRENCY", 5));

  const urls = [...new Set(links.filter((link) => isCrawlableScheme(link.url)).map((link) => link.url))];
  const outcomes = new Map<string, LinkValidation>();
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(concurrency, urls.length) }, async () => {
    while (nextIndex < urls.length) {
      const url = urls[nextIndex++];
      try {
        const status = await fetcher.probe(url, { headers, timeoutMs });
        outcomes.set(url, { status, accessible: status < 400 });
      } catch (error) {
        log.debug(`Validation failed for ${url}: ${errorMessage(error)}`, url);
        outcomes.set(url, { status: "unreachable", accessible: false, error: errorMessage(error) });
      }
    }
  });
  try {
    await Promise.all(workers);
  } finally {
    if (!options.fetcher) {
      await fetcher.close();
    }
  }

  const accessible = [...outcomes.values()].filter((outcome) => outcome.accessible).length;
  log.info(`Validated ${urls.length} unique URLs: ${accessible} accessible`);

  return links.map((link) => ({
    ...link,
    validation: outcomes.get(link.url) ?? { status: "skipped", accessible: false },
  }));
}

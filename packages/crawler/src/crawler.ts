import { BrowserFetcher } from "./browser-fetcher.js";
import { countCommentTypes, extractComments, filterComments } from "./comment-extractor.js";
import { resolveCrawlOptions } from "./config.js";
import { parseDocument, type ParsedDocument } from "./document.js";
import { CrawlFailedError, CrawlerError, errorMessage } from "./errors.js";
import { HttpFetcher, toFetchError, type Fetcher } from "./fetcher.js";
import { extractLinks } from "./link-extractor.js";
import { log, runWithLogCallback } from "./logger.js";
import { withRetry } from "./retry.js";
import type {
  CrawlErrorEntry,
  CrawlOptions,
  CrawlPhase,
  CrawlProgress,
  CrawlResult,
  FrontierEntry,
  Link,
  PageFetchResult,
  PageSummary,
  ResolvedCrawlOptions,
  TerminationReason,
} from "./types.js";
import { dedupKey, looksLikePage } from "./url-classifier.js";

const PROGRESS_LOG_INTERVAL = 25;

export function createFetcher(options: { renderJs: boolean }): Fetcher {
  return options.renderJs ? new BrowserFetcher() : new HttpFetcher();
}

/**
 * One crawl session. Owns the frontier, the visited set and the page counter;
 * workers share them through this instance only. JavaScript runs the workers
 * on one thread, so every check-then-update below that has no `await` in
 * between is atomic with respect to the other workers.
 */
export class CrawlScheduler {
  readonly options: ResolvedCrawlOptions;
  private readonly fetcher: Fetcher;
  private readonly ownsFetcher: boolean;
  private readonly hooks: Pick<CrawlOptions, "signal" | "shouldAbort" | "onProgress" | "onLog">;

  private phase: CrawlPhase = "idle";
  private readonly visited = new Set<string>();
  private nextLevel: FrontierEntry[] = [];
  private pagesCrawled = 0;
  private readonly links: Link[] = [];
  private readonly firstOccurrence = new Map<string, number>();
  private readonly pages: PageSummary[] = [];
  private readonly errors: CrawlErrorEntry[] = [];
  private started = false;
  private aborted = false;
  private limitReached = false;
  private seedFailure: unknown = null;
  private startedAt = 0;

  constructor(options: CrawlOptions) {
    this.options = resolveCrawlOptions(options);
    this.fetcher = options.fetcher ?? createFetcher(this.options);
    this.ownsFetcher = options.fetcher === undefined;
    this.hooks = {
      signal: options.signal,
      shouldAbort: options.shouldAbort,
      onProgress: options.onProgress,
      onLog: options.onLog,
    };
  }

  get state(): CrawlPhase {
    return this.phase;
  }

  async run(): Promise<CrawlResult> {
    if (this.started) {
      throw new CrawlerError("A crawl session can only be run once; create a new scheduler");
    }
    this.started = true;
    return runWithLogCallback(this.hooks.onLog ?? null, async () => {
      this.startedAt = Date.now();
      const { startUrl, maxDepth, maxPages } = this.options;
      log.info(`Crawling ${startUrl} (max depth ${maxDepth}, max pages ${maxPages}, concurrency ${this.options.concurrency})`);

      this.visited.add(dedupKey(startUrl));
      let level: FrontierEntry[] = [{ url: startUrl, depth: 0 }];

      try {
        while (level.length > 0) {
          this.nextLevel = [];
          await this.drainLevel(level);

          if (this.seedFailure !== null) {
            this.phase = "failed";
            const result = this.buildResult();
            throw new CrawlFailedError(
              `Failed to fetch start URL ${startUrl}: ${errorMessage(this.seedFailure)}`,
              result,
              this.seedFailure
            );
          }
          if (this.aborted || this.limitReached) {
            break;
          }
          if (this.nextLevel.length > 0 && this.pagesCrawled >= maxPages) {
            this.limitReached = true;
            break;
          }
          level = this.nextLevel;
        }
      } finally {
        if (this.ownsFetcher) {
          await this.fetcher.close();
        }
      }

      this.phase = "done";
      const result = this.buildResult();
      log.info(
        `Crawl finished (${result.terminationReason}): ${result.pagesCrawled} pages, ` +
          `${result.links.length} links, ${result.errors.length} errors`
      );
      await this.reportProgress();
      return result;
    });
  }

  /**
   * Breadth-first: every entry of one depth is taken before the next depth
   * starts, so no depth d+1 fetch begins while depth d work is queued.
   */
  private async drainLevel(level: FrontierEntry[]): Promise<void> {
    let nextIndex = 0;
    const takeNext = (): FrontierEntry | null => {
      if (nextIndex >= level.length) {
        return null;
      }
      // Check and reserve the page slot before the fetch is issued.
      if (this.pagesCrawled >= this.options.maxPages) {
        this.limitReached = true;
        return null;
      }
      this.pagesCrawled += 1;
      return level[nextIndex++];
    };

    let workerFailed = false;
    const workerCount = Math.max(1, Math.min(this.options.concurrency, level.length));
    const workers = Array.from({ length: workerCount }, async () => {
      try {
        while (!workerFailed) {
          if (await this.shouldStop()) {
            return;
          }
          const entry = takeNext();
          if (!entry) {
            return;
          }
          await this.processEntry(entry);
        }
      } catch (error) {
        workerFailed = true;
        throw error;
      }
    });

    // Every worker settles before the caller may close the fetcher.
    const outcomes = await Promise.allSettled(workers);
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        throw outcome.reason;
      }
    }
  }

  private async processEntry(entry: FrontierEntry): Promise<void> {
    this.phase = "fetching";
    await this.reportProgress(entry);

    const page = await this.fetchEntry(entry);
    if (!page) {
      return;
    }

    this.phase = "extracting";
    let document: ParsedDocument;
    try {
      document = parseDocument(page.html, page.url);
    } catch (error) {
      this.recordFailure(entry, error);
      return;
    }

    const pageLinks = extractLinks(document, {
      seedUrl: this.options.startUrl,
      includeSubdomains: this.options.includeSubdomains,
      includeEmbeds: this.options.includeEmbeds,
      includeSrcset: this.options.includeSrcset,
      nonCrawlableSchemes: this.options.nonCrawlableSchemes,
    });
    this.appendLinks(pageLinks);
    this.pages.push(this.summarizePage(entry, page, document, pageLinks));

    this.phase = "enqueuing";
    // A redirect target counts as visited too.
    this.visited.add(dedupKey(page.url));
    if (entry.depth < this.options.maxDepth) {
      let enqueued = 0;
      for (const link of pageLinks) {
        if (this.isFollowable(link) && this.enqueue(link.url, entry.depth + 1)) {
          enqueued += 1;
        }
      }
      log.debug(`Found ${pageLinks.length} links, queued ${enqueued} at depth ${entry.depth + 1}`, entry.url);
    }

    if (this.pagesCrawled % PROGRESS_LOG_INTERVAL === 0) {
      log.info(
        `Progress: ${this.pagesCrawled}/${this.options.maxPages} pages, ${this.links.length} links, ${this.errors.length} errors`
      );
    }
  }

  private async fetchEntry(entry: FrontierEntry): Promise<PageFetchResult | null> {
    const { headers, timeoutMs, retries, retryDelayMs } = this.options;
    try {
      return await withRetry(
        () => this.fetcher.fetchPage(entry.url, { headers: { ...headers }, timeoutMs }),
        retries,
        retryDelayMs,
        entry.url,
        () => this.shouldStop()
      );
    } catch (error) {
      this.recordFailure(entry, error);
      return null;
    }
  }

  private recordFailure(entry: FrontierEntry, error: unknown): void {
    const failure = toFetchError(entry.url, error);
    this.errors.push(failure.toEntry(entry.depth));
    log.error(`Failed ${entry.url}: ${failure.message}`, entry.url);
    if (entry.depth === 0) {
      this.seedFailure = failure;
    }
  }

  private isFollowable(link: Link): boolean {
    if (!looksLikePage(link.url)) {
      return false;
    }
    if (this.options.followRule === "all") {
      return true;
    }
    return link.isInternal || (this.options.includeSubdomains && link.isSubdomain);
  }

  /** Enqueue-if-not-visited. The key is marked visited here, never at fetch time. */
  private enqueue(url: string, depth: number): boolean {
    if (depth > this.options.maxDepth) {
      return false;
    }
    const key = dedupKey(url);
    if (this.visited.has(key)) {
      return false;
    }
    this.visited.add(key);
    this.nextLevel.push({ url, depth });
    return true;
  }

  private appendLinks(pageLinks: Link[]): void {
    for (const link of pageLinks) {
      const key = dedupKey(link.url);
      const first = this.firstOccurrence.get(key);
      if (first === undefined) {
        this.firstOccurrence.set(key, this.links.length);
        this.links.push(link);
      } else if (this.options.allowDuplicates) {
        this.links.push(Object.freeze({ ...link, duplicateOf: first }));
      }
    }
  }

  private summarizePage(
    entry: FrontierEntry,
    page: PageFetchResult,
    document: ParsedDocument,
    pageLinks: Link[]
  ): PageSummary {
    const summary: PageSummary = {
      url: entry.url,
      finalUrl: page.url,
      depth: entry.depth,
      status: page.status,
      title: document.title,
      linksOnPage: pageLinks.length,
      internalLinks: pageLinks.filter((link) => link.isInternal).length,
      externalLinks: pageLinks.filter((link) => !link.isInternal && !link.isSubdomain).length,
      subdomainLinks: pageLinks.filter((link) => link.isSubdomain).length,
      filesFound: pageLinks.filter((link) => link.linkType !== "page").length,
      rendered: page.rendered,
    };

    if (this.options.comments) {
      const comments = filterComments(extractComments(document), this.options.comments);
      summary.comments = comments;
      summary.commentTypes = countCommentTypes(comments);
    }
    return summary;
  }

  private async shouldStop(): Promise<boolean> {
    if (this.aborted) {
      return true;
    }
    const requested =
      this.hooks.signal?.aborted === true || (this.hooks.shouldAbort ? await this.hooks.shouldAbort() : false);
    if (requested && !this.aborted) {
      this.aborted = true;
      log.warn("Crawl cancelled by request; finishing in-flight pages");
    }
    return this.aborted;
  }

  private async reportProgress(entry?: FrontierEntry): Promise<void> {
    if (!this.hooks.onProgress) {
      return;
    }
    const progress: CrawlProgress = {
      phase: this.phase,
      pagesCrawled: this.pagesCrawled,
      maxPages: this.options.maxPages,
      queued: this.nextLevel.length,
      linksFound: this.links.length,
      currentUrl: entry?.url,
      depth: entry?.depth,
    };
    await this.hooks.onProgress(progress);
  }

  private terminationReason(): TerminationReason {
    if (this.aborted) return "aborted";
    if (this.limitReached) return "max_pages";
    return "frontier_exhausted";
  }

  private buildResult(): CrawlResult {
    return {
      startUrl: this.options.startUrl,
      pagesCrawled: this.pagesCrawled,
      links: [...this.links],
      pages: [...this.pages],
      errors: [...this.errors],
      terminationReason: this.terminationReason(),
      durationMs: Date.now() - this.startedAt,
    };
  }
}

/** Run one crawl session with a fresh scheduler. */
export async function crawlSite(options: CrawlOptions): Promise<CrawlResult> {
  return new CrawlScheduler(options).run();
}

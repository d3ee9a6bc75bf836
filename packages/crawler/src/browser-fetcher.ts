import { chromium, type Browser, type BrowserContext } from "playwright";
import { FetchError, errorMessage } from "./errors.js";
import { HttpFetcher, toFetchError, type Fetcher } from "./fetcher.js";
import { log } from "./logger.js";
import type { FetchPageOptions, PageFetchResult } from "./types.js";

export interface BrowserFetcherOptions {
  /** Override how the browser is started (defaults to headless chromium). */
  launch?: () => Promise<Browser>;
  /** Used for probes, and for pages once the browser is known to be unavailable. */
  http?: Fetcher;
}

/**
 * Renders pages in headless chromium. When no browser can be launched the
 * fetcher degrades to plain HTTP and marks every result with `fallbackReason`
 * instead of failing the crawl.
 */
export class BrowserFetcher implements Fetcher {
  private readonly launch: () => Promise<Browser>;
  private readonly http: Fetcher;
  private browser: Browser | null = null;
  private context: Promise<BrowserContext | null> | null = null;
  private fallbackReason: string | null = null;

  constructor(options: BrowserFetcherOptions = {}) {
    this.launch = options.launch ?? (() => chromium.launch({ headless: true }));
    this.http = options.http ?? new HttpFetcher();
  }

  async fetchPage(url: string, options: FetchPageOptions): Promise<PageFetchResult> {
    const context = await this.getContext();
    if (!context) {
      const result = await this.http.fetchPage(url, options);
      return { ...result, rendered: false, fallbackReason: this.fallbackReason ?? "browser unavailable" };
    }

    const page = await context.newPage();
    try {
      await page.setExtraHTTPHeaders(options.headers);
      const response = await page.goto(url, { waitUntil: "domcontentloaded", timeout: options.timeoutMs });
      await page.waitForLoadState("networkidle", { timeout: Math.min(5000, options.timeoutMs) }).catch(() => {
        log.debug(`Network did not settle for ${url}, using current DOM`, url);
      });

      const status = response?.status() ?? 200;
      if (status >= 400) {
        throw new FetchError(url, "http", `HTTP ${status} for ${url}`, { status });
      }

      return {
        url: page.url() || url,
        requestedUrl: url,
        status,
        contentType: response?.headers()["content-type"] ?? "text/html",
        html: await page.content(),
        rendered: true,
      };
    } catch (error) {
      throw toFetchError(url, error);
    } finally {
      await page.close().catch(() => undefined);
    }
  }

  probe(url: string, options: FetchPageOptions): Promise<number> {
    return this.http.probe(url, options);
  }

  async close(): Promise<void> {
    const context = this.context ? await this.context : null;
    this.context = null;
    await context?.close().catch(() => undefined);
    await this.browser?.close().catch(() => undefined);
    this.browser = null;
    await this.http.close();
  }

  /** Why rendering was skipped, or null while the browser is in use. */
  get fallback(): string | null {
    return this.fallbackReason;
  }

  private getContext(): Promise<BrowserContext | null> {
    if (!this.context) {
      this.context = this.startBrowser();
    }
    return this.context;
  }

  private async startBrowser(): Promise<BrowserContext | null> {
    try {
      this.browser = await this.launch();
      return await this.browser.newContext();
    } catch (error) {
      this.fallbackReason = `JavaScript rendering unavailable (${errorMessage(error)})`;
      log.warn(`${this.fallbackReason}; falling back to plain HTTP`);
      await this.browser?.close().catch(() => undefined);
      this.browser = null;
      return null;
    }
  }
}

import { FetchError, errorMessage } from "./errors.js";
import type { FetchPageOptions, PageFetchResult } from "./types.js";

/** The network collaborator the crawl core talks to. */
export interface Fetcher {
  /** Resolves with the page, or rejects with a `FetchError`. */
  fetchPage(url: string, options: FetchPageOptions): Promise<PageFetchResult>;
  /** Lightweight reachability check; resolves with the HTTP status. */
  probe(url: string, options: FetchPageOptions): Promise<number>;
  close(): Promise<void>;
}

const NETWORK_CODES: Record<string, FetchError["kind"]> = {
  ENOTFOUND: "dns",
  EAI_AGAIN: "dns",
  ECONNREFUSED: "connection_refused",
  ETIMEDOUT: "timeout",
  UND_ERR_CONNECT_TIMEOUT: "timeout",
  UND_ERR_HEADERS_TIMEOUT: "timeout",
  UND_ERR_BODY_TIMEOUT: "timeout",
};

function errorCode(error: unknown): string {
  const cause = error instanceof Error ? error.cause : undefined;
  for (const candidate of [cause, error]) {
    if (typeof candidate === "object" && candidate !== null && "code" in candidate && typeof candidate.code === "string") {
      return candidate.code;
    }
  }
  return "";
}

/** Map whatever a transport threw onto the fetch-error taxonomy. */
export function toFetchError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  const message = errorMessage(error);
  const kind = NETWORK_CODES[errorCode(error)];
  if (kind) {
    return new FetchError(url, kind, `${message} (${errorCode(error)})`, { cause: error });
  }

  const lower = message.toLowerCase();
  if (lower.includes("err_name_not_resolved")) {
    return new FetchError(url, "dns", message, { cause: error });
  }
  if (lower.includes("err_connection_refused")) {
    return new FetchError(url, "connection_refused", message, { cause: error });
  }
  if (lower.includes("timeout") || lower.includes("timed out")) {
    return new FetchError(url, "timeout", message, { cause: error });
  }
  return new FetchError(url, "network", message, { cause: error });
}

export function isHtmlContentType(contentType: string): boolean {
  const lower = contentType.toLowerCase();
  return lower === "" || lower.includes("text/html") || lower.includes("application/xhtml");
}

/** Plain HTTP through the runtime's global `fetch`. */
export class HttpFetcher implements Fetcher {
  async fetchPage(url: string, options: FetchPageOptions): Promise<PageFetchResult> {
    return this.withTimeout(url, options.timeoutMs, async (signal) => {
      const res = await fetch(url, {
        redirect: "follow",
        headers: { accept: "text/html,application/xhtml+xml,*/*", ...options.headers },
        signal,
      });

      if (!res.ok) {
        await res.body?.cancel().catch(() => undefined);
        throw new FetchError(url, "http", `HTTP ${res.status} for ${url}`, { status: res.status });
      }

      const contentType = res.headers.get("content-type") ?? "";
      let html = "";
      if (isHtmlContentType(contentType)) {
        html = await res.text();
      } else {
        await res.body?.cancel().catch(() => undefined);
      }

      return {
        url: res.url || url,
        requestedUrl: url,
        status: res.status,
        contentType,
        html,
        rendered: false,
      };
    });
  }

  /** HEAD first; servers that refuse HEAD get a GET whose body is discarded. */
  async probe(url: string, options: FetchPageOptions): Promise<number> {
    return this.withTimeout(url, options.timeoutMs, async (signal) => {
      const request = async (method: "HEAD" | "GET"): Promise<number> => {
        const res = await fetch(url, { method, redirect: "follow", headers: { ...options.headers }, signal });
        await res.body?.cancel().catch(() => undefined);
        return res.status;
      };
      const status = await request("HEAD");
      return status === 405 || status === 501 ? request("GET") : status;
    });
  }

  async close(): Promise<void> {}

  private async withTimeout<T>(url: string, timeoutMs: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      return await fn(controller.signal);
    } catch (error) {
      if (timedOut) {
        throw new FetchError(url, "timeout", `Timed out after ${timeoutMs}ms fetching ${url}`, { cause: error });
      }
      throw toFetchError(url, error);
    } finally {
      clearTimeout(timeout);
    }
  }
}

import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { FetchError } from "./errors.js";
import { HttpFetcher, isHtmlContentType, toFetchError } from "./fetcher.js";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const options = { headers: { "user-agent": "test-agent" }, timeoutMs: 1000 };

describe("HttpFetcher.fetchPage", () => {
  it("returns the body of an HTML page and sends the configured headers", async () => {
    let sent = new Headers();
    globalThis.fetch = async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      sent = new Headers(init?.headers);
      return new Response("<p>Hi</p>", { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
    };

    const page = await new HttpFetcher().fetchPage("https://example.com/", options);

    assert.deepEqual(page, {
      url: "https://example.com/",
      requestedUrl: "https://example.com/",
      status: 200,
      contentType: "text/html; charset=utf-8",
      html: "<p>Hi</p>",
      rendered: false,
    });
    assert.equal(sent.get("user-agent"), "test-agent");
    assert.equal(sent.get("accept"), "text/html,application/xhtml+xml,*/*");
  });

  it("skips the body of non-HTML responses", async () => {
    globalThis.fetch = async (): Promise<Response> =>
      new Response("%PDF-1.4", { status: 200, headers: { "content-type": "application/pdf" } });

    const page = await new HttpFetcher().fetchPage("https://example.com/a.pdf", options);

    assert.equal(page.html, "");
    assert.equal(page.contentType, "application/pdf");
  });

  it("rejects error statuses with an http FetchError", async () => {
    globalThis.fetch = async (): Promise<Response> => new Response("Gone", { status: 410 });

    await assert.rejects(new HttpFetcher().fetchPage("https://example.com/old", options), (error: unknown) => {
      assert.ok(error instanceof FetchError);
      assert.equal(error.kind, "http");
      assert.equal(error.status, 410);
      assert.equal(error.message, "HTTP 410 for https://example.com/old");
      return true;
    });
  });

  it("turns an overrun into a timeout FetchError", async () => {
    globalThis.fetch = (_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
      });

    await assert.rejects(
      new HttpFetcher().fetchPage("https://example.com/slow", { headers: {}, timeoutMs: 10 }),
      (error: unknown) => {
        assert.ok(error instanceof FetchError);
        assert.equal(error.kind, "timeout");
        assert.equal(error.message, "Timed out after 10ms fetching https://example.com/slow");
        return true;
      }
    );
  });

  it("classifies DNS failures from the error code", async () => {
    globalThis.fetch = async (): Promise<Response> => {
      throw new TypeError("fetch failed", { cause: Object.assign(new Error("getaddrinfo ENOTFOUND nowhere.test"), { code: "ENOTFOUND" }) });
    };

    await assert.rejects(new HttpFetcher().fetchPage("https://nowhere.test/", options), (error: unknown) => {
      assert.ok(error instanceof FetchError);
      assert.equal(error.kind, "dns");
      assert.equal(error.message, "fetch failed (ENOTFOUND)");
      return true;
    });
  });
});

describe("HttpFetcher.probe", () => {
  it("falls back to GET when HEAD is not allowed", async () => {
    const methods: string[] = [];
    globalThis.fetch = async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const method = init?.method ?? "GET";
      methods.push(method);
      return new Response(method === "HEAD" ? null : "ok", { status: method === "HEAD" ? 405 : 200 });
    };

    assert.equal(await new HttpFetcher().probe("https://example.com/", options), 200);
    assert.deepEqual(methods, ["HEAD", "GET"]);
  });

  it("returns the HEAD status otherwise", async () => {
    globalThis.fetch = async (): Promise<Response> => new Response(null, { status: 404 });
    assert.equal(await new HttpFetcher().probe("https://example.com/missing", options), 404);
  });
});

describe("toFetchError", () => {
  it("maps browser-style messages", () => {
    assert.equal(toFetchError("https://x.test/", new Error("net::ERR_NAME_NOT_RESOLVED at https://x.test/")).kind, "dns");
    assert.equal(toFetchError("https://x.test/", new Error("net::ERR_CONNECTION_REFUSED")).kind, "connection_refused");
    assert.equal(toFetchError("https://x.test/", new Error("Timeout 30000ms exceeded")).kind, "timeout");
    assert.equal(toFetchError("https://x.test/", "socket hang up").kind, "network");
  });

  it("passes FetchErrors through", () => {
    const original = new FetchError("https://x.test/", "http", "HTTP 500", { status: 500 });
    assert.equal(toFetchError("https://x.test/", original), original);
  });
});

describe("isHtmlContentType", () => {
  it("accepts HTML, XHTML and a missing header", () => {
    assert.equal(isHtmlContentType("text/html"), true);
    assert.equal(isHtmlContentType("application/xhtml+xml"), true);
    assert.equal(isHtmlContentType(""), true);
    assert.equal(isHtmlContentType("image/png"), false);
  });
});

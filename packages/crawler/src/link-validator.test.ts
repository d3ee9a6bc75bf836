import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { parseDocument } from "./document.js";
import { FetchError } from "./errors.js";
import type { Fetcher } from "./fetcher.js";
import { extractLinks } from "./link-extractor.js";
import { validateLinks } from "./link-validator.js";
import { runWithLogCallback } from "./logger.js";
import type { PageFetchResult } from "./types.js";

class ProbeFetcher implements Fetcher {
  readonly probed: string[] = [];
  closed = false;

  constructor(private readonly statuses: Record<string, number>) {}

  async fetchPage(url: string): Promise<PageFetchResult> {
    throw new FetchError(url, "network", "not used");
  }

  async probe(url: string): Promise<number> {
    this.probed.push(url);
    const status = this.statuses[url];
    if (status === undefined) {
      throw new FetchError(url, "connection_refused", "connect ECONNREFUSED");
    }
    return status;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const links = extractLinks(
  parseDocument(
    `<body>
      <a href="/ok">Ok</a>
      <a href="/gone">Gone</a>
      <a href="/ok">Ok again</a>
      <a href="mailto:team@example.com">Mail</a>
      <a href="https://down.example.net/">Down</a>
    </body>`,
    "https://example.com/"
  ),
  { seedUrl: "https://example.com/" }
);

describe("validateLinks", () => {
  it("probes each distinct http URL once and annotates every link", async () => {
    const fetcher = new ProbeFetcher({ "https://example.com/ok": 200, "https://example.com/gone": 404 });

    const validated = await runWithLogCallback(
      () => undefined,
      () => validateLinks(links, { fetcher, concurrency: 2 })
    );

    assert.deepEqual([...fetcher.probed].sort(), [
      "https://down.example.net/",
      "https://example.com/gone",
      "https://example.com/ok",
    ]);
    assert.deepEqual(
      validated.map((link) => [link.url, link.validation]),
      [
        ["https://example.com/ok", { status: 200, accessible: true }],
        ["https://example.com/gone", { status: 404, accessible: false }],
        ["https://example.com/ok", { status: 200, accessible: true }],
        ["mailto:team@example.com", { status: "skipped", accessible: false }],
        ["https://down.example.net/", { status: "unreachable", accessible: false, error: "connect ECONNREFUSED" }],
      ]
    );
    assert.equal(validated[1].text, "Gone");
    assert.equal(fetcher.closed, false);
  });

  it("returns nothing for no links", async () => {
    const fetcher = new ProbeFetcher({});
    assert.deepEqual(await runWithLogCallback(() => undefined, () => validateLinks([], { fetcher })), []);
    assert.deepEqual(fetcher.probed, []);
  });
});

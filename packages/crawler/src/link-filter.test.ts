import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { parseDocument } from "./document.js";
import { extractLinks } from "./link-extractor.js";
import { expandTypeFilters, filterLinks, selectLinks } from "./link-filter.js";
import type { CrawlResult } from "./types.js";

const links = extractLinks(
  parseDocument(
    `<body>
      <a href="/about">About</a>
      <a href="/files/report.PDF">Report</a>
      <a href="https://blog.example.com/post">Blog</a>
      <a href="https://cdn.other.org/logo.png">Logo</a>
      <a href="/clip.mp4">Clip</a>
      <a href="/v1/api/items">API</a>
    </body>`,
    "https://example.com/"
  ),
  { seedUrl: "https://example.com/" }
);

const urls = (selected: { url: string }[]) => selected.map((link) => link.url);

describe("selectLinks", () => {
  it("filters by scope", () => {
    assert.deepEqual(urls(selectLinks(links, { scope: "subdomain" })), ["https://blog.example.com/post"]);
    assert.deepEqual(urls(selectLinks(links, { scope: "external" })), ["https://cdn.other.org/logo.png"]);
    assert.equal(selectLinks(links, { scope: "internal" }).length, 4);
  });

  it("filters by type and group", () => {
    assert.deepEqual(urls(selectLinks(links, { types: ["media"] })), ["https://example.com/clip.mp4"]);
    assert.deepEqual(urls(selectLinks(links, { types: ["API"] })), ["https://example.com/v1/api/items"]);
    assert.deepEqual(urls(selectLinks(links, { types: ["files"] })), [
      "https://example.com/files/report.PDF",
      "https://cdn.other.org/logo.png",
      "https://example.com/clip.mp4",
    ]);
  });

  it("filters by extension, case-insensitively and with or without the dot", () => {
    assert.deepEqual(urls(selectLinks(links, { extensions: [".pdf", "PNG"] })), [
      "https://example.com/files/report.PDF",
      "https://cdn.other.org/logo.png",
    ]);
  });

  it("reads type names that are not link types as extensions", () => {
    assert.deepEqual(urls(selectLinks(links, { types: ["pdf", ".png"] })), [
      "https://example.com/files/report.PDF",
      "https://cdn.other.org/logo.png",
    ]);
    assert.deepEqual(urls(selectLinks(links, { types: ["pages", "mp4"] })), [
      "https://example.com/about",
      "https://blog.example.com/post",
      "https://example.com/clip.mp4",
    ]);
  });

  it("combines criteria with AND", () => {
    assert.deepEqual(urls(selectLinks(links, { scope: "internal", types: ["images", "documents"] })), [
      "https://example.com/files/report.PDF",
    ]);
  });

  it("keeps everything without criteria", () => {
    assert.equal(selectLinks(links, {}).length, links.length);
  });
});

describe("expandTypeFilters", () => {
  it("expands groups and keeps plain type names", () => {
    assert.deepEqual([...expandTypeFilters(["media", " page ", ""])], ["video", "audio", "page"]);
  });
});

describe("filterLinks", () => {
  it("returns a copy with only the selected links", () => {
    const result: CrawlResult = {
      startUrl: "https://example.com/",
      pagesCrawled: 1,
      links,
      pages: [],
      errors: [],
      terminationReason: "frontier_exhausted",
      durationMs: 5,
    };
    const filtered = filterLinks(result, { types: ["pages"] });
    assert.deepEqual(urls(filtered.links), ["https://example.com/about", "https://blog.example.com/post"]);
    assert.equal(result.links.length, 6);
    assert.equal(filtered.pagesCrawled, 1);
  });

  it("points repeats at their first occurrence in the filtered list", () => {
    const [report, page] = extractLinks(
      parseDocument(`<body><a href="/r.pdf">R</a><a href="/x">X</a></body>`, "https://example.com/"),
      { seedUrl: "https://example.com/" }
    );
    const result: CrawlResult = {
      startUrl: "https://example.com/",
      pagesCrawled: 2,
      links: [report, page, { ...page, foundOnPage: "https://example.com/x", duplicateOf: 1 }],
      pages: [],
      errors: [],
      terminationReason: "frontier_exhausted",
      durationMs: 5,
    };

    const filtered = filterLinks(result, { types: ["pages"] });

    assert.deepEqual(
      filtered.links.map((link) => [link.url, link.duplicateOf]),
      [
        ["https://example.com/x", undefined],
        ["https://example.com/x", 0],
      ]
    );
    assert.equal(result.links[2].duplicateOf, 1);
  });
});

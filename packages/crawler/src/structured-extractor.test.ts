import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it } from "node:test";
import { parseDocument } from "./document.js";
import { ConfigError } from "./errors.js";
import {
  applyExtractionRules,
  extractPageContent,
  loadExtractionRules,
  selectElements,
  validateExtractionRules,
} from "./structured-extractor.js";

const createdTempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(createdTempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sitelinks-rules-"));
  createdTempDirs.push(dir);
  return dir;
}

const PRODUCT_PAGE = parseDocument(
  `<html><head><title> Desk Lamp </title></head><body>
    <h1> Desk Lamp </h1>
    <span class="price">$20</span>
    <img class="product" src="/lamp.jpg">
    <ul><li class="feature">Dimmable</li><li class="feature">USB</li></ul>
    <a class="more" href="/lamps">More lamps</a>
  </body></html>`,
  "https://shop.example.com/lamp"
);

describe("applyExtractionRules", () => {
  it("reads text, attributes and lists", () => {
    const result = applyExtractionRules(PRODUCT_PAGE, {
      title: { selector: "h1" },
      price: { selector: ".price", attribute: "text" },
      image: { selector: "img.product", attribute: "src" },
      features: { selector: ".feature", all: true },
      missing: { selector: ".nope" },
      missingList: { selector: ".nope", all: true },
      noAttr: { selector: "h1", attribute: "data-id" },
    });

    assert.deepEqual(result, {
      title: "Desk Lamp",
      price: "$20",
      image: "/lamp.jpg",
      features: ["Dimmable", "USB"],
      missing: null,
      missingList: [],
      noAttr: "",
    });
  });

  it("reports an invalid selector as a missing value", () => {
    assert.deepEqual(applyExtractionRules(PRODUCT_PAGE, { broken: { selector: "[[" } }), { broken: null });
  });
});

describe("loadExtractionRules", () => {
  it("loads and validates a rules file", async () => {
    const dir = await tempDir();
    const file = path.join(dir, "rules.json");
    await fs.writeFile(file, JSON.stringify({ price: { selector: ".price" }, all: { selector: "li", all: true } }));

    assert.deepEqual(await loadExtractionRules(file), {
      price: { selector: ".price", attribute: undefined, all: undefined },
      all: { selector: "li", attribute: undefined, all: true },
    });
  });

  it("rejects missing files and invalid JSON", async () => {
    const dir = await tempDir();
    await assert.rejects(loadExtractionRules(path.join(dir, "absent.json")), ConfigError);

    const file = path.join(dir, "bad.json");
    await fs.writeFile(file, "{ not json");
    await assert.rejects(loadExtractionRules(file), ConfigError);
  });

  it("rejects rules without a selector", () => {
    assert.throws(() => validateExtractionRules({ title: { attribute: "text" } }), ConfigError);
    assert.throws(() => validateExtractionRules(["h1"]), ConfigError);
  });
});

describe("selectElements", () => {
  it("returns text, markup, attributes and href", () => {
    assert.deepEqual(selectElements(PRODUCT_PAGE, "a.more"), [
      {
        text: "More lamps",
        html: '<a class="more" href="/lamps">More lamps</a>',
        attributes: { class: "more", href: "/lamps" },
        href: "/lamps",
      },
    ]);
  });
});

describe("extractPageContent", () => {
  it("summarizes title and body text", () => {
    const content = extractPageContent(parseDocument("<title>T</title><p>Hello   world</p>", "https://example.com/"), 200);
    assert.deepEqual(content, {
      url: "https://example.com/",
      title: "T",
      textLength: 13,
      statusCode: 200,
      contentPreview: "Hello   world",
    });
  });

  it("truncates long previews", () => {
    const content = extractPageContent(parseDocument(`<p>${"a".repeat(600)}</p>`, "https://example.com/"), 200);
    assert.equal(content.textLength, 600);
    assert.equal(content.contentPreview, `${"a".repeat(500)}...`);
  });
});

import { load, type CheerioAPI } from "cheerio";
import { ParseError, errorMessage } from "./errors.js";
import { isCrawlableScheme, tryNormalizeUrl } from "./url-classifier.js";

export interface ParsedDocument {
  $: CheerioAPI;
  html: string;
  pageUrl: string;
  /** URL relative references resolve against: `<base href>` when present, else the page URL. */
  baseUrl: string;
  title: string;
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Parse a fetched page. Malformed markup is repaired by the parser; only a
 * failure of the parser itself raises `ParseError`.
 */
export function parseDocument(html: string, pageUrl: string): ParsedDocument {
  let $: CheerioAPI;
  try {
    $ = load(html);
  } catch (error) {
    throw new ParseError(pageUrl, `Failed to parse ${pageUrl}: ${errorMessage(error)}`, error);
  }

  const baseHref = $("base[href]").first().attr("href");
  const resolvedBase = baseHref ? tryNormalizeUrl(baseHref, pageUrl) : null;
  const baseUrl = resolvedBase && isCrawlableScheme(resolvedBase) ? resolvedBase : pageUrl;

  return {
    $,
    html,
    pageUrl,
    baseUrl,
    title: collapseWhitespace($("title").first().text()),
  };
}

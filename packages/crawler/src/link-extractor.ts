import { isTag, type Element } from "domhandler";
import { collapseWhitespace, type ParsedDocument } from "./document.js";
import { log } from "./logger.js";
import { detectElementSource } from "./source-detector.js";
import type { Link, NonCrawlablePolicy } from "./types.js";
import { classifyDomain, getLinkType, isCrawlableScheme, tryNormalizeUrl } from "./url-classifier.js";

export interface LinkExtractionContext {
  /** Seed URL the domain classification is relative to. */
  seedUrl: string;
  includeSubdomains?: boolean;
  /** Collect `src` of images, frames, media and scripts. Defaults to true. */
  includeEmbeds?: boolean;
  includeSrcset?: boolean;
  nonCrawlableSchemes?: NonCrawlablePolicy;
}

const ANCHOR_SELECTOR = "a[href], area[href]";
const EMBED_TAGS = ["img", "iframe", "embed", "source", "video", "audio", "track", "script"];
const SRCSET_TAGS = ["img", "source"];

function buildSelector(context: LinkExtractionContext): string {
  const selectors = [ANCHOR_SELECTOR];
  if (context.includeEmbeds !== false) {
    selectors.push(...EMBED_TAGS.map((tag) => `${tag}[src]`));
  }
  if (context.includeSrcset) {
    selectors.push(...SRCSET_TAGS.map((tag) => `${tag}[srcset]`));
  }
  return selectors.join(", ");
}

/** URL candidates of a `srcset` value, descriptors dropped. */
export function parseSrcset(srcset: string): string[] {
  return srcset
    .split(",")
    .map((candidate) => candidate.trim().split(/\s+/)[0] ?? "")
    .filter(Boolean);
}

function referencesOf(element: Element, context: LinkExtractionContext): string[] {
  const attribs = element.attribs;
  const references: string[] = [];
  if (attribs.href !== undefined && (element.name === "a" || element.name === "area")) {
    references.push(attribs.href);
  }
  if (attribs.src !== undefined && context.includeEmbeds !== false && EMBED_TAGS.includes(element.name)) {
    references.push(attribs.src);
  }
  if (attribs.srcset !== undefined && context.includeSrcset && SRCSET_TAGS.includes(element.name)) {
    references.push(...parseSrcset(attribs.srcset));
  }
  return references;
}

/**
 * Every link-like reference of a parsed page, in document order. Empty and
 * fragment-only references are skipped; unresolvable ones are dropped.
 */
export function extractLinks(document: ParsedDocument, context: LinkExtractionContext): Link[] {
  const { $, baseUrl, pageUrl } = document;
  const policy = context.nonCrawlableSchemes ?? "record";
  const links: Link[] = [];

  for (const element of $(buildSelector(context)).toArray().filter(isTag)) {
    const $element = $(element);
    const text = collapseWhitespace($element.text()) || collapseWhitespace($element.attr("alt") ?? "");
    const source = detectElementSource(element);

    for (const rawHref of referencesOf(element, context)) {
      const trimmed = rawHref.trim();
      if (!trimmed || trimmed.startsWith("#")) {
        continue;
      }

      const url = tryNormalizeUrl(trimmed, baseUrl);
      if (!url) {
        log.debug(`Skipping unresolvable reference "${rawHref}"`, pageUrl);
        continue;
      }

      const crawlable = isCrawlableScheme(url);
      if (!crawlable && policy === "exclude") {
        continue;
      }

      const parsed = new URL(url);
      const { domain, isInternal, isSubdomain } = classifyDomain(url, context.seedUrl, {
        includeSubdomains: context.includeSubdomains,
      });

      links.push(
        Object.freeze({
          rawHref,
          url,
          text,
          domain,
          path: parsed.pathname,
          query: parsed.search.replace(/^\?/, ""),
          isInternal,
          isSubdomain,
          linkType: getLinkType(url),
          source,
          element: element.name,
          foundOnPage: pageUrl,
        })
      );
    }
  }

  return links;
}

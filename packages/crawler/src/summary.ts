import type { CrawlInfo, CrawlResult, Link, LinkType } from "./types.js";

export interface LinkBreakdown {
  total: number;
  internal: number;
  subdomain: number;
  external: number;
  byType: Partial<Record<LinkType, number>>;
}

export function getCrawlInfo(result: CrawlResult, maxDepth: number): CrawlInfo {
  return {
    startUrl: result.startUrl,
    pagesCrawled: result.pagesCrawled,
    maxDepth,
    totalLinks: result.links.length,
    filesFound: result.links.filter((link) => link.linkType !== "page").length,
  };
}

/** Counts by domain relationship and by link type. Subdomains counted as internal are not counted twice. */
export function summarizeLinks(links: readonly Link[]): LinkBreakdown {
  const breakdown: LinkBreakdown = { total: links.length, internal: 0, subdomain: 0, external: 0, byType: {} };
  for (const link of links) {
    if (link.isInternal) {
      breakdown.internal += 1;
    } else if (link.isSubdomain) {
      breakdown.subdomain += 1;
    } else {
      breakdown.external += 1;
    }
    breakdown.byType[link.linkType] = (breakdown.byType[link.linkType] ?? 0) + 1;
  }
  return breakdown;
}

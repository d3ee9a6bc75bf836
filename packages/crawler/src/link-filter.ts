import type { CrawlResult, Link, LinkType } from "./types.js";
import { dedupKey, getExtension } from "./url-classifier.js";

export type LinkScope = "internal" | "external" | "subdomain";

export interface LinkFilterCriteria {
  scope?: LinkScope;
  /** Link types or group names (`images`, `documents`, `media`, `pages`, `files`, `code`, `api`). */
  types?: readonly string[];
  /** File extensions, with or without the leading dot. */
  extensions?: readonly string[];
}

export const LINK_TYPE_GROUPS: Readonly<Record<string, readonly LinkType[]>> = {
  images: ["image"],
  documents: ["document"],
  media: ["video", "audio"],
  pages: ["page"],
  files: ["document", "image", "video", "audio", "archive"],
  code: ["code"],
  api: ["api"],
};

const LINK_TYPES: ReadonlySet<string> = new Set<LinkType>([
  "page",
  "image",
  "document",
  "video",
  "audio",
  "archive",
  "code",
  "api",
  "other",
]);

/** Expand group names into the link types they stand for. Other names are kept as given and match as file extensions. */
export function expandTypeFilters(types: readonly string[]): Set<string> {
  const expanded = new Set<string>();
  for (const raw of types) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const group = LINK_TYPE_GROUPS[name];
    if (group) {
      group.forEach((type) => expanded.add(type));
    } else {
      expanded.add(name);
    }
  }
  return expanded;
}

function matchesScope(link: Link, scope: LinkScope): boolean {
  switch (scope) {
    case "internal":
      return link.isInternal;
    case "external":
      return !link.isInternal && !link.isSubdomain;
    case "subdomain":
      return link.isSubdomain;
  }
}

/** Build a predicate that holds when every supplied criterion holds. */
export function buildLinkPredicate(criteria: LinkFilterCriteria): (link: Link) => boolean {
  const types = criteria.types && criteria.types.length > 0 ? expandTypeFilters(criteria.types) : null;
  // A type filter that names no link type is read as an extension (`pdf`, `png`).
  const typeExtensions = types
    ? new Set([...types].filter((name) => !LINK_TYPES.has(name)).map((name) => name.replace(/^\./, "")))
    : null;
  const extensions =
    criteria.extensions && criteria.extensions.length > 0
      ? new Set(criteria.extensions.map((ext) => ext.trim().toLowerCase().replace(/^\./, "")).filter(Boolean))
      : null;

  return (link) => {
    if (criteria.scope && !matchesScope(link, criteria.scope)) {
      return false;
    }
    if (types && !types.has(link.linkType) && !typeExtensions?.has(getExtension(link.path))) {
      return false;
    }
    if (extensions && !extensions.has(getExtension(link.path))) {
      return false;
    }
    return true;
  };
}

export function selectLinks(links: readonly Link[], criteria: LinkFilterCriteria): Link[] {
  return links.filter(buildLinkPredicate(criteria));
}

/**
 * A copy of `result` keeping only the matching links. Pages and errors are
 * untouched; `duplicateOf` is re-pointed at the first occurrence in the
 * filtered list.
 */
export function filterLinks(result: CrawlResult, criteria: LinkFilterCriteria): CrawlResult {
  const firstOccurrence = new Map<string, number>();
  const links = selectLinks(result.links, criteria).map((link, index): Link => {
    const key = dedupKey(link.url);
    const first = firstOccurrence.get(key);
    if (first === undefined) {
      firstOccurrence.set(key, index);
      if (link.duplicateOf === undefined) {
        return link;
      }
      const { duplicateOf: _dropped, ...original } = link;
      return Object.freeze(original);
    }
    return link.duplicateOf === first ? link : Object.freeze({ ...link, duplicateOf: first });
  });
  return { ...result, links };
}

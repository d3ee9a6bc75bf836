import { isTag, type AnyNode, type Element } from "domhandler";
import type { SourceRegion } from "./types.js";

/** The three questions the detector asks of a document tree. */
export interface TreeTraversal<N> {
  parent(node: N): N | null;
  /** Lowercased tag name, or null for non-element nodes (document root, text). */
  tagName(node: N): string | null;
  attribute(node: N, name: string): string | undefined;
}

type RegionMatcher = readonly [region: SourceRegion, keywords: readonly string[]];

const SEMANTIC_TAGS: ReadonlyMap<string, SourceRegion> = new Map([
  ["nav", "navigation"],
  ["header", "header"],
  ["footer", "footer"],
  ["aside", "sidebar"],
  ["main", "main_content"],
  ["article", "main_content"],
]);

// Evaluated top to bottom for each ancestor. Keywords match anywhere in the
// class and id values, so "topnav" and "mainmenu" count as navigation.
const KEYWORD_MATCHERS: readonly RegionMatcher[] = [
  ["navigation", ["nav", "menu"]],
  ["header", ["header", "top", "banner"]],
  ["footer", ["footer", "bottom"]],
  ["sidebar", ["sidebar", "side", "widget"]],
  ["breadcrumb", ["breadcrumb", "crumb"]],
  ["main_content", ["content", "article", "post"]],
];

function matchKeywords(names: string): SourceRegion | null {
  if (!names) {
    return null;
  }
  for (const [region, keywords] of KEYWORD_MATCHERS) {
    if (keywords.some((keyword) => names.includes(keyword))) {
      return region;
    }
  }
  return null;
}

/** Region signalled by a single element, ignoring its ancestors. */
export function regionOf<N>(traversal: TreeTraversal<N>, node: N): SourceRegion | null {
  const tag = traversal.tagName(node);
  if (!tag) {
    return null;
  }
  const semantic = SEMANTIC_TAGS.get(tag);
  if (semantic) {
    return semantic;
  }
  const names = [traversal.attribute(node, "class"), traversal.attribute(node, "id")]
    .filter((value): value is string => Boolean(value))
    .join(" ")
    .toLowerCase();
  return matchKeywords(names);
}

/**
 * Walk up from `node` and return the region of the nearest ancestor that
 * carries a structural signal. Falls back to `content` once `body` is
 * reached, or `unknown` when the walk ends outside any body.
 */
export function detectSource<N>(traversal: TreeTraversal<N>, node: N): SourceRegion {
  let current = traversal.parent(node);
  while (current !== null) {
    const tag = traversal.tagName(current);
    if (tag === "body" || tag === "html") {
      return tag === "body" ? "content" : "unknown";
    }
    const region = regionOf(traversal, current);
    if (region) {
      return region;
    }
    current = traversal.parent(current);
  }
  return "unknown";
}

export const cheerioTraversal: TreeTraversal<AnyNode> = {
  parent: (node) => node.parent,
  tagName: (node) => (isTag(node) ? node.name.toLowerCase() : null),
  attribute: (node, name) => (isTag(node) ? node.attribs[name] : undefined),
};

export function detectElementSource(element: Element): SourceRegion {
  return detectSource(cheerioTraversal, element);
}

import { InvalidUrlError } from "./errors.js";
import type { LinkType } from "./types.js";

const CRAWLABLE_PROTOCOLS = new Set(["http:", "https:"]);

/** Looked up in order; the first table holding the extension wins. */
const EXTENSION_TYPES: ReadonlyArray<readonly [LinkType, ReadonlySet<string>]> = [
  ["document", new Set(["pdf", "doc", "docx", "xls", "xlsx", "ppt", "pptx", "txt", "rtf"])],
  ["image", new Set(["jpg", "jpeg", "png", "gif", "svg", "webp", "bmp", "ico"])],
  ["video", new Set(["mp4", "avi", "mkv", "mov", "webm", "wmv", "flv"])],
  ["audio", new Set(["mp3", "wav", "flac", "ogg", "aac", "wma"])],
  ["archive", new Set(["zip", "rar", "tar", "gz", "7z", "bz2"])],
  ["code", new Set(["js", "css", "json", "html", "htm", "xml"])],
];

// Extensions served as regular HTML pages; links to them are still followed.
const PAGE_EXTENSIONS = new Set(["html", "htm", "php", "asp", "aspx", "jsp", "shtml"]);

export interface DomainClassification {
  domain: string;
  isInternal: boolean;
  isSubdomain: boolean;
}

/**
 * Resolve `rawHref` against `baseUrl` and normalize it: fragment removed,
 * scheme and host lowercased, default port dropped. Query strings and trailing
 * slashes are kept. Applying it again to its own output is a no-op.
 */
export function normalizeUrl(rawHref: string, baseUrl?: string): string {
  const href = rawHref.trim();
  if (!href) {
    throw new InvalidUrlError(rawHref, "empty reference");
  }

  let parsed: URL;
  try {
    parsed = baseUrl === undefined ? new URL(href) : new URL(href, baseUrl);
  } catch {
    throw new InvalidUrlError(rawHref, baseUrl ? `cannot be resolved against ${baseUrl}` : "not an absolute URL");
  }

  if (!CRAWLABLE_PROTOCOLS.has(parsed.protocol)) {
    // Opaque schemes (mailto:, tel:, data:, javascript:) keep their body as written.
    return parsed.href.replace(/#.*$/s, "");
  }

  parsed.hash = "";
  return parsed.href;
}

/** Like `normalizeUrl`, returning null instead of throwing. */
export function tryNormalizeUrl(rawHref: string, baseUrl?: string): string | null {
  try {
    return normalizeUrl(rawHref, baseUrl);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      return null;
    }
    throw error;
  }
}

/**
 * Key used for the visited set and link deduplication: the normalized URL
 * with trailing slashes stripped from the path.
 */
export function dedupKey(url: string): string {
  const normalized = normalizeUrl(url);
  const parsed = new URL(normalized);
  if (!CRAWLABLE_PROTOCOLS.has(parsed.protocol)) {
    return normalized;
  }
  const pathname = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.protocol}//${parsed.host}${pathname}${parsed.search}`;
}

export function isCrawlableScheme(url: string): boolean {
  try {
    return CRAWLABLE_PROTOCOLS.has(new URL(url).protocol);
  } catch {
    return false;
  }
}

/** Matches hrefs that must never be dereferenced as pages, before any resolution. */
export function hasNonCrawlableScheme(rawHref: string): boolean {
  const match = /^\s*([a-z][a-z0-9+.-]*):/i.exec(rawHref);
  if (!match) {
    return false;
  }
  const protocol = `${match[1].toLowerCase()}:`;
  return !CRAWLABLE_PROTOCOLS.has(protocol);
}

/** Host with a leading `www.` removed, so `www.example.com` and `example.com` compare equal. */
export function registrableHost(hostname: string): string {
  const lower = hostname.toLowerCase();
  return lower.startsWith("www.") ? lower.slice(4) : lower;
}

export function isSubdomainOf(hostname: string, seedHostname: string): boolean {
  const host = registrableHost(hostname);
  const base = registrableHost(seedHostname);
  if (!host || !base || host === base) {
    return false;
  }
  return host.endsWith(`.${base}`);
}

export function classifyDomain(
  url: string,
  seedUrl: string,
  options: { includeSubdomains?: boolean } = {}
): DomainClassification {
  let parsed: URL;
  let seed: URL;
  try {
    parsed = new URL(url);
    seed = new URL(seedUrl);
  } catch {
    return { domain: "", isInternal: false, isSubdomain: false };
  }

  if (!CRAWLABLE_PROTOCOLS.has(parsed.protocol)) {
    return { domain: parsed.host, isInternal: false, isSubdomain: false };
  }

  const sameSite = registrableHost(parsed.hostname) === registrableHost(seed.hostname);
  const isSubdomain = isSubdomainOf(parsed.hostname, seed.hostname);
  return {
    domain: parsed.host,
    isInternal: sameSite || (isSubdomain && options.includeSubdomains === true),
    isSubdomain,
  };
}

/** Lowercased extension of the last path segment, without the dot. Empty when there is none. */
export function getExtension(pathname: string): string {
  const segment = pathname.slice(pathname.lastIndexOf("/") + 1).toLowerCase();
  const dot = segment.lastIndexOf(".");
  if (dot <= 0 || dot === segment.length - 1) {
    return "";
  }
  return segment.slice(dot + 1);
}

/**
 * Extension table first, then the `api` heuristic (path mentions "api" or
 * the URL carries a query), then `page` for extensionless paths.
 */
export function getLinkType(url: string): LinkType {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return "other";
  }
  if (!CRAWLABLE_PROTOCOLS.has(parsed.protocol)) {
    return "other";
  }

  const extension = getExtension(parsed.pathname);
  if (extension) {
    for (const [type, extensions] of EXTENSION_TYPES) {
      if (extensions.has(extension)) {
        return type;
      }
    }
  }

  if (parsed.pathname.toLowerCase().includes("api") || parsed.search.length > 1) {
    return "api";
  }

  return extension ? "other" : "page";
}

/** Whether a URL points at something that can be crawled as an HTML page. */
export function looksLikePage(url: string): boolean {
  if (!isCrawlableScheme(url)) {
    return false;
  }
  const extension = getExtension(new URL(url).pathname);
  return extension === "" || PAGE_EXTENSIONS.has(extension);
}

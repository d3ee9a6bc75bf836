import type { Fetcher } from "./fetcher.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LinkType =
  | "page"
  | "image"
  | "document"
  | "video"
  | "audio"
  | "archive"
  | "code"
  | "api"
  | "other";

export type SourceRegion =
  | "navigation"
  | "header"
  | "footer"
  | "main_content"
  | "sidebar"
  | "breadcrumb"
  | "content"
  | "unknown";

export type FollowRule = "internal" | "all";

/** What to do with `mailto:`, `javascript:`, `tel:`, `data:` and similar hrefs. */
export type NonCrawlablePolicy = "record" | "exclude";

export type CrawlPhase = "idle" | "fetching" | "extracting" | "enqueuing" | "done" | "failed";

export type TerminationReason = "frontier_exhausted" | "max_pages" | "aborted";

export type FetchErrorKind = "timeout" | "dns" | "http" | "connection_refused" | "network" | "parse";

export type CommentType = "html" | "javascript_single" | "javascript_multi";

export type CommentTypeFilter = "html" | "javascript" | "js_single" | "js_multi";

export interface Link {
  /** The attribute value exactly as found in the document. */
  rawHref: string;
  /** Absolute, normalized URL. Never empty. */
  url: string;
  text: string;
  domain: string;
  path: string;
  query: string;
  isInternal: boolean;
  isSubdomain: boolean;
  linkType: LinkType;
  source: SourceRegion;
  /** Tag name of the element the reference came from ("a", "img", ...). */
  element: string;
  foundOnPage: string;
  /** Set on repeats kept under `allowDuplicates`: index of the first occurrence in `CrawlResult.links`. */
  duplicateOf?: number;
}

export interface PageComment {
  type: CommentType;
  content: string;
  lineStart: number;
  position: number;
  location: "html" | "inline_script";
}

export interface FrontierEntry {
  url: string;
  depth: number;
}

export interface PageFetchResult {
  /** Final URL after redirects. */
  url: string;
  requestedUrl: string;
  status: number;
  contentType: string;
  html: string;
  /** Whether the page went through a headless browser. */
  rendered: boolean;
  /** Set when rendering was requested but the fetcher fell back to plain HTTP. */
  fallbackReason?: string;
}

export interface FetchPageOptions {
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface CrawlErrorEntry {
  url: string;
  depth: number;
  kind: FetchErrorKind;
  status?: number;
  message: string;
}

export interface PageSummary {
  url: string;
  finalUrl: string;
  depth: number;
  status: number;
  title: string;
  linksOnPage: number;
  internalLinks: number;
  externalLinks: number;
  subdomainLinks: number;
  filesFound: number;
  rendered: boolean;
  comments?: PageComment[];
  commentTypes?: Partial<Record<CommentType, number>>;
}

export interface CrawlProgress {
  phase: CrawlPhase;
  pagesCrawled: number;
  maxPages: number;
  queued: number;
  linksFound: number;
  currentUrl?: string;
  depth?: number;
}

export interface CommentOptions {
  type?: CommentTypeFilter;
  minLength?: number;
}

export interface CrawlOptions {
  startUrl: string;
  maxDepth?: number;
  maxPages?: number;
  headers?: Record<string, string>;
  followRule?: FollowRule;
  /** Count subdomains of the seed as internal (classified and followed). */
  includeSubdomains?: boolean;
  allowDuplicates?: boolean;
  concurrency?: number;
  timeoutMs?: number;
  /** Retries per page for transient fetch failures. Defaults to 0. */
  retries?: number;
  retryDelayMs?: number;
  renderJs?: boolean;
  nonCrawlableSchemes?: NonCrawlablePolicy;
  /** Also collect `src` references of images, frames, media and scripts. Defaults to true. */
  includeEmbeds?: boolean;
  includeSrcset?: boolean;
  /** Extract HTML and inline-script comments per page. Off unless set. */
  comments?: boolean | CommentOptions;
  /** Collaborator override. When omitted a fetcher is created from `renderJs`. */
  fetcher?: Fetcher;
  signal?: AbortSignal;
  shouldAbort?: () => boolean | Promise<boolean>;
  onProgress?: (progress: CrawlProgress) => void | Promise<void>;
  onLog?: (level: LogLevel, message: string, url?: string) => void | Promise<void>;
}

export interface ResolvedCrawlOptions {
  readonly startUrl: string;
  readonly maxDepth: number;
  readonly maxPages: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly followRule: FollowRule;
  readonly includeSubdomains: boolean;
  readonly allowDuplicates: boolean;
  readonly concurrency: number;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly retryDelayMs: number;
  readonly renderJs: boolean;
  readonly nonCrawlableSchemes: NonCrawlablePolicy;
  readonly includeEmbeds: boolean;
  readonly includeSrcset: boolean;
  readonly comments: CommentOptions | null;
}

export interface CrawlResult {
  startUrl: string;
  /** Fetch attempts, failed ones included. */
  pagesCrawled: number;
  links: Link[];
  pages: PageSummary[];
  errors: CrawlErrorEntry[];
  terminationReason: TerminationReason;
  durationMs: number;
}

export interface CrawlInfo {
  startUrl: string;
  pagesCrawled: number;
  maxDepth: number;
  totalLinks: number;
  /** Links whose type is anything but "page". */
  filesFound: number;
}

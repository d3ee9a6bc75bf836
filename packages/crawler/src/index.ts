// Main exports
export { crawlSite, CrawlScheduler, createFetcher } from "./crawler.js";
export { filterLinks, selectLinks, buildLinkPredicate, expandTypeFilters, LINK_TYPE_GROUPS } from "./link-filter.js";
export { validateLinks } from "./link-validator.js";
export { getCrawlInfo, summarizeLinks } from "./summary.js";

// Types
export type {
  CrawlOptions,
  ResolvedCrawlOptions,
  CrawlResult,
  CrawlInfo,
  CrawlProgress,
  CrawlPhase,
  CrawlErrorEntry,
  PageSummary,
  PageComment,
  PageFetchResult,
  FetchPageOptions,
  FrontierEntry,
  Link,
  LinkType,
  SourceRegion,
  FollowRule,
  NonCrawlablePolicy,
  TerminationReason,
  FetchErrorKind,
  CommentType,
  CommentTypeFilter,
  CommentOptions,
  LogLevel,
} from "./types.js";
export type { LinkFilterCriteria, LinkScope } from "./link-filter.js";
export type { LinkValidation, ValidatedLink, ValidateOptions } from "./link-validator.js";
export type { LinkBreakdown } from "./summary.js";
export type { TreeTraversal } from "./source-detector.js";
export type { LinkExtractionContext } from "./link-extractor.js";
export type { ParsedDocument } from "./document.js";
export type { Fetcher } from "./fetcher.js";
export type { BrowserFetcherOptions } from "./browser-fetcher.js";
export type {
  ExtractionRule,
  ExtractionRules,
  ExtractedValue,
  SelectedElement,
  PageContent,
} from "./structured-extractor.js";

// Errors
export {
  CrawlerError,
  ConfigError,
  InvalidUrlError,
  FetchError,
  ParseError,
  CrawlFailedError,
} from "./errors.js";

// Utilities (for advanced usage)
export {
  normalizeUrl,
  tryNormalizeUrl,
  dedupKey,
  classifyDomain,
  getLinkType,
  getExtension,
  isCrawlableScheme,
  hasNonCrawlableScheme,
  looksLikePage,
  isSubdomainOf,
  registrableHost,
} from "./url-classifier.js";
export { detectSource, detectElementSource, cheerioTraversal, regionOf } from "./source-detector.js";
export { parseDocument } from "./document.js";
export { extractLinks, parseSrcset } from "./link-extractor.js";
export { extractComments, filterComments, countCommentTypes } from "./comment-extractor.js";
export {
  applyExtractionRules,
  loadExtractionRules,
  validateExtractionRules,
  selectElements,
  extractPageContent,
} from "./structured-extractor.js";
export { HttpFetcher } from "./fetcher.js";
export { BrowserFetcher } from "./browser-fetcher.js";
export { resolveCrawlOptions, parseHeaders, parseListOption } from "./config.js";
export { setLogCallback } from "./logger.js";

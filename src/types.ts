/**
 * Shared record and capability types for content-lens
 */

// ============================================================================
// Content classification
// ============================================================================

export const CONTENT_TYPES = ['html', 'feed', 'api', 'unknown'] as const;

/** Kind of resource an analysis ran against */
export type ContentType = (typeof CONTENT_TYPES)[number];

/** Terminal state of a single analysis */
export type AnalysisStatus = 'success' | 'error' | 'timeout' | 'blocked';

export type FeedType = 'rss' | 'atom' | 'json';

// ============================================================================
// Analysis records
// ============================================================================

export interface AnalysisScores {
  /** Structural completeness proxy. Not query-aware. */
  relevance: number;
  quality: number;
  freshness: number;
}

export interface AnalysisTiming {
  /** Time spent waiting on the fetch capability */
  responseTimeMs: number;
  /** Wall time from request start to record creation */
  processingTimeMs: number;
}

/**
 * Fields an analyzer fills in. Analyzers write into a draft of this shape
 * as they go, so a deadline can still report partial work.
 */
export interface ContentFields {
  title?: string;
  description?: string;
  mainContent?: string;
  summary?: string;
  language?: string;
  author?: string;
  publishedAt?: Date;
  lastModifiedAt?: Date;
  canonicalUrl?: string;
  discoveredFeeds: string[];
  images: string[];
  externalLinks: string[];
}

/**
 * Normalized result of analyzing one resource. Frozen once returned.
 */
export interface AnalysisRecord {
  readonly url: string;
  readonly resolvedContentType: ContentType;
  readonly status: AnalysisStatus;
  readonly title?: string;
  readonly description?: string;
  readonly mainContent?: string;
  readonly summary?: string;
  readonly language?: string;
  readonly author?: string;
  readonly publishedAt?: Date;
  readonly lastModifiedAt?: Date;
  readonly canonicalUrl?: string;
  readonly scores: Readonly<AnalysisScores>;
  readonly discoveredFeeds: readonly string[];
  readonly images: readonly string[];
  readonly externalLinks: readonly string[];
  readonly timing: Readonly<AnalysisTiming>;
  /** HTTP status returned by the fetch capability, when a response arrived */
  readonly statusCode?: number;
  /** Bytes received before truncation */
  readonly contentLength?: number;
  readonly errorMessage?: string;
  readonly analyzedAt: Date;
}

// ============================================================================
// Feeds
// ============================================================================

export interface FeedDescriptor {
  url: string;
  title?: string;
  description?: string;
  feedType: FeedType;
  lastUpdated?: Date;
  /** Entries seen, capped at the configured maximum */
  entryCount: number;
  isActive: boolean;
  language?: string;
  /** False when the descriptor was built from an unvalidated candidate */
  validated: boolean;
}

export type DiscoveryMethod = 'direct' | 'page-scan' | 'crawl';

export interface FeedDiscoveryResult {
  sourceUrl: string;
  feeds: FeedDescriptor[];
  discoveryMethod: DiscoveryMethod;
  totalFeeds: number;
  pagesVisited: number;
  discoveryTimeMs: number;
  errorMessage?: string;
}

// ============================================================================
// API payloads
// ============================================================================

export type ApiStructureKind =
  | 'array-of-objects'
  | 'array-of-values'
  | 'single-object'
  | 'envelope'
  | 'paginated-envelope'
  | 'error-envelope'
  | 'xml-document'
  | 'text'
  | 'empty'
  | 'unparseable';

export interface ApiStructure {
  kind: ApiStructureKind;
  /** Dotted path of the record container, e.g. `data.children` */
  containerPath?: string;
  recordCount: number;
  /** Pagination keys seen next to the container */
  paginationKeys: string[];
  /** Short human-readable description, e.g. `envelope(data)` */
  label: string;
}

export interface NormalizedRecord {
  title?: string;
  content?: string;
  url?: string;
  date?: string;
  id?: string;
  /** Fields that did not map onto a normalized name */
  metadata: Record<string, unknown>;
}

export type KnownApiSchema = 'json-api' | 'json-feed' | 'reddit-listing' | 'hal' | 'odata';

export interface ApiAnalysisRecord {
  endpointUrl: string;
  detectedStructure: ApiStructure;
  extractedRecords: NormalizedRecord[];
  detectedSchema: KnownApiSchema | null;
  /** Items in the container before the record cap applied */
  totalRecords: number;
  dataQuality: number;
  processingTimeMs: number;
  errorMessage?: string;
}

// ============================================================================
// Batch & metadata
// ============================================================================

export interface BatchAggregate {
  succeeded: number;
  /** Records with status `error` or `blocked` */
  failed: number;
  timedOut: number;
  totalElapsedMs: number;
}

export interface BatchResult {
  /** Aligned with the input list */
  records: AnalysisRecord[];
  aggregate: BatchAggregate;
  /** `<url>: <message>` for every record that did not succeed */
  errors: string[];
}

export interface BatchProgress {
  completed: number;
  total: number;
  url: string;
  status: AnalysisStatus;
}

export interface PageMetadata {
  url: string;
  resolvedContentType: ContentType;
  title?: string;
  description?: string;
  language?: string;
  author?: string;
  publishedAt?: Date;
  lastModifiedAt?: Date;
  canonicalUrl?: string;
  statusCode?: number;
  responseTimeMs: number;
  contentLength?: number;
  errorMessage?: string;
}

// ============================================================================
// Fetch capability
// ============================================================================

export interface FetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface FetchResponse {
  status: number;
  /** Header names lower-cased */
  headers: Record<string, string>;
  body: string;
  elapsedMs: number;
}

/**
 * Network access used by the engine. Rejection means a transport failure;
 * any HTTP status (including 4xx/5xx) resolves.
 */
export type FetchCapability = (url: string, options: FetchOptions) => Promise<FetchResponse>;

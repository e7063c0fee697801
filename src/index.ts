/**
 * content-lens
 *
 * Turns fetched HTML pages, syndication feeds and API payloads into
 * normalized, scored analysis records.
 *
 * @example Simple usage
 * ```typescript
 * import { analyze } from 'content-lens';
 *
 * const record = await analyze('https://example.com/blog/post');
 * console.log(record.status, record.title, record.scores.quality);
 * ```
 *
 * @example Batches, feeds and API payloads
 * ```typescript
 * import { AnalysisManager } from 'content-lens';
 *
 * const manager = new AnalysisManager({ config: { maxConcurrent: 3 } });
 * const batch = await manager.analyzeBatch(urls);
 * const feeds = await manager.discoverFeeds('https://example.com');
 * const api = manager.analyzeApiPayload('https://api.example.com/posts', body);
 * ```
 */

// ============================================================================
// HIGH-LEVEL API
// ============================================================================

export { analyze, createAnalyzer, type AnalyzeOptions } from './analyze';

// ============================================================================
// MODULAR COMPONENTS
// ============================================================================

// Orchestration
export {
  AnalysisManager,
  METADATA_TIMEOUT_MS,
  truncateBody,
  type AnalysisManagerOptions,
  type BatchOptions,
  type RequestOptions,
} from './orchestrator/analysis-manager';

export { FeedDiscoverer, MAX_DISCOVERY_DEPTH, type FeedDiscoveryOptions } from './orchestrator/feed-discoverer';

// Analyzers
export {
  HtmlAnalyzer,
  COMMON_FEED_PATHS,
  type HtmlMetadata,
  type FeedCandidate,
  type FeedCandidateSource,
  type PageLinks,
} from './analyzers/html-analyzer';

export { FeedAnalyzer, isFeedActive, type FeedEntry, type ParsedFeed } from './analyzers/feed-analyzer';

export { ApiAnalyzer, normalizeRecord, calculateDataQuality } from './analyzers/api-analyzer';

export { UnknownAnalyzer } from './analyzers/unknown-analyzer';

export { extractMainContent, type MainContentResult } from './analyzers/main-content';

export type { ContentAnalyzer, AnalyzerInput, AnalyzerOutput } from './analyzers/types';

// Content type resolution
export {
  resolveContentType,
  contentTypeFromHint,
  contentTypeFromUrl,
  sniffContentType,
  detectFeedFormat,
} from './resolver/content-type-resolver';

// Scoring
export {
  calculateScores,
  calculateRelevanceScore,
  calculateQualityScore,
  calculateFreshnessScore,
  createScoringConfig,
  DEFAULT_SCORING_CONFIG,
  ZERO_SCORES,
  type ScoringConfig,
  type ScoringInput,
  type ScoringSignals,
} from './scoring/scoring-engine';

// Fetching
export { createHttpFetcher, fetchResource, type HttpFetcherOptions } from './fetch/http-fetcher';

// Configuration & logging
export {
  AnalysisConfigSchema,
  DEFAULT_ANALYSIS_CONFIG,
  resolveConfig,
  type AnalysisConfig,
  type AnalysisOptions,
} from './config';

export { createLogger, type Logger, type LogLevel, type LogSink } from './utils/logger';

// Utilities
export { detectLanguage, normalizeLanguageTag, type LanguageGuess } from './utils/language';
export { summarize, truncateText, collapseWhitespace } from './formatters/text-cleaner';

// ============================================================================
// TYPES & INTERFACES
// ============================================================================

export type {
  ContentType,
  AnalysisStatus,
  AnalysisRecord,
  AnalysisScores,
  AnalysisTiming,
  ContentFields,
  FeedType,
  FeedDescriptor,
  DiscoveryMethod,
  FeedDiscoveryResult,
  ApiStructureKind,
  ApiStructure,
  NormalizedRecord,
  KnownApiSchema,
  ApiAnalysisRecord,
  BatchAggregate,
  BatchResult,
  BatchProgress,
  PageMetadata,
  FetchCapability,
  FetchOptions,
  FetchResponse,
} from './types';

export { CONTENT_TYPES } from './types';

// ============================================================================
// ERROR CLASSES
// ============================================================================

export {
  AnalyzerError,
  ResolutionError,
  ParseError,
  AnalysisTimeoutError,
  TransportError,
  ValidationError,
  isAnalyzerError,
  isAbortError,
  describeError,
  statusForError,
} from './errors';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '0.1.0';

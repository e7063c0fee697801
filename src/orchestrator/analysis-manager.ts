/**
 * Analysis Manager
 *
 * Entry point for analysis. Fetches a resource, resolves its content type,
 * dispatches to the matching analyzer and scores the result. Every fault is
 * folded into a terminal record; nothing here throws to the caller except a
 * constructor given invalid base options.
 */

import pLimit from 'p-limit';
import { ApiAnalyzer } from '../analyzers/api-analyzer';
import { FeedAnalyzer } from '../analyzers/feed-analyzer';
import { HtmlAnalyzer } from '../analyzers/html-analyzer';
import { UnknownAnalyzer } from '../analyzers/unknown-analyzer';
import { emptyFields, type ContentAnalyzer } from '../analyzers/types';
import { DEFAULT_ANALYSIS_CONFIG, resolveConfig, type AnalysisConfig, type AnalysisOptions } from '../config';
import { ParseError, ResolutionError, TransportError, describeError, statusForError } from '../errors';
import { createHttpFetcher, fetchResource } from '../fetch/http-fetcher';
import { contentTypeFromHint, resolveContentType } from '../resolver/content-type-resolver';
import { ZERO_SCORES, calculateScores, createScoringConfig, type ScoringConfig } from '../scoring/scoring-engine';
import type {
  AnalysisRecord,
  AnalysisScores,
  AnalysisStatus,
  ApiAnalysisRecord,
  BatchAggregate,
  BatchProgress,
  BatchResult,
  ContentFields,
  ContentType,
  FeedDiscoveryResult,
  FetchCapability,
  PageMetadata,
} from '../types';
import { checkAborted, withDeadline } from '../utils/deadline';
import { detectLanguage, normalizeLanguageTag } from '../utils/language';
import { createLogger, type LogSink, type Logger } from '../utils/logger';
import { dedupeUrls, isHttpUrl } from '../utils/url-utils';
import { FeedDiscoverer } from './feed-discoverer';

// ============================================================================
// Types
// ============================================================================

export interface AnalysisManagerOptions {
  /** Defaults to a fetcher over Node's global fetch */
  fetch?: FetchCapability;
  /** Base configuration; per-call options are merged over it */
  config?: AnalysisOptions;
  /** Source of "now" for freshness and activity */
  clock?: () => Date;
  logSink?: LogSink;
}

/** Per-call options. Log level is fixed when the manager is built. */
export type RequestOptions = Omit<AnalysisOptions, 'logLevel'>;

export interface BatchOptions extends RequestOptions {
  contentTypeHint?: string;
  onProgress?: (progress: BatchProgress) => void;
}

/** Mutable view of one request, read back when it fails part-way */
interface RequestState {
  resolvedType: ContentType;
  draft: ContentFields;
  responseTimeMs: number;
  statusCode?: number;
  contentLength?: number;
}

interface Outcome {
  status: AnalysisStatus;
  fields: ContentFields;
  scores: Readonly<AnalysisScores>;
  errorMessage?: string;
}

/** Metadata lookups never wait longer than this */
export const METADATA_TIMEOUT_MS = 10000;

const MAX_POOL_WIDTH = 50;

// ============================================================================
// Manager
// ============================================================================

export class AnalysisManager {
  readonly config: AnalysisConfig;
  readonly htmlAnalyzer: HtmlAnalyzer;
  readonly feedAnalyzer: FeedAnalyzer;
  readonly apiAnalyzer: ApiAnalyzer;

  private readonly fetch: FetchCapability;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly analyzers: Record<ContentType, ContentAnalyzer>;
  private readonly feedDiscoverer: FeedDiscoverer;

  /**
   * @throws ValidationError when the base options are invalid
   */
  constructor(options: AnalysisManagerOptions = {}) {
    this.config = resolveConfig(DEFAULT_ANALYSIS_CONFIG, options.config);
    this.fetch = options.fetch ?? createHttpFetcher();
    this.clock = options.clock ?? (() => new Date());

    const loggerFor = (scope: string) => createLogger(scope, this.config.logLevel, options.logSink);
    this.logger = loggerFor('AnalysisManager');

    this.htmlAnalyzer = new HtmlAnalyzer({ logger: loggerFor('HtmlAnalyzer') });
    this.feedAnalyzer = new FeedAnalyzer({ fetch: this.fetch, logger: loggerFor('FeedAnalyzer') });
    this.apiAnalyzer = new ApiAnalyzer({ logger: loggerFor('ApiAnalyzer') });

    this.analyzers = {
      html: this.htmlAnalyzer,
      feed: this.feedAnalyzer,
      api: this.apiAnalyzer,
      unknown: new UnknownAnalyzer(),
    };

    this.feedDiscoverer = new FeedDiscoverer({
      fetch: this.fetch,
      htmlAnalyzer: this.htmlAnalyzer,
      feedAnalyzer: this.feedAnalyzer,
      logger: loggerFor('FeedDiscoverer'),
    });
  }

  // ==========================================================================
  // Single resource
  // ==========================================================================

  /**
   * Analyze one URL. Always resolves to a record; failures are reported
   * through `status` and `errorMessage`.
   */
  async analyzeOne(url: string, contentTypeHint?: string, options?: RequestOptions): Promise<AnalysisRecord> {
    const startTime = Date.now();
    const now = this.clock();
    const state: RequestState = {
      resolvedType: contentTypeFromHint(contentTypeHint) ?? 'unknown',
      draft: emptyFields(),
      responseTimeMs: 0,
    };

    let config: AnalysisConfig;
    try {
      config = resolveConfig(this.config, options);
    } catch (error) {
      return this.failureRecord(url, state, error, startTime, now);
    }

    const controller = new AbortController();
    try {
      return await withDeadline(
        this.run(url, contentTypeHint, config, now, state, controller.signal, startTime),
        config.timeoutMs,
        { controller, url }
      );
    } catch (error) {
      return this.failureRecord(url, state, error, startTime, now);
    }
  }

  private async run(
    url: string,
    contentTypeHint: string | undefined,
    config: AnalysisConfig,
    now: Date,
    state: RequestState,
    signal: AbortSignal,
    startTime: number
  ): Promise<AnalysisRecord> {
    if (!isHttpUrl(url)) {
      throw new ResolutionError(`Not an absolute http(s) URL: ${url}`, { url });
    }

    this.logger.debug(`Fetching ${url}`);
    const response = await fetchResource(this.fetch, url, { timeoutMs: config.timeoutMs, signal });
    state.responseTimeMs = Math.max(0, response.elapsedMs);
    state.statusCode = response.status;
    state.contentLength = Buffer.byteLength(response.body, 'utf8');

    const body = truncateBody(response.body, state.contentLength, config.maxContentBytes);
    if (body.length < response.body.length) {
      this.logger.info(`Truncated ${url} from ${state.contentLength} to ${config.maxContentBytes} bytes`);
    }

    state.resolvedType = resolveContentType(url, contentTypeHint, body);
    checkAborted(signal);

    const output = await this.analyzers[state.resolvedType].analyze({
      url,
      body,
      headers: response.headers,
      config,
      now,
      draft: state.draft,
      signal,
    });

    if (state.resolvedType !== 'unknown' && !output.fields.mainContent) {
      throw new ParseError('Analyzer produced no main content', { format: parseFormatOf(state.resolvedType), url });
    }

    const scores = config.calculateScores
      ? calculateScores({ ...output.fields, ...output.signals }, now, scoringConfigFor(config))
      : ZERO_SCORES;

    this.logger.debug(`Analyzed ${url} as ${state.resolvedType}`);
    return this.buildRecord(url, state, { status: 'success', fields: output.fields, scores }, startTime, now);
  }

  private failureRecord(url: string, state: RequestState, error: unknown, startTime: number, now: Date): AnalysisRecord {
    const status = statusForError(error);
    const errorMessage = describeError(error);
    if (status === 'timeout') {
      this.logger.warn(`Timed out analyzing ${url}: ${errorMessage}`);
    } else {
      this.logger.warn(`Analysis of ${url} ended ${status}: ${errorMessage}`);
    }

    // Whatever the analyzer got to before the deadline
    const fields = status === 'timeout' ? snapshot(state.draft) : emptyFields();
    if (error instanceof TransportError && error.statusCode !== undefined) {
      state.statusCode = error.statusCode;
    }

    return this.buildRecord(url, state, { status, fields, scores: ZERO_SCORES, errorMessage }, startTime, now);
  }

  private buildRecord(
    url: string,
    state: RequestState,
    outcome: Outcome,
    startTime: number,
    now: Date
  ): AnalysisRecord {
    const { fields } = outcome;
    const record: AnalysisRecord = {
      url,
      resolvedContentType: state.resolvedType,
      status: outcome.status,
      title: fields.title,
      description: fields.description,
      mainContent: fields.mainContent,
      summary: fields.summary,
      language: fields.language,
      author: fields.author,
      publishedAt: fields.publishedAt,
      lastModifiedAt: fields.lastModifiedAt,
      canonicalUrl: fields.canonicalUrl,
      scores: Object.freeze({ ...outcome.scores }),
      discoveredFeeds: Object.freeze(dedupeUrls(fields.discoveredFeeds)),
      images: Object.freeze([...fields.images]),
      externalLinks: Object.freeze([...fields.externalLinks]),
      timing: Object.freeze({
        responseTimeMs: state.responseTimeMs,
        processingTimeMs: Math.max(0, Date.now() - startTime),
      }),
      statusCode: state.statusCode,
      contentLength: state.contentLength,
      errorMessage: outcome.errorMessage,
      analyzedAt: now,
    };
    return Object.freeze(record);
  }

  // ==========================================================================
  // Batch
  // ==========================================================================

  /**
   * Analyze many URLs under a fixed-width pool. Records come back in input
   * order; duplicates are analyzed independently.
   */
  async analyzeBatch(urls: readonly string[], maxConcurrent?: number, options: BatchOptions = {}): Promise<BatchResult> {
    const startTime = Date.now();
    const { onProgress, contentTypeHint, ...requestOptions } = options;

    if (urls.length === 0) {
      return {
        records: [],
        aggregate: { succeeded: 0, failed: 0, timedOut: 0, totalElapsedMs: 0 },
        errors: [],
      };
    }

    const width = poolWidth(maxConcurrent ?? requestOptions.maxConcurrent ?? this.config.maxConcurrent);
    const limit = pLimit(width);
    let completed = 0;

    this.logger.info(`Analyzing ${urls.length} URLs (${width} at a time)`);

    const records = await Promise.all(
      urls.map(url =>
        limit(async () => {
          const record = await this.analyzeOne(url, contentTypeHint, requestOptions);
          completed++;
          this.reportProgress(onProgress, { completed, total: urls.length, url, status: record.status });
          return record;
        })
      )
    );

    const aggregate: BatchAggregate = {
      succeeded: records.filter(record => record.status === 'success').length,
      failed: records.filter(record => record.status === 'error' || record.status === 'blocked').length,
      timedOut: records.filter(record => record.status === 'timeout').length,
      totalElapsedMs: Date.now() - startTime,
    };
    const errors = records
      .filter(record => record.status !== 'success')
      .map(record => `${record.url}: ${record.errorMessage ?? record.status}`);

    this.logger.info(
      `Batch done: ${aggregate.succeeded} succeeded, ${aggregate.failed} failed, ${aggregate.timedOut} timed out`
    );

    return { records, aggregate, errors };
  }

  private reportProgress(onProgress: BatchOptions['onProgress'], progress: BatchProgress): void {
    if (!onProgress) return;
    try {
      onProgress(progress);
    } catch (error) {
      this.logger.warn(`Progress callback failed: ${describeError(error)}`);
    }
  }

  // ==========================================================================
  // Feeds and API payloads
  // ==========================================================================

  async discoverFeeds(url: string, depth?: number, validate?: boolean): Promise<FeedDiscoveryResult> {
    return this.feedDiscoverer.discover(url, {
      depth: depth ?? this.config.feedDiscoveryDepth,
      validate: validate ?? this.config.validateFeeds,
      config: this.config,
      now: this.clock(),
    });
  }

  /**
   * Analyze an API response body that was fetched elsewhere
   */
  analyzeApiPayload(endpointUrl: string, rawPayload: unknown, schemaHint?: string): ApiAnalysisRecord {
    return this.apiAnalyzer.analyzePayload(endpointUrl, rawPayload, schemaHint, this.config.maxApiRecords);
  }

  // ==========================================================================
  // Metadata
  // ==========================================================================

  /**
   * Title, description, language and dates without content extraction or
   * scoring. Uses a shorter deadline and never throws.
   */
  async getPageMetadata(url: string): Promise<PageMetadata> {
    const timeoutMs = Math.min(this.config.timeoutMs, METADATA_TIMEOUT_MS);
    const controller = new AbortController();
    let responseTimeMs = 0;
    let statusCode: number | undefined;

    try {
      if (!isHttpUrl(url)) {
        throw new ResolutionError(`Not an absolute http(s) URL: ${url}`, { url });
      }

      const response = await withDeadline(
        fetchResource(this.fetch, url, { timeoutMs, signal: controller.signal }),
        timeoutMs,
        { controller, url }
      );
      responseTimeMs = response.elapsedMs;
      statusCode = response.status;

      const contentLength = Buffer.byteLength(response.body, 'utf8');
      const body = truncateBody(response.body, contentLength, this.config.maxContentBytes);
      const resolvedContentType = resolveContentType(url, undefined, body);
      const base: PageMetadata = { url, resolvedContentType, statusCode, responseTimeMs, contentLength };

      if (resolvedContentType === 'html') {
        const metadata = this.htmlAnalyzer.extractMetadata(body, url, response.headers);
        const language = detectLanguage(
          [metadata.title, metadata.description].filter(Boolean).join('. '),
          metadata.declaredLanguage,
          { enabled: this.config.detectLanguage, minLength: this.config.languageMinLength }
        );
        return {
          ...base,
          title: metadata.title,
          description: metadata.description,
          language: language.language,
          author: metadata.author,
          publishedAt: metadata.publishedAt,
          lastModifiedAt: metadata.lastModifiedAt,
          canonicalUrl: metadata.canonicalUrl,
        };
      }

      if (resolvedContentType === 'feed') {
        const feed = await this.feedAnalyzer.parse(body, url, this.config.maxFeedEntries);
        return {
          ...base,
          title: feed.title,
          description: feed.description,
          language: normalizeLanguageTag(feed.language),
          author: feed.author,
          lastModifiedAt: feed.lastUpdated,
        };
      }

      return base;
    } catch (error) {
      this.logger.warn(`Metadata lookup failed for ${url}: ${describeError(error)}`);
      return {
        url,
        resolvedContentType: 'unknown',
        statusCode: error instanceof TransportError ? error.statusCode : statusCode,
        responseTimeMs,
        errorMessage: describeError(error),
      };
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function scoringConfigFor(config: AnalysisConfig): ScoringConfig {
  return createScoringConfig({
    freshnessHalfLifeDays: config.freshnessHalfLifeDays,
    freshnessHorizonDays: config.freshnessHorizonDays,
  });
}

function parseFormatOf(type: Exclude<ContentType, 'unknown'>): 'html' | 'feed' | 'json' {
  return type === 'api' ? 'json' : type;
}

/**
 * Cut a body to at most `maxBytes` UTF-8 bytes. A multi-byte character split
 * at the boundary is dropped.
 */
export function truncateBody(body: string, byteLength: number, maxBytes: number): string {
  if (byteLength <= maxBytes) return body;
  return Buffer.from(body, 'utf8').subarray(0, maxBytes).toString('utf8').replace(/\uFFFD$/, '');
}

function poolWidth(requested: number): number {
  return Math.min(MAX_POOL_WIDTH, Math.max(1, Math.floor(requested) || DEFAULT_ANALYSIS_CONFIG.maxConcurrent));
}

function snapshot(draft: ContentFields): ContentFields {
  return {
    ...draft,
    discoveredFeeds: [...draft.discoveredFeeds],
    images: [...draft.images],
    externalLinks: [...draft.externalLinks],
  };
}

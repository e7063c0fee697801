/**
 * Feed discovery
 *
 * Breadth-first scan of a site for feeds: the source page (which may itself
 * be a feed), then same-site pages down to the requested depth. Candidates
 * are deduped and, when asked, validated under a fixed-width pool.
 */

import pLimit from 'p-limit';
import type { AnalysisConfig } from '../config';
import { describeError } from '../errors';
import type { FeedAnalyzer } from '../analyzers/feed-analyzer';
import type { HtmlAnalyzer } from '../analyzers/html-analyzer';
import { fetchResource } from '../fetch/http-fetcher';
import { contentTypeFromUrl, detectFeedFormat } from '../resolver/content-type-resolver';
import type { DiscoveryMethod, FeedDescriptor, FeedDiscoveryResult, FeedType, FetchCapability } from '../types';
import type { Logger } from '../utils/logger';
import { isHttpUrl, isSameSite, urlKey } from '../utils/url-utils';

// ============================================================================
// Types
// ============================================================================

export interface FeedDiscoveryOptions {
  /** Levels to scan; the source page is level 0 */
  depth: number;
  validate: boolean;
  config: AnalysisConfig;
  now: Date;
}

export interface FeedDiscovererDeps {
  fetch: FetchCapability;
  htmlAnalyzer: HtmlAnalyzer;
  feedAnalyzer: FeedAnalyzer;
  logger: Logger;
}

interface PendingFeed {
  url: string;
  title?: string;
  feedType?: FeedType;
  /** Body already fetched, for a page that turned out to be a feed */
  body?: string;
}

type PageFetch = { ok: true; body: string } | { ok: false; error: string };

export const MAX_DISCOVERY_DEPTH = 5;

// ============================================================================
// Discoverer
// ============================================================================

export class FeedDiscoverer {
  constructor(private readonly deps: FeedDiscovererDeps) {}

  /**
   * Never throws; a failed source fetch yields an empty result with
   * `errorMessage` set.
   */
  async discover(sourceUrl: string, options: FeedDiscoveryOptions): Promise<FeedDiscoveryResult> {
    const startTime = Date.now();
    const { config, validate } = options;
    const depth = Math.min(MAX_DISCOVERY_DEPTH, Math.max(1, Math.floor(options.depth) || 1));

    const finish = (
      feeds: FeedDescriptor[],
      discoveryMethod: DiscoveryMethod,
      pagesVisited: number,
      errorMessage?: string
    ): FeedDiscoveryResult => ({
      sourceUrl,
      feeds,
      discoveryMethod,
      totalFeeds: feeds.length,
      pagesVisited,
      discoveryTimeMs: Date.now() - startTime,
      errorMessage,
    });

    if (!isHttpUrl(sourceUrl)) {
      return finish([], 'page-scan', 0, `Not an absolute http(s) URL: ${sourceUrl}`);
    }

    try {
      const limit = pLimit(config.maxConcurrent);
      // Owned by this call; concurrent discoveries never share it
      const visited = new Set<string>([urlKey(sourceUrl)]);
      const pending = new Map<string, PendingFeed>();
      const addPending = (feed: PendingFeed) => {
        const key = urlKey(feed.url);
        if (!pending.has(key)) pending.set(key, feed);
      };

      let method: DiscoveryMethod = 'page-scan';
      let pagesVisited = 0;
      let sourceError: string | undefined;
      let level = [sourceUrl];

      for (let current = 0; current < depth && level.length > 0; current++) {
        const pages = await Promise.all(level.map(pageUrl => limit(() => this.fetchPage(pageUrl, config))));
        const next: string[] = [];

        pages.forEach((page, index) => {
          const pageUrl = level[index] ?? sourceUrl;
          if (!page.ok) {
            if (current === 0) sourceError = page.error;
            this.deps.logger.debug(`Skipping ${pageUrl}: ${page.error}`);
            return;
          }

          pagesVisited++;
          if (current > 0) method = 'crawl';

          const feedType = detectFeedFormat(page.body);
          if (feedType) {
            if (current === 0) method = 'direct';
            addPending({ url: pageUrl, feedType, body: page.body });
            return;
          }

          const candidates = this.deps.htmlAnalyzer.discoverFeedLinks(page.body, pageUrl, {
            guessCommonPaths: validate && current === 0,
          });
          candidates.forEach(candidate => addPending(candidate));

          if (current + 1 >= depth) return;
          const links = this.deps.htmlAnalyzer.extractLinks(page.body, pageUrl);
          for (const link of [...links.internal, ...links.external]) {
            if (next.length >= config.maxPagesPerLevel) break;
            const key = urlKey(link);
            if (visited.has(key) || pending.has(key)) continue;
            if (!isSameSite(link, sourceUrl) || contentTypeFromUrl(link) !== null) continue;
            visited.add(key);
            next.push(link);
          }
        });

        level = next;
      }

      if (pagesVisited === 0) {
        return finish([], method, 0, sourceError ?? 'Source page could not be fetched');
      }

      const candidates = Array.from(pending.values());
      this.deps.logger.info(`Found ${candidates.length} feed candidates for ${sourceUrl} (${pagesVisited} pages)`);

      const feeds = validate
        ? await this.validateAll(candidates, options, limit)
        : candidates.map(candidate => unvalidated(candidate));

      return finish(feeds, method, pagesVisited);
    } catch (error) {
      this.deps.logger.error(`Feed discovery failed for ${sourceUrl}: ${describeError(error)}`);
      return finish([], 'page-scan', 0, describeError(error));
    }
  }

  private async fetchPage(url: string, config: AnalysisConfig): Promise<PageFetch> {
    try {
      const response = await fetchResource(this.deps.fetch, url, { timeoutMs: config.timeoutMs });
      return { ok: true, body: response.body.slice(0, config.maxContentBytes) };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }

  private async validateAll(
    candidates: PendingFeed[],
    options: FeedDiscoveryOptions,
    limit: ReturnType<typeof pLimit>
  ): Promise<FeedDescriptor[]> {
    const { feedAnalyzer, logger } = this.deps;

    const results = await Promise.all(
      candidates.map(candidate =>
        limit(async (): Promise<FeedDescriptor | null> => {
          try {
            if (candidate.body !== undefined) {
              const parsed = await feedAnalyzer.parse(candidate.body, candidate.url, options.config.maxFeedEntries);
              return feedAnalyzer.describe(candidate.url, parsed, options.config, options.now);
            }
            return await feedAnalyzer.validate(candidate.url, options.config, options.now);
          } catch (error) {
            logger.debug(`Dropping feed candidate ${candidate.url}: ${describeError(error)}`);
            return null;
          }
        })
      )
    );

    return results.filter((feed): feed is FeedDescriptor => feed !== null);
  }
}

function unvalidated(candidate: PendingFeed): FeedDescriptor {
  return {
    url: candidate.url,
    title: candidate.title,
    feedType: candidate.feedType ?? guessFeedType(candidate.url),
    entryCount: 0,
    isActive: false,
    validated: false,
  };
}

function guessFeedType(url: string): FeedType {
  const lower = url.toLowerCase();
  if (lower.includes('atom')) return 'atom';
  if (lower.endsWith('.json')) return 'json';
  return 'rss';
}

/**
 * High-level API
 *
 * One-call helpers over AnalysisManager for hosts that do not need to hold
 * a manager themselves.
 */

import type { AnalysisOptions } from './config';
import { AnalysisManager, type AnalysisManagerOptions, type BatchOptions } from './orchestrator/analysis-manager';
import type { AnalysisRecord, BatchResult, FeedDiscoveryResult } from './types';

export interface AnalyzeOptions extends AnalysisOptions {
  /** Force a content type instead of resolving it (`html`, `feed`, `api`, ...) */
  contentType?: string;
}

/**
 * Analyze a single URL with default settings
 *
 * @example
 * ```typescript
 * const record = await analyze('https://example.com/post');
 * if (record.status === 'success') console.log(record.title, record.scores);
 * ```
 */
export async function analyze(url: string, options: AnalyzeOptions = {}): Promise<AnalysisRecord> {
  const { contentType, ...config } = options;
  return new AnalysisManager({ config }).analyzeOne(url, contentType);
}

/**
 * Create an analyzer with default options
 * Useful for configuring once and reusing
 *
 * @example
 * ```typescript
 * const lens = createAnalyzer({ config: { timeoutMs: 10000, extractLinks: true } });
 *
 * const one = await lens.analyze('https://example.com/post');
 * const many = await lens.analyzeBatch(['https://a.example', 'https://b.example']);
 * ```
 */
export function createAnalyzer(defaults: AnalysisManagerOptions = {}) {
  const manager = new AnalysisManager(defaults);

  return {
    manager,
    analyze: (url: string, contentType?: string) => manager.analyzeOne(url, contentType),
    analyzeBatch: (urls: readonly string[], options?: BatchOptions): Promise<BatchResult> =>
      manager.analyzeBatch(urls, undefined, options),
    discoverFeeds: (url: string, depth?: number): Promise<FeedDiscoveryResult> => manager.discoverFeeds(url, depth),
  };
}

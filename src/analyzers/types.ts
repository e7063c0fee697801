import type { AnalysisConfig } from '../config';
import type { ScoringSignals } from '../scoring/scoring-engine';
import type { ContentFields, ContentType } from '../types';

export interface AnalyzerInput {
  url: string;
  body: string;
  /** Response headers, names lower-cased */
  headers: Record<string, string>;
  config: AnalysisConfig;
  now: Date;
  /**
   * Fields written as soon as they are known. The manager reads it back when
   * the deadline fires before the analyzer returns.
   */
  draft: ContentFields;
  signal?: AbortSignal;
}

export interface AnalyzerOutput {
  fields: ContentFields;
  signals: Required<ScoringSignals>;
}

/**
 * One strategy per resolved content type
 */
export interface ContentAnalyzer {
  readonly contentType: ContentType;
  analyze(input: AnalyzerInput): Promise<AnalyzerOutput>;
}

export function emptyFields(): ContentFields {
  return { discoveredFeeds: [], images: [], externalLinks: [] };
}

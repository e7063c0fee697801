/**
 * Scoring engine
 *
 * Pure functions producing relevance, quality and freshness scores in [0, 1].
 * Weights and horizons come from a ScoringConfig passed explicitly; the only
 * time input is the `now` argument.
 *
 * Relevance is a structural completeness proxy (title, description, content
 * length, structured metadata). It does not look at any query.
 */

import type { AnalysisScores, ContentFields } from '../types';
import { DAY_MS } from '../utils/dates';

// ============================================================================
// Types
// ============================================================================

export interface ScoringSignals {
  /** JSON-LD, OpenGraph, microdata, or an equivalent structured source */
  hasStructuredMetadata?: boolean;
  /** Share of text outside the main content (0 = none, 1 = all) */
  boilerplateRatio?: number;
  /** Language detection confidence */
  languageConfidence?: number;
}

export type ScoringInput = Pick<
  ContentFields,
  'title' | 'description' | 'mainContent' | 'author' | 'publishedAt' | 'lastModifiedAt'
> &
  ScoringSignals;

export interface ScoringConfig {
  relevanceWeights: {
    title: number;
    description: number;
    /** Awarded when content reaches `substantialContentLength` */
    content: number;
    /** Awarded when content reaches `partialContentLength` instead */
    partialContent: number;
    structuredMetadata: number;
  };
  qualityWeights: {
    length: number;
    author: number;
    date: number;
    boilerplate: number;
    language: number;
  };
  substantialContentLength: number;
  partialContentLength: number;
  /** Content length that earns the full length component */
  idealContentLength: number;
  freshnessHalfLifeDays: number;
  freshnessHorizonDays: number;
  /** Freshness of content without any date */
  undatedFreshness: number;
  /** Boilerplate ratio assumed when the analyzer could not measure it */
  unknownBoilerplateRatio: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  relevanceWeights: {
    title: 0.2,
    description: 0.2,
    content: 0.4,
    partialContent: 0.2,
    structuredMetadata: 0.2,
  },
  qualityWeights: {
    length: 0.4,
    author: 0.15,
    date: 0.15,
    boilerplate: 0.15,
    language: 0.15,
  },
  substantialContentLength: 500,
  partialContentLength: 200,
  idealContentLength: 5000,
  freshnessHalfLifeDays: 30,
  freshnessHorizonDays: 365,
  undatedFreshness: 0.5,
  unknownBoilerplateRatio: 0.5,
};

/**
 * Overlay freshness horizons from analysis options on the defaults
 */
export function createScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  return {
    ...DEFAULT_SCORING_CONFIG,
    ...overrides,
    relevanceWeights: { ...DEFAULT_SCORING_CONFIG.relevanceWeights, ...overrides.relevanceWeights },
    qualityWeights: { ...DEFAULT_SCORING_CONFIG.qualityWeights, ...overrides.qualityWeights },
  };
}

export const ZERO_SCORES: Readonly<AnalysisScores> = Object.freeze({ relevance: 0, quality: 0, freshness: 0 });

// ============================================================================
// Scores
// ============================================================================

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function hasText(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Structural completeness of a record
 */
export function calculateRelevanceScore(input: ScoringInput, config: ScoringConfig = DEFAULT_SCORING_CONFIG): number {
  const weights = config.relevanceWeights;
  const contentLength = input.mainContent?.trim().length ?? 0;

  let score = 0;
  if (hasText(input.title)) score += weights.title;
  if (hasText(input.description)) score += weights.description;

  if (contentLength >= config.substantialContentLength) {
    score += weights.content;
  } else if (contentLength >= config.partialContentLength) {
    score += weights.partialContent;
  }

  if (input.hasStructuredMetadata) score += weights.structuredMetadata;

  return clamp01(score);
}

/**
 * Content quality from length, attribution, dating, boilerplate share and
 * language confidence
 */
export function calculateQualityScore(input: ScoringInput, config: ScoringConfig = DEFAULT_SCORING_CONFIG): number {
  const weights = config.qualityWeights;
  const contentLength = input.mainContent?.trim().length ?? 0;

  // Log scale: doubling a short text matters more than doubling a long one
  const lengthFactor = contentLength > 0
    ? clamp01(Math.log1p(contentLength) / Math.log1p(config.idealContentLength))
    : 0;

  const boilerplate = clamp01(input.boilerplateRatio ?? config.unknownBoilerplateRatio);

  const score =
    lengthFactor * weights.length +
    (hasText(input.author) ? weights.author : 0) +
    (input.publishedAt || input.lastModifiedAt ? weights.date : 0) +
    (1 - boilerplate) * weights.boilerplate +
    clamp01(input.languageConfidence ?? 0) * weights.language;

  return clamp01(score);
}

/**
 * Exponential decay over the content's age. Future dates score 1, dates at
 * or beyond the horizon score 0, undated content gets `undatedFreshness`.
 */
export function calculateFreshnessScore(
  input: Pick<ScoringInput, 'publishedAt' | 'lastModifiedAt'>,
  now: Date,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): number {
  const date = input.publishedAt ?? input.lastModifiedAt;
  if (!date || Number.isNaN(date.getTime())) return clamp01(config.undatedFreshness);

  const ageDays = (now.getTime() - date.getTime()) / DAY_MS;
  if (ageDays <= 0) return 1;
  if (ageDays >= config.freshnessHorizonDays) return 0;

  return clamp01(Math.pow(0.5, ageDays / config.freshnessHalfLifeDays));
}

export function calculateScores(
  input: ScoringInput,
  now: Date,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): AnalysisScores {
  return {
    relevance: calculateRelevanceScore(input, config),
    quality: calculateQualityScore(input, config),
    freshness: calculateFreshnessScore(input, now, config),
  };
}

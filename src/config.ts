/**
 * Analysis configuration
 *
 * One zod schema describes every tunable with its default. Per-call options
 * are merged over the manager's base configuration and validated again.
 */

import { z } from 'zod';
import { ValidationError } from './errors';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export const AnalysisConfigSchema = z.object({
  /** Per-request deadline covering fetch and analysis */
  timeoutMs: z.number().int().positive().default(30000),
  /** Bodies longer than this are cut before parsing */
  maxContentBytes: z.number().int().min(1024).default(1_000_000),
  extractMainContent: z.boolean().default(true),
  extractLinks: z.boolean().default(false),
  extractImages: z.boolean().default(false),
  discoverFeeds: z.boolean().default(true),
  /** Add `/feed`, `/rss.xml` and friends to feed candidates */
  guessCommonFeedPaths: z.boolean().default(false),
  calculateScores: z.boolean().default(true),
  detectLanguage: z.boolean().default(true),
  maxConcurrent: z.number().int().min(1).max(50).default(5),
  freshnessHorizonDays: z.number().positive().default(365),
  freshnessHalfLifeDays: z.number().positive().default(30),
  feedActivityWindowDays: z.number().positive().default(90),
  summaryLength: z.number().int().positive().default(500),
  /** Density results shorter than this trigger the Readability fallback */
  minContentLength: z.number().int().min(0).default(100),
  /** Below this many characters the declared language is used instead of detection */
  languageMinLength: z.number().int().min(1).default(50),
  maxFeedEntries: z.number().int().positive().default(100),
  maxLinks: z.number().int().positive().default(50),
  maxImages: z.number().int().positive().default(20),
  maxApiRecords: z.number().int().positive().default(100),
  feedDiscoveryDepth: z.number().int().min(1).max(5).default(2),
  validateFeeds: z.boolean().default(true),
  maxPagesPerLevel: z.number().int().positive().default(10),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

/** Caller-facing options: every field optional */
export type AnalysisOptions = z.input<typeof AnalysisConfigSchema>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = AnalysisConfigSchema.parse({});

/**
 * Merge overrides over a base configuration and validate the result
 *
 * @throws ValidationError listing every offending option
 */
export function resolveConfig(base: AnalysisConfig, overrides?: AnalysisOptions): AnalysisConfig {
  // An explicit `undefined` keeps the base value
  const defined = Object.fromEntries(Object.entries(overrides ?? {}).filter(([, value]) => value !== undefined));
  const result = AnalysisConfigSchema.safeParse({ ...base, ...defined });
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid analysis options: ${issues}`);
  }
  return result.data;
}

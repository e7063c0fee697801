/**
 * Feed analyzer
 *
 * RSS 0.9x/1.0/2.0 and Atom go through rss-parser; JSON Feed is validated
 * with zod. Produces a parsed feed, a record view for the manager, and
 * validated descriptors for feed discovery.
 */

import * as cheerio from 'cheerio';
import Parser from 'rss-parser';
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from '../config';
import { ParseError, ValidationError, describeError, toError } from '../errors';
import { fetchResource } from '../fetch/http-fetcher';
import { clip, collapseWhitespace, summarize, truncateText } from '../formatters/text-cleaner';
import { detectFeedFormat } from '../resolver/content-type-resolver';
import type { FeedDescriptor, FeedType, FetchCapability } from '../types';
import { DAY_MS, latestDate, parseDate } from '../utils/dates';
import { isRecord, scalarText, tryParseJson } from '../utils/json';
import { detectLanguage, normalizeLanguageTag } from '../utils/language';
import { createLogger, type Logger } from '../utils/logger';
import { dedupeUrls, resolveUrl } from '../utils/url-utils';
import { JsonFeedItemSchema, JsonFeedSchema, jsonFeedAuthor } from './json-feed';
import { emptyFields, type AnalyzerInput, type AnalyzerOutput, type ContentAnalyzer } from './types';

// ============================================================================
// Types
// ============================================================================

export interface FeedEntry {
  id?: string;
  title?: string;
  link?: string;
  /** Plain text */
  summary?: string;
  /** Plain text of the full body, when the feed carries one */
  content?: string;
  author?: string;
  publishedAt?: Date;
  updatedAt?: Date;
}

export interface ParsedFeed {
  feedType: FeedType;
  title?: string;
  description?: string;
  link?: string;
  language?: string;
  author?: string;
  lastUpdated?: Date;
  /** At most `maxFeedEntries` */
  entries: FeedEntry[];
  /** Entries in the document before the cap */
  totalEntries: number;
}

// rss-parser copies these as raw xml2js values, which may be `{ _: text, $: attrs }`
interface RssFeedExtras {
  subtitle?: unknown;
  language?: unknown;
  lastBuildDate?: unknown;
}

interface RssItemExtras {
  id?: unknown;
  author?: unknown;
  updated?: unknown;
  'content:encoded'?: unknown;
}

// ============================================================================
// Constants
// ============================================================================

/** Entries compiled into a record's main content */
const CONTENT_ENTRY_COUNT = 10;
/** Characters of each entry's body kept in the main content */
const ENTRY_EXCERPT_LENGTH = 500;
/** Entry titles listed in the summary */
const SUMMARY_ENTRY_COUNT = 5;

/** Minimum dated entries before publishing cadence is considered */
const MIN_CADENCE_ENTRIES = 3;
/** Maximum coefficient of variation of entry intervals for a regular cadence */
const MAX_CADENCE_VARIATION = 0.5;
/** A regular feed is still active this many mean intervals after its last entry */
const CADENCE_GRACE_INTERVALS = 2;

// ============================================================================
// Activity
// ============================================================================

function entryDate(entry: FeedEntry): Date | undefined {
  return entry.updatedAt ?? entry.publishedAt;
}

/**
 * A feed is active when an entry falls inside the window, or when its
 * entries follow a regular cadence whose next entry is not overdue.
 */
export function isFeedActive(entries: FeedEntry[], now: Date, windowDays: number): boolean {
  const times = entries
    .map(entryDate)
    .filter((date): date is Date => date !== undefined)
    .map(date => date.getTime())
    .filter(time => time <= now.getTime() + DAY_MS)
    .sort((a, b) => b - a);

  if (times.length === 0) return false;

  const latest = times[0] ?? 0;
  if (now.getTime() - latest <= windowDays * DAY_MS) return true;

  if (times.length < MIN_CADENCE_ENTRIES) return false;

  const intervals: number[] = [];
  for (let i = 1; i < times.length; i++) {
    intervals.push((times[i - 1] ?? 0) - (times[i] ?? 0));
  }
  const mean = intervals.reduce((sum, interval) => sum + interval, 0) / intervals.length;
  if (mean <= 0) return false;

  const variance = intervals.reduce((sum, interval) => sum + (interval - mean) ** 2, 0) / intervals.length;
  const variation = Math.sqrt(variance) / mean;

  return variation <= MAX_CADENCE_VARIATION && now.getTime() - latest <= CADENCE_GRACE_INTERVALS * mean;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Text of an xml2js value: plain strings or `{ _: text }` nodes
 */
function xmlText(value: unknown): string | undefined {
  if (Array.isArray(value)) return xmlText(value[0]);
  if (isRecord(value)) return scalarText(value._);
  return scalarText(value);
}

function htmlToText(html: string | undefined): string | undefined {
  if (!html) return undefined;
  const text = collapseWhitespace(cheerio.load(html).root().text());
  return text || undefined;
}

function hasBody(entry: FeedEntry): boolean {
  return Boolean(entry.content || entry.summary);
}

// ============================================================================
// Analyzer
// ============================================================================

export class FeedAnalyzer implements ContentAnalyzer {
  readonly contentType = 'feed' as const;
  private readonly parser: Parser<RssFeedExtras, RssItemExtras>;
  private readonly fetch?: FetchCapability;
  private readonly logger: Logger;

  constructor(options: { fetch?: FetchCapability; logger?: Logger } = {}) {
    this.fetch = options.fetch;
    this.logger = options.logger ?? createLogger('FeedAnalyzer');
    this.parser = new Parser<RssFeedExtras, RssItemExtras>({
      customFields: {
        feed: ['subtitle', 'language', 'lastBuildDate'],
        item: ['updated'],
      },
    });
  }

  /**
   * Parse an RSS, Atom or JSON Feed document
   *
   * @throws ParseError when the payload is not a well-formed feed
   */
  async parse(body: string, url: string, maxEntries = DEFAULT_ANALYSIS_CONFIG.maxFeedEntries): Promise<ParsedFeed> {
    const document = body.replace(/^\uFEFF/, '').trim();
    // The JSON Feed schema decides for any JSON object
    if (document.startsWith('{')) return this.parseJsonFeed(document, url, maxEntries);

    const format = detectFeedFormat(document);
    if (format === null) {
      throw new ParseError('Payload is not an RSS, Atom or JSON feed', { format: 'feed', url });
    }

    let output: Awaited<ReturnType<Parser<RssFeedExtras, RssItemExtras>['parseString']>>;
    try {
      output = await this.parser.parseString(document);
    } catch (error) {
      throw new ParseError(`Malformed ${format} feed: ${describeError(error)}`, {
        format: 'feed',
        url,
        cause: toError(error),
      });
    }

    const items = output.items ?? [];
    const entries: FeedEntry[] = items.slice(0, maxEntries).map(item => ({
      id: xmlText(item.guid) ?? xmlText(item.id),
      title: clip(xmlText(item.title), 500),
      link: item.link ? resolveUrl(item.link, url) ?? undefined : undefined,
      summary: htmlToText(xmlText(item.summary)) ?? item.contentSnippet?.trim() ?? undefined,
      content: htmlToText(xmlText(item['content:encoded']) ?? xmlText(item.content)),
      author: clip(xmlText(item.creator) ?? xmlText(item.author), 100),
      publishedAt: parseDate(item.isoDate) ?? parseDate(xmlText(item.pubDate)),
      updatedAt: parseDate(xmlText(item.updated)),
    }));

    return {
      feedType: format,
      title: clip(xmlText(output.title), 200),
      description: clip(xmlText(output.description) ?? xmlText(output.subtitle), 500),
      link: output.link,
      language: xmlText(output.language),
      lastUpdated: parseDate(xmlText(output.lastBuildDate)) ?? latestDate(entries.map(entryDate)),
      entries,
      totalEntries: items.length,
    };
  }

  private parseJsonFeed(document: string, url: string, maxEntries: number): ParsedFeed {
    const parsed = tryParseJson(document);
    if (!parsed.ok) {
      throw new ParseError(`Malformed JSON feed: ${parsed.error.message}`, { format: 'feed', url, cause: parsed.error });
    }

    const result = JsonFeedSchema.safeParse(parsed.value);
    if (!result.success) {
      throw new ParseError(`Invalid JSON feed: ${result.error.issues[0]?.message ?? 'schema mismatch'}`, {
        format: 'feed',
        url,
      });
    }
    const feed = result.data;

    const entries: FeedEntry[] = [];
    for (const raw of feed.items.slice(0, maxEntries)) {
      const item = JsonFeedItemSchema.safeParse(raw);
      if (!item.success) {
        this.logger.debug(`Skipping malformed JSON feed item in ${url}`);
        continue;
      }
      const entry = item.data;
      const link = entry.url ?? entry.external_url;
      entries.push({
        id: entry.id,
        title: clip(entry.title, 500),
        link: link ? resolveUrl(link, url) ?? undefined : undefined,
        summary: clip(entry.summary, 2000),
        content: htmlToText(entry.content_html) ?? clip(entry.content_text, 100000),
        author: clip(jsonFeedAuthor(entry), 100),
        publishedAt: parseDate(entry.date_published),
        updatedAt: parseDate(entry.date_modified),
      });
    }

    return {
      feedType: 'json',
      title: clip(feed.title, 200),
      description: clip(feed.description, 500),
      link: feed.home_page_url,
      language: feed.language,
      author: clip(jsonFeedAuthor(feed), 100),
      lastUpdated: latestDate(entries.map(entryDate)),
      entries,
      totalEntries: feed.items.length,
    };
  }

  // ==========================================================================
  // Record view
  // ==========================================================================

  async analyze(input: AnalyzerInput): Promise<AnalyzerOutput> {
    const { url, body, config, draft } = input;
    const feed = await this.parse(body, url, config.maxFeedEntries);

    draft.title = feed.title;
    draft.description = feed.description;
    draft.author = feed.author;
    draft.lastModifiedAt = feed.lastUpdated;
    draft.publishedAt = latestDate(feed.entries.map(entry => entry.publishedAt ?? entry.updatedAt));

    if (config.extractLinks) {
      const links = feed.entries.map(entry => entry.link).filter((link): link is string => Boolean(link));
      draft.externalLinks = dedupeUrls(links, config.maxLinks);
    }

    const recent = feed.entries.slice(0, CONTENT_ENTRY_COUNT);
    let mainContent = recent
      .map(entry => {
        const body = entry.content ?? entry.summary;
        return [entry.title, body ? truncateText(body, ENTRY_EXCERPT_LENGTH) : undefined]
          .filter((part): part is string => Boolean(part))
          .join('\n');
      })
      .filter(Boolean)
      .join('\n\n');

    if (!mainContent) {
      mainContent = [feed.title, feed.description].filter((part): part is string => Boolean(part)).join('\n\n');
    }
    if (!mainContent) {
      throw new ParseError('Feed has no entries or descriptive text', { format: 'feed', url });
    }
    draft.mainContent = mainContent;

    const titles = recent.map(entry => entry.title).filter((title): title is string => Boolean(title));
    draft.summary = titles.length > 0
      ? truncateText(`Recent entries: ${titles.slice(0, SUMMARY_ENTRY_COUNT).join('; ')}`, config.summaryLength)
      : summarize(mainContent, config.summaryLength);

    const language = detectLanguage(collapseWhitespace(mainContent), feed.language, {
      enabled: config.detectLanguage,
      minLength: config.languageMinLength,
    });
    draft.language = language.language;

    const withBody = feed.entries.filter(hasBody).length;

    return {
      fields: { ...emptyFields(), ...draft },
      signals: {
        hasStructuredMetadata: feed.entries.some(entry => entryDate(entry) !== undefined),
        boilerplateRatio: feed.entries.length > 0 ? 1 - withBody / feed.entries.length : 1,
        languageConfidence: language.confidence,
      },
    };
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /**
   * Fetch a feed candidate and describe it
   *
   * @throws TransportError when the fetch fails or is refused
   * @throws ValidationError when the response is not a feed
   */
  async validate(
    feedUrl: string,
    config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
    now: Date = new Date()
  ): Promise<FeedDescriptor> {
    if (!this.fetch) {
      throw new ValidationError('Feed validation needs a fetch capability', { url: feedUrl });
    }

    const response = await fetchResource(this.fetch, feedUrl, { timeoutMs: config.timeoutMs });

    let feed: ParsedFeed;
    try {
      feed = await this.parse(response.body, feedUrl, config.maxFeedEntries);
    } catch (error) {
      throw new ValidationError(`Not a feed: ${describeError(error)}`, { url: feedUrl, cause: toError(error) });
    }

    this.logger.debug(`Validated ${feed.feedType} feed ${feedUrl} (${feed.entries.length} entries)`);
    return this.describe(feedUrl, feed, config, now);
  }

  describe(feedUrl: string, feed: ParsedFeed, config: AnalysisConfig, now: Date): FeedDescriptor {
    return {
      url: feedUrl,
      title: feed.title,
      description: feed.description,
      feedType: feed.feedType,
      lastUpdated: feed.lastUpdated,
      entryCount: feed.entries.length,
      isActive: isFeedActive(feed.entries, now, config.feedActivityWindowDays),
      language: normalizeLanguageTag(feed.language),
      validated: true,
    };
  }
}

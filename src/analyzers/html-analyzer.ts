/**
 * HTML analyzer
 *
 * Extracts metadata, main content, links, images and feed candidates from
 * an HTML document. Parsing is tolerant (cheerio / htmlparser2); a document
 * with no extractable text is a ParseError.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { ParseError } from '../errors';
import { clip, collapseWhitespace, normalizeParagraphs, summarize } from '../formatters/text-cleaner';
import { contentTypeFromUrl } from '../resolver/content-type-resolver';
import type { FeedType } from '../types';
import { checkAborted } from '../utils/deadline';
import { findDateInText, parseDate } from '../utils/dates';
import { isRecord, scalarText, tryParseJson } from '../utils/json';
import { detectLanguage } from '../utils/language';
import { createLogger, type Logger } from '../utils/logger';
import { dedupeUrls, isSameOrigin, parseHttpUrl, resolveUrl, urlKey } from '../utils/url-utils';
import { extractMainContent } from './main-content';
import { emptyFields, type AnalyzerInput, type AnalyzerOutput, type ContentAnalyzer } from './types';

// ============================================================================
// Types
// ============================================================================

export interface HtmlMetadata {
  title?: string;
  description?: string;
  author?: string;
  canonicalUrl?: string;
  publishedAt?: Date;
  lastModifiedAt?: Date;
  /** `<html lang>`, content-language meta or header */
  declaredLanguage?: string;
  /** JSON-LD, OpenGraph or microdata present */
  hasStructuredMetadata: boolean;
}

export type FeedCandidateSource = 'link-tag' | 'anchor' | 'common-path';

export interface FeedCandidate {
  url: string;
  title?: string;
  feedType?: FeedType;
  source: FeedCandidateSource;
}

export interface PageLinks {
  /** Same-origin links, absolute, deduped */
  internal: string[];
  external: string[];
}

export interface FeedLinkOptions {
  /** Add well-known feed paths of the page's origin */
  guessCommonPaths?: boolean;
}

interface JsonLdSummary {
  title?: string;
  description?: string;
  author?: string;
  datePublished?: string;
  dateModified?: string;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_TITLE_LENGTH = 200;
const MAX_DESCRIPTION_LENGTH = 500;
const MAX_AUTHOR_LENGTH = 100;

const PUBLISHED_META_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[property="og:published_time"]',
  'meta[name="datePublished"]',
  'meta[itemprop="datePublished"]',
  'meta[name="publishdate"]',
  'meta[name="pubdate"]',
  'meta[name="date"]',
  'meta[name="dc.date"]',
  'meta[name="DC.date"]',
];

const MODIFIED_META_SELECTORS = [
  'meta[property="article:modified_time"]',
  'meta[property="og:updated_time"]',
  'meta[name="dateModified"]',
  'meta[itemprop="dateModified"]',
  'meta[name="last-modified"]',
];

const AUTHOR_META_SELECTORS = [
  'meta[name="author"]',
  'meta[property="article:author"]',
  'meta[name="twitter:creator"]',
];

const AUTHOR_ELEMENT_SELECTORS = ['[rel="author"]', '[itemprop="author"]', '.author', '.byline'];

/** Feed MIME types accepted on `<link rel="alternate">` */
const FEED_MIME_TYPES: Record<string, FeedType> = {
  'application/rss+xml': 'rss',
  'application/rdf+xml': 'rss',
  'application/atom+xml': 'atom',
  'application/feed+json': 'json',
};

/** Generic types that only count with a feed-looking href */
const AMBIGUOUS_FEED_TYPES: Record<string, FeedType> = {
  'application/json': 'json',
  'application/xml': 'rss',
  'text/xml': 'rss',
};

export const COMMON_FEED_PATHS = ['/feed', '/rss', '/rss.xml', '/atom.xml', '/feed.xml', '/index.xml'];

// ============================================================================
// Analyzer
// ============================================================================

export class HtmlAnalyzer implements ContentAnalyzer {
  readonly contentType = 'html' as const;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger('HtmlAnalyzer');
  }

  async analyze(input: AnalyzerInput): Promise<AnalyzerOutput> {
    const { url, body, headers, config, draft, signal } = input;
    const $ = cheerio.load(body);

    const metadata = this.extractMetadata($, url, headers);
    draft.title = metadata.title;
    draft.description = metadata.description;
    draft.author = metadata.author;
    draft.canonicalUrl = metadata.canonicalUrl;
    draft.publishedAt = metadata.publishedAt;
    draft.lastModifiedAt = metadata.lastModifiedAt;

    if (config.extractLinks) {
      draft.externalLinks = this.extractLinks($, url).external.slice(0, config.maxLinks);
    }
    if (config.extractImages) {
      draft.images = this.extractImages($, url).slice(0, config.maxImages);
    }
    if (config.discoverFeeds) {
      draft.discoveredFeeds = this.discoverFeedLinks($, url, {
        guessCommonPaths: config.guessCommonFeedPaths,
      }).map(candidate => candidate.url);
    }

    checkAborted(signal);

    const content = config.extractMainContent
      ? extractMainContent($, body, url, { minContentLength: config.minContentLength, logger: this.logger })
      : { text: normalizeParagraphs($('body').text()), boilerplateRatio: 0 };

    if (!content.text) {
      throw new ParseError('No extractable content in HTML document', { format: 'html', url });
    }

    draft.mainContent = content.text;
    draft.summary = summarize(content.text, config.summaryLength);

    const language = detectLanguage(collapseWhitespace(content.text), metadata.declaredLanguage, {
      enabled: config.detectLanguage,
      minLength: config.languageMinLength,
    });
    draft.language = language.language;

    this.logger.debug(`Analyzed ${url}: ${content.text.length} chars of main content`);

    return {
      fields: { ...emptyFields(), ...draft },
      signals: {
        hasStructuredMetadata: metadata.hasStructuredMetadata,
        boilerplateRatio: content.boilerplateRatio,
        languageConfidence: language.confidence,
      },
    };
  }

  // ==========================================================================
  // Metadata
  // ==========================================================================

  /**
   * Title, description, author, canonical link, dates and declared language
   */
  extractMetadata(document: CheerioAPI | string, url: string, headers: Record<string, string> = {}): HtmlMetadata {
    const $ = typeof document === 'string' ? cheerio.load(document) : document;
    const jsonLd = this.readJsonLd($, url);

    const title = clip(
      collapseWhitespace($('title').first().text()) ||
        metaContent($, ['meta[property="og:title"]', 'meta[name="twitter:title"]']) ||
        collapseWhitespace($('h1').first().text()) ||
        jsonLd.title,
      MAX_TITLE_LENGTH
    );

    const description = clip(
      metaContent($, [
        'meta[name="description"]',
        'meta[property="og:description"]',
        'meta[name="twitter:description"]',
      ]) || jsonLd.description,
      MAX_DESCRIPTION_LENGTH
    );

    const author = clip(
      metaContent($, AUTHOR_META_SELECTORS) || this.authorFromElements($) || jsonLd.author,
      MAX_AUTHOR_LENGTH
    );

    const canonicalHref = $('link[rel="canonical"]').attr('href');
    const canonicalUrl = canonicalHref ? resolveUrl(canonicalHref, url) ?? undefined : undefined;

    const lastModifiedAt =
      parseDate(metaContent($, MODIFIED_META_SELECTORS)) ??
      parseDate(jsonLd.dateModified) ??
      parseDate(headers['last-modified']);

    const declaredLanguage =
      $('html').attr('lang') ||
      metaContent($, ['meta[http-equiv="content-language"]', 'meta[http-equiv="Content-Language"]', 'meta[name="language"]']) ||
      headers['content-language'] ||
      undefined;

    const hasStructuredMetadata =
      $('script[type="application/ld+json"]').length > 0 ||
      $('meta[property^="og:"]').length > 0 ||
      $('[itemscope]').length > 0;

    return {
      title,
      description,
      author,
      canonicalUrl,
      publishedAt: this.extractPublishedDate($, jsonLd),
      lastModifiedAt,
      declaredLanguage,
      hasStructuredMetadata,
    };
  }

  /**
   * Structured metadata > `<time>` markup > dates in the body text
   */
  private extractPublishedDate($: CheerioAPI, jsonLd: JsonLdSummary): Date | undefined {
    const structured = parseDate(metaContent($, PUBLISHED_META_SELECTORS)) ?? parseDate(jsonLd.datePublished);
    if (structured) return structured;

    const time = $('time').first();
    const fromTime = parseDate(time.attr('datetime')) ?? parseDate(time.text());
    if (fromTime) return fromTime;

    return findDateInText(collapseWhitespace($('body').text()));
  }

  private authorFromElements($: CheerioAPI): string | undefined {
    for (const selector of AUTHOR_ELEMENT_SELECTORS) {
      const element = $(selector).first();
      const text = element.attr('content') || element.text();
      const cleaned = collapseWhitespace(text).replace(/^by\s+/i, '');
      if (cleaned) return cleaned;
    }
    return undefined;
  }

  private readJsonLd($: CheerioAPI, url: string): JsonLdSummary {
    const summary: JsonLdSummary = {};
    const nodes: Record<string, unknown>[] = [];

    $('script[type="application/ld+json"]').each((_, element) => {
      const parsed = tryParseJson($(element).text());
      if (!parsed.ok) {
        this.logger.debug(`Skipping malformed JSON-LD on ${url}`, parsed.error.message);
        return;
      }
      collectJsonLdNodes(parsed.value, nodes);
    });

    for (const node of nodes) {
      summary.title ??= scalarText(node.headline) ?? scalarText(node.name);
      summary.description ??= scalarText(node.description);
      summary.author ??= jsonLdAuthor(node.author);
      summary.datePublished ??= scalarText(node.datePublished);
      summary.dateModified ??= scalarText(node.dateModified);
    }

    return summary;
  }

  // ==========================================================================
  // Links, images, feeds
  // ==========================================================================

  /**
   * Absolute http(s) links split by origin
   */
  extractLinks(document: CheerioAPI | string, baseUrl: string): PageLinks {
    const $ = typeof document === 'string' ? cheerio.load(document) : document;
    const internal: string[] = [];
    const external: string[] = [];

    $('a[href]').each((_, element) => {
      const resolved = resolveUrl($(element).attr('href') ?? '', baseUrl);
      if (!resolved) return;
      (isSameOrigin(resolved, baseUrl) ? internal : external).push(resolved);
    });

    return { internal: dedupeUrls(internal), external: dedupeUrls(external) };
  }

  extractImages(document: CheerioAPI | string, baseUrl: string): string[] {
    const $ = typeof document === 'string' ? cheerio.load(document) : document;
    const images: string[] = [];

    $('img').each((_, element) => {
      const image = $(element);
      const src = image.attr('src') || image.attr('data-src');
      const resolved = src ? resolveUrl(src, baseUrl) : null;
      if (resolved) images.push(resolved);
    });

    return dedupeUrls(images);
  }

  /**
   * Feed candidates advertised by a page. Candidates are not fetched here.
   */
  discoverFeedLinks(document: CheerioAPI | string, baseUrl: string, options: FeedLinkOptions = {}): FeedCandidate[] {
    const $ = typeof document === 'string' ? cheerio.load(document) : document;
    const candidates = new Map<string, FeedCandidate>();

    const add = (candidate: FeedCandidate) => {
      const key = urlKey(candidate.url);
      if (!candidates.has(key)) candidates.set(key, candidate);
    };

    $('link[rel][href]').each((_, element) => {
      const link = $(element);
      const rels = (link.attr('rel') ?? '').toLowerCase().split(/\s+/);
      if (!rels.includes('alternate')) return;

      const mimeType = (link.attr('type') ?? '').toLowerCase().split(';')[0]?.trim() ?? '';
      const resolved = resolveUrl(link.attr('href') ?? '', baseUrl);
      if (!resolved) return;

      const feedType = FEED_MIME_TYPES[mimeType] ??
        (contentTypeFromUrl(resolved) === 'feed' ? AMBIGUOUS_FEED_TYPES[mimeType] : undefined);
      if (!feedType) return;

      add({ url: resolved, title: clip(link.attr('title'), MAX_TITLE_LENGTH), feedType, source: 'link-tag' });
    });

    $('a[href]').each((_, element) => {
      const anchor = $(element);
      const resolved = resolveUrl(anchor.attr('href') ?? '', baseUrl);
      if (!resolved || contentTypeFromUrl(resolved) !== 'feed') return;
      add({ url: resolved, title: clip(anchor.text(), MAX_TITLE_LENGTH), source: 'anchor' });
    });

    const origin = parseHttpUrl(baseUrl)?.origin;
    if (options.guessCommonPaths && origin) {
      for (const path of COMMON_FEED_PATHS) {
        add({ url: `${origin}${path}`, source: 'common-path' });
      }
    }

    return Array.from(candidates.values());
  }
}

// ============================================================================
// Helpers
// ============================================================================

function metaContent($: CheerioAPI, selectors: string[]): string | undefined {
  for (const selector of selectors) {
    const content = $(selector).first().attr('content')?.trim();
    if (content) return content;
  }
  return undefined;
}

function collectJsonLdNodes(value: unknown, nodes: Record<string, unknown>[]): void {
  if (Array.isArray(value)) {
    for (const item of value) collectJsonLdNodes(item, nodes);
    return;
  }
  if (!isRecord(value)) return;
  nodes.push(value);
  if (Array.isArray(value['@graph'])) collectJsonLdNodes(value['@graph'], nodes);
}

function jsonLdAuthor(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    const names = value.map(jsonLdAuthor).filter((name): name is string => Boolean(name));
    return names.length > 0 ? names.join(', ') : undefined;
  }
  if (isRecord(value)) return scalarText(value.name);
  return scalarText(value);
}

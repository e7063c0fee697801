/**
 * Main content extraction
 *
 * Strategy chain:
 * 1. Text density over block candidates (cheerio), after stripping page chrome
 * 2. Mozilla Readability over jsdom when the density winner is too short
 * 3. Whole body text
 */

import type { CheerioAPI, Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { JSDOM, VirtualConsole } from 'jsdom';
import { Readability } from '@mozilla/readability';
import { collapseWhitespace, normalizeParagraphs } from '../formatters/text-cleaner';
import type { Logger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type ExtractionMethod = 'density' | 'readability' | 'body';

export interface MainContentResult {
  text: string;
  /** Share of the page's visible text left outside `text` */
  boilerplateRatio: number;
  method: ExtractionMethod;
}

export interface MainContentOptions {
  /** Density results shorter than this fall back to Readability */
  minContentLength: number;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

/** Never content */
const NON_CONTENT_SELECTORS = 'script, style, noscript, template, svg, canvas, iframe, object, embed, button, select, input, textarea';

/** Page chrome removed before scoring */
const CHROME_SELECTORS = [
  'nav',
  'footer',
  'aside',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  '[role="complementary"]',
  '[aria-hidden="true"]',
].join(', ');

const CANDIDATE_SELECTOR = 'article, main, [role="main"], section, div, td, blockquote';
const SEMANTIC_CONTAINER = 'article, main, [role="main"]';
const BLOCK_SELECTOR = 'p, div, section, article, main, header, li, h1, h2, h3, h4, h5, h6, pre, blockquote, tr, dd, dt, figcaption, table, ul, ol';

const NEGATIVE_PATTERN = /comment|sidebar|footer|footnote|\bnav|menu|share|social|advert|\bads?\b|promo|sponsor|cookie|newsletter|related|breadcrumb|popup|modal|banner|widget|subscribe/i;
const POSITIVE_PATTERN = /article|content|entry|post|story|body|text|main|blog/i;

const MIN_CANDIDATE_TEXT = 25;
const MIN_PARAGRAPH_TEXT = 40;
/** Weight of text in direct child paragraphs (paragraph clusters) */
const PARAGRAPH_WEIGHT = 0.5;
const SEMANTIC_BONUS = 1.5;
const POSITIVE_BONUS = 1.25;
const NEGATIVE_PENALTY = 0.2;
/** Negative-class descendants smaller than this share of the winner are dropped */
const NEGATIVE_PRUNE_SHARE = 0.5;

// ============================================================================
// Helpers
// ============================================================================

function signatureOf(node: Cheerio<Element>): string {
  return `${node.attr('class') ?? ''} ${node.attr('id') ?? ''}`;
}

function textLengthOf(node: Cheerio<Element>): number {
  return collapseWhitespace(node.text()).length;
}

/**
 * Remove script-like and chrome regions in place
 */
export function removeNonContentElements($: CheerioAPI): void {
  $(NON_CONTENT_SELECTORS).remove();
  $(CHROME_SELECTORS).remove();

  // Page-level headers; article headers (title, byline) stay
  $('header').each((_, element) => {
    const header = $(element);
    if (header.closest(SEMANTIC_CONTAINER).length === 0) header.remove();
  });
}

function scoreCandidate($: CheerioAPI, element: Element): number {
  const node = $(element);
  const textLength = textLengthOf(node);
  if (textLength < MIN_CANDIDATE_TEXT) return 0;

  const tagCount = node.find('*').length;
  const linkTextLength = collapseWhitespace(node.find('a').text()).length;
  const linkDensity = Math.min(1, linkTextLength / textLength);

  let paragraphText = 0;
  node.children('p').each((_, paragraph) => {
    const length = textLengthOf($(paragraph));
    if (length >= MIN_PARAGRAPH_TEXT) paragraphText += length;
  });

  let score = (textLength / (tagCount + 1)) * (1 - linkDensity) + paragraphText * PARAGRAPH_WEIGHT;

  if (node.is(SEMANTIC_CONTAINER)) score *= SEMANTIC_BONUS;
  const signature = signatureOf(node);
  if (NEGATIVE_PATTERN.test(signature)) {
    score *= NEGATIVE_PENALTY;
  } else if (POSITIVE_PATTERN.test(signature)) {
    score *= POSITIVE_BONUS;
  }

  return score;
}

/**
 * Text of an element with block boundaries kept as paragraph breaks
 */
export function blockText($: CheerioAPI, element: Element): string {
  const clone = $(element).clone();

  const total = textLengthOf(clone);
  clone.find('*').each((_, descendant) => {
    const node = $(descendant);
    if (NEGATIVE_PATTERN.test(signatureOf(node)) && textLengthOf(node) < total * NEGATIVE_PRUNE_SHARE) {
      node.remove();
    }
  });

  clone.find('br').replaceWith('\n');
  clone.find(BLOCK_SELECTOR).each((_, block) => {
    $(block).before('\n').after('\n');
  });

  return normalizeParagraphs(clone.text());
}

/**
 * Highest-scoring block by text density, or null when nothing qualifies
 */
export function findDensestBlock($: CheerioAPI): Element | null {
  let best: Element | null = null;
  let bestScore = 0;

  for (const element of $(CANDIDATE_SELECTOR).toArray()) {
    const score = scoreCandidate($, element);
    if (score > bestScore) {
      best = element;
      bestScore = score;
    }
  }

  return best;
}

/**
 * Readability over a jsdom document. Returns null when Readability finds
 * no article.
 */
export function extractWithReadability(html: string, url: string): string | null {
  // Keep jsdom's CSS and script noise off the console
  const virtualConsole = new VirtualConsole();
  const dom = new JSDOM(html, { url, virtualConsole });
  try {
    const article = new Readability(dom.window.document).parse();
    const text = article?.textContent ? normalizeParagraphs(article.textContent) : '';
    return text || null;
  } finally {
    dom.window.close();
  }
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract the main content of a parsed page. Mutates `$`: run metadata and
 * link extraction first.
 */
export function extractMainContent(
  $: CheerioAPI,
  html: string,
  url: string,
  options: MainContentOptions
): MainContentResult {
  $(NON_CONTENT_SELECTORS).remove();
  const bodyElement = $('body').get(0);
  const pageScope: Cheerio<AnyNode> = bodyElement ? $(bodyElement) : $.root();
  const pageText = collapseWhitespace(pageScope.text());

  removeNonContentElements($);

  const densest = findDensestBlock($);
  let text = densest ? blockText($, densest) : '';
  let method: ExtractionMethod = 'density';

  if (text.length < options.minContentLength) {
    let readable: string | null = null;
    try {
      readable = extractWithReadability(html, url);
    } catch (error) {
      options.logger?.debug(`Readability failed for ${url}`, error);
    }
    if (readable && readable.length > text.length) {
      text = readable;
      method = 'readability';
    }
  }

  if (!text) {
    text = bodyElement ? blockText($, bodyElement) : normalizeParagraphs($.root().text());
    method = 'body';
  }

  const mainLength = collapseWhitespace(text).length;
  const boilerplateRatio = pageText.length > 0 ? Math.max(0, 1 - mainLength / pageText.length) : 0;

  return { text, boilerplateRatio: Math.min(1, boilerplateRatio), method };
}

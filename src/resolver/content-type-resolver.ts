/**
 * Content type resolution
 *
 * Precedence: explicit hint > URL pattern > payload sniff > URL default.
 * Pure; never throws. Anything ambiguous resolves to `unknown`.
 */

import type { ContentType, FeedType } from '../types';
import { isRecord, tryParseJson } from '../utils/json';
import { parseHttpUrl } from '../utils/url-utils';

const HINT_ALIASES: Record<string, ContentType> = {
  html: 'html',
  page: 'html',
  feed: 'feed',
  rss: 'feed',
  atom: 'feed',
  api: 'api',
  json: 'api',
  xml: 'api',
  unknown: 'unknown',
};

// Path segments or extensions that mark a feed endpoint
const FEED_PATH_PATTERN = /(?:^|\/)(?:feeds?|rss|atom)(?:\/|\.xml|\.rss|\.atom|\.json|$)|\.(?:rss|atom)$/;
const FEED_QUERY_PATTERN = /(?:^|[?&])(?:format|type|output)=(?:rss2?|atom|feed)(?:&|$)/;
const API_PATH_PATTERN = /(?:^|\/)api(?:\/|$)|\.json$/;
const API_QUERY_PATTERN = /(?:^|[?&])(?:format|output)=json(?:&|$)/;

const JSON_FEED_VERSION = /"version"\s*:\s*"https?:\/\/jsonfeed\.org\/version\//;
const JSON_FEED_VERSION_URL = /^https?:\/\/jsonfeed\.org\/version\//;
const RSS_ROOT = /^<(?:rss|rdf:rdf)[\s>]/;
const ATOM_ROOT = /^<feed[\s>]/;
const SNIFF_WINDOW = 4096;

/**
 * Map a caller hint onto a content type; null when the hint is absent,
 * `auto`, or not recognised
 */
export function contentTypeFromHint(hint: string | undefined): ContentType | null {
  if (!hint) return null;
  return HINT_ALIASES[hint.trim().toLowerCase()] ?? null;
}

/**
 * Classify by URL shape alone; null when the URL carries no marker
 */
export function contentTypeFromUrl(url: string): ContentType | null {
  const parsed = parseHttpUrl(url);
  if (!parsed) return null;

  const path = parsed.pathname.toLowerCase().replace(/\/+$/, '');
  const query = parsed.search.toLowerCase();

  if (FEED_PATH_PATTERN.test(path) || FEED_QUERY_PATTERN.test(query)) return 'feed';
  if (parsed.hostname.toLowerCase().startsWith('api.')) return 'api';
  if (API_PATH_PATTERN.test(path) || API_QUERY_PATTERN.test(query)) return 'api';
  return null;
}

/**
 * Strip the XML prolog, comments, processing instructions and doctype so
 * the root element is first
 */
function leadingElement(payload: string): string {
  return payload
    .replace(/^(?:\s*(?:<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!doctype[^>]*>))*\s*/i, '')
    .toLowerCase();
}

/**
 * Feed format of a payload judged by its root element (or JSON Feed
 * version), or null when it does not look like a feed
 */
export function detectFeedFormat(payload: string): FeedType | null {
  const document = payload.replace(/^\uFEFF/, '').trimStart();
  const head = document.slice(0, SNIFF_WINDOW);
  if (head.startsWith('{')) return JSON_FEED_VERSION.test(head) || isJsonFeed(document) ? 'json' : null;
  if (!head.startsWith('<')) return null;

  const root = leadingElement(head);
  if (RSS_ROOT.test(root)) return 'rss';
  if (ATOM_ROOT.test(root)) return 'atom';
  return null;
}

/**
 * Object keys have no fixed order, so `version` may sit after a long
 * `items` array and outside the sniff window
 */
function isJsonFeed(document: string): boolean {
  const parsed = tryParseJson(document);
  if (!parsed.ok || !isRecord(parsed.value)) return false;
  const { version } = parsed.value;
  return typeof version === 'string' && JSON_FEED_VERSION_URL.test(version);
}

/**
 * Classify a payload by its first bytes
 */
export function sniffContentType(payload: string): ContentType {
  const head = payload.replace(/^\uFEFF/, '').trimStart().slice(0, SNIFF_WINDOW);
  if (!head) return 'unknown';
  if (detectFeedFormat(payload)) return 'feed';

  if (head.startsWith('{') || head.startsWith('[')) return 'api';

  if (head.startsWith('<')) {
    if (leadingElement(head).startsWith('<html')) return 'html';
    if (/^<\?xml/i.test(head)) return 'api';
  }

  return 'html';
}

/**
 * Resolve the content type of a fetched resource
 *
 * @param url - Requested URL
 * @param hint - Caller hint (`html`, `feed`, `rss`, `atom`, `api`, `json`, `xml`, `unknown`; `auto` is ignored)
 * @param sniffed - Payload prefix, when a body is available
 */
export function resolveContentType(url: string, hint?: string, sniffed?: string): ContentType {
  const fromHint = contentTypeFromHint(hint);
  if (fromHint) return fromHint;

  const fromUrl = contentTypeFromUrl(url);
  if (fromUrl) return fromUrl;

  if (sniffed !== undefined) return sniffContentType(sniffed);

  return parseHttpUrl(url) ? 'html' : 'unknown';
}

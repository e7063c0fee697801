/**
 * API payload analyzer
 *
 * Detects the shape of a JSON or XML payload (bare arrays, envelopes,
 * paginated envelopes, error envelopes), recognises a few published
 * conventions (JSON:API, JSON Feed, HAL, OData, Reddit listings) and maps
 * items onto normalized records with case-insensitive field matching.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { AnalyzerError, ParseError, describeError } from '../errors';
import { summarize, truncateText } from '../formatters/text-cleaner';
import type { ApiAnalysisRecord, ApiStructure, ApiStructureKind, KnownApiSchema, NormalizedRecord } from '../types';
import { latestDate, parseDate } from '../utils/dates';
import { isRecord, scalarText, tryParseJson } from '../utils/json';
import { detectLanguage } from '../utils/language';
import { createLogger, type Logger } from '../utils/logger';
import { dedupeUrls, resolveUrl } from '../utils/url-utils';
import { JSON_FEED_VERSION_PREFIX } from './json-feed';
import { emptyFields, type AnalyzerInput, type AnalyzerOutput, type ContentAnalyzer } from './types';

// ============================================================================
// Types
// ============================================================================

type DecodedPayload =
  | { format: 'json'; value: unknown }
  | { format: 'xml'; document: CheerioAPI }
  | { format: 'text'; text: string }
  | { format: 'empty' };

interface Inspection {
  structure: ApiStructure;
  /** Raw record sources, before normalization */
  items: unknown[];
  errorMessage?: string;
}

type MappedField = 'title' | 'content' | 'url' | 'date' | 'id';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_RECORDS = 100;

/** Keys that hold the record list of an envelope, in priority order */
const CONTAINER_KEYS = [
  'data', 'items', 'results', 'entries', 'posts', 'articles', 'records',
  'documents', 'objects', 'hits', 'children', 'content', 'list', 'rows',
];

/** Wrapper objects searched for a nested container */
const WRAPPER_KEYS = [...CONTAINER_KEYS, 'response', 'result', 'payload', 'body'];

const MAX_CONTAINER_DEPTH = 2;

/** Keys wrapping a single resource, e.g. `{ "data": { "id": 1 } }` */
const SINGLE_WRAPPER_KEYS = ['data', 'result', 'response', 'payload'];

/** Objects that carry pagination details next to a container */
const PAGINATION_HOLDERS = ['meta', 'pagination', 'paging', 'links', 'pageinfo'];

const PAGINATION_KEYS = new Set([
  'page', 'perpage', 'pagesize', 'pagenumber', 'totalpages', 'total', 'totalcount',
  'totalresults', 'totalitems', 'next', 'nextpage', 'nexturl', 'nextpagetoken',
  'nextcursor', 'cursor', 'after', 'before', 'offset', 'limit', 'hasmore', 'hasnext',
  'prev', 'previous',
]);

/** Keys an error-only response is made of */
const ERROR_ENVELOPE_KEYS = new Set(['message', 'status', 'statuscode', 'code', 'detail', 'title', 'type', 'success', 'ok', 'documentationurl']);

/** Normalized record fields and the source keys that feed them (normalized form) */
const FIELD_MAP: ReadonlyArray<[MappedField, readonly string[]]> = [
  ['title', ['title', 'name', 'headline', 'subject']],
  ['content', ['body', 'content', 'description', 'text', 'summary', 'message', 'excerpt', 'selftext', 'contenttext', 'contenthtml']],
  ['url', ['url', 'link', 'href', 'permalink', 'weburl', 'htmlurl', 'canonicalurl', 'externalurl']],
  ['date', [
    'date', 'publishedat', 'published', 'pubdate', 'datepublished', 'createdat', 'created',
    'createdutc', 'updatedat', 'updated', 'modified', 'datemodified', 'timestamp', 'time',
  ]],
  ['id', ['id', 'uuid', 'guid', 'key', 'identifier']],
];

/** Keys of a typed wrapper such as `{ type, id, attributes }` or `{ kind, data }` */
const TYPED_WRAPPER_KEYS = new Set(['type', 'kind', 'id', 'data', 'attributes', 'links', 'relationships', 'meta']);

const SCHEMA_ALIASES: Record<string, KnownApiSchema> = {
  'json-api': 'json-api',
  jsonapi: 'json-api',
  'json-feed': 'json-feed',
  jsonfeed: 'json-feed',
  'reddit-listing': 'reddit-listing',
  reddit: 'reddit-listing',
  hal: 'hal',
  odata: 'odata',
};

const SCHEMA_DETECTORS: Record<KnownApiSchema, (value: unknown) => boolean> = {
  'json-feed': value =>
    isRecord(value) &&
    typeof value.version === 'string' &&
    value.version.startsWith(JSON_FEED_VERSION_PREFIX) &&
    Array.isArray(value.items),
  'json-api': value => {
    if (!isRecord(value)) return false;
    const resources = Array.isArray(value.data) ? value.data : [value.data];
    return resources.length > 0 && resources.every(
      resource => isRecord(resource) && typeof resource.type === 'string' && isRecord(resource.attributes)
    );
  },
  'reddit-listing': value =>
    isRecord(value) && value.kind === 'Listing' && isRecord(value.data) && Array.isArray(value.data.children),
  hal: value => isRecord(value) && (isRecord(value._embedded) || isRecord(value._links)),
  odata: value =>
    isRecord(value) && Array.isArray(value.value) && Object.keys(value).some(key => key.startsWith('@odata')),
};

const SCHEMA_ORDER: KnownApiSchema[] = ['json-feed', 'json-api', 'reddit-listing', 'odata', 'hal'];

/** Records rendered into a record view's main content */
const CONTENT_RECORD_COUNT = 20;
const RECORD_EXCERPT_LENGTH = 500;

// ============================================================================
// Helpers
// ============================================================================

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[_\-\s]/g, '');
}

function findKey(source: Record<string, unknown>, normalized: string): string | undefined {
  return Object.keys(source).find(key => normalizeKey(key) === normalized);
}

function fieldText(value: unknown): string | undefined {
  // WordPress-style `{ rendered: "…" }`
  if (isRecord(value)) return scalarText(value.rendered);
  return scalarText(value);
}

function valueAtPath(value: unknown, path: string): unknown {
  let current = value;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Flatten `{ type, id, attributes }` / `{ kind, data }` wrappers into one object
 */
function unwrapTypedItem(item: Record<string, unknown>): Record<string, unknown> {
  const keys = Object.keys(item);
  if (!keys.every(key => TYPED_WRAPPER_KEYS.has(key))) return item;

  const inner = isRecord(item.attributes) ? item.attributes : isRecord(item.data) ? item.data : undefined;
  if (!inner) return item;

  const rest = Object.fromEntries(Object.entries(item).filter(([key]) => key !== 'attributes' && key !== 'data'));
  return { ...rest, ...inner };
}

export function normalizeRecord(item: Record<string, unknown>): NormalizedRecord {
  const source = unwrapTypedItem(item);
  const index = new Map<string, string>();
  for (const key of Object.keys(source)) {
    const normalized = normalizeKey(key);
    if (!index.has(normalized)) index.set(normalized, key);
  }

  const record: NormalizedRecord = { metadata: {} };
  const used = new Set<string>();

  for (const [field, candidates] of FIELD_MAP) {
    for (const candidate of candidates) {
      const key = index.get(candidate);
      if (key === undefined || used.has(key)) continue;
      const text = fieldText(source[key]);
      if (text === undefined) continue;
      record[field] = text;
      used.add(key);
      break;
    }
  }

  for (const [key, value] of Object.entries(source)) {
    if (!used.has(key) && value !== undefined) record.metadata[key] = value;
  }

  return record;
}

function recordFromItem(item: unknown): NormalizedRecord {
  if (isRecord(item)) return normalizeRecord(item);
  const text = scalarText(item);
  return text !== undefined ? { content: text, metadata: {} } : { metadata: { value: item } };
}

export function calculateDataQuality(records: NormalizedRecord[]): number {
  if (records.length === 0) return 0;
  const complete = records.filter(record => record.title && record.content).length;
  return complete / records.length;
}

// ============================================================================
// Analyzer
// ============================================================================

export class ApiAnalyzer implements ContentAnalyzer {
  readonly contentType = 'api' as const;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger('ApiAnalyzer');
  }

  // ==========================================================================
  // Public operations
  // ==========================================================================

  /**
   * Shape of a payload (raw string or parsed value)
   *
   * @throws ParseError for malformed JSON
   */
  detectStructure(payload: unknown, schemaHint?: string): ApiStructure {
    const decoded = this.decode(payload);
    return this.inspect(decoded, this.schemaOf(decoded, schemaHint)).structure;
  }

  /**
   * Normalized records of a payload. When a structure is given, its
   * container path is used instead of detecting one.
   *
   * @throws ParseError for malformed JSON
   */
  extractRecords(
    payload: unknown,
    structure?: ApiStructure,
    schemaHint?: string,
    maxRecords = DEFAULT_MAX_RECORDS
  ): NormalizedRecord[] {
    const decoded = this.decode(payload);
    if (decoded.format === 'json' && structure?.containerPath) {
      const container = valueAtPath(decoded.value, structure.containerPath);
      if (Array.isArray(container)) return container.slice(0, maxRecords).map(recordFromItem);
    }
    const inspection = this.inspect(decoded, this.schemaOf(decoded, schemaHint));
    return inspection.items.slice(0, maxRecords).map(recordFromItem);
  }

  /**
   * Known convention the payload follows. A hint is honoured only when it
   * names a known schema and the payload matches it.
   */
  detectSchema(payload: unknown, schemaHint?: string): KnownApiSchema | null {
    let decoded: DecodedPayload;
    try {
      decoded = this.decode(payload);
    } catch (error) {
      this.logger.debug(`Schema detection skipped: ${describeError(error)}`);
      return null;
    }
    return this.schemaOf(decoded, schemaHint);
  }

  /**
   * Full analysis of a payload. Never throws: failures are reported in
   * `errorMessage` with an `unparseable` structure.
   */
  analyzePayload(
    endpointUrl: string,
    rawPayload: unknown,
    schemaHint?: string,
    maxRecords = DEFAULT_MAX_RECORDS
  ): ApiAnalysisRecord {
    const startTime = Date.now();

    try {
      const decoded = this.decode(rawPayload);
      const schema = this.schemaOf(decoded, schemaHint);
      const inspection = this.inspect(decoded, schema);
      const records = inspection.items.slice(0, maxRecords).map(recordFromItem);

      this.logger.debug(`${endpointUrl}: ${inspection.structure.label}, ${records.length} records`);

      return {
        endpointUrl,
        detectedStructure: inspection.structure,
        extractedRecords: records,
        detectedSchema: schema,
        totalRecords: inspection.items.length,
        dataQuality: calculateDataQuality(records),
        processingTimeMs: Date.now() - startTime,
        errorMessage: inspection.errorMessage,
      };
    } catch (error) {
      this.logger.warn(`Could not analyze payload from ${endpointUrl}: ${describeError(error)}`);
      return {
        endpointUrl,
        detectedStructure: { kind: 'unparseable', recordCount: 0, paginationKeys: [], label: 'unparseable' },
        extractedRecords: [],
        detectedSchema: null,
        totalRecords: 0,
        dataQuality: 0,
        processingTimeMs: Date.now() - startTime,
        errorMessage: describeError(error),
      };
    }
  }

  // ==========================================================================
  // Record view
  // ==========================================================================

  async analyze(input: AnalyzerInput): Promise<AnalyzerOutput> {
    const { url, body, config, draft } = input;
    const result = this.analyzePayload(url, body, undefined, config.maxApiRecords);
    const { detectedStructure: structure, extractedRecords: records } = result;

    if (structure.kind === 'unparseable') {
      throw new ParseError(result.errorMessage ?? 'Unparseable API payload', { format: 'json', url });
    }
    if (structure.kind === 'error-envelope') {
      throw new AnalyzerError(result.errorMessage ?? 'API returned an error', { code: 'API_ERROR_RESPONSE', url });
    }
    if (records.length === 0) {
      throw new ParseError('API response contains no records', { format: 'json', url });
    }

    const defaultTitle = `API response (${result.totalRecords} ${result.totalRecords === 1 ? 'record' : 'records'})`;
    draft.title = structure.kind === 'single-object' ? records[0]?.title ?? defaultTitle : defaultTitle;
    draft.description = `Structured data: ${structure.label}${result.detectedSchema ? `, ${result.detectedSchema}` : ''}`;
    draft.publishedAt = latestDate(records.map(record => parseDate(record.date)));

    if (config.extractLinks) {
      const links = records
        .map(record => (record.url ? resolveUrl(record.url, url) : null))
        .filter((link): link is string => link !== null);
      draft.externalLinks = dedupeUrls(links, config.maxLinks);
    }

    const mainContent = records
      .slice(0, CONTENT_RECORD_COUNT)
      .map(record =>
        [record.title, record.content ? truncateText(record.content, RECORD_EXCERPT_LENGTH) : undefined, record.url]
          .filter((part): part is string => Boolean(part))
          .join('\n')
      )
      .filter(Boolean)
      .join('\n\n---\n\n');

    if (!mainContent) {
      throw new ParseError('API records carry no title, content or URL fields', { format: 'json', url });
    }
    draft.mainContent = mainContent;
    draft.summary = summarize(mainContent, config.summaryLength);

    const language = detectLanguage(
      records.map(record => record.content ?? record.title ?? '').join(' ').trim(),
      undefined,
      { enabled: config.detectLanguage, minLength: config.languageMinLength }
    );
    draft.language = language.language;

    return {
      fields: { ...emptyFields(), ...draft },
      signals: {
        hasStructuredMetadata: result.detectedSchema !== null,
        boilerplateRatio: 1 - result.dataQuality,
        languageConfidence: language.confidence,
      },
    };
  }

  // ==========================================================================
  // Decoding & inspection
  // ==========================================================================

  private decode(payload: unknown): DecodedPayload {
    if (payload === undefined || payload === null) return { format: 'empty' };
    if (typeof payload !== 'string') return { format: 'json', value: payload };

    const trimmed = payload.replace(/^\uFEFF/, '').trim();
    if (!trimmed) return { format: 'empty' };

    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      const parsed = tryParseJson(trimmed);
      if (!parsed.ok) {
        throw new ParseError(`Malformed JSON: ${parsed.error.message}`, { format: 'json', cause: parsed.error });
      }
      return { format: 'json', value: parsed.value };
    }

    if (trimmed.startsWith('<')) {
      return { format: 'xml', document: cheerio.load(trimmed, { xml: true }) };
    }

    return { format: 'text', text: trimmed };
  }

  private schemaOf(decoded: DecodedPayload, schemaHint?: string): KnownApiSchema | null {
    if (decoded.format !== 'json') return null;

    const hinted = schemaHint ? SCHEMA_ALIASES[schemaHint.trim().toLowerCase()] : undefined;
    if (hinted && SCHEMA_DETECTORS[hinted](decoded.value)) return hinted;

    return SCHEMA_ORDER.find(schema => SCHEMA_DETECTORS[schema](decoded.value)) ?? null;
  }

  private inspect(decoded: DecodedPayload, schema: KnownApiSchema | null): Inspection {
    switch (decoded.format) {
      case 'empty':
        return { structure: structureOf('empty', 0), items: [] };
      case 'text':
        return { structure: structureOf('text', 1), items: [decoded.text] };
      case 'xml':
        return this.inspectXml(decoded.document);
      case 'json':
        return this.inspectJson(decoded.value, schema);
    }
  }

  private inspectJson(value: unknown, schema: KnownApiSchema | null): Inspection {
    if (Array.isArray(value)) {
      if (value.length === 0) return { structure: structureOf('empty', 0), items: [] };
      const objects = value.filter(isRecord).length;
      const kind: ApiStructureKind = objects * 2 >= value.length ? 'array-of-objects' : 'array-of-values';
      return { structure: structureOf(kind, value.length), items: value };
    }

    if (!isRecord(value)) {
      return value === null
        ? { structure: structureOf('empty', 0), items: [] }
        : { structure: structureOf('text', 1), items: [value] };
    }

    const container = findContainer(value, schema);
    const errorMessage = errorEnvelopeMessage(value);

    if (errorMessage !== undefined && (!container || container.items.length === 0)) {
      return {
        structure: structureOf('error-envelope', 0),
        items: [],
        errorMessage: `API returned an error: ${errorMessage}`,
      };
    }

    if (!container) {
      const wrapperKey = SINGLE_WRAPPER_KEYS.map(name => findKey(value, name)).find(
        (key): key is string => key !== undefined && isRecord(value[key])
      );
      const item = wrapperKey ? value[wrapperKey] : value;
      const keys = isRecord(item) ? Object.keys(item).slice(0, 5).join(', ') : '';
      return {
        structure: structureOf('single-object', 1, { containerPath: wrapperKey, label: `single-object(${keys})` }),
        items: [item],
      };
    }

    const paginationKeys = collectPaginationKeys([value, container.parent], container.key);
    const kind: ApiStructureKind = paginationKeys.length > 0 ? 'paginated-envelope' : 'envelope';
    return {
      structure: structureOf(kind, container.items.length, { containerPath: container.path, paginationKeys }),
      items: container.items,
    };
  }

  private inspectXml($: CheerioAPI): Inspection {
    const root = $.root().children().first().get(0);
    if (!root) return { structure: structureOf('empty', 0), items: [] };

    const found = findRepeatedElements($, root, [root.tagName]);
    const elements = found?.elements ?? [root];
    const containerPath = found?.path.join('/') ?? root.tagName;

    return {
      structure: structureOf('xml-document', elements.length, { containerPath }),
      items: elements.map(element => flattenElement($, element)),
    };
  }
}

// ============================================================================
// Structure helpers
// ============================================================================

function structureOf(
  kind: ApiStructureKind,
  recordCount: number,
  details: { containerPath?: string; paginationKeys?: string[]; label?: string } = {}
): ApiStructure {
  const paginationKeys = details.paginationKeys ?? [];
  let label = details.label ?? kind;
  if (!details.label) {
    if (kind === 'paginated-envelope') {
      label = `${kind}(${details.containerPath}; ${paginationKeys.join(', ')})`;
    } else if (details.containerPath) {
      label = `${kind}(${details.containerPath})`;
    } else if (kind === 'array-of-objects' || kind === 'array-of-values') {
      label = `${kind}(${recordCount})`;
    }
  }
  return { kind, containerPath: details.containerPath, recordCount, paginationKeys, label };
}

interface ContainerMatch {
  path: string;
  key: string;
  items: unknown[];
  parent: Record<string, unknown>;
}

function findContainer(
  source: Record<string, unknown>,
  schema: KnownApiSchema | null,
  prefix: string[] = [],
  depth = 0
): ContainerMatch | null {
  if (schema === 'hal' && depth === 0 && isRecord(source._embedded)) {
    const embedded = source._embedded;
    const key = Object.keys(embedded).find(name => Array.isArray(embedded[name]));
    const items = key ? embedded[key] : undefined;
    if (key && Array.isArray(items)) {
      return { path: `_embedded.${key}`, key, items, parent: embedded };
    }
  }
  if (schema === 'odata' && depth === 0 && Array.isArray(source.value)) {
    return { path: 'value', key: 'value', items: source.value, parent: source };
  }

  for (const candidate of CONTAINER_KEYS) {
    const key = findKey(source, candidate);
    const items = key ? source[key] : undefined;
    if (key && Array.isArray(items)) {
      return { path: [...prefix, key].join('.'), key, items, parent: source };
    }
  }

  if (depth >= MAX_CONTAINER_DEPTH) return null;

  for (const candidate of WRAPPER_KEYS) {
    const key = findKey(source, candidate);
    const nested = key ? source[key] : undefined;
    if (key && isRecord(nested)) {
      const match = findContainer(nested, schema, [...prefix, key], depth + 1);
      if (match) return match;
    }
  }

  return null;
}

function collectPaginationKeys(holders: Record<string, unknown>[], containerKey: string): string[] {
  const keys = new Set<string>();

  const visit = (source: Record<string, unknown>, nested: boolean) => {
    for (const [key, value] of Object.entries(source)) {
      if (key === containerKey) continue;
      const normalized = normalizeKey(key);
      if (PAGINATION_KEYS.has(normalized) && value !== null && value !== undefined) keys.add(key);
      if (!nested && PAGINATION_HOLDERS.includes(normalized) && isRecord(value)) visit(value, true);
    }
  };

  for (const holder of holders) visit(holder, false);
  return Array.from(keys);
}

/**
 * Error text of an error-only response, or undefined
 */
function errorEnvelopeMessage(source: Record<string, unknown>): string | undefined {
  const errorKey = findKey(source, 'error');
  const error = errorKey ? source[errorKey] : undefined;
  if (error !== undefined && error !== null && error !== false && error !== '') {
    if (isRecord(error)) return fieldText(error.message) ?? fieldText(error.type) ?? 'unknown error';
    return scalarText(error) ?? 'unknown error';
  }

  const errorsKey = findKey(source, 'errors');
  const errors = errorsKey ? source[errorsKey] : undefined;
  if (Array.isArray(errors) && errors.length > 0) {
    const first: unknown = errors[0];
    if (isRecord(first)) return fieldText(first.message) ?? fieldText(first.detail) ?? fieldText(first.title) ?? 'unknown error';
    return scalarText(first) ?? 'unknown error';
  }

  const keys = Object.keys(source).map(normalizeKey);
  const messageKey = findKey(source, 'message');
  const failed =
    source.success === false ||
    source.ok === false ||
    ['status', 'statuscode', 'code'].some(name => {
      const key = findKey(source, name);
      return key !== undefined && Number(source[key]) >= 400;
    });
  if (messageKey && failed && keys.every(key => ERROR_ENVELOPE_KEYS.has(key))) {
    return fieldText(source[messageKey]) ?? 'unknown error';
  }

  return undefined;
}

// ============================================================================
// XML helpers
// ============================================================================

function childElements($: CheerioAPI, element: Element): Element[] {
  return $(element).children().toArray();
}

/**
 * Descend from the root to the first element whose children repeat a tag
 * (e.g. `rss/channel/item`, `catalog/book`)
 */
function findRepeatedElements(
  $: CheerioAPI,
  element: Element,
  path: string[],
  depth = 0
): { elements: Element[]; path: string[] } | null {
  const children = childElements($, element);
  const counts = new Map<string, number>();
  for (const child of children) counts.set(child.tagName, (counts.get(child.tagName) ?? 0) + 1);

  let repeated: string | undefined;
  let best = 1;
  for (const [tag, count] of counts) {
    if (count > best) {
      repeated = tag;
      best = count;
    }
  }
  if (repeated) {
    const tag = repeated;
    return { elements: children.filter(child => child.tagName === tag), path: [...path, tag] };
  }

  if (depth >= 3) return null;
  for (const child of children) {
    const match = findRepeatedElements($, child, [...path, child.tagName], depth + 1);
    if (match) return match;
  }
  return null;
}

/**
 * Attributes and leaf children of an element as a flat object
 */
function flattenElement($: CheerioAPI, element: Element): Record<string, unknown> {
  const flat: Record<string, unknown> = { ...element.attribs };

  const children = childElements($, element);
  if (children.length === 0) {
    const text = $(element).text().trim();
    if (text) flat.text = text;
    return flat;
  }

  for (const child of children) {
    if (child.tagName in flat) continue;
    if (childElements($, child).length === 0) {
      flat[child.tagName] = $(child).text().trim();
    } else {
      flat[child.tagName] = flattenElement($, child);
    }
  }
  return flat;
}

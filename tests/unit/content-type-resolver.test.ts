/**
 * Unit tests for content type resolution.
 */

import { describe, it, expect } from 'vitest';
import {
  contentTypeFromHint,
  contentTypeFromUrl,
  detectFeedFormat,
  resolveContentType,
  sniffContentType,
} from '../../src/resolver/content-type-resolver';

describe('contentTypeFromHint', () => {
  it('maps aliases onto content types', () => {
    expect(contentTypeFromHint('rss')).toBe('feed');
    expect(contentTypeFromHint('Atom')).toBe('feed');
    expect(contentTypeFromHint('json')).toBe('api');
    expect(contentTypeFromHint(' page ')).toBe('html');
    expect(contentTypeFromHint('unknown')).toBe('unknown');
  });

  it('ignores auto, empty and unrecognised hints', () => {
    expect(contentTypeFromHint('auto')).toBeNull();
    expect(contentTypeFromHint('')).toBeNull();
    expect(contentTypeFromHint(undefined)).toBeNull();
    expect(contentTypeFromHint('spreadsheet')).toBeNull();
  });
});

describe('contentTypeFromUrl', () => {
  it('recognises feed paths', () => {
    expect(contentTypeFromUrl('https://example.com/feed')).toBe('feed');
    expect(contentTypeFromUrl('https://example.com/blog/feed/')).toBe('feed');
    expect(contentTypeFromUrl('https://example.com/rss.xml')).toBe('feed');
    expect(contentTypeFromUrl('https://example.com/atom.xml')).toBe('feed');
    expect(contentTypeFromUrl('https://example.com/news.rss')).toBe('feed');
    expect(contentTypeFromUrl('https://example.com/posts?format=rss')).toBe('feed');
  });

  it('recognises API endpoints', () => {
    expect(contentTypeFromUrl('https://api.example.com/v1/posts')).toBe('api');
    expect(contentTypeFromUrl('https://example.com/api/posts')).toBe('api');
    expect(contentTypeFromUrl('https://example.com/data/posts.json')).toBe('api');
    expect(contentTypeFromUrl('https://example.com/posts?format=json')).toBe('api');
  });

  it('returns null for plain pages and invalid URLs', () => {
    expect(contentTypeFromUrl('https://example.com/blog/feeding-cats')).toBeNull();
    expect(contentTypeFromUrl('https://example.com/rapid-growth')).toBeNull();
    expect(contentTypeFromUrl('not a url')).toBeNull();
  });
});

describe('detectFeedFormat', () => {
  it('reads the root element', () => {
    expect(detectFeedFormat('<?xml version="1.0"?>\n<rss version="2.0"><channel/></rss>')).toBe('rss');
    expect(detectFeedFormat('<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"></rdf:RDF>')).toBe('rss');
    expect(detectFeedFormat('<!-- generated -->\n<feed xmlns="http://www.w3.org/2005/Atom"></feed>')).toBe('atom');
  });

  it('recognises JSON Feed by its version URL', () => {
    expect(detectFeedFormat('{"version":"https://jsonfeed.org/version/1.1","items":[]}')).toBe('json');
    expect(detectFeedFormat('{"items":[]}')).toBeNull();
  });

  it('finds the JSON Feed version outside the sniff window', () => {
    const body = JSON.stringify({
      items: Array.from({ length: 60 }, (_, index) => ({ id: String(index), content_text: 'x'.repeat(100) })),
      version: 'https://jsonfeed.org/version/1.1',
    });

    expect(body.length).toBeGreaterThan(4096);
    expect(detectFeedFormat(body)).toBe('json');
    expect(resolveContentType('https://example.com/data', undefined, body)).toBe('feed');
  });

  it('does not treat HTML as a feed', () => {
    expect(detectFeedFormat('<!DOCTYPE html><html><body>feed</body></html>')).toBeNull();
  });
});

describe('sniffContentType', () => {
  it('classifies payloads by their first bytes', () => {
    expect(sniffContentType('')).toBe('unknown');
    expect(sniffContentType('   ')).toBe('unknown');
    expect(sniffContentType('<rss version="2.0"></rss>')).toBe('feed');
    expect(sniffContentType('[{"id":1}]')).toBe('api');
    expect(sniffContentType('{"data":[]}')).toBe('api');
    expect(sniffContentType('<!DOCTYPE html>\n<html lang="en"></html>')).toBe('html');
    expect(sniffContentType('<?xml version="1.0"?><catalog><book/></catalog>')).toBe('api');
    expect(sniffContentType('<p>fragment</p>')).toBe('html');
  });
});

describe('resolveContentType', () => {
  it('lets a valid hint win over URL and payload', () => {
    expect(resolveContentType('https://example.com/feed', 'api', '<rss></rss>')).toBe('api');
  });

  it('falls back to the URL pattern when the hint is not recognised', () => {
    expect(resolveContentType('https://example.com/rss.xml', 'auto', '<html></html>')).toBe('feed');
  });

  it('sniffs the payload when the URL has no marker', () => {
    expect(resolveContentType('https://example.com/latest', undefined, '<feed xmlns="http://www.w3.org/2005/Atom"></feed>')).toBe('feed');
    expect(resolveContentType('https://example.com/latest', undefined, '{"ok":true}')).toBe('api');
  });

  it('defaults to html for a valid URL and unknown otherwise', () => {
    expect(resolveContentType('https://example.com/about')).toBe('html');
    expect(resolveContentType('ftp://example.com/file')).toBe('unknown');
    expect(resolveContentType('nonsense')).toBe('unknown');
  });
});

/**
 * Unit tests for feed discovery across a small in-memory site.
 */

import { describe, it, expect, vi } from 'vitest';
import { AnalysisManager } from '../../src/orchestrator/analysis-manager';
import { createStubFetcher, type StubResponse } from '../helpers/stub-fetcher';

const NOW = new Date('2024-06-01T00:00:00Z');
const ROOT = 'https://blog.example/';

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Blog Feed</title>
    <link>https://blog.example/</link>
    <description>Posts from the blog</description>
    <item>
      <title>Hello</title>
      <link>https://blog.example/posts/hello</link>
      <pubDate>Mon, 20 May 2024 09:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Blog Atom</title>
  <id>urn:uuid:blog</id>
  <updated>2024-05-21T10:00:00Z</updated>
  <entry>
    <title>Hello again</title>
    <id>urn:uuid:hello</id>
    <updated>2024-05-21T10:00:00Z</updated>
  </entry>
</feed>`;

const page = (head: string, body: string) => `<html><head>${head}</head><body>${body}</body></html>`;

const SITE: Record<string, StubResponse> = {
  [ROOT]: {
    body: page(
      '<link rel="alternate" type="application/rss+xml" title="Blog Feed" href="/feed.xml">',
      `<a href="/about">About</a>
       <a href="/posts/">Posts</a>
       <a href="https://other.example/">Elsewhere</a>
       <a href="/feed.xml/">Subscribe</a>`
    ),
  },
  'https://blog.example/about': {
    body: page(
      '<link rel="alternate" type="application/atom+xml" title="Blog Atom" href="/atom.xml">',
      '<a href="/">Home</a>'
    ),
  },
  'https://blog.example/posts/': {
    body: page('', '<a href="/posts/deep">Deep</a> <a href="/about">About</a>'),
  },
  'https://blog.example/posts/deep': {
    body: page('<link rel="alternate" type="application/rss+xml" href="/deep.xml">', ''),
  },
  'https://blog.example/feed.xml': { body: RSS_FEED },
  'https://blog.example/atom.xml': { body: ATOM_FEED },
};

function managerFor(routes: Record<string, StubResponse> = SITE) {
  const stub = createStubFetcher(routes);
  const manager = new AnalysisManager({ fetch: stub.fetch, clock: () => NOW, logSink: vi.fn() });
  return { manager, stub };
}

describe('AnalysisManager.discoverFeeds', () => {
  it('treats a source that is itself a feed as a direct hit', async () => {
    const { manager, stub } = managerFor();

    const result = await manager.discoverFeeds('https://blog.example/feed.xml', 2, true);

    expect(result.discoveryMethod).toBe('direct');
    expect(result.pagesVisited).toBe(1);
    expect(result.totalFeeds).toBe(1);
    expect(result.feeds[0]).toMatchObject({
      url: 'https://blog.example/feed.xml',
      title: 'Blog Feed',
      feedType: 'rss',
      entryCount: 1,
      isActive: true,
      validated: true,
    });
    expect(stub.requests).toEqual(['https://blog.example/feed.xml']);
  });

  it('scans the source page and dedupes candidates', async () => {
    const { manager } = managerFor();

    const result = await manager.discoverFeeds(ROOT, 1, false);

    expect(result.discoveryMethod).toBe('page-scan');
    expect(result.pagesVisited).toBe(1);
    expect(result.feeds).toEqual([
      {
        url: 'https://blog.example/feed.xml',
        title: 'Blog Feed',
        feedType: 'rss',
        entryCount: 0,
        isActive: false,
        validated: false,
      },
    ]);
    expect(result.errorMessage).toBeUndefined();
  });

  it('merges candidates that differ only by scheme', async () => {
    const { manager } = managerFor({
      [ROOT]: {
        body: page(
          '<link rel="alternate" type="application/rss+xml" href="https://blog.example/feed.xml">',
          '<a href="http://blog.example/feed.xml">RSS</a>'
        ),
      },
    });

    const result = await manager.discoverFeeds(ROOT, 1, false);

    expect(result.feeds.map(feed => feed.url)).toEqual(['https://blog.example/feed.xml']);
  });

  it('validates candidates, including common paths, and drops failures', async () => {
    const { manager, stub } = managerFor();

    const result = await manager.discoverFeeds(ROOT, 1, true);

    expect(result.feeds.map(feed => [feed.url, feed.feedType, feed.validated])).toEqual([
      ['https://blog.example/feed.xml', 'rss', true],
      ['https://blog.example/atom.xml', 'atom', true],
    ]);
    expect(stub.requests).toContain('https://blog.example/index.xml');
  });

  it('crawls same-site pages level by level', async () => {
    const { manager, stub } = managerFor();

    const result = await manager.discoverFeeds(ROOT, 2, false);

    expect(result.discoveryMethod).toBe('crawl');
    expect(result.pagesVisited).toBe(3);
    expect(result.feeds.map(feed => [feed.url, feed.title, feed.feedType])).toEqual([
      ['https://blog.example/feed.xml', 'Blog Feed', 'rss'],
      ['https://blog.example/atom.xml', 'Blog Atom', 'atom'],
    ]);
    expect(stub.requests).not.toContain('https://other.example/');
    expect(stub.requests).not.toContain('https://blog.example/posts/deep');
  });

  it('visits each page once however often it is linked', async () => {
    const { manager, stub } = managerFor();

    const result = await manager.discoverFeeds(ROOT, 3, false);

    expect(result.pagesVisited).toBe(4);
    expect(result.feeds.map(feed => feed.url)).toEqual([
      'https://blog.example/feed.xml',
      'https://blog.example/atom.xml',
      'https://blog.example/deep.xml',
    ]);
    expect(stub.requests.filter(url => url === 'https://blog.example/about')).toHaveLength(1);
    expect(stub.requests.filter(url => url === ROOT)).toHaveLength(1);
  });

  it('reports a source that cannot be fetched', async () => {
    const { manager } = managerFor({});

    const result = await manager.discoverFeeds('https://down.example/', 2, true);

    expect(result.feeds).toEqual([]);
    expect(result.totalFeeds).toBe(0);
    expect(result.pagesVisited).toBe(0);
    expect(result.errorMessage).toBe('HTTP 404');
  });

  it('reports an invalid source URL', async () => {
    const { manager, stub } = managerFor();

    const result = await manager.discoverFeeds('nope');

    expect(result.errorMessage).toBe('Not an absolute http(s) URL: nope');
    expect(stub.requests).toEqual([]);
  });
});

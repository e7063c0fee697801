/**
 * Unit tests for RSS, Atom and JSON Feed analysis.
 */

import { describe, it, expect } from 'vitest';
import { FeedAnalyzer, isFeedActive, type FeedEntry } from '../../src/analyzers/feed-analyzer';
import { emptyFields } from '../../src/analyzers/types';
import { DEFAULT_ANALYSIS_CONFIG, resolveConfig, type AnalysisOptions } from '../../src/config';
import { ParseError, TransportError, ValidationError } from '../../src/errors';
import { DAY_MS } from '../../src/utils/dates';
import { createStubFetcher } from '../helpers/stub-fetcher';

const FEED_URL = 'https://garden.example/feed.xml';
const NOW = new Date('2024-06-01T00:00:00Z');

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Garden Notes</title>
    <link>https://garden.example/</link>
    <description>Weekly gardening notes</description>
    <language>en-us</language>
    <item>
      <title>Planting garlic</title>
      <link>https://garden.example/posts/garlic</link>
      <description>&lt;p&gt;Plant cloves in &lt;b&gt;autumn&lt;/b&gt;.&lt;/p&gt;</description>
      <pubDate>Mon, 20 May 2024 09:00:00 GMT</pubDate>
      <guid>garlic-1</guid>
    </item>
    <item>
      <title>Pruning roses</title>
      <link>/posts/roses</link>
      <pubDate>Mon, 13 May 2024 09:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Garden</title>
  <subtitle>Seasonal notes</subtitle>
  <link href="https://garden.example/" rel="alternate"/>
  <updated>2024-05-21T10:00:00Z</updated>
  <id>urn:uuid:garden</id>
  <entry>
    <title>Harvesting beans</title>
    <link href="https://garden.example/posts/beans" rel="alternate"/>
    <id>urn:uuid:beans</id>
    <published>2024-05-18T10:00:00Z</published>
    <updated>2024-05-21T10:00:00Z</updated>
    <author><name>Pat Grower</name></author>
    <summary>Pick beans while young.</summary>
  </entry>
</feed>`;

const JSON_FEED = JSON.stringify({
  version: 'https://jsonfeed.org/version/1.1',
  title: 'JSON Garden',
  home_page_url: 'https://garden.example/',
  language: 'en',
  authors: [{ name: 'Robin' }],
  items: [
    {
      id: '1',
      url: 'https://garden.example/posts/kale',
      title: 'Kale in winter',
      content_html: '<p>Kale survives <em>frost</em>.</p>',
      date_published: '2024-05-10T00:00:00Z',
    },
    { id: 2, content_text: 'Untitled note' },
    'not an item',
  ],
});

// `version` after a long `items` array, past the first few kilobytes
const JSON_FEED_VERSION_LAST = JSON.stringify({
  items: Array.from({ length: 60 }, (_, index) => ({ id: String(index), content_text: 'x'.repeat(100) })),
  title: 'Late Version',
  version: 'https://jsonfeed.org/version/1.1',
});

function inputFor(body: string, options: AnalysisOptions = {}) {
  return {
    url: FEED_URL,
    body,
    headers: {},
    config: resolveConfig(DEFAULT_ANALYSIS_CONFIG, { detectLanguage: false, ...options }),
    now: NOW,
    draft: emptyFields(),
  };
}

describe('FeedAnalyzer.parse', () => {
  const analyzer = new FeedAnalyzer();

  it('parses RSS 2.0 channels and items', async () => {
    const feed = await analyzer.parse(RSS_FEED, FEED_URL);

    expect(feed.feedType).toBe('rss');
    expect(feed.title).toBe('Garden Notes');
    expect(feed.description).toBe('Weekly gardening notes');
    expect(feed.language).toBe('en-us');
    expect(feed.totalEntries).toBe(2);
    expect(feed.lastUpdated).toEqual(new Date('2024-05-20T09:00:00Z'));

    const [garlic, roses] = feed.entries;
    expect(garlic?.id).toBe('garlic-1');
    expect(garlic?.title).toBe('Planting garlic');
    expect(garlic?.content).toBe('Plant cloves in autumn.');
    expect(garlic?.publishedAt).toEqual(new Date('2024-05-20T09:00:00Z'));
    expect(roses?.link).toBe('https://garden.example/posts/roses');
    expect(roses?.content).toBeUndefined();
  });

  it('parses Atom feeds', async () => {
    const feed = await analyzer.parse(ATOM_FEED, 'https://garden.example/atom.xml');

    expect(feed.feedType).toBe('atom');
    expect(feed.title).toBe('Atom Garden');
    expect(feed.description).toBe('Seasonal notes');
    expect(feed.lastUpdated).toEqual(new Date('2024-05-21T10:00:00Z'));

    const [beans] = feed.entries;
    expect(beans).toMatchObject({
      id: 'urn:uuid:beans',
      title: 'Harvesting beans',
      link: 'https://garden.example/posts/beans',
      summary: 'Pick beans while young.',
      author: 'Pat Grower',
    });
    expect(beans?.publishedAt).toEqual(new Date('2024-05-18T10:00:00Z'));
    expect(beans?.updatedAt).toEqual(new Date('2024-05-21T10:00:00Z'));
  });

  it('parses JSON Feed and skips malformed items', async () => {
    const feed = await analyzer.parse(JSON_FEED, 'https://garden.example/feed.json');

    expect(feed.feedType).toBe('json');
    expect(feed.title).toBe('JSON Garden');
    expect(feed.author).toBe('Robin');
    expect(feed.language).toBe('en');
    expect(feed.totalEntries).toBe(3);
    expect(feed.entries).toHaveLength(2);
    expect(feed.entries[0]?.content).toBe('Kale survives frost.');
    expect(feed.entries[1]?.id).toBe('2');
    expect(feed.entries[1]?.content).toBe('Untitled note');
    expect(feed.lastUpdated).toEqual(new Date('2024-05-10T00:00:00Z'));
  });

  it('accepts a JSON Feed whose version key comes last', async () => {
    const feed = await analyzer.parse(JSON_FEED_VERSION_LAST, 'https://garden.example/feed.json');

    expect(feed.feedType).toBe('json');
    expect(feed.title).toBe('Late Version');
    expect(feed.totalEntries).toBe(60);
    expect(feed.entries).toHaveLength(60);
  });

  it('rejects JSON objects that are not JSON Feeds', async () => {
    await expect(analyzer.parse('{"items":[]}', FEED_URL)).rejects.toThrow(/^Invalid JSON feed/);
  });

  it('caps entries at the requested maximum', async () => {
    const feed = await analyzer.parse(RSS_FEED, FEED_URL, 1);

    expect(feed.entries).toHaveLength(1);
    expect(feed.totalEntries).toBe(2);
  });

  it('rejects payloads that are not feeds', async () => {
    await expect(analyzer.parse('<html><body>Hi</body></html>', FEED_URL)).rejects.toThrow(
      'Payload is not an RSS, Atom or JSON feed'
    );
  });

  it('rejects malformed XML and JSON', async () => {
    await expect(analyzer.parse('<rss version="2.0"><channel><title>Broken', FEED_URL)).rejects.toBeInstanceOf(
      ParseError
    );
    await expect(
      analyzer.parse('{"version":"https://jsonfeed.org/version/1","items":', FEED_URL)
    ).rejects.toThrow(/^Malformed JSON feed/);
  });
});

describe('FeedAnalyzer.analyze', () => {
  const analyzer = new FeedAnalyzer();

  it('builds a record view of the feed', async () => {
    const { fields, signals } = await analyzer.analyze(inputFor(RSS_FEED, { extractLinks: true }));

    expect(fields.title).toBe('Garden Notes');
    expect(fields.description).toBe('Weekly gardening notes');
    expect(fields.mainContent).toBe('Planting garlic\nPlant cloves in autumn.\n\nPruning roses');
    expect(fields.summary).toBe('Recent entries: Planting garlic; Pruning roses');
    expect(fields.publishedAt).toEqual(new Date('2024-05-20T09:00:00Z'));
    expect(fields.lastModifiedAt).toEqual(new Date('2024-05-20T09:00:00Z'));
    expect(fields.language).toBe('en');
    expect(fields.externalLinks).toEqual([
      'https://garden.example/posts/garlic',
      'https://garden.example/posts/roses',
    ]);

    expect(signals).toEqual({ hasStructuredMetadata: true, boilerplateRatio: 0.5, languageConfidence: 0.5 });
  });

  it('fails when the feed has nothing to describe', async () => {
    const empty = '<rss version="2.0"><channel><link>https://garden.example/</link></channel></rss>';

    await expect(analyzer.analyze(inputFor(empty))).rejects.toBeInstanceOf(ParseError);
  });
});

describe('FeedAnalyzer.validate', () => {
  it('describes a reachable feed', async () => {
    const stub = createStubFetcher({ [FEED_URL]: { body: RSS_FEED } });
    const analyzer = new FeedAnalyzer({ fetch: stub.fetch });

    const descriptor = await analyzer.validate(FEED_URL, DEFAULT_ANALYSIS_CONFIG, NOW);

    expect(descriptor).toEqual({
      url: FEED_URL,
      title: 'Garden Notes',
      description: 'Weekly gardening notes',
      feedType: 'rss',
      lastUpdated: new Date('2024-05-20T09:00:00Z'),
      entryCount: 2,
      isActive: true,
      language: 'en',
      validated: true,
    });
  });

  it('rejects responses that are not feeds', async () => {
    const stub = createStubFetcher({ [FEED_URL]: { body: '<html><body>Not here</body></html>' } });
    const analyzer = new FeedAnalyzer({ fetch: stub.fetch });

    await expect(analyzer.validate(FEED_URL)).rejects.toBeInstanceOf(ValidationError);
  });

  it('surfaces transport failures', async () => {
    const analyzer = new FeedAnalyzer({ fetch: createStubFetcher().fetch });

    await expect(analyzer.validate(FEED_URL)).rejects.toBeInstanceOf(TransportError);
  });

  it('needs a fetch capability', async () => {
    await expect(new FeedAnalyzer().validate(FEED_URL)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('isFeedActive', () => {
  const entriesAt = (...daysAgo: number[]): FeedEntry[] =>
    daysAgo.map(days => ({ publishedAt: new Date(NOW.getTime() - days * DAY_MS) }));

  it('is active with an entry inside the window', () => {
    expect(isFeedActive(entriesAt(10, 400), NOW, 90)).toBe(true);
  });

  it('is inactive without dated entries', () => {
    expect(isFeedActive([], NOW, 90)).toBe(false);
    expect(isFeedActive([{ title: 'Undated' }], NOW, 90)).toBe(false);
  });

  it('accepts a regular cadence whose next entry is not overdue', () => {
    expect(isFeedActive(entriesAt(40, 70, 100), NOW, 30)).toBe(true);
  });

  it('rejects a regular cadence that has lapsed', () => {
    expect(isFeedActive(entriesAt(200, 207, 214), NOW, 90)).toBe(false);
  });

  it('rejects an irregular cadence outside the window', () => {
    expect(isFeedActive(entriesAt(40, 41, 100), NOW, 30)).toBe(false);
  });

  it('ignores entries dated in the future', () => {
    expect(isFeedActive(entriesAt(-30), NOW, 90)).toBe(false);
  });
});

/**
 * Unit tests for HTML metadata, main content and feed link extraction.
 */

import { describe, it, expect } from 'vitest';
import { HtmlAnalyzer } from '../../src/analyzers/html-analyzer';
import { emptyFields } from '../../src/analyzers/types';
import { DEFAULT_ANALYSIS_CONFIG, resolveConfig, type AnalysisOptions } from '../../src/config';
import { ParseError } from '../../src/errors';
import { detectLanguage } from '../../src/utils/language';

const PAGE_URL = 'https://garden.example/guides/tomatoes';
const NOW = new Date('2024-06-01T00:00:00Z');

const PARAGRAPHS = [
  'Tomatoes need at least six hours of direct sunlight every day to produce a healthy crop of fruit.',
  'Water the plants deeply twice a week rather than giving them a little water every single day.',
  'Support the stems with stakes or cages once the plants reach about a foot in height.',
];

const ARTICLE_PAGE = `
<!DOCTYPE html>
<html lang="en-US">
  <head>
    <title>Growing Tomatoes at Home</title>
    <meta name="description" content="A practical guide to tomatoes.">
    <meta name="author" content="Jane Gardener">
    <meta property="article:published_time" content="2024-05-01T08:00:00Z">
    <link rel="canonical" href="/guides/tomatoes">
    <link rel="alternate" type="application/rss+xml" title="Garden RSS" href="/feed.xml">
  </head>
  <body>
    <nav><a href="/">Home</a> <a href="/about">About</a></nav>
    <article class="post">
      <h1>Growing Tomatoes at Home</h1>
      <p>${PARAGRAPHS[0]}</p>
      <p>${PARAGRAPHS[1]}</p>
      <p>${PARAGRAPHS[2]}</p>
    </article>
    <div class="sidebar"><a href="https://ads.example.net/seeds">Buy seeds</a></div>
    <footer>Copyright Garden Example</footer>
  </body>
</html>`;

function inputFor(body: string, options: AnalysisOptions = {}, url = PAGE_URL) {
  return {
    url,
    body,
    headers: {},
    config: resolveConfig(DEFAULT_ANALYSIS_CONFIG, options),
    now: NOW,
    draft: emptyFields(),
  };
}

describe('HtmlAnalyzer.analyze', () => {
  const analyzer = new HtmlAnalyzer();

  it('extracts metadata and the article body', async () => {
    const { fields, signals } = await analyzer.analyze(
      inputFor(ARTICLE_PAGE, { detectLanguage: false, extractLinks: true })
    );

    expect(fields.title).toBe('Growing Tomatoes at Home');
    expect(fields.description).toBe('A practical guide to tomatoes.');
    expect(fields.author).toBe('Jane Gardener');
    expect(fields.publishedAt).toEqual(new Date('2024-05-01T08:00:00Z'));
    expect(fields.canonicalUrl).toBe('https://garden.example/guides/tomatoes');
    expect(fields.mainContent).toBe(['Growing Tomatoes at Home', ...PARAGRAPHS].join('\n\n'));
    expect(fields.summary).toBe(['Growing Tomatoes at Home', ...PARAGRAPHS].join(' '));
    expect(fields.language).toBe('en');
    expect(fields.discoveredFeeds).toEqual(['https://garden.example/feed.xml']);
    expect(fields.externalLinks).toEqual(['https://ads.example.net/seeds']);
    expect(fields.images).toEqual([]);

    expect(signals.hasStructuredMetadata).toBe(false);
    expect(signals.languageConfidence).toBe(0.5);
    expect(signals.boilerplateRatio).toBeGreaterThan(0);
    expect(signals.boilerplateRatio).toBeLessThan(0.5);
  });

  it('leaves links and images out unless asked', async () => {
    const { fields } = await analyzer.analyze(inputFor(ARTICLE_PAGE, { detectLanguage: false }));

    expect(fields.externalLinks).toEqual([]);
    expect(fields.images).toEqual([]);
  });

  it('skips feed discovery when disabled', async () => {
    const { fields } = await analyzer.analyze(inputFor(ARTICLE_PAGE, { discoverFeeds: false, detectLanguage: false }));

    expect(fields.discoveredFeeds).toEqual([]);
  });

  it('writes fields into the draft as it goes', async () => {
    const input = inputFor(ARTICLE_PAGE, { detectLanguage: false });
    await analyzer.analyze(input);

    expect(input.draft.title).toBe('Growing Tomatoes at Home');
    expect(input.draft.mainContent).toBe(['Growing Tomatoes at Home', ...PARAGRAPHS].join('\n\n'));
  });

  it('collects images from src and data-src', async () => {
    const html = `<html><body><article>
      <p>${PARAGRAPHS[0]} ${PARAGRAPHS[1]}</p>
      <img src="/img/a.jpg"><img data-src="https://cdn.example/b.png"><img src="/img/a.jpg">
    </article></body></html>`;

    const { fields } = await analyzer.analyze(inputFor(html, { extractImages: true, detectLanguage: false }));

    expect(fields.images).toEqual(['https://garden.example/img/a.jpg', 'https://cdn.example/b.png']);
  });

  it('fails with ParseError when the page has no text', async () => {
    const html = '<html><head><title></title></head><body><script>var x = 1;</script></body></html>';

    await expect(analyzer.analyze(inputFor(html))).rejects.toBeInstanceOf(ParseError);
  });

  it('uses raw body text when main content extraction is off', async () => {
    const html = '<html><body><div>First line</div>\n<div>Second line</div></body></html>';

    const { fields, signals } = await analyzer.analyze(
      inputFor(html, { extractMainContent: false, detectLanguage: false })
    );

    expect(fields.mainContent).toBe('First line\n\nSecond line');
    expect(signals.boilerplateRatio).toBe(0);
  });
});

describe('HtmlAnalyzer.extractMetadata', () => {
  const analyzer = new HtmlAnalyzer();

  it('falls back to JSON-LD for title, author and dates', () => {
    const html = `<html><head>
      <script type="application/ld+json">
        {"@context":"https://schema.org","@type":"NewsArticle","headline":"LD Headline",
         "author":[{"name":"A. Writer"},{"name":"B. Writer"}],
         "datePublished":"2024-03-02T10:00:00Z","dateModified":"2024-03-04T10:00:00Z"}
      </script>
    </head><body></body></html>`;

    const metadata = analyzer.extractMetadata(html, PAGE_URL);

    expect(metadata.title).toBe('LD Headline');
    expect(metadata.author).toBe('A. Writer, B. Writer');
    expect(metadata.publishedAt).toEqual(new Date('2024-03-02T10:00:00Z'));
    expect(metadata.lastModifiedAt).toEqual(new Date('2024-03-04T10:00:00Z'));
    expect(metadata.hasStructuredMetadata).toBe(true);
  });

  it('reads JSON-LD inside an @graph', () => {
    const html = `<html><head><script type="application/ld+json">
      {"@graph":[{"@type":"WebSite","name":"Site"},{"@type":"Article","description":"From the graph"}]}
    </script></head><body></body></html>`;

    const metadata = analyzer.extractMetadata(html, PAGE_URL);

    expect(metadata.title).toBe('Site');
    expect(metadata.description).toBe('From the graph');
  });

  it('ignores malformed JSON-LD', () => {
    const html = '<html><head><title>Plain</title><script type="application/ld+json">{not json</script></head></html>';

    const metadata = analyzer.extractMetadata(html, PAGE_URL);

    expect(metadata.title).toBe('Plain');
    expect(metadata.author).toBeUndefined();
  });

  it('prefers OpenGraph over the first heading when there is no title', () => {
    const html = `<html><head><meta property="og:title" content="OG Title"></head>
      <body><h1>Heading</h1></body></html>`;

    expect(analyzer.extractMetadata(html, PAGE_URL).title).toBe('OG Title');
  });

  it('strips a "By" prefix from bylines', () => {
    const html = '<html><body><span class="byline">By   Sam Author</span></body></html>';

    expect(analyzer.extractMetadata(html, PAGE_URL).author).toBe('Sam Author');
  });

  it('finds a labelled date in the body text', () => {
    const html = '<html><body><p>Released 2023-01-01. Posted on March 5, 2024 by staff</p></body></html>';

    expect(analyzer.extractMetadata(html, PAGE_URL).publishedAt).toEqual(new Date(Date.UTC(2024, 2, 5)));
  });

  it('takes the modification date and language from headers', () => {
    const metadata = analyzer.extractMetadata('<html><body></body></html>', PAGE_URL, {
      'last-modified': 'Wed, 01 May 2024 12:00:00 GMT',
      'content-language': 'de-DE',
    });

    expect(metadata.lastModifiedAt).toEqual(new Date('2024-05-01T12:00:00Z'));
    expect(metadata.declaredLanguage).toBe('de-DE');
  });
});

describe('HtmlAnalyzer.discoverFeedLinks', () => {
  const analyzer = new HtmlAnalyzer();
  const html = `<html><head>
    <link rel="alternate" type="application/atom+xml" title="Atom" href="/atom.xml">
    <link rel="alternate" type="application/json" href="/feed.json">
    <link rel="alternate" type="application/json" href="/data.json">
    <link rel="alternate" hreflang="fr" href="/fr/">
    <link rel="stylesheet" type="text/css" href="/style.css">
  </head><body>
    <a href="/rss">RSS</a>
    <a href="/atom.xml#top">Atom again</a>
  </body></html>`;

  it('accepts feed MIME types, feed-looking generic types and feed anchors', () => {
    expect(analyzer.discoverFeedLinks(html, 'https://example.com/')).toEqual([
      { url: 'https://example.com/atom.xml', title: 'Atom', feedType: 'atom', source: 'link-tag' },
      { url: 'https://example.com/feed.json', title: undefined, feedType: 'json', source: 'link-tag' },
      { url: 'https://example.com/rss', title: 'RSS', source: 'anchor' },
    ]);
  });

  it('adds common feed paths without duplicating known candidates', () => {
    const urls = analyzer
      .discoverFeedLinks(html, 'https://example.com/blog/post', { guessCommonPaths: true })
      .map(candidate => candidate.url);

    expect(urls).toEqual([
      'https://example.com/atom.xml',
      'https://example.com/feed.json',
      'https://example.com/rss',
      'https://example.com/feed',
      'https://example.com/rss.xml',
      'https://example.com/feed.xml',
      'https://example.com/index.xml',
    ]);
  });
});

describe('HtmlAnalyzer.extractLinks', () => {
  it('splits links by origin and drops fragments and non-http schemes', () => {
    const html = `<html><body>
      <a href="/a">A</a><a href="/a#section">A again</a>
      <a href="https://other.example/x">X</a>
      <a href="mailto:someone@example.com">Mail</a>
      <a href="#top">Top</a>
    </body></html>`;

    expect(new HtmlAnalyzer().extractLinks(html, 'https://example.com/')).toEqual({
      internal: ['https://example.com/a'],
      external: ['https://other.example/x'],
    });
  });
});

describe('detectLanguage', () => {
  const english = PARAGRAPHS.join(' ');

  it('detects the language of longer text over the declared one', () => {
    const guess = detectLanguage(english, 'fr', { enabled: true, minLength: 50 });

    expect(guess.language).toBe('en');
    expect(guess.method).toBe('statistical');
  });

  it('falls back to the declared language for short or disabled detection', () => {
    expect(detectLanguage('Bonjour', 'fr-CA', { enabled: true, minLength: 50 })).toEqual({
      language: 'fr',
      confidence: 0.5,
      method: 'declared',
    });
    expect(detectLanguage(english, undefined, { enabled: false, minLength: 50 })).toEqual({
      confidence: 0,
      method: 'none',
    });
  });
});

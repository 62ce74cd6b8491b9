import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import * as cheerio from 'cheerio';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { UrlValidationError } from '../src/errors/app-error.js';
import { DocumentCache } from '../src/services/cache.js';
import {
  findCategoryUrls,
  findFeedLinks,
  parseFeedItems,
  Source,
} from '../src/services/source.js';

import { FakeTransport, htmlResponse, loadFixture } from './helpers/fixtures.js';

const BRIDGE_URL = 'http://example.com/world/2024/05/01/bridge-reopens';
const HARBOR_URL = 'http://example.com/world/2024/05/02/harbor-festival';
const RAIL_URL = 'http://example.com/world/2024/05/03/rail-strike-ends';
const MUSEUM_URL = 'http://example.com/world/2024/05/04/museum-opens-new-wing';

const HOME_PAGE = `<html><head>
<title>Example News</title>
<meta name="description" content="Example daily news">
<link rel="icon" href="/favicon.ico">
</head><body>
<a href="/world">World</a>
<a href="/about">About</a>
</body></html>`;

const WORLD_PAGE = `<html><head>
<link rel="alternate" type="application/rss+xml" href="/rss/world.xml">
</head><body>
<a href="/world/2024/05/03/rail-strike-ends">Rail strike ends</a>
<a href="/world/2024/05/04/museum-opens-new-wing">Museum opens new wing</a>
</body></html>`;

const MAIN_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel>
<title>Example News</title>
<item><title>Bridge reopens</title><link>${BRIDGE_URL}</link></item>
<item><title>Harbor festival</title><link>${HARBOR_URL}?utm_source=rss</link></item>
</channel></rss>`;

const WORLD_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel>
<item><title>Bridge reopens</title><link>${BRIDGE_URL}</link></item>
<item><title>Rail strike ends</title><link>${RAIL_URL}</link></item>
</channel></rss>`;

const RSS_INDEX_PAGE =
  '<html><head><link rel="alternate" type="application/rss+xml" href="/rss/world.xml"></head><body></body></html>';

function siteTransport(): FakeTransport {
  return new FakeTransport({
    'http://example.com/': HOME_PAGE,
    'http://example.com/world': WORLD_PAGE,
    'http://example.com/feed': MAIN_FEED,
    'http://example.com/rss': RSS_INDEX_PAGE,
    'http://example.com/rss/world.xml': WORLD_FEED,
    [BRIDGE_URL]: loadFixture('storm-article.html'),
    [RAIL_URL]: '<html><body><p>Short.</p></body></html>',
  });
}

describe('Source', () => {
  describe('construction', () => {
    it('derives domain, brand and scheme', () => {
      const source = new Source('http://cnn.com');

      expect(source.url).toBe('http://cnn.com/');
      expect(source.domain).toBe('cnn.com');
      expect(source.brand).toBe('cnn');
      expect(source.scheme).toBe('http');
    });

    it('takes the registrable label under a second-level suffix', () => {
      const source = new Source('https://www.bbc.co.uk');

      expect(source.domain).toBe('www.bbc.co.uk');
      expect(source.brand).toBe('bbc');
      expect(source.scheme).toBe('https');
    });

    it('rejects non-http URLs', () => {
      expect(() => new Source('ftp://example.com')).toThrow(UrlValidationError);
      expect(() => new Source('   ')).toThrow('Source URL must not be empty');
    });

    it('uses the default configuration', () => {
      const source = new Source('http://cnn.com');

      expect(source.config.maxFileMemo).toBe(20000);
      expect(source.config.useMetaLanguage).toBe(true);
    });

    it('turns meta language off for an explicit language', () => {
      const source = new Source('http://cnn.com', { language: 'en' });

      expect(source.config.useMetaLanguage).toBe(false);
    });
  });

  describe('findCategoryUrls', () => {
    it('keeps related hosts and short section paths', () => {
      const $ = cheerio.load(`<body>
        <a href="/world">World</a>
        <a href="/politics/">Politics</a>
        <a href="http://money.cnn.com/markets">Markets</a>
        <a href="http://m.cnn.com">Mobile</a>
        <a href="/about">About</a>
        <a href="/2013/11/27/travel/weather-story/index.html">Story</a>
        <a href="/averyveryverylongsection">Long</a>
        <a href="http://www.bbc.co.uk/news">BBC</a>
        <a href="mailto:tips@cnn.com">Tips</a>
        <a href="#top">Top</a>
        <a href="/world">World again</a>
        <a href="//edition.cnn.com/">Edition</a>
      </body>`);

      expect(findCategoryUrls($, 'http://cnn.com/')).toEqual([
        'http://cnn.com/world',
        'http://cnn.com/politics/',
        'http://money.cnn.com/',
        'http://edition.cnn.com/',
        'http://cnn.com/',
      ]);
    });

    it('always keeps the root', () => {
      expect(findCategoryUrls(cheerio.load('<p>No links</p>'), 'http://cnn.com/')).toEqual([
        'http://cnn.com/',
      ]);
    });
  });

  describe('feed parsing', () => {
    it('finds declared RSS and Atom links', () => {
      const $ = cheerio.load(`<head>
        <link rel="alternate" type="application/rss+xml" href="/rss/top.xml">
        <link rel="alternate" type="Application/Atom+XML" href="http://example.com/atom">
        <link rel="stylesheet" type="text/css" href="/site.css">
      </head>`);

      expect(findFeedLinks($, 'http://example.com/news')).toEqual([
        'http://example.com/rss/top.xml',
        'http://example.com/atom',
      ]);
    });

    it('reads RSS items', () => {
      expect(parseFeedItems(MAIN_FEED, 'http://example.com/feed')).toEqual([
        { url: BRIDGE_URL, title: 'Bridge reopens' },
        { url: HARBOR_URL, title: 'Harbor festival' },
      ]);
    });

    it('reads Atom entries, preferring the alternate link', () => {
      const atom = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <title>Tide tables</title>
    <link rel="edit" href="/api/entries/1"/>
    <link rel="alternate" href="/coast/2024/06/01/tide-tables"/>
  </entry>
  <entry>
    <title>Lighthouse</title>
    <link href="http://example.com/coast/2024/06/02/lighthouse"/>
  </entry>
</feed>`;

      expect(parseFeedItems(atom, 'http://example.com/atom')).toEqual([
        { url: 'http://example.com/coast/2024/06/01/tide-tables', title: 'Tide tables' },
        { url: 'http://example.com/coast/2024/06/02/lighthouse', title: 'Lighthouse' },
      ]);
    });
  });

  describe('build', () => {
    it('collects metadata, categories, feeds and articles', async () => {
      const source = new Source('http://example.com', {}, { transport: siteTransport() });
      await source.build();

      expect(source.description).toBe('Example daily news');
      expect(source.favicon).toBe('http://example.com/favicon.ico');
      expect(source.categoryUrls()).toEqual([
        'http://example.com/world',
        'http://example.com/',
      ]);
      expect(source.feedUrls()).toEqual([
        'http://example.com/feed',
        'http://example.com/rss/world.xml',
      ]);
      expect(source.articleUrls()).toEqual([BRIDGE_URL, HARBOR_URL, RAIL_URL, MUSEUM_URL]);
      expect(source.size()).toBe(4);
    });

    it('passes feed titles on to the articles', async () => {
      const source = new Source('http://example.com', {}, { transport: siteTransport() });
      await source.build();

      const [bridge] = source.articles;
      expect(bridge?.sourceUrl).toBe('http://example.com/');
      await bridge?.download(htmlResponse(BRIDGE_URL, '<html><body></body></html>'));
      bridge?.parse();
      expect(bridge?.title).toBe('Bridge reopens');
    });

    it('gives the same categories when run twice', async () => {
      const source = new Source('http://example.com', {}, { transport: siteTransport() });
      await source.download();
      source.parse();

      source.setCategories();
      const first = source.categoryUrls();
      source.setCategories();

      expect(source.categoryUrls()).toEqual(first);
    });

    it('has no categories before parse', () => {
      const source = new Source('http://example.com', {}, { transport: siteTransport() });
      source.setCategories();

      expect(source.categories).toEqual([]);
    });

    it('caps generated articles at the limit', async () => {
      const source = new Source('http://example.com', {}, { transport: siteTransport() });
      await source.build();
      await source.generateArticles(2);

      expect(source.articleUrls()).toEqual([BRIDGE_URL, HARBOR_URL]);
    });

    it('reports download progress for every article', async () => {
      const source = new Source('http://example.com', {}, { transport: siteTransport() });
      await source.build();

      const progress: [number, number][] = [];
      await source.downloadArticles(2, (completed, total) => {
        progress.push([completed, total]);
      });

      expect(progress).toEqual([
        [1, 4],
        [2, 4],
        [3, 4],
        [4, 4],
      ]);
    });

    it('decodes the home page with the charset of a mixed-case header', async () => {
      const html =
        '<html><head><meta name="description" content="Café news"></head><body></body></html>';
      const transport = siteTransport().route('http://example.com/', {
        url: 'http://example.com/',
        status: 200,
        headers: { 'Content-Type': 'text/html; charset=iso-8859-1' },
        body: new Uint8Array(Buffer.from(html, 'latin1')),
      });
      const source = new Source('http://example.com', {}, { transport });
      await source.download();
      source.parse();

      expect(source.description).toBe('Café news');
    });

    it('downloads and keeps only articles with a real body', async () => {
      const source = new Source(
        'http://example.com',
        { minWordCount: 100 },
        { transport: siteTransport() }
      );
      await source.build();
      await source.downloadArticles(2);
      source.parseArticles();

      expect(source.articleUrls()).toEqual([BRIDGE_URL]);
      expect(source.articles[0]?.title).toBe(
        'After storm, forecasters see smooth sailing for Thanksgiving'
      );
    });
  });

  describe('with a document cache', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(os.tmpdir(), 'broadsheet-source-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('purges articles already cached', async () => {
      const cache = new DocumentCache({ directory, maxEntries: 10 });
      await cache.set(HARBOR_URL, htmlResponse(HARBOR_URL, '<p>seen</p>'));

      const source = new Source('http://example.com', {}, {
        transport: siteTransport(),
        cache,
      });
      await source.build();

      expect(source.articleUrls()).toEqual([BRIDGE_URL, RAIL_URL, MUSEUM_URL]);
    });

    it('keeps cached articles when memoization is off', async () => {
      const cache = new DocumentCache({ directory, maxEntries: 10 });
      await cache.set(HARBOR_URL, htmlResponse(HARBOR_URL, '<p>seen</p>'));

      const source = new Source(
        'http://example.com',
        { memoizeArticles: false },
        { transport: siteTransport(), cache }
      );
      await source.build();

      expect(source.articleUrls()).toContain(HARBOR_URL);
    });

    it('clears the cache', async () => {
      const cache = new DocumentCache({ directory, maxEntries: 10 });
      await cache.set(HARBOR_URL, htmlResponse(HARBOR_URL, '<p>seen</p>'));
      const source = new Source('http://example.com', {}, { cache });

      await source.cleanMemoCache();

      expect(await cache.has(HARBOR_URL)).toBe(false);
    });
  });
});

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

import {
  Configuration,
  type ConfigurationOptions,
} from '../config/configuration.js';
import { CATEGORY_LIMITS, SOURCE_LIMITS } from '../config/constants.js';
import type { Transport } from '../config/types.js';

import { runWithConcurrency } from '../utils/concurrency.js';
import { decodeHtml, getCharsetFromContentType } from '../utils/encoding.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { readHeader } from '../utils/headers.js';
import { dedupePreservingOrder, sanitizeText } from '../utils/sanitizer.js';
import {
  getHostname,
  getPath,
  getScheme,
  isValidNewsUrl,
  prepareUrl,
  splitHost,
  validateSourceUrl,
} from '../utils/urls.js';

import { Article } from './article.js';
import type { DocumentCache } from './cache.js';
import { HttpTransport } from './fetcher.js';
import { logDebug, logInfo, logWarn } from './logger.js';
import { extractMetadata } from './metadata-collector.js';

export interface SourceContext {
  transport?: Transport;
  cache?: DocumentCache;
}

export interface Category {
  url: string;
  html: string;
  doc: CheerioAPI | null;
}

export interface Feed {
  url: string;
  rss: string;
}

const FEED_PATHS = ['/feed', '/feeds', '/rss'] as const;
const MAX_FEEDS = 50;
const FEED_TYPES = new Set(['application/rss+xml', 'application/atom+xml']);
const MOBILE_SUBDOMAINS = new Set(['m', 'i']);
const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:/i;
const FEED_DOCUMENT = /^\s*(?:<\?xml[^>]*>\s*)?(?:<!--[\s\S]*?-->\s*)*<(?:rss|feed|rdf:RDF)\b/i;

// Words that mark a link as site furniture rather than a section.
const CATEGORY_DENYLIST = [
  'about',
  'help',
  'privacy',
  'legal',
  'feedback',
  'sitemap',
  'profile',
  'account',
  'mobile',
  'facebook',
  'myspace',
  'twitter',
  'linkedin',
  'bebo',
  'friendster',
  'stumbleupon',
  'youtube',
  'vimeo',
  'store',
  'mail',
  'preferences',
  'maps',
  'password',
  'imgur',
  'flickr',
  'search',
  'subscription',
  'itunes',
  'siteindex',
  'events',
  'stop',
  'jobs',
  'careers',
  'newsletter',
  'subscribe',
  'academy',
  'shopping',
  'purchase',
  'site-map',
  'shop',
  'donate',
  'product',
  'advert',
  'info',
  'tickets',
  'coupons',
  'forum',
  'board',
  'archive',
  'browse',
  'howto',
  'how to',
  'faq',
  'terms',
  'charts',
  'services',
  'contact',
  'plus',
  'admin',
  'login',
  'signup',
  'register',
  'developer',
  'proxy',
] as const;

interface LinkCandidate {
  url: string;
  title: string;
}

function isSkippableHref(href: string): boolean {
  const lower = href.toLowerCase();
  return (
    !href ||
    href.startsWith('#') ||
    lower.startsWith('mailto:') ||
    lower.startsWith('tel:') ||
    lower.startsWith('javascript:')
  );
}

function containsDeniedWord(candidate: string): boolean {
  const path = getPath(candidate) || candidate;
  const { subdomain } = splitHost(getHostname(candidate));
  const conjunction = `${path} ${subdomain}`.toLowerCase();
  return CATEGORY_DENYLIST.some((word) => conjunction.includes(word));
}

/**
 * Section URLs linked from a site's homepage. Links on the same site (or a
 * subdomain naming the brand) contribute their host; relative links with a
 * single short path segment contribute that path. The root is always kept.
 */
export function findCategoryUrls($: CheerioAPI, sourceUrl: string): string[] {
  const source = splitHost(getHostname(sourceUrl));
  const sourceScheme = getScheme(sourceUrl) || 'http';
  const candidates: string[] = [];

  for (const element of $('a[href]').toArray()) {
    const rawHref = $(element).attr('href')?.trim() ?? '';
    if (isSkippableHref(rawHref)) continue;
    const href = rawHref.startsWith('//') ? `${sourceScheme}:${rawHref}` : rawHref;

    if (ABSOLUTE_URL.test(href)) {
      const scheme = getScheme(href);
      const hostname = getHostname(href);
      if (!hostname || (scheme !== 'http' && scheme !== 'https')) continue;

      const child = splitHost(hostname);
      const related =
        child.domain === source.domain ||
        child.subdomain.split('.').includes(source.domain);
      if (!related || MOBILE_SUBDOMAINS.has(child.subdomain)) continue;
      candidates.push(`${scheme}://${hostname}`);
      continue;
    }

    const path = href.split(/[?#]/)[0] ?? '';
    const chunks = path
      .split('/')
      .filter((chunk) => chunk.length > 0 && chunk !== 'index.html');
    const only = chunks[0];
    if (chunks.length === 1 && only && only.length < CATEGORY_LIMITS.MAX_SEGMENT_LENGTH) {
      candidates.push(path.startsWith('/') ? path : `/${path}`);
    }
  }

  const kept = candidates.filter(
    (candidate) => !containsDeniedWord(prepareUrl(candidate, sourceUrl))
  );
  kept.push('/');

  return dedupePreservingOrder(
    kept
      .map((candidate) => prepareUrl(candidate, sourceUrl))
      .filter((url) => url.length > 0)
  );
}

/** `<link type=application/rss+xml>` targets declared by a page. */
export function findFeedLinks($: CheerioAPI, pageUrl: string): string[] {
  const links: string[] = [];
  for (const element of $('link[href]').toArray()) {
    const $link = $(element);
    const type = $link.attr('type')?.trim().toLowerCase() ?? '';
    if (!FEED_TYPES.has(type)) continue;
    const url = prepareUrl($link.attr('href') ?? '', pageUrl);
    if (url) links.push(url);
  }
  return links;
}

/** Item links and titles of an RSS or Atom document. */
export function parseFeedItems(xml: string, feedUrl: string): LinkCandidate[] {
  const $ = cheerio.load(xml, { xml: true });
  const items: LinkCandidate[] = [];

  for (const element of $('item').toArray()) {
    const $item = $(element);
    const link = sanitizeText($item.children('link').first().text());
    const url = prepareUrl(link, feedUrl);
    if (url) items.push({ url, title: sanitizeText($item.children('title').first().text()) });
  }

  for (const element of $('entry').toArray()) {
    const $entry = $(element);
    const $links = $entry.children('link');
    const alternate = $links.filter('[rel="alternate"]').first().attr('href');
    const href = alternate ?? $links.first().attr('href') ?? '';
    const url = prepareUrl(href, feedUrl);
    if (url) items.push({ url, title: sanitizeText($entry.children('title').first().text()) });
  }

  return items;
}

function isFeedDocument(body: string): boolean {
  return FEED_DOCUMENT.test(body);
}

/**
 * A news site: its homepage, the sections and feeds linked from it, and
 * the articles those list.
 */
export class Source {
  readonly url: string;
  readonly domain: string;
  readonly scheme: string;
  readonly brand: string;
  readonly config: Configuration;

  html = '';
  description = '';
  favicon = '';
  categories: Category[] = [];
  feeds: Feed[] = [];
  articles: Article[] = [];

  private doc: CheerioAPI | null = null;
  private readonly cache: DocumentCache | undefined;
  private transport: Transport | undefined;

  constructor(
    url: string,
    options: ConfigurationOptions | Configuration = {},
    context: SourceContext = {}
  ) {
    this.url = validateSourceUrl(url);
    this.config = Configuration.from(options);
    this.domain = getHostname(this.url);
    this.scheme = getScheme(this.url);
    this.brand = splitHost(this.domain).domain;
    this.cache = context.cache;
    this.transport = context.transport;
  }

  async build(): Promise<void> {
    await this.download();
    this.parse();

    this.setCategories();
    await this.downloadCategories();
    this.parseCategories();

    await this.setFeeds();
    await this.downloadFeeds();

    await this.generateArticles();
    logInfo('Source built', {
      url: this.url,
      categories: this.categories.length,
      feeds: this.feeds.length,
      articles: this.articles.length,
    });
  }

  async download(): Promise<void> {
    this.html = await this.fetchText(this.url);
  }

  parse(): void {
    this.doc = cheerio.load(this.html);
    const metadata = extractMetadata(this.doc, this.url, this.config);
    this.description = metadata.metaDescription;
    this.favicon = metadata.metaFavicon;
  }

  setCategories(): void {
    if (!this.doc) {
      logWarn('setCategories() called before parse()', { url: this.url });
      this.categories = [];
      return;
    }
    this.categories = findCategoryUrls(this.doc, this.url).map((url) => ({
      url,
      html: '',
      doc: null,
    }));
  }

  async downloadCategories(): Promise<void> {
    const pages = await this.fetchAll(this.categories.map(({ url }) => url));
    this.categories.forEach((category, index) => {
      category.html = pages[index] ?? '';
    });
  }

  parseCategories(): void {
    for (const category of this.categories) {
      category.doc = category.html ? cheerio.load(category.html) : null;
    }
    this.categories = this.categories.filter((category) => category.doc !== null);
  }

  /**
   * Feeds declared by the categories plus the conventional `/feed`,
   * `/feeds` and `/rss` endpoints when they answer with a feed.
   */
  async setFeeds(): Promise<void> {
    const candidateUrls = FEED_PATHS.map((feedPath) => prepareUrl(feedPath, this.url));
    const pages = await this.fetchAll(candidateUrls);

    const urls: string[] = [];
    candidateUrls.forEach((candidateUrl, index) => {
      const body = pages[index] ?? '';
      if (!body) return;
      if (isFeedDocument(body)) {
        urls.push(candidateUrl);
        return;
      }
      urls.push(...findFeedLinks(cheerio.load(body), candidateUrl));
    });

    for (const category of this.categories) {
      if (category.doc) urls.push(...findFeedLinks(category.doc, category.url));
    }

    this.feeds = dedupePreservingOrder(urls)
      .slice(0, MAX_FEEDS)
      .map((url) => ({ url, rss: '' }));
  }

  async downloadFeeds(): Promise<void> {
    const bodies = await this.fetchAll(this.feeds.map(({ url }) => url));
    this.feeds.forEach((feed, index) => {
      feed.rss = bodies[index] ?? '';
    });
  }

  async generateArticles(limit: number = SOURCE_LIMITS.MAX_ARTICLES): Promise<void> {
    const candidates = [...this.feedCandidates(), ...this.categoryCandidates()];

    const unique = new Map<string, LinkCandidate>();
    for (const candidate of candidates) {
      if (!unique.has(candidate.url)) unique.set(candidate.url, candidate);
    }

    this.articles = [...unique.values()]
      .slice(0, limit)
      .map(
        ({ url, title }) =>
          new Article(url, this.config, {
            transport: this.transport,
            cache: this.cache,
            sourceUrl: this.url,
            title,
          })
      );
    await this.purgeArticles();
  }

  /**
   * Drops articles whose URL does not look like a story and, when
   * memoizing, those already in the document cache.
   */
  async purgeArticles(): Promise<void> {
    const before = this.articles.length;
    let kept = this.articles.filter((article) => isValidNewsUrl(article.url));

    const { cache } = this;
    if (this.config.memoizeArticles && cache) {
      const cached = await Promise.all(kept.map(async (article) => cache.has(article.url)));
      kept = kept.filter((_, index) => !cached[index]);
    }

    this.articles = kept;
    logDebug('Purged articles', {
      url: this.url,
      before,
      after: kept.length,
    });
  }

  async downloadArticles(
    threads: number = this.config.numberThreads,
    onProgress?: (completed: number, total: number) => void
  ): Promise<void> {
    await runWithConcurrency(
      threads,
      this.articles.map((article) => async () => article.download()),
      {
        onProgress: (completed, total) => {
          logDebug('Article download progress', { url: this.url, completed, total });
          onProgress?.(completed, total);
        },
      }
    );
    const failed = this.articles.filter((article) => article.downloadError !== null);
    if (failed.length > 0) {
      logWarn('Some articles failed to download', {
        url: this.url,
        failed: failed.length,
        total: this.articles.length,
      });
    }
  }

  parseArticles(): void {
    for (const article of this.articles) {
      article.parse();
    }
    this.articles = this.articles.filter((article) => article.isValidBody());
  }

  size(): number {
    return this.articles.length;
  }

  categoryUrls(): string[] {
    return this.categories.map(({ url }) => url);
  }

  feedUrls(): string[] {
    return this.feeds.map(({ url }) => url);
  }

  articleUrls(): string[] {
    return this.articles.map(({ url }) => url);
  }

  async cleanMemoCache(): Promise<void> {
    await this.cache?.clear();
  }

  private feedCandidates(): LinkCandidate[] {
    return this.feeds.flatMap((feed) =>
      feed.rss ? parseFeedItems(feed.rss, feed.url) : []
    );
  }

  private categoryCandidates(): LinkCandidate[] {
    const candidates: LinkCandidate[] = [];
    for (const { doc, url } of this.categories) {
      if (!doc) continue;
      for (const element of doc('a[href]').toArray()) {
        const $anchor = doc(element);
        const articleUrl = prepareUrl($anchor.attr('href') ?? '', url);
        if (articleUrl) {
          candidates.push({ url: articleUrl, title: sanitizeText($anchor.text()) });
        }
      }
    }
    return candidates;
  }

  private async fetchAll(urls: string[]): Promise<string[]> {
    const results = await runWithConcurrency(
      this.config.numberThreads,
      urls.map((url) => async () => this.fetchText(url))
    );
    return results.map((result) => (result.status === 'fulfilled' ? result.value : ''));
  }

  private async fetchText(url: string): Promise<string> {
    this.transport ??= new HttpTransport();
    try {
      const response = await this.transport.fetch(url, {
        timeoutMs: this.config.requestTimeoutMs,
        userAgent: this.config.userAgent,
        proxy: this.config.proxy,
        httpSuccessOnly: this.config.httpSuccessOnly,
      });
      const charset = getCharsetFromContentType(
        readHeader(response.headers, 'content-type')
      );
      return decodeHtml(response.body, charset);
    } catch (error) {
      logWarn('Source page download failed', { url, error: getErrorMessage(error) });
      return '';
    }
  }
}

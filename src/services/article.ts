import * as cheerio from 'cheerio';

import {
  Configuration,
  type ConfigurationOptions,
} from '../config/configuration.js';
import type {
  ExtractedArticle,
  KeywordScore,
  MetaNamespace,
  Transport,
  TransportResponse,
} from '../config/types.js';

import { ArticleException } from '../errors/app-error.js';

import { decodeHtml, getCharsetFromContentType } from '../utils/encoding.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { readHeader } from '../utils/headers.js';
import { countWords, splitSentences } from '../utils/text.js';
import { isValidNewsUrl, prepareUrl, resolveUrl } from '../utils/urls.js';

import type { DocumentCache } from './cache.js';
import { emptyArticle, extractArticle } from './extractor.js';
import { HttpTransport } from './fetcher.js';
import { logDebug, logWarn } from './logger.js';
import { analyzeText } from './nlp.js';
import { resolveStopwords, type StopwordSet } from './stopwords.js';

export const DownloadState = {
  NotStarted: 'not_started',
  Attempted: 'attempted',
} as const;
export type DownloadState = (typeof DownloadState)[keyof typeof DownloadState];

export const ParseState = {
  NotParsed: 'not_parsed',
  Parsed: 'parsed',
} as const;
export type ParseState = (typeof ParseState)[keyof typeof ParseState];

export const NlpState = {
  NotRun: 'not_run',
  Run: 'run',
} as const;
export type NlpState = (typeof NlpState)[keyof typeof NlpState];

export interface ArticleContext {
  transport?: Transport;
  cache?: DocumentCache;
  /** Site the article was discovered on; relative URLs resolve against it. */
  sourceUrl?: string;
  /** Used when extraction finds no title, e.g. the feed item title. */
  title?: string;
}

const MEDIA_PATH_HINTS = [
  '/video',
  '/slide',
  '/gallery',
  '/powerpoint',
  '/fashion',
  '/glamour',
  '/cloth',
] as const;

const REFRESH_URL = /url\s*=\s*['"]?([^'"\s;]+)/i;

function isTransportResponse(
  input: string | TransportResponse | undefined
): input is TransportResponse {
  return typeof input === 'object';
}

function findMetaRefresh(html: string, baseUrl: string): string {
  const $ = cheerio.load(html);
  for (const element of $('meta[http-equiv]').toArray()) {
    const $meta = $(element);
    if ($meta.attr('http-equiv')?.trim().toLowerCase() !== 'refresh') continue;
    const target = REFRESH_URL.exec($meta.attr('content') ?? '')?.[1];
    if (target) return resolveUrl(target, baseUrl);
  }
  return '';
}

/**
 * One URL's trip through download, parse and nlp. Stages only move
 * forward: parse needs a download attempt, nlp needs a parse, and calling
 * a finished stage again changes nothing. Network trouble never throws;
 * it leaves `html` empty and records `downloadError`.
 */
export class Article {
  readonly originalUrl: string;
  readonly url: string;
  readonly sourceUrl: string;
  readonly config: Configuration;

  private readonly cache: DocumentCache | undefined;
  private readonly titleHint: string;
  private transport: Transport | undefined;

  private downloadStateValue: DownloadState = DownloadState.NotStarted;
  private parseStateValue: ParseState = ParseState.NotParsed;
  private nlpStateValue: NlpState = NlpState.NotRun;

  private htmlValue = '';
  private finalUrlValue = '';
  private downloadErrorValue: string | null = null;
  private fields: ExtractedArticle = emptyArticle();
  private summaryValue = '';
  private keywordScoresValue: KeywordScore[] = [];
  private languageValue: string;
  private stopwords: StopwordSet;

  constructor(
    url: string,
    options: ConfigurationOptions | Configuration = {},
    context: ArticleContext = {}
  ) {
    this.config = Configuration.from(options);
    this.originalUrl = url;
    this.sourceUrl = context.sourceUrl ?? '';
    this.url = prepareUrl(url, this.sourceUrl);
    this.transport = context.transport;
    this.cache = context.cache;
    this.titleHint = context.title?.trim() ?? '';
    this.languageValue = this.config.baseLanguage;
    this.stopwords = resolveStopwords(this.languageValue);
  }

  get downloadState(): DownloadState {
    return this.downloadStateValue;
  }

  get parseState(): ParseState {
    return this.parseStateValue;
  }

  get nlpState(): NlpState {
    return this.nlpStateValue;
  }

  get isDownloaded(): boolean {
    return this.downloadStateValue === DownloadState.Attempted;
  }

  get isParsed(): boolean {
    return this.parseStateValue === ParseState.Parsed;
  }

  /** Language of the stopword set in use. */
  get language(): string {
    return this.languageValue;
  }

  get html(): string {
    return this.htmlValue;
  }

  /** URL the content was finally served from, after redirects. */
  get finalUrl(): string {
    return this.finalUrlValue;
  }

  get downloadError(): string | null {
    return this.downloadErrorValue;
  }

  get title(): string {
    return this.fields.title;
  }

  get authors(): string[] {
    return this.fields.authors;
  }

  get publishDate(): Date | null {
    return this.fields.publishDate;
  }

  get topImage(): string | null {
    return this.fields.topImage;
  }

  get images(): string[] {
    return this.fields.images;
  }

  get movies(): string[] {
    return this.fields.movies;
  }

  get text(): string {
    return this.fields.text;
  }

  get articleHtml(): string {
    return this.fields.articleHtml;
  }

  get metaData(): MetaNamespace {
    return this.fields.metaData;
  }

  get metaLang(): string {
    return this.fields.metaLang;
  }

  get metaDescription(): string {
    return this.fields.metaDescription;
  }

  get metaKeywords(): string[] {
    return this.fields.metaKeywords;
  }

  get metaSiteName(): string {
    return this.fields.metaSiteName;
  }

  get metaFavicon(): string {
    return this.fields.metaFavicon;
  }

  get metaType(): string {
    return this.fields.metaType;
  }

  get canonicalLink(): string {
    return this.fields.canonicalLink;
  }

  get summary(): string {
    return this.summaryValue;
  }

  get keywords(): string[] {
    return this.keywordScoresValue.map(({ keyword }) => keyword);
  }

  get keywordScores(): KeywordScore[] {
    return this.keywordScoresValue;
  }

  /**
   * Fetches `url` (this article's URL by default) or takes an already
   * fetched response as is.
   */
  async download(input?: string | TransportResponse): Promise<void> {
    if (this.isDownloaded) return;

    const response = isTransportResponse(input)
      ? input
      : await this.fetchResponse(input ?? this.url);

    if (response) {
      this.applyResponse(response);
      if (this.config.followMetaRefresh) await this.followMetaRefresh();
    }

    this.downloadStateValue = DownloadState.Attempted;
  }

  parse(): void {
    if (!this.isDownloaded) {
      throw new ArticleException(
        `You must download() an article before calling parse(): ${this.url}`,
        this.url
      );
    }
    if (this.isParsed) return;

    const fields = extractArticle(this.htmlValue, this.url, this.config);
    this.fields = fields.title ? fields : { ...fields, title: this.titleHint };

    if (this.config.useMetaLanguage && fields.metaLang) {
      this.switchLanguage(fields.metaLang);
    }

    this.parseStateValue = ParseState.Parsed;
  }

  nlp(): void {
    if (!this.isParsed) {
      throw new ArticleException(
        `You must parse() an article before calling nlp(): ${this.url}`,
        this.url
      );
    }
    if (this.nlpStateValue === NlpState.Run) return;

    const result = analyzeText(this.text, this.title, this.stopwords, this.config);
    this.keywordScoresValue = result.keywords;
    this.summaryValue = result.summary;
    this.nlpStateValue = NlpState.Run;
  }

  /** download, parse and nlp in one call. */
  async build(): Promise<void> {
    await this.download();
    this.parse();
    this.nlp();
  }

  isValidUrl(): boolean {
    return isValidNewsUrl(this.url);
  }

  isMediaNews(): boolean {
    return MEDIA_PATH_HINTS.some((hint) => this.url.includes(hint));
  }

  /**
   * Whether the parsed body looks like a real article rather than an index
   * or stub page.
   */
  isValidBody(): boolean {
    if (!this.isParsed) {
      throw new ArticleException(
        `You must parse() an article before checking its body: ${this.url}`,
        this.url
      );
    }

    const words = countWords(this.text);
    if (this.metaType === 'article' && words > this.config.minWordCount) {
      return true;
    }
    if (!this.isMediaNews() && !this.text) return false;
    if (countWords(this.title) < 2) return false;
    if (words < this.config.minWordCount) return false;
    if (splitSentences(this.text).length < this.config.minSentenceCount) {
      return false;
    }
    return this.htmlValue.length > 0;
  }

  private switchLanguage(language: string): void {
    if (language === this.languageValue) return;
    logDebug('Switching stopwords to meta language', {
      url: this.url,
      from: this.languageValue,
      to: language,
    });
    this.languageValue = language;
    this.stopwords = resolveStopwords(language);
  }

  private applyResponse(response: TransportResponse): void {
    const charset = getCharsetFromContentType(
      readHeader(response.headers, 'content-type')
    );
    this.htmlValue = decodeHtml(response.body, charset);
    this.finalUrlValue = response.url || this.url;
    this.downloadErrorValue = null;
  }

  private async followMetaRefresh(): Promise<void> {
    const base = this.finalUrlValue || this.url;
    const target = findMetaRefresh(this.htmlValue, base);
    if (!target || target === base) return;

    logDebug('Following meta refresh', { url: this.url, target });
    const response = await this.fetchResponse(target);
    if (response) this.applyResponse(response);
  }

  private async fetchResponse(url: string): Promise<TransportResponse | null> {
    const useCache = this.config.memoizeArticles && this.cache !== undefined;
    if (useCache) {
      const cached = await this.cache?.get(url);
      if (cached) {
        logDebug('Serving article from cache', { url });
        return cached.response;
      }
    }

    this.transport ??= new HttpTransport();
    try {
      const response = await this.transport.fetch(url, {
        timeoutMs: this.config.requestTimeoutMs,
        userAgent: this.config.userAgent,
        proxy: this.config.proxy,
        httpSuccessOnly: this.config.httpSuccessOnly,
      });
      if (useCache) await this.cache?.set(url, response);
      return response;
    } catch (error) {
      this.htmlValue = '';
      this.downloadErrorValue = getErrorMessage(error);
      logWarn('Article download failed', {
        url,
        error: this.downloadErrorValue,
      });
      return null;
    }
  }
}

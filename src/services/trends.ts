import { readFile } from 'node:fs/promises';

import * as cheerio from 'cheerio';
import { z } from 'zod';

import {
  Configuration,
  type ConfigurationOptions,
} from '../config/configuration.js';
import type { Transport } from '../config/types.js';

import { decodeHtml, getCharsetFromContentType } from '../utils/encoding.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { readHeader } from '../utils/headers.js';
import { dedupePreservingOrder, sanitizeText } from '../utils/sanitizer.js';

import { logWarn } from './logger.js';

export const TRENDING_FEED_URL =
  'https://trends.google.com/trending/rss?geo=US';

const POPULAR_SOURCES_FILE = new URL(
  '../../data/popular-sources.json',
  import.meta.url
);

const popularSourcesSchema = z.array(z.string().url());

export interface TrendsServiceOptions {
  feedUrl?: string;
}

/** Trending search terms and a bundled list of well-known news sites. */
export class TrendsService {
  private readonly transport: Transport;
  private readonly config: Configuration;
  private readonly feedUrl: string;

  constructor(
    transport: Transport,
    options: ConfigurationOptions | Configuration = {},
    serviceOptions: TrendsServiceOptions = {}
  ) {
    this.transport = transport;
    this.config = Configuration.from(options);
    this.feedUrl = serviceOptions.feedUrl ?? TRENDING_FEED_URL;
  }

  /** Titles of the trending feed's items; empty when the feed is unreachable. */
  async hot(): Promise<string[]> {
    try {
      const response = await this.transport.fetch(this.feedUrl, {
        timeoutMs: this.config.requestTimeoutMs,
        userAgent: this.config.userAgent,
        proxy: this.config.proxy,
        httpSuccessOnly: this.config.httpSuccessOnly,
      });
      const xml = decodeHtml(
        response.body,
        getCharsetFromContentType(readHeader(response.headers, 'content-type'))
      );
      const $ = cheerio.load(xml, { xml: true });
      const titles = $('item > title')
        .toArray()
        .map((element) => sanitizeText($(element).text()))
        .filter((title) => title.length > 0);
      return dedupePreservingOrder(titles);
    } catch (error) {
      logWarn('Trending feed unavailable', {
        url: this.feedUrl,
        error: getErrorMessage(error),
      });
      return [];
    }
  }

  async popularUrls(): Promise<string[]> {
    const raw = await readFile(POPULAR_SOURCES_FILE, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    return popularSourcesSchema.parse(parsed);
  }
}

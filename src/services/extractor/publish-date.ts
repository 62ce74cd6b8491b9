import type { CheerioAPI } from 'cheerio';

import { getPath } from '../../utils/urls.js';

interface DateSource {
  attribute: 'property' | 'name' | 'itemprop';
  value: string;
  content: 'content' | 'datetime';
}

const DATE_SOURCES: readonly DateSource[] = [
  { attribute: 'property', value: 'rnews:datePublished', content: 'content' },
  {
    attribute: 'property',
    value: 'article:published_time',
    content: 'content',
  },
  { attribute: 'name', value: 'OriginalPublicationDate', content: 'content' },
  { attribute: 'itemprop', value: 'datePublished', content: 'datetime' },
  { attribute: 'itemprop', value: 'datePublished', content: 'content' },
  { attribute: 'property', value: 'og:published_time', content: 'content' },
  { attribute: 'name', value: 'article_date_original', content: 'content' },
  { attribute: 'name', value: 'publication_date', content: 'content' },
  { attribute: 'name', value: 'sailthru.date', content: 'content' },
  { attribute: 'name', value: 'PublishDate', content: 'content' },
  { attribute: 'name', value: 'pubdate', content: 'content' },
  { attribute: 'name', value: 'date', content: 'content' },
];

const PATH_DATE = /\/((?:19|20)\d{2})\/(\d{1,2})\/(\d{1,2})(?:\/|$)/;

function parseDate(value: string): Date | null {
  const timestamp = Date.parse(value.trim());
  return Number.isNaN(timestamp) ? null : new Date(timestamp);
}

function dateFromPath(url: string): Date | null {
  const match = PATH_DATE.exec(getPath(url));
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2013/02/31 over into March; reject instead.
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Publication date from the first parseable meta tag in priority order,
 * else from a `/YYYY/MM/DD/` segment of the URL path.
 */
export function extractPublishDate($: CheerioAPI, url: string): Date | null {
  for (const source of DATE_SOURCES) {
    const selector = `[${source.attribute}="${source.value}"]`;
    for (const element of $(selector).toArray()) {
      const raw = $(element).attr(source.content);
      if (!raw) continue;
      const date = parseDate(raw);
      if (date) return date;
    }
  }
  return dateFromPath(url);
}

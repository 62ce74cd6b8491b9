import * as cheerio from 'cheerio';

import type { Configuration } from '../config/configuration.js';
import { SIZE_LIMITS } from '../config/constants.js';
import type { ExtractedArticle } from '../config/types.js';

import { cleanDocument } from './document-cleaner.js';
import { extractAuthors } from './extractor/authors.js';
import { extractBody } from './extractor/body.js';
import {
  extractImages,
  extractMetaImage,
  extractMovies,
  extractTopImage,
  getDocumentBase,
} from './extractor/media.js';
import { extractPublishDate } from './extractor/publish-date.js';
import { extractTitle } from './extractor/title.js';
import { logError, logWarn } from './logger.js';
import { extractMetadata } from './metadata-collector.js';

type ExtractionSettings = Pick<
  Configuration,
  | 'maxTitle'
  | 'maxText'
  | 'maxKeywords'
  | 'maxAuthors'
  | 'fetchImages'
  | 'keepArticleHtml'
  | 'densityDecay'
  | 'minBodyScore'
  | 'minWordsPerBlock'
>;

export function emptyArticle(): ExtractedArticle {
  return {
    title: '',
    authors: [],
    publishDate: null,
    topImage: null,
    images: [],
    movies: [],
    text: '',
    articleHtml: '',
    metaData: {},
    metaLang: '',
    metaDescription: '',
    metaKeywords: [],
    metaSiteName: '',
    metaFavicon: '',
    metaType: '',
    canonicalLink: '',
  };
}

function truncateHtml(html: string): string {
  if (html.length <= SIZE_LIMITS.TEN_MB) return html;
  logWarn('HTML exceeds size limit, truncating', {
    length: html.length,
    limit: SIZE_LIMITS.TEN_MB,
  });
  return html.substring(0, SIZE_LIMITS.TEN_MB);
}

function extractFields(
  html: string,
  url: string,
  settings: ExtractionSettings
): ExtractedArticle {
  const raw = cheerio.load(html);
  const cleaned = cleanDocument(html);
  const baseUrl = getDocumentBase(raw, url);

  const metadata = extractMetadata(raw, url, settings);
  const body = extractBody(cleaned, settings);
  const metaImage = extractMetaImage(raw, baseUrl);
  const topImage =
    metaImage ||
    (settings.fetchImages
      ? extractTopImage(cleaned, body.root, baseUrl)
      : null);

  return {
    ...metadata,
    title: extractTitle(raw, settings.maxTitle),
    authors: extractAuthors(raw, settings.maxAuthors),
    publishDate: extractPublishDate(raw, url),
    topImage: topImage || null,
    images: extractImages(raw, baseUrl, metaImage),
    movies: extractMovies(raw, baseUrl),
    text: body.text,
    articleHtml: body.articleHtml,
  };
}

/**
 * Every structured field of one HTML document. Pure: the same html, url
 * and settings always produce an equal result. Empty html, or a document
 * the extractors choke on, yields the empty article.
 */
export function extractArticle(
  html: string,
  url: string,
  settings: ExtractionSettings
): ExtractedArticle {
  if (!html.trim()) return emptyArticle();

  try {
    return extractFields(truncateHtml(html), url, settings);
  } catch (error) {
    logError(
      'Failed to extract article',
      error instanceof Error ? error : { url }
    );
    return emptyArticle();
  }
}

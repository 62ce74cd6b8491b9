import {
  Configuration,
  type ConfigurationOptions,
} from './config/configuration.js';

import { DocumentCache } from './services/cache.js';
import { cleanDocument } from './services/document-cleaner.js';
import { extractBody } from './services/extractor/body.js';
import { Source, type SourceContext } from './services/source.js';
import { supportedLanguages as listStopwordLanguages } from './services/stopwords.js';

export { Configuration, type ConfigurationOptions } from './config/configuration.js';
export type {
  CacheEntry,
  ExtractedArticle,
  ExtractedMetadata,
  KeywordScore,
  MetaNamespace,
  MetaValue,
  Transport,
  TransportRequestOptions,
  TransportResponse,
} from './config/types.js';
export {
  AppError,
  ArticleException,
  ConfigurationError,
  FetchError,
  UrlValidationError,
} from './errors/app-error.js';
export {
  Article,
  DownloadState,
  NlpState,
  ParseState,
  type ArticleContext,
} from './services/article.js';
export { DocumentCache, type DocumentCacheOptions } from './services/cache.js';
export { HttpTransport, type HttpTransportOptions } from './services/fetcher.js';
export {
  NewsPool,
  type NewsPoolJob,
  type NewsPoolReport,
} from './services/news-pool.js';
export {
  Source,
  type Category,
  type Feed,
  type SourceContext,
} from './services/source.js';
export { TrendsService, type TrendsServiceOptions } from './services/trends.js';
export { isValidNewsUrl, prepareUrl } from './utils/urls.js';

/**
 * Builds a `Source` for `url`. When memoizing without an injected cache, a
 * `DocumentCache` under `memoDirectory` remembers what was already fetched.
 */
export async function build(
  url: string,
  options: ConfigurationOptions | Configuration = {},
  context: SourceContext = {}
): Promise<Source> {
  const config = Configuration.from(options);
  const cache =
    context.cache ??
    (config.memoizeArticles
      ? new DocumentCache({
          directory: config.memoDirectory,
          maxEntries: config.maxFileMemo,
        })
      : undefined);

  const source = new Source(url, config, { ...context, cache });
  await source.build();
  return source;
}

/** Body text of an HTML document. */
export function fulltext(html: string, language?: string): string {
  const config = new Configuration(language ? { language } : {});
  if (!html.trim()) return '';
  return extractBody(cleanDocument(html), config).text;
}

/** Language codes with a stopword list. */
export function supportedLanguages(): string[] {
  return listStopwordLanguages();
}

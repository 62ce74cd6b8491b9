/** A `<meta>` value: a leaf string or a namespace of nested values. */
export type MetaValue = string | MetaNamespace;

export interface MetaNamespace {
  [key: string]: MetaValue;
}

export interface TransportRequestOptions {
  timeoutMs: number;
  userAgent: string;
  proxy?: string | undefined;
  httpSuccessOnly?: boolean;
  signal?: AbortSignal;
}

export interface TransportResponse {
  /** Final URL after redirects. */
  url: string;
  status: number;
  headers: Record<string, string>;
  body: Uint8Array | string;
}

/**
 * HTTP capability. Implementations reject with `FetchError`.
 */
export interface Transport {
  fetch(url: string, options: TransportRequestOptions): Promise<TransportResponse>;
}

export interface ExtractedMetadata {
  metaData: MetaNamespace;
  metaLang: string;
  metaDescription: string;
  metaKeywords: string[];
  metaSiteName: string;
  metaFavicon: string;
  metaType: string;
  canonicalLink: string;
}

export interface ExtractedArticle extends ExtractedMetadata {
  title: string;
  authors: string[];
  publishDate: Date | null;
  topImage: string | null;
  images: string[];
  movies: string[];
  text: string;
  articleHtml: string;
}

export interface KeywordScore {
  keyword: string;
  score: number;
}

export interface CacheEntry {
  url: string;
  fetchedAt: string;
  fetchedAtMs: number;
  response: TransportResponse;
}

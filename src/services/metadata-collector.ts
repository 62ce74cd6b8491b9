import type { CheerioAPI } from 'cheerio';

import type {
  ExtractedMetadata,
  MetaNamespace,
  MetaValue,
} from '../config/types.js';

import { resolveUrl } from '../utils/urls.js';

// Key under which a leaf is kept when a namespace of the same name exists.
const LEAF_KEY = 'identifier';

const LANGUAGE_PATTERN = /^[A-Za-z]{2}$/;

// Segments that would reach object internals instead of a namespace.
const UNSAFE_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

export interface MetadataOptions {
  maxKeywords: number;
}

function isNamespace(value: MetaValue | undefined): value is MetaNamespace {
  return typeof value === 'object';
}

function ownValue(node: MetaNamespace, key: string): MetaValue | undefined {
  return Object.hasOwn(node, key) ? node[key] : undefined;
}

function descend(node: MetaNamespace, segment: string): MetaNamespace {
  const existing = ownValue(node, segment);
  if (isNamespace(existing)) return existing;

  const namespace: MetaNamespace = {};
  if (existing !== undefined) namespace[LEAF_KEY] = existing;
  node[segment] = namespace;
  return namespace;
}

function insertLeaf(root: MetaNamespace, key: string, value: string): void {
  const segments = key
    .split(':')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
  if (segments.some((segment) => UNSAFE_SEGMENTS.has(segment))) return;
  const leafKey = segments.pop();
  if (leafKey === undefined) return;

  let node = root;
  for (const segment of segments) {
    node = descend(node, segment);
  }

  const existing = ownValue(node, leafKey);
  if (isNamespace(existing)) {
    existing[LEAF_KEY] = value;
  } else {
    node[leafKey] = value;
  }
}

/**
 * Nested view of every `<meta>` tag. `og:image:width` lands at
 * `tree.og.image.width`; later duplicates overwrite earlier leaves.
 */
export function buildMetaTree($: CheerioAPI): MetaNamespace {
  const root: MetaNamespace = {};

  for (const element of $('meta').toArray()) {
    const $meta = $(element);
    const key = $meta.attr('property') ?? $meta.attr('name');
    const value = ($meta.attr('content') ?? $meta.attr('value'))?.trim();
    if (!key || !value) continue;
    insertLeaf(root, key.trim(), value);
  }

  return root;
}

/** Trimmed `content` of the first matching `<meta>` with any content. */
export function getMetaContent($: CheerioAPI, selector: string): string {
  for (const element of $(selector).toArray()) {
    const content = $(element).attr('content')?.trim();
    if (content) return content;
  }
  return '';
}

function openGraph($: CheerioAPI, field: string): string {
  return getMetaContent(
    $,
    `meta[property="og:${field}"], meta[name="og:${field}"]`
  );
}

function httpEquivContent($: CheerioAPI, name: string): string {
  for (const element of $('meta[http-equiv]').toArray()) {
    const $meta = $(element);
    if ($meta.attr('http-equiv')?.trim().toLowerCase() !== name) continue;
    const content = $meta.attr('content')?.trim();
    if (content) return content;
  }
  return '';
}

function normalizeLanguage(candidate: string): string {
  const prefix = candidate.trim().slice(0, 2);
  return LANGUAGE_PATTERN.test(prefix) ? prefix.toLowerCase() : '';
}

export function extractMetaLang($: CheerioAPI): string {
  const candidates = [
    $('html').attr('lang') ?? '',
    httpEquivContent($, 'content-language'),
    getMetaContent($, 'meta[name="lang"]'),
    openGraph($, 'locale'),
  ];

  for (const candidate of candidates) {
    const language = normalizeLanguage(candidate);
    if (language) return language;
  }
  return '';
}

function extractKeywords($: CheerioAPI, maxKeywords: number): string[] {
  const content = getMetaContent($, 'meta[name="keywords"]');
  if (!content) return [];
  return content
    .split(',')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0)
    .slice(0, maxKeywords);
}

function extractLinkHref(
  $: CheerioAPI,
  selector: string,
  baseUrl: string
): string {
  const href = $(selector).first().attr('href')?.trim();
  if (!href) return '';
  return resolveUrl(href, baseUrl);
}

export function extractCanonicalLink($: CheerioAPI, baseUrl: string): string {
  const canonical = extractLinkHref($, 'link[rel="canonical"]', baseUrl);
  if (canonical) return canonical;

  const ogUrl = openGraph($, 'url');
  return ogUrl ? resolveUrl(ogUrl, baseUrl) : '';
}

export function extractMetadata(
  $: CheerioAPI,
  url: string,
  options: MetadataOptions
): ExtractedMetadata {
  return {
    metaData: buildMetaTree($),
    metaLang: extractMetaLang($),
    metaDescription:
      getMetaContent($, 'meta[name="description"]') ||
      openGraph($, 'description'),
    metaKeywords: extractKeywords($, options.maxKeywords),
    metaSiteName: openGraph($, 'site_name'),
    metaFavicon: extractLinkHref($, 'link[rel~="icon"]', url),
    metaType: openGraph($, 'type'),
    canonicalLink: extractCanonicalLink($, url),
  };
}

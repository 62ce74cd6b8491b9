import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import { IMAGE_LIMITS } from '../../config/constants.js';

import { dedupePreservingOrder } from '../../utils/sanitizer.js';
import { getHostname, resolveUrl } from '../../utils/urls.js';

import { getMetaContent } from '../metadata-collector.js';

const VIDEO_HOSTS = [
  'youtube.com',
  'youtu.be',
  'youtube-nocookie.com',
  'vimeo.com',
  'dailymotion.com',
  'kewego.com',
  'twitch.tv',
] as const;

const AD_HOSTS = [
  'doubleclick.net',
  'googlesyndication.com',
  'adservice.google.com',
  'amazon-adsystem.com',
  'adnxs.com',
  'taboola.com',
  'outbrain.com',
  'scorecardresearch.com',
] as const;

const MOVIE_SELECTOR =
  'iframe[src], embed[src], object[data], video[src], video source[src]';

function matchesHost(hostname: string, host: string): boolean {
  return hostname === host || hostname.endsWith(`.${host}`);
}

export function isVideoUrl(url: string): boolean {
  const hostname = getHostname(url.startsWith('//') ? `https:${url}` : url);
  if (!hostname) return false;
  if (VIDEO_HOSTS.some((host) => matchesHost(hostname, host))) return true;
  return matchesHost(hostname, 'facebook.com') && /video/i.test(url);
}

function isAdUrl(url: string): boolean {
  const hostname = getHostname(url);
  return AD_HOSTS.some((host) => matchesHost(hostname, host));
}

/** `<base href>` when the document declares one, else the page URL. */
export function getDocumentBase($: CheerioAPI, url: string): string {
  const href = $('base[href]').first().attr('href')?.trim();
  if (!href) return url;
  return resolveUrl(href, url) || url;
}

function readDimension(value: string | undefined): number | null {
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

function isTrackingPixel($img: Cheerio<Element>): boolean {
  const width = readDimension($img.attr('width'));
  const height = readDimension($img.attr('height'));
  return (
    (width !== null && width < IMAGE_LIMITS.MIN_DIMENSION) ||
    (height !== null && height < IMAGE_LIMITS.MIN_DIMENSION)
  );
}

function readImageSource($img: Cheerio<Element>, baseUrl: string): string {
  const src = $img.attr('src')?.trim();
  if (!src || src.startsWith('data:')) return '';
  return resolveUrl(src, baseUrl);
}

/** `og:image`, `twitter:image` or `link[rel=image_src]`, resolved. */
export function extractMetaImage($: CheerioAPI, baseUrl: string): string {
  const candidate =
    getMetaContent($, 'meta[property="og:image"], meta[name="og:image"]') ||
    getMetaContent(
      $,
      'meta[name="twitter:image"], meta[property="twitter:image"]'
    ) ||
    ($('link[rel="image_src"]').first().attr('href')?.trim() ?? '');

  return candidate ? resolveUrl(candidate, baseUrl) : '';
}

/**
 * Every `<img src>` on the page that is not a tracking pixel, in document
 * order, followed by the meta image when it was not already seen.
 */
export function extractImages(
  $: CheerioAPI,
  baseUrl: string,
  metaImage: string
): string[] {
  const urls: string[] = [];
  for (const element of $('img[src]').toArray()) {
    const $img = $(element);
    if (isTrackingPixel($img)) continue;
    const src = readImageSource($img, baseUrl);
    if (src) urls.push(src);
  }
  if (metaImage) urls.push(metaImage);
  return dedupePreservingOrder(urls);
}

/**
 * Largest declared image inside the body root. Images without dimensions
 * score zero; the first of equal scores wins.
 */
export function extractTopImage(
  $: CheerioAPI,
  root: Element | null,
  baseUrl: string
): string | null {
  if (!root) return null;

  let best: string | null = null;
  let bestArea = -1;
  for (const element of $(root).find('img[src]').toArray()) {
    const $img = $(element);
    if (isTrackingPixel($img)) continue;
    const src = readImageSource($img, baseUrl);
    if (!src || isAdUrl(src)) continue;

    const area =
      (readDimension($img.attr('width')) ?? 0) *
      (readDimension($img.attr('height')) ?? 0);
    if (area > bestArea) {
      best = src;
      bestArea = area;
    }
  }
  return best;
}

export function extractMovies($: CheerioAPI, baseUrl: string): string[] {
  const urls: string[] = [];
  for (const element of $(MOVIE_SELECTOR).toArray()) {
    const $element = $(element);
    const raw = ($element.attr('src') ?? $element.attr('data'))?.trim();
    if (!raw) continue;
    const resolved = resolveUrl(raw, baseUrl);
    if (resolved && isVideoUrl(resolved)) urls.push(resolved);
  }
  return dedupePreservingOrder(urls);
}

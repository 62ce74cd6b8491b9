import { UrlValidationError } from '../errors/app-error.js';

const ALLOWED_FILE_TYPES = new Set([
  'html',
  'htm',
  'md',
  'rst',
  'aspx',
  'jsp',
  'rhtml',
  'cgi',
  'xhtml',
  'jhtml',
  'asp',
  'shtml',
  'php',
]);

const GOOD_PATH_SEGMENTS = new Set([
  'story',
  'article',
  'feature',
  'featured',
  'slides',
  'slideshow',
  'gallery',
  'news',
  'video',
  'media',
  'v',
  'radio',
  'press',
]);

const BAD_PATH_SEGMENTS = new Set([
  'careers',
  'contact',
  'about',
  'faq',
  'terms',
  'privacy',
  'advert',
  'preferences',
  'feedback',
  'info',
  'browse',
  'howto',
  'account',
  'subscribe',
  'donate',
  'shop',
  'admin',
]);

const BAD_DOMAINS = new Set(['amazon', 'doubleclick', 'twitter']);

// Second-level labels under which registrations happen (example.co.uk).
const SECOND_LEVEL_LABELS = new Set([
  'co',
  'com',
  'org',
  'net',
  'ac',
  'gov',
  'edu',
  'ne',
  'or',
]);

const PATH_DATE_PATTERN =
  /(?:^|\/)(?:19|20)\d{2}[/\-_.]?(?:[0-3]?\d|[a-z]{3,5})[/\-_.](?:[0-3]?\d)?/i;

export interface HostParts {
  subdomain: string;
  domain: string;
  suffix: string;
}

function parseUrl(url: string, base?: string): URL | null {
  try {
    return new URL(url, base || undefined);
  } catch {
    return null;
  }
}

/**
 * Absolute form of `url` (resolved against `baseUrl` when relative) with
 * query string and fragment removed. Empty string when unparsable.
 */
export function prepareUrl(url: string, baseUrl?: string): string {
  const parsed = parseUrl(url.trim(), baseUrl);
  if (!parsed) return '';
  parsed.search = '';
  parsed.hash = '';
  return parsed.href;
}

export function resolveUrl(url: string, baseUrl: string): string {
  return parseUrl(url.trim(), baseUrl)?.href ?? '';
}

export function isHttpUrl(url: string): boolean {
  const parsed = parseUrl(url);
  return parsed !== null && /^https?:$/.test(parsed.protocol);
}

export function validateSourceUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) {
    throw new UrlValidationError('Source URL must not be empty', url);
  }
  if (!isHttpUrl(trimmed)) {
    throw new UrlValidationError(`Not an http(s) URL: ${trimmed}`, url);
  }
  return prepareUrl(trimmed);
}

export function getHostname(url: string): string {
  return parseUrl(url)?.hostname ?? '';
}

export function getScheme(url: string): string {
  return parseUrl(url)?.protocol.replace(/:$/, '') ?? '';
}

export function getPath(url: string): string {
  return parseUrl(url)?.pathname ?? '';
}

/**
 * Splits a hostname into subdomain, registrable label and public suffix,
 * treating common second-level labels (`co.uk`, `com.au`) as part of the
 * suffix.
 */
export function splitHost(hostname: string): HostParts {
  const labels = hostname.toLowerCase().replace(/\.$/, '').split('.');
  if (labels.length < 2) {
    return { subdomain: '', domain: labels[0] ?? '', suffix: '' };
  }

  const last = labels[labels.length - 1] ?? '';
  const secondLast = labels[labels.length - 2] ?? '';
  const suffixSize =
    labels.length > 2 && last.length === 2 && SECOND_LEVEL_LABELS.has(secondLast)
      ? 2
      : 1;

  const suffix = labels.slice(-suffixSize).join('.');
  const domain = labels[labels.length - suffixSize - 1] ?? '';
  const subdomain = labels.slice(0, -suffixSize - 1).join('.');
  return { subdomain, domain, suffix };
}

export function urlToFileType(url: string): string | null {
  const path = getPath(url);
  const lastSegment = path.split('/').filter(Boolean).pop() ?? '';
  const dot = lastSegment.lastIndexOf('.');
  if (dot === -1) return null;
  const extension = lastSegment.slice(dot + 1).toLowerCase();
  return extension.length > 0 && extension.length <= 5 ? extension : null;
}

function slugTokens(slug: string, separator: string): string[] {
  return slug.split(separator).map((token) => token.toLowerCase());
}

/**
 * Guesses from the URL shape alone whether it points at a news article:
 * long dash/underscore slugs, dated paths and known article path segments
 * count in favour, site furniture paths and ad/social hosts against.
 */
export function isValidNewsUrl(url: string): boolean {
  if (url.length < 11 || url.includes('mailto:')) return false;

  const parsed = parseUrl(prepareUrl(url));
  if (!parsed || !/^https?:$/.test(parsed.protocol)) return false;

  const chunks = parsed.pathname.split('/').filter((chunk) => chunk.length > 0);
  if (chunks.length === 0) return false;

  const fileType = urlToFileType(parsed.href);
  if (fileType && !ALLOWED_FILE_TYPES.has(fileType)) return false;

  const lastChunk = chunks[chunks.length - 1] ?? '';
  const lastParts = lastChunk.split('.');
  if (lastParts.length > 1) {
    chunks[chunks.length - 1] = lastParts[lastParts.length - 2] ?? lastChunk;
  }

  const pathChunks = chunks.filter((chunk) => chunk !== 'index');
  const { subdomain, domain } = splitHost(parsed.hostname);
  if (BAD_DOMAINS.has(domain)) return false;

  const slug = pathChunks[pathChunks.length - 1] ?? '';
  const dashCount = slug.split('-').length - 1;
  const underscoreCount = slug.split('_').length - 1;

  if (slug && (dashCount > 4 || underscoreCount > 4)) {
    const separator = dashCount >= underscoreCount ? '-' : '_';
    if (!slugTokens(slug, separator).includes(domain)) return true;
  }

  if (pathChunks.length <= 1) return false;

  for (const chunk of pathChunks) {
    if (BAD_PATH_SEGMENTS.has(chunk.toLowerCase())) return false;
  }
  if (BAD_PATH_SEGMENTS.has(subdomain)) return false;

  if (PATH_DATE_PATTERN.test(parsed.pathname)) return true;

  return pathChunks.some((chunk) =>
    GOOD_PATH_SEGMENTS.has(chunk.toLowerCase())
  );
}

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import { sanitizeText } from '../../utils/sanitizer.js';

const AUTHOR_ATTRIBUTES = ['name', 'rel', 'itemprop', 'class', 'id'] as const;
const AUTHOR_VALUES = new Set(['author', 'byline', 'dc.creator', 'byl']);

const MAX_BYLINE_LENGTH = 200;

const HONORIFICS = new Set(['mr', 'mrs', 'ms', 'dr', 'prof']);
const NAME_DELIMITERS = new Set(['and', ',', '']);

const TAG_PATTERN = /<[^<]+?>/g;
const BY_PREFIX = /\b(?:by|from)\b[:\s]*/gi;
const NAME_SPLITTER = /[^\p{L}\p{N}_'\-.]/u;
const DIGIT = /\d/;

function attributeNamesAuthor(element: Element, attribute: string): boolean {
  const value = element.attribs[attribute];
  if (!value) return false;
  return value
    .toLowerCase()
    .split(/\s+/)
    .some((token) => AUTHOR_VALUES.has(token));
}

function isHonorific(token: string): boolean {
  return HONORIFICS.has(token.replace(/\.$/, '').toLowerCase());
}

/**
 * Names in a byline such as "By Jane Roe, John Doe and Ann Poe". Tokens
 * with digits and honorifics are dropped; a name needs at least two tokens.
 */
export function parseByline(byline: string): string[] {
  const cleaned = sanitizeText(byline.replace(TAG_PATTERN, ''))
    .replace(BY_PREFIX, '')
    .trim();

  const names: string[] = [];
  let current: string[] = [];
  const flush = (): void => {
    if (current.length >= 2) names.push(current.join(' '));
    current = [];
  };

  for (const rawToken of cleaned.split(NAME_SPLITTER)) {
    const token = rawToken.trim();
    if (NAME_DELIMITERS.has(token.toLowerCase())) {
      flush();
    } else if (!DIGIT.test(token) && !isHonorific(token)) {
      current.push(token);
    }
  }
  flush();

  return names;
}

function readCandidate($: CheerioAPI, element: Element): string {
  const $element = $(element);
  const text =
    element.tagName.toLowerCase() === 'meta'
      ? ($element.attr('content') ?? '')
      : $element.text();
  return sanitizeText(text);
}

/**
 * Authors from `meta[name=author]`, `rel=author` links and byline-like
 * elements, deduplicated case-insensitively in first-seen order.
 */
export function extractAuthors($: CheerioAPI, maxAuthors: number): string[] {
  const candidates: string[] = [];
  const elements = $<Element, '*'>('*').toArray();

  // Attribute priority first, document order within one attribute.
  for (const attribute of AUTHOR_ATTRIBUTES) {
    for (const element of elements) {
      if (!attributeNamesAuthor(element, attribute)) continue;
      const text = readCandidate($, element);
      if (text && text.length <= MAX_BYLINE_LENGTH) candidates.push(text);
    }
  }

  const seen = new Set<string>();
  const authors: string[] = [];
  for (const name of candidates.flatMap(parseByline)) {
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    authors.push(name);
    if (authors.length >= maxAuthors) break;
  }
  return authors;
}

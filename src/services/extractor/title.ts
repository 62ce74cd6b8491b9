import type { CheerioAPI } from 'cheerio';

import { clampText, sanitizeText } from '../../utils/sanitizer.js';
import { countWords } from '../../utils/text.js';

import { getMetaContent } from '../metadata-collector.js';

const TITLE_SPLITTERS: readonly RegExp[] = [
  /\|/,
  / - /,
  /_/,
  /\//,
  / » /,
  /:/,
];

const COMPARISON_NOISE = /[^\p{L}\p{N} ]/gu;

function forComparison(text: string): string {
  return text.replace(COMPARISON_NOISE, '').toLowerCase();
}

function longestHeading($: CheerioAPI): string {
  const headings = $('h1')
    .toArray()
    .map((element) => sanitizeText($(element).text()))
    .filter((text) => text.length > 0)
    .sort((a, b) => b.length - a.length);

  const longest = headings[0] ?? '';
  return countWords(longest) > 2 ? longest : '';
}

function splitTitle(title: string, splitter: RegExp, hint: string): string {
  const pieces = title.split(splitter).map((piece) => piece.trim());
  const filteredHint = hint ? forComparison(hint) : '';

  let longestIndex = 0;
  let longestLength = 0;
  for (const [index, piece] of pieces.entries()) {
    if (filteredHint && forComparison(piece).includes(filteredHint)) {
      return piece;
    }
    if (piece.length > longestLength) {
      longestLength = piece.length;
      longestIndex = index;
    }
  }

  const candidate = pieces[longestIndex] ?? title;
  // A piece that lost more than half the words was probably not a suffix.
  return countWords(candidate) * 2 >= countWords(title) ? candidate : title;
}

function trimSiteName(title: string, hint: string): string {
  const splitter = TITLE_SPLITTERS.find((pattern) => pattern.test(title));
  return splitter ? splitTitle(title, splitter, hint) : title;
}

/**
 * Article headline. The `<title>` tag is reconciled with the longest `<h1>`
 * and `og:title`; a site-name suffix is cut at the first separator that
 * occurs in the title.
 */
export function extractTitle($: CheerioAPI, maxTitle: number): string {
  const heading = longestHeading($);
  const openGraph = getMetaContent(
    $,
    'meta[property="og:title"], meta[name="og:title"], meta[name="headline"]'
  );
  const titleTag = sanitizeText($('title').first().text());

  if (!titleTag) {
    return clampText(openGraph || heading, maxTitle);
  }

  const filteredHeading = forComparison(heading);
  const filteredOpenGraph = forComparison(openGraph);
  let title: string;

  if (heading && heading === titleTag) {
    title = heading;
  } else if (heading && filteredHeading === filteredOpenGraph) {
    title = heading;
  } else if (
    filteredOpenGraph &&
    forComparison(titleTag).startsWith(filteredOpenGraph)
  ) {
    title = openGraph;
  } else {
    title = trimSiteName(titleTag, heading);
  }

  if (heading && forComparison(title) === filteredHeading) {
    title = heading;
  }

  return clampText(sanitizeText(title.replace(/&raquo;/g, '»')), maxTitle);
}

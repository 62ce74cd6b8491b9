import * as stopword from 'stopword';

import { logWarn } from './logger.js';

export type StopwordSet = ReadonlySet<string>;

// ISO 639-1 code -> key of the word list exported by the `stopword` package.
const LANGUAGE_KEYS: Readonly<Record<string, string>> = {
  af: 'afr',
  ar: 'ara',
  hy: 'hye',
  eu: 'eus',
  bn: 'ben',
  br: 'bre',
  bg: 'bul',
  ca: 'cat',
  zh: 'zho',
  hr: 'hrv',
  cs: 'ces',
  da: 'dan',
  nl: 'nld',
  en: 'eng',
  eo: 'epo',
  et: 'est',
  fi: 'fin',
  fr: 'fra',
  gl: 'glg',
  de: 'deu',
  el: 'ell',
  gu: 'guj',
  ha: 'hau',
  he: 'heb',
  hi: 'hin',
  hu: 'hun',
  id: 'ind',
  ga: 'gle',
  it: 'ita',
  ja: 'jpn',
  ko: 'kor',
  ku: 'kur',
  la: 'lat',
  lv: 'lav',
  lt: 'lit',
  ms: 'msa',
  mr: 'mar',
  my: 'mya',
  nb: 'nob',
  no: 'nob',
  fa: 'fas',
  pl: 'pol',
  pt: 'por',
  pa: 'panGu',
  ro: 'ron',
  ru: 'rus',
  sk: 'slk',
  sl: 'slv',
  so: 'som',
  st: 'sot',
  es: 'spa',
  sw: 'swa',
  sv: 'swe',
  tl: 'tgl',
  th: 'tha',
  tr: 'tur',
  uk: 'ukr',
  ur: 'urd',
  vi: 'vie',
  yo: 'yor',
  zu: 'zul',
};

const EMPTY_SET: StopwordSet = new Set<string>();

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

// The package exports one array per language next to its helper functions.
function loadWordLists(): ReadonlyMap<string, readonly string[]> {
  const exported: [string, unknown][] = Object.entries(stopword);
  const lists = new Map<string, readonly string[]>();
  for (const [key, value] of exported) {
    if (isStringArray(value)) lists.set(key, value);
  }
  return lists;
}

const wordLists = loadWordLists();
const resolved = new Map<string, StopwordSet>();

function buildSet(words: readonly string[]): StopwordSet {
  return new Set(words.map((word) => word.toLowerCase()));
}

/**
 * Stopwords for a two-letter language code. Sets are built once per
 * language and shared. An unsupported code yields an empty set.
 */
export function resolveStopwords(language: string): StopwordSet {
  const code = language.trim().toLowerCase();
  const cached = resolved.get(code);
  if (cached) return cached;

  const key = LANGUAGE_KEYS[code];
  const words = key ? wordLists.get(key) : undefined;
  if (!words) {
    logWarn('No stopword list for language', { language: code });
    resolved.set(code, EMPTY_SET);
    return EMPTY_SET;
  }

  const set = buildSet(words);
  resolved.set(code, set);
  return set;
}

export function supportedLanguages(): string[] {
  return Object.entries(LANGUAGE_KEYS)
    .filter(([, key]) => wordLists.has(key))
    .map(([code]) => code)
    .sort();
}

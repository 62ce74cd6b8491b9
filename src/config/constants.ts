export const LIBRARY_NAME = 'broadsheet';
export const LIBRARY_VERSION = '1.0.0';

export const TIMEOUT = {
  DEFAULT_REQUEST_TIMEOUT_S: 7,
  SLOW_REQUEST_WARN_MS: 5000,
} as const;

export const SIZE_LIMITS = {
  TEN_MB: 10 * 1024 * 1024,
  CHARSET_SCAN_BYTES: 8192,
} as const;

export const RETRY = {
  BASE_DELAY_MS: 500,
  MAX_DELAY_MS: 10000,
  JITTER_FACTOR: 0.25,
} as const;

/** Body density scoring. */
export const DENSITY = {
  POSITIVE_TAG_WEIGHT: 1.5,
  NEUTRAL_TAG_WEIGHT: 1,
  BOILERPLATE_WEIGHT: -3,
  MAX_LINK_DENSITY: 0.5,
} as const;

export const IMAGE_LIMITS = {
  MIN_DIMENSION: 25,
} as const;

export const NLP = {
  TITLE_BOOST: 1.5,
  MIN_TOKEN_LENGTH: 2,
} as const;

export const CATEGORY_LIMITS = {
  MAX_SEGMENT_LENGTH: 14,
} as const;

export const SOURCE_LIMITS = {
  MAX_ARTICLES: 5000,
} as const;

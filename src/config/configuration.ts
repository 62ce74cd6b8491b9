import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import { ConfigurationError } from '../errors/app-error.js';

import { LIBRARY_NAME, LIBRARY_VERSION, TIMEOUT } from './constants.js';

const AUTO_LANGUAGE = 'auto';

const languageSchema = z
  .string()
  .regex(/^(?:[a-zA-Z]{2}|auto)$/, {
    message: 'must be a two-letter language code or "auto"',
  })
  .transform((value) => value.toLowerCase());

const proxySchema = z
  .string()
  .url()
  .refine((value) => /^https?:/i.test(value), {
    message: 'proxy must be an http(s) URL',
  });

const configurationSchema = z
  .object({
    language: languageSchema.optional(),
    useMetaLanguage: z.boolean().optional(),
    memoizeArticles: z.boolean().optional(),
    maxFileMemo: z.number().int().positive().optional(),
    memoDirectory: z.string().min(1).optional(),
    fetchImages: z.boolean().optional(),
    numberThreads: z.number().int().min(1).max(64).optional(),
    requestTimeout: z.number().positive().optional(),
    userAgent: z.string().min(1).optional(),
    proxy: proxySchema.optional(),
    httpSuccessOnly: z.boolean().optional(),
    followMetaRefresh: z.boolean().optional(),
    keepArticleHtml: z.boolean().optional(),
    minWordCount: z.number().int().nonnegative().optional(),
    minSentenceCount: z.number().int().nonnegative().optional(),
    maxTitle: z.number().int().positive().optional(),
    maxText: z.number().int().positive().optional(),
    maxKeywords: z.number().int().positive().optional(),
    maxAuthors: z.number().int().positive().optional(),
    maxSummary: z.number().int().positive().optional(),
    topKSentences: z.number().int().positive().optional(),
    topNKeywords: z.number().int().positive().optional(),
    densityDecay: z.number().gt(0).lte(1).optional(),
    minBodyScore: z.number().nonnegative().optional(),
    minWordsPerBlock: z.number().int().min(1).optional(),
  })
  .strict();

export type ConfigurationOptions = z.input<typeof configurationSchema>;

function formatIssues(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function parseOptions(
  options: ConfigurationOptions
): z.output<typeof configurationSchema> {
  const result = configurationSchema.safeParse(options);
  if (result.success) return result.data;

  const issues = formatIssues(result.error);
  const summary = issues
    .map((issue) =>
      issue.path ? `${issue.path}: ${issue.message}` : issue.message
    )
    .join('; ');
  throw new ConfigurationError(`Invalid configuration: ${summary}`, issues);
}

/**
 * Immutable settings snapshot shared by an article, its source and the
 * transport. Only the fields a caller sets override the defaults; an
 * explicit language switches meta-language detection off.
 */
export class Configuration {
  readonly language: string;
  readonly useMetaLanguage: boolean;
  readonly memoizeArticles: boolean;
  readonly maxFileMemo: number;
  readonly memoDirectory: string;
  readonly fetchImages: boolean;
  readonly numberThreads: number;
  readonly requestTimeout: number;
  readonly userAgent: string;
  readonly proxy: string | undefined;
  readonly httpSuccessOnly: boolean;
  readonly followMetaRefresh: boolean;
  readonly keepArticleHtml: boolean;
  readonly minWordCount: number;
  readonly minSentenceCount: number;
  readonly maxTitle: number;
  readonly maxText: number;
  readonly maxKeywords: number;
  readonly maxAuthors: number;
  readonly maxSummary: number;
  readonly topKSentences: number;
  readonly topNKeywords: number;
  readonly densityDecay: number;
  readonly minBodyScore: number;
  readonly minWordsPerBlock: number;

  constructor(options: ConfigurationOptions = {}) {
    const values = parseOptions(options);
    const explicitLanguage =
      values.language !== undefined && values.language !== AUTO_LANGUAGE;

    this.language = values.language ?? 'en';
    this.useMetaLanguage = explicitLanguage
      ? false
      : (values.useMetaLanguage ?? true);
    this.memoizeArticles = values.memoizeArticles ?? true;
    this.maxFileMemo = values.maxFileMemo ?? 20000;
    this.memoDirectory =
      values.memoDirectory ?? path.join(os.tmpdir(), `${LIBRARY_NAME}-memo`);
    this.fetchImages = values.fetchImages ?? true;
    this.numberThreads = values.numberThreads ?? 10;
    this.requestTimeout =
      values.requestTimeout ?? TIMEOUT.DEFAULT_REQUEST_TIMEOUT_S;
    this.userAgent = values.userAgent ?? `${LIBRARY_NAME}/${LIBRARY_VERSION}`;
    this.proxy = values.proxy;
    this.httpSuccessOnly = values.httpSuccessOnly ?? true;
    this.followMetaRefresh = values.followMetaRefresh ?? false;
    this.keepArticleHtml = values.keepArticleHtml ?? false;
    this.minWordCount = values.minWordCount ?? 300;
    this.minSentenceCount = values.minSentenceCount ?? 7;
    this.maxTitle = values.maxTitle ?? 200;
    this.maxText = values.maxText ?? 100000;
    this.maxKeywords = values.maxKeywords ?? 35;
    this.maxAuthors = values.maxAuthors ?? 10;
    this.maxSummary = values.maxSummary ?? 5000;
    this.topKSentences = values.topKSentences ?? 5;
    this.topNKeywords = values.topNKeywords ?? 10;
    this.densityDecay = values.densityDecay ?? 0.75;
    this.minBodyScore = values.minBodyScore ?? 20;
    this.minWordsPerBlock = values.minWordsPerBlock ?? 5;

    Object.freeze(this);
  }

  static from(options: ConfigurationOptions | Configuration = {}): Configuration {
    return options instanceof Configuration
      ? options
      : new Configuration(options);
  }

  get requestTimeoutMs(): number {
    return Math.round(this.requestTimeout * 1000);
  }

  /** Language the stopword set starts from before any meta language is seen. */
  get baseLanguage(): string {
    return this.language === AUTO_LANGUAGE ? 'en' : this.language;
  }
}

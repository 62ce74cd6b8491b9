import { NLP } from '../config/constants.js';
import type { KeywordScore } from '../config/types.js';

import { clampText } from '../utils/sanitizer.js';
import {
  isIdeograph,
  isNumeric,
  splitSentences,
  tokenizeWords,
} from '../utils/text.js';

import type { StopwordSet } from './stopwords.js';

export interface NlpOptions {
  topNKeywords: number;
  topKSentences: number;
  maxSummary: number;
}

export interface NlpResult {
  keywords: KeywordScore[];
  summary: string;
}

function isCandidate(token: string, stopwords: StopwordSet): boolean {
  if (stopwords.has(token) || isNumeric(token)) return false;
  return token.length >= NLP.MIN_TOKEN_LENGTH || isIdeograph(token);
}

function candidateTokens(text: string, stopwords: StopwordSet): string[] {
  return tokenizeWords(text.toLowerCase()).filter((token) =>
    isCandidate(token, stopwords)
  );
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Relative frequency of every non-stopword token in `text`, boosted when the
 * token also occurs in the title.
 */
export function scoreTokens(
  text: string,
  title: string,
  stopwords: StopwordSet
): Map<string, number> {
  const tokens = candidateTokens(text, stopwords);
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  const titleTokens = new Set(candidateTokens(title, stopwords));
  const scores = new Map<string, number>();
  for (const [token, count] of counts) {
    const base = count / tokens.length;
    scores.set(token, titleTokens.has(token) ? base * NLP.TITLE_BOOST : base);
  }
  return scores;
}

/** Highest scores first; equal scores in code-unit order of the keyword. */
export function rankKeywords(
  scores: ReadonlyMap<string, number>,
  topN: number
): KeywordScore[] {
  return [...scores]
    .map(([keyword, score]) => ({ keyword, score }))
    .sort(
      (a, b) => b.score - a.score || compareCodeUnits(a.keyword, b.keyword)
    )
    .slice(0, topN);
}

function scoreSentence(
  sentence: string,
  scores: ReadonlyMap<string, number>
): number {
  const tokens = tokenizeWords(sentence.toLowerCase());
  if (tokens.length === 0) return 0;
  const total = tokens.reduce((sum, token) => sum + (scores.get(token) ?? 0), 0);
  return total / tokens.length;
}

export function summarize(
  text: string,
  scores: ReadonlyMap<string, number>,
  topK: number,
  maxSummary: number
): string {
  const ranked = splitSentences(text)
    .map((sentence, index) => ({
      sentence,
      index,
      score: scoreSentence(sentence, scores),
    }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, topK);

  const summary = ranked
    .sort((a, b) => a.index - b.index)
    .map(({ sentence }) => sentence)
    .join('\n');
  return clampText(summary, maxSummary);
}

/**
 * Keywords and an extractive summary. Deterministic for equal inputs.
 */
export function analyzeText(
  text: string,
  title: string,
  stopwords: StopwordSet,
  options: NlpOptions
): NlpResult {
  const scores = scoreTokens(text, title, stopwords);
  return {
    keywords: rankKeywords(scores, options.topNKeywords),
    summary: summarize(text, scores, options.topKSentences, options.maxSummary),
  };
}

import { describe, expect, test } from 'vitest';

import {
  countWords,
  isIdeograph,
  isNumeric,
  splitSentences,
  tokenizeWords,
} from '../../../src/utils/text.js';

describe('text', () => {
  describe('tokenizeWords', () => {
    test('keeps inner apostrophes and numbers', () => {
      expect(tokenizeWords("Don't stop, 2024 rocks!")).toEqual([
        "Don't",
        'stop',
        '2024',
        'rocks',
      ]);
    });

    test('splits ideographs into single-character tokens', () => {
      expect(tokenizeWords('Tokyo 今天 news')).toEqual([
        'Tokyo',
        '今',
        '天',
        'news',
      ]);
    });

    test('returns nothing for punctuation only', () => {
      expect(tokenizeWords('... -- !!')).toEqual([]);
    });
  });

  test('countWords counts tokens', () => {
    expect(countWords('one two  three\nfour')).toBe(4);
  });

  test('isIdeograph and isNumeric classify tokens', () => {
    expect(isIdeograph('天')).toBe(true);
    expect(isIdeograph('a')).toBe(false);
    expect(isNumeric('2024')).toBe(true);
    expect(isNumeric('20x')).toBe(false);
  });

  describe('splitSentences', () => {
    test('splits on terminal punctuation', () => {
      expect(
        splitSentences('Dr. Smith arrived. He spoke at noon! Was it late?')
      ).toEqual(['Dr. Smith arrived.', 'He spoke at noon!', 'Was it late?']);
    });

    test('treats line breaks as sentence ends', () => {
      expect(splitSentences('First line without stop\nSecond line.')).toEqual([
        'First line without stop',
        'Second line.',
      ]);
    });

    test('splits on full-width terminators without spaces', () => {
      expect(splitSentences('今天下雨。明天晴天！')).toEqual([
        '今天下雨。',
        '明天晴天！',
      ]);
    });

    test('returns nothing for blank text', () => {
      expect(splitSentences('  \n ')).toEqual([]);
    });
  });
});

import { describe, expect, test } from 'vitest';

import {
  clampText,
  dedupePreservingOrder,
  sanitizeText,
} from '../../../src/utils/sanitizer.js';

describe('sanitizer', () => {
  describe('sanitizeText', () => {
    test('collapses runs of whitespace to single spaces', () => {
      expect(sanitizeText('hello \t\n\n  world')).toBe('hello world');
    });

    test('trims both ends', () => {
      expect(sanitizeText('   hello world   ')).toBe('hello world');
    });

    test('handles null and undefined input', () => {
      expect(sanitizeText(null)).toBe('');
      expect(sanitizeText(undefined)).toBe('');
    });
  });

  describe('clampText', () => {
    test('returns short text unchanged', () => {
      expect(clampText('short', 10)).toBe('short');
    });

    test('cuts at the limit and drops trailing whitespace', () => {
      expect(clampText('hello world again', 6)).toBe('hello');
    });
  });

  describe('dedupePreservingOrder', () => {
    test('keeps the first occurrence of each value', () => {
      expect(dedupePreservingOrder(['b', 'a', 'b', 'c', 'a'])).toEqual([
        'b',
        'a',
        'c',
      ]);
    });
  });
});

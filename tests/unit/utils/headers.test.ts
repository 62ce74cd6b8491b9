import { describe, expect, test } from 'vitest';

import { readHeader } from '../../../src/utils/headers.js';

describe('headers', () => {
  describe('readHeader', () => {
    test('matches header names in any case', () => {
      const headers = { 'Content-Type': 'text/html; charset=utf-8' };

      expect(readHeader(headers, 'content-type')).toBe('text/html; charset=utf-8');
      expect(readHeader(headers, 'CONTENT-TYPE')).toBe('text/html; charset=utf-8');
    });

    test('returns undefined for a missing header', () => {
      expect(readHeader({ 'content-length': '12' }, 'content-type')).toBeUndefined();
    });
  });
});

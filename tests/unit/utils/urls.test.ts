import { describe, expect, test } from 'vitest';

import { UrlValidationError } from '../../../src/errors/app-error.js';
import {
  getHostname,
  getPath,
  getScheme,
  isValidNewsUrl,
  prepareUrl,
  resolveUrl,
  splitHost,
  urlToFileType,
  validateSourceUrl,
} from '../../../src/utils/urls.js';

describe('urls', () => {
  describe('prepareUrl', () => {
    test('drops query string and fragment', () => {
      expect(
        prepareUrl(
          'http://www.cnn.com/2013/11/27/travel/weather-thanksgiving/index.html?iref=allsearch#top'
        )
      ).toBe(
        'http://www.cnn.com/2013/11/27/travel/weather-thanksgiving/index.html'
      );
    });

    test('resolves relative URLs against the base', () => {
      expect(prepareUrl('/world', 'http://cnn.com')).toBe('http://cnn.com/world');
      expect(prepareUrl('local/story.html', 'http://cnn.com/us/')).toBe(
        'http://cnn.com/us/local/story.html'
      );
    });

    test('returns an empty string for unparsable input', () => {
      expect(prepareUrl('::not a url')).toBe('');
    });
  });

  test('resolveUrl keeps the query string', () => {
    expect(resolveUrl('/a?b=1', 'https://example.com/x')).toBe(
      'https://example.com/a?b=1'
    );
  });

  test('host, scheme and path accessors', () => {
    const url = 'https://news.example.com/politics/today';
    expect(getHostname(url)).toBe('news.example.com');
    expect(getScheme(url)).toBe('https');
    expect(getPath(url)).toBe('/politics/today');
    expect(getHostname('nope')).toBe('');
  });

  describe('validateSourceUrl', () => {
    test('normalizes a valid URL', () => {
      expect(validateSourceUrl(' http://cnn.com ')).toBe('http://cnn.com/');
    });

    test('rejects empty and non-http input', () => {
      expect(() => validateSourceUrl('')).toThrow(UrlValidationError);
      expect(() => validateSourceUrl('ftp://files.example.com')).toThrow(
        'Not an http(s) URL: ftp://files.example.com'
      );
      expect(() => validateSourceUrl('cnn.com')).toThrow(UrlValidationError);
    });
  });

  describe('splitHost', () => {
    test('splits a plain host', () => {
      expect(splitHost('www.cnn.com')).toEqual({
        subdomain: 'www',
        domain: 'cnn',
        suffix: 'com',
      });
    });

    test('keeps second-level suffixes together', () => {
      expect(splitHost('www.bbc.co.uk')).toEqual({
        subdomain: 'www',
        domain: 'bbc',
        suffix: 'co.uk',
      });
    });

    test('handles nested subdomains and bare names', () => {
      expect(splitHost('espn.go.com')).toEqual({
        subdomain: 'espn',
        domain: 'go',
        suffix: 'com',
      });
      expect(splitHost('localhost')).toEqual({
        subdomain: '',
        domain: 'localhost',
        suffix: '',
      });
    });
  });

  test('urlToFileType reads the last segment extension', () => {
    expect(urlToFileType('http://example.com/a/b.HTML')).toBe('html');
    expect(urlToFileType('http://example.com/a/photo.jpg')).toBe('jpg');
    expect(urlToFileType('http://example.com/a/')).toBeNull();
  });

  describe('isValidNewsUrl', () => {
    test('accepts dated article paths', () => {
      expect(
        isValidNewsUrl(
          'http://www.cnn.com/2013/11/27/travel/weather-thanksgiving/index.html'
        )
      ).toBe(true);
    });

    test('accepts long slugs that do not repeat the domain', () => {
      expect(
        isValidNewsUrl(
          'http://example.com/local/heavy-rain-floods-streets-across-county'
        )
      ).toBe(true);
    });

    test('accepts known article path segments', () => {
      expect(isValidNewsUrl('http://example.com/sports/news/match')).toBe(true);
    });

    test('rejects site furniture, media files and short paths', () => {
      expect(isValidNewsUrl('http://example.com/about/team-page')).toBe(false);
      expect(isValidNewsUrl('http://example.com/a/photo.jpg')).toBe(false);
      expect(isValidNewsUrl('http://example.com/story')).toBe(false);
      expect(isValidNewsUrl('http://example.com/sports/results')).toBe(false);
    });

    test('rejects ad and social hosts and mail links', () => {
      expect(
        isValidNewsUrl('http://www.amazon.com/news/deal-of-the-day-for-you')
      ).toBe(false);
      expect(isValidNewsUrl('mailto:desk@example.com')).toBe(false);
    });
  });
});

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DocumentCache } from '../src/services/cache.js';
import { decodeHtml } from '../src/utils/encoding.js';

import { htmlResponse } from './helpers/fixtures.js';

const PAGE_URL = 'http://example.com/news/2024/05/01/story';

function clock(start: number): () => number {
  let current = start;
  return () => {
    const value = current;
    current += 1000;
    return value;
  };
}

describe('DocumentCache', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'broadsheet-cache-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('misses on an empty directory', async () => {
    const cache = new DocumentCache({ directory, maxEntries: 5 });

    expect(await cache.get(PAGE_URL)).toBeNull();
    expect(await cache.has(PAGE_URL)).toBe(false);
    expect(await cache.size()).toBe(0);
  });

  it('stores and returns a response', async () => {
    const cache = new DocumentCache({
      directory,
      maxEntries: 5,
      now: () => Date.UTC(2024, 4, 1, 12, 0, 0),
    });
    await cache.set(`${PAGE_URL}?ref=home`, htmlResponse(PAGE_URL, '<p>Stored</p>'));

    const entry = await cache.get(PAGE_URL);

    expect(entry?.url).toBe(PAGE_URL);
    expect(entry?.fetchedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(entry?.fetchedAtMs).toBe(Date.UTC(2024, 4, 1, 12, 0, 0));
    expect(entry?.response.status).toBe(200);
    expect(entry?.response.headers).toEqual({ 'content-type': 'text/html; charset=utf-8' });
    expect(decodeHtml(entry?.response.body ?? '')).toBe('<p>Stored</p>');
  });

  it('stores string bodies as bytes', async () => {
    const cache = new DocumentCache({ directory, maxEntries: 5 });
    await cache.set(PAGE_URL, {
      url: PAGE_URL,
      status: 200,
      headers: {},
      body: 'plain text body',
    });

    const entry = await cache.get(PAGE_URL);

    expect(entry?.response.body).toBeInstanceOf(Uint8Array);
    expect(decodeHtml(entry?.response.body ?? '')).toBe('plain text body');
  });

  it('keys by the normalized URL', () => {
    const cache = new DocumentCache({ directory, maxEntries: 5 });

    expect(cache.keyFor(PAGE_URL)).toHaveLength(32);
    expect(cache.keyFor(`${PAGE_URL}#comments`)).toBe(cache.keyFor(PAGE_URL));
    expect(cache.keyFor('http://example.com/other')).not.toBe(cache.keyFor(PAGE_URL));
  });

  it('evicts the oldest entries beyond the limit', async () => {
    const cache = new DocumentCache({
      directory,
      maxEntries: 2,
      now: clock(Date.UTC(2024, 0, 1)),
    });

    await cache.set('http://example.com/a/1', htmlResponse('http://example.com/a/1', '1'));
    await cache.set('http://example.com/a/2', htmlResponse('http://example.com/a/2', '2'));
    await cache.set('http://example.com/a/3', htmlResponse('http://example.com/a/3', '3'));

    expect(await cache.size()).toBe(2);
    expect(await cache.has('http://example.com/a/1')).toBe(false);
    expect(await cache.has('http://example.com/a/2')).toBe(true);
    expect(await cache.has('http://example.com/a/3')).toBe(true);
  });

  it('treats malformed entries as misses', async () => {
    const cache = new DocumentCache({ directory, maxEntries: 5 });
    const file = path.join(directory, `${cache.keyFor(PAGE_URL)}.json`);

    await writeFile(file, '{"url": 1}', 'utf8');
    expect(await cache.get(PAGE_URL)).toBeNull();

    await writeFile(file, 'not json', 'utf8');
    expect(await cache.get(PAGE_URL)).toBeNull();
  });

  it('clears every entry', async () => {
    const cache = new DocumentCache({ directory, maxEntries: 5 });
    await cache.set(PAGE_URL, htmlResponse(PAGE_URL, '<p>Stored</p>'));

    await cache.clear();

    expect(await cache.size()).toBe(0);
    expect(await cache.has(PAGE_URL)).toBe(false);
  });
});

import { createHash } from 'node:crypto';
import { mkdir, readdir, readFile, rm, stat, utimes, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { CacheEntry, TransportResponse } from '../config/types.js';

import { getErrorMessage } from '../utils/error-utils.js';
import { prepareUrl } from '../utils/urls.js';

import { logDebug, logWarn } from './logger.js';

const URL_HASH_LENGTH = 32;
const ENTRY_EXTENSION = '.json';

const cacheFileSchema = z.object({
  url: z.string(),
  fetchedAt: z.string(),
  fetchedAtMs: z.number(),
  response: z.object({
    url: z.string(),
    status: z.number().int(),
    headers: z.record(z.string()),
    bodyBase64: z.string(),
  }),
});

type CacheFile = z.infer<typeof cacheFileSchema>;

export interface DocumentCacheOptions {
  directory: string;
  maxEntries: number;
  now?: () => number;
}

function createHashFragment(input: string, length: number): string {
  return createHash('sha256').update(input).digest('hex').substring(0, length);
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  );
}

function encodeBody(body: Uint8Array | string): string {
  return typeof body === 'string'
    ? Buffer.from(body, 'utf8').toString('base64')
    : Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString(
        'base64'
      );
}

function toEntry(file: CacheFile): CacheEntry {
  const { bodyBase64, ...response } = file.response;
  return {
    url: file.url,
    fetchedAt: file.fetchedAt,
    fetchedAtMs: file.fetchedAtMs,
    response: {
      ...response,
      body: new Uint8Array(Buffer.from(bodyBase64, 'base64')),
    },
  };
}

/**
 * Fetched responses on disk, one JSON file per normalized URL. Keys never
 * share a file, so concurrent writers need no locking; the newest write of
 * a key wins. Holds at most `maxEntries`, evicting the oldest fetches.
 */
export class DocumentCache {
  readonly directory: string;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: DocumentCacheOptions) {
    this.directory = options.directory;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  keyFor(url: string): string {
    return createHashFragment(prepareUrl(url) || url, URL_HASH_LENGTH);
  }

  private pathFor(url: string): string {
    return path.join(this.directory, `${this.keyFor(url)}${ENTRY_EXTENSION}`);
  }

  async get(url: string): Promise<CacheEntry | null> {
    const file = this.pathFor(url);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logWarn('Cache read failed', { url, error: getErrorMessage(error) });
      }
      return null;
    }

    try {
      const parsed = cacheFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return toEntry(parsed.data);
      logWarn('Discarding malformed cache entry', { url, file });
    } catch (error) {
      logWarn('Discarding unreadable cache entry', {
        url,
        error: getErrorMessage(error),
      });
    }
    return null;
  }

  async has(url: string): Promise<boolean> {
    return (await this.get(url)) !== null;
  }

  async set(url: string, response: TransportResponse): Promise<void> {
    const fetchedAtMs = this.now();
    const payload: CacheFile = {
      url: prepareUrl(url) || url,
      fetchedAt: new Date(fetchedAtMs).toISOString(),
      fetchedAtMs,
      response: {
        url: response.url,
        status: response.status,
        headers: response.headers,
        bodyBase64: encodeBody(response.body),
      },
    };

    const file = this.pathFor(url);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(file, JSON.stringify(payload), 'utf8');
      const fetchedAt = new Date(fetchedAtMs);
      await utimes(file, fetchedAt, fetchedAt);
      await this.prune();
    } catch (error) {
      logWarn('Cache write failed', { url, error: getErrorMessage(error) });
    }
  }

  /** Deletes the oldest entries beyond `maxEntries`; returns how many. */
  async prune(): Promise<number> {
    const names = await this.listEntries();
    const excess = names.length - this.maxEntries;
    if (excess <= 0) return 0;

    const dated = await Promise.all(
      names.map(async (name) => {
        const { mtimeMs } = await stat(path.join(this.directory, name));
        return { name, mtimeMs };
      })
    );
    dated.sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name));

    const victims = dated.slice(0, excess);
    await Promise.all(
      victims.map(async ({ name }) =>
        rm(path.join(this.directory, name), { force: true })
      )
    );
    logDebug('Pruned cache entries', { removed: victims.length });
    return victims.length;
  }

  async size(): Promise<number> {
    return (await this.listEntries()).length;
  }

  async clear(): Promise<void> {
    await rm(this.directory, { recursive: true, force: true });
  }

  private async listEntries(): Promise<string[]> {
    try {
      const names = await readdir(this.directory);
      return names.filter((name) => name.endsWith(ENTRY_EXTENSION));
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }
}

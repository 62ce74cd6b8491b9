import { describe, expect, it } from 'vitest';

import { NewsPool } from '../src/services/news-pool.js';
import { Source } from '../src/services/source.js';

import { FakeTransport, loadFixture } from './helpers/fixtures.js';

const STORY_URL = 'http://example.com/world/2024/05/01/bridge-reopens';

class BrokenSource extends Source {
  override async downloadArticles(): Promise<void> {
    throw new Error('disk full');
  }
}

function newsTransport(): FakeTransport {
  return new FakeTransport({
    'http://example.com/': `<html><body><a href="${STORY_URL}">Bridge reopens</a></body></html>`,
    [STORY_URL]: loadFixture('storm-article.html'),
  });
}

async function builtSource(transport: FakeTransport): Promise<Source> {
  const source = new Source('http://example.com', { minWordCount: 100 }, { transport });
  await source.build();
  return source;
}

describe('NewsPool', () => {
  it('downloads and parses every source', async () => {
    const transport = newsTransport();
    const source = await builtSource(transport);
    const pool = new NewsPool([
      { source, threads: 2 },
      { source: new BrokenSource('http://broken.example.com') },
    ]);

    const reports = await pool.join();

    expect(reports).toEqual([
      { url: 'http://example.com/', ok: true, articles: 1 },
      {
        url: 'http://broken.example.com/',
        ok: false,
        articles: 0,
        error: 'disk full',
      },
    ]);
    expect(source.articles[0]?.isParsed).toBe(true);
  });

  it('ignores a second run while jobs are pending', async () => {
    const transport = newsTransport();
    const source = await builtSource(transport);
    const pool = new NewsPool([{ source }]);

    pool.run();
    pool.run();
    await pool.join();

    expect(transport.requestedUrls().filter((url) => url === STORY_URL)).toHaveLength(1);
  });

  it('resolves to nothing without jobs', async () => {
    await expect(new NewsPool([]).join()).resolves.toEqual([]);
  });
});

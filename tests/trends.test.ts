import { describe, expect, it } from 'vitest';

import { TRENDING_FEED_URL, TrendsService } from '../src/services/trends.js';

import { FakeTransport } from './helpers/fixtures.js';

const TRENDING_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"><channel>
<title>Daily Search Trends</title>
<item><title>Solar eclipse</title></item>
<item><title> Marathon results </title></item>
<item><title>Solar eclipse</title></item>
<item><title></title></item>
</channel></rss>`;

describe('TrendsService', () => {
  it('lists distinct item titles of the trending feed', async () => {
    const transport = new FakeTransport({ [TRENDING_FEED_URL]: TRENDING_RSS });
    const trends = new TrendsService(transport);

    expect(await trends.hot()).toEqual(['Solar eclipse', 'Marathon results']);
    expect(transport.requestedUrls()).toEqual([TRENDING_FEED_URL]);
  });

  it('reads a custom feed URL', async () => {
    const transport = new FakeTransport({ 'http://example.com/trends.xml': TRENDING_RSS });
    const trends = new TrendsService(transport, {}, {
      feedUrl: 'http://example.com/trends.xml',
    });

    expect(await trends.hot()).toHaveLength(2);
  });

  it('decodes the feed with the charset of a mixed-case header', async () => {
    const xml = '<rss version="2.0"><channel><item><title>Café</title></item></channel></rss>';
    const transport = new FakeTransport({
      [TRENDING_FEED_URL]: {
        url: TRENDING_FEED_URL,
        status: 200,
        headers: { 'Content-Type': 'text/xml; charset=iso-8859-1' },
        body: new Uint8Array(Buffer.from(xml, 'latin1')),
      },
    });

    expect(await new TrendsService(transport).hot()).toEqual(['Café']);
  });

  it('returns nothing when the feed is unreachable', async () => {
    expect(await new TrendsService(new FakeTransport()).hot()).toEqual([]);
  });

  it('lists the bundled popular sources', async () => {
    const urls = await new TrendsService(new FakeTransport()).popularUrls();

    expect(urls).toHaveLength(40);
    expect(urls.slice(0, 2)).toEqual(['http://www.huffingtonpost.com', 'http://cnn.com']);
  });
});

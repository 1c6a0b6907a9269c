import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { headlinesMentioning, parseRssFeed, RssNewsClient } from './news.client';
import { HttpGetter } from '../../shared/http';

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Wire</title>
    <item>
      <title><![CDATA[ Bitcoin & Ether rally ]]></title>
      <link>https://news.test/rally</link>
      <pubDate>Mon, 05 Oct 2026 09:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Solana validators upgrade</title>
      <link>https://news.test/solana</link>
    </item>
  </channel>
</rss>`;

const SINGLE_ITEM_FEED = `<rss version="2.0"><channel><item><title>XRP ruling</title><link>https://news.test/xrp</link><pubDate>Tue, 06 Oct 2026 08:00:00 GMT</pubDate></item></channel></rss>`;

describe('parseRssFeed', () => {
  it('reads title, link and publication date of every item', () => {
    expect(parseRssFeed(FEED)).toEqual([
      { title: 'Bitcoin & Ether rally', link: 'https://news.test/rally', published: 'Mon, 05 Oct 2026 09:00:00 GMT' },
      { title: 'Solana validators upgrade', link: 'https://news.test/solana', published: '' },
    ]);
  });

  it('treats a lone item as a one-element list', () => {
    expect(parseRssFeed(SINGLE_ITEM_FEED)).toEqual([
      { title: 'XRP ruling', link: 'https://news.test/xrp', published: 'Tue, 06 Oct 2026 08:00:00 GMT' },
    ]);
  });

  it('rejects documents that are not RSS', () => {
    expect(parseRssFeed('<feed><entry><title>Atom</title></entry></feed>')).toBeNull();
  });
});

describe('headlinesMentioning', () => {
  it('matches the coin name case-insensitively and caps the result', () => {
    const headlines = [
      { title: 'BITCOIN up', link: 'a', published: '' },
      { title: 'Ether flat', link: 'b', published: '' },
      { title: 'bitcoin down', link: 'c', published: '' },
    ];

    expect(headlinesMentioning(headlines, 'Bitcoin', 1)).toEqual([{ title: 'BITCOIN up', link: 'a', published: '' }]);
    expect(headlinesMentioning(headlines, 'Cardano', 3)).toEqual([]);
  });
});

describe('RssNewsClient', () => {
  let get: jest.Mock<HttpGetter['get']>;

  beforeEach(() => {
    get = jest.fn<HttpGetter['get']>();
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('requests each feed as text and concatenates the items in feed order', async () => {
    get.mockResolvedValueOnce({ data: FEED }).mockResolvedValueOnce({ data: SINGLE_ITEM_FEED });
    const client = new RssNewsClient(['https://feeds.test/a', 'https://feeds.test/b'], 3000, { get });

    const result = await client.getRecentHeadlines();

    expect(result.success && result.data.map(headline => headline.title)).toEqual([
      'Bitcoin & Ether rally',
      'Solana validators upgrade',
      'XRP ruling',
    ]);
    expect(get).toHaveBeenCalledWith('https://feeds.test/a', {
      timeout: 3000,
      headers: { Accept: 'application/rss+xml, application/xml, text/xml' },
      responseType: 'text',
    });
  });

  it('skips a failing feed and keeps the others', async () => {
    get.mockRejectedValueOnce(new Error('503')).mockResolvedValueOnce({ data: SINGLE_ITEM_FEED });
    const client = new RssNewsClient(['https://feeds.test/a', 'https://feeds.test/b'], 3000, { get });

    const result = await client.getRecentHeadlines();

    expect(result).toEqual({
      success: true,
      data: [{ title: 'XRP ruling', link: 'https://news.test/xrp', published: 'Tue, 06 Oct 2026 08:00:00 GMT' }],
    });
    expect(console.warn).toHaveBeenCalledWith('[News] News feed fetch failed for https://feeds.test/a: 503');
  });

  it('fails when every feed fails', async () => {
    get.mockResolvedValueOnce({ data: '<html>maintenance</html>' });
    const client = new RssNewsClient(['https://feeds.test/a'], 3000, { get });

    expect(await client.getRecentHeadlines()).toEqual({
      success: false,
      error: 'Unexpected RSS payload from https://feeds.test/a',
    });
  });
});

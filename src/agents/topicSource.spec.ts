import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GoogleNewsFeed, collectCandidates, parseRssItems } from './topicSource.js';
import { StaticFeed, candidate, rssDocument, rssItem } from '../test/fakes.js';
import type { SearchConfig } from '../config.js';

const searchConfig: SearchConfig = {
  queries: [],
  maxQueries: 3,
  resultsPerQuery: 3,
  snippetChars: 200,
  timeoutMs: 1000,
  locale: 'en-US',
  region: 'US',
};

describe('parseRssItems', () => {
  it('maps items to candidates and decodes entities', () => {
    const xml = rssDocument([
      rssItem('Compose &amp; Kotlin news', '&lt;b&gt;Big&lt;/b&gt; news about Compose', 'Android Weekly'),
    ]);

    expect(parseRssItems(xml, 3)).toEqual([
      {
        title: 'Compose & Kotlin news',
        body: 'Big news about Compose',
        source: 'Android Weekly',
        published: 'Mon, 06 Oct 2025 10:00:00 GMT',
      },
    ]);
  });

  it('takes at most the requested number of items', () => {
    const xml = rssDocument(['one', 'two', 'three', 'four'].map((t) => rssItem(t)));

    expect(parseRssItems(xml, 3).map((c) => c.title)).toEqual(['one', 'two', 'three']);
  });

  it('truncates the description', () => {
    const xml = rssDocument([rssItem('Long', 'x'.repeat(250))]);

    expect(parseRssItems(xml, 3, 200)[0].body).toBe('x'.repeat(200));
  });

  it('fills in source and date when the item has none', () => {
    const xml = rssDocument(['<item><title>Bare item</title></item>']);

    expect(parseRssItems(xml, 3)).toEqual([
      { title: 'Bare item', body: '', source: 'Google News', published: 'recent' },
    ]);
  });

  it('returns nothing for a channel without items', () => {
    expect(parseRssItems(rssDocument([]), 3)).toEqual([]);
  });

  it('rejects documents that are not RSS', () => {
    expect(() => parseRssItems('<html><body>nope</body></html>', 3)).toThrow('Feed payload has no RSS channel');
  });
});

describe('GoogleNewsFeed', () => {
  it('builds the search URL with locale parameters', () => {
    const feed = new GoogleNewsFeed(searchConfig);

    expect(feed.buildUrl('Kotlin new features')).toBe(
      'https://news.google.com/rss/search?q=Kotlin+new+features&hl=en-US&gl=US&ceid=US%3Aen',
    );
  });

  it('fetches and parses the feed', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(rssDocument([rssItem('Compose 1.7 released')]), { status: 200 }),
    );
    const feed = new GoogleNewsFeed(searchConfig, fetchImpl);

    const results = await feed.search('Jetpack Compose updates');

    expect(results.map((c) => c.title)).toEqual(['Compose 1.7 released']);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe(feed.buildUrl('Jetpack Compose updates'));
  });

  it('raises on a non-200 reply', async () => {
    const fetchImpl = vi.fn(async () => new Response('busy', { status: 503 }));
    const feed = new GoogleNewsFeed(searchConfig, fetchImpl);

    await expect(feed.search('anything')).rejects.toThrow('Search feed error: 503');
  });

  it('gives up when the feed body stalls after the headers', async () => {
    const fetchImpl = vi.fn(async () => new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 }));
    const feed = new GoogleNewsFeed({ ...searchConfig, timeoutMs: 100 }, fetchImpl);

    await expect(feed.search('q')).rejects.toThrow('timed out after 100ms');
  });
});

describe('collectCandidates', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('skips failed queries and keeps the rest in query order', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const feed = new StaticFeed({
      first: [candidate('A1'), candidate('A2')],
      second: new Error('socket hang up'),
      third: [candidate('C1')],
    });

    const results = await collectCandidates(feed, ['first', 'second', 'third']);

    expect(results.map((c) => c.title)).toEqual(['A1', 'A2', 'C1']);
    expect(warn).toHaveBeenCalledWith('[topic-source] Search failed for "second": socket hang up');
  });

  it('issues only the first maxQueries queries', async () => {
    const feed = new StaticFeed({});

    await collectCandidates(feed, ['q1', 'q2', 'q3', 'q4', 'q5'], 3);

    expect(feed.queries).toEqual(['q1', 'q2', 'q3']);
  });

  it('returns an empty list when every query fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const feed = new StaticFeed({ a: new Error('down'), b: new Error('down') });

    expect(await collectCandidates(feed, ['a', 'b'])).toEqual([]);
  });
});

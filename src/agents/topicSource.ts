import { XMLParser } from 'fast-xml-parser';
import { errorMessage } from '../errors.js';
import { fetchWithTimeout, type FetchLike } from '../utils/http.js';
import type { SearchConfig } from '../config.js';
import type { TopicCandidate } from '../composer/types.js';

const GOOGLE_NEWS_RSS_URL = 'https://news.google.com/rss/search';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface SearchFeed {
  search(query: string): Promise<TopicCandidate[]>;
}

export type SearchOutcome =
  | { query: string; ok: true; candidates: TopicCandidate[] }
  | { query: string; ok: false; error: string };

const parser = new XMLParser({
  ignoreAttributes: false,
  processEntities: true,
  parseTagValue: false,
  trimValues: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Elements with attributes come back as { '#text': ..., '@_url': ... }.
function text(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (isRecord(value)) return text(value['#text']);
  return '';
}

function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Pulls `<item>` entries out of an RSS 2.0 document.
 * Throws when the payload has no RSS channel.
 */
export function parseRssItems(xml: string, limit: number, snippetChars = 200): TopicCandidate[] {
  const doc: unknown = parser.parse(xml);
  const rss = isRecord(doc) ? doc.rss : undefined;
  const channel = isRecord(rss) ? rss.channel : undefined;
  if (!isRecord(channel)) throw new Error('Feed payload has no RSS channel');

  const raw = channel.item;
  const items = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];

  return items
    .filter(isRecord)
    .slice(0, limit)
    .map((item) => ({
      title: text(item.title),
      body: stripHtml(text(item.description)).slice(0, snippetChars),
      source: text(item.source) || 'Google News',
      published: text(item.pubDate) || 'recent',
    }));
}

export class GoogleNewsFeed implements SearchFeed {
  constructor(
    private readonly config: SearchConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  buildUrl(query: string): string {
    const [lang] = this.config.locale.split('-');
    const params = new URLSearchParams({
      q: query,
      hl: this.config.locale,
      gl: this.config.region,
      ceid: `${this.config.region}:${lang}`,
    });
    return `${GOOGLE_NEWS_RSS_URL}?${params}`;
  }

  async search(query: string): Promise<TopicCandidate[]> {
    const res = await fetchWithTimeout(
      this.buildUrl(query),
      { headers: { 'User-Agent': USER_AGENT } },
      this.config.timeoutMs,
      this.fetchImpl,
    );
    if (res.status !== 200) throw new Error(`Search feed error: ${res.status}`);

    return parseRssItems(res.text, this.config.resultsPerQuery, this.config.snippetChars);
  }
}

/**
 * Runs the queries one after another. A failing query is logged and
 * contributes nothing; the rest still run.
 */
export async function collectCandidates(
  feed: SearchFeed,
  queries: string[],
  maxQueries = 3,
): Promise<TopicCandidate[]> {
  const outcomes: SearchOutcome[] = [];

  for (const query of queries.slice(0, maxQueries)) {
    try {
      outcomes.push({ query, ok: true, candidates: await feed.search(query) });
    } catch (err) {
      outcomes.push({ query, ok: false, error: errorMessage(err) });
    }
  }

  return outcomes.flatMap((outcome) => {
    if (!outcome.ok) {
      console.warn(`[topic-source] Search failed for "${outcome.query}": ${outcome.error}`);
      return [];
    }
    console.log(`[topic-source] "${outcome.query}": ${outcome.candidates.length} result(s)`);
    return outcome.candidates;
  });
}

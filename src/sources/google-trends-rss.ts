import { XMLParser } from 'fast-xml-parser';
import { InfrastructureError, describeError } from '../errors.js';
import type { KeywordSource } from './types.js';

const RSS_URL = 'https://trends.google.com/trending/rss';

interface TrendItem {
  title?: string | number;
  'ht:approx_traffic'?: string;
}

function parseTraffic(traffic?: string): number {
  if (!traffic) return 0;
  // "200,000+" → 200000
  return parseInt(traffic.replace(/[,+]/g, ''), 10) || 0;
}

/** Titles from a trending-searches RSS document, highest approximate traffic first. */
export function parseTrendingRss(xml: string): string[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    processEntities: true,
  });
  const feed: unknown = parser.parse(xml);

  const items = extractItems(feed);
  return items
    .filter((item): item is TrendItem & { title: string | number } => item.title !== undefined && String(item.title).trim() !== '')
    .map((item, index) => ({ title: String(item.title), traffic: parseTraffic(item['ht:approx_traffic']), index }))
    .sort((a, b) => b.traffic - a.traffic || a.index - b.index)
    .map((item) => item.title);
}

function extractItems(feed: unknown): TrendItem[] {
  if (!isRecord(feed) || !isRecord(feed.rss) || !isRecord(feed.rss.channel)) return [];
  const items = feed.rss.channel.item;
  if (items === undefined) return [];
  const list: unknown[] = Array.isArray(items) ? items : [items];
  return list.filter(isRecord).map((item) => ({
    title: typeof item.title === 'string' || typeof item.title === 'number' ? item.title : undefined,
    'ht:approx_traffic': typeof item['ht:approx_traffic'] === 'string' ? item['ht:approx_traffic'] : undefined,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Daily trending searches for one geo, as published on the Google Trends RSS feed. */
export class GoogleTrendsRssSource implements KeywordSource {
  readonly name = 'google-trends-rss';

  constructor(
    private readonly geo: string = 'US',
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async fetchCandidates(limit?: number): Promise<string[]> {
    const url = `${RSS_URL}?geo=${encodeURIComponent(this.geo)}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { 'User-Agent': 'momentum-pipeline/0.1.0' },
      });
    } catch (err) {
      throw new InfrastructureError(`Google Trends RSS unreachable: ${describeError(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new InfrastructureError(`Google Trends RSS returned ${res.status}`);
    }

    const titles = parseTrendingRss(await res.text());
    return limit === undefined ? titles : titles.slice(0, limit);
  }
}

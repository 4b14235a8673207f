import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  buildSite,
  generateIndexHtml,
  generateJsonFeed,
  generateKeywordHtml,
  generateRssFeed,
  sparklinePoints,
  type KeywordPage,
} from '../src/publisher/site-generator.js';

const date = '2026-03-02';
const site = { siteUrl: 'https://example.com' };

function page(id: number, keyword: string, momentum: number, series: number[] | null = [10, 20, 30]): KeywordPage {
  return {
    snapshot: {
      keyword_id: id,
      keyword,
      keyword_type: keyword.startsWith('#') ? 'hashtag' : 'keyword',
      snapshot_date: date,
      momentum_score: momentum,
      raw_score: 0.5,
      lift: 1.25,
      acceleration: 0.4,
      novelty: 0.875,
      noise: 0.1,
    },
    series,
  };
}

const pages: KeywordPage[] = [
  page(1, 'dupes', 55),
  page(2, 'matcha latte', 81),
  page(3, 'cottage core', 55),
];

describe('sparklinePoints', () => {
  it('scales values to the series maximum', () => {
    expect(sparklinePoints([0, 50, 100])).toBe('0.0,120.0 300.0,60.0 600.0,0.0');
  });

  it('keeps an all-zero series on the baseline', () => {
    expect(sparklinePoints([0, 0])).toBe('0.0,120.0 600.0,120.0');
  });

  it('handles a single point and an empty series', () => {
    expect(sparklinePoints([40])).toBe('0.0,0.0');
    expect(sparklinePoints([])).toBe('');
  });
});

describe('index page', () => {
  it('ranks keywords by momentum, ties alphabetically', () => {
    const html = generateIndexHtml(pages, date);

    expect(html).toContain('<tr><td>1</td><td><a href="/keywords/2/">matcha latte</a></td><td>81</td></tr>');
    expect(html).toContain('<tr><td>2</td><td><a href="/keywords/3/">cottage core</a></td><td>55</td></tr>');
    expect(html).toContain('<tr><td>3</td><td><a href="/keywords/1/">dupes</a></td><td>55</td></tr>');
    expect(html).toContain('<time datetime="2026-03-02">2026-03-02</time> · 3 keywords');
  });

  it('escapes keyword text', () => {
    const html = generateIndexHtml([page(9, '<script>alert("x")</script>', 50)], date);

    expect(html).toContain('&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;');
    expect(html).not.toContain('<script>alert');
  });
});

describe('keyword page', () => {
  it('renders the metrics and the weekly chart', () => {
    const html = generateKeywordHtml(page(2, 'matcha latte', 81, [0, 50, 100]), date);

    expect(html).toContain('<h1>matcha latte</h1>');
    expect(html).toContain('<p class="score">81/100</p>');
    expect(html).toContain('<dt>Lift</dt><dd>1.25</dd>');
    expect(html).toContain('<dt>Novelty</dt><dd>87.5%</dd>');
    expect(html).toContain('points="0.0,120.0 300.0,60.0 600.0,0.0"');
    expect(html).toContain('<figcaption>Weekly search interest, 3 weeks</figcaption>');
    expect(html).toContain('<script type="application/json" id="series">[0,50,100]</script>');
  });

  it('says so when no series is cached', () => {
    const html = generateKeywordHtml(page(2, 'matcha latte', 81, null), date);

    expect(html).toContain('<p>No series data available.</p>');
    expect(html).not.toContain('<svg');
  });
});

describe('feeds', () => {
  it('produces a JSON Feed 1.1 document in rank order', () => {
    const feed = JSON.parse(generateJsonFeed(pages, date, site));

    expect(feed.version).toBe('https://jsonfeed.org/version/1.1');
    expect(feed.feed_url).toBe('https://example.com/feed.json');
    expect(feed.items.map((i: { title: string }) => i.title)).toEqual(['matcha latte', 'cottage core', 'dupes']);
    expect(feed.items[0]).toMatchObject({
      id: '2026-03-02-2',
      url: 'https://example.com/keywords/2/',
      date_published: '2026-03-02T00:00:00.000Z',
      tags: ['keyword'],
      content_text: 'Momentum 81/100 (lift 1.25, acceleration 0.40)',
      _momentum: { momentum_score: 81, lift: 1.25, novelty: 0.875 },
    });
  });

  it('produces an RSS 2.0 document', () => {
    const xml = generateRssFeed(pages, date, site);

    expect(xml).toContain('<rss version="2.0"');
    expect(xml).toContain('matcha latte (81/100)');
    expect(xml).toContain('<link>https://example.com/keywords/2/</link>');
    expect(xml.indexOf('matcha latte')).toBeLessThan(xml.indexOf('dupes'));
  });
});

describe('buildSite', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), 'momentum-site-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  it('writes the full tree for a snapshot date', async () => {
    const files = await buildSite(pages, outDir, date, site);

    expect(files.map((f) => f.slice(outDir.length + 1)).sort()).toEqual([
      'data/2026-03-02.json',
      'feed.json',
      'feed.xml',
      'index.html',
      'keywords/1/index.html',
      'keywords/2/index.html',
      'keywords/3/index.html',
    ]);
    expect((await readdir(join(outDir, 'keywords'))).sort()).toEqual(['1', '2', '3']);

    const data = JSON.parse(await readFile(join(outDir, 'data', '2026-03-02.json'), 'utf-8'));
    expect(data).toHaveLength(3);
    expect(data[0]).toMatchObject({ keyword_id: 2, keyword: 'matcha latte', weekly_series: [10, 20, 30] });
  });

  it('writes an empty index when there are no pages', async () => {
    const files = await buildSite([], outDir, date, site);

    expect(files).toHaveLength(4);
    expect(await readFile(join(outDir, 'index.html'), 'utf-8')).toContain('0 keywords');
  });
});

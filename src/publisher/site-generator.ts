import { Feed } from 'feed';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { SnapshotWithKeyword } from '../db/types.js';

const SITE_TITLE = 'Keyword Momentum';
const SITE_DESCRIPTION = 'Daily momentum scores for emerging search keywords, computed from weekly search interest.';

export interface KeywordPage {
  snapshot: SnapshotWithKeyword;
  series: number[] | null; // weekly interest, oldest first
}

export interface SiteOptions {
  siteUrl: string;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function keywordPath(page: KeywordPage): string {
  return `/keywords/${page.snapshot.keyword_id}/`;
}

function sortPages(pages: readonly KeywordPage[]): KeywordPage[] {
  return [...pages].sort(
    (a, b) =>
      b.snapshot.momentum_score - a.snapshot.momentum_score ||
      a.snapshot.keyword.localeCompare(b.snapshot.keyword),
  );
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<link rel="alternate" type="application/feed+json" href="/feed.json">
<link rel="alternate" type="application/rss+xml" href="/feed.xml">
</head>
<body>
${body}
</body>
</html>
`;
}

/**
 * Polyline for an inline SVG chart. Values are scaled to the series maximum
 * (Google Trends values already sit on 0-100, so this is usually 100).
 */
export function sparklinePoints(series: readonly number[], width = 600, height = 120): string {
  if (series.length === 0) return '';
  const max = Math.max(...series, 1);
  const step = series.length > 1 ? width / (series.length - 1) : 0;
  return series
    .map((v, i) => `${(i * step).toFixed(1)},${(height - (v / max) * height).toFixed(1)}`)
    .join(' ');
}

export function generateIndexHtml(pages: readonly KeywordPage[], date: string): string {
  const rows = sortPages(pages)
    .map((page, i) => {
      const s = page.snapshot;
      return `<tr><td>${i + 1}</td><td><a href="${keywordPath(page)}">${escapeHtml(s.keyword)}</a></td><td>${s.momentum_score}</td></tr>`;
    })
    .join('\n');

  return layout(
    `${SITE_TITLE} · ${date}`,
    `<h1>${SITE_TITLE}</h1>
<p>${SITE_DESCRIPTION}</p>
<p>Updated: <time datetime="${date}">${date}</time> · ${pages.length} keywords</p>
<table>
<thead><tr><th>#</th><th>Keyword</th><th>Momentum</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>`,
  );
}

export function generateKeywordHtml(page: KeywordPage, date: string): string {
  const s = page.snapshot;
  const chart = page.series && page.series.length > 0
    ? `<figure>
<svg viewBox="0 0 600 120" width="600" height="120" role="img" aria-label="Weekly search interest">
<polyline fill="none" stroke="currentColor" stroke-width="2" points="${sparklinePoints(page.series)}"/>
</svg>
<figcaption>Weekly search interest, ${page.series.length} weeks</figcaption>
</figure>
<script type="application/json" id="series">${JSON.stringify(page.series)}</script>`
    : '<p>No series data available.</p>';

  return layout(
    `${s.keyword} · ${SITE_TITLE}`,
    `<a href="/">← All keywords</a>
<h1>${escapeHtml(s.keyword)}</h1>
<p class="score">${s.momentum_score}/100</p>
<p>Last updated: <time datetime="${date}">${date}</time></p>
<dl>
<dt>Lift</dt><dd>${s.lift.toFixed(2)}</dd>
<dt>Acceleration</dt><dd>${s.acceleration.toFixed(2)}</dd>
<dt>Novelty</dt><dd>${(s.novelty * 100).toFixed(1)}%</dd>
<dt>Noise</dt><dd>${s.noise.toFixed(2)}</dd>
</dl>
${chart}`,
  );
}

export function generateJsonFeed(pages: readonly KeywordPage[], date: string, opts: SiteOptions): string {
  const published = new Date(`${date}T00:00:00Z`).toISOString();
  const items = sortPages(pages).map((page) => {
    const s = page.snapshot;
    return {
      id: `${date}-${s.keyword_id}`,
      url: `${opts.siteUrl}${keywordPath(page)}`,
      title: s.keyword,
      content_text: `Momentum ${s.momentum_score}/100 (lift ${s.lift.toFixed(2)}, acceleration ${s.acceleration.toFixed(2)})`,
      date_published: published,
      tags: [s.keyword_type],
      _momentum: {
        momentum_score: s.momentum_score,
        raw_score: s.raw_score,
        lift: s.lift,
        acceleration: s.acceleration,
        novelty: s.novelty,
        noise: s.noise,
      },
    };
  });

  return JSON.stringify(
    {
      version: 'https://jsonfeed.org/version/1.1',
      title: SITE_TITLE,
      home_page_url: opts.siteUrl,
      feed_url: `${opts.siteUrl}/feed.json`,
      description: SITE_DESCRIPTION,
      items,
    },
    null,
    2,
  );
}

export function generateRssFeed(pages: readonly KeywordPage[], date: string, opts: SiteOptions): string {
  const updated = new Date(`${date}T00:00:00Z`);
  const feed = new Feed({
    title: SITE_TITLE,
    description: SITE_DESCRIPTION,
    id: opts.siteUrl,
    link: opts.siteUrl,
    language: 'en',
    updated,
    copyright: 'All rights reserved',
    feedLinks: {
      json: `${opts.siteUrl}/feed.json`,
      rss: `${opts.siteUrl}/feed.xml`,
    },
  });

  for (const page of sortPages(pages)) {
    const s = page.snapshot;
    feed.addItem({
      title: `${s.keyword} (${s.momentum_score}/100)`,
      id: `${opts.siteUrl}${keywordPath(page)}#${date}`,
      link: `${opts.siteUrl}${keywordPath(page)}`,
      description: `Momentum ${s.momentum_score}/100 on ${date}`,
      date: updated,
      category: [{ name: s.keyword_type }],
    });
  }

  return feed.rss2();
}

/** Write the full static tree for one snapshot date under `outDir`. Returns written paths. */
export async function buildSite(
  pages: readonly KeywordPage[],
  outDir: string,
  date: string,
  opts: SiteOptions,
): Promise<string[]> {
  const files: string[] = [];
  const write = async (relative: string, content: string) => {
    const path = join(outDir, relative);
    await writeFile(path, content, 'utf-8');
    files.push(path);
  };

  await mkdir(join(outDir, 'data'), { recursive: true });
  await write('index.html', generateIndexHtml(pages, date));

  for (const page of pages) {
    await mkdir(join(outDir, 'keywords', String(page.snapshot.keyword_id)), { recursive: true });
    await write(join('keywords', String(page.snapshot.keyword_id), 'index.html'), generateKeywordHtml(page, date));
  }

  await write(
    join('data', `${date}.json`),
    JSON.stringify(
      sortPages(pages).map((p) => ({ ...p.snapshot, weekly_series: p.series })),
      null,
      2,
    ),
  );
  await write('feed.json', generateJsonFeed(pages, date, opts));
  await write('feed.xml', generateRssFeed(pages, date, opts));

  return files;
}

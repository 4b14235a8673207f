#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import { getConfig, type AppConfig } from './config.js';
import { describeError } from './errors.js';
import { normalizeKeyword } from './keywords/normalize.js';
import { createLogger } from './logger.js';
import { createPipeline, createServices } from './pipeline/compose.js';
import { collectPages, isSnapshotDate, type PipelineRunReport } from './pipeline/daily-pipeline.js';
import { acquireRunLock, RunInProgressError, type RunLock } from './pipeline/run-lock.js';
import { publishTree } from './publisher/atomic-publish.js';
import { buildSite } from './publisher/site-generator.js';
import { scoreSeries } from './scoring/momentum.js';
import { FileKeywordSource } from './sources/file.js';
import { GoogleTrendsRssSource } from './sources/google-trends-rss.js';
import type { KeywordSource } from './sources/types.js';

function parseDate(value: string): string {
  if (!isSnapshotDate(value)) throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  return value;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function loadConfig(): AppConfig {
  try {
    return getConfig();
  } catch (err) {
    console.error(describeError(err));
    process.exit(1);
  }
}

function printReport(report: PipelineRunReport): void {
  const line = '='.repeat(60);
  console.log(`\n${line}`);
  console.log('Pipeline run');
  console.log(line);
  console.log(`Snapshot date:     ${report.snapshot_date}`);
  console.log(`State:             ${report.state}`);
  console.log(`Duration:          ${(report.duration_ms / 1000).toFixed(1)}s`);
  console.log(`Keywords fetched:  ${report.keywords_fetched}`);
  console.log(`Keywords scored:   ${report.keywords_scored}`);
  console.log(`Keywords failed:   ${report.keywords_failed}`);
  console.log(`Snapshots skipped: ${report.snapshots_skipped}`);
  console.log(`Published:         ${report.published}`);
  console.log(`Success:           ${report.success}`);
  if (report.fatal_error) {
    console.error(`\nFatal: ${report.fatal_error}`);
  }
  if (report.errors.length > 0) {
    console.log(`\nKeyword errors (${report.errors.length}):`);
    for (const e of report.errors) {
      console.log(`  - [${e.stage}] ${e.keyword}: ${e.error}`);
    }
  }
  console.log(line);
}

const program = new Command();

program
  .name('momentum')
  .description('Keyword momentum pipeline: cached weekly trends, deterministic scoring, atomic static publishing')
  .version('0.1.0');

program
  .command('run')
  .description('Run the daily pipeline once')
  .option('--date <date>', 'Snapshot date (YYYY-MM-DD), default: today (UTC)', parseDate)
  .option('--max-keywords <n>', 'Maximum number of keywords to process', parsePositiveInt)
  .option('--source <source>', 'Keyword source: rss or file', 'rss')
  .option('--keywords-file <path>', 'Keyword list for --source file (one per line)')
  .action(async (opts: { date?: string; maxKeywords?: number; source: string; keywordsFile?: string }) => {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);

    let source: KeywordSource;
    if (opts.source === 'file') {
      if (!opts.keywordsFile) {
        console.error('--source file requires --keywords-file <path>');
        process.exit(1);
      }
      source = new FileKeywordSource(resolve(opts.keywordsFile));
    } else if (opts.source === 'rss') {
      source = new GoogleTrendsRssSource(config.keywordSourceGeo);
    } else {
      console.error(`Unknown source: ${opts.source}. Use rss or file.`);
      process.exit(1);
    }

    let lock: RunLock;
    try {
      lock = await acquireRunLock(`${resolve(config.publish.publicDir)}.lock`);
    } catch (err) {
      console.error(err instanceof RunInProgressError ? err.message : `Cannot start run: ${describeError(err)}`);
      process.exit(1);
    }

    let report: PipelineRunReport;
    try {
      const services = createServices(config, logger);
      const pipeline = createPipeline(config, logger, services, source);
      report = await pipeline.run({ date: opts.date, keywordLimit: opts.maxKeywords });
    } catch (err) {
      // Only wiring can throw here (missing credentials); run() itself reports.
      console.error(`Pipeline could not start: ${describeError(err)}`);
      process.exitCode = 1;
      return;
    } finally {
      await lock.release();
    }

    printReport(report);
    // Degraded runs (nothing scored) still exit 0; only FAILED is an error.
    process.exitCode = report.state === 'FAILED' ? 1 : 0;
  });

program
  .command('score <keyword>')
  .description('Fetch (or reuse) the weekly series for one keyword and print its metrics')
  .option('--refresh', 'Invalidate the cached series before scoring')
  .action(async (rawKeyword: string, opts: { refresh?: boolean }) => {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    const keyword = normalizeKeyword(rawKeyword);
    if (!keyword) {
      console.error('Keyword is empty after normalization.');
      process.exit(1);
    }

    try {
      const { store, cache, fetcher } = createServices(config, logger);
      const known = await store.findKeyword(keyword);
      let series: number[];
      let origin: string;
      if (known) {
        if (opts.refresh) await cache.invalidate(known.id);
        const lookup = await cache.getOrFetch(known, config.trends.geo, config.trends.timeframe);
        series = lookup.series;
        origin = lookup.source;
      } else {
        // Not tracked yet: score without caching
        series = await fetcher.fetch(keyword, config.trends.geo, config.trends.timeframe);
        origin = 'fetched (untracked)';
      }

      const m = scoreSeries(series);
      console.log(`${keyword} (${series.length} weeks, ${origin})`);
      console.log(`  momentum:     ${m.momentum_score}/100`);
      console.log(`  raw score:    ${m.raw_score.toFixed(4)}`);
      console.log(`  lift:         ${m.lift.toFixed(4)}`);
      console.log(`  acceleration: ${m.acceleration.toFixed(4)}`);
      console.log(`  novelty:      ${m.novelty.toFixed(4)}`);
      console.log(`  noise:        ${m.noise.toFixed(4)}`);
    } catch (err) {
      console.error(`Scoring "${keyword}" failed: ${describeError(err)}`);
      process.exitCode = 1;
    }
  });

program
  .command('build')
  .description('Render the static page tree for a stored snapshot date')
  .requiredOption('--date <date>', 'Snapshot date (YYYY-MM-DD)', parseDate)
  .requiredOption('--out <dir>', 'Output directory')
  .action(async (opts: { date: string; out: string }) => {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    try {
      const { store } = createServices(config, logger);
      const pages = await collectPages(store, opts.date, config.trends.geo, config.trends.timeframe);
      if (pages.length === 0) {
        console.log(`No snapshots stored for ${opts.date}.`);
        return;
      }
      const files = await buildSite(pages, resolve(opts.out), opts.date, { siteUrl: config.siteUrl });
      console.log(`Wrote ${files.length} files for ${pages.length} keywords to ${resolve(opts.out)}`);
    } catch (err) {
      console.error(`Build failed: ${describeError(err)}`);
      process.exitCode = 1;
    }
  });

program
  .command('publish')
  .description('Atomically swap a staged directory into the live directory')
  .requiredOption('--staged <dir>', 'Staged (newly generated) directory')
  .option('--live <dir>', 'Live directory served to readers (default: PUBLIC_DIR)')
  .action(async (opts: { staged: string; live?: string }) => {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    const live = resolve(opts.live ?? config.publish.publicDir);
    try {
      await publishTree(resolve(opts.staged), live, {
        logger,
        permissions: {
          fileMode: config.publish.fileMode,
          dirMode: config.publish.dirMode,
          uid: config.publish.uid,
          gid: config.publish.gid,
        },
        forbiddenTerms: config.publish.forbiddenTerms,
      });
      console.log(`Published ${resolve(opts.staged)} -> ${live}`);
    } catch (err) {
      console.error(describeError(err));
      process.exitCode = 1;
    }
  });

await program.parseAsync();

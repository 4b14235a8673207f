import { rm } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Keyword, MomentumStore } from '../db/types.js';
import { FetchError, InfrastructureError, InsufficientDataError, describeError } from '../errors.js';
import { normalizeCandidates, type NormalizedKeyword } from '../keywords/normalize.js';
import { silentLogger, type Logger } from '../logger.js';
import { attempt, err, ok, type Outcome } from '../outcome.js';
import { publishTree, type PublishOptions, type PublishOutcome, type TreePermissions } from '../publisher/atomic-publish.js';
import { buildSite, type KeywordPage, type SiteOptions } from '../publisher/site-generator.js';
import { DEFAULT_WINDOWS, scoreSeries, type ScoringWindows } from '../scoring/momentum.js';
import type { KeywordSource } from '../sources/types.js';
import type { TrendsCache } from '../trends/cache.js';
import { systemClock, type Clock } from '../trends/timing.js';

export type PipelineState = 'INGESTING' | 'SCORING' | 'PUBLISHING' | 'DONE' | 'FAILED';

export interface KeywordFailure {
  keyword: string;
  stage: 'fetch' | 'score';
  error: string;
}

export interface PipelineRunReport {
  snapshot_date: string;
  state: PipelineState;
  keywords_fetched: number;
  keywords_scored: number;
  keywords_failed: number;
  snapshots_skipped: number;
  errors: KeywordFailure[];
  fatal_error?: string;
  published: boolean;
  started_at: string;
  duration_ms: number;
  success: boolean;
}

export interface RunOptions {
  date?: string; // YYYY-MM-DD, defaults to today (UTC)
  keywordLimit?: number;
}

export interface DailyPipelineDeps {
  source: KeywordSource;
  store: MomentumStore;
  cache: TrendsCache;
  liveDir: string;
  site: SiteOptions;
  geo?: string;
  timeframe?: string;
  ttlMs?: number;
  windows?: ScoringWindows;
  permissions?: TreePermissions;
  forbiddenTerms?: readonly string[];
  build?: typeof buildSite;
  publish?: (staged: string, live: string, opts: PublishOptions) => Promise<PublishOutcome>;
  clock?: Clock;
  logger?: Logger;
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isSnapshotDate(value: string): boolean {
  return DATE_RE.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}

/** Pages for every snapshot stored for `date`, with the cached series behind each. */
export async function collectPages(
  store: MomentumStore,
  date: string,
  geo: string,
  timeframe: string,
): Promise<KeywordPage[]> {
  const snapshots = await store.listSnapshotsForDate(date);
  const pages: KeywordPage[] = [];
  for (const snapshot of snapshots) {
    const entry = await store.getCacheEntry(snapshot.keyword_id, geo, timeframe);
    pages.push({ snapshot, series: entry?.weekly_series ?? null });
  }
  return pages;
}

/**
 * Nightly run: ingest candidates, fetch-or-reuse each weekly series, score,
 * persist a snapshot, then rebuild and swap the static tree.
 *
 * Per-keyword problems come back as `err` outcomes and are folded into the
 * report. Store, source and filesystem failures end the run in FAILED.
 * `run()` resolves with a report in every case.
 */
export class DailyPipeline {
  private readonly deps: DailyPipelineDeps;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private active = false;

  constructor(deps: DailyPipelineDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.active;
  }

  async run(opts: RunOptions = {}): Promise<PipelineRunReport> {
    const startedAt = this.clock();
    const report: PipelineRunReport = {
      snapshot_date: opts.date ?? new Date(startedAt).toISOString().slice(0, 10),
      state: 'INGESTING',
      keywords_fetched: 0,
      keywords_scored: 0,
      keywords_failed: 0,
      snapshots_skipped: 0,
      errors: [],
      published: false,
      started_at: new Date(startedAt).toISOString(),
      duration_ms: 0,
      success: false,
    };

    if (this.active) {
      return this.finish(report, startedAt, 'A pipeline run is already in progress');
    }
    if (!isSnapshotDate(report.snapshot_date)) {
      return this.finish(report, startedAt, `Invalid snapshot date "${report.snapshot_date}", expected YYYY-MM-DD`);
    }

    this.active = true;
    const log = this.logger.child({ snapshot_date: report.snapshot_date });
    try {
      log.info({ keyword_limit: opts.keywordLimit }, 'pipeline started');

      const candidates = await this.ingest(opts.keywordLimit);
      report.keywords_fetched = candidates.length;
      log.info({ source: this.deps.source.name, keywords: candidates.length }, 'candidates ingested');

      report.state = 'SCORING';
      for (const [i, candidate] of candidates.entries()) {
        const kwLog = log.child({ keyword: candidate.keyword, position: `${i + 1}/${candidates.length}` });
        const outcome = await this.processKeyword(candidate, report.snapshot_date, kwLog);

        if (outcome.ok) {
          report.keywords_scored++;
          if (outcome.value === 'skipped') {
            report.snapshots_skipped++;
            kwLog.debug('snapshot already recorded for this date');
          }
        } else {
          report.keywords_failed++;
          report.errors.push(outcome.error);
          kwLog.warn({ stage: outcome.error.stage, err: outcome.error.error }, 'keyword skipped');
        }
      }

      if (report.keywords_scored === 0) {
        log.warn('no keywords scored, skipping publish');
        return this.finish(report, startedAt);
      }

      report.state = 'PUBLISHING';
      await this.stageAndPublish(report.snapshot_date, log);
      report.published = true;
      return this.finish(report, startedAt);
    } catch (error) {
      log.error({ err: describeError(error), state: report.state }, 'pipeline failed');
      return this.finish(report, startedAt, describeError(error));
    } finally {
      this.active = false;
    }
  }

  private async ingest(limit?: number): Promise<NormalizedKeyword[]> {
    let raw = await this.fetchCandidates(limit);
    let unique = normalizeCandidates(raw);
    // A full page that dedupes below the limit may hide more distinct keywords
    if (limit !== undefined && unique.length < limit && raw.length >= limit) {
      raw = await this.fetchCandidates(undefined);
      unique = normalizeCandidates(raw);
    }
    return limit === undefined ? unique : unique.slice(0, limit);
  }

  private async fetchCandidates(limit: number | undefined): Promise<string[]> {
    try {
      return await this.deps.source.fetchCandidates(limit);
    } catch (error) {
      if (error instanceof InfrastructureError) throw error;
      throw new InfrastructureError(`Keyword source "${this.deps.source.name}" failed: ${describeError(error)}`, { cause: error });
    }
  }

  private async processKeyword(
    candidate: NormalizedKeyword,
    date: string,
    log: Logger,
  ): Promise<Outcome<'inserted' | 'skipped', KeywordFailure>> {
    const { store, cache } = this.deps;
    const keyword: Keyword = await store.upsertKeyword(candidate.keyword, candidate.keyword_type, date);

    const lookup = await attempt(
      () => cache.getOrFetch(keyword, this.geo, this.timeframe, this.deps.ttlMs),
      [FetchError],
    );
    if (!lookup.ok) {
      return err({ keyword: keyword.keyword, stage: 'fetch', error: lookup.error.message });
    }

    const metrics = await attempt(() => scoreSeries(lookup.value.series, this.deps.windows ?? DEFAULT_WINDOWS), [InsufficientDataError]);
    if (!metrics.ok) {
      return err({ keyword: keyword.keyword, stage: 'score', error: metrics.error.message });
    }

    const m = metrics.value;
    const write = await store.insertSnapshot({
      keyword_id: keyword.id,
      snapshot_date: date,
      momentum_score: m.momentum_score,
      raw_score: m.raw_score,
      lift: m.lift,
      acceleration: m.acceleration,
      novelty: m.novelty,
      noise: m.noise,
    });
    log.info({ momentum_score: m.momentum_score, series_source: lookup.value.source }, 'keyword scored');
    return ok(write);
  }

  private async stageAndPublish(date: string, log: Logger): Promise<void> {
    const live = resolve(this.deps.liveDir);
    const staged = `${live}.staging`;
    const build = this.deps.build ?? buildSite;
    const publish = this.deps.publish ?? publishTree;

    const pages = await collectPages(this.deps.store, date, this.geo, this.timeframe);

    try {
      await rm(staged, { recursive: true, force: true });
      const files = await build(pages, staged, date, this.deps.site);
      log.info({ staged, files: files.length }, 'staged static tree');
    } catch (error) {
      await rm(staged, { recursive: true, force: true }).catch((cleanupError: unknown) => {
        log.warn({ staged, err: describeError(cleanupError) }, 'could not remove partial staging tree');
      });
      throw new InfrastructureError(`Staging pages in ${staged} failed: ${describeError(error)}`, { cause: error });
    }

    await publish(staged, live, {
      permissions: this.deps.permissions,
      forbiddenTerms: this.deps.forbiddenTerms,
      logger: log,
    });
  }

  private get geo(): string {
    return this.deps.geo ?? '';
  }

  private get timeframe(): string {
    return this.deps.timeframe ?? 'today 5-y';
  }

  private finish(report: PipelineRunReport, startedAt: number, fatal?: string): PipelineRunReport {
    if (fatal !== undefined) {
      report.state = 'FAILED';
      report.fatal_error = fatal;
    } else {
      report.state = 'DONE';
    }
    report.duration_ms = this.clock() - startedAt;
    report.success = report.state === 'DONE' && report.keywords_scored > 0 && report.published;

    this.logger.info(
      {
        snapshot_date: report.snapshot_date,
        state: report.state,
        scored: report.keywords_scored,
        failed: report.keywords_failed,
        duration_ms: report.duration_ms,
      },
      'pipeline finished',
    );
    return report;
  }
}

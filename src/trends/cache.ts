import type { Keyword, MomentumStore, TrendsCacheEntry } from '../db/types.js';
import { FetchError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { TrendsFetcher } from './fetcher.js';
import { systemClock, type Clock } from './timing.js';

export const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export type CacheSource = 'cache' | 'fetched' | 'stale';

export interface CacheLookup {
  series: number[];
  source: CacheSource;
  fetched_at: string;
}

export interface TrendsCacheOptions {
  store: MomentumStore;
  fetcher: TrendsFetcher;
  ttlMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Decides between reusing a stored weekly series and fetching a new one.
 *
 * Fresh entries never trigger an external call. A failed refetch falls back to
 * whatever entry exists, however old; FetchError surfaces only with nothing cached.
 */
export class TrendsCache {
  private readonly store: MomentumStore;
  private readonly fetcher: TrendsFetcher;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(opts: TrendsCacheOptions) {
    this.store = opts.store;
    this.fetcher = opts.fetcher;
    this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? silentLogger;
  }

  isFresh(entry: TrendsCacheEntry, ttlMs: number = this.ttlMs): boolean {
    const age = this.clock() - Date.parse(entry.fetched_at);
    return age < ttlMs;
  }

  async getOrFetch(keyword: Keyword, geo: string, timeframe: string, ttlMs: number = this.ttlMs): Promise<CacheLookup> {
    const log = this.logger.child({ keyword: keyword.keyword, keyword_id: keyword.id });
    const cached = await this.store.getCacheEntry(keyword.id, geo, timeframe);

    if (cached && this.isFresh(cached, ttlMs)) {
      log.debug({ fetched_at: cached.fetched_at }, 'trends cache hit');
      return { series: cached.weekly_series, source: 'cache', fetched_at: cached.fetched_at };
    }

    let series: number[];
    try {
      series = await this.fetcher.fetch(keyword.keyword, geo, timeframe);
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      if (cached) {
        log.warn({ fetched_at: cached.fetched_at, err: err.message }, 'fetch failed, serving stale trends cache');
        return { series: cached.weekly_series, source: 'stale', fetched_at: cached.fetched_at };
      }
      throw err;
    }

    const entry: TrendsCacheEntry = {
      keyword_id: keyword.id,
      geo,
      timeframe,
      weekly_series: series,
      fetched_at: new Date(this.clock()).toISOString(),
    };
    await this.store.replaceCacheEntry(entry);
    return { series, source: 'fetched', fetched_at: entry.fetched_at };
  }

  async invalidate(keywordId: number): Promise<number> {
    const removed = await this.store.deleteCacheEntries(keywordId);
    this.logger.info({ keyword_id: keywordId, removed }, 'invalidated trends cache');
    return removed;
  }
}

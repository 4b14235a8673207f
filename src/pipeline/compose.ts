import type { SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from '../config.js';
import { createSupabaseClient, SupabaseStore } from '../db/supabase.js';
import type { MomentumStore } from '../db/types.js';
import type { Logger } from '../logger.js';
import type { KeywordSource } from '../sources/types.js';
import { TrendsCache } from '../trends/cache.js';
import { TrendsFetcher } from '../trends/fetcher.js';
import { GoogleTrendsTransport, type TrendsTransport } from '../trends/google-trends.js';
import { RateGate } from '../trends/rate-gate.js';
import { DailyPipeline } from './daily-pipeline.js';

export interface Services {
  store: MomentumStore;
  gate: RateGate;
  fetcher: TrendsFetcher;
  cache: TrendsCache;
}

/**
 * Wire the store, the shared rate gate, the fetcher and the cache from config.
 * Each call gets its own gate; share the returned services to share pacing.
 */
export function createServices(
  config: AppConfig,
  logger: Logger,
  overrides: { client?: SupabaseClient; transport?: TrendsTransport; store?: MomentumStore } = {},
): Services {
  const store = overrides.store
    ?? new SupabaseStore(overrides.client ?? createSupabaseClient(config.supabase.url, config.supabase.serviceKey));
  const gate = new RateGate({ minIntervalMs: config.trends.minDelayMs });
  const transport = overrides.transport ?? new GoogleTrendsTransport({ hl: config.trends.hl, tz: config.trends.tz });
  const fetcher = new TrendsFetcher({
    transport,
    gate,
    retry: { attempts: config.trends.maxAttempts, baseDelayMs: config.trends.backoffMs, factor: 2 },
    logger: logger.child({ component: 'fetcher' }),
  });
  const cache = new TrendsCache({
    store,
    fetcher,
    ttlMs: config.trends.cacheTtlMs,
    logger: logger.child({ component: 'cache' }),
  });
  return { store, gate, fetcher, cache };
}

export function createPipeline(config: AppConfig, logger: Logger, services: Services, source: KeywordSource): DailyPipeline {
  return new DailyPipeline({
    source,
    store: services.store,
    cache: services.cache,
    liveDir: config.publish.publicDir,
    site: { siteUrl: config.siteUrl },
    geo: config.trends.geo,
    timeframe: config.trends.timeframe,
    ttlMs: config.trends.cacheTtlMs,
    permissions: {
      fileMode: config.publish.fileMode,
      dirMode: config.publish.dirMode,
      uid: config.publish.uid,
      gid: config.publish.gid,
    },
    forbiddenTerms: config.publish.forbiddenTerms,
    logger: logger.child({ component: 'pipeline' }),
  });
}

import { FetchError, TransportError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { TrendsTransport } from './google-trends.js';
import type { RateGate } from './rate-gate.js';
import { DEFAULT_RETRY, RetryExhaustedError, withRetry, type RetryPolicy } from './retry.js';
import type { Sleep } from './timing.js';

export interface TrendsFetcherOptions {
  transport: TrendsTransport;
  gate: RateGate;
  retry?: RetryPolicy;
  sleep?: Sleep;
  logger?: Logger;
}

/** Client errors other than 429 will not change on retry (e.g. 404 "no data"). */
export function isRetryableFetchError(err: unknown): boolean {
  if (!(err instanceof TransportError) || err.status === undefined) return true;
  return err.status === 429 || err.status < 400 || err.status >= 500;
}

/**
 * Paced, retrying access to a TrendsTransport. Every attempt, including
 * retries, passes through the shared rate gate.
 */
export class TrendsFetcher {
  private readonly transport: TrendsTransport;
  private readonly gate: RateGate;
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;
  private readonly logger: Logger;

  constructor(opts: TrendsFetcherOptions) {
    this.transport = opts.transport;
    this.gate = opts.gate;
    this.retry = opts.retry ?? DEFAULT_RETRY;
    this.sleep = opts.sleep;
    this.logger = opts.logger ?? silentLogger;
  }

  async fetch(keyword: string, geo: string, timeframe: string): Promise<number[]> {
    const log = this.logger.child({ keyword, geo, timeframe });
    try {
      const series = await withRetry(
        async (attempt) => {
          await this.gate.wait();
          log.debug({ attempt }, 'requesting weekly series');
          const weekly = await this.transport.fetchWeekly(keyword, geo, timeframe);
          // empty timelines are failed lookups
          if (weekly.length === 0) throw new TransportError(`Empty weekly series for "${keyword}"`);
          return weekly;
        },
        { policy: this.retry, sleep: this.sleep, logger: log, shouldRetry: isRetryableFetchError },
      );
      log.info({ points: series.length }, 'fetched weekly series');
      return series;
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new FetchError(keyword, err.attempts, { cause: err.lastError });
      }
      throw new FetchError(keyword, 1, { cause: err });
    }
  }
}

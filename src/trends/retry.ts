import type { Logger } from '../logger.js';
import { describeError } from '../errors.js';
import { realSleep, type Sleep } from './timing.js';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 2000,
  factor: 2,
};

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`All ${attempts} attempts failed: ${describeError(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/** Delay before attempt `n + 1` (n is 1-based): base, base*factor, base*factor^2... */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * policy.factor ** (attempt - 1);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: {
    policy?: RetryPolicy;
    sleep?: Sleep;
    logger?: Logger;
    shouldRetry?: (err: unknown) => boolean;
  } = {},
): Promise<T> {
  const policy = opts.policy ?? DEFAULT_RETRY;
  const sleep = opts.sleep ?? realSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const retryable = opts.shouldRetry ? opts.shouldRetry(err) : true;
      if (!retryable || attempt === policy.attempts) {
        throw new RetryExhaustedError(attempt, err);
      }
      const wait = backoffDelay(policy, attempt);
      opts.logger?.warn({ attempt, attempts: policy.attempts, wait_ms: wait, err: describeError(err) }, 'attempt failed, backing off');
      await sleep(wait);
    }
  }

  throw new RetryExhaustedError(policy.attempts, lastError);
}

import { realSleep, systemClock, type Clock, type Sleep } from './timing.js';

export interface RateGateOptions {
  minIntervalMs?: number;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Enforces a minimum delay between consecutive external calls.
 *
 * One instance is shared by every fetcher that talks to the same upstream, so
 * the spacing holds across keywords. Callers are served in arrival order.
 */
export class RateGate {
  readonly minIntervalMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private lastCallAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(opts: RateGateOptions = {}) {
    this.minIntervalMs = opts.minIntervalMs ?? 1000;
    this.clock = opts.clock ?? systemClock;
    this.sleep = opts.sleep ?? realSleep;
  }

  /** Resolves once the caller may issue its call; records the call time. */
  wait(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    // The chain only orders callers; each caller still sees its own rejection.
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async take(): Promise<void> {
    if (this.lastCallAt !== null) {
      const elapsed = this.clock() - this.lastCallAt;
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastCallAt = this.clock();
  }
}

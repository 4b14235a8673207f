import { InsufficientDataError } from '../errors.js';

export interface MomentumMetrics {
  lift: number;
  acceleration: number;
  novelty: number;
  noise: number;
  raw_score: number;
  momentum_score: number; // integer, 1-100
}

export interface ScoringWindows {
  recent: number;
  prior: number;
  baseline: number;
  minPoints: number;
}

export const DEFAULT_WINDOWS: ScoringWindows = {
  recent: 7,
  prior: 21,
  baseline: 90,
  minPoints: 28,
};

export const WEIGHTS = {
  lift: 0.45,
  acceleration: 0.35,
  novelty: 0.25,
  noise: -0.25,
} as const;

// Keeps ratios finite when a window averages zero.
const STABILIZER = 0.01;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Sample standard deviation (n - 1). Zero for fewer than two points. */
export function stdev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - m) * (v - m);
  return Math.sqrt(squares / (values.length - 1));
}

/** Ordinary least-squares slope of value against index 0..n-1. */
export function slope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;
  for (let x = 0; x < n; x++) {
    const y = values[x];
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumXX += x * x;
  }

  const denominator = n * sumXX - sumX * sumX;
  if (denominator === 0) return 0;
  return (n * sumXY - sumX * sumY) / denominator;
}

/** (count below + half the count equal) / total. 0.5 for an empty population. */
export function percentileRank(value: number, population: readonly number[]): number {
  if (population.length === 0) return 0.5;
  let below = 0;
  let equal = 0;
  for (const v of population) {
    if (v < value) below++;
    else if (v === value) equal++;
  }
  return (below + 0.5 * equal) / population.length;
}

/**
 * Map a raw score onto 1-100 through a logistic curve.
 * Math.exp overflows to Infinity rather than throwing, which lands on the clamp.
 */
export function toMomentumScore(raw: number): number {
  if (Number.isNaN(raw)) return 1;
  const score = Math.round(100 / (1 + Math.exp(-raw)));
  return Math.min(100, Math.max(1, score));
}

/**
 * Score a weekly series (oldest first, newest last).
 *
 * Throws InsufficientDataError when the series is shorter than
 * `windows.minPoints` or contains a negative or non-finite value.
 */
export function scoreSeries(
  series: readonly number[],
  windows: ScoringWindows = DEFAULT_WINDOWS,
): MomentumMetrics {
  if (series.length < windows.minPoints) {
    throw new InsufficientDataError(series.length, windows.minPoints);
  }
  const badIndex = series.findIndex((v) => !Number.isFinite(v) || v < 0);
  if (badIndex !== -1) {
    throw new InsufficientDataError(
      series.length,
      windows.minPoints,
      `Unusable value ${series[badIndex]} at week index ${badIndex}`,
    );
  }

  const n = series.length;
  const recent = series.slice(n - windows.recent);
  const prior = series.slice(n - windows.recent - windows.prior, n - windows.recent);
  // Histories shorter than the baseline window use everything available.
  const baseline = series.slice(Math.max(0, n - windows.baseline));

  const recentMean = mean(recent);
  const priorMean = mean(prior);

  const lift = (recentMean - priorMean) / (priorMean + STABILIZER);
  const acceleration = slope(recent) - slope(prior);
  const novelty = 1 - percentileRank(mean(baseline), series);
  const noise = stdev(recent) / (recentMean + STABILIZER);

  const raw_score =
    WEIGHTS.lift * lift +
    WEIGHTS.acceleration * acceleration +
    WEIGHTS.novelty * novelty +
    WEIGHTS.noise * noise;

  return {
    lift,
    acceleration,
    novelty,
    noise,
    raw_score,
    momentum_score: toMomentumScore(raw_score),
  };
}

import { ConfigurationError } from './errors.js';
import { presentValues, type MetricSample } from './sample.js';

export type Trend = 'rising' | 'falling' | 'stable' | 'insufficient-data';

export interface TrendEpsilon {
  /** Fraction of the larger magnitude of the two compared means */
  relative: number;
  /** Floor for near-zero values */
  absolute: number;
}

export interface TrendOptions {
  /** Samples per side of the comparison (default: 3) */
  k?: number;
  epsilon?: Partial<TrendEpsilon>;
}

export const DEFAULT_TREND_K = 3;
export const DEFAULT_EPSILON: TrendEpsilon = { relative: 0.005, absolute: 0.01 };

const TREND_SYMBOLS: Record<Trend, string> = {
  rising: '↗',
  falling: '↘',
  stable: '─',
  'insufficient-data': '·',
};

export function trendSymbol(trend: Trend): string {
  return TREND_SYMBOLS[trend];
}

export function validateTrendOptions(options: TrendOptions, configKey = 'trend'): void {
  const k = options.k ?? DEFAULT_TREND_K;
  if (!Number.isInteger(k) || k <= 0) {
    throw new ConfigurationError(`Trend window k must be a positive integer, got ${k}`, { configKey: `${configKey}.k` });
  }
  const { relative, absolute } = { ...DEFAULT_EPSILON, ...options.epsilon };
  if (!(relative >= 0) || !(absolute >= 0)) {
    throw new ConfigurationError(
      `Trend epsilon must be non-negative, got relative=${relative} absolute=${absolute}`,
      { configKey: `${configKey}.epsilon` }
    );
  }
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Classify the direction of recent history.
 *
 * Missing samples are dropped first. The mean of the last `k` values is
 * compared with the mean of the `k` values before them; with fewer than `2k`
 * values, `k` shrinks to `floor(n / 2)`, down to latest-vs-previous. Fewer
 * than two values is `insufficient-data`.
 *
 * Only sample order matters; timestamps are ignored.
 */
export function trend(samples: readonly MetricSample[], options: TrendOptions = {}): Trend {
  validateTrendOptions(options);

  const values = presentValues(samples);
  if (values.length < 2) return 'insufficient-data';

  const k = Math.min(options.k ?? DEFAULT_TREND_K, Math.floor(values.length / 2));
  const recent = mean(values.slice(values.length - k));
  const previous = mean(values.slice(values.length - 2 * k, values.length - k));

  const { relative, absolute } = { ...DEFAULT_EPSILON, ...options.epsilon };
  const tolerance = Math.max(absolute, relative * Math.max(Math.abs(recent), Math.abs(previous)));
  const delta = recent - previous;

  if (delta === 0 || Math.abs(delta) < tolerance) return 'stable';
  return delta > 0 ? 'rising' : 'falling';
}

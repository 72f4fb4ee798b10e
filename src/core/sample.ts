/**
 * Metric identities and the immutable sample value type.
 *
 * A missing reading is `null`: it is threaded through classification, trend
 * and rendering as its own case and is never coerced to zero.
 */

/** Tracked metrics, in the fixed order the dashboard displays them */
export const METRICS = ['temperature', 'feels-like', 'humidity', 'wind-speed', 'pressure'] as const;

export type MetricName = (typeof METRICS)[number];

export interface MetricInfo {
  label: string;
  unit: string;
  /** Decimal places used for the current value and the range label */
  precision: number;
}

export const METRIC_INFO: Record<MetricName, MetricInfo> = {
  temperature: { label: 'Temperature', unit: '°F', precision: 1 },
  'feels-like': { label: 'Feels Like', unit: '°F', precision: 1 },
  humidity: { label: 'Humidity', unit: '%', precision: 0 },
  'wind-speed': { label: 'Wind Speed', unit: 'mph', precision: 1 },
  pressure: { label: 'Pressure', unit: 'inHg', precision: 2 },
};

export interface MetricSample {
  /** Epoch milliseconds */
  readonly timestamp: number;
  /** `null` when the reading was absent or the fetch failed */
  readonly value: number | null;
}

export function isMetricName(name: string): name is MetricName {
  return METRICS.some((metric) => metric === name);
}

/**
 * Create a frozen sample. Non-finite numbers count as missing.
 */
export function createSample(value: number | null | undefined, timestamp: number = Date.now()): MetricSample {
  const normalized = typeof value === 'number' && Number.isFinite(value) ? value : null;
  return Object.freeze({ timestamp, value: normalized });
}

export function isMissing(sample: MetricSample): boolean {
  return sample.value === null;
}

/**
 * Values of the non-missing samples, in order
 */
export function presentValues(samples: readonly MetricSample[]): number[] {
  const values: number[] = [];
  for (const sample of samples) {
    if (sample.value !== null) values.push(sample.value);
  }
  return values;
}

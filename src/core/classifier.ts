/**
 * Color band classification
 *
 * Each metric owns an ordered table of `{ upTo, band }` entries that
 * partitions the real line. A value belongs to the first entry whose
 * `upTo` is >= the value, so a boundary value always lands in the lower band.
 * The last entry must be open-ended (`upTo: Infinity`).
 */

import { ConfigurationError } from './errors.js';
import { METRICS, isMetricName, type MetricName } from './sample.js';

export type BandColor = 'blue' | 'cyan' | 'green' | 'yellow' | 'red';

/** Band name, suffixed with the color it renders in (e.g. `cold-blue`) */
export type ColorBand = `${string}-${BandColor}` | 'unknown';

export interface ThresholdBand {
  readonly upTo: number;
  readonly band: Exclude<ColorBand, 'unknown'>;
}

export type ThresholdTable = readonly ThresholdBand[];

export type ThresholdConfig = Readonly<Record<MetricName, ThresholdTable>>;

function freezeTable(table: ThresholdTable): ThresholdTable {
  return Object.freeze(table.map((entry) => Object.freeze({ upTo: entry.upTo, band: entry.band })));
}

/** Deep copy, frozen at every level */
function freezeThresholds(config: ThresholdConfig): ThresholdConfig {
  return Object.freeze({
    temperature: freezeTable(config.temperature),
    'feels-like': freezeTable(config['feels-like']),
    humidity: freezeTable(config.humidity),
    'wind-speed': freezeTable(config['wind-speed']),
    pressure: freezeTable(config.pressure),
  });
}

const TEMPERATURE_BANDS: ThresholdTable = freezeTable([
  { upTo: 32, band: 'cold-blue' },
  { upTo: 50, band: 'cool-cyan' },
  { upTo: 75, band: 'comfortable-green' },
  { upTo: 90, band: 'warm-yellow' },
  { upTo: Infinity, band: 'hot-red' },
]);

export const DEFAULT_THRESHOLDS: ThresholdConfig = freezeThresholds({
  temperature: TEMPERATURE_BANDS,
  'feels-like': TEMPERATURE_BANDS,
  humidity: [
    { upTo: 30, band: 'dry-yellow' },
    { upTo: 70, band: 'comfortable-green' },
    { upTo: Infinity, band: 'humid-cyan' },
  ],
  'wind-speed': [
    { upTo: 10, band: 'calm-green' },
    { upTo: 25, band: 'moderate-yellow' },
    { upTo: Infinity, band: 'strong-red' },
  ],
  pressure: [
    { upTo: 29.8, band: 'low-yellow' },
    { upTo: 30.2, band: 'normal-green' },
    { upTo: Infinity, band: 'high-cyan' },
  ],
});

const BAND_COLORS: readonly BandColor[] = ['blue', 'cyan', 'green', 'yellow', 'red'];

function isBandColor(value: string): value is BandColor {
  return BAND_COLORS.some((color) => color === value);
}

/** `cold-blue` yes, `cold`, `-blue` and `unknown` no */
export function isBandName(value: string): value is ThresholdBand['band'] {
  const dash = value.lastIndexOf('-');
  return dash > 0 && isBandColor(value.slice(dash + 1));
}

/**
 * Terminal color for a band. `unknown` renders white.
 */
export function bandColor(band: ColorBand): BandColor | 'white' {
  if (band === 'unknown') return 'white';
  const suffix = band.slice(band.lastIndexOf('-') + 1);
  return isBandColor(suffix) ? suffix : 'white';
}

/**
 * Validate one table: non-empty, strictly increasing bounds, open-ended top.
 */
export function validateThresholdTable(metric: string, table: ThresholdTable): void {
  const configKey = `thresholds.${metric}`;

  if (table.length === 0) {
    throw new ConfigurationError(`Threshold table for ${metric} is empty`, { configKey });
  }

  let previous = -Infinity;
  for (const entry of table) {
    if (Number.isNaN(entry.upTo)) {
      throw new ConfigurationError(`Threshold bound for ${metric} band "${entry.band}" is not a number`, { configKey });
    }
    if (entry.upTo <= previous) {
      throw new ConfigurationError(
        `Threshold bounds for ${metric} overlap: ${entry.upTo} does not exceed ${previous}`,
        { configKey }
      );
    }
    if (!isBandName(entry.band)) {
      throw new ConfigurationError(
        `Band "${entry.band}" for ${metric} must end with one of: ${BAND_COLORS.join(', ')}`,
        { configKey }
      );
    }
    previous = entry.upTo;
  }

  if (previous !== Infinity) {
    throw new ConfigurationError(
      `Threshold table for ${metric} leaves values above ${previous} uncovered`,
      { configKey }
    );
  }
}

/**
 * Build a frozen threshold config from per-metric overrides on top of the defaults.
 */
export function createThresholdConfig(
  overrides: Partial<Record<string, ThresholdTable>> = {}
): ThresholdConfig {
  for (const metric of Object.keys(overrides)) {
    if (!isMetricName(metric)) {
      throw new ConfigurationError(`Unknown metric in thresholds: ${metric}`, { configKey: `thresholds.${metric}` });
    }
  }

  const resolve = (metric: MetricName): ThresholdTable => {
    const table = freezeTable(overrides[metric] ?? DEFAULT_THRESHOLDS[metric]);
    validateThresholdTable(metric, table);
    return table;
  };

  return Object.freeze({
    temperature: resolve('temperature'),
    'feels-like': resolve('feels-like'),
    humidity: resolve('humidity'),
    'wind-speed': resolve('wind-speed'),
    pressure: resolve('pressure'),
  });
}

export class ColorClassifier {
  private readonly thresholds: ThresholdConfig;

  /** Keeps a frozen copy; later changes to `thresholds` have no effect */
  constructor(thresholds: ThresholdConfig = DEFAULT_THRESHOLDS) {
    const copy = freezeThresholds(thresholds);
    for (const metric of METRICS) {
      validateThresholdTable(metric, copy[metric]);
    }
    this.thresholds = copy;
  }

  classify(metric: MetricName, value: number | null): ColorBand {
    if (value === null || Number.isNaN(value)) return 'unknown';

    const table = this.thresholds[metric];
    for (const entry of table) {
      if (value <= entry.upTo) return entry.band;
    }
    // Unreachable for a validated table; the last bound is Infinity
    return table[table.length - 1].band;
  }
}

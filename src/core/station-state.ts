import { ColorClassifier, createThresholdConfig, type ColorBand, type ThresholdConfig } from './classifier.js';
import { ConfigurationError } from './errors.js';
import { RollingWindow, DEFAULT_CAPACITY } from './rolling-window.js';
import {
  METRICS,
  METRIC_INFO,
  createSample,
  isMetricName,
  type MetricName,
  type MetricSample,
} from './sample.js';
import { renderSparkline } from '../utils/sparkline.js';
import { trend, trendSymbol, validateTrendOptions, type Trend, type TrendOptions } from './trend.js';

export const DEFAULT_SPARKLINE_WIDTH = 25;

/** Pressure moves in hundredths of an inHg; a relative 0.5% would hide real changes */
export const DEFAULT_METRIC_TREND: Partial<Record<MetricName, TrendOptions>> = {
  pressure: { epsilon: { relative: 0.0005 } },
};

export interface StationStateOptions {
  /** Samples kept per metric (default: 60) */
  capacity?: number;
  /** Glyphs per sparkline (default: 25) */
  sparklineWidth?: number;
  thresholds?: ThresholdConfig;
  trend?: TrendOptions;
  /** Per-metric trend settings, merged over `trend` */
  metricTrend?: Partial<Record<MetricName, TrendOptions>>;
}

/**
 * One observation delivered by the data source
 */
export interface Reading {
  /** Epoch milliseconds */
  timestamp: number;
  values: Record<MetricName, number | null>;
}

/**
 * Render-ready state of one metric, recomputed on every call
 */
export interface Snapshot {
  metric: MetricName;
  label: string;
  unit: string;
  precision: number;
  current: number | null;
  band: ColorBand;
  trend: Trend;
  trendSymbol: string;
  sparkline: string;
  rangeLabel: string;
  /** Number of samples in the window, missing ones included */
  samples: number;
}

/**
 * Aggregates one rolling window per tracked metric and derives
 * the per-metric snapshots consumed by the display.
 */
export class StationState {
  private readonly windows: Map<MetricName, RollingWindow>;
  private readonly classifier: ColorClassifier;
  private readonly trendOptions: Record<MetricName, TrendOptions>;
  readonly sparklineWidth: number;

  constructor(options: StationStateOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    const width = options.sparklineWidth ?? DEFAULT_SPARKLINE_WIDTH;

    if (!Number.isInteger(width) || width < 0) {
      throw new ConfigurationError(`Sparkline width must be a non-negative integer, got ${width}`, {
        configKey: 'sparklineWidth',
      });
    }

    this.sparklineWidth = width;
    this.classifier = new ColorClassifier(options.thresholds ?? createThresholdConfig());
    this.windows = new Map(METRICS.map((metric) => [metric, new RollingWindow(capacity)]));

    const metricTrend = { ...DEFAULT_METRIC_TREND, ...options.metricTrend };
    const resolveTrend = (metric: MetricName): TrendOptions => {
      const base = options.trend ?? {};
      const override = metricTrend[metric] ?? {};
      const merged: TrendOptions = {
        k: override.k ?? base.k,
        epsilon: { ...base.epsilon, ...override.epsilon },
      };
      validateTrendOptions(merged, `trend.${metric}`);
      return merged;
    };

    this.trendOptions = {
      temperature: resolveTrend('temperature'),
      'feels-like': resolveTrend('feels-like'),
      humidity: resolveTrend('humidity'),
      'wind-speed': resolveTrend('wind-speed'),
      pressure: resolveTrend('pressure'),
    };
  }

  private window(metric: string): RollingWindow {
    const window = isMetricName(metric) ? this.windows.get(metric) : undefined;
    if (!window) {
      throw new ConfigurationError(`Unknown metric: ${metric}`, { configKey: 'metric' });
    }
    return window;
  }

  /**
   * Record one reading for one metric. `null` records a missing reading.
   */
  ingest(metric: string, value: number | null, timestamp: number = Date.now()): void {
    this.window(metric).push(createSample(value, timestamp));
  }

  /**
   * Record a full observation. Every tracked metric receives a sample;
   * metrics absent from the reading are recorded as missing.
   */
  ingestReading(reading: Reading): void {
    for (const name of Object.keys(reading.values)) {
      this.window(name);
    }
    for (const metric of METRICS) {
      this.window(metric).push(createSample(reading.values[metric] ?? null, reading.timestamp));
    }
  }

  /**
   * Record a failed fetch: a missing sample in every window keeps
   * sparkline timing aligned with elapsed ticks.
   */
  ingestFailure(timestamp: number = Date.now()): void {
    for (const metric of METRICS) {
      this.window(metric).push(createSample(null, timestamp));
    }
  }

  /** Classify a value against this station's thresholds */
  classify(metric: MetricName, value: number | null): ColorBand {
    return this.classifier.classify(metric, value);
  }

  history(metric: MetricName): readonly MetricSample[] {
    return this.window(metric).snapshot();
  }

  /** Number of ticks currently retained */
  get readings(): number {
    let count = 0;
    for (const window of this.windows.values()) {
      count = Math.max(count, window.size);
    }
    return count;
  }

  snapshot(metric: MetricName): Snapshot {
    const samples = this.window(metric).snapshot();
    const info = METRIC_INFO[metric];
    const current = samples.length > 0 ? samples[samples.length - 1].value : null;
    const direction = trend(samples, this.trendOptions[metric]);
    const spark = renderSparkline(samples, this.sparklineWidth, { precision: info.precision });

    return {
      metric,
      label: info.label,
      unit: info.unit,
      precision: info.precision,
      current,
      band: this.classifier.classify(metric, current),
      trend: direction,
      trendSymbol: trendSymbol(direction),
      sparkline: spark.glyphs,
      rangeLabel: spark.rangeLabel,
      samples: samples.length,
    };
  }

  /** Snapshots of every tracked metric, in declared order */
  snapshotAll(): Snapshot[] {
    return METRICS.map((metric) => this.snapshot(metric));
  }

  reset(): void {
    for (const window of this.windows.values()) {
      window.clear();
    }
  }
}

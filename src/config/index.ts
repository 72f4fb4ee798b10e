/**
 * Monitor configuration
 *
 * Layers, lowest precedence first: defaults, JSON config file, environment,
 * CLI flags. The merged result is validated once with zod; any failure is a
 * ConfigurationError naming the offending key.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { createThresholdConfig, isBandName } from '../core/classifier.js';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_CAPACITY } from '../core/rolling-window.js';
import { DEFAULT_SPARKLINE_WIDTH, type StationStateOptions } from '../core/station-state.js';
import { DEFAULT_EPSILON, DEFAULT_TREND_K } from '../core/trend.js';
import { DEFAULT_INTERVAL_SECONDS } from '../runner/monitor.js';
import { DEFAULT_API_URL, DEFAULT_TIMEOUT, type PwsSourceOptions } from '../source/pws.js';
import { LOG_LEVELS } from '../utils/logger.js';

const BandSchema = z.object({
  // JSON has no Infinity; null marks the open-ended top band
  upTo: z
    .number()
    .nullable()
    .transform((value) => value ?? Infinity),
  band: z.string().refine(isBandName, {
    message: 'Band must be a name followed by a color: blue, cyan, green, yellow or red (e.g. "cold-blue")',
  }),
});

export const ConfigSchema = z.object({
  stationId: z.string().trim().min(1, 'A station ID is required'),
  apiKey: z.string().trim().min(1, 'An API key is required'),
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  /** Seconds between refreshes */
  interval: z.number().int().min(1).default(DEFAULT_INTERVAL_SECONDS),
  capacity: z.number().int().positive().default(DEFAULT_CAPACITY),
  sparklineWidth: z.number().int().nonnegative().default(DEFAULT_SPARKLINE_WIDTH),
  /** Per-attempt HTTP timeout in ms */
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  trend: z
    .object({
      k: z.number().int().positive().default(DEFAULT_TREND_K),
      epsilon: z
        .object({
          relative: z.number().nonnegative().default(DEFAULT_EPSILON.relative),
          absolute: z.number().nonnegative().default(DEFAULT_EPSILON.absolute),
        })
        .default({}),
    })
    .default({}),
  thresholds: z.record(z.string(), z.array(BandSchema)).default({}),
  retry: z
    .object({
      attempts: z.number().int().positive().default(3),
      delay: z.number().nonnegative().default(1000),
      maxDelay: z.number().nonnegative().default(10_000),
    })
    .default({}),
  logLevel: z.enum(LOG_LEVELS).optional(),
  plain: z.boolean().default(false),
});

export type MonitorConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/** Values coming from command-line flags */
export interface ConfigFlags {
  stationId?: string;
  apiKey?: string;
  interval?: number;
  capacity?: number;
  width?: number;
  plain?: boolean;
  verbose?: boolean;
  logLevel?: string;
}

export interface LoadConfigOptions {
  flags?: ConfigFlags;
  env?: Record<string, string | undefined>;
  /** Path to a JSON config file */
  file?: string;
}

const ENV_KEYS = {
  stationId: 'PWS_STATION_ID',
  apiKey: 'PWS_API_KEY',
  apiUrl: 'PWS_API_URL',
  interval: 'PWS_INTERVAL',
  logLevel: 'PWS_LOG_LEVEL',
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config file ${path}: ${message}`, { configKey: 'config' });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file ${path} is not valid JSON: ${message}`, { configKey: 'config' });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`, { configKey: 'config' });
  }
  return parsed;
}

export function fromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const layer: Record<string, unknown> = {};

  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    layer[key] = key === 'interval' ? Number(value) : value;
  }

  return layer;
}

export function fromFlags(flags: ConfigFlags): Record<string, unknown> {
  const layer: Record<string, unknown> = {
    stationId: flags.stationId,
    apiKey: flags.apiKey,
    interval: flags.interval,
    capacity: flags.capacity,
    sparklineWidth: flags.width,
    plain: flags.plain,
    logLevel: flags.verbose ? 'debug' : flags.logLevel,
  };

  for (const key of Object.keys(layer)) {
    if (layer[key] === undefined) delete layer[key];
  }
  return layer;
}

/**
 * Validate a merged config object
 */
export function parseConfig(input: unknown): MonitorConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = issue.path.join('.') || 'config';
    throw new ConfigurationError(`Invalid configuration at ${configKey}: ${issue.message}`, { configKey });
  }

  // Reject bad tables and unknown metrics now rather than at first render
  createThresholdConfig(result.data.thresholds);
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<MonitorConfig> {
  const fileLayer = options.file ? await readConfigFile(options.file) : {};
  const envLayer = fromEnv(options.env ?? process.env);
  const flagLayer = fromFlags(options.flags ?? {});

  return parseConfig({ ...fileLayer, ...envLayer, ...flagLayer });
}

export function toStationStateOptions(config: MonitorConfig): StationStateOptions {
  return {
    capacity: config.capacity,
    sparklineWidth: config.sparklineWidth,
    thresholds: createThresholdConfig(config.thresholds),
    trend: { k: config.trend.k, epsilon: config.trend.epsilon },
  };
}

export function toSourceOptions(config: MonitorConfig): PwsSourceOptions {
  return {
    stationId: config.stationId,
    apiKey: config.apiKey,
    apiUrl: config.apiUrl,
    timeout: config.timeout,
    retry: config.retry,
  };
}

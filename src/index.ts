/**
 * pws-monitor
 *
 * Metric core and dashboard pieces for a personal weather station monitor.
 *
 * @example
 * ```typescript
 * import { StationState } from 'pws-monitor';
 *
 * const state = new StationState({ capacity: 60 });
 * state.ingest('temperature', 72.4);
 * state.snapshot('temperature').band; // 'comfortable-green'
 * ```
 */

export * from './core/errors.js';
export * from './core/sample.js';
export * from './core/rolling-window.js';
export * from './core/classifier.js';
export * from './core/trend.js';
export * from './core/station-state.js';
export * from './utils/sparkline.js';
export { Logger, isLogLevel, LOG_LEVELS, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { DEFAULT_RETRY, backoffDelay, retryAfterMs, type RetryOptions } from './utils/backoff.js';
export * from './source/types.js';
export * from './source/pws.js';
export * from './display/renderer.js';
export * from './display/screen.js';
export * from './runner/monitor.js';
export * from './config/index.js';
export { loadEnvFile, parseEnv } from './config/env-file.js';

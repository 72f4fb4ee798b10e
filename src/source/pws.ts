/**
 * Weather Underground personal weather station client.
 *
 * Fetches `observations/current` in imperial units through undici, retries
 * transient failures with backoff, and validates the payload with zod.
 */

import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { FetchError, MonitorError, ParseError } from '../core/errors.js';
import { DEFAULT_RETRY, backoffDelay, retryAfterMs, sleep, type RetryOptions } from '../utils/backoff.js';
import type { Logger } from '../utils/logger.js';
import type { FetchOutcome, Observation, WeatherSource } from './types.js';

export const DEFAULT_API_URL = 'https://api.weather.com/v2/pws/observations/current';
export const DEFAULT_TIMEOUT = 10_000;
export const DEFAULT_USER_AGENT = 'pws-monitor/0.1';

const field = z.unknown();

const ObservationSchema = z.object({
  stationID: field,
  epoch: field,
  humidity: field,
  winddir: field,
  imperial: z
    .object({
      temp: field,
      heatIndex: field,
      dewpt: field,
      windSpeed: field,
      windGust: field,
      pressure: field,
      precipRate: field,
    })
    .nullish(),
});

const ResponseSchema = z.object({
  observations: z.array(ObservationSchema).nullish(),
});

export type PwsObservation = z.infer<typeof ObservationSchema>;

export interface PwsSourceOptions {
  stationId: string;
  apiKey: string;
  apiUrl?: string;
  /** Per-attempt timeout in ms (default: 10000) */
  timeout?: number;
  retry?: RetryOptions;
  userAgent?: string;
  /** undici dispatcher, e.g. a MockAgent in tests */
  dispatcher?: Dispatcher;
  logger?: Logger;
  now?: () => number;
}

/**
 * Coerce an API field to a number; anything unusable is missing
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Map one API observation onto the tracked metrics
 */
export function toObservation(raw: PwsObservation, stationId: string, now: number): Observation {
  const imperial = raw.imperial;
  const epoch = toNumber(raw.epoch);
  const reported = typeof raw.stationID === 'string' ? raw.stationID.trim() : '';

  return {
    stationId: reported || stationId,
    timestamp: epoch !== null ? epoch * 1000 : now,
    values: {
      temperature: toNumber(imperial?.temp),
      'feels-like': toNumber(imperial?.heatIndex),
      humidity: toNumber(raw.humidity),
      'wind-speed': toNumber(imperial?.windSpeed),
      pressure: toNumber(imperial?.pressure),
    },
    extras: {
      windGust: toNumber(imperial?.windGust),
      windDirection: toNumber(raw.winddir),
      precipRate: toNumber(imperial?.precipRate),
      dewPoint: toNumber(imperial?.dewpt),
    },
  };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export class PwsSource implements WeatherSource {
  private readonly options: PwsSourceOptions;
  private readonly now: () => number;

  constructor(options: PwsSourceOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  buildUrl(): URL {
    const url = new URL(this.options.apiUrl ?? DEFAULT_API_URL);
    url.searchParams.set('stationId', this.options.stationId);
    url.searchParams.set('format', 'json');
    url.searchParams.set('units', 'e');
    url.searchParams.set('apiKey', this.options.apiKey);
    return url;
  }

  /**
   * Fetch the current observation. Aborting `signal` cancels the request
   * in flight and any pending retry wait.
   */
  async fetch(signal?: AbortSignal): Promise<FetchOutcome> {
    try {
      const observation = await this.fetchWithRetry(signal);
      return { ok: true, observation };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (signal?.aborted) {
        this.options.logger?.debug(`Fetch for ${this.options.stationId} aborted`);
      } else {
        this.options.logger?.warn(`Fetch failed for ${this.options.stationId}: ${message}`);
      }
      return { ok: false, error: message, at: this.now() };
    }
  }

  private async fetchWithRetry(signal?: AbortSignal): Promise<Observation> {
    const retry = { ...DEFAULT_RETRY, ...this.options.retry };
    const maxAttempts = Math.max(1, retry.attempts);

    let attempt = 0;
    while (true) {
      signal?.throwIfAborted();
      attempt++;
      try {
        this.options.logger?.debug(`→ GET observations/current (${this.options.stationId}) attempt ${attempt}`);
        return await this.fetchOnce(signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        if (!(error instanceof MonitorError) || !error.retriable || attempt >= maxAttempts) throw error;

        const requested = error instanceof FetchError ? error.retryAfter : undefined;
        const delayMs = requested !== undefined
          ? Math.min(requested, retry.maxDelay)
          : backoffDelay(attempt, retry);

        this.options.logger?.warn(`Attempt ${attempt} failed (${error.message}), retrying in ${delayMs}ms`);
        await sleep(delayMs, signal);
      }
    }
  }

  private async fetchOnce(signal?: AbortSignal): Promise<Observation> {
    const timeout = this.options.timeout ?? DEFAULT_TIMEOUT;
    const { stationId } = this.options;

    let response: Dispatcher.ResponseData;
    try {
      response = await request(this.buildUrl(), {
        method: 'GET',
        headers: {
          'user-agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
          accept: 'application/json',
        },
        headersTimeout: timeout,
        bodyTimeout: timeout,
        dispatcher: this.options.dispatcher,
        signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Network request failed: ${message}`, { code: errorCode(error), retriable: true });
    }

    const { statusCode, headers, body } = response;

    if (statusCode >= 400) {
      await body.dump();
      throw new FetchError(`Request failed with status code ${statusCode}`, {
        status: statusCode,
        retryAfter: retryAfterMs(headerValue(headers['retry-after']), this.now()),
      });
    }

    const text = await body.text();
    if (!text.trim()) {
      throw new FetchError('Received empty response from server', { status: statusCode, retriable: false });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ParseError('Invalid response format. Check API key and station ID', { format: 'json' });
    }

    const parsed = ResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ParseError(
        `Unexpected response shape at ${issue.path.join('.') || '(root)'}: ${issue.message}`,
        { format: 'json' }
      );
    }

    const first = parsed.data.observations?.[0];
    if (!first) {
      throw new FetchError(`No observation data found for '${stationId}'`, { status: statusCode, retriable: false });
    }

    return toObservation(first, stationId, this.now());
  }
}

import type { Reading } from '../core/station-state.js';

/**
 * Values shown on the dashboard but not tracked over time
 */
export interface ObservationExtras {
  windGust: number | null;
  /** Degrees */
  windDirection: number | null;
  /** in/hr */
  precipRate: number | null;
  dewPoint: number | null;
}

export interface Observation extends Reading {
  stationId: string;
  extras: ObservationExtras;
}

export type FetchOutcome =
  | { ok: true; observation: Observation }
  | { ok: false; error: string; at: number };

/**
 * Produces one observation per call. Implementations own retry policy and
 * never reject: transport failures come back as `{ ok: false }`.
 * An aborted `signal` ends the call early with `{ ok: false }`.
 */
export interface WeatherSource {
  fetch(signal?: AbortSignal): Promise<FetchOutcome>;
}

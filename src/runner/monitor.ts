import { bandColor } from '../core/classifier.js';
import type { StationState } from '../core/station-state.js';
import type { DashboardFrame, ExtraRow, Renderer } from '../display/renderer.js';
import type { Screen } from '../display/screen.js';
import type { ObservationExtras, WeatherSource } from '../source/types.js';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_INTERVAL_SECONDS = 60;

export interface MonitorOptions {
  stationId: string;
  source: WeatherSource;
  state: StationState;
  renderer: Renderer;
  screen: Screen;
  /** Seconds between ticks (default: 60) */
  interval?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Drives the dashboard from a single timer: each tick fetches one
 * observation, ingests it, then redraws. Ticks never overlap.
 */
export class Monitor {
  private readonly options: MonitorOptions;
  private readonly interval: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;
  private lastUpdated: Date | null = null;
  private lastError: string | null = null;
  private extras: ObservationExtras | null = null;
  private stopped: (() => void) | null = null;
  /** Aborted by `stop()`; cancels the fetch of a tick still in flight */
  private controller: AbortController | null = null;

  constructor(options: MonitorOptions) {
    this.options = options;
    this.interval = options.interval ?? DEFAULT_INTERVAL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Fetch, ingest and redraw once. Skipped when the previous tick is still
   * waiting on the data source. A tick that settles after `stop()` is dropped.
   */
  async tick(): Promise<void> {
    if (this.inFlight) {
      this.options.logger?.warn('Previous fetch still in flight, skipping tick');
      return;
    }

    const signal = this.controller?.signal;
    this.inFlight = true;
    try {
      const outcome = await this.options.source.fetch(signal);
      if (signal?.aborted) return;
      if (outcome.ok) {
        this.options.state.ingestReading(outcome.observation);
        this.extras = outcome.observation.extras;
        this.lastUpdated = new Date(this.now());
        this.lastError = null;
      } else {
        this.options.state.ingestFailure(outcome.at);
        this.extras = null;
        this.lastError = outcome.error;
      }
    } finally {
      this.inFlight = false;
    }

    this.draw();
  }

  frame(): DashboardFrame {
    const { state } = this.options;
    const extras: ExtraRow[] = [];

    const gust = this.extras?.windGust ?? null;
    if (gust !== null && gust > 0) {
      extras.push({
        label: 'Wind Gust',
        value: `${gust.toFixed(1)} mph`,
        color: bandColor(state.classify('wind-speed', gust)),
      });
    }
    const precip = this.extras?.precipRate ?? null;
    if (precip !== null && precip > 0) {
      extras.push({ label: 'Precip Rate', value: `${precip.toFixed(2)} in/hr`, color: 'blue' });
    }

    return {
      stationId: this.options.stationId,
      interval: this.interval,
      snapshots: state.snapshotAll(),
      extras,
      windDirection: this.extras?.windDirection ?? null,
      readings: state.readings,
      lastUpdated: this.lastUpdated,
      error: this.lastError,
    };
  }

  draw(): void {
    this.options.screen.draw(this.options.renderer.render(this.frame()));
  }

  private runTick(): void {
    const signal = this.controller?.signal;
    this.tick().catch((error: unknown) => {
      if (signal?.aborted) return;
      const err = error instanceof Error ? error : new Error(String(error));
      this.options.logger?.logError('Tick failed', err);
      this.lastError = err.message;
    });
  }

  /**
   * Open the screen, tick immediately, then every `interval` seconds
   */
  start(): void {
    if (this.timer) return;

    this.controller = new AbortController();
    this.options.screen.open();
    this.draw();
    this.timer = setInterval(() => this.runTick(), this.interval * 1000);
    this.runTick();
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.controller?.abort();
    this.controller = null;
    this.options.screen.close();
    this.stopped?.();
    this.stopped = null;
  }

  /**
   * Start and resolve once stopped, either by `stop()` or by the signal
   */
  run(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      this.stopped = resolve;
      signal?.addEventListener('abort', () => this.stop(), { once: true });
      this.start();
    });
  }
}

/**
 * Dashboard renderers
 *
 * The core hands over plain `Snapshot` records; a renderer turns a frame of
 * them into text. Two variants exist behind the same interface: `rich`
 * (ANSI colors) and `plain` (no escape codes). The variant is picked once at
 * startup by `selectRenderer`.
 */

import { bandColor, type BandColor, type ColorBand } from '../core/classifier.js';
import type { Snapshot } from '../core/station-state.js';
import type { Trend } from '../core/trend.js';
import { createColors, detectColorSupport, type Colors, type Env, type Paint } from '../utils/colors.js';

export type RendererCapability = 'rich' | 'plain';

/**
 * A value shown below the tracked metrics (wind gust, precipitation)
 */
export interface ExtraRow {
  label: string;
  value: string;
  color: BandColor | 'white';
}

export interface DashboardFrame {
  stationId: string;
  /** Refresh interval in seconds */
  interval: number;
  snapshots: Snapshot[];
  extras: ExtraRow[];
  /** Degrees, appended to the wind speed row when known */
  windDirection: number | null;
  readings: number;
  lastUpdated: Date | null;
  error: string | null;
}

export interface Renderer {
  readonly capability: RendererCapability;
  render(frame: DashboardFrame): string;
}

const LABEL_WIDTH = 13;
const VALUE_WIDTH = 18;

const pad2 = (n: number) => String(n).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD hh:mm:ss AM`
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const suffix = hours < 12 ? 'AM' : 'PM';
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(hour12)}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())} ${suffix}`
  );
}

function unitSpacing(unit: string): string {
  return unit === '°F' || unit === '%' ? unit : ` ${unit}`;
}

/**
 * Current value with its unit, or `N/A` when missing
 */
export function formatCurrent(snapshot: Snapshot, windDirection: number | null = null): string {
  if (snapshot.current === null) return 'N/A';

  let text = `${snapshot.current.toFixed(snapshot.precision)}${unitSpacing(snapshot.unit)}`;
  if (snapshot.metric === 'wind-speed' && windDirection !== null && snapshot.current > 0) {
    text += ` from ${Math.round(windDirection)}°`;
  }
  return text;
}

/**
 * Sparkline followed by the range with one shared unit suffix,
 * e.g. `▁▃▅█ (70-74.5°F)`. Empty until two samples exist.
 */
export function formatGraph(snapshot: Snapshot): string {
  if (snapshot.samples < 2 || snapshot.rangeLabel === '') return '';
  return `${snapshot.sparkline} (${snapshot.rangeLabel}${snapshot.unit})`;
}

abstract class TextRenderer implements Renderer {
  abstract readonly capability: RendererCapability;
  protected readonly paint: Colors;

  constructor(colorsEnabled: boolean) {
    this.paint = createColors(colorsEnabled);
  }

  protected abstract header(frame: DashboardFrame): string[];
  protected abstract ruler(): string;

  private colorFor(color: BandColor | 'white'): Paint {
    return this.paint[color];
  }

  private bandPaint(band: ColorBand): Paint {
    return this.colorFor(bandColor(band));
  }

  private trendPaint(trend: Trend): Paint {
    if (trend === 'rising') return this.paint.green;
    if (trend === 'falling') return this.paint.red;
    return this.paint.dim;
  }

  protected row(label: string, value: string, valuePaint: Paint, trend = '', graph = ''): string {
    const parts = [
      this.paint.bold(`${label}:`.padEnd(LABEL_WIDTH)),
      valuePaint(value.padEnd(VALUE_WIDTH)),
      trend.padEnd(2),
      graph ? this.paint.dim(graph) : '',
    ];
    return parts.join(' ').trimEnd();
  }

  render(frame: DashboardFrame): string {
    const lines = [...this.header(frame), this.ruler()];

    for (const snapshot of frame.snapshots) {
      lines.push(
        this.row(
          snapshot.label,
          formatCurrent(snapshot, frame.windDirection),
          this.bandPaint(snapshot.band),
          this.trendPaint(snapshot.trend)(snapshot.trendSymbol.padEnd(2)),
          formatGraph(snapshot)
        )
      );
    }

    for (const extra of frame.extras) {
      lines.push(this.row(extra.label, extra.value, this.colorFor(extra.color)));
    }

    lines.push('');
    lines.push(
      this.paint.dim(
        this.paint.italic(frame.readings < 2 ? 'Collecting trend data...' : `Showing ${frame.readings} readings`)
      )
    );

    if (frame.error) {
      lines.push(this.paint.bold(this.paint.red(`Error: ${frame.error}`)));
      lines.push(this.paint.dim(`Retrying in ${frame.interval} seconds...`));
    }

    lines.push(this.ruler());
    lines.push(this.paint.dim(frame.lastUpdated ? `Last updated: ${formatTimestamp(frame.lastUpdated)}` : 'Waiting for first reading...'));

    return lines.join('\n');
  }
}

export class RichRenderer extends TextRenderer {
  readonly capability = 'rich';

  constructor() {
    super(true);
  }

  protected header(frame: DashboardFrame): string[] {
    return [
      this.paint.bold(this.paint.cyan(`Personal Weather Station Monitor - ${frame.stationId}`)),
      this.paint.dim(`Refreshing every ${frame.interval}s • Press Ctrl+C to exit`),
    ];
  }

  protected ruler(): string {
    return this.paint.gray('─'.repeat(70));
  }
}

export class PlainRenderer extends TextRenderer {
  readonly capability = 'plain';

  constructor() {
    super(false);
  }

  protected header(frame: DashboardFrame): string[] {
    return [
      '='.repeat(70),
      `  Personal Weather Station Monitor: ${frame.stationId}`,
      `  (Refreshing every ${frame.interval}s. Press Ctrl+C to exit)`,
    ];
  }

  protected ruler(): string {
    return '='.repeat(70);
  }
}

export interface RendererSelection {
  /** Force the plain variant */
  plain?: boolean;
  isTTY?: boolean;
  env?: Env;
}

export function selectRenderer(selection: RendererSelection = {}): Renderer {
  if (selection.plain) return new PlainRenderer();

  const isTTY = selection.isTTY ?? Boolean(process.stdout.isTTY);
  const env = selection.env ?? process.env;
  // FORCE_COLOR alone does not make a pipe a terminal
  if (!isTTY || !detectColorSupport(env, isTTY)) return new PlainRenderer();

  return new RichRenderer();
}

/**
 * Sparkline - Compact inline charts using Unicode block characters
 *
 * Uses 8-level block characters for smooth gradation:
 * ▁▂▃▄▅▆▇█ (U+2581 to U+2588)
 */

import type { MetricSample } from '../core/sample.js';

// 8-level block characters for sparkline
const SPARK_CHARS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;
export const MISSING_CHAR = '·';

export interface SparklineOptions {
  /** Decimal places in the range label (default: 1) */
  precision?: number;
  /** Number of glyph levels, 2-8 (default: 8) */
  levels?: number;
  /** Shrink the label's precision until it fits this many characters */
  maxLabelLength?: number;
}

export interface Sparkline {
  glyphs: string;
  /** `"min-max"` over the non-missing samples, empty when there are none */
  rangeLabel: string;
}

/**
 * Pick `levels` glyphs spread evenly over the full block alphabet
 */
export function glyphAlphabet(levels: number = SPARK_CHARS.length): string[] {
  const count = Math.max(2, Math.min(SPARK_CHARS.length, Math.floor(levels)));
  if (count === SPARK_CHARS.length) return [...SPARK_CHARS];

  const step = (SPARK_CHARS.length - 1) / (count - 1);
  return Array.from({ length: count }, (_, i) => SPARK_CHARS[Math.round(i * step)]);
}

/**
 * Format a number with a fixed precision, then trim trailing zero decimals.
 * `formatValue(30, 1)` → `"30"`, `formatValue(29.95, 2)` → `"29.95"`
 */
export function formatValue(value: number, precision: number): string {
  const fixed = value.toFixed(Math.max(0, precision));
  const trimmed = fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed;
  return trimmed === '-0' ? '0' : trimmed;
}

/**
 * Compressed `"min-max"` label. When `maxLength` is given, precision is
 * reduced until the label fits or reaches zero decimals.
 */
export function formatRange(min: number, max: number, precision: number, maxLength?: number): string {
  let digits = Math.max(0, precision);
  let label = `${formatValue(min, digits)}-${formatValue(max, digits)}`;

  while (maxLength !== undefined && label.length > maxLength && digits > 0) {
    digits--;
    label = `${formatValue(min, digits)}-${formatValue(max, digits)}`;
  }

  return label;
}

/**
 * Render the most recent `width` samples as a sparkline.
 *
 * Output length is exactly `min(width, samples.length)`; padding is left to
 * the caller. Missing samples render as `·` and take no part in the scale.
 * A flat series renders every glyph at the mid level.
 *
 * @example
 * ```ts
 * const history = [1, 2, 3, 4, 5, 6, 7, 8].map((v) => createSample(v));
 * renderSparkline(history, 8).glyphs;
 * // ▁▂▃▄▅▆▇█
 * ```
 */
export function renderSparkline(
  samples: readonly MetricSample[],
  width: number,
  options: SparklineOptions = {}
): Sparkline {
  const { precision = 1, levels, maxLabelLength } = options;
  const alphabet = glyphAlphabet(levels);
  const top = alphabet.length - 1;

  const count = Math.min(Math.max(0, Math.floor(width)), samples.length);
  if (count === 0) return { glyphs: '', rangeLabel: '' };

  const slice = samples.slice(samples.length - count);

  let min = Infinity;
  let max = -Infinity;
  for (const { value } of slice) {
    if (value === null) continue;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  if (min > max) {
    // Every sample in the slice is missing
    return { glyphs: MISSING_CHAR.repeat(count), rangeLabel: '' };
  }

  const range = max - min;
  const mid = Math.floor(top / 2);

  let glyphs = '';
  for (const { value } of slice) {
    if (value === null) {
      glyphs += MISSING_CHAR;
      continue;
    }
    const level = range === 0 ? mid : Math.floor(((value - min) * top) / range);
    glyphs += alphabet[Math.max(0, Math.min(top, level))];
  }

  return { glyphs, rangeLabel: formatRange(min, max, precision, maxLabelLength) };
}

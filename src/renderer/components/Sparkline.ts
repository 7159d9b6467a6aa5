/**
 * Sparkline - one block glyph per value
 *
 * Eight levels: ▁▂▃▄▅▆▇█ (U+2581 to U+2588)
 */

import { SPARK_CHARS } from '../glyphs';
import { OutputSink } from '../output';

/**
 * Level 0-7 for a value inside [min, max]; a flat range is level 0,
 * as is a non-finite value or bound
 */
export function sparkLevel(value: number, min: number, max: number): number {
  const range = max - min;
  if (!Number.isFinite(value) || !Number.isFinite(range) || range <= 0) return 0;
  const level = Math.floor(((value - min) * (SPARK_CHARS.length - 1)) / range);
  return Math.min(SPARK_CHARS.length - 1, Math.max(0, level));
}

/**
 * Render a sparkline followed by a newline; empty input gives ''
 *
 * NaN and infinite values are left out of the min/max and drawn at the lowest level.
 *
 * @example
 * sparkline([1, 5, 22, 13, 53, 29, 44, 90]) // '▁▁▂▁▅▃▄█\n'
 */
export function sparkline(values: readonly number[]): string {
  if (values.length === 0) return '';

  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (!Number.isFinite(value)) continue;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  let result = '';
  for (const value of values) {
    result += SPARK_CHARS[sparkLevel(value, min, max)];
  }
  return result + '\n';
}

export class Sparkline {
  private readonly values: readonly number[];

  constructor(values: readonly number[]) {
    this.values = [...values];
  }

  render(sink: OutputSink): void {
    const text = sparkline(this.values);
    if (text) sink.write(text);
  }

  toString(): string {
    return sparkline(this.values);
  }
}

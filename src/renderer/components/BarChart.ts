/**
 * Horizontal bar chart
 */

import { style, visibleLength } from '../ansi';
import { barGlyphs, BarStyle } from '../glyphs';
import { OutputSink, renderToString } from '../output';
import { ColorPicker, createRandomColorPicker } from '../palette';
import { assertNonNegative } from '../../utils/errors';
import { logRender } from '../../utils/logger';

const LABEL_WIDTH = 12;

export interface Bar {
  label: string;
  value: number;
}

/**
 * Filled cells for a value; a zero maximum gives zero-length bars
 */
export function barLength(value: number, maxValue: number, maxWidth: number): number {
  if (maxValue <= 0) return 0;
  return Math.round((value * maxWidth) / maxValue);
}

export class BarChart {
  private bars: Bar[] = [];
  private colorPicker: ColorPicker | null = null;

  constructor(
    private readonly style: BarStyle = 'unicode',
    private readonly maxWidth = 40
  ) {}

  /**
   * Add one bar; negative or non-finite values are rejected
   */
  addBar(label: string, value: number): this {
    assertNonNegative(label, value);
    this.bars.push({ label, value });
    return this;
  }

  /**
   * Color every filled cell independently. Pass a picker for a fixed sequence.
   */
  withRandomColors(enabled: boolean, picker: ColorPicker = createRandomColorPicker()): this {
    this.colorPicker = enabled ? picker : null;
    return this;
  }

  getBars(): Bar[] {
    return this.bars.map(bar => ({ ...bar }));
  }

  render(sink: OutputSink): void {
    if (this.bars.length === 0) {
      sink.write('No bars to display\n');
      return;
    }

    let maxValue = 0;
    for (const bar of this.bars) {
      if (bar.value > maxValue) maxValue = bar.value;
    }
    const char = barGlyphs[this.style];

    for (const bar of this.bars) {
      const length = barLength(bar.value, maxValue, this.maxWidth);
      let filled = '';
      for (let i = 0; i < length; i++) {
        filled += this.colorPicker ? this.colorPicker() + char + style.reset : char;
      }
      const labelPad = ' '.repeat(Math.max(0, LABEL_WIDTH - visibleLength(bar.label)));
      sink.write(`${bar.label}${labelPad} | ${filled} (${bar.value})\n`);
    }

    logRender('bar chart', { bars: this.bars.length, maxWidth: this.maxWidth });
  }

  toString(): string {
    return renderToString(sink => this.render(sink));
  }
}

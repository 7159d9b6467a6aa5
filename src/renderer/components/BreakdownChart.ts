/**
 * Breakdown chart: one stacked bar split proportionally across segments,
 * with an optional legend underneath
 */

import { style } from '../ansi';
import { breakdownGlyphs, BreakdownStyle } from '../glyphs';
import { OutputSink, renderToString } from '../output';
import { SEGMENT_COLORS, colorAt } from '../palette';
import { assertNonNegative } from '../../utils/errors';
import { logRender } from '../../utils/logger';

export interface Segment {
  label: string;
  value: number;
  color?: string;
  percentage: number;
}

type SegmentInput = Omit<Segment, 'percentage'>;

export interface BreakdownOptions {
  readonly title?: string;
  readonly showPercentages: boolean;
  readonly showValues: boolean;
  readonly showLegend: boolean;
  readonly minSegmentWidth: number;
  readonly colorEnabled: boolean;
}

export interface BreakdownStatistics {
  total: number;
  segments: number;
  largest: Segment;
}

const DEFAULT_OPTIONS: BreakdownOptions = Object.freeze({
  showPercentages: true,
  showValues: false,
  showLegend: true,
  minSegmentWidth: 1,
  colorEnabled: true,
});

/**
 * Split `totalWidth` cells across segments by percentage.
 * All but the last get round(pct * width), raised to the minimum and capped
 * at what is left; the last takes the remainder so the sum is exact.
 */
export function allocateSegmentWidths(
  percentages: readonly number[],
  totalWidth: number,
  minSegmentWidth = 1
): number[] {
  const widths: number[] = [];
  let remaining = totalWidth;

  percentages.forEach((percentage, i) => {
    if (i === percentages.length - 1) {
      widths.push(remaining);
      return;
    }
    const ideal = Math.round((percentage / 100) * totalWidth);
    const width = Math.min(Math.max(minSegmentWidth, ideal), remaining);
    widths.push(width);
    remaining -= width;
  });

  return widths;
}

export class BreakdownChart {
  private segments: SegmentInput[] = [];
  private options: BreakdownOptions = DEFAULT_OPTIONS;

  constructor(
    private readonly style: BreakdownStyle = 'unicode',
    private readonly width = 40
  ) {}

  /**
   * Add a segment; negative or non-finite values are rejected
   */
  addSegment(label: string, value: number, color?: string): this {
    assertNonNegative(label, value);
    this.segments.push(color === undefined ? { label, value } : { label, value, color });
    return this;
  }

  withTitle(title: string): this {
    return this.configure({ title });
  }

  withPercentages(showPercentages: boolean): this {
    return this.configure({ showPercentages });
  }

  withValues(showValues: boolean): this {
    return this.configure({ showValues });
  }

  withLegend(showLegend: boolean): this {
    return this.configure({ showLegend });
  }

  withMinSegmentWidth(minSegmentWidth: number): this {
    return this.configure({ minSegmentWidth: Math.max(0, Math.floor(minSegmentWidth)) });
  }

  withColors(colorEnabled: boolean): this {
    return this.configure({ colorEnabled });
  }

  private configure(changes: Partial<BreakdownOptions>): this {
    this.options = Object.freeze({ ...this.options, ...changes });
    return this;
  }

  getOptions(): BreakdownOptions {
    return this.options;
  }

  /**
   * Segments with percentages computed from the current values
   */
  getSegments(): Segment[] {
    const total = this.total();
    return this.segments.map(segment => ({
      ...segment,
      percentage: total > 0 ? (segment.value / total) * 100 : 0,
    }));
  }

  /**
   * Widths each segment would get in the bar
   */
  getSegmentWidths(): number[] {
    return allocateSegmentWidths(
      this.getSegments().map(segment => segment.percentage),
      this.width,
      this.options.minSegmentWidth
    );
  }

  getStatistics(): BreakdownStatistics | null {
    const segments = this.getSegments();
    if (segments.length === 0) return null;

    let largest = segments[0];
    for (const segment of segments) {
      if (segment.value > largest.value) largest = segment;
    }

    return { total: this.total(), segments: segments.length, largest };
  }

  private total(): number {
    return this.segments.reduce((sum, segment) => sum + segment.value, 0);
  }

  private colorFor(segment: SegmentInput, index: number): string {
    if (!this.options.colorEnabled) return '';
    return segment.color ?? colorAt(SEGMENT_COLORS, index);
  }

  render(sink: OutputSink): void {
    if (this.segments.length === 0) {
      sink.write('No segments to display\n');
      return;
    }

    if (this.options.title) {
      sink.write(this.options.title + '\n');
    }

    this.renderBar(sink);

    if (this.options.showLegend) {
      this.renderLegend(sink);
    }

    sink.write('\n');
    logRender('breakdown chart', { segments: this.segments.length, width: this.width });
  }

  renderBar(sink: OutputSink): void {
    const glyph = breakdownGlyphs[this.style].segment;
    const widths = this.getSegmentWidths();

    let line = '';
    this.segments.forEach((segment, i) => {
      const color = this.colorFor(segment, i);
      line += color + glyph.repeat(widths[i]) + (color ? style.reset : '');
    });
    sink.write(line + '\n');
  }

  renderLegend(sink: OutputSink): void {
    const glyph = breakdownGlyphs[this.style].legend;

    sink.write('\nLegend:\n');
    this.getSegments().forEach((segment, i) => {
      const color = this.colorFor(segment, i);
      let line = color + glyph + (color ? style.reset : '') + ' ' + segment.label;

      if (this.options.showPercentages) {
        line += ` (${segment.percentage.toFixed(1)}%)`;
      }
      if (this.options.showValues) {
        line += ` [${segment.value.toFixed(2)}]`;
      }
      sink.write(line + '\n');
    });
  }

  printStatistics(sink: OutputSink): void {
    const stats = this.getStatistics();
    if (!stats) return;

    sink.write('Statistics:\n');
    sink.write(`  Total: ${stats.total.toFixed(2)}\n`);
    sink.write(`  Segments: ${stats.segments}\n`);
    sink.write(`  Largest: ${stats.largest.label} (${stats.largest.percentage.toFixed(1)}%)\n`);
  }

  toString(): string {
    return renderToString(sink => this.render(sink));
  }
}

/**
 * Pair labels with values by index; labels without a value are skipped
 */
export function createBreakdown(
  labels: readonly string[],
  values: readonly number[],
  style: BreakdownStyle = 'unicode',
  width = 40
): BreakdownChart {
  const chart = new BreakdownChart(style, width);
  labels.forEach((label, i) => {
    if (i < values.length) {
      chart.addSegment(label, values[i]);
    }
  });
  return chart;
}

/**
 * Line chart drawn onto a character canvas
 */

import { Canvas } from '../Canvas';
import { centerOffset } from '../ansi';
import { lineGlyphs, LineStyle } from '../glyphs';
import { OutputSink, renderToString } from '../output';
import { AxisBounds, ScaleMapper, computeBounds } from '../scale';
import { LengthMismatchError } from '../../utils/errors';
import { logRender } from '../../utils/logger';

export interface DataPoint {
  x: number;
  y: number;
  label?: string;
}

export interface LineChartOptions {
  readonly title?: string;
  readonly xLabel?: string;
  readonly yLabel?: string;
  readonly color?: string;
  readonly showGrid: boolean;
  readonly showMarkers: boolean;
  readonly showValues: boolean;
}

export interface LineChartStatistics {
  count: number;
  minY: number;
  maxY: number;
  meanY: number;
  rangeY: number;
}

const DEFAULT_OPTIONS: LineChartOptions = Object.freeze({
  showGrid: false,
  showMarkers: true,
  showValues: false,
});

/**
 * Format a y value for inline labels: integers as-is, otherwise 2 decimals
 */
function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export class LineChart {
  private points: DataPoint[] = [];
  private bounds: AxisBounds = { minX: 0, maxX: 0, minY: 0, maxY: 0, autoScale: true };
  private options: LineChartOptions = DEFAULT_OPTIONS;

  constructor(
    private readonly style: LineStyle = 'unicode',
    private readonly width = 60,
    private readonly height = 20
  ) {}

  addPoint(x: number, y: number, label?: string): this {
    this.points.push(label === undefined ? { x, y } : { x, y, label });
    if (this.bounds.autoScale) {
      this.bounds = computeBounds(this.points);
    }
    return this;
  }

  /**
   * Add pairs from parallel sequences; nothing is added on a length mismatch
   */
  addPoints(xValues: readonly number[], yValues: readonly number[]): this {
    if (xValues.length !== yValues.length) {
      throw new LengthMismatchError(xValues.length, yValues.length);
    }
    xValues.forEach((x, i) => this.addPoint(x, yValues[i]));
    return this;
  }

  /**
   * Add y values with x implied as 0, 1, 2, ...
   */
  addYValues(yValues: readonly number[]): this {
    yValues.forEach((y, i) => this.addPoint(i, y));
    return this;
  }

  withTitle(title: string): this {
    return this.configure({ title });
  }

  withLabels(xLabel: string, yLabel: string): this {
    return this.configure({ xLabel, yLabel });
  }

  withColor(color: string): this {
    return this.configure({ color });
  }

  withGrid(showGrid: boolean): this {
    return this.configure({ showGrid });
  }

  withMarkers(showMarkers: boolean): this {
    return this.configure({ showMarkers });
  }

  withValues(showValues: boolean): this {
    return this.configure({ showValues });
  }

  /**
   * Fix the axis range; auto-scaling stays off from here on
   */
  setBounds(minX: number, maxX: number, minY: number, maxY: number): this {
    this.bounds = { minX, maxX, minY, maxY, autoScale: false };
    return this;
  }

  private configure(changes: Partial<LineChartOptions>): this {
    this.options = Object.freeze({ ...this.options, ...changes });
    return this;
  }

  getOptions(): LineChartOptions {
    return this.options;
  }

  getBounds(): AxisBounds {
    return { ...this.bounds };
  }

  getPoints(): DataPoint[] {
    return this.points.map(point => ({ ...point }));
  }

  getStatistics(): LineChartStatistics | null {
    if (this.points.length === 0) return null;

    let sum = 0;
    let minY = this.points[0].y;
    let maxY = this.points[0].y;
    for (const point of this.points) {
      sum += point.y;
      minY = Math.min(minY, point.y);
      maxY = Math.max(maxY, point.y);
    }

    return {
      count: this.points.length,
      minY,
      maxY,
      meanY: sum / this.points.length,
      rangeY: maxY - minY,
    };
  }

  /**
   * Draw grid, segments, markers and value labels, in that order
   */
  buildCanvas(): Canvas {
    const glyphs = lineGlyphs[this.style];
    const canvas = new Canvas(this.width, this.height);
    const mapper = new ScaleMapper(this.bounds, this.width, this.height);
    const dataStyle = this.options.color ?? '';

    // Stable sort keeps insertion order between equal x values
    const sorted = [...this.points].sort((a, b) => a.x - b.x);
    const screen = sorted.map(point => mapper.map(point.x, point.y));

    if (this.options.showGrid) {
      canvas.drawGrid(glyphs.gridHorizontal, glyphs.gridVertical);
    }

    for (let i = 0; i < screen.length - 1; i++) {
      const from = screen[i];
      const to = screen[i + 1];
      canvas.drawLineSegment(from.x, from.y, to.x, to.y, glyphs, dataStyle);
    }

    if (this.options.showMarkers) {
      for (const point of screen) {
        canvas.drawPoint(point.x, point.y, glyphs.marker, dataStyle);
      }
    }

    if (this.options.showValues) {
      sorted.forEach((point, i) => {
        const text = point.label ?? formatValue(point.y);
        canvas.writeText(screen[i].x + 1, screen[i].y, text);
      });
    }

    return canvas;
  }

  render(sink: OutputSink): void {
    if (this.points.length === 0) {
      sink.write('No data points to display\n');
      return;
    }

    const { title, xLabel, yLabel } = this.options;

    if (title) {
      sink.write(' '.repeat(centerOffset(title, this.width)) + title + '\n');
    }

    this.buildCanvas().render(sink);

    if (xLabel) {
      sink.write(' '.repeat(centerOffset(xLabel, this.width)) + xLabel + '\n');
    }
    if (yLabel) {
      sink.write(' '.repeat(centerOffset(yLabel, this.width)) + yLabel + '\n');
    }

    logRender('line chart', { points: this.points.length, width: this.width, height: this.height });
  }

  printStatistics(sink: OutputSink): void {
    const stats = this.getStatistics();
    if (!stats) {
      sink.write('No data points for statistics\n');
      return;
    }

    sink.write('\nLine Chart Statistics:\n');
    sink.write(`Points: ${stats.count}\n`);
    sink.write(`Y Range: ${stats.minY.toFixed(2)} to ${stats.maxY.toFixed(2)}\n`);
    sink.write(`Y Mean: ${stats.meanY.toFixed(2)}\n`);
    sink.write(`Y Spread: ${stats.rangeY.toFixed(2)}\n`);
  }

  toString(): string {
    return renderToString(sink => this.render(sink));
  }
}

export function createSimpleLineChart(yValues: readonly number[], style: LineStyle = 'unicode'): LineChart {
  return new LineChart(style, 60, 20).addYValues(yValues);
}

export function createLineChart(
  xValues: readonly number[],
  yValues: readonly number[],
  style: LineStyle,
  width: number,
  height: number
): LineChart {
  return new LineChart(style, width, height).addPoints(xValues, yValues);
}

/**
 * Character grid that charts draw into before emitting text.
 * Lives for a single render call.
 */

import { style } from './ansi';
import type { LineGlyphs } from './glyphs';
import type { OutputSink } from './output';

export interface Cell {
  char: string;
  style: string;
}

export type SegmentDirection = 'horizontal' | 'vertical' | 'forward' | 'back';

/**
 * Glyph class for a segment from its screen deltas (screen y grows downward)
 */
export function segmentDirection(dx: number, dy: number): SegmentDirection {
  if (Math.abs(dx) > Math.abs(dy)) return 'horizontal';
  if (Math.abs(dy) > Math.abs(dx)) return 'vertical';
  if ((dx > 0 && dy < 0) || (dx < 0 && dy > 0)) return 'forward';
  return 'back';
}

function glyphFor(direction: SegmentDirection, glyphs: LineGlyphs): string {
  switch (direction) {
    case 'horizontal':
      return glyphs.horizontal;
    case 'vertical':
      return glyphs.vertical;
    case 'forward':
      return glyphs.forwardSlash;
    case 'back':
      return glyphs.backSlash;
  }
}

export class Canvas {
  private readonly buffer: Cell[][];

  constructor(
    private readonly width: number,
    private readonly height: number
  ) {
    this.buffer = this.createEmptyBuffer();
  }

  private createEmptyBuffer(): Cell[][] {
    const buffer: Cell[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push({ char: ' ', style: '' });
      }
      buffer.push(row);
    }
    return buffer;
  }

  getCell(x: number, y: number): Cell | undefined {
    const cell = this.buffer[y]?.[x];
    return cell ? { ...cell } : undefined;
  }

  /**
   * Set a single cell; anything off the grid is dropped
   */
  drawPoint(x: number, y: number, char: string, cellStyle = ''): void {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return;
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;
    this.buffer[y][x] = { char, style: cellStyle };
  }

  /**
   * Rasterize a segment by stepping max(|dx|, |dy|) times.
   * A zero-length segment draws nothing; its endpoint is plotted as a marker.
   */
  drawLineSegment(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    glyphs: LineGlyphs,
    cellStyle = ''
  ): void {
    const dx = x2 - x1;
    const dy = y2 - y1;
    const steps = Math.max(Math.abs(dx), Math.abs(dy));
    if (steps === 0) return;

    const xInc = dx / steps;
    const yInc = dy / steps;
    const char = glyphFor(segmentDirection(dx, dy), glyphs);

    let x = x1;
    let y = y1;
    for (let i = 0; i <= steps; i++) {
      this.drawPoint(Math.round(x), Math.round(y), char, cellStyle);
      x += xInc;
      y += yInc;
    }
  }

  /**
   * Gridlines every height/5 rows and width/5 columns.
   * Must run before data so lines and markers land on top.
   */
  drawGrid(horizontalChar: string, verticalChar: string, cellStyle = ''): void {
    const rowStep = Math.max(1, Math.floor(this.height / 5));
    const colStep = Math.max(1, Math.floor(this.width / 5));

    for (let y = 0; y < this.height; y += rowStep) {
      for (let x = 0; x < this.width; x++) {
        this.buffer[y][x] = { char: horizontalChar, style: cellStyle };
      }
    }

    for (let x = 0; x < this.width; x += colStep) {
      for (let y = 0; y < this.height; y++) {
        this.buffer[y][x] = { char: verticalChar, style: cellStyle };
      }
    }
  }

  /**
   * Place text one code point per cell, clipped at the right edge
   */
  writeText(x: number, y: number, text: string, cellStyle = ''): void {
    let col = x;
    for (const char of text) {
      if (col >= this.width) break;
      this.drawPoint(col, y, char, cellStyle);
      col++;
    }
  }

  /**
   * Row-major text, one string per row.
   * Style changes are emitted inline and a styled row ends with a reset.
   */
  toLines(): string[] {
    return this.buffer.map(row => {
      let line = '';
      let lastStyle = '';

      for (const cell of row) {
        if (cell.style !== lastStyle) {
          line += lastStyle ? style.reset + cell.style : cell.style;
          lastStyle = cell.style;
        }
        line += cell.char;
      }

      if (lastStyle) {
        line += style.reset;
      }
      return line;
    });
  }

  render(sink: OutputSink): void {
    for (const line of this.toLines()) {
      sink.write(line + '\n');
    }
  }
}

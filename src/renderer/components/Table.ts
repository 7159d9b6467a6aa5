/**
 * Bordered table with fixed-width columns and optional color themes
 */

import { Alignment, bg, fg, padVisible, style, visibleLength } from '../ansi';
import { tableGlyphs, TableGlyphs, TableStyle } from '../glyphs';
import { OutputSink, renderToString } from '../output';
import { logRender } from '../../utils/logger';

export interface Column {
  header: string;
  width: number;
  alignment: Alignment;
}

export type Row = readonly string[];

export interface TableColorTheme {
  border: string;
  header: string;
  headerBackground: string;
  row: string;
  altRow: string;
}

export const tableThemes = {
  default: {
    border: fg.white,
    header: fg.white,
    headerBackground: '',
    row: fg.white,
    altRow: fg.white,
  },
  dark: {
    border: fg.brightBlack,
    header: fg.brightWhite,
    headerBackground: bg.black,
    row: fg.brightWhite,
    altRow: fg.brightBlack,
  },
  blue: {
    border: fg.blue,
    header: fg.brightBlue,
    headerBackground: '',
    row: fg.white,
    altRow: fg.brightBlack,
  },
  green: {
    border: fg.green,
    header: fg.brightGreen,
    headerBackground: '',
    row: fg.white,
    altRow: fg.brightBlack,
  },
} satisfies Record<string, TableColorTheme>;

export type TableThemeName = keyof typeof tableThemes;

export const TABLE_THEMES: readonly TableThemeName[] = ['default', 'dark', 'blue', 'green'];

const MIN_AUTO_WIDTH = 5;

type BorderKind = 'top' | 'middle' | 'bottom';

export class Table {
  private columns: Column[] = [];
  private rows: Row[] = [];
  private theme: TableColorTheme | null = null;
  private alternatingRows = false;
  private showHeader = true;

  constructor(private readonly style: TableStyle = 'unicode') {}

  addColumn(header: string, width: number, alignment: Alignment = 'left'): this {
    this.columns.push({ header, width: Math.max(0, Math.floor(width)), alignment });
    return this;
  }

  addRow(cells: Row): this {
    this.rows.push([...cells]);
    return this;
  }

  withColors(theme: TableColorTheme | TableThemeName): this {
    this.theme = typeof theme === 'string' ? tableThemes[theme] : { ...theme };
    return this;
  }

  withAlternatingRows(enabled: boolean): this {
    this.alternatingRows = enabled;
    return this;
  }

  withHeader(enabled: boolean): this {
    this.showHeader = enabled;
    return this;
  }

  getColumns(): Column[] {
    return this.columns.map(column => ({ ...column }));
  }

  getRows(): string[][] {
    return this.rows.map(row => [...row]);
  }

  private get glyphs(): TableGlyphs {
    return tableGlyphs[this.style];
  }

  private borderLine(kind: BorderKind): string {
    const chars = this.glyphs;
    const [left, junction, right] =
      kind === 'top'
        ? [chars.topLeft, chars.teeDown, chars.topRight]
        : kind === 'middle'
          ? [chars.teeRight, chars.cross, chars.teeLeft]
          : [chars.bottomLeft, chars.teeUp, chars.bottomRight];

    const body = this.columns.map(column => chars.horizontal.repeat(column.width + 2)).join(junction);
    const line = left + body + right;
    return this.theme ? this.theme.border + line + style.reset : line;
  }

  /**
   * One bordered row; each cell is framed by a space on both sides
   */
  private contentLine(cells: Row, color: string): string {
    const vertical = this.glyphs.vertical;
    const border = this.theme?.border ?? '';

    let line = border + vertical;
    this.columns.forEach((column, i) => {
      const padded = padVisible(cells[i] ?? '', column.width, column.alignment);
      if (this.theme) {
        line += style.reset + color + ' ' + padded + ' ' + style.reset + border + vertical;
      } else {
        line += ' ' + padded + ' ' + vertical;
      }
    });
    return this.theme ? line + style.reset : line;
  }

  render(sink: OutputSink): void {
    if (this.columns.length === 0) {
      sink.write('Empty table\n');
      return;
    }

    sink.write(this.borderLine('top') + '\n');

    if (this.showHeader) {
      const headerColor = this.theme ? this.theme.headerBackground + this.theme.header : '';
      sink.write(this.contentLine(this.columns.map(column => column.header), headerColor) + '\n');
      sink.write(this.borderLine('middle') + '\n');
    }

    this.rows.forEach((row, index) => {
      const color = !this.theme
        ? ''
        : this.alternatingRows && index % 2 === 1
          ? this.theme.altRow
          : this.theme.row;
      sink.write(this.contentLine(row, color) + '\n');
    });

    sink.write(this.borderLine('bottom') + '\n');
    logRender('table', { columns: this.columns.length, rows: this.rows.length });
  }

  toString(): string {
    return renderToString(sink => this.render(sink));
  }
}

/**
 * Column widths that fit the header and every cell, never below 5
 */
export function autoColumnWidths(headers: readonly string[], rows: readonly Row[]): number[] {
  return headers.map((header, i) => {
    let width = visibleLength(header);
    for (const row of rows) {
      const cell = row[i];
      if (cell !== undefined) width = Math.max(width, visibleLength(cell));
    }
    return Math.max(width, MIN_AUTO_WIDTH);
  });
}

/**
 * Left-aligned table sized to its content
 */
export function createSimpleTable(
  headers: readonly string[],
  rows: readonly Row[],
  tableStyle: TableStyle = 'unicode'
): Table {
  const table = new Table(tableStyle);
  const widths = autoColumnWidths(headers, rows);
  headers.forEach((header, i) => table.addColumn(header, widths[i], 'left'));
  rows.forEach(row => table.addRow(row));
  return table;
}

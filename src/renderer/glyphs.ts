/**
 * Glyph tables for every chart type, keyed by visual style
 */

export interface LineGlyphs {
  horizontal: string;
  vertical: string;
  forwardSlash: string;
  backSlash: string;
  marker: string;
  gridHorizontal: string;
  gridVertical: string;
}

export const lineGlyphs = {
  ascii: {
    horizontal: '-',
    vertical: '|',
    forwardSlash: '/',
    backSlash: '\\',
    marker: '*',
    gridHorizontal: '-',
    gridVertical: '|',
  },
  unicode: {
    horizontal: '─',
    vertical: '│',
    forwardSlash: '╱',
    backSlash: '╲',
    marker: '●',
    gridHorizontal: '─',
    gridVertical: '│',
  },
  smooth: {
    horizontal: '━',
    vertical: '┃',
    forwardSlash: '╱',
    backSlash: '╲',
    marker: '●',
    gridHorizontal: '┄',
    gridVertical: '┆',
  },
} satisfies Record<string, LineGlyphs>;

export type LineStyle = keyof typeof lineGlyphs;

export const barGlyphs = {
  ascii: '#',
  unicode: '█',
} satisfies Record<string, string>;

export type BarStyle = keyof typeof barGlyphs;

export interface BreakdownGlyphs {
  segment: string;
  legend: string;
}

export const breakdownGlyphs = {
  ascii: { segment: '=', legend: 'o' },
  unicode: { segment: '█', legend: '●' },
  block: { segment: '█', legend: '●' },
  rounded: { segment: '█', legend: '●' },
  minimal: { segment: '▬', legend: '•' },
} satisfies Record<string, BreakdownGlyphs>;

export type BreakdownStyle = keyof typeof breakdownGlyphs;

// Box drawing characters for tables: corners, edges, junctions
export interface TableGlyphs {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
  cross: string;
  teeDown: string;
  teeUp: string;
  teeLeft: string;
  teeRight: string;
}

export const tableGlyphs = {
  ascii: {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
    cross: '+',
    teeDown: '+',
    teeUp: '+',
    teeLeft: '+',
    teeRight: '+',
  },
  unicode: {
    topLeft: '┌',
    topRight: '┐',
    bottomLeft: '└',
    bottomRight: '┘',
    horizontal: '─',
    vertical: '│',
    cross: '┼',
    teeDown: '┬',
    teeUp: '┴',
    teeLeft: '┤',
    teeRight: '├',
  },
  double: {
    topLeft: '╔',
    topRight: '╗',
    bottomLeft: '╚',
    bottomRight: '╝',
    horizontal: '═',
    vertical: '║',
    cross: '╬',
    teeDown: '╦',
    teeUp: '╩',
    teeLeft: '╣',
    teeRight: '╠',
  },
  rounded: {
    topLeft: '╭',
    topRight: '╮',
    bottomLeft: '╰',
    bottomRight: '╯',
    horizontal: '─',
    vertical: '│',
    cross: '┼',
    teeDown: '┬',
    teeUp: '┴',
    teeLeft: '┤',
    teeRight: '├',
  },
} satisfies Record<string, TableGlyphs>;

export type TableStyle = keyof typeof tableGlyphs;

export interface TreeGlyphs {
  branch: string;
  lastBranch: string;
  continuation: string;
  space: string;
}

export const treeGlyphs = {
  ascii: { branch: '|-', lastBranch: '`-', continuation: '| ', space: '  ' },
  unicode: { branch: '├─', lastBranch: '└─', continuation: '│ ', space: '  ' },
  rounded: { branch: '├─', lastBranch: '╰─', continuation: '│ ', space: '  ' },
  thick: { branch: '┣━', lastBranch: '┗━', continuation: '┃ ', space: '  ' },
} satisfies Record<string, TreeGlyphs>;

export type TreeStyle = keyof typeof treeGlyphs;

export const SPARK_CHARS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;

export const LINE_STYLES: readonly LineStyle[] = ['ascii', 'unicode', 'smooth'];
export const BAR_STYLES: readonly BarStyle[] = ['ascii', 'unicode'];
export const BREAKDOWN_STYLES: readonly BreakdownStyle[] = ['ascii', 'unicode', 'block', 'rounded', 'minimal'];
export const TABLE_STYLES: readonly TableStyle[] = ['ascii', 'unicode', 'double', 'rounded'];
export const TREE_STYLES: readonly TreeStyle[] = ['ascii', 'unicode', 'rounded', 'thick'];

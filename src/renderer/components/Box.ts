/**
 * Box drawing utilities for framed text (toasts, captions)
 */

import { Alignment, padVisible, style, visibleLength } from '../ansi';

// Box drawing characters (Unicode)
export const boxChars = {
  // Single line
  single: {
    topLeft: '┌',
    topRight: '┐',
    bottomLeft: '└',
    bottomRight: '┘',
    horizontal: '─',
    vertical: '│',
  },
  // Double line
  double: {
    topLeft: '╔',
    topRight: '╗',
    bottomLeft: '╚',
    bottomRight: '╝',
    horizontal: '═',
    vertical: '║',
  },
  // Rounded
  rounded: {
    topLeft: '╭',
    topRight: '╮',
    bottomLeft: '╰',
    bottomRight: '╯',
    horizontal: '─',
    vertical: '│',
  },
  // Heavy
  heavy: {
    topLeft: '┏',
    topRight: '┓',
    bottomLeft: '┗',
    bottomRight: '┛',
    horizontal: '━',
    vertical: '┃',
  },
  // Plain ASCII
  ascii: {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  },
};

export type BoxStyle = keyof typeof boxChars;

export interface FrameOptions {
  width?: number;
  style?: BoxStyle;
  align?: Alignment;
  borderColor?: string;
  contentColor?: string;
}

/**
 * Total box width that fits every line plus one space of padding per side
 */
export function fitWidth(lines: readonly string[]): number {
  const widest = lines.reduce((max, line) => Math.max(max, visibleLength(line)), 0);
  return widest + 4;
}

/**
 * Frame lines of text in a box.
 * The box is at least wide enough for the content; `width` only grows it.
 */
export function frame(lines: readonly string[], options: FrameOptions = {}): string[] {
  const {
    style: boxStyle = 'single',
    align = 'left',
    borderColor = '',
    contentColor = '',
  } = options;

  const chars = boxChars[boxStyle];
  const width = Math.max(options.width ?? 0, fitWidth(lines));
  const inner = width - 2;
  const close = borderColor ? style.reset : '';

  const result: string[] = [];
  result.push(borderColor + chars.topLeft + chars.horizontal.repeat(inner) + chars.topRight + close);

  for (const line of lines) {
    const padded = padVisible(line, inner, align);
    const body = contentColor || borderColor ? style.reset + contentColor + padded + style.reset : padded;
    result.push(borderColor + chars.vertical + body + borderColor + chars.vertical + close);
  }

  result.push(borderColor + chars.bottomLeft + chars.horizontal.repeat(inner) + chars.bottomRight + close);
  return result;
}

/**
 * ANSI SGR constants and visible-width helpers
 * Every renderer that pads text into fixed-width cells goes through here
 */

import stringWidth from 'string-width';

// Foreground colors - basic 8 plus bright variants
export const fg = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Bright variants
  brightBlack: '\x1b[90m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',
} as const;

export const bg = {
  black: '\x1b[40m',
  red: '\x1b[41m',
  green: '\x1b[42m',
  yellow: '\x1b[43m',
  blue: '\x1b[44m',
  magenta: '\x1b[45m',
  cyan: '\x1b[46m',
  white: '\x1b[47m',
} as const;

// Text styles
export const style = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
} as const;

export type ForegroundColor = keyof typeof fg;
export type BackgroundColor = keyof typeof bg;

export type Alignment = 'left' | 'center' | 'right';

// CSI introducer, parameter/intermediate bytes, then one final byte in 0x40-0x7E
// eslint-disable-next-line no-control-regex
const CSI_PATTERN = /\x1b\[[^\x40-\x7e]*[\x40-\x7e]?/g;
// eslint-disable-next-line no-control-regex
const CSI_AT = /\x1b\[[^\x40-\x7e]*[\x40-\x7e]?/y;

/**
 * Helper to create styled text
 */
export function styled(text: string, ...styles: string[]): string {
  const prefix = styles.join('');
  if (!prefix) return text;
  return prefix + text + style.reset;
}

/**
 * Strip ANSI codes from string (for width calculation)
 */
export function stripAnsi(str: string): string {
  return str.replace(CSI_PATTERN, '');
}

/**
 * Terminal columns a string occupies once escapes are removed.
 * Wide (CJK, emoji) characters take two columns, combining marks none.
 */
export function visibleLength(str: string): number {
  return stringWidth(stripAnsi(str));
}

/**
 * Cut a string down to `width` columns, keeping escape sequences.
 * A wide character that would straddle the edge is dropped.
 * A reset is appended when any escape survived.
 */
export function truncateVisible(str: string, width: number): string {
  if (visibleLength(str) <= width) return str;

  let result = '';
  let visibleCount = 0;
  let sawEscape = false;
  let index = 0;

  while (index < str.length) {
    CSI_AT.lastIndex = index;
    const match = CSI_AT.exec(str);
    if (match) {
      result += match[0];
      sawEscape = true;
      index += match[0].length;
      continue;
    }

    const codePoint = str.codePointAt(index);
    if (codePoint === undefined) break;
    const char = String.fromCodePoint(codePoint);
    const charWidth = stringWidth(char);
    if (visibleCount + charWidth > width) break;
    result += char;
    visibleCount += charWidth;
    index += char.length;
  }

  return sawEscape ? result + style.reset : result;
}

/**
 * Fit text into exactly `width` visible columns.
 * Longer text is truncated; for center alignment the odd column goes right.
 */
export function padVisible(str: string, width: number, alignment: Alignment = 'left'): string {
  const fitted = visibleLength(str) > width ? truncateVisible(str, width) : str;
  const padding = Math.max(0, width - visibleLength(fitted));
  if (padding === 0) return fitted;

  switch (alignment) {
    case 'right':
      return ' '.repeat(padding) + fitted;
    case 'center': {
      const left = Math.floor(padding / 2);
      return ' '.repeat(left) + fitted + ' '.repeat(padding - left);
    }
    default:
      return fitted + ' '.repeat(padding);
  }
}

/**
 * Left padding that centers `text` inside `width` columns (never negative)
 */
export function centerOffset(text: string, width: number): number {
  return Math.max(0, Math.floor((width - visibleLength(text)) / 2));
}

/**
 * Fixed color tables and the injectable color picker
 */

import { bg, fg } from './ansi';

// Pool sampled per cell by bar charts in random-color mode
export const RANDOM_COLORS: readonly string[] = [
  fg.red,
  fg.green,
  fg.yellow,
  fg.brightRed,
  fg.brightWhite,
  fg.brightBlue,
  fg.blue,
  fg.brightCyan,
  bg.red,
  fg.cyan,
  bg.green,
  bg.blue,
];

// Breakdown segments without their own color cycle through these
export const SEGMENT_COLORS: readonly string[] = [
  fg.red,
  fg.green,
  fg.blue,
  fg.yellow,
  fg.magenta,
  fg.cyan,
  fg.white,
];

export type ColorPicker = () => string;
export type RandomSource = () => number;

/**
 * Color at index, wrapping around the palette
 */
export function colorAt(palette: readonly string[], index: number): string {
  if (palette.length === 0) return '';
  const wrapped = ((index % palette.length) + palette.length) % palette.length;
  return palette[wrapped];
}

/**
 * Picker that samples the palette with a random source in [0, 1)
 */
export function createRandomColorPicker(
  random: RandomSource = Math.random,
  palette: readonly string[] = RANDOM_COLORS
): ColorPicker {
  return () => colorAt(palette, Math.floor(random() * palette.length));
}

/**
 * Deterministic picker that walks a fixed list of colors in order
 */
export function createSequenceColorPicker(colors: readonly string[]): ColorPicker {
  let index = 0;
  return () => colorAt(colors, index++);
}

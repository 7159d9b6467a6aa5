/**
 * termcharts library surface
 */

export * from './renderer/ansi';
export * from './renderer/output';
export * from './renderer/glyphs';
export * from './renderer/scale';
export * from './renderer/palette';
export * from './renderer/Canvas';
export * from './renderer/components/LineChart';
export * from './renderer/components/BarChart';
export * from './renderer/components/BreakdownChart';
export * from './renderer/components/Sparkline';
export * from './renderer/components/Table';
export * from './renderer/components/Tree';
export * from './renderer/components/Toast';
export { boxChars, fitWidth, frame } from './renderer/components/Box';
export type { BoxStyle, FrameOptions } from './renderer/components/Box';
export * from './utils/errors';
export { setLogLevel, getLogLevel } from './utils/logger';
export type { LogLevel } from './utils/logger';

import Conf from 'conf';
import {
  BAR_STYLES,
  BREAKDOWN_STYLES,
  BarStyle,
  BreakdownStyle,
  LINE_STYLES,
  LineStyle,
  TABLE_STYLES,
  TREE_STYLES,
  TableStyle,
  TreeStyle,
} from '../renderer/glyphs';
import { LOG_LEVELS, LogLevel } from '../utils/logger';
import { detectColorSupport } from '../utils/terminal';
import {
  ValidationResult,
  validateChoice,
  validateDimension,
} from '../utils/validation';

export type ColorMode = 'auto' | 'always' | 'never';

export const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export interface ConfigSchema {
  lineStyle: LineStyle;
  barStyle: BarStyle;
  breakdownStyle: BreakdownStyle;
  tableStyle: TableStyle;
  treeStyle: TreeStyle;
  color: ColorMode;
  chartWidth: number; // line chart columns
  chartHeight: number; // line chart rows
  barWidth: number; // longest bar / breakdown bar width
  logLevel: LogLevel;
}

export type SettingKey = keyof ConfigSchema;

export const DEFAULT_SETTINGS: Readonly<ConfigSchema> = Object.freeze({
  lineStyle: 'unicode',
  barStyle: 'unicode',
  breakdownStyle: 'unicode',
  tableStyle: 'unicode',
  treeStyle: 'unicode',
  color: 'auto',
  chartWidth: 60,
  chartHeight: 20,
  barWidth: 40,
  logLevel: 'warn',
});

export const SETTING_KEYS: readonly SettingKey[] = [
  'lineStyle',
  'barStyle',
  'breakdownStyle',
  'tableStyle',
  'treeStyle',
  'color',
  'chartWidth',
  'chartHeight',
  'barWidth',
  'logLevel',
];

let store: Conf<ConfigSchema> | null = null;

/**
 * Config store, created on first use.
 * TERMCHARTS_CONFIG_DIR moves it out of the user's config directory.
 */
export function getConfigStore(): Conf<ConfigSchema> {
  if (!store) {
    store = new Conf<ConfigSchema>({
      projectName: 'termcharts',
      cwd: process.env.TERMCHARTS_CONFIG_DIR || undefined,
      defaults: { ...DEFAULT_SETTINGS },
    });
  }
  return store;
}

/**
 * Drop the cached store so the next call re-reads the environment
 */
export function closeConfigStore(): void {
  store = null;
}

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some(candidate => candidate === key);
}

export function getSetting<K extends SettingKey>(key: K): ConfigSchema[K] {
  return getConfigStore().get(key);
}

export function listSettings(): ConfigSchema {
  const config = getConfigStore();
  return {
    lineStyle: config.get('lineStyle'),
    barStyle: config.get('barStyle'),
    breakdownStyle: config.get('breakdownStyle'),
    tableStyle: config.get('tableStyle'),
    treeStyle: config.get('treeStyle'),
    color: config.get('color'),
    chartWidth: config.get('chartWidth'),
    chartHeight: config.get('chartHeight'),
    barWidth: config.get('barWidth'),
    logLevel: config.get('logLevel'),
  };
}

function persist<K extends SettingKey>(key: K, result: ValidationResult<ConfigSchema[K]>): ValidationResult {
  if (!result.valid || result.sanitized === undefined) {
    return { valid: false, error: result.error };
  }
  getConfigStore().set(key, result.sanitized);
  return { valid: true, sanitized: String(result.sanitized) };
}

/**
 * Validate and persist one setting given as text
 */
export function setSetting(key: string, raw: string): ValidationResult {
  if (!isSettingKey(key)) {
    return { valid: false, error: `Unknown setting: ${key} (expected one of ${SETTING_KEYS.join(', ')})` };
  }

  switch (key) {
    case 'lineStyle':
      return persist(key, validateChoice(raw, LINE_STYLES, 'line style'));
    case 'barStyle':
      return persist(key, validateChoice(raw, BAR_STYLES, 'bar style'));
    case 'breakdownStyle':
      return persist(key, validateChoice(raw, BREAKDOWN_STYLES, 'breakdown style'));
    case 'tableStyle':
      return persist(key, validateChoice(raw, TABLE_STYLES, 'table style'));
    case 'treeStyle':
      return persist(key, validateChoice(raw, TREE_STYLES, 'tree style'));
    case 'color':
      return persist(key, validateChoice(raw, COLOR_MODES, 'color mode'));
    case 'chartWidth':
    case 'chartHeight':
    case 'barWidth':
      return persist(key, validateDimension(raw, key));
    case 'logLevel':
      return persist(key, validateChoice(raw, LOG_LEVELS, 'log level'));
  }
}

/**
 * Restore every setting to its default
 */
export function resetSettings(): void {
  getConfigStore().clear();
}

/**
 * Color decision for a stream: config mode first, auto falls back to detection
 */
export function resolveColorEnabled(
  mode: ColorMode = getSetting('color'),
  stream: { isTTY?: boolean } = process.stdout
): boolean {
  if (mode === 'always') return true;
  if (mode === 'never') return false;
  return detectColorSupport(stream);
}

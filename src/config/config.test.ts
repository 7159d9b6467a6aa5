import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_SETTINGS,
  closeConfigStore,
  getSetting,
  isSettingKey,
  listSettings,
  resetSettings,
  resolveColorEnabled,
  setSetting,
} from './index';

describe('config', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'termcharts-config-test-'));
    process.env.TERMCHARTS_CONFIG_DIR = configDir;
    closeConfigStore();
  });

  afterEach(() => {
    closeConfigStore();
    delete process.env.TERMCHARTS_CONFIG_DIR;
    vi.unstubAllEnvs();
    rmSync(configDir, { recursive: true, force: true });
  });

  it('should start from the defaults', () => {
    expect(listSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('should recognize setting keys', () => {
    expect(isSettingKey('chartWidth')).toBe(true);
    expect(isSettingKey('fontSize')).toBe(false);
  });

  describe('setSetting', () => {
    it('should validate and store numbers', () => {
      expect(setSetting('chartWidth', '80')).toEqual({ valid: true, sanitized: '80' });
      expect(getSetting('chartWidth')).toBe(80);
    });

    it('should normalize style names', () => {
      expect(setSetting('lineStyle', 'ASCII').sanitized).toBe('ascii');
      expect(getSetting('lineStyle')).toBe('ascii');
    });

    it('should reject unknown keys', () => {
      expect(setSetting('fontSize', '12').error).toBe(
        'Unknown setting: fontSize (expected one of lineStyle, barStyle, breakdownStyle, tableStyle, treeStyle, color, chartWidth, chartHeight, barWidth, logLevel)'
      );
    });

    it('should reject invalid values without storing them', () => {
      expect(setSetting('chartHeight', '0').error).toBe('chartHeight must be between 1 and 500');
      expect(setSetting('color', 'sometimes').error).toBe(
        'Unknown color mode: sometimes (expected one of auto, always, never)'
      );
      expect(getSetting('chartHeight')).toBe(20);
      expect(getSetting('color')).toBe('auto');
    });

    it('should persist across store instances', () => {
      setSetting('logLevel', 'debug');
      closeConfigStore();
      expect(getSetting('logLevel')).toBe('debug');
    });
  });

  it('should restore defaults on reset', () => {
    setSetting('barWidth', '25');
    resetSettings();
    expect(getSetting('barWidth')).toBe(40);
  });

  describe('resolveColorEnabled', () => {
    it('should follow explicit modes', () => {
      expect(resolveColorEnabled('always', { isTTY: false })).toBe(true);
      expect(resolveColorEnabled('never', { isTTY: true })).toBe(false);
    });

    it('should detect support in auto mode', () => {
      vi.stubEnv('NO_COLOR', '1');
      expect(resolveColorEnabled('auto', { isTTY: true })).toBe(false);
    });

    it('should read the mode from settings by default', () => {
      setSetting('color', 'always');
      expect(resolveColorEnabled(undefined, { isTTY: false })).toBe(true);
    });
  });
});

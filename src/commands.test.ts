import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { stripAnsi } from './renderer/ansi';
import { createBufferSink } from './renderer/output';
import { LengthMismatchError } from './utils/errors';
import { DEFAULT_SETTINGS, closeConfigStore } from './config/index';
import { HELP_TEXT, buildTreeFromPaths, getCurrentVersion, parseArgs, runCommand } from './commands';

function run(argv: string[]) {
  const out = createBufferSink();
  const err = createBufferSink();
  const code = runCommand(parseArgs(argv), {
    sink: out,
    errorSink: err,
    settings: { ...DEFAULT_SETTINGS },
    colorEnabled: false,
  });
  return { code, out: out.toString(), lines: out.lines(), err: stripAnsi(err.toString()) };
}

describe('parseArgs', () => {
  it('should split command, positionals and flags', () => {
    expect(parseArgs(['line', '1', '2', '--width', '30', '--grid', '--title=Hi'])).toEqual({
      command: 'line',
      positionals: ['1', '2'],
      flags: { width: '30', grid: true, title: 'Hi' },
    });
  });

  it('should map short flags', () => {
    expect(parseArgs(['-v']).flags).toEqual({ version: true });
    expect(parseArgs(['-h']).command).toBeUndefined();
  });

  it('should keep a value flag without a value as empty', () => {
    expect(parseArgs(['bar', '--width']).flags).toEqual({ width: '' });
  });
});

describe('runCommand', () => {
  it('should print help without a command', () => {
    expect(run([]).out).toBe(HELP_TEXT);
    expect(run(['--help']).out).toBe(HELP_TEXT);
  });

  it('should print the package version', () => {
    expect(getCurrentVersion()).toBe('0.4.0');
    expect(run(['--version']).out).toBe('termcharts v0.4.0\n');
  });

  it('should reject unknown commands', () => {
    const result = run(['plot']);
    expect(result.code).toBe(1);
    expect(result.err).toBe('Error: Unknown command: plot. Run termcharts --help for usage.\n');
  });

  describe('spark', () => {
    it('should print a sparkline', () => {
      expect(run(['spark', '1,5,22,13,53,29,44,90'])).toMatchObject({ code: 0, out: '▁▁▂▁▅▃▄█\n' });
    });

    it('should report bad numbers', () => {
      expect(run(['spark', '1', 'x'])).toMatchObject({ code: 1, err: 'Error: Not a number: x\n' });
    });
  });

  describe('line', () => {
    it('should draw a chart with the given size and style', () => {
      const result = run(['line', '5', '5', '--width', '10', '--height', '3', '--style', 'ascii']);
      expect(result.code).toBe(0);
      expect(result.lines).toEqual(['          ', '*--------*', '          ']);
    });

    it('should append statistics', () => {
      const result = run(['line', '2', '4', '9', '--width', '10', '--height', '3', '--stats']);
      expect(result.lines.slice(-4)).toEqual(['Points: 3', 'Y Range: 2.00 to 9.00', 'Y Mean: 5.00', 'Y Spread: 7.00']);
    });

    it('should reject an unknown style', () => {
      expect(run(['line', '1', '--style', 'fancy']).err).toBe(
        'Error: Unknown line style: fancy (expected one of ascii, unicode, smooth)\n'
      );
    });

    it('should throw when x and y lengths differ', () => {
      expect(() => run(['line', '1', '2', '--x', '1'])).toThrow(LengthMismatchError);
    });
  });

  describe('bar', () => {
    it('should draw bars', () => {
      const result = run(['bar', 'A=10', 'B=5', '--style', 'ascii', '--width', '10']);
      expect(result.out).toBe('A            | ########## (10)\nB            | ##### (5)\n');
    });

    it('should validate the width', () => {
      expect(run(['bar', 'a=1', '--width', 'abc']).err).toBe('Error: --width must be a whole number\n');
    });

    it('should reject negative values', () => {
      expect(run(['bar', 'a=-2']).code).toBe(1);
    });
  });

  describe('breakdown', () => {
    it('should draw the bar and legend', () => {
      const result = run(['breakdown', 'A=5', 'B=3', 'C=2', '--style', 'ascii', '--width', '10']);
      expect(result.out).toBe('==========\n\nLegend:\no A (50.0%)\no B (30.0%)\no C (20.0%)\n\n');
    });
  });

  describe('table', () => {
    it('should build a table from comma separated rows', () => {
      const result = run(['table', 'Name,Age', 'Alice,25', '--style', 'ascii']);
      expect(result.lines).toEqual([
        '+-------+-------+',
        '| Name  | Age   |',
        '+-------+-------+',
        '| Alice | 25    |',
        '+-------+-------+',
      ]);
    });

    it('should require a header row', () => {
      expect(run(['table']).code).toBe(1);
    });

    it('should reject unknown themes', () => {
      expect(run(['table', 'a', '--theme', 'neon']).err).toBe(
        'Error: Unknown table theme: neon (expected one of default, dark, blue, green)\n'
      );
    });
  });

  describe('tree', () => {
    it('should build a tree from paths', () => {
      const result = run(['tree', 'src/main.ts', 'src/lib.ts', 'README.md', '--root', 'proj']);
      expect(result.out).toBe('proj\n├─src\n│ ├─main.ts\n│ └─lib.ts\n└─README.md\n');
    });

    it('should limit the depth', () => {
      const result = run(['tree', 'src/main.ts', 'README.md', '--depth', '1']);
      expect(result.out).toBe('.\n├─src\n└─README.md\n');
    });

    it('should share path prefixes', () => {
      const root = buildTreeFromPaths('r', ['a/b', 'a/c', '/a//d/']);
      expect(root.countNodes()).toBe(5);
      expect(root.findChild('a')?.getChildren().map(child => child.name)).toEqual(['b', 'c', 'd']);
    });
  });

  describe('toast', () => {
    it('should frame the message', () => {
      expect(run(['toast', 'success', 'Saved']).lines).toEqual([
        '┌──────────────────┐',
        '│ ✓ SUCCESS: Saved │',
        '└──────────────────┘',
      ]);
    });

    it('should reject unknown types', () => {
      expect(run(['toast', 'bogus', 'hi']).err).toBe(
        'Error: Unknown toast type: bogus (expected one of info, success, warning, error)\n'
      );
    });

    it('should require a message', () => {
      expect(run(['toast', 'info']).err).toBe('Error: Toast needs a message\n');
    });
  });

  it('should render every component in the demo', () => {
    const result = run(['demo']);
    expect(result.code).toBe(0);
    expect(stripAnsi(result.lines[0])).toBe('Sparkline');
    expect(result.lines[1]).toBe('▁▁▂▁▅▃▄█');
  });

  describe('config', () => {
    let configDir: string;

    beforeEach(() => {
      configDir = mkdtempSync(join(tmpdir(), 'termcharts-cli-test-'));
      process.env.TERMCHARTS_CONFIG_DIR = configDir;
      closeConfigStore();
    });

    afterEach(() => {
      closeConfigStore();
      delete process.env.TERMCHARTS_CONFIG_DIR;
      rmSync(configDir, { recursive: true, force: true });
    });

    it('should set and get a value', () => {
      expect(stripAnsi(run(['config', 'set', 'chartWidth', '80']).out)).toBe('chartWidth = 80\n');
      expect(run(['config', 'get', 'chartWidth']).out).toBe('80\n');
    });

    it('should list every setting', () => {
      const { lines } = run(['config', 'list']);
      expect(lines).toHaveLength(10);
      expect(lines[0]).toBe('lineStyle        unicode');
    });

    it('should reset to defaults', () => {
      run(['config', 'set', 'barWidth', '12']);
      run(['config', 'reset']);
      expect(run(['config', 'get', 'barWidth']).out).toBe('40\n');
    });

    it('should report unknown settings', () => {
      expect(run(['config', 'get', 'fontSize']).err).toBe('Error: Unknown setting: fontSize\n');
    });
  });
});

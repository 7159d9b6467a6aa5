/**
 * CLI command dispatch. Every command renders into the sinks it is given,
 * so the whole CLI can run against in-memory buffers.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { fg } from './renderer/ansi';
import {
  BAR_STYLES,
  BREAKDOWN_STYLES,
  LINE_STYLES,
  TABLE_STYLES,
  TREE_STYLES,
} from './renderer/glyphs';
import { OutputSink } from './renderer/output';
import { BarChart } from './renderer/components/BarChart';
import { BreakdownChart } from './renderer/components/BreakdownChart';
import { LineChart } from './renderer/components/LineChart';
import { Sparkline } from './renderer/components/Sparkline';
import { Table, TABLE_THEMES, autoColumnWidths } from './renderer/components/Table';
import { TreeNode, TreeRenderer, createTree } from './renderer/components/Tree';
import { TOAST_TYPES, Toast } from './renderer/components/Toast';
import {
  ConfigSchema,
  SETTING_KEYS,
  getSetting,
  isSettingKey,
  listSettings,
  resetSettings,
  setSetting,
} from './config/index';
import {
  ValidationResult,
  parseCsvRow,
  parseLabeledValues,
  parseNumberList,
  validateChoice,
  validateDimension,
} from './utils/validation';

const BOOLEAN_FLAGS = new Set([
  'grid',
  'values',
  'no-markers',
  'no-legend',
  'no-percentages',
  'random-colors',
  'alternate',
  'metadata',
  'icons',
  'sort',
  'timestamp',
  'stats',
  'help',
  'version',
]);

const SHORT_FLAGS: Record<string, string> = {
  '-h': 'help',
  '-v': 'version',
};

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Record<string, string | true>;
}

export interface CommandContext {
  sink: OutputSink;
  errorSink: OutputSink;
  settings: ConfigSchema;
  colorEnabled: boolean;
}

/**
 * Split argv into command, positionals and --flags.
 * Value flags take the next token or an inline "--flag=value".
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | true> = {};

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const short = SHORT_FLAGS[token];

    if (short) {
      flags[short] = true;
    } else if (token.startsWith('--') && token.length > 2) {
      const body = token.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
      } else if (BOOLEAN_FLAGS.has(body)) {
        flags[body] = true;
      } else {
        const next = argv[i + 1];
        flags[body] = next ?? '';
        if (next !== undefined) i++;
      }
    } else {
      positionals.push(token);
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

/**
 * Version from package.json (one level above both src/ and dist/)
 */
export function getCurrentVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

export const HELP_TEXT = `
termcharts - tables, charts and trees as terminal text

Usage:
  termcharts spark <numbers...>
  termcharts line <y values...> [--x <x values>] [--width N] [--height N]
                  [--style ascii|unicode|smooth] [--title T] [--x-label T]
                  [--y-label T] [--grid] [--values] [--no-markers] [--stats]
  termcharts bar <label=value...> [--width N] [--style ascii|unicode] [--random-colors]
  termcharts breakdown <label=value...> [--width N] [--style S] [--title T]
                  [--values] [--no-percentages] [--no-legend] [--min-segment N] [--stats]
  termcharts table <header,row> <cell,cell...>... [--style S] [--theme T] [--alternate]
  termcharts tree <path...> [--root NAME] [--style S] [--depth N] [--sort] [--icons] [--stats]
  termcharts toast <info|success|warning|error> <message...> [--width N] [--timestamp]
  termcharts demo
  termcharts config [list | get <key> | set <key> <value> | reset]
  termcharts --version
  termcharts --help
`;

function fail(ctx: CommandContext, message: string): number {
  ctx.errorSink.write(chalk.red(`Error: ${message}`) + '\n');
  return 1;
}

function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags[name];
  return typeof value === 'string' ? value : undefined;
}

function hasFlag(parsed: ParsedArgs, name: string): boolean {
  return parsed.flags[name] !== undefined;
}

/**
 * Resolve an optional flag: default when absent, validated when present
 */
function optionalFlag<T>(
  parsed: ParsedArgs,
  name: string,
  fallback: T,
  validate: (raw: string | undefined) => ValidationResult<T>
): ValidationResult<T> {
  if (!hasFlag(parsed, name)) return { valid: true, sanitized: fallback };
  return validate(stringFlag(parsed, name));
}

function dimensionFlag(parsed: ParsedArgs, name: string, fallback: number): ValidationResult<number> {
  return optionalFlag(parsed, name, fallback, raw => validateDimension(raw, `--${name}`));
}

function runSpark(parsed: ParsedArgs, ctx: CommandContext): number {
  const values = parseNumberList(parsed.positionals);
  if (!values.valid || !values.sanitized) return fail(ctx, values.error ?? 'Invalid values');

  new Sparkline(values.sanitized).render(ctx.sink);
  return 0;
}

function runLine(parsed: ParsedArgs, ctx: CommandContext): number {
  const ys = parseNumberList(parsed.positionals);
  if (!ys.valid || !ys.sanitized) return fail(ctx, ys.error ?? 'Invalid values');

  const style = optionalFlag(parsed, 'style', ctx.settings.lineStyle, raw => validateChoice(raw, LINE_STYLES, 'line style'));
  const width = dimensionFlag(parsed, 'width', ctx.settings.chartWidth);
  const height = dimensionFlag(parsed, 'height', ctx.settings.chartHeight);
  for (const result of [style, width, height]) {
    if (!result.valid) return fail(ctx, result.error ?? 'Invalid option');
  }
  if (style.sanitized === undefined || width.sanitized === undefined || height.sanitized === undefined) {
    return fail(ctx, 'Invalid option');
  }

  const chart = new LineChart(style.sanitized, width.sanitized, height.sanitized);

  const rawX = stringFlag(parsed, 'x');
  if (rawX !== undefined) {
    const xs = parseNumberList([rawX]);
    if (!xs.valid || !xs.sanitized) return fail(ctx, xs.error ?? 'Invalid x values');
    chart.addPoints(xs.sanitized, ys.sanitized);
  } else {
    chart.addYValues(ys.sanitized);
  }

  const title = stringFlag(parsed, 'title');
  const xLabel = stringFlag(parsed, 'x-label');
  const yLabel = stringFlag(parsed, 'y-label');
  if (title) chart.withTitle(title);
  if (xLabel || yLabel) chart.withLabels(xLabel ?? '', yLabel ?? '');
  if (ctx.colorEnabled) chart.withColor(fg.cyan);

  chart
    .withGrid(hasFlag(parsed, 'grid'))
    .withValues(hasFlag(parsed, 'values'))
    .withMarkers(!hasFlag(parsed, 'no-markers'))
    .render(ctx.sink);

  if (hasFlag(parsed, 'stats')) chart.printStatistics(ctx.sink);
  return 0;
}

function runBar(parsed: ParsedArgs, ctx: CommandContext): number {
  const pairs = parseLabeledValues(parsed.positionals);
  if (!pairs.valid || !pairs.sanitized) return fail(ctx, pairs.error ?? 'Invalid bars');

  const style = optionalFlag(parsed, 'style', ctx.settings.barStyle, raw => validateChoice(raw, BAR_STYLES, 'bar style'));
  const width = dimensionFlag(parsed, 'width', ctx.settings.barWidth);
  if (!style.valid || style.sanitized === undefined) return fail(ctx, style.error ?? 'Invalid style');
  if (!width.valid || width.sanitized === undefined) return fail(ctx, width.error ?? 'Invalid width');

  const chart = new BarChart(style.sanitized, width.sanitized);
  for (const { label, value } of pairs.sanitized) {
    chart.addBar(label, value);
  }
  chart.withRandomColors(ctx.colorEnabled && hasFlag(parsed, 'random-colors'));
  chart.render(ctx.sink);
  return 0;
}

function runBreakdown(parsed: ParsedArgs, ctx: CommandContext): number {
  const pairs = parseLabeledValues(parsed.positionals);
  if (!pairs.valid || !pairs.sanitized) return fail(ctx, pairs.error ?? 'Invalid segments');

  const style = optionalFlag(parsed, 'style', ctx.settings.breakdownStyle, raw =>
    validateChoice(raw, BREAKDOWN_STYLES, 'breakdown style')
  );
  const width = dimensionFlag(parsed, 'width', ctx.settings.barWidth);
  const minSegment = optionalFlag(parsed, 'min-segment', 1, raw => validateDimension(raw, '--min-segment', 0));
  if (!style.valid || style.sanitized === undefined) return fail(ctx, style.error ?? 'Invalid style');
  if (!width.valid || width.sanitized === undefined) return fail(ctx, width.error ?? 'Invalid width');
  if (!minSegment.valid || minSegment.sanitized === undefined) return fail(ctx, minSegment.error ?? 'Invalid minimum');

  const chart = new BreakdownChart(style.sanitized, width.sanitized);
  for (const { label, value } of pairs.sanitized) {
    chart.addSegment(label, value);
  }

  const title = stringFlag(parsed, 'title');
  if (title) chart.withTitle(title);

  chart
    .withValues(hasFlag(parsed, 'values'))
    .withPercentages(!hasFlag(parsed, 'no-percentages'))
    .withLegend(!hasFlag(parsed, 'no-legend'))
    .withMinSegmentWidth(minSegment.sanitized)
    .withColors(ctx.colorEnabled)
    .render(ctx.sink);

  if (hasFlag(parsed, 'stats')) chart.printStatistics(ctx.sink);
  return 0;
}

function runTable(parsed: ParsedArgs, ctx: CommandContext): number {
  const [headerLine, ...rowLines] = parsed.positionals;
  if (headerLine === undefined) return fail(ctx, 'Table needs a header row, e.g. "Name,Age"');

  const style = optionalFlag(parsed, 'style', ctx.settings.tableStyle, raw => validateChoice(raw, TABLE_STYLES, 'table style'));
  if (!style.valid || style.sanitized === undefined) return fail(ctx, style.error ?? 'Invalid style');

  const headers = parseCsvRow(headerLine);
  const rows = rowLines.map(parseCsvRow);
  const widths = autoColumnWidths(headers, rows);

  const table = new Table(style.sanitized);
  headers.forEach((header, i) => table.addColumn(header, widths[i], 'left'));
  rows.forEach(row => table.addRow(row));

  const theme = stringFlag(parsed, 'theme');
  if (theme !== undefined) {
    const choice = validateChoice(theme, TABLE_THEMES, 'table theme');
    if (!choice.valid || choice.sanitized === undefined) return fail(ctx, choice.error ?? 'Invalid theme');
    if (ctx.colorEnabled) table.withColors(choice.sanitized);
  }

  table.withAlternatingRows(hasFlag(parsed, 'alternate')).render(ctx.sink);
  return 0;
}

/**
 * Build a tree from slash separated paths, reusing shared prefixes
 */
export function buildTreeFromPaths(rootName: string, paths: readonly string[]): TreeNode {
  const root = createTree(rootName);
  for (const path of paths) {
    let node = root;
    for (const part of path.split('/').filter(segment => segment.length > 0)) {
      node = node.findChild(part) ?? node.addChild(part);
    }
  }
  return root;
}

function runTree(parsed: ParsedArgs, ctx: CommandContext): number {
  if (parsed.positionals.length === 0) return fail(ctx, 'Tree needs at least one path');

  const style = optionalFlag(parsed, 'style', ctx.settings.treeStyle, raw => validateChoice(raw, TREE_STYLES, 'tree style'));
  if (!style.valid || style.sanitized === undefined) return fail(ctx, style.error ?? 'Invalid style');

  const root = buildTreeFromPaths(stringFlag(parsed, 'root') || '.', parsed.positionals);
  let renderer = new TreeRenderer(style.sanitized)
    .withAlphabeticalSort(hasFlag(parsed, 'sort'))
    .withIcons(hasFlag(parsed, 'icons'))
    .withColors(ctx.colorEnabled);

  if (hasFlag(parsed, 'depth')) {
    const depth = validateDimension(stringFlag(parsed, 'depth'), '--depth', 0);
    if (!depth.valid || depth.sanitized === undefined) return fail(ctx, depth.error ?? 'Invalid depth');
    renderer = renderer.withMaxDepth(depth.sanitized);
  }

  renderer.render(ctx.sink, root);
  if (hasFlag(parsed, 'stats')) renderer.printStatistics(ctx.sink, root);
  return 0;
}

function runToast(parsed: ParsedArgs, ctx: CommandContext): number {
  const [rawType, ...words] = parsed.positionals;
  const type = validateChoice(rawType, TOAST_TYPES, 'toast type');
  if (!type.valid || type.sanitized === undefined) return fail(ctx, type.error ?? 'Invalid toast type');
  if (words.length === 0) return fail(ctx, 'Toast needs a message');

  let toast = new Toast(words.join(' '), type.sanitized)
    .withTimestamp(hasFlag(parsed, 'timestamp'))
    .withColors(ctx.colorEnabled);

  if (hasFlag(parsed, 'width')) {
    const width = validateDimension(stringFlag(parsed, 'width'), '--width');
    if (!width.valid || width.sanitized === undefined) return fail(ctx, width.error ?? 'Invalid width');
    toast = toast.withWidth(width.sanitized);
  }

  toast.render(ctx.sink);
  return 0;
}

function runDemo(ctx: CommandContext): number {
  const { sink } = ctx;

  sink.write(chalk.bold('Sparkline') + '\n');
  new Sparkline([1, 5, 22, 13, 53, 29, 44, 90]).render(sink);

  sink.write('\n' + chalk.bold('Line chart') + '\n');
  new LineChart(ctx.settings.lineStyle, 40, 10)
    .addYValues([3, 7, 4, 9, 6, 11, 8])
    .withTitle('Weekly builds')
    .withGrid(true)
    .render(sink);

  sink.write('\n' + chalk.bold('Bar chart') + '\n');
  new BarChart(ctx.settings.barStyle, 30)
    .addBar('Apples', 12)
    .addBar('Pears', 7)
    .addBar('Plums', 3)
    .render(sink);

  sink.write('\n' + chalk.bold('Breakdown') + '\n');
  new BreakdownChart(ctx.settings.breakdownStyle, 40)
    .addSegment('Frontend', 45)
    .addSegment('Backend', 30)
    .addSegment('Database', 15)
    .addSegment('Other', 10)
    .withColors(ctx.colorEnabled)
    .render(sink);

  sink.write(chalk.bold('Table') + '\n');
  const table = new Table(ctx.settings.tableStyle)
    .addColumn('Name', 10, 'left')
    .addColumn('Age', 5, 'right')
    .addColumn('City', 12, 'center')
    .addRow(['Alice', '25', 'New York'])
    .addRow(['Bob', '30', 'Los Angeles']);
  if (ctx.colorEnabled) table.withColors('blue').withAlternatingRows(true);
  table.render(sink);

  sink.write('\n' + chalk.bold('Tree') + '\n');
  const root = createTree('project');
  const src = root.addChildWithMetadata('src', 'directory');
  src.addChildWithMetadata('main.ts', '1.2KB');
  src.addChildWithMetadata('lib.ts', '856B');
  root.addChildWithMetadata('README.md', '1.8KB');
  new TreeRenderer(ctx.settings.treeStyle).withMetadata(true).withColors(ctx.colorEnabled).render(sink, root);

  sink.write('\n');
  new Toast('Demo finished', 'success').withColors(ctx.colorEnabled).render(sink);
  return 0;
}

function runConfig(parsed: ParsedArgs, ctx: CommandContext): number {
  const [action = 'list', key, ...valueParts] = parsed.positionals;

  switch (action) {
    case 'list': {
      const settings = listSettings();
      for (const name of SETTING_KEYS) {
        ctx.sink.write(`${name.padEnd(16)} ${settings[name]}\n`);
      }
      return 0;
    }
    case 'get': {
      if (key === undefined || !isSettingKey(key)) {
        return fail(ctx, `Unknown setting: ${key ?? '(none)'}`);
      }
      ctx.sink.write(`${getSetting(key)}\n`);
      return 0;
    }
    case 'set': {
      if (key === undefined) return fail(ctx, 'Usage: termcharts config set <key> <value>');
      const result = setSetting(key, valueParts.join(' '));
      if (!result.valid) return fail(ctx, result.error ?? 'Invalid value');
      ctx.sink.write(chalk.green(`${key} = ${result.sanitized}`) + '\n');
      return 0;
    }
    case 'reset':
      resetSettings();
      ctx.sink.write(chalk.green('Settings restored to defaults') + '\n');
      return 0;
    default:
      return fail(ctx, `Unknown config action: ${action}`);
  }
}

/**
 * Run one parsed command; returns the process exit code
 */
export function runCommand(parsed: ParsedArgs, ctx: CommandContext): number {
  if (hasFlag(parsed, 'version')) {
    ctx.sink.write(`termcharts v${getCurrentVersion()}\n`);
    return 0;
  }

  if (hasFlag(parsed, 'help') || parsed.command === undefined || parsed.command === 'help') {
    ctx.sink.write(HELP_TEXT);
    return 0;
  }

  switch (parsed.command) {
    case 'spark':
      return runSpark(parsed, ctx);
    case 'line':
      return runLine(parsed, ctx);
    case 'bar':
      return runBar(parsed, ctx);
    case 'breakdown':
      return runBreakdown(parsed, ctx);
    case 'table':
      return runTable(parsed, ctx);
    case 'tree':
      return runTree(parsed, ctx);
    case 'toast':
      return runToast(parsed, ctx);
    case 'demo':
      return runDemo(ctx);
    case 'config':
      return runConfig(parsed, ctx);
    default:
      return fail(ctx, `Unknown command: ${parsed.command}. Run termcharts --help for usage.`);
  }
}

#!/usr/bin/env node
/**
 * termcharts entry point. Startup only; command dispatch lives in commands.ts.
 */

import chalk from 'chalk';
import { getCurrentVersion, parseArgs, runCommand } from './commands';
import { listSettings, resolveColorEnabled } from './config/index';
import { createStreamSink } from './renderer/output';
import { logAppError, logStartup, setLogLevel } from './utils/logger';
import { prepareConsole } from './utils/terminal';

function main(): number {
  const parsed = parseArgs(process.argv.slice(2));

  prepareConsole();
  const settings = listSettings();
  setLogLevel(settings.logLevel);
  logStartup(getCurrentVersion(), parsed.command ?? '');

  return runCommand(parsed, {
    sink: createStreamSink(process.stdout),
    errorSink: createStreamSink(process.stderr),
    settings,
    colorEnabled: resolveColorEnabled(settings.color, process.stdout),
  });
}

try {
  process.exitCode = main();
} catch (error) {
  const err = error instanceof Error ? error : new Error(String(error));
  logAppError(err, 'main');
  process.stderr.write(chalk.red(`Error: ${err.message}`) + '\n');
  process.exitCode = 1;
}

/**
 * Host-side terminal setup. Renderers never call into this module;
 * the CLI does, once, before writing anything.
 */

import { execSync } from 'child_process';
import chalk from 'chalk';
import { logger } from './logger';

// Windows console code page for UTF-8 output
const UTF8_CODE_PAGE = 65001;

let consolePrepared = false;

interface TtyStream {
  isTTY?: boolean;
}

/**
 * Switch the Windows console to UTF-8 so box-drawing glyphs survive.
 * No-op elsewhere and after the first call.
 */
export function prepareConsole(platform: NodeJS.Platform = process.platform): boolean {
  if (consolePrepared) return false;
  consolePrepared = true;

  if (platform !== 'win32') return false;

  try {
    execSync(`chcp ${UTF8_CODE_PAGE}`, { stdio: 'ignore' });
    return true;
  } catch (error) {
    logger.warn('Could not switch console to UTF-8', {
      message: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Allow prepareConsole to run again (tests)
 */
export function resetConsolePreparation(): void {
  consolePrepared = false;
}

/**
 * Whether colored output should be written to this stream.
 * NO_COLOR wins, then FORCE_COLOR, then chalk's own detection.
 */
export function detectColorSupport(
  stream: TtyStream = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false;
  if (env.FORCE_COLOR !== undefined) return env.FORCE_COLOR !== '0' && env.FORCE_COLOR !== 'false';
  if (!stream.isTTY) return false;
  return chalk.supportsColor !== false;
}

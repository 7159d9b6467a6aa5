import { existsSync, mkdirSync, appendFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const envLevel = process.env.TERMCHARTS_LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

/**
 * Set the lowest level that gets written
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/**
 * Log directory; created on first write, not on import
 */
export function getLogDir(): string {
  return process.env.TERMCHARTS_LOG_DIR || join(homedir(), '.termcharts', 'logs');
}

/**
 * Get log file path for today
 */
function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
  return join(getLogDir(), `termcharts-${date}.log`);
}

/**
 * Format log entry as string
 */
export function formatLogEntry(entry: LogEntry): string {
  const dataStr = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${dataStr}\n`;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

/**
 * Write log entry to file
 */
function writeLog(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  try {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      data,
    };

    const dir = getLogDir();
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    appendFileSync(getLogFilePath(), formatLogEntry(entry), 'utf-8');
  } catch {
    // A failed log write has nowhere left to go
  }
}

/**
 * Logger API
 */
export const logger = {
  info: (message: string, data?: unknown) => writeLog('info', message, data),
  warn: (message: string, data?: unknown) => writeLog('warn', message, data),
  error: (message: string, data?: unknown) => writeLog('error', message, data),
  debug: (message: string, data?: unknown) => writeLog('debug', message, data),
};

/**
 * Log one finished render
 */
export function logRender(kind: string, details: Record<string, unknown>): void {
  logger.debug(`Rendered ${kind}`, details);
}

/**
 * Log application startup
 */
export function logStartup(version: string, command: string): void {
  logger.info('CLI started', { version, command });
}

/**
 * Log application error
 */
export function logAppError(error: Error, context?: string): void {
  logger.error('Application error', {
    context,
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
}

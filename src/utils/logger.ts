import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { resolveSettings, type LogLevel } from '../config/index.js';

export const DEFAULT_LOG_DIR = join(homedir(), '.gridpaint', 'logs');

type EntryLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  data?: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  dir: string;
}

let options: LoggerOptions | null = null;
const createdDirs = new Set<string>();

/**
 * Level and directory in effect; read from settings on first use
 */
function currentOptions(): LoggerOptions {
  if (!options) {
    const settings = resolveSettings();
    options = { level: settings.logLevel, dir: settings.logDir || DEFAULT_LOG_DIR };
  }
  return options;
}

/**
 * Override the level or directory for the rest of the process
 */
export function configureLogger(next: Partial<LoggerOptions>): void {
  const current = currentOptions();
  options = {
    level: next.level ?? current.level,
    dir: next.dir ?? current.dir,
  };
}

/**
 * Forget configured options; the next entry re-reads settings
 */
export function resetLogger(): void {
  options = null;
}

/**
 * Log file path for a given day
 */
export function getLogFilePath(date: Date = new Date()): string {
  const day = date.toISOString().split('T')[0]; // YYYY-MM-DD
  return join(currentOptions().dir, `gridpaint-${day}.log`);
}

/**
 * Format log entry as string
 */
export function formatLogEntry(entry: LogEntry): string {
  const dataStr = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${dataStr}\n`;
}

/**
 * Write log entry to file
 */
function writeLog(level: EntryLevel, message: string, data?: unknown): void {
  try {
    const { level: threshold, dir } = currentOptions();
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    if (!createdDirs.has(dir)) {
      mkdirSync(dir, { recursive: true });
      createdDirs.add(dir);
    }

    const now = new Date();
    const line = formatLogEntry({ timestamp: now.toISOString(), level, message, data });
    appendFileSync(getLogFilePath(now), line, 'utf-8');
  } catch {
    // Logging runs inside the render loop and crash handlers; a failed
    // write has nowhere else to go
  }
}

/**
 * Logger API
 */
export const logger = {
  debug: (message: string, data?: unknown) => writeLog('debug', message, data),
  info: (message: string, data?: unknown) => writeLog('info', message, data),
  warn: (message: string, data?: unknown) => writeLog('warn', message, data),
  error: (message: string, data?: unknown) => writeLog('error', message, data),
};

/**
 * Log an error with its stack
 */
export function logError(error: unknown, context?: string): void {
  if (error instanceof Error) {
    logger.error(error.message, { context, name: error.name, stack: error.stack });
  } else {
    logger.error(String(error), { context });
  }
}

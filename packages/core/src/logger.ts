import type { Logger, LogLevel } from './types.js';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Console logger filtered by level
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const currentLevel = LOG_LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[PACKAGER ERROR] ${msg}`, meta || '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[PACKAGER WARN] ${msg}`, meta || '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[PACKAGER INFO] ${msg}`, meta || '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[PACKAGER DEBUG] ${msg}`, meta || '');
    },
  };
}

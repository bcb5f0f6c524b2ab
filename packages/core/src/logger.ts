import { LOG_LEVELS, type LogLevel, type Logger } from './types.js';

/**
 * Create the console logger used when a task is not given one
 *
 * Messages above `level` are dropped.
 *
 * @example
 * ```typescript
 * const logger = createDefaultLogger('debug');
 * logger.debug('Moving a to b', { task: 'Move' });
 * // [FSFLOW DEBUG] Moving a to b { task: 'Move' }
 * ```
 */
export function createDefaultLogger(level: LogLevel = 'info'): Logger {
  const currentLevel = LOG_LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[FSFLOW ERROR] ${msg}`, meta || '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[FSFLOW WARN] ${msg}`, meta || '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[FSFLOW INFO] ${msg}`, meta || '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[FSFLOW DEBUG] ${msg}`, meta || '');
    },
  };
}

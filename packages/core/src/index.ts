/**
 * fsflow
 *
 * Move, Copy and Remove tasks for workflow engines
 */

export { createDefaultLogger } from './logger.js';

export { LOG_LEVELS, type LogLevel, type Logger } from './types.js';

// Export task system
export * from './tasks/index.js';

// Export file-system adapters
export * from './fs/index.js';

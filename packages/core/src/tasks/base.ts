import { EventEmitter } from 'eventemitter3';
import type { Logger } from '../types.js';
import { createDefaultLogger } from '../logger.js';
import { NodeFileSystemAdapter, type FileSystemAdapter } from '../fs/index.js';
import { toTaskError } from './errors.js';
import type { FileTaskOptions } from './schema.js';

/**
 * Identifies one invocation of a task
 */
export interface TaskRunEvent {
  task: string;
  /** 1 for the first run of an instance, 2 for the second, ... */
  runId: number;
}

export interface TaskCompletedEvent extends TaskRunEvent {
  durationMs: number;
}

export interface FileTaskEvents {
  started: [event: TaskRunEvent];
  completed: [event: TaskCompletedEvent];
  failed: [error: Error, event: TaskRunEvent];
}

/**
 * FileTask - Shared lifecycle of the file tasks
 *
 * Subclasses implement `run` and route the body through `execute`, which
 * emits `started` / `completed` / `failed` and normalizes failures.
 *
 * @example
 * ```typescript
 * const task = new RemoveTask({ removePath: '/tmp/build' });
 *
 * task.on('failed', (error, { runId }) => {
 *   console.error(`run ${runId} failed: ${error.message}`);
 * });
 *
 * await task.run();
 * ```
 */
export abstract class FileTask extends EventEmitter<FileTaskEvents> {
  readonly name: string;

  protected readonly logger: Logger;
  protected readonly fileSystem: FileSystemAdapter;

  private runCount = 0;

  protected constructor(defaultName: string, options: FileTaskOptions) {
    super();
    this.name = options.name || defaultName;
    this.logger = options.logger || createDefaultLogger(options.logLevel || 'info');
    this.fileSystem = options.fileSystem || new NodeFileSystemAdapter();
  }

  /**
   * Run one task body with lifecycle events and error normalization
   */
  protected async execute<T>(operation: () => Promise<T>): Promise<T> {
    const event: TaskRunEvent = { task: this.name, runId: ++this.runCount };
    const startTime = Date.now();

    this.emit('started', event);

    try {
      const result = await operation();
      this.emit('completed', { ...event, durationMs: Date.now() - startTime });
      return result;
    } catch (error) {
      const failure = toTaskError(error, this.name);

      this.logger.error(`${this.name} task failed`, {
        runId: event.runId,
        error: failure.message,
      });

      this.emit('failed', failure, event);
      throw failure;
    }
  }
}

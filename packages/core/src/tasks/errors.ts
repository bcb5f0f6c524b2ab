import type { z } from 'zod';
import { isErrnoException } from '../fs/index.js';

/**
 * Base class for every error a file task rejects with
 */
export class FileTaskError extends Error {
  public task?: string;

  constructor(message: string, task?: string) {
    super(message);
    this.name = 'FileTaskError';
    this.task = task;
  }
}

/**
 * A path parameter or configuration value is missing or invalid
 *
 * Always raised before the task touches the file system. Parameters are
 * named after the task attribute (`sourcePath`, `targetPath`, `removePath`,
 * the `source_path` / `target_path` / `remove_path` of snake_case
 * workflow definitions), both in `parameter` and in the message:
 * ``No `sourcePath` provided``.
 */
export class InvalidInputError extends FileTaskError {
  constructor(
    message: string,
    public parameter?: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
  }
}

/**
 * The underlying file-system operation failed
 *
 * Carries the errno fields of the original error, which is kept as `cause`.
 */
export class IOFailureError extends FileTaskError {
  public readonly code?: string;
  public readonly path?: string;
  public readonly syscall?: string;
  public override readonly cause?: unknown;

  constructor(message: string, cause: NodeJS.ErrnoException, task?: string) {
    super(message, task);
    this.name = 'IOFailureError';
    this.code = cause.code;
    this.path = cause.path;
    this.syscall = cause.syscall;
    this.cause = cause;
  }
}

/**
 * Normalize whatever a task operation threw
 *
 * Task errors pass through (tagged with the task name), errno errors
 * become `IOFailureError`, anything else is returned unchanged.
 */
export function toTaskError(error: unknown, task: string): Error {
  if (error instanceof FileTaskError) {
    if (!error.task) error.task = task;
    return error;
  }

  if (isErrnoException(error)) {
    return new IOFailureError(error.message, error, task);
  }

  return error instanceof Error ? error : new Error(String(error));
}

import { z } from 'zod';
import { LOG_LEVELS, type Logger } from '../types.js';
import type { FileSystemAdapter } from '../fs/index.js';
import { InvalidInputError } from './errors.js';

/**
 * A path parameter as stored on a task (empty string = not provided)
 */
export const PathParameterSchema = z.string().default('');

/**
 * A path argument handed to `run` by a workflow engine
 */
export const PathArgumentSchema = z.string().optional();

/**
 * Options shared by every file task
 */
export const FileTaskOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export const TransferTaskConfigSchema = FileTaskOptionsSchema.extend({
  sourcePath: PathParameterSchema,
  targetPath: PathParameterSchema,
});

export const RemoveTaskConfigSchema = FileTaskOptionsSchema.extend({
  removePath: PathParameterSchema,
});

/**
 * Collaborators that are passed by reference and not validated
 */
export interface FileTaskDependencies {
  logger?: Logger;
  fileSystem?: FileSystemAdapter;
}

export type FileTaskOptions = z.input<typeof FileTaskOptionsSchema> & FileTaskDependencies;

/**
 * Configuration of MoveTask and CopyTask
 */
export type TransferTaskConfig = z.input<typeof TransferTaskConfigSchema> & FileTaskDependencies;

/**
 * Configuration of RemoveTask
 */
export type RemoveTaskConfig = z.input<typeof RemoveTaskConfigSchema> & FileTaskDependencies;

/**
 * Parse task configuration, throwing InvalidInputError on failure
 */
export function parseTaskConfig<T extends z.ZodTypeAny>(schema: T, config: unknown): z.output<T> {
  const result = schema.safeParse(config);
  if (!result.success) {
    throw new InvalidInputError('Invalid task configuration', undefined, result.error);
  }
  return result.data;
}

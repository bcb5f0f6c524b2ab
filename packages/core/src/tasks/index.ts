/**
 * Task System - File-system tasks for workflow engines
 *
 * Each task stores default path parameters at construction and accepts
 * per-run overrides. Runs reject with InvalidInputError before touching
 * the disk, or with IOFailureError when the operation itself fails.
 */

export {
  FileTaskOptionsSchema,
  TransferTaskConfigSchema,
  RemoveTaskConfigSchema,
  PathParameterSchema,
  PathArgumentSchema,
  parseTaskConfig,
  type FileTaskOptions,
  type FileTaskDependencies,
  type TransferTaskConfig,
  type RemoveTaskConfig,
} from './schema.js';

export { FileTaskError, InvalidInputError, IOFailureError, toTaskError } from './errors.js';

export {
  resolveParameter,
  requireParameter,
  resolvePathParameter,
  resolveTargetPath,
} from './params.js';

export {
  FileTask,
  type FileTaskEvents,
  type TaskRunEvent,
  type TaskCompletedEvent,
} from './base.js';

export { MoveTask } from './move.js';
export { CopyTask } from './copy.js';
export { RemoveTask } from './remove.js';

import { basename, join } from 'path';
import type { FileSystemAdapter } from '../fs/index.js';
import { InvalidInputError } from './errors.js';
import { PathArgumentSchema } from './schema.js';

/**
 * Pick the value a run actually uses: the argument when non-empty,
 * otherwise the default stored at construction
 */
export function resolveParameter(argument: string | undefined, storedDefault: string): string {
  return argument ? argument : storedDefault;
}

/**
 * Reject a parameter that resolved to the empty string
 */
export function requireParameter(name: string, value: string): string {
  if (value === '') {
    throw new InvalidInputError(`No \`${name}\` provided`, name);
  }
  return value;
}

/**
 * Validate, resolve and require one path parameter of a run
 *
 * `argument` is typed loosely because workflow engines pass through
 * whatever an upstream task produced.
 *
 * @example
 * ```typescript
 * resolvePathParameter('sourcePath', undefined, '/data/in.csv'); // '/data/in.csv'
 * resolvePathParameter('sourcePath', '', '');                    // throws "No `sourcePath` provided"
 * ```
 */
export function resolvePathParameter(name: string, argument: unknown, storedDefault: string): string {
  const result = PathArgumentSchema.safeParse(argument);
  if (!result.success) {
    throw new InvalidInputError(`Invalid \`${name}\`: expected a string`, name, result.error);
  }

  return requireParameter(name, resolveParameter(result.data, storedDefault));
}

/**
 * Compute where a move or copy lands
 *
 * An existing directory target receives the entry under its own base name;
 * any other target is used as the new path itself.
 */
export async function resolveTargetPath(
  fileSystem: FileSystemAdapter,
  sourcePath: string,
  targetPath: string
): Promise<string> {
  if (await fileSystem.isDirectory(targetPath)) {
    return join(targetPath, basename(sourcePath));
  }
  return targetPath;
}

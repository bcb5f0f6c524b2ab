import { cp, lstat, readdir, rename, rm, stat, unlink, utimes } from 'fs/promises';
import { join } from 'path';
import type { FileSystemAdapter } from './types.js';

/**
 * NodeFileSystemAdapter - FileSystemAdapter backed by the local disk
 *
 * @example
 * ```typescript
 * const fs = new NodeFileSystemAdapter();
 *
 * if (await fs.isDirectory('/data/inbox')) {
 *   await fs.copyTree('/data/inbox', '/data/archive/inbox');
 * }
 * ```
 */
export class NodeFileSystemAdapter implements FileSystemAdapter {
  async exists(path: string): Promise<boolean> {
    try {
      await lstat(path);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      const stats = await stat(path);
      return stats.isDirectory();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Move with rename(2), falling back to copy + delete across devices
   *
   * The fallback refuses an existing directory target, as rename(2) does
   * for a non-empty one.
   */
  async move(sourcePath: string, targetPath: string): Promise<void> {
    try {
      await rename(sourcePath, targetPath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EXDEV') {
        throw error;
      }

      if (await this.isDirectory(targetPath)) {
        throw alreadyExists(targetPath, 'rename');
      }

      await cp(sourcePath, targetPath, {
        recursive: true,
        preserveTimestamps: true,
      });
      if ((await lstat(sourcePath)).isDirectory()) {
        await copyDirectoryTimes(sourcePath, targetPath);
      }
      await rm(sourcePath, { recursive: true });
    }
  }

  async copyFile(sourcePath: string, targetPath: string): Promise<void> {
    await cp(sourcePath, targetPath, { preserveTimestamps: true, dereference: true });
  }

  async copyTree(sourcePath: string, targetPath: string): Promise<void> {
    // cp() merges into an existing directory; a tree copy must land in a fresh one
    if (await this.exists(targetPath)) {
      throw alreadyExists(targetPath, 'copytree');
    }

    await cp(sourcePath, targetPath, {
      recursive: true,
      preserveTimestamps: true,
      dereference: true,
      errorOnExist: true,
      force: false,
    });
    await copyDirectoryTimes(sourcePath, targetPath);
  }

  async removeFile(path: string): Promise<void> {
    await unlink(path);
  }

  async removeTree(path: string): Promise<void> {
    await rm(path, { recursive: true });
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function alreadyExists(path: string, syscall: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`EEXIST: file already exists, ${syscall} '${path}'`);
  error.code = 'EEXIST';
  error.path = path;
  error.syscall = syscall;
  return error;
}

/**
 * Give every copied directory the atime/mtime of its source
 *
 * cp() only preserves timestamps of files. Children are stamped before
 * their parent, since writing into a directory bumps its mtime.
 */
async function copyDirectoryTimes(sourcePath: string, targetPath: string): Promise<void> {
  const entries = await readdir(sourcePath, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isDirectory()) {
      await copyDirectoryTimes(join(sourcePath, entry.name), join(targetPath, entry.name));
    }
  }

  const { atime, mtime } = await stat(sourcePath);
  await utimes(targetPath, atime, mtime);
}

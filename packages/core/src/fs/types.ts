/**
 * FileSystemAdapter - The file-system primitives tasks are built on
 *
 * Implementations:
 * - NodeFileSystemAdapter - Local disk through fs/promises
 * - Custom adapters via the task `fileSystem` option
 *
 * Failures are reported as the errno-style errors Node raises
 * (`code`, `path`, `syscall`); tasks turn those into `IOFailureError`.
 */
export interface FileSystemAdapter {
  /**
   * Check if anything exists at path (a dangling symbolic link counts)
   */
  exists(path: string): Promise<boolean>;

  /**
   * Check if path is a directory, following symbolic links
   *
   * @returns false when nothing exists at path
   */
  isDirectory(path: string): Promise<boolean>;

  /**
   * Move a file or directory tree to target
   *
   * @throws EEXIST when a cross-device move meets an existing directory
   */
  move(sourcePath: string, targetPath: string): Promise<void>;

  /**
   * Copy a single file, replacing target if it is a file
   *
   * A symbolic link source is copied as the file it points to.
   */
  copyFile(sourcePath: string, targetPath: string): Promise<void>;

  /**
   * Copy a directory tree into a new directory
   *
   * Links are followed, so the copy never shares entries with the source.
   * Timestamps and modes of files and directories are kept.
   *
   * @throws EEXIST when target already exists
   */
  copyTree(sourcePath: string, targetPath: string): Promise<void>;

  /**
   * Delete a single file or symbolic link
   */
  removeFile(path: string): Promise<void>;

  /**
   * Delete a directory and everything beneath it
   */
  removeTree(path: string): Promise<void>;
}

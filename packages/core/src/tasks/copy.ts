import { parse, type ParsedPath } from 'path';
import { FileTask } from './base.js';
import { resolvePathParameter, resolveTargetPath } from './params.js';
import { TransferTaskConfigSchema, parseTaskConfig, type TransferTaskConfig } from './schema.js';

/**
 * CopyTask - Copy a file, or a directory with its whole subtree
 *
 * Target resolution is the same as MoveTask. A directory is only copied
 * into a path that does not exist yet; a file replaces an existing file.
 * Timestamps and modes are preserved.
 */
export class CopyTask extends FileTask {
  readonly sourcePath: string;
  readonly targetPath: string;

  constructor(config: TransferTaskConfig = {}) {
    super('Copy', config);
    const { sourcePath, targetPath } = parseTaskConfig(TransferTaskConfigSchema, config);
    this.sourcePath = sourcePath;
    this.targetPath = targetPath;
  }

  /**
   * Copy source to target, leaving source untouched
   *
   * @returns Path of the copy
   * @throws InvalidInputError when no source or target is available
   * @throws IOFailureError when copying fails, including `EEXIST` for a
   *   directory copied onto an existing path
   */
  run(sourcePath?: string, targetPath?: string): Promise<ParsedPath> {
    return this.execute(async () => {
      const source = resolvePathParameter('sourcePath', sourcePath, this.sourcePath);
      const target = resolvePathParameter('targetPath', targetPath, this.targetPath);

      const destination = await resolveTargetPath(this.fileSystem, source, target);

      this.logger.debug(`Copying ${source} to ${destination}`, { task: this.name });
      if (await this.fileSystem.isDirectory(source)) {
        await this.fileSystem.copyTree(source, destination);
      } else {
        await this.fileSystem.copyFile(source, destination);
      }

      return parse(destination);
    });
  }
}

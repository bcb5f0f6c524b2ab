import { FileTask } from './base.js';
import { resolvePathParameter } from './params.js';
import { RemoveTaskConfigSchema, parseTaskConfig, type RemoveTaskConfig } from './schema.js';

/**
 * RemoveTask - Delete a file, or a directory and everything beneath it
 *
 * Symbolic links are unlinked; what they point to is left alone.
 */
export class RemoveTask extends FileTask {
  readonly removePath: string;

  constructor(config: RemoveTaskConfig = {}) {
    super('Remove', config);
    const { removePath } = parseTaskConfig(RemoveTaskConfigSchema, config);
    this.removePath = removePath;
  }

  /**
   * @param removePath - Overrides the configured path for this run
   * @throws InvalidInputError when no path is available
   * @throws IOFailureError when the path is missing or cannot be deleted
   */
  run(removePath?: string): Promise<void> {
    return this.execute(async () => {
      const path = resolvePathParameter('removePath', removePath, this.removePath);

      this.logger.debug(`Removing ${path}`, { task: this.name });
      if (await this.fileSystem.isDirectory(path)) {
        await this.fileSystem.removeTree(path);
      } else {
        await this.fileSystem.removeFile(path);
      }
    });
  }
}

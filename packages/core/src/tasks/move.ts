import { parse, type ParsedPath } from 'path';
import { FileTask } from './base.js';
import { resolvePathParameter, resolveTargetPath } from './params.js';
import { TransferTaskConfigSchema, parseTaskConfig, type TransferTaskConfig } from './schema.js';

/**
 * MoveTask - Move a file or directory
 *
 * When the target is an existing directory the entry is moved inside it,
 * keeping its base name. Otherwise the target is the new path of the entry.
 *
 * @example
 * ```typescript
 * const move = new MoveTask({ targetPath: '/data/processed' });
 *
 * const result = await move.run('/data/inbox/report.csv');
 * path.format(result); // '/data/processed/report.csv'
 * ```
 */
export class MoveTask extends FileTask {
  readonly sourcePath: string;
  readonly targetPath: string;

  constructor(config: TransferTaskConfig = {}) {
    super('Move', config);
    const { sourcePath, targetPath } = parseTaskConfig(TransferTaskConfigSchema, config);
    this.sourcePath = sourcePath;
    this.targetPath = targetPath;
  }

  /**
   * Move source to target
   *
   * @param sourcePath - Overrides the configured source for this run
   * @param targetPath - Overrides the configured target for this run
   * @returns Path the entry now lives at
   * @throws InvalidInputError when no source or target is available
   * @throws IOFailureError when the move itself fails
   */
  run(sourcePath?: string, targetPath?: string): Promise<ParsedPath> {
    return this.execute(async () => {
      const source = resolvePathParameter('sourcePath', sourcePath, this.sourcePath);
      const target = resolvePathParameter('targetPath', targetPath, this.targetPath);

      const destination = await resolveTargetPath(this.fileSystem, source, target);

      this.logger.debug(`Moving ${source} to ${destination}`, { task: this.name });
      await this.fileSystem.move(source, destination);

      return parse(destination);
    });
  }
}

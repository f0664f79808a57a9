import { glob } from 'glob';
import * as path from 'path';
import { PixiLockError } from '../utils/errors';
import { CommandRunner, runCommand } from '../utils/execAsync';
import { createLogger } from '../utils/logger';

const log = createLogger('UpdateLockfiles');

export const LOCKFILE_NAME = 'pixi.lock';

export class LockfileService {
  constructor(
    private readonly pixiExecutable: string,
    private readonly runner: CommandRunner = runCommand
  ) {}

  async findLockfiles(basePath: string): Promise<string[]> {
    const matches = await glob(`**/${LOCKFILE_NAME}`, {
      cwd: basePath,
      absolute: true,
      nodir: true,
      ignore: ['**/.pixi/**']
    });
    return matches.sort();
  }

  async lock(directory: string): Promise<void> {
    log.info(`Running pixi lock in ${directory}`);
    const { exitCode, stdout, stderr } = await this.runner(this.pixiExecutable, ['lock'], { cwd: directory });
    if (exitCode !== 0) {
      let message = `Failed to run pixi lock in ${directory}`;
      if (stderr) {
        message += `: ${stderr}`;
      }
      if (stdout) {
        message += ` (Output: ${stdout})`;
      }
      throw new PixiLockError(message);
    }
    log.info(`Successfully updated lockfile in ${directory}`);
    if (stdout.trim()) {
      log.info(`   ${stdout.trim()}`);
    }
  }

  /**
   * Re-locks every workspace below `basePath`, stopping at the first failure.
   * Returns the directories that were processed.
   */
  async updateAll(basePath: string): Promise<string[]> {
    log.info(`Searching for ${LOCKFILE_NAME} files in ${basePath}`);
    const lockfiles = await this.findLockfiles(basePath);
    if (lockfiles.length === 0) {
      log.warn(`No ${LOCKFILE_NAME} files found in ${basePath}`);
      return [];
    }
    log.info(`Found ${lockfiles.length} ${LOCKFILE_NAME} file(s)`);

    const processed: string[] = [];
    for (const lockfile of lockfiles) {
      const directory = path.dirname(lockfile);
      log.info('='.repeat(60));
      log.info(`Processing: ${directory}`);
      await this.lock(directory);
      processed.push(directory);
    }
    return processed;
  }
}

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { ENV_FILE, loadEnvFiles, resolveRoot } from '../config/config';
import { BinaryLocatorService } from '../services/binary-locator.service';
import { LockfileService } from '../services/lockfile.service';
import { parseCommandLine } from '../utils/args';
import { errorMessage, UsageError } from '../utils/errors';
import { CommandRunner } from '../utils/execAsync';
import { createLogger } from '../utils/logger';

const log = createLogger('UpdateLockfiles');

export const PIXI_BUILD_DATA_DIR = path.join('tests', 'data', 'pixi_build');

export const UPDATE_LOCKFILES_USAGE = `Usage: update-lockfiles [folder]

Run 'pixi lock' for every pixi.lock below ${PIXI_BUILD_DATA_DIR}.

Arguments:
  folder      Only update lockfiles below this folder (relative to ${PIXI_BUILD_DATA_DIR})

Options:
  -h, --help  Show this message`;

export interface UpdateLockfilesArgs {
  folder?: string;
  help: boolean;
}

export function parseUpdateLockfilesArgs(argv: string[]): UpdateLockfilesArgs {
  const { values, positionals } = parseCommandLine(() =>
    parseArgs({
      args: argv,
      options: { help: { type: 'boolean', short: 'h' } },
      strict: true,
      allowPositionals: true
    })
  );
  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one folder, got ${positionals.length}`);
  }
  const args: UpdateLockfilesArgs = { help: values.help ?? false };
  if (positionals[0] !== undefined) {
    args.folder = positionals[0];
  }
  return args;
}

export interface UpdateLockfilesDeps {
  env: NodeJS.ProcessEnv;
  root: string;
  platform: NodeJS.Platform;
  runner: CommandRunner;
}

export async function updateLockfilesCommand(
  argv: string[],
  deps: Partial<UpdateLockfilesDeps> = {}
): Promise<number> {
  const env = deps.env ?? process.env;
  const root = deps.root ?? resolveRoot(env);

  let args: UpdateLockfilesArgs;
  try {
    args = parseUpdateLockfilesArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      log.error(error.message);
      console.error(UPDATE_LOCKFILES_USAGE);
      return 2;
    }
    throw error;
  }
  if (args.help) {
    console.log(UPDATE_LOCKFILES_USAGE);
    return 0;
  }

  loadEnvFiles(root, { env, override: true, files: [ENV_FILE] });

  const baseDir = path.join(root, PIXI_BUILD_DATA_DIR);
  const targetDir = args.folder ? path.join(baseDir, args.folder) : baseDir;

  if (!fs.existsSync(targetDir)) {
    log.error(`Path does not exist: ${targetDir}`);
    return 1;
  }
  if (!fs.statSync(targetDir).isDirectory()) {
    log.error(`Path is not a directory: ${targetDir}`);
    return 1;
  }

  let pixiExecutable: string;
  try {
    pixiExecutable = new BinaryLocatorService(root, deps.platform).locatePixi(env).executable;
  } catch (error) {
    log.error(errorMessage(error));
    return 1;
  }
  log.info(`Using pixi executable: ${pixiExecutable}`);

  try {
    const processed = await new LockfileService(pixiExecutable, deps.runner).updateAll(targetDir);
    if (processed.length > 0) {
      log.info('='.repeat(60));
      log.info(`Updated ${processed.length} lockfile(s)`);
    }
  } catch (error) {
    log.error(errorMessage(error));
    return 1;
  }
  return 0;
}

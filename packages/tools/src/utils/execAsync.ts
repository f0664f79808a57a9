import { execFile } from 'child_process';
import { promisify } from 'util';
import { CommandNotFoundError, errorCode } from './errors';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

function outputOf(error: object, key: 'stdout' | 'stderr'): string {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

/**
 * Runs an executable without a shell and reports its exit code instead of throwing
 * on a non-zero status. A missing executable raises CommandNotFoundError.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024,
      windowsHide: true
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      throw new CommandNotFoundError(command);
    }
    if (typeof code === 'number' && typeof error === 'object' && error !== null) {
      return {
        exitCode: code,
        stdout: outputOf(error, 'stdout'),
        stderr: outputOf(error, 'stderr')
      };
    }
    throw error;
  }
};

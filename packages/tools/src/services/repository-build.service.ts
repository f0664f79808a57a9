import * as fs from 'fs';
import { errorMessage, GitPullError, GitRepositoryError, PixiBuildError } from '../utils/errors';
import { CommandRunner, runCommand } from '../utils/execAsync';
import { createLogger } from '../utils/logger';

const log = createLogger('BuildRepos');

export const MAIN_BRANCH = 'main';

export interface RepositoryRef {
  // name of the environment variable the path came from
  name: string;
  path: string;
}

export interface RepositoryBuildResult {
  name: string;
  path: string;
  success: boolean;
  branch: string | null;
  pulled: boolean;
  error?: string;
}

export class RepositoryBuildService {
  constructor(private readonly runner: CommandRunner = runCommand) {}

  async isGitWorktree(repoPath: string): Promise<boolean> {
    if (!fs.existsSync(repoPath) || !fs.statSync(repoPath).isDirectory()) {
      return false;
    }
    const { exitCode, stdout } = await this.runner('git', ['rev-parse', '--is-inside-work-tree'], { cwd: repoPath });
    return exitCode === 0 && stdout.trim().toLowerCase() === 'true';
  }

  /**
   * Null when git cannot tell, including a detached HEAD.
   */
  async getCurrentBranch(repoPath: string): Promise<string | null> {
    const { exitCode, stdout } = await this.runner('git', ['branch', '--show-current'], { cwd: repoPath });
    const branch = stdout.trim();
    return exitCode === 0 && branch ? branch : null;
  }

  async pull(repoPath: string): Promise<void> {
    log.info(`Pulling latest changes in ${repoPath}`);
    const { exitCode, stdout, stderr } = await this.runner('git', ['pull'], { cwd: repoPath });
    if (exitCode !== 0) {
      throw new GitPullError(`Failed to pull changes: ${stderr.trim()}`);
    }
    log.info('Successfully pulled changes');
    if (stdout.trim()) {
      log.info(`   ${stdout.trim()}`);
    }
  }

  async buildRelease(repoPath: string): Promise<void> {
    log.info(`Building release in ${repoPath}`);
    const { exitCode, stdout, stderr } = await this.runner('pixi', ['run', 'build-release'], { cwd: repoPath });
    if (exitCode !== 0) {
      let message = 'Failed to build release';
      if (stderr) {
        message += `: ${stderr}`;
      }
      if (stdout) {
        message += ` (Output: ${stdout})`;
      }
      throw new PixiBuildError(message);
    }
    log.info('Successfully built release');
  }

  /**
   * Verifies the work tree, pulls when it is on main, then builds.
   */
  async processRepository(repo: RepositoryRef): Promise<RepositoryBuildResult> {
    log.info('='.repeat(60));
    log.info(`Processing ${repo.name}: ${repo.path}`);
    log.info('='.repeat(60));

    if (!(await this.isGitWorktree(repo.path))) {
      throw new GitRepositoryError(`${repo.path} is not a valid git worktree`);
    }
    log.info('Verified git worktree');

    const branch = await this.getCurrentBranch(repo.path);
    let pulled = false;
    if (branch) {
      log.info(`Current branch: ${branch}`);
      if (branch === MAIN_BRANCH) {
        await this.pull(repo.path);
        pulled = true;
      } else {
        log.warn(`Not on ${MAIN_BRANCH} branch, skipping git pull`);
      }
    } else {
      log.warn('Could not determine current branch');
    }

    await this.buildRelease(repo.path);
    return { name: repo.name, path: repo.path, success: true, branch, pulled };
  }

  /**
   * Processes every repository even when an earlier one fails.
   */
  async processAll(repos: RepositoryRef[]): Promise<RepositoryBuildResult[]> {
    const results: RepositoryBuildResult[] = [];
    for (const repo of repos) {
      try {
        results.push(await this.processRepository(repo));
      } catch (error) {
        log.error(`Error processing ${repo.name}: ${errorMessage(error)}`);
        results.push({
          name: repo.name,
          path: repo.path,
          success: false,
          branch: null,
          pulled: false,
          error: errorMessage(error)
        });
      }
    }
    return results;
  }
}

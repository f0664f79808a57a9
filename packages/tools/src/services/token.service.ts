import { CommandNotFoundError, errorMessage } from '../utils/errors';
import { CommandResult, CommandRunner, runCommand } from '../utils/execAsync';
import { createLogger } from '../utils/logger';

const log = createLogger('Token');

export interface TokenSources {
  cliToken?: string;
  env?: NodeJS.ProcessEnv;
}

export class TokenService {
  constructor(private readonly runner: CommandRunner = runCommand) {}

  /**
   * `--token`, then `GITHUB_TOKEN`, then the GitHub CLI session.
   */
  async resolve(sources: TokenSources = {}): Promise<string | null> {
    const cliToken = sources.cliToken?.trim();
    if (cliToken) {
      return cliToken;
    }
    const envToken = (sources.env ?? process.env).GITHUB_TOKEN?.trim();
    if (envToken) {
      return envToken;
    }
    return this.tokenFromGitHubCli();
  }

  async tokenFromGitHubCli(): Promise<string | null> {
    let result: CommandResult;
    try {
      result = await this.runner('gh', ['auth', 'token']);
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        log.warn('GitHub CLI not found; skipping GH auth token lookup');
        return null;
      }
      log.warn(`Failed to run GitHub CLI: ${errorMessage(error)}`);
      return null;
    }

    if (result.exitCode !== 0) {
      log.warn(`Failed to obtain token via GitHub CLI. Return code: ${result.exitCode}`);
      return null;
    }

    const token = result.stdout.trim();
    if (!token) {
      log.warn('GitHub CLI returned an empty token');
      return null;
    }

    log.info('Using token from GitHub CLI authentication');
    return token;
  }
}

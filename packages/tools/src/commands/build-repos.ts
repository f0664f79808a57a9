import * as path from 'path';
import { ENV_FILE, loadEnvFiles, resolveRoot } from '../config/config';
import { RepositoryBuildService, RepositoryRef } from '../services/repository-build.service';
import { CommandRunner } from '../utils/execAsync';
import { createLogger } from '../utils/logger';

const log = createLogger('BuildRepos');

export const REPOSITORY_VARIABLES = ['PIXI_REPO', 'BUILD_BACKENDS_REPO'] as const;

export interface BuildReposDeps {
  env: NodeJS.ProcessEnv;
  root: string;
  runner: CommandRunner;
}

export async function buildReposCommand(deps: Partial<BuildReposDeps> = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const root = deps.root ?? resolveRoot(env);
  const service = new RepositoryBuildService(deps.runner);

  if (loadEnvFiles(root, { env, override: true, files: [ENV_FILE] }).length === 0) {
    log.warn(`No ${ENV_FILE} file found at ${path.join(root, ENV_FILE)}`);
  }

  const repos: RepositoryRef[] = [];
  for (const name of REPOSITORY_VARIABLES) {
    const value = env[name]?.trim();
    if (!value) {
      log.error(`${name} environment variable not set`);
      return 1;
    }
    repos.push({ name, path: path.resolve(root, value) });
  }

  for (const repo of repos) {
    log.info(`${repo.name}: ${repo.path}`);
  }

  const results = await service.processAll(repos);

  log.info('='.repeat(60));
  log.info('Summary:');
  for (const result of results) {
    log.info(`  ${result.name}: ${result.success ? 'OK' : `FAILED (${result.error ?? 'unknown error'})`}`);
  }
  log.info('='.repeat(60));

  if (results.every((result) => result.success)) {
    log.info('All repositories processed successfully!');
    return 0;
  }
  log.error('Some repositories failed to process');
  return 1;
}

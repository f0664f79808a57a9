import { ArtifactTarget, RepositoryKind, REPOSITORY_KINDS } from '../models/Artifact';
import { createLogger } from '../utils/logger';
import { prNumberSchema } from '../utils/validation.schemas';
import { readCiOverrides } from './config';

const log = createLogger('Config');

export const DEFAULT_BRANCH = 'main';

interface TargetDefaults {
  repo: string;
  workflow: string;
  repoVariable: 'PIXI_CI_REPO_NAME' | 'BUILD_BACKENDS_CI_REPO_NAME';
  branchVariable: 'PIXI_CI_REPO_BRANCH' | 'BUILD_BACKENDS_CI_REPO_BRANCH';
  prVariable: 'PIXI_PR_NUMBER' | 'BUILD_BACKENDS_PR_NUMBER';
}

export const TARGET_DEFAULTS: Record<RepositoryKind, TargetDefaults> = {
  pixi: {
    repo: 'prefix-dev/pixi',
    workflow: 'CI',
    repoVariable: 'PIXI_CI_REPO_NAME',
    branchVariable: 'PIXI_CI_REPO_BRANCH',
    prVariable: 'PIXI_PR_NUMBER'
  },
  'pixi-build-backends': {
    repo: 'prefix-dev/pixi-build-backends',
    workflow: 'Testsuite',
    repoVariable: 'BUILD_BACKENDS_CI_REPO_NAME',
    branchVariable: 'BUILD_BACKENDS_CI_REPO_BRANCH',
    prVariable: 'BUILD_BACKENDS_PR_NUMBER'
  }
};

/**
 * Only plain positive integers count; anything else is ignored with a warning.
 */
export function parsePrNumber(raw: string | undefined, variable: string): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = raw.trim();
  const parsed = /^\d+$/.test(value) ? prNumberSchema.safeParse(value) : undefined;
  if (!parsed?.success) {
    log.warn(`Ignoring ${variable}=${JSON.stringify(raw)}: not a pull request number`);
    return undefined;
  }
  return parsed.data;
}

export function resolveArtifactTarget(kind: RepositoryKind, env: NodeJS.ProcessEnv = process.env): ArtifactTarget {
  const defaults = TARGET_DEFAULTS[kind];
  const overrides = readCiOverrides(env);

  const target: ArtifactTarget = {
    kind,
    repo: overrides[defaults.repoVariable] ?? defaults.repo,
    workflow: defaults.workflow,
    branch: overrides[defaults.branchVariable] ?? DEFAULT_BRANCH
  };
  const prNumber = parsePrNumber(overrides[defaults.prVariable], defaults.prVariable);
  if (prNumber !== undefined) {
    target.prNumber = prNumber;
  }

  if (target.repo !== defaults.repo || target.branch !== DEFAULT_BRANCH) {
    log.warn(`CI overrides active: using ${target.repo} branch ${target.branch}`);
  }
  return target;
}

/**
 * Targets to download: the requested repository, or both when none is given.
 */
export function resolveArtifactTargets(
  kind: RepositoryKind | undefined,
  env: NodeJS.ProcessEnv = process.env
): ArtifactTarget[] {
  const kinds = kind ? [kind] : REPOSITORY_KINDS;
  return kinds.map((each) => resolveArtifactTarget(each, env));
}

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { RepositoryBuildService } from '../services/repository-build.service';
import { GitRepositoryError, PixiBuildError } from '../utils/errors';
import { createFakeRunner, failed, succeeded } from './utils/fakeRunner';
import { makeTempDir, removeTempDir } from './utils/tempDir';

describe('RepositoryBuildService', () => {
  let repoPath: string;

  beforeEach(() => {
    repoPath = makeTempDir('testsuite-repo-');
  });

  afterEach(() => {
    removeTempDir(repoPath);
  });

  it('pulls and builds a repository on main', async () => {
    const { runner, calls } = createFakeRunner({
      'git rev-parse --is-inside-work-tree': succeeded('true\n'),
      'git branch --show-current': succeeded('main\n'),
      'git pull': succeeded('Already up to date.\n'),
      'pixi run build-release': succeeded()
    });

    const result = await new RepositoryBuildService(runner).processRepository({ name: 'PIXI_REPO', path: repoPath });

    expect(result).toEqual({ name: 'PIXI_REPO', path: repoPath, success: true, branch: 'main', pulled: true });
    expect(calls.map((call) => [call.command, ...call.args].join(' '))).toEqual([
      'git rev-parse --is-inside-work-tree',
      'git branch --show-current',
      'git pull',
      'pixi run build-release'
    ]);
    expect(calls.every((call) => call.cwd === repoPath)).toBe(true);
  });

  it('skips the pull on other branches and when the branch is unknown', async () => {
    const feature = createFakeRunner({
      'git rev-parse --is-inside-work-tree': succeeded('true\n'),
      'git branch --show-current': succeeded('feature\n'),
      'pixi run build-release': succeeded()
    });
    const detached = createFakeRunner({
      'git rev-parse --is-inside-work-tree': succeeded('true\n'),
      'git branch --show-current': succeeded(''),
      'pixi run build-release': succeeded()
    });

    const onFeature = await new RepositoryBuildService(feature.runner).processRepository({ name: 'R', path: repoPath });
    const onDetached = await new RepositoryBuildService(detached.runner).processRepository({ name: 'R', path: repoPath });

    expect(onFeature).toMatchObject({ branch: 'feature', pulled: false, success: true });
    expect(onDetached).toMatchObject({ branch: null, pulled: false, success: true });
    expect(feature.calls.some((call) => call.args[0] === 'pull')).toBe(false);
  });

  it('rejects directories that are not git work trees', async () => {
    const { runner } = createFakeRunner({ 'git rev-parse --is-inside-work-tree': failed(128, 'not a git repository') });

    await expect(
      new RepositoryBuildService(runner).processRepository({ name: 'R', path: repoPath })
    ).rejects.toThrow(new GitRepositoryError(`${repoPath} is not a valid git worktree`));
  });

  it('does not run git for a missing directory', async () => {
    const { runner, calls } = createFakeRunner({});
    await expect(new RepositoryBuildService(runner).isGitWorktree(`${repoPath}-missing`)).resolves.toBe(false);
    expect(calls).toEqual([]);
  });

  it('reports build output on failure', async () => {
    const { runner } = createFakeRunner({ 'pixi run build-release': failed(1, 'linker error', 'compiling') });

    await expect(new RepositoryBuildService(runner).buildRelease(repoPath)).rejects.toThrow(
      new PixiBuildError('Failed to build release: linker error (Output: compiling)')
    );
  });

  it('keeps going after a repository fails', async () => {
    const other = makeTempDir('testsuite-repo-');
    try {
      const { runner } = createFakeRunner({
        'git rev-parse --is-inside-work-tree': (_args, options) =>
          options?.cwd === repoPath ? failed(128, 'fatal') : succeeded('true'),
        'git branch --show-current': succeeded('main'),
        'git pull': failed(1, 'merge conflict\n')
      });

      const results = await new RepositoryBuildService(runner).processAll([
        { name: 'PIXI_REPO', path: repoPath },
        { name: 'BUILD_BACKENDS_REPO', path: other }
      ]);

      expect(results).toEqual([
        {
          name: 'PIXI_REPO',
          path: repoPath,
          success: false,
          branch: null,
          pulled: false,
          error: `${repoPath} is not a valid git worktree`
        },
        {
          name: 'BUILD_BACKENDS_REPO',
          path: other,
          success: false,
          branch: null,
          pulled: false,
          error: 'Failed to pull changes: merge conflict'
        }
      ]);
    } finally {
      removeTempDir(other);
    }
  });
});

import { afterEach, describe, expect, it } from '@jest/globals';
import { TokenService } from '../services/token.service';
import { CommandNotFoundError } from '../utils/errors';
import { captureLogs } from './utils/captureLogs';
import { createFakeRunner, failed, succeeded } from './utils/fakeRunner';

describe('TokenService', () => {
  let warnings: ReturnType<typeof captureLogs> | undefined;

  afterEach(() => {
    warnings?.restore();
    warnings = undefined;
  });

  it('prefers the --token value', async () => {
    const { runner, calls } = createFakeRunner({ 'gh auth token': succeeded('cli-token\n') });
    const token = await new TokenService(runner).resolve({
      cliToken: ' test-secret ',
      env: { GITHUB_TOKEN: 'env-token' }
    });
    expect(token).toBe('test-secret');
    expect(calls).toEqual([]);
  });

  it('falls back to GITHUB_TOKEN', async () => {
    const { runner, calls } = createFakeRunner({});
    await expect(new TokenService(runner).resolve({ env: { GITHUB_TOKEN: 'env-token' } })).resolves.toBe('env-token');
    expect(calls).toEqual([]);
  });

  it('asks the GitHub CLI last', async () => {
    const { runner, calls } = createFakeRunner({ 'gh auth token': succeeded('cli-token\n') });
    await expect(new TokenService(runner).resolve({ env: { GITHUB_TOKEN: '  ' } })).resolves.toBe('cli-token');
    expect(calls).toEqual([{ command: 'gh', args: ['auth', 'token'], cwd: undefined }]);
  });

  it('returns null when the GitHub CLI is not installed', async () => {
    warnings = captureLogs('warn');
    const { runner } = createFakeRunner({ gh: new CommandNotFoundError('gh') });
    await expect(new TokenService(runner).resolve({ env: {} })).resolves.toBeNull();
    expect(warnings.lines()).toEqual(['[Token] GitHub CLI not found; skipping GH auth token lookup']);
  });

  it('returns null when the GitHub CLI fails', async () => {
    warnings = captureLogs('warn');
    const { runner } = createFakeRunner({ 'gh auth token': failed(1, 'not logged in') });
    await expect(new TokenService(runner).resolve({ env: {} })).resolves.toBeNull();
    expect(warnings.lines()).toEqual(['[Token] Failed to obtain token via GitHub CLI. Return code: 1']);
  });

  it('returns null when the GitHub CLI cannot be started', async () => {
    warnings = captureLogs('warn');
    const { runner } = createFakeRunner({ gh: new Error('spawn EACCES') });
    await expect(new TokenService(runner).tokenFromGitHubCli()).resolves.toBeNull();
    expect(warnings.lines()).toEqual(['[Token] Failed to run GitHub CLI: spawn EACCES']);
  });

  it('returns null for an empty token', async () => {
    const { runner } = createFakeRunner({ 'gh auth token': succeeded('\n') });
    await expect(new TokenService(runner).tokenFromGitHubCli()).resolves.toBeNull();
  });
});

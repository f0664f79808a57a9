import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { extractRepoInfo, GitHubService } from '../services/github.service';
import { ConfigError } from '../utils/errors';
import { GitHubStub, startGitHubStub } from './utils/githubStub';
import { makeTempDir, removeTempDir } from './utils/tempDir';

function rawRun(id: number) {
  return {
    id,
    created_at: `2026-01-0${id}T00:00:00Z`,
    head_sha: `sha${id}`,
    head_branch: 'main',
    conclusion: 'success'
  };
}

describe('extractRepoInfo', () => {
  it('splits owner and name', () => {
    expect(extractRepoInfo('prefix-dev/pixi')).toEqual({ owner: 'prefix-dev', repo: 'pixi' });
  });

  it('rejects names without an owner', () => {
    expect(() => extractRepoInfo('pixi')).toThrow(ConfigError);
    expect(() => extractRepoInfo('a/b/c')).toThrow('Invalid GitHub repository name: a/b/c');
  });
});

describe('GitHubService', () => {
  let stub: GitHubStub;
  let service: GitHubService;

  beforeEach(async () => {
    stub = await startGitHubStub();
    service = new GitHubService('test-secret', { baseUrl: stub.baseUrl });
  });

  afterEach(async () => {
    await stub.close();
  });

  it('reads the repository name', async () => {
    stub.route('GET', '/repos/prefix-dev/pixi', { json: { full_name: 'prefix-dev/pixi' } });

    await expect(service.getRepositoryName('prefix-dev/pixi')).resolves.toBe('prefix-dev/pixi');
    expect(stub.requests[0].headers.authorization).toBe('token test-secret');
  });

  it('finds a workflow by its display name', async () => {
    stub.route('GET', '/repos/prefix-dev/pixi/actions/workflows', {
      json: {
        total_count: 2,
        workflows: [
          { id: 1, name: 'Docs', path: '.github/workflows/docs.yml' },
          { id: 7, name: 'CI', path: '.github/workflows/ci.yml' }
        ]
      }
    });

    await expect(service.findWorkflow('prefix-dev/pixi', 'CI')).resolves.toEqual({
      id: 7,
      name: 'CI'
    });
    await expect(service.findWorkflow('prefix-dev/pixi', 'Release')).resolves.toBeNull();
  });

  it('filters workflow runs and caps them at the limit', async () => {
    stub.route('GET', '/repos/prefix-dev/pixi/actions/workflows/7/runs', {
      json: { total_count: 4, workflow_runs: [rawRun(4), rawRun(3), rawRun(2), rawRun(1)] }
    });

    const runs = await service.listWorkflowRuns('prefix-dev/pixi', 7, { branch: 'main', event: 'push' }, 3);

    expect(runs.map((candidate) => candidate.id)).toEqual([4, 3, 2]);
    expect(runs[0]).toEqual({
      id: 4,
      createdAt: '2026-01-04T00:00:00Z',
      headSha: 'sha4',
      headBranch: 'main'
    });
    const query = stub.requests[0].query;
    expect(query.get('branch')).toBe('main');
    expect(query.get('event')).toBe('push');
    expect(query.get('per_page')).toBe('3');
    expect(query.has('head_sha')).toBe(false);
  });

  it('reads a single workflow run', async () => {
    stub.route('GET', '/repos/prefix-dev/pixi/actions/runs/2', { json: rawRun(2) });

    await expect(service.getWorkflowRun('prefix-dev/pixi', 2)).resolves.toMatchObject({ id: 2, headSha: 'sha2' });
  });

  it('lists the artifacts of a run', async () => {
    stub.route('GET', '/repos/prefix-dev/pixi/actions/runs/42/artifacts', {
      json: {
        total_count: 1,
        artifacts: [
          {
            id: 5,
            name: 'pixi-linux-x86_64',
            archive_download_url: 'https://example.invalid/5/zip',
            size_in_bytes: 2048,
            expired: false
          }
        ]
      }
    });

    await expect(service.listRunArtifacts('prefix-dev/pixi', 42)).resolves.toEqual([
      {
        id: 5,
        name: 'pixi-linux-x86_64',
        archiveDownloadUrl: 'https://example.invalid/5/zip',
        expired: false
      }
    ]);
  });

  it('summarises a pull request', async () => {
    stub.route('GET', '/repos/prefix-dev/pixi/pulls/12', {
      json: { number: 12, title: 'Fix solver', head: { sha: 'abc', ref: 'fix', label: 'someone:fix' } }
    });

    await expect(service.getPullRequest('prefix-dev/pixi', 12)).resolves.toEqual({
      number: 12,
      title: 'Fix solver',
      headSha: 'abc',
      headRef: 'fix',
      headLabel: 'someone:fix'
    });
  });

  it('streams an artifact through the storage redirect', async () => {
    const workDir = makeTempDir();
    try {
      stub.route('GET', '/repos/prefix-dev/pixi/actions/artifacts/5/zip', {
        status: 302,
        headers: { location: `${stub.baseUrl}/storage/pixi.zip` }
      });
      stub.route('GET', '/storage/pixi.zip', { body: Buffer.from('zip-bytes') });
      const destination = path.join(workDir, 'pixi.zip');

      await service.downloadArtifact(
        {
          id: 5,
          name: 'pixi-linux-x86_64',
          archiveDownloadUrl: `${stub.baseUrl}/repos/prefix-dev/pixi/actions/artifacts/5/zip`,
          expired: false
        },
        destination
      );

      expect(fs.readFileSync(destination, 'utf8')).toBe('zip-bytes');
      expect(stub.requests.map((request) => request.path)).toEqual([
        '/repos/prefix-dev/pixi/actions/artifacts/5/zip',
        '/storage/pixi.zip'
      ]);
      expect(stub.requests[0].headers.authorization).toBe('token test-secret');
    } finally {
      removeTempDir(workDir);
    }
  });
});

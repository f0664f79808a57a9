import { Octokit } from '@octokit/rest';
import axios from 'axios';
import * as fs from 'fs';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import {
  PullRequestSummary,
  RemoteArtifact,
  RunFilter,
  WorkflowRunSummary,
  WorkflowSummary
} from '../models/Artifact';
import { DEFAULT_GITHUB_API_URL } from '../config/config';
import { ConfigError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('GitHub');

const DOWNLOAD_TIMEOUT_MS = 30_000;
const USER_AGENT = 'pixi-testsuite-tools';

/**
 * The subset of the GitHub Actions API the artifact downloader needs.
 */
export interface ArtifactsApi {
  getRepositoryName(repo: string): Promise<string>;
  findWorkflow(repo: string, name: string): Promise<WorkflowSummary | null>;
  listWorkflowRuns(repo: string, workflowId: number, filter: RunFilter, limit: number): Promise<WorkflowRunSummary[]>;
  getWorkflowRun(repo: string, runId: number): Promise<WorkflowRunSummary>;
  listRunArtifacts(repo: string, runId: number): Promise<RemoteArtifact[]>;
  getPullRequest(repo: string, pullNumber: number): Promise<PullRequestSummary>;
  downloadArtifact(artifact: RemoteArtifact, destination: string): Promise<void>;
}

export interface GitHubServiceOptions {
  baseUrl?: string;
}

interface RawWorkflowRun {
  id: number;
  created_at: string;
  head_sha: string;
  head_branch: string | null;
}

function toRunSummary(run: RawWorkflowRun): WorkflowRunSummary {
  return {
    id: run.id,
    createdAt: run.created_at,
    headSha: run.head_sha,
    headBranch: run.head_branch
  };
}

export function extractRepoInfo(repo: string): { owner: string; repo: string } {
  const match = repo.match(/^([^/\s]+)\/([^/\s]+)$/);
  if (!match) {
    throw new ConfigError(`Invalid GitHub repository name: ${repo}`);
  }
  return { owner: match[1], repo: match[2] };
}

function contentLength(header: unknown): number {
  if (typeof header === 'number') {
    return header;
  }
  if (typeof header === 'string') {
    const parsed = Number.parseInt(header, 10);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function progressReporter(total: number): Transform {
  let received = 0;
  let reportedDecile = 0;
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      received += chunk.length;
      if (total > 0) {
        const decile = Math.floor((received / total) * 10);
        if (decile > reportedDecile) {
          reportedDecile = decile;
          log.info(`Downloading... ${Math.min(decile * 10, 100)}% (${received}/${total} bytes)`);
        }
      }
      callback(null, chunk);
    }
  });
}

export class GitHubService implements ArtifactsApi {
  private octokit: Octokit;

  constructor(private readonly token: string, options: GitHubServiceOptions = {}) {
    this.octokit = new Octokit({
      auth: token,
      baseUrl: options.baseUrl ?? DEFAULT_GITHUB_API_URL,
      userAgent: USER_AGENT
    });
  }

  async getRepositoryName(repo: string): Promise<string> {
    const { data } = await this.octokit.rest.repos.get(extractRepoInfo(repo));
    return data.full_name;
  }

  async findWorkflow(repo: string, name: string): Promise<WorkflowSummary | null> {
    const workflows = await this.octokit.paginate(this.octokit.rest.actions.listRepoWorkflows, {
      ...extractRepoInfo(repo),
      per_page: 100
    });
    const workflow = workflows.find((candidate) => candidate.name === name);
    return workflow ? { id: workflow.id, name: workflow.name } : null;
  }

  async listWorkflowRuns(
    repo: string,
    workflowId: number,
    filter: RunFilter,
    limit: number
  ): Promise<WorkflowRunSummary[]> {
    const { data } = await this.octokit.rest.actions.listWorkflowRuns({
      ...extractRepoInfo(repo),
      workflow_id: workflowId,
      branch: filter.branch,
      event: filter.event,
      head_sha: filter.headSha,
      per_page: limit
    });
    return data.workflow_runs.slice(0, limit).map(toRunSummary);
  }

  async getWorkflowRun(repo: string, runId: number): Promise<WorkflowRunSummary> {
    const { data } = await this.octokit.rest.actions.getWorkflowRun({
      ...extractRepoInfo(repo),
      run_id: runId
    });
    return toRunSummary(data);
  }

  async listRunArtifacts(repo: string, runId: number): Promise<RemoteArtifact[]> {
    const artifacts = await this.octokit.paginate(this.octokit.rest.actions.listWorkflowRunArtifacts, {
      ...extractRepoInfo(repo),
      run_id: runId,
      per_page: 100
    });
    return artifacts.map((artifact) => ({
      id: artifact.id,
      name: artifact.name,
      archiveDownloadUrl: artifact.archive_download_url,
      expired: artifact.expired
    }));
  }

  async getPullRequest(repo: string, pullNumber: number): Promise<PullRequestSummary> {
    const { data } = await this.octokit.rest.pulls.get({
      ...extractRepoInfo(repo),
      pull_number: pullNumber
    });
    return {
      number: data.number,
      title: data.title,
      headSha: data.head.sha,
      headRef: data.head.ref,
      headLabel: data.head.label
    };
  }

  /**
   * Streams the artifact zip to `destination`. The archive URL answers with a
   * redirect to blob storage; the token is only sent to the API host.
   */
  async downloadArtifact(artifact: RemoteArtifact, destination: string): Promise<void> {
    log.info(`Downloading artifact ${artifact.name}...`);
    const response = await axios.get<Readable>(artifact.archiveDownloadUrl, {
      responseType: 'stream',
      headers: {
        Authorization: `token ${this.token}`,
        'User-Agent': USER_AGENT
      },
      timeout: DOWNLOAD_TIMEOUT_MS,
      maxRedirects: 5
    });

    const total = contentLength(response.headers['content-length']);
    await pipeline(response.data, progressReporter(total), fs.createWriteStream(destination));
    log.info(`Saved ${artifact.name} to ${destination}`);
  }
}

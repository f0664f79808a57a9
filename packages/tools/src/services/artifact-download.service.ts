import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  ArtifactTarget,
  DownloadResult,
  PullRequestSummary,
  RemoteArtifact,
  RepositoryKind,
  WorkflowRunSummary,
  WorkflowSummary
} from '../models/Artifact';
import { DownloadMetadata } from '../models/DownloadMetadata';
import { ArtifactNotFoundError, WorkflowNotFoundError, WorkflowRunNotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { ArtifactPlatform, currentArtifactPlatform } from '../utils/platform';
import { ArtifactExtractionService } from './artifact-extraction.service';
import { ArtifactMetadataService } from './artifact-metadata.service';
import { ArtifactsApi } from './github.service';

const log = createLogger('ArtifactDownload');

// newest runs inspected when searching a branch or PR for an artifact
export const MAX_RUN_CANDIDATES = 3;

export function artifactNamePattern(kind: RepositoryKind, platform: ArtifactPlatform): string {
  return kind === 'pixi' ? `pixi-${platform}` : `pixi-build-backends-${platform}`;
}

export function findMatchingArtifact(artifacts: RemoteArtifact[], pattern: string): RemoteArtifact | undefined {
  return artifacts.find((artifact) => !artifact.expired && artifact.name.includes(pattern));
}

export interface DownloadOptions {
  runId?: number;
}

interface Selection {
  run: WorkflowRunSummary | null;
  artifact: RemoteArtifact | undefined;
  available: RemoteArtifact[];
  pullRequest?: PullRequestSummary;
}

export class ArtifactDownloadService {
  constructor(
    private readonly api: ArtifactsApi,
    private readonly outputDir: string,
    private readonly extractor: ArtifactExtractionService = new ArtifactExtractionService(),
    private readonly metadata: ArtifactMetadataService = new ArtifactMetadataService(outputDir),
    private readonly platform: () => ArtifactPlatform = () => currentArtifactPlatform(),
    private readonly now: () => Date = () => new Date(),
    private readonly tempRoot: () => string = () => os.tmpdir()
  ) {}

  async download(target: ArtifactTarget, options: DownloadOptions = {}): Promise<DownloadResult> {
    const pattern = artifactNamePattern(target.kind, this.platform());

    const fullName = await this.api.getRepositoryName(target.repo);
    log.info(`Connected to repository: ${fullName}`);

    const selection = await this.select(target, pattern, options);
    if (!selection.run) {
      throw new WorkflowRunNotFoundError();
    }
    const { run, artifact } = selection;
    log.info(`Selected run: ${run.id} from ${run.createdAt}`);

    if (!artifact) {
      throw new ArtifactNotFoundError(
        pattern,
        selection.available.map((candidate) => candidate.name)
      );
    }
    log.info(`Found artifact: ${artifact.name}`);

    await fs.mkdir(this.outputDir, { recursive: true });
    log.info(`Output directory: ${this.outputDir}`);

    const files = await this.fetchAndExtract(artifact, target.kind);
    await this.metadata.write(target.repo, this.describe(target, run, artifact, selection.pullRequest));

    return { target, artifact: artifact.name, runId: run.id, files };
  }

  private async select(target: ArtifactTarget, pattern: string, options: DownloadOptions): Promise<Selection> {
    if (options.runId !== undefined) {
      log.info(`Using specified run ID: ${options.runId}`);
      const run = await this.api.getWorkflowRun(target.repo, options.runId);
      const available = await this.api.listRunArtifacts(target.repo, run.id);
      return { run, artifact: findMatchingArtifact(available, pattern), available };
    }

    const workflow = await this.requireWorkflow(target);

    if (target.prNumber !== undefined) {
      log.info(`Finding workflow run for PR #${target.prNumber}`);
      const pullRequest = await this.api.getPullRequest(target.repo, target.prNumber);
      log.info(`PR #${pullRequest.number}: ${pullRequest.title} (head: ${pullRequest.headSha})`);
      const runs = await this.api.listWorkflowRuns(
        target.repo,
        workflow.id,
        { headSha: pullRequest.headSha },
        MAX_RUN_CANDIDATES
      );
      return { ...(await this.firstRunWithArtifact(target, runs, pattern)), pullRequest };
    }

    log.info(`Finding latest workflow run from ${target.branch} branch`);
    const runs = await this.api.listWorkflowRuns(
      target.repo,
      workflow.id,
      { branch: target.branch, event: 'push' },
      MAX_RUN_CANDIDATES
    );
    return this.firstRunWithArtifact(target, runs, pattern);
  }

  private async requireWorkflow(target: ArtifactTarget): Promise<WorkflowSummary> {
    const workflow = await this.api.findWorkflow(target.repo, target.workflow);
    if (!workflow) {
      throw new WorkflowNotFoundError(target.workflow);
    }
    log.info(`Found workflow: ${workflow.name}`);
    return workflow;
  }

  private async firstRunWithArtifact(
    target: ArtifactTarget,
    runs: WorkflowRunSummary[],
    pattern: string
  ): Promise<Selection> {
    let selection: Selection = { run: null, artifact: undefined, available: [] };
    for (const run of runs.slice(0, MAX_RUN_CANDIDATES)) {
      const available = await this.api.listRunArtifacts(target.repo, run.id);
      selection = { run, artifact: findMatchingArtifact(available, pattern), available };
      if (selection.artifact) {
        break;
      }
      log.debug(`Run ${run.id} has no artifact matching '${pattern}'`);
    }
    return selection;
  }

  private async fetchAndExtract(artifact: RemoteArtifact, kind: RepositoryKind): Promise<string[]> {
    const tempDir = await fs.mkdtemp(path.join(this.tempRoot(), 'testsuite-artifact-'));
    try {
      const archivePath = path.join(tempDir, `${artifact.name}.zip`);
      await this.api.downloadArtifact(artifact, archivePath);
      return await this.extractor.extract(archivePath, this.outputDir, kind);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }

  private describe(
    target: ArtifactTarget,
    run: WorkflowRunSummary,
    artifact: RemoteArtifact,
    pullRequest: PullRequestSummary | undefined
  ): DownloadMetadata {
    const common = {
      artifact: artifact.name,
      downloaded_at: this.now().toISOString(),
      run_id: run.id,
      head_sha: run.headSha,
      workflow: target.workflow
    };
    if (target.prNumber !== undefined) {
      return {
        ...common,
        source: 'pr',
        pr_number: target.prNumber,
        ...(pullRequest && {
          pr_title: pullRequest.title,
          head_ref: pullRequest.headRef,
          head_label: pullRequest.headLabel
        })
      };
    }
    return { ...common, source: 'branch', branch: run.headBranch || target.branch };
  }
}

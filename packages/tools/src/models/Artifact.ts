export type RepositoryKind = 'pixi' | 'pixi-build-backends';

export const REPOSITORY_KINDS: readonly RepositoryKind[] = ['pixi', 'pixi-build-backends'];

export function isRepositoryKind(value: string): value is RepositoryKind {
  return REPOSITORY_KINDS.some((kind) => kind === value);
}

export interface ArtifactTarget {
  kind: RepositoryKind;
  // owner/name on GitHub
  repo: string;
  // display name of the workflow producing the artifact
  workflow: string;
  branch: string;
  prNumber?: number;
}

export interface WorkflowSummary {
  id: number;
  name: string;
}

export interface WorkflowRunSummary {
  id: number;
  createdAt: string;
  headSha: string;
  headBranch: string | null;
}

export interface RemoteArtifact {
  id: number;
  name: string;
  archiveDownloadUrl: string;
  expired: boolean;
}

export interface PullRequestSummary {
  number: number;
  title: string;
  headSha: string;
  headRef: string;
  headLabel: string;
}

export interface RunFilter {
  branch?: string;
  event?: string;
  headSha?: string;
}

export interface DownloadResult {
  target: ArtifactTarget;
  artifact: string;
  runId: number;
  files: string[];
}

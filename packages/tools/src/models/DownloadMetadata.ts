interface DownloadMetadataBase {
  artifact: string;
  downloaded_at: string;
  run_id: number;
  head_sha: string;
  workflow: string;
}

export interface PullRequestDownloadMetadata extends DownloadMetadataBase {
  source: 'pr';
  pr_number: number;
  // absent when the run was chosen by id and the pull request was not looked up
  pr_title?: string;
  head_ref?: string;
  head_label?: string;
}

export interface BranchDownloadMetadata extends DownloadMetadataBase {
  source: 'branch';
  branch: string;
}

// Keys are snake_case: the file is read by the test harness as well.
export type DownloadMetadata = PullRequestDownloadMetadata | BranchDownloadMetadata;

export const METADATA_FILE_NAME = 'download-metadata.json';

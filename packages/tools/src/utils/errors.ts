export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'USAGE'
  | 'UNSUPPORTED_PLATFORM'
  | 'WORKFLOW_NOT_FOUND'
  | 'WORKFLOW_RUN_NOT_FOUND'
  | 'ARTIFACT_NOT_FOUND'
  | 'ARCHIVE_CONTENT'
  | 'COMMAND_NOT_FOUND'
  | 'GIT_REPOSITORY'
  | 'GIT_PULL'
  | 'PIXI_BUILD'
  | 'PIXI_LOCK'
  | 'BINARY_NOT_FOUND'
  | 'ARTIFACT_SOURCE_MISMATCH';

export class TestsuiteError extends Error {
  constructor(message: string, readonly code: ErrorCode) {
    super(message);
    this.name = 'TestsuiteError';
  }
}

export class ConfigError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

export class UsageError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

export class UnsupportedPlatformError extends TestsuiteError {
  constructor(platform: string, arch: string) {
    super(`Unsupported platform: ${platform}-${arch}`, 'UNSUPPORTED_PLATFORM');
    this.name = 'UnsupportedPlatformError';
  }
}

export class WorkflowNotFoundError extends TestsuiteError {
  constructor(workflow: string) {
    super(`Could not find workflow: ${workflow}`, 'WORKFLOW_NOT_FOUND');
    this.name = 'WorkflowNotFoundError';
  }
}

export class WorkflowRunNotFoundError extends TestsuiteError {
  constructor(message = 'Could not find a suitable workflow run') {
    super(message, 'WORKFLOW_RUN_NOT_FOUND');
    this.name = 'WorkflowRunNotFoundError';
  }
}

export class ArtifactNotFoundError extends TestsuiteError {
  constructor(readonly pattern: string, readonly availableArtifacts: string[]) {
    super(
      `Could not find artifact matching pattern '${pattern}'. ` +
        `Available artifacts: ${availableArtifacts.length > 0 ? availableArtifacts.join(', ') : '(none)'}`,
      'ARTIFACT_NOT_FOUND'
    );
    this.name = 'ArtifactNotFoundError';
  }
}

export class ArchiveContentError extends TestsuiteError {
  constructor(what: string, readonly archiveContents: string[]) {
    super(
      `Could not find ${what} in archive. Archive contents: ${archiveContents.join(', ')}`,
      'ARCHIVE_CONTENT'
    );
    this.name = 'ArchiveContentError';
  }
}

export class CommandNotFoundError extends TestsuiteError {
  constructor(readonly command: string) {
    super(`Command not found: ${command}`, 'COMMAND_NOT_FOUND');
    this.name = 'CommandNotFoundError';
  }
}

export class GitRepositoryError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'GIT_REPOSITORY');
    this.name = 'GitRepositoryError';
  }
}

export class GitPullError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'GIT_PULL');
    this.name = 'GitPullError';
  }
}

export class PixiBuildError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'PIXI_BUILD');
    this.name = 'PixiBuildError';
  }
}

export class PixiLockError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'PIXI_LOCK');
    this.name = 'PixiLockError';
  }
}

export class BinaryNotFoundError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'BINARY_NOT_FOUND');
    this.name = 'BinaryNotFoundError';
  }
}

export class ArtifactSourceMismatchError extends TestsuiteError {
  constructor(message: string) {
    super(message, 'ARTIFACT_SOURCE_MISMATCH');
    this.name = 'ArtifactSourceMismatchError';
  }
}

// Errors raised by Node itself are not always instances of this realm's Error,
// so both helpers look at the shape of the value.
export function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

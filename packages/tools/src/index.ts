export * from './models/Artifact';
export * from './models/DownloadMetadata';
export * from './config/config';
export * from './config/artifact-targets';
export * from './services/github.service';
export * from './services/artifact-download.service';
export * from './services/artifact-extraction.service';
export * from './services/artifact-metadata.service';
export * from './services/token.service';
export * from './services/repository-build.service';
export * from './services/binary-locator.service';
export * from './services/lockfile.service';
export * from './services/branch-override.service';
export * from './commands/download-artifacts';
export * from './commands/check-branch-override';
export * from './commands/build-repos';
export * from './commands/update-lockfiles';
export * from './commands/verify-artifacts';
export * from './utils/errors';
export * from './utils/platform';
export { createLogger, Logger, LogLevel } from './utils/logger';
export { runCommand, CommandRunner, CommandResult, CommandOptions } from './utils/execAsync';

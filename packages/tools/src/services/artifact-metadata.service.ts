import * as fs from 'fs/promises';
import * as path from 'path';
import { ArtifactTarget } from '../models/Artifact';
import { DownloadMetadata, METADATA_FILE_NAME } from '../models/DownloadMetadata';
import { TARGET_DEFAULTS } from '../config/artifact-targets';
import { ArtifactSourceMismatchError, errorCode } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { downloadMetadataFileSchema, metadataSourceSchema } from '../utils/validation.schemas';

const log = createLogger('ArtifactMetadata');

type MetadataFile = Record<string, unknown>;

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(Reflect.get(value, key))])
    );
  }
  return value;
}

export function serializeMetadata(metadata: MetadataFile): string {
  return JSON.stringify(sortKeys(metadata), null, 2);
}

/**
 * Reads and writes `download-metadata.json`, the record of which branch or
 * pull request each downloaded artifact came from.
 */
export class ArtifactMetadataService {
  readonly metadataPath: string;

  constructor(outputDir: string) {
    this.metadataPath = path.join(outputDir, METADATA_FILE_NAME);
  }

  /**
   * Returns an empty object when the file is missing. Invalid content throws
   * unless `tolerateInvalid` is set, in which case it is treated as empty.
   */
  async read(tolerateInvalid = false): Promise<MetadataFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.metadataPath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      if (tolerateInvalid) {
        log.warn(`Existing metadata file at ${this.metadataPath} is invalid JSON; overwriting`);
        return {};
      }
      throw new ArtifactSourceMismatchError(
        `Artifact metadata file at ${this.metadataPath} is not valid JSON. Re-run 'pixi run download-artifacts'.`
      );
    }

    const parsed = downloadMetadataFileSchema.safeParse(json);
    if (!parsed.success) {
      if (tolerateInvalid) {
        log.warn(`Existing metadata file at ${this.metadataPath} is not a JSON object; overwriting`);
        return {};
      }
      throw new ArtifactSourceMismatchError(
        `Artifact metadata file at ${this.metadataPath} must contain a JSON object. Re-run 'pixi run download-artifacts'.`
      );
    }
    return parsed.data;
  }

  async write(repo: string, entry: DownloadMetadata): Promise<void> {
    const existing = await this.read(true);
    existing[repo] = entry;
    await fs.mkdir(path.dirname(this.metadataPath), { recursive: true });
    await fs.writeFile(this.metadataPath, serializeMetadata(existing), 'utf8');
    log.debug(`Recorded ${entry.source} source for ${repo} in ${this.metadataPath}`);
  }

  async validateSources(targets: ArtifactTarget[], env: NodeJS.ProcessEnv = process.env): Promise<void> {
    validateArtifactSources(await this.read(), targets, env);
  }
}

/**
 * Artifacts downloaded from a PR must match the PR variable of the current
 * environment; branch artifacts require the PR variable to be unset.
 */
export function validateArtifactSources(
  metadata: MetadataFile,
  targets: ArtifactTarget[],
  env: NodeJS.ProcessEnv = process.env
): void {
  for (const target of targets) {
    const rawEntry = metadata[target.repo];
    if (rawEntry === undefined) {
      continue;
    }
    const parsed = metadataSourceSchema.safeParse(rawEntry);
    if (!parsed.success) {
      throw new ArtifactSourceMismatchError(
        `Artifact metadata for ${target.repo} does not record a valid source. Re-run 'pixi run download-artifacts'.`
      );
    }
    const entry = parsed.data;
    const variable = TARGET_DEFAULTS[target.kind].prVariable;
    const envValue = env[variable]?.trim() ?? '';

    if (entry.source === 'pr') {
      const prNumber = String(entry.pr_number ?? '').trim();
      if (!prNumber) {
        throw new ArtifactSourceMismatchError(
          `Artifact metadata for ${target.repo} is missing a pull request number. Re-run 'pixi run download-artifacts'.`
        );
      }
      if (!envValue) {
        throw new ArtifactSourceMismatchError(
          `Artifacts for ${target.repo} originate from PR #${prNumber}, but ${variable} is not set. ` +
            'Set the environment variable or re-download the correct artifacts.'
        );
      }
      if (envValue !== prNumber) {
        throw new ArtifactSourceMismatchError(
          `Artifacts for ${target.repo} originate from PR #${prNumber}, but ${variable}='${envValue}'. ` +
            'Update your environment or refresh the artifacts.'
        );
      }
    } else if (envValue) {
      throw new ArtifactSourceMismatchError(
        `Artifacts for ${target.repo} originate from branch '${entry.branch ?? 'main'}', but ${variable}='${envValue}' is set. ` +
          'Unset the environment variable or download the matching PR artifacts.'
      );
    }
  }
}

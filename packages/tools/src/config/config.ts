import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { ciOverrideEnvSchema, CiOverrideEnv } from '../utils/validation.schemas';

const log = createLogger('Config');

export const ENV_FILE = '.env';
export const CI_OVERRIDE_FILE = '.env.ci';
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_ARTIFACTS_DIR = 'artifacts';

export interface LoadEnvOptions {
  // replace variables that are already set in the environment
  override?: boolean;
  files?: string[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads `.env` and then `.env.ci` from the repository root.
 * Later files win over earlier ones; the process environment wins over
 * both unless `override` is set. Returns the files that were found.
 */
export function loadEnvFiles(root: string, options: LoadEnvOptions = {}): string[] {
  const env = options.env ?? process.env;
  const files = options.files ?? [ENV_FILE, CI_OVERRIDE_FILE];
  const merged: Record<string, string> = {};
  const loaded: string[] = [];

  for (const name of files) {
    const file = path.join(root, name);
    if (!fs.existsSync(file)) {
      continue;
    }
    Object.assign(merged, dotenv.parse(fs.readFileSync(file)));
    loaded.push(file);
    log.info(`Loaded environment variables from ${file}`);
  }

  for (const [key, value] of Object.entries(merged)) {
    if (options.override || env[key] === undefined) {
      env[key] = value;
    }
  }

  return loaded;
}

export function resolveRoot(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.TESTSUITE_ROOT?.trim();
  return configured ? path.resolve(configured) : process.cwd();
}

export function readCiOverrides(env: NodeJS.ProcessEnv = process.env): CiOverrideEnv {
  const parsed = ciOverrideEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid CI override configuration: ${details}`);
  }
  return parsed.data;
}

export function githubApiUrl(env: NodeJS.ProcessEnv = process.env): string {
  return readCiOverrides(env).GITHUB_API_URL ?? DEFAULT_GITHUB_API_URL;
}

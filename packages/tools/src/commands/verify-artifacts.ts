import * as path from 'path';
import { resolveArtifactTargets } from '../config/artifact-targets';
import { DEFAULT_ARTIFACTS_DIR, loadEnvFiles, resolveRoot } from '../config/config';
import { ArtifactMetadataService } from '../services/artifact-metadata.service';
import { BinaryLocatorService } from '../services/binary-locator.service';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('VerifyArtifacts');

export interface VerifyArtifactsDeps {
  env: NodeJS.ProcessEnv;
  root: string;
  platform: NodeJS.Platform;
}

/**
 * Checks that the downloaded artifacts match the configured PR variables and
 * prints the binary locations as KEY=VALUE lines.
 */
export async function verifyArtifactsCommand(deps: Partial<VerifyArtifactsDeps> = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const root = deps.root ?? resolveRoot(env);

  loadEnvFiles(root, { env, override: true });

  try {
    const targets = resolveArtifactTargets(undefined, env);
    const metadata = new ArtifactMetadataService(path.join(root, DEFAULT_ARTIFACTS_DIR));
    await metadata.validateSources(targets, env);

    const locator = new BinaryLocatorService(root, deps.platform);
    const pixi = locator.locatePixi(env);
    const backends = locator.locateBuildBackends(env);

    console.log(`PIXI_BIN_DIR=${pixi.binDir}`);
    console.log(`BUILD_BACKENDS_BIN_DIR=${backends.binDir}`);
    console.log(`PIXI_BUILD_BACKEND_OVERRIDE=${backends.override}`);
  } catch (error) {
    log.error(errorMessage(error));
    return 1;
  }
  return 0;
}

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_ARTIFACTS_DIR } from '../config/config';
import { BinaryNotFoundError } from '../utils/errors';
import { execExtension } from '../utils/platform';

export const BUILD_BACKENDS = [
  'pixi-build-cmake',
  'pixi-build-python',
  'pixi-build-rattler-build',
  'pixi-build-rust'
] as const;

export interface PixiLocation {
  binDir: string;
  executable: string;
}

export interface BuildBackendsLocation {
  binDir: string;
  // value for PIXI_BUILD_BACKEND_OVERRIDE
  override: string;
}

function isDirectory(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
}

function isFile(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isFile();
}

/**
 * Finds the pixi executable and build backends a test run should use:
 * the *_BIN_DIR variables when set, otherwise the downloaded artifacts.
 */
export class BinaryLocatorService {
  constructor(
    private readonly root: string,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  locatePixi(env: NodeJS.ProcessEnv = process.env): PixiLocation {
    const executableName = execExtension('pixi', this.platform);
    const configured = env.PIXI_BIN_DIR?.trim();
    const artifactsDir = path.join(this.root, DEFAULT_ARTIFACTS_DIR);

    // relative to the project root, not the working directory
    const binDir = configured
      ? path.resolve(this.root, configured)
      : [artifactsDir, path.join(artifactsDir, 'pixi')].find(
          (candidate) => isDirectory(candidate) && isFile(path.join(candidate, executableName))
        );

    if (!binDir) {
      throw new BinaryNotFoundError(
        "Could not determine Pixi binary location. Set PIXI_BIN_DIR or run 'pixi run download-artifacts --repo pixi'."
      );
    }
    if (!isDirectory(binDir)) {
      throw new BinaryNotFoundError(
        `PIXI_BIN_DIR points to '${binDir}' which is not a valid directory. ` +
          'Please set it to a directory that exists and contains the Pixi executable.'
      );
    }

    const executable = path.join(binDir, executableName);
    if (!isFile(executable)) {
      throw new BinaryNotFoundError(
        `Pixi executable not found at '${executable}'. Set PIXI_BIN_DIR or run 'pixi run download-artifacts --repo pixi'.`
      );
    }
    return { binDir, executable };
  }

  locateBuildBackends(env: NodeJS.ProcessEnv = process.env): BuildBackendsLocation {
    const configured = env.BUILD_BACKENDS_BIN_DIR?.trim();
    const artifactsDir = path.join(this.root, DEFAULT_ARTIFACTS_DIR);

    const binDir = configured
      ? path.resolve(this.root, configured)
      : [artifactsDir, path.join(artifactsDir, 'pixi-build-backends')].find(
          (candidate) =>
            isDirectory(candidate) &&
            BUILD_BACKENDS.every((backend) => isFile(path.join(candidate, execExtension(backend, this.platform))))
        );

    if (!binDir) {
      throw new BinaryNotFoundError(
        'Could not determine build backend locations. Set BUILD_BACKENDS_BIN_DIR or run ' +
          "'pixi run download-artifacts --repo pixi-build-backends'."
      );
    }
    if (!isDirectory(binDir)) {
      throw new BinaryNotFoundError(
        `BUILD_BACKENDS_BIN_DIR points to '${binDir}' which is not a valid directory. ` +
          'Please set it to a directory that exists and contains build backend definitions.'
      );
    }

    const parts = BUILD_BACKENDS.map((backend) => {
      const backendPath = path.join(binDir, execExtension(backend, this.platform));
      if (!isFile(backendPath)) {
        throw new BinaryNotFoundError(
          `'${backend}' not found at '${backendPath}'. Set BUILD_BACKENDS_BIN_DIR ` +
            "or run 'pixi run download-artifacts --repo pixi-build-backends'."
        );
      }
      return `${backend}=${backendPath}`;
    });

    return { binDir, override: parts.join(',') };
  }
}

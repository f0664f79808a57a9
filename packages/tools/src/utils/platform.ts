import * as os from 'os';
import { UnsupportedPlatformError } from './errors';

export type ArtifactPlatform =
  | 'linux-x86_64'
  | 'linux-aarch64'
  | 'macos-aarch64'
  | 'macos-x86_64'
  | 'windows-x86_64';

const ARTIFACT_PLATFORMS: Partial<Record<NodeJS.Platform, Partial<Record<string, ArtifactPlatform>>>> = {
  linux: { x64: 'linux-x86_64', arm64: 'linux-aarch64' },
  darwin: { arm64: 'macos-aarch64', x64: 'macos-x86_64' },
  win32: { x64: 'windows-x86_64' }
};

/**
 * Platform suffix used in CI artifact names, e.g. `pixi-linux-x86_64`.
 */
export function currentArtifactPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = os.arch()
): ArtifactPlatform {
  const resolved = ARTIFACT_PLATFORMS[platform]?.[arch];
  if (!resolved) {
    throw new UnsupportedPlatformError(platform, arch);
  }
  return resolved;
}

export function isWindows(platform: NodeJS.Platform = process.platform): boolean {
  return platform === 'win32';
}

export function execExtension(name: string, platform: NodeJS.Platform = process.platform): string {
  return isWindows(platform) ? `${name}.exe` : name;
}

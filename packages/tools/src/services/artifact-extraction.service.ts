import AdmZip from 'adm-zip';
import * as fs from 'fs/promises';
import * as path from 'path';
import { RepositoryKind } from '../models/Artifact';
import { ArchiveContentError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { isWindows } from '../utils/platform';

const log = createLogger('ArtifactExtraction');

const BACKEND_PREFIX = 'pixi-build-';

export function isPixiBinaryEntry(entryName: string): boolean {
  return entryName === 'pixi' || entryName.endsWith('/pixi') || entryName.endsWith('pixi.exe');
}

export function isBackendExecutableEntry(entryName: string, platform: NodeJS.Platform): boolean {
  const baseName = path.posix.basename(entryName);
  if (!baseName.startsWith(BACKEND_PREFIX)) {
    return false;
  }
  return isWindows(platform) ? baseName.endsWith('.exe') : !baseName.includes('.');
}

export class ArtifactExtractionService {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  /**
   * Writes the executables of a CI artifact archive flat into `outputDir`.
   * Returns the written paths.
   */
  async extract(archivePath: string, outputDir: string, kind: RepositoryKind): Promise<string[]> {
    log.info(`Extracting ${archivePath}...`);
    const zip = new AdmZip(archivePath);
    const entries = zip.getEntries().filter((entry) => !entry.isDirectory);
    const names = entries.map((entry) => entry.entryName);
    log.debug(`Archive contents: ${names.join(', ')}`);

    let selected: AdmZip.IZipEntry[];
    if (kind === 'pixi') {
      const binary = entries.find((entry) => isPixiBinaryEntry(entry.entryName));
      if (!binary) {
        throw new ArchiveContentError('pixi binary', names);
      }
      selected = [binary];
    } else {
      selected = entries.filter((entry) => isBackendExecutableEntry(entry.entryName, this.platform));
      if (selected.length === 0) {
        throw new ArchiveContentError('any pixi-build-* executables', names);
      }
      log.info(`Found ${selected.length} backend executable(s)`);
    }

    await fs.mkdir(outputDir, { recursive: true });
    const written: string[] = [];
    for (const entry of selected) {
      written.push(await this.writeEntry(entry, outputDir));
    }
    return written;
  }

  private async writeEntry(entry: AdmZip.IZipEntry, outputDir: string): Promise<string> {
    const finalPath = path.join(outputDir, path.posix.basename(entry.entryName));
    await fs.rm(finalPath, { recursive: true, force: true });
    await fs.writeFile(finalPath, entry.getData());

    if (!isWindows(this.platform)) {
      await fs.chmod(finalPath, 0o755);
    }
    log.info(`Extracted executable: ${finalPath}`);
    return finalPath;
  }
}

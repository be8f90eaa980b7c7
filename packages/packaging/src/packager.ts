/**
 * Packager
 *
 * Zips a resource pack for upload: `pack.mcmeta`, `pack.png` when present,
 * and the `assets/` directory. Nothing else in the pack directory is shipped.
 */

import AdmZip from 'adm-zip';
import { join } from 'node:path';
import { ExternalToolError } from '@packpub/core';
import { createLogger, getFileSizeBytes, pathKind, safeWriteFile } from '@packpub/utils';

const log = createLogger({ module: 'packager' });

interface PackEntry {
  name: string;
  kind: 'file' | 'directory';
  required: boolean;
}

export const PACK_ENTRIES: readonly PackEntry[] = [
  { name: 'pack.mcmeta', kind: 'file', required: true },
  { name: 'pack.png', kind: 'file', required: false },
  { name: 'assets', kind: 'directory', required: true },
];

export interface PackageRequest {
  packDir: string;
  outputPath: string;
}

export interface PackageResult {
  archivePath: string;
  size: number;
  /** File entries in the archive, sorted */
  entries: string[];
}

export class Packager {
  /**
   * Build the archive, replacing any previous file at `outputPath`
   */
  async package(request: PackageRequest): Promise<PackageResult> {
    const { packDir, outputPath } = request;
    const zip = new AdmZip();

    for (const entry of PACK_ENTRIES) {
      const localPath = join(packDir, entry.name);
      const kind = await pathKind(localPath);

      if (kind === null) {
        if (entry.required) {
          throw new ExternalToolError('packager', `Missing ${entry.name} in ${packDir}`);
        }
        log.debug({ entry: entry.name }, 'Optional pack entry not present');
        continue;
      }

      if (kind !== entry.kind) {
        throw new ExternalToolError(
          'packager',
          `Expected ${entry.name} to be a ${entry.kind} in ${packDir}`
        );
      }

      if (kind === 'directory') {
        zip.addLocalFolder(localPath, entry.name);
      } else {
        zip.addLocalFile(localPath);
      }
    }

    await safeWriteFile(outputPath, zip.toBuffer());

    const size = await getFileSizeBytes(outputPath);
    const entries = zip
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.entryName)
      .sort();

    log.info({ archivePath: outputPath, size, files: entries.length }, 'Created pack archive');

    return { archivePath: outputPath, size, entries };
  }
}

/**
 * Modrinth Uploader
 *
 * Creates one Modrinth version per pack format group through the API.
 */

import { ExternalToolError } from '@packpub/core';
import { createLogger, getFileSizeBytes, pathKind } from '@packpub/utils';
import { ModrinthClient, type ModrinthClientOptions } from '../modrinth/client.js';
import type { UploadOutcome, UploadRequest, Uploader } from '../types.js';

const log = createLogger({ module: 'modrinth-uploader' });

export interface ModrinthUploaderConfig extends Omit<ModrinthClientOptions, 'token'> {
  releaseChannel?: 'release' | 'beta' | 'alpha';
  featured?: boolean;
}

export class ModrinthUploader implements Uploader {
  readonly name = 'modrinth';

  constructor(private readonly config: ModrinthUploaderConfig) {}

  async upload(request: UploadRequest): Promise<UploadOutcome> {
    if ((await pathKind(request.archivePath)) !== 'file') {
      throw new ExternalToolError('uploader', `Archive not found: ${request.archivePath}`);
    }

    const client = new ModrinthClient({ ...this.config, token: request.token });
    const size = await getFileSizeBytes(request.archivePath);

    log.info(
      {
        project: request.projectId,
        versionNumber: request.versionNumber,
        gameVersions: request.gameVersions,
        size,
      },
      'Uploading to Modrinth'
    );

    const created = await client.createVersion(
      {
        name: request.versionName,
        version_number: request.versionNumber,
        changelog: request.changelog,
        dependencies: [],
        game_versions: request.gameVersions,
        release_channel: this.config.releaseChannel ?? 'release',
        loaders: ['minecraft'],
        featured: this.config.featured ?? false,
        project_id: request.projectId,
      },
      request.archivePath
    );

    log.info({ versionId: created.id, versionNumber: created.version_number }, 'Upload successful');
    return { versionNumber: created.version_number, versionId: created.id };
  }
}

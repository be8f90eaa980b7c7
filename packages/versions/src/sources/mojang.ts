/**
 * Mojang launcher manifest
 */

import type { VersionManifest } from '@packpub/core';
import { DEFAULT_MANIFEST_URL, FetchError } from '@packpub/core';
import { getJson, type HttpOptions } from '../http.js';
import { mojangManifestSchema, parseBody } from './schema.js';
import type { ManifestSource } from './types.js';

export class MojangManifestSource implements ManifestSource {
  constructor(
    private readonly http: HttpOptions,
    private readonly manifestUrl: string = DEFAULT_MANIFEST_URL
  ) {}

  async fetchManifest(): Promise<VersionManifest> {
    const response = await getJson(this.manifestUrl, this.http);
    if (!response.found) {
      throw new FetchError(this.manifestUrl, 'version manifest not found', response.status);
    }

    const manifest = parseBody(mojangManifestSchema, response.body, this.manifestUrl);
    return {
      latest: manifest.latest,
      versions: manifest.versions.map(({ id, type, url }) => ({ id, type, url })),
    };
  }
}

/**
 * misode/mcmeta version data
 *
 * Two layouts are read:
 * - `<base>/<id>-summary/version.json`: one document per game version
 * - `<base>/summary/versions/data.json`: every version, newest first
 */

import type { ManifestEntry, VersionManifest } from '@packpub/core';
import { DEFAULT_MCMETA_BASE_URL, FetchError, LookupError } from '@packpub/core';
import { getJson, type HttpOptions } from '../http.js';
import { mcmetaSummarySchema, mcmetaVersionSchema, parseBody } from './schema.js';
import type { ManifestSource, PackFormatSource } from './types.js';

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path}`;
}

/**
 * Looks up one version's pack format per request
 */
export class McmetaPackFormatSource implements PackFormatSource {
  constructor(
    private readonly http: HttpOptions,
    private readonly baseUrl: string = DEFAULT_MCMETA_BASE_URL
  ) {}

  versionUrl(id: string): string {
    return joinUrl(this.baseUrl, `${encodeURIComponent(id)}-summary/version.json`);
  }

  async fetchPackFormat(entry: ManifestEntry): Promise<number> {
    const url = this.versionUrl(entry.id);
    const response = await getJson(url, this.http);
    if (!response.found) {
      throw new LookupError(entry.id, 'version metadata not found');
    }

    const version = parseBody(mcmetaVersionSchema, response.body, url);
    if (version.resource_pack_version === undefined) {
      throw new LookupError(entry.id, 'metadata has no resource pack version');
    }
    return version.resource_pack_version;
  }
}

interface SummaryEntry {
  type: string;
  packFormat?: number;
}

/**
 * Serves both the manifest and pack formats from the single summary
 * document, downloaded at most once per instance
 */
export class McmetaSummarySource implements ManifestSource, PackFormatSource {
  private summary?: Promise<{ manifest: VersionManifest; byId: Map<string, SummaryEntry> }>;

  constructor(
    private readonly http: HttpOptions,
    private readonly baseUrl: string = DEFAULT_MCMETA_BASE_URL
  ) {}

  get summaryUrl(): string {
    return joinUrl(this.baseUrl, 'summary/versions/data.json');
  }

  private async load(): Promise<{ manifest: VersionManifest; byId: Map<string, SummaryEntry> }> {
    const url = this.summaryUrl;
    const response = await getJson(url, this.http);
    if (!response.found) {
      throw new FetchError(url, 'version summary not found', response.status);
    }

    const entries = parseBody(mcmetaSummarySchema, response.body, url);
    const byId = new Map<string, SummaryEntry>();
    for (const entry of entries) {
      if (!byId.has(entry.id)) {
        byId.set(entry.id, { type: entry.type, packFormat: entry.resource_pack_version });
      }
    }

    return {
      manifest: { versions: entries.map(({ id, type }) => ({ id, type })) },
      byId,
    };
  }

  private loadOnce() {
    // a failed download is not cached, the next call fetches again
    this.summary ??= this.load().catch((error: unknown) => {
      this.summary = undefined;
      throw error;
    });
    return this.summary;
  }

  async fetchManifest(): Promise<VersionManifest> {
    const { manifest } = await this.loadOnce();
    return manifest;
  }

  async fetchPackFormat(entry: ManifestEntry): Promise<number> {
    const { byId } = await this.loadOnce();
    const found = byId.get(entry.id);
    if (!found) {
      throw new LookupError(entry.id, 'not present in version summary');
    }
    if (found.packFormat === undefined) {
      throw new LookupError(entry.id, 'summary has no resource pack version');
    }
    return found.packFormat;
  }
}

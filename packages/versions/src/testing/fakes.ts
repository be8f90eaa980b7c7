/**
 * In-memory version sources for tests
 */

import { LookupError, type ManifestEntry, type VersionManifest } from '@packpub/core';
import type { ManifestSource, PackFormatSource } from '../sources/types.js';

export class StaticManifestSource implements ManifestSource {
  fetches = 0;

  constructor(private readonly entries: ReadonlyArray<readonly [string, string]>) {}

  async fetchManifest(): Promise<VersionManifest> {
    this.fetches++;
    return { versions: this.entries.map(([id, type]) => ({ id, type })) };
  }
}

export class StaticPackFormatSource implements PackFormatSource {
  readonly calls: string[] = [];
  private readonly formats: Map<string, number>;

  constructor(
    formats: Record<string, number>,
    private readonly delays: Record<string, number> = {}
  ) {
    this.formats = new Map(Object.entries(formats));
  }

  async fetchPackFormat(entry: ManifestEntry): Promise<number> {
    this.calls.push(entry.id);
    const delay = this.delays[entry.id];
    if (delay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    const packFormat = this.formats.get(entry.id);
    if (packFormat === undefined) {
      throw new LookupError(entry.id, 'version metadata not found');
    }
    return packFormat;
  }
}

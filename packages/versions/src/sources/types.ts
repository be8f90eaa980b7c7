import type { ManifestEntry, VersionManifest } from '@packpub/core';

/**
 * Supplies the list of released versions, newest first
 */
export interface ManifestSource {
  fetchManifest(): Promise<VersionManifest>;
}

/**
 * Supplies the resource pack format of one manifest entry.
 * Rejects with LookupError when the version has no pack format.
 */
export interface PackFormatSource {
  fetchPackFormat(entry: ManifestEntry): Promise<number>;
}

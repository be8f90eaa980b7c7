/**
 * Version Types
 *
 * Shapes shared by the resolver, the packager and the uploaders.
 */

/** Release-type tag as found in version manifests */
export type ReleaseType = 'release' | 'snapshot' | 'old_beta' | 'old_alpha' | (string & {});

export interface ManifestEntry {
  id: string;
  type: ReleaseType;
  /** Per-version detail document, when the manifest points at one */
  url?: string;
}

/** Entries ordered newest first */
export interface VersionManifest {
  latest?: {
    release?: string;
    snapshot?: string;
  };
  versions: ManifestEntry[];
}

export interface VersionRecord {
  id: string;
  packFormat: number;
}

export interface PackFormatGroup {
  packFormat: number;
  /** Ordered by manifest position, newest first */
  versions: string[];
}

export type SelectionPolicy =
  | { kind: 'explicit'; versions: readonly string[] }
  | { kind: 'latest'; count?: number }
  /** Every release; groups keep full membership so upload planning can compare them */
  | { kind: 'all' };

/**
 * Version Resolver
 *
 * Picks the game versions a run publishes for and partitions them by pack
 * format, so one upload covers every version sharing the same pack contents.
 */

import {
  LookupError,
  ResolutionError,
  type ManifestEntry,
  type MissingPackFormatPolicy,
  type PackFormatGroup,
  type SelectionPolicy,
  type VersionManifest,
  type VersionRecord,
} from '@packpub/core';
import { createLogger, mapWithConcurrency, type Logger } from '@packpub/utils';
import { groupByPackFormat } from './grouping.js';
import type { ManifestSource, PackFormatSource } from './sources/types.js';

export const DEFAULT_LATEST_COUNT = 2;

export interface ResolverOptions {
  manifestSource: ManifestSource;
  packFormatSource: PackFormatSource;
  /** What to do with a version whose pack format cannot be found */
  missingPackFormat?: MissingPackFormatPolicy;
  /** Pack format lookups in flight at once */
  concurrency?: number;
  logger?: Logger;
}

export interface CandidateSelection {
  entries: ManifestEntry[];
  /** Requested ids that the manifest does not list */
  unknown: string[];
}

export interface Resolution {
  manifest: VersionManifest;
  candidates: string[];
  records: VersionRecord[];
  skipped: LookupError[];
  groups: PackFormatGroup[];
}

function releases(manifest: VersionManifest): ManifestEntry[] {
  return manifest.versions.filter((entry) => entry.type === 'release');
}

/**
 * Candidate manifest entries for a policy, in manifest order (newest first)
 */
export function selectCandidates(
  manifest: VersionManifest,
  policy: SelectionPolicy
): CandidateSelection {
  switch (policy.kind) {
    case 'latest': {
      const count = policy.count ?? DEFAULT_LATEST_COUNT;
      const available = releases(manifest);
      if (available.length < count) {
        throw new ResolutionError(
          `Need ${count} release entries in the version manifest, found ${available.length}`,
          { required: count, found: available.length }
        );
      }
      return { entries: available.slice(0, count), unknown: [] };
    }

    case 'all': {
      const available = releases(manifest);
      if (available.length === 0) {
        throw new ResolutionError('No release entries in the version manifest');
      }
      return { entries: available, unknown: [] };
    }

    case 'explicit': {
      const requested = new Set(policy.versions.map((id) => id.trim()).filter(Boolean));
      if (requested.size === 0) {
        throw new ResolutionError('No game versions were requested');
      }

      const entries = manifest.versions.filter((entry) => requested.has(entry.id));
      const listed = new Set(entries.map((entry) => entry.id));
      return {
        entries,
        unknown: [...requested].filter((id) => !listed.has(id)),
      };
    }
  }
}

export class VersionResolver {
  private readonly manifestSource: ManifestSource;
  private readonly packFormatSource: PackFormatSource;
  private readonly missingPackFormat: MissingPackFormatPolicy;
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(options: ResolverOptions) {
    this.manifestSource = options.manifestSource;
    this.packFormatSource = options.packFormatSource;
    this.missingPackFormat = options.missingPackFormat ?? 'abort';
    this.concurrency = options.concurrency ?? 4;
    this.log = options.logger ?? createLogger({ module: 'resolver' });
  }

  /**
   * Resolve a selection policy to pack format groups, sorted by pack format
   */
  async resolve(policy: SelectionPolicy = { kind: 'latest' }): Promise<PackFormatGroup[]> {
    const { groups } = await this.resolveDetailed(policy);
    return groups;
  }

  async resolveDetailed(policy: SelectionPolicy = { kind: 'latest' }): Promise<Resolution> {
    const manifest = await this.manifestSource.fetchManifest();
    this.log.info(
      { versions: manifest.versions.length, releases: releases(manifest).length, policy: policy.kind },
      'Fetched version manifest'
    );

    const { entries, unknown } = selectCandidates(manifest, policy);
    const failures: LookupError[] = unknown.map(
      (id) => new LookupError(id, 'not listed in the version manifest')
    );
    this.log.debug({ candidates: entries.map((entry) => entry.id), unknown }, 'Selected candidates');

    const [firstUnknown] = failures;
    if (firstUnknown && this.missingPackFormat === 'abort') {
      throw firstUnknown;
    }

    const lookups = await mapWithConcurrency(entries, this.concurrency, async (entry) => {
      try {
        const packFormat = await this.packFormatSource.fetchPackFormat(entry);
        return { id: entry.id, packFormat };
      } catch (error) {
        if (error instanceof LookupError) return error;
        throw error;
      }
    });

    const records: VersionRecord[] = [];
    for (const lookup of lookups) {
      if (lookup instanceof LookupError) {
        failures.push(lookup);
      } else {
        records.push(lookup);
      }
    }

    const [firstFailure] = failures;
    if (firstFailure && this.missingPackFormat === 'abort') {
      throw firstFailure;
    }
    for (const failure of failures) {
      this.log.warn({ version: failure.versionId, reason: failure.message }, 'Skipping version without pack format');
    }

    const groups = groupByPackFormat(records);
    this.log.info(
      {
        groups: groups.map((group) => ({ packFormat: group.packFormat, versions: group.versions })),
        skipped: failures.map((failure) => failure.versionId),
      },
      'Resolved pack format groups'
    );

    return {
      manifest,
      candidates: entries.map((entry) => entry.id),
      records,
      skipped: failures,
      groups,
    };
  }
}

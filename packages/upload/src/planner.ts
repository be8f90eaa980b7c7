/**
 * Upload Planning
 *
 * Compares resolved groups with what the project already has, so re-runs
 * only publish what changed.
 */

import type { PackFormatGroup } from '@packpub/core';
import { versionLabel } from '@packpub/versions';
import type { PublishedState } from './modrinth/client.js';

export interface UploadPlan {
  group: PackFormatGroup;
  versionNumber: string;
  needsUpload: boolean;
  reason: string;
  /** Group versions no existing upload covers */
  missingVersions: string[];
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((item) => right.has(item));
}

export function planUploads(
  groups: readonly PackFormatGroup[],
  published: PublishedState,
  packVersion: string
): UploadPlan[] {
  return groups.map((group) => {
    const versionNumber = versionLabel(packVersion, group.packFormat);
    const missingVersions = group.versions.filter((id) => !published.gameVersions.has(id));
    const existing = published.packVersions.get(versionNumber);

    const plan = (needsUpload: boolean, reason: string): UploadPlan => ({
      group,
      versionNumber,
      needsUpload,
      reason,
      missingVersions,
    });

    if (existing === undefined) {
      return plan(true, `Pack version ${packVersion} not published for pack format ${group.packFormat}`);
    }
    if (missingVersions.length > 0) {
      const listed = missingVersions.slice(0, 3).join(', ');
      return plan(true, `New Minecraft versions: ${listed}${missingVersions.length > 3 ? '...' : ''}`);
    }
    if (!sameMembers(existing, group.versions)) {
      return plan(true, 'Game version list mismatch');
    }
    return plan(false, 'Up-to-date');
  });
}

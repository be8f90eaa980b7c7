/**
 * Pack Format Grouping
 */

import type { PackFormatGroup, VersionRecord } from '@packpub/core';

/**
 * Fold records into groups keyed by pack format.
 *
 * Versions keep the order of `records` inside each group; groups come out
 * sorted by pack format ascending. A repeated version id is kept once.
 */
export function groupByPackFormat(records: readonly VersionRecord[]): PackFormatGroup[] {
  const groups = new Map<number, string[]>();
  const seen = new Set<string>();

  for (const { id, packFormat } of records) {
    if (seen.has(id)) continue;
    seen.add(id);

    const members = groups.get(packFormat);
    if (members) {
      members.push(id);
    } else {
      groups.set(packFormat, [id]);
    }
  }

  return [...groups.entries()]
    .map(([packFormat, versions]) => ({ packFormat, versions }))
    .sort((a, b) => a.packFormat - b.packFormat);
}

/**
 * Upload label for a group: `<base>-pf<packFormat>`
 */
export function versionLabel(baseVersion: string, packFormat: number): string {
  return `${baseVersion}-pf${packFormat}`;
}

/**
 * "1.21" for one version, "<oldest>-<newest>" for several (input is newest first)
 */
export function versionRange(versions: readonly string[]): string {
  const newest = versions[0];
  const oldest = versions[versions.length - 1];
  if (newest === undefined || oldest === undefined) return '';
  return newest === oldest ? newest : `${oldest}-${newest}`;
}

export function displayName(packFormat: number, versions: readonly string[]): string {
  return `Pack Format ${packFormat} (${versionRange(versions)})`;
}

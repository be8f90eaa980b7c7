import { versionRange } from '@packpub/versions';

/**
 * "Minecraft 1.21.1" or "Minecraft 1.21-1.21.1" (input newest first)
 */
export function defaultVersionName(gameVersions: readonly string[]): string {
  return `Minecraft ${versionRange(gameVersions)}`;
}

export function defaultChangelog(gameVersions: readonly string[]): string {
  const newest = gameVersions[0];
  const oldest = gameVersions[gameVersions.length - 1];
  if (gameVersions.length <= 1 || newest === undefined || oldest === undefined) {
    return `Auto-updated resource pack for Minecraft ${newest ?? ''}`.trim();
  }
  return `Auto-updated resource pack for Minecraft ${oldest} through ${newest} (${gameVersions.length} versions)`;
}

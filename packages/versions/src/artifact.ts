/**
 * Versions Artifact
 *
 * The grouping handed from the resolver to the packaging and upload steps,
 * stored as JSON. Field names are snake_case so CI steps and scripts in
 * other languages can read the file directly.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError, type PackFormatGroup } from '@packpub/core';
import { isErrnoException, safeWriteFile } from '@packpub/utils';
import { displayName, versionLabel, versionRange } from './grouping.js';

const artifactGroupSchema = z.object({
  pack_format: z.number().int().positive(),
  versions: z.array(z.string().min(1)).min(1),
  version_number: z.string().min(1),
  version_range: z.string(),
  display_name: z.string(),
});

export const versionsArtifactSchema = z.object({
  pack_version: z.string().min(1),
  groups: z.array(artifactGroupSchema),
});

export type ArtifactGroup = z.infer<typeof artifactGroupSchema>;
export type VersionsArtifact = z.infer<typeof versionsArtifactSchema>;

export function buildArtifact(
  packVersion: string,
  groups: readonly PackFormatGroup[]
): VersionsArtifact {
  return {
    pack_version: packVersion,
    groups: groups.map(({ packFormat, versions }) => ({
      pack_format: packFormat,
      versions: [...versions],
      version_number: versionLabel(packVersion, packFormat),
      version_range: versionRange(versions),
      display_name: displayName(packFormat, versions),
    })),
  };
}

export function groupsFromArtifact(artifact: VersionsArtifact): PackFormatGroup[] {
  return artifact.groups.map((group) => ({
    packFormat: group.pack_format,
    versions: [...group.versions],
  }));
}

export function serializeArtifact(artifact: VersionsArtifact): string {
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

export function parseArtifact(content: string, source: string = 'artifact'): VersionsArtifact {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ValidationError(source, 'not valid JSON');
  }

  const result = versionsArtifactSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      source,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
    );
  }

  const formats = result.data.groups.map((group) => group.pack_format);
  if (new Set(formats).size !== formats.length) {
    throw new ValidationError(source, 'duplicate pack_format groups');
  }
  return result.data;
}

export async function writeArtifact(path: string, artifact: VersionsArtifact): Promise<void> {
  await safeWriteFile(path, serializeArtifact(artifact));
}

export async function readArtifact(path: string): Promise<VersionsArtifact> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ValidationError(path, 'artifact file not found');
    }
    throw error;
  }
  return parseArtifact(content, path);
}

/**
 * `KEY=value` lines for CI step outputs, one block per group
 */
export function formatGroupOutputs(artifact: VersionsArtifact): string[] {
  const lines = artifact.groups.flatMap((group, index) => [
    `GROUP_${index}_VERSIONS=${group.versions.join(',')}`,
    `GROUP_${index}_PACK_FORMAT=${group.pack_format}`,
    `GROUP_${index}_VERSION_NUMBER=${group.version_number}`,
  ]);
  lines.push(`TOTAL_GROUPS=${artifact.groups.length}`);
  return lines;
}

/**
 * Pack Version Resolution
 *
 * Finds the base version label ("2.3.0") that upload labels are derived from.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { createLogger, executeCommand, safeReadFile } from '@packpub/utils';
import { ConfigError } from '../errors/index.js';

const log = createLogger({ module: 'pack-version' });

export type PackVersionOrigin =
  | 'override'
  | 'env'
  | 'version.json'
  | 'VERSION'
  | 'ci-tag'
  | 'git-tag';

export interface PackVersionResult {
  version: string;
  origin: PackVersionOrigin;
}

export interface PackVersionOptions {
  override?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Latest git tag lookup; defaults to `git describe --tags --abbrev=0` */
  latestTag?: (cwd: string) => Promise<string | null>;
}

const versionJsonSchema = z.object({
  version: z.string().optional(),
  pack_version: z.string().optional(),
  name: z.string().optional(),
});

async function readVersionJson(cwd: string): Promise<string | null> {
  const content = await safeReadFile(join(cwd, 'version.json'));
  if (content === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    log.warn({ error: error instanceof Error ? error.message : String(error) }, 'Ignoring unparseable version.json');
    return null;
  }

  const result = versionJsonSchema.safeParse(parsed);
  if (!result.success) return null;
  const { version, pack_version, name } = result.data;
  return version || pack_version || name || null;
}

export async function gitLatestTag(cwd: string): Promise<string | null> {
  try {
    const result = await executeCommand('git', ['describe', '--tags', '--abbrev=0'], {
      cwd,
      timeout: 10000,
    });
    const tag = result.stdout.trim();
    return result.exitCode === 0 && tag ? tag : null;
  } catch (error) {
    log.debug({ error: error instanceof Error ? error.message : String(error) }, 'git unavailable');
    return null;
  }
}

/**
 * Resolve the pack version. First match wins:
 * override, PACK_VERSION, version.json, VERSION, CI tag ref, latest git tag.
 */
export async function resolvePackVersion(
  options: PackVersionOptions = {}
): Promise<PackVersionResult> {
  const {
    override,
    env = process.env,
    cwd = process.cwd(),
    latestTag = gitLatestTag,
  } = options;

  if (override?.trim()) {
    return { version: override.trim(), origin: 'override' };
  }

  const fromEnv = env['PACK_VERSION']?.trim();
  if (fromEnv) {
    return { version: fromEnv, origin: 'env' };
  }

  const fromJson = await readVersionJson(cwd);
  if (fromJson) {
    return { version: fromJson.trim(), origin: 'version.json' };
  }

  const versionFile = await safeReadFile(join(cwd, 'VERSION'));
  if (versionFile?.trim()) {
    return { version: versionFile.trim(), origin: 'VERSION' };
  }

  if (env['GITHUB_REF_TYPE'] === 'tag' && env['GITHUB_REF_NAME']) {
    return { version: env['GITHUB_REF_NAME'], origin: 'ci-tag' };
  }

  const tag = await latestTag(cwd);
  if (tag) {
    return { version: tag, origin: 'git-tag' };
  }

  throw new ConfigError(
    'Pack version not found. Set PACK_VERSION, or add a version.json or VERSION file'
  );
}


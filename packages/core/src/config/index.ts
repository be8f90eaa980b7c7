/**
 * Publisher Configuration
 *
 * Environment (plus an optional .env file) validated into one immutable
 * structure that is handed to the pipeline. Nothing reads process.env after
 * this point.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { splitList } from '@packpub/utils';
import { ConfigError } from '../errors/index.js';

export const DEFAULT_MANIFEST_URL =
  'https://piston-meta.mojang.com/mc/game/version_manifest_v2.json';
export const DEFAULT_MCMETA_BASE_URL = 'https://raw.githubusercontent.com/misode/mcmeta';
export const DEFAULT_MODRINTH_API_URL = 'https://api.modrinth.com';
export const DEFAULT_USER_AGENT = 'packpub/1.0.0 (resource pack publisher)';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Target project
  MODRINTH_PROJECT_ID: z.string().min(1).optional(),
  MODRINTH_TOKEN: z.string().min(1).optional(),
  MODRINTH_API_URL: z.string().url().default(DEFAULT_MODRINTH_API_URL),
  PACK_NAME: z.string().min(1).default('resource-pack'),
  PACK_VERSION: z.string().min(1).optional(),

  // Paths (relative to the working directory)
  PACK_DIR: z.string().default('.'),
  ARTIFACT_PATH: z.string().default('versions_to_update.json'),
  ARCHIVE_PATH: z.string().optional(),

  // Version sources
  VERSION_SOURCE: z.enum(['mojang', 'mcmeta']).default('mojang'),
  MANIFEST_URL: z.string().url().default(DEFAULT_MANIFEST_URL),
  MCMETA_BASE_URL: z.string().url().default(DEFAULT_MCMETA_BASE_URL),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FETCH_ATTEMPTS: z.coerce.number().int().min(1).default(1),
  LOOKUP_CONCURRENCY: z.coerce.number().int().min(1).default(4),

  // Selection
  GAME_VERSIONS: z.string().optional(),
  LATEST_COUNT: z.coerce.number().int().min(1).default(2),

  // External collaborators
  UPDATER_COMMAND: z.string().min(1).optional(),
  UPLOADER_COMMAND: z.string().min(1).optional(),

  // Failure policies
  MISSING_PACK_FORMAT: z.enum(['abort', 'skip']).default('abort'),
  UPLOAD_FAILURE: z.enum(['abort', 'continue']).default('continue'),
});

export type MissingPackFormatPolicy = 'abort' | 'skip';
export type UploadFailurePolicy = 'abort' | 'continue';
export type VersionSourceKind = 'mojang' | 'mcmeta';

export interface PublisherConfig {
  readonly logLevel: string;
  readonly project: {
    readonly id?: string;
    readonly name: string;
    readonly packVersion?: string;
  };
  readonly modrinth: {
    readonly apiUrl: string;
    readonly token?: string;
  };
  readonly paths: {
    readonly packDir: string;
    readonly artifact: string;
    readonly archive: string;
  };
  readonly sources: {
    readonly kind: VersionSourceKind;
    readonly manifestUrl: string;
    readonly mcmetaBaseUrl: string;
    readonly userAgent: string;
    readonly timeoutMs: number;
    readonly attempts: number;
    readonly lookupConcurrency: number;
  };
  readonly selection: {
    readonly gameVersions: readonly string[];
    readonly latestCount: number;
  };
  readonly commands: {
    readonly updater?: string;
    readonly uploader?: string;
  };
  readonly policies: {
    readonly missingPackFormat: MissingPackFormatPolicy;
    readonly uploadFailure: UploadFailurePolicy;
  };
}

/**
 * Load a .env file into process.env (existing variables win)
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') });
}

/**
 * Archive file name derived from the pack name
 */
export function archiveFileName(packName: string): string {
  const slug = packName
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `${slug || 'resource-pack'}.zip`;
}

/**
 * Validate environment variables into a frozen PublisherConfig.
 * Empty strings count as unset, which is how CI passes absent inputs.
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): PublisherConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const parseResult = envSchema.safeParse(present);
  if (!parseResult.success) {
    throw new ConfigError(
      'Invalid environment configuration',
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env = parseResult.data;

  return Object.freeze({
    logLevel: env.LOG_LEVEL,
    project: Object.freeze({
      id: env.MODRINTH_PROJECT_ID,
      name: env.PACK_NAME,
      packVersion: env.PACK_VERSION,
    }),
    modrinth: Object.freeze({
      apiUrl: env.MODRINTH_API_URL,
      token: env.MODRINTH_TOKEN,
    }),
    paths: Object.freeze({
      packDir: resolve(cwd, env.PACK_DIR),
      artifact: resolve(cwd, env.ARTIFACT_PATH),
      archive: resolve(cwd, env.ARCHIVE_PATH ?? `build/${archiveFileName(env.PACK_NAME)}`),
    }),
    sources: Object.freeze({
      kind: env.VERSION_SOURCE,
      manifestUrl: env.MANIFEST_URL,
      mcmetaBaseUrl: env.MCMETA_BASE_URL,
      userAgent: env.USER_AGENT,
      timeoutMs: env.FETCH_TIMEOUT_MS,
      attempts: env.FETCH_ATTEMPTS,
      lookupConcurrency: env.LOOKUP_CONCURRENCY,
    }),
    selection: Object.freeze({
      gameVersions: Object.freeze(splitList(env.GAME_VERSIONS ?? '')),
      latestCount: env.LATEST_COUNT,
    }),
    commands: Object.freeze({
      updater: env.UPDATER_COMMAND,
      uploader: env.UPLOADER_COMMAND,
    }),
    policies: Object.freeze({
      missingPackFormat: env.MISSING_PACK_FORMAT,
      uploadFailure: env.UPLOAD_FAILURE,
    }),
  });
}

/**
 * Return a copy of the config with some sections overridden (CLI flags)
 */
export function withOverrides(
  base: PublisherConfig,
  overrides: {
    project?: Partial<PublisherConfig['project']>;
    paths?: Partial<PublisherConfig['paths']>;
    selection?: Partial<PublisherConfig['selection']>;
    policies?: Partial<PublisherConfig['policies']>;
  }
): PublisherConfig {
  return Object.freeze({
    ...base,
    project: Object.freeze({ ...base.project, ...overrides.project }),
    paths: Object.freeze({ ...base.paths, ...overrides.paths }),
    selection: Object.freeze({ ...base.selection, ...overrides.selection }),
    policies: Object.freeze({ ...base.policies, ...overrides.policies }),
  });
}

/**
 * Require a value the current command depends on
 */
export function requireSetting<T>(value: T | undefined, variable: string): T {
  if (value === undefined) {
    throw new ConfigError(`${variable} is required for this command`);
  }
  return value;
}

/**
 * Run Context
 *
 * Builds the collaborators a command needs from the validated configuration.
 */

import type { Command } from 'commander';
import {
  ConfigError,
  loadConfig,
  loadEnvFile,
  type PublisherConfig,
  type SelectionPolicy,
} from '@packpub/core';
import { CommandPackUpdater, McmetaPackUpdater, Packager, type PackUpdater } from '@packpub/packaging';
import { CommandUploader, ModrinthClient, ModrinthUploader, type Uploader } from '@packpub/upload';
import { setLogLevel, splitList } from '@packpub/utils';
import {
  McmetaPackFormatSource,
  McmetaSummarySource,
  MojangManifestSource,
  VersionResolver,
  type HttpOptions,
  type ManifestSource,
  type PackFormatSource,
} from '@packpub/versions';

export interface SelectionOptions {
  versions?: string;
  latest?: string;
  all?: boolean;
}

export function httpOptions(config: PublisherConfig): HttpOptions {
  return {
    userAgent: config.sources.userAgent,
    timeoutMs: config.sources.timeoutMs,
    attempts: config.sources.attempts,
  };
}

export function createSources(
  config: PublisherConfig
): { manifestSource: ManifestSource; packFormatSource: PackFormatSource } {
  const http = httpOptions(config);
  if (config.sources.kind === 'mcmeta') {
    const summary = new McmetaSummarySource(http, config.sources.mcmetaBaseUrl);
    return { manifestSource: summary, packFormatSource: summary };
  }
  return {
    manifestSource: new MojangManifestSource(http, config.sources.manifestUrl),
    packFormatSource: new McmetaPackFormatSource(http, config.sources.mcmetaBaseUrl),
  };
}

export function createResolver(config: PublisherConfig): VersionResolver {
  return new VersionResolver({
    ...createSources(config),
    missingPackFormat: config.policies.missingPackFormat,
    concurrency: config.sources.lookupConcurrency,
  });
}

export function createUpdater(config: PublisherConfig): PackUpdater {
  return config.commands.updater
    ? new CommandPackUpdater(config.commands.updater)
    : new McmetaPackUpdater();
}

export function createPackager(): Packager {
  return new Packager();
}

export function createUploader(config: PublisherConfig): Uploader {
  if (config.commands.uploader) {
    return new CommandUploader({ commandLine: config.commands.uploader });
  }
  return new ModrinthUploader({
    apiUrl: config.modrinth.apiUrl,
    userAgent: config.sources.userAgent,
    timeoutMs: config.sources.timeoutMs,
  });
}

export function createModrinthClient(config: PublisherConfig): ModrinthClient {
  return new ModrinthClient({
    apiUrl: config.modrinth.apiUrl,
    userAgent: config.sources.userAgent,
    token: config.modrinth.token,
    timeoutMs: config.sources.timeoutMs,
  });
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigError('Invalid --latest value', [`expected a positive integer, got "${value}"`]);
  }
  return count;
}

/**
 * Selection policy from CLI flags, falling back to GAME_VERSIONS and LATEST_COUNT
 */
export function selectionFromOptions(options: SelectionOptions, config: PublisherConfig): SelectionPolicy {
  const flags = [options.versions !== undefined, options.latest !== undefined, options.all === true];
  if (flags.filter(Boolean).length > 1) {
    throw new ConfigError('Choose one of --versions, --latest and --all');
  }

  if (options.all) {
    return { kind: 'all' };
  }
  if (options.versions !== undefined) {
    return { kind: 'explicit', versions: splitList(options.versions) };
  }
  if (options.latest !== undefined) {
    return { kind: 'latest', count: parseCount(options.latest) };
  }
  if (config.selection.gameVersions.length > 0) {
    return { kind: 'explicit', versions: config.selection.gameVersions };
  }
  return { kind: 'latest', count: config.selection.latestCount };
}

export type GlobalOptions = {
  json?: boolean;
  debug?: boolean;
};

export function globalOptions(command: Command): { json: boolean; debug: boolean } {
  const options = command.optsWithGlobals<GlobalOptions>();
  return { json: options.json === true, debug: options.debug === true };
}

export interface LoadOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** `--debug` wins over LOG_LEVEL */
  debug?: boolean;
}

/**
 * .env from the working directory, then the validated environment.
 * Applies the configured log level.
 */
export function loadPublisherConfig(options: LoadOptions = {}): PublisherConfig {
  const { cwd = process.cwd(), env = process.env, debug = false } = options;
  loadEnvFile(cwd);
  const config = loadConfig(env, cwd);
  setLogLevel(debug ? 'debug' : config.logLevel);
  return config;
}

/**
 * Resolve Command
 *
 * Resolves the targeted game versions, groups them by pack format and
 * writes the versions artifact.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { resolvePackVersion, withOverrides } from '@packpub/core';
import { buildArtifact, writeArtifact } from '@packpub/versions';
import {
  createResolver,
  globalOptions,
  loadPublisherConfig,
  selectionFromOptions,
  type SelectionOptions,
} from '../lib/context.js';
import { fail, printHeader, printJson, printKeyValue, printSuccess, printWarning, spinner } from '../lib/output.js';

interface ResolveOptions extends SelectionOptions {
  out?: string;
}

export async function resolveCommand(options: ResolveOptions, command: Command): Promise<void> {
  const { json, debug } = globalOptions(command);
  const spin = spinner('Resolving game versions...', json);

  try {
    const base = loadPublisherConfig({ debug });
    const config = options.out ? withOverrides(base, { paths: { artifact: resolve(options.out) } }) : base;

    const policy = selectionFromOptions(options, config);
    const { version } = await resolvePackVersion({ override: config.project.packVersion });
    const groups = await createResolver(config).resolve(policy);

    const artifact = buildArtifact(version, groups);
    await writeArtifact(config.paths.artifact, artifact);
    spin.succeed(`Resolved ${groups.length} pack format group(s)`);

    if (json) {
      printJson(artifact);
      return;
    }

    if (groups.length === 0) {
      printWarning('No game versions to publish');
    } else {
      printHeader(`Pack ${version}`);
      for (const group of artifact.groups) {
        printKeyValue(group.version_number, group.versions.join(', '));
      }
      console.log();
    }
    printSuccess(`Wrote ${config.paths.artifact}`);
  } catch (error) {
    spin.fail('Resolution failed');
    fail(error, json);
  }
}

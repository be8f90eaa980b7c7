/**
 * Groups Command
 *
 * Prints the versions artifact as KEY=value lines for CI step outputs.
 */

import { appendFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import { requireSetting } from '@packpub/core';
import { formatGroupOutputs, readArtifact } from '@packpub/versions';
import { globalOptions, loadPublisherConfig } from '../lib/context.js';
import { fail, printJson } from '../lib/output.js';

interface GroupsOptions {
  githubOutput?: boolean;
}

export async function groupsCommand(
  file: string | undefined,
  options: GroupsOptions,
  command: Command
): Promise<void> {
  const { json, debug } = globalOptions(command);

  try {
    const path = file ? resolve(file) : loadPublisherConfig({ debug }).paths.artifact;
    const artifact = await readArtifact(path);
    const lines = formatGroupOutputs(artifact);

    if (options.githubOutput) {
      const outputFile = requireSetting(process.env['GITHUB_OUTPUT'] || undefined, 'GITHUB_OUTPUT');
      await appendFile(outputFile, `${lines.join('\n')}\n`, 'utf8');
    }

    if (json) {
      printJson(artifact);
    } else {
      console.log(lines.join('\n'));
    }
  } catch (error) {
    fail(error, json);
  }
}

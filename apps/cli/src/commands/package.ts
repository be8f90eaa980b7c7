/**
 * Package Command
 *
 * Zips the pack directory into the archive that gets uploaded.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { formatBytes } from '@packpub/utils';
import { createPackager, globalOptions, loadPublisherConfig } from '../lib/context.js';
import { fail, printJson, printKeyValue, spinner } from '../lib/output.js';

interface PackageOptions {
  packDir?: string;
  out?: string;
}

export async function packageCommand(options: PackageOptions, command: Command): Promise<void> {
  const { json, debug } = globalOptions(command);
  const spin = spinner('Packaging...', json);

  try {
    const config = loadPublisherConfig({ debug });
    const result = await createPackager().package({
      packDir: options.packDir ? resolve(options.packDir) : config.paths.packDir,
      outputPath: options.out ? resolve(options.out) : config.paths.archive,
    });
    spin.succeed(`Packaged ${result.entries.length} files`);

    if (json) {
      printJson(result);
      return;
    }
    printKeyValue('Archive', result.archivePath);
    printKeyValue('Size', formatBytes(result.size));
  } catch (error) {
    spin.fail('Packaging failed');
    fail(error, json);
  }
}

/**
 * Update pack.mcmeta Command
 *
 * Stamps a pack.mcmeta with a pack format and the Minecraft version it was updated for.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { updatePackMcmeta } from '@packpub/packaging';
import { globalOptions } from '../lib/context.js';
import { fail, printJson, printKeyValue, printSuccess } from '../lib/output.js';

export async function updateMcmetaCommand(
  path: string,
  minecraftVersion: string,
  packFormat: string,
  description: string | undefined,
  _options: Record<string, never>,
  command: Command
): Promise<void> {
  const { json } = globalOptions(command);

  try {
    const result = await updatePackMcmeta({
      path: resolve(path),
      packFormat: Number(packFormat),
      minecraftVersion,
      baseDescription: description,
    });

    if (json) {
      printJson(result);
      return;
    }
    printSuccess(`Updated ${path}`);
    printKeyValue('pack_format', result.packFormat);
    printKeyValue('description', typeof result.description === 'string' ? result.description : JSON.stringify(result.description));
  } catch (error) {
    fail(error, json);
  }
}

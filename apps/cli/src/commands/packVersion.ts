/**
 * Pack Version Command
 */

import type { Command } from 'commander';
import { resolvePackVersion } from '@packpub/core';
import { globalOptions } from '../lib/context.js';
import { fail, printJson } from '../lib/output.js';

export async function packVersionCommand(
  override: string | undefined,
  _options: Record<string, never>,
  command: Command
): Promise<void> {
  const { json } = globalOptions(command);

  try {
    const result = await resolvePackVersion({ override });
    if (json) {
      printJson(result);
    } else {
      console.log(result.version);
    }
  } catch (error) {
    fail(error, json);
  }
}

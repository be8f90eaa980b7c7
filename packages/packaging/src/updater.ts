/**
 * Pack Updaters
 *
 * Regenerate pack contents in place before packaging. Runs once per publish.
 */

import { join } from 'node:path';
import { ExternalToolError, type PackFormatGroup } from '@packpub/core';
import { commandOutput, createLogger, executeShell } from '@packpub/utils';
import { updatePackMcmeta } from './mcmeta.js';

const log = createLogger({ module: 'updater' });

export interface UpdateContext {
  packDir: string;
  packVersion: string;
  /** Sorted by pack format ascending */
  groups: readonly PackFormatGroup[];
}

export interface PackUpdater {
  readonly name: string;
  update(context: UpdateContext): Promise<void>;
}

/**
 * Runs a user supplied command in the pack directory.
 * The grouping is exposed through PACK_VERSION, PACK_FORMATS and GAME_VERSIONS.
 */
export class CommandPackUpdater implements PackUpdater {
  readonly name = 'command';

  constructor(
    private readonly commandLine: string,
    private readonly timeoutMs: number = 600000
  ) {}

  async update(context: UpdateContext): Promise<void> {
    const env = {
      ...process.env,
      PACK_VERSION: context.packVersion,
      PACK_FORMATS: context.groups.map((group) => group.packFormat).join(','),
      GAME_VERSIONS: context.groups.flatMap((group) => group.versions).join(','),
    };

    log.info({ command: this.commandLine, cwd: context.packDir }, 'Running pack updater');
    const result = await executeShell(this.commandLine, [], {
      cwd: context.packDir,
      env,
      timeout: this.timeoutMs,
    });

    if (result.timedOut) {
      throw new ExternalToolError('updater', 'Pack updater timed out', result.exitCode, commandOutput(result));
    }
    if (result.exitCode !== 0) {
      throw new ExternalToolError('updater', 'Pack updater failed', result.exitCode, commandOutput(result));
    }
    log.debug({ duration: result.duration }, 'Pack updater finished');
  }
}

/**
 * Built-in updater: stamps pack.mcmeta with the newest pack format and,
 * when several formats are published, the supported range.
 */
export class McmetaPackUpdater implements PackUpdater {
  readonly name = 'mcmeta';

  async update(context: UpdateContext): Promise<void> {
    const newest = context.groups[context.groups.length - 1];
    const oldest = context.groups[0];
    if (!newest || !oldest) {
      log.info('No pack format groups, pack.mcmeta left unchanged');
      return;
    }

    const [latestVersion = String(newest.packFormat)] = newest.versions;
    const result = await updatePackMcmeta({
      path: join(context.packDir, 'pack.mcmeta'),
      packFormat: newest.packFormat,
      minecraftVersion: latestVersion,
      supportedFormats:
        oldest.packFormat === newest.packFormat
          ? undefined
          : { min: oldest.packFormat, max: newest.packFormat },
    });
    log.info({ packFormat: result.packFormat, minecraftVersion: latestVersion }, 'Updated pack.mcmeta');
  }
}

/**
 * Command Uploader
 *
 * Hands one group to an external uploader script. Positional arguments:
 *   <archive> <project id> <game versions, comma separated> <version number> <token>
 */

import { ExternalToolError } from '@packpub/core';
import { commandOutput, createLogger, executeShell } from '@packpub/utils';
import type { UploadOutcome, UploadRequest, Uploader } from '../types.js';

const log = createLogger({ module: 'command-uploader' });

export interface CommandUploaderConfig {
  commandLine: string;
  cwd?: string;
  timeoutMs?: number;
}

export class CommandUploader implements Uploader {
  readonly name = 'command';
  private readonly commandLine: string;
  private readonly cwd?: string;
  private readonly timeoutMs: number;

  constructor(config: CommandUploaderConfig) {
    this.commandLine = config.commandLine;
    this.cwd = config.cwd;
    this.timeoutMs = config.timeoutMs ?? 600000;
  }

  async upload(request: UploadRequest): Promise<UploadOutcome> {
    const args = [
      request.archivePath,
      request.projectId,
      request.gameVersions.join(','),
      request.versionNumber,
      request.token,
    ];

    log.info(
      { command: this.commandLine, versionNumber: request.versionNumber, gameVersions: request.gameVersions },
      'Running uploader'
    );

    const result = await executeShell(this.commandLine, args, {
      cwd: this.cwd,
      timeout: this.timeoutMs,
      env: {
        ...process.env,
        PACK_FORMAT: String(request.packFormat),
        VERSION_NAME: request.versionName,
        CHANGELOG: request.changelog,
      },
    });

    if (result.exitCode !== 0 || result.timedOut) {
      throw new ExternalToolError(
        'uploader',
        `Uploader failed for ${request.versionNumber}${result.timedOut ? ' (timed out)' : ''}`,
        result.exitCode,
        commandOutput(result).split(request.token).join('[redacted]')
      );
    }

    return { versionNumber: request.versionNumber };
  }
}

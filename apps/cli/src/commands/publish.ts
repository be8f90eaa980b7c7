/**
 * Publish Command
 *
 * Full run: resolve, write the artifact, update, package, then upload one
 * version per pack format group.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { ConfigError, requireSetting, resolvePackVersion, withOverrides, type UploadFailurePolicy } from '@packpub/core';
import {
  createModrinthClient,
  createPackager,
  createResolver,
  createUpdater,
  createUploader,
  globalOptions,
  loadPublisherConfig,
  selectionFromOptions,
  type SelectionOptions,
} from '../lib/context.js';
import { fail, printError, printHeader, printJson, printKeyValue, printSuccess, printWarning, spinner } from '../lib/output.js';
import { PublishPipeline, type PublishProgress, type UploadStatus } from '../pipeline/publish.js';

interface PublishOptions extends SelectionOptions {
  dryRun?: boolean;
  skipPublished?: boolean;
  continueOnUploadFailure?: boolean;
  abortOnUploadFailure?: boolean;
}

const stepLabels: Record<PublishProgress['step'], string> = {
  resolve: 'Resolving game versions',
  artifact: 'Writing versions artifact',
  update: 'Updating pack',
  package: 'Packaging',
  upload: 'Uploading',
};

const statusColors: Record<UploadStatus, (text: string) => string> = {
  uploaded: chalk.green,
  skipped: chalk.gray,
  failed: chalk.red,
  'not-attempted': chalk.yellow,
};

function uploadFailurePolicy(options: PublishOptions): UploadFailurePolicy | undefined {
  if (options.continueOnUploadFailure && options.abortOnUploadFailure) {
    throw new ConfigError('Choose one of --continue-on-upload-failure and --abort-on-upload-failure');
  }
  if (options.continueOnUploadFailure) return 'continue';
  if (options.abortOnUploadFailure) return 'abort';
  return undefined;
}

export async function publishCommand(options: PublishOptions, command: Command): Promise<void> {
  const { json, debug } = globalOptions(command);
  const spin = spinner('Preparing publish...', json);

  try {
    const base = loadPublisherConfig({ debug });
    const uploadFailure = uploadFailurePolicy(options);
    const config = uploadFailure ? withOverrides(base, { policies: { uploadFailure } }) : base;
    const dryRun = options.dryRun === true;

    const projectId = dryRun
      ? config.project.id ?? ''
      : requireSetting(config.project.id, 'MODRINTH_PROJECT_ID');
    const token = dryRun ? '' : requireSetting(config.modrinth.token, 'MODRINTH_TOKEN');

    const policy = selectionFromOptions(options, config);
    const { version, origin } = await resolvePackVersion({ override: config.project.packVersion });
    spin.text = `Publishing ${version} (from ${origin})`;

    const client = options.skipPublished ? createModrinthClient(config) : undefined;
    const pipeline = new PublishPipeline(
      {
        projectId,
        packVersion: version,
        packDir: config.paths.packDir,
        artifactPath: config.paths.artifact,
        archivePath: config.paths.archive,
        token,
        uploadFailure: config.policies.uploadFailure,
        dryRun,
      },
      {
        resolver: createResolver(config),
        updater: createUpdater(config),
        packager: createPackager(),
        uploader: createUploader(config),
        published: client ? (id) => client.getPublishedState(id) : undefined,
      },
      ({ step, details }) => {
        spin.text = details ? `${stepLabels[step]} (${details})` : stepLabels[step];
      }
    );

    const report = await pipeline.run(policy);

    if (report.failed) {
      spin.fail('Publish finished with failed uploads');
      process.exitCode = 1;
    } else {
      spin.succeed(dryRun ? 'Dry run complete' : 'Publish complete');
    }

    if (json) {
      printJson(report);
      return;
    }

    printHeader(`Pack ${report.packVersion}`);
    if (report.groups.length === 0) {
      printWarning('No game versions to publish');
    }
    for (const group of report.groups) {
      printKeyValue(`Pack format ${group.packFormat}`, group.versions.join(', '));
    }
    if (report.archive) {
      printKeyValue('Archive', report.archive.archivePath);
    }

    if (report.uploads.length > 0) {
      console.log();
      console.log(chalk.bold('Uploads:'));
      for (const upload of report.uploads) {
        const colorFn = statusColors[upload.status];
        const suffix = upload.reason ? ` (${upload.reason})` : '';
        console.log(`  ${colorFn('●')} ${upload.versionNumber}: ${colorFn(upload.status)}${suffix}`);
      }
    }

    console.log();
    for (const upload of report.uploads) {
      if (upload.error) printError(`${upload.versionNumber}: ${upload.error}`);
    }
    if (!report.failed) {
      printSuccess(dryRun ? `Wrote ${report.artifactPath}` : `Published ${report.packVersion}`);
    }
  } catch (error) {
    spin.fail('Publish failed');
    fail(error, json);
  }
}

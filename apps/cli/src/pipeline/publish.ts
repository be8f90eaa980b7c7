/**
 * Publish Pipeline
 *
 * One run: resolve -> artifact -> upload plan -> updater -> packager -> one upload per group.
 * Collaborators are injected so every stage can be replaced in tests.
 */

import {
  describeError,
  type PackFormatGroup,
  type SelectionPolicy,
  type UploadFailurePolicy,
} from '@packpub/core';
import type { PackUpdater, PackageRequest, PackageResult } from '@packpub/packaging';
import {
  defaultChangelog,
  defaultVersionName,
  planUploads,
  type PublishedState,
  type Uploader,
} from '@packpub/upload';
import { createLogger, formatDuration } from '@packpub/utils';
import { buildArtifact, versionLabel, writeArtifact } from '@packpub/versions';

const log = createLogger({ module: 'publish' });

export interface PublishConfig {
  readonly projectId: string;
  readonly packVersion: string;
  readonly packDir: string;
  readonly artifactPath: string;
  readonly archivePath: string;
  readonly token: string;
  readonly uploadFailure: UploadFailurePolicy;
  /** Resolve and write the artifact only */
  readonly dryRun: boolean;
}

export interface PublishCollaborators {
  resolver: { resolve(policy: SelectionPolicy): Promise<PackFormatGroup[]> };
  updater: PackUpdater;
  packager: { package(request: PackageRequest): Promise<PackageResult> };
  uploader: Uploader;
  /** When given, groups the project already has up to date are not uploaded again */
  published?: (projectId: string) => Promise<PublishedState>;
}

export type PublishStep = 'resolve' | 'artifact' | 'update' | 'package' | 'upload';

export interface PublishProgress {
  step: PublishStep;
  details?: string;
}

export type UploadStatus = 'uploaded' | 'skipped' | 'failed' | 'not-attempted';

export interface UploadReport {
  packFormat: number;
  versionNumber: string;
  gameVersions: string[];
  status: UploadStatus;
  versionId?: string;
  reason?: string;
  error?: string;
}

export interface PublishReport {
  packVersion: string;
  dryRun: boolean;
  artifactPath: string;
  groups: PackFormatGroup[];
  archive?: PackageResult;
  uploads: UploadReport[];
  /** True when any group failed to upload */
  failed: boolean;
}

export class PublishPipeline {
  constructor(
    private readonly config: PublishConfig,
    private readonly collaborators: PublishCollaborators,
    private readonly onProgress: (progress: PublishProgress) => void = () => {}
  ) {}

  async run(policy: SelectionPolicy): Promise<PublishReport> {
    const startTime = Date.now();
    const { config } = this;

    this.onProgress({ step: 'resolve', details: policy.kind });
    const groups = await this.collaborators.resolver.resolve(policy);

    this.onProgress({ step: 'artifact', details: config.artifactPath });
    await writeArtifact(config.artifactPath, buildArtifact(config.packVersion, groups));
    log.info({ path: config.artifactPath, groups: groups.length }, 'Wrote versions artifact');

    const report: PublishReport = {
      packVersion: config.packVersion,
      dryRun: config.dryRun,
      artifactPath: config.artifactPath,
      groups,
      uploads: [],
      failed: false,
    };

    if (config.dryRun) {
      log.info('Dry run, stopping after the artifact');
      return report;
    }
    if (groups.length === 0) {
      log.info('No versions to publish');
      return report;
    }

    const skipReasons = await this.skipReasons(groups);
    if (groups.every((group) => skipReasons.has(group.packFormat))) {
      log.info('Every group is up to date, nothing to publish');
      report.uploads = groups.map((group): UploadReport => ({
        ...this.describeGroup(group),
        status: 'skipped',
        reason: skipReasons.get(group.packFormat),
      }));
      return report;
    }

    this.onProgress({ step: 'update', details: this.collaborators.updater.name });
    await this.collaborators.updater.update({
      packDir: config.packDir,
      packVersion: config.packVersion,
      groups,
    });

    this.onProgress({ step: 'package', details: config.archivePath });
    report.archive = await this.collaborators.packager.package({
      packDir: config.packDir,
      outputPath: config.archivePath,
    });

    report.uploads = await this.uploadGroups(groups, skipReasons, report.archive.archivePath);
    report.failed = report.uploads.some((upload) => upload.status === 'failed');

    log.info(
      {
        packVersion: config.packVersion,
        uploaded: report.uploads.filter((upload) => upload.status === 'uploaded').length,
        failed: report.uploads.filter((upload) => upload.status === 'failed').length,
        duration: formatDuration(Date.now() - startTime),
      },
      report.failed ? 'Publish finished with failures' : 'Publish finished'
    );
    return report;
  }

  private async skipReasons(groups: PackFormatGroup[]): Promise<Map<number, string>> {
    const reasons = new Map<number, string>();
    if (!this.collaborators.published) return reasons;

    const state = await this.collaborators.published(this.config.projectId);
    for (const plan of planUploads(groups, state, this.config.packVersion)) {
      if (!plan.needsUpload) {
        reasons.set(plan.group.packFormat, plan.reason);
      } else {
        log.debug({ versionNumber: plan.versionNumber, reason: plan.reason }, 'Upload needed');
      }
    }
    return reasons;
  }

  private describeGroup(group: PackFormatGroup): Pick<UploadReport, 'packFormat' | 'versionNumber' | 'gameVersions'> {
    return {
      packFormat: group.packFormat,
      versionNumber: versionLabel(this.config.packVersion, group.packFormat),
      gameVersions: group.versions,
    };
  }

  private async uploadGroups(
    groups: PackFormatGroup[],
    skipReasons: ReadonlyMap<number, string>,
    archivePath: string
  ): Promise<UploadReport[]> {
    const { config } = this;
    const reports: UploadReport[] = [];
    let aborted = false;

    for (const group of groups) {
      const base = this.describeGroup(group);
      const { versionNumber } = base;

      if (aborted) {
        reports.push({ ...base, status: 'not-attempted' });
        continue;
      }

      const skipReason = skipReasons.get(group.packFormat);
      if (skipReason !== undefined) {
        log.info({ versionNumber, reason: skipReason }, 'Skipping upload');
        reports.push({ ...base, status: 'skipped', reason: skipReason });
        continue;
      }

      this.onProgress({ step: 'upload', details: versionNumber });
      try {
        const outcome = await this.collaborators.uploader.upload({
          archivePath,
          projectId: config.projectId,
          packFormat: group.packFormat,
          gameVersions: group.versions,
          versionNumber,
          versionName: defaultVersionName(group.versions),
          changelog: defaultChangelog(group.versions),
          token: config.token,
        });
        reports.push({ ...base, status: 'uploaded', versionId: outcome.versionId });
      } catch (error) {
        const message = describeError(error);
        log.error({ versionNumber, error: message }, 'Upload failed');
        reports.push({ ...base, status: 'failed', error: message });
        if (config.uploadFailure === 'abort') {
          aborted = true;
        }
      }
    }

    return reports;
  }
}

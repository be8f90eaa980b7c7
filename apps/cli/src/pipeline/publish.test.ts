import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ExternalToolError,
  LookupError,
  ResolutionError,
  type SelectionPolicy,
} from '@packpub/core';
import type { PackUpdater, PackageRequest, PackageResult, UpdateContext } from '@packpub/packaging';
import type { PublishedState, UploadOutcome, UploadRequest, Uploader } from '@packpub/upload';
import { readArtifact, VersionResolver } from '@packpub/versions';
import { StaticManifestSource, StaticPackFormatSource } from '@packpub/versions/testing';
import { PublishPipeline, type PublishConfig, type PublishProgress } from './publish.js';

const MANIFEST = [
  ['1.21.1', 'release'],
  ['1.21.1-rc1', 'snapshot'],
  ['1.21', 'release'],
  ['1.20.6', 'release'],
] as const;

const FORMATS = { '1.21.1': 34, '1.21': 34, '1.20.6': 32 };

class RecordingUpdater implements PackUpdater {
  readonly name = 'recording';
  readonly calls: UpdateContext[] = [];

  constructor(private readonly failure?: Error) {}

  async update(context: UpdateContext): Promise<void> {
    this.calls.push(context);
    if (this.failure) throw this.failure;
  }
}

class RecordingPackager {
  readonly calls: PackageRequest[] = [];

  async package(request: PackageRequest): Promise<PackageResult> {
    this.calls.push(request);
    return { archivePath: request.outputPath, size: 128, entries: ['pack.mcmeta'] };
  }
}

class RecordingUploader implements Uploader {
  readonly name = 'recording';
  readonly requests: UploadRequest[] = [];

  constructor(private readonly rejected: ReadonlySet<string> = new Set()) {}

  async upload(request: UploadRequest): Promise<UploadOutcome> {
    this.requests.push(request);
    if (this.rejected.has(request.versionNumber)) {
      throw new ExternalToolError('uploader', 'rejected');
    }
    return { versionNumber: request.versionNumber, versionId: `id-${request.packFormat}` };
  }
}

describe('PublishPipeline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'packpub-publish-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(options: {
    manifest?: ReadonlyArray<readonly [string, string]>;
    formats?: Record<string, number>;
    missingPackFormat?: 'abort' | 'skip';
    config?: Partial<PublishConfig>;
    updater?: RecordingUpdater;
    uploader?: RecordingUploader;
    published?: PublishedState;
  } = {}) {
    const resolver = new VersionResolver({
      manifestSource: new StaticManifestSource(options.manifest ?? MANIFEST),
      packFormatSource: new StaticPackFormatSource(options.formats ?? FORMATS),
      missingPackFormat: options.missingPackFormat,
    });
    const updater = options.updater ?? new RecordingUpdater();
    const packager = new RecordingPackager();
    const uploader = options.uploader ?? new RecordingUploader();
    const progress: PublishProgress[] = [];
    const { published } = options;

    const config: PublishConfig = {
      projectId: 'classic-panorama',
      packVersion: '2.3.0',
      packDir: join(dir, 'pack'),
      artifactPath: join(dir, 'versions_to_update.json'),
      archivePath: join(dir, 'build', 'pack.zip'),
      token: 'test-secret',
      uploadFailure: 'continue',
      dryRun: false,
      ...options.config,
    };

    const pipeline = new PublishPipeline(
      config,
      {
        resolver,
        updater,
        packager,
        uploader,
        published: published ? async () => published : undefined,
      },
      (step) => progress.push(step)
    );

    return { pipeline, config, updater, packager, uploader, progress };
  }

  it('publishes the latest two releases as one group', async () => {
    const { pipeline, config, updater, packager, uploader, progress } = setup();

    const report = await pipeline.run({ kind: 'latest' });

    expect(report.groups).toEqual([{ packFormat: 34, versions: ['1.21.1', '1.21'] }]);
    expect(report.failed).toBe(false);
    expect(updater.calls).toEqual([
      { packDir: config.packDir, packVersion: '2.3.0', groups: report.groups },
    ]);
    expect(packager.calls).toEqual([{ packDir: config.packDir, outputPath: config.archivePath }]);
    expect(uploader.requests).toEqual([
      {
        archivePath: config.archivePath,
        projectId: 'classic-panorama',
        packFormat: 34,
        gameVersions: ['1.21.1', '1.21'],
        versionNumber: '2.3.0-pf34',
        versionName: 'Minecraft 1.21-1.21.1',
        changelog: 'Auto-updated resource pack for Minecraft 1.21 through 1.21.1 (2 versions)',
        token: 'test-secret',
      },
    ]);
    expect(report.uploads).toEqual([
      {
        packFormat: 34,
        versionNumber: '2.3.0-pf34',
        gameVersions: ['1.21.1', '1.21'],
        status: 'uploaded',
        versionId: 'id-34',
      },
    ]);
    expect(progress.map((item) => item.step)).toEqual(['resolve', 'artifact', 'update', 'package', 'upload']);
  });

  it('uploads once per pack format in ascending order', async () => {
    const { pipeline, uploader } = setup();

    const report = await pipeline.run({ kind: 'explicit', versions: ['1.21.1', '1.20.6'] });

    expect(report.groups).toEqual([
      { packFormat: 32, versions: ['1.20.6'] },
      { packFormat: 34, versions: ['1.21.1'] },
    ]);
    expect(uploader.requests.map((request) => request.versionNumber)).toEqual(['2.3.0-pf32', '2.3.0-pf34']);
  });

  it('writes the grouping to the artifact before anything else runs', async () => {
    const { pipeline, config } = setup({ config: { dryRun: true } });

    await pipeline.run({ kind: 'explicit', versions: ['1.21.1', '1.20.6'] });

    await expect(readArtifact(config.artifactPath)).resolves.toEqual({
      pack_version: '2.3.0',
      groups: [
        {
          pack_format: 32,
          versions: ['1.20.6'],
          version_number: '2.3.0-pf32',
          version_range: '1.20.6',
          display_name: 'Pack Format 32 (1.20.6)',
        },
        {
          pack_format: 34,
          versions: ['1.21.1'],
          version_number: '2.3.0-pf34',
          version_range: '1.21.1',
          display_name: 'Pack Format 34 (1.21.1)',
        },
      ],
    });
  });

  it('stops after the artifact on a dry run', async () => {
    const { pipeline, updater, packager, uploader } = setup({ config: { dryRun: true } });

    const report = await pipeline.run({ kind: 'latest' });

    expect(report.dryRun).toBe(true);
    expect(report.uploads).toEqual([]);
    expect(updater.calls).toHaveLength(0);
    expect(packager.calls).toHaveLength(0);
    expect(uploader.requests).toHaveLength(0);
  });

  it('runs nothing downstream when resolution fails', async () => {
    const { pipeline, config, updater, packager, uploader } = setup({
      manifest: [['1.21.1', 'release'], ['24w14a', 'snapshot']],
    });

    await expect(pipeline.run({ kind: 'latest' })).rejects.toBeInstanceOf(ResolutionError);
    await expect(stat(config.artifactPath)).rejects.toMatchObject({ code: 'ENOENT' });
    expect(updater.calls).toHaveLength(0);
    expect(packager.calls).toHaveLength(0);
    expect(uploader.requests).toHaveLength(0);
  });

  it('uploads nothing when a pack format lookup fails', async () => {
    const { pipeline, uploader } = setup({ formats: { '1.21.1': 34 } });

    await expect(pipeline.run({ kind: 'latest' })).rejects.toBeInstanceOf(LookupError);
    expect(uploader.requests).toHaveLength(0);
  });

  it('does not package when the updater fails', async () => {
    const failure = new ExternalToolError('updater', 'Pack updater failed', 3);
    const { pipeline, packager, uploader } = setup({ updater: new RecordingUpdater(failure) });

    await expect(pipeline.run({ kind: 'latest' })).rejects.toBe(failure);
    expect(packager.calls).toHaveLength(0);
    expect(uploader.requests).toHaveLength(0);
  });

  it('keeps uploading after a failed group by default', async () => {
    const { pipeline, uploader } = setup({ uploader: new RecordingUploader(new Set(['2.3.0-pf32'])) });

    const report = await pipeline.run({ kind: 'explicit', versions: ['1.21.1', '1.20.6'] });

    expect(uploader.requests).toHaveLength(2);
    expect(report.failed).toBe(true);
    expect(report.uploads.map(({ versionNumber, status, error }) => ({ versionNumber, status, error }))).toEqual([
      { versionNumber: '2.3.0-pf32', status: 'failed', error: '[uploader] rejected' },
      { versionNumber: '2.3.0-pf34', status: 'uploaded', error: undefined },
    ]);
  });

  it('stops at the first failed group under the abort policy', async () => {
    const { pipeline, uploader } = setup({
      uploader: new RecordingUploader(new Set(['2.3.0-pf32'])),
      config: { uploadFailure: 'abort' },
    });

    const report = await pipeline.run({ kind: 'explicit', versions: ['1.21.1', '1.20.6'] });

    expect(uploader.requests.map((request) => request.versionNumber)).toEqual(['2.3.0-pf32']);
    expect(report.failed).toBe(true);
    expect(report.uploads.map((upload) => upload.status)).toEqual(['failed', 'not-attempted']);
  });

  it('skips groups the project already has', async () => {
    const published: PublishedState = {
      gameVersions: new Set(['1.20.6']),
      packVersions: new Map([['2.3.0-pf32', ['1.20.6']]]),
    };
    const { pipeline, uploader } = setup({ published });

    const report = await pipeline.run({ kind: 'explicit', versions: ['1.21.1', '1.20.6'] });

    expect(uploader.requests.map((request) => request.versionNumber)).toEqual(['2.3.0-pf34']);
    expect(report.uploads.map(({ status, reason }) => ({ status, reason }))).toEqual([
      { status: 'skipped', reason: 'Up-to-date' },
      { status: 'uploaded', reason: undefined },
    ]);
    expect(report.failed).toBe(false);
  });

  it('finishes without uploads when no version resolves', async () => {
    const { pipeline, updater, packager, uploader } = setup({ formats: {}, missingPackFormat: 'skip' });

    const report = await pipeline.run({ kind: 'explicit', versions: ['1.21.1'] });

    expect(report.groups).toEqual([]);
    expect(report.uploads).toEqual([]);
    expect(updater.calls).toHaveLength(0);
    expect(packager.calls).toHaveLength(0);
    expect(uploader.requests).toHaveLength(0);
  });

  describe('with every release selected', () => {
    const all: SelectionPolicy = { kind: 'all' };

    it('uploads every group again for a new pack version', async () => {
      const published: PublishedState = {
        gameVersions: new Set(['1.21.1', '1.21', '1.20.6']),
        packVersions: new Map([
          ['2.3.0-pf34', ['1.21.1', '1.21']],
          ['2.3.0-pf32', ['1.20.6']],
        ]),
      };
      const { pipeline, updater, uploader } = setup({ published, config: { packVersion: '2.4.0' } });

      const report = await pipeline.run(all);

      expect(updater.calls).toHaveLength(1);
      expect(uploader.requests.map(({ versionNumber, gameVersions }) => ({ versionNumber, gameVersions }))).toEqual([
        { versionNumber: '2.4.0-pf32', gameVersions: ['1.20.6'] },
        { versionNumber: '2.4.0-pf34', gameVersions: ['1.21.1', '1.21'] },
      ]);
      expect(report.failed).toBe(false);
    });

    it('re-uploads a group with its full membership when it gains a version', async () => {
      const published: PublishedState = {
        gameVersions: new Set(['1.21', '1.20.6']),
        packVersions: new Map([
          ['2.3.0-pf34', ['1.21']],
          ['2.3.0-pf32', ['1.20.6']],
        ]),
      };
      const { pipeline, uploader } = setup({ published });

      const report = await pipeline.run(all);

      expect(uploader.requests.map(({ versionNumber, gameVersions }) => ({ versionNumber, gameVersions }))).toEqual([
        { versionNumber: '2.3.0-pf34', gameVersions: ['1.21.1', '1.21'] },
      ]);
      expect(report.uploads.map(({ versionNumber, status, reason }) => ({ versionNumber, status, reason }))).toEqual([
        { versionNumber: '2.3.0-pf32', status: 'skipped', reason: 'Up-to-date' },
        { versionNumber: '2.3.0-pf34', status: 'uploaded', reason: undefined },
      ]);
    });

    it('neither updates nor packages when every group is up to date', async () => {
      const published: PublishedState = {
        gameVersions: new Set(['1.21.1', '1.21', '1.20.6']),
        packVersions: new Map([
          ['2.3.0-pf34', ['1.21', '1.21.1']],
          ['2.3.0-pf32', ['1.20.6']],
        ]),
      };
      const { pipeline, updater, packager, uploader, progress } = setup({ published });

      const report = await pipeline.run(all);

      expect(updater.calls).toHaveLength(0);
      expect(packager.calls).toHaveLength(0);
      expect(uploader.requests).toHaveLength(0);
      expect(report.archive).toBeUndefined();
      expect(report.uploads.map(({ versionNumber, status }) => ({ versionNumber, status }))).toEqual([
        { versionNumber: '2.3.0-pf32', status: 'skipped' },
        { versionNumber: '2.3.0-pf34', status: 'skipped' },
      ]);
      expect(progress.map((item) => item.step)).toEqual(['resolve', 'artifact']);
    });
  });
});

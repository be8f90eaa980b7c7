import { describe, it, expect } from 'vitest';
import { FetchError, LookupError, ResolutionError, type ManifestEntry } from '@packpub/core';
import { buildArtifact } from './artifact.js';
import { VersionResolver, selectCandidates } from './resolver.js';
import type { PackFormatSource } from './sources/types.js';
import { StaticManifestSource, StaticPackFormatSource } from './testing/fakes.js';

const MANIFEST = [
  ['1.21.1', 'release'],
  ['1.21.1-rc1', 'snapshot'],
  ['1.21', 'release'],
  ['1.20.6', 'release'],
] as const;

const PACK_FORMATS = { '1.21.1': 34, '1.21': 34, '1.20.6': 32 };

function resolverFor(
  packFormats: Record<string, number> = PACK_FORMATS,
  options: { missingPackFormat?: 'abort' | 'skip'; delays?: Record<string, number> } = {}
) {
  const manifestSource = new StaticManifestSource(MANIFEST);
  const packFormatSource = new StaticPackFormatSource(packFormats, options.delays);
  const resolver = new VersionResolver({
    manifestSource,
    packFormatSource,
    missingPackFormat: options.missingPackFormat,
  });
  return { resolver, manifestSource, packFormatSource };
}

describe('VersionResolver', () => {
  it('groups the two latest releases by default', async () => {
    const { resolver, packFormatSource } = resolverFor();

    await expect(resolver.resolve()).resolves.toEqual([
      { packFormat: 34, versions: ['1.21.1', '1.21'] },
    ]);
    expect(packFormatSource.calls).toEqual(['1.21.1', '1.21']);
  });

  it('splits versions spanning two pack formats into two labelled groups', async () => {
    const { resolver } = resolverFor();

    const groups = await resolver.resolve({ kind: 'explicit', versions: ['1.21.1', '1.20.6'] });

    expect(groups).toEqual([
      { packFormat: 32, versions: ['1.20.6'] },
      { packFormat: 34, versions: ['1.21.1'] },
    ]);
    expect(buildArtifact('2.3.0', groups).groups.map((group) => group.version_number)).toEqual([
      '2.3.0-pf32',
      '2.3.0-pf34',
    ]);
  });

  it('fails before any lookup when the manifest has too few releases', async () => {
    const manifestSource = new StaticManifestSource([
      ['1.21.1', 'release'],
      ['24w33a', 'snapshot'],
    ]);
    const packFormatSource = new StaticPackFormatSource(PACK_FORMATS);
    const resolver = new VersionResolver({ manifestSource, packFormatSource });

    await expect(resolver.resolve()).rejects.toBeInstanceOf(ResolutionError);
    expect(packFormatSource.calls).toEqual([]);
  });

  it('aborts when a selected version has no pack format', async () => {
    const { resolver } = resolverFor({ '1.21.1': 34 });

    const error = await resolver.resolve().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LookupError);
    expect(error).toMatchObject({ versionId: '1.21' });
  });

  it('drops versions without a pack format under the skip policy', async () => {
    const { resolver } = resolverFor({ '1.21.1': 34 }, { missingPackFormat: 'skip' });

    const resolution = await resolver.resolveDetailed();

    expect(resolution.groups).toEqual([{ packFormat: 34, versions: ['1.21.1'] }]);
    expect(resolution.skipped.map((error) => error.versionId)).toEqual(['1.21']);
  });

  it('rejects explicit versions missing from the manifest without looking anything up', async () => {
    const { resolver, packFormatSource } = resolverFor();

    await expect(
      resolver.resolve({ kind: 'explicit', versions: ['1.21', '9.9.9'] })
    ).rejects.toMatchObject({ code: 'LOOKUP_ERROR', versionId: '9.9.9' });
    expect(packFormatSource.calls).toEqual([]);
  });

  it('groups every release with full membership', async () => {
    const { resolver, packFormatSource } = resolverFor();

    await expect(resolver.resolve({ kind: 'all' })).resolves.toEqual([
      { packFormat: 32, versions: ['1.20.6'] },
      { packFormat: 34, versions: ['1.21.1', '1.21'] },
    ]);
    expect([...packFormatSource.calls].sort()).toEqual(['1.20.6', '1.21', '1.21.1']);
  });

  it('does not depend on request order or completion order', async () => {
    const slowFirst = resolverFor(PACK_FORMATS, { delays: { '1.21.1': 20, '1.21': 0, '1.20.6': 5 } });
    const slowLast = resolverFor(PACK_FORMATS, { delays: { '1.21.1': 0, '1.21': 0, '1.20.6': 20 } });

    const a = await slowFirst.resolver.resolve({ kind: 'explicit', versions: ['1.20.6', '1.21', '1.21.1'] });
    const b = await slowLast.resolver.resolve({ kind: 'explicit', versions: ['1.21.1', '1.21', '1.20.6'] });

    expect(a).toEqual(b);
    expect(a).toEqual([
      { packFormat: 32, versions: ['1.20.6'] },
      { packFormat: 34, versions: ['1.21.1', '1.21'] },
    ]);
  });

  it('gives the same grouping on every run over the same manifest', async () => {
    const { resolver } = resolverFor();

    const first = await resolver.resolve();
    const second = await resolver.resolve();

    expect(second).toEqual(first);
  });

  it('propagates fetch failures even when skipping lookups', async () => {
    const failing: PackFormatSource = {
      fetchPackFormat: async (entry: ManifestEntry) => {
        throw new FetchError(`https://meta.test/${entry.id}`, 'HTTP 503', 503);
      },
    };
    const resolver = new VersionResolver({
      manifestSource: new StaticManifestSource(MANIFEST),
      packFormatSource: failing,
      missingPackFormat: 'skip',
    });

    await expect(resolver.resolve()).rejects.toBeInstanceOf(FetchError);
  });

  it('partitions any selection with no empty or overlapping groups', async () => {
    // Deterministic pseudo-random manifests
    let seed = 7;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed;
    };

    for (let round = 0; round < 25; round++) {
      const size = 2 + (next() % 12);
      const entries: Array<[string, string]> = [];
      const formats: Record<string, number> = {};
      for (let i = 0; i < size; i++) {
        const id = `1.${size - i}.${round}`;
        entries.push([id, next() % 3 === 0 ? 'snapshot' : 'release']);
        formats[id] = 1 + (next() % 4);
      }
      const resolver = new VersionResolver({
        manifestSource: new StaticManifestSource(entries),
        packFormatSource: new StaticPackFormatSource(formats),
      });
      const selected = entries.filter(() => next() % 2 === 0).map(([id]) => id);
      if (selected.length === 0) continue;

      const groups = await resolver.resolve({ kind: 'explicit', versions: selected });
      const members = groups.flatMap((group) => group.versions);

      expect(new Set(members)).toEqual(new Set(selected));
      expect(members).toHaveLength(selected.length);
      expect(groups.every((group) => group.versions.length > 0)).toBe(true);
      expect(new Set(groups.map((group) => group.packFormat)).size).toBe(groups.length);
      for (const group of groups) {
        expect(group.versions.every((id) => formats[id] === group.packFormat)).toBe(true);
      }
    }
  });
});

describe('selectCandidates', () => {
  const manifest = {
    versions: MANIFEST.map(([id, type]) => ({ id, type })),
  };

  it('never selects snapshots for the latest policy', () => {
    expect(selectCandidates(manifest, { kind: 'latest', count: 3 }).entries.map((e) => e.id)).toEqual([
      '1.21.1',
      '1.21',
      '1.20.6',
    ]);
  });

  it('requires the configured release count', () => {
    expect(() => selectCandidates(manifest, { kind: 'latest', count: 4 })).toThrow(
      'Need 4 release entries in the version manifest, found 3'
    );
  });

  it('selects every release for the all policy', () => {
    expect(selectCandidates(manifest, { kind: 'all' }).entries.map((e) => e.id)).toEqual([
      '1.21.1',
      '1.21',
      '1.20.6',
    ]);
    expect(() =>
      selectCandidates({ versions: [{ id: '24w14a', type: 'snapshot' }] }, { kind: 'all' })
    ).toThrow('No release entries in the version manifest');
  });

  it('orders explicit versions by manifest position and collapses duplicates', () => {
    expect(
      selectCandidates(manifest, { kind: 'explicit', versions: ['1.20.6', ' 1.21.1', '1.20.6'] })
    ).toEqual({
      entries: [
        { id: '1.21.1', type: 'release' },
        { id: '1.20.6', type: 'release' },
      ],
      unknown: [],
    });
  });

  it('rejects an empty explicit list', () => {
    expect(() => selectCandidates(manifest, { kind: 'explicit', versions: [' '] })).toThrow(
      ResolutionError
    );
  });

  it('allows explicit snapshots listed in the manifest', () => {
    expect(
      selectCandidates(manifest, { kind: 'explicit', versions: ['1.21.1-rc1'] }).entries
    ).toEqual([{ id: '1.21.1-rc1', type: 'snapshot' }]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  collectManifestReferences,
  isSimilarName,
  loadManifests,
  stripReferences,
} from '../../../src/core/manifest.js';
import type { PlistObject } from '../../../src/core/plist.js';
import { addManifest, addRaw, makeRepo, removeRepo, type TestRepo } from '../helpers.js';

describe('collectManifestReferences', () => {
  it('gathers all four lists, conditionals included', () => {
    const refs = collectManifestReferences([
      {
        managed_installs: ['A'],
        managed_uninstalls: ['B'],
        conditional_items: [{ condition: 'arch == "arm64"', optional_installs: ['C'] }],
      },
      { managed_updates: ['D', 'A'], included_manifests: ['site_default'] },
    ]);
    expect([...refs].sort()).toEqual(['A', 'B', 'C', 'D']);
  });
});

describe('loadManifests', () => {
  let repo: TestRepo;

  beforeEach(() => {
    repo = makeRepo();
  });

  afterEach(() => {
    removeRepo(repo);
  });

  it('loads manifests and records the broken ones', () => {
    const good = addManifest(repo, 'site_default', { managed_installs: ['A'] });
    const nested = addManifest(repo, 'groups/lab', { optional_installs: ['B'] });
    const bad = addManifest(repo, 'bad', { managed_installs: [1, 2] });
    const garbage = addRaw(join(repo.layout.manifests, 'garbage'), '<<<');

    const store = loadManifests(repo.layout);
    expect([...store.manifests.keys()].sort()).toEqual([nested, good].sort());
    expect([...store.errors.keys()].sort()).toEqual([bad, garbage].sort());
  });
});

describe('isSimilarName', () => {
  const names = new Set(['Foo']);

  it('flags longer names sharing the prefix', () => {
    expect(isSimilarName('FooBar', names)).toBe(true);
    expect(isSimilarName('Foo-1.0', names)).toBe(true);
  });

  it('ignores exact matches and unrelated names', () => {
    expect(isSimilarName('Foo', names)).toBe(false);
    expect(isSimilarName('BarFoo', names)).toBe(false);
    expect(isSimilarName('Bar', names)).toBe(false);
  });

  it('ignores names ending with a removal name', () => {
    expect(isSimilarName('FooFoo', names)).toBe(false);
  });
});

describe('stripReferences', () => {
  it('removes exact matches only', () => {
    const manifest: PlistObject = { managed_installs: ['X', 'Y'] };
    const result = stripReferences(manifest, new Set(['X']));
    expect(result.value).toEqual({ managed_installs: ['Y'] });
    expect(result.removed).toEqual([{ key: 'managed_installs', item: 'X' }]);
    expect(result.similar).toEqual([]);
  });

  it('keeps a longer name and reports it as similar', () => {
    const result = stripReferences({ optional_installs: ['Foo', 'FooBar'] }, new Set(['Foo']));
    expect(result.value).toEqual({ optional_installs: ['FooBar'] });
    expect(result.similar).toEqual([{ key: 'optional_installs', item: 'FooBar' }]);
  });

  it('descends into conditional items and keeps other keys', () => {
    const manifest: PlistObject = {
      catalogs: ['production'],
      managed_installs: ['B'],
      conditional_items: [
        { condition: 'machine_type == "laptop"', managed_installs: ['X', 'Z'] },
        { condition: 'machine_type == "desktop"', managed_updates: ['Q'] },
      ],
    };
    const result = stripReferences(manifest, new Set(['X']));
    expect(result.value).toEqual({
      catalogs: ['production'],
      managed_installs: ['B'],
      conditional_items: [
        { condition: 'machine_type == "laptop"', managed_installs: ['Z'] },
        { condition: 'machine_type == "desktop"', managed_updates: ['Q'] },
      ],
    });
    expect(result.removed).toEqual([{ key: 'conditional_items[0].managed_installs', item: 'X' }]);
  });

  it('leaves the input untouched', () => {
    const manifest: PlistObject = { managed_installs: ['X', 'Y'] };
    stripReferences(manifest, new Set(['X']));
    expect(manifest).toEqual({ managed_installs: ['X', 'Y'] });
  });

  it('returns the same object when nothing matches', () => {
    const manifest: PlistObject = { managed_installs: ['Y'], managed_uninstalls: [3] };
    const result = stripReferences(manifest, new Set(['X']));
    expect(result.value).toBe(manifest);
    expect(result.removed).toEqual([]);
  });
});

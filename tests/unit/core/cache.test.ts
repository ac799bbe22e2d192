import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { loadDescriptorCache, parseDescriptor } from '../../../src/core/cache.js';
import { toPlistString } from '../../../src/core/plist.js';
import { addPkginfo, addRaw, makeRepo, removeRepo, type TestRepo } from '../helpers.js';

describe('parseDescriptor', () => {
  it('attaches the path to a valid record', () => {
    const outcome = parseDescriptor(
      '/repo/pkgsinfo/A.plist',
      toPlistString({ name: 'A', version: '1.0', requires: ['B'] }),
    );
    expect(outcome).toEqual({
      ok: true,
      descriptor: { name: 'A', version: '1.0', catalogs: [], requires: ['B'], path: '/repo/pkgsinfo/A.plist' },
    });
  });

  it('reports missing keys', () => {
    const outcome = parseDescriptor('/repo/pkgsinfo/A.plist', toPlistString({ version: '1.0' }));
    expect(outcome).toEqual({ ok: false, error: 'name: Required' });
  });
});

describe('loadDescriptorCache', () => {
  let repo: TestRepo;

  beforeEach(() => {
    repo = makeRepo();
  });

  afterEach(() => {
    removeRepo(repo);
  });

  it('loads pkginfos from nested directories', () => {
    const a = addPkginfo(repo, 'apps/A-1.0.plist', {
      name: 'A',
      version: '1.0',
      catalogs: ['testing', 'production'],
      installer_item_location: 'apps/A-1.0.dmg',
    });
    const b = addPkginfo(repo, 'B-2.0.plist', { name: 'B', version: '2.0' });

    const cache = loadDescriptorCache(repo.layout);
    expect([...cache.descriptors.keys()].sort()).toEqual([a, b].sort());
    expect(cache.descriptors.get(a)?.catalogs).toEqual(['testing', 'production']);
    expect(cache.errors.size).toBe(0);
  });

  it('records unparseable files instead of failing', () => {
    const good = addPkginfo(repo, 'A-1.0.plist', { name: 'A', version: '1.0' });
    const missingName = addPkginfo(repo, 'NoName.plist', { version: '1.0' });
    const garbage = addRaw(join(repo.layout.pkgsinfo, 'garbage.plist'), 'this is not a plist');

    const cache = loadDescriptorCache(repo.layout);
    expect([...cache.descriptors.keys()]).toEqual([good]);
    expect([...cache.errors.keys()].sort()).toEqual([garbage, missingName].sort());
    expect(cache.errors.get(missingName)).toBe('name: Required');
  });

  it('skips hidden files', () => {
    addRaw(join(repo.layout.pkgsinfo, '.DS_Store'), 'binary junk');
    const cache = loadDescriptorCache(repo.layout);
    expect(cache.descriptors.size).toBe(0);
    expect(cache.errors.size).toBe(0);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import {
  assertRepoMounted,
  installerPathWithin,
  catalogSettings,
  installerPath,
  normalizeLocation,
  repoLayout,
  resolveRepoRoot,
} from '../../../src/core/repo.js';
import { RepoNotFoundError } from '../../../src/core/errors.js';
import { SettingsSchema } from '../../../src/config/schema.js';
import { makeRepo, removeRepo, type TestRepo } from '../helpers.js';

const ENV_KEY = 'MUNKI_SWEEP_REPO';

describe('repoLayout', () => {
  it('places the four stores under the root', () => {
    expect(repoLayout('/srv/munki')).toEqual({
      root: '/srv/munki',
      pkgs: '/srv/munki/pkgs',
      pkgsinfo: '/srv/munki/pkgsinfo',
      manifests: '/srv/munki/manifests',
      catalogs: '/srv/munki/catalogs',
    });
  });

  it('maps installer locations into the installer store', () => {
    expect(normalizeLocation('\\apps\\Foo.dmg')).toBe('apps/Foo.dmg');
    expect(normalizeLocation('apps/Foo.pkg/')).toBe('apps/Foo.pkg');
    expect(installerPath(repoLayout('/srv/munki'), '/apps/Foo.dmg')).toBe('/srv/munki/pkgs/apps/Foo.dmg');
  });
});

describe('installerPathWithin', () => {
  const layout = repoLayout('/srv/munki');

  it('accepts paths inside the installer store', () => {
    expect(installerPathWithin(layout, 'apps/Foo.pkg/')).toBe('/srv/munki/pkgs/apps/Foo.pkg');
  });

  it('rejects the store itself and anything outside it', () => {
    expect(installerPathWithin(layout, '/')).toBeNull();
    expect(installerPathWithin(layout, 'apps/..')).toBeNull();
    expect(installerPathWithin(layout, '../manifests/site_default')).toBeNull();
  });
});

describe('resolveRepoRoot', () => {
  let repo: TestRepo;
  let savedEnv: string | undefined;

  beforeEach(() => {
    repo = makeRepo();
    savedEnv = process.env[ENV_KEY];
    delete process.env[ENV_KEY];
  });

  afterEach(() => {
    if (savedEnv === undefined) {
      delete process.env[ENV_KEY];
    } else {
      process.env[ENV_KEY] = savedEnv;
    }
    removeRepo(repo);
  });

  it('prefers the option, then the environment, then settings', () => {
    const settings = SettingsSchema.parse({ repo_path: '/nowhere' });
    process.env[ENV_KEY] = repo.layout.root;
    expect(resolveRepoRoot(repo.dir, settings)).toBe(repo.dir);
    expect(resolveRepoRoot(undefined, settings)).toBe(repo.layout.root);
    delete process.env[ENV_KEY];
    expect(() => resolveRepoRoot(undefined, settings)).toThrow('Repository not found: /nowhere');
  });

  it('fails when nothing is configured', () => {
    expect(() => resolveRepoRoot(undefined, SettingsSchema.parse({}))).toThrow(RepoNotFoundError);
  });
});

describe('assertRepoMounted', () => {
  it('needs a readable all catalog', () => {
    const repo = makeRepo();
    try {
      expect(() => assertRepoMounted(repo.layout)).not.toThrow();
      rmSync(join(repo.layout.catalogs, 'all'));
      expect(() => assertRepoMounted(repo.layout)).toThrow('Please mount your repository and try again.');
    } finally {
      removeRepo(repo);
    }
  });
});

describe('catalogSettings', () => {
  it('reads production and testing catalogs from settings', () => {
    const settings = SettingsSchema.parse({ testing_catalogs: 'testing, beta' });
    expect(catalogSettings(settings)).toEqual({ production: 'production', testing: ['testing', 'beta'] });
  });
});

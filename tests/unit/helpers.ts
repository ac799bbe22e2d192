import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { repoLayout } from '../../src/core/repo.js';
import { writePlist, type PlistObject } from '../../src/core/plist.js';
import type { Descriptor, RepoLayout } from '../../src/types/repo.js';

export interface TestRepo {
  dir: string;
  layout: RepoLayout;
}

/** Empty repository with the `all` catalog in place. */
export function makeRepo(): TestRepo {
  const dir = mkdtempSync(join(tmpdir(), 'munki-sweep-test-'));
  const layout = repoLayout(join(dir, 'repo'));
  for (const sub of [layout.pkgs, layout.pkgsinfo, layout.manifests, layout.catalogs]) {
    mkdirSync(sub, { recursive: true });
  }
  writePlist(join(layout.catalogs, 'all'), []);
  return { dir, layout };
}

export function removeRepo(repo: TestRepo): void {
  rmSync(repo.dir, { recursive: true, force: true });
}

function writeAt(path: string, data: PlistObject): string {
  mkdirSync(dirname(path), { recursive: true });
  writePlist(path, data);
  return path;
}

export function addPkginfo(repo: TestRepo, rel: string, data: PlistObject): string {
  return writeAt(join(repo.layout.pkgsinfo, rel), data);
}

export function addManifest(repo: TestRepo, rel: string, data: PlistObject): string {
  return writeAt(join(repo.layout.manifests, rel), data);
}

export function addRaw(path: string, content: string): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

export function addInstaller(repo: TestRepo, rel: string): string {
  return addRaw(join(repo.layout.pkgs, rel), 'installer');
}

/** A non-flat package: a directory with contents. */
export function addBundle(repo: TestRepo, rel: string): string {
  const path = join(repo.layout.pkgs, rel);
  addRaw(join(path, 'Contents', 'Info.plist'), '<plist/>');
  return path;
}

/** In-memory pkginfo under `/repo/pkgsinfo`. */
export function pkginfo(
  name: string,
  version: string,
  extra: Partial<Descriptor> = {},
): Descriptor {
  return {
    name,
    version,
    catalogs: ['production'],
    path: `/repo/pkgsinfo/${name}-${version}.plist`,
    ...extra,
  };
}

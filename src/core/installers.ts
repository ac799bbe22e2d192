import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { InstallerEntry, InstallerIndex } from '../types/repo.js';
import { isHidden } from '../utils/fs.js';
import { normalizeLocation } from './repo.js';

const BUNDLE_EXTENSIONS = /\.(pkg|mpkg)$/i;

export function isBundleName(name: string): boolean {
  return BUNDLE_EXTENSIONS.test(name);
}

function joinRel(dir: string, name: string): string {
  return dir === '' ? name : `${dir}/${name}`;
}

/**
 * Indexes the installer store. Bundle packages (directories named
 * `*.pkg` / `*.mpkg`, any case) are single items; their contents are
 * not walked.
 */
export function buildInstallerIndex(root: string): InstallerIndex {
  const index: InstallerIndex = { root, items: [], listings: new Map() };
  walkInstallers(root, '', index);
  return index;
}

function walkInstallers(absDir: string, relDir: string, index: InstallerIndex): void {
  let entries;
  try {
    entries = readdirSync(absDir, { withFileTypes: true });
  } catch {
    return;
  }
  const names = new Set<string>();
  index.listings.set(relDir, names);

  for (const entry of entries) {
    if (isHidden(entry.name)) continue;
    names.add(entry.name);
    const absPath = join(absDir, entry.name);
    const relPath = joinRel(relDir, entry.name);

    if (entry.isDirectory()) {
      if (isBundleName(entry.name)) {
        index.items.push({ relPath, absPath, kind: 'bundle' });
      } else {
        walkInstallers(absPath, relPath, index);
      }
    } else if (entry.isFile()) {
      index.items.push({ relPath, absPath, kind: 'file' });
    }
  }
}

export type LocationMatch =
  | { status: 'exact' }
  | { status: 'case-mismatch'; component: string }
  | { status: 'missing' };

/**
 * Resolves an installer location against the index, component by
 * component. A component only found under a different case is reported
 * as the first bad component, and the walk continues with the real name.
 */
export function matchLocation(index: InstallerIndex, location: string): LocationMatch {
  const parts = normalizeLocation(location).split('/').filter((p) => p.length > 0);
  if (parts.length === 0) return { status: 'missing' };

  let dir = '';
  let badComponent: string | null = null;
  for (const part of parts) {
    const listing = index.listings.get(dir);
    if (!listing) return { status: 'missing' };

    let actual: string | undefined = listing.has(part) ? part : undefined;
    if (actual === undefined) {
      const lower = part.toLowerCase();
      actual = [...listing].find((name) => name.toLowerCase() === lower);
      if (actual === undefined) return { status: 'missing' };
      badComponent ??= part;
    }
    dir = joinRel(dir, actual);
  }
  return badComponent === null ? { status: 'exact' } : { status: 'case-mismatch', component: badComponent };
}

/** Installers whose relative path no descriptor references. */
export function findOrphans(
  index: InstallerIndex,
  referenced: ReadonlySet<string>,
): InstallerEntry[] {
  return index.items.filter((item) => !referenced.has(item.relPath));
}

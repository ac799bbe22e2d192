import { rmSync, statSync } from 'node:fs';
import { basename, dirname, join, relative, isAbsolute } from 'node:path';
import type { RepoLayout } from '../types/repo.js';
import { ensureDir, dirExists, movePath } from '../utils/fs.js';
import { descriptorNames, loadDescriptorCache } from './cache.js';
import { isBundleName } from './installers.js';
import { listManifestFiles, parseManifest, stripReferences, type ReferenceChange } from './manifest.js';
import { isPlistObject, readPlist, writePlist } from './plist.js';
import type { RemovalPlan } from './removal.js';
import { ArchiveDirectoryError, errorMessage } from './errors.js';

export type RemovalMode = { kind: 'delete' } | { kind: 'archive'; root: string };

export interface ItemFailure {
  path: string;
  error: string;
}

export interface ManifestChange {
  path: string;
  removed: ReferenceChange[];
}

export interface ManifestCleanupResult {
  /** Names actually stripped, after re-checking the repository. */
  names: string[];
  /** Requested names that reappeared in the repository meanwhile. */
  kept: string[];
  changed: ManifestChange[];
  /** Non-matching items that look like a removed name, left in place. */
  similar: Array<ReferenceChange & { path: string }>;
  errors: ItemFailure[];
}

export interface RemovalResult {
  mode: RemovalMode['kind'];
  processed: string[];
  /** Destination of each archived file, keyed by its original path. */
  archived: Map<string, string>;
  failures: ItemFailure[];
  manifests: ManifestCleanupResult;
}

// ── File removal ────────────────────────────────────────────────────

/** Only plain files and bundle packages may be removed or moved. */
function assertRemovable(path: string): void {
  if (statSync(path).isDirectory() && !isBundleName(basename(path))) {
    throw new Error(`${path} is a directory, not an installer bundle`);
  }
}

function removeFiles(paths: string[]): { processed: string[]; failures: ItemFailure[] } {
  const processed: string[] = [];
  const failures: ItemFailure[] = [];
  for (const path of paths) {
    try {
      assertRemovable(path);
      // Bundle installers are directories.
      rmSync(path, { recursive: true });
      processed.push(path);
    } catch (err) {
      failures.push({ path, error: errorMessage(err) });
    }
  }
  return { processed, failures };
}

function makeArchiveDir(dir: string): void {
  if (dirExists(dir)) return;
  try {
    ensureDir(dir);
  } catch (err) {
    throw new ArchiveDirectoryError(dir, errorMessage(err));
  }
}

/** Where `path` lands under the archive root. */
export function archivePath(layout: RepoLayout, archiveRoot: string, path: string): string {
  const rel = relative(layout.root, path);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new Error(`${path} is outside the repository ${layout.root}`);
  }
  return join(archiveRoot, rel);
}

function archiveFiles(
  paths: string[],
  layout: RepoLayout,
  archiveRoot: string,
): { processed: string[]; archived: Map<string, string>; failures: ItemFailure[] } {
  for (const top of ['pkgs', 'pkgsinfo']) {
    makeArchiveDir(join(archiveRoot, top));
  }

  const processed: string[] = [];
  const archived = new Map<string, string>();
  const failures: ItemFailure[] = [];
  for (const path of paths) {
    let dest: string;
    try {
      assertRemovable(path);
      dest = archivePath(layout, archiveRoot, path);
    } catch (err) {
      failures.push({ path, error: errorMessage(err) });
      continue;
    }
    // Throws, and so ends the run, when the tree cannot be created.
    makeArchiveDir(dirname(dest));
    try {
      movePath(path, dest);
      processed.push(path);
      archived.set(path, dest);
    } catch (err) {
      failures.push({ path, error: errorMessage(err) });
    }
  }
  return { processed, archived, failures };
}

// ── Manifest cleanup ────────────────────────────────────────────────

/**
 * Strips `names` from every manifest. The repository is read again
 * first: a name that has pkginfos on disk by now is kept.
 */
export function removeNamesFromManifests(
  names: Iterable<string>,
  layout: RepoLayout,
): ManifestCleanupResult {
  const requested = [...new Set(names)].sort();
  const result: ManifestCleanupResult = {
    names: [],
    kept: [],
    changed: [],
    similar: [],
    errors: [],
  };
  if (requested.length === 0) return result;

  const remaining = descriptorNames(loadDescriptorCache(layout).descriptors.values());
  result.names = requested.filter((name) => !remaining.has(name));
  result.kept = requested.filter((name) => remaining.has(name));
  if (result.names.length === 0) return result;

  const finalNames = new Set(result.names);
  for (const path of listManifestFiles(layout)) {
    try {
      const data = readPlist(path);
      if (!isPlistObject(data)) {
        throw new Error('manifest is not a dictionary');
      }
      // Manifests the reports reject are left alone.
      parseManifest(data);
      const stripped = stripReferences(data, finalNames);
      result.similar.push(...stripped.similar.map((s) => ({ ...s, path })));
      if (stripped.removed.length > 0) {
        writePlist(path, stripped.value);
        result.changed.push({ path, removed: stripped.removed });
      }
    } catch (err) {
      result.errors.push({ path, error: errorMessage(err) });
    }
  }
  return result;
}

// ── Execution ───────────────────────────────────────────────────────

/**
 * Applies a plan: deletes or archives every file, then strips the
 * fully removed names from the manifests. Per-file failures are
 * collected; only an unusable archive destination throws.
 */
export function executeRemoval(
  plan: RemovalPlan,
  mode: RemovalMode,
  layout: RepoLayout,
): RemovalResult {
  const paths = [...plan.descriptorPaths, ...plan.installerPaths];
  const outcome =
    mode.kind === 'archive'
      ? archiveFiles(paths, layout, mode.root)
      : { ...removeFiles(paths), archived: new Map<string, string>() };

  return {
    mode: mode.kind,
    processed: outcome.processed,
    archived: outcome.archived,
    failures: outcome.failures,
    manifests: removeNamesFromManifests(plan.namesToRemove, layout),
  };
}

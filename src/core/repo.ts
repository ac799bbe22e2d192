import { isAbsolute, join, relative, resolve } from 'node:path';
import { envVar } from '../config/branding.js';
import type { Settings } from '../config/schema.js';
import type { CatalogSettings, RepoLayout } from '../types/repo.js';
import { dirExists } from '../utils/fs.js';
import { readPlist } from './plist.js';
import { RepoNotFoundError, errorMessage } from './errors.js';

// ── Directory constants ─────────────────────────────────────────────

const PKGS_DIR = 'pkgs';
const PKGSINFO_DIR = 'pkgsinfo';
const MANIFESTS_DIR = 'manifests';
const CATALOGS_DIR = 'catalogs';
const ALL_CATALOG = 'all';

// ── Path resolution ─────────────────────────────────────────────────

export function repoLayout(root: string): RepoLayout {
  const abs = resolve(root);
  return {
    root: abs,
    pkgs: join(abs, PKGS_DIR),
    pkgsinfo: join(abs, PKGSINFO_DIR),
    manifests: join(abs, MANIFESTS_DIR),
    catalogs: join(abs, CATALOGS_DIR),
  };
}

/**
 * Picks the repository root from, in order: the explicit option, the
 * environment, the settings file.
 */
export function resolveRepoRoot(
  option: string | undefined,
  settings: Settings,
): string {
  const root = option ?? process.env[envVar('REPO')] ?? settings.repo_path;
  if (!root) {
    throw new RepoNotFoundError(
      `No repository configured. Pass --repo, set ${envVar('REPO')}, or run \`config set repo_path <path>\`.`,
    );
  }
  if (!dirExists(root)) {
    throw new RepoNotFoundError(`Repository not found: ${root}`);
  }
  return root;
}

export function catalogSettings(settings: Settings): CatalogSettings {
  return {
    production: settings.production_catalog,
    testing: settings.testing_catalogs,
  };
}

/** Installer path for a pkginfo `installer_item_location`. */
export function installerPath(layout: RepoLayout, location: string): string {
  return join(layout.pkgs, normalizeLocation(location));
}

export function normalizeLocation(location: string): string {
  return location.replace(/\\/g, '/').replace(/^\/+/, '').replace(/\/+$/, '');
}

/**
 * Installer path for a location, or null when the location is empty or
 * leaves the installer store.
 */
export function installerPathWithin(layout: RepoLayout, location: string): string | null {
  const normalized = normalizeLocation(location);
  if (normalized === '') return null;
  const path = installerPath(layout, normalized);
  const rel = relative(layout.pkgs, path);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;
  return path;
}

/**
 * A repo on a network share that is not mounted still looks like an
 * empty directory; the `all` catalog is the cheapest proof it is there.
 */
export function assertRepoMounted(layout: RepoLayout): void {
  const allPath = join(layout.catalogs, ALL_CATALOG);
  try {
    readPlist(allPath);
  } catch (err) {
    throw new RepoNotFoundError(
      `Cannot read ${allPath} (${errorMessage(err)}). Please mount your repository and try again.`,
    );
  }
}

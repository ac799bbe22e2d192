import { RemovalListSchema } from '../config/schema.js';
import type { Descriptor, DescriptorCache, RemovalList, RepoLayout } from '../types/repo.js';
import { readPlist, writePlist, type PlistValue } from './plist.js';
import { installerPathWithin } from './repo.js';
import { RemovalListError, describeIssues, errorMessage } from './errors.js';

/** Category value that selects pkginfos without a category. */
export const NO_CATEGORY = '*NO CATEGORY*';

export type RemovalSelection =
  | { kind: 'category'; categories: string[] }
  | { kind: 'name'; names: string[] }
  | { kind: 'list'; paths: string[] };

export interface RemovalPlan {
  /** Pkginfo files to remove, sorted. */
  descriptorPaths: string[];
  /** Installer files to remove, sorted. */
  installerPaths: string[];
  /** Product names with no surviving pkginfo, to strip from manifests. */
  namesToRemove: string[];
  warnings: string[];
}

// ── Removal list files ──────────────────────────────────────────────

export function parseRemovalList(path: string, data: PlistValue): RemovalList {
  const result = RemovalListSchema.safeParse(data);
  if (!result.success) {
    throw new RemovalListError(path, describeIssues(result.error));
  }
  return result.data;
}

export function loadRemovalList(path: string): RemovalList {
  let data: PlistValue;
  try {
    data = readPlist(path);
  } catch (err) {
    throw new RemovalListError(path, errorMessage(err));
  }
  return parseRemovalList(path, data);
}

export function writeRemovalList(path: string, paths: string[]): void {
  writePlist(path, { removals: paths.map((p) => ({ path: p })) });
}

// ── Planning ────────────────────────────────────────────────────────

function matches(selection: RemovalSelection, d: Descriptor): boolean {
  switch (selection.kind) {
    case 'category':
      return selection.categories.some((c) =>
        c === NO_CATEGORY ? d.category === undefined : d.category === c,
      );
    case 'name':
      return selection.names.includes(d.name);
    case 'list':
      return selection.paths.includes(d.path);
  }
}

/**
 * Names to strip from manifests: those of the removed pkginfos that no
 * surviving pkginfo still carries.
 */
export function namesToRemove(
  removals: ReadonlySet<string>,
  descriptors: Map<string, Descriptor>,
): Set<string> {
  const removalNames = new Set<string>();
  const remainingNames = new Set<string>();
  for (const [path, d] of descriptors) {
    if (removals.has(path)) {
      removalNames.add(d.name);
    } else {
      remainingNames.add(d.name);
    }
  }
  return new Set([...removalNames].filter((name) => !remainingNames.has(name)));
}

/**
 * Turns the selections into concrete files. List entries that are no
 * longer in the cache are dropped, so replaying a list is harmless.
 */
export function planRemoval(
  selections: RemovalSelection[],
  cache: DescriptorCache,
  layout: RepoLayout,
): RemovalPlan {
  const descriptorPaths = new Set<string>();
  const installerPaths = new Set<string>();
  const warnings: string[] = [];

  for (const d of cache.descriptors.values()) {
    if (!selections.some((s) => matches(s, d))) continue;
    descriptorPaths.add(d.path);
    if (d.installer_item_location === undefined) continue;
    const pkg = installerPathWithin(layout, d.installer_item_location);
    if (pkg === null) {
      warnings.push(
        `Pkginfo '${d.path}' has installer_item_location '${d.installer_item_location}', which is not a path inside ${layout.pkgs}. Its installer will not be removed.`,
      );
    } else {
      installerPaths.add(pkg);
    }
  }

  for (const d of cache.descriptors.values()) {
    if (descriptorPaths.has(d.path) || !d.installer_item_location) continue;
    const pkg = installerPathWithin(layout, d.installer_item_location);
    if (pkg !== null && installerPaths.has(pkg)) {
      warnings.push(
        `Package '${pkg}' is targeted for removal, but is referenced by pkginfo '${d.path}' which is not targeted for removal.`,
      );
    }
  }

  return {
    descriptorPaths: [...descriptorPaths].sort(),
    installerPaths: [...installerPaths].sort(),
    namesToRemove: [...namesToRemove(descriptorPaths, cache.descriptors)].sort(),
    warnings: warnings.sort(),
  };
}

export function isEmptyPlan(plan: RemovalPlan): boolean {
  return plan.descriptorPaths.length === 0 && plan.installerPaths.length === 0;
}

import type { Descriptor, UsageItem } from '../types/repo.js';
import { descriptorNames, groupByName, inCatalogs } from './cache.js';
import { normalizeLocation } from './repo.js';
import { compareLooseVersions } from './version.js';

export interface ResolveOptions {
  /** Only descriptors in one of these catalogs take part in expansion. */
  catalogs?: readonly string[];
  /** Newest distinct versions kept per name; all when omitted. */
  keep?: number;
}

/**
 * Maps a reference to a known product name. References may carry a
 * version: `name-1.0` or `name--1.0`. Returns null when nothing matches.
 */
export function referencedName(ref: string, known: ReadonlySet<string>): string | null {
  if (known.has(ref)) return ref;
  for (const separator of ['--', '-']) {
    const idx = ref.lastIndexOf(separator);
    if (idx > 0) {
      const candidate = ref.slice(0, idx);
      if (known.has(candidate)) return candidate;
    }
  }
  return null;
}

function eligible(all: Descriptor[], catalogs: readonly string[] | undefined): Descriptor[] {
  return catalogs ? all.filter((d) => inCatalogs(d, catalogs)) : all;
}

/**
 * Closure of product names reachable from `seeds` through `requires`
 * (forward) and `update_for` (reverse). Worklist over names; every name
 * is expanded once, so the walk ends after at most one pass per name.
 */
export function resolveUsedNames(
  descriptors: Iterable<Descriptor>,
  seeds: Iterable<string>,
  options: Pick<ResolveOptions, 'catalogs'> = {},
): Set<string> {
  const all = [...descriptors];
  const known = descriptorNames(all);
  const candidates = eligible(all, options.catalogs);
  const byName = groupByName(candidates);

  const updatesFor = new Map<string, Descriptor[]>();
  for (const d of candidates) {
    for (const target of d.update_for ?? []) {
      const name = referencedName(target, known);
      if (name === null) continue;
      const list = updatesFor.get(name);
      if (list) {
        list.push(d);
      } else {
        updatesFor.set(name, [d]);
      }
    }
  }

  const used = new Set<string>();
  const queue: string[] = [];
  const visit = (ref: string): void => {
    const name = referencedName(ref, known);
    if (name === null || used.has(name)) return;
    used.add(name);
    queue.push(name);
  };

  for (const seed of seeds) visit(seed);

  for (let i = 0; i < queue.length; i++) {
    const name = queue[i];
    for (const d of byName.get(name) ?? []) {
      for (const req of d.requires ?? []) visit(req);
    }
    for (const update of updatesFor.get(name) ?? []) {
      visit(update.name);
    }
  }
  return used;
}

export function toUsageItem(d: Descriptor): UsageItem {
  return {
    name: d.name,
    version: d.version,
    descriptorPath: d.path,
    installerLocation: d.installer_item_location
      ? normalizeLocation(d.installer_item_location)
      : null,
    size: d.installer_item_size ?? null,
  };
}

/** Newest first; ties broken by path so the order is stable. */
export function sortByVersionDesc(list: Descriptor[]): Descriptor[] {
  return [...list].sort(
    (a, b) =>
      compareLooseVersions(b.version, a.version) ||
      (a.path < b.path ? -1 : a.path > b.path ? 1 : 0),
  );
}

function newestVersions(list: Descriptor[], keep: number): Descriptor[] {
  const kept: Descriptor[] = [];
  let distinct = 0;
  let last: string | null = null;
  for (const d of sortByVersionDesc(list)) {
    if (last === null || compareLooseVersions(d.version, last) !== 0) {
      distinct++;
      last = d.version;
    }
    if (distinct > keep) break;
    kept.push(d);
  }
  return kept;
}

/**
 * Descriptors in use: every descriptor of a used name that passes the
 * catalog filter, limited to the `keep` newest versions of each name.
 */
export function resolveUsage(
  descriptors: Iterable<Descriptor>,
  seeds: Iterable<string>,
  options: ResolveOptions = {},
): UsageItem[] {
  const all = [...descriptors];
  const used = resolveUsedNames(all, seeds, options);
  const groups = groupByName(eligible(all, options.catalogs));
  const keep = options.keep ?? Infinity;

  const items: UsageItem[] = [];
  for (const name of used) {
    const versions = groups.get(name) ?? [];
    const kept = Number.isFinite(keep) ? newestVersions(versions, keep) : versions;
    items.push(...kept.map(toUsageItem));
  }
  return items;
}

/** Items of `a` whose descriptor is not in `b`. */
export function usageDifference(a: UsageItem[], b: UsageItem[]): UsageItem[] {
  const keepPaths = new Set(b.map((item) => item.descriptorPath));
  return a.filter((item) => !keepPaths.has(item.descriptorPath));
}

/**
 * Used items in `catalogs` that are not among the `keep` newest
 * versions of their product.
 */
export function findOutOfDate(
  descriptors: Iterable<Descriptor>,
  seeds: Iterable<string>,
  catalogs: readonly string[],
  keep: number,
): UsageItem[] {
  const all = [...descriptors];
  const seedList = [...seeds];
  const used = resolveUsage(all, seedList, { catalogs });
  const current = resolveUsage(all, seedList, { catalogs, keep });
  return usageDifference(used, current);
}

/** Every descriptor outside the usage closure. */
export function findUnused(
  descriptors: Iterable<Descriptor>,
  seeds: Iterable<string>,
): UsageItem[] {
  const all = [...descriptors];
  return usageDifference(all.map(toUsageItem), resolveUsage(all, seeds));
}

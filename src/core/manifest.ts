import { ManifestSchema, REFERENCE_KEYS } from '../config/schema.js';
import type { ConditionalItem, Manifest, ManifestStore, RepoLayout } from '../types/repo.js';
import { walkFiles } from '../utils/fs.js';
import {
  isPlistArray,
  isPlistObject,
  readPlist,
  type PlistObject,
  type PlistValue,
} from './plist.js';
import { describeIssues, errorMessage } from './errors.js';

// ── Loading ─────────────────────────────────────────────────────────

export function listManifestFiles(layout: RepoLayout): string[] {
  return walkFiles(layout.manifests);
}

export function parseManifest(data: PlistValue): Manifest {
  const result = ManifestSchema.safeParse(data);
  if (!result.success) {
    throw new Error(describeIssues(result.error));
  }
  return result.data;
}

export function loadManifests(layout: RepoLayout): ManifestStore {
  const manifests = new Map<string, Manifest>();
  const errors = new Map<string, string>();
  for (const path of listManifestFiles(layout)) {
    try {
      manifests.set(path, parseManifest(readPlist(path)));
    } catch (err) {
      errors.set(path, errorMessage(err));
    }
  }
  return { manifests, errors };
}

// ── References ──────────────────────────────────────────────────────

function addSectionReferences(section: ConditionalItem, into: Set<string>): void {
  for (const key of REFERENCE_KEYS) {
    for (const item of section[key] ?? []) into.add(item);
  }
}

/**
 * Every name a manifest points at: the four reference lists at the top
 * level and inside each `conditional_items` entry.
 */
export function collectManifestReferences(manifests: Iterable<Manifest>): Set<string> {
  const refs = new Set<string>();
  for (const manifest of manifests) {
    addSectionReferences(manifest, refs);
    for (const conditional of manifest.conditional_items ?? []) {
      addSectionReferences(conditional, refs);
    }
  }
  return refs;
}

// ── Name stripping ──────────────────────────────────────────────────

export interface ReferenceChange {
  /** Dotted location of the list, e.g. `conditional_items[0].managed_installs`. */
  key: string;
  item: string;
}

export interface StripResult {
  value: PlistObject;
  removed: ReferenceChange[];
  /** Items left in place that look like versions of a removed name. */
  similar: ReferenceChange[];
}

/**
 * True for an item that is not one of `names` but starts with one of
 * them and ends with none, e.g. `Foo-1.0` or `FooBar` when `Foo` goes.
 */
export function isSimilarName(item: string, names: ReadonlySet<string>): boolean {
  if (names.has(item)) return false;
  let prefixed = false;
  for (const name of names) {
    if (item.endsWith(name)) return false;
    if (item.startsWith(name)) prefixed = true;
  }
  return prefixed;
}

/**
 * Returns a copy of a manifest (or conditional section) without the
 * exact matches of `names`. The input is never mutated; when nothing
 * matches, `value` is the input itself.
 */
export function stripReferences(
  section: PlistObject,
  names: ReadonlySet<string>,
  prefix = '',
): StripResult {
  const removed: ReferenceChange[] = [];
  const similar: ReferenceChange[] = [];
  const patch: Record<string, PlistValue> = {};

  for (const key of REFERENCE_KEYS) {
    const list = section[key];
    if (!isPlistArray(list)) continue;
    const label = prefix + key;

    const drop = new Set<number>();
    list.forEach((item, index) => {
      if (typeof item !== 'string') return;
      if (names.has(item)) {
        drop.add(index);
        removed.push({ key: label, item });
      } else if (isSimilarName(item, names)) {
        similar.push({ key: label, item });
      }
    });
    if (drop.size > 0) {
      patch[key] = list.filter((_, index) => !drop.has(index));
    }
  }

  const conditionals = section.conditional_items;
  if (isPlistArray(conditionals)) {
    let changed = false;
    const next = conditionals.map((entry, index) => {
      if (!isPlistObject(entry)) return entry;
      const nested = stripReferences(entry, names, `${prefix}conditional_items[${index}].`);
      removed.push(...nested.removed);
      similar.push(...nested.similar);
      if (nested.removed.length > 0) changed = true;
      return nested.value;
    });
    if (changed) patch.conditional_items = next;
  }

  const value = Object.keys(patch).length > 0 ? { ...section, ...patch } : section;
  return { value, removed, similar };
}

import { PkginfoSchema } from '../config/schema.js';
import type { Descriptor, DescriptorCache, RepoLayout } from '../types/repo.js';
import { walkFiles } from '../utils/fs.js';
import { parsePlist, readPlist, type PlistValue } from './plist.js';
import { describeIssues, errorMessage } from './errors.js';

export type ParseOutcome =
  | { ok: true; descriptor: Descriptor }
  | { ok: false; error: string };

export function toDescriptor(path: string, data: PlistValue): ParseOutcome {
  const result = PkginfoSchema.safeParse(data);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  return { ok: true, descriptor: { ...result.data, path } };
}

export function parseDescriptor(path: string, raw: string): ParseOutcome {
  let data: PlistValue;
  try {
    data = parsePlist(raw);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
  return toDescriptor(path, data);
}

/**
 * Reads every pkginfo file under the repository. Files that fail to
 * parse are recorded in `errors` and left out of `descriptors`.
 */
export function loadDescriptorCache(layout: RepoLayout): DescriptorCache {
  const descriptors = new Map<string, Descriptor>();
  const errors = new Map<string, string>();

  for (const path of walkFiles(layout.pkgsinfo)) {
    let data: PlistValue;
    try {
      data = readPlist(path);
    } catch (err) {
      errors.set(path, errorMessage(err));
      continue;
    }
    const outcome = toDescriptor(path, data);
    if (outcome.ok) {
      descriptors.set(path, outcome.descriptor);
    } else {
      errors.set(path, outcome.error);
    }
  }
  return { descriptors, errors };
}

export function descriptorNames(descriptors: Iterable<Descriptor>): Set<string> {
  const names = new Set<string>();
  for (const d of descriptors) names.add(d.name);
  return names;
}

export function groupByName(descriptors: Iterable<Descriptor>): Map<string, Descriptor[]> {
  const groups = new Map<string, Descriptor[]>();
  for (const d of descriptors) {
    const list = groups.get(d.name);
    if (list) {
      list.push(d);
    } else {
      groups.set(d.name, [d]);
    }
  }
  return groups;
}

export function inCatalogs(descriptor: Descriptor, catalogs: readonly string[]): boolean {
  return descriptor.catalogs.some((c) => catalogs.includes(c));
}

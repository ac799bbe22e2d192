import type { UsageItem } from '../../types/repo.js';
import type { Finding, RepoSnapshot, ReportDefinition, ReportFindings } from '../../types/report.js';
import { findOutOfDate, findUnused } from '../usage.js';
import { gigabytes, humanSize } from './format.js';

function toFinding(item: UsageItem): Finding {
  return {
    name: item.name,
    version: item.version,
    path: item.descriptorPath,
    size: humanSize(item.size),
  };
}

export function outOfDateItems(snapshot: RepoSnapshot): UsageItem[] {
  return findOutOfDate(
    snapshot.cache.descriptors.values(),
    snapshot.references,
    [snapshot.catalogs.production],
    snapshot.keep,
  );
}

export function unusedItems(snapshot: RepoSnapshot): UsageItem[] {
  return findUnused(snapshot.cache.descriptors.values(), snapshot.references);
}

export const outOfDateReport: ReportDefinition = {
  id: 'out-of-date',
  title: 'Out of Date Items Report',
  description:
    'Items in the production catalog that are not among the current release ' +
    'versions. Items needed by a current release through `requires` or ' +
    '`update_for` count as current. Items outside production are not considered.',
  sortKeys: [
    { key: 'name', reverse: false },
    { key: 'version', reverse: true },
  ],
  itemsOrder: ['name', 'path'],
  collect(snapshot) {
    return { items: outOfDateItems(snapshot).map(toFinding), metadata: [] };
  },
};

export const unusedReport: ReportDefinition = {
  id: 'unused',
  title: 'Unused Item Report',
  description:
    'Items not used by any manifest, not required by any item in use ' +
    '(`requires`) and not an update for any item in use (`update_for`).',
  sortKeys: [
    { key: 'name', reverse: false },
    { key: 'version', reverse: true },
  ],
  itemsOrder: ['name', 'path'],
  collect(snapshot) {
    return { items: unusedItems(snapshot).map(toFinding), metadata: [] };
  },
};

export const unusedDiskUsageReport: ReportDefinition = {
  id: 'unused-disk-usage',
  title: 'Unused / Out Of Date Item Disk Usage',
  description: 'Installer space taken by the items of the unused and out of date reports.',
  sortKeys: [],
  itemsOrder: [],
  collect(snapshot): ReportFindings {
    const sizes = new Map<string, number>();
    for (const item of [...unusedItems(snapshot), ...outOfDateItems(snapshot)]) {
      sizes.set(item.descriptorPath, item.size ?? 0);
    }
    let total = 0;
    for (const size of sizes.values()) total += size;
    return {
      items: [],
      metadata: [
        { 'Unused files account for': gigabytes(total) },
        { 'Items counted': sizes.size },
      ],
    };
  },
};

import type { Finding, ReportDefinition } from '../../types/report.js';
import { findOrphans, matchLocation } from '../installers.js';
import { installerPath, normalizeLocation } from '../repo.js';

export const pathIssuesReport: ReportDefinition = {
  id: 'path-issues',
  title: 'Case-Sensitive Path Issues Report',
  description:
    'Items whose installer_item_location only resolves when case is ignored. ' +
    'Such paths work on the case-insensitive filesystems macOS uses by default ' +
    'but break when the repository is served from a case-sensitive one.',
  sortKeys: [{ key: 'name', reverse: false }],
  itemsOrder: ['name', 'path'],
  collect({ cache, installers }) {
    const items: Finding[] = [];
    for (const [path, d] of cache.descriptors) {
      if (!d.installer_item_location) continue;
      const match = matchLocation(installers, d.installer_item_location);
      if (match.status === 'case-mismatch') {
        items.push({ name: d.name, path, bad_path_component: match.component });
      }
    }
    return { items, metadata: [] };
  },
};

export const missingInstallersReport: ReportDefinition = {
  id: 'missing-installers',
  title: 'Missing Installer Report',
  description: 'Items whose installer_item_location points at a nonexistent installer.',
  sortKeys: [{ key: 'name', reverse: false }],
  itemsOrder: ['name', 'path'],
  collect({ cache, installers, layout }) {
    const items: Finding[] = [];
    for (const [path, d] of cache.descriptors) {
      if (!d.installer_item_location) continue;
      if (matchLocation(installers, d.installer_item_location).status === 'missing') {
        items.push({
          name: d.name,
          path,
          missing_installer: installerPath(layout, d.installer_item_location),
        });
      }
    }
    return { items, metadata: [] };
  },
};

export const orphanedInstallersReport: ReportDefinition = {
  id: 'orphaned-installers',
  title: 'Orphaned Installer Report',
  description: 'Installers present in the repository that no pkginfo file references.',
  sortKeys: [{ key: 'path', reverse: false }],
  itemsOrder: ['path'],
  collect({ cache, installers }) {
    const referenced = new Set<string>();
    for (const d of cache.descriptors.values()) {
      if (d.installer_item_location) {
        referenced.add(normalizeLocation(d.installer_item_location));
      }
    }
    const items = findOrphans(installers, referenced).map((item) => ({
      path: item.absPath,
      kind: item.kind,
    }));
    return { items, metadata: [] };
  },
};

import type { CatalogSettings, RepoLayout } from '../types/repo.js';
import type { RepoSnapshot } from '../types/report.js';
import { loadDescriptorCache } from './cache.js';
import { collectManifestReferences, loadManifests } from './manifest.js';
import { buildInstallerIndex } from './installers.js';

export interface SnapshotOptions {
  catalogs: CatalogSettings;
  keep: number;
}

export function loadSnapshot(layout: RepoLayout, options: SnapshotOptions): RepoSnapshot {
  const cache = loadDescriptorCache(layout);
  const manifests = loadManifests(layout);
  return {
    layout,
    cache,
    manifests,
    installers: buildInstallerIndex(layout.pkgs),
    references: collectManifestReferences(manifests.manifests.values()),
    catalogs: options.catalogs,
    keep: options.keep,
  };
}

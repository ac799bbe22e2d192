import type {
  CatalogSettings,
  DescriptorCache,
  InstallerIndex,
  ManifestStore,
  RepoLayout,
} from './repo.js';

export const REPORT_IDS = [
  'path-issues',
  'missing-installers',
  'orphaned-installers',
  'pkginfo-errors',
  'manifest-errors',
  'out-of-date',
  'unused',
  'unused-disk-usage',
  'unattended-testing',
  'attended-production',
  'force-install-testing',
  'force-install-production',
] as const;

export type ReportId = (typeof REPORT_IDS)[number];

export type FindingValue = string | number;
export type Finding = Record<string, FindingValue>;

export interface SortKey {
  key: string;
  reverse: boolean;
}

/** Everything a report may look at; loaded once per run. */
export interface RepoSnapshot {
  layout: RepoLayout;
  cache: DescriptorCache;
  manifests: ManifestStore;
  installers: InstallerIndex;
  /** Names referenced by any manifest, conditionals included. */
  references: Set<string>;
  catalogs: CatalogSettings;
  keep: number;
}

export interface ReportFindings {
  items: Finding[];
  metadata: Finding[];
}

export interface ReportDefinition {
  id: ReportId;
  title: string;
  description: string;
  sortKeys: SortKey[];
  /** Keys printed first, in this order; the rest follow as found. */
  itemsOrder: string[];
  collect(snapshot: RepoSnapshot): ReportFindings;
}

export interface ReportResult extends ReportFindings {
  id: ReportId;
  title: string;
  description: string;
  itemsOrder: string[];
}

import type { z } from 'zod';
import type {
  PkginfoSchema,
  ManifestSchema,
  ConditionalItemSchema,
  RemovalListSchema,
} from '../config/schema.js';

export type PkginfoRecord = z.infer<typeof PkginfoSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
export type ConditionalItem = z.infer<typeof ConditionalItemSchema>;
export type RemovalList = z.infer<typeof RemovalListSchema>;

/** A pkginfo record together with the file it was read from. */
export interface Descriptor extends PkginfoRecord {
  path: string;
}

export interface RepoLayout {
  root: string;
  pkgs: string;
  pkgsinfo: string;
  manifests: string;
  catalogs: string;
}

export interface CatalogSettings {
  production: string;
  testing: string[];
}

export interface DescriptorCache {
  /** Keyed by absolute pkginfo path. */
  descriptors: Map<string, Descriptor>;
  /** Pkginfo files that could not be parsed, path → message. */
  errors: Map<string, string>;
}

export interface ManifestStore {
  manifests: Map<string, Manifest>;
  errors: Map<string, string>;
}

export type InstallerKind = 'file' | 'bundle';

export interface InstallerEntry {
  /** Path relative to the pkgs directory, '/'-separated. */
  relPath: string;
  absPath: string;
  kind: InstallerKind;
}

export interface InstallerIndex {
  root: string;
  items: InstallerEntry[];
  /** Directory (relative, '' for the root) → names of its entries. */
  listings: Map<string, Set<string>>;
}

export interface UsageItem {
  name: string;
  version: string;
  descriptorPath: string;
  /** `installer_item_location`, normalised; null when there is none. */
  installerLocation: string | null;
  /** Installer size in kilobytes, as pkginfo records it. */
  size: number | null;
}

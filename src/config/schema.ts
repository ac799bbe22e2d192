import { z } from 'zod';

// ── Settings ────────────────────────────────────────────────────────

const commaList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

export const SettingsSchema = z.object({
  repo_path: z.string().min(1).optional(),
  production_catalog: z.string().min(1).default('production'),
  testing_catalogs: commaList.default('testing'),
  keep_versions: z.coerce.number().int().positive().default(1),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ── Pkginfo (descriptor) ────────────────────────────────────────────

export const PkginfoSchema = z.object({
  name: z.string().min(1),
  version: z.string(),
  display_name: z.string().optional(),
  category: z.string().optional(),
  catalogs: z.array(z.string()).default([]),
  installer_item_location: z.string().optional(),
  installer_item_size: z.number().nonnegative().optional(),
  requires: z.array(z.string()).optional(),
  update_for: z.array(z.string()).optional(),
  force_install_after_date: z.union([z.date(), z.string()]).optional(),
  unattended_install: z.boolean().optional(),
});

// ── Manifests ───────────────────────────────────────────────────────

export const REFERENCE_KEYS = [
  'managed_installs',
  'managed_uninstalls',
  'optional_installs',
  'managed_updates',
] as const;

export type ReferenceKey = (typeof REFERENCE_KEYS)[number];

const referenceList = z.array(z.string()).optional();

const ReferenceFields = {
  managed_installs: referenceList,
  managed_uninstalls: referenceList,
  optional_installs: referenceList,
  managed_updates: referenceList,
};

export const ConditionalItemSchema = z.object({
  condition: z.string().optional(),
  ...ReferenceFields,
});

export const ManifestSchema = z.object({
  catalogs: z.array(z.string()).optional(),
  included_manifests: z.array(z.string()).optional(),
  ...ReferenceFields,
  conditional_items: z.array(ConditionalItemSchema).optional(),
});

// ── Removal list ────────────────────────────────────────────────────

export const RemovalListSchema = z.object({
  removals: z.array(z.object({ path: z.string().min(1) })).default([]),
});

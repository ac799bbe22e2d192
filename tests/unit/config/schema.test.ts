import { describe, it, expect } from 'vitest';
import { ManifestSchema, PkginfoSchema, SettingsSchema } from '../../../src/config/schema.js';

describe('SettingsSchema', () => {
  it('applies defaults', () => {
    expect(SettingsSchema.parse({})).toEqual({
      production_catalog: 'production',
      testing_catalogs: ['testing'],
      keep_versions: 1,
    });
  });

  it('coerces values stored as strings', () => {
    const settings = SettingsSchema.parse({ keep_versions: '3', testing_catalogs: 'dev,,qa ' });
    expect(settings.keep_versions).toBe(3);
    expect(settings.testing_catalogs).toEqual(['dev', 'qa']);
  });

  it('rejects a keep count below one', () => {
    expect(SettingsSchema.safeParse({ keep_versions: '0' }).success).toBe(false);
  });
});

describe('PkginfoSchema', () => {
  it('requires a name and version', () => {
    expect(PkginfoSchema.safeParse({ version: '1.0' }).success).toBe(false);
    expect(PkginfoSchema.safeParse({ name: 'A' }).success).toBe(false);
  });

  it('defaults catalogs to an empty list', () => {
    expect(PkginfoSchema.parse({ name: 'A', version: '1.0' }).catalogs).toEqual([]);
  });
});

describe('ManifestSchema', () => {
  it('rejects non-string references', () => {
    expect(ManifestSchema.safeParse({ managed_installs: ['A', 2] }).success).toBe(false);
    expect(
      ManifestSchema.safeParse({ conditional_items: [{ condition: 'x', managed_updates: ['B'] }] }).success,
    ).toBe(true);
  });
});

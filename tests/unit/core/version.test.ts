import { describe, it, expect } from 'vitest';
import { compareLooseVersions, parseLooseVersion } from '../../../src/core/version.js';

describe('parseLooseVersion', () => {
  it('splits numeric and alphabetic runs', () => {
    expect(parseLooseVersion('1.10b2')).toEqual([1, 10, 'b', 2]);
    expect(parseLooseVersion('2024.01-rc')).toEqual([2024, 1, 'rc']);
  });

  it('returns no parts for an empty version', () => {
    expect(parseLooseVersion('')).toEqual([]);
  });
});

describe('compareLooseVersions', () => {
  it('compares numeric components numerically', () => {
    expect(compareLooseVersions('1.10', '1.9')).toBe(1);
    expect(compareLooseVersions('2.0', '10.0')).toBe(-1);
    expect(compareLooseVersions('1.0', '1.0')).toBe(0);
  });

  it('orders a prefix before its extension', () => {
    expect(compareLooseVersions('1.0', '1.0.1')).toBe(-1);
    expect(compareLooseVersions('1.0b1', '1.0')).toBe(1);
  });

  it('compares words lexically and after numbers', () => {
    expect(compareLooseVersions('1.0a', '1.0b')).toBe(-1);
    expect(compareLooseVersions('1.2', '1.b')).toBe(-1);
  });

  it('sorts a list ascending', () => {
    expect(['1.10', '1.9', '1.2.1'].sort(compareLooseVersions)).toEqual(['1.2.1', '1.9', '1.10']);
  });
});

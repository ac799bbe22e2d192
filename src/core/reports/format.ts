import type { Finding, FindingValue, SortKey } from '../../types/report.js';
import { compareLooseVersions } from '../version.js';

const SIZE_UNITS = ['KB', 'MB', 'GB', 'TB'];

/** Formats a pkginfo size, which is recorded in kilobytes. */
export function humanSize(kilobytes: number | null): string {
  if (kilobytes === null) return '';
  let value = kilobytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${SIZE_UNITS[unit]}` : `${value.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

export function gigabytes(kilobytes: number): string {
  const gb = kilobytes / 1024 ** 2;
  return `${gb.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })} gigabytes`;
}

function compareValues(key: string, a: FindingValue | undefined, b: FindingValue | undefined): number {
  if (a === undefined || b === undefined) {
    return a === b ? 0 : a === undefined ? -1 : 1;
  }
  if (key === 'version') return compareLooseVersions(String(a), String(b));
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Sorts by each key in turn; `version` keys use loose version order. */
export function sortFindings(items: Finding[], keys: SortKey[]): Finding[] {
  if (keys.length === 0) return [...items];
  return [...items].sort((a, b) => {
    for (const { key, reverse } of keys) {
      const cmp = compareValues(key, a[key], b[key]);
      if (cmp !== 0) return reverse ? -cmp : cmp;
    }
    return 0;
  });
}

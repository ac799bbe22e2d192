type VersionPart = number | string;

const COMPONENT = /\d+|[a-zA-Z]+/g;

/**
 * Splits a version string into numeric and alphabetic runs; every other
 * character is a separator. `"1.10b2"` → `[1, 10, "b", 2]`.
 */
export function parseLooseVersion(version: string): VersionPart[] {
  const parts = version.match(COMPONENT) ?? [];
  return parts.map((p) => (/^\d+$/.test(p) ? Number(p) : p));
}

function comparePart(a: VersionPart, b: VersionPart): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  // Numbers order before words: 1.0 < 1.0b
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareLooseVersions(a: string, b: string): number {
  const left = parseLooseVersion(a);
  const right = parseLooseVersion(b);
  const len = Math.min(left.length, right.length);
  for (let i = 0; i < len; i++) {
    const cmp = comparePart(left[i], right[i]);
    if (cmp !== 0) return Math.sign(cmp);
  }
  return Math.sign(left.length - right.length);
}

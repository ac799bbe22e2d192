import { readFileSync, writeFileSync } from 'node:fs';
import plist, { type PlistArray, type PlistObject, type PlistValue } from 'plist';

export type { PlistArray, PlistObject, PlistValue };

export function parsePlist(raw: string): PlistValue {
  return plist.parse(raw);
}

export function readPlist(path: string): PlistValue {
  return parsePlist(readFileSync(path, 'utf-8'));
}

export function writePlist(path: string, value: PlistValue): void {
  writeFileSync(path, plist.build(value), 'utf-8');
}

export function toPlistString(value: PlistValue): string {
  return plist.build(value);
}

export function isPlistArray(value: PlistValue): value is PlistArray {
  return Array.isArray(value);
}

export function isPlistObject(value: PlistValue): value is PlistObject {
  return (
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !Buffer.isBuffer(value)
  );
}

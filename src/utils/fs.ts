import {
  mkdirSync,
  readdirSync,
  renameSync,
  cpSync,
  rmSync,
  statSync,
} from 'node:fs';
import { join } from 'node:path';

export function isHidden(name: string): boolean {
  return name.startsWith('.');
}

/** Every non-hidden file below `root`, as absolute paths in walk order. */
export function walkFiles(root: string): string[] {
  const results: string[] = [];
  walk(root, results);
  return results;
}

function walk(dir: string, results: string[]): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    if (isHidden(entry.name)) continue;
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(path, results);
    } else if (entry.isFile()) {
      results.push(path);
    }
  }
}

export function ensureDir(path: string, mode?: number): void {
  mkdirSync(path, { recursive: true, mode });
}

/**
 * Moves a file or directory. Falls back to copy and delete when the
 * destination is on another device.
 */
export function movePath(src: string, dest: string): void {
  try {
    renameSync(src, dest);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'EXDEV') throw err;
    cpSync(src, dest, { recursive: true, preserveTimestamps: true });
    rmSync(src, { recursive: true });
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function dirExists(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

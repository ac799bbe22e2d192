import type { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { APP_NAME } from '../config/branding.js';

// Same relative location from src/commands and dist/commands.
const PACKAGE_JSON = new URL('../../package.json', import.meta.url);

export function currentVersion(): string {
  try {
    const data: unknown = JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8'));
    if (typeof data === 'object' && data !== null && 'version' in data && typeof data.version === 'string') {
      return data.version;
    }
  } catch {
    // Fall through to the development marker
  }
  return 'dev';
}

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Print version information')
    .option('--short', 'Print version number only')
    .option('--json', 'Print version info as JSON')
    .action((opts: { short?: boolean; json?: boolean }) => {
      const version = currentVersion();

      if (opts.short) {
        console.log(version);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify({ name: APP_NAME, version, node: process.version }, null, 2));
        return;
      }

      console.log(`${APP_NAME} version ${version} (node ${process.version})`);
    });
}

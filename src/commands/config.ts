import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { printTable } from '../ui/table.js';
import { fail } from '../ui/output.js';

const KNOWN_KEYS = ['repo_path', 'production_catalog', 'testing_catalogs', 'keep_versions'];

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage user settings');

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', `Config key (${KNOWN_KEYS.join(', ')})`)
    .argument('<value>', 'Config value')
    .action((key: string, value: string) => {
      settings.init();
      settings.set(key, value);
      try {
        settings.resolved();
      } catch (err) {
        fail(`Saved, but the settings are now invalid: ${String(err)}`);
        process.exit(1);
      }
      console.log(`Set ${key} = ${value}`);
    });

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string) => {
      settings.init();
      const value = settings.get(key);
      if (value) {
        console.log(value);
      }
    });

  cmd
    .command('list')
    .description('Show effective settings, defaults included')
    .action(() => {
      settings.init();
      const effective = settings.resolved();
      printTable(
        ['Key', 'Value'],
        Object.entries(effective).map(([k, v]) => [k, Array.isArray(v) ? v.join(',') : String(v ?? '')]),
      );
    });
}

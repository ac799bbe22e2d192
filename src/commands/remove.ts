import type { Command } from 'commander';
import { resolve } from 'node:path';
import { loadDescriptorCache } from '../core/cache.js';
import {
  isEmptyPlan,
  loadRemovalList,
  planRemoval,
  type RemovalPlan,
  type RemovalSelection,
} from '../core/removal.js';
import { executeRemoval, type RemovalMode, type RemovalResult } from '../core/executor.js';
import { ArchiveDirectoryError } from '../core/errors.js';
import { askConfirm } from '../ui/prompts.js';
import { die, fail, info, ok, printList, warn } from '../ui/output.js';
import { openRepo, type RepoOption } from './shared.js';

interface RemoveOptions extends RepoOption {
  category?: string[];
  name?: string[];
  plist?: string;
  archive?: string;
  yes?: boolean;
}

function selectionsFrom(opts: RemoveOptions): RemovalSelection[] {
  const selections: RemovalSelection[] = [];
  if (opts.category?.length) {
    selections.push({ kind: 'category', categories: opts.category });
  }
  if (opts.name?.length) {
    selections.push({ kind: 'name', names: opts.name });
  }
  if (opts.plist) {
    const list = loadRemovalList(opts.plist);
    selections.push({ kind: 'list', paths: list.removals.map((r) => resolve(r.path)) });
  }
  return selections;
}

function printPlan(plan: RemovalPlan, mode: RemovalMode): void {
  const verb = mode.kind === 'archive' ? `archived to ${mode.root}` : 'removed';
  printList(`Items to be ${verb}:`, [...plan.descriptorPaths, ...plan.installerPaths].sort());
  printList('Items to be removed from manifests:', plan.namesToRemove);
  for (const w of plan.warnings) warn(w);
}

function printResult(result: RemovalResult): void {
  for (const f of result.failures) {
    warn(`Unable to remove ${f.path}: ${f.error}`);
  }
  const { manifests } = result;
  for (const name of manifests.kept) {
    info(`${name} is back in the repository; leaving it in manifests.`);
  }
  for (const change of manifests.changed) {
    for (const r of change.removed) info(`Removed ${r.item} from ${r.key} in ${change.path}`);
  }
  for (const s of manifests.similar) {
    warn(
      `Found ${s.item} in ${s.key} of ${s.path}, which may match a name being removed. Please remove it manually if required.`,
    );
  }
  for (const e of manifests.errors) {
    fail(`Error reading manifest ${e.path}: ${e.error}`);
  }
  const action = result.mode === 'archive' ? 'Archived' : 'Removed';
  ok(`${action} ${result.processed.length} file(s); updated ${manifests.changed.length} manifest(s).`);
}

export function registerRemove(program: Command): void {
  program
    .command('remove')
    .alias('deprecate')
    .description('Remove or archive pkginfos and installers, and drop fully removed products from manifests')
    .option('--repo <path>', 'Repository root')
    .option('-c, --category <categories...>', 'Remove every item in these categories ("*NO CATEGORY*" for none)')
    .option('-n, --name <names...>', 'Remove every version of these products')
    .option('-p, --plist <file>', 'Remove the pkginfos listed in a removal plist')
    .option('--archive <dir>', 'Move files under this directory instead of deleting them')
    .option('-y, --yes', 'Skip confirmation prompt')
    .action(async (opts: RemoveOptions) => {
      try {
        const selections = selectionsFrom(opts);
        if (selections.length === 0) {
          die('Nothing selected. Use --category, --name or --plist.');
        }

        const { layout } = openRepo(opts);
        const mode: RemovalMode = opts.archive
          ? { kind: 'archive', root: resolve(opts.archive) }
          : { kind: 'delete' };

        const plan = planRemoval(selections, loadDescriptorCache(layout), layout);
        if (isEmptyPlan(plan)) {
          info('Nothing to remove.');
          return;
        }
        printPlan(plan, mode);

        if (!opts.yes) {
          const confirmed = await askConfirm('Are you sure you want to continue?', false);
          if (!confirmed) {
            console.log('Cancelled.');
            return;
          }
        }

        printResult(executeRemoval(plan, mode, layout));
      } catch (err) {
        if (err instanceof ArchiveDirectoryError) {
          die(`${err.message}. Quitting.`);
        }
        fail(String(err));
        process.exit(1);
      }
    });
}

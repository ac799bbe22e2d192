import type { Command } from 'commander';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import { assertRepoMounted, catalogSettings } from '../core/repo.js';
import { loadSnapshot } from '../core/snapshot.js';
import { parseReportIds, removablePaths, runReports, toDocument } from '../core/reports/index.js';
import { writeRemovalList } from '../core/removal.js';
import { toPlistString } from '../core/plist.js';
import { REPORT_IDS } from '../types/report.js';
import { renderReport } from '../ui/report.js';
import { withSpinner } from '../ui/spinner.js';
import { ok, fail } from '../ui/output.js';
import { openRepo, type RepoOption } from './shared.js';

const FORMATS = ['text', 'json', 'yaml', 'plist'] as const;
type Format = (typeof FORMATS)[number];

interface ReportOptions extends RepoOption {
  only?: string;
  format: string;
  keep?: string;
  exportRemovals?: string;
}

function parseFormat(s: string): Format {
  const format = FORMATS.find((f) => f === s);
  if (!format) {
    throw new Error(`Unknown format "${s}". Expected one of: ${FORMATS.join(', ')}.`);
  }
  return format;
}

function parseKeep(s: string): number {
  const n = Number(s);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--keep must be a positive integer, got "${s}".`);
  }
  return n;
}

export function registerReport(program: Command): void {
  program
    .command('report')
    .description('Report on unused, out of date and inconsistent repository items')
    .option('--repo <path>', 'Repository root')
    .option('--only <ids>', `Comma-separated reports to run (${REPORT_IDS.join(', ')})`)
    .option('-f, --format <format>', 'Output format: text|json|yaml|plist', 'text')
    .option('--keep <n>', 'Current versions to keep per product (out of date report)')
    .option('--export-removals <file>', 'Write out of date and unused pkginfos as a removal list')
    .action((opts: ReportOptions) => {
      try {
        const format = parseFormat(opts.format);
        const ids = opts.only ? parseReportIds(opts.only) : undefined;
        const { settings, layout } = openRepo(opts);
        assertRepoMounted(layout);

        const keep = opts.keep ? parseKeep(opts.keep) : settings.keep_versions;
        const snapshot = withSpinner(
          `Reading ${layout.root}...`,
          () => loadSnapshot(layout, { catalogs: catalogSettings(settings), keep }),
          format === 'text',
        );
        const results = runReports(snapshot, ids);

        switch (format) {
          case 'json':
            console.log(JSON.stringify(toDocument(results), null, 2));
            break;
          case 'yaml':
            console.log(yaml.dump(toDocument(results), { lineWidth: -1 }));
            break;
          case 'plist':
            console.log(toPlistString(toDocument(results)));
            break;
          case 'text':
            for (const result of results) console.log(renderReport(result));
            break;
        }

        if (opts.exportRemovals) {
          const target = resolve(opts.exportRemovals);
          const paths = removablePaths(results);
          writeRemovalList(target, paths);
          if (format === 'text') ok(`Wrote ${paths.length} removal(s) to ${target}`);
        }
      } catch (err) {
        fail(String(err));
        process.exit(1);
      }
    });
}

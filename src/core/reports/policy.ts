import type { Descriptor } from '../../types/repo.js';
import type { Finding, RepoSnapshot, ReportDefinition, ReportId } from '../../types/report.js';
import { inCatalogs } from '../cache.js';

type Condition = (d: Descriptor, snapshot: RepoSnapshot) => boolean;

const inTesting: Condition = (d, { catalogs }) => inCatalogs(d, catalogs.testing);
const inProduction: Condition = (d, { catalogs }) => inCatalogs(d, [catalogs.production]);
const isUnattended: Condition = (d) => d.unattended_install === true;
const hasForceDate: Condition = (d) => d.force_install_after_date !== undefined;

function not(condition: Condition): Condition {
  return (d, snapshot) => !condition(d, snapshot);
}

/** Report listing every descriptor that meets all `conditions`. */
function conditionReport(
  id: ReportId,
  title: string,
  description: string,
  conditions: Condition[],
): ReportDefinition {
  return {
    id,
    title,
    description,
    sortKeys: [
      { key: 'name', reverse: false },
      { key: 'version', reverse: true },
    ],
    itemsOrder: ['name', 'path'],
    collect(snapshot) {
      const items: Finding[] = [];
      for (const [path, d] of snapshot.cache.descriptors) {
        if (conditions.every((condition) => condition(d, snapshot))) {
          items.push({ name: d.name, version: d.version, path });
        }
      }
      return { items, metadata: [] };
    },
  };
}

export const unattendedTestingReport = conditionReport(
  'unattended-testing',
  'Unattended Installs in Testing Report',
  "Items in the testing catalogs that install without user intervention ('unattended_install: true').",
  [inTesting, isUnattended],
);

export const attendedProductionReport = conditionReport(
  'attended-production',
  'Attended Installs in Production Report',
  "Items in the production catalog that need user intervention (no 'unattended_install: true').",
  [inProduction, not(isUnattended)],
);

export const forceInstallTestingReport = conditionReport(
  'force-install-testing',
  'Testing Non-Forced Installation Report',
  'Items in the testing catalogs without a `force_install_after_date`.',
  [inTesting, not(hasForceDate)],
);

export const forceInstallProductionReport = conditionReport(
  'force-install-production',
  'Production Forced Installation Report',
  'Items in the production catalog with a `force_install_after_date`.',
  [inProduction, hasForceDate],
);

import {
  REPORT_IDS,
  type Finding,
  type RepoSnapshot,
  type ReportDefinition,
  type ReportId,
  type ReportResult,
} from '../../types/report.js';
import { pkginfoErrorsReport, manifestErrorsReport } from './errors.js';
import {
  missingInstallersReport,
  orphanedInstallersReport,
  pathIssuesReport,
} from './installers.js';
import {
  attendedProductionReport,
  forceInstallProductionReport,
  forceInstallTestingReport,
  unattendedTestingReport,
} from './policy.js';
import { outOfDateReport, unusedDiskUsageReport, unusedReport } from './usage.js';
import { sortFindings } from './format.js';

export { humanSize, gigabytes, sortFindings } from './format.js';
export { outOfDateItems, unusedItems } from './usage.js';

// Run order.
export const REPORTS: readonly ReportDefinition[] = [
  pathIssuesReport,
  missingInstallersReport,
  orphanedInstallersReport,
  pkginfoErrorsReport,
  manifestErrorsReport,
  outOfDateReport,
  unusedReport,
  unusedDiskUsageReport,
  unattendedTestingReport,
  attendedProductionReport,
  forceInstallTestingReport,
  forceInstallProductionReport,
];

export function parseReportId(s: string): ReportId | null {
  return REPORT_IDS.find((id) => id === s) ?? null;
}

/** Parses a comma-separated list of report ids. */
export function parseReportIds(csv: string): ReportId[] {
  const ids: ReportId[] = [];
  for (const part of csv.split(',').map((p) => p.trim()).filter(Boolean)) {
    const id = parseReportId(part);
    if (id === null) {
      throw new Error(`Unknown report "${part}". Expected one of: ${REPORT_IDS.join(', ')}.`);
    }
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function runReport(report: ReportDefinition, snapshot: RepoSnapshot): ReportResult {
  const findings = report.collect(snapshot);
  return {
    id: report.id,
    title: report.title,
    description: report.description,
    itemsOrder: report.itemsOrder,
    items: sortFindings(findings.items, report.sortKeys),
    metadata: findings.metadata,
  };
}

/** Runs the selected reports (all when `ids` is omitted) in run order. */
export function runReports(snapshot: RepoSnapshot, ids?: readonly ReportId[]): ReportResult[] {
  const selected = ids ? REPORTS.filter((r) => ids.includes(r.id)) : REPORTS;
  return selected.map((report) => runReport(report, snapshot));
}

export type ReportDocument = Record<string, { items: Finding[]; metadata: Finding[] }>;

/** One entry per report, keyed by title, for structured output. */
export function toDocument(results: ReportResult[]): ReportDocument {
  const doc: ReportDocument = {};
  for (const result of results) {
    doc[result.title] = { items: result.items, metadata: result.metadata };
  }
  return doc;
}

/** Descriptor paths found by the reports whose items are descriptors. */
export function removablePaths(results: ReportResult[]): string[] {
  const paths = new Set<string>();
  for (const result of results) {
    if (result.id !== 'out-of-date' && result.id !== 'unused') continue;
    for (const item of result.items) {
      if (typeof item.path === 'string') paths.add(item.path);
    }
  }
  return [...paths].sort();
}

import type { Finding, ReportDefinition } from '../../types/report.js';

function errorFindings(errors: Map<string, string>): Finding[] {
  return [...errors].map(([path, error]) => ({ path, error }));
}

export const pkginfoErrorsReport: ReportDefinition = {
  id: 'pkginfo-errors',
  title: 'Pkginfo Syntax Error Report',
  description: 'Pkginfo files that are not valid property lists or lack required keys.',
  sortKeys: [{ key: 'path', reverse: false }],
  itemsOrder: ['path'],
  collect({ cache }) {
    return { items: errorFindings(cache.errors), metadata: [] };
  },
};

export const manifestErrorsReport: ReportDefinition = {
  id: 'manifest-errors',
  title: 'Manifest Syntax Error Report',
  description: 'Manifest files that could not be read. Their references are ignored by the other reports.',
  sortKeys: [{ key: 'path', reverse: false }],
  itemsOrder: ['path'],
  collect({ manifests }) {
    return { items: errorFindings(manifests.errors), metadata: [] };
  },
};

export * from './errors.js';
export * from './version.js';

export {
  repoLayout,
  resolveRepoRoot,
  catalogSettings,
  installerPath,
  assertRepoMounted,
} from './repo.js';

export {
  loadDescriptorCache,
  parseDescriptor,
  descriptorNames,
  groupByName,
} from './cache.js';

export {
  loadManifests,
  collectManifestReferences,
  stripReferences,
  isSimilarName,
} from './manifest.js';

export { buildInstallerIndex, matchLocation, findOrphans } from './installers.js';

export {
  resolveUsedNames,
  resolveUsage,
  findOutOfDate,
  findUnused,
  referencedName,
} from './usage.js';

export { loadSnapshot } from './snapshot.js';

export {
  REPORTS,
  runReports,
  parseReportIds,
  toDocument,
  removablePaths,
} from './reports/index.js';

export {
  planRemoval,
  loadRemovalList,
  writeRemovalList,
  namesToRemove,
  NO_CATEGORY,
} from './removal.js';

export {
  executeRemoval,
  removeNamesFromManifests,
  archivePath,
} from './executor.js';

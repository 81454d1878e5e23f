export * from './types';
export * from './errors';
export * from './poller';
export {
  MeiliClient,
  taskStatusFetcher,
  parseEnqueuedTask,
  parseKey,
  type MeiliClientOptions,
  type MeiliOutcome,
  type MeiliSuccess,
  type MeiliError,
  type HealthResponse,
} from './meili';
export { waitForHealthy, type HealthWaitOptions } from './health';
export { submitAndWait, type TaskRun, type TaskRunOptions } from './task';
export {
  loadCatalogIndex,
  parseCatalogIndex,
  provisionCatalogIndex,
  createCatalogKeys,
  generateMasterKey,
  type ProvisionResult,
} from './provision';
export { runBackup, pruneBackups, findLatestDump, type BackupOptions, type BackupResult } from './backup';

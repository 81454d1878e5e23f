/**
 * Boundary types for catalog-search-ops
 *
 * These types define the contracts between modules: the poller core,
 * the Meilisearch client, and the action-level orchestration.
 */

// -----------------------------------------------------------------------------
// OperationHandle
// Opaque identifier of a submitted remote task (Meilisearch taskUid)
// -----------------------------------------------------------------------------

export type OperationHandle = string | number;

// -----------------------------------------------------------------------------
// OperationStatus
// Classified status of a single poll response
// -----------------------------------------------------------------------------

export type OperationStatus = 'enqueued' | 'processing' | 'succeeded' | 'failed' | 'unknown';

// -----------------------------------------------------------------------------
// StatusPayload
// Structured response from a task-status endpoint
// -----------------------------------------------------------------------------

export interface StatusPayload {
  /** Raw status string as reported by the remote API */
  status: string;
  /** Error description, present when the remote operation failed */
  error?: unknown;
  [key: string]: unknown;
}

// -----------------------------------------------------------------------------
// PollConfig
// -----------------------------------------------------------------------------

export type StatusPredicate = (payload: StatusPayload) => boolean;

export interface PollConfig {
  /** Base milliseconds between polls */
  readonly interval_ms: number;
  /** Total polling budget in milliseconds (0 = poll exactly once) */
  readonly max_wait_ms: number;
  /** Interval growth factor per attempt (1 = fixed interval) */
  readonly backoff_multiplier: number;
  /** Upper bound on the escalated interval (null = uncapped) */
  readonly max_interval_ms: number | null;
  readonly success_predicate: StatusPredicate;
  readonly failure_predicate: StatusPredicate;
}

// -----------------------------------------------------------------------------
// OperationResult
// Terminal outcome of a poll, produced exactly once per handle
// -----------------------------------------------------------------------------

export interface FailureCause {
  message: string;
  code: string | null;
  type: string | null;
  link: string | null;
}

export interface OperationSucceeded {
  success: true;
  status: 'succeeded';
  payload: StatusPayload;
  polls: number;
  elapsed_ms: number;
}

export interface OperationFailed {
  success: false;
  status: 'failed';
  cause: FailureCause;
  payload: StatusPayload;
  polls: number;
  elapsed_ms: number;
}

export interface OperationCancelled {
  success: false;
  status: 'cancelled';
  polls: number;
  elapsed_ms: number;
}

export type OperationResult = OperationSucceeded | OperationFailed | OperationCancelled;

// -----------------------------------------------------------------------------
// Logger
// Shape shared with @actions/core so the action runtime can be passed directly
// -----------------------------------------------------------------------------

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
  warning(message: string): void;
}

// -----------------------------------------------------------------------------
// Meilisearch resources
// -----------------------------------------------------------------------------

export interface EnqueuedTask {
  taskUid: number;
  indexUid: string | null;
  status: string;
  type: string;
  enqueuedAt: string;
}

export interface IndexSettings {
  searchableAttributes?: string[];
  filterableAttributes?: string[];
  sortableAttributes?: string[];
  displayedAttributes?: string[];
  rankingRules?: string[];
}

export interface CatalogIndexDefinition {
  uid: string;
  primaryKey: string;
  settings: IndexSettings;
}

export interface KeyRequest {
  description: string;
  actions: string[];
  indexes: string[];
  /** ISO timestamp, or null for a non-expiring key */
  expiresAt: string | null;
}

export interface ApiKey {
  key: string;
  uid: string;
  description: string | null;
  actions: string[];
  indexes: string[];
  expiresAt: string | null;
}

export interface CatalogKeys {
  search: ApiKey;
  admin: ApiKey;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type ActionMode = 'setup' | 'backup' | 'wait' | 'master-key';

export interface Config {
  mode: ActionMode;
  /** Engine base URL, without trailing slash */
  host: string;
  /** Master or admin key used for management calls */
  api_key: string;
  /** Overrides the uid in the index definition when set */
  index_uid: string | null;
  /** Overrides the primary key in the index definition when set */
  primary_key: string | null;
  /** Optional JSON file overriding the bundled catalog settings */
  settings_file: string | null;
  /** File receiving the generated key env snippets (setup mode) */
  keys_file: string | null;
  /** Task to wait on in 'wait' mode */
  task_uid: number | null;
  poll: {
    interval_ms: number;
    max_wait_ms: number;
    backoff_multiplier: number;
    max_interval_ms: number | null;
  };
  health_attempts: number;
  backup_dir: string;
  dumps_dir: string;
  retention_days: number;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DEFAULT_HOST = 'http://localhost:7700';

export const POLL_INTERVAL_SECONDS = 5;
export const MAX_WAIT_SECONDS = 300;

export const HEALTH_MAX_ATTEMPTS = 30;
export const HEALTH_INTERVAL_MS = 2000;

/** Timeout for fetch requests to the engine (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

export const BACKUP_DIR = './backups';
export const DUMPS_DIR = './data/dumps';
export const RETENTION_DAYS = 7;
export const BACKUP_FILE_PREFIX = 'meili_dump_';

/**
 * Action Configuration
 * Layer: action
 *
 * Provided ports:
 *   - config.read
 *
 * Reads and validates action inputs (see action.yml).
 */

import * as core from '@actions/core';
import type { ActionMode, Config } from './types';
import {
  BACKUP_DIR,
  DEFAULT_HOST,
  DUMPS_DIR,
  HEALTH_MAX_ATTEMPTS,
  MAX_WAIT_SECONDS,
  POLL_INTERVAL_SECONDS,
  RETENTION_DAYS,
} from './types';

const MODES: readonly ActionMode[] = ['setup', 'backup', 'wait', 'master-key'];

function isActionMode(value: string): value is ActionMode {
  return MODES.some((mode) => mode === value);
}

interface NumberRule {
  /** Smallest accepted value (inclusive) */
  min: number;
  integer?: boolean;
}

/**
 * Parses a numeric input, returning `fallback` when it is empty.
 *
 * @throws Error naming the input if the value is not a number within range
 */
export function parseNumberInput(name: string, fallback: number, rule: NumberRule): number {
  const raw = core.getInput(name).trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < rule.min || (rule.integer && !Number.isInteger(value))) {
    const kind = rule.integer ? 'an integer' : 'a number';
    throw new Error(`Invalid input '${name}': expected ${kind} >= ${rule.min}, got '${raw}'`);
  }
  return value;
}

function optionalInput(name: string): string | null {
  const value = core.getInput(name).trim();
  return value ? value : null;
}

// -----------------------------------------------------------------------------
// Port: config.read
// -----------------------------------------------------------------------------

/**
 * Builds the action configuration from inputs and environment.
 * Masks the API key.
 *
 * @throws Error for a missing or invalid input
 */
export function readConfig(): Config {
  const mode = core.getInput('mode', { required: true }).trim();
  if (!isActionMode(mode)) {
    throw new Error(`Invalid mode: ${mode}. Must be one of: ${MODES.join(', ')}.`);
  }

  const apiKey = core.getInput('api-key') || process.env['MEILI_MASTER_KEY'] || '';
  if (apiKey) {
    // Mask key to prevent accidental exposure
    core.setSecret(apiKey);
  } else if (mode !== 'master-key') {
    throw new Error(
      'No API key provided. Set the api-key input or MEILI_MASTER_KEY environment variable.',
    );
  }

  const taskUid =
    mode === 'wait' ? parseNumberInput('task-uid', Number.NaN, { min: 0, integer: true }) : null;
  if (taskUid !== null && Number.isNaN(taskUid)) {
    throw new Error("Input 'task-uid' is required in wait mode");
  }

  const intervalSeconds = parseNumberInput('interval-seconds', POLL_INTERVAL_SECONDS, {
    min: 0.001,
  });
  const maxIntervalSeconds = parseNumberInput('max-interval-seconds', 0, { min: 0 });

  return {
    mode,
    host: (optionalInput('host') ?? DEFAULT_HOST).replace(/\/+$/, ''),
    api_key: apiKey,
    index_uid: optionalInput('index-uid'),
    primary_key: optionalInput('primary-key'),
    settings_file: optionalInput('settings-file'),
    keys_file: optionalInput('keys-file'),
    task_uid: taskUid,
    poll: {
      interval_ms: intervalSeconds * 1000,
      max_wait_ms: parseNumberInput('max-wait-seconds', MAX_WAIT_SECONDS, { min: 0 }) * 1000,
      backoff_multiplier: parseNumberInput('backoff-multiplier', 1, { min: 1 }),
      max_interval_ms: maxIntervalSeconds > 0 ? maxIntervalSeconds * 1000 : null,
    },
    health_attempts: parseNumberInput('health-attempts', HEALTH_MAX_ATTEMPTS, {
      min: 1,
      integer: true,
    }),
    backup_dir: optionalInput('backup-dir') ?? BACKUP_DIR,
    dumps_dir: optionalInput('dumps-dir') ?? DUMPS_DIR,
    retention_days: parseNumberInput('retention-days', RETENTION_DAYS, { min: 0 }),
  };
}

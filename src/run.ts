/**
 * Mode Handlers
 * Layer: action
 *
 * Dispatches the configured mode. Every error is caught here once and
 * reported through core.setFailed.
 *
 * Required ports:
 *   - config.read
 *   - meili.*
 *   - provision.*
 *   - backup.run
 *   - output.render
 */

import * as core from '@actions/core';
import type { Config } from './types';
import { readConfig } from './config';
import { MeiliClient, taskStatusFetcher } from './meili';
import { waitForHealthy } from './health';
import { pollOperation, resolvePollConfig } from './poller';
import type { PollConfigInput } from './poller';
import {
  createCatalogKeys,
  generateMasterKey,
  loadCatalogIndex,
  provisionCatalogIndex,
} from './provision';
import { runBackup } from './backup';
import {
  renderBackupSummary,
  renderSetupSummary,
  renderWaitSummary,
  writeKeysFile,
  writeStepSummary,
} from './output';
import { errorMessage } from './utils';

// -----------------------------------------------------------------------------
// Entry
// -----------------------------------------------------------------------------

/**
 * Runs the action. Aborting `signal` cancels any wait in progress.
 */
export async function run(signal?: AbortSignal): Promise<void> {
  try {
    const config = readConfig();

    switch (config.mode) {
      case 'setup':
        await handleSetup(config, signal);
        break;
      case 'backup':
        await handleBackup(config, signal);
        break;
      case 'wait':
        await handleWait(config, signal);
        break;
      case 'master-key':
        handleMasterKey();
        break;
    }
  } catch (error) {
    core.setFailed(errorMessage(error));
  }
}

function createClient(config: Config): MeiliClient {
  return new MeiliClient({ host: config.host, apiKey: config.api_key });
}

async function awaitHealthy(
  client: MeiliClient,
  config: Config,
  signal: AbortSignal | undefined,
): Promise<void> {
  core.info(`Waiting for search engine at ${config.host}...`);
  await waitForHealthy(client, { max_attempts: config.health_attempts, signal });
}

// -----------------------------------------------------------------------------
// Setup mode
// -----------------------------------------------------------------------------

export async function handleSetup(config: Config, signal?: AbortSignal): Promise<void> {
  const pollConfig: PollConfigInput = resolvePollConfig(config.poll);
  const definition = loadCatalogIndex(config.settings_file, {
    index_uid: config.index_uid,
    primary_key: config.primary_key,
  });
  const client = createClient(config);

  await awaitHealthy(client, config, signal);

  const provision = await provisionCatalogIndex(client, definition, pollConfig, { signal });
  const keys = await createCatalogKeys(client, provision.index_uid);

  core.setSecret(keys.search.key);
  core.setSecret(keys.admin.key);
  core.setOutput('index-uid', provision.index_uid);
  core.setOutput('search-key', keys.search.key);
  core.setOutput('admin-key', keys.admin.key);

  if (config.keys_file) {
    writeKeysFile(config.keys_file, config.host, keys);
    core.info(`API keys saved to: ${config.keys_file}`);
    core.warning(`Keep ${config.keys_file} secure and do not commit it`);
  }

  writeStepSummary(renderSetupSummary(config.host, provision, keys));
  core.info('Setup complete');
}

// -----------------------------------------------------------------------------
// Backup mode
// -----------------------------------------------------------------------------

export async function handleBackup(config: Config, signal?: AbortSignal): Promise<void> {
  const pollConfig: PollConfigInput = resolvePollConfig(config.poll);
  const client = createClient(config);

  await awaitHealthy(client, config, signal);

  const backup = await runBackup(
    client,
    {
      backup_dir: config.backup_dir,
      dumps_dir: config.dumps_dir,
      retention_days: config.retention_days,
    },
    pollConfig,
    { signal },
  );

  core.setOutput('task-uid', String(backup.task_uid));
  core.setOutput('backup-file', backup.backup_file);
  core.setOutput('backup-size', String(backup.size_bytes));

  writeStepSummary(renderBackupSummary(backup));
  core.info('Backup process complete');
}

// -----------------------------------------------------------------------------
// Wait mode
// -----------------------------------------------------------------------------

export async function handleWait(config: Config, signal?: AbortSignal): Promise<void> {
  if (config.task_uid === null) {
    throw new Error("Input 'task-uid' is required in wait mode");
  }
  const taskUid = config.task_uid;
  const client = createClient(config);

  const result = await pollOperation(taskUid, taskStatusFetcher(client), config.poll, { signal });

  core.setOutput('task-status', result.status);
  writeStepSummary(renderWaitSummary(taskUid, result));

  if (result.status === 'cancelled') {
    throw new Error(`Operation cancelled: task ${taskUid}`);
  }
  if (result.status === 'failed') {
    throw new Error(`Task ${taskUid} failed: ${result.cause.message}`);
  }
  core.info(`Task ${taskUid} succeeded`);
}

// -----------------------------------------------------------------------------
// Master key mode
// -----------------------------------------------------------------------------

export function handleMasterKey(): void {
  const masterKey = generateMasterKey();
  core.setSecret(masterKey);
  core.setOutput('master-key', masterKey);
  core.info('Generated master key');
}

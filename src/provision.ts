/**
 * Catalog Provisioning
 * Layer: action
 *
 * Provided ports:
 *   - provision.loadCatalogIndex
 *   - provision.provisionCatalogIndex
 *   - provision.createCatalogKeys
 *   - provision.generateMasterKey
 *
 * Creates the product index, applies its search settings, and issues the
 * frontend/backend API keys.
 */

import * as core from '@actions/core';
import * as crypto from 'crypto';
import * as fs from 'fs';
import type { CatalogIndexDefinition, CatalogKeys, IndexSettings, Logger } from './types';
import type { MeiliClient } from './meili';
import type { PollConfigInput } from './poller';
import { submitAndWait } from './task';
import type { TaskRunOptions } from './task';
import { errorMessage, isARealObject, isStringArray } from './utils';
import defaultCatalogIndex from '../config/catalog-index.json';

// -----------------------------------------------------------------------------
// Port: provision.loadCatalogIndex
// -----------------------------------------------------------------------------

const SETTINGS_LIST_FIELDS = [
  'searchableAttributes',
  'filterableAttributes',
  'sortableAttributes',
  'displayedAttributes',
  'rankingRules',
] as const;

/**
 * Validates an index definition. Returns null if any field has the wrong shape.
 */
export function parseCatalogIndex(raw: unknown): CatalogIndexDefinition | null {
  if (!isARealObject(raw) || !isARealObject(raw['settings'])) {
    return null;
  }
  const { uid, primaryKey } = raw;
  if (typeof uid !== 'string' || !uid || typeof primaryKey !== 'string' || !primaryKey) {
    return null;
  }

  const rawSettings = raw['settings'];
  const settings: IndexSettings = {};
  for (const field of SETTINGS_LIST_FIELDS) {
    const value = rawSettings[field];
    if (value === undefined) continue;
    if (!isStringArray(value)) return null;
    settings[field] = value;
  }

  return { uid, primaryKey, settings };
}

export interface CatalogIndexOverrides {
  index_uid?: string | null;
  primary_key?: string | null;
}

/**
 * Loads the bundled catalog definition, or the one in `settingsFile`,
 * then applies uid/primary key overrides.
 *
 * @throws Error if the file cannot be read or has the wrong shape
 */
export function loadCatalogIndex(
  settingsFile: string | null,
  overrides: CatalogIndexOverrides = {},
): CatalogIndexDefinition {
  let raw: unknown = defaultCatalogIndex;
  const source = settingsFile ?? 'bundled catalog settings';

  if (settingsFile) {
    try {
      raw = JSON.parse(fs.readFileSync(settingsFile, 'utf-8'));
    } catch (err) {
      throw new Error(`Failed to read settings file ${settingsFile}: ${errorMessage(err)}`);
    }
  }

  const definition = parseCatalogIndex(raw);
  if (!definition) {
    throw new Error(`Invalid index definition in ${source}`);
  }

  return {
    ...definition,
    uid: overrides.index_uid || definition.uid,
    primaryKey: overrides.primary_key || definition.primaryKey,
  };
}

// -----------------------------------------------------------------------------
// Port: provision.provisionCatalogIndex
// -----------------------------------------------------------------------------

export interface ProvisionResult {
  index_uid: string;
  /** False when the index already existed and was reused */
  created: boolean;
  task_uids: number[];
}

/**
 * Creates the index (reusing an existing one) and applies its settings.
 * Each engine task is submitted once and polled to completion.
 */
export async function provisionCatalogIndex(
  client: MeiliClient,
  definition: CatalogIndexDefinition,
  pollConfig: PollConfigInput,
  options: TaskRunOptions = {},
): Promise<ProvisionResult> {
  const logger: Logger = options.logger ?? core;
  const { uid, primaryKey, settings } = definition;

  logger.info(`Creating index '${uid}'...`);
  const creation = await submitAndWait(
    client,
    `index creation '${uid}'`,
    () => client.createIndex(uid, primaryKey),
    pollConfig,
    options,
  );

  let created = true;
  if (!creation.result.success) {
    if (creation.result.cause.code !== 'index_already_exists') {
      throw new Error(`Index creation failed: ${creation.result.cause.message}`);
    }
    created = false;
    logger.info(`Index '${uid}' already exists`);
  } else {
    logger.info(`Index '${uid}' created`);
  }

  logger.info(`Configuring settings for '${uid}'...`);
  const update = await submitAndWait(
    client,
    `settings update '${uid}'`,
    () => client.updateSettings(uid, settings),
    pollConfig,
    options,
  );
  if (!update.result.success) {
    throw new Error(`Settings update failed: ${update.result.cause.message}`);
  }
  logger.info(`Settings configured for '${uid}'`);

  return {
    index_uid: uid,
    created,
    task_uids: [creation.task.taskUid, update.task.taskUid],
  };
}

// -----------------------------------------------------------------------------
// Port: provision.createCatalogKeys
// -----------------------------------------------------------------------------

/**
 * Issues a search-only key scoped to the catalog index and an admin key.
 * Neither expires.
 */
export async function createCatalogKeys(
  client: MeiliClient,
  indexUid: string,
  logger: Logger = core,
): Promise<CatalogKeys> {
  logger.info('Creating search-only API key for frontend...');
  const search = await client.createKey({
    description: 'Catalog frontend search key',
    actions: ['search'],
    indexes: [indexUid],
    expiresAt: null,
  });
  if (!search.success) {
    throw new Error(`Failed to create search key: ${search.error}`);
  }

  logger.info('Creating admin API key for backend...');
  const admin = await client.createKey({
    description: 'Catalog backend admin key',
    actions: ['*'],
    indexes: ['*'],
    expiresAt: null,
  });
  if (!admin.success) {
    throw new Error(`Failed to create admin key: ${admin.error}`);
  }

  return { search: search.data, admin: admin.data };
}

// -----------------------------------------------------------------------------
// Port: provision.generateMasterKey
// -----------------------------------------------------------------------------

/**
 * Generates a master key for a new engine: 32 random bytes, base64.
 */
export function generateMasterKey(): string {
  return crypto.randomBytes(32).toString('base64');
}

/**
 * Dump Backup
 * Layer: action
 *
 * Provided ports:
 *   - backup.run
 *   - backup.prune
 *
 * Triggers an engine dump, waits for it, then stores a gzip copy of the
 * newest dump file and prunes backups past their retention window.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { pipeline } from 'stream/promises';
import type { Logger } from './types';
import { BACKUP_FILE_PREFIX } from './types';
import type { MeiliClient } from './meili';
import type { PollConfigInput } from './poller';
import { submitAndWait } from './task';
import type { TaskRunOptions } from './task';
import { errorMessage } from './utils';

const DAY_MS = 24 * 60 * 60 * 1000;
const BACKUP_FILE_PATTERN = new RegExp(`^${BACKUP_FILE_PREFIX}.+\\.dump\\.gz$`);

export interface BackupOptions {
  backup_dir: string;
  dumps_dir: string;
  retention_days: number;
  /** Clock for naming and pruning; defaults to the current time */
  now?: Date;
}

export interface BackupResult {
  task_uid: number;
  backup_file: string;
  size_bytes: number;
  /** Names of pruned backup files */
  removed: string[];
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as YYYYMMDD_HHMMSS (UTC).
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Returns the most recently modified *.dump file in `dir`, or null.
 */
export function findLatestDump(dir: string): string | null {
  if (!fs.existsSync(dir)) return null;

  let latest: { file: string; mtimeMs: number } | null = null;
  for (const name of fs.readdirSync(dir)) {
    if (!name.endsWith('.dump')) continue;
    const file = path.join(dir, name);
    const stat = fs.statSync(file);
    if (!stat.isFile()) continue;
    if (!latest || stat.mtimeMs > latest.mtimeMs) {
      latest = { file, mtimeMs: stat.mtimeMs };
    }
  }
  return latest ? latest.file : null;
}

// -----------------------------------------------------------------------------
// Port: backup.prune
// -----------------------------------------------------------------------------

/**
 * Deletes backups in `dir` whose age in whole days exceeds `retentionDays`
 * (a 7-day retention removes files 8 or more full days old).
 * Only files matching the backup naming scheme are considered.
 *
 * @returns Names of deleted files
 */
export function pruneBackups(dir: string, retentionDays: number, now: Date): string[] {
  const removed: string[] = [];

  for (const name of fs.readdirSync(dir)) {
    if (!BACKUP_FILE_PATTERN.test(name)) continue;
    const file = path.join(dir, name);
    const ageDays = Math.floor((now.getTime() - fs.statSync(file).mtimeMs) / DAY_MS);
    if (ageDays > retentionDays) {
      fs.unlinkSync(file);
      removed.push(name);
    }
  }
  return removed.sort();
}

// -----------------------------------------------------------------------------
// Port: backup.run
// -----------------------------------------------------------------------------

/**
 * Creates a dump and stores it as <backup_dir>/meili_dump_<timestamp>.dump.gz.
 *
 * @throws Error if the dump task fails or no dump file is produced
 */
export async function runBackup(
  client: MeiliClient,
  options: BackupOptions,
  pollConfig: PollConfigInput,
  runOptions: TaskRunOptions = {},
): Promise<BackupResult> {
  const logger: Logger = runOptions.logger ?? core;
  const now = options.now ?? new Date();

  fs.mkdirSync(options.backup_dir, { recursive: true });

  logger.info('Creating dump...');
  const { task, result } = await submitAndWait(
    client,
    'dump',
    () => client.createDump(),
    pollConfig,
    runOptions,
  );
  if (!result.success) {
    throw new Error(`Dump creation failed: ${result.cause.message}`);
  }
  logger.info('Dump created successfully');

  const dumpFile = findLatestDump(options.dumps_dir);
  if (!dumpFile) {
    throw new Error(`No dump file found in ${options.dumps_dir}`);
  }

  const backupFile = path.join(
    options.backup_dir,
    `${BACKUP_FILE_PREFIX}${formatBackupTimestamp(now)}.dump.gz`,
  );
  logger.info(`Compressing ${dumpFile} to ${backupFile}...`);
  try {
    await pipeline(
      fs.createReadStream(dumpFile),
      zlib.createGzip(),
      fs.createWriteStream(backupFile),
    );
  } catch (err) {
    fs.rmSync(backupFile, { force: true });
    throw new Error(`Failed to compress ${dumpFile}: ${errorMessage(err)}`);
  }

  const sizeBytes = fs.statSync(backupFile).size;
  logger.info(`Backup completed: ${backupFile} (${sizeBytes} bytes)`);

  logger.info(`Removing backups older than ${options.retention_days} days...`);
  const removed = pruneBackups(options.backup_dir, options.retention_days, now);
  if (removed.length > 0) {
    logger.info(`Removed ${removed.length} old backup(s)`);
  }

  return { task_uid: task.taskUid, backup_file: backupFile, size_bytes: sizeBytes, removed };
}

/**
 * Backup Tests
 *
 * Uses real temp directories; the engine client is spied on.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import { MeiliClient } from '../src/meili';
import {
  findLatestDump,
  formatBackupTimestamp,
  pruneBackups,
  runBackup,
} from '../src/backup';
import { makeLogger } from './poller/helpers';

vi.mock('@actions/core');

const gzipFailure = vi.hoisted(() => {
  const state: { error: Error | null } = { error: null };
  return state;
});

vi.mock('zlib', async (importOriginal) => {
  const actual = await importOriginal<typeof import('zlib')>();
  const { Transform } = await import('stream');
  return {
    ...actual,
    createGzip: (options?: import('zlib').ZlibOptions) => {
      const error = gzipFailure.error;
      if (!error) return actual.createGzip(options);
      return new Transform({
        transform(_chunk, _encoding, callback) {
          callback(error);
        },
      });
    },
  };
});

const DAY_MS = 24 * 60 * 60 * 1000;

let tmpDir: string;
let backupDir: string;
let dumpsDir: string;

function touch(file: string, content: string, mtime: Date): void {
  fs.writeFileSync(file, content);
  fs.utimesSync(file, mtime, mtime);
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-backup-'));
  backupDir = path.join(tmpDir, 'backups');
  dumpsDir = path.join(tmpDir, 'dumps');
  fs.mkdirSync(dumpsDir);
});

afterEach(() => {
  gzipFailure.error = null;
  fs.rmSync(tmpDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// -----------------------------------------------------------------------------
// formatBackupTimestamp
// -----------------------------------------------------------------------------

describe('formatBackupTimestamp', () => {
  it('formats in UTC with zero padding', () => {
    expect(formatBackupTimestamp(new Date('2026-03-04T05:06:07Z'))).toBe('20260304_050607');
  });

  it('does not depend on the local offset', () => {
    expect(formatBackupTimestamp(new Date('2026-12-31T23:59:59Z'))).toBe('20261231_235959');
  });
});

// -----------------------------------------------------------------------------
// findLatestDump
// -----------------------------------------------------------------------------

describe('findLatestDump', () => {
  it('returns null for a missing directory', () => {
    expect(findLatestDump(path.join(tmpDir, 'nope'))).toBeNull();
  });

  it('returns null when there are no dump files', () => {
    fs.writeFileSync(path.join(dumpsDir, 'notes.txt'), 'x');
    expect(findLatestDump(dumpsDir)).toBeNull();
  });

  it('picks the most recently modified dump', () => {
    const now = Date.now();
    touch(path.join(dumpsDir, '20260101-000000000.dump'), 'old', new Date(now - 2 * DAY_MS));
    touch(path.join(dumpsDir, '20260102-000000000.dump'), 'new', new Date(now - DAY_MS));
    touch(path.join(dumpsDir, 'newer.txt'), 'ignored', new Date(now));

    expect(findLatestDump(dumpsDir)).toBe(path.join(dumpsDir, '20260102-000000000.dump'));
  });
});

// -----------------------------------------------------------------------------
// pruneBackups
// -----------------------------------------------------------------------------

describe('pruneBackups', () => {
  it('removes only backups more than retention_days whole days old', () => {
    fs.mkdirSync(backupDir);
    const now = new Date();
    touch(path.join(backupDir, 'meili_dump_20260101_000000.dump.gz'), 'a', new Date(now.getTime() - 10 * DAY_MS));
    touch(path.join(backupDir, 'meili_dump_20260102_000000.dump.gz'), 'b', new Date(now.getTime() - 8.5 * DAY_MS));
    touch(path.join(backupDir, 'meili_dump_20260103_000000.dump.gz'), 'e', new Date(now.getTime() - 7.5 * DAY_MS));
    touch(path.join(backupDir, 'meili_dump_20260109_000000.dump.gz'), 'c', new Date(now.getTime() - 6 * DAY_MS));
    touch(path.join(backupDir, 'unrelated.dump.gz'), 'd', new Date(now.getTime() - 30 * DAY_MS));

    const removed = pruneBackups(backupDir, 7, now);

    expect(removed).toEqual([
      'meili_dump_20260101_000000.dump.gz',
      'meili_dump_20260102_000000.dump.gz',
    ]);
    expect(fs.readdirSync(backupDir).sort()).toEqual([
      'meili_dump_20260103_000000.dump.gz',
      'meili_dump_20260109_000000.dump.gz',
      'unrelated.dump.gz',
    ]);
  });
});

// -----------------------------------------------------------------------------
// runBackup
// -----------------------------------------------------------------------------

describe('runBackup', () => {
  function makeClient(status: unknown = { status: 'succeeded' }) {
    const client = new MeiliClient({ host: 'http://localhost:7700', apiKey: 'test-key' });
    const createDump = vi.spyOn(client, 'createDump').mockResolvedValue({
      success: true,
      data: { taskUid: 12, indexUid: null, status: 'enqueued', type: 'dumpCreation', enqueuedAt: '' },
    });
    vi.spyOn(client, 'getTask').mockResolvedValue({ success: true, data: status });
    return { client, createDump };
  }

  it('compresses the newest dump and prunes old backups', async () => {
    const now = new Date();
    touch(path.join(dumpsDir, 'latest.dump'), 'catalog dump contents', now);
    fs.mkdirSync(backupDir);
    const stale = 'meili_dump_20200101_000000.dump.gz';
    touch(path.join(backupDir, stale), 'old', new Date(now.getTime() - 9 * DAY_MS));
    const { client, createDump } = makeClient();

    const result = await runBackup(
      client,
      { backup_dir: backupDir, dumps_dir: dumpsDir, retention_days: 7, now },
      {},
      { logger: makeLogger() },
    );

    const expectedFile = path.join(backupDir, `meili_dump_${formatBackupTimestamp(now)}.dump.gz`);
    expect(createDump).toHaveBeenCalledTimes(1);
    expect(result.task_uid).toBe(12);
    expect(result.backup_file).toBe(expectedFile);
    expect(result.size_bytes).toBe(fs.statSync(expectedFile).size);
    expect(result.removed).toEqual([stale]);
    expect(zlib.gunzipSync(fs.readFileSync(expectedFile)).toString()).toBe('catalog dump contents');
  });

  it('creates the backup directory when missing', async () => {
    touch(path.join(dumpsDir, 'latest.dump'), 'x', new Date());
    const { client } = makeClient();

    await runBackup(
      client,
      { backup_dir: backupDir, dumps_dir: dumpsDir, retention_days: 7 },
      {},
      { logger: makeLogger() },
    );

    expect(fs.existsSync(backupDir)).toBe(true);
  });

  it('removes the partial backup when compression fails', async () => {
    touch(path.join(dumpsDir, 'latest.dump'), 'catalog dump contents', new Date());
    gzipFailure.error = new Error('ENOSPC: no space left on device');
    const { client } = makeClient();

    await expect(
      runBackup(
        client,
        { backup_dir: backupDir, dumps_dir: dumpsDir, retention_days: 7 },
        {},
        { logger: makeLogger() },
      ),
    ).rejects.toThrow(
      `Failed to compress ${path.join(dumpsDir, 'latest.dump')}: ENOSPC: no space left on device`,
    );
    expect(fs.readdirSync(backupDir)).toEqual([]);
  });

  it('throws when the dump task fails', async () => {
    const { client } = makeClient({
      status: 'failed',
      error: { message: 'No space left on device', code: 'dump_process_failed' },
    });

    await expect(
      runBackup(
        client,
        { backup_dir: backupDir, dumps_dir: dumpsDir, retention_days: 7 },
        {},
        { logger: makeLogger() },
      ),
    ).rejects.toThrow('Dump creation failed: No space left on device');
  });

  it('throws when no dump file was written', async () => {
    const { client } = makeClient();

    await expect(
      runBackup(
        client,
        { backup_dir: backupDir, dumps_dir: dumpsDir, retention_days: 7 },
        {},
        { logger: makeLogger() },
      ),
    ).rejects.toThrow(`No dump file found in ${dumpsDir}`);
  });
});

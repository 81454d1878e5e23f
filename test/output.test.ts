/**
 * Output Renderer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  formatBytes,
  formatDuration,
  renderBackupSummary,
  renderEnvFile,
  renderSetupSummary,
  renderWaitSummary,
  writeKeysFile,
  writeStepSummary,
} from '../src/output';
import type { ApiKey, CatalogKeys } from '../src/types';

function apiKey(key: string, actions: string[], indexes: string[]): ApiKey {
  return { key, uid: `${key}-uid`, description: null, actions, indexes, expiresAt: null };
}

const KEYS: CatalogKeys = {
  search: apiKey('search-placeholder', ['search'], ['products']),
  admin: apiKey('admin-placeholder', ['*'], ['*']),
};

// -----------------------------------------------------------------------------
// formatDuration / formatBytes
// -----------------------------------------------------------------------------

describe('formatDuration', () => {
  it('formats seconds, minutes and hours', () => {
    expect(formatDuration(999)).toBe('0s');
    expect(formatDuration(45000)).toBe('45s');
    expect(formatDuration(120000)).toBe('2m');
    expect(formatDuration(125000)).toBe('2m 5s');
    expect(formatDuration(3600000)).toBe('1h');
    expect(formatDuration(5400000)).toBe('1h 30m');
  });
});

describe('formatBytes', () => {
  it('formats with binary units', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MiB');
    expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe('3.0 GiB');
  });
});

// -----------------------------------------------------------------------------
// Summaries
// -----------------------------------------------------------------------------

describe('renderSetupSummary', () => {
  it('lists key scopes without key material', () => {
    const summary = renderSetupSummary(
      'http://localhost:7700',
      { index_uid: 'products', created: true, task_uids: [1, 2] },
      KEYS,
    );

    expect(summary.split('\n')).toEqual([
      '## Catalog Search Setup',
      '',
      '**Host:** http://localhost:7700 | **Index:** `products`',
      '',
      'Index `products` was created and configured.',
      '',
      '| Key | Actions | Indexes |',
      '|-----|---------|---------|',
      '| search | search | products |',
      '| admin | * | * |',
      '',
      'Tasks: 1, 2',
    ]);
    expect(summary).not.toContain('search-placeholder');
    expect(summary).not.toContain('admin-placeholder');
  });

  it('notes a reused index', () => {
    const summary = renderSetupSummary(
      'http://localhost:7700',
      { index_uid: 'products', created: false, task_uids: [3, 4] },
      KEYS,
    );

    expect(summary).toContain('Index `products` already existed; settings were re-applied.');
  });
});

describe('renderBackupSummary', () => {
  it('renders the backup without pruned section when nothing was removed', () => {
    const summary = renderBackupSummary({
      task_uid: 12,
      backup_file: 'backups/meili_dump_20260304_050607.dump.gz',
      size_bytes: 2048,
      removed: [],
    });

    expect(summary).toBe(
      [
        '## Catalog Search Backup',
        '',
        '**Dump task:** 12 | **Size:** 2.0 KiB',
        '',
        'Backup written to `backups/meili_dump_20260304_050607.dump.gz`.',
      ].join('\n'),
    );
  });

  it('lists pruned backups', () => {
    const summary = renderBackupSummary({
      task_uid: 12,
      backup_file: 'backups/meili_dump_20260304_050607.dump.gz',
      size_bytes: 100,
      removed: ['meili_dump_20260220_000000.dump.gz'],
    });

    expect(summary.split('\n').slice(-4)).toEqual([
      '',
      '### Pruned backups',
      '',
      '- meili_dump_20260220_000000.dump.gz',
    ]);
  });
});

describe('renderWaitSummary', () => {
  it('renders a succeeded task', () => {
    const summary = renderWaitSummary(42, {
      success: true,
      status: 'succeeded',
      payload: { status: 'succeeded' },
      polls: 4,
      elapsed_ms: 15000,
    });

    expect(summary).toBe(
      '## Search Engine Task\n\n**Task:** 42 | **Status:** succeeded | **Polls:** 4 | **Elapsed:** 15s',
    );
  });

  it('includes the failure message and code', () => {
    const summary = renderWaitSummary(42, {
      success: false,
      status: 'failed',
      cause: {
        message: 'Index `products` not found.',
        code: 'index_not_found',
        type: 'invalid_request',
        link: null,
      },
      payload: { status: 'failed' },
      polls: 1,
      elapsed_ms: 0,
    });

    expect(summary.split('\n').slice(-1)).toEqual(['> Index `products` not found. (`index_not_found`)']);
  });

  it('renders a cancelled wait', () => {
    const summary = renderWaitSummary('dump', {
      success: false,
      status: 'cancelled',
      polls: 2,
      elapsed_ms: 65000,
    });

    expect(summary).toContain('**Task:** dump | **Status:** cancelled | **Polls:** 2 | **Elapsed:** 1m 5s');
  });
});

describe('renderEnvFile', () => {
  it('renders frontend and backend variables', () => {
    const env = renderEnvFile('http://localhost:7700', KEYS);

    expect(env.split('\n')).toEqual([
      '# Search API keys for the product catalog',
      '# KEEP THESE KEYS SECURE - DO NOT COMMIT',
      '',
      '# Frontend (.env.local)',
      'NEXT_PUBLIC_MEILI_HOST=http://localhost:7700',
      'NEXT_PUBLIC_MEILI_SEARCH_KEY=search-placeholder',
      '',
      '# Backend (.env)',
      'MEILI_HOST=http://localhost:7700',
      'MEILI_ADMIN_KEY=admin-placeholder',
      '',
    ]);
  });
});

// -----------------------------------------------------------------------------
// File writers
// -----------------------------------------------------------------------------

describe('file writers', () => {
  let tmpDir: string;
  let savedSummary: string | undefined;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-output-'));
    savedSummary = process.env['GITHUB_STEP_SUMMARY'];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    if (savedSummary === undefined) {
      delete process.env['GITHUB_STEP_SUMMARY'];
    } else {
      process.env['GITHUB_STEP_SUMMARY'] = savedSummary;
    }
  });

  it('appends to the step summary file', () => {
    const file = path.join(tmpDir, 'summary.md');
    process.env['GITHUB_STEP_SUMMARY'] = file;

    writeStepSummary('## One');
    writeStepSummary('## Two');

    expect(fs.readFileSync(file, 'utf-8')).toBe('## One\n## Two\n');
  });

  it('does nothing without a step summary path', () => {
    delete process.env['GITHUB_STEP_SUMMARY'];
    expect(() => writeStepSummary('## One')).not.toThrow();
  });

  it('writes the keys file readable by the owner only', () => {
    const file = path.join(tmpDir, 'meili-keys.txt');

    writeKeysFile(file, 'http://localhost:7700', KEYS);

    expect(fs.readFileSync(file, 'utf-8')).toBe(renderEnvFile('http://localhost:7700', KEYS));
    if (process.platform !== 'win32') {
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    }
  });

  it('restricts an existing keys file to the owner', () => {
    const file = path.join(tmpDir, 'meili-keys.txt');
    fs.writeFileSync(file, 'MEILI_ADMIN_KEY=old-placeholder\n', { mode: 0o644 });
    fs.chmodSync(file, 0o644);

    writeKeysFile(file, 'http://localhost:7700', KEYS);

    expect(fs.readFileSync(file, 'utf-8')).toBe(renderEnvFile('http://localhost:7700', KEYS));
    if (process.platform !== 'win32') {
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    }
  });
});

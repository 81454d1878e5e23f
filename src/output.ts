/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.render
 *
 * Generates the step summary for each mode and the env snippets for keys.
 * Summaries never include key material.
 */

import * as fs from 'fs';
import type { CatalogKeys, OperationResult, OperationHandle } from './types';
import type { ProvisionResult } from './provision';
import type { BackupResult } from './backup';

// -----------------------------------------------------------------------------
// Port: output.render
// -----------------------------------------------------------------------------

/**
 * Renders the setup summary.
 */
export function renderSetupSummary(
  host: string,
  provision: ProvisionResult,
  keys: CatalogKeys,
): string {
  const lines: string[] = [];

  lines.push('## Catalog Search Setup');
  lines.push('');
  lines.push(`**Host:** ${host} | **Index:** \`${provision.index_uid}\``);
  lines.push('');
  lines.push(
    provision.created
      ? `Index \`${provision.index_uid}\` was created and configured.`
      : `Index \`${provision.index_uid}\` already existed; settings were re-applied.`,
  );
  lines.push('');
  lines.push('| Key | Actions | Indexes |');
  lines.push('|-----|---------|---------|');
  lines.push(`| search | ${keys.search.actions.join(', ')} | ${keys.search.indexes.join(', ')} |`);
  lines.push(`| admin | ${keys.admin.actions.join(', ')} | ${keys.admin.indexes.join(', ')} |`);
  lines.push('');
  lines.push(`Tasks: ${provision.task_uids.join(', ')}`);

  return lines.join('\n');
}

/**
 * Renders the backup summary.
 */
export function renderBackupSummary(backup: BackupResult): string {
  const lines: string[] = [];

  lines.push('## Catalog Search Backup');
  lines.push('');
  lines.push(`**Dump task:** ${backup.task_uid} | **Size:** ${formatBytes(backup.size_bytes)}`);
  lines.push('');
  lines.push(`Backup written to \`${backup.backup_file}\`.`);
  if (backup.removed.length > 0) {
    lines.push('');
    lines.push('### Pruned backups');
    lines.push('');
    for (const name of backup.removed) {
      lines.push(`- ${name}`);
    }
  }

  return lines.join('\n');
}

/**
 * Renders the summary of a wait on an existing task.
 */
export function renderWaitSummary(handle: OperationHandle, result: OperationResult): string {
  const lines: string[] = [];

  lines.push('## Search Engine Task');
  lines.push('');
  lines.push(
    `**Task:** ${handle} | **Status:** ${result.status} | ` +
      `**Polls:** ${result.polls} | **Elapsed:** ${formatDuration(result.elapsed_ms)}`,
  );
  if (result.status === 'failed') {
    lines.push('');
    const code = result.cause.code ? ` (\`${result.cause.code}\`)` : '';
    lines.push(`> ${result.cause.message}${code}`);
  }

  return lines.join('\n');
}

/**
 * Renders env snippets for the frontend and backend applications.
 * Contains secrets: write only to a protected file.
 */
export function renderEnvFile(host: string, keys: CatalogKeys): string {
  return [
    '# Search API keys for the product catalog',
    '# KEEP THESE KEYS SECURE - DO NOT COMMIT',
    '',
    '# Frontend (.env.local)',
    `NEXT_PUBLIC_MEILI_HOST=${host}`,
    `NEXT_PUBLIC_MEILI_SEARCH_KEY=${keys.search.key}`,
    '',
    '# Backend (.env)',
    `MEILI_HOST=${host}`,
    `MEILI_ADMIN_KEY=${keys.admin.key}`,
    '',
  ].join('\n');
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Formats a duration in milliseconds in human-readable form.
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) {
    return secs > 0 ? `${minutes}m ${secs}s` : `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`;
}

/**
 * Formats a byte count with a binary unit.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KiB', 'MiB', 'GiB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}

/**
 * Writes the key env snippets, readable by the owner only.
 */
export function writeKeysFile(file: string, host: string, keys: CatalogKeys): void {
  fs.writeFileSync(file, renderEnvFile(host, keys), { encoding: 'utf-8', mode: 0o600 });
  // mode above only applies to a newly created file
  fs.chmodSync(file, 0o600);
}

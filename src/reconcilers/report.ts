/**
 * Update report
 *
 * Plain-text summary written to `.update-report.txt` for CI jobs and
 * chat notifications, plus the one-line console summary.
 */

import { existsSync } from 'node:fs';
import { mkdir, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ReconcileResult } from './types.js';

/** Default report file name, relative to the repository root */
export const REPORT_FILE = '.update-report.txt';

export type ReportWriteOutcome = 'written' | 'removed' | 'unchanged';

/**
 * Render the report text.
 *
 * @returns undefined when nothing changed and no major upgrade is available
 */
export function renderReport(result: Pick<ReconcileResult, 'chartChanges' | 'imageChanges' | 'majorUpgrades'>): string | undefined {
  const { chartChanges, imageChanges, majorUpgrades } = result;
  if (chartChanges.length === 0 && imageChanges.length === 0 && majorUpgrades.length === 0) {
    return undefined;
  }

  const lines: string[] = [
    'Update summary',
    '================',
    `Helm charts updated: ${chartChanges.length}`,
    `Docker images updated: ${imageChanges.length}`,
    `Major versions available: ${majorUpgrades.length}`,
    '',
  ];

  if (chartChanges.length > 0) {
    lines.push('Helm chart updates:');
    for (const c of chartChanges) {
      lines.push(`- ${c.name} (${c.kind}) ${c.from} → ${c.to}  [${c.file}]`);
    }
    lines.push('');
  }

  if (imageChanges.length > 0) {
    lines.push('Docker image updates:');
    for (const c of imageChanges) {
      lines.push(`- ${c.id}: ${c.from} → ${c.to}  [${c.file}]`);
    }
    lines.push('');
  }

  if (majorUpgrades.length > 0) {
    lines.push('⚠️ Major version upgrades available (not auto-updated):');
    for (const m of majorUpgrades) {
      lines.push(`- ${m.id}: ${m.currentTag} → ${m.availableTag} (major ${m.currentMajor} → ${m.newMajor})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Write the report, or remove a stale one when there is nothing to say.
 */
export async function writeReport(
  reportPath: string,
  result: Pick<ReconcileResult, 'chartChanges' | 'imageChanges' | 'majorUpgrades'>
): Promise<ReportWriteOutcome> {
  const text = renderReport(result);
  if (text === undefined) {
    if (existsSync(reportPath)) {
      await unlink(reportPath);
      return 'removed';
    }
    return 'unchanged';
  }
  await mkdir(dirname(reportPath), { recursive: true });
  await writeFile(reportPath, text, 'utf-8');
  return 'written';
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.floor((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * One-line summary of a run
 */
export function formatCompactSummary(result: ReconcileResult): string {
  const { stats } = result;
  const dryRunLabel = result.dryRun ? '[DRY RUN] ' : '';
  const verb = result.dryRun ? 'would update' : 'updated';
  return (
    `${dryRunLabel}${stats.applied}/${stats.total} artifacts ${verb}, ` +
    `${stats.upToDate} up to date, ${stats.skipped} skipped, ${stats.failed} failed ` +
    `(${formatDuration(stats.durationMs)})`
  );
}

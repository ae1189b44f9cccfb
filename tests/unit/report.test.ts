/**
 * Tests for the update report and run summaries
 *
 * Covers:
 * - Report text layout
 * - Writing and removing the report file
 * - Run aggregation (stats, ordering, warnings)
 * - Compact one-line summaries
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  formatCompactSummary,
  formatDuration,
  renderReport,
  writeReport,
} from '../../src/reconcilers/report.js';
import { summarizeRun } from '../../src/reconcilers/batch.js';
import type { ArtifactResult, ChartChange, ImageChange } from '../../src/reconcilers/types.js';
import type { MajorUpgradeNotice } from '../../src/versions/resolve.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const chartChange: ChartChange = {
  type: 'chart',
  kind: 'argoApplication',
  name: 'cert-manager',
  file: 'apps/cert-manager.yaml',
  from: 'v1.14.4',
  to: 'v1.15.0',
};

const imageChange: ImageChange = {
  type: 'image',
  id: 'postgres',
  file: 'workloads/app.yaml',
  from: 'postgres:16.2',
  to: 'postgres:16.3',
};

const notice: MajorUpgradeNotice = {
  id: 'postgres',
  currentTag: '16.2',
  availableTag: '17.0',
  currentMajor: 16,
  newMajor: 17,
};

const empty = { chartChanges: [], imageChanges: [], majorUpgrades: [] };

function artifact(overrides: Partial<ArtifactResult> & Pick<ArtifactResult, 'name' | 'status'>): ArtifactResult {
  return {
    type: 'image',
    source: 'dockerImage',
    changes: [],
    variantFallback: false,
    durationMs: 1,
    ...overrides,
  };
}

// =============================================================================
// renderReport
// =============================================================================

describe('renderReport', () => {
  it('returns undefined when there is nothing to report', () => {
    expect(renderReport(empty)).toBeUndefined();
  });

  it('lists updates and available majors', () => {
    const text = renderReport({ chartChanges: [chartChange], imageChanges: [imageChange], majorUpgrades: [notice] });

    expect(text).toBe(
      [
        'Update summary',
        '================',
        'Helm charts updated: 1',
        'Docker images updated: 1',
        'Major versions available: 1',
        '',
        'Helm chart updates:',
        '- cert-manager (argoApplication) v1.14.4 → v1.15.0  [apps/cert-manager.yaml]',
        '',
        'Docker image updates:',
        '- postgres: postgres:16.2 → postgres:16.3  [workloads/app.yaml]',
        '',
        '⚠️ Major version upgrades available (not auto-updated):',
        '- postgres: 16.2 → 17.0 (major 16 → 17)',
        '',
      ].join('\n')
    );
  });

  it('omits empty sections', () => {
    const text = renderReport({ chartChanges: [], imageChanges: [], majorUpgrades: [notice] });

    expect(text?.split('\n')).toEqual([
      'Update summary',
      '================',
      'Helm charts updated: 0',
      'Docker images updated: 0',
      'Major versions available: 1',
      '',
      '⚠️ Major version upgrades available (not auto-updated):',
      '- postgres: 16.2 → 17.0 (major 16 → 17)',
      '',
    ]);
  });
});

// =============================================================================
// writeReport
// =============================================================================

describe('writeReport', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `report-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes the rendered report', async () => {
    const path = join(tempDir, '.update-report.txt');
    const result = { chartChanges: [chartChange], imageChanges: [], majorUpgrades: [] };

    expect(await writeReport(path, result)).toBe('written');
    expect(readFileSync(path, 'utf-8')).toBe(renderReport(result));
  });

  it('creates missing parent directories', async () => {
    const path = join(tempDir, 'out', 'nested', 'report.txt');

    expect(await writeReport(path, { chartChanges: [chartChange], imageChanges: [], majorUpgrades: [] })).toBe('written');
    expect(existsSync(path)).toBe(true);
  });

  it('removes a stale report when nothing changed', async () => {
    const path = join(tempDir, '.update-report.txt');
    writeFileSync(path, 'old');

    expect(await writeReport(path, empty)).toBe('removed');
    expect(existsSync(path)).toBe(false);
    expect(await writeReport(path, empty)).toBe('unchanged');
  });
});

// =============================================================================
// summarizeRun
// =============================================================================

describe('summarizeRun', () => {
  it('counts statuses and sorts changes', () => {
    const redisChange: ImageChange = { ...imageChange, id: 'redis', from: 'redis:7.2', to: 'redis:7.4' };
    const results = [
      artifact({ name: 'redis', status: 'applied', changes: [redisChange] }),
      artifact({ name: 'postgres', status: 'applied', changes: [imageChange], majorUpgrade: notice }),
      artifact({ name: 'nginx', status: 'up-to-date', variantFallback: true }),
      artifact({ name: 'vault', status: 'skipped', reason: 'no versions available' }),
      artifact({ name: 'mysql', status: 'failed', error: 'boom' }),
    ];

    const run = summarizeRun(results, { dryRun: false, startedAt: '2026-01-01T00:00:00.000Z', durationMs: 42 });

    expect(run.stats).toEqual({
      total: 5,
      applied: 2,
      upToDate: 1,
      skipped: 1,
      failed: 1,
      majorUpgrades: 1,
      durationMs: 42,
    });
    expect(run.success).toBe(false);
    expect(run.imageChanges.map((change) => change.id)).toEqual(['postgres', 'redis']);
    expect(run.changedFiles).toEqual(['workloads/app.yaml']);
    expect(run.warnings).toEqual(['nginx: no versions share the current variant, resolved across variants']);
  });
});

// =============================================================================
// Formatting
// =============================================================================

describe('formatting', () => {
  it('formats durations', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });

  it('summarizes a dry run on one line', () => {
    const run = summarizeRun([artifact({ name: 'redis', status: 'applied' })], {
      dryRun: true,
      startedAt: '2026-01-01T00:00:00.000Z',
      durationMs: 250,
    });

    expect(formatCompactSummary(run)).toBe(
      '[DRY RUN] 1/1 artifacts would update, 0 up to date, 0 skipped, 0 failed (250ms)'
    );
  });

  it('summarizes an applied run', () => {
    const run = summarizeRun([artifact({ name: 'redis', status: 'up-to-date' })], {
      dryRun: false,
      startedAt: '2026-01-01T00:00:00.000Z',
      durationMs: 2000,
    });

    expect(formatCompactSummary(run)).toBe('0/1 artifacts updated, 1 up to date, 0 skipped, 0 failed (2.0s)');
  });
});

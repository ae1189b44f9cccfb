/**
 * Reconciliation result types
 */

import type { MajorUpgradeNotice } from '../versions/resolve.js';

/** Where a chart version is pinned */
export type ChartSourceKind = 'argoApplication' | 'kustomizeHelm' | 'chartDependency';

export type ArtifactStatus = 'applied' | 'up-to-date' | 'skipped' | 'failed';

/**
 * A chart version bump in one file
 */
export interface ChartChange {
  type: 'chart';
  kind: ChartSourceKind;
  name: string;
  file: string;
  from: string;
  to: string;
}

/**
 * An image reference bump; from/to are full image strings
 */
export interface ImageChange {
  type: 'image';
  id: string;
  file: string;
  from: string;
  to: string;
}

export type VersionChange = ChartChange | ImageChange;

/**
 * Outcome of reconciling one inventory entry
 */
export interface ArtifactResult {
  type: 'chart' | 'image';
  /** Chart name or image id */
  name: string;
  source: ChartSourceKind | 'dockerImage';
  status: ArtifactStatus;
  /** Why nothing was applied (skipped) */
  reason?: string;
  /** Failure message (failed) */
  error?: string;
  /** Edits made, or that would be made in dry-run */
  changes: VersionChange[];
  majorUpgrade?: MajorUpgradeNotice;
  /** Candidates were taken across variants because none shared the current one */
  variantFallback: boolean;
  durationMs: number;
}

/**
 * Aggregated statistics for a run
 */
export interface ReconcileStats {
  total: number;
  applied: number;
  upToDate: number;
  skipped: number;
  failed: number;
  majorUpgrades: number;
  durationMs: number;
}

export interface ReconcileResult {
  /** True when no artifact failed */
  success: boolean;
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  stats: ReconcileStats;
  results: ArtifactResult[];
  chartChanges: ChartChange[];
  imageChanges: ImageChange[];
  majorUpgrades: MajorUpgradeNotice[];
  /** Files edited (or that would be edited), sorted */
  changedFiles: string[];
  warnings: string[];
}

/**
 * Per-location outcome inside one artifact
 */
export type LocationOutcome =
  | { status: 'applied'; change: VersionChange }
  | { status: 'up-to-date' }
  | { status: 'skipped'; reason: string };

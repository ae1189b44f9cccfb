/**
 * Batch reconciliation
 *
 * Runs every chart and image artifact of the config with bounded
 * concurrency:
 * - Failure isolation (one artifact's error never aborts its siblings)
 * - Per-registry request gates
 * - Aggregated, stable (sorted) results regardless of completion order
 */

import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { ImageEntry, UpdateConfig } from '../config/types.js';
import { Gate, Mutex } from '../concurrency/gate.js';
import { RegistryGates } from '../concurrency/registry-gates.js';
import { compileIgnoreRules } from '../ignore/rules.js';
import { compareStrings } from '../utils/sort.js';
import type { VersionProvider } from '../registries/index.js';
import type { MajorUpgradeNotice } from '../versions/resolve.js';
import { chartArtifacts, reconcileChart, type ChartArtifact } from './charts.js';
import type { ReconcileContext } from './context.js';
import { reconcileImage } from './images.js';
import { ManifestEditor } from './manifest-file.js';
import type {
  ArtifactResult,
  ChartChange,
  ImageChange,
  ReconcileResult,
  ReconcileStats,
} from './types.js';

/** Default number of artifacts in flight */
export const DEFAULT_CONCURRENCY = 10;

export type ArtifactScope = 'charts' | 'images';

export interface ReconcileOptions {
  /** Repository root that inventory paths are relative to */
  root: string;
  provider: VersionProvider;
  /** Per-registry gates (default: built from the standard limits) */
  gates?: RegistryGates;
  /** Maximum artifacts processed at once */
  concurrency?: number;
  /** Resolve and patch in memory without writing files */
  dryRun?: boolean;
  /** Restrict the run to one artifact family */
  only?: ArtifactScope;
  logger?: ApiLogger;
  /** Called as each artifact completes */
  onArtifactComplete?: (result: ArtifactResult) => void;
}

type Task = { type: 'chart'; artifact: ChartArtifact } | { type: 'image'; entry: ImageEntry };

function taskLabel(task: Task): Pick<ArtifactResult, 'type' | 'name' | 'source'> {
  return task.type === 'chart'
    ? { type: 'chart', name: task.artifact.name, source: task.artifact.source }
    : { type: 'image', name: task.entry.id, source: 'dockerImage' };
}

function buildTasks(config: UpdateConfig, only: ArtifactScope | undefined): Task[] {
  const tasks: Task[] = [];
  if (only !== 'images') {
    for (const artifact of chartArtifacts(config)) {
      tasks.push({ type: 'chart', artifact });
    }
  }
  if (only !== 'charts') {
    for (const entry of config.dockerImages ?? []) {
      tasks.push({ type: 'image', entry });
    }
  }
  return tasks;
}

/**
 * Reconcile every artifact of a config.
 */
export async function reconcileAll(config: UpdateConfig, options: ReconcileOptions): Promise<ReconcileResult> {
  const startedAt = new Date().toISOString();
  const startTime = Date.now();
  const log = options.logger ?? defaultLogger;
  const dryRun = options.dryRun ?? false;

  const { ruleSet, warnings: ruleWarnings } = compileIgnoreRules(config.ignore);
  for (const warning of ruleWarnings) {
    log.warn(warning);
  }

  const ctx: ReconcileContext = {
    editor: new ManifestEditor(options.root, { dryRun, mutex: new Mutex() }),
    provider: options.provider,
    gates: options.gates ?? new RegistryGates(),
    rules: ruleSet,
    logger: log,
  };

  const tasks = buildTasks(config, options.only);
  const gate = new Gate(options.concurrency ?? DEFAULT_CONCURRENCY);

  log.debug(`Reconciling ${tasks.length} artifacts`, {
    dryRun,
    concurrency: gate.limit,
    registryLimits: ctx.gates.limits(),
  });

  /**
   * Process a single artifact; errors become a failed outcome
   */
  async function processTask(task: Task): Promise<ArtifactResult> {
    const taskStart = Date.now();
    let result: ArtifactResult;
    try {
      result =
        task.type === 'chart' ? await reconcileChart(task.artifact, ctx) : await reconcileImage(task.entry, ctx);
    } catch (err) {
      const label = taskLabel(task);
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Failed to process ${label.name}`, err instanceof Error ? err : undefined, {
        source: label.source,
      });
      result = {
        ...label,
        status: 'failed',
        error: message,
        changes: [],
        variantFallback: false,
        durationMs: Date.now() - taskStart,
      };
    }
    options.onArtifactComplete?.(result);
    return result;
  }

  const results = await Promise.all(tasks.map((task) => gate.run(() => processTask(task))));
  return summarizeRun(results, {
    dryRun,
    startedAt,
    durationMs: Date.now() - startTime,
    warnings: ruleWarnings,
  });
}

/**
 * Aggregate artifact results into a sorted run result.
 */
export function summarizeRun(
  results: ArtifactResult[],
  meta: { dryRun: boolean; startedAt: string; durationMs: number; warnings?: string[] }
): ReconcileResult {
  const stats: ReconcileStats = {
    total: results.length,
    applied: 0,
    upToDate: 0,
    skipped: 0,
    failed: 0,
    majorUpgrades: 0,
    durationMs: meta.durationMs,
  };

  const chartChanges: ChartChange[] = [];
  const imageChanges: ImageChange[] = [];
  const majorUpgrades: MajorUpgradeNotice[] = [];
  const changedFiles = new Set<string>();
  const warnings = [...(meta.warnings ?? [])];

  for (const result of results) {
    switch (result.status) {
      case 'applied':
        stats.applied++;
        break;
      case 'up-to-date':
        stats.upToDate++;
        break;
      case 'skipped':
        stats.skipped++;
        break;
      case 'failed':
        stats.failed++;
        break;
    }

    for (const change of result.changes) {
      changedFiles.add(change.file);
      if (change.type === 'chart') {
        chartChanges.push(change);
      } else {
        imageChanges.push(change);
      }
    }
    if (result.majorUpgrade) {
      majorUpgrades.push(result.majorUpgrade);
    }
    if (result.variantFallback) {
      warnings.push(`${result.name}: no versions share the current variant, resolved across variants`);
    }
  }
  stats.majorUpgrades = majorUpgrades.length;

  chartChanges.sort(
    (a, b) => compareStrings(a.name, b.name) || compareStrings(a.kind, b.kind) || compareStrings(a.file, b.file)
  );
  imageChanges.sort((a, b) => compareStrings(a.id, b.id) || compareStrings(a.file, b.file));
  majorUpgrades.sort((a, b) => compareStrings(a.id, b.id));

  return {
    success: stats.failed === 0,
    dryRun: meta.dryRun,
    startedAt: meta.startedAt,
    completedAt: new Date().toISOString(),
    stats,
    results,
    chartChanges,
    imageChanges,
    majorUpgrades,
    changedFiles: [...changedFiles].sort(),
    warnings,
  };
}

/**
 * update command - Bump pinned chart and image versions
 *
 * Safe update policy:
 * - Only versions within the current major are applied
 * - Newer majors are reported, never applied
 * - One artifact's failure never aborts the run
 */

import { isAbsolute, resolve } from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import { loadUpdateConfig } from '../config/loader.js';
import { RegistryGates } from '../concurrency/registry-gates.js';
import { DEFAULT_TIMEOUT_MS } from '../api/http.js';
import { DEFAULT_CACHE_DIR, DEFAULT_CACHE_TTL_MS, ResponseCache } from '../api/cache.js';
import { credentialsFromEnv, RegistryClients, type RegistryCredentials, type VersionProvider } from '../registries/index.js';
import {
  DEFAULT_CONCURRENCY,
  formatCompactSummary,
  reconcileAll,
  REPORT_FILE,
  writeReport,
  type ArtifactScope,
  type ReconcileResult,
  type ReportWriteOutcome,
} from '../reconcilers/index.js';
import {
  dryRunNotice,
  header,
  info,
  printChanges,
  printFiles,
  printMajorUpgrades,
  printStats,
  warn,
} from '../utils/output.js';
import { VERSION } from '../version.js';

export interface UpdateOptions {
  /** Resolve everything but write no files */
  dryRun?: boolean;
  /** Report path, relative to the root unless absolute */
  report?: string;
  /** Artifacts in flight at once */
  concurrency?: number;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  only?: ArtifactScope;
  /** Version source (default: live registry clients) */
  provider?: VersionProvider;
  /** Registry credentials (default: from the environment) */
  credentials?: RegistryCredentials;
  /** Persist registry responses between runs (default: true) */
  cache?: boolean;
  /** Cache directory, relative to the root unless absolute */
  cacheDir?: string;
  /** Age after which cached responses are refetched */
  cacheTtlMs?: number;
}

export interface UpdateSummary extends ReconcileResult {
  reportPath: string;
  report: ReportWriteOutcome | 'skipped' | 'failed';
}

function resolvePath(root: string, path: string): string {
  return isAbsolute(path) ? path : resolve(root, path);
}

function createCache(ctx: CommandContext, options: UpdateOptions): ResponseCache {
  const dir = resolvePath(ctx.root, options.cacheDir ?? DEFAULT_CACHE_DIR);
  const ttlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
  ctx.logger.debug('Registry response cache', { dir, ttlMs });
  return new ResponseCache({ dir, ttlMs, logger: ctx.logger });
}

/**
 * Execute the update command
 */
export async function updateCommand(
  ctx: CommandContext,
  options: UpdateOptions = {}
): Promise<CommandResult<UpdateSummary>> {
  const { outputFormat, logger } = ctx;
  const human = outputFormat === 'human';
  const dryRun = options.dryRun ?? false;

  const loaded = await loadUpdateConfig(ctx.configPath);
  for (const warning of loaded.warnings) {
    logger.warn(warning);
  }

  const credentials = options.credentials ?? credentialsFromEnv();
  const gates = new RegistryGates({ dockerHubAuthenticated: credentials.dockerHub !== undefined });
  if (credentials.dockerHub) {
    logger.info('Docker Hub: authenticated');
  } else {
    logger.info('Docker Hub: anonymous (set DOCKERHUB_USERNAME and DOCKERHUB_TOKEN to raise limits)');
  }

  const provider =
    options.provider ??
    new RegistryClients({
      credentials,
      logger,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      userAgent: `manifest-bumper/${VERSION}`,
      cache: options.cache === false ? undefined : createCache(ctx, options),
    });

  if (human) {
    header('Update');
    if (dryRun) dryRunNotice();
  }

  const result = await reconcileAll(loaded.config, {
    root: ctx.root,
    provider,
    gates,
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    dryRun,
    only: options.only,
    logger,
  });

  const reportPath = resolvePath(ctx.root, options.report ?? REPORT_FILE);
  const warnings = [...loaded.warnings, ...result.warnings];
  let report: UpdateSummary['report'] = 'skipped';
  if (!dryRun) {
    try {
      report = await writeReport(reportPath, result);
    } catch (err) {
      // Manifests are already written; the run still completes
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to write report ${reportPath}`, err instanceof Error ? err : undefined);
      warnings.push(`report: ${message}`);
      report = 'failed';
    }
  }

  const errors = result.results
    .filter((r) => r.status === 'failed')
    .map((r) => `${r.name}: ${r.error ?? 'unknown error'}`);

  if (human) {
    printChanges([...result.chartChanges, ...result.imageChanges], dryRun);
    printMajorUpgrades(result.majorUpgrades);
    printStats(result.stats);
    if (result.changedFiles.length > 0) {
      printFiles(dryRun ? 'Files that would change:' : 'Changed files:', result.changedFiles);
    } else {
      info('No changes detected.');
    }
    if (report === 'written') {
      info(`Report written to ${reportPath}`);
    }
    for (const skippedResult of result.results.filter((r) => r.status === 'skipped')) {
      warn(`${skippedResult.name}: ${skippedResult.reason ?? 'skipped'}`);
    }
  }

  return {
    // Artifact failures are reported, not fatal
    success: true,
    message: formatCompactSummary(result),
    data: { ...result, reportPath, report },
    errors: errors.length > 0 ? errors : undefined,
    warnings: warnings.length > 0 ? warnings : undefined,
  };
}

/**
 * discover command - Scan the repository and (re)generate the update config
 */

import { existsSync } from 'node:fs';
import type { CommandContext, CommandResult } from '../types.js';
import type { UpdateConfig } from '../config/types.js';
import { loadUpdateConfig, stringifyUpdateConfig, writeUpdateConfig } from '../config/loader.js';
import { discoverInventory, mergeInventories, type SkippedDiscovery } from '../discover/index.js';
import { dryRunNotice, header, info, warn } from '../utils/output.js';

export interface DiscoverOptions {
  /** Print the resulting config instead of writing it */
  dryRun?: boolean;
}

export interface DiscoverSummary {
  configPath: string;
  filesScanned: number;
  /** Whether an existing config was merged */
  merged: boolean;
  written: boolean;
  counts: {
    argoApps: number;
    kustomizeHelmCharts: number;
    chartDependencies: number;
    dockerImages: number;
  };
  skipped: SkippedDiscovery[];
  config: UpdateConfig;
}

function countSections(config: UpdateConfig): DiscoverSummary['counts'] {
  return {
    argoApps: config.argoApps?.length ?? 0,
    kustomizeHelmCharts: config.kustomizeHelmCharts?.length ?? 0,
    chartDependencies: config.chartDependencies?.length ?? 0,
    dockerImages: config.dockerImages?.length ?? 0,
  };
}

/**
 * Execute the discover command
 */
export async function discoverCommand(
  ctx: CommandContext,
  options: DiscoverOptions = {}
): Promise<CommandResult<DiscoverSummary>> {
  const { outputFormat, configPath, logger } = ctx;
  const human = outputFormat === 'human';
  const dryRun = options.dryRun ?? false;

  if (human) {
    header('Discover');
    if (dryRun) dryRunNotice();
    info(`Scanning ${ctx.root}...`);
  }

  const discovered = await discoverInventory(ctx.root, { logger });
  const warnings = [...discovered.warnings];

  let config: UpdateConfig;
  let skipped: SkippedDiscovery[] = [];
  const merged = existsSync(configPath);
  if (merged) {
    const existing = await loadUpdateConfig(configPath);
    warnings.push(...existing.warnings);
    const result = mergeInventories(existing.config, discovered.inventory);
    warnings.push(...result.warnings);
    config = result.config;
    skipped = result.skipped;
  } else {
    config = discovered.inventory;
  }

  for (const entry of skipped) {
    logger.info(`Skipping discovered ${entry.section} entry ${entry.name}: ${entry.reason}`);
  }

  const counts = countSections(config);
  if (dryRun) {
    if (human) {
      process.stdout.write(stringifyUpdateConfig(config));
    }
  } else {
    await writeUpdateConfig(configPath, config);
  }

  if (human) {
    for (const warning of warnings) {
      warn(warning);
    }
    info(`Argo CD Applications: ${counts.argoApps}`);
    info(`Kustomize Helm charts: ${counts.kustomizeHelmCharts}`);
    info(`Chart.yaml dependencies: ${counts.chartDependencies}`);
    info(`Docker images: ${counts.dockerImages}`);
    if (skipped.length > 0) {
      info(`Ignored ${skipped.length} discovered resource(s) based on ignore rules`);
    }
  }

  const verb = dryRun ? 'Would write' : merged ? 'Merged into' : 'Created';
  return {
    success: true,
    message: `${verb} ${configPath}`,
    data: {
      configPath,
      filesScanned: discovered.filesScanned,
      merged,
      written: !dryRun,
      counts,
      skipped,
      config,
    },
    warnings,
  };
}

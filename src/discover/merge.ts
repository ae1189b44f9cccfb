/**
 * Merge freshly discovered inventory into an existing config
 *
 * The existing `ignore` section is kept as-is. Discovered entries hit by
 * a whole-artifact ignore rule are dropped; for everything else entries
 * already in the config win over discovered ones with the same key, so
 * manual edits survive re-discovery.
 */

import type { ArgoAppEntry, ChartEntry, ImageEntry, InventorySection, UpdateConfig } from '../config/types.js';
import { compileIgnoreRules, shouldIgnore, type ArtifactIdentity, type IgnoreRuleSet } from '../ignore/rules.js';
import { byKeys } from '../utils/sort.js';

export interface SkippedDiscovery {
  section: InventorySection;
  name: string;
  reason: string;
}

export interface MergeResult {
  config: UpdateConfig;
  /** Discovered entries dropped by ignore rules */
  skipped: SkippedDiscovery[];
  /** Ignore rule compilation warnings */
  warnings: string[];
}

function mergeSection<T>(
  section: InventorySection,
  existing: T[] | undefined,
  discovered: T[] | undefined,
  keyOf: (item: T) => string,
  identityOf: (item: T) => ArtifactIdentity,
  labelOf: (item: T) => string,
  order: (a: T, b: T) => number,
  ruleSet: IgnoreRuleSet,
  skipped: SkippedDiscovery[]
): T[] {
  const merged = new Map<string, T>();

  for (const item of discovered ?? []) {
    const decision = shouldIgnore(identityOf(item), '', ruleSet);
    if (decision.ignored) {
      skipped.push({ section, name: labelOf(item), reason: decision.reason ?? 'ignored' });
      continue;
    }
    merged.set(keyOf(item), item);
  }
  for (const item of existing ?? []) {
    merged.set(keyOf(item), item);
  }

  return [...merged.values()].sort(order);
}

const chartIdentity = (item: { name: string }): ArtifactIdentity => ({ kind: 'helm-chart', name: item.name });

export function mergeInventories(existing: UpdateConfig, discovered: UpdateConfig): MergeResult {
  const { ruleSet, warnings } = compileIgnoreRules(existing.ignore);
  const skipped: SkippedDiscovery[] = [];
  const config: UpdateConfig = {};

  if (existing.ignore) {
    config.ignore = existing.ignore;
  }

  config.argoApps = mergeSection<ArgoAppEntry>(
    'argoApps',
    existing.argoApps,
    discovered.argoApps,
    (item) => `${item.name}\0${item.file}`,
    chartIdentity,
    (item) => item.name,
    byKeys((item) => item.name, (item) => item.repoUrl, (item) => item.file),
    ruleSet,
    skipped
  );

  for (const section of ['kustomizeHelmCharts', 'chartDependencies'] as const) {
    config[section] = mergeSection<ChartEntry>(
      section,
      existing[section],
      discovered[section],
      (item) => `${item.name}\0${item.repoUrl}`,
      chartIdentity,
      (item) => item.name,
      byKeys((item) => item.name, (item) => item.repoUrl),
      ruleSet,
      skipped
    );
  }

  config.dockerImages = mergeSection<ImageEntry>(
    'dockerImages',
    existing.dockerImages,
    discovered.dockerImages,
    (item) => `${item.registry}\0${item.repository}`,
    (item) => ({ kind: 'container-image', id: item.id, repository: item.repository }),
    (item) => item.id,
    byKeys((item) => item.id, (item) => item.registry, (item) => item.repository),
    ruleSet,
    skipped
  );

  return { config, skipped, warnings };
}

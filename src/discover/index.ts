/**
 * Repository discovery
 *
 * Scans a repository for Helm chart and container image references and
 * builds the inventory sections of the update config.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { ArgoAppEntry, ChartEntry, ImageEntry, UpdateConfig } from '../config/types.js';
import { loadManifestValues } from '../patch/locate.js';
import {
  extractArgoApps,
  extractChartDependencies,
  extractImages,
  extractKustomizeCharts,
  type ChartReference,
} from './extractors.js';
import { baseName, listManifestFiles } from './walk.js';
import { compareStrings } from '../utils/sort.js';

export { findRepoRoot, resolveRepoRoot } from './repo-root.js';
export { listManifestFiles } from './walk.js';
export { parseImageReference, splitImageTag, isTrackableImage, imageId, type ImageReference } from './image-ref.js';
export { mergeInventories, type MergeResult, type SkippedDiscovery } from './merge.js';
export * from './extractors.js';

export interface DiscoveryResult {
  /** Inventory sections only; never carries ignore rules */
  inventory: UpdateConfig;
  /** Number of YAML files scanned */
  filesScanned: number;
  /** Files that could not be read */
  warnings: string[];
}

export interface DiscoveryOptions {
  logger?: ApiLogger;
}

const KUSTOMIZATION_FILES = new Set(['kustomization.yaml', 'kustomization.yml']);
const CHART_FILE = 'Chart.yaml';

/**
 * Group chart references by (name, repoUrl) with sorted file lists.
 */
export function groupChartReferences(refs: ChartReference[]): ChartEntry[] {
  const groups = new Map<string, ChartEntry>();
  for (const ref of refs) {
    const key = `${ref.name}\0${ref.repoUrl}`;
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { name: ref.name, repoUrl: ref.repoUrl, files: [ref.file] });
    } else if (!group.files.includes(ref.file)) {
      group.files.push(ref.file);
    }
  }

  const entries = [...groups.values()];
  for (const entry of entries) {
    entry.files.sort();
  }
  return entries.sort((a, b) => compareStrings(a.name, b.name));
}

/**
 * First occurrence per (registry, repository), sorted by id.
 */
export function dedupeImages(images: ImageEntry[]): ImageEntry[] {
  const seen = new Map<string, ImageEntry>();
  for (const image of images) {
    const key = `${image.registry}\0${image.repository}`;
    if (!seen.has(key)) {
      seen.set(key, image);
    }
  }
  return [...seen.values()].sort((a, b) => compareStrings(a.id, b.id));
}

/**
 * Scan root and build the inventory.
 */
export async function discoverInventory(root: string, options: DiscoveryOptions = {}): Promise<DiscoveryResult> {
  const log = options.logger ?? defaultLogger;
  const files = await listManifestFiles(root);
  const warnings: string[] = [];

  const argoApps: ArgoAppEntry[] = [];
  const kustomizeRefs: ChartReference[] = [];
  const dependencyRefs: ChartReference[] = [];
  const images: ImageEntry[] = [];

  const parsed = await Promise.all(
    files.map(async (file) => {
      try {
        const text = await readFile(join(root, file), 'utf-8');
        return { file, documents: loadManifestValues(text) };
      } catch (err) {
        warnings.push(`${file}: ${err instanceof Error ? err.message : String(err)}`);
        return { file, documents: [] };
      }
    })
  );

  for (const { file, documents } of parsed) {
    const name = baseName(file);
    argoApps.push(...extractArgoApps(file, documents));
    if (KUSTOMIZATION_FILES.has(name)) {
      kustomizeRefs.push(...extractKustomizeCharts(file, documents));
    }
    if (name === CHART_FILE) {
      dependencyRefs.push(...extractChartDependencies(file, documents));
    }
    images.push(...extractImages(file, documents));
  }

  const inventory: UpdateConfig = {};
  const sortedApps = argoApps.sort((a, b) => compareStrings(a.name, b.name) || compareStrings(a.file, b.file));
  const kustomizeHelmCharts = groupChartReferences(kustomizeRefs);
  const chartDependencies = groupChartReferences(dependencyRefs);
  const dockerImages = dedupeImages(images);

  if (sortedApps.length > 0) inventory.argoApps = sortedApps;
  if (kustomizeHelmCharts.length > 0) inventory.kustomizeHelmCharts = kustomizeHelmCharts;
  if (chartDependencies.length > 0) inventory.chartDependencies = chartDependencies;
  if (dockerImages.length > 0) inventory.dockerImages = dockerImages;

  log.debug('Discovery complete', {
    filesScanned: files.length,
    argoApps: sortedApps.length,
    kustomizeHelmCharts: kustomizeHelmCharts.length,
    chartDependencies: chartDependencies.length,
    dockerImages: dockerImages.length,
  });

  return { inventory, filesScanned: files.length, warnings };
}

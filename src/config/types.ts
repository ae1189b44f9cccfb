/**
 * Update configuration types (.update-config.yaml)
 */

import type { YamlPath } from '../patch/locate.js';

// ============================================================================
// Ignore Rules
// ============================================================================

export interface HelmChartIgnore {
  /** Chart name */
  name: string;
  /** Upstream versions matching this pattern are never proposed */
  versionPattern?: string;
}

export interface DockerImageIgnore {
  /** Image id as recorded in dockerImages[] */
  id?: string;
  /** Image repository, e.g. library/postgres */
  repository?: string;
  /** Upstream tags matching this pattern are never proposed */
  tagPattern?: string;
}

export interface IgnoreConfig {
  helmCharts?: HelmChartIgnore[];
  dockerImages?: DockerImageIgnore[];
}

// ============================================================================
// Inventory
// ============================================================================

/**
 * Argo CD Application pinned to a Helm chart via spec.source.targetRevision
 */
export interface ArgoAppEntry {
  name: string;
  repoUrl: string;
  file: string;
}

/**
 * Chart referenced from kustomization.yaml helmCharts[] or Chart.yaml dependencies[]
 */
export interface ChartEntry {
  name: string;
  repoUrl: string;
  files: string[];
}

/**
 * Container image reference in a workload manifest
 */
export interface ImageEntry {
  id: string;
  /** `dockerhub` or a registry host such as ghcr.io */
  registry: string;
  repository: string;
  file: string;
  /** Path to the image string inside the document */
  yamlPath: YamlPath;
  /** Document index in a multi-document file, when not the first */
  document?: number;
}

export interface UpdateConfig {
  ignore?: IgnoreConfig;
  argoApps?: ArgoAppEntry[];
  kustomizeHelmCharts?: ChartEntry[];
  chartDependencies?: ChartEntry[];
  dockerImages?: ImageEntry[];
}

export type InventorySection = 'argoApps' | 'kustomizeHelmCharts' | 'chartDependencies' | 'dockerImages';

export const INVENTORY_SECTIONS: readonly InventorySection[] = [
  'argoApps',
  'kustomizeHelmCharts',
  'chartDependencies',
  'dockerImages',
];

// ============================================================================
// Errors
// ============================================================================

/**
 * Config error codes
 */
export type ConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_READ_ERROR'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID';

/**
 * Errors that can occur while loading the update config
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

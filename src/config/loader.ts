/**
 * Update config loading
 *
 * Reads `.update-config.yaml`, validates it section by section and turns
 * it into a typed {@link UpdateConfig}. A missing or unparseable file is
 * fatal; a malformed entry is dropped with a warning.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { YamlPath } from '../patch/locate.js';
import { isRecord, type Fields } from '../utils/guards.js';
import {
  ConfigError,
  type ArgoAppEntry,
  type ChartEntry,
  type DockerImageIgnore,
  type HelmChartIgnore,
  type IgnoreConfig,
  type ImageEntry,
  type UpdateConfig,
} from './types.js';

/** Default config file name, relative to the repository root */
export const CONFIG_FILE = '.update-config.yaml';

export interface LoadedConfig {
  config: UpdateConfig;
  /** Absolute path the config was read from */
  path: string;
  /** Entries dropped during validation */
  warnings: string[];
}

// =============================================================================
// Narrowing Helpers
// =============================================================================

function stringField(record: Fields, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function listOf<T>(
  raw: unknown,
  section: string,
  warnings: string[],
  parseEntry: (entry: Fields) => T | string
): T[] | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!Array.isArray(raw)) {
    warnings.push(`${section}: expected a list, ignoring section`);
    return undefined;
  }

  const entries: T[] = [];
  raw.forEach((item: unknown, index) => {
    if (!isRecord(item)) {
      warnings.push(`${section}[${index}]: expected a mapping, skipping entry`);
      return;
    }
    const parsed = parseEntry(item);
    if (typeof parsed === 'string') {
      warnings.push(`${section}[${index}]: ${parsed}, skipping entry`);
      return;
    }
    entries.push(parsed);
  });
  return entries;
}

function missing(...fields: string[]): string {
  return fields.length === 1
    ? `missing required field '${fields[0]}'`
    : `missing required fields ${fields.map((f) => `'${f}'`).join(', ')}`;
}

// =============================================================================
// Entry Parsers
// =============================================================================

function parseHelmIgnore(entry: Fields): HelmChartIgnore | string {
  const name = stringField(entry, 'name');
  if (!name) return missing('name');
  const versionPattern = stringField(entry, 'versionPattern');
  return versionPattern === undefined ? { name } : { name, versionPattern };
}

function parseImageIgnore(entry: Fields): DockerImageIgnore | string {
  const rule: DockerImageIgnore = {};
  const id = stringField(entry, 'id');
  const repository = stringField(entry, 'repository');
  const tagPattern = stringField(entry, 'tagPattern');
  if (id === undefined && repository === undefined) {
    return `needs 'id' or 'repository'`;
  }
  if (id !== undefined) rule.id = id;
  if (repository !== undefined) rule.repository = repository;
  if (tagPattern !== undefined) rule.tagPattern = tagPattern;
  return rule;
}

function parseArgoApp(entry: Fields): ArgoAppEntry | string {
  const name = stringField(entry, 'name');
  const repoUrl = stringField(entry, 'repoUrl');
  const file = stringField(entry, 'file');
  if (!name || !repoUrl || !file) {
    return missing(...['name', 'repoUrl', 'file'].filter((key) => !stringField(entry, key)));
  }
  return { name, repoUrl, file };
}

function parseChart(entry: Fields): ChartEntry | string {
  const name = stringField(entry, 'name');
  const repoUrl = stringField(entry, 'repoUrl');
  if (!name || !repoUrl) {
    return missing(...['name', 'repoUrl'].filter((key) => !stringField(entry, key)));
  }

  const files: string[] = [];
  if (Array.isArray(entry.files)) {
    for (const file of entry.files) {
      if (typeof file === 'string' && file.length > 0) {
        files.push(file);
      }
    }
  }
  const single = stringField(entry, 'file');
  if (single && !files.includes(single)) {
    files.push(single);
  }
  if (files.length === 0) {
    return missing('files');
  }
  return { name, repoUrl, files };
}

function parseYamlPath(raw: unknown): YamlPath | undefined {
  if (!Array.isArray(raw) || raw.length === 0) {
    return undefined;
  }
  const path: YamlPath = [];
  for (const segment of raw) {
    if (typeof segment === 'string' || (typeof segment === 'number' && Number.isInteger(segment))) {
      path.push(segment);
    } else {
      return undefined;
    }
  }
  return path;
}

function parseImage(entry: Fields): ImageEntry | string {
  const id = stringField(entry, 'id');
  const repository = stringField(entry, 'repository');
  const file = stringField(entry, 'file');
  if (!id || !repository || !file) {
    return missing(...['id', 'repository', 'file'].filter((key) => !stringField(entry, key)));
  }
  const yamlPath = parseYamlPath(entry.yamlPath);
  if (!yamlPath) {
    return `invalid or missing 'yamlPath'`;
  }

  const image: ImageEntry = {
    id,
    registry: stringField(entry, 'registry') ?? 'dockerhub',
    repository,
    file,
    yamlPath,
  };
  if (typeof entry.document === 'number' && Number.isInteger(entry.document) && entry.document > 0) {
    image.document = entry.document;
  }
  return image;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate parsed YAML content into an update config.
 *
 * @throws ConfigError when the top level is not a mapping
 */
export function parseUpdateConfig(
  data: unknown,
  sourcePath?: string
): { config: UpdateConfig; warnings: string[] } {
  if (data === null || data === undefined) {
    return { config: {}, warnings: [] };
  }
  if (!isRecord(data)) {
    throw new ConfigError('Update config must be a mapping at the top level', 'CONFIG_INVALID', {
      path: sourcePath,
    });
  }

  const warnings: string[] = [];
  const config: UpdateConfig = {};

  if (data.ignore !== undefined && data.ignore !== null) {
    if (isRecord(data.ignore)) {
      const ignore: IgnoreConfig = {};
      const helmCharts = listOf(data.ignore.helmCharts, 'ignore.helmCharts', warnings, parseHelmIgnore);
      const dockerImages = listOf(data.ignore.dockerImages, 'ignore.dockerImages', warnings, parseImageIgnore);
      if (helmCharts) ignore.helmCharts = helmCharts;
      if (dockerImages) ignore.dockerImages = dockerImages;
      config.ignore = ignore;
    } else {
      warnings.push('ignore: expected a mapping, ignoring section');
    }
  }

  const argoApps = listOf(data.argoApps, 'argoApps', warnings, parseArgoApp);
  const kustomizeHelmCharts = listOf(data.kustomizeHelmCharts, 'kustomizeHelmCharts', warnings, parseChart);
  const chartDependencies = listOf(data.chartDependencies, 'chartDependencies', warnings, parseChart);
  const dockerImages = listOf(data.dockerImages, 'dockerImages', warnings, parseImage);

  if (argoApps) config.argoApps = argoApps;
  if (kustomizeHelmCharts) config.kustomizeHelmCharts = kustomizeHelmCharts;
  if (chartDependencies) config.chartDependencies = chartDependencies;
  if (dockerImages) config.dockerImages = dockerImages;

  return { config, warnings };
}

/**
 * Resolve a config path against the repository root.
 */
export function resolveConfigPath(root: string, configPath: string = CONFIG_FILE): string {
  return isAbsolute(configPath) ? configPath : resolve(root, configPath);
}

/**
 * Load and validate the update config.
 *
 * @throws ConfigError if the file is missing, unreadable or not valid YAML
 */
export async function loadUpdateConfig(configPath: string): Promise<LoadedConfig> {
  if (!existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found: ${configPath}. Run 'manifest-bumper discover' to generate it.`,
      'CONFIG_NOT_FOUND',
      { path: configPath }
    );
  }

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read config file: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_READ_ERROR',
      { path: configPath, originalError: err }
    );
  }

  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse config YAML: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR',
      { path: configPath, originalError: err }
    );
  }

  const { config, warnings } = parseUpdateConfig(data, configPath);
  return { config, path: configPath, warnings };
}

/**
 * Load the config if it exists, otherwise return an empty one.
 */
export async function loadUpdateConfigIfPresent(configPath: string): Promise<LoadedConfig> {
  if (!existsSync(configPath)) {
    return { config: {}, path: configPath, warnings: [] };
  }
  return loadUpdateConfig(configPath);
}

/**
 * Serialize a config to YAML text, ignore rules first.
 */
export function stringifyUpdateConfig(config: UpdateConfig): string {
  const ordered: UpdateConfig = {};
  if (config.ignore) ordered.ignore = config.ignore;
  if (config.argoApps) ordered.argoApps = config.argoApps;
  if (config.kustomizeHelmCharts) ordered.kustomizeHelmCharts = config.kustomizeHelmCharts;
  if (config.chartDependencies) ordered.chartDependencies = config.chartDependencies;
  if (config.dockerImages) ordered.dockerImages = config.dockerImages;
  return stringifyYaml(ordered);
}

/**
 * Write a config file.
 */
export async function writeUpdateConfig(configPath: string, config: UpdateConfig): Promise<void> {
  await writeFile(configPath, stringifyUpdateConfig(config), 'utf-8');
}

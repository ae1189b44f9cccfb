/**
 * Helm chart repository index
 *
 * A chart repository serves `index.yaml` listing every published version
 * under `entries.<chart>[].version`. Each index is downloaded once per
 * run and shared by every chart that points at the same repository.
 */

import { parse as parseYaml } from 'yaml';
import { isRecord } from '../utils/guards.js';
import type { RegistryContext } from './types.js';

/** Parsed index: chart name to its published versions */
export type HelmIndex = Map<string, string[]>;

/**
 * URL of a repository's index file.
 */
export function indexUrl(repoUrl: string): string {
  return `${repoUrl.replace(/\/+$/, '')}/index.yaml`;
}

/**
 * Parse index.yaml text into chart versions.
 */
export function parseHelmIndex(text: string): HelmIndex {
  const index: HelmIndex = new Map();
  const data: unknown = parseYaml(text);
  if (!isRecord(data) || !isRecord(data.entries)) {
    return index;
  }

  for (const [chart, entries] of Object.entries(data.entries)) {
    if (!Array.isArray(entries)) {
      continue;
    }
    const versions: string[] = [];
    for (const entry of entries) {
      if (!isRecord(entry)) continue;
      const version = entry.version;
      if (typeof version === 'string' || typeof version === 'number') {
        versions.push(String(version));
      }
    }
    index.set(chart, versions);
  }
  return index;
}

export class HelmIndexCache {
  private readonly indexes = new Map<string, Promise<HelmIndex>>();

  constructor(private readonly ctx: RegistryContext) {}

  /**
   * Fetch (or reuse) the parsed index of a repository.
   */
  fetchIndex(repoUrl: string): Promise<HelmIndex> {
    const url = indexUrl(repoUrl);
    let pending = this.indexes.get(url);
    if (!pending) {
      pending = this.ctx.http.getText(url).then((response) => parseHelmIndex(response.body));
      this.indexes.set(url, pending);
      // A failed download is not cached
      void pending.catch(() => this.indexes.delete(url));
    }
    return pending;
  }

  /**
   * Every published version of a chart; throws when the index is unavailable.
   */
  async listChartVersions(repoUrl: string, chart: string): Promise<string[]> {
    const index = await this.fetchIndex(repoUrl);
    return index.get(chart) ?? [];
  }
}

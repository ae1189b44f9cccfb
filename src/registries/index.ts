/**
 * Registry clients
 *
 * Tag and chart-version listings for every supported registry. The public
 * methods never throw: a failed listing is logged and reported as an
 * empty list, which the reconcilers turn into a skipped outcome.
 */

import { HttpClient, type HttpClientConfig } from '../api/http.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { listDockerHubTags } from './dockerhub.js';
import { listGhcrTags } from './ghcr.js';
import { HelmIndexCache } from './helm-index.js';
import { listQuayTags } from './quay.js';
import { listRegistryV2Tags } from './registry-v2.js';
import type { RegistryContext, RegistryCredentials, TagLister } from './types.js';

export { credentialsFromEnv, MAX_PAGES } from './types.js';
export type { RegistryContext, RegistryCredentials, DockerHubCredentials, TagLister } from './types.js';
export { parseHelmIndex, indexUrl, HelmIndexCache, type HelmIndex } from './helm-index.js';
export { parseNextLink } from './ghcr.js';

/**
 * Source of available versions, as seen by the reconcilers
 */
export interface VersionProvider {
  /** Tags of a container image repository; [] when unavailable */
  listImageTags(registry: string, repository: string): Promise<string[]>;
  /** Published versions of a Helm chart; [] when unavailable */
  listChartVersions(repoUrl: string, chart: string): Promise<string[]>;
}

const TAG_LISTERS: Record<string, TagLister> = {
  dockerhub: listDockerHubTags,
  'docker.io': listDockerHubTags,
  'ghcr.io': listGhcrTags,
  'quay.io': listQuayTags,
};

export interface RegistryClientsConfig extends HttpClientConfig {
  credentials?: RegistryCredentials;
  /** Prebuilt HTTP client; otherwise one is created from this config */
  http?: HttpClient;
}

export class RegistryClients implements VersionProvider {
  private readonly ctx: RegistryContext;
  private readonly helm: HelmIndexCache;
  private readonly log: ApiLogger;

  constructor(config: RegistryClientsConfig = {}) {
    this.log = config.logger ?? defaultLogger;
    this.ctx = {
      http: config.http ?? new HttpClient({ ...config, logger: this.log }),
      logger: this.log,
      credentials: config.credentials ?? {},
    };
    this.helm = new HelmIndexCache(this.ctx);
  }

  async listImageTags(registry: string, repository: string): Promise<string[]> {
    const lister = TAG_LISTERS[registry];
    try {
      return lister
        ? await lister(this.ctx, repository)
        : await listRegistryV2Tags(this.ctx, registry, repository);
    } catch (err) {
      this.log.warn(`Failed to list tags for ${registry}/${repository}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }

  async listChartVersions(repoUrl: string, chart: string): Promise<string[]> {
    try {
      return await this.helm.listChartVersions(repoUrl, chart);
    } catch (err) {
      this.log.warn(`Failed to fetch Helm index for ${chart}`, {
        repoUrl,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }
}

/**
 * Registry class used to pick a concurrency gate for an image registry
 */
export function registryClassOf(registry: string): string {
  return registry === 'docker.io' ? 'dockerhub' : registry;
}

/**
 * Docker Registry HTTP API v2 tag listing (gcr.io and other registries)
 *
 * Only public repositories are supported; a 401 yields no tags.
 */

import { isRecord, stringItems } from '../utils/guards.js';
import type { RegistryContext } from './types.js';

export async function listRegistryV2Tags(
  ctx: RegistryContext,
  registry: string,
  repository: string
): Promise<string[]> {
  const response = await ctx.http.getJson(`https://${registry}/v2/${repository}/tags/list`, {
    acceptStatuses: [401],
  });

  if (response.status === 401) {
    ctx.logger.warn(`Registry ${registry} requires authentication`, { repository });
    return [];
  }

  return isRecord(response.body) ? stringItems(response.body.tags) : [];
}

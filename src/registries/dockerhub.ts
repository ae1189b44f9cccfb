/**
 * Docker Hub tag listing
 *
 * Anonymous requests are limited to 100 pulls per 6h; Basic auth with
 * DOCKERHUB_USERNAME/DOCKERHUB_TOKEN doubles that.
 */

import { isRecord, stringProp } from '../utils/guards.js';
import { MAX_PAGES, type RegistryContext } from './types.js';

export const DOCKERHUB_API = 'https://registry.hub.docker.com/v2/repositories';

export async function listDockerHubTags(ctx: RegistryContext, repository: string): Promise<string[]> {
  const headers: Record<string, string> = {};
  const { dockerHub } = ctx.credentials;
  if (dockerHub) {
    const encoded = Buffer.from(`${dockerHub.username}:${dockerHub.token}`).toString('base64');
    headers.Authorization = `Basic ${encoded}`;
  }

  const tags: string[] = [];
  let url: string | undefined = `${DOCKERHUB_API}/${repository}/tags?page_size=100`;
  let pages = 0;

  while (url && pages < MAX_PAGES) {
    const response = await ctx.http.getJson(url, { headers });
    pages++;
    const body = response.body;
    if (!isRecord(body)) {
      break;
    }

    if (Array.isArray(body.results)) {
      for (const result of body.results) {
        const name = isRecord(result) ? stringProp(result, 'name') : undefined;
        if (name) {
          tags.push(name);
        }
      }
    }
    url = stringProp(body, 'next');
  }

  if (url) {
    ctx.logger.debug(`Stopped listing Docker Hub tags after ${MAX_PAGES} pages`, { repository });
  }
  return tags;
}

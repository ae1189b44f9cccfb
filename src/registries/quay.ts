/**
 * Quay.io tag listing
 */

import { isRecord, stringProp } from '../utils/guards.js';
import { MAX_PAGES, type RegistryContext } from './types.js';

export const QUAY_API = 'https://quay.io/api/v1/repository';

export async function listQuayTags(ctx: RegistryContext, repository: string): Promise<string[]> {
  const tags: string[] = [];
  let page = 1;

  while (page <= MAX_PAGES) {
    const response = await ctx.http.getJson(`${QUAY_API}/${repository}/tag/`, {
      params: { limit: 100, page },
    });
    const body = response.body;
    if (!isRecord(body)) {
      break;
    }

    if (Array.isArray(body.tags)) {
      for (const tag of body.tags) {
        const name = isRecord(tag) ? stringProp(tag, 'name') : undefined;
        if (name) {
          tags.push(name);
        }
      }
    }

    if (body.has_additional !== true) {
      break;
    }
    page = (typeof body.page === 'number' ? body.page : page) + 1;
  }

  return tags;
}

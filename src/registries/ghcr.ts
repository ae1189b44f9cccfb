/**
 * GitHub Container Registry tag listing (registry API v2)
 *
 * With GITHUB_TOKEN/GH_TOKEN the token is sent base64-encoded as a Bearer
 * credential; otherwise an anonymous pull token is requested first.
 */

import { isRecord, stringItems, stringProp } from '../utils/guards.js';
import { MAX_PAGES, type RegistryContext } from './types.js';

export const GHCR_HOST = 'https://ghcr.io';

/**
 * Extract the `rel="next"` target from a Link header.
 */
export function parseNextLink(header: string | null, origin: string): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = /<([^>]+)>;\s*rel="next"/.exec(header);
  if (!match) {
    return undefined;
  }
  return match[1].startsWith('/') ? `${origin}${match[1]}` : match[1];
}

async function bearerToken(ctx: RegistryContext, repository: string): Promise<string | undefined> {
  if (ctx.credentials.githubToken) {
    return Buffer.from(ctx.credentials.githubToken).toString('base64');
  }

  const response = await ctx.http.getJson(`${GHCR_HOST}/token`, {
    params: { scope: `repository:${repository}:pull` },
    cache: false,
  });
  return isRecord(response.body) ? stringProp(response.body, 'token') : undefined;
}

export async function listGhcrTags(ctx: RegistryContext, repository: string): Promise<string[]> {
  const token = await bearerToken(ctx, repository);
  const headers: Record<string, string> = token ? { Authorization: `Bearer ${token}` } : {};

  const tags: string[] = [];
  let url: string | undefined = `${GHCR_HOST}/v2/${repository}/tags/list?n=1000`;
  let pages = 0;

  while (url && pages < MAX_PAGES) {
    const response = await ctx.http.getJson(url, { headers });
    pages++;
    if (isRecord(response.body)) {
      tags.push(...stringItems(response.body.tags));
    }
    url = parseNextLink(response.headers.get('Link'), GHCR_HOST);
  }

  return tags;
}

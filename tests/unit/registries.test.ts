/**
 * Unit tests for registry clients
 *
 * All HTTP traffic goes through a routing fake passed to the client, so
 * nothing leaves the process.
 *
 * Tests cover:
 * - Docker Hub pagination and Basic auth
 * - ghcr.io anonymous tokens, PAT tokens and Link pagination
 * - Quay pagination
 * - Generic registry v2 listing and 401 handling
 * - Helm index caching and failure handling
 * - Credentials from the environment
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import type { FetchFn } from '../../src/api/http.js';
import { createLogger } from '../../src/api/logger.js';
import {
  RegistryClients,
  credentialsFromEnv,
  indexUrl,
  parseHelmIndex,
  parseNextLink,
  registryClassOf,
  type RegistryCredentials,
} from '../../src/registries/index.js';

type Route = (url: string) => Response | undefined;

function json(body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers });
}

function createClients(route: Route, credentials: RegistryCredentials = {}) {
  const lines: string[] = [];
  const logger = createLogger({ level: 'warn', timestamps: false, sink: (line) => lines.push(line) });
  const fetch = vi.fn<FetchFn>(async (url) => route(url) ?? new Response('not found', { status: 404 }));
  const clients = new RegistryClients({ fetch, logger, retry: false, credentials });
  return { clients, fetch, lines };
}

function headersOf(fetch: Mock<FetchFn>, call: number): RequestInit['headers'] {
  return fetch.mock.calls[call][1]?.headers;
}

// =============================================================================
// Docker Hub
// =============================================================================

describe('Docker Hub', () => {
  const first = 'https://registry.hub.docker.com/v2/repositories/library/postgres/tags?page_size=100';
  const second = 'https://registry.hub.docker.com/v2/repositories/library/postgres/tags?page=2&page_size=100';

  const route: Route = (url) => {
    if (url === first) {
      return json({ results: [{ name: '16.2' }, { name: '16.3-alpine' }], next: second });
    }
    if (url === second) {
      return json({ results: [{ name: '15.6' }], next: null });
    }
    return undefined;
  };

  it('follows next links across pages', async () => {
    const { clients, fetch } = createClients(route);

    expect(await clients.listImageTags('dockerhub', 'library/postgres')).toEqual(['16.2', '16.3-alpine', '15.6']);
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(headersOf(fetch, 0)).toEqual({});
  });

  it('treats docker.io as Docker Hub', async () => {
    const { clients } = createClients(route);

    expect(await clients.listImageTags('docker.io', 'library/postgres')).toHaveLength(3);
  });

  it('sends Basic credentials when configured', async () => {
    const { clients, fetch } = createClients(route, {
      dockerHub: { username: 'test-user', token: 'test-secret' },
    });

    await clients.listImageTags('dockerhub', 'library/postgres');

    expect(headersOf(fetch, 0)).toEqual({
      Authorization: `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`,
    });
  });

  it('returns no tags and warns when the listing fails', async () => {
    const { clients, lines } = createClients(() => new Response('boom', { status: 500 }));

    expect(await clients.listImageTags('dockerhub', 'library/redis')).toEqual([]);
    expect(lines.some((line) => line.startsWith('[WARN] Failed to list tags for dockerhub/library/redis'))).toBe(true);
  });
});

// =============================================================================
// ghcr.io
// =============================================================================

describe('ghcr.io', () => {
  const first = 'https://ghcr.io/v2/acme/api/tags/list?n=1000';
  const second = 'https://ghcr.io/v2/acme/api/tags/list?last=1.1.0&n=1000';

  const route: Route = (url) => {
    if (url.startsWith('https://ghcr.io/token?')) {
      return json({ token: 'anon-token' });
    }
    if (url === first) {
      return json({ tags: ['1.0.0', '1.1.0'] }, { Link: '</v2/acme/api/tags/list?last=1.1.0&n=1000>; rel="next"' });
    }
    if (url === second) {
      return json({ tags: ['2.0.0'] });
    }
    return undefined;
  };

  it('requests an anonymous pull token and follows Link headers', async () => {
    const { clients, fetch } = createClients(route);

    expect(await clients.listImageTags('ghcr.io', 'acme/api')).toEqual(['1.0.0', '1.1.0', '2.0.0']);
    expect(new URL(fetch.mock.calls[0][0]).searchParams.get('scope')).toBe('repository:acme/api:pull');
    expect(headersOf(fetch, 1)).toEqual({ Authorization: 'Bearer anon-token' });
  });

  it('uses a GitHub token without the token exchange', async () => {
    const { clients, fetch } = createClients(route, { githubToken: 'test-secret' });

    await clients.listImageTags('ghcr.io', 'acme/api');

    expect(fetch.mock.calls[0][0]).toBe(first);
    expect(headersOf(fetch, 0)).toEqual({
      Authorization: `Bearer ${Buffer.from('test-secret').toString('base64')}`,
    });
  });

  it('parseNextLink resolves relative targets', () => {
    expect(parseNextLink('</v2/x/tags/list?last=a>; rel="next"', 'https://ghcr.io')).toBe(
      'https://ghcr.io/v2/x/tags/list?last=a'
    );
    expect(parseNextLink('<https://other.test/page2>; rel="next"', 'https://ghcr.io')).toBe(
      'https://other.test/page2'
    );
    expect(parseNextLink(null, 'https://ghcr.io')).toBeUndefined();
    expect(parseNextLink('</a>; rel="prev"', 'https://ghcr.io')).toBeUndefined();
  });
});

// =============================================================================
// Quay and Generic v2
// =============================================================================

describe('quay.io', () => {
  it('pages while has_additional is set', async () => {
    const base = 'https://quay.io/api/v1/repository/prometheus/node-exporter/tag/';
    const { clients } = createClients((url) => {
      if (url === `${base}?limit=100&page=1`) {
        return json({ tags: [{ name: 'v1.8.0' }], page: 1, has_additional: true });
      }
      if (url === `${base}?limit=100&page=2`) {
        return json({ tags: [{ name: 'v1.7.0' }], page: 2, has_additional: false });
      }
      return undefined;
    });

    expect(await clients.listImageTags('quay.io', 'prometheus/node-exporter')).toEqual(['v1.8.0', 'v1.7.0']);
  });
});

describe('registry v2', () => {
  it('lists tags from other registries', async () => {
    const { clients } = createClients((url) =>
      url === 'https://gcr.io/v2/distroless/static/tags/list' ? json({ tags: ['nonroot', 'latest'] }) : undefined
    );

    expect(await clients.listImageTags('gcr.io', 'distroless/static')).toEqual(['nonroot', 'latest']);
  });

  it('returns no tags for registries that require authentication', async () => {
    const { clients, lines } = createClients(() => new Response('denied', { status: 401 }));

    expect(await clients.listImageTags('registry.example.com', 'private/app')).toEqual([]);
    expect(lines).toContain(
      '[WARN] Registry registry.example.com requires authentication {"repository":"private/app"}'
    );
  });

  it('maps docker.io to the dockerhub gate', () => {
    expect(registryClassOf('docker.io')).toBe('dockerhub');
    expect(registryClassOf('ghcr.io')).toBe('ghcr.io');
  });
});

// =============================================================================
// Helm Index
// =============================================================================

describe('Helm index', () => {
  const index = [
    'apiVersion: v1',
    'entries:',
    '  redis:',
    '    - version: 18.1.0',
    '    - version: 18.0.2',
    '  postgresql:',
    '    - version: 13.2.0',
    '',
  ].join('\n');

  it('builds the index URL', () => {
    expect(indexUrl('https://charts.example.com/')).toBe('https://charts.example.com/index.yaml');
    expect(indexUrl('https://charts.example.com/stable')).toBe('https://charts.example.com/stable/index.yaml');
  });

  it('parses versions per chart', () => {
    const parsed = parseHelmIndex(index);

    expect(parsed.get('redis')).toEqual(['18.1.0', '18.0.2']);
    expect(parsed.get('postgresql')).toEqual(['13.2.0']);
    expect(parseHelmIndex('apiVersion: v1\n').size).toBe(0);
  });

  it('downloads each repository index once', async () => {
    const { clients, fetch } = createClients((url) =>
      url === 'https://charts.example.com/index.yaml' ? new Response(index, { status: 200 }) : undefined
    );

    expect(await clients.listChartVersions('https://charts.example.com/', 'redis')).toEqual(['18.1.0', '18.0.2']);
    expect(await clients.listChartVersions('https://charts.example.com', 'postgresql')).toEqual(['13.2.0']);
    expect(await clients.listChartVersions('https://charts.example.com', 'vault')).toEqual([]);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('does not cache a failed download', async () => {
    let available = false;
    const { clients, fetch, lines } = createClients((url) =>
      available && url === 'https://charts.example.com/index.yaml' ? new Response(index, { status: 200 }) : undefined
    );

    expect(await clients.listChartVersions('https://charts.example.com', 'redis')).toEqual([]);
    expect(lines.some((line) => line.startsWith('[WARN] Failed to fetch Helm index for redis'))).toBe(true);

    available = true;
    expect(await clients.listChartVersions('https://charts.example.com', 'redis')).toEqual(['18.1.0', '18.0.2']);
    expect(fetch).toHaveBeenCalledTimes(2);
  });
});

// =============================================================================
// Credentials
// =============================================================================

describe('credentialsFromEnv', () => {
  it('reads Docker Hub and GitHub credentials', () => {
    expect(
      credentialsFromEnv({ DOCKERHUB_USERNAME: ' test-user ', DOCKERHUB_PASSWORD: 'test-secret', GH_TOKEN: 'test-token' })
    ).toEqual({
      dockerHub: { username: 'test-user', token: 'test-secret' },
      githubToken: 'test-token',
    });
  });

  it('needs both Docker Hub fields', () => {
    expect(credentialsFromEnv({ DOCKERHUB_USERNAME: 'test-user' })).toEqual({});
  });
});

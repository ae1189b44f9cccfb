/**
 * Persistent response cache
 *
 * Successful GET responses are stored as JSON files under the cache
 * directory, one file per URL, and reused until they are older than the
 * TTL. An expired entry is kept on disk so the client can fall back to it
 * when the registry is down.
 */

import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isRecord } from '../utils/guards.js';
import { logger as defaultLogger, type ApiLogger } from './logger.js';
import type { HttpResponse } from './types.js';

/** Default cache directory, relative to the repository root */
export const DEFAULT_CACHE_DIR = '.registry_cache';

/** Default time-to-live: 6 hours */
export const DEFAULT_CACHE_TTL_MS = 6 * 60 * 60 * 1000;

export interface CachedResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
  /** Epoch milliseconds when the response was stored */
  storedAt: number;
}

export interface ResponseCacheConfig {
  /** Directory holding the cache files */
  dir: string;
  /** Age after which an entry is stale (default: 6 hours) */
  ttlMs?: number;
  logger?: ApiLogger;
  /** Clock (default: Date.now) */
  now?: () => number;
}

function parseEntry(data: unknown): CachedResponse | undefined {
  if (!isRecord(data) || !isRecord(data.headers)) {
    return undefined;
  }
  const { url, status, body, storedAt } = data;
  if (typeof url !== 'string' || typeof status !== 'number' || typeof body !== 'string') {
    return undefined;
  }
  if (typeof storedAt !== 'number') {
    return undefined;
  }

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(data.headers)) {
    if (typeof value === 'string') {
      headers[name] = value;
    }
  }
  return { url, status, headers, body, storedAt };
}

export class ResponseCache {
  readonly dir: string;
  readonly ttlMs: number;
  private readonly log: ApiLogger;
  private readonly now: () => number;

  constructor(config: ResponseCacheConfig) {
    this.dir = config.dir;
    this.ttlMs = config.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.log = config.logger ?? defaultLogger;
    this.now = config.now ?? Date.now;
  }

  /**
   * File holding the entry for a URL
   */
  pathFor(url: string): string {
    return join(this.dir, `${createHash('sha256').update(url).digest('hex')}.json`);
  }

  /**
   * Read the entry for a URL, fresh or stale.
   *
   * @returns undefined when there is no entry or it cannot be read
   */
  async get(url: string): Promise<CachedResponse | undefined> {
    const path = this.pathFor(url);
    if (!existsSync(path)) {
      return undefined;
    }

    try {
      const entry = parseEntry(JSON.parse(await readFile(path, 'utf-8')));
      return entry?.url === url ? entry : undefined;
    } catch (err) {
      this.log.debug(`Ignoring unreadable cache entry ${path}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
  }

  isFresh(entry: CachedResponse): boolean {
    return this.now() - entry.storedAt < this.ttlMs;
  }

  /**
   * Store a response. A write failure is logged; the response stays usable.
   */
  async set(response: HttpResponse<string>): Promise<void> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name] = value;
    });
    const entry: CachedResponse = {
      url: response.url,
      status: response.status,
      headers,
      body: response.body,
      storedAt: this.now(),
    };

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(this.pathFor(response.url), JSON.stringify(entry), 'utf-8');
    } catch (err) {
      this.log.warn(`Failed to write cache entry for ${response.url}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Rebuild a response from a cache entry
 */
export function toHttpResponse(entry: CachedResponse): HttpResponse<string> {
  return { status: entry.status, headers: new Headers(entry.headers), body: entry.body, url: entry.url };
}

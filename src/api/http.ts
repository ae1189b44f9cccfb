/**
 * Minimal HTTP client for registry APIs
 *
 * GET-only fetch wrapper with per-attempt timeouts, retry with backoff,
 * an optional persistent response cache, and request/response logging
 * through {@link ApiLogger}.
 */

import { toHttpResponse, type ResponseCache } from './cache.js';
import { logger as defaultLogger, type ApiLogger } from './logger.js';
import { ApiRequestError, parseRetryAfter, withRetry, type RetryOptions } from './retry.js';
import type { HttpRequestOptions, HttpResponse, QueryParams, RetryConfig } from './types.js';

/** Default per-attempt timeout */
export const DEFAULT_TIMEOUT_MS = 10000;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Logger for request/response and retry messages */
  logger?: ApiLogger;
  /** Default per-attempt timeout in milliseconds */
  timeoutMs?: number;
  /** Default retry configuration; `false` disables retries */
  retry?: RetryConfig | false;
  /** User-Agent header value */
  userAgent?: string;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchFn;
  /** Sleep used between retries (default: timers) */
  sleep?: (ms: number) => Promise<void>;
  /** Cache for successful responses; stale entries are served when a request fails */
  cache?: ResponseCache;
}

/**
 * Append query parameters to a URL
 */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }
  const result = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      result.searchParams.set(key, String(value));
    }
  }
  return result.toString();
}

/**
 * Whether a failed request is the upstream's fault rather than the caller's
 */
function isUpstreamFailure(err: unknown): boolean {
  if (err instanceof ApiRequestError) {
    return err.isServerError() || err.isRateLimited();
  }
  return true;
}

export class HttpClient {
  private readonly log: ApiLogger;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig | false;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchFn;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly cache?: ResponseCache;

  constructor(config: HttpClientConfig = {}) {
    this.log = config.logger ?? defaultLogger;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = config.retry ?? {};
    this.headers = config.userAgent ? { 'User-Agent': config.userAgent } : {};
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = config.sleep;
    this.cache = config.cache;
  }

  /**
   * GET a URL and return its body as text
   *
   * With a cache, a fresh entry is returned without a request, successful
   * responses are stored, and a stale entry stands in for a request that
   * fails with a network error, a timeout, 429 or 5xx.
   *
   * @throws ApiRequestError for non-2xx statuses not listed in acceptStatuses
   */
  async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
    const target = buildUrl(url, options.params);
    const cache = options.cache === false ? undefined : this.cache;
    const cached = cache ? await cache.get(target) : undefined;
    if (cache && cached && cache.isFresh(cached)) {
      this.log.debug('HTTP cache hit', { url: target });
      return toHttpResponse(cached);
    }

    let response: HttpResponse<string>;
    try {
      response = await this.fetchText(target, options);
    } catch (err) {
      if (cached && isUpstreamFailure(err)) {
        this.log.warn(`Serving stale cached response for ${target}`, {
          error: err instanceof Error ? err.message : String(err),
        });
        return toHttpResponse(cached);
      }
      throw err;
    }

    if (cache && response.status >= 200 && response.status < 300) {
      await cache.set(response);
    }
    return response;
  }

  private async fetchText(target: string, options: HttpRequestOptions): Promise<HttpResponse<string>> {
    const headers = { ...this.headers, ...options.headers };
    const timeout = options.timeoutMs ?? this.timeoutMs;
    const accept = options.acceptStatuses ?? [];

    this.log.request('GET', target, headers);

    const makeRequest = async (): Promise<HttpResponse<string>> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        const response = await this.fetchImpl(target, {
          method: 'GET',
          headers,
          signal: controller.signal,
        });
        const body = await response.text();
        this.log.response(response.status, target, Date.now() - startTime);

        if (!response.ok && !accept.includes(response.status)) {
          throw new ApiRequestError(
            `GET ${target} failed with HTTP ${response.status}${body ? `: ${body.substring(0, 200)}` : ''}`,
            response.status,
            {
              url: target,
              retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
            }
          );
        }

        return { status: response.status, headers: response.headers, body, url: target };
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const retry = options.retry ?? this.retry;
    if (retry === false) {
      return makeRequest();
    }

    const retryOptions: RetryOptions<HttpResponse<string>> = {
      ...retry,
      logger: this.log,
      sleep: this.sleep,
    };
    const result = await withRetry(makeRequest, retryOptions);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  /**
   * GET a URL and parse its body as JSON
   *
   * Accepted non-2xx responses carry an undefined body when it is not JSON.
   */
  async getJson(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
    const response = await this.getText(url, options);
    let body: unknown;
    try {
      body = response.body ? JSON.parse(response.body) : undefined;
    } catch (err) {
      if (response.status >= 200 && response.status < 300) {
        throw new ApiRequestError(`Invalid JSON from ${response.url}`, response.status, {
          url: response.url,
          cause: err,
        });
      }
      body = undefined;
    }
    return { ...response, body };
  }
}

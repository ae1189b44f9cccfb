/**
 * HTTP plumbing for registry APIs
 *
 * Provides:
 * - HttpClient with per-attempt timeouts
 * - Retry logic with exponential backoff and a separate 429 path
 * - Persistent response cache with stale-if-error
 * - JSON logging with secret redaction
 */

export { HttpClient, buildUrl, DEFAULT_TIMEOUT_MS } from './http.js';
export type { HttpClientConfig, FetchFn } from './http.js';

// Persistent response cache
export { ResponseCache, toHttpResponse, DEFAULT_CACHE_DIR, DEFAULT_CACHE_TTL_MS } from './cache.js';
export type { CachedResponse, ResponseCacheConfig } from './cache.js';

// Retry utilities
export {
  withRetry,
  ApiRequestError,
  calculateDelay,
  calculateRateLimitDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  RATE_LIMIT_STATUS,
  SERVER_ERROR_THRESHOLD,
} from './retry.js';

export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactRecord,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig, LogSink } from './logger.js';

export type { RetryConfig, RetryResult, QueryParams, HttpRequestOptions, HttpResponse } from './types.js';

/**
 * HTTP plumbing types shared by the registry clients
 */

// =============================================================================
// Retry Types
// =============================================================================

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay between retries (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 to randomize delays (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes that should trigger a backoff retry (429 is handled separately) */
  retryableStatuses?: number[];
  /** Base delay for rate-limited (429) retries without Retry-After (default: 2000) */
  rateLimitDelayMs?: number;
}

/**
 * Result of a retried operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };

// =============================================================================
// HTTP Types
// =============================================================================

export type QueryParams = Record<string, string | number | undefined>;

/**
 * Options for a single GET request
 */
export interface HttpRequestOptions {
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Query parameters appended to the URL */
  params?: QueryParams;
  /** Per-attempt timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Statuses returned to the caller instead of raising */
  acceptStatuses?: number[];
  /** Retry configuration; `false` disables retries */
  retry?: RetryConfig | false;
  /** Use the client's response cache, when it has one (default: true) */
  cache?: boolean;
}

/**
 * Response body and metadata returned by the HTTP helpers
 */
export interface HttpResponse<T> {
  status: number;
  headers: Headers;
  body: T;
  url: string;
}

/**
 * Retry logic with exponential backoff for registry requests
 *
 * Features:
 * - Exponential backoff with configurable base delay
 * - Jitter to prevent thundering herd
 * - Rate limit handling (HTTP 429) on its own path, honouring Retry-After
 * - Configurable retry conditions
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [500, 502, 503, 504],
  rateLimitDelayMs: 2000,
};

/**
 * HTTP status codes with special handling
 */
export const RATE_LIMIT_STATUS = 429;
export const SERVER_ERROR_THRESHOLD = 500;

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions<T> extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
  /** Called when operation succeeds */
  onSuccess?: (result: T, attempts: number) => void;
  /** Called when all retries are exhausted */
  onExhausted?: (error: Error, attempts: number) => void;
  /** Replaces the timer-based sleep, for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Error class for HTTP errors with status
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly url?: string;
  public readonly details?: Record<string, unknown>;
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options?: {
      url?: string;
      details?: Record<string, unknown>;
      retryAfter?: number;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiRequestError';
    this.status = status;
    this.url = options?.url;
    this.details = options?.details;
    this.retryAfter = options?.retryAfter;
  }

  /**
   * Check if this error is a rate limit error
   */
  isRateLimited(): boolean {
    return this.status === RATE_LIMIT_STATUS;
  }

  /**
   * Check if this error is a server error
   */
  isServerError(): boolean {
    return this.status >= SERVER_ERROR_THRESHOLD;
  }
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 * @param config - Retry configuration
 * @returns Delay in milliseconds
 */
export function calculateDelay(attempt: number, config: Required<RetryConfig>): number {
  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  // Add jitter to prevent thundering herd
  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  const delayWithJitter = exponentialDelay + jitter;

  // Clamp to max delay
  return Math.min(Math.max(delayWithJitter, 0), config.maxDelayMs);
}

/**
 * Calculate delay after a 429 response
 *
 * Uses Retry-After when the registry sent one, otherwise doubles
 * rateLimitDelayMs per attempt (2s, 4s, 8s with the defaults).
 *
 * @param retryAfter - Retry-After header value in seconds
 */
export function calculateRateLimitDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    // Add small jitter to Retry-After to prevent thundering herd
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }
  return Math.min(config.rateLimitDelayMs * Math.pow(2, attempt - 1), config.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(error: Error, config: Required<RetryConfig>): boolean {
  // Network errors are retryable
  if (error.name === 'TypeError' && error.message.includes('fetch')) {
    return true;
  }

  // Check for AbortError / TimeoutError (timeout)
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  // Check ApiRequestError status
  if (error instanceof ApiRequestError) {
    return error.isRateLimited() || config.retryableStatuses.includes(error.status);
  }

  // Check for common network error messages
  const networkErrorPatterns = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'network',
    'socket hang up',
  ];

  const message = error.message.toLowerCase();
  return networkErrorPatterns.some((pattern) => message.includes(pattern.toLowerCase()));
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  // Try parsing as number (seconds)
  if (/^\d+$/.test(value.trim())) {
    const seconds = Number.parseInt(value, 10);
    return seconds > 0 ? seconds : undefined;
  }

  // Try parsing as HTTP-date
  const date = new Date(value);
  const delayMs = date.getTime() - Date.now();
  if (!Number.isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

/**
 * Execute a function with retry logic
 *
 * @param fn - The function to execute
 * @param options - Retry options
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions<T> = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
    rateLimitDelayMs: options.rateLimitDelayMs ?? DEFAULT_RETRY_CONFIG.rateLimitDelayMs,
  };

  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  let lastError: Error = new Error('Operation was not attempted');

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      const result = await fn();

      // Success
      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.debug(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      options.onSuccess?.(result, attempt);

      return { success: true, data: result, attempts: attempt, totalTimeMs };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      // Check if we should retry
      const isRetryable = options.isRetryable
        ? options.isRetryable(lastError)
        : isRetryableError(lastError, config);

      const isLastAttempt = attempt > config.maxRetries;

      if (!isRetryable || isLastAttempt) {
        const totalTimeMs = Date.now() - startTime;

        if (isLastAttempt && isRetryable && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: lastError.message,
            attempts: attempt,
            totalTimeMs,
          });
          options.onExhausted?.(lastError, attempt);
        } else if (!isRetryable) {
          log.debug('Error is not retryable', {
            error: lastError.message,
            attempts: attempt,
          });
        }

        return { success: false, error: lastError, attempts: attempt, totalTimeMs };
      }

      let delayMs: number;
      if (lastError instanceof ApiRequestError && lastError.isRateLimited()) {
        delayMs = calculateRateLimitDelay(attempt, config, lastError.retryAfter);
        log.warn(
          `Rate limited, retrying in ${Math.round(delayMs)}ms (attempt ${attempt}/${config.maxRetries})`,
          { url: lastError.url, retryAfter: lastError.retryAfter }
        );
      } else {
        delayMs = calculateDelay(attempt, config);
        log.info(`Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`, {
          error: lastError.message,
          status: lastError instanceof ApiRequestError ? lastError.status : undefined,
          delayMs: Math.round(delayMs),
        });
      }

      options.onRetry?.(attempt, lastError, delayMs);

      // Wait before retry
      await wait(delayMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}

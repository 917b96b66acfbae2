/**
 * Fetch Policies
 *
 * Decorators layered around an ItemTransport. Each policy returns a new
 * transport, so timeout (in the HTTP transport), rate limiting and retry can
 * be composed and tested independently:
 *
 *   withRetry(withRateLimit(new HttpTransport(...), limiter), retryConfig)
 */

import { FetchFailedError, HttpError } from './errors.js';
import { systemClock, type Clock, type RateLimiter } from './rate-limiter.js';
import type { ItemTransport } from './transport.js';

/**
 * Acquire a rate limiter slot before every request
 */
export function withRateLimit(transport: ItemTransport, limiter: RateLimiter): ItemTransport {
  return {
    async get(path: string): Promise<unknown> {
      await limiter.acquire();
      return transport.get(path);
    },
  };
}

/**
 * Configuration for the retry policy
 */
export interface RetryConfig {
  /** Retries after the first attempt (default: 3) */
  maxRetries: number;
  /** Base delay for exponential backoff in ms (default: 1000) */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay in ms (default: 30000) */
  maxDelayMs: number;
  /** Called before each backoff sleep */
  onRetry?: (path: string, attempt: number, delayMs: number, error: unknown) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Backoff delay before retry number `attempt` (0-based): base × 2^attempt, capped
 */
export function backoffDelay(attempt: number, config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
}

const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Check if an error is transient: timeouts, connection failures, 5xx and 429
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status >= 500 || error.status === 429;
  }

  if (!(error instanceof Error)) return false;

  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }

  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && RETRYABLE_CODES.has(code)) {
    return true;
  }

  // undici reports network failures as TypeError('fetch failed')
  const message = error.message.toLowerCase();
  return (
    message.includes('fetch failed') ||
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('socket hang up')
  );
}

/**
 * Retry transient failures with exponential backoff.
 * Throws FetchFailedError once retries are exhausted or the error is not transient.
 */
export function withRetry(
  transport: ItemTransport,
  config: Partial<RetryConfig> = {},
  clock: Clock = systemClock
): ItemTransport {
  const retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };

  return {
    async get(path: string): Promise<unknown> {
      let attempt = 0;

      for (;;) {
        try {
          return await transport.get(path);
        } catch (error) {
          const hasRetriesLeft = attempt < retryConfig.maxRetries;

          if (!isRetryableError(error) || !hasRetriesLeft) {
            throw new FetchFailedError(path, attempt + 1, error);
          }

          const delay = backoffDelay(attempt, retryConfig);
          retryConfig.onRetry?.(path, attempt + 1, delay, error);
          await clock.sleep(delay);
          attempt++;
        }
      }
    },
  };
}

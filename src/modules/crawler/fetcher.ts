/**
 * Item Fetcher
 *
 * Retrieves single items and listings through a policy-wrapped transport
 * and validates the payloads. Missing, deleted and dead items come back as
 * `not_found` results; only exhausted transient failures throw.
 */

import { FetchFailedError } from './errors.js';
import { withRateLimit, withRetry, type RetryConfig } from './policies.js';
import { systemClock, type Clock, type RateLimiter } from './rate-limiter.js';
import {
  HttpTransport,
  itemPath,
  listingPath,
  type HttpTransportConfig,
  type ItemTransport,
} from './transport.js';
import {
  apiItemSchema,
  listingIdsSchema,
  type FetchResult,
  type Listing,
} from './types.js';

/**
 * Options for building a fetcher over HTTP with the standard policies
 */
export interface ItemFetcherOptions {
  limiter: RateLimiter;
  retry: Pick<RetryConfig, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'>;
  /** Raw transport to wrap (default: HttpTransport built from `http`) */
  transport?: ItemTransport;
  http?: Partial<HttpTransportConfig>;
  clock?: Clock;
}

export class ItemFetcher {
  private transport: ItemTransport;

  /**
   * @param transport - already wrapped with whatever policies the caller wants
   */
  constructor(transport: ItemTransport) {
    this.transport = transport;
  }

  /**
   * Compose rate limiting and retry around a raw transport.
   * The limiter sits inside the retry loop so every attempt takes a slot.
   */
  static create(options: ItemFetcherOptions): ItemFetcher {
    const raw = options.transport ?? new HttpTransport(options.http);
    const { maxRetries } = options.retry;

    const retry: RetryConfig = {
      ...options.retry,
      onRetry: (path, attempt, delay) => {
        console.log(`  Retrying ${path} after ${delay}ms (retry ${attempt}/${maxRetries})...`);
      },
    };

    const policied = withRetry(withRateLimit(raw, options.limiter), retry, options.clock ?? systemClock);
    return new ItemFetcher(policied);
  }

  /**
   * Get a single item by ID
   */
  async fetchItem(id: number): Promise<FetchResult> {
    const path = itemPath(id);
    let body: unknown;

    try {
      body = await this.transport.get(path);
    } catch (error) {
      if (error instanceof FetchFailedError) {
        throw error.forItem(id);
      }
      throw new FetchFailedError(path, 1, error, id);
    }

    if (body === null || body === undefined) {
      return { status: 'not_found', kids: [] };
    }

    const parsed = apiItemSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new FetchFailedError(path, 1, new Error(`Malformed item payload: ${issues.join('; ')}`), id);
    }

    const item = parsed.data;
    if (item.deleted || item.dead) {
      return { status: 'not_found', kids: item.kids ?? [] };
    }

    return { status: 'found', item };
  }

  /**
   * Get the ordered item ids of a listing
   */
  async fetchListing(listing: Listing): Promise<number[]> {
    const path = listingPath(listing);
    let body: unknown;

    try {
      body = await this.transport.get(path);
    } catch (error) {
      if (error instanceof FetchFailedError) throw error;
      throw new FetchFailedError(path, 1, error);
    }

    if (body === null || body === undefined) {
      return [];
    }

    const parsed = listingIdsSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchFailedError(path, 1, new Error('Malformed listing payload'));
    }
    return parsed.data;
  }
}

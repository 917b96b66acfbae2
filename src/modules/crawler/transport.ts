/**
 * Hacker News API Transport
 *
 * The raw HTTP primitive the fetch policies wrap. One GET per call, no
 * retries, no rate limiting. The HN Firebase API needs no authentication.
 *
 * API Documentation: https://github.com/HackerNews/API
 */

import { HttpError } from './errors.js';
import type { Listing } from './types.js';

/**
 * HN Firebase API base URL
 */
export const HN_API_BASE = 'https://hacker-news.firebaseio.com/v0';

/**
 * HN website base URL for generating discussion URLs
 */
export const HN_WEB_BASE = 'https://news.ycombinator.com';

/**
 * Map listings to their API endpoints
 */
const LISTING_ENDPOINTS: Record<Listing, string> = {
  top: 'topstories',
  new: 'newstories',
  best: 'beststories',
  ask: 'askstories',
  show: 'showstories',
  job: 'jobstories',
};

export function itemPath(id: number): string {
  return `/item/${id}.json`;
}

export function listingPath(listing: Listing): string {
  return `/${LISTING_ENDPOINTS[listing]}.json`;
}

/**
 * Generate the HN web URL for an item
 */
export function discussionUrl(id: number | string): string {
  return `${HN_WEB_BASE}/item?id=${id}`;
}

/**
 * Something that can GET a JSON document by API path.
 * Resolves to null when the document does not exist (404 or empty body).
 */
export interface ItemTransport {
  get(path: string): Promise<unknown>;
}

/**
 * Configuration for the HTTP transport
 */
export interface HttpTransportConfig {
  /** API base URL (default: HN Firebase API) */
  baseUrl: string;
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs: number;
}

const DEFAULT_TRANSPORT_CONFIG: HttpTransportConfig = {
  baseUrl: HN_API_BASE,
  timeoutMs: 10000,
};

/**
 * Fetch-based transport against the HN API
 */
export class HttpTransport implements ItemTransport {
  private config: HttpTransportConfig;

  constructor(config: Partial<HttpTransportConfig> = {}) {
    this.config = { ...DEFAULT_TRANSPORT_CONFIG, ...config };
  }

  async get(path: string): Promise<unknown> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;

    const response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (response.status === 404) {
      return null;
    }

    if (!response.ok) {
      throw new HttpError(response.status, response.statusText, url);
    }

    const body = await response.text();
    if (!body.trim()) {
      return null;
    }

    return JSON.parse(body) as unknown;
  }
}

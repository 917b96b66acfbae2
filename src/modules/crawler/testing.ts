/**
 * In-process stand-ins for the HN API, shared by the test suites
 */

import type { Clock } from './rate-limiter.js';
import { itemPath, listingPath, type ItemTransport } from './transport.js';
import type { ApiItem, Listing } from './types.js';

/**
 * Transport serving canned documents. Paths without a document resolve to
 * null, like a 404.
 */
export class ScriptedTransport implements ItemTransport {
  readonly requests: string[] = [];
  private documents = new Map<string, unknown>();
  private queuedFailures = new Map<string, unknown[]>();
  private brokenPaths = new Map<string, unknown>();

  items(...items: ApiItem[]): this {
    for (const item of items) {
      this.documents.set(itemPath(item.id), item);
    }
    return this;
  }

  raw(path: string, body: unknown): this {
    this.documents.set(path, body);
    return this;
  }

  listing(listing: Listing, ids: number[]): this {
    this.documents.set(listingPath(listing), ids);
    return this;
  }

  /** Throw these errors on the next requests for `path`, then serve normally */
  failNext(path: string, ...errors: unknown[]): this {
    this.queuedFailures.set(path, [...(this.queuedFailures.get(path) ?? []), ...errors]);
    return this;
  }

  /** Throw `error` on every request for `path` */
  failAlways(path: string, error: unknown): this {
    this.brokenPaths.set(path, error);
    return this;
  }

  requestCount(path: string): number {
    return this.requests.filter((p) => p === path).length;
  }

  async get(path: string): Promise<unknown> {
    this.requests.push(path);

    const queued = this.queuedFailures.get(path);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }

    if (this.brokenPaths.has(path)) {
      throw this.brokenPaths.get(path);
    }

    return this.documents.get(path) ?? null;
  }
}

export function story(id: number, fields: Partial<ApiItem> = {}): ApiItem {
  return {
    id,
    type: 'story',
    by: 'author',
    time: 1700000000,
    title: `Story ${id}`,
    url: `https://example.com/${id}`,
    score: 100,
    descendants: 0,
    ...fields,
  };
}

export function comment(id: number, kids: number[] = [], fields: Partial<ApiItem> = {}): ApiItem {
  return {
    id,
    type: 'comment',
    by: 'commenter',
    time: 1700000000 + id,
    text: `comment ${id}`,
    ...(kids.length > 0 ? { kids } : {}),
    ...fields,
  };
}

/**
 * Clock whose sleeps advance virtual time instantly
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

/**
 * Error classes raised by the crawler.
 *
 * A missing item is not an error: the fetcher reports it as a `not_found`
 * result. Everything here is either retried, logged and skipped, or (for
 * configuration) fatal before a run starts.
 */

/**
 * Non-2xx response from the upstream API (404 is handled before this is thrown)
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}: ${statusText} (${url})`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

/**
 * A fetch that still failed after the retry policy gave up
 */
export class FetchFailedError extends Error {
  readonly target: string;
  readonly attempts: number;
  readonly lastError: unknown;
  readonly itemId?: number;

  constructor(target: string, attempts: number, lastError: unknown, itemId?: number) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Fetch of ${target} failed after ${attempts} attempt(s): ${reason}`);
    this.name = 'FetchFailedError';
    this.target = target;
    this.attempts = attempts;
    this.lastError = lastError;
    this.itemId = itemId;
  }

  /**
   * Copy of this error tagged with the item id it was fetching
   */
  forItem(itemId: number): FetchFailedError {
    return new FetchFailedError(this.target, this.attempts, this.lastError, itemId);
  }
}

/**
 * Invalid crawl configuration. Raised at startup only.
 */
export class ConfigInvalidError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid crawl configuration: ${issues.join('; ')}`);
    this.name = 'ConfigInvalidError';
    this.issues = issues;
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

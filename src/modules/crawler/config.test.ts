import { describe, it, expect } from 'vitest';
import { crawlConfigFromEnv, resolveCrawlConfig } from './config.js';
import { ConfigInvalidError } from './errors.js';
import { HN_API_BASE } from './transport.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigInvalidError) return error.issues;
    throw error;
  }
  throw new Error('expected ConfigInvalidError');
}

describe('resolveCrawlConfig', () => {
  it('should apply defaults', () => {
    const config = resolveCrawlConfig({}, { env: {} });

    expect(config).toMatchObject({
      listing: 'top',
      maxArticles: 30,
      maxCommentsPerArticle: 200,
      maxCommentDepth: 4,
      maxChildrenPerNode: 15,
      maxCommentLength: 1000,
      requestRateIntervalMs: 1000,
      maxRetries: 3,
      minScoreThreshold: 0,
      concurrency: 2,
      commentFanOut: 1,
      skipAlreadyProcessed: false,
      apiBaseUrl: HN_API_BASE,
      runTimeoutMs: 7_200_000,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should layer settings, environment and overrides', () => {
    const config = resolveCrawlConfig(
      { maxArticles: 40 },
      {
        settings: { maxArticles: 10, concurrency: 3, listing: 'new' },
        env: { CRAWL_MAX_ARTICLES: '20', CRAWL_LISTING: 'best' },
      }
    );

    expect(config.maxArticles).toBe(40);
    expect(config.listing).toBe('best');
    expect(config.concurrency).toBe(3);
  });

  it('should reject negative caps', () => {
    expect(() => resolveCrawlConfig({ maxCommentDepth: -1 }, { env: {} })).toThrow(ConfigInvalidError);
    expect(issuesOf(() => resolveCrawlConfig({ maxCommentDepth: -1 }, { env: {} }))).toEqual([
      expect.stringMatching(/^maxCommentDepth: /),
    ]);
  });

  it('should reject non-numeric environment values', () => {
    expect(issuesOf(() => resolveCrawlConfig({}, { env: { CRAWL_MAX_ARTICLES: 'lots' } }))).toEqual([
      expect.stringMatching(/^maxArticles: /),
    ]);
  });

  it('should reject unknown keys from the settings table', () => {
    expect(issuesOf(() => resolveCrawlConfig({}, { env: {}, settings: { maxComments: 5 } }))).toEqual([
      expect.stringMatching(/^config: Unrecognized key/),
    ]);
  });

  it('should reject an unknown listing', () => {
    expect(issuesOf(() => resolveCrawlConfig({}, { env: { CRAWL_LISTING: 'hot' } }))).toEqual([
      expect.stringMatching(/^listing: /),
    ]);
  });

  it('should require the retry delay cap to cover the base delay', () => {
    expect(
      issuesOf(() => resolveCrawlConfig({ retryBaseDelayMs: 5000, retryMaxDelayMs: 1000 }, { env: {} }))
    ).toEqual(['retryMaxDelayMs: retryMaxDelayMs must be at least retryBaseDelayMs']);
  });

  it('should reject out-of-range concurrency', () => {
    expect(issuesOf(() => resolveCrawlConfig({ concurrency: 0 }, { env: {} }))).toEqual([
      expect.stringMatching(/^concurrency: /),
    ]);
  });
});

describe('crawlConfigFromEnv', () => {
  it('should read only the crawl variables', () => {
    expect(
      crawlConfigFromEnv({
        CRAWL_MAX_ARTICLES: '5',
        CRAWL_API_BASE_URL: 'http://localhost:8080/v0',
        CRAWL_MAX_COMMENT_DEPTH: '  ',
        UNRELATED: 'x',
      })
    ).toEqual({ maxArticles: 5, apiBaseUrl: 'http://localhost:8080/v0' });
  });

  it('should parse boolean flags', () => {
    expect(crawlConfigFromEnv({ CRAWL_SKIP_ALREADY_PROCESSED: 'TRUE' })).toEqual({ skipAlreadyProcessed: true });
    expect(crawlConfigFromEnv({ CRAWL_SKIP_ALREADY_PROCESSED: '0' })).toEqual({ skipAlreadyProcessed: false });
  });

  it('should pass unrecognized flag values on for validation', () => {
    expect(issuesOf(() => resolveCrawlConfig({}, { env: { CRAWL_SKIP_ALREADY_PROCESSED: 'maybe' } }))).toEqual([
      expect.stringMatching(/^skipAlreadyProcessed: /),
    ]);
  });
});

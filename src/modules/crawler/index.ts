/**
 * Crawler Module
 *
 * Crawls Hacker News listings and bounded comment trees through the public
 * HN Firebase API (no authentication required).
 */

// Export types
export {
  type Listing,
  type ApiItem,
  type FetchResult,
  type StoryType,
  type Article,
  type Comment,
  type ScoreSnapshot,
  type ItemFailure,
  type CommentTreeStats,
  type CommentTreeResult,
  type ArticleCrawlResult,
  type PageCrawlResult,
  type CrawlError,
  apiItemSchema,
  listingSchema,
} from './types.js';

// Export errors
export { HttpError, FetchFailedError, ConfigInvalidError, toError } from './errors.js';

// Export configuration
export {
  type CrawlConfig,
  type CrawlConfigInput,
  type ResolveConfigOptions,
  crawlConfigSchema,
  crawlConfigFromEnv,
  resolveCrawlConfig,
} from './config.js';

// Export transport and fetch policies
export {
  type ItemTransport,
  type HttpTransportConfig,
  HttpTransport,
  HN_API_BASE,
  HN_WEB_BASE,
  discussionUrl,
  itemPath,
  listingPath,
} from './transport.js';
export { RateLimiter, systemClock, type Clock } from './rate-limiter.js';
export {
  type RetryConfig,
  DEFAULT_RETRY_CONFIG,
  withRateLimit,
  withRetry,
  isRetryableError,
  backoffDelay,
} from './policies.js';

// Export fetcher and crawlers
export { ItemFetcher, type ItemFetcherOptions } from './fetcher.js';
export {
  CommentTreeCrawler,
  type CommentTreeConfig,
  DEFAULT_COMMENT_TREE_CONFIG,
} from './comment-tree.js';
export { ArticleCrawler, type ArticleExistsFn, type ArticleResultHandler } from './article-crawler.js';

// Export normalization helpers
export {
  cleanMarkup,
  unescapeEntities,
  truncate,
  extractDomain,
  classifyStoryType,
  toArticle,
  toComment,
  SELF_POST_DOMAIN,
} from './normalize.js';

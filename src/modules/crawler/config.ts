/**
 * Crawl Configuration
 *
 * Defaults, environment overrides and validation for a single crawl run.
 * Precedence (lowest first): defaults, settings row, environment, explicit overrides.
 */

import { z } from 'zod';
import { ConfigInvalidError } from './errors.js';
import { HN_API_BASE } from './transport.js';
import { listingSchema } from './types.js';

const count = () => z.number().int().nonnegative();

export const crawlConfigSchema = z
  .object({
    /** Listing to crawl */
    listing: listingSchema.default('top'),
    /** Articles taken from the listing per run */
    maxArticles: z.number().int().positive().default(30),
    /** Comments emitted per article */
    maxCommentsPerArticle: count().default(200),
    /** Deepest comment depth fetched (top-level = 0) */
    maxCommentDepth: count().default(4),
    /** Children descended per comment */
    maxChildrenPerNode: count().default(15),
    maxCommentLength: z.number().int().positive().default(1000),
    maxStoryTextLength: z.number().int().positive().default(5000),
    /** Minimum spacing between any two upstream requests */
    requestRateIntervalMs: count().default(1000),
    requestTimeoutMs: z.number().int().positive().default(10000),
    maxRetries: count().default(3),
    retryBaseDelayMs: count().default(1000),
    retryMaxDelayMs: count().default(30000),
    /** Articles scoring below this are discarded after fetch */
    minScoreThreshold: count().default(0),
    /** Articles crawled concurrently */
    concurrency: z.number().int().min(1).max(16).default(2),
    /** Top-level comment subtrees walked concurrently per article */
    commentFanOut: z.number().int().min(1).max(16).default(1),
    /** Skip re-fetching comment trees of articles already stored */
    skipAlreadyProcessed: z.boolean().default(false),
    apiBaseUrl: z.string().url().default(HN_API_BASE),
    /** Cooperative stop after this long */
    runTimeoutMs: z.number().int().positive().default(2 * 60 * 60 * 1000),
  })
  .strict()
  .refine((config) => config.retryMaxDelayMs >= config.retryBaseDelayMs, {
    message: 'retryMaxDelayMs must be at least retryBaseDelayMs',
    path: ['retryMaxDelayMs'],
  });

export type CrawlConfig = Readonly<z.output<typeof crawlConfigSchema>>;
export type CrawlConfigInput = z.input<typeof crawlConfigSchema>;

type NumericKey = {
  [K in keyof CrawlConfigInput]-?: NonNullable<CrawlConfigInput[K]> extends number ? K : never;
}[keyof CrawlConfigInput];

/**
 * Environment variables for numeric fields
 */
const NUMERIC_ENV_VARS: Record<NumericKey, string> = {
  maxArticles: 'CRAWL_MAX_ARTICLES',
  maxCommentsPerArticle: 'CRAWL_MAX_COMMENTS_PER_ARTICLE',
  maxCommentDepth: 'CRAWL_MAX_COMMENT_DEPTH',
  maxChildrenPerNode: 'CRAWL_MAX_CHILDREN_PER_NODE',
  maxCommentLength: 'CRAWL_MAX_COMMENT_LENGTH',
  maxStoryTextLength: 'CRAWL_MAX_STORY_TEXT_LENGTH',
  requestRateIntervalMs: 'CRAWL_REQUEST_INTERVAL_MS',
  requestTimeoutMs: 'CRAWL_REQUEST_TIMEOUT_MS',
  maxRetries: 'CRAWL_MAX_RETRIES',
  retryBaseDelayMs: 'CRAWL_RETRY_BASE_DELAY_MS',
  retryMaxDelayMs: 'CRAWL_RETRY_MAX_DELAY_MS',
  minScoreThreshold: 'CRAWL_MIN_SCORE',
  concurrency: 'CRAWL_CONCURRENCY',
  commentFanOut: 'CRAWL_COMMENT_FAN_OUT',
  runTimeoutMs: 'CRAWL_RUN_TIMEOUT_MS',
};

const BOOLEAN_STRINGS: Record<string, boolean> = {
  true: true,
  '1': true,
  false: false,
  '0': false,
};

/**
 * Read crawl settings from environment variables.
 * Values are passed through unchecked so validation reports bad input.
 */
export function crawlConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [key, name] of Object.entries(NUMERIC_ENV_VARS)) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') {
      config[key] = Number(raw);
    }
  }

  if (env.CRAWL_LISTING) {
    config.listing = env.CRAWL_LISTING;
  }

  if (env.CRAWL_API_BASE_URL) {
    config.apiBaseUrl = env.CRAWL_API_BASE_URL;
  }

  const skip = env.CRAWL_SKIP_ALREADY_PROCESSED?.trim().toLowerCase();
  if (skip) {
    config.skipAlreadyProcessed = BOOLEAN_STRINGS[skip] ?? skip;
  }

  return config;
}

/**
 * Options for resolving a crawl configuration
 */
export interface ResolveConfigOptions {
  /** Values stored in the settings table, below environment */
  settings?: Record<string, unknown>;
  /** Environment to read (default: process.env); pass {} to ignore it */
  env?: NodeJS.ProcessEnv;
}

/**
 * Merge all configuration layers and validate the result.
 * Throws ConfigInvalidError on negative caps, unknown keys or wrong types.
 */
export function resolveCrawlConfig(
  overrides: Partial<CrawlConfigInput> = {},
  options: ResolveConfigOptions = {}
): CrawlConfig {
  const merged = {
    ...options.settings,
    ...crawlConfigFromEnv(options.env ?? process.env),
    ...overrides,
  };

  const parseResult = crawlConfigSchema.safeParse(merged);
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((e) => `${e.path.join('.') || 'config'}: ${e.message}`);
    throw new ConfigInvalidError(issues);
  }

  return Object.freeze(parseResult.data);
}

/**
 * Scheduler Module Types
 *
 * Type definitions for crawl orchestration and the job scheduler.
 */

import type { CrawlConfigInput, CrawlError, Listing } from '../crawler/index.js';

// =============================================================================
// SCHEDULER CONFIGURATION
// =============================================================================

/**
 * Scheduler configuration options
 */
export interface SchedulerConfig {
  /** Cron expression for crawl runs (default: '0 * * * *' = hourly) */
  cronExpression: string;
  /** Timezone for cron (default: 'UTC') */
  timezone: string;
  /** Whether to run at startup when the last completed run is stale (default: true) */
  checkMissedRunsOnStartup: boolean;
  /** Age of the last completed run that counts as missed, in ms (default: 1 hour) */
  missedRunThresholdMs: number;
  /** Whether to run the scheduler (default: true, can be disabled for testing) */
  enabled: boolean;
  /** Explicit crawl overrides, applied above settings and environment */
  crawl: Partial<CrawlConfigInput>;
}

/**
 * Default scheduler configuration
 */
export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  cronExpression: '0 * * * *',
  timezone: 'UTC',
  checkMissedRunsOnStartup: true,
  missedRunThresholdMs: 60 * 60 * 1000,
  enabled: true,
  crawl: {},
};

/**
 * Job type recorded in system_metadata
 */
export const CRAWL_JOB_TYPE = 'crawl';

// =============================================================================
// RUN SUMMARY TYPES
// =============================================================================

/**
 * Final state of a crawl run
 * - completed: the page was crawled and every result went through the writes
 * - cancelled: stopped by cancel(); results crawled so far were still written
 * - timeout: stopped by runTimeoutMs, same as cancelled otherwise
 * - failed: the listing itself could not be fetched
 */
export type CrawlRunStatus = 'completed' | 'cancelled' | 'timeout' | 'failed';

export interface WriteCounts {
  succeeded: number;
  failed: number;
}

/**
 * Article-level counts
 */
export interface ArticleRunStats {
  /** Ids taken from the listing */
  listed: number;
  /** Items fetched successfully (retained or filtered) */
  fetched: number;
  /** Articles that cleared the filters */
  retained: number;
  notFound: number;
  /** Listing entries that were not stories, jobs or polls */
  notArticle: number;
  belowThreshold: number;
  /** Already stored; only score refreshed */
  treeSkipped: number;
  /** Fetch failed after retries */
  failed: number;
  /** Articles whose upsert succeeded */
  stored: number;
}

/**
 * Comment-level counts, summed over all articles
 */
export interface CommentRunStats {
  emitted: number;
  stored: number;
  /** Not found, deleted or textless */
  skipped: number;
  /** Fetch failed; subtree dropped */
  failed: number;
  breadthPruned: number;
  /** Articles whose tree hit maxCommentsPerArticle */
  cappedArticles: number;
}

/**
 * Fully accounted result of one crawl run
 */
export interface CrawlRunSummary {
  status: CrawlRunStatus;
  listing: Listing;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  articles: ArticleRunStats;
  comments: CommentRunStats;
  writes: {
    articles: WriteCounts;
    comments: WriteCounts;
    snapshots: WriteCounts;
  };
  errors: CrawlError[];
}

// =============================================================================
// SCHEDULER STATE
// =============================================================================

/**
 * Current scheduler state
 */
export interface SchedulerState {
  /** Whether the scheduler is running */
  isRunning: boolean;
  /** Whether a crawl is currently executing */
  isCrawlRunning: boolean;
  /** Job run id of the executing crawl */
  currentRunId?: string;
  /** Last crawl summary */
  lastRun?: CrawlRunSummary;
  /** Total runs since scheduler started */
  totalRuns: number;
  /** Runs that ended completed or cancelled */
  successfulRuns: number;
  /** Runs that failed, timed out or threw */
  failedRuns: number;
}

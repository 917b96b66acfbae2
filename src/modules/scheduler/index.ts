/**
 * Scheduler Module
 *
 * Runs crawls of a Hacker News listing on a cron schedule and records each
 * run in system_metadata.
 */

// Export types
export {
  type SchedulerConfig,
  type SchedulerState,
  type CrawlRunStatus,
  type CrawlRunSummary,
  type ArticleRunStats,
  type CommentRunStats,
  type WriteCounts,
  CRAWL_JOB_TYPE,
  DEFAULT_SCHEDULER_CONFIG,
} from './types.js';

// Export crawl orchestrator
export { CrawlOrchestrator, isCompletedRun, runCrawl, type CrawlOrchestratorOptions } from './orchestrator.js';

// Export scheduler
export { JobScheduler, getScheduler, startScheduler, stopScheduler } from './scheduler.js';

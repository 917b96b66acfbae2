/**
 * Job Scheduler
 *
 * Manages scheduled execution of crawl runs using node-cron.
 *
 * Features:
 * - Runs hourly by default (configurable)
 * - Runs immediately on startup when the last completed crawl is stale
 * - Prevents duplicate concurrent executions, locally and across instances
 * - Records every run in system_metadata
 */

import cron, { type ScheduledTask } from 'node-cron';
import { z } from 'zod';
import {
  PostgresRepository,
  getSetting,
  isJobRunning,
  getLatestJobRun,
  startJobRun,
  completeJobRun,
  failJobRun,
  type Repository,
} from '../database/index.js';
import { toError } from '../crawler/index.js';
import { CrawlOrchestrator } from './orchestrator.js';
import {
  type SchedulerConfig,
  type SchedulerState,
  type CrawlRunSummary,
  CRAWL_JOB_TYPE,
  DEFAULT_SCHEDULER_CONFIG,
} from './types.js';

const storedSettingsSchema = z.record(z.unknown());

/**
 * Job metadata stored for a finished run
 */
function summaryMetadata(summary: CrawlRunSummary): Record<string, unknown> {
  return {
    status: summary.status,
    listing: summary.listing,
    articles: summary.articles,
    comments: summary.comments,
    writes: summary.writes,
    errorCount: summary.errors.length,
    completedAt: summary.completedAt.toISOString(),
    durationMs: summary.durationMs,
  };
}

/**
 * JobScheduler manages the cron-based execution of crawl runs
 */
export class JobScheduler {
  private config: SchedulerConfig;
  private repository: Repository;
  private cronJob: ScheduledTask | null = null;
  private currentOrchestrator: CrawlOrchestrator | null = null;
  private currentRun: Promise<CrawlRunSummary | null> | null = null;
  private stopRequested = false;
  private state: SchedulerState;

  constructor(config: Partial<SchedulerConfig> = {}, repository: Repository = new PostgresRepository()) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.repository = repository;
    this.state = {
      isRunning: false,
      isCrawlRunning: false,
      totalRuns: 0,
      successfulRuns: 0,
      failedRuns: 0,
    };
  }

  /**
   * Start the scheduler
   */
  async start(): Promise<void> {
    if (!this.config.enabled) {
      console.log('Scheduler is disabled');
      return;
    }

    if (this.state.isRunning) {
      console.log('Scheduler is already running');
      return;
    }

    console.log('\n--- Starting Job Scheduler ---');
    console.log(`Cron expression: ${this.config.cronExpression}`);
    console.log(`Timezone: ${this.config.timezone}`);

    if (!cron.validate(this.config.cronExpression)) {
      throw new Error(`Invalid cron expression: ${this.config.cronExpression}`);
    }

    this.cronJob = cron.schedule(
      this.config.cronExpression,
      async () => {
        console.log('\n[Scheduler] Cron triggered - starting crawl');
        await this.executeCrawl();
      },
      {
        timezone: this.config.timezone,
      }
    );

    this.state.isRunning = true;
    this.stopRequested = false;

    if (this.config.checkMissedRunsOnStartup) {
      await this.checkAndRunMissedJob();
    }
  }

  /**
   * Stop the scheduler. A running crawl is cancelled and awaited, so its
   * writes and run record land before the caller closes the database.
   */
  async stop(): Promise<void> {
    console.log('\n--- Stopping Job Scheduler ---');
    this.stopRequested = true;

    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }

    if (this.currentOrchestrator) {
      console.log('Cancelling running crawl...');
      this.currentOrchestrator.cancel();
    }

    if (this.currentRun) {
      console.log('Waiting for the running crawl to finish...');
      await this.currentRun;
    }

    this.state.isRunning = false;
    console.log('Scheduler stopped');
  }

  /**
   * Run a crawl now if the last completed one is older than the threshold
   */
  private async checkAndRunMissedJob(): Promise<void> {
    console.log('\nChecking for missed runs...');

    try {
      const lastCompleted = await getLatestJobRun(CRAWL_JOB_TYPE, 'completed');
      if (lastCompleted) {
        const age = Date.now() - lastCompleted.runStartedAt.getTime();
        if (age < this.config.missedRunThresholdMs) {
          console.log(`Last crawl completed ${Math.round(age / 60000)} minutes ago, no action needed`);
          return;
        }
      }

      console.log('No recent completed crawl found - executing immediately');
      await this.executeCrawl();
    } catch (error) {
      // The cron schedule still stands if the check fails
      console.error('Error checking for missed runs:', error);
    }
  }

  /**
   * Start a crawl unless one is already running in this process. The flag is
   * taken before anything is awaited, so simultaneous triggers start one run.
   */
  private executeCrawl(): Promise<CrawlRunSummary | null> {
    if (this.state.isCrawlRunning) {
      console.log('[Scheduler] Crawl already running, skipping');
      return Promise.resolve(null);
    }

    this.state.isCrawlRunning = true;
    const run = this.performCrawl().finally(() => {
      this.state.isCrawlRunning = false;
      this.state.currentRunId = undefined;
      this.currentOrchestrator = null;
      this.currentRun = null;
    });
    this.currentRun = run;
    return run;
  }

  /**
   * Execute a crawl with cross-instance duplicate prevention and job tracking
   */
  private async performCrawl(): Promise<CrawlRunSummary | null> {
    let counted = false;
    let runId: string | undefined;

    try {
      const stored = storedSettingsSchema.safeParse(await getSetting('crawl_config'));
      const orchestrator = new CrawlOrchestrator({
        repository: this.repository,
        settings: stored.success ? stored.data : undefined,
        config: this.config.crawl,
      });

      // A running row older than the run timeout was left by a dead process
      if (await isJobRunning(CRAWL_JOB_TYPE, orchestrator.config.runTimeoutMs)) {
        console.log('[Scheduler] Crawl running in another instance, skipping');
        return null;
      }

      if (this.stopRequested) {
        console.log('[Scheduler] Scheduler stopping, crawl not started');
        return null;
      }

      this.state.totalRuns++;
      counted = true;
      this.currentOrchestrator = orchestrator;

      const jobRun = await startJobRun(CRAWL_JOB_TYPE, {
        config: { ...orchestrator.config },
      });
      runId = jobRun.id;
      this.state.currentRunId = runId;

      const summary = await orchestrator.run();
      const itemsProcessed = summary.articles.stored + summary.comments.stored;
      this.state.lastRun = summary;

      if (summary.status === 'completed' || summary.status === 'cancelled') {
        await completeJobRun(runId, itemsProcessed, summaryMetadata(summary));
        this.state.successfulRuns++;
      } else {
        await failJobRun(
          runId,
          summary.errors.map((e) => ({
            message: e.message,
            stack: e.stack,
            timestamp: e.timestamp,
          })),
          itemsProcessed
        );
        this.state.failedRuns++;
      }

      return summary;
    } catch (error) {
      const errorObj = toError(error);
      console.error('[Scheduler] Crawl execution error:', errorObj.message);
      if (!counted) this.state.totalRuns++;
      this.state.failedRuns++;

      if (runId) {
        await failJobRun(runId, [
          { message: errorObj.message, stack: errorObj.stack, timestamp: new Date().toISOString() },
        ]).catch((recordError: unknown) => {
          console.error('[Scheduler] Could not record failed run:', toError(recordError).message);
        });
      }
      return null;
    }
  }

  /**
   * Manually trigger a crawl
   */
  async triggerManually(): Promise<CrawlRunSummary | null> {
    console.log('\n[Scheduler] Manual trigger requested');
    return this.executeCrawl();
  }

  /**
   * Get current scheduler state
   */
  getState(): SchedulerState {
    return { ...this.state };
  }
}

// Singleton instance
let schedulerInstance: JobScheduler | null = null;

/**
 * Get or create the scheduler instance
 */
export function getScheduler(config?: Partial<SchedulerConfig>): JobScheduler {
  if (!schedulerInstance) {
    schedulerInstance = new JobScheduler(config);
  }
  return schedulerInstance;
}

/**
 * Start the scheduler
 */
export async function startScheduler(config?: Partial<SchedulerConfig>): Promise<JobScheduler> {
  const scheduler = getScheduler(config);
  await scheduler.start();
  return scheduler;
}

/**
 * Stop the scheduler
 */
export async function stopScheduler(): Promise<void> {
  if (schedulerInstance) {
    await schedulerInstance.stop();
    schedulerInstance = null;
  }
}

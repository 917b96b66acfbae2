/**
 * Crawl Orchestrator
 *
 * Runs one crawl of a listing page end to end:
 * 1. Resolve and validate configuration (fatal before the run starts)
 * 2. Crawl the page: articles plus bounded comment trees
 * 3. Persist each retained article, its comments and a score snapshot as
 *    soon as its tree is crawled
 *
 * Every failure after startup is recorded in the run summary and the run
 * carries on. Cancellation and the run timeout are cooperative: they stop
 * new fetches, and whatever was crawled before that is still written.
 */

import {
  ArticleCrawler,
  ItemFetcher,
  RateLimiter,
  resolveCrawlConfig,
  systemClock,
  toError,
  type ArticleCrawlResult,
  type Clock,
  type CrawlConfig,
  type CrawlConfigInput,
  type CrawlError,
  type ItemTransport,
  type PageCrawlResult,
} from '../crawler/index.js';
import { RepositoryWriteFailedError, type Repository } from '../database/repository.js';
import type { CrawlRunStatus, CrawlRunSummary, WriteCounts } from './types.js';

export interface CrawlOrchestratorOptions {
  repository: Repository;
  /** Explicit overrides, highest precedence */
  config?: Partial<CrawlConfigInput>;
  /** Stored settings layer, below environment */
  settings?: Record<string, unknown>;
  /** Environment layer (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Raw transport; defaults to HTTP against `apiBaseUrl` */
  transport?: ItemTransport;
  clock?: Clock;
}

function emptyWrites(): WriteCounts {
  return { succeeded: 0, failed: 0 };
}

function createSummary(config: CrawlConfig, startedAt: Date): CrawlRunSummary {
  return {
    status: 'completed',
    listing: config.listing,
    startedAt,
    completedAt: startedAt,
    durationMs: 0,
    articles: {
      listed: 0,
      fetched: 0,
      retained: 0,
      notFound: 0,
      notArticle: 0,
      belowThreshold: 0,
      treeSkipped: 0,
      failed: 0,
      stored: 0,
    },
    comments: {
      emitted: 0,
      stored: 0,
      skipped: 0,
      failed: 0,
      breadthPruned: 0,
      cappedArticles: 0,
    },
    writes: {
      articles: emptyWrites(),
      comments: emptyWrites(),
      snapshots: emptyWrites(),
    },
    errors: [],
  };
}

/**
 * CrawlOrchestrator runs crawls against one repository with one resolved config
 */
export class CrawlOrchestrator {
  readonly config: CrawlConfig;
  private repository: Repository;
  private transport?: ItemTransport;
  private clock: Clock;
  private abortController: AbortController | null = null;
  private cancelRequested = false;
  private timedOut = false;

  /**
   * @throws ConfigInvalidError when the merged configuration does not validate
   */
  constructor(options: CrawlOrchestratorOptions) {
    this.config = resolveCrawlConfig(options.config, {
      settings: options.settings,
      env: options.env,
    });
    this.repository = options.repository;
    this.transport = options.transport;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Run one crawl. Never rejects for upstream or storage failures; those are
   * counted in the returned summary.
   */
  async run(): Promise<CrawlRunSummary> {
    const startedAt = new Date();
    const summary = createSummary(this.config, startedAt);
    const controller = new AbortController();
    this.abortController = controller;
    this.timedOut = false;
    if (this.cancelRequested) controller.abort();

    const timer = setTimeout(() => {
      this.timedOut = true;
      controller.abort();
    }, this.config.runTimeoutMs);

    console.log('\n' + '='.repeat(60));
    console.log('CRAWL STARTED');
    console.log(`Listing: ${this.config.listing} (up to ${this.config.maxArticles} articles)`);
    console.log(`Started: ${startedAt.toISOString()}`);
    console.log('='.repeat(60) + '\n');

    try {
      const fetcher = ItemFetcher.create({
        limiter: new RateLimiter(this.config.requestRateIntervalMs, this.clock),
        retry: {
          maxRetries: this.config.maxRetries,
          baseDelayMs: this.config.retryBaseDelayMs,
          maxDelayMs: this.config.retryMaxDelayMs,
        },
        transport: this.transport,
        http: { baseUrl: this.config.apiBaseUrl, timeoutMs: this.config.requestTimeoutMs },
        clock: this.clock,
      });
      const crawler = new ArticleCrawler(fetcher, this.config, (id) => this.repository.exists(id));

      console.log('--- Step: CRAWL & STORE ---');
      const page = await crawler.crawlPage(
        this.config.maxArticles,
        this.config.minScoreThreshold,
        controller.signal,
        async (result) => {
          this.tallyArticle(result, summary);
          await this.persist(result, summary);
        }
      );
      this.tallyPage(page, summary);

      summary.status = this.finalStatus(page, controller.signal);
    } finally {
      clearTimeout(timer);
      this.abortController = null;
      this.cancelRequested = false;
    }

    summary.completedAt = new Date();
    summary.durationMs = summary.completedAt.getTime() - startedAt.getTime();

    console.log('\n' + '='.repeat(60));
    console.log(`CRAWL ${summary.status.toUpperCase()}`);
    console.log(`Duration: ${summary.durationMs}ms`);
    console.log(
      `Articles: ${summary.articles.stored}/${summary.articles.retained} stored, ` +
        `${summary.articles.failed} failed`
    );
    console.log(`Comments: ${summary.comments.stored} stored, ${summary.comments.failed} failed`);
    console.log(`Errors: ${summary.errors.length}`);
    console.log('='.repeat(60) + '\n');

    return summary;
  }

  /**
   * Stop the running crawl at its next checkpoint. Called before `run()`,
   * the next run starts already cancelled.
   */
  cancel(): void {
    this.cancelRequested = true;
    if (this.abortController) {
      this.abortController.abort();
    }
  }

  private tallyPage(page: PageCrawlResult, summary: CrawlRunSummary): void {
    const { articles } = summary;

    articles.listed = page.listed;
    articles.retained = page.retained;
    articles.notFound = page.notFound;
    articles.notArticle = page.notArticle;
    articles.belowThreshold = page.belowThreshold;
    articles.fetched = page.retained + page.notArticle + page.belowThreshold;
    articles.failed = page.errors.filter((e) => e.scope === 'article').length;

    summary.errors.push(...page.errors);
  }

  private tallyArticle(result: ArticleCrawlResult, summary: CrawlRunSummary): void {
    const { articles, comments } = summary;

    if (result.treeSkipped) articles.treeSkipped++;
    comments.emitted += result.comments.length;
    comments.skipped += result.tree.skipped;
    comments.failed += result.tree.failed;
    comments.breadthPruned += result.tree.breadthPruned;
    if (result.tree.capReached) comments.cappedArticles++;
  }

  /**
   * Write one article, its comments and a snapshot.
   * Comments and snapshot reference the article, so they are skipped when
   * the article upsert fails.
   */
  private async persist(result: ArticleCrawlResult, summary: CrawlRunSummary): Promise<void> {
    const { article } = result;

    const stored = await this.write(summary, 'upsertArticle', article.id, () =>
      this.repository.upsertArticle(article)
    );
    if (!stored) return;
    summary.articles.stored++;

    if (!result.treeSkipped && result.comments.length > 0) {
      const written = await this.write(summary, 'upsertComments', article.id, () =>
        this.repository.upsertComments(article.id, result.comments)
      );
      if (written) summary.comments.stored += result.comments.length;
    }

    await this.write(summary, 'recordSnapshot', article.id, () =>
      this.repository.recordSnapshot({
        articleId: article.id,
        capturedAt: result.fetchedAt,
        score: article.score,
        commentCount: article.commentCount,
        rank: result.rank,
      })
    );
  }

  private async write(
    summary: CrawlRunSummary,
    operation: RepositoryWriteFailedError['operation'],
    articleId: string,
    fn: () => Promise<void>
  ): Promise<boolean> {
    const counts = {
      upsertArticle: summary.writes.articles,
      upsertComments: summary.writes.comments,
      recordSnapshot: summary.writes.snapshots,
    }[operation];

    try {
      await fn();
      counts.succeeded++;
      return true;
    } catch (error) {
      const writeError = new RepositoryWriteFailedError(operation, articleId, error);
      counts.failed++;
      summary.errors.push(this.createWriteError(writeError, articleId));
      console.error(`  ${writeError.message}`);
      return false;
    }
  }

  private createWriteError(error: unknown, itemId: string): CrawlError {
    const errorObj = toError(error);
    return {
      scope: 'write',
      message: errorObj.message,
      stack: errorObj.stack,
      timestamp: new Date().toISOString(),
      itemId,
    };
  }

  private finalStatus(page: PageCrawlResult, signal: AbortSignal): CrawlRunStatus {
    if (page.errors.some((e) => e.scope === 'listing')) return 'failed';
    if (this.timedOut) return 'timeout';
    if (signal.aborted || page.cancelled) return 'cancelled';
    return 'completed';
  }
}

/**
 * Whether a run finished its whole page. Cancelled and timed-out runs did
 * not, even though what they crawled was stored.
 */
export function isCompletedRun(summary: CrawlRunSummary): boolean {
  return summary.status === 'completed';
}

/**
 * Run a single crawl with the given options
 */
export async function runCrawl(options: CrawlOrchestratorOptions): Promise<CrawlRunSummary> {
  const orchestrator = new CrawlOrchestrator(options);
  return orchestrator.run();
}

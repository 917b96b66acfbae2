import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigInvalidError, type CrawlConfigInput, type ItemTransport } from '../crawler/index.js';
import { ScriptedTransport, comment, story } from '../crawler/testing.js';
import type { Article, Comment } from '../crawler/types.js';
import { MemoryRepository } from '../database/memory-repository.js';
import { TrendAnalyzer } from '../trends/analyzer.js';
import { CrawlOrchestrator, isCompletedRun } from './orchestrator.js';

const fastConfig = {
  requestRateIntervalMs: 0,
  maxRetries: 0,
  retryBaseDelayMs: 0,
  retryMaxDelayMs: 0,
  concurrency: 1,
  minScoreThreshold: 10,
} satisfies Partial<CrawlConfigInput>;

function frontPage(): ScriptedTransport {
  return new ScriptedTransport()
    .listing('top', [10, 11, 12, 13])
    .items(
      story(10, { score: 200, descendants: 3, kids: [100, 101] }),
      comment(100, [102]),
      comment(101),
      comment(102),
      story(12, { score: 5 })
    )
    .failAlways('/item/13.json', new Error('down'));
}

function orchestratorFor(
  transport: ItemTransport,
  repository: MemoryRepository,
  config: Partial<CrawlConfigInput> = {}
): CrawlOrchestrator {
  return new CrawlOrchestrator({ repository, transport, env: {}, config: { ...fastConfig, ...config } });
}

describe('CrawlOrchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should crawl, store and account for a page', async () => {
    const repository = new MemoryRepository();

    const summary = await orchestratorFor(frontPage(), repository).run();

    expect(summary.status).toBe('completed');
    expect(isCompletedRun(summary)).toBe(true);
    expect(summary.listing).toBe('top');
    expect(summary.articles).toEqual({
      listed: 4,
      fetched: 2,
      retained: 1,
      notFound: 1,
      notArticle: 0,
      belowThreshold: 1,
      treeSkipped: 0,
      failed: 1,
      stored: 1,
    });
    expect(summary.comments).toEqual({
      emitted: 3,
      stored: 3,
      skipped: 0,
      failed: 0,
      breadthPruned: 0,
      cappedArticles: 0,
    });
    expect(summary.writes).toEqual({
      articles: { succeeded: 1, failed: 0 },
      comments: { succeeded: 1, failed: 0 },
      snapshots: { succeeded: 1, failed: 0 },
    });
    expect(summary.errors.map((e) => [e.scope, e.itemId])).toEqual([['article', '13']]);
    expect(summary.durationMs).toBe(summary.completedAt.getTime() - summary.startedAt.getTime());
  });

  it('should persist the article, its comments and a snapshot', async () => {
    const repository = new MemoryRepository();

    await orchestratorFor(frontPage(), repository).run();

    expect(await repository.getArticle('10')).toMatchObject({ score: 200, commentCount: 3 });
    expect(await repository.exists('12')).toBe(false);
    expect((await repository.getArticleComments('10')).map((c) => [c.id, c.parentId, c.depth])).toEqual([
      ['100', null, 0],
      ['101', null, 0],
      ['102', '100', 1],
    ]);
    expect(await repository.getSnapshotHistory('10', new Date(0))).toEqual([
      { articleId: '10', capturedAt: expect.any(Date), score: 200, commentCount: 3, rank: 1 },
    ]);
  });

  it('should be idempotent across runs and feed the trend analyzer', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    const repository = new MemoryRepository();
    const transport = frontPage();
    const orchestrator = orchestratorFor(transport, repository);

    vi.setSystemTime(new Date('2024-05-01T10:00:00Z'));
    await orchestrator.run();

    transport.items(story(10, { score: 260, descendants: 4, kids: [100, 101] }));
    vi.setSystemTime(new Date('2024-05-01T11:00:00Z'));
    await orchestrator.run();

    const stats = await repository.getStats();
    expect(stats).toMatchObject({ totalArticles: 1, totalComments: 3, totalSnapshots: 2 });

    const trending = await new TrendAnalyzer(repository).computeTrending(24, {
      now: new Date('2024-05-01T12:00:00Z'),
    });
    expect(trending).toEqual([
      {
        articleId: '10',
        scoreIncrease: 60,
        commentIncrease: 1,
        snapshots: 2,
        firstCapturedAt: new Date('2024-05-01T10:00:00Z'),
        lastCapturedAt: new Date('2024-05-01T11:00:00Z'),
      },
    ]);
  });

  it('should only refresh scores of stored articles when skipping processed ones', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    const repository = new MemoryRepository();
    const transport = frontPage();

    vi.setSystemTime(new Date('2024-05-01T10:00:00Z'));
    await orchestratorFor(transport, repository).run();

    vi.setSystemTime(new Date('2024-05-01T11:00:00Z'));
    const summary = await orchestratorFor(transport, repository, { skipAlreadyProcessed: true }).run();

    expect(summary.articles.treeSkipped).toBe(1);
    expect(summary.comments.emitted).toBe(0);
    expect(summary.writes.comments).toEqual({ succeeded: 0, failed: 0 });
    expect(summary.writes.snapshots).toEqual({ succeeded: 1, failed: 0 });
    expect(transport.requestCount('/item/100.json')).toBe(1);
  });

  it('should record a comment write failure and still record the snapshot', async () => {
    class FailingComments extends MemoryRepository {
      async upsertComments(_articleId: string, _comments: Comment[]): Promise<void> {
        throw new Error('disk full');
      }
    }
    const repository = new FailingComments();

    const summary = await orchestratorFor(frontPage(), repository).run();

    expect(summary.status).toBe('completed');
    expect(summary.writes.comments).toEqual({ succeeded: 0, failed: 1 });
    expect(summary.writes.snapshots).toEqual({ succeeded: 1, failed: 0 });
    expect(summary.comments.stored).toBe(0);
    expect(summary.errors).toContainEqual(
      expect.objectContaining({
        scope: 'write',
        itemId: '10',
        message: 'upsertComments failed for article 10: disk full',
      })
    );
    expect(await repository.getSnapshotHistory('10', new Date(0))).toHaveLength(1);
  });

  it('should skip dependent writes when the article write fails', async () => {
    class FailingArticles extends MemoryRepository {
      async upsertArticle(_article: Article): Promise<void> {
        throw new Error('constraint violation');
      }
    }
    const repository = new FailingArticles();

    const summary = await orchestratorFor(frontPage(), repository).run();

    expect(summary.articles.stored).toBe(0);
    expect(summary.writes).toEqual({
      articles: { succeeded: 0, failed: 1 },
      comments: { succeeded: 0, failed: 0 },
      snapshots: { succeeded: 0, failed: 0 },
    });
    expect((await repository.getStats()).totalSnapshots).toBe(0);
  });

  it('should fail the run when the listing cannot be fetched', async () => {
    const transport = new ScriptedTransport().failAlways('/topstories.json', new Error('down'));

    const summary = await orchestratorFor(transport, new MemoryRepository()).run();

    expect(summary.status).toBe('failed');
    expect(summary.articles.listed).toBe(0);
    expect(summary.errors.map((e) => e.scope)).toEqual(['listing']);
  });

  it('should start already cancelled when cancel comes before run', async () => {
    const transport = frontPage();
    const orchestrator = orchestratorFor(transport, new MemoryRepository());

    orchestrator.cancel();
    const cancelled = await orchestrator.run();
    const next = await orchestrator.run();

    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.articles.stored).toBe(0);
    expect(next.status).toBe('completed');
  });

  it('should reject an invalid configuration before running', () => {
    expect(() => orchestratorFor(frontPage(), new MemoryRepository(), { maxCommentDepth: -1 })).toThrow(
      ConfigInvalidError
    );
  });

  it('should store each article before fetching the next one', async () => {
    const scripted = frontPage();
    const repository = new MemoryRepository();
    const storedBeforeNext: boolean[] = [];
    const transport: ItemTransport = {
      async get(path: string): Promise<unknown> {
        if (path === '/item/11.json') storedBeforeNext.push(await repository.exists('10'));
        return scripted.get(path);
      },
    };

    await orchestratorFor(transport, repository).run();

    expect(storedBeforeNext).toEqual([true]);
    expect(await repository.getSnapshotHistory('10', new Date(0))).toHaveLength(1);
  });

  it('should stop between articles when cancelled and keep what was crawled', async () => {
    const scripted = frontPage();
    const repository = new MemoryRepository();
    let orchestrator: CrawlOrchestrator | undefined;
    const transport: ItemTransport = {
      async get(path: string): Promise<unknown> {
        if (path === '/item/11.json') orchestrator?.cancel();
        return scripted.get(path);
      },
    };
    orchestrator = orchestratorFor(transport, repository);

    const summary = await orchestrator.run();

    expect(summary.status).toBe('cancelled');
    expect(isCompletedRun(summary)).toBe(false);
    expect(summary.articles.stored).toBe(1);
    expect(scripted.requestCount('/item/12.json')).toBe(0);
    expect(await repository.exists('10')).toBe(true);
  });

  it('should report a timeout when the run outlasts runTimeoutMs', async () => {
    const scripted = frontPage();
    const transport: ItemTransport = {
      async get(path: string): Promise<unknown> {
        if (path === '/item/11.json') {
          await new Promise((resolve) => setTimeout(resolve, 50));
        }
        return scripted.get(path);
      },
    };

    const summary = await orchestratorFor(transport, new MemoryRepository(), { runTimeoutMs: 5 }).run();

    expect(summary.status).toBe('timeout');
    expect(isCompletedRun(summary)).toBe(false);
    expect(scripted.requestCount('/item/12.json')).toBe(0);
  });
});

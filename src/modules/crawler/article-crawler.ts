/**
 * Article Crawler
 *
 * Fetches one page of a listing, keeps the articles that clear the score
 * threshold, and walks each retained article's comment tree. Articles are
 * processed by a small worker pool; every fetch still goes through the
 * shared rate limiter inside the fetcher.
 */

import { CommentTreeCrawler } from './comment-tree.js';
import type { CrawlConfig } from './config.js';
import { toError } from './errors.js';
import type { ItemFetcher } from './fetcher.js';
import { toArticle } from './normalize.js';
import type {
  ArticleCrawlResult,
  CrawlError,
  CommentTreeStats,
  FetchResult,
  ItemFailure,
  Listing,
  PageCrawlResult,
} from './types.js';

/**
 * Lookup used by the "skip already processed" fast path
 */
export type ArticleExistsFn = (articleId: string) => Promise<boolean>;

type ArticleCrawlerConfig = Pick<
  CrawlConfig,
  | 'listing'
  | 'concurrency'
  | 'maxCommentsPerArticle'
  | 'maxCommentDepth'
  | 'maxChildrenPerNode'
  | 'maxCommentLength'
  | 'maxStoryTextLength'
  | 'commentFanOut'
  | 'skipAlreadyProcessed'
>;

/**
 * Receives each retained article as soon as its tree is crawled
 */
export type ArticleResultHandler = (result: ArticleCrawlResult) => Promise<void>;

type ArticleOutcome =
  | { kind: 'retained'; result: ArticleCrawlResult }
  | { kind: 'handed_off'; tree: CommentTreeStats; commentFailures: ItemFailure[] }
  | { kind: 'not_found' }
  | { kind: 'not_article' }
  | { kind: 'below_threshold' }
  | { kind: 'failed'; error: CrawlError };

const EMPTY_TREE: CommentTreeStats = {
  fetched: 0,
  skipped: 0,
  failed: 0,
  breadthPruned: 0,
  capReached: false,
  cancelled: false,
};

function createCrawlError(scope: CrawlError['scope'], error: unknown, itemId?: string): CrawlError {
  const errorObj = toError(error);
  return {
    scope,
    message: errorObj.message,
    stack: errorObj.stack,
    timestamp: new Date().toISOString(),
    itemId,
  };
}

export class ArticleCrawler {
  private fetcher: Pick<ItemFetcher, 'fetchItem' | 'fetchListing'>;
  private config: ArticleCrawlerConfig;
  private comments: CommentTreeCrawler;
  private exists?: ArticleExistsFn;

  constructor(
    fetcher: Pick<ItemFetcher, 'fetchItem' | 'fetchListing'>,
    config: ArticleCrawlerConfig,
    exists?: ArticleExistsFn
  ) {
    this.fetcher = fetcher;
    this.config = config;
    this.exists = exists;
    this.comments = new CommentTreeCrawler(fetcher, {
      maxDepth: config.maxCommentDepth,
      maxChildrenPerNode: config.maxChildrenPerNode,
      maxTotalComments: config.maxCommentsPerArticle,
      maxCommentLength: config.maxCommentLength,
      fanOut: config.commentFanOut,
    });
  }

  /**
   * Crawl the first `pageSize` articles of the configured listing.
   *
   * With `onResult`, each retained article is handed over as soon as it is
   * ready instead of being collected in `page.articles`; the worker waits for
   * the handler before taking the next id, and a rejected handler rejects
   * the page.
   */
  async crawlPage(
    pageSize: number,
    minScoreThreshold: number,
    signal?: AbortSignal,
    onResult?: ArticleResultHandler
  ): Promise<PageCrawlResult> {
    const listing: Listing = this.config.listing;
    const page: PageCrawlResult = {
      listing,
      listed: 0,
      retained: 0,
      articles: [],
      notFound: 0,
      notArticle: 0,
      belowThreshold: 0,
      errors: [],
      cancelled: false,
    };

    let ids: number[];
    try {
      ids = (await this.fetcher.fetchListing(listing)).slice(0, Math.max(0, pageSize));
    } catch (error) {
      const listingError = createCrawlError('listing', error);
      page.errors.push(listingError);
      console.error(`  ${listing}: could not fetch listing - ${listingError.message}`);
      return page;
    }

    page.listed = ids.length;
    console.log(`  Fetching ${ids.length} articles from ${listing}...`);

    const outcomes: Array<ArticleOutcome | undefined> = new Array(ids.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
      for (;;) {
        const idx = cursor++;
        if (idx >= ids.length) break;

        if (signal?.aborted) {
          page.cancelled = true;
          break;
        }

        const outcome = await this.crawlArticle(ids[idx], idx + 1, minScoreThreshold, signal);
        if (outcome.kind === 'retained' && onResult) {
          await onResult(outcome.result);
          outcomes[idx] = {
            kind: 'handed_off',
            tree: outcome.result.tree,
            commentFailures: outcome.result.commentFailures,
          };
        } else {
          outcomes[idx] = outcome;
        }
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(this.config.concurrency, ids.length) }, () => worker())
    );

    // Outcomes are collected by index so results keep listing order
    for (const outcome of outcomes) {
      if (!outcome) continue;

      switch (outcome.kind) {
        case 'retained':
          page.articles.push(outcome.result);
          this.tallyTree(page, outcome.result.tree, outcome.result.commentFailures);
          break;
        case 'handed_off':
          this.tallyTree(page, outcome.tree, outcome.commentFailures);
          break;
        case 'not_found':
          page.notFound++;
          break;
        case 'not_article':
          page.notArticle++;
          break;
        case 'below_threshold':
          page.belowThreshold++;
          break;
        case 'failed':
          page.errors.push(outcome.error);
          break;
      }
    }

    return page;
  }

  private tallyTree(page: PageCrawlResult, tree: CommentTreeStats, failures: ItemFailure[]): void {
    page.retained++;
    if (tree.cancelled) page.cancelled = true;
    for (const failure of failures) {
      page.errors.push({
        scope: 'comment',
        itemId: String(failure.itemId),
        message: failure.message,
        timestamp: failure.timestamp,
      });
    }
  }

  /**
   * Fetch one article and, unless skipped, its comment tree
   */
  private async crawlArticle(
    id: number,
    rank: number,
    minScoreThreshold: number,
    signal?: AbortSignal
  ): Promise<ArticleOutcome> {
    let fetched: FetchResult;
    try {
      fetched = await this.fetcher.fetchItem(id);
    } catch (error) {
      const articleError = createCrawlError('article', error, String(id));
      console.error(`  Article ${id}: Error - ${articleError.message}`);
      return { kind: 'failed', error: articleError };
    }

    if (fetched.status === 'not_found') {
      return { kind: 'not_found' };
    }

    const fetchedAt = new Date();
    const article = toArticle(fetched.item, this.config.maxStoryTextLength);
    if (!article) {
      return { kind: 'not_article' };
    }

    if (article.score < minScoreThreshold) {
      return { kind: 'below_threshold' };
    }

    if (this.config.skipAlreadyProcessed && (await this.isStored(article.id))) {
      console.log(`  #${rank} ${article.title.slice(0, 50)} (already stored, refreshing score only)`);
      return {
        kind: 'retained',
        result: {
          article,
          comments: [],
          tree: { ...EMPTY_TREE },
          rank,
          fetchedAt,
          treeSkipped: true,
          commentFailures: [],
        },
      };
    }

    const tree = await this.comments.crawl(article.id, fetched.item.kids ?? [], signal);
    console.log(
      `  #${rank} ${article.title.slice(0, 50)}: score ${article.score}, ${tree.comments.length} comments` +
        (tree.stats.capReached ? ' (cap reached)' : '')
    );

    return {
      kind: 'retained',
      result: {
        article,
        comments: tree.comments,
        tree: tree.stats,
        rank,
        fetchedAt,
        treeSkipped: false,
        commentFailures: tree.failures,
      },
    };
  }

  private async isStored(articleId: string): Promise<boolean> {
    if (!this.exists) return false;

    try {
      return await this.exists(articleId);
    } catch (error) {
      console.warn(`  Warning: existence check failed for article ${articleId}: ${toError(error).message}`);
      return false;
    }
  }
}

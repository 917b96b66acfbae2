/**
 * Comment Tree Crawler
 *
 * Expands an article's top-level comment ids into a flat, depth-annotated
 * list. Traversal is depth-first over an explicit stack and bounded three
 * ways: depth (checked before any fetch), breadth (children per node) and
 * total volume (a budget shared by the whole article).
 *
 * A deleted or textless comment is not emitted, but its replies are still
 * walked: they are valid comments in their own right. A failed fetch drops
 * only the subtree below that node.
 */

import { FetchFailedError, toError } from './errors.js';
import type { ItemFetcher } from './fetcher.js';
import { toComment } from './normalize.js';
import type { Comment, CommentTreeResult, CommentTreeStats, ItemFailure } from './types.js';

/**
 * Caps applied to one article's comment tree
 */
export interface CommentTreeConfig {
  /** Deepest depth fetched; top-level comments are depth 0 (default: 4) */
  maxDepth: number;
  /** Children descended per node (default: 15) */
  maxChildrenPerNode: number;
  /** Comments emitted per article (default: 200) */
  maxTotalComments: number;
  /** Characters kept of each comment's cleaned text (default: 1000) */
  maxCommentLength: number;
  /** Top-level subtrees walked concurrently (default: 1) */
  fanOut: number;
}

export const DEFAULT_COMMENT_TREE_CONFIG: CommentTreeConfig = {
  maxDepth: 4,
  maxChildrenPerNode: 15,
  maxTotalComments: 200,
  maxCommentLength: 1000,
  fanOut: 1,
};

interface WorkItem {
  id: number;
  parentId: string | null;
  depth: number;
}

/**
 * Running count of emitted comments, passed by reference through a traversal.
 * `precedingCount` reports comments that come before this traversal in the
 * final order; it only ever grows.
 */
class CommentBudget {
  private emitted: number = 0;

  constructor(
    private readonly limit: number,
    private readonly precedingCount: () => number = () => 0
  ) {}

  get count(): number {
    return this.emitted;
  }

  get exhausted(): boolean {
    return this.precedingCount() + this.emitted >= this.limit;
  }

  take(): void {
    this.emitted++;
  }
}

function emptyStats(): CommentTreeStats {
  return {
    fetched: 0,
    skipped: 0,
    failed: 0,
    breadthPruned: 0,
    capReached: false,
    cancelled: false,
  };
}

export class CommentTreeCrawler {
  private fetcher: Pick<ItemFetcher, 'fetchItem'>;
  private config: CommentTreeConfig;

  constructor(fetcher: Pick<ItemFetcher, 'fetchItem'>, config: Partial<CommentTreeConfig> = {}) {
    this.fetcher = fetcher;
    this.config = { ...DEFAULT_COMMENT_TREE_CONFIG, ...config };
  }

  /**
   * Crawl the comment tree below an article
   */
  async crawl(articleId: string, rootIds: number[], signal?: AbortSignal): Promise<CommentTreeResult> {
    const stats = emptyStats();
    const failures: ItemFailure[] = [];

    if (rootIds.length === 0) {
      return { comments: [], stats, failures };
    }

    if (this.config.maxTotalComments <= 0) {
      stats.capReached = true;
      return { comments: [], stats, failures };
    }

    if (this.config.fanOut <= 1 || rootIds.length === 1) {
      const { comments, capReached } = await this.walk(
        articleId,
        rootIds.map((id) => ({ id, parentId: null, depth: 0 })),
        new CommentBudget(this.config.maxTotalComments),
        stats,
        failures,
        signal
      );
      stats.capReached = capReached;
      return { comments, stats, failures };
    }

    return this.crawlSubtreesConcurrently(articleId, rootIds, stats, failures, signal);
  }

  /**
   * Walk top-level subtrees with a worker pool. Subtree `i` stops once the
   * comments emitted so far by subtrees before it, plus its own, reach the
   * cap. Results are joined in root order and cut to the cap, which yields
   * the same comments as a sequential walk.
   */
  private async crawlSubtreesConcurrently(
    articleId: string,
    rootIds: number[],
    stats: CommentTreeStats,
    failures: ItemFailure[],
    signal?: AbortSignal
  ): Promise<CommentTreeResult> {
    const limit = this.config.maxTotalComments;
    const subtrees: Array<Comment[] | undefined> = new Array(rootIds.length);
    const budgets: CommentBudget[] = [];
    let cursor = 0;
    let capReached = false;

    const emittedBefore = (idx: number): number => {
      let count = 0;
      for (let i = 0; i < idx; i++) {
        count += budgets[i].count;
      }
      return count;
    };

    for (let idx = 0; idx < rootIds.length; idx++) {
      budgets.push(new CommentBudget(limit, () => emittedBefore(idx)));
    }

    const worker = async (): Promise<void> => {
      for (;;) {
        const idx = cursor++;
        if (idx >= rootIds.length) break;

        if (signal?.aborted) {
          stats.cancelled = true;
          break;
        }

        if (budgets[idx].exhausted) {
          capReached = true;
          break;
        }

        const result = await this.walk(
          articleId,
          [{ id: rootIds[idx], parentId: null, depth: 0 }],
          budgets[idx],
          stats,
          failures,
          signal
        );
        subtrees[idx] = result.comments;
        if (result.capReached) capReached = true;
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(this.config.fanOut, rootIds.length) }, () => worker())
    );

    const merged: Comment[] = [];
    for (const subtree of subtrees) {
      if (subtree) merged.push(...subtree);
    }

    if (merged.length > limit) {
      capReached = true;
    }

    stats.capReached = capReached;
    return { comments: merged.slice(0, limit), stats, failures };
  }

  /**
   * Depth-first walk from the given start nodes
   */
  private async walk(
    articleId: string,
    start: WorkItem[],
    budget: CommentBudget,
    stats: CommentTreeStats,
    failures: ItemFailure[],
    signal?: AbortSignal
  ): Promise<{ comments: Comment[]; capReached: boolean }> {
    const { maxDepth, maxChildrenPerNode, maxCommentLength } = this.config;
    const comments: Comment[] = [];
    const stack: WorkItem[] = [...start].reverse();

    while (stack.length > 0) {
      if (budget.exhausted) {
        return { comments, capReached: true };
      }

      if (signal?.aborted) {
        stats.cancelled = true;
        break;
      }

      const node = stack.pop();
      if (!node || node.depth > maxDepth) continue;

      let kids: number[];
      try {
        const result = await this.fetcher.fetchItem(node.id);

        if (result.status === 'not_found') {
          stats.skipped++;
          kids = result.kids;
        } else {
          stats.fetched++;
          kids = result.item.kids ?? [];

          const comment = toComment(
            result.item,
            { articleId, parentId: node.parentId, depth: node.depth },
            maxCommentLength
          );

          if (comment) {
            comments.push(comment);
            budget.take();
          } else {
            stats.skipped++;
          }
        }
      } catch (error) {
        const err = toError(error);
        stats.failed++;
        failures.push({
          itemId: error instanceof FetchFailedError ? (error.itemId ?? node.id) : node.id,
          message: err.message,
          timestamp: new Date().toISOString(),
        });
        console.warn(`  Warning: Could not fetch comment ${node.id}: ${err.message}`);
        continue;
      }

      const childDepth = node.depth + 1;
      if (kids.length === 0 || childDepth > maxDepth) continue;

      const descended = kids.slice(0, maxChildrenPerNode);
      stats.breadthPruned += kids.length - descended.length;

      const parentId = String(node.id);
      for (let i = descended.length - 1; i >= 0; i--) {
        stack.push({ id: descended[i], parentId, depth: childDepth });
      }
    }

    return { comments, capReached: false };
  }
}

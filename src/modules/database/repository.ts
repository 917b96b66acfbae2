/**
 * Repository contract consumed by the crawl pipeline.
 *
 * Implementations own all persisted state. Writes reject on failure; the
 * orchestrator wraps those rejections in RepositoryWriteFailedError and
 * carries on with the next write.
 */

import type { Article, Comment, ScoreSnapshot } from '../crawler/types.js';

/**
 * Article as stored, with bookkeeping timestamps
 */
export interface StoredArticle extends Article {
  firstSeenAt: Date;
  updatedAt: Date;
}

/**
 * Aggregate statistics over the stored data
 */
export interface RepositoryStats {
  totalArticles: number;
  totalComments: number;
  totalSnapshots: number;
  /** Mean article score, rounded to one decimal */
  averageScore: number;
  uniqueDomains: number;
}

export interface Repository {
  /** Insert or update by article id. postedAt and firstSeenAt are kept. */
  upsertArticle(article: Article): Promise<void>;
  /** Insert or update each comment by (articleId, comment id) */
  upsertComments(articleId: string, comments: Comment[]): Promise<void>;
  /** Append a snapshot. A second snapshot with the same key is ignored. */
  recordSnapshot(snapshot: ScoreSnapshot): Promise<void>;
  /** Snapshots of one article captured at or after `since`, oldest first */
  getSnapshotHistory(articleId: string, since: Date): Promise<ScoreSnapshot[]>;
  /** Snapshots of all articles captured at or after `since`, oldest first per article */
  getSnapshotsSince(since: Date): Promise<ScoreSnapshot[]>;
  exists(articleId: string): Promise<boolean>;
  getArticle(articleId: string): Promise<StoredArticle | undefined>;
  /** Comments of an article ordered by depth, then posted time */
  getArticleComments(articleId: string): Promise<Comment[]>;
  /** Highest scoring articles first */
  getTopArticles(limit: number): Promise<StoredArticle[]>;
  getStats(): Promise<RepositoryStats>;
}

/**
 * A repository write that failed for one article
 */
export class RepositoryWriteFailedError extends Error {
  readonly operation: 'upsertArticle' | 'upsertComments' | 'recordSnapshot';
  readonly articleId: string;

  constructor(operation: RepositoryWriteFailedError['operation'], articleId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for article ${articleId}: ${reason}`, { cause });
    this.name = 'RepositoryWriteFailedError';
    this.operation = operation;
    this.articleId = articleId;
  }
}

/**
 * Keep the last comment for each id, in first-seen order
 */
export function dedupeComments(comments: Comment[]): Comment[] {
  const byId = new Map<string, Comment>();
  for (const comment of comments) {
    byId.set(comment.id, comment);
  }
  return [...byId.values()];
}

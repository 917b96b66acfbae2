/**
 * PostgreSQL-backed repository built on the Drizzle query functions
 */

import type { Article, Comment, ScoreSnapshot } from '../crawler/types.js';
import {
  upsertArticleRow,
  getArticleById,
  articleExists,
  getTopArticleRows,
  upsertCommentRows,
  getCommentRowsByArticle,
  insertScoreSnapshot,
  getSnapshotRows,
  getSnapshotRowsSince,
  getDatabaseStats,
} from './queries.js';
import { dedupeComments, type Repository, type RepositoryStats, type StoredArticle } from './repository.js';
import type { ArticleRow, CommentRow, ScoreSnapshotRow } from './schema.js';

function toStoredArticle(row: ArticleRow): StoredArticle {
  return {
    id: row.id,
    title: row.title,
    url: row.url,
    domain: row.domain,
    score: row.score,
    author: row.author,
    postedAt: row.postedAt,
    commentCount: row.commentCount,
    storyText: row.storyText,
    storyType: row.storyType,
    firstSeenAt: row.firstSeenAt,
    updatedAt: row.updatedAt,
  };
}

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    articleId: row.articleId,
    parentId: row.parentId,
    author: row.author,
    text: row.text,
    postedAt: row.postedAt,
    depth: row.depth,
  };
}

function toSnapshot(row: ScoreSnapshotRow): ScoreSnapshot {
  return {
    articleId: row.articleId,
    capturedAt: row.capturedAt,
    score: row.score,
    commentCount: row.commentCount,
    rank: row.rank,
  };
}

export class PostgresRepository implements Repository {
  async upsertArticle(article: Article): Promise<void> {
    await upsertArticleRow({ ...article });
  }

  async upsertComments(articleId: string, comments: Comment[]): Promise<void> {
    // Postgres rejects an upsert that touches the same row twice
    const rows = dedupeComments(comments).map((comment) => ({ ...comment, articleId }));
    if (rows.length === 0) return;
    await upsertCommentRows(rows);
  }

  async recordSnapshot(snapshot: ScoreSnapshot): Promise<void> {
    await insertScoreSnapshot(snapshot);
  }

  async getSnapshotHistory(articleId: string, since: Date): Promise<ScoreSnapshot[]> {
    return (await getSnapshotRows(articleId, since)).map(toSnapshot);
  }

  async getSnapshotsSince(since: Date): Promise<ScoreSnapshot[]> {
    return (await getSnapshotRowsSince(since)).map(toSnapshot);
  }

  async exists(articleId: string): Promise<boolean> {
    return articleExists(articleId);
  }

  async getArticle(articleId: string): Promise<StoredArticle | undefined> {
    const row = await getArticleById(articleId);
    return row ? toStoredArticle(row) : undefined;
  }

  async getArticleComments(articleId: string): Promise<Comment[]> {
    return (await getCommentRowsByArticle(articleId)).map(toComment);
  }

  async getTopArticles(limit: number): Promise<StoredArticle[]> {
    return (await getTopArticleRows(limit)).map(toStoredArticle);
  }

  async getStats(): Promise<RepositoryStats> {
    return getDatabaseStats();
  }
}

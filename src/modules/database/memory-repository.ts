/**
 * In-memory repository
 *
 * Same contract as the Postgres repository, held in Maps. Used for dry
 * runs (`npm run crawl -- --dry-run`) and as the store in tests.
 */

import type { Article, Comment, ScoreSnapshot } from '../crawler/types.js';
import { dedupeComments, type Repository, type RepositoryStats, type StoredArticle } from './repository.js';

export class MemoryRepository implements Repository {
  private articles = new Map<string, StoredArticle>();
  private comments = new Map<string, Map<string, Comment>>();
  private snapshots = new Map<string, ScoreSnapshot[]>();
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async upsertArticle(article: Article): Promise<void> {
    const existing = this.articles.get(article.id);
    const updatedAt = this.now();

    this.articles.set(article.id, {
      ...article,
      postedAt: existing?.postedAt ?? article.postedAt,
      firstSeenAt: existing?.firstSeenAt ?? updatedAt,
      updatedAt,
    });
  }

  async upsertComments(articleId: string, comments: Comment[]): Promise<void> {
    let stored = this.comments.get(articleId);
    if (!stored) {
      stored = new Map();
      this.comments.set(articleId, stored);
    }

    for (const comment of dedupeComments(comments)) {
      stored.set(comment.id, { ...comment, articleId });
    }
  }

  async recordSnapshot(snapshot: ScoreSnapshot): Promise<void> {
    const history = this.snapshots.get(snapshot.articleId) ?? [];
    const capturedAt = snapshot.capturedAt.getTime();

    if (history.some((s) => s.capturedAt.getTime() === capturedAt)) {
      return;
    }

    history.push({ ...snapshot });
    history.sort((a, b) => a.capturedAt.getTime() - b.capturedAt.getTime());
    this.snapshots.set(snapshot.articleId, history);
  }

  async getSnapshotHistory(articleId: string, since: Date): Promise<ScoreSnapshot[]> {
    return (this.snapshots.get(articleId) ?? [])
      .filter((s) => s.capturedAt.getTime() >= since.getTime())
      .map((s) => ({ ...s }));
  }

  async getSnapshotsSince(since: Date): Promise<ScoreSnapshot[]> {
    const articleIds = [...this.snapshots.keys()].sort();
    const result: ScoreSnapshot[] = [];
    for (const articleId of articleIds) {
      result.push(...(await this.getSnapshotHistory(articleId, since)));
    }
    return result;
  }

  async exists(articleId: string): Promise<boolean> {
    return this.articles.has(articleId);
  }

  async getArticle(articleId: string): Promise<StoredArticle | undefined> {
    const article = this.articles.get(articleId);
    return article ? { ...article } : undefined;
  }

  async getArticleComments(articleId: string): Promise<Comment[]> {
    return [...(this.comments.get(articleId)?.values() ?? [])]
      .sort(
        (a, b) =>
          a.depth - b.depth ||
          a.postedAt.getTime() - b.postedAt.getTime() ||
          a.id.localeCompare(b.id)
      )
      .map((c) => ({ ...c }));
  }

  async getTopArticles(limit: number): Promise<StoredArticle[]> {
    return [...this.articles.values()]
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, limit)
      .map((a) => ({ ...a }));
  }

  async getStats(): Promise<RepositoryStats> {
    const articles = [...this.articles.values()];
    const totalScore = articles.reduce((sum, a) => sum + a.score, 0);
    let totalComments = 0;
    for (const stored of this.comments.values()) totalComments += stored.size;
    let totalSnapshots = 0;
    for (const history of this.snapshots.values()) totalSnapshots += history.length;

    return {
      totalArticles: articles.length,
      totalComments,
      totalSnapshots,
      averageScore: articles.length > 0 ? Math.round((totalScore / articles.length) * 10) / 10 : 0,
      uniqueDomains: new Set(articles.map((a) => a.domain)).size,
    };
  }
}

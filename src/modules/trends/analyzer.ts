/**
 * Trend Analyzer
 *
 * Computes score and comment deltas from the append-only snapshot history.
 * An article needs at least two snapshots inside the window to have a delta.
 */

import type { ScoreSnapshot } from '../crawler/types.js';
import type { Repository } from '../database/repository.js';
import type { SnapshotDelta, TrendingArticle, TrendQueryOptions } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Deterministic order: score increase desc, comment increase desc, article id asc
 */
export function compareTrending(a: TrendingArticle, b: TrendingArticle): number {
  if (a.scoreIncrease !== b.scoreIncrease) return b.scoreIncrease - a.scoreIncrease;
  if (a.commentIncrease !== b.commentIncrease) return b.commentIncrease - a.commentIncrease;
  return a.articleId < b.articleId ? -1 : a.articleId > b.articleId ? 1 : 0;
}

/**
 * Group snapshots by article and compute latest-minus-earliest deltas
 */
export function rankTrending(snapshots: ScoreSnapshot[]): TrendingArticle[] {
  const byArticle = new Map<string, ScoreSnapshot[]>();
  for (const snapshot of snapshots) {
    const history = byArticle.get(snapshot.articleId);
    if (history) {
      history.push(snapshot);
    } else {
      byArticle.set(snapshot.articleId, [snapshot]);
    }
  }

  const trending: TrendingArticle[] = [];
  for (const [articleId, history] of byArticle) {
    if (history.length < 2) continue;

    const ordered = [...history].sort((a, b) => a.capturedAt.getTime() - b.capturedAt.getTime());
    const earliest = ordered[0];
    const latest = ordered[ordered.length - 1];

    trending.push({
      articleId,
      scoreIncrease: latest.score - earliest.score,
      commentIncrease: latest.commentCount - earliest.commentCount,
      snapshots: ordered.length,
      firstCapturedAt: earliest.capturedAt,
      lastCapturedAt: latest.capturedAt,
    });
  }

  return trending.sort(compareTrending);
}

export class TrendAnalyzer {
  private repository: Pick<Repository, 'getSnapshotsSince' | 'getSnapshotHistory'>;

  constructor(repository: Pick<Repository, 'getSnapshotsSince' | 'getSnapshotHistory'>) {
    this.repository = repository;
  }

  /**
   * Articles ranked by score growth over the last `windowHours`
   */
  async computeTrending(windowHours: number, options: TrendQueryOptions = {}): Promise<TrendingArticle[]> {
    if (!Number.isFinite(windowHours) || windowHours <= 0) {
      throw new RangeError(`windowHours must be a positive number, got ${windowHours}`);
    }

    const now = options.now ?? new Date();
    const since = new Date(now.getTime() - windowHours * HOUR_MS);

    const snapshots = (await this.repository.getSnapshotsSince(since)).filter(
      (s) => s.capturedAt.getTime() <= now.getTime()
    );

    const trending = rankTrending(snapshots);
    return options.limit !== undefined ? trending.slice(0, options.limit) : trending;
  }

  /**
   * Delta between an article's two most recent snapshots, or null with fewer than two
   */
  async latestDelta(articleId: string): Promise<SnapshotDelta | null> {
    const history = await this.repository.getSnapshotHistory(articleId, new Date(0));
    if (history.length < 2) return null;

    const previous = history[history.length - 2];
    const latest = history[history.length - 1];

    return {
      articleId,
      scoreIncrease: latest.score - previous.score,
      commentIncrease: latest.commentCount - previous.commentCount,
      from: previous.capturedAt,
      to: latest.capturedAt,
    };
  }
}

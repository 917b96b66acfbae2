/**
 * Trend Analysis Types
 */

/**
 * Score and comment growth of one article inside a time window
 */
export interface TrendingArticle {
  articleId: string;
  /** latest.score - earliest.score */
  scoreIncrease: number;
  /** latest.commentCount - earliest.commentCount */
  commentIncrease: number;
  /** Snapshots found in the window */
  snapshots: number;
  firstCapturedAt: Date;
  lastCapturedAt: Date;
}

/**
 * Change between an article's two most recent snapshots
 */
export interface SnapshotDelta {
  articleId: string;
  scoreIncrease: number;
  commentIncrease: number;
  from: Date;
  to: Date;
}

/**
 * Options for computing the trending list
 */
export interface TrendQueryOptions {
  /** Reference time for the window (default: now) */
  now?: Date;
  /** Maximum entries returned (default: all) */
  limit?: number;
}

/**
 * Trends Module
 *
 * Turns score snapshots into "trending" rankings.
 */

export { type TrendingArticle, type SnapshotDelta, type TrendQueryOptions } from './types.js';
export { TrendAnalyzer, rankTrending, compareTrending } from './analyzer.js';

/**
 * Type definitions for the Crawler module
 */

import { z } from 'zod';

/**
 * Hacker News listings the crawler can start from.
 * Each maps to `/{listing}stories.json` on the API.
 */
export const listingSchema = z.enum(['top', 'new', 'best', 'ask', 'show', 'job']);
export type Listing = z.infer<typeof listingSchema>;

/**
 * Raw HN API item response.
 * Deleted items usually carry only id, time, parent and the deleted flag.
 */
export const apiItemSchema = z.object({
  id: z.number().int(),
  type: z.enum(['story', 'comment', 'job', 'poll', 'pollopt']).optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  text: z.string().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  score: z.number().optional(),
  descendants: z.number().optional(),
  kids: z.array(z.number().int()).optional(),
  parent: z.number().int().optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
});

export type ApiItem = z.infer<typeof apiItemSchema>;

export const listingIdsSchema = z.array(z.number().int());

/**
 * Outcome of fetching a single item.
 * `not_found` covers 404s, empty bodies and deleted/dead items; for the
 * latter `kids` still holds the reply ids so live replies can be walked.
 */
export type FetchResult =
  | { status: 'found'; item: ApiItem }
  | { status: 'not_found'; kids: number[] };

export type StoryType = 'story' | 'ask' | 'job' | 'poll';

/**
 * Normalized article as persisted by the repository
 */
export interface Article {
  id: string;
  title: string;
  url: string | null;
  domain: string;
  score: number;
  author: string;
  postedAt: Date;
  /** Declared comment count (`descendants`), not the number crawled */
  commentCount: number;
  storyText: string | null;
  storyType: StoryType;
}

/**
 * Normalized comment. Belongs to exactly one article, referenced by id.
 */
export interface Comment {
  id: string;
  articleId: string;
  /** null for top-level comments */
  parentId: string | null;
  author: string;
  text: string;
  postedAt: Date;
  /** 0 for top-level comments, parent depth + 1 otherwise */
  depth: number;
}

/**
 * Point-in-time capture of an article's score, used for trend deltas
 */
export interface ScoreSnapshot {
  articleId: string;
  capturedAt: Date;
  score: number;
  commentCount: number;
  /** 1-based position in the listing at fetch time */
  rank: number | null;
}

/**
 * A failure recorded for a single item while crawling
 */
export interface ItemFailure {
  itemId: number;
  message: string;
  timestamp: string;
}

/**
 * Statistics from walking one article's comment tree
 */
export interface CommentTreeStats {
  /** Items successfully fetched (including deleted/textless ones) */
  fetched: number;
  /** Items that were not found or carried no usable text */
  skipped: number;
  /** Items whose fetch failed after retries; their subtree is dropped */
  failed: number;
  /** Child ids dropped by the breadth cap */
  breadthPruned: number;
  /** Whether the total comment cap stopped the traversal */
  capReached: boolean;
  /** Whether the traversal was stopped by the abort signal */
  cancelled: boolean;
}

export interface CommentTreeResult {
  comments: Comment[];
  stats: CommentTreeStats;
  failures: ItemFailure[];
}

/**
 * One retained article with its crawled comments
 */
export interface ArticleCrawlResult {
  article: Article;
  comments: Comment[];
  tree: CommentTreeStats;
  /** 1-based position in the listing */
  rank: number;
  fetchedAt: Date;
  /** True when the article was already stored and its tree was not re-fetched */
  treeSkipped: boolean;
  commentFailures: ItemFailure[];
}

/**
 * Result of crawling one page of a listing
 */
export interface PageCrawlResult {
  listing: Listing;
  /** Number of ids considered after truncating to the page size */
  listed: number;
  /** Articles that cleared the filters, whether kept here or handed off */
  retained: number;
  /** Retained results, in listing order; empty when a result handler took them */
  articles: ArticleCrawlResult[];
  notFound: number;
  notArticle: number;
  belowThreshold: number;
  errors: CrawlError[];
  cancelled: boolean;
}

/**
 * Error that occurred during a crawl run
 */
export interface CrawlError {
  scope: 'listing' | 'article' | 'comment' | 'write';
  message: string;
  timestamp: string;
  itemId?: string;
  stack?: string;
}

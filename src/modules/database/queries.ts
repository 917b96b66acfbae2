import { eq, gte, desc, asc, and, sql } from 'drizzle-orm';
import { db } from './client.js';
import {
  articles,
  comments,
  scoreSnapshots,
  settings,
  systemMetadata,
  type ArticleRow,
  type NewArticleRow,
  type CommentRow,
  type NewCommentRow,
  type ScoreSnapshotRow,
  type NewScoreSnapshotRow,
  type SystemMetadataRecord,
} from './schema.js';

/**
 * Rows per multi-row insert
 */
const INSERT_CHUNK_SIZE = 500;

// =============================================================================
// ARTICLES QUERIES
// =============================================================================

/**
 * Insert or update an article.
 * first_seen_at and posted_at keep their original values.
 */
export async function upsertArticleRow(article: NewArticleRow): Promise<ArticleRow> {
  const [result] = await db
    .insert(articles)
    .values(article)
    .onConflictDoUpdate({
      target: articles.id,
      set: {
        title: article.title,
        url: article.url,
        domain: article.domain,
        score: article.score,
        author: article.author,
        commentCount: article.commentCount,
        storyText: article.storyText,
        storyType: article.storyType,
        updatedAt: new Date(),
      },
    })
    .returning();
  return result;
}

/**
 * Get article by ID
 */
export async function getArticleById(id: string): Promise<ArticleRow | undefined> {
  const [result] = await db.select().from(articles).where(eq(articles.id, id));
  return result;
}

/**
 * Check whether an article has been stored (dedup fast path)
 */
export async function articleExists(id: string): Promise<boolean> {
  const [result] = await db.select({ id: articles.id }).from(articles).where(eq(articles.id, id)).limit(1);
  return result !== undefined;
}

/**
 * Get the highest scoring articles
 */
export async function getTopArticleRows(limit: number = 50): Promise<ArticleRow[]> {
  return await db.select().from(articles).orderBy(desc(articles.score), asc(articles.id)).limit(limit);
}

// =============================================================================
// COMMENTS QUERIES
// =============================================================================

/**
 * Insert or update comments keyed by (article_id, id).
 * Callers must not pass the same key twice in one batch.
 */
export async function upsertCommentRows(rows: NewCommentRow[]): Promise<number> {
  let written = 0;

  for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
    const chunk = rows.slice(i, i + INSERT_CHUNK_SIZE);
    const result = await db
      .insert(comments)
      .values(chunk)
      .onConflictDoUpdate({
        target: [comments.articleId, comments.id],
        set: {
          parentId: sql`excluded.parent_id`,
          author: sql`excluded.author`,
          text: sql`excluded.text`,
          postedAt: sql`excluded.posted_at`,
          depth: sql`excluded.depth`,
          updatedAt: new Date(),
        },
      })
      .returning({ id: comments.id });
    written += result.length;
  }

  return written;
}

/**
 * Get comments of an article, shallowest first
 */
export async function getCommentRowsByArticle(articleId: string): Promise<CommentRow[]> {
  return await db
    .select()
    .from(comments)
    .where(eq(comments.articleId, articleId))
    .orderBy(asc(comments.depth), asc(comments.postedAt), asc(comments.id));
}

// =============================================================================
// SCORE SNAPSHOT QUERIES
// =============================================================================

/**
 * Append a score snapshot; duplicates of (article_id, captured_at) are ignored
 */
export async function insertScoreSnapshot(snapshot: NewScoreSnapshotRow): Promise<void> {
  await db.insert(scoreSnapshots).values(snapshot).onConflictDoNothing({
    target: [scoreSnapshots.articleId, scoreSnapshots.capturedAt],
  });
}

/**
 * Get one article's snapshots since a point in time, oldest first
 */
export async function getSnapshotRows(articleId: string, since: Date): Promise<ScoreSnapshotRow[]> {
  return await db
    .select()
    .from(scoreSnapshots)
    .where(and(eq(scoreSnapshots.articleId, articleId), gte(scoreSnapshots.capturedAt, since)))
    .orderBy(asc(scoreSnapshots.capturedAt));
}

/**
 * Get all snapshots since a point in time, grouped by article, oldest first
 */
export async function getSnapshotRowsSince(since: Date): Promise<ScoreSnapshotRow[]> {
  return await db
    .select()
    .from(scoreSnapshots)
    .where(gte(scoreSnapshots.capturedAt, since))
    .orderBy(asc(scoreSnapshots.articleId), asc(scoreSnapshots.capturedAt));
}

// =============================================================================
// SETTINGS QUERIES
// =============================================================================

/**
 * Get a setting by key. Callers validate the stored JSON.
 */
export async function getSetting(key: string): Promise<unknown> {
  const [result] = await db.select().from(settings).where(eq(settings.key, key));
  return result?.value;
}

// =============================================================================
// SYSTEM METADATA QUERIES
// =============================================================================

/**
 * Start a new job run
 */
export async function startJobRun(
  jobType: string,
  metadata?: Record<string, unknown>
): Promise<SystemMetadataRecord> {
  const [result] = await db
    .insert(systemMetadata)
    .values({
      jobType,
      status: 'running',
      metadata,
    })
    .returning();
  return result;
}

/**
 * Complete a job run
 */
export async function completeJobRun(
  id: string,
  itemsProcessed: number,
  metadata?: Record<string, unknown>
): Promise<SystemMetadataRecord | undefined> {
  const [result] = await db
    .update(systemMetadata)
    .set({
      status: 'completed',
      runCompletedAt: new Date(),
      itemsProcessed,
      metadata,
    })
    .where(eq(systemMetadata.id, id))
    .returning();
  return result;
}

/**
 * Fail a job run
 */
export async function failJobRun(
  id: string,
  errors: Array<{ message: string; stack?: string; timestamp: string }>,
  itemsProcessed: number = 0
): Promise<SystemMetadataRecord | undefined> {
  const [result] = await db
    .update(systemMetadata)
    .set({
      status: 'failed',
      runCompletedAt: new Date(),
      itemsProcessed,
      errors,
    })
    .where(eq(systemMetadata.id, id))
    .returning();
  return result;
}

/**
 * Get the latest job run for a specific job type, optionally with a given status
 */
export async function getLatestJobRun(
  jobType: string,
  status?: string
): Promise<SystemMetadataRecord | undefined> {
  const condition = status
    ? and(eq(systemMetadata.jobType, jobType), eq(systemMetadata.status, status))
    : eq(systemMetadata.jobType, jobType);

  const [result] = await db
    .select()
    .from(systemMetadata)
    .where(condition)
    .orderBy(desc(systemMetadata.runStartedAt))
    .limit(1);
  return result;
}

/**
 * Check if a job is currently running.
 * With `staleAfterMs`, a running row older than that is treated as abandoned
 * by a process that died before recording its outcome.
 */
export async function isJobRunning(jobType: string, staleAfterMs?: number): Promise<boolean> {
  const conditions = [eq(systemMetadata.jobType, jobType), eq(systemMetadata.status, 'running')];
  if (staleAfterMs !== undefined) {
    conditions.push(gte(systemMetadata.runStartedAt, new Date(Date.now() - staleAfterMs)));
  }

  const [result] = await db
    .select()
    .from(systemMetadata)
    .where(and(...conditions))
    .limit(1);
  return result !== undefined;
}

// =============================================================================
// STATISTICS
// =============================================================================

/**
 * Get aggregate statistics over stored articles, comments and snapshots
 */
export async function getDatabaseStats(): Promise<{
  totalArticles: number;
  totalComments: number;
  totalSnapshots: number;
  averageScore: number;
  uniqueDomains: number;
}> {
  const [articleStats] = await db
    .select({
      count: sql<number>`count(*)`,
      avgScore: sql<number | null>`avg(${articles.score})`,
      domains: sql<number>`count(distinct ${articles.domain})`,
    })
    .from(articles);
  const [commentsCount] = await db.select({ count: sql<number>`count(*)` }).from(comments);
  const [snapshotsCount] = await db.select({ count: sql<number>`count(*)` }).from(scoreSnapshots);

  return {
    totalArticles: Number(articleStats?.count ?? 0),
    totalComments: Number(commentsCount?.count ?? 0),
    totalSnapshots: Number(snapshotsCount?.count ?? 0),
    averageScore: Math.round(Number(articleStats?.avgScore ?? 0) * 10) / 10,
    uniqueDomains: Number(articleStats?.domains ?? 0),
  };
}

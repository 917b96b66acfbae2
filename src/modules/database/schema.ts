import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  integer,
  jsonb,
  index,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/pg-core';

// =============================================================================
// ARTICLES TABLE
// =============================================================================
/**
 * One row per HN article, keyed by the HN item id.
 * Score and comment count are refreshed on every crawl that sees the article.
 */
export const articles = pgTable(
  'articles',
  {
    id: varchar('id', { length: 32 }).primaryKey(),
    title: text('title').notNull(),
    url: text('url'),
    domain: varchar('domain', { length: 255 }).notNull(),
    score: integer('score').notNull().default(0),
    author: varchar('author', { length: 100 }).notNull(),
    postedAt: timestamp('posted_at', { withTimezone: true }).notNull(),
    commentCount: integer('comment_count').notNull().default(0),
    storyText: text('story_text'),
    storyType: varchar('story_type', { length: 16 }).$type<'story' | 'ask' | 'job' | 'poll'>().notNull(),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    // Index for top-article queries
    index('articles_score_idx').on(table.score),
    index('articles_domain_idx').on(table.domain),
    index('articles_posted_at_idx').on(table.postedAt),
  ]
);

// =============================================================================
// COMMENTS TABLE
// =============================================================================
/**
 * Comments keyed by (article id, comment id).
 * The article is referenced by id only; re-crawls overwrite mutable fields.
 */
export const comments = pgTable(
  'comments',
  {
    articleId: varchar('article_id', { length: 32 })
      .notNull()
      .references(() => articles.id, { onDelete: 'cascade' }),
    id: varchar('id', { length: 32 }).notNull(),
    parentId: varchar('parent_id', { length: 32 }),
    author: varchar('author', { length: 100 }).notNull(),
    text: text('text').notNull(),
    postedAt: timestamp('posted_at', { withTimezone: true }).notNull(),
    depth: integer('depth').notNull().default(0),
    crawledAt: timestamp('crawled_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.articleId, table.id] }),
    // Index for thread reconstruction
    index('comments_parent_id_idx').on(table.parentId),
  ]
);

// =============================================================================
// SCORE SNAPSHOTS TABLE
// =============================================================================
/**
 * Append-only score history used for trend deltas
 */
export const scoreSnapshots = pgTable(
  'score_snapshots',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    articleId: varchar('article_id', { length: 32 })
      .notNull()
      .references(() => articles.id, { onDelete: 'cascade' }),
    capturedAt: timestamp('captured_at', { withTimezone: true }).notNull(),
    score: integer('score').notNull(),
    commentCount: integer('comment_count').notNull(),
    rank: integer('rank'),
  },
  (table) => [
    // One snapshot per article per instant
    uniqueIndex('score_snapshots_article_captured_unique_idx').on(table.articleId, table.capturedAt),
    // Index for window queries
    index('score_snapshots_captured_at_idx').on(table.capturedAt),
  ]
);

// =============================================================================
// SETTINGS TABLE
// =============================================================================
/**
 * System configuration (crawl caps, schedule).
 * Stores key-value pairs with flexible JSON values.
 */
export const settings = pgTable(
  'settings',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    key: varchar('key', { length: 100 }).notNull().unique(),
    value: jsonb('value').notNull(),
    description: text('description'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('settings_key_unique_idx').on(table.key)]
);

// =============================================================================
// SYSTEM METADATA TABLE
// =============================================================================
/**
 * Tracks crawl runs. Used for monitoring pipeline health and missed-run checks.
 */
export const systemMetadata = pgTable(
  'system_metadata',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobType: varchar('job_type', { length: 50 }).notNull(),
    runStartedAt: timestamp('run_started_at', { withTimezone: true }).notNull().defaultNow(),
    runCompletedAt: timestamp('run_completed_at', { withTimezone: true }),
    status: varchar('status', { length: 20 }).notNull().default('running'),
    itemsProcessed: integer('items_processed').notNull().default(0),
    errors: jsonb('errors').$type<Array<{ message: string; stack?: string; timestamp: string }>>(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
  },
  (table) => [
    index('system_metadata_job_type_run_started_at_idx').on(table.jobType, table.runStartedAt),
    index('system_metadata_status_idx').on(table.status),
  ]
);

// =============================================================================
// TYPE EXPORTS
// =============================================================================
export type ArticleRow = typeof articles.$inferSelect;
export type NewArticleRow = typeof articles.$inferInsert;

export type CommentRow = typeof comments.$inferSelect;
export type NewCommentRow = typeof comments.$inferInsert;

export type ScoreSnapshotRow = typeof scoreSnapshots.$inferSelect;
export type NewScoreSnapshotRow = typeof scoreSnapshots.$inferInsert;

export type Setting = typeof settings.$inferSelect;
export type NewSetting = typeof settings.$inferInsert;

export type SystemMetadataRecord = typeof systemMetadata.$inferSelect;
export type NewSystemMetadataRecord = typeof systemMetadata.$inferInsert;

/**
 * Database Module
 *
 * Provides type-safe storage for crawled articles, comments and score history.
 * Uses Drizzle ORM with PostgreSQL.
 */

// Export database client and connection utilities
export {
  db,
  checkDatabaseHealth,
  closeDatabaseConnection,
  initializeDatabase,
} from './client.js';

// Export schema and types
export {
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
  type Setting,
  type NewSetting,
  type SystemMetadataRecord,
  type NewSystemMetadataRecord,
} from './schema.js';

// Export query builders
export {
  // Articles
  upsertArticleRow,
  getArticleById,
  articleExists,
  getTopArticleRows,
  // Comments
  upsertCommentRows,
  getCommentRowsByArticle,
  // Score snapshots
  insertScoreSnapshot,
  getSnapshotRows,
  getSnapshotRowsSince,
  // Settings
  getSetting,
  // System Metadata
  startJobRun,
  completeJobRun,
  failJobRun,
  getLatestJobRun,
  isJobRunning,
  getDatabaseStats,
} from './queries.js';

// Export repositories
export {
  type Repository,
  type RepositoryStats,
  type StoredArticle,
  RepositoryWriteFailedError,
  dedupeComments,
} from './repository.js';
export { PostgresRepository } from './postgres-repository.js';
export { MemoryRepository } from './memory-repository.js';

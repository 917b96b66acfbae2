import 'dotenv/config';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { settings } from './schema.js';

const { Pool } = pg;

/**
 * Default crawl caps stored under the `crawl_config` setting.
 * Environment variables and explicit options still take precedence.
 */
const DEFAULT_CRAWL_CONFIG = {
  listing: 'top',
  maxArticles: 30,
  maxCommentsPerArticle: 200,
  maxCommentDepth: 4,
  maxChildrenPerNode: 15,
  minScoreThreshold: 10,
  requestRateIntervalMs: 1000,
  concurrency: 2,
};

/**
 * Default settings for the crawler
 */
const DEFAULT_SETTINGS = [
  {
    key: 'crawl_config',
    value: DEFAULT_CRAWL_CONFIG,
    description: 'Crawl caps and pacing applied to scheduled and one-off crawl runs.',
  },
  {
    key: 'crawl_schedule',
    value: '0 * * * *',
    description: 'Cron expression for scheduled crawls. Hourly runs give the trend report enough snapshots.',
  },
  {
    key: 'trend_window_hours',
    value: 24,
    description: 'Default window for the trending report, in hours.',
  },
];

/**
 * Seed the settings table with default values
 */
async function seedSettings() {
  const connectionString = process.env.DATABASE_URL;

  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  console.log('Connecting to database...');
  const pool = new Pool({ connectionString });
  const db = drizzle(pool);

  try {
    console.log('Seeding settings table...');

    for (const setting of DEFAULT_SETTINGS) {
      await db
        .insert(settings)
        .values({
          key: setting.key,
          value: setting.value,
          description: setting.description,
        })
        .onConflictDoUpdate({
          target: settings.key,
          set: {
            value: setting.value,
            description: setting.description,
            updatedAt: new Date(),
          },
        });
      console.log(`  ✓ Set ${setting.key}`);
    }

    console.log('\nSettings seeded successfully!');
    console.log('\nDefault configuration:');
    console.log(`  - Listing: ${DEFAULT_CRAWL_CONFIG.listing}, ${DEFAULT_CRAWL_CONFIG.maxArticles} articles per run`);
    console.log(`  - Comments: depth ${DEFAULT_CRAWL_CONFIG.maxCommentDepth}, ${DEFAULT_CRAWL_CONFIG.maxChildrenPerNode} per node, ${DEFAULT_CRAWL_CONFIG.maxCommentsPerArticle} per article`);
    console.log(`  - Minimum score: ${DEFAULT_CRAWL_CONFIG.minScoreThreshold}`);
    console.log(`  - Schedule: hourly`);
  } catch (error) {
    console.error('Seeding failed:', error);
    throw error;
  } finally {
    await pool.end();
  }
}

// Run seeding if this file is executed directly
seedSettings().catch((error) => {
  console.error('Seed script failed:', error);
  process.exit(1);
});

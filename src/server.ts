import 'dotenv/config';
import { z } from 'zod';
import { initializeDatabase, closeDatabaseConnection, getSetting } from './modules/database/index.js';
import { resolveCrawlConfig } from './modules/crawler/index.js';
import { startScheduler, stopScheduler, DEFAULT_SCHEDULER_CONFIG } from './modules/scheduler/index.js';

const SCHEDULER_ENABLED = process.env.SCHEDULER_ENABLED !== 'false';
const SHUTDOWN_TIMEOUT_MS = 60_000;

/**
 * Application entry point
 *
 * Starts the crawl scheduler and keeps running until signalled.
 */
async function main() {
  console.log('Starting thread crawler...');

  try {
    await initializeDatabase();

    // Fail fast on a bad configuration instead of at the first cron tick
    const storedConfig = z.record(z.unknown()).safeParse(await getSetting('crawl_config'));
    const crawlConfig = resolveCrawlConfig({}, {
      settings: storedConfig.success ? storedConfig.data : undefined,
    });
    console.log(`Crawl config: ${crawlConfig.listing}, ${crawlConfig.maxArticles} articles per run`);

    const storedSchedule = z.string().safeParse(await getSetting('crawl_schedule'));
    const cronExpression =
      process.env.CRAWL_CRON ??
      (storedSchedule.success ? storedSchedule.data : DEFAULT_SCHEDULER_CONFIG.cronExpression);

    const shutdown = async (signal: string) => {
      console.log(`\nReceived ${signal}. Shutting down gracefully...`);

      // Force exit if the cancelled crawl does not wind down in time
      setTimeout(() => {
        console.error('Forced shutdown after timeout');
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();

      try {
        // Cancels a running crawl and waits until its run is recorded
        await stopScheduler();
        await closeDatabaseConnection();
        process.exit(0);
      } catch (error) {
        console.error('Error during graceful shutdown:', error);
        process.exit(1);
      }
    };

    // Registered before the scheduler starts: a startup crawl may run for a while
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    await startScheduler({
      enabled: SCHEDULER_ENABLED,
      cronExpression,
      timezone: process.env.CRAWL_TIMEZONE ?? DEFAULT_SCHEDULER_CONFIG.timezone,
      checkMissedRunsOnStartup: true,
    });

    if (SCHEDULER_ENABLED) {
      console.log('Job scheduler started');
    } else {
      console.log('Job scheduler disabled (SCHEDULER_ENABLED=false)');
    }

    console.log('\nScripts:');
    console.log('  npm run crawl         - Run one crawl now (add -- --dry-run to skip the database)');
    console.log('  npm run trending      - Print trending articles');
    console.log('  npm run db:generate   - Generate migrations from schema changes');
    console.log('  npm run db:migrate    - Run migrations');
    console.log('  npm run db:seed       - Seed default settings');
  } catch (error) {
    console.error('Failed to start application:', error);
    await closeDatabaseConnection().catch((closeError: unknown) => {
      console.error('Error closing database connections:', closeError);
    });
    process.exit(1);
  }
}

main();

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { listingSchema, type CrawlConfigInput } from './modules/crawler/index.js';
import { MemoryRepository } from './modules/database/memory-repository.js';
import { closeDatabaseConnection } from './modules/database/index.js';
import { JobScheduler } from './modules/scheduler/scheduler.js';
import { isCompletedRun, runCrawl } from './modules/scheduler/orchestrator.js';
import type { CrawlRunSummary } from './modules/scheduler/types.js';

interface CrawlCommandOptions {
  dryRun?: boolean;
  listing?: CrawlConfigInput['listing'];
  maxArticles?: number;
  minScore?: number;
}

function parseListing(raw: string): CrawlConfigInput['listing'] {
  const parsed = listingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Use one of: ${listingSchema.options.join(', ')}.`);
  }
  return parsed.data;
}

function parseCount(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return value;
}

function printSummary(summary: CrawlRunSummary): void {
  console.log('Run summary:');
  console.log(`  Status: ${summary.status}`);
  console.log(
    `  Articles: ${summary.articles.listed} listed, ${summary.articles.retained} retained, ` +
      `${summary.articles.stored} stored, ${summary.articles.failed} failed`
  );
  console.log(
    `  Comments: ${summary.comments.emitted} emitted, ${summary.comments.stored} stored, ` +
      `${summary.comments.skipped} skipped, ${summary.comments.failed} failed`
  );
  for (const error of summary.errors.slice(0, 10)) {
    console.log(`  [${error.scope}] ${error.itemId ?? '-'}: ${error.message}`);
  }
}

async function runOnce(options: CrawlCommandOptions): Promise<boolean> {
  const overrides: Partial<CrawlConfigInput> = {};
  if (options.listing !== undefined) overrides.listing = options.listing;
  if (options.maxArticles !== undefined) overrides.maxArticles = options.maxArticles;
  if (options.minScore !== undefined) overrides.minScoreThreshold = options.minScore;

  if (options.dryRun) {
    console.log('Dry run: results are kept in memory only');
    const repository = new MemoryRepository();
    const summary = await runCrawl({ repository, config: overrides });
    printSummary(summary);

    const top = await repository.getTopArticles(10);
    if (top.length > 0) {
      console.log('\nTop articles:');
      for (const article of top) {
        console.log(`  ${String(article.score).padStart(5)}  ${article.title} (${article.domain})`);
      }
    }
    return isCompletedRun(summary);
  }

  const scheduler = new JobScheduler({ enabled: false, crawl: overrides });
  try {
    const summary = await scheduler.triggerManually();
    if (!summary) return false;
    printSummary(summary);
    return isCompletedRun(summary);
  } finally {
    await closeDatabaseConnection();
  }
}

const program = new Command();

program
  .name('crawl')
  .description('Run one crawl of a Hacker News listing')
  .option('--dry-run', 'Crawl without touching the database')
  .option('-l, --listing <listing>', 'Listing to crawl (top, new, best, ask, show, job)', parseListing)
  .option('-n, --max-articles <number>', 'Articles to take from the listing', parseCount)
  .option('--min-score <number>', 'Minimum article score', parseCount)
  .action(async () => {
    try {
      const ok = await runOnce(program.opts<CrawlCommandOptions>());
      process.exit(ok ? 0 : 1);
    } catch (err) {
      console.error('Crawl failed:', err);
      process.exit(1);
    }
  });

program.parse();

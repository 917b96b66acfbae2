import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import {
  PostgresRepository,
  closeDatabaseConnection,
  getSetting,
} from './modules/database/index.js';
import { discussionUrl } from './modules/crawler/index.js';
import { TrendAnalyzer } from './modules/trends/index.js';

interface TrendingCommandOptions {
  hours?: number;
  limit: number;
}

const DEFAULT_WINDOW_HOURS = 24;

function parsePositive(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return value;
}

async function report(options: TrendingCommandOptions): Promise<void> {
  const stored = z.number().positive().safeParse(await getSetting('trend_window_hours'));
  const windowHours = options.hours ?? (stored.success ? stored.data : DEFAULT_WINDOW_HOURS);

  const repository = new PostgresRepository();
  const analyzer = new TrendAnalyzer(repository);
  const trending = await analyzer.computeTrending(windowHours, { limit: options.limit });

  console.log(`Trending over the last ${windowHours}h (${trending.length} articles):\n`);

  for (const [index, entry] of trending.entries()) {
    const article = await repository.getArticle(entry.articleId);
    const title = article?.title ?? `#${entry.articleId}`;
    console.log(
      `  ${String(index + 1).padStart(3)}. +${entry.scoreIncrease} points, ` +
        `+${entry.commentIncrease} comments (${entry.snapshots} snapshots)  ${title}`
    );
    console.log(`       ${discussionUrl(entry.articleId)}`);
  }
}

const program = new Command();

program
  .name('trending')
  .description('Print the articles whose score grew most within a time window')
  .option('-w, --hours <number>', 'Window size in hours (default: trend_window_hours setting)', parsePositive)
  .option('-n, --limit <number>', 'Number of articles to print', parsePositive, 20)
  .action(async () => {
    try {
      await report(program.opts<TrendingCommandOptions>());
      await closeDatabaseConnection();
    } catch (err) {
      console.error('Trending report failed:', err);
      process.exit(1);
    }
  });

program.parse();

#!/usr/bin/env node

import { Command } from 'commander';
import pc from 'picocolors';
import type { StartOptions } from './app/bootstrap';
import { review } from './commands/review';
import { checkReviews, listReviews } from './commands/reviews';

interface GlobalOptions {
  repoPath: string;
  database?: string;
}

const program = new Command();

program
  .name('local-review')
  .description('Review local Git branch changes in the terminal')
  .version('0.1.0')
  .option('--repo-path <path>', 'Repository path', '.')
  .option('--database <path>', 'SQLite database file (default: .local-review/reviews.db)');

function startOptions(): StartOptions {
  const { repoPath, database } = program.opts<GlobalOptions>();
  return { repoPath, database };
}

function fail(error: unknown): never {
  console.error(pc.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
}

// Default command: open the review UI
program.action(async () => {
  try {
    await review(startOptions());
  } catch (error) {
    fail(error);
  }
});

// Reviews subcommand
const reviews = program
  .command('reviews')
  .description('Manage reviews without opening the UI');

reviews
  .command('list')
  .alias('ls')
  .description('List all reviews in the repository')
  .action(async () => {
    try {
      await listReviews(startOptions());
    } catch (error) {
      fail(error);
    }
  });

reviews
  .command('check')
  .description('Check every review for moved or deleted branches')
  .action(async () => {
    try {
      await checkReviews(startOptions());
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);

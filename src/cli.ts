#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan';
import { dbInsightsCommand, DEFAULT_QUERY_LIMIT } from './commands/db-insights';
import { dbClearCommand } from './commands/db-clear';
import { errorMessage } from './types/errors';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('file-insights')
  .description('Scan directories and report statistics about the files in them')
  .version('0.1.0');

// Scan a directory
program
  .command('scan')
  .description('Scan a directory and display insights')
  .argument('[directory]', 'Directory to scan', '.')
  .option('-o, --output <file>', 'Save insights to a JSON file')
  .option('--no-recursive', 'Only scan the top-level directory')
  .option('-e, --exclude <pattern...>', 'Glob patterns to exclude (replaces the defaults)')
  .option('--video-metadata', 'Extract video metadata with ffprobe')
  .option('--no-video-metadata', 'Skip video metadata even if the config file enables it')
  .option('--duplicates', 'Find files with identical content')
  .option('--db-save', 'Save scanned files to the database')
  .option('--db-connection <url>', 'Database connection string (default: DATABASE_URL)')
  .option('--rebuild-db', 'Drop and recreate the database schema before saving')
  .option('-j, --concurrency <number>', 'Files processed in parallel (default: 1)', parseInteger)
  .option('--probe-timeout <ms>', 'Per-file video probe timeout (default: 30000)', parseInteger)
  .option('-c, --config <file>', 'Config file (default: ~/.file-insights/config.json)')
  .option('-v, --verbose', 'Show per-file diagnostics')
  .action(async (directory: string, options) => {
    try {
      await scanCommand(directory, options);
    } catch (error) {
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(1);
    }
  });

// Insights from saved records
program
  .command('db-insights')
  .description('Display insights from files saved in the database')
  .option('--limit <number>', 'Maximum number of files to load', parseInteger, DEFAULT_QUERY_LIMIT)
  .option('--video-only', 'Only include video files')
  .option('-e, --extension <ext...>', 'Only include these extensions (e.g. mp4 .mkv)')
  .option('-o, --output <file>', 'Save insights to a JSON file')
  .option('--db-connection <url>', 'Database connection string (default: DATABASE_URL)')
  .option('-c, --config <file>', 'Config file (default: ~/.file-insights/config.json)')
  .action(async (options) => {
    try {
      await dbInsightsCommand(options);
    } catch (error) {
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(1);
    }
  });

// Clear saved records
program
  .command('db-clear')
  .description('Delete all file records from the database')
  .option('--db-connection <url>', 'Database connection string (default: DATABASE_URL)')
  .option('-c, --config <file>', 'Config file (default: ~/.file-insights/config.json)')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options) => {
    try {
      await dbClearCommand(options);
    } catch (error) {
      console.error(chalk.red('❌ Error:'), errorMessage(error));
      process.exit(1);
    }
  });

program.parse();

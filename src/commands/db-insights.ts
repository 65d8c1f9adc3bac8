import chalk from 'chalk';
import { ConfigManager } from '../lib/config-manager';
import { SqliteStore } from '../lib/sqlite-store';
import { aggregate } from '../lib/aggregator';
import { renderInsights } from '../lib/insights-renderer';
import { toReportDocument, writeReport } from '../lib/report-sink';
import { ConfigError } from '../types/errors';

export interface DbInsightsOptions {
  limit?: number;
  videoOnly?: boolean;
  extension?: string[];
  output?: string;
  dbConnection?: string;
  config?: string;
}

export const DEFAULT_QUERY_LIMIT = 1000;

export async function dbInsightsCommand(options: DbInsightsOptions): Promise<void> {
  const limit = options.limit ?? DEFAULT_QUERY_LIMIT;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ConfigError(`Invalid limit: ${limit}. Must be a positive integer.`);
  }

  const configManager = new ConfigManager(options.config);
  const appConfig = await configManager.loadAppConfig();
  const store = SqliteStore.fromConnectionString(
    configManager.resolveDatabaseUrl(appConfig, options.dbConnection)
  );

  try {
    await store.testConnection();
    await store.initialize();

    const records = await store.query({
      limit,
      videoOnly: options.videoOnly,
      extensions: options.extension,
    });

    if (records.length === 0) {
      console.log(chalk.yellow('No files found in database matching the criteria.'));
      console.log(chalk.dim('\nPopulate it with: file-insights scan <directory> --db-save'));
      return;
    }

    const total = await store.count(options.videoOnly);
    console.log(chalk.blue(`🗄️  Loaded ${records.length} of ${total} files from database\n`));

    const insights = aggregate(records, new Date());
    console.log(renderInsights(insights));

    if (options.output) {
      await writeReport(options.output, toReportDocument(insights));
      console.log(chalk.green(`\n💾 Insights saved to ${options.output}`));
    }
  } finally {
    await store.close();
  }
}

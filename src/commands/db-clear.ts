import chalk from 'chalk';
import { ConfigManager } from '../lib/config-manager';
import { SqliteStore } from '../lib/sqlite-store';
import { confirm } from '../utils/prompt-utils';

export interface DbClearOptions {
  dbConnection?: string;
  yes?: boolean;
  config?: string;
}

export async function dbClearCommand(options: DbClearOptions): Promise<void> {
  const configManager = new ConfigManager(options.config);
  const appConfig = await configManager.loadAppConfig();
  const store = SqliteStore.fromConnectionString(
    configManager.resolveDatabaseUrl(appConfig, options.dbConnection)
  );

  try {
    await store.testConnection();
    await store.initialize();

    const count = await store.count();
    if (count === 0) {
      console.log(chalk.dim('Database is already empty'));
      return;
    }

    if (!options.yes) {
      console.log(chalk.yellow(`⚠️  Delete all ${count} file records from the database?`));
      console.log(chalk.dim('   Video metadata is removed with them. Files on disk are not touched.'));
      console.log();

      const confirmed = await confirm('Continue?', { defaultYes: false });
      if (!confirmed) {
        console.log(chalk.dim('Cancelled'));
        return;
      }
    }

    const deleted = await store.deleteAll();
    console.log(chalk.green(`✅ Deleted ${deleted} file records`));
  } finally {
    await store.close();
  }
}

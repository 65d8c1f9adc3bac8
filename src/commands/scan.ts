import chalk from 'chalk';
import { ConfigManager } from '../lib/config-manager';
import { Logger } from '../lib/logger';
import { ScanProgress, ScanService } from '../lib/scan-service';
import { aggregate } from '../lib/aggregator';
import { DuplicateGroup, findDuplicates } from '../lib/duplicate-finder';
import { renderInsights } from '../lib/insights-renderer';
import { toReportDocument, writeReport } from '../lib/report-sink';
import { SqliteStore, parseConnectionString } from '../lib/sqlite-store';
import { FileRecord } from '../types/file-record';
import { ScanConfig } from '../types/scan-config';
import { errorMessage } from '../types/errors';
import { commandExists } from '../utils/process-utils';
import { formatBytes, truncate } from '../utils/format-utils';

export interface ScanCommandOptions {
  output?: string;
  recursive?: boolean;
  exclude?: string[];
  videoMetadata?: boolean;
  duplicates?: boolean;
  dbSave?: boolean;
  dbConnection?: string;
  rebuildDb?: boolean;
  concurrency?: number;
  probeTimeout?: number;
  config?: string;
  verbose?: boolean;
}

/**
 * Scan settings given on the command line; undefined leaves the config file value
 * --no-recursive only ever turns recursion off. --video-metadata and
 * --no-video-metadata are declared as a pair, so either one overrides the file.
 */
export function scanConfigOverrides(options: ScanCommandOptions): Partial<ScanConfig> {
  return {
    recursive: options.recursive === false ? false : undefined,
    excludePatterns: options.exclude,
    extractVideoMetadata: options.videoMetadata,
    verbose: options.verbose,
    concurrency: options.concurrency,
    probeTimeoutMs: options.probeTimeout,
  };
}

function displayProgress(progress: ScanProgress): void {
  const percentage = progress.total > 0 ? (progress.processed / progress.total) * 100 : 0;
  process.stdout.write('\r\x1b[K');
  process.stdout.write(
    chalk.blue(`[${progress.processed}/${progress.total}] ${percentage.toFixed(1)}% `) +
      chalk.dim(truncate(progress.currentPath, 60))
  );
}

function printVideoDiagnostics(records: readonly FileRecord[]): void {
  const videos = records.filter((record) => record.isVideo);
  const withMetadata = videos.filter((record) => record.hasVideoMetadata);
  const failed = videos.filter((record) => record.videoProbe === 'failed');
  const skipped = videos.filter((record) => record.videoProbe === 'skipped');

  console.log(chalk.dim(`   Videos found: ${videos.length}`));
  console.log(chalk.dim(`   With metadata: ${withMetadata.length}`));
  if (skipped.length > 0) {
    console.log(chalk.dim(`   Too small to probe: ${skipped.length}`));
  }
  if (failed.length > 0) {
    console.log(chalk.yellow(`   Probe failed: ${failed.length}`));
    for (const record of failed) {
      console.log(chalk.dim(`     ${record.path}`));
    }
  }
}

async function saveToDatabase(
  records: readonly FileRecord[],
  connectionString: string,
  rebuild: boolean
): Promise<void> {
  const store = SqliteStore.fromConnectionString(connectionString);
  try {
    await store.testConnection();
    await store.initialize({ rebuild });
    if (rebuild) {
      console.log(chalk.yellow('⚠️  Database schema rebuilt (previous data removed)'));
    }

    const result = await store.save(records);
    console.log(chalk.green(`✅ Saved ${result.savedCount} files to database`));

    if (result.failures.length > 0) {
      console.log(chalk.yellow(`⚠️  ${result.failures.length} files could not be saved:`));
      for (const failure of result.failures) {
        console.log(chalk.dim(`   ${failure.path}: ${failure.error}`));
      }
    }
  } catch (error) {
    console.error(chalk.red('❌ Database error:'), errorMessage(error));
  } finally {
    await store.close();
  }
}

export async function scanCommand(directory: string, options: ScanCommandOptions): Promise<void> {
  const configManager = new ConfigManager(options.config);
  const appConfig = await configManager.loadAppConfig();
  const config = configManager.resolveScanConfig(appConfig, scanConfigOverrides(options));

  // Resolve the connection string before any work so a bad URL fails fast
  const connectionString = options.dbSave
    ? configManager.resolveDatabaseUrl(appConfig, options.dbConnection)
    : undefined;
  if (connectionString) {
    parseConnectionString(connectionString);
  }

  const logger = new Logger({ verbose: config.verbose, logFilePath: appConfig.logFile });
  const service = new ScanService(config, { logger });
  const root = await service.validateRoot(directory);

  if (config.extractVideoMetadata && !(await commandExists('ffprobe'))) {
    logger.warn('ffprobe not found in PATH, video metadata extraction will fail');
  }

  console.log(chalk.blue(`🔍 Scanning ${root}...`));

  const controller = new AbortController();
  const sigintHandler = () => {
    if (!controller.signal.aborted) {
      process.stdout.write('\r\x1b[K');
      console.log(chalk.yellow('\n⚠️  Scan interrupted, finishing with partial results...'));
      controller.abort();
    }
  };
  process.on('SIGINT', sigintHandler);

  const showProgress = process.stdout.isTTY === true && !config.verbose;
  const result = await service
    .scan(root, {
      signal: controller.signal,
      onProgress: showProgress ? displayProgress : undefined,
    })
    .finally(() => {
      process.removeListener('SIGINT', sigintHandler);
      if (showProgress) {
        process.stdout.write('\r\x1b[K');
      }
    });

  const elapsed = ((result.finishedAt.getTime() - result.startedAt.getTime()) / 1000).toFixed(1);
  if (result.cancelled) {
    console.log(
      chalk.yellow(`⚠️  Scan cancelled: ${result.records.length} of ${result.totalCandidates} files processed`)
    );
  } else {
    console.log(chalk.green(`✅ Scanned ${result.records.length} files in ${elapsed}s`));
  }

  if (result.failures.length > 0) {
    const hint = config.verbose ? '' : ' (use --verbose for details)';
    logger.warn(`${result.failures.length} problems encountered during the scan${hint}`);
  }

  if (config.verbose && result.emptyDirectories.length > 0) {
    console.log(chalk.dim(`\nEmpty directories (${result.emptyDirectories.length}):`));
    for (const dir of result.emptyDirectories) {
      console.log(chalk.dim(`   ${dir}`));
    }
  }

  if (config.verbose && config.extractVideoMetadata) {
    console.log(chalk.dim('\nVideo metadata:'));
    printVideoDiagnostics(result.records);
  }

  let duplicates: DuplicateGroup[] | undefined;
  if (options.duplicates) {
    console.log(chalk.dim(`\nLooking for duplicate files (${config.hashAlgorithm})...`));
    const report = await findDuplicates(result.records, config.hashAlgorithm, logger);
    duplicates = report.groups;
    if (report.failures.length > 0) {
      logger.warn(`${report.failures.length} files could not be hashed`);
    }
    if (duplicates.length === 0) {
      console.log(chalk.dim('No duplicate files found.'));
    }
  }

  const insights = aggregate(result.records, new Date());
  console.log();
  console.log(renderInsights(insights, duplicates));

  if (options.output) {
    await writeReport(options.output, toReportDocument(insights, { root, duplicates }));
    console.log(chalk.green(`\n💾 Insights saved to ${options.output}`));
  }

  if (connectionString) {
    console.log(chalk.dim(`\nSaving ${result.records.length} files (${formatBytes(insights.generalStats.totalSize)}) to database...`));
    await saveToDatabase(result.records, connectionString, options.rebuildDb ?? false);
  }

  await logger.flush();
}

import {
  AppConfig,
  DEFAULT_APP_CONFIG,
  DEFAULT_SCAN_CONFIG,
  HASH_ALGORITHMS,
  HashAlgorithm,
  MAX_CONCURRENCY,
  ScanConfig,
} from '../types/scan-config';
import { ConfigError, errorCode, errorMessage } from '../types/errors';
import { expandHome, getConfigFilePath, readJsonFile } from '../utils/file-utils';
import { isRecord, isStringArray } from '../utils/json-utils';

function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return typeof value === 'string' && HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

function parseScanSection(value: unknown): Partial<ScanConfig> {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ConfigError('Config field "scan" must be an object');

  const scan: Partial<ScanConfig> = {};
  const booleanFields = ['recursive', 'extractVideoMetadata', 'verbose'] as const;
  for (const field of booleanFields) {
    const fieldValue = value[field];
    if (fieldValue === undefined) continue;
    if (typeof fieldValue !== 'boolean') {
      throw new ConfigError(`Config field "scan.${field}" must be a boolean`);
    }
    scan[field] = fieldValue;
  }

  const numberFields = ['concurrency', 'probeTimeoutMs'] as const;
  for (const field of numberFields) {
    const fieldValue = value[field];
    if (fieldValue === undefined) continue;
    if (typeof fieldValue !== 'number') {
      throw new ConfigError(`Config field "scan.${field}" must be a number`);
    }
    scan[field] = fieldValue;
  }

  if (value.excludePatterns !== undefined) {
    if (!isStringArray(value.excludePatterns)) {
      throw new ConfigError('Config field "scan.excludePatterns" must be an array of strings');
    }
    scan.excludePatterns = value.excludePatterns;
  }

  if (value.hashAlgorithm !== undefined) {
    if (!isHashAlgorithm(value.hashAlgorithm)) {
      throw new ConfigError(`Config field "scan.hashAlgorithm" must be one of: ${HASH_ALGORITHMS.join(', ')}`);
    }
    scan.hashAlgorithm = value.hashAlgorithm;
  }

  return scan;
}

/**
 * Validate the parsed content of a config file
 * @throws ConfigError on unknown shapes or wrongly typed fields
 */
export function parseAppConfig(data: unknown): AppConfig {
  if (!isRecord(data)) {
    throw new ConfigError('Config file must contain a JSON object');
  }

  const config: AppConfig = {
    version: typeof data.version === 'string' ? data.version : DEFAULT_APP_CONFIG.version,
    scan: parseScanSection(data.scan),
  };

  if (data.databaseUrl !== undefined) {
    if (typeof data.databaseUrl !== 'string') {
      throw new ConfigError('Config field "databaseUrl" must be a string');
    }
    config.databaseUrl = data.databaseUrl;
  }

  if (data.logFile !== undefined) {
    if (typeof data.logFile !== 'string') {
      throw new ConfigError('Config field "logFile" must be a string');
    }
    config.logFile = expandHome(data.logFile);
  }

  return config;
}

/**
 * Check ranges of a fully merged scan configuration
 * @throws ConfigError if a value is out of range
 */
export function validateScanConfig(config: ScanConfig): void {
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new ConfigError(`Invalid concurrency: ${config.concurrency}. Must be a positive integer.`);
  }
  if (config.concurrency > MAX_CONCURRENCY) {
    throw new ConfigError(`Invalid concurrency: ${config.concurrency}. Maximum is ${MAX_CONCURRENCY}.`);
  }
  if (!Number.isFinite(config.probeTimeoutMs) || config.probeTimeoutMs <= 0) {
    throw new ConfigError(`Invalid probe timeout: ${config.probeTimeoutMs}. Must be a positive number of milliseconds.`);
  }
  if (!isHashAlgorithm(config.hashAlgorithm)) {
    throw new ConfigError(`Invalid hash algorithm: ${config.hashAlgorithm}`);
  }
  if (config.excludePatterns.some((pattern) => pattern.length === 0)) {
    throw new ConfigError('Exclude patterns must not be empty');
  }
}

/**
 * Loads the config file and merges it with command-line overrides
 * Precedence: overrides > config file > defaults.
 */
export class ConfigManager {
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ? expandHome(configPath) : getConfigFilePath();
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load the config file; a missing file yields the defaults
   * @throws ConfigError if the file cannot be parsed or has invalid fields
   */
  async loadAppConfig(): Promise<AppConfig> {
    let data: unknown;
    try {
      data = await readJsonFile(this.configPath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return { ...DEFAULT_APP_CONFIG, scan: {} };
      }
      throw new ConfigError(`Failed to read config file ${this.configPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return parseAppConfig(data);
  }

  resolveScanConfig(appConfig: AppConfig, overrides: Partial<ScanConfig> = {}): ScanConfig {
    const definedOverrides: Partial<ScanConfig> = {};
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        Object.assign(definedOverrides, { [key]: value });
      }
    }

    const config: ScanConfig = {
      ...DEFAULT_SCAN_CONFIG,
      ...appConfig.scan,
      ...definedOverrides,
    };
    validateScanConfig(config);
    return config;
  }

  /**
   * Database URL from the command line, then DATABASE_URL, then the config file
   * @throws ConfigError when none is set
   */
  resolveDatabaseUrl(
    appConfig: AppConfig,
    cliValue?: string,
    env: NodeJS.ProcessEnv = process.env
  ): string {
    const url = cliValue || env.DATABASE_URL || appConfig.databaseUrl;
    if (!url) {
      throw new ConfigError(
        'Database connection string must be provided with --db-connection, the DATABASE_URL environment variable or "databaseUrl" in the config file'
      );
    }
    return url;
  }
}

export type HashAlgorithm = 'md5' | 'sha1' | 'sha256';

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['md5', 'sha1', 'sha256'];

export interface ScanConfig {
  recursive: boolean;
  excludePatterns: string[];    // Empty = DEFAULT_EXCLUDE_PATTERNS
  extractVideoMetadata: boolean;
  verbose: boolean;
  concurrency: number;          // Files built in parallel (1 = sequential)
  probeTimeoutMs: number;       // Per-file media probe timeout
  hashAlgorithm: HashAlgorithm; // Used for duplicate detection
}

/**
 * Shape of ~/.file-insights/config.json
 */
export interface AppConfig {
  version: string;
  scan: Partial<ScanConfig>;
  databaseUrl?: string;
  logFile?: string;
}

/**
 * Patterns used when the caller supplies none
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  '**/.*',             // Hidden files and directories
  '**/__pycache__/**',
  '**/*.pyc',
  '**/node_modules/**',
  '**/venv/**',
  '**/.git/**',
  '**/.svn/**',
  '**/.hg/**',
  '**/.vscode/**',
  '**/.idea/**',
];

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  recursive: true,
  excludePatterns: [],
  extractVideoMetadata: false,
  verbose: false,
  concurrency: 1,
  probeTimeoutMs: 30000,
  hashAlgorithm: 'md5',
};

export const DEFAULT_APP_CONFIG: AppConfig = {
  version: '1.0.0',
  scan: {},
};

export const MAX_CONCURRENCY = 64;

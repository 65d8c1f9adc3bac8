import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { FileRecord } from '../types/file-record';
import { ConfigError, ScanFailure, errorMessage } from '../types/errors';
import { MediaProbe } from '../types/media';
import { ScanConfig } from '../types/scan-config';
import { ContentClassifier } from './content-classifier';
import { DirectoryWalker } from './directory-walker';
import { FileRecordBuilder } from './file-record-builder';
import { MediaEnricher } from './media-enricher';
import { FfprobeMediaProbe } from './ffprobe-probe';
import { Logger, createSilentLogger } from './logger';

export interface ScanProgress {
  processed: number;
  total: number;
  currentPath: string;
}

export interface ScanOptions {
  signal?: AbortSignal;  // Stops new work; the partial result is returned
  onProgress?: (progress: ScanProgress) => void;
}

export interface ScanResult {
  root: string;
  records: FileRecord[];
  failures: ScanFailure[];      // Absorbed per-file and per-directory problems
  emptyDirectories: string[];
  totalCandidates: number;
  cancelled: boolean;
  startedAt: Date;
  finishedAt: Date;
}

export interface ScanServiceDependencies {
  probe?: MediaProbe;
  logger?: Logger;
}

/**
 * Runs a full scan: validate root, walk, then build one record per file
 */
export class ScanService {
  private config: ScanConfig;
  private probe: MediaProbe;
  private logger: Logger;

  constructor(config: ScanConfig, dependencies: ScanServiceDependencies = {}) {
    this.config = config;
    this.probe = dependencies.probe ?? new FfprobeMediaProbe();
    this.logger = dependencies.logger ?? createSilentLogger();
  }

  /**
   * Validate that root exists and is a directory
   * @throws ConfigError otherwise
   */
  async validateRoot(root: string): Promise<string> {
    const absoluteRoot = path.resolve(root);
    let stats: Stats;
    try {
      stats = await fs.stat(absoluteRoot);
    } catch (error) {
      throw new ConfigError(`Directory not found: ${root} (${errorMessage(error)})`, { cause: error });
    }
    if (!stats.isDirectory()) {
      throw new ConfigError(`${root} is not a directory`);
    }
    return absoluteRoot;
  }

  async scan(root: string, options: ScanOptions = {}): Promise<ScanResult> {
    const startedAt = new Date();
    const absoluteRoot = await this.validateRoot(root);
    const { signal, onProgress } = options;

    const walker = new DirectoryWalker(
      {
        recursive: this.config.recursive,
        excludePatterns: this.config.excludePatterns,
        signal,
      },
      this.logger
    );
    const walked = await walker.walk(absoluteRoot);
    this.logger.debug(`Found ${walked.files.length} candidate files`);

    const enricher = this.config.extractVideoMetadata
      ? new MediaEnricher(
          this.probe,
          { enabled: true, timeoutMs: this.config.probeTimeoutMs },
          this.logger
        )
      : undefined;
    const builder = new FileRecordBuilder(new ContentClassifier(this.logger), enricher, this.logger);

    const files = walked.files;
    const slots: Array<FileRecord | undefined> = new Array(files.length);
    const failures: ScanFailure[] = [...walked.failures];
    let nextIndex = 0;
    let processed = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < files.length && !signal?.aborted) {
        const index = nextIndex++;
        const filePath = files[index];
        const outcome = await builder.build(filePath);

        if (outcome.ok) {
          slots[index] = outcome.record;
          failures.push(...outcome.warnings);
        } else {
          failures.push(outcome.failure);
        }

        processed++;
        onProgress?.({ processed, total: files.length, currentPath: filePath });
      }
    };

    const workerCount = Math.max(1, Math.min(this.config.concurrency, files.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const records = slots.filter((record): record is FileRecord => record !== undefined);

    return {
      root: absoluteRoot,
      records,
      failures,
      emptyDirectories: walked.emptyDirectories,
      totalCandidates: files.length,
      cancelled: signal?.aborted ?? false,
      startedAt,
      finishedAt: new Date(),
    };
  }
}

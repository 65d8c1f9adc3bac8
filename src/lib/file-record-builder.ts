import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import { FileRecord, createFileRecord } from '../types/file-record';
import { ScanFailure, errorMessage } from '../types/errors';
import { ContentClassifier } from './content-classifier';
import { MediaEnricher } from './media-enricher';
import { Logger, createSilentLogger } from './logger';

export type BuildOutcome =
  | { ok: true; record: FileRecord; warnings: ScanFailure[] }
  | { ok: false; failure: ScanFailure };

/**
 * Creation time where the filesystem records one, else the metadata-change time
 * (birthtimeMs is 0 when the platform or filesystem has no birth time)
 */
export function creationTime(stats: Stats): Date {
  return stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;
}

/**
 * Turns one path into one FileRecord: stat, classify, then optionally enrich
 * Per-file problems come back as a failed outcome; build() never rejects.
 */
export class FileRecordBuilder {
  private classifier: ContentClassifier;
  private enricher?: MediaEnricher;
  private logger: Logger;

  constructor(classifier: ContentClassifier, enricher?: MediaEnricher, logger?: Logger) {
    this.classifier = classifier;
    this.enricher = enricher;
    this.logger = logger ?? createSilentLogger();
  }

  async build(filePath: string): Promise<BuildOutcome> {
    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.debug('Skipping file that cannot be read:', { path: filePath, cause: message });
      return { ok: false, failure: { path: filePath, kind: 'path', message } };
    }

    if (!stats.isFile()) {
      return { ok: false, failure: { path: filePath, kind: 'path', message: 'Not a regular file' } };
    }

    const warnings: ScanFailure[] = [];
    const classification = await this.classifier.classify(filePath, stats.size);
    if (classification.error) {
      warnings.push({ path: filePath, kind: 'classification', message: classification.error });
    }

    let record = createFileRecord({
      path: filePath,
      size: stats.size,
      createdTime: creationTime(stats),
      modifiedTime: stats.mtime,
      contentPreview: classification.preview,
      mimeType: classification.mimeType,
      isBinary: classification.isBinary,
    });

    if (this.enricher) {
      record = await this.enricher.enrich(record);
      if (record.videoProbe === 'failed') {
        warnings.push({ path: filePath, kind: 'probe', message: 'Video metadata extraction failed' });
      }
    }

    return { ok: true, record, warnings };
  }
}

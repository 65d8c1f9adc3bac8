import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { FileRecord } from '../types/file-record';
import { ScanFailure, errorMessage } from '../types/errors';
import { HashAlgorithm } from '../types/scan-config';
import { Logger, createSilentLogger } from './logger';

export interface DuplicateGroup {
  hash: string;
  size: number;          // Size of each copy
  paths: string[];
  wastedBytes: number;   // size * (copies - 1)
}

export interface DuplicateReport {
  groups: DuplicateGroup[];
  failures: ScanFailure[];
}

/**
 * Hash a file's content as a hex digest
 */
export function hashFile(filePath: string, algorithm: HashAlgorithm): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath, { highWaterMark: 64 * 1024 });

    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Find files with identical content
 * Only files sharing a size with another file are hashed. Empty files are ignored.
 * Groups are sorted by wasted bytes, largest first.
 */
export async function findDuplicates(
  records: readonly FileRecord[],
  algorithm: HashAlgorithm,
  logger: Logger = createSilentLogger()
): Promise<DuplicateReport> {
  const bySize = new Map<number, FileRecord[]>();
  for (const record of records) {
    if (record.size === 0) continue;
    const group = bySize.get(record.size) ?? [];
    group.push(record);
    bySize.set(record.size, group);
  }

  const groups: DuplicateGroup[] = [];
  const failures: ScanFailure[] = [];

  for (const [size, candidates] of bySize) {
    if (candidates.length < 2) continue;

    const byHash = new Map<string, string[]>();
    for (const candidate of candidates) {
      try {
        const digest = await hashFile(candidate.path, algorithm);
        const paths = byHash.get(digest) ?? [];
        paths.push(candidate.path);
        byHash.set(digest, paths);
      } catch (error) {
        const message = errorMessage(error);
        logger.debug('Cannot hash file:', { path: candidate.path, cause: message });
        failures.push({ path: candidate.path, kind: 'path', message });
      }
    }

    for (const [hash, paths] of byHash) {
      if (paths.length > 1) {
        groups.push({ hash, size, paths, wastedBytes: size * (paths.length - 1) });
      }
    }
  }

  groups.sort((a, b) => b.wastedBytes - a.wastedBytes);
  return { groups, failures };
}

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import { PathError, ScanFailure, errorMessage } from '../types/errors';
import { PathFilter, effectivePatterns } from './path-filter';
import { Logger, createSilentLogger } from './logger';

export interface WalkOptions {
  recursive: boolean;
  excludePatterns?: readonly string[];  // Empty or missing = defaults
  signal?: AbortSignal;
}

export interface WalkResult {
  files: string[];
  failures: ScanFailure[];
  emptyDirectories: string[];
}

const byName = (a: Dirent, b: Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/**
 * Enumerates candidate files under a root directory
 * Symbolic links are neither followed nor listed.
 */
export class DirectoryWalker {
  private recursive: boolean;
  private patterns: readonly string[];
  private signal?: AbortSignal;
  private logger: Logger;

  constructor(options: WalkOptions, logger?: Logger) {
    this.recursive = options.recursive;
    this.patterns = effectivePatterns(options.excludePatterns);
    this.signal = options.signal;
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Walk the tree under root
   * @throws PathError if the root itself cannot be read
   */
  async walk(root: string): Promise<WalkResult> {
    const result: WalkResult = { files: [], failures: [], emptyDirectories: [] };

    let entries: Dirent[];
    try {
      entries = await fs.readdir(root, { withFileTypes: true });
    } catch (error) {
      throw new PathError(root, `Cannot read directory ${root}: ${errorMessage(error)}`, { cause: error });
    }

    const filter = new PathFilter(root, this.patterns);

    if (this.recursive) {
      await this.walkEntries(root, entries, filter, result);
    } else {
      for (const entry of entries.sort(byName)) {
        const entryPath = path.join(root, entry.name);
        if (entry.isFile() && !filter.excludes(entryPath)) {
          result.files.push(entryPath);
        }
      }
    }

    return result;
  }

  private async walkEntries(
    dirPath: string,
    entries: Dirent[],
    filter: PathFilter,
    result: WalkResult
  ): Promise<void> {
    if (entries.length === 0) {
      result.emptyDirectories.push(dirPath);
      return;
    }

    for (const entry of entries.sort(byName)) {
      if (this.signal?.aborted) return;

      const entryPath = path.join(dirPath, entry.name);

      if (entry.isSymbolicLink()) {
        continue;
      }

      if (entry.isDirectory()) {
        if (filter.prunes(entryPath)) {
          continue;
        }

        let children: Dirent[];
        try {
          children = await fs.readdir(entryPath, { withFileTypes: true });
        } catch (error) {
          const message = errorMessage(error);
          this.logger.debug('Skipping unreadable directory:', { path: entryPath, cause: message });
          result.failures.push({ path: entryPath, kind: 'path', message });
          continue;
        }

        await this.walkEntries(entryPath, children, filter, result);
        continue;
      }

      if (entry.isFile() && !filter.excludes(entryPath)) {
        result.files.push(entryPath);
      }
    }
  }
}

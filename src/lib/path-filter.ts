import * as path from 'path';
import { DEFAULT_EXCLUDE_PATTERNS } from '../types/scan-config';

const patternCache = new Map<string, RegExp>();

function escapeRegExp(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

function escapeSetChar(char: string): string {
  return char.replace(/[\\\]^-]/g, '\\$&');
}

/**
 * Regular expression for the inside of a `[...]` set
 * Reversed ranges such as `z-a` match nothing and are dropped;
 * a set left empty never matches (or, negated, matches any character).
 */
function translateSet(set: string, negate: boolean): string {
  const parts: string[] = [];
  let k = 0;
  while (k < set.length) {
    const start = set[k];
    if (set[k + 1] === '-' && k + 2 < set.length) {
      const end = set[k + 2];
      if (start <= end) {
        parts.push(`${escapeSetChar(start)}-${escapeSetChar(end)}`);
      }
      k += 3;
    } else {
      parts.push(escapeSetChar(start));
      k++;
    }
  }

  if (parts.length === 0) {
    return negate ? '.' : '(?!)';
  }
  return `[${negate ? '^' : ''}${parts.join('')}]`;
}

/**
 * Translate a shell-style pattern to a regular expression source
 * `*` matches any run of characters, separators included; `**` is not special.
 * `?` matches one character, `[seq]` / `[!seq]` a character set.
 * An unterminated `[` is a literal.
 */
export function translatePattern(pattern: string): string {
  let source = '';
  let i = 0;
  const n = pattern.length;

  while (i < n) {
    const char = pattern[i++];

    if (char === '*') {
      while (pattern[i] === '*') i++;
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      let j = i;
      if (j < n && pattern[j] === '!') j++;
      if (j < n && pattern[j] === ']') j++;
      while (j < n && pattern[j] !== ']') j++;

      if (j >= n) {
        source += '\\[';
        continue;
      }

      let set = pattern.slice(i, j);
      i = j + 1;

      let negate = false;
      if (set.startsWith('!')) {
        negate = true;
        set = set.slice(1);
      }
      source += translateSet(set, negate);
    } else {
      source += escapeRegExp(char);
    }
  }

  return source;
}

/**
 * Compile (and cache) a pattern for the given platform
 * On Windows matching is case-insensitive and '/' is treated as '\'.
 */
export function compilePattern(pattern: string, platform: NodeJS.Platform = process.platform): RegExp {
  const windows = platform === 'win32';
  const key = `${windows ? 'w' : 'p'}:${pattern}`;
  const cached = patternCache.get(key);
  if (cached) return cached;

  const normalized = windows ? pattern.replace(/\//g, '\\') : pattern;
  const regex = new RegExp(`^(?:${translatePattern(normalized)})$`, windows ? 'si' : 's');
  patternCache.set(key, regex);
  return regex;
}

/**
 * Check if a path matches any exclusion pattern
 */
export function shouldExclude(
  filePath: string,
  patterns: readonly string[],
  platform: NodeJS.Platform = process.platform
): boolean {
  const subject = platform === 'win32' ? filePath.replace(/\//g, '\\') : filePath;
  return patterns.some((pattern) => compilePattern(pattern, platform).test(subject));
}

// Check if a directory should be skipped before it is read.
// The path is also tested with a trailing separator so that patterns
// such as "**/node_modules/**" prune the directory itself.
export function shouldPruneDirectory(
  dirPath: string,
  patterns: readonly string[],
  platform: NodeJS.Platform = process.platform
): boolean {
  const separator = platform === 'win32' ? '\\' : '/';
  return (
    shouldExclude(dirPath, patterns, platform) ||
    shouldExclude(`${dirPath}${separator}`, patterns, platform)
  );
}

/**
 * Patterns in effect for a scan: the supplied ones, else the defaults
 */
export function effectivePatterns(patterns: readonly string[] | undefined): readonly string[] {
  return patterns && patterns.length > 0 ? patterns : DEFAULT_EXCLUDE_PATTERNS;
}

/**
 * Exclusion checks for the entries below one scan root
 * Relative patterns are matched against "./" plus the path below the root,
 * so the directories above the root take no part in matching.
 * Absolute patterns are matched against the full path.
 */
export class PathFilter {
  private root: string;
  private platform: NodeJS.Platform;
  private pathApi: path.PlatformPath;
  private relativePatterns: string[] = [];
  private absolutePatterns: string[] = [];

  constructor(root: string, patterns: readonly string[], platform: NodeJS.Platform = process.platform) {
    this.root = root;
    this.platform = platform;
    this.pathApi = platform === 'win32' ? path.win32 : path.posix;

    for (const pattern of patterns) {
      if (this.pathApi.isAbsolute(pattern)) {
        this.absolutePatterns.push(pattern);
      } else {
        this.relativePatterns.push(pattern);
      }
    }
  }

  /**
   * Path as relative patterns see it
   * Example: root "/home/me/.cache/proj", entry "/home/me/.cache/proj/src/a.ts" → "./src/a.ts"
   */
  subjectFor(entryPath: string): string {
    return `.${this.pathApi.sep}${this.pathApi.relative(this.root, entryPath)}`;
  }

  excludes(entryPath: string): boolean {
    return (
      shouldExclude(this.subjectFor(entryPath), this.relativePatterns, this.platform) ||
      shouldExclude(entryPath, this.absolutePatterns, this.platform)
    );
  }

  prunes(dirPath: string): boolean {
    return (
      shouldPruneDirectory(this.subjectFor(dirPath), this.relativePatterns, this.platform) ||
      shouldPruneDirectory(dirPath, this.absolutePatterns, this.platform)
    );
  }
}

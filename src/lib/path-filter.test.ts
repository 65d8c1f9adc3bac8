import { describe, it, expect } from 'vitest';
import {
  PathFilter,
  compilePattern,
  effectivePatterns,
  shouldExclude,
  shouldPruneDirectory,
  translatePattern,
} from './path-filter';
import { DEFAULT_EXCLUDE_PATTERNS } from '../types/scan-config';

describe('path-filter', () => {
  describe('translatePattern()', () => {
    it('should turn a star run into a single wildcard', () => {
      expect(translatePattern('**/*.txt')).toBe('.*\\/.*\\.txt');
    });

    it('should translate ? to a single-character wildcard', () => {
      expect(translatePattern('a?c')).toBe('a.c');
    });

    it('should keep character sets and negate with !', () => {
      expect(translatePattern('[abc]')).toBe('[abc]');
      expect(translatePattern('[!abc]')).toBe('[^abc]');
    });

    it('should treat an unterminated bracket as a literal', () => {
      expect(translatePattern('a[b')).toBe('a\\[b');
    });

    it('should drop reversed ranges and keep the rest of the set', () => {
      expect(translatePattern('[a-cz-x]')).toBe('[a-c]');
      expect(translatePattern('[z-a]')).toBe('(?!)');
      expect(translatePattern('[!z-a]')).toBe('.');
    });

    it('should keep a trailing dash literal', () => {
      expect(translatePattern('[a-]')).toBe('[a\\-]');
    });
  });

  describe('shouldExclude()', () => {
    it('should let * match across separators', () => {
      expect(shouldExclude('/var/log/app/today.log', ['*.log'], 'linux')).toBe(true);
    });

    it('should match a single character with ?', () => {
      expect(shouldExclude('/x/a1.txt', ['*/a?.txt'], 'linux')).toBe(true);
      expect(shouldExclude('/x/a12.txt', ['*/a?.txt'], 'linux')).toBe(false);
    });

    it('should match character ranges and negated ranges', () => {
      expect(shouldExclude('/d/file7.txt', ['*/file[0-9].txt'], 'linux')).toBe(true);
      expect(shouldExclude('/d/filex.txt', ['*/file[0-9].txt'], 'linux')).toBe(false);
      expect(shouldExclude('/d/filex.txt', ['*/file[!0-9].txt'], 'linux')).toBe(true);
      expect(shouldExclude('/d/file7.txt', ['*/file[!0-9].txt'], 'linux')).toBe(false);
    });

    it('should accept a closing bracket as the first set member', () => {
      expect(shouldExclude('/d/]x', ['*/[]]x'], 'linux')).toBe(true);
    });

    it('should match an unterminated bracket literally', () => {
      expect(shouldExclude('/d/a[b', ['*/a[b'], 'linux')).toBe(true);
      expect(shouldExclude('/d/ab', ['*/a[b'], 'linux')).toBe(false);
    });

    it('should never match a set made only of reversed ranges', () => {
      expect(shouldExclude('/a/b', ['[z-a]'], 'linux')).toBe(false);
      expect(shouldExclude('/a/b', ['*/[!z-a]'], 'linux')).toBe(true);
    });

    it('should return false for an empty pattern list', () => {
      expect(shouldExclude('/d/anything', [], 'linux')).toBe(false);
    });

    describe('with the default patterns', () => {
      const check = (filePath: string) => shouldExclude(filePath, DEFAULT_EXCLUDE_PATTERNS, 'linux');

      it('should exclude hidden files and anything below hidden directories', () => {
        expect(check('/proj/.env')).toBe(true);
        expect(check('/proj/.git/config')).toBe(true);
        expect(check('/proj/.cache/x/y.bin')).toBe(true);
      });

      it('should exclude dependency and bytecode directories', () => {
        expect(check('/proj/node_modules/pkg/index.js')).toBe(true);
        expect(check('/proj/venv/lib/site.py')).toBe(true);
        expect(check('/proj/__pycache__/mod.cpython-311.pyc')).toBe(true);
        expect(check('/proj/src/mod.pyc')).toBe(true);
      });

      it('should keep ordinary source files', () => {
        expect(check('/proj/src/main.ts')).toBe(false);
        expect(check('/proj/README')).toBe(false);
      });
    });

    it('should be case-sensitive on POSIX platforms', () => {
      expect(shouldExclude('/p/Node_Modules/x.js', ['**/node_modules/**'], 'linux')).toBe(false);
    });

    it('should be case-insensitive and accept either separator on Windows', () => {
      expect(shouldExclude('C:\\Proj\\Node_Modules\\x.js', ['**/node_modules/**'], 'win32')).toBe(true);
      expect(shouldExclude('C:/Proj/node_modules/x.js', ['**/node_modules/**'], 'win32')).toBe(true);
    });
  });

  describe('shouldPruneDirectory()', () => {
    it('should prune a directory whose contents a pattern excludes', () => {
      expect(shouldExclude('/p/node_modules', ['**/node_modules/**'], 'linux')).toBe(false);
      expect(shouldPruneDirectory('/p/node_modules', ['**/node_modules/**'], 'linux')).toBe(true);
    });

    it('should prune hidden directories with the default patterns', () => {
      expect(shouldPruneDirectory('/p/.git', DEFAULT_EXCLUDE_PATTERNS, 'linux')).toBe(true);
    });

    it('should keep ordinary directories', () => {
      expect(shouldPruneDirectory('/p/src', DEFAULT_EXCLUDE_PATTERNS, 'linux')).toBe(false);
    });

    it('should use a backslash separator on Windows', () => {
      expect(shouldPruneDirectory('C:\\p\\venv', ['**/venv/**'], 'win32')).toBe(true);
    });
  });

  describe('compilePattern()', () => {
    it('should return the cached expression for a repeated pattern', () => {
      expect(compilePattern('*.md', 'linux')).toBe(compilePattern('*.md', 'linux'));
    });

    it('should compile separately per platform', () => {
      expect(compilePattern('*.md', 'linux')).not.toBe(compilePattern('*.md', 'win32'));
    });
  });

  describe('effectivePatterns()', () => {
    it('should fall back to the defaults when none are supplied', () => {
      expect(effectivePatterns(undefined)).toBe(DEFAULT_EXCLUDE_PATTERNS);
      expect(effectivePatterns([])).toBe(DEFAULT_EXCLUDE_PATTERNS);
    });

    it('should replace the defaults with supplied patterns', () => {
      expect(effectivePatterns(['*.tmp'])).toEqual(['*.tmp']);
    });
  });

  describe('PathFilter', () => {
    it('should match relative patterns below the root only', () => {
      const filter = new PathFilter('/home/me/.cache/project', DEFAULT_EXCLUDE_PATTERNS, 'linux');

      expect(filter.excludes('/home/me/.cache/project/a.txt')).toBe(false);
      expect(filter.excludes('/home/me/.cache/project/src/b.py')).toBe(false);
      expect(filter.excludes('/home/me/.cache/project/.env')).toBe(true);
      expect(filter.prunes('/home/me/.cache/project/node_modules')).toBe(true);
      expect(filter.prunes('/home/me/.cache/project/src')).toBe(false);
    });

    it('should give relative patterns a ./ prefixed subject', () => {
      const filter = new PathFilter('/data', ['*.tmp'], 'linux');

      expect(filter.subjectFor('/data/sub/x.tmp')).toBe('./sub/x.tmp');
      expect(filter.excludes('/data/sub/x.tmp')).toBe(true);
    });

    it('should match absolute patterns against the full path', () => {
      const filter = new PathFilter('/data', ['/data/archive/*'], 'linux');

      expect(filter.excludes('/data/archive/old.txt')).toBe(true);
      expect(filter.excludes('/data/current/new.txt')).toBe(false);
      expect(filter.prunes('/data/archive')).toBe(true);
    });

    it('should use backslashes on Windows', () => {
      const filter = new PathFilter('C:\\Users\\me\\.config\\app', DEFAULT_EXCLUDE_PATTERNS, 'win32');

      expect(filter.subjectFor('C:\\Users\\me\\.config\\app\\main.ts')).toBe('.\\main.ts');
      expect(filter.excludes('C:\\Users\\me\\.config\\app\\main.ts')).toBe(false);
      expect(filter.prunes('C:\\Users\\me\\.config\\app\\.git')).toBe(true);
    });
  });
});

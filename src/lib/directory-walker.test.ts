import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { DirectoryWalker } from './directory-walker';
import { PathError } from '../types/errors';
import { createTempDir, removeTempDir, writeTree } from '../../tests/fixtures/temp-dir';

describe('DirectoryWalker', () => {
  let root: string;
  const p = (...segments: string[]) => path.join(root, ...segments);

  beforeEach(async () => {
    root = await createTempDir();
    await writeTree(root, {
      'a.txt': 'alpha',
      'b.log': 'log line',
      '.hidden.txt': 'secret',
      'docs/readme.md': '# docs',
      'docs/deep/note.txt': 'note',
      'node_modules/pkg/index.js': 'module.exports = 1;',
      '.git/config': '[core]',
    });
    await fs.mkdir(p('empty'));
    await fs.symlink(p('a.txt'), p('link.txt'));
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('walk()', () => {
    it('should list files depth-first in name order with the default patterns', async () => {
      const walker = new DirectoryWalker({ recursive: true });

      const result = await walker.walk(root);

      expect(result.files).toEqual([p('a.txt'), p('b.log'), p('docs', 'deep', 'note.txt'), p('docs', 'readme.md')]);
      expect(result.emptyDirectories).toEqual([p('empty')]);
      expect(result.failures).toEqual([]);
    });

    it('should replace the defaults with supplied patterns', async () => {
      const walker = new DirectoryWalker({ recursive: true, excludePatterns: ['*.log'] });

      const result = await walker.walk(root);

      expect(result.files).toEqual([
        p('.git', 'config'),
        p('.hidden.txt'),
        p('a.txt'),
        p('docs', 'deep', 'note.txt'),
        p('docs', 'readme.md'),
        p('node_modules', 'pkg', 'index.js'),
      ]);
    });

    it('should only list direct files when not recursive', async () => {
      const walker = new DirectoryWalker({ recursive: false });

      const result = await walker.walk(root);

      expect(result.files).toEqual([p('a.txt'), p('b.log')]);
      expect(result.emptyDirectories).toEqual([]);
    });

    it('should not follow or list symbolic links', async () => {
      const walker = new DirectoryWalker({ recursive: true, excludePatterns: ['*.log'] });

      const result = await walker.walk(root);

      expect(result.files).not.toContain(p('link.txt'));
    });

    it('should report an empty root as an empty directory', async () => {
      const emptyRoot = p('empty');
      const walker = new DirectoryWalker({ recursive: true });

      const result = await walker.walk(emptyRoot);

      expect(result.files).toEqual([]);
      expect(result.emptyDirectories).toEqual([emptyRoot]);
    });

    it('should stop when the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const walker = new DirectoryWalker({ recursive: true, signal: controller.signal });

      const result = await walker.walk(root);

      expect(result.files).toEqual([]);
    });

    it('should ignore hidden directories above the root', async () => {
      await writeTree(root, {
        '.cache/project/a.txt': 'alpha',
        '.cache/project/src/b.py': 'print(1)',
        '.cache/project/.env': 'KEY=test-secret',
      });
      const project = p('.cache', 'project');
      const walker = new DirectoryWalker({ recursive: true });

      const result = await walker.walk(project);

      expect(result.files).toEqual([path.join(project, 'a.txt'), path.join(project, 'src', 'b.py')]);
    });

    it('should throw PathError for an unreadable root', async () => {
      const walker = new DirectoryWalker({ recursive: true });

      await expect(walker.walk(p('missing'))).rejects.toBeInstanceOf(PathError);
    });
  });
});

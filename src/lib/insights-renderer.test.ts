import { describe, it, expect } from 'vitest';
import {
  renderAgeDistribution,
  renderFileTypes,
  renderInsights,
  renderTreeLines,
  renderVideoStats,
} from './insights-renderer';
import { aggregate, buildFileTree, videoStatistics } from './aggregator';
import { FIXED_NOW, createSampleRecords, createTestRecord, createVideoRecords } from '../../tests/fixtures/file-records';

describe('insights-renderer', () => {
  describe('renderTreeLines()', () => {
    it('should draw an empty root', () => {
      expect(renderTreeLines(buildFileTree([]))).toEqual(['📁 Root']);
    });

    it('should draw nested entries with connectors and video summaries', () => {
      const tree = buildFileTree([...createVideoRecords(), ...createSampleRecords()]);

      expect(renderTreeLines(tree)).toEqual([
        '📁 Root',
        '├── 📁 data',
        '│   ├── 📄 a.txt (5.0 B)',
        '│   ├── 📄 b.py (3.0 B)',
        '│   └── 📄 c.jpg (1000.0 B)',
        '└── 📁 media',
        '    ├── 📄 v1.mp4 (4.0 KB) 🎬 1920x1080, 10.00s, h264',
        '    ├── 📄 v2.mkv (8.0 KB) 🎬 1920x1080, 20.00s, hevc',
        '    ├── 📄 v3.mp4 (2.0 KB) 🎬 1280x720, 30.00s, h264',
        '    └── 📄 v4.mov (1.0 KB)',
      ]);
    });
  });

  describe('renderAgeDistribution()', () => {
    it('should list non-empty buckets in order', () => {
      const result = aggregate(createSampleRecords(), FIXED_NOW);

      expect(renderAgeDistribution(result.ageDistribution)).toEqual([
        'Last 24 hours: 1 files',
        'Last 7 days: 1 files',
        'Last 30 days: 1 files',
      ]);
    });
  });

  describe('renderFileTypes()', () => {
    it('should label files without an extension', () => {
      const output = renderFileTypes([{ extension: '', count: 2, totalSize: 2048, percentage: 100 }]);

      expect(output).toContain('(no extension)');
      expect(output).toContain('2.0 KB');
      expect(output).toContain('100.0%');
    });
  });

  describe('renderVideoStats()', () => {
    it('should show codec shares among probed videos', () => {
      const stats = videoStatistics(createVideoRecords());
      if (!stats) throw new Error('expected video stats');

      const output = renderVideoStats(stats);

      expect(output).toContain('1m 0s');
      expect(output).toContain('20.00s');
      expect(output).toContain('1280x720');
      expect(output).toContain('66.7%');
      expect(output).toContain('33.3%');
    });

    it('should name missing codecs Unknown', () => {
      const stats = videoStatistics([
        createTestRecord({ path: '/media/raw.avi', size: 2048, videoProbe: 'ok', video: { duration: 5 } }),
      ]);
      if (!stats) throw new Error('expected video stats');

      expect(renderVideoStats(stats)).toContain('Unknown');
    });
  });

  describe('renderInsights()', () => {
    it('should include the tree and duplicates when present', () => {
      const output = renderInsights(aggregate(createSampleRecords(), FIXED_NOW), [
        { hash: 'abc123', size: 12, paths: ['/data/a.txt', '/data/copy.txt'], wastedBytes: 12 },
      ]);

      expect(output).toContain('File Tree:');
      expect(output).toContain('Duplicate Files (12.0 B reclaimable)');
      expect(output).not.toContain('Video Files');
    });

    it('should leave out empty sections', () => {
      const output = renderInsights(aggregate([], FIXED_NOW));

      expect(output).toContain('N/A');
      expect(output).not.toContain('File Types');
      expect(output).not.toContain('File Tree:');
    });
  });
});

import * as path from 'path';
import { FileRecord, formatResolution, videoMetadataOf } from '../types/file-record';
import {
  AGE_BUCKETS,
  AgeBucketLabel,
  AgeDistribution,
  AggregateResult,
  CodecCount,
  DirectoryNode,
  ExtensionStats,
  FileLeafNode,
  GeneralStats,
  ResolutionCount,
  VideoStats,
} from '../types/aggregate';
import { formatIsoDate } from '../utils/format-utils';

/**
 * Path components below the filesystem root marker ("/", "C:\", "\\server\share\")
 * "." components are dropped; ".." components are kept.
 */
export function pathSegments(filePath: string, pathApi: path.PlatformPath = path): string[] {
  const { root } = pathApi.parse(filePath);
  const rest = filePath.slice(root.length);
  const separators = pathApi.sep === '\\' ? /[\\/]+/ : /\/+/;
  return rest.split(separators).filter((segment) => segment !== '' && segment !== '.');
}

function fileLabel(record: FileRecord): string {
  return `${record.name} (${formatIsoDate(record.createdTime)})`;
}

export function generalStatistics(records: readonly FileRecord[]): GeneralStats {
  if (records.length === 0) {
    return {
      totalFiles: 0,
      totalSize: 0,
      averageSize: 0,
      oldestFile: 'N/A',
      newestFile: 'N/A',
      totalDirectories: 0,
    };
  }

  let totalSize = 0;
  let oldest = records[0];
  let newest = records[0];
  const directories = new Set<string>();

  for (const record of records) {
    totalSize += record.size;
    // Strict comparisons: the first occurrence wins ties
    if (record.createdTime.getTime() < oldest.createdTime.getTime()) oldest = record;
    if (record.createdTime.getTime() > newest.createdTime.getTime()) newest = record;
    directories.add(path.dirname(record.path));
  }

  return {
    totalFiles: records.length,
    totalSize,
    averageSize: totalSize / records.length,
    oldestFile: fileLabel(oldest),
    newestFile: fileLabel(newest),
    totalDirectories: directories.size,
  };
}

export function extensionStatistics(records: readonly FileRecord[]): ExtensionStats[] {
  const groups = new Map<string, { count: number; totalSize: number }>();
  let totalSize = 0;

  for (const record of records) {
    const group = groups.get(record.extension) ?? { count: 0, totalSize: 0 };
    group.count++;
    group.totalSize += record.size;
    groups.set(record.extension, group);
    totalSize += record.size;
  }

  const stats: ExtensionStats[] = [];
  for (const [extension, group] of groups) {
    stats.push({
      extension,
      count: group.count,
      totalSize: group.totalSize,
      percentage: totalSize > 0 ? (group.totalSize / totalSize) * 100 : 0,
    });
  }

  // Array.prototype.sort is stable: equal sizes keep first-seen order
  return stats.sort((a, b) => b.totalSize - a.totalSize);
}

export function ageBucketFor(createdTime: Date, now: Date): AgeBucketLabel {
  const ageSeconds = (now.getTime() - createdTime.getTime()) / 1000;
  for (const bucket of AGE_BUCKETS) {
    if (ageSeconds < bucket.maxAgeSeconds) {
      return bucket.label;
    }
  }
  return 'Older';
}

export function ageDistribution(records: readonly FileRecord[], now: Date): AgeDistribution {
  const counts = new Map<AgeBucketLabel, number>();
  for (const record of records) {
    const label = ageBucketFor(record.createdTime, now);
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  const distribution: AgeDistribution = {};
  for (const bucket of AGE_BUCKETS) {
    const count = counts.get(bucket.label);
    if (count) {
      distribution[bucket.label] = count;
    }
  }
  return distribution;
}

export function createDirectoryNode(name: string): DirectoryNode {
  return { kind: 'directory', name, children: new Map() };
}

export function buildFileTree(records: readonly FileRecord[]): DirectoryNode {
  const root = createDirectoryNode('');

  for (const record of records) {
    const segments = pathSegments(record.path);
    if (segments.length === 0) continue;

    let current = root;
    for (const segment of segments.slice(0, -1)) {
      const existing = current.children.get(segment);
      if (existing && existing.kind === 'directory') {
        current = existing;
      } else {
        const directory = createDirectoryNode(segment);
        current.children.set(segment, directory);
        current = directory;
      }
    }

    const name = segments[segments.length - 1];
    if (current.children.get(name)?.kind === 'directory') {
      continue;
    }

    const leaf: FileLeafNode = {
      kind: 'file',
      name,
      size: record.size,
      extension: record.extension,
      isVideo: record.isVideo,
    };
    const video = videoMetadataOf(record);
    if (video) {
      leaf.video = video;
    }
    current.children.set(name, leaf);
  }

  return root;
}

function mostCommon<K>(counts: Map<K, number>): Array<[K, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export function videoStatistics(records: readonly FileRecord[]): VideoStats | undefined {
  const videos = records.filter((record) => record.isVideo);
  if (videos.length === 0) {
    return undefined;
  }

  const withMetadata = videos.filter((video) => video.hasVideoMetadata);

  let totalDuration = 0;
  let durationCount = 0;
  const resolutions = new Map<string, number>();
  const codecs = new Map<string | undefined, number>();

  for (const video of withMetadata) {
    if (video.videoDuration !== undefined) {
      totalDuration += video.videoDuration;
      durationCount++;
    }
    if (video.videoResolution) {
      const key = formatResolution(video.videoResolution);
      resolutions.set(key, (resolutions.get(key) ?? 0) + 1);
    }
    codecs.set(video.videoCodec, (codecs.get(video.videoCodec) ?? 0) + 1);
  }

  const resolutionCounts: ResolutionCount[] = mostCommon(resolutions).map(([resolution, count]) => ({
    resolution,
    count,
  }));
  const codecCounts: CodecCount[] = mostCommon(codecs).map(([codec, count]) =>
    codec === undefined ? { count } : { codec, count }
  );

  return {
    totalVideos: videos.length,
    videosWithMetadata: withMetadata.length,
    totalDuration,
    averageDuration: durationCount > 0 ? totalDuration / durationCount : 0,
    resolutionCounts,
    codecCounts,
  };
}

/**
 * Produce every statistic for a record set
 * Pure apart from the injected clock value.
 */
export function aggregate(records: readonly FileRecord[], now: Date): AggregateResult {
  const result: AggregateResult = {
    generatedAt: now,
    generalStats: generalStatistics(records),
    fileTypes: extensionStatistics(records),
    ageDistribution: ageDistribution(records, now),
    fileTree: buildFileTree(records),
  };

  const videoStats = videoStatistics(records);
  if (videoStats) {
    result.videoStats = videoStats;
  }

  return result;
}

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  AGE_BUCKETS,
  AgeDistribution,
  AggregateResult,
  DirectoryNode,
  ExtensionStats,
  FileTreeNode,
  GeneralStats,
  VideoStats,
} from '../types/aggregate';
import { VideoMetadata, formatResolution } from '../types/file-record';
import { DuplicateGroup } from './duplicate-finder';
import { formatBytes, formatDuration, formatPercentage } from '../utils/format-utils';

// The tree is only printed when the top level stays this small
export const MAX_TREE_TOP_LEVEL_ENTRIES = 100;

export function renderGeneralStats(stats: GeneralStats): string {
  const table = new Table({ head: ['STATISTIC', 'VALUE'] });
  table.push(
    ['Total Files', String(stats.totalFiles)],
    ['Total Size', formatBytes(stats.totalSize)],
    ['Average File Size', formatBytes(stats.averageSize)],
    ['Oldest File', stats.oldestFile],
    ['Newest File', stats.newestFile],
    ['Total Directories', String(stats.totalDirectories)]
  );
  return table.toString();
}

export function renderFileTypes(fileTypes: readonly ExtensionStats[]): string {
  const table = new Table({ head: ['EXTENSION', 'COUNT', 'TOTAL SIZE', 'PERCENTAGE'] });
  for (const stats of fileTypes) {
    table.push([
      stats.extension || '(no extension)',
      String(stats.count),
      formatBytes(stats.totalSize),
      formatPercentage(stats.percentage),
    ]);
  }
  return table.toString();
}

export function renderAgeDistribution(distribution: AgeDistribution): string[] {
  const lines: string[] = [];
  for (const bucket of AGE_BUCKETS) {
    const count = distribution[bucket.label];
    if (count !== undefined) {
      lines.push(`${bucket.label}: ${count} files`);
    }
  }
  return lines;
}

export function renderVideoStats(stats: VideoStats): string {
  const table = new Table({ head: ['STATISTIC', 'VALUE'] });
  table.push(
    ['Total Videos', String(stats.totalVideos)],
    ['Videos with Metadata', String(stats.videosWithMetadata)]
  );
  if (stats.totalDuration > 0) {
    table.push(['Total Duration', formatDuration(stats.totalDuration)]);
  }
  if (stats.averageDuration > 0) {
    table.push(['Average Duration', formatDuration(stats.averageDuration)]);
  }

  const sections = [table.toString()];

  const resolutionTotal = stats.resolutionCounts.reduce((sum, r) => sum + r.count, 0);
  if (resolutionTotal > 0) {
    const resolutions = new Table({ head: ['RESOLUTION', 'COUNT', 'PERCENTAGE'] });
    for (const { resolution, count } of stats.resolutionCounts) {
      resolutions.push([resolution, String(count), formatPercentage((count / resolutionTotal) * 100)]);
    }
    sections.push(resolutions.toString());
  }

  const codecTotal = stats.codecCounts.reduce((sum, c) => sum + c.count, 0);
  if (codecTotal > 0) {
    const codecs = new Table({ head: ['CODEC', 'COUNT', 'PERCENTAGE'] });
    for (const { codec, count } of stats.codecCounts) {
      codecs.push([codec ?? 'Unknown', String(count), formatPercentage((count / codecTotal) * 100)]);
    }
    sections.push(codecs.toString());
  }

  return sections.join('\n');
}

export function renderDuplicates(groups: readonly DuplicateGroup[]): string {
  const table = new Table({ head: ['COPIES', 'SIZE', 'WASTED', 'PATHS'] });
  for (const group of groups) {
    table.push([
      String(group.paths.length),
      formatBytes(group.size),
      formatBytes(group.wastedBytes),
      group.paths.join('\n'),
    ]);
  }
  return table.toString();
}

function videoSummary(video: VideoMetadata): string {
  const parts: string[] = [];
  if (video.resolution) parts.push(formatResolution(video.resolution));
  if (video.duration !== undefined) parts.push(formatDuration(video.duration));
  if (video.videoCodec) parts.push(video.videoCodec);
  return parts.join(', ');
}

function nodeLabel(node: FileTreeNode): string {
  if (node.kind === 'directory') {
    return `📁 ${node.name}`;
  }
  let label = `📄 ${node.name} (${formatBytes(node.size)})`;
  const summary = node.video ? videoSummary(node.video) : '';
  if (summary) {
    label += ` 🎬 ${summary}`;
  }
  return label;
}

function sortedChildren(node: DirectoryNode): FileTreeNode[] {
  return [...node.children.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Tree lines with box-drawing connectors, children sorted by name
 * Example:
 *   📁 Root
 *   └── 📁 docs
 *       └── 📄 a.txt (5.0 B)
 */
export function renderTreeLines(root: DirectoryNode): string[] {
  const lines = ['📁 Root'];

  const walk = (node: DirectoryNode, prefix: string): void => {
    const children = sortedChildren(node);
    children.forEach((child, index) => {
      const last = index === children.length - 1;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${nodeLabel(child)}`);
      if (child.kind === 'directory') {
        walk(child, prefix + (last ? '    ' : '│   '));
      }
    });
  };

  walk(root, '');
  return lines;
}

/**
 * Full terminal report for an aggregate
 */
export function renderInsights(result: AggregateResult, duplicates?: readonly DuplicateGroup[]): string {
  const out: string[] = [];

  out.push(chalk.blue.bold('📊 File Insights'));
  out.push(renderGeneralStats(result.generalStats));

  if (result.fileTypes.length > 0) {
    out.push('', chalk.bold('File Types'));
    out.push(renderFileTypes(result.fileTypes));
  }

  const ageLines = renderAgeDistribution(result.ageDistribution);
  if (ageLines.length > 0) {
    out.push('', chalk.yellow.bold('📅 File Age Distribution'));
    out.push(...ageLines);
  }

  if (result.videoStats) {
    out.push('', chalk.cyan.bold('🎬 Video Files'));
    out.push(renderVideoStats(result.videoStats));
  }

  if (duplicates && duplicates.length > 0) {
    const wasted = duplicates.reduce((sum, group) => sum + group.wastedBytes, 0);
    out.push('', chalk.magenta.bold(`🔁 Duplicate Files (${formatBytes(wasted)} reclaimable)`));
    out.push(renderDuplicates(duplicates));
  }

  if (result.fileTree.children.size > 0 && result.fileTree.children.size <= MAX_TREE_TOP_LEVEL_ENTRIES) {
    out.push('', chalk.bold('File Tree:'));
    out.push(...renderTreeLines(result.fileTree));
  }

  return out.join('\n');
}

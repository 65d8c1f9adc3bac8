import * as fs from 'fs/promises';
import {
  AGE_BUCKETS,
  AgeDistribution,
  AggregateResult,
  CodecCount,
  DirectoryNode,
  ExtensionStats,
  FileTreeNode,
  GeneralStats,
  ResolutionCount,
  VideoStats,
} from '../types/aggregate';
import { VideoMetadata, formatResolution } from '../types/file-record';
import { DuplicateGroup } from './duplicate-finder';
import { writeTextAtomic } from '../utils/file-utils';
import { isFiniteNumber, isRecord, isStringArray } from '../utils/json-utils';

export interface ReportVideoMetadata {
  duration?: number;
  resolution?: string;   // "WxH"
  fps?: number;
  videoCodec?: string;
  audioCodec?: string;
}

export interface ReportFileNode {
  kind: 'file';
  name: string;
  size: number;
  extension: string;
  isVideo: boolean;
  video?: ReportVideoMetadata;
}

export interface ReportDirectoryNode {
  kind: 'directory';
  name: string;
  children: ReportTreeNode[];   // Sorted by name
}

export type ReportTreeNode = ReportDirectoryNode | ReportFileNode;

/**
 * JSON form of an AggregateResult
 */
export interface ReportDocument {
  generatedAt: string;   // ISO timestamp
  root?: string;
  generalStats: GeneralStats;
  fileTypes: ExtensionStats[];
  ageDistribution: AgeDistribution;
  fileTree: ReportDirectoryNode;
  videoStats?: VideoStats;
  duplicates?: DuplicateGroup[];
}

export interface ReportExtras {
  root?: string;
  duplicates?: DuplicateGroup[];
}

function toReportVideo(video: VideoMetadata): ReportVideoMetadata {
  const result: ReportVideoMetadata = {};
  if (video.duration !== undefined) result.duration = video.duration;
  if (video.resolution !== undefined) result.resolution = formatResolution(video.resolution);
  if (video.fps !== undefined) result.fps = video.fps;
  if (video.videoCodec !== undefined) result.videoCodec = video.videoCodec;
  if (video.audioCodec !== undefined) result.audioCodec = video.audioCodec;
  return result;
}

function toReportNode(node: FileTreeNode): ReportTreeNode {
  if (node.kind === 'file') {
    const file: ReportFileNode = {
      kind: 'file',
      name: node.name,
      size: node.size,
      extension: node.extension,
      isVideo: node.isVideo,
    };
    if (node.video) {
      file.video = toReportVideo(node.video);
    }
    return file;
  }
  return toReportDirectory(node);
}

function toReportDirectory(node: DirectoryNode): ReportDirectoryNode {
  const names = [...node.children.keys()].sort();
  const children: ReportTreeNode[] = [];
  for (const name of names) {
    const child = node.children.get(name);
    if (child) children.push(toReportNode(child));
  }
  return { kind: 'directory', name: node.name, children };
}

/**
 * Convert an aggregate to its deterministic JSON form
 */
export function toReportDocument(result: AggregateResult, extras: ReportExtras = {}): ReportDocument {
  const document: ReportDocument = {
    generatedAt: result.generatedAt.toISOString(),
    generalStats: { ...result.generalStats },
    fileTypes: result.fileTypes.map((stats) => ({ ...stats })),
    ageDistribution: { ...result.ageDistribution },
    fileTree: toReportDirectory(result.fileTree),
  };

  if (extras.root !== undefined) document.root = extras.root;
  if (result.videoStats) document.videoStats = result.videoStats;
  if (extras.duplicates) document.duplicates = extras.duplicates;

  return document;
}

export function serializeReport(document: ReportDocument): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Write a report to disk, creating the parent directory
 */
export async function writeReport(filePath: string, document: ReportDocument): Promise<void> {
  await writeTextAtomic(filePath, serializeReport(document));
}

// ---- Parsing -------------------------------------------------------------

class ReportFormatError extends Error {
  constructor(field: string) {
    super(`Invalid report: bad or missing field "${field}"`);
    this.name = 'ReportFormatError';
  }
}

function requireNumber(data: Record<string, unknown>, key: string, where: string): number {
  const value = data[key];
  if (!isFiniteNumber(value)) throw new ReportFormatError(`${where}.${key}`);
  return value;
}

function requireString(data: Record<string, unknown>, key: string, where: string): string {
  const value = data[key];
  if (typeof value !== 'string') throw new ReportFormatError(`${where}.${key}`);
  return value;
}

function optionalNumber(data: Record<string, unknown>, key: string, where: string): number | undefined {
  return data[key] === undefined ? undefined : requireNumber(data, key, where);
}

function optionalString(data: Record<string, unknown>, key: string, where: string): string | undefined {
  return data[key] === undefined ? undefined : requireString(data, key, where);
}

function parseGeneralStats(value: unknown): GeneralStats {
  if (!isRecord(value)) throw new ReportFormatError('generalStats');
  const where = 'generalStats';
  return {
    totalFiles: requireNumber(value, 'totalFiles', where),
    totalSize: requireNumber(value, 'totalSize', where),
    averageSize: requireNumber(value, 'averageSize', where),
    oldestFile: requireString(value, 'oldestFile', where),
    newestFile: requireString(value, 'newestFile', where),
    totalDirectories: requireNumber(value, 'totalDirectories', where),
  };
}

function parseFileTypes(value: unknown): ExtensionStats[] {
  if (!Array.isArray(value)) throw new ReportFormatError('fileTypes');
  return value.map((item: unknown, index) => {
    const where = `fileTypes[${index}]`;
    if (!isRecord(item)) throw new ReportFormatError(where);
    return {
      extension: requireString(item, 'extension', where),
      count: requireNumber(item, 'count', where),
      totalSize: requireNumber(item, 'totalSize', where),
      percentage: requireNumber(item, 'percentage', where),
    };
  });
}

function parseAgeDistribution(value: unknown): AgeDistribution {
  if (!isRecord(value)) throw new ReportFormatError('ageDistribution');
  const distribution: AgeDistribution = {};
  for (const bucket of AGE_BUCKETS) {
    const count = optionalNumber(value, bucket.label, 'ageDistribution');
    if (count !== undefined) distribution[bucket.label] = count;
  }
  return distribution;
}

function parseTreeNode(value: unknown, where: string): ReportTreeNode {
  if (!isRecord(value)) throw new ReportFormatError(where);
  const name = requireString(value, 'name', where);

  if (value.kind === 'directory') {
    if (!Array.isArray(value.children)) throw new ReportFormatError(`${where}.children`);
    return {
      kind: 'directory',
      name,
      children: value.children.map((child: unknown, index) => parseTreeNode(child, `${where}.children[${index}]`)),
    };
  }

  if (value.kind === 'file') {
    if (typeof value.isVideo !== 'boolean') throw new ReportFormatError(`${where}.isVideo`);
    const file: ReportFileNode = {
      kind: 'file',
      name,
      size: requireNumber(value, 'size', where),
      extension: requireString(value, 'extension', where),
      isVideo: value.isVideo,
    };
    if (value.video !== undefined) {
      if (!isRecord(value.video)) throw new ReportFormatError(`${where}.video`);
      const videoWhere = `${where}.video`;
      const video: ReportVideoMetadata = {};
      const duration = optionalNumber(value.video, 'duration', videoWhere);
      const resolution = optionalString(value.video, 'resolution', videoWhere);
      const fps = optionalNumber(value.video, 'fps', videoWhere);
      const videoCodec = optionalString(value.video, 'videoCodec', videoWhere);
      const audioCodec = optionalString(value.video, 'audioCodec', videoWhere);
      if (duration !== undefined) video.duration = duration;
      if (resolution !== undefined) video.resolution = resolution;
      if (fps !== undefined) video.fps = fps;
      if (videoCodec !== undefined) video.videoCodec = videoCodec;
      if (audioCodec !== undefined) video.audioCodec = audioCodec;
      file.video = video;
    }
    return file;
  }

  throw new ReportFormatError(`${where}.kind`);
}

function parseVideoStats(value: unknown): VideoStats {
  if (!isRecord(value)) throw new ReportFormatError('videoStats');
  const where = 'videoStats';
  const { resolutionCounts, codecCounts } = value;
  if (!Array.isArray(resolutionCounts)) throw new ReportFormatError(`${where}.resolutionCounts`);
  if (!Array.isArray(codecCounts)) throw new ReportFormatError(`${where}.codecCounts`);

  return {
    totalVideos: requireNumber(value, 'totalVideos', where),
    videosWithMetadata: requireNumber(value, 'videosWithMetadata', where),
    totalDuration: requireNumber(value, 'totalDuration', where),
    averageDuration: requireNumber(value, 'averageDuration', where),
    resolutionCounts: resolutionCounts.map((item: unknown, index): ResolutionCount => {
      const itemWhere = `${where}.resolutionCounts[${index}]`;
      if (!isRecord(item)) throw new ReportFormatError(itemWhere);
      return {
        resolution: requireString(item, 'resolution', itemWhere),
        count: requireNumber(item, 'count', itemWhere),
      };
    }),
    codecCounts: codecCounts.map((item: unknown, index): CodecCount => {
      const itemWhere = `${where}.codecCounts[${index}]`;
      if (!isRecord(item)) throw new ReportFormatError(itemWhere);
      const codec = optionalString(item, 'codec', itemWhere);
      const count = requireNumber(item, 'count', itemWhere);
      return codec === undefined ? { count } : { codec, count };
    }),
  };
}

function parseDuplicates(value: unknown): DuplicateGroup[] {
  if (!Array.isArray(value)) throw new ReportFormatError('duplicates');
  return value.map((item: unknown, index) => {
    const where = `duplicates[${index}]`;
    if (!isRecord(item) || !isStringArray(item.paths)) throw new ReportFormatError(where);
    return {
      hash: requireString(item, 'hash', where),
      size: requireNumber(item, 'size', where),
      paths: item.paths,
      wastedBytes: requireNumber(item, 'wastedBytes', where),
    };
  });
}

/**
 * Parse and validate a report produced by serializeReport
 * @throws Error naming the first invalid field
 */
export function parseReport(json: string): ReportDocument {
  const data: unknown = JSON.parse(json);
  if (!isRecord(data)) throw new ReportFormatError('(root)');

  const tree = parseTreeNode(data.fileTree, 'fileTree');
  if (tree.kind !== 'directory') throw new ReportFormatError('fileTree.kind');

  const document: ReportDocument = {
    generatedAt: requireString(data, 'generatedAt', 'report'),
    generalStats: parseGeneralStats(data.generalStats),
    fileTypes: parseFileTypes(data.fileTypes),
    ageDistribution: parseAgeDistribution(data.ageDistribution),
    fileTree: tree,
  };

  const root = optionalString(data, 'root', 'report');
  if (root !== undefined) document.root = root;
  if (data.videoStats !== undefined) document.videoStats = parseVideoStats(data.videoStats);
  if (data.duplicates !== undefined) document.duplicates = parseDuplicates(data.duplicates);

  return document;
}

export async function readReport(filePath: string): Promise<ReportDocument> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseReport(content);
}

import { VideoMetadata } from './file-record';

export interface GeneralStats {
  totalFiles: number;
  totalSize: number;
  averageSize: number;
  oldestFile: string;        // "name (YYYY-MM-DD)" or "N/A"
  newestFile: string;
  totalDirectories: number;  // Distinct parent directories
}

export interface ExtensionStats {
  extension: string;         // '' for files without an extension
  count: number;
  totalSize: number;
  percentage: number;        // Share of the total size, 0-100
}

export const AGE_BUCKETS = [
  { label: 'Last 24 hours', maxAgeSeconds: 86400 },
  { label: 'Last 7 days', maxAgeSeconds: 604800 },
  { label: 'Last 30 days', maxAgeSeconds: 2592000 },
  { label: 'Last year', maxAgeSeconds: 31536000 },
  { label: 'Older', maxAgeSeconds: Infinity },
] as const;

export type AgeBucketLabel = (typeof AGE_BUCKETS)[number]['label'];

/**
 * Bucket label → count, in bucket order, empty buckets omitted
 */
export type AgeDistribution = Partial<Record<AgeBucketLabel, number>>;

export interface DirectoryNode {
  kind: 'directory';
  name: string;
  children: Map<string, FileTreeNode>;
}

export interface FileLeafNode {
  kind: 'file';
  name: string;
  size: number;
  extension: string;
  isVideo: boolean;
  video?: VideoMetadata;
}

export type FileTreeNode = DirectoryNode | FileLeafNode;

export interface ResolutionCount {
  resolution: string;        // "WxH"
  count: number;
}

export interface CodecCount {
  codec?: string;            // Absent when the probe reported no codec
  count: number;
}

export interface VideoStats {
  totalVideos: number;
  videosWithMetadata: number;
  totalDuration: number;
  averageDuration: number;
  resolutionCounts: ResolutionCount[];
  codecCounts: CodecCount[];
}

export interface AggregateResult {
  generatedAt: Date;
  generalStats: GeneralStats;
  fileTypes: ExtensionStats[];
  ageDistribution: AgeDistribution;
  fileTree: DirectoryNode;
  videoStats?: VideoStats;
}

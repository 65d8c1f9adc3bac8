import * as path from 'path';

export interface Resolution {
  width: number;
  height: number;
}

export type VideoProbeStatus = 'skipped' | 'ok' | 'failed';

export interface VideoMetadata {
  duration?: number;       // Seconds
  resolution?: Resolution;
  fps?: number;
  videoCodec?: string;
  audioCodec?: string;
}

export interface FileRecord {
  readonly path: string;
  readonly name: string;
  readonly size: number;              // Bytes
  readonly extension: string;         // Lowercase, '' or starts with '.'
  readonly createdTime: Date;         // Birth time, or ctime where the filesystem has none
  readonly modifiedTime: Date;
  readonly contentPreview?: string;   // At most 1000 characters, never set for binary files
  readonly mimeType?: string;
  readonly isBinary: boolean;
  readonly isVideo: boolean;
  readonly videoDuration?: number;
  readonly videoResolution?: Resolution;
  readonly videoFps?: number;
  readonly videoCodec?: string;
  readonly audioCodec?: string;
  readonly videoProbe?: VideoProbeStatus;
  readonly hasVideoMetadata: boolean;
}

export interface FileRecordInput {
  path: string;
  size: number;
  createdTime: Date;
  modifiedTime: Date;
  extension?: string;
  contentPreview?: string;
  mimeType?: string;
  isBinary?: boolean;
  videoProbe?: VideoProbeStatus;
  video?: VideoMetadata;
}

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4',
  '.avi',
  '.mov',
  '.mkv',
  '.wmv',
  '.flv',
  '.webm',
  '.m4v',
  '.mpg',
  '.mpeg',
  '.3gp',
]);

const TEXT_LIKE_MIME_PREFIXES = ['text/', 'application/json'];

/**
 * Whether a MIME type counts as text when a record derives its binary flag
 */
export function isTextLikeMime(mimeType: string): boolean {
  return TEXT_LIKE_MIME_PREFIXES.some((prefix) => mimeType.startsWith(prefix));
}

/**
 * Lowercase suffix of the last path component, including the dot
 * Example: "Clip.MP4" → ".mp4", ".bashrc" → "", "notes." → ""
 */
export function extractExtension(filePath: string): string {
  const ext = path.extname(filePath);
  return ext === '.' ? '' : ext.toLowerCase();
}

export function isVideoExtension(extension: string): boolean {
  return VIDEO_EXTENSIONS.has(extension.toLowerCase());
}

/**
 * Build an immutable record, deriving name, extension and the video flags
 */
export function createFileRecord(input: FileRecordInput): FileRecord {
  const extension = input.extension !== undefined
    ? input.extension.toLowerCase()
    : extractExtension(input.path);
  const isVideo = isVideoExtension(extension);
  const isBinary = input.isBinary ?? (input.mimeType !== undefined && !isTextLikeMime(input.mimeType));
  const video = isVideo ? input.video : undefined;

  return Object.freeze({
    path: input.path,
    name: path.basename(input.path),
    size: input.size,
    extension,
    createdTime: input.createdTime,
    modifiedTime: input.modifiedTime,
    contentPreview: isBinary ? undefined : input.contentPreview,
    mimeType: input.mimeType,
    isBinary,
    isVideo,
    videoDuration: video?.duration,
    videoResolution: video?.resolution,
    videoFps: video?.fps,
    videoCodec: video?.videoCodec,
    audioCodec: video?.audioCodec,
    videoProbe: input.videoProbe,
    hasVideoMetadata: isVideo && video?.duration !== undefined,
  });
}

/**
 * Return a copy of the record carrying the given probe outcome
 */
export function withVideoMetadata(
  record: FileRecord,
  status: VideoProbeStatus,
  video?: VideoMetadata
): FileRecord {
  return createFileRecord({
    path: record.path,
    size: record.size,
    extension: record.extension,
    createdTime: record.createdTime,
    modifiedTime: record.modifiedTime,
    contentPreview: record.contentPreview,
    mimeType: record.mimeType,
    isBinary: record.isBinary,
    videoProbe: status,
    video,
  });
}

/**
 * The video block of a record, or undefined when no video field is set
 */
export function videoMetadataOf(record: FileRecord): VideoMetadata | undefined {
  const metadata: VideoMetadata = {};
  if (record.videoDuration !== undefined) metadata.duration = record.videoDuration;
  if (record.videoResolution !== undefined) metadata.resolution = record.videoResolution;
  if (record.videoFps !== undefined) metadata.fps = record.videoFps;
  if (record.videoCodec !== undefined) metadata.videoCodec = record.videoCodec;
  if (record.audioCodec !== undefined) metadata.audioCodec = record.audioCodec;
  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

export function formatResolution(resolution: Resolution): string {
  return `${resolution.width}x${resolution.height}`;
}


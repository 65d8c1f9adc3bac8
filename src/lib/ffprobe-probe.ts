import { MediaProbe, MediaProbeResult } from '../types/media';
import { execFileCommand } from '../utils/process-utils';
import { isRecord } from '../utils/json-utils';

interface FfprobeStream {
  codecType?: string;
  codecName?: string;
  width?: number;
  height?: number;
  duration?: number;
  frameRate?: number;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * ffprobe prints most numbers as strings and "N/A" when unknown
 */
function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.toUpperCase() !== 'N/A') {
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Parse an ffprobe frame rate ("30000/1001", "25/1" or "25")
 * Returns undefined for "0/0" and other non-positive rates
 */
export function parseFrameRate(value: unknown): number | undefined {
  const text = readString(value);
  if (!text) return undefined;

  if (text.includes('/')) {
    const [numStr, denStr] = text.split('/');
    const num = parseFloat(numStr);
    const den = parseFloat(denStr);
    if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) {
      return undefined;
    }
    const rate = num / den;
    return rate > 0 ? rate : undefined;
  }

  const rate = readNumber(text);
  return rate !== undefined && rate > 0 ? rate : undefined;
}

function parseStream(value: unknown): FfprobeStream | null {
  if (!isRecord(value)) return null;
  return {
    codecType: readString(value.codec_type),
    codecName: readString(value.codec_name),
    width: readNumber(value.width),
    height: readNumber(value.height),
    duration: readNumber(value.duration),
    frameRate: parseFrameRate(value.r_frame_rate) ?? parseFrameRate(value.avg_frame_rate),
  };
}

/**
 * Extract probe fields from `ffprobe -print_format json -show_format -show_streams` output
 * @throws Error when the output is not an ffprobe JSON document or has no video stream
 */
export function parseFfprobeOutput(json: string): MediaProbeResult {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    throw new Error('ffprobe returned invalid JSON');
  }

  if (!isRecord(data)) {
    throw new Error('ffprobe returned an unexpected document');
  }

  const streams = Array.isArray(data.streams)
    ? data.streams.map(parseStream).filter((s): s is FfprobeStream => s !== null)
    : [];
  const video = streams.find((s) => s.codecType === 'video');
  const audio = streams.find((s) => s.codecType === 'audio');

  if (!video) {
    throw new Error('No video stream found');
  }

  const format = isRecord(data.format) ? data.format : {};

  return {
    duration: readNumber(format.duration) ?? video.duration,
    width: video.width,
    height: video.height,
    fps: video.frameRate,
    videoCodec: video.codecName,
    audioCodec: audio?.codecName,
  };
}

/**
 * MediaProbe backed by the ffprobe binary from FFmpeg
 */
export class FfprobeMediaProbe implements MediaProbe {
  private binary: string;

  constructor(binary = 'ffprobe') {
    this.binary = binary;
  }

  async probe(filePath: string, signal?: AbortSignal): Promise<MediaProbeResult> {
    const output = await execFileCommand(
      this.binary,
      ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', filePath],
      { signal }
    );
    return parseFfprobeOutput(output);
  }
}

import { FileRecord, Resolution, VideoMetadata, withVideoMetadata } from '../types/file-record';
import { MediaProbe, MediaProbeResult } from '../types/media';
import { ProbeError, errorMessage } from '../types/errors';
import { Logger, createSilentLogger } from './logger';

export const MIN_PROBE_SIZE = 10 * 1024; // Smaller files cannot hold a valid container

export interface MediaEnricherOptions {
  enabled: boolean;
  timeoutMs: number;
}

function toFloat(value: unknown): number | undefined {
  const number = typeof value === 'string' ? parseFloat(value) : value;
  return typeof number === 'number' && Number.isFinite(number) ? number : undefined;
}

/**
 * Validate raw probe fields: durations must be >= 0, resolution and fps > 0
 * Rejected values are left out rather than stored as zero.
 */
export function normalizeProbeResult(result: MediaProbeResult): VideoMetadata {
  const metadata: VideoMetadata = {};

  const duration = toFloat(result.duration);
  if (duration !== undefined && duration >= 0) {
    metadata.duration = duration;
  }

  const width = toFloat(result.width);
  const height = toFloat(result.height);
  if (width !== undefined && height !== undefined && width > 0 && height > 0) {
    const resolution: Resolution = { width: Math.round(width), height: Math.round(height) };
    metadata.resolution = resolution;
  }

  const fps = toFloat(result.fps);
  if (fps !== undefined && fps > 0) {
    metadata.fps = fps;
  }

  if (typeof result.videoCodec === 'string' && result.videoCodec.trim()) {
    metadata.videoCodec = result.videoCodec.trim();
  }
  if (typeof result.audioCodec === 'string' && result.audioCodec.trim()) {
    metadata.audioCodec = result.audioCodec.trim();
  }

  return metadata;
}

/**
 * Adds video metadata to records of video files through a MediaProbe
 * Probe failures and timeouts never propagate: the record comes back without video fields.
 */
export class MediaEnricher {
  private probe: MediaProbe;
  private options: MediaEnricherOptions;
  private logger: Logger;

  constructor(probe: MediaProbe, options: MediaEnricherOptions, logger?: Logger) {
    this.probe = probe;
    this.options = options;
    this.logger = logger ?? createSilentLogger();
  }

  async enrich(record: FileRecord): Promise<FileRecord> {
    if (!this.options.enabled || !record.isVideo) {
      return record;
    }

    if (record.size < MIN_PROBE_SIZE) {
      this.logger.debug('Skipping probe for small video file:', { path: record.path });
      return withVideoMetadata(record, 'skipped');
    }

    try {
      const result = await this.probeWithTimeout(record.path);
      const metadata = normalizeProbeResult(result);
      this.logger.debug('Extracted video metadata:', { path: record.path });
      return withVideoMetadata(record, 'ok', metadata);
    } catch (error) {
      this.logger.debug('Video metadata extraction failed:', {
        path: record.path,
        cause: errorMessage(error),
      });
      return withVideoMetadata(record, 'failed');
    }
  }

  private async probeWithTimeout(filePath: string): Promise<MediaProbeResult> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new ProbeError(filePath, `Probe timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([this.probe.probe(filePath, controller.signal), timeout]);
    } catch (error) {
      if (error instanceof ProbeError) throw error;
      throw new ProbeError(filePath, errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

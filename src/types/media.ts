/**
 * Raw result of a media container probe
 * Every field is optional; MediaEnricher validates ranges before accepting them.
 */
export interface MediaProbeResult {
  duration?: number;
  width?: number;
  height?: number;
  fps?: number;
  videoCodec?: string;
  audioCodec?: string;
}

export interface MediaProbe {
  /**
   * Probe a media file
   * @throws on unreadable, corrupted or non-media files
   */
  probe(filePath: string, signal?: AbortSignal): Promise<MediaProbeResult>;
}

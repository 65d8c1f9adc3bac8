import { describe, it, expect, vi } from 'vitest';
import { FfprobeMediaProbe, parseFfprobeOutput, parseFrameRate } from './ffprobe-probe';
import { execFileCommand } from '../utils/process-utils';

vi.mock('../utils/process-utils', () => ({
  execFileCommand: vi.fn(),
}));

const FULL_OUTPUT = JSON.stringify({
  streams: [
    { codec_type: 'video', codec_name: 'h264', width: 1920, height: 1080, r_frame_rate: '30/1' },
    { codec_type: 'audio', codec_name: 'aac' },
  ],
  format: { duration: '12.500000' },
});

describe('ffprobe-probe', () => {
  describe('parseFrameRate()', () => {
    it('should divide fractional rates', () => {
      expect(parseFrameRate('25/1')).toBe(25);
      expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
    });

    it('should accept plain numbers', () => {
      expect(parseFrameRate('24')).toBe(24);
    });

    it('should reject zero and malformed rates', () => {
      expect(parseFrameRate('0/0')).toBeUndefined();
      expect(parseFrameRate('0/1')).toBeUndefined();
      expect(parseFrameRate('abc')).toBeUndefined();
      expect(parseFrameRate(undefined)).toBeUndefined();
    });
  });

  describe('parseFfprobeOutput()', () => {
    it('should read duration, resolution, frame rate and codecs', () => {
      expect(parseFfprobeOutput(FULL_OUTPUT)).toEqual({
        duration: 12.5,
        width: 1920,
        height: 1080,
        fps: 30,
        videoCodec: 'h264',
        audioCodec: 'aac',
      });
    });

    it('should fall back to the stream duration and average frame rate', () => {
      const output = JSON.stringify({
        streams: [
          {
            codec_type: 'video',
            codec_name: 'vp9',
            width: 640,
            height: 360,
            duration: '8.0',
            r_frame_rate: '0/0',
            avg_frame_rate: '24/1',
          },
        ],
        format: { duration: 'N/A' },
      });

      const result = parseFfprobeOutput(output);
      expect(result.duration).toBe(8);
      expect(result.fps).toBe(24);
      expect(result.audioCodec).toBeUndefined();
    });

    it('should reject output without a video stream', () => {
      const output = JSON.stringify({ streams: [{ codec_type: 'audio', codec_name: 'mp3' }], format: {} });
      expect(() => parseFfprobeOutput(output)).toThrow('No video stream found');
    });

    it('should reject invalid JSON', () => {
      expect(() => parseFfprobeOutput('not json')).toThrow('ffprobe returned invalid JSON');
    });

    it('should reject a document that is not an object', () => {
      expect(() => parseFfprobeOutput('[]')).toThrow('ffprobe returned an unexpected document');
    });
  });

  describe('FfprobeMediaProbe.probe()', () => {
    it('should run ffprobe with JSON output and parse the result', async () => {
      vi.mocked(execFileCommand).mockResolvedValue(FULL_OUTPUT);
      const probe = new FfprobeMediaProbe();

      const result = await probe.probe('/videos/clip.mp4');

      expect(execFileCommand).toHaveBeenCalledWith(
        'ffprobe',
        ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', '/videos/clip.mp4'],
        { signal: undefined }
      );
      expect(result.videoCodec).toBe('h264');
    });

    it('should use a custom binary path', async () => {
      vi.mocked(execFileCommand).mockResolvedValue(FULL_OUTPUT);
      const probe = new FfprobeMediaProbe('/opt/ffmpeg/bin/ffprobe');

      await probe.probe('/videos/clip.mp4');

      expect(vi.mocked(execFileCommand).mock.calls[0][0]).toBe('/opt/ffmpeg/bin/ffprobe');
    });

    it('should propagate process failures', async () => {
      vi.mocked(execFileCommand).mockRejectedValue(new Error('spawn ffprobe ENOENT'));
      const probe = new FfprobeMediaProbe();

      await expect(probe.probe('/videos/clip.mp4')).rejects.toThrow('spawn ffprobe ENOENT');
    });
  });
});

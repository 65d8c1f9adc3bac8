import { FileRecord, FileRecordInput, createFileRecord } from '../../src/types/file-record';

// Noon UTC keeps local calendar dates stable across most time zones
export const FIXED_NOW = new Date('2025-06-15T12:00:00.000Z');

const HOUR_MS = 60 * 60 * 1000;

export function hoursAgo(hours: number, now: Date = FIXED_NOW): Date {
  return new Date(now.getTime() - hours * HOUR_MS);
}

export function daysAgo(days: number, now: Date = FIXED_NOW): Date {
  return hoursAgo(days * 24, now);
}

export type TestRecordInput = Partial<FileRecordInput> & { path: string };

export function createTestRecord(input: TestRecordInput): FileRecord {
  return createFileRecord({
    size: 0,
    createdTime: FIXED_NOW,
    modifiedTime: FIXED_NOW,
    ...input,
  });
}

/**
 * Three files of different age and size under /data
 */
export function createSampleRecords(now: Date = FIXED_NOW): FileRecord[] {
  return [
    createTestRecord({ path: '/data/a.txt', size: 5, createdTime: daysAgo(10, now), mimeType: 'text/plain' }),
    createTestRecord({ path: '/data/b.py', size: 3, createdTime: daysAgo(2, now), mimeType: 'text/x-python' }),
    createTestRecord({ path: '/data/c.jpg', size: 1000, createdTime: hoursAgo(1, now), mimeType: 'image/jpeg' }),
  ];
}

/**
 * Video records: three probed, one without metadata
 */
export function createVideoRecords(): FileRecord[] {
  return [
    createTestRecord({
      path: '/media/v1.mp4',
      size: 4096,
      videoProbe: 'ok',
      video: { duration: 10, resolution: { width: 1920, height: 1080 }, videoCodec: 'h264' },
    }),
    createTestRecord({
      path: '/media/v2.mkv',
      size: 8192,
      videoProbe: 'ok',
      video: { duration: 20, resolution: { width: 1920, height: 1080 }, videoCodec: 'hevc' },
    }),
    createTestRecord({
      path: '/media/v3.mp4',
      size: 2048,
      videoProbe: 'ok',
      video: { duration: 30, resolution: { width: 1280, height: 720 }, videoCodec: 'h264' },
    }),
    createTestRecord({ path: '/media/v4.mov', size: 1024, videoProbe: 'failed' }),
  ];
}

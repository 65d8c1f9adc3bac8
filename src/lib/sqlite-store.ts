import * as path from 'path';
import { open, Database } from 'sqlite';
import sqlite3 from 'sqlite3';
import {
  FileRecord,
  VideoMetadata,
  VideoProbeStatus,
  createFileRecord,
  videoMetadataOf,
} from '../types/file-record';
import { SaveResult, Store, StoreQuery, StoreRowFailure } from '../types/store';
import { ConfigError, StoreError, errorMessage } from '../types/errors';
import { ensureDir, expandHome } from '../utils/file-utils';

export const MEMORY_DATABASE = ':memory:';

// Row shape of the files ⟕ video_metadata query
interface FileRow {
  id: number;
  path: string;
  size: number;
  extension: string;
  created_time: string;
  modified_time: string;
  content_preview: string | null;
  mime_type: string | null;
  is_binary: number;
  video_probe: string | null;
  video_duration: number | null;
  resolution_width: number | null;
  resolution_height: number | null;
  video_fps: number | null;
  video_codec: string | null;
  audio_codec: string | null;
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT NOT NULL,
    name TEXT NOT NULL,
    size INTEGER NOT NULL CHECK (size >= 0),
    extension TEXT NOT NULL,
    created_time TEXT NOT NULL,
    modified_time TEXT NOT NULL,
    content_preview TEXT,
    mime_type TEXT,
    is_binary INTEGER NOT NULL,
    is_video INTEGER NOT NULL,
    video_probe TEXT,
    scan_timestamp TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS video_metadata (
    file_id INTEGER PRIMARY KEY REFERENCES files(id) ON DELETE CASCADE,
    duration REAL,
    resolution_width INTEGER,
    resolution_height INTEGER,
    fps REAL,
    video_codec TEXT,
    audio_codec TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_files_path ON files(path)',
  'CREATE INDEX IF NOT EXISTS idx_files_is_video ON files(is_video)',
];

/**
 * Resolve a connection string to an SQLite filename
 * Accepts ":memory:", "sqlite::memory:", "sqlite://<path>", "sqlite:<path>" or a plain path.
 * @throws ConfigError for empty strings or other URL schemes
 */
export function parseConnectionString(connectionString: string): string {
  const value = connectionString.trim();
  if (!value) {
    throw new ConfigError('Database connection string is empty');
  }

  let filename = value;
  if (value.startsWith('sqlite://')) {
    filename = value.slice('sqlite://'.length);
  } else if (value.startsWith('sqlite:')) {
    filename = value.slice('sqlite:'.length);
  } else {
    const scheme = value.match(/^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//);
    if (scheme) {
      throw new ConfigError(`Unsupported database connection string scheme: ${scheme[1]}:// (expected sqlite:)`);
    }
  }

  if (!filename) {
    throw new ConfigError(`Database connection string has no path: ${connectionString}`);
  }
  return filename === MEMORY_DATABASE ? MEMORY_DATABASE : expandHome(filename);
}

/**
 * Extension filter values as stored: lowercase with a leading dot ("MP4" → ".mp4")
 */
export function normalizeExtensionFilter(extensions: readonly string[]): string[] {
  return extensions
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

function parseProbeStatus(value: string | null): VideoProbeStatus | undefined {
  return value === 'skipped' || value === 'ok' || value === 'failed' ? value : undefined;
}

function rowToRecord(row: FileRow): FileRecord {
  const video: VideoMetadata = {};
  if (row.video_duration !== null) video.duration = row.video_duration;
  if (
    row.resolution_width !== null &&
    row.resolution_height !== null &&
    row.resolution_width > 0 &&
    row.resolution_height > 0
  ) {
    video.resolution = { width: row.resolution_width, height: row.resolution_height };
  }
  if (row.video_fps !== null) video.fps = row.video_fps;
  if (row.video_codec !== null) video.videoCodec = row.video_codec;
  if (row.audio_codec !== null) video.audioCodec = row.audio_codec;

  return createFileRecord({
    path: row.path,
    size: row.size,
    extension: row.extension,
    createdTime: new Date(row.created_time),
    modifiedTime: new Date(row.modified_time),
    contentPreview: row.content_preview ?? undefined,
    mimeType: row.mime_type ?? undefined,
    isBinary: row.is_binary === 1,
    videoProbe: parseProbeStatus(row.video_probe),
    video,
  });
}

/**
 * Store backed by a local SQLite database
 */
export class SqliteStore implements Store {
  private db: Database | null = null;
  private filename: string;

  constructor(filename: string) {
    this.filename = filename;
  }

  static fromConnectionString(connectionString: string): SqliteStore {
    return new SqliteStore(parseConnectionString(connectionString));
  }

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;

    try {
      if (this.filename !== MEMORY_DATABASE) {
        await ensureDir(path.dirname(path.resolve(this.filename)));
      }
      const db = await open({ filename: this.filename, driver: sqlite3.Database });
      await db.exec('PRAGMA foreign_keys = ON');
      this.db = db;
      return db;
    } catch (error) {
      throw new StoreError(`Failed to open database ${this.filename}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async testConnection(): Promise<void> {
    const db = await this.getDb();
    try {
      await db.get('SELECT 1');
    } catch (error) {
      throw new StoreError(`Database connection failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Create the schema; with rebuild, drop existing tables first (all data is lost)
   */
  async initialize(options: { rebuild?: boolean } = {}): Promise<void> {
    const db = await this.getDb();
    try {
      if (options.rebuild) {
        await db.exec('DROP TABLE IF EXISTS video_metadata');
        await db.exec('DROP TABLE IF EXISTS files');
      }
      for (const statement of SCHEMA) {
        await db.exec(statement);
      }
    } catch (error) {
      throw new StoreError(`Failed to initialize database schema: ${errorMessage(error)}`, { cause: error });
    }
  }

  async save(records: readonly FileRecord[], scanTimestamp: Date = new Date()): Promise<SaveResult> {
    if (records.length === 0) {
      return { savedCount: 0, failures: [] };
    }

    const db = await this.getDb();
    const failures: StoreRowFailure[] = [];
    let savedCount = 0;

    try {
      await db.exec('BEGIN');
    } catch (error) {
      throw new StoreError(`Failed to start transaction: ${errorMessage(error)}`, { cause: error });
    }

    try {
      for (const record of records) {
        await db.exec('SAVEPOINT save_row');
        try {
          await this.insertRecord(db, record, scanTimestamp);
          await db.exec('RELEASE save_row');
          savedCount++;
        } catch (error) {
          await db.exec('ROLLBACK TO save_row');
          await db.exec('RELEASE save_row');
          failures.push({ path: record.path, error: errorMessage(error) });
        }
      }
      await db.exec('COMMIT');
    } catch (error) {
      await db.exec('ROLLBACK').catch(() => undefined);
      throw new StoreError(`Failed to save records: ${errorMessage(error)}`, { cause: error });
    }

    return { savedCount, failures };
  }

  private async insertRecord(db: Database, record: FileRecord, scanTimestamp: Date): Promise<void> {
    const result = await db.run(
      `INSERT INTO files (
        path, name, size, extension, created_time, modified_time,
        content_preview, mime_type, is_binary, is_video, video_probe, scan_timestamp
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      record.path,
      record.name,
      record.size,
      record.extension,
      record.createdTime.toISOString(),
      record.modifiedTime.toISOString(),
      record.contentPreview ?? null,
      record.mimeType ?? null,
      record.isBinary ? 1 : 0,
      record.isVideo ? 1 : 0,
      record.videoProbe ?? null,
      scanTimestamp.toISOString()
    );

    const video = record.isVideo ? videoMetadataOf(record) : undefined;
    if (!video) return;

    if (result.lastID === undefined) {
      throw new Error('Insert did not return a row id');
    }

    await db.run(
      `INSERT INTO video_metadata (
        file_id, duration, resolution_width, resolution_height, fps, video_codec, audio_codec
      ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      result.lastID,
      video.duration ?? null,
      video.resolution?.width ?? null,
      video.resolution?.height ?? null,
      video.fps ?? null,
      video.videoCodec ?? null,
      video.audioCodec ?? null
    );
  }

  async query(query: StoreQuery): Promise<FileRecord[]> {
    const db = await this.getDb();
    let sql = `
      SELECT f.id, f.path, f.size, f.extension, f.created_time, f.modified_time,
             f.content_preview, f.mime_type, f.is_binary, f.video_probe,
             v.duration AS video_duration,
             v.resolution_width,
             v.resolution_height,
             v.fps AS video_fps,
             v.video_codec,
             v.audio_codec
      FROM files f
      LEFT JOIN video_metadata v ON f.id = v.file_id
      WHERE 1=1`;
    const params: Array<string | number> = [];

    if (query.videoOnly) {
      sql += ' AND f.is_video = 1';
    }

    const extensions = normalizeExtensionFilter(query.extensions ?? []);
    if (extensions.length > 0) {
      sql += ` AND f.extension IN (${extensions.map(() => '?').join(', ')})`;
      params.push(...extensions);
    }

    sql += ' ORDER BY f.path LIMIT ?';
    params.push(query.limit);

    try {
      const rows = await db.all<FileRow[]>(sql, params);
      return rows.map(rowToRecord);
    } catch (error) {
      throw new StoreError(`Failed to query files: ${errorMessage(error)}`, { cause: error });
    }
  }

  async count(videoOnly = false): Promise<number> {
    const db = await this.getDb();
    const sql = videoOnly
      ? 'SELECT COUNT(*) AS count FROM files WHERE is_video = 1'
      : 'SELECT COUNT(*) AS count FROM files';
    try {
      const row = await db.get<{ count: number }>(sql);
      return row?.count ?? 0;
    } catch (error) {
      throw new StoreError(`Failed to count files: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Delete every file row; video metadata goes with it through the cascade
   */
  async deleteAll(): Promise<number> {
    const db = await this.getDb();
    try {
      const result = await db.run('DELETE FROM files');
      return result.changes ?? 0;
    } catch (error) {
      throw new StoreError(`Failed to delete files: ${errorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
    }
  }
}

import { FileRecord } from './file-record';

export interface StoreQuery {
  limit: number;
  videoOnly?: boolean;
  extensions?: string[];   // Matched against the stored lowercase extension
}

export interface StoreRowFailure {
  path: string;
  error: string;
}

export interface SaveResult {
  savedCount: number;
  failures: StoreRowFailure[];
}

/**
 * Persistence collaborator for scanned records
 * A failed row never aborts a batch: it is rolled back and listed in SaveResult.failures.
 */
export interface Store {
  initialize(options?: { rebuild?: boolean }): Promise<void>;
  testConnection(): Promise<void>;
  save(records: readonly FileRecord[], scanTimestamp?: Date): Promise<SaveResult>;
  query(query: StoreQuery): Promise<FileRecord[]>;
  count(videoOnly?: boolean): Promise<number>;
  deleteAll(): Promise<number>;
  close(): Promise<void>;
}

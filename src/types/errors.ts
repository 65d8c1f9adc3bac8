export type ErrorKind = 'path' | 'classification' | 'probe' | 'store' | 'config';

/**
 * Base class for every failure the scanner reports
 * Per-file kinds (path, classification, probe) are absorbed into ScanFailure values;
 * only directory-root, store and config errors are thrown to the caller.
 */
export class FileInsightsError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class PathError extends FileInsightsError {
  readonly path: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('path', message, options);
    this.path = filePath;
  }
}

export class ProbeError extends FileInsightsError {
  readonly path: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('probe', message, options);
    this.path = filePath;
  }
}

export class StoreError extends FileInsightsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store', message, options);
  }
}

export class ConfigError extends FileInsightsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

/**
 * A per-file problem that was absorbed during a scan
 */
export interface ScanFailure {
  path: string;
  kind: ErrorKind;
  message: string;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Errno code of a Node.js system error, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

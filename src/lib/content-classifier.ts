import * as fs from 'fs/promises';
import mime from 'mime-types';
import { extractExtension } from '../types/file-record';
import { errorMessage } from '../types/errors';
import { Logger, createSilentLogger } from './logger';

export const MAX_PREVIEW_CHARS = 1000;
export const MAX_PREVIEW_FILE_SIZE = 1024 * 1024; // 1 MiB
const MAX_BYTES_PER_CHAR = 4;
const NON_PRINTABLE_RATIO = 0.1;

/**
 * Extensions never sniffed for a preview
 */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  // Images
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.ico', '.svg', '.webp', '.tiff',
  // Audio / video
  '.mp3', '.wav', '.flac', '.ogg', '.mp4', '.avi', '.mov', '.mkv', '.wmv', '.webm',
  // Archives
  '.zip', '.tar', '.gz', '.rar', '.7z', '.bz2', '.xz',
  // Executables and libraries
  '.exe', '.dll', '.so', '.dylib', '.bin', '.class',
  // Documents
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx',
]);

// Source files the MIME database misses or maps to a non-text type (.ts is video/mp2t there)
const MIME_OVERRIDES: Record<string, string> = {
  '.ts': 'text/x-typescript',
  '.tsx': 'text/x-typescript',
  '.mts': 'text/x-typescript',
  '.cts': 'text/x-typescript',
  '.js': 'text/javascript',
  '.mjs': 'text/javascript',
  '.cjs': 'text/javascript',
  '.py': 'text/x-python',
  '.rs': 'text/x-rust',
  '.go': 'text/x-go',
  '.rb': 'text/x-ruby',
  '.sh': 'text/x-shellscript',
  '.toml': 'text/x-toml',
};

// MIME types whose content is worth sniffing for a preview
const PREVIEWABLE_MIME_PREFIXES = ['text/', 'application/json', 'application/xml'];

export function isPreviewableMime(mimeType: string): boolean {
  return PREVIEWABLE_MIME_PREFIXES.some((prefix) => mimeType.startsWith(prefix));
}

export interface Classification {
  mimeType?: string;
  isBinary: boolean;
  preview?: string;
  error?: string;   // Read or decode failure, absorbed
}

/**
 * Best-effort MIME type from the file extension
 */
export function guessMimeType(filePath: string): string | undefined {
  const extension = extractExtension(filePath);
  if (!extension) return undefined;
  return MIME_OVERRIDES[extension] ?? (mime.lookup(extension) || undefined);
}

/**
 * Decode a byte prefix as UTF-8, falling back to latin1 on invalid sequences
 * A multi-byte sequence cut off at the end of the buffer is not an error.
 */
export function decodePreview(bytes: Uint8Array): string {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes, { stream: true });
  } catch {
    text = Buffer.from(bytes).toString('latin1');
  }
  return Array.from(text).slice(0, MAX_PREVIEW_CHARS).join('');
}

/**
 * True if decoded text contains NUL or more than 10% control characters
 * (tab, newline and carriage return are printable here)
 */
export function looksBinary(text: string): boolean {
  if (text.includes('\0')) return true;

  const chars = Array.from(text);
  if (chars.length === 0) return false;

  let nonPrintable = 0;
  for (const char of chars) {
    const code = char.charCodeAt(0);
    if (code < 32 && char !== '\n' && char !== '\r' && char !== '\t') {
      nonPrintable++;
    }
  }

  return nonPrintable > chars.length * NON_PRINTABLE_RATIO;
}

export class ContentClassifier {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Determine MIME type, binary verdict and text preview for one file
   * Never throws: read failures yield no preview and a non-binary verdict.
   */
  async classify(filePath: string, size: number): Promise<Classification> {
    const mimeType = guessMimeType(filePath);
    const extension = extractExtension(filePath);

    const likelyBinary =
      BINARY_EXTENSIONS.has(extension) ||
      (mimeType !== undefined && !isPreviewableMime(mimeType));

    if (likelyBinary) {
      return { mimeType, isBinary: true };
    }

    if (size >= MAX_PREVIEW_FILE_SIZE) {
      return { mimeType, isBinary: false };
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.readPrefix(filePath, Math.min(size, MAX_PREVIEW_CHARS * MAX_BYTES_PER_CHAR));
    } catch (error) {
      const message = errorMessage(error);
      this.logger.debug('Preview unavailable:', { path: filePath, cause: message });
      return { mimeType, isBinary: false, error: message };
    }

    const preview = decodePreview(bytes);
    if (looksBinary(preview)) {
      return { mimeType, isBinary: true };
    }

    return { mimeType, isBinary: false, preview };
  }

  private async readPrefix(filePath: string, length: number): Promise<Uint8Array> {
    const fileHandle = await fs.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await fileHandle.read(buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await fileHandle.close();
    }
  }
}

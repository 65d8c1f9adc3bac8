import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { errorMessage } from '../types/errors';

/**
 * Ensure a directory exists, creating parents as needed
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
}

/**
 * Write a text file atomically: write a sibling temp file, then rename over the target
 * The parent directory is created first. The temp file is removed if anything fails.
 */
export async function writeTextAtomic(filePath: string, content: string): Promise<void> {
  const target = path.resolve(filePath);
  await ensureDir(path.dirname(target));

  const tempPath = `${target}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.error(`Failed to remove ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw error;
  }
}

/**
 * Read and parse a JSON file; the caller validates the shape
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  return JSON.parse(content);
}

/**
 * Default config file path (~/.file-insights/config.json)
 */
export function getConfigFilePath(): string {
  return path.join(os.homedir(), '.file-insights', 'config.json');
}

/**
 * Expand a leading ~ to the home directory
 * Example: "~/reports/a.json" → "/home/me/reports/a.json"
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface ExecFileOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  maxBuffer?: number;
}

/**
 * Run a binary with arguments (no shell) and return stdout
 * Throws on non-zero exit code, timeout or abort
 */
export async function execFileCommand(
  file: string,
  args: string[],
  options: ExecFileOptions = {}
): Promise<string> {
  const { stdout } = await execFileAsync(file, args, {
    signal: options.signal,
    timeout: options.timeoutMs,
    maxBuffer: options.maxBuffer ?? 10 * 1024 * 1024,
    encoding: 'utf8',
  });
  return stdout.trim();
}

/**
 * Check if a command exists in PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  try {
    await execFileAsync(process.platform === 'win32' ? 'where' : 'which', [command]);
    return true;
  } catch {
    return false;
  }
}

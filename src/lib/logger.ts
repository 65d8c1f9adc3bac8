import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  path?: string;   // File the entry is about
  cause?: string;
}

export interface LoggerOptions {
  verbose?: boolean;       // Print debug entries
  silent?: boolean;        // Suppress console output entirely
  logFilePath?: string;    // Append JSON lines here
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export class Logger {
  private verbose: boolean;
  private silent: boolean;
  private logFilePath?: string;
  private pendingWrites: Promise<void> = Promise.resolve();

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.logFilePath = options.logFilePath;
  }

  get isVerbose(): boolean {
    return this.verbose;
  }

  debug(message: string, details?: { path?: string; cause?: string }): void {
    this.log('debug', message, details);
  }

  info(message: string, details?: { path?: string; cause?: string }): void {
    this.log('info', message, details);
  }

  warn(message: string, details?: { path?: string; cause?: string }): void {
    this.log('warn', message, details);
  }

  error(message: string, details?: { path?: string; cause?: string }): void {
    this.log('error', message, details);
  }

  /**
   * Wait until every queued file write has been attempted
   */
  async flush(): Promise<void> {
    await this.pendingWrites;
  }

  private log(level: LogLevel, message: string, details?: { path?: string; cause?: string }): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...details,
    };

    if (!this.silent && (level !== 'debug' || this.verbose)) {
      const line = Logger.formatHumanReadable(entry);
      if (level === 'warn' || level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    }

    // File log keeps debug entries only in verbose mode, like the console
    if (this.logFilePath && (level !== 'debug' || this.verbose)) {
      this.appendToFile(this.logFilePath, entry);
    }
  }

  private appendToFile(logFilePath: string, entry: LogEntry): void {
    const jsonLog = JSON.stringify(entry) + '\n';
    this.pendingWrites = this.pendingWrites.then(async () => {
      try {
        await fs.mkdir(path.dirname(logFilePath), { recursive: true });
        await fs.appendFile(logFilePath, jsonLog, 'utf-8');
      } catch (error) {
        console.error('[Logger] Failed to write to log file:', error);
      }
    });
  }

  /**
   * Format log entry for human reading (console output)
   */
  static formatHumanReadable(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    let line = color(entry.message);

    if (entry.path) {
      line += ` ${entry.path}`;
    }

    if (entry.cause) {
      line += chalk.dim(` (${entry.cause})`);
    }

    return line;
  }
}

/**
 * Logger that discards everything, for library callers that pass none
 */
export function createSilentLogger(): Logger {
  return new Logger({ silent: true });
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { LogEntry, Logger, createSilentLogger } from './logger';
import { createTempDir, removeTempDir } from '../../tests/fixtures/temp-dir';

async function readEntries(logFilePath: string): Promise<LogEntry[]> {
  const content = await fs.readFile(logFilePath, 'utf-8');
  return content
    .trim()
    .split('\n')
    .map((line): LogEntry => JSON.parse(line));
}

function spyConsole() {
  return {
    logSpy: vi.spyOn(console, 'log').mockImplementation(() => {}),
    errorSpy: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

describe('Logger', () => {
  describe('console output', () => {
    it('should hide debug entries unless verbose', () => {
      const { logSpy } = spyConsole();

      new Logger().debug('hidden');
      expect(logSpy).not.toHaveBeenCalled();

      new Logger({ verbose: true }).debug('shown');
      expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it('should send warnings and errors to stderr', () => {
      const { logSpy, errorSpy } = spyConsole();
      const logger = new Logger();

      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(2);
    });

    it('should print nothing when silent', () => {
      const { logSpy, errorSpy } = spyConsole();
      const logger = createSilentLogger();

      logger.error('nothing');

      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe('formatHumanReadable()', () => {
    it('should append the path and cause', () => {
      const line = Logger.formatHumanReadable({
        timestamp: '2025-06-15T12:00:00.000Z',
        level: 'warn',
        message: 'Cannot read',
        path: '/data/a.txt',
        cause: 'EACCES',
      });

      expect(line).toContain('Cannot read');
      expect(line).toContain(' /data/a.txt');
      expect(line).toContain('(EACCES)');
    });
  });

  describe('log file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('should append JSON lines', async () => {
      const logFilePath = path.join(dir, 'logs', 'scan.log');
      const logger = new Logger({ silent: true, logFilePath });

      logger.info('Scan started');
      logger.warn('Skipping file', { path: '/data/x.bin', cause: 'EACCES' });
      logger.debug('not written without verbose');
      await logger.flush();

      const entries = await readEntries(logFilePath);
      expect(entries.map((e) => [e.level, e.message])).toEqual([
        ['info', 'Scan started'],
        ['warn', 'Skipping file'],
      ]);
      expect(entries[1]).toMatchObject({ path: '/data/x.bin', cause: 'EACCES' });
    });

    it('should keep debug entries when verbose', async () => {
      const logFilePath = path.join(dir, 'scan.log');
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new Logger({ verbose: true, logFilePath });

      logger.debug('walking');
      await logger.flush();

      expect((await readEntries(logFilePath)).map((e) => e.message)).toEqual(['walking']);
    });
  });
});

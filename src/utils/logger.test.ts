import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { configureLogger, formatLogEntry, getLogFilePath, logError, logger, resetLogger } from './logger.js';

describe('logger', () => {
  let logDir: string;
  let run = 0;

  beforeEach(() => {
    logDir = join(tmpdir(), `gridpaint-logger-test-${process.pid}-${run++}`);
    configureLogger({ dir: logDir, level: 'info' });
  });

  afterEach(() => {
    resetLogger();
    rmSync(logDir, { recursive: true, force: true });
  });

  function logLines(): string[] {
    const file = getLogFilePath();
    if (!existsSync(file)) return [];
    return readFileSync(file, 'utf-8').trim().split('\n');
  }

  describe('formatLogEntry', () => {
    it('should format level, message and data', () => {
      const line = formatLogEntry({
        timestamp: '2026-01-02T03:04:05.000Z',
        level: 'warn',
        message: 'slow frame',
        data: { ms: 40 },
      });

      expect(line).toBe('[2026-01-02T03:04:05.000Z] [WARN] slow frame {"ms":40}\n');
    });

    it('should leave out missing data', () => {
      expect(formatLogEntry({ timestamp: 't', level: 'info', message: 'ready' })).toBe('[t] [INFO] ready\n');
    });
  });

  describe('getLogFilePath', () => {
    it('should name the file after the day', () => {
      expect(getLogFilePath(new Date('2026-01-02T10:00:00Z'))).toBe(join(logDir, 'gridpaint-2026-01-02.log'));
    });
  });

  describe('levels', () => {
    it('should write entries at or above the threshold', () => {
      logger.debug('hidden');
      logger.info('shown', { frame: 1 });
      logger.error('failed');

      const lines = logLines();
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[[^\]]+\] \[INFO\] shown \{"frame":1\}$/);
      expect(lines[1]).toMatch(/^\[[^\]]+\] \[ERROR\] failed$/);
    });

    it('should write nothing when silent', () => {
      configureLogger({ level: 'silent' });
      logger.error('quiet');

      expect(logLines()).toEqual([]);
    });
  });

  describe('logError', () => {
    it('should log errors with context and stack', () => {
      logError(new Error('bad frame'), 'render');

      const [line] = logLines();
      expect(line).toContain('[ERROR] bad frame {"context":"render","name":"Error","stack":"Error: bad frame');
    });

    it('should stringify non-errors', () => {
      logError('oops');

      expect(logLines()).toHaveLength(1);
      expect(logLines()[0]).toMatch(/\[ERROR\] oops \{\}$/);
    });
  });
});

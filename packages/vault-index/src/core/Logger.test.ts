/**
 * Tests for Logger class.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  Logger,
  LogLevel,
  ModuleLogger,
  parseLogLevel,
  isLogEntry,
  type LogEntry,
} from './Logger.js';

describe('Logger', () => {
  let lines: string[];
  let logger: Logger;

  beforeEach(() => {
    lines = [];
    logger = new Logger(
      { level: LogLevel.DEBUG, timestamps: false },
      (line) => lines.push(line),
    );
  });

  describe('Configuration', () => {
    it('should use default configuration', () => {
      const config = new Logger().getConfig();

      expect(config.level).toBe(LogLevel.INFO);
      expect(config.console).toBe(true);
      expect(config.json).toBe(false);
      expect(config.modules).toEqual([]);
    });

    it('should update configuration at runtime', () => {
      logger.setLevel(LogLevel.ERROR);
      logger.configure({ modules: ['Indexer'] });

      expect(logger.getConfig().level).toBe(LogLevel.ERROR);
      expect(logger.getConfig().modules).toEqual(['Indexer']);
    });
  });

  describe('Log Levels', () => {
    it('should respect log level filtering', () => {
      logger.setLevel(LogLevel.WARN);

      logger.debug('Test', 'debug');
      logger.info('Test', 'info');
      logger.warn('Test', 'warn');
      logger.error('Test', 'error');

      expect(lines).toEqual(['WARN  [Test] warn', 'ERROR [Test] error']);
    });

    it('should log nothing at SILENT', () => {
      logger.setLevel(LogLevel.SILENT);
      logger.fatal('Test', 'fatal');
      expect(lines).toEqual([]);
    });

    it('should filter by module', () => {
      logger.configure({ modules: ['Coordinator'] });

      logger.info('Coordinator', 'kept');
      logger.info('Indexer', 'dropped');

      expect(lines).toEqual(['INFO  [Coordinator] kept']);
    });
  });

  describe('Formatting', () => {
    it('should append structured data as JSON', () => {
      logger.info('Test', 'claimed', { holderId: 'a' });
      expect(lines).toEqual(['INFO  [Test] claimed {"holderId":"a"}']);
    });

    it('should emit JSON lines in json mode', () => {
      logger.configure({ json: true });
      logger.warn('Test', 'hello', { n: 1 });

      const parsed: unknown = JSON.parse(lines[0]);
      expect(isLogEntry(parsed)).toBe(true);
      expect(parsed).toMatchObject({
        level: LogLevel.WARN,
        levelName: 'WARN',
        module: 'Test',
        message: 'hello',
        data: { n: 1 },
      });
    });
  });

  describe('Forwarded entries', () => {
    it('should write entries produced elsewhere', () => {
      const entry: LogEntry = {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: LogLevel.ERROR,
        levelName: 'ERROR',
        module: 'Worker',
        message: 'boom',
      };
      logger.write(entry);
      expect(lines).toEqual(['ERROR [Worker] boom']);
    });

    it('should apply the level filter to forwarded entries', () => {
      logger.setLevel(LogLevel.ERROR);
      logger.write({
        timestamp: '2026-01-01T00:00:00.000Z',
        level: LogLevel.INFO,
        levelName: 'INFO',
        module: 'Worker',
        message: 'quiet',
      });
      expect(lines).toEqual([]);
    });
  });

  describe('Timers', () => {
    it('should return -1 for unknown timers', () => {
      expect(logger.endTimer('missing', 'Test', 'done')).toBe(-1);
      expect(lines).toEqual(["WARN  [Logger] Timer 'missing' not found"]);
    });

    it('should measure async functions', async () => {
      const result = await logger.measure('op', 'Test', async () => 42);
      expect(result).toBe(42);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/^DEBUG \[Test\] op completed \(\d+(\.\d+)?ms\)$/);
    });
  });

  describe('File output', () => {
    let logPath: string;

    beforeEach(() => {
      logPath = join(tmpdir(), `vault-index-logger-${randomUUID()}`, 'out.log');
    });

    afterEach(async () => {
      await rm(join(logPath, '..'), { recursive: true, force: true });
    });

    it('should append JSON lines to the log file', async () => {
      logger.configure({ console: false, filePath: logPath });
      logger.info('Test', 'one');
      logger.info('Test', 'two');
      await logger.close();

      const content = await readFile(logPath, 'utf8');
      const messages = content
        .trim()
        .split('\n')
        .map((line) => {
          const parsed: unknown = JSON.parse(line);
          return isLogEntry(parsed) ? parsed.message : null;
        });
      expect(messages).toEqual(['one', 'two']);
    });
  });
});

describe('ModuleLogger', () => {
  it('should prefix the bound module', () => {
    const lines: string[] = [];
    const logger = new Logger({ timestamps: false }, (line) => lines.push(line));
    const log = logger.child('Searcher');

    expect(log).toBeInstanceOf(ModuleLogger);
    log.info('search:done');

    expect(lines).toEqual(['INFO  [Searcher] search:done']);
  });
});

describe('parseLogLevel', () => {
  it('should parse known names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Warning')).toBe(LogLevel.WARN);
    expect(parseLogLevel('off')).toBe(LogLevel.SILENT);
  });

  it('should default to INFO', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});

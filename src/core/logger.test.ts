import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  NEVER_LOG_FIELDS,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Logger', () => {
  let sink: LogSink;
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    sink = test.sink;
    entries = test.entries;
    configureLogging({ level: 'debug', sink });
  });

  afterEach(() => {
    resetLogging();
  });

  // -----------------------------------------------------------------------
  // Log entry structure
  // -----------------------------------------------------------------------

  describe('log entry structure', () => {
    it('writes level, component and msg', () => {
      const logger = createLogger('dispatcher');
      logger.info('test message');

      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe('info');
      expect(entries[0].component).toBe('dispatcher');
      expect(entries[0].msg).toBe('test message');
    });

    it('timestamp is ISO 8601 format', () => {
      const logger = createLogger('dispatcher');
      logger.info('test');

      const ts = entries[0].ts;
      expect(new Date(ts).toISOString()).toBe(ts);
    });

    it('includes optional metadata when provided', () => {
      const logger = createLogger('guest');
      logger.info('loaded', { nodeType: 'word-count', pages: 1 });

      expect(entries[0].meta).toEqual({ nodeType: 'word-count', pages: 1 });
    });

    it('omits meta field when no metadata is provided', () => {
      const logger = createLogger('guest');
      logger.info('simple message');

      expect(entries[0].meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Level filtering
  // -----------------------------------------------------------------------

  describe('level filtering', () => {
    it('filters out debug when level is info', () => {
      configureLogging({ level: 'info', sink });
      const logger = createLogger('guest');

      logger.debug('should be filtered');
      logger.info('should appear');

      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe('info');
    });

    it('only shows warn and error when level is warn', () => {
      configureLogging({ level: 'warn', sink });
      const logger = createLogger('guest');

      logger.debug('filtered');
      logger.info('filtered');
      logger.warn('visible');
      logger.error('visible');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('resetLogging restores the info level', () => {
      const logger = createLogger('guest');

      resetLogging();
      configureLogging({ sink });

      logger.debug('filtered at default level');
      logger.info('visible');

      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe('info');
    });
  });

  // -----------------------------------------------------------------------
  // Promoted fields
  // -----------------------------------------------------------------------

  describe('promoted fields', () => {
    it('lifts node, phase, duration_ms, ok and error_code to top level', () => {
      const logger = createLogger('dispatcher');
      logger.debug('phase completed', {
        node: 'word-count',
        phase: 'post',
        duration_ms: 3,
        ok: false,
        error_code: 'MISSING_EXEC_RESULT',
        attempt: 1,
      });

      const entry = entries[0];
      expect(entry.node).toBe('word-count');
      expect(entry.phase).toBe('post');
      expect(entry.duration_ms).toBe(3);
      expect(entry.ok).toBe(false);
      expect(entry.error_code).toBe('MISSING_EXEC_RESULT');
      expect(entry.meta).toEqual({ attempt: 1 });
    });

    it('applies bound context from withContext', () => {
      const logger = createLogger('dispatcher').withContext({ node: 'word-count', phase: 'exec' });
      logger.info('running');

      expect(entries[0].node).toBe('word-count');
      expect(entries[0].phase).toBe('exec');
    });

    it('child loggers extend the component name and keep the context', () => {
      const logger = createLogger('guest').withContext({ node: 'echo' }).child('arena');
      logger.info('grown');

      expect(entries[0].component).toBe('guest:arena');
      expect(entries[0].node).toBe('echo');
    });
  });

  // -----------------------------------------------------------------------
  // Metadata sanitization
  // -----------------------------------------------------------------------

  describe('metadata sanitization', () => {
    it('never logs payload fields', () => {
      const logger = createLogger('guest');
      logger.info('call', { text: 'private words', input: { a: 1 }, bytes: 12 });

      expect(entries[0].meta).toEqual({ bytes: 12 });
    });

    it('covers every payload key in NEVER_LOG_FIELDS', () => {
      expect([...NEVER_LOG_FIELDS].sort()).toEqual([
        'cleaned_text',
        'config',
        'input',
        'original_text',
        'output',
        'text',
      ]);
    });

    it('truncates long string values', () => {
      const logger = createLogger('guest');
      logger.info('long', { detail: 'x'.repeat(META_STRING_MAX_LENGTH + 10) });

      const detail = entries[0].meta?.['detail'];
      expect(detail).toBe('x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('serializes Error values', () => {
      const logger = createLogger('guest');
      logger.error('failed', { err: new TypeError('boom') });

      expect(entries[0].meta?.['err']).toMatchObject({ name: 'TypeError', message: 'boom' });
    });
  });
});

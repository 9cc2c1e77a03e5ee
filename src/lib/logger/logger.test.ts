/**
 * Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, formatError, formatPrefix, getLogLevel } from './logger';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  describe('getLogLevel', () => {
    it('reads LOG_LEVEL case-insensitively', () => {
      process.env.LOG_LEVEL = 'WARN';
      expect(getLogLevel()).toBe('warn');
    });

    it('ignores unknown levels', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(['debug', 'info']).toContain(getLogLevel());
    });
  });

  describe('level filtering', () => {
    it('drops messages below the configured level', () => {
      process.env.LOG_LEVEL = 'warn';
      const logger = createLogger('Test');

      logger.info('hidden');
      logger.warn('shown');

      expect(console.info).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('prefixes messages with the service name', () => {
      process.env.LOG_LEVEL = 'debug';
      createLogger('Test').info('hello');

      const [message] = vi.mocked(console.info).mock.calls[0];
      expect(message).toMatch(/ INFO \[Test\] hello$/);
    });
  });

  describe('child', () => {
    it('adds the source to the prefix', () => {
      process.env.LOG_LEVEL = 'debug';
      createLogger('Test').child({ source: 'http://a' }).info('hello');

      const [message] = vi.mocked(console.info).mock.calls[0];
      expect(message).toMatch(/ INFO \[Test\]\[http:\/\/a\] hello$/);
    });
  });

  describe('formatPrefix', () => {
    it('omits the service when there is none', () => {
      expect(
        formatPrefix({ timestamp: '2024-01-01T00:00:00.000Z', level: 'error', message: 'x' })
      ).toBe('2024-01-01T00:00:00.000Z ERROR');
    });
  });

  describe('formatError', () => {
    it('formats Error instances', () => {
      const formatted = formatError(new TypeError('boom'));
      expect(formatted?.name).toBe('TypeError');
      expect(formatted?.message).toBe('boom');
    });

    it('formats plain values', () => {
      expect(formatError('oops')).toEqual({ name: 'UnknownError', message: 'oops' });
      expect(formatError(undefined)).toBeUndefined();
    });
  });
});

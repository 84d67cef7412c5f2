/**
 * Tests for loggers and redaction
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, InMemoryLogger, LogLevel, NoopLogger, redactSensitive } from '../logging.js';

describe('redactSensitive', () => {
  it('should redact credentials', () => {
    expect(
      redactSensitive({ apiKey: 'test-key', 'X-API-Key': 'test-key', authorization: 'Bearer x' })
    ).toEqual({ apiKey: '[REDACTED]', 'X-API-Key': '[REDACTED]', authorization: '[REDACTED]' });
  });

  it('should strip presigned query strings', () => {
    expect(
      redactSensitive({ url: 'https://storage.test/raw/a.mp3?X-Amz-Signature=abc', note: 'a?b' })
    ).toEqual({ url: 'https://storage.test/raw/a.mp3?[REDACTED]', note: 'a?b' });
  });

  it('should recurse into nested objects', () => {
    expect(redactSensitive({ headers: { 'x-api-key': 'test-key', accept: '*/*' } })).toEqual({
      headers: { 'x-api-key': '[REDACTED]', accept: '*/*' },
    });
  });
});

describe('InMemoryLogger', () => {
  it('should share entries with children', () => {
    const logger = new InMemoryLogger({ component: 'client' });
    const child = logger.child({ upload: 1 });

    logger.info('parent');
    child.debug('child', { state: 'Idle' });

    expect(logger.getLogs().map((entry) => entry.message)).toEqual(['parent', 'child']);
    expect(logger.getLogsByLevel(LogLevel.Debug)[0]?.context).toEqual({
      component: 'client',
      upload: 1,
      state: 'Idle',
    });
  });

  it('should clear entries', () => {
    const logger = new InMemoryLogger();
    logger.warn('x');
    logger.clear();

    expect(logger.getLogs()).toEqual([]);
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should filter below the configured level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Warn, format: 'json' });

    logger.info('hidden');
    logger.error('shown', { apiKey: 'test-key' });

    expect(spy).toHaveBeenCalledTimes(1);
    const line = spy.mock.calls[0]?.[0];
    expect(typeof line === 'string' ? JSON.parse(line) : undefined).toMatchObject({
      level: 'ERROR',
      message: 'shown',
      apiKey: '[REDACTED]',
    });
  });

  it('should prefix pretty lines with the level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleLogger({ context: { upload: 'a' } }).info('hello');

    const line = spy.mock.calls[0]?.[0];
    expect(typeof line === 'string' && line.endsWith('] INFO: hello {"upload":"a"}')).toBe(true);
  });
});

describe('NoopLogger', () => {
  it('should return itself as child', () => {
    const logger = new NoopLogger();
    expect(logger.child({ a: 1 })).toBe(logger);
  });
});

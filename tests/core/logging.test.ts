import { afterEach, describe, expect, test, vi } from 'vitest';
import { configure, resetConfig } from '../../src/core/config';
import {
  type LogEntry,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  getLogger,
  isLevelEnabled,
  setLogger,
  withContext,
} from '../../src/core/logging';

describe('logging', () => {
  afterEach(() => {
    setLogger(null);
    resetConfig();
    vi.restoreAllMocks();
  });

  test('level filtering', () => {
    expect(isLevelEnabled('warn', 'info')).toBe(true);
    expect(isLevelEnabled('debug', 'info')).toBe(false);
    expect(isLevelEnabled('error', 'error')).toBe(true);
  });

  test('createLogger drops entries below the minimum level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ minLevel: 'warn', output: (entry) => entries.push(entry) });
    logger.info('skipped');
    logger.warn('kept', { rows: 3 });
    expect(entries).toHaveLength(1);
    expect(entries[0]?.message).toBe('kept');
    expect(entries[0]?.context).toEqual({ rows: 3 });
  });

  test('test logger captures entries by level', () => {
    const logger = createTestLogger();
    logger.debug('one');
    logger.error('two', new Error('boom'));
    expect(logger.getLogs().map((e) => e.message)).toEqual(['one', 'two']);
    expect(logger.getLogsByLevel('error')[0]?.error?.message).toBe('boom');
    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });

  test('withContext merges bound and local context', () => {
    const logger = createTestLogger();
    const child = withContext(logger, { operator: 'filter', rows: 1 });
    child.info('done', { rows: 2 });
    expect(logger.getLogs()[0]?.context).toEqual({ operator: 'filter', rows: 2 });
  });

  test('json format', () => {
    const line = formatLogEntry({ level: 'warn', message: 'hi', timestamp: 0, context: { rows: 1 } }, 'json');
    expect(JSON.parse(line)).toEqual({ level: 'warn', message: 'hi', timestamp: 0, context: { rows: 1 } });
  });

  test('pretty format', () => {
    const line = formatLogEntry({ level: 'info', message: 'hi', timestamp: 0 }, 'pretty');
    expect(line).toBe('[1970-01-01T00:00:00.000Z] INFO  hi');
  });

  test('getLogger returns the installed logger', () => {
    const logger = createNoopLogger();
    setLogger(logger);
    expect(getLogger()).toBe(logger);
  });

  test('default logger writes to stderr at the configured level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    configure({ logLevel: 'info', logFormat: 'json' });
    getLogger().debug('hidden');
    getLogger().info('shown');
    expect(spy).toHaveBeenCalledTimes(1);
    const [line] = spy.mock.calls[0] ?? [];
    expect(typeof line === 'string' ? JSON.parse(line).message : undefined).toBe('shown');
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, setLogLevel, childLogger, serializeError, isLogLevel } from '../observability/logger';
import { AppError } from '@tallyplan/shared';

describe('logger', () => {
  const stdout = () => vi.mocked(process.stdout.write);
  const stderr = () => vi.mocked(process.stderr.write);

  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    setLogLevel('info');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function lastLine(write: typeof process.stdout.write): Record<string, unknown> {
    const call = vi.mocked(write).mock.calls.at(-1);
    return JSON.parse(String(call?.[0]));
  }

  it('writes info lines as JSON to stdout', () => {
    logger.info('tree built', { sheetName: 'Budget', totalItems: 4 });
    const entry = lastLine(process.stdout.write);
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('tree built');
    expect(entry.sheetName).toBe('Budget');
    expect(entry.totalItems).toBe(4);
    expect(typeof entry.timestamp).toBe('string');
  });

  it('writes errors to stderr', () => {
    logger.error('hydration failed');
    expect(stderr()).toHaveBeenCalledTimes(1);
    expect(stdout()).not.toHaveBeenCalled();
  });

  it('drops lines below the minimum level', () => {
    logger.debug('noisy');
    expect(stdout()).not.toHaveBeenCalled();
    setLogLevel('debug');
    logger.debug('noisy');
    expect(stdout()).toHaveBeenCalledTimes(1);
  });

  it('stamps child logger fields on every line', () => {
    const log = childLogger({ requestId: 'req-1', userId: 'user-1' });
    log.warn('skipped row', { term: '' });
    const entry = lastLine(process.stdout.write);
    expect(entry.requestId).toBe('req-1');
    expect(entry.userId).toBe('user-1');
    expect(entry.level).toBe('warn');
  });

  it('serializes AppError codes', () => {
    const err = serializeError(new AppError('SHEET_UNREADABLE', 'bad sheet', 422));
    expect(err.code).toBe('SHEET_UNREADABLE');
    expect(err.message).toBe('bad sheet');
    expect(serializeError('boom')).toEqual({ message: 'boom' });
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { logInfo, logWarn, logError } from '../src/utils/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('prints info as one JSON line', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logInfo('test', { id: 1 });
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({ level: 'info', message: 'test', id: 1 });
  });

  it('prints warnings', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logWarn('careful');
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({ level: 'warn', message: 'careful' });
  });

  it('prints error messages for Error values', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logError('oops', { id: 2, err: new Error('db down') });
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({ level: 'error', message: 'oops', id: 2, err: 'db down' });
  });
});

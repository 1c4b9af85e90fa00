import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '../src/Logger';

enum LoggerTestCases {
  EXPECT_FORMATTED_DEBUG = 'Debug line should carry class name and args',
  EXPECT_DEBUG_SUPPRESSED = 'Debug should be suppressed at warn level',
  EXPECT_SESSION_FILTER_BYPASS = 'Session filter should force logging for its session',
  EXPECT_ERROR_STACK = 'Error should print message then stack',
  EXPECT_LEVEL_GUARD = 'Only known levels should be accepted',
}

describe('Logger', () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

  beforeEach(() => {
    log.mockClear();
    warn.mockClear();
    error.mockClear();
  });

  afterEach(() => {
    Logger.setLevel('debug');
    Logger.setSessionFilter(null);
  });

  it('should format debug lines with class name and args', () => {
    Logger.debug('SessionClient', null, 'Creating session', 'gpt-4o-realtime', 3);
    expect(log, LoggerTestCases.EXPECT_FORMATTED_DEBUG)
      .toHaveBeenCalledWith('[SessionClient] Creating session - {gpt-4o-realtime, 3}');
  });

  it('should format lines without args as the bare message', () => {
    Logger.warn('FetchTransport', null, 'Slow response');
    expect(warn).toHaveBeenCalledWith('[FetchTransport] Slow response');
  });

  it('should suppress debug below the threshold', () => {
    Logger.setLevel('warn');
    Logger.debug('SessionClient', null, 'hidden');
    Logger.warn('SessionClient', null, 'shown');
    expect(log, LoggerTestCases.EXPECT_DEBUG_SUPPRESSED).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should force logging for the filtered session', () => {
    Logger.setLevel('error');
    Logger.setSessionFilter('sess_1');
    Logger.debug('SessionClient', 'sess_1', 'traced');
    Logger.debug('SessionClient', 'sess_2', 'not traced');
    expect(log, LoggerTestCases.EXPECT_SESSION_FILTER_BYPASS).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[SessionClient] traced');
  });

  it('should print the error stack after the message', () => {
    const failure = new Error('boom');
    Logger.error('RealtimeConnection', null, 'Socket failed', failure);
    expect(error, LoggerTestCases.EXPECT_ERROR_STACK).toHaveBeenNthCalledWith(1, '[RealtimeConnection] Socket failed');
    expect(error, LoggerTestCases.EXPECT_ERROR_STACK).toHaveBeenNthCalledWith(2, failure.stack);
  });

  it('should only accept known level names', () => {
    expect(Logger.isLogLevel('warn'), LoggerTestCases.EXPECT_LEVEL_GUARD).toBe(true);
    expect(Logger.isLogLevel('verbose'), LoggerTestCases.EXPECT_LEVEL_GUARD).toBe(false);
    expect(Logger.isLogLevel('toString'), LoggerTestCases.EXPECT_LEVEL_GUARD).toBe(false);
  });
});

/**
 * Unit tests for lib/logging/logger: level filtering and JSON line format.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { isDebugEnabled, logDebug, logError, logInfo, logWarn } from '@/lib/logging/logger';

const savedLevel = process.env.LOG_LEVEL;
const savedDebug = process.env.ATTRIBUTION_DEBUG;

function restore(name: 'LOG_LEVEL' | 'ATTRIBUTION_DEBUG', value: string | undefined): void {
  if (value === undefined) delete process.env[name];
  else process.env[name] = value;
}

function lines(spy: { mock: { calls: unknown[][] } }): unknown[] {
  return spy.mock.calls.map((call) => JSON.parse(String(call[0])));
}

describe('logger', () => {
  beforeEach(() => {
    delete process.env.ATTRIBUTION_DEBUG;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    restore('LOG_LEVEL', savedLevel);
    restore('ATTRIBUTION_DEBUG', savedDebug);
  });

  test('writes one JSON line with level, msg, ts and context', () => {
    process.env.LOG_LEVEL = 'info';
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    logInfo('referrer dataset loaded', { component: 'loader', entries: 3 });

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(String(stdout.mock.calls[0][0]).endsWith('\n')).toBe(true);
    expect(lines(stdout)[0]).toEqual({
      level: 'info',
      msg: 'referrer dataset loaded',
      ts: expect.any(String),
      component: 'loader',
      entries: 3,
    });
  });

  test('errors go to stderr', () => {
    process.env.LOG_LEVEL = 'info';
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    logError('reload failed', { component: 'loader' });

    expect(stdout).not.toHaveBeenCalled();
    expect(lines(stderr)).toEqual([{ level: 'error', msg: 'reload failed', ts: expect.any(String), component: 'loader' }]);
  });

  test('levels below LOG_LEVEL are dropped', () => {
    process.env.LOG_LEVEL = 'warn';
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    logInfo('hidden');
    logWarn('shown');

    expect(lines(stdout)).toEqual([{ level: 'warn', msg: 'shown', ts: expect.any(String) }]);
  });

  test('debug needs ATTRIBUTION_DEBUG or LOG_LEVEL=debug', () => {
    process.env.LOG_LEVEL = 'info';
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(isDebugEnabled()).toBe(false);
    logDebug('quiet');
    expect(stdout).not.toHaveBeenCalled();

    process.env.ATTRIBUTION_DEBUG = 'true';
    expect(isDebugEnabled()).toBe(true);
    logDebug('loud');
    expect(lines(stdout)).toEqual([{ level: 'debug', msg: 'loud', ts: expect.any(String) }]);
  });
});

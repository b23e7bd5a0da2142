import { afterEach, describe, it, expect, vi } from 'vitest';
import { formatSummary, log, printSummary } from '../logger.js';

describe('formatSummary', () => {
  it('writes plain counts without color', () => {
    expect(formatSummary({ done: 3, total: 4, warnings: 2, errors: 1 }, false)).toBe('파일 3/4 변환 · 경고 2 · 실패 1');
    expect(formatSummary({ done: 2, total: 2, warnings: 0, errors: 0 }, false)).toBe('파일 2/2 변환 · 경고 0 · 실패 0');
  });

  it('colors the counts that need attention', () => {
    expect(formatSummary({ done: 1, total: 1, warnings: 0, errors: 1 }, true)).toBe(
      '\x1b[32m파일 1/1 변환\x1b[0m · 경고 0 · \x1b[31m실패 1\x1b[0m',
    );
  });
});

describe('terminal output', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('names the error log only when something failed', () => {
    vi.stubEnv('NO_COLOR', '1');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    printSummary({ done: 1, total: 2, warnings: 0, errors: 1, logFile: 'figjson-errors.log' });
    expect(out.mock.calls.map(call => call[0])).toEqual(['', '파일 1/2 변환 · 경고 0 · 실패 1', '실패 내역: figjson-errors.log']);
  });

  it('prints report lines as they are', () => {
    vi.stubEnv('NO_COLOR', '1');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    log.report(['header  fig-kiwi', 'version 101']);
    expect(out.mock.calls.map(call => call[0])).toEqual(['header  fig-kiwi', 'version 101']);
  });
});

import { afterEach, describe, it, expect, vi } from 'vitest';
import { isDebugEnabled, logger, renderBar } from '../../utils/logger.js';

describe('renderBar', () => {
  it('fills in proportion to progress', () => {
    expect(renderBar(1, 4, 8)).toBe('▕██░░░░░░▏');
    expect(renderBar(4, 4, 8)).toBe('▕████████▏');
  });

  it('shows a full bar when there is nothing to do', () => {
    expect(renderBar(0, 0, 4)).toBe('▕████▏');
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('prints debug lines only when enabled', () => {
    vi.stubEnv('NO_COLOR', '1');
    vi.stubEnv('DEBUG', '');
    vi.stubEnv('FIGJSON_DEBUG', '');
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.debug('hidden');
    expect(isDebugEnabled()).toBe(false);
    expect(out).not.toHaveBeenCalled();

    vi.stubEnv('FIGJSON_DEBUG', 'true');
    logger.debug('pass timings');
    expect(out).toHaveBeenCalledWith('[figjson] pass timings');
  });

  it('describes the error below the message', () => {
    vi.stubEnv('NO_COLOR', '1');
    vi.stubEnv('DEBUG', '');
    vi.stubEnv('FIGJSON_DEBUG', '');
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.error('변환 실패', { code: 'CONFIG_INVALID', reason: 'bad' });
    expect(err.mock.calls.map(call => call[0])).toEqual(['error 변환 실패', '      설정 파일 오류: bad']);
  });
});

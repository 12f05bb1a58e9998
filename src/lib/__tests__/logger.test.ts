import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from '../logger';

describe('logger', () => {
  afterEach(() => {
    logger.setLevel('error');
    vi.restoreAllMocks();
  });

  it('drops messages below the current level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.setLevel('warn');

    logger.info('hidden');
    logger.warn('shown', 1);

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T.*\] \[WARN\]$/);
    expect(warn.mock.calls[0].slice(1)).toEqual(['shown', 1]);
  });

  it('prefixes scoped messages', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.setLevel('debug');
    logger.scope('session').error('lost', 'Site A');
    expect(error.mock.calls[0].slice(1)).toEqual(['[session] lost', 'Site A']);
  });

  it('silent suppresses everything', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.setLevel('silent');
    logger.error('nope');
    expect(error).not.toHaveBeenCalled();
  });
});

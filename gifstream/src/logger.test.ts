import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger } from './logger.js';

afterEach(() => {
  logger.disableDebug();
  logger.setLevel('debug');
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('writes warnings and errors to stderr', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logger.warn('stage ended abnormally', { code: 1 });
    logger.error('launch failed');

    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[WARN\]$/), 'stage ended abnormally', { code: 1 });
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/\[ERROR\]$/), 'launch failed');
  });

  it('only prints debug output when debug is enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    logger.disableDebug();
    logger.debug('hidden');
    expect(log).not.toHaveBeenCalled();

    logger.enableDebug();
    logger.debug('shown');
    expect(log).toHaveBeenCalledWith(expect.stringMatching(/\[DEBUG\]$/), 'shown');
  });

  it('drops messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logger.setLevel('warn');
    logger.info('quiet');
    logger.warn('loud');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

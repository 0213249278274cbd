import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, createPrefixedLogger, noopLogger } from '../../src/core/logger.js';
import { recordingLogger } from '../helpers/fakes.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('noopLogger discards everything', () => {
    expect(() => noopLogger.error('ignored', { a: 1 })).not.toThrow();
  });

  describe('createConsoleLogger', () => {
    it('writes level-tagged lines to the matching console method', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = createConsoleLogger();

      logger.info('started');
      logger.error('failed', { code: 'X' });

      expect(info).toHaveBeenCalledWith('[INFO] started');
      expect(error).toHaveBeenCalledWith('[ERROR] failed', { code: 'X' });
    });

    it('drops entries below the minimum level', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const logger = createConsoleLogger('warn');

      logger.debug('noise');
      logger.warn('careful');

      expect(debug).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('[WARN] careful');
    });
  });

  it('createPrefixedLogger tags each message', () => {
    const sink = recordingLogger();
    const logger = createPrefixedLogger(sink, 'nonce');

    logger.debug('a');
    logger.info('b', { nonce: 1 });
    logger.warn('c');
    logger.error('d');

    expect(sink.entries).toEqual([
      { level: 'debug', message: '[nonce] a', context: undefined },
      { level: 'info', message: '[nonce] b', context: { nonce: 1 } },
      { level: 'warn', message: '[nonce] c', context: undefined },
      { level: 'error', message: '[nonce] d', context: undefined },
    ]);
  });
});

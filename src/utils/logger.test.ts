/**
 * Logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, createLogger } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('redacts signing material and summarizes byte buffers', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('TEST').info('msg', {
      signature: 'abc',
      pubKey: new Uint8Array(3),
      nested: { secretKey: 'k' },
      amount: '1.0',
    });

    expect(log).toHaveBeenCalledTimes(1);
    const line = String(log.mock.calls[0]?.[0]);
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO \] \[TEST\] msg /);
    expect(line.endsWith(
      '[INFO ] [TEST] msg {"signature":"[REDACTED]","pubKey":"<3 bytes>",' +
        '"nested":{"secretKey":"[REDACTED]"},"amount":"1.0"}',
    )).toBe(true);
  });

  it('writes bigints as strings and omits empty data', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger('TEST');

    logger.info('block', { num: 12345n });
    logger.info('plain', {});

    expect(String(log.mock.calls[0]?.[0]).endsWith('block {"num":"12345"}')).toBe(true);
    expect(String(log.mock.calls[1]?.[0]).endsWith('[TEST] plain')).toBe(true);
  });

  it('drops messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('TEST', 'info').debug('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('routes warnings and errors to their console streams', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('TEST', 'debug');

    logger.warn('careful');
    logger.error('broken');

    expect(String(warn.mock.calls[0]?.[0]).endsWith('[WARN ] [TEST] careful')).toBe(true);
    expect(String(error.mock.calls[0]?.[0]).endsWith('[ERROR] [TEST] broken')).toBe(true);
  });
});

describe('createLogger', () => {
  const saved = process.env['LOG_LEVEL'];

  afterEach(() => {
    if (saved === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = saved;
    }
    vi.restoreAllMocks();
  });

  it('takes its level from LOG_LEVEL', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.env['LOG_LEVEL'] = 'debug';

    createLogger('TEST').debug('visible');

    expect(log).toHaveBeenCalledTimes(1);
  });

  it('falls back to info for unknown levels', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    process.env['LOG_LEVEL'] = 'constructor';
    const logger = createLogger('TEST');

    logger.debug('hidden');
    logger.info('shown');

    expect(log).toHaveBeenCalledTimes(1);
  });
});

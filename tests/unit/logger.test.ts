import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel, maskContext } from '@/logger.js';

describe('maskContext', () => {
  it('masks sensitive keys at any depth', () => {
    expect(
      maskContext({
        user_id: 'u1',
        token: 'test-secret',
        smtp: { Password: 'test-secret', host: 'mail.example.test' },
        headers: [{ authorization: 'Bearer test-secret' }],
      })
    ).toEqual({
      user_id: 'u1',
      token: '***MASKED***',
      smtp: { Password: '***MASKED***', host: 'mail.example.test' },
      headers: [{ authorization: '***MASKED***' }],
    });
  });

  it('flattens errors to their name and message', () => {
    expect(maskContext({ error: new TypeError('bad input') })).toEqual({
      error: { name: 'TypeError', message: 'bad input' },
    });
  });
});

describe('isLogLevel', () => {
  it('recognises the four levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes scoped lines with masked JSON context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('Queue', 'debug').info('Job queued', { job_id: 'j1', token: 'test-secret' });

    expect(log).toHaveBeenCalledWith('[Queue] Job queued {"job_id":"j1","token":"***MASKED***"}');
  });

  it('routes warnings and errors to their console methods', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('Worker', 'debug');

    logger.warn('slow');
    logger.error('down');

    expect(warn).toHaveBeenCalledWith('[Worker] slow');
    expect(error).toHaveBeenCalledWith('[Worker] down');
  });

  it('drops messages below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('Worker', 'warn');

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledOnce();
  });
});

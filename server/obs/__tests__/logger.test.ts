import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops lines below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger({ observability: { logLevel: 'warn' } });

    logger.info('hidden');
    logger.warn('shown', { url: 'https://news.example.com/a' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: 'warn',
      message: 'shown',
      url: 'https://news.example.com/a',
    });
  });

  it('adds child bindings to every line', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger({ observability: { logLevel: 'error' } }).child({ runId: 'run-1' });

    logger.error('failed', { attempts: 3 });

    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({ runId: 'run-1', attempts: 3 });
  });
});

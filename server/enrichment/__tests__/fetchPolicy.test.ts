import { describe, expect, it, vi } from 'vitest';
import { checkUrlAllowed, classifyHttpStatus, fetchWithRetries, type AttemptResult } from '../fetchPolicy';

describe('checkUrlAllowed', () => {
  it('allows public http and https URLs', () => {
    expect(checkUrlAllowed('https://news.example.com/story')).toBeNull();
    expect(checkUrlAllowed('http://8.8.8.8/page')).toBeNull();
  });

  it('refuses unsupported protocols and invalid URLs', () => {
    expect(checkUrlAllowed('ftp://example.com/file')).toBe('Unsupported protocol: ftp:');
    expect(checkUrlAllowed('not a url')).toBe('Invalid URL: not a url');
  });

  it.each([
    'http://localhost:3000/',
    'http://printer.local/',
    'http://127.0.0.1/',
    'http://10.1.2.3/',
    'http://192.168.0.10/',
    'http://172.20.0.1/',
    'http://169.254.169.254/latest',
    'http://[::1]/',
  ])('refuses private address %s', (url) => {
    expect(checkUrlAllowed(url)).not.toBeNull();
  });
});

describe('classifyHttpStatus', () => {
  it('treats 403 and 404 as terminal client errors', () => {
    expect(classifyHttpStatus(404)).toEqual({
      ok: false,
      retryable: false,
      reason: 'client_error',
      status: 404,
      error: 'HTTP 404',
    });
    expect(classifyHttpStatus(403)).toMatchObject({ retryable: false, reason: 'client_error' });
  });

  it('retries server errors, 408 and 429', () => {
    for (const status of [500, 502, 503, 408, 429]) {
      expect(classifyHttpStatus(status)).toMatchObject({ retryable: true, reason: 'http_error' });
    }
  });

  it('does not retry other client errors', () => {
    expect(classifyHttpStatus(410)).toMatchObject({ retryable: false, reason: 'http_error', status: 410 });
  });
});

describe('fetchWithRetries', () => {
  const timeout: AttemptResult = { ok: false, retryable: true, reason: 'timeout', error: 'Timed out' };

  it('waits base * n between retryable failures', async () => {
    const wait = vi.fn(async () => {});
    const attempt = vi.fn(async (): Promise<AttemptResult> => timeout);

    const outcome = await fetchWithRetries(attempt, { maxRetries: 3, baseDelayMs: 1000 }, wait);

    expect(attempt).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[1000], [2000]]);
    expect(outcome).toEqual({ ok: false, reason: 'timeout', status: undefined, error: 'Timed out', attempts: 3 });
  });

  it('returns the first success', async () => {
    const attempt = vi
      .fn<(attemptNumber: number) => Promise<AttemptResult>>()
      .mockResolvedValueOnce(timeout)
      .mockResolvedValueOnce({ ok: true, html: '<p>ok</p>', finalUrl: 'https://example.com/', status: 200 });

    const outcome = await fetchWithRetries(attempt, { maxRetries: 3, baseDelayMs: 0 });

    expect(outcome).toEqual({ ok: true, html: '<p>ok</p>', finalUrl: 'https://example.com/', status: 200, attempts: 2 });
  });

  it('stops at the first terminal failure', async () => {
    const wait = vi.fn(async () => {});
    const attempt = vi.fn(async () => classifyHttpStatus(404));

    const outcome = await fetchWithRetries(attempt, { maxRetries: 3, baseDelayMs: 1000 }, wait);

    expect(attempt).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ ok: false, reason: 'client_error', status: 404, attempts: 1 });
  });
});

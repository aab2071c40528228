import type { Logger } from '../obs/logger';
import { errorMessage } from '../utils/async';
import { checkUrlAllowed, classifyHttpStatus, fetchWithRetries, type AttemptResult, type RetryPolicy } from './fetchPolicy';
import type { FetchOutcome, FetchPageOptions, PageFetcher } from './types';

export interface HttpPageFetcherOptions extends RetryPolicy {
  timeoutMs: number;
  userAgent: string;
  logger: Logger;
  wait?: (ms: number) => Promise<void>;
}

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');

const fetchWithTimeout = async (url: string, options: { timeoutMs: number; userAgent: string }) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
      redirect: 'follow',
      signal: controller.signal,
    });
    if (!response.ok) {
      // Release the connection; error pages are never parsed.
      await response.body?.cancel();
      return { response, html: '' };
    }
    // The body read is covered by the same timer.
    return { response, html: await response.text() };
  } finally {
    clearTimeout(timer);
  }
};

export const createHttpPageFetcher = (options: HttpPageFetcherOptions): PageFetcher => {
  const attemptOnce = async (url: string, attemptNumber: number): Promise<AttemptResult> => {
    try {
      const { response, html } = await fetchWithTimeout(url, options);
      if (!response.ok) {
        return classifyHttpStatus(response.status);
      }
      return { ok: true, html, finalUrl: response.url || url, status: response.status };
    } catch (error) {
      const timedOut = isAbortError(error);
      options.logger.debug('Page fetch attempt failed', {
        url,
        attempt: attemptNumber,
        timedOut,
        error: errorMessage(error),
      });
      return {
        ok: false,
        retryable: true,
        reason: timedOut ? 'timeout' : 'network',
        error: timedOut ? `Timed out after ${options.timeoutMs}ms` : errorMessage(error),
      };
    }
  };

  const fetchPage = async (url: string, overrides: FetchPageOptions = {}): Promise<FetchOutcome> => {
    const blocked = checkUrlAllowed(url);
    if (blocked) {
      return { ok: false, reason: 'blocked', error: blocked, attempts: 0 };
    }
    return fetchWithRetries(
      (attemptNumber) => attemptOnce(url, attemptNumber),
      {
        maxRetries: overrides.maxRetries ?? options.maxRetries,
        baseDelayMs: overrides.baseDelayMs ?? options.baseDelayMs,
      },
      options.wait,
    );
  };

  return { strategy: 'http', fetchPage };
};

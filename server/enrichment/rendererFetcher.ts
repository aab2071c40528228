/**
 * Headless-browser page fetching for publishers that only render their
 * content client-side.
 *
 * A single Chromium instance is launched on first use and reused for every
 * page; each fetch gets its own browser context so cookies never leak between
 * publishers. Retry and status classification match the plain HTTP fetcher.
 */

import { chromium, errors } from 'playwright-core';
import type { Logger } from '../obs/logger';
import { errorMessage, sleep } from '../utils/async';
import { checkUrlAllowed, classifyHttpStatus, fetchWithRetries, type AttemptResult, type RetryPolicy } from './fetchPolicy';
import type { FetchOutcome, FetchPageOptions, PageFetcher } from './types';

// Structural subset of the playwright-core API used here, so tests can hand
// in a fake browser.
export interface RenderResponse {
  status(): number;
  url(): string;
}

export interface RenderPage {
  goto(url: string, options: { timeout: number; waitUntil: 'domcontentloaded' }): Promise<RenderResponse | null>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface RenderBrowser {
  newContext(options: { userAgent: string }): Promise<RenderContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<RenderBrowser>;

export interface RendererPageFetcherOptions extends RetryPolicy {
  timeoutMs: number;
  userAgent: string;
  renderWaitMs: number;
  executablePath?: string;
  logger: Logger;
  launch?: BrowserLauncher;
  wait?: (ms: number) => Promise<void>;
}

export const launchChromium =
  (executablePath?: string): BrowserLauncher =>
  () =>
    chromium.launch({ headless: true, executablePath });

const isTimeoutError = (error: unknown): boolean =>
  error instanceof errors.TimeoutError || (error instanceof Error && error.name === 'TimeoutError');

export const createRendererPageFetcher = (options: RendererPageFetcherOptions): PageFetcher => {
  const launch = options.launch ?? launchChromium(options.executablePath);
  let browserPromise: Promise<RenderBrowser> | null = null;

  const getBrowser = (): Promise<RenderBrowser> => {
    if (!browserPromise) {
      options.logger.info('Launching headless browser');
      browserPromise = launch().catch((error: unknown) => {
        browserPromise = null;
        throw error;
      });
    }
    return browserPromise;
  };

  const attemptOnce = async (url: string, attemptNumber: number): Promise<AttemptResult> => {
    let context: RenderContext | null = null;
    try {
      const browser = await getBrowser();
      context = await browser.newContext({ userAgent: options.userAgent });
      const page = await context.newPage();
      const response = await page.goto(url, { timeout: options.timeoutMs, waitUntil: 'domcontentloaded' });
      const status = response?.status() ?? 200;
      if (status < 200 || status >= 300) {
        return classifyHttpStatus(status);
      }
      if (options.renderWaitMs > 0) {
        await page.waitForTimeout(options.renderWaitMs);
      }
      const html = await page.content();
      return { ok: true, html, finalUrl: response?.url() || url, status };
    } catch (error) {
      const timedOut = isTimeoutError(error);
      options.logger.debug('Rendered fetch attempt failed', {
        url,
        attempt: attemptNumber,
        timedOut,
        error: errorMessage(error),
      });
      return { ok: false, retryable: true, reason: timedOut ? 'timeout' : 'network', error: errorMessage(error) };
    } finally {
      if (context) {
        await context.close().catch((error: unknown) => {
          options.logger.warn('Failed to close browser context', { url, error: errorMessage(error) });
        });
      }
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
      options.wait ?? sleep,
    );
  };

  const close = async (): Promise<void> => {
    const pending = browserPromise;
    browserPromise = null;
    if (!pending) return;
    const browser = await pending;
    await browser.close();
  };

  return { strategy: 'renderer', fetchPage, close };
};

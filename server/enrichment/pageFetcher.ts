import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { createHttpPageFetcher } from './httpFetcher';
import { createRendererPageFetcher, type BrowserLauncher } from './rendererFetcher';
import type { PageFetcher } from './types';

/** Picks the fetch strategy named by `FETCH_STRATEGY`. */
export const createPageFetcher = (config: AppConfig, logger: Logger, launch?: BrowserLauncher): PageFetcher => {
  const shared = {
    timeoutMs: config.enrichment.fetchTimeoutMs,
    userAgent: config.enrichment.userAgent,
    maxRetries: config.enrichment.maxRetries,
    baseDelayMs: config.enrichment.retryBaseDelayMs,
  };
  if (config.enrichment.fetchStrategy === 'renderer') {
    return createRendererPageFetcher({
      ...shared,
      renderWaitMs: config.renderer.renderWaitMs,
      executablePath: config.renderer.executablePath,
      logger: logger.child({ fetcher: 'renderer' }),
      launch,
    });
  }
  return createHttpPageFetcher({ ...shared, logger: logger.child({ fetcher: 'http' }) });
};

import { effectiveSnippetLength, type AppConfig } from '../../shared/config';
import type { Article, EnrichedArticle, EnrichmentReport } from '../../shared/types';
import type { Logger } from '../obs/logger';
import type { Summarizer } from '../services/summarizer';
import { errorMessage } from '../utils/async';
import { KeyedSemaphore, runWorkerPool } from '../utils/concurrency';
import { isMissingValue, truncateForLog } from '../utils/text';
import type { EnrichmentCache } from './cache';
import { extractContent } from './extractor';
import { domainOf, fallbackImage, fallbackText } from './fallbacks';
import {
  CONTENT_KINDS,
  PERMANENT_FAILURE,
  type CacheWrite,
  type ContentKind,
  type PageFetcher,
  type ProgressCallback,
} from './types';

export interface EnrichmentDeps {
  fetcher: PageFetcher;
  cache: EnrichmentCache;
  config: AppConfig;
  logger: Logger;
  summarizer?: Summarizer | null;
  /**
   * URL units currently being fetched, shared by runs over the same cache so
   * overlapping batches wait for each other instead of fetching twice.
   */
  inflight?: InflightUnits;
}

export type InflightUnits = Map<string, Promise<void>>;

export interface EnrichOptions {
  onProgress?: ProgressCallback;
  /** Polled between URLs; in-flight fetches are left to finish. */
  signal?: AbortSignal;
}

export interface EnrichmentResult {
  articles: EnrichedArticle[];
  report: EnrichmentReport;
}

interface WorkItem {
  url: string;
  kinds: Set<ContentKind>;
}

const currentValue = (article: Article, kind: ContentKind): string | null =>
  kind === 'text' ? article.text : article.imageUrl;

export const missingKinds = (article: Article): ContentKind[] =>
  CONTENT_KINDS.filter((kind) => isMissingValue(currentValue(article, kind)));

/**
 * Builds the deduplicated URL worklist. Kinds already in the cache (resolved
 * or permanently failed) are not queued again.
 */
export const buildWorklist = (
  articles: readonly Article[],
  cache: EnrichmentCache,
): { items: WorkItem[]; cacheHits: number } => {
  const byUrl = new Map<string, Set<ContentKind>>();
  let cacheHits = 0;
  for (const article of articles) {
    for (const kind of missingKinds(article)) {
      if (cache.get(article.url, kind)) {
        cacheHits += 1;
        continue;
      }
      const kinds = byUrl.get(article.url) ?? new Set<ContentKind>();
      kinds.add(kind);
      byUrl.set(article.url, kinds);
    }
  }
  return { items: Array.from(byUrl, ([url, kinds]) => ({ url, kinds })), cacheHits };
};

export const enrichArticles = async (
  articles: readonly Article[],
  deps: EnrichmentDeps,
  options: EnrichOptions = {},
): Promise<EnrichmentResult> => {
  const startedAt = Date.now();
  const { fetcher, cache, config, logger, summarizer } = deps;
  const inflight: InflightUnits = deps.inflight ?? new Map();
  const { signal, onProgress } = options;
  const snippetLength = effectiveSnippetLength(config);

  const report: EnrichmentReport = {
    articles: articles.length,
    urlsQueued: 0,
    urlsFetched: 0,
    fetchFailures: 0,
    cacheHits: 0,
    failedSnippets: 0,
    failedImages: 0,
    cancelled: false,
    elapsedMs: 0,
  };

  const worklist = buildWorklist(articles, cache);
  report.cacheHits = worklist.cacheHits;
  const items = config.enrichment.skipScraping ? [] : worklist.items;
  report.urlsQueued = items.length;

  if (config.enrichment.skipScraping) {
    logger.info('Web scraping skipped; using fallback values', { articles: articles.length });
  }

  const notifyProgress = (fraction: number, message: string) => {
    if (!onProgress) return;
    try {
      onProgress(fraction, message);
    } catch (error) {
      logger.warn('Progress callback failed', { error: errorMessage(error) });
    }
  };

  const maybeSummarize = async (text: string): Promise<string> => {
    if (!summarizer || text.length < config.llm.summaryMinLength) return text;
    return summarizer.summarize(text);
  };

  // A resolved kind is never overwritten.
  const store = (url: string, kind: ContentKind, write: CacheWrite) => {
    if (cache.get(url, kind)?.outcome === 'success') return;
    cache.put(url, kind, write);
  };

  const markFailed = (item: WorkItem) => {
    for (const kind of item.kinds) {
      if (!cache.get(item.url, kind)) {
        cache.put(item.url, kind, PERMANENT_FAILURE);
      }
    }
  };

  const processUrl = async (item: WorkItem): Promise<void> => {
    try {
      report.urlsFetched += 1;
      const outcome = await fetcher.fetchPage(item.url, {
        maxRetries: config.enrichment.maxRetries,
        baseDelayMs: config.enrichment.retryBaseDelayMs,
      });
      if (!outcome.ok) {
        report.fetchFailures += 1;
        logger.debug('Page fetch failed', {
          url: item.url,
          reason: outcome.reason,
          status: outcome.status,
          attempts: outcome.attempts,
          error: outcome.error,
        });
        markFailed(item);
        return;
      }

      const extracted = extractContent(
        outcome.html,
        outcome.finalUrl,
        { text: item.kinds.has('text'), image: item.kinds.has('image') },
        { maxLength: snippetLength },
      );

      if (item.kinds.has('text')) {
        const text = extracted.text ? await maybeSummarize(extracted.text) : null;
        store(item.url, 'text', text ? { outcome: 'success', value: text } : PERMANENT_FAILURE);
      }
      if (item.kinds.has('image')) {
        store(item.url, 'image', extracted.image ? { outcome: 'success', value: extracted.image } : PERMANENT_FAILURE);
      }
    } catch (error) {
      logger.warn('Enrichment failed for URL', { url: item.url, error: errorMessage(error) });
      markFailed(item);
    }
  };

  const hostLimiter = new KeyedSemaphore(config.enrichment.perHostConcurrency);

  /** One unit per URL at a time; kinds another run resolved meanwhile are dropped. */
  const processExclusive = async (item: WorkItem): Promise<void> => {
    let pending = inflight.get(item.url);
    while (pending) {
      await pending;
      pending = inflight.get(item.url);
    }
    const kinds = new Set([...item.kinds].filter((kind) => !cache.get(item.url, kind)));
    if (kinds.size === 0) return;

    const unit = hostLimiter.get(domainOf(item.url) ?? 'unknown').use(() => processUrl({ url: item.url, kinds }));
    inflight.set(item.url, unit);
    try {
      await unit;
    } finally {
      if (inflight.get(item.url) === unit) inflight.delete(item.url);
    }
  };

  let completed = 0;
  const started = await runWorkerPool(
    items,
    async (item) => {
      await processExclusive(item);
      completed += 1;
      notifyProgress(completed / items.length, `Processing (${completed}/${items.length}): ${truncateForLog(item.url)}`);
    },
    {
      concurrency: config.enrichment.concurrency,
      shouldStop: () => signal?.aborted ?? false,
    },
  );
  report.cancelled = started < items.length;

  const resolve = (article: Article, kind: ContentKind): string => {
    const current = currentValue(article, kind);
    if (current != null && !isMissingValue(current)) return current;
    const entry = cache.get(article.url, kind);
    if (entry?.outcome === 'success' && entry.value) return entry.value;
    if (kind === 'text') {
      report.failedSnippets += 1;
      return fallbackText(article.headline, config.enrichment.headlineFallbackLength);
    }
    report.failedImages += 1;
    return fallbackImage(article.url, config.enrichment);
  };

  const enriched = articles.map(
    (article): EnrichedArticle => ({
      ...article,
      text: resolve(article, 'text'),
      imageUrl: resolve(article, 'image'),
    }),
  );

  report.elapsedMs = Date.now() - startedAt;
  if (report.failedSnippets || report.failedImages) {
    logger.warn(
      `${report.failedSnippets} snippets / ${report.failedImages} images could not be fetched; fallbacks applied`,
      { ...report },
    );
  } else {
    logger.info('Content enrichment complete', { ...report });
  }
  if (report.cancelled) {
    logger.info('Enrichment cancelled before all URLs were fetched', { started, queued: items.length });
  }

  return { articles: enriched, report };
};

import type { AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type { Article, CacheStats, PipelineResult, StageName } from '../../shared/types';
import { createInMemoryEnrichmentCache, type EnrichmentCache } from '../enrichment/cache';
import { enrichArticles, type InflightUnits } from '../enrichment/orchestrator';
import { createPageFetcher } from '../enrichment/pageFetcher';
import type { PageFetcher, ProgressCallback } from '../enrichment/types';
import { scoreArticles } from '../labeling/scorer';
import type { Logger } from '../obs/logger';
import { createSummarizer, type Summarizer } from '../services/summarizer';

export interface PipelineDeps {
  config: AppConfig;
  logger: Logger;
  cache?: EnrichmentCache;
  fetcher?: PageFetcher;
  /** `null` disables summarization regardless of config. */
  summarizer?: Summarizer | null;
  random?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
  onStage?: (stage: StageName, status: 'start' | 'success', message: string) => void;
}

export interface EnrichmentPipeline {
  run: (articles: readonly Article[], onProgress?: ProgressCallback, options?: RunOptions) => Promise<PipelineResult>;
  cacheStats: () => CacheStats;
  close: () => Promise<void>;
}

/**
 * Enrichment followed by labeling. The cache is created once per pipeline and
 * shared by every `run`, so repeated batches only fetch URLs they have not
 * seen before.
 */
export const createEnrichmentPipeline = (deps: PipelineDeps): EnrichmentPipeline => {
  const { config, logger } = deps;
  const cache = deps.cache ?? createInMemoryEnrichmentCache();
  const fetcher = deps.fetcher ?? createPageFetcher(config, logger);
  const inflight: InflightUnits = new Map();
  const summarizer = deps.summarizer === undefined ? createSummarizer({ config, logger }) : deps.summarizer;

  const run: EnrichmentPipeline['run'] = async (articles, onProgress, options = {}) => {
    const runId = options.runId ?? randomId();
    const runLogger = logger.child({ runId });
    const onStage = options.onStage ?? (() => {});

    onStage('enrichment', 'start', `Enriching ${articles.length} articles`);
    const enrichment = await enrichArticles(
      articles,
      { fetcher, cache, config, logger: runLogger, summarizer, inflight },
      { onProgress, signal: options.signal },
    );
    onStage(
      'enrichment',
      'success',
      `Fetched ${enrichment.report.urlsFetched} URLs (${enrichment.report.cacheHits} cache hits)`,
    );

    onStage('labeling', 'start', 'Scoring narrative labels');
    const labeled = scoreArticles(enrichment.articles, { labeling: config.labeling, random: deps.random });
    onStage('labeling', 'success', `Scored ${labeled.length} articles`);

    return { runId, articles: labeled, report: enrichment.report };
  };

  const close = async () => {
    await fetcher.close?.();
  };

  return { run, cacheStats: () => cache.stats(), close };
};

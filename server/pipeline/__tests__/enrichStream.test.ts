import { describe, expect, it, vi } from 'vitest';
import type { SseStream } from '../../../shared/sse';
import type { PipelineResult, StageEvent } from '../../../shared/types';
import { createNoopLogger } from '../../obs/logger';
import type { EnrichmentPipeline } from '../enrichmentPipeline';
import { handleEnrichStream } from '../enrichStream';

const buildStream = () => {
  const stageEvents: StageEvent[] = [];
  const named: Array<[string, unknown]> = [];
  const close = vi.fn();
  const stream: SseStream = {
    controller: new AbortController(),
    send: (event) => {
      stageEvents.push(event);
    },
    sendJson: (eventName, payload) => {
      named.push([eventName, payload]);
    },
    close,
  };
  return { stream, stageEvents, named, close };
};

const emptyResult = (runId: string): PipelineResult => ({
  runId,
  articles: [],
  report: {
    articles: 0,
    urlsQueued: 0,
    urlsFetched: 0,
    fetchFailures: 0,
    cacheHits: 0,
    failedSnippets: 0,
    failedImages: 0,
    cancelled: false,
    elapsedMs: 0,
  },
});

const buildPipeline = (run: EnrichmentPipeline['run']): EnrichmentPipeline => ({
  run,
  cacheStats: () => ({ text: { success: 0, permanentFailure: 0 }, image: { success: 0, permanentFailure: 0 } }),
  close: async () => {},
});

describe('handleEnrichStream', () => {
  it('rejects an invalid body with a fatal event', async () => {
    const run = vi.fn<EnrichmentPipeline['run']>();
    const { stream, named, close } = buildStream();

    await handleEnrichStream({ body: { articles: 'nope' }, pipeline: buildPipeline(run), stream, logger: createNoopLogger() });

    expect(run).not.toHaveBeenCalled();
    expect(named).toEqual([
      ['fatal', { error: 'Invalid request body', issues: ['articles: Expected array, received string'] }],
    ]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('streams stage events, progress and the result', async () => {
    const { stream, stageEvents, named, close } = buildStream();
    const pipeline = buildPipeline(async (_articles, onProgress, options = {}) => {
      options.onStage?.('enrichment', 'start', 'Enriching 0 articles');
      onProgress?.(1, 'Processing (1/1): https://news.example.com/a');
      options.onStage?.('enrichment', 'success', 'done');
      options.onStage?.('labeling', 'start', 'Scoring narrative labels');
      options.onStage?.('labeling', 'success', 'Scored 0 articles');
      expect(options.signal).toBe(stream.controller.signal);
      return emptyResult(options.runId ?? 'missing');
    });

    await handleEnrichStream({ body: { articles: [] }, pipeline, stream, logger: createNoopLogger() });

    expect(stageEvents.map((event) => `${event.stage}:${event.status}`)).toEqual([
      'enrichment:start',
      'enrichment:progress',
      'enrichment:success',
      'labeling:start',
      'labeling:success',
    ]);
    expect(stageEvents[1]).toMatchObject({
      message: 'Processing (1/1): https://news.example.com/a',
      data: { fraction: 1 },
    });
    const runIds = new Set(stageEvents.map((event) => event.runId));
    expect(runIds.size).toBe(1);
    expect(named).toHaveLength(1);
    expect(named[0][0]).toBe('enrich-result');
    expect(named[0][1]).toEqual(emptyResult(stageEvents[0].runId));
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('reports a failure against the stage that was running', async () => {
    const { stream, stageEvents, named, close } = buildStream();
    const pipeline = buildPipeline(async (_articles, _onProgress, options = {}) => {
      options.onStage?.('enrichment', 'start', 'Enriching');
      options.onStage?.('enrichment', 'success', 'done');
      options.onStage?.('labeling', 'start', 'Scoring');
      throw new Error('scoring exploded');
    });

    await handleEnrichStream({ body: { articles: [] }, pipeline, stream, logger: createNoopLogger() });

    expect(stageEvents.at(-1)).toMatchObject({ stage: 'labeling', status: 'failure', message: 'scoring exploded' });
    expect(named).toEqual([['fatal', { error: 'scoring exploded' }]]);
    expect(close).toHaveBeenCalledTimes(1);
  });
});

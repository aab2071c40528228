import { randomId } from '../../shared/crypto';
import type { SseStream } from '../../shared/sse';
import type { StageName } from '../../shared/types';
import { parseEnrichRequest } from '../http/articleInput';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../utils/async';
import type { EnrichmentPipeline } from './enrichmentPipeline';
import { makeStageEmitter, type StageEmitter, type StageEvent } from './stageEmitter';

export interface EnrichStreamArgs {
  body: unknown;
  pipeline: EnrichmentPipeline;
  stream: SseStream;
  logger: Logger;
}

export const handleEnrichStream = async ({ body, pipeline, stream, logger }: EnrichStreamArgs): Promise<void> => {
  const parsed = parseEnrichRequest(body);
  if (!parsed.ok) {
    stream.sendJson('fatal', { error: 'Invalid request body', issues: parsed.issues });
    stream.close();
    return;
  }

  const runId = randomId();
  const sender = <T>(event: StageEvent<T>) => stream.send(event);
  const stages: Record<StageName, StageEmitter> = {
    enrichment: makeStageEmitter(runId, 'enrichment', sender),
    labeling: makeStageEmitter(runId, 'labeling', sender),
  };
  let currentStage: StageName = 'enrichment';

  try {
    const result = await pipeline.run(
      parsed.articles,
      (fraction, message) => stages.enrichment.progress({ message, data: { fraction } }),
      {
        runId,
        signal: stream.controller.signal,
        onStage: (stage, status, message) => {
          currentStage = stage;
          if (status === 'start') stages[stage].start({ message });
          else stages[stage].success({ message });
        },
      },
    );
    stream.sendJson('enrich-result', result);
  } catch (error) {
    logger.error('Enrichment stream failed', { runId, error: errorMessage(error) });
    stages[currentStage].failure(error);
    stream.sendJson('fatal', { error: errorMessage(error) });
  } finally {
    stream.close();
  }
};

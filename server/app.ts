import cors from 'cors';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { getPublicConfig, type AppConfig } from '../shared/config';
import type { ApiHealthResponse, PipelineResult } from '../shared/types';
import { parseEnrichRequest } from './http/articleInput';
import { createSseStream } from './http/sse';
import type { Logger } from './obs/logger';
import type { EnrichmentPipeline } from './pipeline/enrichmentPipeline';
import { handleEnrichStream } from './pipeline/enrichStream';
import { errorMessage } from './utils/async';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  pipeline: EnrichmentPipeline;
}

export const createApp = ({ config, logger, pipeline }: AppDeps): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      let finished = false;
      res.on('finish', () => {
        finished = true;
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      res.on('close', () => {
        if (finished) return;
        logger.debug('HTTP closed early', {
          method: req.method,
          path: req.originalUrl,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    const body: ApiHealthResponse = { ok: true, ts: new Date().toISOString() };
    res.json(body);
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/api/cache/stats', (_req: Request, res: Response) => {
    res.json(pipeline.cacheStats());
  });

  app.post('/api/enrich', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = parseEnrichRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: 'Invalid request body', issues: parsed.issues });
      return;
    }
    try {
      const result: PipelineResult = await pipeline.run(parsed.articles);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/enrich-stream', async (req: Request, res: Response) => {
    const stream = createSseStream(res, {
      heartbeatMs: config.server.heartbeatIntervalMs,
      onClose: (reason) => {
        if (reason === 'client') logger.info('Enrichment stream closed by client; cancelling run');
      },
    });
    await handleEnrichStream({ body: req.body, pipeline, stream, logger });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled request error', { method: req.method, path: req.originalUrl, error: errorMessage(error) });
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};

import 'dotenv/config';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { createEnrichmentPipeline } from './pipeline/enrichmentPipeline';
import { createApp } from './app';
import { errorMessage } from './utils/async';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  fetchStrategy: config.enrichment.fetchStrategy,
  concurrency: config.enrichment.concurrency,
  perHostConcurrency: config.enrichment.perHostConcurrency,
  skipScraping: config.enrichment.skipScraping,
  summarizer: {
    enabled: config.llm.summarizeSnippets,
    hasApiKey: Boolean(config.llm.apiKey),
  },
});

// One pipeline per process: its cache lives as long as the server does.
const pipeline = createEnrichmentPipeline({ config, logger });
const app = createApp({ config, logger, pipeline });

const port = config.server.port;
const server = app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});

const shutdown = (signal: string) => {
  logger.info('Shutting down', { signal });
  server.close();
  pipeline
    .close()
    .catch((error: unknown) => logger.error('Failed to release fetcher resources', { error: errorMessage(error) }))
    .finally(() => process.exit(0));
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

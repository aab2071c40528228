import { z } from 'zod';

export const FETCH_STRATEGIES = ['http', 'renderer'] as const;
export type FetchStrategy = (typeof FETCH_STRATEGIES)[number];

const urlTemplate = z
  .string()
  .refine((value) => value === '' || value.includes('{domain}'), {
    message: 'Template must contain a {domain} placeholder or be empty',
  });

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  enrichment: z.object({
    concurrency: z.number().int().positive(),
    perHostConcurrency: z.number().int().positive(),
    fetchStrategy: z.enum(FETCH_STRATEGIES),
    fetchTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().positive(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    userAgent: z.string().min(1),
    skipScraping: z.boolean(),
    snippetMaxLength: z.number().int().min(20),
    summarySourceMaxLength: z.number().int().min(20),
    headlineFallbackLength: z.number().int().positive(),
    logoUrlTemplate: urlTemplate,
    faviconUrlTemplate: urlTemplate,
    placeholderImageUrl: z.string().url(),
  }),
  renderer: z.object({
    executablePath: z.string().optional(),
    renderWaitMs: z.number().int().nonnegative(),
  }),
  llm: z.object({
    summarizeSnippets: z.boolean(),
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    requestsPerMinute: z.number().int().positive(),
    summaryMinLength: z.number().int().nonnegative(),
    summaryTimeoutMs: z.number().int().positive(),
  }),
  labeling: z.object({
    keywordWeight: z.number().positive().max(1),
    strongThreshold: z.number().min(0).max(1),
    factualCenter: z.number().min(0).max(1),
    neutralCenter: z.number().min(0).max(1),
    jitter: z.number().min(0).max(0.5),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LabelingConfig = AppConfig['labeling'];

export interface PublicConfig {
  enrichment: {
    concurrency: number;
    perHostConcurrency: number;
    fetchStrategy: FetchStrategy;
    maxRetries: number;
    skipScraping: boolean;
    snippetMaxLength: number;
  };
  summarizer: {
    enabled: boolean;
    hasApiKey: boolean;
    model: string;
  };
  labeling: LabelingConfig;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  enrichment: {
    concurrency: config.enrichment.concurrency,
    perHostConcurrency: config.enrichment.perHostConcurrency,
    fetchStrategy: config.enrichment.fetchStrategy,
    maxRetries: config.enrichment.maxRetries,
    skipScraping: config.enrichment.skipScraping,
    snippetMaxLength: config.enrichment.snippetMaxLength,
  },
  summarizer: {
    enabled: config.llm.summarizeSnippets,
    hasApiKey: config.llm.apiKey.length > 0,
    model: config.llm.model,
  },
  labeling: { ...config.labeling },
});

/**
 * Snippet length the extractor should cut at. A summarizer gets a longer
 * source text than what is shown directly.
 */
export const effectiveSnippetLength = (config: AppConfig): number =>
  config.llm.summarizeSnippets ? config.enrichment.summarySourceMaxLength : config.enrichment.snippetMaxLength;

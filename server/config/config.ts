import { ConfigSchema, type AppConfig } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const stringFromEnv = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

export type { AppConfig };

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36';

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    enrichment: {
      concurrency: numberFromEnv(env.ENRICH_CONCURRENCY, 4),
      perHostConcurrency: numberFromEnv(env.ENRICH_PER_HOST_CONCURRENCY, 2),
      fetchStrategy: stringFromEnv(env.FETCH_STRATEGY, 'http').toLowerCase(),
      fetchTimeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 15_000),
      maxRetries: numberFromEnv(env.FETCH_MAX_RETRIES, 3),
      retryBaseDelayMs: numberFromEnv(env.FETCH_RETRY_BASE_DELAY_MS, 1_000),
      userAgent: stringFromEnv(env.FETCH_USER_AGENT, DEFAULT_USER_AGENT),
      skipScraping: booleanFromEnv(env.SKIP_WEB_SCRAPING, false),
      snippetMaxLength: numberFromEnv(env.SNIPPET_MAX_LENGTH, 500),
      summarySourceMaxLength: numberFromEnv(env.SUMMARY_SOURCE_MAX_LENGTH, 1_000),
      headlineFallbackLength: 250,
      logoUrlTemplate: env.LOGO_URL_TEMPLATE?.trim() ?? 'https://logo.clearbit.com/{domain}',
      faviconUrlTemplate: env.FAVICON_URL_TEMPLATE?.trim() ?? 'https://icons.duckduckgo.com/ip3/{domain}.ico',
      placeholderImageUrl: stringFromEnv(env.PLACEHOLDER_IMAGE_URL, 'https://placehold.co/600x400?text=News'),
    },
    renderer: {
      executablePath: env.RENDERER_EXECUTABLE_PATH?.trim() || undefined,
      renderWaitMs: numberFromEnv(env.RENDERER_WAIT_MS, 2_000),
    },
    llm: {
      summarizeSnippets: booleanFromEnv(env.SUMMARIZE_SNIPPETS, false),
      apiKey: env.GEMINI_API_KEY?.trim() || '',
      model: stringFromEnv(env.GEMINI_MODEL, 'gemini-2.5-flash-lite'),
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0.2),
      maxOutputTokens: numberFromEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 256),
      // Hard cap: never exceed 10 RPM regardless of environment value
      requestsPerMinute: Math.max(1, Math.min(10, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 10))),
      summaryMinLength: numberFromEnv(env.SUMMARY_MIN_LENGTH, 150),
      summaryTimeoutMs: numberFromEnv(env.SUMMARY_TIMEOUT_MS, 20_000),
    },
    labeling: {
      keywordWeight: numberFromEnv(env.LABEL_KEYWORD_WEIGHT, 0.2),
      strongThreshold: numberFromEnv(env.LABEL_STRONG_THRESHOLD, 0.3),
      factualCenter: numberFromEnv(env.LABEL_FACTUAL_CENTER, 0.7),
      neutralCenter: numberFromEnv(env.LABEL_NEUTRAL_CENTER, 0.6),
      jitter: numberFromEnv(env.LABEL_JITTER, 0.1),
    },
    observability: {
      logLevel: stringFromEnv(env.LOG_LEVEL, 'info').toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

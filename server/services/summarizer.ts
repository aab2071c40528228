import type { AppConfig } from '../../shared/config';
import { buildSummaryPrompt } from '../../shared/prompts';
import type { Logger } from '../obs/logger';
import { errorMessage, withTimeout } from '../utils/async';
import { buildExcerpt, normalizeWhitespace } from '../utils/text';
import { generateGeminiText, type GenerateText } from './genai';

export interface Summarizer {
  /** Never rejects: errors, timeouts and missing keys yield the truncated input. */
  summarize: (text: string) => Promise<string>;
}

export interface SummarizerOptions {
  config: AppConfig;
  logger: Logger;
  generate?: GenerateText;
}

export const createGeminiSummarizer = ({ config, logger, generate = generateGeminiText }: SummarizerOptions): Summarizer => {
  // Keyed by the exact input text; separate from the enrichment cache.
  const summaries = new Map<string, string>();
  let warnedMissingKey = false;

  const fallback = (text: string) => buildExcerpt(text, config.enrichment.snippetMaxLength);

  const summarize = async (text: string): Promise<string> => {
    const cached = summaries.get(text);
    if (cached) return cached;

    if (!config.llm.apiKey) {
      if (!warnedMissingKey) {
        warnedMissingKey = true;
        logger.warn('Summarizer enabled without GEMINI_API_KEY; using truncated text');
      }
      return fallback(text);
    }

    const controller = new AbortController();
    try {
      const raw = await withTimeout(
        generate({
          apiKey: config.llm.apiKey,
          model: config.llm.model,
          prompt: buildSummaryPrompt(text),
          temperature: config.llm.temperature,
          maxOutputTokens: config.llm.maxOutputTokens,
          requestsPerMinute: config.llm.requestsPerMinute,
          signal: controller.signal,
        }),
        config.llm.summaryTimeoutMs,
        'Summary request',
      );
      const summary = normalizeWhitespace(raw);
      if (!summary) return fallback(text);
      summaries.set(text, summary);
      return summary;
    } catch (error) {
      controller.abort();
      logger.warn('Summarization failed; using truncated text', {
        model: config.llm.model,
        error: errorMessage(error),
      });
      return fallback(text);
    }
  };

  return { summarize };
};

export const createSummarizer = (options: SummarizerOptions): Summarizer | null =>
  options.config.llm.summarizeSnippets ? createGeminiSummarizer(options) : null;

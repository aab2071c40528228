import { z } from 'zod';
import type { Article } from '../../shared/types';

export const MAX_ARTICLES_PER_REQUEST = 5_000;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

/** Parses to YYYY-MM-DD; anything unparseable becomes null instead of an error. */
export const coerceDate = (value: string | number | null | undefined): string | null => {
  if (value == null || value === '') return null;
  if (typeof value === 'string') {
    // Keep the calendar date as written rather than shifting it through the local timezone.
    const prefix = /^\d{4}-\d{2}-\d{2}/.exec(value.trim());
    if (prefix) {
      const day = new Date(`${prefix[0]}T00:00:00Z`);
      return !Number.isNaN(day.getTime()) && day.toISOString().startsWith(prefix[0]) ? prefix[0] : null;
    }
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString().slice(0, 10);
};

const ArticleInputSchema = z
  .object({
    headline: optionalText,
    url: z.string().trim().min(1, 'url is required'),
    sourceName: optionalText,
    datePublished: z.union([z.string(), z.number(), z.null()]).optional().catch(null).transform(coerceDate),
    text: optionalText,
    imageUrl: optionalText,
  })
  .transform((input): Article => ({ ...input, labelScores: null }));

export const EnrichRequestSchema = z.object({
  articles: z.array(ArticleInputSchema).max(MAX_ARTICLES_PER_REQUEST),
});

export type ParsedEnrichRequest = { ok: true; articles: Article[] } | { ok: false; issues: string[] };

export const parseEnrichRequest = (body: unknown): ParsedEnrichRequest => {
  const result = EnrichRequestSchema.safeParse(body);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    };
  }
  return { ok: true, articles: result.data.articles };
};

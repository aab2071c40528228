export type StageName = 'enrichment' | 'labeling';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export const NARRATIVE_LABELS = [
  'Pro-Russia',
  'Anti-West',
  'Anti-France',
  'Anti-US',
  'Sensationalist',
  'Opinion',
  'Business',
  'Politics',
] as const;

export const CATCH_ALL_LABELS = ['Factual', 'Neutral'] as const;

export type NarrativeLabel = (typeof NARRATIVE_LABELS)[number];
export type CatchAllLabel = (typeof CATCH_ALL_LABELS)[number];
export type Label = NarrativeLabel | CatchAllLabel;

export const ALL_LABELS: readonly Label[] = [...CATCH_ALL_LABELS, ...NARRATIVE_LABELS];

export type LabelScores = Record<Label, number>;

export interface Article {
  headline: string | null;
  url: string;
  sourceName: string | null;
  /** ISO calendar date (YYYY-MM-DD). */
  datePublished: string | null;
  text: string | null;
  imageUrl: string | null;
  labelScores: LabelScores | null;
}

export interface EnrichedArticle extends Article {
  text: string;
  imageUrl: string;
}

export interface LabeledArticle extends EnrichedArticle {
  labelScores: LabelScores;
}

export interface EnrichmentReport {
  articles: number;
  /** Distinct URLs that needed at least one fetch. */
  urlsQueued: number;
  urlsFetched: number;
  fetchFailures: number;
  /** Article fields resolved from the cache without a fetch. */
  cacheHits: number;
  failedSnippets: number;
  failedImages: number;
  cancelled: boolean;
  elapsedMs: number;
}

export interface PipelineResult {
  runId: string;
  articles: LabeledArticle[];
  report: EnrichmentReport;
}

export interface CacheStats {
  text: { success: number; permanentFailure: number };
  image: { success: number; permanentFailure: number };
}

export interface ApiHealthResponse {
  ok: boolean;
  ts: string;
}

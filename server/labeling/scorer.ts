import type { LabelingConfig } from '../../shared/config';
import {
  ALL_LABELS,
  type Article,
  type EnrichedArticle,
  type LabelScores,
  type LabeledArticle,
} from '../../shared/types';
import { KEYWORD_LABELS, type KeywordTable } from './keywords';

export const DEFAULT_LABELING: LabelingConfig = {
  keywordWeight: 0.2,
  strongThreshold: 0.3,
  factualCenter: 0.7,
  neutralCenter: 0.6,
  jitter: 0.1,
};

export interface ScoreOptions {
  labeling?: LabelingConfig;
  table?: KeywordTable;
  /** Uniform source in [0, 1). */
  random?: () => number;
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export const emptyScores = (): LabelScores => ({
  Factual: 0,
  Neutral: 0,
  'Pro-Russia': 0,
  'Anti-West': 0,
  'Anti-France': 0,
  'Anti-US': 0,
  Sensationalist: 0,
  Opinion: 0,
  Business: 0,
  Politics: 0,
});

/**
 * Whole-word check by padding: the keyword must sit between spaces or at
 * either end of the text. Punctuation next to a word defeats the match.
 */
export const containsKeyword = (text: string, keyword: string): boolean =>
  text.includes(` ${keyword} `) || text.startsWith(`${keyword} `) || text.endsWith(` ${keyword}`);

export const combinedText = (article: Pick<Article, 'headline' | 'text'>): string =>
  `${(article.headline ?? '').toLowerCase()} ${(article.text ?? '').toLowerCase()}`;

export const scoreArticle = (article: Pick<Article, 'headline' | 'text'>, options: ScoreOptions = {}): LabelScores => {
  const labeling = options.labeling ?? DEFAULT_LABELING;
  const table = options.table ?? KEYWORD_LABELS;
  const random = options.random ?? Math.random;
  const text = combinedText(article);
  const scores = emptyScores();

  let foundStrongLabel = false;
  for (const { label, keywords } of table) {
    let score = 0;
    for (const keyword of keywords) {
      if (containsKeyword(text, keyword)) score += labeling.keywordWeight;
    }
    if (score > 0) {
      scores[label] = Math.min(score, 1);
      if (score >= labeling.strongThreshold) foundStrongLabel = true;
    }
  }

  if (!foundStrongLabel) {
    const jitter = () => (random() * 2 - 1) * labeling.jitter;
    scores.Factual = labeling.factualCenter + jitter();
    scores.Neutral = labeling.neutralCenter + jitter();
  }

  for (const label of ALL_LABELS) scores[label] = clamp01(scores[label]);
  return scores;
};

export const scoreArticles = (articles: readonly EnrichedArticle[], options: ScoreOptions = {}): LabeledArticle[] =>
  articles.map((article) => ({ ...article, labelScores: scoreArticle(article, options) }));

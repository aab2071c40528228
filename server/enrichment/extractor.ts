import { load, type CheerioAPI } from 'cheerio';
import { buildExcerpt, normalizeWhitespace } from '../utils/text';
import { isValidImage } from './imageValidator';

export const ARTICLE_CONTAINER_SELECTORS = [
  'article',
  'div.article-body',
  'div.content-body',
  'div.story-content',
  'div.main-content',
  // CMS variants (WordPress, Newspaper theme, schema.org markup)
  'div.entry-content',
  'div.post-content',
  'div.td-post-content',
  '[itemprop="articleBody"]',
];

const CONTAINER_QUERY = ARTICLE_CONTAINER_SELECTORS.join(', ');
const CONTAINER_IMAGE_QUERY = ARTICLE_CONTAINER_SELECTORS.map((selector) => `${selector} img`).join(', ');

const IMAGE_META_KEYS = ['og:image', 'twitter:image'];

export interface SnippetOptions {
  maxLength: number;
}

const firstNonEmpty = (texts: string[]): string | null => {
  for (const raw of texts) {
    const text = normalizeWhitespace(raw);
    if (text) return text;
  }
  return null;
};

export const extractSnippetFromDocument = ($: CheerioAPI, options: SnippetOptions): string | null => {
  for (const container of $(CONTAINER_QUERY).toArray()) {
    const text = firstNonEmpty(
      $(container)
        .find('p')
        .toArray()
        .map((p) => $(p).text()),
    );
    if (text) return buildExcerpt(text, options.maxLength);
  }
  const anywhere = firstNonEmpty(
    $('p')
      .toArray()
      .map((p) => $(p).text()),
  );
  return anywhere ? buildExcerpt(anywhere, options.maxLength) : null;
};

const resolveImageUrl = (raw: string | undefined, baseUrl: string): string | null => {
  const trimmed = raw?.trim();
  if (!trimmed) return null;
  try {
    const resolved = new URL(trimmed, baseUrl);
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : null;
  } catch {
    return null;
  }
};

const metaContent = ($: CheerioAPI, key: string): string | undefined =>
  $(`meta[property="${key}"]`).attr('content') ?? $(`meta[name="${key}"]`).attr('content');

/** Image candidates in priority order, resolved but not yet validated. */
export const collectImageCandidates = ($: CheerioAPI, baseUrl: string): string[] => {
  const imgSources = (selector: string) =>
    $(selector)
      .toArray()
      // Lazy loaders keep the real URL in data-src behind a placeholder src.
      .flatMap((el) => [$(el).attr('data-src'), $(el).attr('src')]);
  const raw: Array<string | undefined> = [
    ...IMAGE_META_KEYS.map((key) => metaContent($, key)),
    ...imgSources(CONTAINER_IMAGE_QUERY),
    ...imgSources('img'),
  ];

  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const value of raw) {
    const resolved = resolveImageUrl(value, baseUrl);
    if (!resolved || seen.has(resolved)) continue;
    seen.add(resolved);
    candidates.push(resolved);
  }
  return candidates;
};

export const extractImageFromDocument = ($: CheerioAPI, baseUrl: string): string | null =>
  collectImageCandidates($, baseUrl).find((candidate) => isValidImage(candidate)) ?? null;

export const extractSnippet = (html: string, options: SnippetOptions): string | null =>
  extractSnippetFromDocument(load(html), options);

export const extractImage = (html: string, baseUrl: string): string | null =>
  extractImageFromDocument(load(html), baseUrl);

export interface ExtractedContent {
  text: string | null;
  image: string | null;
}

/** Parses once and runs only the requested extractions. */
export const extractContent = (
  html: string,
  baseUrl: string,
  wanted: { text: boolean; image: boolean },
  options: SnippetOptions,
): ExtractedContent => {
  const $ = load(html);
  return {
    text: wanted.text ? extractSnippetFromDocument($, options) : null,
    image: wanted.image ? extractImageFromDocument($, baseUrl) : null,
  };
};

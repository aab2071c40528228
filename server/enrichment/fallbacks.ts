import { isMissingValue, sliceText } from '../utils/text';
import { isValidImage } from './imageValidator';

export const NO_SNIPPET_TEXT = 'No snippet available';

export interface ImageFallbackOptions {
  logoUrlTemplate: string;
  faviconUrlTemplate: string;
  placeholderImageUrl: string;
}

export const fallbackText = (headline: string | null, maxLength = 250): string => {
  const trimmed = headline?.trim();
  if (!trimmed || isMissingValue(trimmed)) return NO_SNIPPET_TEXT;
  return `${sliceText(trimmed, maxLength)}...`;
};

export const domainOf = (rawUrl: string): string | null => {
  try {
    const host = new URL(rawUrl).hostname.toLowerCase().replace(/^www\./, '');
    return host || null;
  } catch {
    return null;
  }
};

const fromTemplate = (template: string, domain: string | null): string | null =>
  template && domain ? template.replaceAll('{domain}', domain) : null;

/**
 * Logo for the article's domain, then its favicon, then the placeholder.
 * The placeholder is returned even when it fails validation so the chain
 * always ends in a value.
 */
export const fallbackImage = (articleUrl: string, options: ImageFallbackOptions): string => {
  const domain = domainOf(articleUrl);
  const chain = [fromTemplate(options.logoUrlTemplate, domain), fromTemplate(options.faviconUrlTemplate, domain)];
  for (const candidate of chain) {
    if (candidate && isValidImage(candidate, { allowBranding: true })) {
      return candidate;
    }
  }
  return options.placeholderImageUrl;
};

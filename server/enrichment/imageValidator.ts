/** Publisher branding. Rejected for extracted images, tolerated for the derived logo/favicon fallbacks. */
export const BRANDING_MARKERS = ['logo', 'icon'] as const;

export const NON_CONTENT_MARKERS = [
  'ad.',
  '/ads/',
  'banner',
  'sponsor',
  'doubleclick',
  '.gif',
  'pixel',
  'tracking',
  'spacer',
  '1x1',
  'blank.',
] as const;

export interface ImageValidationOptions {
  allowBranding?: boolean;
}

export const isValidImage = (url: string | null | undefined, options: ImageValidationOptions = {}): boolean => {
  if (!url) return false;
  const normalized = url.trim().toLowerCase();
  if (!normalized) return false;
  if (NON_CONTENT_MARKERS.some((marker) => normalized.includes(marker))) return false;
  if (!options.allowBranding && BRANDING_MARKERS.some((marker) => normalized.includes(marker))) return false;
  return true;
};

export const TRUNCATION_MARKER = '...';

/** `slice(0, end)` that backs off instead of splitting a surrogate pair. */
export const sliceText = (value: string, end: number): string => {
  const cut = value.slice(0, end);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
};

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/**
 * Collapses whitespace and cuts to `maxLength` characters, marker included.
 * Text that already fits is returned without a marker.
 */
export const buildExcerpt = (value: string | null | undefined, maxLength = 500): string => {
  if (!value) return '';
  const normalized = normalizeWhitespace(String(value));
  if (normalized.length <= maxLength) return normalized;
  const keep = Math.max(0, maxLength - TRUNCATION_MARKER.length);
  return `${sliceText(normalized, keep).trim()}${TRUNCATION_MARKER}`;
};

const MISSING_SENTINELS = new Set(['none', 'null', 'nan']);

/** Blank values and spreadsheet placeholders such as "None" count as missing. */
export const isMissingValue = (value: string | null | undefined): boolean => {
  if (value == null) return true;
  const trimmed = value.trim();
  return trimmed === '' || MISSING_SENTINELS.has(trimmed.toLowerCase());
};

export const truncateForLog = (value: string, maxLength = 50): string =>
  value.length <= maxLength ? value : `${sliceText(value, maxLength)}...`;

import type { CacheStats } from '../../shared/types';
import type { CacheEntry, CacheWrite, ContentKind } from './types';

export interface EnrichmentCache {
  get: (url: string, kind: ContentKind) => CacheEntry | undefined;
  put: (url: string, kind: ContentKind, write: CacheWrite) => CacheEntry;
  stats: () => CacheStats;
  clear: () => void;
}

/**
 * Process-lifetime cache of resolved snippets and images. Text and image are
 * keyed separately, so a URL can succeed for one and fail for the other.
 * Entries never expire; a permanent failure stays one until `clear()`.
 */
export const createInMemoryEnrichmentCache = (now: () => number = Date.now): EnrichmentCache => {
  const entries: Record<ContentKind, Map<string, CacheEntry>> = {
    text: new Map(),
    image: new Map(),
  };

  const get = (url: string, kind: ContentKind): CacheEntry | undefined => entries[kind].get(url);

  const put = (url: string, kind: ContentKind, write: CacheWrite): CacheEntry => {
    const entry: CacheEntry = {
      url,
      kind,
      outcome: write.outcome,
      value: write.outcome === 'success' ? write.value : null,
      storedAt: now(),
    };
    entries[kind].set(url, entry);
    return entry;
  };

  const countFor = (kind: ContentKind) => {
    let success = 0;
    let permanentFailure = 0;
    for (const entry of entries[kind].values()) {
      if (entry.outcome === 'success') success += 1;
      else permanentFailure += 1;
    }
    return { success, permanentFailure };
  };

  return {
    get,
    put,
    stats: () => ({ text: countFor('text'), image: countFor('image') }),
    clear: () => {
      entries.text.clear();
      entries.image.clear();
    },
  };
};

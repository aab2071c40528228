import { describe, expect, it } from 'vitest';
import { createInMemoryEnrichmentCache } from '../cache';
import { PERMANENT_FAILURE } from '../types';

describe('createInMemoryEnrichmentCache', () => {
  it('stores text and image outcomes separately per URL', () => {
    const cache = createInMemoryEnrichmentCache(() => 1_000);
    const url = 'https://news.example.com/a';

    cache.put(url, 'text', { outcome: 'success', value: 'Snippet.' });
    cache.put(url, 'image', PERMANENT_FAILURE);

    expect(cache.get(url, 'text')).toEqual({ url, kind: 'text', outcome: 'success', value: 'Snippet.', storedAt: 1_000 });
    expect(cache.get(url, 'image')).toEqual({ url, kind: 'image', outcome: 'permanent_failure', value: null, storedAt: 1_000 });
    expect(cache.get('https://news.example.com/b', 'text')).toBeUndefined();
  });

  it('counts entries by kind and outcome', () => {
    const cache = createInMemoryEnrichmentCache();
    cache.put('https://a.example.com/', 'text', { outcome: 'success', value: 'x' });
    cache.put('https://b.example.com/', 'text', PERMANENT_FAILURE);
    cache.put('https://b.example.com/', 'image', PERMANENT_FAILURE);

    expect(cache.stats()).toEqual({
      text: { success: 1, permanentFailure: 1 },
      image: { success: 0, permanentFailure: 1 },
    });
  });

  it('overwrites and clears entries', () => {
    const cache = createInMemoryEnrichmentCache();
    const url = 'https://a.example.com/';
    cache.put(url, 'text', PERMANENT_FAILURE);
    cache.put(url, 'text', { outcome: 'success', value: 'later' });

    expect(cache.get(url, 'text')?.value).toBe('later');

    cache.clear();
    expect(cache.get(url, 'text')).toBeUndefined();
    expect(cache.stats().text).toEqual({ success: 0, permanentFailure: 0 });
  });
});

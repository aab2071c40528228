export type ContentKind = 'text' | 'image';

export const CONTENT_KINDS: readonly ContentKind[] = ['text', 'image'];

/**
 * `client_error` (403/404), `blocked` and `http_error` are terminal on the
 * first attempt; `timeout` and `network` are what remains once retries run out.
 */
export type FetchFailureReason = 'timeout' | 'network' | 'client_error' | 'http_error' | 'blocked';

export type FetchOutcome =
  | { ok: true; html: string; finalUrl: string; status: number; attempts: number }
  | { ok: false; reason: FetchFailureReason; status?: number; error: string; attempts: number };

export interface FetchPageOptions {
  maxRetries?: number;
  baseDelayMs?: number;
}

export interface PageFetcher {
  readonly strategy: 'http' | 'renderer';
  fetchPage: (url: string, options?: FetchPageOptions) => Promise<FetchOutcome>;
  close?: () => Promise<void>;
}

export type CacheOutcome = 'success' | 'permanent_failure';

export interface CacheEntry {
  url: string;
  kind: ContentKind;
  outcome: CacheOutcome;
  value: string | null;
  storedAt: number;
}

export type CacheWrite = { outcome: 'success'; value: string } | { outcome: 'permanent_failure' };

export const PERMANENT_FAILURE: CacheWrite = { outcome: 'permanent_failure' };

export type ProgressCallback = (fraction: number, message: string) => void;

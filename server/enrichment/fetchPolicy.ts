import { sleep } from '../utils/async';
import type { FetchFailureReason, FetchOutcome } from './types';

export type AttemptResult =
  | { ok: true; html: string; finalUrl: string; status: number }
  | { ok: false; retryable: boolean; reason: FetchFailureReason; status?: number; error: string };

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

const PRIVATE_IP_RANGES = [/^127\./, /^10\./, /^192\.168\./, /^172\.(1[6-9]|2[0-9]|3[0-1])\./, /^169\.254\./, /^0\./];

const PRIVATE_IPV6_PREFIXES = ['fc', 'fd', 'fe80', '::1'];

const isIpv4 = (value: string): boolean => /^(\d{1,3}\.){3}\d{1,3}$/.test(value);

const isPrivateHost = (hostname: string): boolean => {
  const host = hostname.replace(/^\[|\]$/g, '').toLowerCase();
  if (host.includes(':')) {
    return PRIVATE_IPV6_PREFIXES.some((prefix) => host.startsWith(prefix));
  }
  return isIpv4(host) && PRIVATE_IP_RANGES.some((pattern) => pattern.test(host));
};

/** Returns why `rawUrl` must not be fetched, or `null` when it may be. */
export const checkUrlAllowed = (rawUrl: string): string | null => {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    return `Invalid URL: ${rawUrl}`;
  }
  if (!TRUSTED_PROTOCOLS.has(parsed.protocol)) {
    return `Unsupported protocol: ${parsed.protocol}`;
  }
  if (parsed.hostname === 'localhost' || parsed.hostname.endsWith('.local')) {
    return `Blocked hostname: ${parsed.hostname}`;
  }
  if (isPrivateHost(parsed.hostname)) {
    return `Blocked IP address: ${parsed.hostname}`;
  }
  return null;
};

const TERMINAL_CLIENT_STATUSES = new Set([403, 404]);
const TRANSIENT_STATUSES = new Set([408, 429]);

/** Maps a non-2xx status onto the failure taxonomy. */
export const classifyHttpStatus = (status: number): AttemptResult => {
  const error = `HTTP ${status}`;
  if (TERMINAL_CLIENT_STATUSES.has(status)) {
    return { ok: false, retryable: false, reason: 'client_error', status, error };
  }
  if (status >= 500 || TRANSIENT_STATUSES.has(status)) {
    return { ok: false, retryable: true, reason: 'http_error', status, error };
  }
  return { ok: false, retryable: false, reason: 'http_error', status, error };
};

/**
 * Runs `attempt` up to `maxRetries` times, sleeping `baseDelayMs * n` after
 * the n-th retryable failure. Terminal failures return immediately.
 */
export const fetchWithRetries = async (
  attempt: (attemptNumber: number) => Promise<AttemptResult>,
  policy: RetryPolicy,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<FetchOutcome> => {
  const maxAttempts = Math.max(1, Math.floor(policy.maxRetries));
  let last: Extract<AttemptResult, { ok: false }> | null = null;

  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber += 1) {
    const result = await attempt(attemptNumber);
    if (result.ok) {
      return { ...result, attempts: attemptNumber };
    }
    if (!result.retryable) {
      return { ok: false, reason: result.reason, status: result.status, error: result.error, attempts: attemptNumber };
    }
    last = result;
    if (attemptNumber < maxAttempts && policy.baseDelayMs > 0) {
      await wait(policy.baseDelayMs * attemptNumber);
    }
  }

  return {
    ok: false,
    reason: last?.reason ?? 'network',
    status: last?.status,
    error: last?.error ?? 'Fetch failed',
    attempts: maxAttempts,
  };
};

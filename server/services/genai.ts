import { GoogleGenAI } from '@google/genai';
import { sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

export interface GenerateTextParams {
  apiKey: string;
  model: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  requestsPerMinute: number;
  signal?: AbortSignal;
}

export type GenerateText = (params: GenerateTextParams) => Promise<string>;

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  rateLimitMutex: Semaphore;
  lastUsedAt: number;
};

const stateByApiKey = new Map<string, KeyState>();
const MAX_KEYS = 32;
const WINDOW_MS = 60_000;
const MAX_ATTEMPTS = 3;

const trimStateCache = () => {
  if (stateByApiKey.size <= MAX_KEYS) {
    return;
  }
  let oldestKey: string | null = null;
  let oldestTs = Infinity;
  for (const [key, state] of stateByApiKey.entries()) {
    if (state.lastUsedAt < oldestTs) {
      oldestTs = state.lastUsedAt;
      oldestKey = key;
    }
  }
  if (oldestKey) {
    stateByApiKey.delete(oldestKey);
  }
};

const getStateForApiKey = (apiKey: string): KeyState => {
  const existing = stateByApiKey.get(apiKey);
  if (existing) {
    existing.lastUsedAt = Date.now();
    return existing;
  }

  const created: KeyState = {
    client: new GoogleGenAI({ apiKey }),
    requestTimestamps: [],
    rateLimitMutex: new Semaphore(1),
    lastUsedAt: Date.now(),
  };
  stateByApiKey.set(apiKey, created);
  trimStateCache();
  return created;
};

const statusOf = (error: unknown): number | null => {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  return typeof error.status === 'number' ? error.status : null;
};

export const isTransientError = (error: unknown): boolean => {
  const code = statusOf(error);
  if (code === 429 || code === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return /quota|unavailable|overload|temporar/.test(message);
};

/** Blocks until a request slot is free in the per-key sliding window. */
const reserveSlot = async (state: KeyState, rpm: number, signal?: AbortSignal): Promise<void> => {
  while (true) {
    const waitMs = await state.rateLimitMutex.use(async () => {
      const now = Date.now();
      while (state.requestTimestamps.length > 0 && now - state.requestTimestamps[0] > WINDOW_MS) {
        state.requestTimestamps.shift();
      }
      if (state.requestTimestamps.length < rpm) {
        state.requestTimestamps.push(now);
        return 0;
      }
      return Math.max(0, state.requestTimestamps[0] + WINDOW_MS - now);
    }, signal);

    if (waitMs <= 0) return;
    await sleep(waitMs, signal);
  }
};

/** Gemini text generation, rate limited per API key and retried on transient errors. */
export const generateGeminiText: GenerateText = async (params) => {
  if (!params.apiKey) {
    throw new Error('GEMINI_API_KEY missing');
  }
  const state = getStateForApiKey(params.apiKey);
  // Hard cap: never exceed 10 RPM regardless of config
  const rpm = Math.max(1, Math.min(10, params.requestsPerMinute || 10));

  for (let attempt = 1; ; attempt += 1) {
    try {
      await reserveSlot(state, rpm, params.signal);
      const response = await state.client.models.generateContent({
        model: params.model,
        contents: params.prompt,
        config: {
          temperature: params.temperature,
          maxOutputTokens: params.maxOutputTokens,
          abortSignal: params.signal,
        },
      });
      const text = response.text?.trim();
      if (!text) {
        throw new Error('Empty response from Gemini');
      }
      return text;
    } catch (error) {
      if (params.signal?.aborted || !isTransientError(error) || attempt >= MAX_ATTEMPTS) {
        throw error;
      }
      const backoff = Math.min(30_000, 1_000 * 2 ** attempt) + Math.floor(Math.random() * 1_000);
      await sleep(backoff, params.signal);
    }
  }
};

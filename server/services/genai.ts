import { GoogleGenAI, type GenerateContentConfig, type GenerateContentResponse } from '@google/genai';
import type { AppConfig } from '../../shared/config';
import { ProviderUnconfiguredError } from '../../shared/errors';
import { sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  rateLimitMutex: Semaphore;
  lastUsedAt: number;
};

const stateByApiKey = new Map<string, KeyState>();
const MAX_KEYS = 32;
const WINDOW_MS = 60_000;
const MAX_TRANSPORT_ATTEMPTS = 5;

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

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/** HTTP-ish status carried by an SDK error, either flat or under `error.code`. */
export const errorStatus = (error: unknown): number | null => {
  if (!isRecord(error)) return null;
  if (typeof error.status === 'number') return error.status;
  if (isRecord(error.error) && typeof error.error.code === 'number') return error.error.code;
  return null;
};

const parseDelaySeconds = (value: unknown): number | null => {
  const match = typeof value === 'string' ? value.match(/([0-9.]+)s/) : null;
  return match ? Math.ceil(Number(match[1]) * 1000) : null;
};

export const parseRetryDelayMs = (error: unknown): number | null => {
  if (!isRecord(error)) return null;
  const details = isRecord(error.error) ? error.error.details : error.details;
  if (!Array.isArray(details)) return null;
  for (const detail of details) {
    if (!isRecord(detail)) continue;
    const delay = parseDelaySeconds(detail.retryDelay);
    if (delay != null) return delay;
  }
  return null;
};

export const isTransientError = (error: unknown): boolean => {
  const code = errorStatus(error);
  if (code === 429 || code === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message : isRecord(error) ? String(error.message ?? '') : '';
  return /quota|unavailable|overload|temporar/i.test(message);
};

export interface GenerateContentRequest {
  model: string;
  prompt: string;
  config?: GenerateContentConfig;
  signal?: AbortSignal;
}

/** Reserves a slot in the per-key requests-per-minute window, waiting when it is full. */
const acquireRateSlot = async (state: KeyState, rpm: number, signal?: AbortSignal) => {
  while (true) {
    const release = await state.rateLimitMutex.acquire(signal);
    let waitMs = 0;
    try {
      const now = Date.now();
      while (state.requestTimestamps.length > 0 && now - state.requestTimestamps[0] > WINDOW_MS) {
        state.requestTimestamps.shift();
      }
      if (state.requestTimestamps.length < rpm) {
        state.requestTimestamps.push(now);
      } else {
        waitMs = Math.max(0, state.requestTimestamps[0] + WINDOW_MS - now);
      }
    } finally {
      release();
    }
    if (waitMs <= 0) return;
    await sleep(waitMs, signal);
  }
};

/**
 * One `generateContent` call behind the per-key rate gate. Transient failures
 * (429/503, quota, overload) back off and retry; anything else rejects at once.
 */
export const rateLimitedGenerateContent = async (
  config: Pick<AppConfig, 'llm'>,
  request: GenerateContentRequest,
): Promise<GenerateContentResponse> => {
  const apiKey = config.llm.apiKey;
  if (!apiKey) {
    throw new ProviderUnconfiguredError('Gemini', 'GEMINI_API_KEY is not set');
  }
  const state = getStateForApiKey(apiKey);
  const rpm = Math.max(1, config.llm.requestsPerMinute);

  for (let attempt = 1; ; attempt += 1) {
    try {
      if (request.signal?.aborted) {
        throw new Error('Aborted');
      }
      await acquireRateSlot(state, rpm, request.signal);
      return await state.client.models.generateContent({
        model: request.model,
        contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
        config: { ...request.config, abortSignal: request.config?.abortSignal ?? request.signal },
      });
    } catch (error) {
      if (request.signal?.aborted || !isTransientError(error) || attempt >= MAX_TRANSPORT_ATTEMPTS) {
        throw error instanceof Error ? error : new Error(String(error));
      }
      const backoff = parseRetryDelayMs(error) ?? Math.min(60_000, 1_000 * 2 ** attempt) + Math.floor(Math.random() * 1_000);
      await sleep(backoff, request.signal);
    }
  }
};

/** Text payload of a response: the SDK's `text`, else the joined text parts of the first candidate. */
export const extractGenerateContentText = (response: GenerateContentResponse): string | undefined => {
  const direct = response.text;
  if (typeof direct === 'string' && direct.trim()) return direct;

  const parts = response.candidates?.[0]?.content?.parts ?? [];
  const joined = parts
    .map((part) => (typeof part.text === 'string' ? part.text : ''))
    .join('\n')
    .trim();
  return joined || undefined;
};

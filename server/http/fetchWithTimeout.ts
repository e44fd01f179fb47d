import type { AppConfig } from '../../shared/config';

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
  method?: 'GET' | 'POST' | 'HEAD';
  accept?: string;
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  redirect?: 'follow' | 'manual' | 'error';
}

export const HTML_ACCEPT = 'text/html,application/xhtml+xml';

export const fetchOptionsFrom = (config: Pick<AppConfig, 'fetch'>, signal?: AbortSignal): FetchOptions => ({
  timeoutMs: config.fetch.timeoutMs,
  userAgent: config.fetch.userAgent,
  signal,
});

/**
 * `fetch` bounded by `timeoutMs`. A timeout surfaces as a rejected promise, the
 * same as any other network failure.
 */
export const fetchWithTimeout = async (url: string, options: FetchOptions): Promise<Response> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${options.timeoutMs}ms`)), options.timeoutMs);
  let abortListener: (() => void) | null = null;

  if (options.signal) {
    if (options.signal.aborted) {
      clearTimeout(timer);
      throw new Error('Aborted');
    }
    abortListener = () => controller.abort();
    options.signal.addEventListener('abort', abortListener, { once: true });
  }

  try {
    return await fetch(url, {
      method: options.method ?? 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? HTML_ACCEPT,
        'Accept-Language': 'en-US,en;q=0.9',
        ...options.headers,
      },
      body: options.body,
      redirect: options.redirect ?? 'follow',
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timer);
    if (abortListener && options.signal) {
      options.signal.removeEventListener('abort', abortListener);
    }
  }
};

/** Fetches and reads the body as text; non-2xx statuses reject. */
export const fetchText = async (url: string, options: FetchOptions): Promise<{ response: Response; text: string }> => {
  const response = await fetchWithTimeout(url, options);
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} for ${url}`);
  }
  return { response, text: await response.text() };
};

import { vi } from 'vitest';
import type { AppConfig } from '../../shared/config';
import { buildConfigFromEnv } from '../config/config';

/** Config for tests: no remote provider, in-memory persistence, short timeouts. */
export const testConfig = (env: NodeJS.ProcessEnv = {}): AppConfig =>
  buildConfigFromEnv({
    NODE_ENV: 'test',
    SCRAPING_PROVIDER: 'direct',
    PERSISTENCE_MODE: 'memory',
    FETCH_TIMEOUT_MS: '2000',
    FETCH_USER_AGENT: 'test-agent',
    ...env,
  });

export const htmlResponse = (body: string, status = 200): Response =>
  new Response(body, { status, headers: { 'content-type': 'text/html; charset=utf-8' } });

export const xmlResponse = (body: string, status = 200): Response =>
  new Response(body, { status, headers: { 'content-type': 'application/rss+xml' } });

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

type Route = readonly [match: string | RegExp, respond: (url: string, init?: RequestInit) => Response | Promise<Response>];

const requestUrl = (input: string | URL | Request): string =>
  typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;

/**
 * Stubs global `fetch` with a first-match router. A string matches as a URL
 * prefix. Unrouted requests reject like a network failure.
 */
export const routeFetch = (routes: Route[]) => {
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = requestUrl(input);
    const route = routes.find(([match]) => (typeof match === 'string' ? url.startsWith(match) : match.test(url)));
    if (!route) {
      throw new TypeError(`fetch failed: no route for ${url}`);
    }
    return route[1](url, init);
  });
  vi.stubGlobal('fetch', mock);
  return mock;
};

export const calledUrls = (mock: ReturnType<typeof routeFetch>): string[] =>
  mock.mock.calls.map(([input]) => requestUrl(input));

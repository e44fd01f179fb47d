import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProviderRequestError, ProviderUnconfiguredError } from '../../../shared/errors';
import { calledUrls, jsonResponse, routeFetch, testConfig } from '../../testing/support';
import { createFirecrawlClient, normalizeProviderResponse } from '../connectors/firecrawl';

const providerConfig = testConfig({ SCRAPING_PROVIDER: 'firecrawl', FIRECRAWL_API_KEY: 'test-secret' });

describe('normalizeProviderResponse', () => {
  it('reads an enveloped response with camel-case metadata', () => {
    const doc = normalizeProviderResponse({
      success: true,
      data: {
        markdown: '# Acme',
        html: '<h1>Acme</h1>',
        metadata: {
          title: 'Acme',
          description: 'Logistics software',
          sourceURL: 'https://acme.test',
          statusCode: 200,
          language: 'en',
          keywords: 'logistics, retail',
          ogTitle: 'Acme OG',
          'og:image': 'https://acme.test/og.png',
          twitter_card: 'summary',
        },
      },
    });

    expect(doc).toEqual({
      sourceUrl: 'https://acme.test',
      statusCode: 200,
      title: 'Acme',
      description: 'Logistics software',
      language: 'en',
      keywords: ['logistics', 'retail'],
      markdown: '# Acme',
      html: '<h1>Acme</h1>',
      openGraph: { 'og:title': 'Acme OG', 'og:image': 'https://acme.test/og.png' },
      twitter: { 'twitter:card': 'summary' },
    });
  });

  it('reads a flat legacy response with snake-case metadata', () => {
    const doc = normalizeProviderResponse({
      content: 'Legacy content',
      rawHtml: '<p>Legacy</p>',
      metadata: { source_url: 'https://acme.test/old', og_description: 'Old description', status_code: 201 },
    });

    expect(doc.markdown).toBe('Legacy content');
    expect(doc.html).toBe('<p>Legacy</p>');
    expect(doc.sourceUrl).toBe('https://acme.test/old');
    expect(doc.statusCode).toBe(201);
    expect(doc.description).toBe('Old description');
    expect(doc.openGraph).toEqual({ 'og:description': 'Old description' });
  });

  it('surfaces an unsuccessful response', () => {
    expect(() => normalizeProviderResponse({ success: false, error: 'quota exceeded' })).toThrow(
      'Firecrawl request failed: quota exceeded',
    );
  });

  it('rejects an unrecognised shape', () => {
    expect(() => normalizeProviderResponse({ unexpected: true })).toThrow(ProviderRequestError);
  });
});

describe('createFirecrawlClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('refuses to build when the provider is switched off', () => {
    expect(() => createFirecrawlClient({ config: testConfig({ FIRECRAWL_API_KEY: 'test-secret' }) })).toThrow(
      ProviderUnconfiguredError,
    );
  });

  it('refuses to build without an api key', () => {
    expect(() => createFirecrawlClient({ config: testConfig({ SCRAPING_PROVIDER: 'firecrawl' }) })).toThrow(
      'Firecrawl is not configured: FIRECRAWL_API_KEY is not set',
    );
  });

  it('posts scrape requests with the key and requested formats', async () => {
    const mock = routeFetch([
      ['https://api.firecrawl.dev/v1/scrape', () => jsonResponse({ success: true, data: { markdown: 'Hello' } })],
    ]);
    const client = createFirecrawlClient({ config: providerConfig });

    const doc = await client.scrape('https://acme.test', ['markdown', 'html']);

    expect(doc.markdown).toBe('Hello');
    const init = mock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(init?.body))).toEqual({
      url: 'https://acme.test',
      formats: ['markdown', 'html'],
      onlyMainContent: true,
    });
  });

  it('turns an error status into a request error', async () => {
    routeFetch([['https://api.firecrawl.dev/v1/scrape', () => jsonResponse({ error: 'Unauthorized' }, 401)]]);
    const client = createFirecrawlClient({ config: providerConfig });

    await expect(client.scrape('https://acme.test', ['markdown'])).rejects.toMatchObject({ status: 401 });
  });

  it('polls an asynchronous crawl until it completes', async () => {
    let polls = 0;
    const mock = routeFetch([
      [
        'https://api.firecrawl.dev/v1/crawl/crawl-1',
        () => {
          polls += 1;
          return polls < 2
            ? jsonResponse({ status: 'scraping' })
            : jsonResponse({
                status: 'completed',
                data: [
                  { markdown: 'About us', metadata: { sourceURL: 'https://acme.test/about', title: 'About' } },
                  { markdown: 'Pricing', metadata: { sourceURL: 'https://acme.test/pricing', title: 'Pricing' } },
                ],
              });
        },
      ],
      ['https://api.firecrawl.dev/v1/crawl', () => jsonResponse({ success: true, id: 'crawl-1' })],
    ]);
    const sleep = vi.fn(async (_ms: number) => {});
    const client = createFirecrawlClient({ config: providerConfig, sleep });

    const pages = await client.crawl('https://acme.test', 5);

    expect(pages.map((page) => page.sourceUrl)).toEqual(['https://acme.test/about', 'https://acme.test/pricing']);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(calledUrls(mock)).toEqual([
      'https://api.firecrawl.dev/v1/crawl',
      'https://api.firecrawl.dev/v1/crawl/crawl-1',
      'https://api.firecrawl.dev/v1/crawl/crawl-1',
    ]);
  });

  it('returns pages from a synchronous crawl answer', async () => {
    routeFetch([
      [
        'https://api.firecrawl.dev/v1/crawl',
        () => jsonResponse({ success: true, data: [{ markdown: 'One' }, { markdown: 'Two' }, { markdown: 'Three' }] }),
      ],
    ]);
    const client = createFirecrawlClient({ config: providerConfig, sleep: async () => {} });

    const pages = await client.crawl('https://acme.test', 2);
    expect(pages.map((page) => page.markdown)).toEqual(['One', 'Two']);
  });

  it('rejects a failed crawl', async () => {
    routeFetch([
      ['https://api.firecrawl.dev/v1/crawl/crawl-2', () => jsonResponse({ status: 'failed', error: 'blocked' })],
      ['https://api.firecrawl.dev/v1/crawl', () => jsonResponse({ success: true, id: 'crawl-2' })],
    ]);
    const client = createFirecrawlClient({ config: providerConfig, sleep: async () => {} });

    await expect(client.crawl('https://acme.test', 5)).rejects.toThrow('Firecrawl request failed: blocked');
  });
});

import { z } from 'zod';
import type { AppConfig } from '../../../shared/config';
import { ProviderRequestError, ProviderUnconfiguredError } from '../../../shared/errors';
import { fetchWithTimeout, type FetchOptions } from '../../http/fetchWithTimeout';
import { errorMessage } from '../../obs/logger';
import { sleep as defaultSleep, type Sleep } from '../../utils/async';

const PROVIDER = 'Firecrawl';

export type ProviderFormat = 'markdown' | 'html';

/** The one shape the acquirer sees, whatever the provider version answered with. */
export interface ProviderDocument {
  sourceUrl: string | null;
  statusCode: number | null;
  title: string;
  description: string;
  language: string;
  keywords: string[];
  /** Cleaned long-form text. */
  markdown: string;
  html: string;
  openGraph: Record<string, string>;
  twitter: Record<string, string>;
}

export interface RemoteExtractionProvider {
  readonly name: string;
  scrape(url: string, formats: ProviderFormat[], signal?: AbortSignal): Promise<ProviderDocument>;
  crawl(url: string, pageLimit: number, signal?: AbortSignal): Promise<ProviderDocument[]>;
}

const PageSchema = z
  .object({
    markdown: z.string().nullish(),
    content: z.string().nullish(),
    html: z.string().nullish(),
    rawHtml: z.string().nullish(),
    raw_html: z.string().nullish(),
    metadata: z.record(z.unknown()).nullish(),
  })
  .passthrough();

type ProviderPage = z.infer<typeof PageSchema>;

const FailureSchema = z.object({
  success: z.literal(false),
  error: z.string().optional(),
});

const EnvelopeSchema = z.object({
  success: z.boolean().optional(),
  data: PageSchema,
});

const CrawlStartSchema = z.object({
  success: z.boolean().optional(),
  error: z.string().optional(),
  id: z.string().optional(),
  jobId: z.string().optional(),
  data: z.array(PageSchema).optional(),
});

const CrawlStatusSchema = z.object({
  status: z.string().optional(),
  error: z.string().optional(),
  data: z.array(PageSchema).optional(),
});

const metadataValue = (metadata: Record<string, unknown>, ...keys: string[]): string => {
  for (const key of keys) {
    const value = metadata[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (Array.isArray(value)) {
      const first = value.find((entry): entry is string => typeof entry === 'string' && entry.trim().length > 0);
      if (first) return first.trim();
    }
  }
  return '';
};

const metadataStatus = (metadata: Record<string, unknown>): number | null => {
  const value = metadata.statusCode ?? metadata.status_code;
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
};

const toSnake = (value: string): string => value.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();

/** `ogTitle`, `og_title` and `og:title` all become `og:title`. */
const collectTags = (metadata: Record<string, unknown>, prefix: 'og' | 'twitter'): Record<string, string> => {
  const pattern = new RegExp(`^${prefix}(?::|_|(?=[A-Z]))(.+)$`);
  const tags: Record<string, string> = {};
  for (const key of Object.keys(metadata)) {
    const match = key.match(pattern);
    if (!match?.[1]) continue;
    const value = metadataValue(metadata, key);
    if (value) tags[`${prefix}:${toSnake(match[1])}`] = value;
  }
  return tags;
};

const parseKeywords = (raw: string): string[] =>
  raw
    .split(',')
    .map((keyword) => keyword.trim())
    .filter(Boolean);

const toProviderDocument = (page: ProviderPage): ProviderDocument => {
  const metadata = page.metadata ?? {};
  return {
    sourceUrl: metadataValue(metadata, 'sourceURL', 'sourceUrl', 'source_url', 'url') || null,
    statusCode: metadataStatus(metadata),
    title: metadataValue(metadata, 'title', 'ogTitle', 'og_title', 'og:title'),
    description: metadataValue(metadata, 'description', 'ogDescription', 'og_description', 'og:description'),
    language: metadataValue(metadata, 'language', 'lang'),
    keywords: parseKeywords(metadataValue(metadata, 'keywords')),
    markdown: page.markdown ?? page.content ?? '',
    html: page.html ?? page.rawHtml ?? page.raw_html ?? '',
    openGraph: collectTags(metadata, 'og'),
    twitter: collectTags(metadata, 'twitter'),
  };
};

/**
 * Accepts an enveloped (`{ success, data: {...} }`) or flat (`{ markdown, metadata }`)
 * scrape response, with v0 `content` or current `markdown`, and camel or snake
 * metadata keys.
 */
export const normalizeProviderResponse = (payload: unknown): ProviderDocument => {
  const failure = FailureSchema.safeParse(payload);
  if (failure.success) {
    throw new ProviderRequestError(PROVIDER, failure.data.error ?? 'unsuccessful response');
  }

  const envelope = EnvelopeSchema.safeParse(payload);
  if (envelope.success) {
    return toProviderDocument(envelope.data.data);
  }

  const flat = PageSchema.safeParse(payload);
  if (flat.success && (flat.data.markdown != null || flat.data.content != null || flat.data.html != null)) {
    return toProviderDocument(flat.data);
  }
  throw new ProviderRequestError(PROVIDER, 'unrecognised response shape');
};

export const normalizeCrawlPages = (pages: ProviderPage[]): ProviderDocument[] => pages.map(toProviderDocument);

export interface FirecrawlClientOptions {
  config: Pick<AppConfig, 'fetch' | 'firecrawl' | 'scraping'>;
  sleep?: Sleep;
}

/**
 * REST client for the hosted extraction provider. Construction fails with
 * `ProviderUnconfiguredError` when the provider is switched off or has no key.
 */
export const createFirecrawlClient = ({ config, sleep = defaultSleep }: FirecrawlClientOptions): RemoteExtractionProvider => {
  if (config.scraping.provider !== 'firecrawl') {
    throw new ProviderUnconfiguredError(PROVIDER, `scraping provider is "${config.scraping.provider}"`);
  }
  const apiKey = config.firecrawl.apiKey;
  if (!apiKey) {
    throw new ProviderUnconfiguredError(PROVIDER, 'FIRECRAWL_API_KEY is not set');
  }

  const baseUrl = config.firecrawl.baseUrl.replace(/\/+$/, '');

  const request = async (path: string, signal: AbortSignal | undefined, body?: unknown): Promise<unknown> => {
    const options: FetchOptions = {
      timeoutMs: config.fetch.timeoutMs,
      userAgent: config.fetch.userAgent,
      signal,
      method: body === undefined ? 'GET' : 'POST',
      accept: 'application/json',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    };

    let response: Response;
    try {
      response = await fetchWithTimeout(`${baseUrl}${path}`, options);
    } catch (error) {
      throw new ProviderRequestError(PROVIDER, errorMessage(error));
    }
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new ProviderRequestError(PROVIDER, `${response.status} ${text.slice(0, 200)}`.trim(), response.status);
    }
    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new ProviderRequestError(PROVIDER, `invalid JSON: ${errorMessage(error)}`, response.status);
    }
  };

  const scrape = async (url: string, formats: ProviderFormat[], signal?: AbortSignal): Promise<ProviderDocument> => {
    const payload = await request('/v1/scrape', signal, { url, formats, onlyMainContent: true });
    return normalizeProviderResponse(payload);
  };

  const crawl = async (url: string, pageLimit: number, signal?: AbortSignal): Promise<ProviderDocument[]> => {
    const started = CrawlStartSchema.safeParse(
      await request('/v1/crawl', signal, {
        url,
        limit: pageLimit,
        scrapeOptions: { formats: ['markdown'], onlyMainContent: true },
      }),
    );
    if (!started.success) {
      throw new ProviderRequestError(PROVIDER, 'unrecognised crawl response');
    }
    if (started.data.success === false) {
      throw new ProviderRequestError(PROVIDER, started.data.error ?? 'crawl rejected');
    }
    // older deployments answer synchronously
    if (started.data.data) {
      return normalizeCrawlPages(started.data.data).slice(0, pageLimit);
    }

    const crawlId = started.data.id ?? started.data.jobId;
    if (!crawlId) {
      throw new ProviderRequestError(PROVIDER, 'crawl response carried no job id');
    }

    for (let poll = 0; poll < config.firecrawl.crawlMaxPolls; poll += 1) {
      await sleep(config.firecrawl.crawlPollIntervalMs);
      const status = CrawlStatusSchema.safeParse(await request(`/v1/crawl/${encodeURIComponent(crawlId)}`, signal));
      if (!status.success) {
        throw new ProviderRequestError(PROVIDER, 'unrecognised crawl status');
      }
      if (status.data.status === 'failed' || status.data.status === 'cancelled') {
        throw new ProviderRequestError(PROVIDER, status.data.error ?? `crawl ${status.data.status}`);
      }
      if (status.data.status === 'completed') {
        return normalizeCrawlPages(status.data.data ?? []).slice(0, pageLimit);
      }
    }
    throw new ProviderRequestError(PROVIDER, `crawl ${crawlId} did not finish after ${config.firecrawl.crawlMaxPolls} polls`);
  };

  return { name: PROVIDER, scrape, crawl };
};

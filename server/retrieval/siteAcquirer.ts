import type { AppConfig } from '../../shared/config';
import type { RawDocument, SubPage } from '../../shared/types';
import { fetchOptionsFrom } from '../http/fetchWithTimeout';
import { createNoopLogger, errorMessage, type Logger } from '../obs/logger';
import { settleWith } from '../utils/async';
import { clip } from '../utils/text';
import { createFirecrawlClient, type ProviderDocument, type RemoteExtractionProvider } from './connectors/firecrawl';
import { collectInternalLinks, fetchSitePage, parseSitePage, type SitePage } from './directFetch';
import { MIN_CONTENT_CHARS, runArticleWaterfall } from './extraction';
import { normalizeText } from './normalize';

export const MAX_SUBPAGES = 5;
export const MAX_SUBPAGE_CHARS = 1000;

export interface AcquireOptions {
  config: Pick<AppConfig, 'fetch' | 'scraping' | 'firecrawl'>;
  logger?: Logger;
  signal?: AbortSignal;
  /** Builds the remote provider; throwing here counts as "unconfigured". */
  createProvider?: () => RemoteExtractionProvider;
}

export const siteUrlFor = (domainName: string): string => `https://${domainName}`;

/**
 * Cleaned long-form text when it has substance, else the raw markup through
 * the article waterfall, else the short-form text as delivered.
 */
export const selectProviderContent = (doc: ProviderDocument, maxChars: number): string => {
  const cleaned = normalizeText(doc.markdown);
  if (cleaned.length > MIN_CONTENT_CHARS) {
    return clip(cleaned, maxChars);
  }
  if (doc.html) {
    const fromMarkup = runArticleWaterfall(doc.html).text;
    if (fromMarkup) return clip(normalizeText(fromMarkup), maxChars);
  }
  return clip(doc.markdown, maxChars);
};

const markdownHeadings = (markdown: string, limit: number): string[] =>
  markdown
    .split('\n')
    .map((line) => line.match(/^\s{0,3}#{1,3}\s+(.+?)\s*#*\s*$/)?.[1])
    .filter((heading): heading is string => Boolean(heading))
    .map((heading) => normalizeText(heading))
    .filter(Boolean)
    .slice(0, limit);

const markdownLinks = (markdown: string): string[] =>
  Array.from(markdown.matchAll(/\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g), (match) => match[1] ?? '').filter(Boolean);

const toSubPage = (doc: ProviderDocument): SubPage => ({
  url: doc.sourceUrl ?? '',
  title: doc.title,
  description: doc.description,
  content: clip(doc.markdown, MAX_SUBPAGE_CHARS),
});

const acquireWithProvider = async (
  provider: RemoteExtractionProvider,
  url: string,
  options: AcquireOptions,
  logger: Logger,
): Promise<RawDocument> => {
  const { scraping } = options.config;
  const doc = await provider.scrape(url, ['markdown', 'html'], options.signal);
  const sourceUrl = doc.sourceUrl ?? url;

  const parsed: SitePage | null = doc.html ? parseSitePage(doc.html, sourceUrl, scraping) : null;
  const headings = parsed?.headings.length ? parsed.headings : markdownHeadings(doc.markdown, scraping.maxHeadings);
  const internalLinks = parsed?.internalLinks.length
    ? parsed.internalLinks
    : collectInternalLinks(markdownLinks(doc.markdown), sourceUrl, scraping.maxInternalLinks);

  const pageLimit = Math.min(scraping.crawlPageLimit, MAX_SUBPAGES);
  const subpages =
    pageLimit > 0
      ? await settleWith(
          async () => (await provider.crawl(url, pageLimit, options.signal)).slice(0, pageLimit).map(toSubPage),
          () => [],
          (error) => logger.warn('Crawl failed; continuing with the main page only', { url, error: errorMessage(error) }),
        )
      : [];

  return {
    sourceUrl,
    httpStatus: doc.statusCode ?? undefined,
    title: normalizeText(doc.title) || parsed?.title || '',
    description: normalizeText(doc.description) || parsed?.description || '',
    bodyText: selectProviderContent(doc, scraping.maxBodyChars),
    headings,
    internalLinks,
    extractionMethod: 'remote-provider',
    language: doc.language || parsed?.language || '',
    keywords: doc.keywords.length ? doc.keywords : parsed?.keywords ?? [],
    openGraph: { ...parsed?.openGraph, ...doc.openGraph },
    twitter: { ...parsed?.twitter, ...doc.twitter },
    subpages,
  };
};

const acquireDirect = async (url: string, options: AcquireOptions): Promise<RawDocument> => {
  const result = await fetchSitePage(url, options.config.scraping, fetchOptionsFrom(options.config, options.signal));
  return {
    sourceUrl: result.url,
    httpStatus: result.httpStatus,
    ...result.page,
    extractionMethod: 'direct-fetch',
    subpages: [],
  };
};

/**
 * Primary acquisition for a domain. Any provider failure, including a missing
 * configuration, moves to the direct fetch; a direct-fetch failure propagates.
 */
export const acquireSite = async (domainName: string, options: AcquireOptions): Promise<RawDocument> => {
  const logger = options.logger ?? createNoopLogger();
  const url = siteUrlFor(domainName);
  const createProvider = options.createProvider ?? (() => createFirecrawlClient({ config: options.config }));

  try {
    const provider = createProvider();
    const document = await acquireWithProvider(provider, url, options, logger);
    logger.info('Site acquired through remote provider', { url, provider: provider.name, bodyLength: document.bodyText.length });
    return document;
  } catch (error) {
    logger.warn('Remote extraction failed; falling back to direct fetch', { url, error: errorMessage(error) });
  }

  const document = await acquireDirect(url, options);
  logger.info('Site acquired through direct fetch', { url, httpStatus: document.httpStatus, bodyLength: document.bodyText.length });
  return document;
};

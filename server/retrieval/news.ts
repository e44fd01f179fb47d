import type { AppConfig } from '../../shared/config';
import type { NewsItem } from '../../shared/types';
import { fetchOptionsFrom } from '../http/fetchWithTimeout';
import { createNoopLogger, errorMessage, type Logger } from '../obs/logger';
import { truncateWithEllipsis } from '../utils/text';
import { fetchNewsFeed, type FeedEntry } from './connectors/googleNewsRss';
import { searchNews, type SearchResult } from './connectors/googleSearch';
import { CONTENT_UNAVAILABLE, MAX_ARTICLE_CHARS, MIN_CONTENT_CHARS, extractArticleContent } from './extraction';

export const MAX_NEWS_ITEMS = 5;
export const PUBLISHED_UNKNOWN = 'Recently';
export const DEFAULT_NEWS_SOURCE = 'Google News';
const MIN_DESCRIPTION_CHARS = 50;

export interface NewsOptions {
  config: Pick<AppConfig, 'fetch' | 'news'>;
  logger?: Logger;
  signal?: AbortSignal;
}

/** Extracted text when it is usable, else a long-enough feed description, else the sentinel. */
export const chooseNewsContent = (extracted: string, description: string): string => {
  if (extracted !== CONTENT_UNAVAILABLE && extracted.length >= MIN_CONTENT_CHARS) {
    return extracted;
  }
  if (description.length > MIN_DESCRIPTION_CHARS) {
    return truncateWithEllipsis(description, MAX_ARTICLE_CHARS);
  }
  return CONTENT_UNAVAILABLE;
};

const fromFeed = async (entries: FeedEntry[], options: NewsOptions): Promise<NewsItem[]> =>
  Promise.all(
    entries.map(async (entry): Promise<NewsItem> => {
      const extracted = await extractArticleContent(entry.link, options);
      return {
        title: entry.title,
        url: entry.link,
        source: entry.source ?? DEFAULT_NEWS_SOURCE,
        publishedAt: entry.pubDate ?? PUBLISHED_UNKNOWN,
        content: chooseNewsContent(extracted, entry.description),
      };
    }),
  );

const fromSearch = async (results: SearchResult[], options: NewsOptions): Promise<NewsItem[]> =>
  Promise.all(
    results.map(async (result): Promise<NewsItem> => ({
      title: result.title,
      url: result.url,
      source: result.source ?? DEFAULT_NEWS_SOURCE,
      publishedAt: result.publishedAt ?? PUBLISHED_UNKNOWN,
      content: await extractArticleContent(result.url, options),
    })),
  );

/**
 * Recent news about `subject`, at most five items in feed order. The feed is
 * tried first; an unreachable, malformed or empty feed moves to the HTML
 * search, once. Never rejects.
 */
export const fetchNews = async (subject: string, options: NewsOptions): Promise<NewsItem[]> => {
  const logger = options.logger ?? createNoopLogger();
  const limit = Math.min(options.config.news.maxItems, MAX_NEWS_ITEMS);
  const fetchOptions = fetchOptionsFrom(options.config, options.signal);

  let entries: FeedEntry[] = [];
  try {
    entries = await fetchNewsFeed(subject, options.config, fetchOptions);
  } catch (error) {
    logger.warn('News feed unavailable; using search fallback', { subject, error: errorMessage(error) });
  }

  try {
    if (entries.length) {
      const items = await fromFeed(entries.slice(0, limit), { ...options, logger });
      logger.info('News collected from feed', { subject, count: items.length });
      return items;
    }

    logger.debug('News feed returned no entries; using search fallback', { subject });
    const results = await searchNews(subject, limit, fetchOptions);
    const items = await fromSearch(results.slice(0, limit), { ...options, logger });
    logger.info('News collected from search', { subject, count: items.length });
    return items;
  } catch (error) {
    logger.warn('News enrichment failed', { subject, error: errorMessage(error) });
    return [];
  }
};

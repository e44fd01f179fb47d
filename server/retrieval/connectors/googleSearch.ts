import * as cheerio from 'cheerio';
import type { IndustrySnippets } from '../../../shared/types';
import { fetchText, type FetchOptions } from '../../http/fetchWithTimeout';
import { clip } from '../../utils/text';
import { GOOGLE_NEWS_HOST } from '../googleNewsWrapper';
import { normalizeText } from '../normalize';

const NEWS_SEARCH_ENDPOINT = `https://${GOOGLE_NEWS_HOST}/search`;
const WEB_SEARCH_ENDPOINT = 'https://www.google.com/search';

export const WEB_SEARCH_SOURCE = 'Web Search';
export const NOT_AVAILABLE = 'Not available';
const MAX_SNIPPETS = 3;
const MIN_SNIPPET_CHARS = 50;
const MAX_SNIPPET_CHARS = 200;

export interface SearchResult {
  title: string;
  url: string;
  source: string | null;
  publishedAt: string | null;
}

export const buildNewsSearchUrl = (subject: string): string =>
  `${NEWS_SEARCH_ENDPOINT}?${new URLSearchParams({ q: `${subject} company` }).toString()}`;

export const buildIndustrySearchUrl = (subject: string): string =>
  `${WEB_SEARCH_ENDPOINT}?${new URLSearchParams({ q: `${subject} industry market trends` }).toString()}`;

/** Result-like `<article>` containers: first link, best-effort `<time>`, publisher label. */
export const parseNewsSearchResults = (html: string, baseUrl: string, limit: number): SearchResult[] => {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];

  for (const el of $('article').toArray()) {
    if (results.length >= limit) break;
    const container = $(el);
    const anchor = container.find('a[href]').first();
    const href = anchor.attr('href');
    if (!href) continue;

    let url: string;
    try {
      url = new URL(href, baseUrl).toString();
    } catch {
      continue;
    }

    const heading = container.find('h3, h4').first();
    const title = normalizeText(heading.length ? heading.text() : anchor.text());
    if (!title) continue;

    const time = container.find('time').first();
    const publishedAt = time.attr('datetime') || normalizeText(time.text()) || null;
    const source = normalizeText(container.find('[data-n-tid], .vr1PYe').first().text()) || null;

    results.push({ title, url, source, publishedAt });
  }

  return results;
};

export const searchNews = async (subject: string, limit: number, options: FetchOptions): Promise<SearchResult[]> => {
  const url = buildNewsSearchUrl(subject);
  const { text } = await fetchText(url, options);
  return parseNewsSearchResults(text, `https://${GOOGLE_NEWS_HOST}/`, limit);
};

/** Text of the first few `div.BNeawe` result blocks, keeping those long enough to say something. */
export const parseIndustrySnippets = (html: string): string[] => {
  const $ = cheerio.load(html);
  return $('div.BNeawe')
    .slice(0, MAX_SNIPPETS)
    .toArray()
    .map((el) => normalizeText($(el).text()))
    .filter((text) => text.length > MIN_SNIPPET_CHARS)
    .map((text) => clip(text, MAX_SNIPPET_CHARS));
};

export const emptyIndustrySnippets = (): IndustrySnippets => ({ snippets: [], source: NOT_AVAILABLE });

export const fetchIndustrySnippets = async (subject: string, options: FetchOptions): Promise<IndustrySnippets> => {
  const { text } = await fetchText(buildIndustrySearchUrl(subject), options);
  return { snippets: parseIndustrySnippets(text), source: WEB_SEARCH_SOURCE };
};

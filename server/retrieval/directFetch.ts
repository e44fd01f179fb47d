import * as cheerio from 'cheerio';
import type { AppConfig } from '../../shared/config';
import { AcquisitionError } from '../../shared/errors';
import { fetchWithTimeout, type FetchOptions } from '../http/fetchWithTimeout';
import { errorMessage } from '../obs/logger';
import { clip } from '../utils/text';
import { normalizeText } from './normalize';

export interface SitePage {
  title: string;
  description: string;
  headings: string[];
  bodyText: string;
  internalLinks: string[];
  language: string;
  keywords: string[];
  openGraph: Record<string, string>;
  twitter: Record<string, string>;
}

export type PageLimits = Pick<AppConfig['scraping'], 'maxBodyChars' | 'maxHeadings' | 'maxInternalLinks'>;

const NON_CONTENT = 'script, style, noscript, template, nav, footer, header, aside, iframe, form';

/**
 * Same-host links resolved against `baseUrl`, first-seen order, without
 * fragments or duplicates.
 */
export const collectInternalLinks = (hrefs: Iterable<string>, baseUrl: string, limit: number): string[] => {
  const base = new URL(baseUrl);
  const links: string[] = [];
  for (const href of hrefs) {
    if (links.length >= limit) break;
    let resolved: URL;
    try {
      resolved = new URL(href, base);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;
    if (resolved.host !== base.host) continue;
    resolved.hash = '';
    const url = resolved.toString();
    if (!links.includes(url)) links.push(url);
  }
  return links;
};

export const parseKeywordList = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(',')
    .map((keyword) => keyword.trim())
    .filter(Boolean);

/** Tag-based extraction of one page; every text field goes through `normalizeText`. */
export const parseSitePage = (html: string, baseUrl: string, limits: PageLimits): SitePage => {
  const $ = cheerio.load(html);

  const openGraph: Record<string, string> = {};
  $('meta[property^="og:"]').each((_, el) => {
    const property = $(el).attr('property');
    if (property) openGraph[property] = normalizeText($(el).attr('content'));
  });
  const twitter: Record<string, string> = {};
  $('meta[name^="twitter:"]').each((_, el) => {
    const name = $(el).attr('name');
    if (name) twitter[name] = normalizeText($(el).attr('content'));
  });

  const description =
    normalizeText($('meta[name="description"]').attr('content')) ||
    normalizeText($('meta[property="og:description"]').attr('content'));

  const headings = $('h1, h2, h3')
    .toArray()
    .map((el) => normalizeText($(el).text()))
    .filter(Boolean)
    .slice(0, limits.maxHeadings);

  const internalLinks = collectInternalLinks(
    $('a[href]')
      .toArray()
      .map((el) => $(el).attr('href') ?? ''),
    baseUrl,
    limits.maxInternalLinks,
  );

  const title = normalizeText($('title').first().text());
  const language = ($('html').attr('lang') ?? '').trim();
  const keywords = parseKeywordList($('meta[name="keywords"]').attr('content'));

  $(NON_CONTENT).remove();
  const body = $('body');
  const bodyText = clip(normalizeText((body.length ? body : $.root()).text()), limits.maxBodyChars);

  return { title, description, headings, bodyText, internalLinks, language, keywords, openGraph, twitter };
};

export interface DirectFetchResult {
  url: string;
  httpStatus: number;
  page: SitePage;
}

/** The job's own primary fetch: every failure raises `AcquisitionError`. */
export const fetchSitePage = async (url: string, limits: PageLimits, options: FetchOptions): Promise<DirectFetchResult> => {
  let response: Response;
  try {
    response = await fetchWithTimeout(url, options);
  } catch (error) {
    throw new AcquisitionError(url, errorMessage(error));
  }
  if (!response.ok) {
    throw new AcquisitionError(url, `HTTP ${response.status}`, response.status);
  }
  const finalUrl = response.url || url;
  const html = await response.text();
  return { url: finalUrl, httpStatus: response.status, page: parseSitePage(html, finalUrl, limits) };
};

import type { AppConfig } from '../../../shared/config';
import { FeedParseError } from '../../../shared/errors';
import { fetchWithTimeout, type FetchOptions } from '../../http/fetchWithTimeout';
import { GOOGLE_NEWS_HOST } from '../googleNewsWrapper';
import { normalizeText } from '../normalize';

const GOOGLE_NEWS_RSS_ENDPOINT = `https://${GOOGLE_NEWS_HOST}/rss/search`;
const RSS_ACCEPT = 'application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.1';

export interface FeedEntry {
  title: string;
  link: string;
  source: string | null;
  pubDate: string | null;
  description: string;
}

const decodeXmlEntities = (value: string): string =>
  value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');

const extractTag = (xml: string, tag: string): string | null => {
  const cdata = new RegExp(`<${tag}[^>]*>\\s*<!\\[CDATA\\[([\\s\\S]*?)\\]\\]>\\s*</${tag}>`, 'i');
  const m1 = xml.match(cdata);
  if (m1?.[1]) return m1[1].trim();
  const plain = new RegExp(`<${tag}[^>]*>([\\s\\S]*?)</${tag}>`, 'i');
  const m2 = xml.match(plain);
  if (m2?.[1]) return m2[1].trim();
  return null;
};

const extractSourceName = (itemXml: string): string | null => {
  const m = itemXml.match(/<source[^>]*>([\s\S]*?)<\/source>/i);
  const name = m?.[1] ? normalizeText(m[1]) : '';
  return name || null;
};

export const buildFeedUrl = (subject: string, config: Pick<AppConfig, 'news'>): string => {
  const params = new URLSearchParams({
    q: `${subject} company`,
    hl: config.news.hl,
    gl: config.news.gl,
    ceid: config.news.ceid,
  });
  return `${GOOGLE_NEWS_RSS_ENDPOINT}?${params.toString()}`;
};

/**
 * Parses RSS `<item>` (or Atom `<entry>`) blocks. A payload without a feed
 * root is malformed and throws `FeedParseError`; a well-formed feed with no
 * items returns `[]`.
 */
export const parseFeed = (xml: string): FeedEntry[] => {
  if (!/<(rss|channel|feed)\b/i.test(xml)) {
    throw new FeedParseError('News feed payload has no rss/feed root');
  }

  const isAtom = !/<item\b/i.test(xml) && /<entry\b/i.test(xml);
  const itemTag = isAtom ? 'entry' : 'item';
  const parts = xml.split(new RegExp(`<${itemTag}\\b[^>]*>`, 'i'));
  const entries: FeedEntry[] = [];

  for (let i = 1; i < parts.length; i += 1) {
    const chunk = parts[i];
    const end = chunk.search(new RegExp(`</${itemTag}>`, 'i'));
    if (end < 0) continue;
    const itemXml = chunk.slice(0, end);

    const linkRaw = isAtom
      ? (itemXml.match(/<link[^>]*href="([^"]+)"/i) || [])[1] ?? null
      : extractTag(itemXml, 'link');
    const link = decodeXmlEntities((linkRaw || '').trim());
    if (!link) continue;

    const title = normalizeText(extractTag(itemXml, 'title')) || link;
    entries.push({
      title,
      link: link.replace(`https://${GOOGLE_NEWS_HOST}/rss/articles/`, `https://${GOOGLE_NEWS_HOST}/articles/`),
      source: extractSourceName(itemXml),
      pubDate: extractTag(itemXml, isAtom ? 'updated' : 'pubDate'),
      description: normalizeText(extractTag(itemXml, isAtom ? 'summary' : 'description')),
    });
  }

  return entries;
};

/** Network failures and non-2xx statuses reject; so does a malformed payload. */
export const fetchNewsFeed = async (
  subject: string,
  config: Pick<AppConfig, 'news'>,
  options: FetchOptions,
): Promise<FeedEntry[]> => {
  const url = buildFeedUrl(subject, config);
  const response = await fetchWithTimeout(url, { ...options, accept: RSS_ACCEPT });
  if (!response.ok) {
    throw new Error(`Google News RSS request failed: ${response.status} ${response.statusText}`);
  }
  return parseFeed(await response.text());
};

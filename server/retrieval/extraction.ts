import * as cheerio from 'cheerio';
import type { AppConfig } from '../../shared/config';
import { fetchOptionsFrom, fetchWithTimeout } from '../http/fetchWithTimeout';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../obs/logger';
import { truncateWithEllipsis } from '../utils/text';
import { isIndirectionHost, resolveGoogleNewsWrapperUrl } from './googleNewsWrapper';
import { normalizeText } from './normalize';

export const CONTENT_UNAVAILABLE = 'Content not available';
export const MIN_CONTENT_CHARS = 100;
export const MAX_ARTICLE_CHARS = 800;
const MIN_PARAGRAPH_CHARS = 30;

export type ArticleStrategy =
  | 'article-container'
  | 'class-keyword'
  | 'article-id'
  | 'main-paragraphs'
  | 'page-paragraphs'
  | 'body-text';

/** Diagnostics only; never persisted. */
export interface ExtractionAttemptResult {
  strategy: ArticleStrategy;
  succeeded: boolean;
  length: number;
}

export interface WaterfallResult {
  text: string | null;
  strategy: ArticleStrategy | null;
  attempts: ExtractionAttemptResult[];
}

export interface ArticleExtraction {
  url: string;
  resolvedUrl?: string;
  content: string;
  strategy: ArticleStrategy | null;
  attempts: ExtractionAttemptResult[];
  error?: string;
}

export interface ExtractionOptions {
  config: Pick<AppConfig, 'fetch'>;
  signal?: AbortSignal;
  logger?: Logger;
}

const STRUCTURAL_NOISE = 'script, style, noscript, nav, footer, header, aside, iframe, form';

const NAV_REGIONS = [
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  '[role="complementary"]',
  '.nav',
  '.navbar',
  '.menu',
  '.sidebar',
  '.breadcrumb',
  '.breadcrumbs',
  '.cookie-banner',
].join(', ');

const ARTICLE_CLASS_KEYWORDS = [
  'article-body',
  'article-content',
  'article__body',
  'article-text',
  'story-body',
  'story-content',
  'post-content',
  'post-body',
  'entry-content',
  'content-body',
];

const ARTICLE_IDS = ['article-body', 'article-content', 'story-body', 'main-content', 'article', 'story', 'content'];

const collapse = (value: string): string => value.replace(/\s+/g, ' ').trim();

interface Strategy {
  name: ArticleStrategy;
  /** Candidate texts in preference order; evaluated lazily. */
  candidates: ($: cheerio.CheerioAPI) => Iterable<string>;
}

const STRATEGIES: Strategy[] = [
  {
    name: 'article-container',
    candidates: function* ($) {
      const article = $('article').first();
      if (article.length) yield article.text();
    },
  },
  {
    name: 'class-keyword',
    candidates: function* ($) {
      for (const keyword of ARTICLE_CLASS_KEYWORDS) {
        for (const el of $(`[class*="${keyword}"]`).toArray()) {
          yield $(el).text();
        }
      }
    },
  },
  {
    name: 'article-id',
    candidates: function* ($) {
      for (const id of ARTICLE_IDS) {
        const el = $(`[id="${id}"]`).first();
        if (el.length) yield el.text();
      }
    },
  },
  {
    name: 'main-paragraphs',
    candidates: function* ($) {
      const paragraphs = $('main p, article p, [role="main"] p').toArray();
      if (paragraphs.length) yield paragraphs.map((el) => collapse($(el).text())).join(' ');
    },
  },
  {
    name: 'page-paragraphs',
    candidates: function* ($) {
      const kept = $('p')
        .toArray()
        .map((el) => collapse($(el).text()))
        .filter((text) => text.length > MIN_PARAGRAPH_CHARS);
      if (kept.length) yield kept.join(' ');
    },
  },
  {
    name: 'body-text',
    candidates: function* ($) {
      $(NAV_REGIONS).remove();
      const body = $('body');
      yield (body.length ? body : $.root()).text();
    },
  },
];

/**
 * Tries each strategy in order and stops at the first that yields at least
 * `MIN_CONTENT_CHARS` characters. Returns the raw winning text.
 */
export const runArticleWaterfall = (html: string): WaterfallResult => {
  const $ = cheerio.load(html);
  $(STRUCTURAL_NOISE).remove();

  const attempts: ExtractionAttemptResult[] = [];
  for (const strategy of STRATEGIES) {
    let longest = 0;
    for (const candidate of strategy.candidates($)) {
      const text = collapse(candidate);
      longest = Math.max(longest, text.length);
      if (text.length >= MIN_CONTENT_CHARS) {
        attempts.push({ strategy: strategy.name, succeeded: true, length: text.length });
        return { text, strategy: strategy.name, attempts };
      }
    }
    attempts.push({ strategy: strategy.name, succeeded: false, length: longest });
  }
  return { text: null, strategy: null, attempts };
};

/** Waterfall plus normalisation and the article cap. */
export const extractArticleFromHtml = (html: string, maxChars = MAX_ARTICLE_CHARS): WaterfallResult => {
  const result = runArticleWaterfall(html);
  if (!result.text) return result;
  return { ...result, text: truncateWithEllipsis(normalizeText(result.text), maxChars) };
};

const isFetchableUrl = (rawUrl: string): boolean => {
  try {
    const parsed = new URL(rawUrl);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
    return parsed.hostname !== 'localhost' && !parsed.hostname.endsWith('.local');
  } catch {
    return false;
  }
};

const isHtmlContentType = (contentType: string | null): boolean =>
  !contentType || /html|xml/i.test(contentType);

/**
 * Fetches `url` and extracts the dominant article text. Never throws: every
 * failure yields `CONTENT_UNAVAILABLE` with the reason in `error`. No retries
 * at this layer.
 */
export const extractArticle = async (url: string, options: ExtractionOptions): Promise<ArticleExtraction> => {
  const unavailable = (error: string, extra: Partial<ArticleExtraction> = {}): ArticleExtraction => {
    options.logger?.debug('Article extraction unavailable', { url, error, attempts: extra.attempts });
    return { url, content: CONTENT_UNAVAILABLE, strategy: null, attempts: [], error, ...extra };
  };

  if (!isFetchableUrl(url)) {
    return unavailable('unsupported url');
  }

  const fetchOptions = fetchOptionsFrom(options.config, options.signal);

  let target = url;
  if (isIndirectionHost(url)) {
    const resolved = await resolveGoogleNewsWrapperUrl(url, fetchOptions);
    if (!resolved || isIndirectionHost(resolved)) {
      return unavailable('redirect did not leave the indirection domain');
    }
    target = resolved;
  }

  let html: string;
  let finalUrl = target;
  try {
    const response = await fetchWithTimeout(target, fetchOptions);
    finalUrl = response.url || target;
    if (isIndirectionHost(finalUrl)) {
      return unavailable('redirect did not leave the indirection domain', { resolvedUrl: finalUrl });
    }
    if (!response.ok) {
      return unavailable(`HTTP ${response.status}`, { resolvedUrl: finalUrl });
    }
    const contentType = response.headers.get('content-type');
    if (!isHtmlContentType(contentType)) {
      return unavailable(`Unsupported content-type: ${contentType}`, { resolvedUrl: finalUrl });
    }
    html = await response.text();
  } catch (error) {
    return unavailable(errorMessage(error), { resolvedUrl: finalUrl });
  }

  const result = extractArticleFromHtml(html);
  options.logger?.debug('Article extraction attempts', { url: finalUrl, attempts: result.attempts });
  if (!result.text) {
    return unavailable('no strategy produced enough text', { resolvedUrl: finalUrl, attempts: result.attempts });
  }
  return {
    url,
    resolvedUrl: finalUrl !== url ? finalUrl : undefined,
    content: result.text,
    strategy: result.strategy,
    attempts: result.attempts,
  };
};

/** Content only; `CONTENT_UNAVAILABLE` on failure. */
export const extractArticleContent = async (url: string, options: ExtractionOptions): Promise<string> =>
  (await extractArticle(url, options)).content;

import type { AppConfig } from '../../shared/config';
import type { EnrichmentRecord, IndustrySnippets, NewsItem, ProfessionalPresence } from '../../shared/types';
import { fetchOptionsFrom } from '../http/fetchWithTimeout';
import { createNoopLogger, errorMessage, type Logger } from '../obs/logger';
import { settleWith } from '../utils/async';
import { subjectNameFromDomain } from '../utils/text';
import { emptyIndustrySnippets, fetchIndustrySnippets } from './connectors/googleSearch';
import { absentPresence, probeProfessionalPresence } from './connectors/linkedin';
import { fetchNews } from './news';

export interface EnrichmentOptions {
  config: Pick<AppConfig, 'fetch' | 'news'>;
  logger?: Logger;
  signal?: AbortSignal;
}

/** Probes are swappable for tests; defaults hit the real sources. */
export interface EnrichmentProbes {
  news: (subject: string) => Promise<NewsItem[]>;
  presence: (domainName: string) => Promise<ProfessionalPresence>;
  industry: (subject: string) => Promise<IndustrySnippets>;
}

export const defaultProbes = (options: EnrichmentOptions): EnrichmentProbes => {
  const fetchOptions = fetchOptionsFrom(options.config, options.signal);
  return {
    news: (subject) => fetchNews(subject, options),
    presence: (domainName) => probeProfessionalPresence(domainName, fetchOptions),
    industry: (subject) => fetchIndustrySnippets(subject, fetchOptions),
  };
};

/**
 * Runs the three probes concurrently. Each failure becomes that probe's empty
 * value; the record itself always resolves.
 */
export const enrichDomain = async (
  domainName: string,
  options: EnrichmentOptions,
  probes: EnrichmentProbes = defaultProbes(options),
): Promise<EnrichmentRecord> => {
  const logger = options.logger ?? createNoopLogger();
  const subject = subjectNameFromDomain(domainName);
  const onError = (probe: string) => (error: unknown) =>
    logger.warn('Enrichment probe failed', { domainName, probe, error: errorMessage(error) });

  const [newsItems, professionalPresence, industrySnippets] = await Promise.all([
    settleWith(() => probes.news(subject), () => [], onError('news')),
    settleWith(() => probes.presence(domainName), () => absentPresence(domainName), onError('presence')),
    settleWith(() => probes.industry(subject), emptyIndustrySnippets, onError('industry')),
  ]);

  logger.info('Enrichment collected', {
    domainName,
    newsItems: newsItems.length,
    presenceFound: professionalPresence.found,
    industrySnippets: industrySnippets.snippets.length,
  });

  return { newsItems, professionalPresence, industrySnippets };
};

import { describe, expect, it, vi } from 'vitest';
import type { NewsItem } from '../../../shared/types';
import { testConfig } from '../../testing/support';
import { absentPresence } from '../connectors/linkedin';
import { enrichDomain, type EnrichmentProbes } from '../enrichment';

const config = testConfig();

const newsItem: NewsItem = {
  title: 'Acme raises Series B',
  url: 'https://publisher.test/a1',
  source: 'Publisher Daily',
  publishedAt: 'Recently',
  content: 'Content not available',
};

const probes = (overrides: Partial<EnrichmentProbes> = {}): EnrichmentProbes => ({
  news: async () => [newsItem],
  presence: async (domainName) => ({ ...absentPresence(domainName), found: true }),
  industry: async () => ({ snippets: ['Retail logistics keeps growing across regions and channels.'], source: 'Web Search' }),
  ...overrides,
});

describe('enrichDomain', () => {
  it('collects all three probes, searching news by the company name', async () => {
    const news = vi.fn(async (_subject: string) => [newsItem]);

    const record = await enrichDomain('acme.com', { config }, probes({ news }));

    expect(news).toHaveBeenCalledWith('Acme');
    expect(record).toEqual({
      newsItems: [newsItem],
      professionalPresence: {
        found: true,
        profileUrl: 'https://www.linkedin.com/company/acme',
        employeeCount: 'Not available',
        industry: 'Not available',
      },
      industrySnippets: { snippets: ['Retail logistics keeps growing across regions and channels.'], source: 'Web Search' },
    });
  });

  it('replaces each failing probe with its empty value without touching the others', async () => {
    const record = await enrichDomain(
      'acme.com',
      { config },
      probes({
        presence: async () => {
          throw new Error('blocked');
        },
        industry: async () => {
          throw new Error('captcha');
        },
      }),
    );

    expect(record.newsItems).toEqual([newsItem]);
    expect(record.professionalPresence).toEqual(absentPresence('acme.com'));
    expect(record.industrySnippets).toEqual({ snippets: [], source: 'Not available' });
  });

  it('resolves even when every probe fails', async () => {
    const fail = async (): Promise<never> => {
      throw new Error('offline');
    };

    const record = await enrichDomain('acme.com', { config }, { news: fail, presence: fail, industry: fail });

    expect(record).toEqual({
      newsItems: [],
      professionalPresence: absentPresence('acme.com'),
      industrySnippets: { snippets: [], source: 'Not available' },
    });
  });
});

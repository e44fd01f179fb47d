import { describe, expect, it } from 'vitest';
import { GenerationError } from '../../../shared/errors';
import { createNoopLogger } from '../../obs/logger';
import { ScriptedGenerator, enrichmentRecord, intelligenceReport, rawDocument } from '../../testing/fixtures';
import { REPORT_FIELDS, backfillReport, buildIntelligencePrompt, generateIntelligence } from '../intelligence';

const ARTICLE = 'Acme closed a funding round to expand its warehouse automation platform. '.repeat(4).trim();

describe('buildIntelligencePrompt', () => {
  it('fills every section of the template', () => {
    const prompt = buildIntelligencePrompt(
      'acme.test',
      rawDocument({
        title: '',
        subpages: [{ url: 'https://acme.test/about', title: 'About', description: '', content: 'About us' }],
      }),
      enrichmentRecord({
        newsItems: [
          { title: 'Acme raises Series B', url: 'https://publisher.test/a1', source: 'Daily', publishedAt: 'Recently', content: ARTICLE },
          {
            title: 'Acme hires',
            url: 'https://publisher.test/a2',
            source: 'Daily',
            publishedAt: 'Recently',
            content: 'Content not available',
          },
        ],
        professionalPresence: {
          found: true,
          profileUrl: 'https://www.linkedin.com/company/acme',
          employeeCount: 'Not available',
          industry: 'Not available',
        },
        industrySnippets: { snippets: ['First insight', 'Second insight', 'Third insight'], source: 'Web Search' },
      }),
    );

    expect(prompt).toContain('Domain: "acme.test"');
    expect(prompt).toContain('- Title: N/A\n- Description: Warehouse software for retailers\n');
    expect(prompt).toContain('Other pages on the site:\n- About (https://acme.test/about)\n');
    expect(prompt).toContain(
      `Recent News & Market Context:\n1. Acme raises Series B\n   Summary: ${ARTICLE.slice(0, 200)}...\n\n2. Acme hires\n\nIndustry Market Insights:`,
    );
    expect(prompt).toContain('Industry Market Insights:\n- First insight\n- Second insight\n\nLinkedIn:');
    expect(prompt).toContain('LinkedIn: https://www.linkedin.com/company/acme (Found: true)');
    expect(prompt).not.toMatch(/\{[A-Z_]+\}/);
  });

  it('uses placeholders for missing context', () => {
    const prompt = buildIntelligencePrompt('acme.test', rawDocument(), enrichmentRecord());

    expect(prompt).toContain('Other pages on the site:\nNone gathered\n');
    expect(prompt).toContain('Recent News & Market Context:\nNo recent news available\n');
    expect(prompt).toContain('Industry Market Insights:\nNo market insights available\n');
  });
});

describe('backfillReport', () => {
  it('fills a missing array field with an empty list', () => {
    const { top_competitors: _dropped, ...partial } = intelligenceReport();

    const { report, backfilled } = backfillReport(partial);

    expect(report.top_competitors).toEqual([]);
    expect(backfilled).toEqual(['top_competitors']);
    expect(report.industry_overview).toBe('Warehouse software is consolidating.');
  });

  it('gives each kind of field its own empty value', () => {
    const { report, backfilled } = backfillReport({});

    expect(backfilled).toEqual([...REPORT_FIELDS]);
    expect(report.industry_overview).toBe('');
    expect(report.market_size_and_trends).toEqual({});
    expect(report.buying_behavior).toEqual({});
    expect(report.customer_pain_points).toEqual([]);
    expect(report.sales_upskilling_recommendations).toEqual([]);
  });

  it('keeps present sections as the model wrote them', () => {
    const { report, backfilled } = backfillReport({
      industry_overview: 'x',
      top_competitors: ['Acme', 'Globex'],
      market_size_and_trends: { market_size: '$1B', key_trends: ['AI', 'Cloud'], region: 'EU' },
      customer_pain_points: [{ pain: 'cost' }],
    });

    expect(report.top_competitors).toEqual(['Acme', 'Globex']);
    expect(report.market_size_and_trends).toEqual({ market_size: '$1B', key_trends: ['AI', 'Cloud'], region: 'EU' });
    expect(report.customer_pain_points).toEqual([{ pain: 'cost' }]);
    expect(backfilled).not.toContain('top_competitors');
    expect(backfilled).toContain('common_objections');
  });

  it('wraps a section of the wrong kind instead of dropping it', () => {
    const { report } = backfillReport({
      industry_overview: 42,
      buying_behavior: 'Committee decides in Q4',
      target_customer_segments: 'Retail',
      top_competitors: null,
    });

    expect(report.industry_overview).toBe('42');
    expect(report.buying_behavior).toEqual({ summary: 'Committee decides in Q4' });
    expect(report.target_customer_segments).toEqual(['Retail']);
    expect(report.top_competitors).toEqual([]);
  });

  it('keeps extra fields', () => {
    expect(backfillReport({ confidence: 'high' }).report.confidence).toBe('high');
  });

  it('rejects anything but an object', () => {
    expect(() => backfillReport(['not', 'an', 'object'])).toThrow(GenerationError);
    expect(() => backfillReport('text')).toThrow('Model response is not a JSON object');
  });
});

describe('generateIntelligence', () => {
  it('prompts the generator and returns the backfilled report', async () => {
    const { common_objections: _dropped, ...partial } = intelligenceReport();
    const generator = new ScriptedGenerator([partial]);

    const report = await generateIntelligence(
      generator,
      { domainName: 'acme.test', rawDocument: rawDocument(), enrichment: enrichmentRecord() },
      createNoopLogger(),
    );

    expect(report).toEqual(intelligenceReport({ common_objections: [] }));
    expect(generator.prompts).toHaveLength(1);
    expect(generator.prompts[0]).toContain('Domain: "acme.test"');
  });

  it('propagates generator failures', async () => {
    const generator = new ScriptedGenerator([new GenerationError('Malformed JSON in model response')]);

    await expect(
      generateIntelligence(
        generator,
        { domainName: 'acme.test', rawDocument: rawDocument(), enrichment: enrichmentRecord() },
        createNoopLogger(),
      ),
    ).rejects.toThrow(GenerationError);
  });
});

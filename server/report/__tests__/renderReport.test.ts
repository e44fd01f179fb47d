import { describe, expect, it } from 'vitest';
import { backfillReport } from '../../services/intelligence';
import { intelligenceReport } from '../../testing/fixtures';
import { renderMarkdownReport } from '../renderReport';

const generatedAt = new Date('2026-10-19T08:05:30.000Z');

describe('renderMarkdownReport', () => {
  it('starts with the title, domain and generation time', () => {
    const markdown = renderMarkdownReport({ domainName: 'acme.test', intelligence: intelligenceReport(), generatedAt });

    expect(markdown.startsWith('# Business Intelligence Report\n\n## Domain: acme.test\n\nGenerated: 2026-10-19 08:05 UTC\n\n')).toBe(
      true,
    );
  });

  it('renders every section in order', () => {
    const markdown = renderMarkdownReport({ domainName: 'acme.test', intelligence: intelligenceReport(), generatedAt });

    const headings = markdown.split('\n').filter((line) => line.startsWith('### '));
    expect(headings).toEqual([
      '### 1. Industry Overview',
      '### 2. Market Size and Growth Trends',
      '### 3. Target Customer Segments',
      '### 4. Customer Pain Points',
      '### 5. Buying Behavior',
      '### 6. Top Competitors',
      '### 7. Common Sales Objections',
      '### 8. Unique Selling Propositions',
      '### 9. Emerging Opportunities (3-5 years)',
      '### 10. Recommended Sales Strategies',
      '### 11. AI-Driven Automation Opportunities',
      '### 12. Sales Team Challenges',
      '### 13. Sales Upskilling Recommendations',
    ]);
    expect(markdown).toContain('### 2. Market Size and Growth Trends\n\n- **Market Size:** $10B\n- **Growth Rate:** 8%\n- **Key Trends:** Automation\n');
    expect(markdown).toContain('### 6. Top Competitors\n\n- **Globex**: Enterprise focus\n');
    expect(markdown).toContain('- **Objection:** Too expensive\n  **Response:** Payback within a year');
    expect(markdown).toContain('**Challenge 1:** Long cycles  \n**Impact:** High  \n**Frequency:** Often');
  });

  it('marks empty sections', () => {
    const { report } = backfillReport({});
    const markdown = renderMarkdownReport({ domainName: 'acme.test', intelligence: report, generatedAt });

    expect(markdown).toContain('### 1. Industry Overview\n\nNo data available\n');
    expect(markdown).toContain('### 13. Sales Upskilling Recommendations\n\nNo data available\n');
  });

  it('renders sections in whatever shape the model returned', () => {
    const { report } = backfillReport({
      market_size_and_trends: { market_size: '$1B', key_trends: ['AI', 'Cloud'], region: 'EU' },
      customer_pain_points: [{ pain: 'cost' }],
      top_competitors: ['Acme', { name: 'Globex' }],
      common_objections: ['Too expensive'],
    });
    const markdown = renderMarkdownReport({ domainName: 'acme.test', intelligence: report, generatedAt });

    expect(markdown).toContain(
      '### 2. Market Size and Growth Trends\n\n- **Market Size:** $1B\n- **Key Trends:** AI, Cloud\n- **Region:** EU\n',
    );
    expect(markdown).toContain('### 4. Customer Pain Points\n\n- Pain: cost\n');
    expect(markdown).toContain('### 6. Top Competitors\n\n- Acme\n- Globex\n');
    expect(markdown).toContain('### 7. Common Sales Objections\n\n- **Objection:** Too expensive\n  **Response:** N/A\n');
  });

  it('appends recent news when there is some', () => {
    const markdown = renderMarkdownReport({
      domainName: 'acme.test',
      intelligence: intelligenceReport(),
      generatedAt,
      newsItems: [
        {
          title: 'Acme raises Series B',
          url: 'https://publisher.test/a1',
          source: 'Publisher Daily',
          publishedAt: 'Recently',
          content: 'Content not available',
        },
      ],
    });

    expect(markdown.endsWith(
      '### 14. Recent News & Market Updates\n\n**1. Acme raises Series B**  \nSource: Publisher Daily | Published: Recently  \nURL: <https://publisher.test/a1>\n',
    )).toBe(true);
  });
});

import type { IntelligenceReport, JsonObject, JsonValue, NewsItem } from '../../shared/types';
import { CONTENT_UNAVAILABLE } from '../retrieval/extraction';
import { isJsonObject } from '../utils/jsonExtract';

const NO_DATA = 'No data available';

const titleCase = (key: string): string =>
  key
    .split('_')
    .map((word) => (word ? `${word.charAt(0).toUpperCase()}${word.slice(1)}` : word))
    .join(' ');

/** Flattens any model value to one line: lists join with commas, objects as `Key: value` pairs. */
const formatValue = (value: JsonValue): string => {
  if (value === null) return '';
  if (Array.isArray(value)) return value.map(formatValue).filter(Boolean).join(', ');
  if (isJsonObject(value)) {
    return Object.entries(value)
      .map(([key, entry]) => ({ key, text: formatValue(entry) }))
      .filter((entry) => entry.text)
      .map((entry) => `${titleCase(entry.key)}: ${entry.text}`)
      .join('; ');
  }
  return String(value);
};

const field = (item: JsonValue, key: string): string =>
  isJsonObject(item) ? formatValue(item[key] ?? null) : '';

/** The item's `key` when it is an object, otherwise the whole item. */
const lead = (item: JsonValue, key: string): string => (isJsonObject(item) ? field(item, key) : formatValue(item));

const bulletList = (items: JsonValue[]): string => {
  const lines = items.map(formatValue).filter(Boolean);
  return lines.length ? lines.map((line) => `- ${line}`).join('\n') : NO_DATA;
};

const keyValues = (data: JsonObject): string => {
  const lines = Object.entries(data)
    .map(([key, value]) => ({ key, text: formatValue(value) }))
    .filter((entry) => entry.text)
    .map((entry) => `- **${titleCase(entry.key)}:** ${entry.text}`);
  return lines.length ? lines.join('\n') : NO_DATA;
};

const blocks = <T>(items: T[], render: (item: T, index: number) => string): string =>
  items.length ? items.map(render).join('\n\n') : NO_DATA;

const orNA = (value: string): string => value || 'N/A';

const competitorLine = (item: JsonValue): string => {
  const name = lead(item, 'name');
  if (!name) return formatValue(item);
  const positioning = field(item, 'positioning');
  return positioning ? `**${name}**: ${positioning}` : name;
};

const newsBlock = (item: NewsItem, index: number): string => {
  const lines = [`**${index + 1}. ${item.title}**`, `Source: ${item.source} | Published: ${item.publishedAt}`];
  if (/^https?:\/\//i.test(item.url)) lines.push(`URL: <${item.url}>`);
  if (item.content && item.content !== CONTENT_UNAVAILABLE) lines.push(`Summary: ${item.content}`);
  return lines.join('  \n');
};

export interface ReportInput {
  domainName: string;
  intelligence: IntelligenceReport;
  newsItems?: NewsItem[];
  generatedAt: Date;
}

/** Markdown brief of the intelligence report, one numbered section per field. */
export const renderMarkdownReport = ({ domainName, intelligence, newsItems = [], generatedAt }: ReportInput): string => {
  const sections: Array<[string, string]> = [
    ['1. Industry Overview', intelligence.industry_overview || NO_DATA],
    ['2. Market Size and Growth Trends', keyValues(intelligence.market_size_and_trends)],
    ['3. Target Customer Segments', bulletList(intelligence.target_customer_segments)],
    ['4. Customer Pain Points', bulletList(intelligence.customer_pain_points)],
    ['5. Buying Behavior', keyValues(intelligence.buying_behavior)],
    ['6. Top Competitors', bulletList(intelligence.top_competitors.map(competitorLine))],
    [
      '7. Common Sales Objections',
      blocks(
        intelligence.common_objections,
        (o) => `- **Objection:** ${orNA(lead(o, 'objection'))}\n  **Response:** ${orNA(field(o, 'response'))}`,
      ),
    ],
    ['8. Unique Selling Propositions', bulletList(intelligence.unique_selling_propositions)],
    ['9. Emerging Opportunities (3-5 years)', bulletList(intelligence.emerging_opportunities)],
    ['10. Recommended Sales Strategies', bulletList(intelligence.recommended_strategies)],
    ['11. AI-Driven Automation Opportunities', bulletList(intelligence.ai_automation_opportunities)],
    [
      '12. Sales Team Challenges',
      blocks(
        intelligence.sales_team_challenges,
        (c, i) =>
          `**Challenge ${i + 1}:** ${orNA(lead(c, 'challenge'))}  \n**Impact:** ${orNA(field(c, 'impact'))}  \n` +
          `**Frequency:** ${orNA(field(c, 'frequency'))}`,
      ),
    ],
    [
      '13. Sales Upskilling Recommendations',
      blocks(
        intelligence.sales_upskilling_recommendations,
        (r, i) =>
          `**Recommendation ${i + 1}:** ${orNA(lead(r, 'skill_area'))}  \n**Training Type:** ${orNA(field(r, 'training_type'))}  \n` +
          `**Priority:** ${orNA(field(r, 'priority'))}  \n**Expected Outcome:** ${orNA(field(r, 'expected_outcome'))}`,
      ),
    ],
  ];
  if (newsItems.length) {
    sections.push(['14. Recent News & Market Updates', blocks(newsItems, newsBlock)]);
  }

  const header = [
    '# Business Intelligence Report',
    '',
    `## Domain: ${domainName}`,
    '',
    `Generated: ${generatedAt.toISOString().slice(0, 16).replace('T', ' ')} UTC`,
  ].join('\n');

  return `${[header, ...sections.map(([title, body]) => `### ${title}\n\n${body}`)].join('\n\n')}\n`;
};

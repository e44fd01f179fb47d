import { GenerationError } from '../../shared/errors';
import type { EnrichmentRecord, IntelligenceReport, JsonObject, JsonValue, RawDocument } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { loadPrompt, renderPrompt } from '../prompts/loader';
import { CONTENT_UNAVAILABLE } from '../retrieval/extraction';
import { isJsonObject, toJsonValue } from '../utils/jsonExtract';
import { ELLIPSIS } from '../utils/text';
import type { GenerationCapability } from './llmService';

const PROMPT_CONTENT_CHARS = 2000;
const PROMPT_NEWS_ITEMS = 5;
const PROMPT_NEWS_SUMMARY_CHARS = 200;
const PROMPT_MARKET_SNIPPETS = 2;

/** Top-level sections the report must carry. */
export const REPORT_FIELDS = [
  'industry_overview',
  'market_size_and_trends',
  'target_customer_segments',
  'customer_pain_points',
  'buying_behavior',
  'top_competitors',
  'common_objections',
  'unique_selling_propositions',
  'emerging_opportunities',
  'recommended_strategies',
  'ai_automation_opportunities',
  'sales_team_challenges',
  'sales_upskilling_recommendations',
] as const;

const orNA = (value: string): string => value.trim() || 'N/A';

const formatNews = (enrichment: EnrichmentRecord): string => {
  const items = enrichment.newsItems.slice(0, PROMPT_NEWS_ITEMS);
  if (!items.length) return 'No recent news available';
  return items
    .map((item, idx) => {
      const hasContent = item.content && item.content !== CONTENT_UNAVAILABLE;
      return hasContent
        ? `${idx + 1}. ${item.title}\n   Summary: ${item.content.slice(0, PROMPT_NEWS_SUMMARY_CHARS)}${ELLIPSIS}`
        : `${idx + 1}. ${item.title}`;
    })
    .join('\n\n');
};

const formatSnippets = (enrichment: EnrichmentRecord): string => {
  const snippets = enrichment.industrySnippets.snippets.slice(0, PROMPT_MARKET_SNIPPETS);
  return snippets.length ? snippets.map((snippet) => `- ${snippet}`).join('\n') : 'No market insights available';
};

const formatSubpages = (raw: RawDocument): string =>
  raw.subpages.length
    ? raw.subpages.map((page) => `- ${page.title || page.url} (${page.url})`).join('\n')
    : 'None gathered';

export const buildIntelligencePrompt = (domainName: string, raw: RawDocument, enrichment: EnrichmentRecord): string =>
  renderPrompt(loadPrompt('business_intelligence.md'), {
    DOMAIN: domainName,
    TITLE: orNA(raw.title),
    DESCRIPTION: orNA(raw.description),
    CONTENT: orNA(raw.bodyText.slice(0, PROMPT_CONTENT_CHARS)),
    SUBPAGES: formatSubpages(raw),
    NEWS: formatNews(enrichment),
    MARKET_SNIPPETS: formatSnippets(enrichment),
    LINKEDIN_URL: enrichment.professionalPresence.profileUrl || 'Not available',
    LINKEDIN_FOUND: String(enrichment.professionalPresence.found),
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asText = (value: JsonValue): string => {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
};

const asObject = (value: JsonValue): JsonObject => {
  if (value === null) return {};
  return isJsonObject(value) ? value : { summary: value };
};

const asList = (value: JsonValue): JsonValue[] => {
  if (value === null) return [];
  return Array.isArray(value) ? value : [value];
};

export interface BackfillResult {
  report: IntelligenceReport;
  /** Required fields the model left out. */
  backfilled: string[];
}

/**
 * Turns parsed model output into a report. Missing sections get an empty
 * value of their kind (`""`, `{}`, `[]`); present sections keep what the model
 * wrote, wrapped when their kind is off (a lone string becomes a one-item
 * list, a scalar object section becomes `{ summary }`). Extra fields pass
 * through. Anything other than a JSON object is a `GenerationError`.
 */
export const backfillReport = (parsed: unknown): BackfillResult => {
  if (!isRecord(parsed)) {
    throw new GenerationError('Model response is not a JSON object');
  }

  const source = toJsonValue(parsed);
  const fields: JsonObject = isJsonObject(source) ? source : {};
  const backfilled = REPORT_FIELDS.filter((field) => !(field in fields));
  const field = (name: (typeof REPORT_FIELDS)[number]): JsonValue => fields[name] ?? null;

  const report: IntelligenceReport = {
    ...fields,
    industry_overview: asText(field('industry_overview')),
    market_size_and_trends: asObject(field('market_size_and_trends')),
    target_customer_segments: asList(field('target_customer_segments')),
    customer_pain_points: asList(field('customer_pain_points')),
    buying_behavior: asObject(field('buying_behavior')),
    top_competitors: asList(field('top_competitors')),
    common_objections: asList(field('common_objections')),
    unique_selling_propositions: asList(field('unique_selling_propositions')),
    emerging_opportunities: asList(field('emerging_opportunities')),
    recommended_strategies: asList(field('recommended_strategies')),
    ai_automation_opportunities: asList(field('ai_automation_opportunities')),
    sales_team_challenges: asList(field('sales_team_challenges')),
    sales_upskilling_recommendations: asList(field('sales_upskilling_recommendations')),
  };

  return { report, backfilled };
};

export interface IntelligenceInput {
  domainName: string;
  rawDocument: RawDocument;
  enrichment: EnrichmentRecord;
}

/** Transport and malformed-output errors propagate; missing fields do not. */
export const generateIntelligence = async (
  generator: GenerationCapability,
  input: IntelligenceInput,
  logger: Logger,
): Promise<IntelligenceReport> => {
  const prompt = buildIntelligencePrompt(input.domainName, input.rawDocument, input.enrichment);
  const parsed = await generator.generateJson(prompt);
  const { report, backfilled } = backfillReport(parsed);
  if (backfilled.length) {
    logger.warn('Intelligence report missing fields; backfilled', { domainName: input.domainName, fields: backfilled });
  }
  return report;
};

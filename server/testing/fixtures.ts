import type { EnrichmentRecord, IntelligenceReport, RawDocument } from '../../shared/types';
import type { GenerateOptions, GenerationCapability } from '../services/llmService';

export const rawDocument = (overrides: Partial<RawDocument> = {}): RawDocument => ({
  sourceUrl: 'https://acme.test',
  httpStatus: 200,
  title: 'Acme',
  description: 'Warehouse software for retailers',
  bodyText: 'Acme ships warehouse software to mid-sized retailers across North America.',
  headings: ['Acme'],
  internalLinks: ['https://acme.test/about'],
  extractionMethod: 'direct-fetch',
  language: 'en',
  keywords: [],
  openGraph: {},
  twitter: {},
  subpages: [],
  ...overrides,
});

export const enrichmentRecord = (overrides: Partial<EnrichmentRecord> = {}): EnrichmentRecord => ({
  newsItems: [],
  professionalPresence: {
    found: false,
    profileUrl: 'https://www.linkedin.com/company/acme',
    employeeCount: 'Not available',
    industry: 'Not available',
  },
  industrySnippets: { snippets: [], source: 'Not available' },
  ...overrides,
});

export const intelligenceReport = (overrides: Partial<IntelligenceReport> = {}): IntelligenceReport => ({
  industry_overview: 'Warehouse software is consolidating.',
  market_size_and_trends: { market_size: '$10B', growth_rate: '8%', key_trends: 'Automation' },
  target_customer_segments: ['Mid-sized retailers'],
  customer_pain_points: ['Manual picking'],
  buying_behavior: { decision_process: 'Committee', budget_cycle: 'Annual', key_influencers: 'COO' },
  top_competitors: [{ name: 'Globex', positioning: 'Enterprise focus' }],
  common_objections: [{ objection: 'Too expensive', response: 'Payback within a year' }],
  unique_selling_propositions: ['Fast rollout'],
  emerging_opportunities: ['Robotics'],
  recommended_strategies: ['Lead with ROI'],
  ai_automation_opportunities: ['Demand forecasting'],
  sales_team_challenges: [{ challenge: 'Long cycles', impact: 'High', frequency: 'Often' }],
  sales_upskilling_recommendations: [
    { skill_area: 'Discovery', training_type: 'Workshop', priority: 'High', expected_outcome: 'Better qualification' },
  ],
  ...overrides,
});

/** Generator that answers from a queue of canned values; an Error in the queue is thrown. */
export class ScriptedGenerator implements GenerationCapability {
  readonly prompts: string[] = [];

  constructor(private readonly answers: Array<unknown | Error>) {}

  async generateJson(prompt: string, _options?: GenerateOptions): Promise<unknown> {
    this.prompts.push(prompt);
    if (!this.answers.length) {
      throw new Error('No scripted answer left');
    }
    const answer = this.answers.length > 1 ? this.answers.shift() : this.answers[0];
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

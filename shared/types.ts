export type Stage = 'pending' | 'scraping' | 'analyzing' | 'completed' | 'failed';

export const TERMINAL_STAGES: readonly Stage[] = ['completed', 'failed'];

export type ExtractionMethod = 'remote-provider' | 'direct-fetch';

export interface SubPage {
  url: string;
  title: string;
  description: string;
  content: string;
}

export interface RawDocument {
  sourceUrl: string;
  /** Absent when the provider did not report one. */
  httpStatus?: number;
  title: string;
  description: string;
  bodyText: string;
  headings: string[];
  internalLinks: string[];
  extractionMethod: ExtractionMethod;
  language: string;
  keywords: string[];
  openGraph: Record<string, string>;
  twitter: Record<string, string>;
  subpages: SubPage[];
}

export interface NewsItem {
  title: string;
  url: string;
  source: string;
  publishedAt: string;
  content: string;
}

export interface ProfessionalPresence {
  found: boolean;
  profileUrl: string;
  employeeCount: string;
  industry: string;
}

export interface IndustrySnippets {
  snippets: string[];
  source: string;
}

export interface EnrichmentRecord {
  newsItems: NewsItem[];
  professionalPresence: ProfessionalPresence;
  industrySnippets: IndustrySnippets;
}

/** A value as it came out of the model's JSON. */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * The model's report. Known sections are guaranteed to exist with the listed
 * kind; their contents are kept as the model wrote them, so list items may be
 * plain strings or objects (`{ name, positioning }`, `{ objection, response }`, ...).
 */
export interface IntelligenceReport {
  industry_overview: string;
  /** Usually market_size, growth_rate, key_trends. */
  market_size_and_trends: JsonObject;
  target_customer_segments: JsonValue[];
  customer_pain_points: JsonValue[];
  /** Usually decision_process, budget_cycle, key_influencers. */
  buying_behavior: JsonObject;
  top_competitors: JsonValue[];
  common_objections: JsonValue[];
  unique_selling_propositions: JsonValue[];
  emerging_opportunities: JsonValue[];
  recommended_strategies: JsonValue[];
  ai_automation_opportunities: JsonValue[];
  sales_team_challenges: JsonValue[];
  sales_upskilling_recommendations: JsonValue[];
  [extra: string]: JsonValue;
}

export type ArtifactKind = 'json' | 'report';

export interface ArtifactRef {
  kind: ArtifactKind;
  url: string;
  publishedAt: string;
}

export interface AnalysisJob {
  id: string;
  domainName: string;
  stage: Stage;
  attempts: number;
  rawDocument?: RawDocument;
  enrichment?: EnrichmentRecord;
  intelligence?: IntelligenceReport;
  artifactRefs: ArtifactRef[];
  errorDetail?: string;
  createdAt: string;
  updatedAt: string;
  scrapedAt?: string;
  completedAt?: string;
}

export interface ScrapingLog {
  id: string;
  jobId: string;
  url: string;
  httpStatus?: number;
  success: boolean;
  errorMessage?: string;
  contentLength: number;
  extractionMethod?: ExtractionMethod;
  createdAt: string;
}

export type TrainingType = 'objection_handling' | 'product_knowledge' | 'pitch_strategy' | 'competitor_analysis';

export type DifficultyLevel = 'beginner' | 'intermediate' | 'advanced';

export interface TrainingContent {
  learning_objectives: string[];
  key_concepts: string[];
  scenarios: Array<{ situation: string; approach: string; outcome: string }>;
  exercises: string[];
  assessment: Array<{ question: string; correct_answer: string; explanation: string }>;
  action_items: string[];
  [extra: string]: unknown;
}

export interface TrainingModule {
  id: string;
  jobId: string;
  title: string;
  trainingType: TrainingType;
  difficultyLevel: DifficultyLevel;
  estimatedDurationMinutes: number;
  content: TrainingContent;
  createdAt: string;
}

export interface AnalysisStatus {
  id: string;
  domainName: string;
  stage: Stage;
  attempts: number;
  createdAt: string;
  completedAt: string | null;
  errorDetail: string | null;
  artifactRefs: ArtifactRef[];
  reportReady: boolean;
}

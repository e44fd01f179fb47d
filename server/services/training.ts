import { GenerationError } from '../../shared/errors';
import type { DifficultyLevel, IntelligenceReport, TrainingContent, TrainingType } from '../../shared/types';
import { loadPrompt, renderPrompt } from '../prompts/loader';
import type { GenerationCapability } from './llmService';

export interface TrainingSpec {
  trainingType: TrainingType;
  title: string;
  difficultyLevel: DifficultyLevel;
}

export const TRAINING_SPECS: readonly TrainingSpec[] = [
  { trainingType: 'objection_handling', title: 'Objection Handling', difficultyLevel: 'intermediate' },
  { trainingType: 'product_knowledge', title: 'Product Knowledge Training', difficultyLevel: 'beginner' },
  { trainingType: 'pitch_strategy', title: 'Sales Pitch Strategy', difficultyLevel: 'intermediate' },
  { trainingType: 'competitor_analysis', title: 'Competitor Analysis', difficultyLevel: 'advanced' },
];

export const TRAINING_DURATION_MINUTES = 45;

export const buildTrainingPrompt = (domainName: string, intelligence: IntelligenceReport, spec: TrainingSpec): string =>
  renderPrompt(loadPrompt('sales_training.md'), {
    DOMAIN: domainName,
    INTELLIGENCE: JSON.stringify(intelligence, null, 2),
    TRAINING_TITLE: spec.title,
    DIFFICULTY: spec.difficultyLevel,
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const text = (value: unknown): string => (typeof value === 'string' ? value : '');
const textList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
const recordList = (value: unknown): Record<string, unknown>[] => (Array.isArray(value) ? value.filter(isRecord) : []);

export const toTrainingContent = (parsed: unknown): TrainingContent => {
  if (!isRecord(parsed)) {
    throw new GenerationError('Training response is not a JSON object');
  }
  return {
    ...parsed,
    learning_objectives: textList(parsed.learning_objectives),
    key_concepts: textList(parsed.key_concepts),
    scenarios: recordList(parsed.scenarios).map((item) => ({
      situation: text(item.situation),
      approach: text(item.approach),
      outcome: text(item.outcome),
    })),
    exercises: textList(parsed.exercises),
    assessment: recordList(parsed.assessment).map((item) => ({
      question: text(item.question),
      correct_answer: text(item.correct_answer),
      explanation: text(item.explanation),
    })),
    action_items: textList(parsed.action_items),
  };
};

export const generateTrainingContent = async (
  generator: GenerationCapability,
  domainName: string,
  intelligence: IntelligenceReport,
  spec: TrainingSpec,
): Promise<TrainingContent> => toTrainingContent(await generator.generateJson(buildTrainingPrompt(domainName, intelligence, spec)));

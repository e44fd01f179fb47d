import { randomId } from '../../shared/crypto';
import type { AnalysisJob, TrainingModule } from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';
import type { JobStore } from '../persistence/jobStore';
import type { GenerationCapability } from '../services/llmService';
import { TRAINING_DURATION_MINUTES, TRAINING_SPECS, generateTrainingContent, type TrainingSpec } from '../services/training';

export interface TrainingTaskDeps {
  store: JobStore;
  generator: GenerationCapability;
  logger: Logger;
  specs?: readonly TrainingSpec[];
  now?: () => Date;
}

/**
 * Generates one module per training type for a completed job. Each module stands
 * alone: a failure is logged and the loop moves on.
 */
export const runTrainingTask = async (deps: TrainingTaskDeps, job: AnalysisJob): Promise<TrainingModule[]> => {
  const logger = deps.logger.child({ jobId: job.id, domainName: job.domainName });
  const intelligence = job.intelligence;
  if (!intelligence) {
    logger.warn('Training skipped; job has no intelligence report');
    return [];
  }

  const now = deps.now ?? (() => new Date());
  const created: TrainingModule[] = [];
  for (const spec of deps.specs ?? TRAINING_SPECS) {
    try {
      const content = await generateTrainingContent(deps.generator, job.domainName, intelligence, spec);
      const module: TrainingModule = {
        id: randomId(),
        jobId: job.id,
        title: spec.title,
        trainingType: spec.trainingType,
        difficultyLevel: spec.difficultyLevel,
        estimatedDurationMinutes: TRAINING_DURATION_MINUTES,
        content,
        createdAt: now().toISOString(),
      };
      await deps.store.addTrainingModule(module);
      created.push(module);
      logger.info('Training module created', { trainingType: spec.trainingType });
    } catch (error) {
      logger.error('Training module generation failed', { trainingType: spec.trainingType, error: errorMessage(error) });
    }
  }
  return created;
};

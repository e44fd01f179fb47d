import type { ArtifactPublisher } from '../../shared/artifacts';
import type { RetryPolicy } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import { AcquisitionError } from '../../shared/errors';
import type { AnalysisJob, EnrichmentRecord, RawDocument, ScrapingLog, Stage } from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';
import { requireJob, type JobStore } from '../persistence/jobStore';
import { generateIntelligence } from '../services/intelligence';
import type { GenerationCapability } from '../services/llmService';
import { sleep as defaultSleep, type Sleep } from '../utils/async';
import { publishArtifacts } from './publishArtifacts';
import { assertTransition, isTerminal, type TransitionKind } from './stages';

export interface OrchestratorDeps {
  store: JobStore;
  acquire: (domainName: string) => Promise<RawDocument>;
  enrich: (domainName: string) => Promise<EnrichmentRecord>;
  generator: GenerationCapability;
  publisher: ArtifactPublisher;
  retry: RetryPolicy;
  logger: Logger;
  /** Follow-on work for a completed job; its outcome never touches the job. */
  onCompleted?: (job: AnalysisJob) => Promise<unknown>;
  sleep?: Sleep;
  now?: () => Date;
}

/**
 * Drives one analysis job from `pending` to `completed` or `failed`. Any error
 * while scraping or analyzing re-runs the whole job, up to
 * `retry.maxAttempts` attempts spaced `retry.delayMs` apart; nothing is
 * carried over between attempts.
 */
export class AnalysisOrchestrator {
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async run(jobId: string): Promise<AnalysisJob> {
    let job = await requireJob(this.deps.store, jobId);
    if (isTerminal(job.stage)) {
      return job;
    }

    const { maxAttempts, delayMs } = this.deps.retry;
    const logger = this.deps.logger.child({ jobId, domainName: job.domainName });

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        job = await this.attempt(job, attempt, logger);
        this.startFollowOn(job, logger);
        return job;
      } catch (error) {
        const message = errorMessage(error);
        job = await requireJob(this.deps.store, jobId);
        if (attempt >= maxAttempts) {
          logger.error('Analysis failed; retry budget exhausted', { attempt, error: message });
          return this.fail(job, message);
        }
        logger.warn('Analysis attempt failed; retrying', { attempt, maxAttempts, delayMs, error: message });
        await this.sleep(delayMs);
      }
    }

    return this.fail(job, `Retry policy allows ${maxAttempts} attempts`);
  }

  /** `failed` is only reachable from scraping or analyzing. */
  private async fail(job: AnalysisJob, errorDetail: string): Promise<AnalysisJob> {
    const active = job.stage === 'pending' ? await this.transition(job, 'scraping') : job;
    return this.transition(active, 'failed', 'advance', { errorDetail, completedAt: undefined });
  }

  private async attempt(start: AnalysisJob, attempt: number, logger: Logger): Promise<AnalysisJob> {
    let job = await this.transition(start, 'scraping', start.stage === 'pending' ? 'advance' : 'retry', {
      attempts: attempt,
      rawDocument: undefined,
      enrichment: undefined,
      intelligence: undefined,
      artifactRefs: [],
      errorDetail: undefined,
    });
    logger.info('Scraping', { attempt });

    const [rawDocument, enrichment] = await Promise.all([
      this.acquireLogged(job),
      this.deps.enrich(job.domainName),
    ]);

    job = await this.transition(job, 'analyzing', 'advance', {
      rawDocument,
      enrichment,
      scrapedAt: this.now().toISOString(),
    });
    logger.info('Analyzing', { attempt, extractionMethod: rawDocument.extractionMethod });

    const intelligence = await generateIntelligence(
      this.deps.generator,
      { domainName: job.domainName, rawDocument, enrichment },
      logger,
    );
    job = await this.save({ ...job, intelligence });

    const artifactRefs = await publishArtifacts(
      this.deps.publisher,
      { job, rawDocument, enrichment, intelligence },
      logger,
      this.now,
    );

    job = await this.transition(job, 'completed', 'advance', {
      artifactRefs,
      completedAt: this.now().toISOString(),
    });
    logger.info('Analysis completed', { attempt, artifacts: artifactRefs.length });
    return job;
  }

  private async acquireLogged(job: AnalysisJob): Promise<RawDocument> {
    const log = (entry: Omit<ScrapingLog, 'id' | 'jobId' | 'createdAt'>) =>
      this.deps.store.addScrapingLog({ id: randomId(), jobId: job.id, createdAt: this.now().toISOString(), ...entry });

    try {
      const rawDocument = await this.deps.acquire(job.domainName);
      await log({
        url: rawDocument.sourceUrl,
        httpStatus: rawDocument.httpStatus,
        success: true,
        contentLength: rawDocument.bodyText.length,
        extractionMethod: rawDocument.extractionMethod,
      });
      return rawDocument;
    } catch (error) {
      await log({
        url: error instanceof AcquisitionError ? error.url : `https://${job.domainName}`,
        httpStatus: error instanceof AcquisitionError ? error.httpStatus : undefined,
        success: false,
        errorMessage: errorMessage(error),
        contentLength: 0,
      });
      throw error;
    }
  }

  private startFollowOn(job: AnalysisJob, logger: Logger) {
    const onCompleted = this.deps.onCompleted;
    if (!onCompleted) return;
    onCompleted(job).catch((error: unknown) => {
      logger.error('Follow-on task failed', { error: errorMessage(error) });
    });
  }

  private async transition(
    job: AnalysisJob,
    to: Stage,
    kind: TransitionKind = 'advance',
    patch: Partial<AnalysisJob> = {},
  ): Promise<AnalysisJob> {
    assertTransition(job.stage, to, kind);
    return this.save({ ...job, ...patch, stage: to });
  }

  private async save(job: AnalysisJob): Promise<AnalysisJob> {
    const next = { ...job, updatedAt: this.now().toISOString() };
    await this.deps.store.saveJob(next);
    return next;
  }
}

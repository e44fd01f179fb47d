import { errorMessage, type Logger } from '../obs/logger';
import { Semaphore } from '../utils/concurrency';

export type JobWorker = (jobId: string) => Promise<unknown>;

/**
 * Bounded worker pool keyed by job id. A job id is never run by two workers
 * at once: dispatching an id that is queued or running returns the existing
 * run.
 */
export class JobQueue {
  private readonly slots: Semaphore;
  private readonly active = new Map<string, Promise<void>>();

  constructor(
    concurrency: number,
    private readonly worker: JobWorker,
    private readonly logger: Logger,
  ) {
    this.slots = new Semaphore(Math.max(1, concurrency));
  }

  get size(): number {
    return this.active.size;
  }

  isActive(jobId: string): boolean {
    return this.active.has(jobId);
  }

  /** Resolves when the run ends; worker errors are logged, never rethrown. */
  dispatch(jobId: string): Promise<void> {
    const existing = this.active.get(jobId);
    if (existing) {
      return existing;
    }

    const run = this.slots
      .run(() => this.worker(jobId))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error('Job worker crashed', { jobId, error: errorMessage(error) });
        },
      )
      .finally(() => {
        this.active.delete(jobId);
      });
    this.active.set(jobId, run);
    return run;
  }

  /** Waits for every queued and running job. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all(this.active.values());
    }
  }
}

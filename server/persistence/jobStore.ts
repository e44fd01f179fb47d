import { JobNotFoundError } from '../../shared/errors';
import { randomId } from '../../shared/crypto';
import type { AnalysisJob, ScrapingLog, TrainingModule } from '../../shared/types';

/**
 * Storage for analysis jobs and the records hanging off them. Every read
 * returns a copy, so callers never share mutable state with the store.
 */
export interface JobStore {
  createJob(domainName: string): Promise<AnalysisJob>;
  getJob(id: string): Promise<AnalysisJob | null>;
  saveJob(job: AnalysisJob): Promise<void>;
  /** Newest first. */
  listJobs(): Promise<AnalysisJob[]>;
  addScrapingLog(entry: ScrapingLog): Promise<void>;
  listScrapingLogs(jobId: string): Promise<ScrapingLog[]>;
  addTrainingModule(module: TrainingModule): Promise<void>;
  listTrainingModules(jobId: string): Promise<TrainingModule[]>;
}

export const newJob = (domainName: string, now = new Date()): AnalysisJob => ({
  id: randomId(),
  domainName,
  stage: 'pending',
  attempts: 0,
  artifactRefs: [],
  createdAt: now.toISOString(),
  updatedAt: now.toISOString(),
});

export const requireJob = async (store: JobStore, id: string): Promise<AnalysisJob> => {
  const job = await store.getJob(id);
  if (!job) {
    throw new JobNotFoundError(id);
  }
  return job;
};

/** Newest first; equal timestamps keep the later insertion first. */
export const newestFirst = (jobs: AnalysisJob[]): AnalysisJob[] =>
  jobs
    .map((job, index) => ({ job, index }))
    .sort((a, b) => b.job.createdAt.localeCompare(a.job.createdAt) || b.index - a.index)
    .map(({ job }) => job);

export const createMemoryJobStore = (): JobStore => {
  const jobs = new Map<string, AnalysisJob>();
  const logs: ScrapingLog[] = [];
  const modules: TrainingModule[] = [];

  return {
    async createJob(domainName) {
      const job = newJob(domainName);
      jobs.set(job.id, structuredClone(job));
      return job;
    },
    async getJob(id) {
      const job = jobs.get(id);
      return job ? structuredClone(job) : null;
    },
    async saveJob(job) {
      if (!jobs.has(job.id)) {
        throw new JobNotFoundError(job.id);
      }
      jobs.set(job.id, structuredClone(job));
    },
    async listJobs() {
      return newestFirst(Array.from(jobs.values(), (job) => structuredClone(job)));
    },
    async addScrapingLog(entry) {
      logs.push(structuredClone(entry));
    },
    async listScrapingLogs(jobId) {
      return logs.filter((entry) => entry.jobId === jobId).map((entry) => structuredClone(entry));
    },
    async addTrainingModule(module) {
      modules.push(structuredClone(module));
    },
    async listTrainingModules(jobId) {
      return modules.filter((module) => module.jobId === jobId).map((module) => structuredClone(module));
    },
  };
};

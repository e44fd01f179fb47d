import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { PublicConfig } from '../../shared/config';
import { AppError } from '../../shared/errors';
import type { AnalysisJob, AnalysisStatus } from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';
import { requireJob, type JobStore } from '../persistence/jobStore';
import type { JobQueue } from '../pipeline/jobQueue';
import { normalizeDomainName } from './domain';

export interface AppDeps {
  store: JobStore;
  queue: Pick<JobQueue, 'dispatch'>;
  logger: Logger;
  publicConfig?: PublicConfig;
  debugRequests?: boolean;
}

export const toAnalysisStatus = (job: AnalysisJob): AnalysisStatus => ({
  id: job.id,
  domainName: job.domainName,
  stage: job.stage,
  attempts: job.attempts,
  createdAt: job.createdAt,
  completedAt: job.completedAt ?? null,
  errorDetail: job.errorDetail ?? null,
  artifactRefs: job.artifactRefs,
  reportReady: job.stage === 'completed' && job.artifactRefs.some((ref) => ref.kind === 'report'),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncHandler =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export const createApp = (deps: AppDeps) => {
  const { store, queue, logger } = deps;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (deps.debugRequests) {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  if (deps.publicConfig) {
    const publicConfig = deps.publicConfig;
    app.get('/api/config', (_req: Request, res: Response) => {
      res.json(publicConfig);
    });
  }

  app.post(
    '/api/analyses',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      const raw = typeof body === 'object' && body !== null && 'domain_name' in body ? body.domain_name : undefined;
      const domainName = normalizeDomainName(raw);
      const job = await store.createJob(domainName);
      logger.info('Analysis queued', { jobId: job.id, domainName });
      // dispatch never rejects; the run is observed through the store
      void queue.dispatch(job.id);
      res.status(201).json({ message: 'Domain analysis started', analysis: job });
    }),
  );

  app.get(
    '/api/analyses',
    asyncHandler(async (_req, res) => {
      const jobs = await store.listJobs();
      res.json({ analyses: jobs.map(toAnalysisStatus) });
    }),
  );

  app.get(
    '/api/analyses/:id',
    asyncHandler(async (req, res) => {
      res.json(await requireJob(store, req.params.id));
    }),
  );

  app.get(
    '/api/analyses/:id/status',
    asyncHandler(async (req, res) => {
      res.json(toAnalysisStatus(await requireJob(store, req.params.id)));
    }),
  );

  app.get(
    '/api/analyses/:id/training',
    asyncHandler(async (req, res) => {
      const job = await requireJob(store, req.params.id);
      res.json({ modules: await store.listTrainingModules(job.id) });
    }),
  );

  app.get(
    '/api/analyses/:id/logs',
    asyncHandler(async (req, res) => {
      const job = await requireJob(store, req.params.id);
      res.json({ logs: await store.listScrapingLogs(job.id) });
    }),
  );

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError && error.statusCode < 500) {
      res.status(error.statusCode).json({ error: error.message });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error('Unhandled request error', { method: req.method, path: req.originalUrl, error: errorMessage(error) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import { JobNotFoundError } from '../../shared/errors';
import type { AnalysisJob, JsonValue, ScrapingLog, TrainingModule } from '../../shared/types';
import { errorMessage } from '../obs/logger';
import { newJob, newestFirst, type JobStore } from './jobStore';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

const ExtractionMethodSchema = z.enum(['remote-provider', 'direct-fetch']);

const RawDocumentSchema = z.object({
  sourceUrl: z.string(),
  httpStatus: z.number().int().optional(),
  title: z.string(),
  description: z.string(),
  bodyText: z.string(),
  headings: z.array(z.string()),
  internalLinks: z.array(z.string()),
  extractionMethod: ExtractionMethodSchema,
  language: z.string(),
  keywords: z.array(z.string()),
  openGraph: z.record(z.string()),
  twitter: z.record(z.string()),
  subpages: z.array(z.object({ url: z.string(), title: z.string(), description: z.string(), content: z.string() })),
});

const EnrichmentSchema = z.object({
  newsItems: z.array(
    z.object({ title: z.string(), url: z.string(), source: z.string(), publishedAt: z.string(), content: z.string() }),
  ),
  professionalPresence: z.object({
    found: z.boolean(),
    profileUrl: z.string(),
    employeeCount: z.string(),
    industry: z.string(),
  }),
  industrySnippets: z.object({ snippets: z.array(z.string()), source: z.string() }),
});

const JsonListSchema = z.array(JsonValueSchema);

const IntelligenceSchema = z
  .object({
    industry_overview: z.string(),
    market_size_and_trends: z.record(JsonValueSchema),
    target_customer_segments: JsonListSchema,
    customer_pain_points: JsonListSchema,
    buying_behavior: z.record(JsonValueSchema),
    top_competitors: JsonListSchema,
    common_objections: JsonListSchema,
    unique_selling_propositions: JsonListSchema,
    emerging_opportunities: JsonListSchema,
    recommended_strategies: JsonListSchema,
    ai_automation_opportunities: JsonListSchema,
    sales_team_challenges: JsonListSchema,
    sales_upskilling_recommendations: JsonListSchema,
  })
  .catchall(JsonValueSchema);

const JobSchema = z.object({
  id: z.string(),
  domainName: z.string(),
  stage: z.enum(['pending', 'scraping', 'analyzing', 'completed', 'failed']),
  attempts: z.number().int().nonnegative(),
  rawDocument: RawDocumentSchema.optional(),
  enrichment: EnrichmentSchema.optional(),
  intelligence: IntelligenceSchema.optional(),
  artifactRefs: z.array(z.object({ kind: z.enum(['json', 'report']), url: z.string(), publishedAt: z.string() })),
  errorDetail: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  scrapedAt: z.string().optional(),
  completedAt: z.string().optional(),
});

const ScrapingLogSchema = z.object({
  id: z.string(),
  jobId: z.string(),
  url: z.string(),
  httpStatus: z.number().int().optional(),
  success: z.boolean(),
  errorMessage: z.string().optional(),
  contentLength: z.number().int().nonnegative(),
  extractionMethod: ExtractionMethodSchema.optional(),
  createdAt: z.string(),
});

const TrainingModuleSchema = z.object({
  id: z.string(),
  jobId: z.string(),
  title: z.string(),
  trainingType: z.enum(['objection_handling', 'product_knowledge', 'pitch_strategy', 'competitor_analysis']),
  difficultyLevel: z.enum(['beginner', 'intermediate', 'advanced']),
  estimatedDurationMinutes: z.number(),
  content: z
    .object({
      learning_objectives: z.array(z.string()),
      key_concepts: z.array(z.string()),
      scenarios: z.array(z.object({ situation: z.string(), approach: z.string(), outcome: z.string() })),
      exercises: z.array(z.string()),
      assessment: z.array(z.object({ question: z.string(), correct_answer: z.string(), explanation: z.string() })),
      action_items: z.array(z.string()),
    })
    .passthrough(),
  createdAt: z.string(),
});

const StoredJobSchema = z.object({
  job: JobSchema,
  scrapingLogs: z.array(ScrapingLogSchema),
  trainingModules: z.array(TrainingModuleSchema),
});

interface StoredJob {
  job: AnalysisJob;
  scrapingLogs: ScrapingLog[];
  trainingModules: TrainingModule[];
}

const parseStoredJob = (id: string, raw: string): StoredJob => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Stored job ${id} is not valid JSON: ${errorMessage(error)}`);
  }
  const result = StoredJobSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Stored job ${id} is malformed at ${issue?.path.join('.') || '(root)'}`);
  }
  return result.data;
};

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of persistence root: ${target}`);
  }
};

const isMissingFile = (error: unknown): boolean => isRecord(error) && error.code === 'ENOENT';

/**
 * One JSON document per job under `persistence.jobsDir`, holding the job and
 * its scraping logs and training modules. Writes for the same job are
 * serialised and land through a rename.
 */
export const createFsJobStore = (config: Pick<AppConfig, 'persistence'>): JobStore => {
  const { rootDir, jobsDir } = config.persistence;
  const locks = new Map<string, Promise<void>>();

  const fileFor = (id: string) => {
    if (!/^[a-z0-9-]+$/i.test(id)) {
      throw new JobNotFoundError(id);
    }
    const target = path.join(jobsDir, `${id}.json`);
    guardPath(rootDir, target);
    return target;
  };

  const withLock = async <T>(id: string, task: () => Promise<T>): Promise<T> => {
    const previous = locks.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    locks.set(id, settled);
    try {
      return await run;
    } finally {
      if (locks.get(id) === settled) locks.delete(id);
    }
  };

  const read = async (id: string): Promise<StoredJob | null> => {
    let raw: string;
    try {
      raw = await fs.readFile(fileFor(id), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
    return parseStoredJob(id, raw);
  };

  const write = async (doc: StoredJob) => {
    await ensureDir(jobsDir);
    const target = fileFor(doc.job.id);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temp, JSON.stringify(doc, null, 2), 'utf-8');
    await fs.rename(temp, target);
  };

  const update = (id: string, change: (doc: StoredJob) => void) =>
    withLock(id, async () => {
      const doc = await read(id);
      if (!doc) throw new JobNotFoundError(id);
      change(doc);
      await write(doc);
    });

  return {
    async createJob(domainName) {
      const job = newJob(domainName);
      await withLock(job.id, () => write({ job, scrapingLogs: [], trainingModules: [] }));
      return job;
    },
    async getJob(id) {
      return (await read(id))?.job ?? null;
    },
    async saveJob(job) {
      await update(job.id, (doc) => {
        doc.job = job;
      });
    },
    async listJobs() {
      let names: string[];
      try {
        names = await fs.readdir(jobsDir);
      } catch (error) {
        if (isMissingFile(error)) return [];
        throw error;
      }
      const docs = await Promise.all(
        names.filter((name) => name.endsWith('.json')).map((name) => read(name.slice(0, -'.json'.length))),
      );
      return newestFirst(docs.flatMap((doc) => (doc ? [doc.job] : [])));
    },
    async addScrapingLog(entry) {
      await update(entry.jobId, (doc) => {
        doc.scrapingLogs.push(entry);
      });
    },
    async listScrapingLogs(jobId) {
      return (await read(jobId))?.scrapingLogs ?? [];
    },
    async addTrainingModule(module) {
      await update(module.jobId, (doc) => {
        doc.trainingModules.push(module);
      });
    },
    async listTrainingModules(jobId) {
      return (await read(jobId))?.trainingModules ?? [];
    },
  };
};

import 'dotenv/config';
import type { ArtifactPublisher } from '../shared/artifacts';
import { getPublicConfig, loadConfig, type AppConfig } from './config/config';
import { createApp } from './http/routes';
import { createLogger } from './obs/logger';
import { createFsJobStore } from './persistence/fsJobStore';
import { createFsArtifactPublisher } from './persistence/fsPublisher';
import { createMemoryJobStore, type JobStore } from './persistence/jobStore';
import { createS3ArtifactPublisher } from './persistence/s3Publisher';
import { JobQueue } from './pipeline/jobQueue';
import { AnalysisOrchestrator } from './pipeline/orchestrator';
import { runTrainingTask } from './pipeline/trainingTask';
import { enrichDomain } from './retrieval/enrichment';
import { acquireSite } from './retrieval/siteAcquirer';
import { LLMService } from './services/llmService';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  scraping: {
    provider: config.scraping.provider,
    hasFirecrawlKey: Boolean(config.firecrawl.apiKey),
  },
  llm: {
    model: config.llm.model,
    hasApiKey: Boolean(config.llm.apiKey),
  },
  retry: config.retry,
  persistence: config.persistence.mode,
  artifacts: config.artifacts.publisher,
});

const createStore = (settings: AppConfig): JobStore =>
  settings.persistence.mode === 'memory' ? createMemoryJobStore() : createFsJobStore(settings);

const createPublisher = (settings: AppConfig): ArtifactPublisher =>
  settings.artifacts.publisher === 's3' ? createS3ArtifactPublisher(settings) : createFsArtifactPublisher(settings);

const store = createStore(config);
const generator = new LLMService(config, logger.child({ component: 'llm' }));

const orchestrator = new AnalysisOrchestrator({
  store,
  generator,
  publisher: createPublisher(config),
  retry: config.retry,
  logger: logger.child({ component: 'orchestrator' }),
  acquire: (domainName) => acquireSite(domainName, { config, logger: logger.child({ component: 'acquirer' }) }),
  enrich: (domainName) => enrichDomain(domainName, { config, logger: logger.child({ component: 'enrichment' }) }),
  onCompleted: (job) => runTrainingTask({ store, generator, logger: logger.child({ component: 'training' }) }, job),
});

const queue = new JobQueue(config.queue.concurrency, (jobId) => orchestrator.run(jobId), logger);

const app = createApp({
  store,
  queue,
  logger,
  publicConfig: getPublicConfig(config),
  debugRequests: config.observability.logLevel === 'debug',
});

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});

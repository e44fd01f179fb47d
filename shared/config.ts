import { z } from 'zod';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  fetch: z.object({
    timeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  scraping: z.object({
    provider: z.enum(['firecrawl', 'direct']),
    maxBodyChars: z.number().int().positive(),
    maxHeadings: z.number().int().positive(),
    maxInternalLinks: z.number().int().positive(),
    crawlPageLimit: z.number().int().nonnegative(),
  }),
  firecrawl: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url(),
    crawlPollIntervalMs: z.number().int().positive(),
    crawlMaxPolls: z.number().int().positive(),
  }),
  news: z.object({
    maxItems: z.number().int().positive().max(20),
    hl: z.string().min(2),
    gl: z.string().min(2),
    ceid: z.string().min(3),
  }),
  llm: z.object({
    apiKey: z.string(),
    model: z.string().min(1),
    fallbackModel: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    requestsPerMinute: z.number().int().positive(),
  }),
  retry: z.object({
    maxAttempts: z.number().int().positive(),
    delayMs: z.number().int().nonnegative(),
  }),
  queue: z.object({
    concurrency: z.number().int().positive(),
  }),
  persistence: z.object({
    mode: z.enum(['fs', 'memory']),
    rootDir: z.string().min(1),
    jobsDir: z.string().min(1),
    artifactsDir: z.string().min(1),
  }),
  artifacts: z.object({
    publisher: z.enum(['fs', 's3']),
    s3: z.object({
      bucket: z.string().optional(),
      region: z.string().min(1),
      endpoint: z.string().url().optional(),
      prefix: z.string(),
      publicBaseUrl: z.string().url().optional(),
    }),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type RetryPolicy = AppConfig['retry'];

export interface PublicConfig {
  scrapingProvider: AppConfig['scraping']['provider'];
  providerConfigured: boolean;
  retry: RetryPolicy;
  artifactPublisher: AppConfig['artifacts']['publisher'];
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  scrapingProvider: config.scraping.provider,
  providerConfigured: config.scraping.provider === 'firecrawl' && Boolean(config.firecrawl.apiKey),
  retry: { ...config.retry },
  artifactPublisher: config.artifacts.publisher,
});

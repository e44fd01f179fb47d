import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const stringFromEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const pickEnum = <T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T => {
  const normalized = (value || '').trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalized) ?? fallback;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const rootDir = path.resolve(env.DATA_ROOT || path.join(process.cwd(), 'data'));

  const rawConfig = {
    environment: pickEnum(env.NODE_ENV, ['development', 'test', 'production'], 'development'),
    server: {
      port: numberFromEnv(env.PORT, 3001),
    },
    fetch: {
      timeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 15_000),
      userAgent:
        stringFromEnv(env.FETCH_USER_AGENT) ||
        // Browser UA; several publishers answer 403 to library defaults
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
    },
    scraping: {
      provider: pickEnum(env.SCRAPING_PROVIDER, ['firecrawl', 'direct'], 'firecrawl'),
      maxBodyChars: numberFromEnv(env.SCRAPING_MAX_BODY_CHARS, 5_000),
      maxHeadings: numberFromEnv(env.SCRAPING_MAX_HEADINGS, 20),
      maxInternalLinks: numberFromEnv(env.SCRAPING_MAX_LINKS, 10),
      crawlPageLimit: numberFromEnv(env.SCRAPING_CRAWL_PAGE_LIMIT, 5),
    },
    firecrawl: {
      apiKey: stringFromEnv(env.FIRECRAWL_API_KEY),
      baseUrl: stringFromEnv(env.FIRECRAWL_BASE_URL) || 'https://api.firecrawl.dev',
      crawlPollIntervalMs: numberFromEnv(env.FIRECRAWL_CRAWL_POLL_MS, 2_000),
      crawlMaxPolls: numberFromEnv(env.FIRECRAWL_CRAWL_MAX_POLLS, 15),
    },
    news: {
      maxItems: numberFromEnv(env.NEWS_MAX_ITEMS, 5),
      hl: stringFromEnv(env.NEWS_HL) || 'en-US',
      gl: stringFromEnv(env.NEWS_GL) || 'US',
      ceid: stringFromEnv(env.NEWS_CEID) || 'US:en',
    },
    llm: {
      apiKey: env.GEMINI_API_KEY?.trim() || '',
      model: stringFromEnv(env.GEMINI_MODEL) || 'gemini-2.5-flash',
      fallbackModel: stringFromEnv(env.GEMINI_FALLBACK_MODEL) || 'gemini-2.5-flash-lite',
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0.7),
      maxOutputTokens: numberFromEnv(env.GEMINI_MAX_OUTPUT_TOKENS, 8_000),
      requestsPerMinute: Math.max(1, Math.min(60, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 10))),
    },
    retry: {
      maxAttempts: numberFromEnv(env.ANALYSIS_MAX_ATTEMPTS, 3),
      delayMs: numberFromEnv(env.ANALYSIS_RETRY_DELAY_MS, 60_000),
    },
    queue: {
      concurrency: numberFromEnv(env.ANALYSIS_CONCURRENCY, 2),
    },
    persistence: {
      mode: pickEnum(env.PERSISTENCE_MODE, ['fs', 'memory'], 'fs'),
      rootDir,
      jobsDir: path.join(rootDir, 'jobs'),
      artifactsDir: path.join(rootDir, 'artifacts'),
    },
    artifacts: {
      publisher: pickEnum(env.ARTIFACT_PUBLISHER, ['fs', 's3'], 'fs'),
      s3: {
        bucket: stringFromEnv(env.S3_BUCKET),
        region: stringFromEnv(env.S3_REGION) || 'us-east-1',
        endpoint: stringFromEnv(env.S3_ENDPOINT),
        prefix: env.S3_PREFIX?.trim() ?? 'reports/',
        publicBaseUrl: stringFromEnv(env.S3_PUBLIC_BASE_URL),
      },
    },
    observability: {
      logLevel: pickEnum(env.LOG_LEVEL, ['debug', 'info', 'warn', 'error'], 'info'),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const buildConfigFromEnv = (env: NodeJS.ProcessEnv): AppConfig => buildConfig(env);

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

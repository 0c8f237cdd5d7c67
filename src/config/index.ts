import * as dotenv from 'dotenv';
import * as cron from 'node-cron';
import { pino, destination, Logger } from 'pino';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// Logs go to stderr; stdout is reserved for the JSON run report
const logger: Logger =
  process.env.NODE_ENV === 'development'
    ? pino({
        level: process.env.LOG_LEVEL || 'info',
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            destination: 2,
          },
        },
      })
    : pino({ level: process.env.LOG_LEVEL || 'info' }, destination(2));

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const flag = (fallback: boolean) =>
  z
    .preprocess(emptyAsUndefined, z.enum(['true', 'false']).optional())
    .transform((value) => (value === undefined ? fallback : value === 'true'));

const count = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).default(fallback));

const optionalCount = () =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().optional());

const cronExpression = () =>
  z
    .preprocess(emptyAsUndefined, z.string().optional())
    .refine((value) => value === undefined || cron.validate(value), 'must be a valid cron expression');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  STORE_PATH: z.string().min(1).default('./data/jobs.db'),
  STORE_SYNCHRONIZE: flag(true),
  STORE_LOCK_TTL_SECONDS: count(3600),

  BROWSER_ENDPOINT: z.string().url().default('http://127.0.0.1:9222'),
  BROWSER_SETTLE_DELAY_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(0).max(60_000).default(1500),
  ),
  BROWSER_MIN_CONTENT_LENGTH: count(1000),
  BROWSER_CONNECT_TIMEOUT_MS: count(10_000),
  BROWSER_PAGE_URL_PATTERN: z.preprocess(emptyAsUndefined, z.string().optional()),

  EXTRACTION_RULE_SET: z.enum(['auto', 'upwork', 'python-org', 'generic', 'chat']).default('auto'),

  SNAPSHOT_RETENTION_DAYS: count(30),
  MAX_SNAPSHOT_COUNT: optionalCount(),
  RECORD_RETENTION_DAYS: optionalCount(),
  MAX_RECORD_COUNT: optionalCount(),
  SESSION_INCOMPLETE_THRESHOLD_DAYS: count(7),
  MAX_STORE_SIZE_MB: count(500),
  VACUUM_FRAGMENTATION_RATIO: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().min(0).max(1).default(0.2),
  ),

  INGEST_CRON_SCHEDULE: cronExpression(),
  MAINTENANCE_CRON_SCHEDULE: cronExpression(),

  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: count(3000),
  API_KEYS: z.string().default(''),

  ENABLE_METRICS: flag(true),
  OTEL_TRACES_ENABLED: flag(false),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().default('http://localhost:4318'),
  OTEL_SERVICE_NAME: z.string().min(1).default('job-scrape-ingest'),
});

export type RuleSetChoice = z.infer<typeof envSchema>['EXTRACTION_RULE_SET'];

export interface StoreSettings {
  path: string;
  synchronize: boolean;
  lockTtlMs: number;
}

export interface BrowserSettings {
  endpoint: string;
  settleDelayMs: number;
  minContentLength: number;
  connectTimeoutMs: number;
  pageUrlPattern?: string;
}

export interface RetentionSettings {
  snapshotRetentionDays: number;
  maxSnapshotCount?: number;
  recordRetentionDays?: number;
  maxRecordCount?: number;
  sessionIncompleteThresholdDays: number;
  maxStoreSizeMb: number;
  vacuumFragmentationRatio: number;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logLevel: string;
  store: StoreSettings;
  browser: BrowserSettings;
  extraction: { ruleSet: RuleSetChoice };
  retention: RetentionSettings;
  schedule: {
    ingest?: string;
    maintenance?: string;
  };
  server: {
    host: string;
    port: number;
    apiKeys: string[];
  };
  features: {
    metrics: boolean;
  };
  otel: {
    endpoint: string;
    serviceName: string;
    tracesEnabled: boolean;
  };
}

/**
 * Builds the application configuration from environment variables.
 * Throws once, at startup, listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    store: {
      path: e.STORE_PATH,
      synchronize: e.STORE_SYNCHRONIZE,
      lockTtlMs: e.STORE_LOCK_TTL_SECONDS * 1000,
    },
    browser: {
      endpoint: e.BROWSER_ENDPOINT,
      settleDelayMs: e.BROWSER_SETTLE_DELAY_MS,
      minContentLength: e.BROWSER_MIN_CONTENT_LENGTH,
      connectTimeoutMs: e.BROWSER_CONNECT_TIMEOUT_MS,
      pageUrlPattern: e.BROWSER_PAGE_URL_PATTERN,
    },
    extraction: {
      ruleSet: e.EXTRACTION_RULE_SET,
    },
    retention: {
      snapshotRetentionDays: e.SNAPSHOT_RETENTION_DAYS,
      maxSnapshotCount: e.MAX_SNAPSHOT_COUNT,
      recordRetentionDays: e.RECORD_RETENTION_DAYS,
      maxRecordCount: e.MAX_RECORD_COUNT,
      sessionIncompleteThresholdDays: e.SESSION_INCOMPLETE_THRESHOLD_DAYS,
      maxStoreSizeMb: e.MAX_STORE_SIZE_MB,
      vacuumFragmentationRatio: e.VACUUM_FRAGMENTATION_RATIO,
    },
    schedule: {
      ingest: e.INGEST_CRON_SCHEDULE,
      maintenance: e.MAINTENANCE_CRON_SCHEDULE,
    },
    server: {
      host: e.HOST,
      port: e.PORT,
      apiKeys: e.API_KEYS.split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0),
    },
    features: {
      metrics: e.ENABLE_METRICS,
    },
    otel: {
      endpoint: e.OTEL_EXPORTER_OTLP_ENDPOINT,
      serviceName: e.OTEL_SERVICE_NAME,
      tracesEnabled: e.OTEL_TRACES_ENABLED,
    },
  };
}

// Validate configuration on startup
export const config = loadConfig();

export { logger };

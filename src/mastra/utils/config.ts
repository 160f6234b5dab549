import { LogLevel } from '@mastra/core/logger';
import { z } from 'zod';
import { DEFAULT_EMBEDDING_MODEL } from './cache.js';
import { DEFAULT_SWEEP_INTERVAL_MS } from './cacheSweeper.js';
import { ConfigurationError } from './errors.js';

function cacheSettingsSchema(maxSize: number, ttlSeconds: number) {
  return z
    .object({
      maxSize: z.number().int().positive().default(maxSize),
      ttlSeconds: z.number().nonnegative().default(ttlSeconds),
    })
    .default({});
}

export const ingestConfigSchema = z.object({
  largeDocThreshold: z.number().int().nonnegative().default(50_000),
  maxWorkers: z.number().int().positive().default(4),
  maxChunkWorkers: z.number().int().positive().default(4),
  resultCache: cacheSettingsSchema(500, 3600),
  embeddingCache: cacheSettingsSchema(1000, 7200),
  cleanupIntervalMs: z.number().int().positive().default(DEFAULT_SWEEP_INTERVAL_MS),
  embeddingModel: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
});

export type IngestConfig = z.infer<typeof ingestConfigSchema>;
export type IngestConfigInput = z.input<typeof ingestConfigSchema>;

/**
 * Validate overrides and fill in defaults
 */
export function loadConfig(overrides: IngestConfigInput = {}): IngestConfig {
  const parsed = ingestConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const reasons = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ingest config (${reasons.join('; ')})`, parsed.error.issues);
  }
  return parsed.data;
}

function numberVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  return raw ? Number(raw) : undefined;
}

function stringVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Build the config from INGEST_* environment variables. Unset variables keep
 * their defaults; malformed numbers fail validation.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  return loadConfig({
    largeDocThreshold: numberVar(env, 'INGEST_LARGE_DOC_THRESHOLD'),
    maxWorkers: numberVar(env, 'INGEST_MAX_WORKERS'),
    maxChunkWorkers: numberVar(env, 'INGEST_MAX_CHUNK_WORKERS'),
    resultCache: {
      maxSize: numberVar(env, 'INGEST_RESULT_CACHE_SIZE'),
      ttlSeconds: numberVar(env, 'INGEST_RESULT_CACHE_TTL'),
    },
    embeddingCache: {
      maxSize: numberVar(env, 'INGEST_EMBEDDING_CACHE_SIZE'),
      ttlSeconds: numberVar(env, 'INGEST_EMBEDDING_CACHE_TTL'),
    },
    cleanupIntervalMs: numberVar(env, 'INGEST_CLEANUP_INTERVAL_MS'),
    embeddingModel: stringVar(env, 'INGEST_EMBEDDING_MODEL'),
    logLevel: logLevelVar(env),
  });
}

function logLevelVar(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = stringVar(env, 'INGEST_LOG_LEVEL')?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  const level = Object.values(LogLevel).find((candidate) => candidate === raw);
  if (!level) {
    throw new ConfigurationError(`INGEST_LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got ${raw}`);
  }
  return level;
}

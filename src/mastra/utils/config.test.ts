import { describe, it, expect } from 'vitest';
import { configFromEnv, ingestConfigSchema, loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  it('fills every default', () => {
    expect(loadConfig()).toEqual({
      largeDocThreshold: 50_000,
      maxWorkers: 4,
      maxChunkWorkers: 4,
      resultCache: { maxSize: 500, ttlSeconds: 3600 },
      embeddingCache: { maxSize: 1000, ttlSeconds: 7200 },
      cleanupIntervalMs: 300_000,
      embeddingModel: 'nomic-embed-text',
      logLevel: 'info',
    });
  });

  it('keeps nested defaults when only part of a cache is overridden', () => {
    const config = loadConfig({ resultCache: { maxSize: 10 } });
    expect(config.resultCache).toEqual({ maxSize: 10, ttlSeconds: 3600 });
  });

  it('rejects non-positive worker counts', () => {
    expect(() => loadConfig({ maxWorkers: 0 })).toThrow(ConfigurationError);
  });

  it('names the offending field', () => {
    expect(() => loadConfig({ embeddingCache: { maxSize: -1 } })).toThrow(/embeddingCache\.maxSize/);
  });

  it('rejects unknown log levels through the schema', () => {
    expect(ingestConfigSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false);
  });
});

describe('configFromEnv', () => {
  it('uses defaults when nothing is set', () => {
    expect(configFromEnv({})).toEqual(loadConfig());
  });

  it('reads INGEST_* variables', () => {
    const config = configFromEnv({
      INGEST_LARGE_DOC_THRESHOLD: '1000',
      INGEST_MAX_WORKERS: '2',
      INGEST_MAX_CHUNK_WORKERS: '8',
      INGEST_RESULT_CACHE_SIZE: '50',
      INGEST_RESULT_CACHE_TTL: '60',
      INGEST_EMBEDDING_CACHE_SIZE: '70',
      INGEST_EMBEDDING_CACHE_TTL: '120',
      INGEST_CLEANUP_INTERVAL_MS: '5000',
      INGEST_EMBEDDING_MODEL: 'test-model',
      INGEST_LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({
      largeDocThreshold: 1000,
      maxWorkers: 2,
      maxChunkWorkers: 8,
      resultCache: { maxSize: 50, ttlSeconds: 60 },
      embeddingCache: { maxSize: 70, ttlSeconds: 120 },
      cleanupIntervalMs: 5000,
      embeddingModel: 'test-model',
      logLevel: 'debug',
    });
  });

  it('treats blank variables as unset', () => {
    expect(configFromEnv({ INGEST_MAX_WORKERS: '  ', INGEST_EMBEDDING_MODEL: '' }).maxWorkers).toBe(4);
  });

  it('fails on malformed numbers', () => {
    expect(() => configFromEnv({ INGEST_MAX_WORKERS: 'many' })).toThrow(ConfigurationError);
  });

  it('fails on an unknown log level', () => {
    expect(() => configFromEnv({ INGEST_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });
});

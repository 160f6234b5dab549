import { DocumentClassifier } from './utils/classifier.js';
import { OptimizedChunker } from './utils/chunker.js';
import { QueryCache } from './utils/cache.js';
import { CacheSweeper } from './utils/cacheSweeper.js';
import { AsyncDocumentProcessor, describeChunk } from './utils/asyncProcessor.js';
import { loadConfig, type IngestConfig, type IngestConfigInput } from './utils/config.js';
import { createLogger, type IMastraLogger } from './utils/logger.js';
import type { ChunkUnit } from './utils/types.js';

// Tools
export { readDocsTool, readDocuments, type SourceDocument, type ReadDocumentsResult } from './tools/readFiles.js';
export { createChunkDocumentTool } from './tools/chunkDocumentTool.js';
export { createSearchDocumentsTool } from './tools/searchDocumentsTool.js';

// Core services
export { DocumentClassifier, type ClassificationScores } from './utils/classifier.js';
export { OptimizedChunker, createChunkConfig, DEFAULT_CHUNK_CONFIGS, type ChunkOptions } from './utils/chunker.js';
export { BoundedCache, CacheEntry, QueryCache, hashContent, type CacheStats, type CleanupStats } from './utils/cache.js';
export { CacheSweeper } from './utils/cacheSweeper.js';
export {
  AsyncDocumentProcessor,
  describeChunk,
  type ChunkWorker,
  type CompletionCallback,
  type ProcessingStats,
} from './utils/asyncProcessor.js';
export { ingestDocument, embedText, type IngestResult, type IngestDependencies } from './utils/processing.js';
export { Retriever, type SearchResponse } from './utils/retrieval.js';
export { loadConfig, configFromEnv, ingestConfigSchema, type IngestConfig } from './utils/config.js';
export { ConfigurationError, errorMessage } from './utils/errors.js';
export { createLogger } from './utils/logger.js';
export * from './utils/types.js';

export interface IngestServices<TResult = unknown> {
  config: IngestConfig;
  logger: IMastraLogger;
  classifier: DocumentClassifier;
  chunker: OptimizedChunker;
  queryCache: QueryCache<TResult[]>;
  sweeper: CacheSweeper;
  processor: AsyncDocumentProcessor<ChunkUnit>;
  /** Start the cache sweeper and the processor workers */
  start(): void;
  /** Stop the sweeper and shut the processor down */
  stop(timeoutMs?: number): Promise<void>;
}

/**
 * Wire every service from one validated config. Nothing runs until `start()`.
 */
export function createIngestServices<TResult = unknown>(overrides: IngestConfigInput = {}): IngestServices<TResult> {
  const config = loadConfig(overrides);
  const logger = createLogger('document-ingest', config.logLevel);

  const classifier = new DocumentClassifier();
  const chunker = new OptimizedChunker({ classifier, logger });
  const queryCache = new QueryCache<TResult[]>({
    results: config.resultCache,
    embeddings: config.embeddingCache,
    defaultModel: config.embeddingModel,
    logger,
  });
  const sweeper = new CacheSweeper(queryCache, { intervalMs: config.cleanupIntervalMs, logger });
  const processor = new AsyncDocumentProcessor<ChunkUnit>({
    chunkWorker: describeChunk,
    maxWorkers: config.maxWorkers,
    maxChunkWorkers: config.maxChunkWorkers,
    largeDocThreshold: config.largeDocThreshold,
    chunker,
    logger,
  });

  return {
    config,
    logger,
    classifier,
    chunker,
    queryCache,
    sweeper,
    processor,
    start() {
      sweeper.start();
      processor.start();
    },
    async stop(timeoutMs) {
      sweeper.stop();
      await processor.shutdown(timeoutMs);
    },
  };
}

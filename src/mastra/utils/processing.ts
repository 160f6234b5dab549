import type { AsyncDocumentProcessor } from './asyncProcessor.js';
import type { ChunkOptions, OptimizedChunker } from './chunker.js';
import { createLogger, type IMastraLogger } from './logger.js';
import {
  TERMINAL_STATUSES,
  type ChunkMetadata,
  type ChunkRecord,
  type ChunkUnit,
  type DocumentType,
  type EmbeddingProvider,
  type TaskMetadata,
  type VectorIndex,
} from './types.js';

/**
 * The embedding half of a QueryCache
 */
export interface EmbeddingCache {
  getEmbedding(text: string, model?: string): number[] | undefined;
  cacheEmbedding(text: string, embedding: number[], model?: string): void;
}

/**
 * Embed text, going through the cache when one is given
 */
export async function embedText(text: string, embedder: EmbeddingProvider, cache?: EmbeddingCache): Promise<number[]> {
  const cached = cache?.getEmbedding(text, embedder.model);
  if (cached) {
    return cached;
  }

  const embedding = await embedder.embed(text);
  cache?.cacheEmbedding(text, embedding, embedder.model);
  return embedding;
}

export interface IngestDocumentInput {
  documentId: string;
  content: string;
  filename?: string;
  metadata?: TaskMetadata;
  /** Explicit chunking config or type */
  chunkOptions?: ChunkOptions;
}

export interface IngestDependencies {
  chunker: OptimizedChunker;
  embedder: EmbeddingProvider;
  index: VectorIndex<unknown>;
  /** Large documents go through the processor when one is given */
  processor?: AsyncDocumentProcessor<ChunkUnit>;
  embeddingCache?: EmbeddingCache;
  /** How long to wait for an async task before chunking synchronously instead */
  asyncTimeoutMs?: number;
  logger?: IMastraLogger;
}

export type IngestMode = 'sync' | 'async' | 'sync-fallback';

export interface IngestResult {
  documentId: string;
  documentType: DocumentType;
  chunkCount: number;
  mode: IngestMode;
  chunkMetadata: ChunkMetadata;
}

interface ChunkedDocument {
  chunks: string[];
  chunkMetadata: ChunkMetadata;
  mode: IngestMode;
}

async function chunkDocument(
  input: IngestDocumentInput,
  deps: IngestDependencies,
  logger: IMastraLogger
): Promise<ChunkedDocument> {
  const { documentId, content, filename } = input;
  const { processor } = deps;

  if (processor?.shouldProcessAsync(content)) {
    const inFlight = processor.getTaskStatus(documentId);
    const running = inFlight !== undefined && !TERMINAL_STATUSES.has(inFlight.status);

    if (running && inFlight.content !== content) {
      logger.warn(`Task ${documentId} is still running on other content, chunking synchronously`, {
        operation: 'ingest_document',
        documentId,
        status: inFlight.status,
      });
      const { chunks, metadata } = deps.chunker.chunk(content, filename, input.chunkOptions);
      return { chunks, chunkMetadata: metadata, mode: 'sync-fallback' };
    }

    // Same content still in flight: wait on that task rather than queueing it twice
    if (!running) {
      processor.submitTask(
        documentId,
        content,
        { ...input.metadata, ...(filename !== undefined && { filename }) },
        undefined,
        input.chunkOptions
      );
    }
    const result = await processor.waitForTask(documentId, deps.asyncTimeoutMs);

    if (result) {
      return {
        chunks: result.chunks.map((unit) => unit.content),
        chunkMetadata: result.chunkMetadata,
        mode: 'async',
      };
    }

    logger.warn(`Async processing gave no result for ${documentId}, chunking synchronously`, {
      operation: 'ingest_document',
      documentId,
      status: processor.getTaskStatus(documentId)?.status,
    });
    const { chunks, metadata } = deps.chunker.chunk(content, filename, input.chunkOptions);
    return { chunks, chunkMetadata: metadata, mode: 'sync-fallback' };
  }

  const { chunks, metadata } = deps.chunker.chunk(content, filename, input.chunkOptions);
  return { chunks, chunkMetadata: metadata, mode: 'sync' };
}

/**
 * Chunk a document, embed every chunk and upsert the chunk records into the index.
 * Embedding and index failures propagate to the caller.
 */
export async function ingestDocument(input: IngestDocumentInput, deps: IngestDependencies): Promise<IngestResult> {
  const logger = deps.logger ?? createLogger('ingest');
  const { documentId } = input;

  const { chunks, chunkMetadata, mode } = await chunkDocument(input, deps, logger);

  const embeddings = await Promise.all(
    chunks.map((chunk) => embedText(chunk, deps.embedder, deps.embeddingCache))
  );

  const records: ChunkRecord[] = chunks.map((content, chunkIndex) => ({
    id: `${documentId}_chunk_${chunkIndex}`,
    documentId,
    chunkIndex,
    content,
    embedding: embeddings[chunkIndex],
    metadata: {
      ...input.metadata,
      ...(input.filename !== undefined && { filename: input.filename }),
      documentType: chunkMetadata.documentType,
      chunkCount: chunks.length,
    },
  }));

  if (records.length > 0) {
    await deps.index.upsert(records);
  }

  logger.info(`Ingested ${documentId} as ${records.length} chunks`, {
    operation: 'ingest_document',
    documentId,
    documentType: chunkMetadata.documentType,
    mode,
  });

  return {
    documentId,
    documentType: chunkMetadata.documentType,
    chunkCount: records.length,
    mode,
    chunkMetadata,
  };
}

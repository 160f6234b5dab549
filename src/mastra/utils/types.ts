import { z } from 'zod';

// Document style categories used to pick a chunking strategy
export const DocumentType = z.enum([
  'legal',
  'technical',
  'narrative',
  'structured',
  'mixed',
  'unknown',
]);

export type DocumentType = z.infer<typeof DocumentType>;

// Chunking configuration; overlap must stay below chunk size
export const chunkConfigSchema = z
  .object({
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    sentenceBoundary: z.boolean().default(true),
    paragraphBoundary: z.boolean().default(true),
    preserveStructure: z.boolean().default(false),
    minChunkSize: z.number().int().nonnegative().default(100),
    maxChunkSize: z.number().int().positive().optional(),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type ChunkConfig = z.infer<typeof chunkConfigSchema>;
export type ChunkConfigInput = z.input<typeof chunkConfigSchema>;

// Statistics returned alongside every chunked document
export const chunkMetadataSchema = z.object({
  documentType: DocumentType,
  chunkCount: z.number(),
  chunkSize: z.number(),
  chunkOverlap: z.number(),
  avgChunkLength: z.number(),
  minChunkLength: z.number(),
  maxChunkLength: z.number(),
});

export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;

export interface ChunkingResult {
  chunks: string[];
  metadata: ChunkMetadata;
}

// Lifecycle of an async processing task
export const ProcessingStatus = z.enum(['pending', 'processing', 'completed', 'failed', 'cancelled']);

export type ProcessingStatus = z.infer<typeof ProcessingStatus>;

export const TERMINAL_STATUSES: ReadonlySet<ProcessingStatus> = new Set<ProcessingStatus>([
  'completed',
  'failed',
  'cancelled',
]);

export type TaskMetadata = Record<string, unknown>;

// Aggregated outcome of a completed task, chunks ordered by original index
export interface ProcessingResult<R> {
  chunks: R[];
  chunkMetadata: ChunkMetadata;
  totalChunks: number;
  successfulChunks: number;
  failedChunks: number;
  failedChunkIndices: number[];
  processingTimeMs: number;
}

export interface ProcessingTask<R> {
  taskId: string;
  content: string;
  metadata: TaskMetadata;
  status: ProcessingStatus;
  /** 0-100 */
  progress: number;
  result?: ProcessingResult<R>;
  error?: string;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

// Default per-chunk work result
export interface ChunkUnit {
  chunkIndex: number;
  content: string;
  wordCount: number;
  charCount: number;
  processingTimeMs: number;
  metadata: TaskMetadata;
}

// Search filters shared by the query cache key and the vector index
export interface SearchFilters {
  categoryFilter?: string | null;
  tags?: string[];
}

export interface SearchParams extends SearchFilters {
  topK?: number;
}

/**
 * Embedding collaborator. Failures propagate; callers own any retry policy.
 */
export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface ChunkRecord {
  id: string;
  documentId: string;
  chunkIndex: number;
  content: string;
  embedding: number[];
  metadata: TaskMetadata;
}

/**
 * Vector store collaborator
 */
export interface VectorIndex<TResult> {
  upsert(records: ChunkRecord[]): Promise<void>;
  search(vector: number[], topK: number, filters: SearchFilters): Promise<TResult[]>;
}

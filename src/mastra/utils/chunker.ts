import { DocumentClassifier } from './classifier.js';
import { ConfigurationError } from './errors.js';
import { createLogger, type IMastraLogger } from './logger.js';
import {
  chunkConfigSchema,
  type ChunkConfig,
  type ChunkConfigInput,
  type ChunkingResult,
  type ChunkMetadata,
  DocumentType,
} from './types.js';

// Line prefixes that open a new structural unit
const STRUCTURE_START_PATTERNS: readonly RegExp[] = [
  /^\s*\d+\.\s+/,
  /^\s*[a-z]\)\s+/,
  /^\s*[-•*]\s+/,
  /^\s*#{1,6}\s+/,
];

// Capturing, so split() keeps the markers at odd indices
const LEGAL_SECTION_MARKER = /(\b(?:article|section|clause|chapter|paragraph)\s+\d+)/i;

const SENTENCE_SPLIT = /(?<=[.!?])\s+/;

const SENTENCE_TERMINATORS = ['. ', '! ', '? '] as const;

/**
 * Validate a chunk configuration, filling defaults
 */
export function createChunkConfig(input: ChunkConfigInput): ChunkConfig {
  const parsed = chunkConfigSchema.safeParse(input);
  if (!parsed.success) {
    const reasons = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid chunk config (${reasons.join('; ')})`, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Per-type defaults: smaller chunks for legal references and lists,
 * larger ones for technical context
 */
export const DEFAULT_CHUNK_CONFIGS: Readonly<Record<DocumentType, ChunkConfig>> = {
  legal: createChunkConfig({ chunkSize: 800, chunkOverlap: 150, preserveStructure: true }),
  technical: createChunkConfig({ chunkSize: 1200, chunkOverlap: 200, preserveStructure: true }),
  narrative: createChunkConfig({ chunkSize: 1000, chunkOverlap: 200, paragraphBoundary: false }),
  structured: createChunkConfig({
    chunkSize: 600,
    chunkOverlap: 100,
    sentenceBoundary: false,
    preserveStructure: true,
  }),
  mixed: createChunkConfig({ chunkSize: 900, chunkOverlap: 180, preserveStructure: true }),
  unknown: createChunkConfig({ chunkSize: 1000, chunkOverlap: 200 }),
};

/**
 * Find the exclusive end offset for a window that is cut short of the document end.
 * Preference: paragraph break, sentence terminator, word boundary, hard cut.
 */
function findWindowCut(window: string, config: ChunkConfig): number {
  const { chunkSize } = config;

  if (config.paragraphBoundary) {
    const paragraphBreak = window.lastIndexOf('\n\n');
    if (paragraphBreak >= Math.floor(chunkSize / 3)) {
      return paragraphBreak + 2;
    }
  }

  if (config.sentenceBoundary) {
    const terminator = Math.max(...SENTENCE_TERMINATORS.map((t) => window.lastIndexOf(t)));
    if (terminator > Math.floor(chunkSize / 2)) {
      return terminator + 1;
    }
  }

  const space = window.lastIndexOf(' ');
  if (space > Math.floor(chunkSize / 2)) {
    return space;
  }

  return chunkSize;
}

/**
 * Boundary-aware fixed window split. Consecutive windows share `chunkOverlap`
 * characters whenever the cut leaves room for it.
 */
export function splitWindowed(content: string, config: ChunkConfig): string[] {
  const { chunkSize, chunkOverlap } = config;

  if (content.length <= chunkSize) {
    return [content];
  }

  const chunks: string[] = [];
  let position = 0;

  while (position < content.length) {
    const windowEnd = position + chunkSize;

    if (windowEnd >= content.length) {
      chunks.push(content.slice(position));
      break;
    }

    const endPosition = position + findWindowCut(content.slice(position, windowEnd), config);
    chunks.push(content.slice(position, endPosition));

    // Move back by the overlap, but always make progress
    const nextPosition = endPosition - chunkOverlap;
    position = nextPosition > position ? nextPosition : endPosition;
  }

  return chunks;
}

/**
 * Line-based split that only breaks in front of list items and headings
 */
export function splitStructured(content: string, config: ChunkConfig): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const line of content.split('\n')) {
    const startsStructure = STRUCTURE_START_PATTERNS.some((pattern) => pattern.test(line));

    if (startsStructure && current.trim() && current.length + line.length > config.chunkSize) {
      chunks.push(current.trim());
      current = `${line}\n`;
    } else {
      current += `${line}\n`;
    }
  }

  if (current.trim()) {
    chunks.push(current.trim());
  }

  return chunks;
}

/**
 * Article/section aware split. Oversized runs are re-split at sentence ends,
 * keeping as many whole leading sentences as fit.
 */
export function splitLegal(content: string, config: ChunkConfig): string[] {
  const { chunkSize } = config;
  const chunks: string[] = [];
  let current = '';

  content.split(LEGAL_SECTION_MARKER).forEach((part, index) => {
    if (!part.trim()) {
      return;
    }

    const isMarker = index % 2 === 1;
    if (isMarker && current.length > Math.floor(chunkSize / 2)) {
      if (current.trim()) {
        chunks.push(current.trim());
      }
      current = part;
      return;
    }

    current += part;

    while (current.length > chunkSize) {
      const sentences = current.split(SENTENCE_SPLIT);
      if (sentences.length <= 1) {
        break;
      }

      let taken = 1;
      let size = sentences[0].length;
      while (taken < sentences.length && size + 1 + sentences[taken].length <= chunkSize) {
        size += 1 + sentences[taken].length;
        taken++;
      }
      if (taken === sentences.length) {
        break;
      }

      chunks.push(sentences.slice(0, taken).join(' ').trim());
      current = sentences.slice(taken).join(' ');
    }
  });

  if (current.trim()) {
    chunks.push(current.trim());
  }

  return chunks;
}

/**
 * Prefix each chunk with the tail of its predecessor (as split, before its own prefix)
 * unless it already starts with it
 */
export function applyOverlap(chunks: string[], overlap: number): string[] {
  if (chunks.length <= 1 || overlap <= 0) {
    return chunks;
  }

  const overlapped = [chunks[0]];
  for (let i = 1; i < chunks.length; i++) {
    const tail = chunks[i - 1].slice(-overlap);
    overlapped.push(chunks[i].startsWith(tail) ? chunks[i] : `${tail} ${chunks[i]}`);
  }
  return overlapped;
}

function describeChunks(chunks: string[], documentType: DocumentType, config: ChunkConfig): ChunkMetadata {
  const lengths = chunks.map((chunk) => chunk.length);
  return {
    documentType,
    chunkCount: chunks.length,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    avgChunkLength: lengths.length ? lengths.reduce((a, b) => a + b, 0) / lengths.length : 0,
    minChunkLength: lengths.length ? Math.min(...lengths) : 0,
    maxChunkLength: lengths.length ? Math.max(...lengths) : 0,
  };
}

export interface ChunkOptions {
  /** Explicit configuration; skips classification */
  config?: ChunkConfigInput;
  /** Explicit type; skips classification */
  documentType?: DocumentType;
}

export interface OptimizedChunkerOptions {
  classifier?: DocumentClassifier;
  configs?: Partial<Record<DocumentType, ChunkConfigInput>>;
  logger?: IMastraLogger;
}

/**
 * Document-type aware chunker
 */
export class OptimizedChunker {
  private readonly classifier: DocumentClassifier;
  private readonly configs: Record<DocumentType, ChunkConfig>;
  private readonly logger: IMastraLogger;

  constructor(options: OptimizedChunkerOptions = {}) {
    this.classifier = options.classifier ?? new DocumentClassifier();
    this.logger = options.logger ?? createLogger('optimized-chunker');
    this.configs = { ...DEFAULT_CHUNK_CONFIGS };

    for (const documentType of DocumentType.options) {
      const input = options.configs?.[documentType];
      if (input) {
        this.configs[documentType] = createChunkConfig(input);
      }
    }
  }

  /**
   * Split a document into retrieval chunks.
   *
   * Chunks whose trimmed length is under `minChunkSize` are dropped, except that input
   * which is itself shorter than `minChunkSize` comes back as a single chunk. Overlap is
   * prepended after `maxChunkSize` truncation, so an overlapped chunk may exceed it.
   */
  chunk(content: string, filename?: string, options: ChunkOptions = {}): ChunkingResult {
    const bypassClassifier = options.config !== undefined || options.documentType !== undefined;
    const documentType = bypassClassifier
      ? (options.documentType ?? 'unknown')
      : this.classifier.classify(content, filename);
    const config = options.config ? createChunkConfig(options.config) : this.getOptimalConfig(documentType);

    this.logger.debug(`Chunking document as ${documentType}`, {
      operation: 'chunk_document',
      documentType,
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      contentLength: content.length,
    });

    let chunks = this.split(content, documentType, config).filter((chunk) => {
      const length = chunk.trim().length;
      return length > 0 && length >= config.minChunkSize;
    });

    const trimmedLength = content.trim().length;
    if (chunks.length === 0 && trimmedLength > 0 && trimmedLength < config.minChunkSize) {
      chunks = [content];
    }

    const { maxChunkSize } = config;
    if (maxChunkSize !== undefined) {
      chunks = chunks.map((chunk) => (chunk.length > maxChunkSize ? chunk.slice(0, maxChunkSize) : chunk));
    }

    chunks = applyOverlap(chunks, config.chunkOverlap);
    const metadata = describeChunks(chunks, documentType, config);

    this.logger.info(`Document chunked into ${chunks.length} chunks`, {
      operation: 'chunk_document',
      documentType,
      chunkCount: chunks.length,
      avgChunkLength: metadata.avgChunkLength,
    });

    return { chunks, metadata };
  }

  getOptimalConfig(documentType: DocumentType): ChunkConfig {
    return this.configs[documentType] ?? this.configs.unknown;
  }

  updateConfig(documentType: DocumentType, input: ChunkConfigInput): void {
    this.configs[documentType] = createChunkConfig(input);
    this.logger.info(`Updated chunking config for ${documentType}`, {
      operation: 'update_chunk_config',
      documentType,
    });
  }

  private split(content: string, documentType: DocumentType, config: ChunkConfig): string[] {
    if (content.length <= config.chunkSize) {
      return [content];
    }
    if (config.preserveStructure && documentType === 'structured') {
      return splitStructured(content, config);
    }
    if (config.preserveStructure && documentType === 'legal') {
      return splitLegal(content, config);
    }
    return splitWindowed(content, config);
  }
}

import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import type { OptimizedChunker } from '../utils/chunker.js';
import { DocumentType, chunkMetadataSchema } from '../utils/types.js';

/**
 * Expose a chunker to agents. The document type is detected unless given.
 */
export function createChunkDocumentTool(chunker: OptimizedChunker) {
  return createTool({
    id: 'chunk_document',
    description: 'Split a document into retrieval-sized chunks, choosing the strategy from its detected type (legal, technical, narrative, structured, mixed).',
    inputSchema: z.object({
      content: z.string().describe('Full document text'),
      filename: z.string().optional().describe('Original filename, used as a type hint'),
      documentType: DocumentType.optional().describe('Skip detection and chunk as this type'),
    }),
    outputSchema: z.object({
      chunks: z.array(z.string()),
      metadata: chunkMetadataSchema,
    }),
    execute: async ({ context }) => {
      const { content, filename, documentType } = context;
      return chunker.chunk(content, filename, { documentType });
    },
  });
}

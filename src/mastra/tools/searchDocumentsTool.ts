import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import type { Retriever } from '../utils/retrieval.js';

export function createSearchDocumentsTool<TResult>(retriever: Retriever<TResult>) {
  return createTool({
    id: 'search_documents',
    description: 'Semantic search over ingested document chunks. Repeated queries are served from cache.',
    inputSchema: z.object({
      query: z.string().min(1).describe('Natural-language search query'),
      topK: z.number().int().positive().optional().describe('Number of results (default 5)'),
      categoryFilter: z.string().nullable().optional().describe('Restrict results to one category'),
      tags: z.array(z.string()).optional().describe('Restrict results to chunks carrying these tags'),
    }),
    outputSchema: z.object({
      results: z.array(z.unknown()),
      fromCache: z.boolean(),
    }),
    execute: async ({ context }) => {
      const { query, ...params } = context;
      return retriever.search(query, params);
    },
  });
}

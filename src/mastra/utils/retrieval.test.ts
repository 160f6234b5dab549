import { describe, it, expect, vi } from 'vitest';
import { LogLevel } from '@mastra/core/logger';
import { QueryCache } from './cache.js';
import { createLogger } from './logger.js';
import { Retriever } from './retrieval.js';
import type { EmbeddingProvider, SearchFilters, VectorIndex } from './types.js';

const logger = createLogger('retrieval-test', LogLevel.ERROR);

interface Hit {
  id: string;
  score: number;
}

function createFixture() {
  const embed = vi.fn(async (text: string) => [text.length]);
  const embedder: EmbeddingProvider = { model: 'test-embedder', embed };
  const search = vi.fn(async (_vector: number[], topK: number, _filters: SearchFilters): Promise<Hit[]> =>
    Array.from({ length: topK }, (_, i) => ({ id: `chunk-${i}`, score: 1 - i / 10 }))
  );
  const index: VectorIndex<Hit> = { upsert: async () => undefined, search };
  const cache = new QueryCache<Hit[]>({ logger });
  const retriever = new Retriever<Hit>({ embedder, index, cache, logger });
  return { embed, search, cache, retriever };
}

describe('Retriever', () => {
  it('searches the index with the query embedding', async () => {
    const { retriever, search } = createFixture();

    const response = await retriever.search('notice period', { topK: 2 });
    expect(response.fromCache).toBe(false);
    expect(response.results).toEqual([
      { id: 'chunk-0', score: 1 },
      { id: 'chunk-1', score: 0.9 },
    ]);
    expect(search).toHaveBeenCalledWith([13], 2, { categoryFilter: null, tags: [] });
  });

  it('uses topK 5 by default', async () => {
    const { retriever } = createFixture();
    const response = await retriever.search('rent');
    expect(response.results).toHaveLength(5);
  });

  it('serves repeated queries from the result cache', async () => {
    const { retriever, search, embed } = createFixture();

    await retriever.search('Notice Period', { topK: 2, tags: ['b', 'a'] });
    const second = await retriever.search('notice period ', { topK: 2, tags: ['a', 'b'] });

    expect(second.fromCache).toBe(true);
    expect(second.results).toHaveLength(2);
    expect(search).toHaveBeenCalledTimes(1);
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('reuses the cached query embedding when the filters change', async () => {
    const { retriever, search, embed } = createFixture();

    await retriever.search('deposit', { categoryFilter: 'lease' });
    await retriever.search('deposit', { categoryFilter: 'invoice' });

    expect(search).toHaveBeenCalledTimes(2);
    expect(search).toHaveBeenLastCalledWith([7], 5, { categoryFilter: 'invoice', tags: [] });
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('propagates index failures without caching them', async () => {
    const { retriever, search, cache } = createFixture();
    search.mockRejectedValueOnce(new Error('index offline'));

    await expect(retriever.search('deposit')).rejects.toThrow('index offline');
    expect(cache.getQueryResult('deposit')).toBeUndefined();

    const retry = await retriever.search('deposit');
    expect(retry.fromCache).toBe(false);
  });
});

import type { QueryCache } from './cache.js';
import { createLogger, type IMastraLogger } from './logger.js';
import { embedText } from './processing.js';
import type { EmbeddingProvider, SearchParams, VectorIndex } from './types.js';

const DEFAULT_TOP_K = 5;

export interface RetrieverOptions<TResult> {
  embedder: EmbeddingProvider;
  index: VectorIndex<TResult>;
  cache: QueryCache<TResult[]>;
  logger?: IMastraLogger;
}

export interface SearchResponse<TResult> {
  results: TResult[];
  fromCache: boolean;
}

/**
 * Vector search with cached results and cached query embeddings
 */
export class Retriever<TResult> {
  private readonly embedder: EmbeddingProvider;
  private readonly index: VectorIndex<TResult>;
  private readonly cache: QueryCache<TResult[]>;
  private readonly logger: IMastraLogger;

  constructor(options: RetrieverOptions<TResult>) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.cache = options.cache;
    this.logger = options.logger ?? createLogger('retriever');
  }

  async search(query: string, params: SearchParams = {}): Promise<SearchResponse<TResult>> {
    const cached = this.cache.getQueryResult(query, params);
    if (cached) {
      return { results: cached, fromCache: true };
    }

    const vector = await embedText(query, this.embedder, this.cache);
    const topK = params.topK ?? DEFAULT_TOP_K;
    const results = await this.index.search(vector, topK, {
      categoryFilter: params.categoryFilter ?? null,
      tags: params.tags ?? [],
    });

    this.cache.cacheQueryResult(query, results, params);
    this.logger.debug(`Search returned ${results.length} results`, {
      operation: 'search',
      topK,
      resultCount: results.length,
    });

    return { results, fromCache: false };
  }
}

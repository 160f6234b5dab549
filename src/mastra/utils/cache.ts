import { createHash } from 'node:crypto';
import { ConfigurationError } from './errors.js';
import { createLogger, type IMastraLogger } from './logger.js';
import type { SearchParams } from './types.js';

const DEFAULT_MAX_SIZE = 1000;
const DEFAULT_TOP_K = 5;
export const DEFAULT_EMBEDDING_MODEL = 'nomic-embed-text';

// Lone (unpaired) UTF-16 surrogates
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Generate a SHA-256 hash of content
 */
export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Approximate in-memory footprint: UTF-8 length of the JSON serialization
 */
export function approximateSize(value: unknown): number {
  const serialized = JSON.stringify(value);
  return serialized === undefined ? 0 : Buffer.byteLength(serialized, 'utf8');
}

/**
 * Strip lone surrogates so the text can be hashed as well-formed UTF-8
 */
export function normalizeKeyText(text: string): string {
  return text.replace(LONE_SURROGATE, '');
}

export class CacheEntry<K, V> {
  readonly key: K;
  readonly value: V;
  readonly createdAt: number;
  lastAccessed: number;
  accessCount = 0;
  readonly ttlSeconds?: number;
  readonly sizeBytes: number;

  constructor(key: K, value: V, sizeBytes: number, ttlSeconds?: number) {
    this.key = key;
    this.value = value;
    this.sizeBytes = sizeBytes;
    this.ttlSeconds = ttlSeconds;
    this.createdAt = Date.now();
    this.lastAccessed = this.createdAt;
  }

  isExpired(now: number = Date.now()): boolean {
    if (this.ttlSeconds === undefined) {
      return false;
    }
    return now > this.createdAt + this.ttlSeconds * 1000;
  }

  touch(): void {
    this.lastAccessed = Date.now();
    this.accessCount++;
  }
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
  expired: number;
  totalSizeBytes: number;
}

export interface BoundedCacheOptions<V> {
  maxSize?: number;
  defaultTtlSeconds?: number;
  /** Size estimator; a throwing estimator counts the entry as 0 bytes */
  sizeOf?: (value: V) => number;
}

/**
 * Fixed-capacity LRU cache with per-entry TTL.
 *
 * Recency follows Map insertion order: both `get` and `put` move an entry to the end,
 * eviction removes from the front. Every method is synchronous, so calls never
 * interleave; `get` mutates recency and counters.
 */
export class BoundedCache<K, V> {
  readonly maxSize: number;
  readonly defaultTtlSeconds?: number;
  private readonly sizeOf: (value: V) => number;
  private readonly entries = new Map<K, CacheEntry<K, V>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expired = 0;
  private totalSizeBytes = 0;

  constructor(options: BoundedCacheOptions<V> = {}) {
    const maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new ConfigurationError(`Cache maxSize must be a positive integer, got ${maxSize}`);
    }
    if (options.defaultTtlSeconds !== undefined && options.defaultTtlSeconds < 0) {
      throw new ConfigurationError(`Cache defaultTtlSeconds must not be negative, got ${options.defaultTtlSeconds}`);
    }
    this.maxSize = maxSize;
    this.defaultTtlSeconds = options.defaultTtlSeconds;
    this.sizeOf = options.sizeOf ?? approximateSize;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.isExpired()) {
      this.remove(key, entry);
      this.expired++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    entry.touch();
    this.hits++;
    return entry.value;
  }

  put(key: K, value: V, ttlSeconds?: number): void {
    const existing = this.entries.get(key);
    if (existing) {
      this.remove(key, existing);
    }

    let sizeBytes = 0;
    try {
      sizeBytes = this.sizeOf(value);
    } catch {
      sizeBytes = 0;
    }

    this.entries.set(key, new CacheEntry(key, value, sizeBytes, ttlSeconds ?? this.defaultTtlSeconds));
    this.totalSizeBytes += sizeBytes;

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.entries().next();
      if (oldest.done) {
        break;
      }
      const [oldestKey, oldestEntry] = oldest.value;
      this.remove(oldestKey, oldestEntry);
      this.evictions++;
    }
  }

  delete(key: K): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.remove(key, entry);
    return true;
  }

  /**
   * Remove all entries and reset statistics
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expired = 0;
    this.totalSizeBytes = 0;
  }

  /**
   * Remove every expired entry, returning how many were dropped
   */
  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (entry.isExpired(now)) {
        this.remove(key, entry);
        this.expired++;
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const requests = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: requests > 0 ? this.hits / requests : 0,
      evictions: this.evictions,
      expired: this.expired,
      totalSizeBytes: this.totalSizeBytes,
    };
  }

  private remove(key: K, entry: CacheEntry<K, V>): void {
    this.entries.delete(key);
    this.totalSizeBytes -= entry.sizeBytes;
  }
}

export interface QueryCacheOptions {
  results?: { maxSize?: number; ttlSeconds?: number };
  embeddings?: { maxSize?: number; ttlSeconds?: number };
  defaultModel?: string;
  logger?: IMastraLogger;
}

export interface CleanupStats {
  queryExpired: number;
  embeddingExpired: number;
  totalExpired: number;
}

function preview(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}...` : text;
}

/**
 * Cache for retrieval results and query embeddings.
 *
 * The two sub-caches are independent; checking both is two separate operations.
 */
export class QueryCache<TResult = unknown> {
  readonly results: BoundedCache<string, TResult>;
  readonly embeddings: BoundedCache<string, number[]>;
  private readonly defaultModel: string;
  private readonly logger: IMastraLogger;

  constructor(options: QueryCacheOptions = {}) {
    this.results = new BoundedCache<string, TResult>({
      maxSize: options.results?.maxSize ?? 500,
      defaultTtlSeconds: options.results?.ttlSeconds ?? 3600,
    });
    this.embeddings = new BoundedCache<string, number[]>({
      maxSize: options.embeddings?.maxSize ?? 1000,
      defaultTtlSeconds: options.embeddings?.ttlSeconds ?? 7200,
    });
    this.defaultModel = options.defaultModel ?? DEFAULT_EMBEDDING_MODEL;
    this.logger = options.logger ?? createLogger('query-cache');
  }

  /**
   * Key over normalized query text, topK, category and sorted tags
   */
  queryKey(query: string, params: SearchParams = {}): string {
    return hashContent(
      JSON.stringify({
        query: normalizeKeyText(query.toLowerCase().trim()),
        topK: params.topK ?? DEFAULT_TOP_K,
        categoryFilter: params.categoryFilter ?? null,
        tags: [...(params.tags ?? [])].sort(),
      })
    );
  }

  embeddingKey(text: string, model: string = this.defaultModel): string {
    return hashContent(JSON.stringify({ model, text: normalizeKeyText(text) }));
  }

  getQueryResult(query: string, params?: SearchParams): TResult | undefined {
    const result = this.results.get(this.queryKey(query, params));
    if (result !== undefined) {
      this.logger.debug(`Cache hit for query: ${preview(query)}`, { operation: 'query_cache_get' });
    }
    return result;
  }

  cacheQueryResult(query: string, result: TResult, params?: SearchParams, ttlSeconds?: number): void {
    this.results.put(this.queryKey(query, params), result, ttlSeconds);
    this.logger.debug(`Cached query result: ${preview(query)}`, { operation: 'query_cache_put' });
  }

  getEmbedding(text: string, model?: string): number[] | undefined {
    const embedding = this.embeddings.get(this.embeddingKey(text, model));
    if (embedding !== undefined) {
      this.logger.debug(`Embedding cache hit for text: ${preview(text)}`, { operation: 'embedding_cache_get' });
    }
    return embedding;
  }

  cacheEmbedding(text: string, embedding: number[], model?: string, ttlSeconds?: number): void {
    this.embeddings.put(this.embeddingKey(text, model), embedding, ttlSeconds);
    this.logger.debug(`Cached embedding for text: ${preview(text)}`, { operation: 'embedding_cache_put' });
  }

  cleanupExpired(): CleanupStats {
    const queryExpired = this.results.cleanupExpired();
    const embeddingExpired = this.embeddings.cleanupExpired();
    const totalExpired = queryExpired + embeddingExpired;

    if (totalExpired > 0) {
      this.logger.info(`Cleaned up ${totalExpired} expired cache entries`, {
        operation: 'cache_cleanup',
        queryExpired,
        embeddingExpired,
      });
    }

    return { queryExpired, embeddingExpired, totalExpired };
  }

  clearAll(): void {
    this.results.clear();
    this.embeddings.clear();
    this.logger.info('All caches cleared', { operation: 'cache_clear' });
  }

  stats(): { queryCache: CacheStats; embeddingCache: CacheStats } {
    return {
      queryCache: this.results.stats(),
      embeddingCache: this.embeddings.stats(),
    };
  }
}

/**
 * Recommendation Engine
 *
 * Owns the vector index and runs the query pipeline:
 *   query → embedding → k-NN over-fetch → optional LLM rerank → top-k items
 *
 * The index is loaded (or built from the catalog) once, on first use.
 * Initialization and rebuilds share one in-flight promise, so concurrent
 * first requests wait for the same build instead of starting their own.
 */

import { createLogger } from '../config/index.js';
import { itemToEmbeddingText, type CatalogItem, type CatalogSource } from '../catalog/catalog.js';
import type { EmbeddingService } from '../embeddings/service.js';
import { EmbeddingError, type EmbeddingServiceStatus, type EmbeddingVector } from '../embeddings/types.js';
import { EmbeddingUnavailableError, ValidationError, isRecommenderError } from '../errors.js';
import { VectorIndex, type IndexLocation } from '../vector/vector-index.js';
import type { LLMReranker } from './rerank.js';

const logger = createLogger('recommendation-engine');

export const DEFAULT_TOP_K = 10;
export const MAX_TOP_K = 50;
/** Candidates fetched per requested result when reranking */
export const DEFAULT_OVERFETCH_MULTIPLIER = 2;

export type RecommendationResult = CatalogItem[];

export interface RecommendationEngineOptions {
  embeddings: EmbeddingService;
  catalog: CatalogSource;
  location: IndexLocation;
  reranker?: LLMReranker | null;
  /** Defaults to true whenever a reranker is given */
  rerankingEnabled?: boolean;
  overfetchMultiplier?: number;
  defaultTopK?: number;
  /** Requests above this are clamped to it */
  maxTopK?: number;
  index?: VectorIndex;
}

export interface EngineStatus {
  initialized: boolean;
  index: { size: number; dimensions: number; model: string };
  embeddings: EmbeddingServiceStatus;
  reranking: { enabled: boolean; providers: string[] };
}

export class RecommendationEngine {
  private readonly embeddings: EmbeddingService;
  private readonly catalog: CatalogSource;
  private readonly location: IndexLocation;
  private readonly reranker: LLMReranker | null;
  private readonly rerankingEnabled: boolean;
  private readonly overfetchMultiplier: number;
  private readonly defaultTopK: number;
  private readonly maxTopK: number;
  private readonly index: VectorIndex;

  private ready = false;
  private inFlight: Promise<void> | null = null;

  constructor(options: RecommendationEngineOptions) {
    this.embeddings = options.embeddings;
    this.catalog = options.catalog;
    this.location = options.location;
    this.reranker = options.reranker ?? null;
    this.rerankingEnabled = (options.rerankingEnabled ?? true) && this.reranker !== null;
    this.overfetchMultiplier = Math.max(1, options.overfetchMultiplier ?? DEFAULT_OVERFETCH_MULTIPLIER);
    this.maxTopK = options.maxTopK ?? MAX_TOP_K;
    this.defaultTopK = Math.min(options.defaultTopK ?? DEFAULT_TOP_K, this.maxTopK);
    this.index = options.index ?? new VectorIndex();
  }

  /**
   * Load the persisted index, or build and save a fresh one. Safe to call
   * any number of times; only the first successful run does work.
   */
  async initialize(): Promise<void> {
    if (this.ready) {
      return;
    }
    await this.exclusive(async () => {
      if (!this.ready) {
        await this.loadOrBuild();
      }
    });
  }

  /**
   * Rebuild the index from the current catalog and save it. Work already in
   * flight finishes first; the rebuild always reads the catalog afresh.
   */
  async refresh(): Promise<void> {
    while (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    await this.exclusive(() => this.build('refresh requested'));
  }

  async recommend(query: string, topK: number = this.defaultTopK): Promise<RecommendationResult> {
    const k = this.validate(query, topK);

    await this.surfaceEmbeddingFailure(() => this.initialize());

    if (this.index.size === 0) {
      return [];
    }

    let vector = await this.embedQuery(query);

    if (vector.length !== this.index.dimensions) {
      // The provider was downgraded after the index was built
      await this.realign(vector.length);
      if (this.index.size === 0) {
        return [];
      }
      if (vector.length !== this.index.dimensions) {
        vector = await this.embedQuery(query);
      }
    }

    const candidateK = Math.min(Math.max(k, k * this.overfetchMultiplier), this.index.size);
    const candidates = this.index.search(vector, candidateK).map((candidate) => candidate.item);

    if (!this.rerankingEnabled || !this.reranker || candidates.length < 2) {
      return candidates.slice(0, k);
    }

    const outcome = await this.reranker.rankWithDiagnostics(query, candidates, k);
    if (outcome.degraded) {
      logger.warn({ reason: outcome.reason }, 'Returning vector order without reranking');
    }
    return outcome.items;
  }

  getStatus(): EngineStatus {
    return {
      initialized: this.ready,
      index: {
        size: this.index.size,
        dimensions: this.index.dimensions,
        model: this.index.model,
      },
      embeddings: this.embeddings.getStatus(),
      reranking: {
        enabled: this.rerankingEnabled,
        providers: this.reranker?.getProviders() ?? [],
      },
    };
  }

  private validate(query: string, topK: number): number {
    if (typeof query !== 'string' || !query.trim()) {
      throw new ValidationError('Query must be non-empty text', 'query');
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError('top_k must be a positive integer', 'top_k');
    }
    if (topK > this.maxTopK) {
      logger.info({ requested: topK, ceiling: this.maxTopK }, 'top_k clamped to ceiling');
      return this.maxTopK;
    }
    return topK;
  }

  private exclusive(task: () => Promise<void>): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = task().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async loadOrBuild(): Promise<void> {
    if (!VectorIndex.exists(this.location)) {
      await this.build('no persisted index');
      return;
    }

    try {
      await this.index.load(this.location, {
        dimensions: this.embeddings.getActiveDimensions(),
        model: this.embeddings.getActiveModel(),
      });
      this.ready = true;
    } catch (error) {
      logger.warn({
        code: isRecommenderError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : error,
      }, 'Persisted index unusable, rebuilding');
      await this.build('persisted index unusable');
    }
  }

  private async build(reason: string): Promise<void> {
    const startTime = Date.now();
    const items = await this.catalog.loadItems();

    if (!items.length) {
      this.index.build([], this.embeddings.getActiveModel());
      this.ready = true;
      logger.warn({ reason }, 'Catalog is empty, serving an empty index');
      return;
    }

    logger.info({ reason, items: items.length, provider: this.embeddings.getActiveProvider() }, 'Building vector index');

    const vectors = await this.embeddings.embed(items.map(itemToEmbeddingText));
    if (vectors.length !== items.length) {
      throw new EmbeddingUnavailableError(
        `Embedding provider returned ${vectors.length} vectors for ${items.length} items`
      );
    }

    // Read after embedding: a downgrade during this call changes the model
    this.index.build(
      items.map((item, i) => ({ item, vector: vectors[i] })),
      this.embeddings.getActiveModel()
    );
    this.ready = true;

    try {
      await this.index.save(this.location);
    } catch (error) {
      // The in-memory index is complete; the next process rebuilds
      logger.error({ error: error instanceof Error ? error.message : error }, 'Failed to persist vector index');
    }

    logger.info({
      items: items.length,
      dimensions: this.index.dimensions,
      duration: Date.now() - startTime,
    }, 'Vector index ready');
  }

  private async realign(queryDimensions: number): Promise<void> {
    logger.warn({
      indexDimensions: this.index.dimensions,
      queryDimensions,
      provider: this.embeddings.getActiveProvider(),
    }, 'Query and index dimensionality differ, rebuilding index');

    await this.surfaceEmbeddingFailure(() =>
      this.exclusive(async () => {
        if (this.index.dimensions !== queryDimensions) {
          await this.build('embedding provider changed');
        }
      })
    );
  }

  private async embedQuery(query: string): Promise<EmbeddingVector> {
    return this.surfaceEmbeddingFailure(() => this.embeddings.embedSingle(query));
  }

  private async surfaceEmbeddingFailure<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw new EmbeddingUnavailableError(`Embedding failed: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}

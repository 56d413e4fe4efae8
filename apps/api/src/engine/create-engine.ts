import type { Config } from '../config/index.js';
import { JsonFileCatalog } from '../catalog/catalog.js';
import { createEmbeddingService } from '../embeddings/service.js';
import { createReranker } from './rerank.js';
import { RecommendationEngine } from './recommendation-engine.js';

/**
 * Wire the engine from application config. Nothing is loaded or embedded
 * until the first `initialize()` or `recommend()` call.
 */
export function createRecommendationEngine(config: Config): RecommendationEngine {
  const embeddings = createEmbeddingService({
    timeoutMs: config.embeddings.timeoutMs,
    openai: config.embeddings.openai,
    gemini: config.embeddings.gemini,
    local: config.embeddings.local,
  });

  const reranker = createReranker({
    enabled: config.reranking.enabled,
    timeoutMs: config.embeddings.timeoutMs,
    gemini: config.reranking.gemini,
    openai: config.reranking.openai,
  });

  return new RecommendationEngine({
    embeddings,
    catalog: new JsonFileCatalog(config.storage.catalogPath),
    location: {
      indexPath: config.storage.indexPath,
      metadataPath: config.storage.metadataPath,
    },
    reranker,
    rerankingEnabled: config.reranking.enabled,
    overfetchMultiplier: config.reranking.overfetchMultiplier,
    defaultTopK: config.recommend.defaultTopK,
    maxTopK: config.recommend.maxTopK,
  });
}

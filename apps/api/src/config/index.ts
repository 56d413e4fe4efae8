import path from 'path';
import { loadServerEnv, resetServerEnv } from './env.js';
import { logger } from '../utils/logger.js';
import type { LocalModelDtype } from '../embeddings/types.js';

export interface Config {
  server: {
    port: number;
    host: string;
    frontendOrigin: string;
  };
  embeddings: {
    timeoutMs: number;
    openai?: {
      apiKey: string;
      model: string;
      dimensions: number;
    };
    gemini?: {
      apiKey: string;
      model: string;
      dimensions: number;
    };
    local: {
      model: string;
      dimensions: number;
      dtype: LocalModelDtype;
    };
  };
  reranking: {
    enabled: boolean;
    overfetchMultiplier: number;
    gemini?: { apiKey: string; model: string };
    openai?: { apiKey: string; model: string };
  };
  recommend: {
    defaultTopK: number;
    maxTopK: number;
  };
  storage: {
    catalogPath: string;
    indexPath: string;
    metadataPath: string;
  };
  nodeEnv: 'development' | 'production' | 'test';
}

// Lazy-loaded configuration - doesn't evaluate env at import time
let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = loadServerEnv();

  cachedConfig = {
    server: {
      port: env.PORT,
      host: env.HOST,
      frontendOrigin: env.FRONTEND_ORIGIN,
    },
    embeddings: {
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      openai: env.OPENAI_API_KEY ? {
        apiKey: env.OPENAI_API_KEY,
        model: env.OPENAI_EMBEDDING_MODEL,
        dimensions: env.OPENAI_EMBEDDING_DIMENSIONS,
      } : undefined,
      gemini: env.GEMINI_API_KEY ? {
        apiKey: env.GEMINI_API_KEY,
        model: env.GEMINI_EMBEDDING_MODEL,
        dimensions: env.GEMINI_EMBEDDING_DIMENSIONS,
      } : undefined,
      local: {
        model: env.LOCAL_EMBEDDING_MODEL,
        dimensions: env.LOCAL_EMBEDDING_DIMENSIONS,
        dtype: env.LOCAL_EMBEDDING_DTYPE,
      },
    },
    reranking: {
      enabled: env.ENABLE_RERANKING,
      overfetchMultiplier: env.RERANK_OVERFETCH,
      gemini: env.GEMINI_API_KEY ? { apiKey: env.GEMINI_API_KEY, model: env.RERANK_GEMINI_MODEL } : undefined,
      openai: env.OPENAI_API_KEY ? { apiKey: env.OPENAI_API_KEY, model: env.RERANK_OPENAI_MODEL } : undefined,
    },
    recommend: {
      defaultTopK: Math.min(env.DEFAULT_TOP_K, env.MAX_TOP_K),
      maxTopK: env.MAX_TOP_K,
    },
    storage: {
      catalogPath: path.resolve(env.CATALOG_PATH),
      indexPath: path.resolve(env.INDEX_PATH),
      metadataPath: path.resolve(env.METADATA_PATH),
    },
    nodeEnv: env.NODE_ENV,
  };

  // Log configuration on startup (never the keys themselves)
  logger.info({
    server: {
      port: cachedConfig.server.port,
      host: cachedConfig.server.host,
    },
    nodeEnv: cachedConfig.nodeEnv,
    hasOpenAIKey: !!cachedConfig.embeddings.openai,
    hasGeminiKey: !!cachedConfig.embeddings.gemini,
    rerankingEnabled: cachedConfig.reranking.enabled,
  }, 'Configuration loaded');

  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
  resetServerEnv();
}

export { logger, createLogger } from '../utils/logger.js';

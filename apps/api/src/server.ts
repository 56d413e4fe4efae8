import Fastify from 'fastify';
import cors from '@fastify/cors';
import { logger } from './config/index.js';
import type { CatalogItem } from './catalog/catalog.js';
import type { RecommendationEngine } from './engine/recommendation-engine.js';
import { EmbeddingUnavailableError, ValidationError } from './errors.js';
import {
  RecommendRequestSchema,
  type AssessmentRecommendation,
  type ErrorResponse,
  type RecommendResponse,
} from './schemas/api.js';

export interface ServerOptions {
  frontendOrigin?: string;
}

function toRecommendation(item: CatalogItem): AssessmentRecommendation {
  return {
    assessment_name: item.name,
    assessment_url: item.url,
    test_type: item.type,
    description: item.description,
  };
}

/**
 * HTTP adapter around the engine. Keeps no state of its own.
 */
export async function buildServer(
  engine: RecommendationEngine,
  options: ServerOptions = {}
) {
  const fastify = Fastify({ loggerInstance: logger });

  const allowedOrigins = (options.frontendOrigin ?? '*')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  await fastify.register(cors, {
    origin: allowedOrigins.includes('*') ? true : allowedOrigins,
  });

  fastify.get('/health', async () => ({ status: 'ok' }));

  fastify.get('/status', async () => engine.getStatus());

  fastify.post('/recommend', async (request, reply) => {
    const parsed = RecommendRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const body: ErrorResponse = {
        error: 'Invalid request',
        details: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      };
      return reply.code(400).send(body);
    }

    const { query, top_k } = parsed.data;

    try {
      const items = await engine.recommend(query, top_k);
      const body: RecommendResponse = {
        recommendations: items.map(toRecommendation),
        query,
        count: items.length,
      };
      return reply.send(body);
    } catch (error) {
      if (error instanceof ValidationError) {
        const body: ErrorResponse = { error: error.message, details: [{ path: error.field, message: error.message }] };
        return reply.code(400).send(body);
      }
      if (error instanceof EmbeddingUnavailableError) {
        logger.error({ error: error.message }, 'Embedding unavailable in /recommend');
        const body: ErrorResponse = { error: 'Embedding service unavailable' };
        return reply.code(503).send(body);
      }

      logger.error({ error: error instanceof Error ? error.message : error }, 'Error in /recommend');
      const body: ErrorResponse = { error: 'Internal server error' };
      return reply.code(500).send(body);
    }
  });

  return fastify;
}

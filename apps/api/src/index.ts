import 'dotenv/config';
import { loadConfig, logger } from './config/index.js';
import { createRecommendationEngine } from './engine/create-engine.js';
import { buildServer } from './server.js';

async function start() {
  const config = loadConfig();
  const engine = createRecommendationEngine(config);
  const fastify = await buildServer(engine, { frontendOrigin: config.server.frontendOrigin });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down server...');
    await fastify.close();
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await fastify.listen({ port: config.server.port, host: config.server.host });
  logger.info(`Server listening on http://${config.server.host}:${config.server.port}`);

  // Warm the index in the background; requests arriving first join the same build
  engine.initialize().catch((error: unknown) => {
    logger.error({ error: error instanceof Error ? error.message : error }, 'Index warm-up failed, retrying on first request');
  });
}

start().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : error }, 'Failed to start server');
  process.exit(1);
});

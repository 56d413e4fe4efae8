import 'dotenv/config';
import { loadConfig, logger } from '../src/config/index.js';
import { createRecommendationEngine } from '../src/engine/create-engine.js';

/**
 * Build Index Script
 *
 * Rebuilds the vector index from the catalog file and saves it next to the
 * catalog. Run after the catalog changes or after switching embedding
 * provider.
 *
 * Usage:
 *   CATALOG_PATH=data/catalog.json npm run build-index
 */

async function buildIndex() {
  const config = loadConfig();
  const engine = createRecommendationEngine(config);

  logger.info({ catalog: config.storage.catalogPath }, '🔄 Rebuilding vector index...');
  await engine.refresh();

  const status = engine.getStatus();
  if (status.index.size === 0) {
    logger.warn({ catalog: config.storage.catalogPath }, '⚠️ Catalog is empty or unreadable, nothing indexed');
    process.exitCode = 1;
    return;
  }

  logger.info({
    entries: status.index.size,
    dimensions: status.index.dimensions,
    model: status.index.model,
    indexPath: config.storage.indexPath,
    metadataPath: config.storage.metadataPath,
  }, '✅ Vector index built');
}

buildIndex().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : error }, '❌ Index build failed');
  process.exit(1);
});

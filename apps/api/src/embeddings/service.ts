import { logger } from '../config/index.js';
import { EmbeddingUnavailableError } from '../errors.js';
import { classifyProviderError, describeError, isRecoverable } from './failures.js';
import {
  Embedder,
  EmbeddingError,
  EmbeddingServiceConfig,
  EmbeddingServiceStatus,
  EmbeddingVector,
  ProviderFailureKind
} from './types.js';
import { OpenAIEmbedder } from './providers/openai.js';
import { GeminiEmbedder } from './providers/gemini.js';
import { LocalEmbedder } from './providers/local.js';

/**
 * Embeds text through one active provider with a one-way downgrade path.
 *
 * When the active remote provider fails with a quota or timeout error the
 * service switches to the fallback for the rest of the process and re-runs
 * the whole call there, so the vectors of one call always share a model.
 */
export class EmbeddingService {
  private active: Embedder;
  private downgradeReason: ProviderFailureKind | null = null;
  // Dimensionality each embedder actually returned, which wins over the declared one
  private readonly produced = new Map<Embedder, number>();

  constructor(
    primary: Embedder,
    private readonly fallback: Embedder | null = null
  ) {
    this.active = primary;
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (!texts.length) {
      return [];
    }

    const embedder = this.active;
    try {
      return this.record(embedder, await embedder.embed(texts));
    } catch (error) {
      const kind = error instanceof EmbeddingError ? error.kind : classifyProviderError(error);

      if (!this.fallback || embedder === this.fallback) {
        throw new EmbeddingUnavailableError(
          `All embedding providers exhausted (last: ${embedder.provider}, ${kind})`,
          { cause: error }
        );
      }

      if (!isRecoverable(kind)) {
        throw error instanceof EmbeddingError
          ? error
          : new EmbeddingError(describeError(error), embedder.provider, kind, error);
      }

      this.downgrade(embedder, kind);
      return this.embedWithFallback(this.fallback, texts);
    }
  }

  async embedSingle(text: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }

  getActiveProvider(): Embedder['provider'] {
    return this.active.provider;
  }

  getActiveModel(): string {
    return this.active.getModel();
  }

  getActiveDimensions(): number {
    return this.dimensionsOf(this.active);
  }

  isDowngraded(): boolean {
    return this.downgradeReason !== null;
  }

  getStatus(): EmbeddingServiceStatus {
    const describe = (embedder: Embedder) => ({
      provider: embedder.provider,
      model: embedder.getModel(),
      dimensions: this.dimensionsOf(embedder),
    });

    return {
      active: describe(this.active),
      fallback: this.fallback && this.fallback !== this.active ? describe(this.fallback) : undefined,
      downgraded: this.downgradeReason !== null,
      downgradeReason: this.downgradeReason ?? undefined,
    };
  }

  private dimensionsOf(embedder: Embedder): number {
    return this.produced.get(embedder) ?? embedder.getDimensions();
  }

  private record(embedder: Embedder, vectors: EmbeddingVector[]): EmbeddingVector[] {
    const dimensions = vectors[0]?.length;
    if (dimensions === undefined || this.produced.get(embedder) === dimensions) {
      return vectors;
    }

    if (dimensions !== embedder.getDimensions()) {
      logger.warn({
        provider: embedder.provider,
        model: embedder.getModel(),
        declared: embedder.getDimensions(),
        produced: dimensions,
      }, 'Embedding model returned a different dimensionality than configured');
    }
    this.produced.set(embedder, dimensions);
    return vectors;
  }

  private downgrade(from: Embedder, kind: ProviderFailureKind): void {
    // Concurrent calls may all observe the same failure; switch and log once
    if (this.active !== from || !this.fallback) {
      return;
    }

    this.active = this.fallback;
    this.downgradeReason = kind;

    logger.warn({
      from: { provider: from.provider, model: from.getModel(), dimensions: this.dimensionsOf(from) },
      to: { provider: this.fallback.provider, model: this.fallback.getModel(), dimensions: this.dimensionsOf(this.fallback) },
      reason: kind,
    }, 'Embedding provider downgraded for the rest of the session');
  }

  private async embedWithFallback(fallback: Embedder, texts: string[]): Promise<EmbeddingVector[]> {
    try {
      return this.record(fallback, await fallback.embed(texts));
    } catch (error) {
      logger.error({ error: describeError(error), provider: fallback.provider }, 'Fallback embedder failed');
      throw new EmbeddingUnavailableError(
        `All embedding providers exhausted (last: ${fallback.provider})`,
        { cause: error }
      );
    }
  }
}

/**
 * Pick the provider chain from the configured credentials: OpenAI, then
 * Gemini, then the local model. A remote primary always gets the local model
 * as its fallback; without credentials the local model runs alone.
 */
export function createEmbeddingService(config: EmbeddingServiceConfig): EmbeddingService {
  const timeoutMs = config.timeoutMs;
  const local = new LocalEmbedder(config.local);

  let primary: Embedder | null = null;
  if (config.openai) {
    primary = new OpenAIEmbedder({ timeoutMs, ...config.openai });
  } else if (config.gemini) {
    primary = new GeminiEmbedder({ timeoutMs, ...config.gemini });
  }

  if (!primary) {
    logger.info({ model: local.getModel() }, 'No embedding API keys configured, using local model');
    return new EmbeddingService(local);
  }

  logger.info({
    primary: primary.provider,
    model: primary.getModel(),
    fallback: local.provider,
  }, 'Embedding service configured');

  return new EmbeddingService(primary, local);
}

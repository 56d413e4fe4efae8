import { logger } from '../../config/index.js';
import { describeError } from '../failures.js';
import {
  Embedder,
  EmbeddingVector,
  LocalEmbedderConfig,
  LocalModelDtype,
  EmbeddingError
} from '../types.js';

/**
 * Sentence-transformer model run in-process through transformers.js.
 * Needs no credential; the model is downloaded and loaded on first use and
 * kept for the lifetime of the process.
 */
export class LocalEmbedder implements Embedder {
  readonly provider = 'local' as const;
  private model: string;
  private dimensions: number;
  private batchSize: number;
  private pooling: 'mean' | 'cls';
  private normalize: boolean;
  private dtype: LocalModelDtype;
  // transformers.js pipelines are callable class instances its typings do not model
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  private pipeline: any = null;
  private initializationPromise: Promise<void> | null = null;

  constructor(config: LocalEmbedderConfig = {}) {
    this.model = config.model ?? 'Xenova/all-MiniLM-L6-v2';
    this.dimensions = config.dimensions ?? 384; // all-MiniLM-L6-v2 default
    this.batchSize = config.batchSize ?? 32;
    this.pooling = config.pooling ?? 'mean';
    this.normalize = config.normalize ?? true;
    this.dtype = config.dtype ?? 'q8';
  }

  private async initialize(): Promise<void> {
    if (this.pipeline) {
      return;
    }

    if (!this.initializationPromise) {
      this.initializationPromise = this._initialize().catch((error: unknown) => {
        // Allow a later call to retry the download/load
        this.initializationPromise = null;
        throw error;
      });
    }
    return this.initializationPromise;
  }

  private async _initialize(): Promise<void> {
    try {
      logger.info({ model: this.model }, 'Initializing local embedder');

      const { pipeline } = await import('@huggingface/transformers');
      this.pipeline = await pipeline('feature-extraction', this.model, { dtype: this.dtype });

      logger.info({ model: this.model, dtype: this.dtype }, 'Local embedder initialized');
    } catch (error) {
      logger.error({ error: describeError(error), model: this.model }, 'Failed to initialize local embedder');
      throw new EmbeddingError(
        `Failed to initialize local embedder: ${describeError(error)}`,
        'local',
        'unknown',
        error
      );
    }
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (!texts.length) {
      return [];
    }

    await this.initialize();

    try {
      const allEmbeddings: EmbeddingVector[] = [];

      for (let i = 0; i < texts.length; i += this.batchSize) {
        const batch = texts.slice(i, i + this.batchSize);
        const output: unknown = await this.pipeline(batch, {
          pooling: this.pooling,
          normalize: this.normalize,
        });
        allEmbeddings.push(...tensorToArrays(output, batch.length));
      }

      logger.debug({
        model: this.model,
        textsCount: texts.length,
      }, 'Generated local embeddings');

      return allEmbeddings;
    } catch (error) {
      logger.error({ error: describeError(error), textsCount: texts.length }, 'Local embedding failed');
      throw new EmbeddingError(`Local embedding failed: ${describeError(error)}`, 'local', 'unknown', error);
    }
  }

  async embedSingle(text: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

/**
 * Convert the pooled tensor returned by a feature-extraction pipeline
 * (`dims = [batch, hidden]`) into one plain array per input.
 */
export function tensorToArrays(output: unknown, expectedRows: number): EmbeddingVector[] {
  if (typeof output !== 'object' || output === null || !('tolist' in output) || typeof output.tolist !== 'function') {
    throw new Error('Unexpected tensor output format');
  }

  const rows: unknown = output.tolist();
  if (!Array.isArray(rows) || rows.length !== expectedRows || !rows.every(isNumberArray)) {
    throw new Error(`Expected ${expectedRows} pooled embeddings from the local model`);
  }
  return rows;
}

import OpenAI from 'openai';
import { logger } from '../../config/index.js';
import { classifyProviderError, describeError } from '../failures.js';
import {
  Embedder,
  EmbeddingVector,
  OpenAIEmbedderConfig,
  EmbeddingError
} from '../types.js';

// The embeddings endpoint rejects empty strings
const EMPTY_INPUT_PLACEHOLDER = ' ';

export class OpenAIEmbedder implements Embedder {
  readonly provider = 'openai' as const;
  private client: OpenAI;
  private model: string;
  private dimensions: number;
  private batchSize: number;

  constructor(config: OpenAIEmbedderConfig) {
    this.model = config.model ?? 'text-embedding-3-small';
    this.dimensions = config.dimensions ?? 1536; // Default for text-embedding-3-small
    this.batchSize = config.batchSize ?? 100;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs ?? 15000,
      // Quota errors are handled by switching providers, not by SDK retries
      maxRetries: 0,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (!texts.length) {
      return [];
    }

    try {
      const batches = this.batchTexts(texts, this.batchSize);
      const allEmbeddings: EmbeddingVector[] = [];

      for (const batch of batches) {
        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch.map((text) => (text.length ? text : EMPTY_INPUT_PLACEHOLDER)),
          dimensions: this.dimensions,
        });

        // The API documents `index` on every item; order by it rather than trusting array order
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...ordered.map((item) => item.embedding));

        logger.debug({
          provider: 'openai',
          model: this.model,
          tokens: response.usage?.total_tokens,
          texts: batch.length
        }, 'Generated embeddings');
      }

      return allEmbeddings;
    } catch (error) {
      const kind = classifyProviderError(error);
      logger.error({ error: describeError(error), kind, textsCount: texts.length }, 'OpenAI embedding failed');
      throw new EmbeddingError(`OpenAI embedding failed: ${describeError(error)}`, 'openai', kind, error);
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

  private batchTexts(texts: string[], batchSize: number): string[][] {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      batches.push(texts.slice(i, i + batchSize));
    }
    return batches;
  }
}

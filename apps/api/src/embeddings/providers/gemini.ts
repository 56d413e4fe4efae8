import { GoogleGenerativeAI, TaskType, type GenerativeModel } from '@google/generative-ai';
import { logger } from '../../config/index.js';
import { classifyProviderError, describeError } from '../failures.js';
import {
  Embedder,
  EmbeddingVector,
  GeminiEmbedderConfig,
  EmbeddingError
} from '../types.js';

const EMPTY_INPUT_PLACEHOLDER = ' ';

export class GeminiEmbedder implements Embedder {
  readonly provider = 'gemini' as const;
  private model: GenerativeModel;
  private modelName: string;
  private dimensions: number;
  private batchSize: number;

  constructor(config: GeminiEmbedderConfig) {
    this.modelName = config.model ?? 'text-embedding-004';
    this.dimensions = config.dimensions ?? 768; // text-embedding-004 output size
    this.batchSize = config.batchSize ?? 100; // batchEmbedContents request limit

    const client = new GoogleGenerativeAI(config.apiKey);
    this.model = client.getGenerativeModel(
      { model: this.modelName },
      { timeout: config.timeoutMs ?? 15000 }
    );
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (!texts.length) {
      return [];
    }

    try {
      const allEmbeddings: EmbeddingVector[] = [];

      for (let i = 0; i < texts.length; i += this.batchSize) {
        const batch = texts.slice(i, i + this.batchSize);
        const response = await this.model.batchEmbedContents({
          requests: batch.map((text) => ({
            content: { role: 'user', parts: [{ text: text.length ? text : EMPTY_INPUT_PLACEHOLDER }] },
            taskType: TaskType.RETRIEVAL_DOCUMENT,
          })),
        });

        if (response.embeddings.length !== batch.length) {
          throw new Error(`Expected ${batch.length} embeddings, received ${response.embeddings.length}`);
        }
        allEmbeddings.push(...response.embeddings.map((embedding) => embedding.values));

        logger.debug({ provider: 'gemini', model: this.modelName, texts: batch.length }, 'Generated embeddings');
      }

      return allEmbeddings;
    } catch (error) {
      const kind = classifyProviderError(error);
      logger.error({ error: describeError(error), kind, textsCount: texts.length }, 'Gemini embedding failed');
      throw new EmbeddingError(`Gemini embedding failed: ${describeError(error)}`, 'gemini', kind, error);
    }
  }

  async embedSingle(text: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }

  getModel(): string {
    return this.modelName;
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * Core embedding system interfaces and types
 */

export type EmbeddingVector = number[];

export type EmbedderProvider = 'openai' | 'gemini' | 'local';

export interface Embedder {
  readonly provider: EmbedderProvider;

  /**
   * Generate embeddings for multiple texts, one vector per input in order
   */
  embed(texts: string[]): Promise<EmbeddingVector[]>;

  /**
   * Generate embedding for a single text
   */
  embedSingle(text: string): Promise<EmbeddingVector>;

  getModel(): string;

  getDimensions(): number;
}

export interface EmbedderConfig {
  model: string;
  dimensions: number;
  batchSize?: number;
}

export interface OpenAIEmbedderConfig extends Partial<EmbedderConfig> {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface GeminiEmbedderConfig extends Partial<EmbedderConfig> {
  apiKey: string;
  timeoutMs?: number;
}

/** Weight precision transformers.js loads the ONNX model in */
export type LocalModelDtype = 'fp32' | 'fp16' | 'q8' | 'q4';

export interface LocalEmbedderConfig extends Partial<EmbedderConfig> {
  dtype?: LocalModelDtype;
  pooling?: 'mean' | 'cls';
  normalize?: boolean;
}

export interface EmbeddingServiceConfig {
  timeoutMs?: number;
  openai?: OpenAIEmbedderConfig;
  gemini?: GeminiEmbedderConfig;
  local?: LocalEmbedderConfig;
}

/**
 * How a provider call failed. `quota` and `timeout` are recoverable by
 * switching providers; the rest fail the call.
 */
export type ProviderFailureKind = 'quota' | 'timeout' | 'auth' | 'invalid-input' | 'unknown';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public provider: EmbedderProvider,
    public kind: ProviderFailureKind = 'unknown',
    public cause?: unknown
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export interface EmbeddingServiceStatus {
  active: { provider: EmbedderProvider; model: string; dimensions: number };
  fallback?: { provider: EmbedderProvider; model: string; dimensions: number };
  downgraded: boolean;
  downgradeReason?: ProviderFailureKind;
}

import { EmbeddingError, type Embedder, type EmbedderProvider, type ProviderFailureKind } from '../embeddings/types.js';
import type { ChatModel, ChatProvider, ChatRequest } from '../engine/chat-models.js';
import type { CatalogItem } from '../catalog/catalog.js';

/**
 * Deterministic bag-of-words embedder: each lowercase word adds 1 to the
 * slot its hash lands in.
 */
export class HashingEmbedder implements Embedder {
  calls: string[][] = [];
  private failure: ProviderFailureKind | null = null;
  private declaredDimensions: number | null = null;

  constructor(
    readonly provider: EmbedderProvider,
    private readonly dimensions: number,
    private readonly model = `${provider}-fake-${dimensions}`
  ) {}

  failWith(kind: ProviderFailureKind | null): this {
    this.failure = kind;
    return this;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    if (this.failure) {
      throw new EmbeddingError(`${this.provider} failed`, this.provider, this.failure);
    }
    return texts.map((text) => hashVector(text, this.dimensions));
  }

  async embedSingle(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    return vector;
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return this.declaredDimensions ?? this.dimensions;
  }

  /** Report a dimensionality other than the one actually produced */
  declareDimensions(dimensions: number): this {
    this.declaredDimensions = dimensions;
    return this;
  }
}

export function hashVector(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let hash = 0;
    for (const char of word) {
      hash = (hash * 31 + char.charCodeAt(0)) % 100003;
    }
    vector[hash % dimensions] += 1;
  }
  return vector;
}

export class ScriptedChatModel implements ChatModel {
  readonly model: string;
  prompts: ChatRequest[] = [];

  constructor(
    readonly provider: ChatProvider,
    private readonly reply: string | Error
  ) {
    this.model = `${provider}-scripted`;
  }

  async complete(request: ChatRequest): Promise<string> {
    this.prompts.push(request);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

export function makeItem(id: string, name: string, type = 'Knowledge & Skills', description = ''): CatalogItem {
  return { id, name, description, type, url: `https://catalog.example.com/${id}` };
}

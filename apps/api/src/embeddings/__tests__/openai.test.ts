import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create, clientOptions } = vi.hoisted(() => {
  const clientOptions: unknown[] = [];
  return { create: vi.fn(), clientOptions };
});

vi.mock('openai', () => ({
  default: class {
    embeddings = { create };

    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

import { OpenAIEmbedder } from '../providers/openai.js';
import { EmbeddingError } from '../types.js';

interface EmbeddingsRequest {
  model: string;
  input: string[];
  dimensions: number;
}

class StatusError extends Error {
  constructor(message: string, public status: number) {
    super(message);
  }
}

// Echo each input back as [text length, position in batch], listed in reverse
function respondInReverse(request: EmbeddingsRequest) {
  return {
    data: request.input.map((text, index) => ({ index, embedding: [text.length, index] })).reverse(),
    usage: { total_tokens: request.input.length },
  };
}

describe('OpenAIEmbedder', () => {
  beforeEach(() => {
    create.mockReset();
    clientOptions.length = 0;
  });

  it('should create the client without SDK retries and with the timeout', () => {
    new OpenAIEmbedder({ apiKey: 'test-key', timeoutMs: 5000 });

    expect(clientOptions).toEqual([
      { apiKey: 'test-key', baseURL: undefined, timeout: 5000, maxRetries: 0 },
    ]);
  });

  it('should embed in batches of 100, in input order, with a placeholder for empty text', async () => {
    create.mockImplementation(async (request: EmbeddingsRequest) => respondInReverse(request));
    const texts = Array.from({ length: 101 }, (_, i) => (i === 50 ? '' : `text ${i}`));

    const vectors = await new OpenAIEmbedder({ apiKey: 'test-key' }).embed(texts);

    expect(create).toHaveBeenCalledTimes(2);
    const [firstBatch] = create.mock.calls[0];
    const [secondBatch] = create.mock.calls[1];
    expect(firstBatch).toMatchObject({ model: 'text-embedding-3-small', dimensions: 1536 });
    expect(firstBatch.input).toHaveLength(100);
    expect(firstBatch.input[50]).toBe(' ');
    expect(secondBatch.input).toEqual(['text 100']);

    expect(vectors).toHaveLength(101);
    expect(vectors.map((vector) => vector[1])).toEqual([...Array.from({ length: 100 }, (_, i) => i), 0]);
    expect(vectors[0]).toEqual(['text 0'.length, 0]);
    expect(vectors[50]).toEqual([1, 50]);
    expect(vectors[100]).toEqual(['text 100'.length, 0]);
  });

  it('should not call the API for no input', async () => {
    expect(await new OpenAIEmbedder({ apiKey: 'test-key' }).embed([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it('should report an HTTP 429 as a quota failure', async () => {
    create.mockRejectedValueOnce(new StatusError('Rate limit reached', 429));

    const attempt = new OpenAIEmbedder({ apiKey: 'test-key' }).embed(['alpha']);

    await expect(attempt).rejects.toBeInstanceOf(EmbeddingError);
    await expect(attempt).rejects.toMatchObject({ provider: 'openai', kind: 'quota' });
  });

  it('should report a 401 as an auth failure', async () => {
    create.mockRejectedValueOnce(new StatusError('Incorrect API key provided', 401));

    await expect(new OpenAIEmbedder({ apiKey: 'test-key' }).embed(['alpha']))
      .rejects.toMatchObject({ provider: 'openai', kind: 'auth' });
  });
});

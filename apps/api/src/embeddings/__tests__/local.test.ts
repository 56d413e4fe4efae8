import { describe, it, expect, vi, beforeEach } from 'vitest';

const { pipeline, extractor } = vi.hoisted(() => ({ pipeline: vi.fn(), extractor: vi.fn() }));

vi.mock('@huggingface/transformers', () => ({ pipeline }));

import { LocalEmbedder, tensorToArrays } from '../providers/local.js';
import { EmbeddingError } from '../types.js';

describe('LocalEmbedder', () => {
  it('should report the MiniLM defaults without loading the model', () => {
    const embedder = new LocalEmbedder();

    expect(embedder.provider).toBe('local');
    expect(embedder.getModel()).toBe('Xenova/all-MiniLM-L6-v2');
    expect(embedder.getDimensions()).toBe(384);
  });

  it('should return no vectors for no input', async () => {
    expect(await new LocalEmbedder().embed([])).toEqual([]);
    expect(pipeline).not.toHaveBeenCalled();
  });
});

describe('LocalEmbedder model loading', () => {
  beforeEach(() => {
    pipeline.mockReset();
    extractor.mockReset();
    extractor.mockImplementation(async (batch: string[]) => ({
      tolist: () => batch.map((text) => [text.length, 1]),
    }));
  });

  it('should load the feature-extraction pipeline once with the q8 dtype by default', async () => {
    pipeline.mockResolvedValue(extractor);
    const embedder = new LocalEmbedder({ dimensions: 2 });

    expect(await embedder.embed(['ab', 'abc'])).toEqual([[2, 1], [3, 1]]);
    await embedder.embedSingle('abcd');

    expect(pipeline).toHaveBeenCalledTimes(1);
    expect(pipeline).toHaveBeenCalledWith('feature-extraction', 'Xenova/all-MiniLM-L6-v2', { dtype: 'q8' });
    expect(extractor).toHaveBeenCalledWith(['ab', 'abc'], { pooling: 'mean', normalize: true });
  });

  it('should pass the configured dtype and split inputs into batches', async () => {
    pipeline.mockResolvedValue(extractor);
    const embedder = new LocalEmbedder({ dtype: 'fp32', batchSize: 2 });

    expect(await embedder.embed(['a', 'bb', 'ccc'])).toEqual([[1, 1], [2, 1], [3, 1]]);

    expect(pipeline).toHaveBeenCalledWith('feature-extraction', 'Xenova/all-MiniLM-L6-v2', { dtype: 'fp32' });
    expect(extractor).toHaveBeenCalledTimes(2);
  });

  it('should retry loading after a failed download', async () => {
    pipeline.mockRejectedValueOnce(new Error('fetch failed')).mockResolvedValue(extractor);
    const embedder = new LocalEmbedder();

    await expect(embedder.embed(['a'])).rejects.toThrow(EmbeddingError);
    expect(await embedder.embed(['a'])).toEqual([[1, 1]]);
    expect(pipeline).toHaveBeenCalledTimes(2);
  });
});

describe('tensorToArrays', () => {
  it('should convert a pooled tensor into rows', () => {
    const tensor = { dims: [2, 3], tolist: () => [[0.1, 0.2, 0.3], [0.4, 0.5, 0.6]] };

    expect(tensorToArrays(tensor, 2)).toEqual([[0.1, 0.2, 0.3], [0.4, 0.5, 0.6]]);
  });

  it('should reject a row count that does not match the batch', () => {
    const tensor = { tolist: () => [[0.1, 0.2]] };

    expect(() => tensorToArrays(tensor, 2)).toThrow('Expected 2 pooled embeddings from the local model');
  });

  it('should reject values that are not tensors', () => {
    expect(() => tensorToArrays([1, 2, 3], 1)).toThrow('Unexpected tensor output format');
  });
});

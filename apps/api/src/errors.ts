/**
 * Error taxonomy shared by the recommendation pipeline.
 *
 * Only ValidationError and EmbeddingUnavailableError are meant to reach a
 * caller of `recommend`; the index errors are caught by the engine and turned
 * into a rebuild.
 */

export type RecommenderErrorCode =
  | 'VALIDATION_ERROR'
  | 'DIMENSION_MISMATCH'
  | 'INDEX_CORRUPT'
  | 'INDEX_STALE'
  | 'EMBEDDING_UNAVAILABLE';

export abstract class RecommenderError extends Error {
  abstract readonly code: RecommenderErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends RecommenderError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, public readonly field: string) {
    super(message);
  }
}

export class DimensionMismatchError extends RecommenderError {
  readonly code = 'DIMENSION_MISMATCH';

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string
  ) {
    super(`Dimension mismatch (${context}): expected ${expected}, got ${actual}`);
  }
}

export class IndexCorruptError extends RecommenderError {
  readonly code = 'INDEX_CORRUPT';
}

export class IndexStaleError extends RecommenderError {
  readonly code = 'INDEX_STALE';

  constructor(
    public readonly expectedModel: string,
    public readonly actualModel: string
  ) {
    super(`Index was built with model "${actualModel}" but the active model is "${expectedModel}"`);
  }
}

export class EmbeddingUnavailableError extends RecommenderError {
  readonly code = 'EMBEDDING_UNAVAILABLE';
}

export function isRecommenderError(error: unknown): error is RecommenderError {
  return error instanceof RecommenderError;
}

import type { ProviderFailureKind } from './types.js';

const QUOTA_MARKERS = [
  'quota',
  '429',
  'insufficient_quota',
  'rate_limit',
  'rate limit',
  'too_many_requests',
  'too many requests',
  'resource_exhausted',
];

const TIMEOUT_MARKERS = ['timed out', 'timeout', 'etimedout', 'aborted'];

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Classify an SDK or network error thrown by a remote provider.
 *
 * Works on HTTP status when the SDK exposes one and falls back to the error
 * text, since the providers do not share an error hierarchy.
 */
export function classifyProviderError(error: unknown): ProviderFailureKind {
  if (typeof error !== 'object' || error === null) {
    return 'unknown';
  }

  const status = readStatus(error);
  if (status === 429) return 'quota';
  if (status === 401 || status === 403) return 'auth';
  if (status === 408 || status === 504) return 'timeout';
  if (status === 400 || status === 413 || status === 422) return 'invalid-input';

  const name = error instanceof Error ? error.name.toLowerCase() : '';
  const message = error instanceof Error ? error.message.toLowerCase() : '';

  if (name.includes('timeout') || name === 'aborterror' || TIMEOUT_MARKERS.some((m) => message.includes(m))) {
    return 'timeout';
  }
  if (QUOTA_MARKERS.some((m) => message.includes(m))) {
    return 'quota';
  }
  if (message.includes('api key') || message.includes('unauthorized') || message.includes('permission')) {
    return 'auth';
  }

  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    return classifyProviderError(error.cause);
  }

  return 'unknown';
}

export function isRecoverable(kind: ProviderFailureKind): boolean {
  return kind === 'quota' || kind === 'timeout';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

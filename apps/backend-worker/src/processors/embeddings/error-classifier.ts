import {
  EmbeddingDimensionError,
  EmbeddingInputError,
  EmbeddingUpstreamError,
} from '@shopsense/ai-engine';

export type EmbeddingErrorClass = 'transient' | 'permanent';

export type EmbeddingErrorType =
  | 'INVALID_CONTENT'
  | 'DIMENSION_MISMATCH'
  | 'UPSTREAM'
  | 'TIMEOUT'
  | 'UNKNOWN';

export type EmbeddingErrorDecision = Readonly<{
  classification: EmbeddingErrorClass;
  errorType: EmbeddingErrorType;
  shouldRetry: boolean;
}>;

/** Upstream 4xx answers other than these will not change on retry. */
const RETRYABLE_CLIENT_STATUSES = new Set([408, 409, 425, 429]);

export function classifyEmbeddingError(error: unknown): EmbeddingErrorDecision {
  if (error instanceof EmbeddingInputError) {
    return { classification: 'permanent', errorType: 'INVALID_CONTENT', shouldRetry: false };
  }

  if (error instanceof EmbeddingDimensionError) {
    return { classification: 'permanent', errorType: 'DIMENSION_MISMATCH', shouldRetry: false };
  }

  if (error instanceof EmbeddingUpstreamError) {
    const status = error.status;
    const clientError = status !== undefined && status >= 400 && status < 500;
    if (clientError && !RETRYABLE_CLIENT_STATUSES.has(status)) {
      return { classification: 'permanent', errorType: 'UPSTREAM', shouldRetry: false };
    }
    return { classification: 'transient', errorType: 'UPSTREAM', shouldRetry: true };
  }

  if (error instanceof Error && /timeout|timed out/i.test(error.message)) {
    return { classification: 'transient', errorType: 'TIMEOUT', shouldRetry: true };
  }

  return { classification: 'transient', errorType: 'UNKNOWN', shouldRetry: true };
}

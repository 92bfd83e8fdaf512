import { EmbeddingInputError, EmbeddingsDisabledError, EmbeddingUpstreamError } from '@shopsense/ai-engine';
import { SearchInputError } from '@shopsense/pim';
import { ZodError } from 'zod';

function nowIso(): string {
  return new Date().toISOString();
}

export function successEnvelope<T>(requestId: string, data: T) {
  return {
    success: true,
    data,
    meta: {
      request_id: requestId,
      timestamp: nowIso(),
    },
  } as const;
}

export function errorEnvelope(requestId: string, code: string, message: string) {
  return {
    success: false,
    error: {
      code,
      message,
    },
    meta: {
      request_id: requestId,
      timestamp: nowIso(),
    },
  } as const;
}

export type HttpError = Readonly<{
  statusCode: number;
  code: string;
  message: string;
}>;

function statusCodeOf(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) return null;
  return typeof error.statusCode === 'number' ? error.statusCode : null;
}

function codeForStatus(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'BAD_REQUEST';
    case 404:
      return 'NOT_FOUND';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 415:
      return 'UNSUPPORTED_MEDIA_TYPE';
    case 429:
      return 'TOO_MANY_REQUESTS';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Maps a thrown value to the HTTP status and error code the API answers with. */
export function toHttpError(error: unknown, exposeInternalMessages: boolean): HttpError {
  if (error instanceof ZodError) {
    return { statusCode: 400, code: 'VALIDATION_ERROR', message: describeZodError(error) };
  }
  if (error instanceof SearchInputError) {
    return { statusCode: 400, code: error.code, message: error.message };
  }
  if (error instanceof EmbeddingInputError) {
    return { statusCode: 400, code: 'INVALID_INPUT', message: error.message };
  }
  if (error instanceof EmbeddingsDisabledError) {
    return { statusCode: 409, code: 'EMBEDDINGS_DISABLED', message: error.message };
  }
  if (error instanceof EmbeddingUpstreamError) {
    return { statusCode: 502, code: 'EMBEDDING_UPSTREAM_ERROR', message: error.message };
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  const statusCode = statusCodeOf(error) ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    return { statusCode, code: codeForStatus(statusCode), message };
  }

  return {
    statusCode: 500,
    code: 'INTERNAL_SERVER_ERROR',
    message: exposeInternalMessages ? message : 'Internal Server Error',
  };
}

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { EmbeddingInputError } from '@shopsense/ai-engine';
import { SearchInputError } from '@shopsense/pim';
import { z } from 'zod';

import { errorEnvelope, toHttpError } from '../responses.js';

void describe('toHttpError', () => {
  void it('reports zod issues with their paths', () => {
    const result = z.object({ limit: z.number() }).safeParse({ limit: 'x' });
    assert.equal(result.success, false);
    if (result.success) return;

    assert.deepEqual(toHttpError(result.error, true), {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'limit: Expected number, received string',
    });
  });

  void it('uses the search error code', () => {
    const error = new SearchInputError('SEARCH_QUERY_TOO_LONG', 'query exceeds 1000 characters');
    assert.deepEqual(toHttpError(error, true), {
      statusCode: 400,
      code: 'SEARCH_QUERY_TOO_LONG',
      message: 'SEARCH_QUERY_TOO_LONG: query exceeds 1000 characters',
    });
  });

  void it('maps invalid embedding input to 400', () => {
    assert.equal(toHttpError(new EmbeddingInputError('blank'), true).statusCode, 400);
  });

  void it('keeps client status codes raised by the framework', () => {
    const error = Object.assign(new Error('Body is too large'), { statusCode: 413 });
    assert.deepEqual(toHttpError(error, false), {
      statusCode: 413,
      code: 'PAYLOAD_TOO_LARGE',
      message: 'Body is too large',
    });
  });

  void it('exposes internal messages only when allowed', () => {
    assert.equal(toHttpError(new Error('pool exhausted'), true).message, 'pool exhausted');
    assert.equal(toHttpError(new Error('pool exhausted'), false).message, 'Internal Server Error');
  });
});

void describe('errorEnvelope', () => {
  void it('wraps the code and message with request metadata', () => {
    const envelope = errorEnvelope('req-1', 'NOT_FOUND', 'missing');
    assert.equal(envelope.success, false);
    assert.deepEqual(envelope.error, { code: 'NOT_FOUND', message: 'missing' });
    assert.equal(envelope.meta.request_id, 'req-1');
  });
});

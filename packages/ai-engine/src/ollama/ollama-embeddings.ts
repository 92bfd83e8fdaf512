import type { Logger } from '@shopsense/logger';
import type { EmbeddingVector } from '@shopsense/types';
import { z } from 'zod';

import { EmbeddingDimensionError, EmbeddingInputError, EmbeddingUpstreamError } from '../errors.js';
import type { EmbeddingModel, EmbeddingsProvider } from '../provider.js';

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

export type OllamaEmbeddingsProviderOptions = Readonly<{
  baseUrl: string | URL;
  model: EmbeddingModel;
  logger: Logger;
  timeoutMs?: number;
  /** Throw instead of warning when a vector has the wrong length. */
  strictDimensions?: boolean;
  fetchImpl?: typeof fetch;
}>;

export class OllamaEmbeddingsProvider implements EmbeddingsProvider {
  public readonly kind = 'ollama' as const;
  public readonly model: EmbeddingModel;

  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly strictDimensions: boolean;
  private readonly fetchImpl: typeof fetch;

  public constructor(options: OllamaEmbeddingsProviderOptions) {
    this.baseUrl = options.baseUrl.toString().replace(/\/$/, '');
    this.model = options.model;
    this.logger = options.logger;
    this.timeoutMs = Math.max(1, Math.trunc(options.timeoutMs ?? 60_000));
    this.strictDimensions = options.strictDimensions ?? false;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public async generateEmbedding(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    if (!text.trim()) {
      throw new EmbeddingInputError('Text to embed must not be empty');
    }

    const [vector] = await this.requestEmbeddings([text], signal);
    if (!vector) {
      throw new EmbeddingUpstreamError('EMBEDDING_FAILED: backend returned no vectors');
    }
    return vector;
  }

  public async generateEmbeddings(
    texts: readonly string[],
    signal?: AbortSignal
  ): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    const blankIndex = texts.findIndex((text) => !text.trim());
    if (blankIndex >= 0) {
      throw new EmbeddingInputError(`Text to embed at index ${blankIndex} must not be empty`);
    }

    return this.requestEmbeddings(texts, signal);
  }

  public async testConnection(signal?: AbortSignal): Promise<boolean> {
    try {
      const body = await this.request('/api/tags', { method: 'GET' }, signal);
      const parsed = TagsResponseSchema.safeParse(body);
      if (!parsed.success) {
        this.logger.warn({ baseUrl: this.baseUrl }, 'Embedding backend returned an unexpected model list');
        return false;
      }

      const wanted = this.model.name.toLowerCase();
      const available = parsed.data.models.map((m) => m.name);
      const found = available.some((name) => name.toLowerCase().startsWith(wanted));
      if (!found) {
        this.logger.warn(
          { model: this.model.name, availableModels: available },
          'Configured embedding model is not available on the backend'
        );
      }
      return found;
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(
        { baseUrl: this.baseUrl, error: error instanceof Error ? error.message : String(error) },
        'Embedding backend connection test failed'
      );
      return false;
    }
  }

  private async requestEmbeddings(
    texts: readonly string[],
    signal: AbortSignal | undefined
  ): Promise<EmbeddingVector[]> {
    const body = await this.request(
      '/api/embed',
      {
        method: 'POST',
        body: JSON.stringify({ model: this.model.name, input: texts }),
      },
      signal
    );

    const parsed = EmbedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingUpstreamError('EMBEDDING_FAILED: malformed response from embedding backend');
    }

    const { embeddings } = parsed.data;
    if (embeddings.length === 0) {
      throw new EmbeddingUpstreamError('EMBEDDING_FAILED: backend returned no vectors');
    }
    if (embeddings.length !== texts.length) {
      throw new EmbeddingUpstreamError(
        `EMBEDDING_FAILED: expected ${texts.length} vectors, got ${embeddings.length}`
      );
    }

    embeddings.forEach((vector, index) => {
      if (vector.length === 0) {
        throw new EmbeddingUpstreamError(`EMBEDDING_FAILED: empty vector at index ${index}`);
      }
      this.checkDimensions(vector, index);
    });

    return embeddings;
  }

  private checkDimensions(vector: EmbeddingVector, index: number): void {
    if (vector.length === this.model.dimensions) return;

    if (this.strictDimensions) {
      throw new EmbeddingDimensionError(this.model.dimensions, vector.length);
    }
    this.logger.warn(
      {
        model: this.model.name,
        expectedDimensions: this.model.dimensions,
        actualDimensions: vector.length,
        index,
      },
      'Embedding dimension mismatch'
    );
  }

  private async request(path: string, init: RequestInit, signal: AbortSignal | undefined): Promise<unknown> {
    signal?.throwIfAborted();

    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        headers: { 'content-type': 'application/json' },
        signal: combined,
      });
    } catch (error) {
      throw this.translateFailure(error, signal, timeoutSignal);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new EmbeddingUpstreamError(
        `EMBEDDING_FAILED: ${res.status} ${res.statusText}${text ? ` - ${text}` : ''}`,
        { status: res.status }
      );
    }

    try {
      return await res.json();
    } catch (error) {
      throw this.translateFailure(error, signal, timeoutSignal);
    }
  }

  private translateFailure(
    error: unknown,
    signal: AbortSignal | undefined,
    timeoutSignal: AbortSignal
  ): unknown {
    // Caller cancellation passes through untouched.
    if (signal?.aborted) return signal.reason ?? error;
    if (timeoutSignal.aborted) {
      return new EmbeddingUpstreamError(
        `EMBEDDING_TIMEOUT: no response within ${this.timeoutMs}ms`,
        { cause: error }
      );
    }
    return new EmbeddingUpstreamError(
      `EMBEDDING_UNREACHABLE: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

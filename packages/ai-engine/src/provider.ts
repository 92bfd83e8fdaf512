import type { EmbeddingVector } from '@shopsense/types';

export type EmbeddingModel = Readonly<{
  name: string;
  /** Bumped by operators whenever the model behind `name` changes. */
  version: number;
  dimensions: number;
}>;

export interface EmbeddingsProvider {
  readonly kind: 'ollama';
  readonly model: EmbeddingModel;
  /**
   * @throws EmbeddingInputError for blank text
   * @throws EmbeddingUpstreamError when the backend fails or answers without a vector
   */
  generateEmbedding(text: string, signal?: AbortSignal): Promise<EmbeddingVector>;
  /** Vectors are aligned positionally with `texts`. */
  generateEmbeddings(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]>;
  /** Never throws for backend failures; rethrows cancellation. */
  testConnection(signal?: AbortSignal): Promise<boolean>;
}

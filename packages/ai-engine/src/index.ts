import type { Logger } from '@shopsense/logger';

import { OllamaEmbeddingsProvider } from './ollama/ollama-embeddings.js';
import type { EmbeddingsProvider } from './provider.js';

export const DEFAULT_EMBEDDING_MODEL = 'embeddinggemma';
export const DEFAULT_EMBEDDING_DIMENSIONS = 768;

export function createEmbeddingsProvider(params: {
  baseUrl: string | URL;
  modelName?: string;
  modelVersion: number;
  dimensions?: number;
  timeoutMs?: number;
  strictDimensions?: boolean;
  logger: Logger;
}): EmbeddingsProvider {
  const modelNameTrimmed = params.modelName?.trim();

  return new OllamaEmbeddingsProvider({
    baseUrl: params.baseUrl,
    model: {
      name: modelNameTrimmed ? modelNameTrimmed : DEFAULT_EMBEDDING_MODEL,
      version: params.modelVersion,
      dimensions: params.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS,
    },
    logger: params.logger.child({ component: 'embeddings' }),
    ...(typeof params.timeoutMs === 'number' ? { timeoutMs: params.timeoutMs } : {}),
    ...(params.strictDimensions !== undefined ? { strictDimensions: params.strictDimensions } : {}),
  });
}

export {
  EmbeddingDimensionError,
  EmbeddingInputError,
  EmbeddingsDisabledError,
  EmbeddingUpstreamError,
} from './errors.js';
export { sha256Hex } from './hash.js';
export { OllamaEmbeddingsProvider } from './ollama/ollama-embeddings.js';
export type { OllamaEmbeddingsProviderOptions } from './ollama/ollama-embeddings.js';
export type { EmbeddingModel, EmbeddingsProvider } from './provider.js';

/**
 * Embedding pipeline
 *
 * Per-product state machine: build → chunk → embed → upsert, plus the
 * deactivate/activate/delete lifecycle. Every operation is idempotent so the
 * queue may redeliver a job at any time.
 */

import { sha256Hex, type EmbeddingsProvider } from '@shopsense/ai-engine';
import { withSpan, type Logger } from '@shopsense/logger';
import {
  PLATFORM_SCOPE,
  type CatalogRepository,
  type EmbeddingOperation,
  type EmbeddingStore,
  type EmbeddingVector,
  type ProductEmbeddingRecord,
} from '@shopsense/types';

import {
  buildEmbeddingPayload,
  renderEmbeddingText,
} from '../content/canonical-document.js';
import { chunkContent } from '../content/chunker.js';

import type { CanonicalDocumentService } from './canonical-document-service.js';

export type EmbeddingPipelineOptions = Readonly<{
  /** Global switch; when off, generation is skipped. */
  enabled: boolean;
  maxTokensPerChunk: number;
}>;

export type EmbeddingPipelineDeps = Readonly<{
  catalog: CatalogRepository;
  store: EmbeddingStore;
  provider: EmbeddingsProvider;
  documents: CanonicalDocumentService;
  logger: Logger;
  options: EmbeddingPipelineOptions;
}>;

export type PipelineOutcome =
  | Readonly<{ status: 'disabled' }>
  | Readonly<{ status: 'not_found' }>
  | Readonly<{ status: 'deactivated'; chunks: number }>
  | Readonly<{ status: 'activated'; chunks: number }>
  | Readonly<{ status: 'deleted'; chunks: number }>
  | Readonly<{ status: 'generated'; chunks: number; reused: number; pruned: number }>;

export class EmbeddingPipeline {
  private readonly catalog: CatalogRepository;
  private readonly store: EmbeddingStore;
  private readonly provider: EmbeddingsProvider;
  private readonly documents: CanonicalDocumentService;
  private readonly logger: Logger;
  private readonly options: EmbeddingPipelineOptions;

  public constructor(deps: EmbeddingPipelineDeps) {
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.provider = deps.provider;
    this.documents = deps.documents;
    this.logger = deps.logger;
    this.options = deps.options;
  }

  public run(
    job: Readonly<{ productId: string; operation: EmbeddingOperation }>,
    signal?: AbortSignal
  ): Promise<PipelineOutcome> {
    switch (job.operation) {
      case 'generate':
        return this.generateEmbedding(job.productId, signal);
      case 'delete':
        return this.deleteEmbeddings(job.productId, signal);
      case 'deactivate':
        return this.deactivateEmbeddings(job.productId, signal);
      case 'activate':
        return this.activateEmbeddings(job.productId, signal);
    }
  }

  public async generateEmbedding(productId: string, signal?: AbortSignal): Promise<PipelineOutcome> {
    if (!this.options.enabled) {
      this.logger.debug({ productId }, 'Embedding generation disabled, skipping product');
      return { status: 'disabled' };
    }

    return withSpan<PipelineOutcome>(
      'embeddings.generate',
      { 'product.id': productId },
      async (span) => {
        const product = await this.catalog.findProductById(productId, PLATFORM_SCOPE, signal);
        if (!product) {
          this.logger.warn({ productId }, 'Product not found, skipping embedding');
          return { status: 'not_found' };
        }

        if (!product.isActive || !product.isPublished) {
          this.logger.info({ productId }, 'Product is not active/published, deactivating embeddings');
          return this.deactivateEmbeddings(productId, signal);
        }

        const document = await this.documents.getOrBuild(product, signal);
        const chunks = chunkContent(renderEmbeddingText(document), document.name, {
          maxTokensPerChunk: this.options.maxTokensPerChunk,
        });
        const payload = buildEmbeddingPayload(document);
        const model = this.provider.model;

        const existing = new Map(
          (await this.store.getByProduct(productId, signal)).map((record) => [record.chunkIndex, record])
        );

        let reused = 0;
        for (const chunk of chunks) {
          const contentHash = sha256Hex(chunk.text);
          const previous = existing.get(chunk.index);
          const reusable = previous
            ? this.reusableVector(previous, contentHash, document.schemaVersion)
            : null;
          if (reusable) reused += 1;

          const embedding = reusable ?? (await this.provider.generateEmbedding(chunk.text, signal));

          await this.store.upsert(
            {
              productId,
              tenantId: document.tenantId,
              shopId: document.shopId,
              chunkIndex: chunk.index,
              chunkText: chunk.text,
              embedding,
              embeddingModel: model.name,
              embeddingVersion: model.version,
              canonicalDocumentVersion: document.schemaVersion,
              contentHash,
              payload,
              isActive: true,
            },
            signal
          );
        }

        const pruned = await this.store.pruneChunks(productId, chunks.length, signal);
        await this.catalog.markEmbeddingGenerated(productId, PLATFORM_SCOPE, signal);

        span.setAttribute('embedding.chunks', chunks.length);
        this.logger.info(
          { productId, productName: document.name, chunks: chunks.length, reused, pruned },
          'Generated embeddings for product'
        );

        return { status: 'generated', chunks: chunks.length, reused, pruned };
      }
    );
  }

  public async deleteEmbeddings(productId: string, signal?: AbortSignal): Promise<PipelineOutcome> {
    const deleted = await this.store.deleteByProduct(productId, signal);
    this.logger.info({ productId, deleted }, 'Deleted embeddings for product');
    return { status: 'deleted', chunks: deleted };
  }

  public async deactivateEmbeddings(productId: string, signal?: AbortSignal): Promise<PipelineOutcome> {
    const updated = await this.store.setActive(productId, false, signal);
    if (updated > 0) {
      this.logger.info({ productId, chunks: updated }, 'Deactivated embeddings for product');
    }
    return { status: 'deactivated', chunks: updated };
  }

  /** Reactivates stored chunks, or generates them when the product has none. */
  public async activateEmbeddings(productId: string, signal?: AbortSignal): Promise<PipelineOutcome> {
    const updated = await this.store.setActive(productId, true, signal);
    if (updated === 0) {
      this.logger.info({ productId }, 'No embeddings to activate, generating');
      return this.generateEmbedding(productId, signal);
    }

    this.logger.info({ productId, chunks: updated }, 'Activated embeddings for product');
    return { status: 'activated', chunks: updated };
  }

  private reusableVector(
    previous: ProductEmbeddingRecord,
    contentHash: string,
    schemaVersion: number
  ): EmbeddingVector | null {
    const model = this.provider.model;
    if (
      previous.contentHash !== contentHash ||
      previous.embeddingModel !== model.name ||
      previous.embeddingVersion !== model.version ||
      previous.canonicalDocumentVersion !== schemaVersion ||
      previous.embedding.length !== model.dimensions
    ) {
      return null;
    }
    return previous.embedding;
  }
}

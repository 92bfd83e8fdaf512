export class EmbeddingInputError extends Error {
  public override readonly name = 'EmbeddingInputError';
}

export class EmbeddingUpstreamError extends Error {
  public override readonly name = 'EmbeddingUpstreamError';
  public readonly status: number | undefined;

  public constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.status = options?.status;
  }
}

export class EmbeddingDimensionError extends Error {
  public override readonly name = 'EmbeddingDimensionError';

  public constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`VECTOR_DIMENSION_MISMATCH: expected ${expected}, got ${actual}`);
  }
}

export class EmbeddingsDisabledError extends Error {
  public override readonly name = 'EmbeddingsDisabledError';

  public constructor() {
    super('EMBEDDINGS_DISABLED: embedding generation is turned off');
  }
}

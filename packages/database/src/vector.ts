import type { EmbeddingVector } from '@shopsense/types';

/** pgvector text literal, e.g. `[0.1,0.2,0.3]`. */
export function toPgVectorLiteral(embedding: EmbeddingVector): string {
  for (const value of embedding) {
    if (!Number.isFinite(value)) {
      throw new Error('VECTOR_INVALID: embedding contains a non-finite value');
    }
  }
  return `[${embedding.join(',')}]`;
}

export function parsePgVector(literal: string): number[] {
  const trimmed = literal.trim();
  if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
    throw new Error(`VECTOR_INVALID: unexpected literal ${trimmed.slice(0, 32)}`);
  }
  const body = trimmed.slice(1, -1).trim();
  if (!body) return [];
  return body.split(',').map((part) => {
    const value = Number(part);
    if (!Number.isFinite(value)) {
      throw new Error(`VECTOR_INVALID: non-numeric component ${part}`);
    }
    return value;
  });
}

/**
 * Cosine distance in [0, 2], matching pgvector's `<=>` operator.
 * A zero-length vector has no direction; it is treated as orthogonal (distance 1).
 */
export function cosineDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new Error(`VECTOR_DIMENSION_MISMATCH: expected ${a.length}, got ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 1;
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(2, Math.max(0, 1 - similarity));
}

/** Maps cosine distance [0, 2] onto a similarity score where 1 is identical. */
export function toSimilarityScore(distance: number): number {
  return 1 - distance / 2;
}

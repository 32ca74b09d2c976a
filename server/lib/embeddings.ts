import { logger } from "../config/logger";
import type { AbsentReason } from "@shared/api-contracts";

export type EmbeddingComparison =
  | { present: true; cosine: number; value: number }
  | { present: false; reason: AbsentReason };

/**
 * Calculate cosine similarity between two vectors of equal length.
 *
 * Returns null when no similarity is defined: empty or mismatched vectors,
 * non-finite entries, or a zero vector on either side.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | null {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return null;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    if (!Number.isFinite(a[i]) || !Number.isFinite(b[i])) {
      logger.warn({ index: i }, "Invalid value in embedding vector");
      return null;
    }
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return null;
  }

  const similarity = dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));

  // Clamp to [-1, 1] to absorb floating-point drift
  return Math.max(-1, Math.min(1, similarity));
}

/**
 * Embedding component: cosine mapped from [-1,1] to [0,1] via (cos+1)/2
 */
export function compareEmbeddings(
  a: readonly number[] | undefined,
  b: readonly number[] | undefined
): EmbeddingComparison {
  if (!a || !b || a.length === 0 || b.length === 0) {
    return { present: false, reason: "missing_embedding" };
  }
  if (a.length !== b.length) {
    logger.debug({ aLength: a.length, bLength: b.length }, "Embedding dimension mismatch");
    return { present: false, reason: "embedding_dimension_mismatch" };
  }

  const cosine = cosineSimilarity(a, b);
  if (cosine === null) {
    return { present: false, reason: "missing_embedding" };
  }
  return { present: true, cosine, value: (cosine + 1) / 2 };
}

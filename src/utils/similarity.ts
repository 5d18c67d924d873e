import { Embedding } from '../interfaces/domain/Skill';
import { InvalidInputError } from './errorHandler';

/** Cosine similarity in [-1, 1]; a zero vector is similar to nothing. */
export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) {
    throw new InvalidInputError(`Embedding dimensions differ (${a.length} vs ${b.length})`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(-1, similarity));
}

/** pgvector literal, e.g. `[0.1,0.2]`. */
export function toVectorLiteral(vector: Embedding): string {
  return `[${vector.join(',')}]`;
}

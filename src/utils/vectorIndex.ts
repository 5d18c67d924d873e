import { Embedding } from '../interfaces/domain/Skill';
import { cosineSimilarity } from './similarity';
import { compareSkillNames } from './skillNormalizer';

export type VectorMetadata = Record<string, unknown>;

export interface VectorEntry {
  id: string;
  vector: Embedding;
  metadata?: VectorMetadata;
}

export interface VectorQueryResult {
  id: string;
  /** Cosine similarity, higher is closer. */
  score: number;
  metadata: VectorMetadata;
}

/**
 * Narrow contract over a vector store. Reads may run concurrently;
 * writes are expected to be serialized by the caller.
 */
export interface VectorIndex {
  upsert(entries: VectorEntry[]): Promise<void>;
  get(ids: string[]): Promise<Map<string, Embedding>>;
  query(vector: Embedding, k: number): Promise<VectorQueryResult[]>;
}

export class InMemoryVectorIndex implements VectorIndex {
  private entries = new Map<string, { vector: Embedding; metadata: VectorMetadata }>();

  async upsert(entries: VectorEntry[]): Promise<void> {
    for (const entry of entries) {
      this.entries.set(entry.id, {
        vector: Object.freeze([...entry.vector]),
        metadata: { ...entry.metadata }
      });
    }
  }

  async get(ids: string[]): Promise<Map<string, Embedding>> {
    const found = new Map<string, Embedding>();
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) {
        found.set(id, entry.vector);
      }
    }
    return found;
  }

  async query(vector: Embedding, k: number): Promise<VectorQueryResult[]> {
    if (k <= 0) {
      return [];
    }

    return Array.from(this.entries.entries())
      .map(([id, entry]) => ({
        id,
        score: cosineSimilarity(vector, entry.vector),
        metadata: entry.metadata
      }))
      .sort((a, b) => b.score - a.score || compareSkillNames(a.id, b.id))
      .slice(0, k);
  }

  get size(): number {
    return this.entries.size;
  }
}

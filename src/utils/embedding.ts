import OpenAI from 'openai';
import { Embedding } from '../interfaces/domain/Skill';
import { AppError, EmbeddingError, RetrievalTimeoutError } from './errorHandler';
import { logger } from './logger';
import { VectorIndex } from './vectorIndex';

/** `embed` must be deterministic for identical input within one session. */
export interface EmbeddingClient {
  embed(text: string): Promise<Embedding>;
  embedMany(texts: string[]): Promise<Embedding[]>;
}

export interface OpenAIEmbeddingClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/**
 * Normalizes any collaborator failure into the engine's error taxonomy.
 * Timeouts stay distinguishable so the orchestration layer can decide to retry.
 */
export function toRetrievalError(error: unknown, skills: string[], service = 'Embedding service'): AppError {
  if (error instanceof RetrievalTimeoutError || error instanceof EmbeddingError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    logger.error(`${service} request timed out`, { skills });
    return new RetrievalTimeoutError(`${service} timed out`, skills);
  }
  logger.error(`${service} request failed`, { skills, error: error instanceof Error ? error.message : error });
  return new EmbeddingError(`${service} unavailable, try again later`, skills);
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  private openai: OpenAI;
  private model: string;

  constructor(options: OpenAIEmbeddingClientOptions) {
    // Retries belong to the caller; a slow collaborator must surface as a timeout.
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0
    });
    this.model = options.model;
  }

  async embed(text: string): Promise<Embedding> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  async embedMany(texts: string[]): Promise<Embedding[]> {
    if (texts.length === 0) {
      return [];
    }

    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: texts
      });

      if (response.data.length !== texts.length) {
        throw new EmbeddingError(
          `Embedding service returned ${response.data.length} vectors for ${texts.length} inputs`,
          texts
        );
      }

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);
    } catch (error) {
      throw toRetrievalError(error, texts);
    }
  }
}

/**
 * Looks skill vectors up in the index and embeds only the misses, in one batch.
 * New vectors are written back so later pairs reuse them. A skill already being
 * fetched by a concurrent call is awaited rather than embedded and written again.
 */
export class SkillEmbeddingResolver {
  private inFlight = new Map<string, Promise<Embedding>>();

  constructor(
    private client: EmbeddingClient,
    private index: VectorIndex
  ) {}

  async resolve(skillNames: string[]): Promise<Map<string, Embedding>> {
    const unique = Array.from(new Set(skillNames));
    if (unique.length === 0) {
      return new Map();
    }

    const pending = new Map<string, Promise<Embedding>>();
    const fresh: string[] = [];
    for (const name of unique) {
      const shared = this.inFlight.get(name);
      if (shared) {
        pending.set(name, shared);
      } else {
        fresh.push(name);
      }
    }

    if (fresh.length > 0) {
      const batch = this.fetch(fresh);
      for (const name of fresh) {
        const vector: Promise<Embedding> = batch
          .then(vectors => {
            const found = vectors.get(name);
            if (!found) {
              throw new EmbeddingError(`No embedding returned for skill "${name}"`, [name]);
            }
            return found;
          })
          .finally(() => {
            if (this.inFlight.get(name) === vector) {
              this.inFlight.delete(name);
            }
          });
        this.inFlight.set(name, vector);
        pending.set(name, vector);
      }
    }

    const resolved = await Promise.all(
      Array.from(pending, async ([name, vector]) => [name, await vector] as const)
    );
    return new Map(resolved);
  }

  private async fetch(names: string[]): Promise<Map<string, Embedding>> {
    let vectors: Map<string, Embedding>;
    try {
      vectors = await this.index.get(names);
    } catch (error) {
      throw toRetrievalError(error, names);
    }

    const misses = names.filter(name => !vectors.has(name));
    if (misses.length === 0) {
      return vectors;
    }

    const embedded = await this.client.embedMany(misses);
    if (embedded.length !== misses.length) {
      throw new EmbeddingError(`Expected ${misses.length} embeddings, received ${embedded.length}`, misses);
    }

    const entries = misses.map((name, idx) => ({
      id: name,
      vector: embedded[idx],
      metadata: { kind: 'skill' }
    }));

    try {
      await this.index.upsert(entries);
    } catch (error) {
      throw toRetrievalError(error, misses);
    }

    for (const entry of entries) {
      vectors.set(entry.id, entry.vector);
    }

    logger.debug('Resolved skill embeddings', { requested: names.length, embedded: misses.length });
    return vectors;
  }
}

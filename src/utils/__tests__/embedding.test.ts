import OpenAI from 'openai';
import { SkillEmbeddingResolver, EmbeddingClient, toRetrievalError } from '../embedding';
import { EmbeddingError, RetrievalTimeoutError } from '../errorHandler';
import { InMemoryVectorIndex, VectorIndex } from '../vectorIndex';
import { Embedding } from '../../interfaces/domain/Skill';

class RecordingClient implements EmbeddingClient {
  calls: string[][] = [];

  constructor(private vectors: Record<string, Embedding>, private failure?: Error) {}

  async embed(text: string): Promise<Embedding> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: string[]): Promise<Embedding[]> {
    this.calls.push(texts);
    if (this.failure) {
      throw this.failure;
    }
    return texts.map(text => this.vectors[text] ?? [0, 0]);
  }
}

describe('toRetrievalError', () => {
  it('maps client timeouts to RetrievalTimeoutError', () => {
    const error = toRetrievalError(new OpenAI.APIConnectionTimeoutError(), ['python']);

    expect(error).toBeInstanceOf(RetrievalTimeoutError);
    expect(error.statusCode).toBe(504);
  });

  it('maps other failures to EmbeddingError with the skills involved', () => {
    const error = toRetrievalError(new Error('socket hang up'), ['python', 'sql']);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({ skills: ['python', 'sql'], statusCode: 502 });
  });

  it('passes engine errors through unchanged', () => {
    const timeout = new RetrievalTimeoutError('slow', ['go']);

    expect(toRetrievalError(timeout, ['other'])).toBe(timeout);
  });
});

describe('SkillEmbeddingResolver', () => {
  it('embeds only the skills missing from the index and caches them', async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert([{ id: 'python', vector: [1, 0] }]);
    const client = new RecordingClient({ sql: [0, 1] });
    const resolver = new SkillEmbeddingResolver(client, index);

    const vectors = await resolver.resolve(['python', 'sql', 'python']);

    expect(client.calls).toEqual([['sql']]);
    expect(vectors.get('python')).toEqual([1, 0]);
    expect(vectors.get('sql')).toEqual([0, 1]);
    expect(index.size).toBe(2);

    await resolver.resolve(['sql']);
    expect(client.calls).toHaveLength(1);
  });

  it('shares an in-flight lookup between concurrent calls', async () => {
    const index = new InMemoryVectorIndex();
    const client = new RecordingClient({ python: [1, 0], sql: [0, 1] });
    const resolver = new SkillEmbeddingResolver(client, index);

    const [first, second] = await Promise.all([
      resolver.resolve(['python', 'sql']),
      resolver.resolve(['sql'])
    ]);

    expect(client.calls).toEqual([['python', 'sql']]);
    expect(first.get('sql')).toEqual([0, 1]);
    expect(Array.from(second.entries())).toEqual([['sql', [0, 1]]]);
  });

  it('does nothing for an empty request', async () => {
    const client = new RecordingClient({});
    const resolver = new SkillEmbeddingResolver(client, new InMemoryVectorIndex());

    const vectors = await resolver.resolve([]);

    expect(vectors.size).toBe(0);
    expect(client.calls).toEqual([]);
  });

  it('propagates a timeout from the client unchanged', async () => {
    const timeout = new RetrievalTimeoutError('Embedding service timed out', ['docker']);
    const resolver = new SkillEmbeddingResolver(new RecordingClient({}, timeout), new InMemoryVectorIndex());

    await expect(resolver.resolve(['docker'])).rejects.toBe(timeout);
  });

  it('wraps index failures as EmbeddingError', async () => {
    const brokenIndex: VectorIndex = {
      upsert: async () => undefined,
      get: async () => {
        throw new Error('connection refused');
      },
      query: async () => []
    };
    const resolver = new SkillEmbeddingResolver(new RecordingClient({}), brokenIndex);

    await expect(resolver.resolve(['python', 'sql'])).rejects.toMatchObject({
      name: 'EmbeddingError',
      skills: ['python', 'sql']
    });
  });
});

import { Server } from 'http';
import { createApp } from '../app';
import { MatchingService } from '../models/shared/matching.service';
import {
  FakeEmbeddingClient,
  InMemoryJobStore,
  InMemoryMatchRecordStore
} from '../models/shared/__tests__/inMemoryStores';
import { buildSkillCatalog } from '../utils/skillCatalog';
import { KeywordSkillExtractor } from '../utils/skillExtractor';
import { InMemoryVectorIndex } from '../utils/vectorIndex';

const catalog = buildSkillCatalog({
  categories: { technical: ['python', 'django', 'sql'] },
  synonyms: { py: 'python' }
});

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const jobStore = new InMemoryJobStore();
  const service = new MatchingService({
    catalog,
    extractor: new KeywordSkillExtractor(catalog),
    embeddingClient: new FakeEmbeddingClient({ python: [1, 0], django: [0.8, 0.6], sql: [0, 1] }),
    skillIndex: new InMemoryVectorIndex(),
    jobIndex: new InMemoryVectorIndex(),
    jobStore,
    matchStore: new InMemoryMatchRecordStore(jobStore)
  });

  server = await new Promise<Server>(resolve => {
    const listening = createApp(service).listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

async function request(method: 'GET' | 'POST', path: string, body?: string | object) {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body)
  });
  return { status: response.status, body: await response.json() };
}

describe('HTTP API', () => {
  it('reports health', async () => {
    const { status, body } = await request('GET', '/health');

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
  });

  it('answers 200 for an unsaved match', async () => {
    const { status, body } = await request('POST', '/api/match', {
      resume: { skills: ['py'] },
      jobDescription: { skills: ['python'] }
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({ matchId: null, ats: null, match: { match_score: 100, role_fit: 'Strong' } });
  });

  it('answers 201 for a persisted match and serves the stored record', async () => {
    const created = await request('POST', '/api/match', {
      resume: { skills: ['python'] },
      jobDescription: { skills: ['python', 'sql'] },
      persist: true
    });

    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ matchId: 'match-1' });

    const stored = await request('GET', '/api/matches/match-1');
    expect(stored.status).toBe(200);
    expect(stored.body).toMatchObject({
      id: 'match-1',
      jobKey: null,
      resumeSkills: ['python'],
      jdSkills: ['python', 'sql']
    });
  });

  it('maps invalid input to 400 with the error type', async () => {
    const { status, body } = await request('POST', '/api/match', {
      resume: { skills: 'python' },
      jobDescription: { skills: ['python'] }
    });

    expect(status).toBe(400);
    expect(body).toEqual({ error: 'Skills must be provided as an array of strings', type: 'InvalidInputError' });
  });

  it('maps a malformed JSON body to 400', async () => {
    const { status, body } = await request('POST', '/api/match', '{"resume":');

    expect(status).toBe(400);
    expect(body).toEqual({ error: 'Malformed JSON body', type: 'InvalidInputError' });
  });

  it('includes the affected skills in embedding failures', async () => {
    const { status, body } = await request('POST', '/api/match', {
      resume: { skills: ['python'] },
      jobDescription: { skills: ['golang'] }
    });

    expect(status).toBe(502);
    expect(body).toEqual({
      error: 'Embedding service unavailable, try again later',
      type: 'EmbeddingError',
      skills: ['golang']
    });
  });

  it('maps an empty job registration to 422', async () => {
    const { status, body } = await request('POST', '/api/jobs', { jobKey: 'empty', skills: [] });

    expect(status).toBe(422);
    expect(body).toEqual({ error: 'Job description has no recognizable skills', type: 'EmptyInputError' });
  });

  it('answers 404 for an unknown job and an unknown route', async () => {
    const job = await request('GET', '/api/jobs/missing');
    expect(job.status).toBe(404);
    expect(job.body).toEqual({ error: 'Job not found', type: 'AppError' });

    const route = await request('GET', '/api/nowhere');
    expect(route.status).toBe(404);
    expect(route.body).toEqual({ error: 'Route not found' });
  });
});

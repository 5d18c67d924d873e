import { Embedding } from '../../../interfaces/domain/Skill';
import {
  JobProfile,
  JobStore,
  MatchRecordStore,
  NewJobProfile,
  NewMatchRecord,
  StoredMatchRecord
} from '../../../interfaces/domain/Stores';
import { EmbeddingClient } from '../../../utils/embedding';
import { EmbeddingError } from '../../../utils/errorHandler';

export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, JobProfile>();
  private sequence = 0;

  async upsert(input: NewJobProfile): Promise<JobProfile> {
    const existing = this.jobs.get(input.jobKey);
    const job: JobProfile = {
      id: existing?.id ?? `job-${++this.sequence}`,
      jobKey: input.jobKey,
      title: input.title,
      skills: [...input.skills],
      createdAt: existing?.createdAt ?? new Date(0)
    };
    this.jobs.set(job.jobKey, job);
    return job;
  }

  async findByKey(jobKey: string): Promise<JobProfile | null> {
    return this.jobs.get(jobKey) ?? null;
  }

  async findByKeys(jobKeys: string[]): Promise<JobProfile[]> {
    return jobKeys.flatMap(key => {
      const job = this.jobs.get(key);
      return job ? [job] : [];
    });
  }

  findById(id: string): JobProfile | undefined {
    return Array.from(this.jobs.values()).find(job => job.id === id);
  }
}

export class InMemoryMatchRecordStore implements MatchRecordStore {
  saved: NewMatchRecord[] = [];

  constructor(private jobs: InMemoryJobStore) {}

  async save(record: NewMatchRecord): Promise<string> {
    this.saved.push(record);
    return `match-${this.saved.length}`;
  }

  async findById(id: string): Promise<StoredMatchRecord | null> {
    const position = Number(id.replace('match-', '')) - 1;
    const record = this.saved[position];
    if (!record) {
      return null;
    }
    return {
      id,
      jobKey: record.jobId ? this.jobs.findById(record.jobId)?.jobKey ?? null : null,
      resumeSkills: record.resumeSkills,
      jdSkills: record.jdSkills,
      result: record.result,
      createdAt: new Date(0)
    };
  }
}

/** Looks texts up in a fixed table; unknown texts fail like an unavailable service. */
export class FakeEmbeddingClient implements EmbeddingClient {
  embedded: string[] = [];

  constructor(private vectors: Record<string, Embedding>) {}

  async embed(text: string): Promise<Embedding> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: string[]): Promise<Embedding[]> {
    this.embedded.push(...texts);
    const unknown = texts.filter(text => !(text in this.vectors));
    if (unknown.length > 0) {
      throw new EmbeddingError('Embedding service unavailable, try again later', unknown);
    }
    return texts.map(text => this.vectors[text]);
  }
}

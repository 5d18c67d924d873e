import { DataSource, In, Repository } from 'typeorm';
import { Job } from '../../entities/Job';
import { MatchRecord } from '../../entities/MatchRecord';
import { Embedding } from '../../interfaces/domain/Skill';
import {
  JobProfile,
  JobStore,
  MatchRecordStore,
  NewJobProfile,
  NewMatchRecord,
  StoredMatchRecord
} from '../../interfaces/domain/Stores';
import { toVectorLiteral } from '../../utils/similarity';
import { VectorEntry, VectorIndex, VectorMetadata, VectorQueryResult } from '../../utils/vectorIndex';
import { logger } from '../../utils/logger';

export class TypeOrmJobStore implements JobStore {
  private jobRepository: Repository<Job>;

  constructor(dataSource: DataSource) {
    this.jobRepository = dataSource.getRepository(Job);
  }

  async upsert(input: NewJobProfile): Promise<JobProfile> {
    let job = await this.jobRepository.findOne({ where: { jobKey: input.jobKey } });
    if (job) {
      job.title = input.title;
      job.skills = input.skills;
    } else {
      job = this.jobRepository.create({
        jobKey: input.jobKey,
        title: input.title,
        skills: input.skills
      });
    }
    return this.jobRepository.save(job);
  }

  async findByKey(jobKey: string): Promise<JobProfile | null> {
    return this.jobRepository.findOne({ where: { jobKey } });
  }

  async findByKeys(jobKeys: string[]): Promise<JobProfile[]> {
    if (jobKeys.length === 0) {
      return [];
    }
    return this.jobRepository.find({ where: { jobKey: In(jobKeys) } });
  }
}

export class TypeOrmMatchRecordStore implements MatchRecordStore {
  private matchRepository: Repository<MatchRecord>;
  private jobRepository: Repository<Job>;

  constructor(dataSource: DataSource) {
    this.matchRepository = dataSource.getRepository(MatchRecord);
    this.jobRepository = dataSource.getRepository(Job);
  }

  async save(input: NewMatchRecord): Promise<string> {
    const job = input.jobId
      ? await this.jobRepository.findOne({ where: { id: input.jobId } })
      : null;

    const { result } = input;
    const entity = this.matchRepository.create({
      job,
      resumeSkills: input.resumeSkills,
      jdSkills: input.jdSkills,
      matchedSkills: result.matched_skills,
      missingSkills: result.missing_skills,
      matchScore: result.match_score,
      relevanceScore: result.relevance_score,
      completenessScore: result.completeness_score,
      roleFit: result.role_fit,
      suggestions: result.suggestions
    });

    const saved = await this.matchRepository.save(entity);
    logger.info('Stored match record', { matchId: saved.id, jobId: input.jobId, matchScore: result.match_score });
    return saved.id;
  }

  async findById(id: string): Promise<StoredMatchRecord | null> {
    const record = await this.matchRepository.findOne({
      where: { id },
      relations: ['job']
    });

    if (!record) {
      return null;
    }

    return {
      id: record.id,
      jobKey: record.job?.jobKey ?? null,
      resumeSkills: record.resumeSkills,
      jdSkills: record.jdSkills,
      result: {
        matched_skills: record.matchedSkills,
        missing_skills: record.missingSkills,
        match_score: record.matchScore,
        relevance_score: record.relevanceScore,
        completeness_score: record.completenessScore,
        role_fit: record.roleFit,
        suggestions: record.suggestions
      },
      createdAt: record.createdAt
    };
  }
}

export type VectorTable = 'skill_embeddings' | 'job_embeddings';

interface VectorRow {
  id: string;
  embedding: string;
}

interface VectorQueryRow {
  id: string;
  metadata: VectorMetadata | null;
  score: string | number;
}

function parseVector(literal: string): Embedding {
  return literal
    .replace(/^\[|\]$/g, '')
    .split(',')
    .filter(part => part.trim().length > 0)
    .map(Number);
}

/** pgvector-backed index; `score` is cosine similarity (1 - cosine distance). */
export class PgVectorIndex implements VectorIndex {
  constructor(
    private dataSource: DataSource,
    private table: VectorTable
  ) {}

  async upsert(entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    await this.dataSource.transaction(async manager => {
      for (const entry of entries) {
        await manager.query(`
          INSERT INTO ${this.table} (id, embedding, metadata, updated_at)
          VALUES ($1, $2::vector, $3::jsonb, now())
          ON CONFLICT (id) DO UPDATE
            SET embedding = EXCLUDED.embedding,
                metadata = EXCLUDED.metadata,
                updated_at = now()
        `, [entry.id, toVectorLiteral(entry.vector), JSON.stringify(entry.metadata ?? {})]);
      }
    });
  }

  async get(ids: string[]): Promise<Map<string, Embedding>> {
    const found = new Map<string, Embedding>();
    if (ids.length === 0) {
      return found;
    }

    const rows: VectorRow[] = await this.dataSource.query(`
      SELECT id, embedding::text AS embedding
      FROM ${this.table}
      WHERE id = ANY($1)
    `, [ids]);

    for (const row of rows) {
      found.set(row.id, parseVector(row.embedding));
    }
    return found;
  }

  async query(vector: Embedding, k: number): Promise<VectorQueryResult[]> {
    if (k <= 0) {
      return [];
    }

    const rows: VectorQueryRow[] = await this.dataSource.query(`
      SELECT id, metadata, 1 - (embedding <=> $1::vector) AS score
      FROM ${this.table}
      ORDER BY embedding <=> $1::vector, id
      LIMIT $2
    `, [toVectorLiteral(vector), k]);

    return rows.map(row => ({
      id: row.id,
      score: Number(row.score),
      metadata: row.metadata ?? {}
    }));
  }
}

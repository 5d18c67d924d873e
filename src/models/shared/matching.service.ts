import { DEFAULT_MATCHING_CONFIG, MatchingConfig, resolveMatchingConfig } from '../../config/matching';
import { CreateJobDto, RankJobsDto } from '../../interfaces/dto/CreateJobDto';
import { BatchMatchRequestDto, DocumentInput, MatchRequestDto, PairInput } from '../../interfaces/dto/MatchRequestDto';
import { MatchOutcome, MatchResult } from '../../interfaces/domain/MatchResult';
import { SkillCatalog, SkillSet } from '../../interfaces/domain/Skill';
import { JobProfile, JobStore, MatchRecordStore, StoredMatchRecord } from '../../interfaces/domain/Stores';
import { AtsReport, computeAtsScore } from '../../utils/atsScore';
import { EmbeddingClient, SkillEmbeddingResolver, toRetrievalError } from '../../utils/embedding';
import { AppError, EmptyInputError, InvalidInputError, describeError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import { embeddingsRequiredFor } from '../../utils/matcher';
import { evaluateMatch } from '../../utils/matchEngine';
import { DocumentType, SkillExtractor } from '../../utils/skillExtractor';
import { compareSkillNames, normalize, skillNames } from '../../utils/skillNormalizer';
import { VectorIndex, VectorQueryResult } from '../../utils/vectorIndex';

export interface MatchingServiceDeps {
  catalog: SkillCatalog;
  extractor: SkillExtractor;
  embeddingClient: EmbeddingClient;
  /** Per-skill vectors, keyed by canonical skill name. */
  skillIndex: VectorIndex;
  /** Skill-set aggregate vectors of registered jobs, keyed by job key. */
  jobIndex: VectorIndex;
  jobStore: JobStore;
  matchStore: MatchRecordStore;
  config?: MatchingConfig;
}

export interface PairMatch {
  matchId: string | null;
  match: MatchResult;
  /** Present when the resume was submitted as text. */
  ats: AtsReport | null;
}

export interface RankedJob {
  jobKey: string;
  title: string | null;
  retrievalScore: number;
  match: MatchResult;
}

const DEFAULT_RANK_LIMIT = 5;
const MAX_RANK_LIMIT = 50;

interface PreparedPair {
  resume: SkillSet;
  jd: SkillSet;
  job: JobProfile | null;
}

export class MatchingService {
  private resolver: SkillEmbeddingResolver;
  private baseConfig: MatchingConfig;

  constructor(private deps: MatchingServiceDeps) {
    this.resolver = new SkillEmbeddingResolver(deps.embeddingClient, deps.skillIndex);
    this.baseConfig = resolveMatchingConfig({}, deps.config ?? DEFAULT_MATCHING_CONFIG);
  }

  async matchPair(dto: MatchRequestDto): Promise<PairMatch> {
    if (!dto || typeof dto !== 'object') {
      throw new InvalidInputError('Request body must be an object');
    }

    if (dto.persist !== undefined && typeof dto.persist !== 'boolean') {
      throw new InvalidInputError('"persist" must be a boolean');
    }

    const config = resolveMatchingConfig(dto.config ?? {}, this.baseConfig);
    const pair = await this.preparePair(dto);
    const match = await this.evaluate(pair.resume, pair.jd, config);

    let matchId: string | null = null;
    if (dto.persist === true) {
      matchId = await this.deps.matchStore.save({
        jobId: pair.job?.id ?? null,
        resumeSkills: skillNames(pair.resume),
        jdSkills: skillNames(pair.jd),
        result: match
      });
    }

    logger.info('Computed match', {
      matchId,
      jobKey: pair.job?.jobKey ?? null,
      matchScore: match.match_score,
      roleFit: match.role_fit
    });

    const ats = typeof dto.resume.text === 'string' && dto.resume.skills === undefined
      ? computeAtsScore(dto.resume.text, skillNames(pair.jd))
      : null;

    return { matchId, match, ats };
  }

  /**
   * Evaluates every pair concurrently. A failing pair is reported with its error
   * type and never aborts the others.
   */
  async matchBatch(dto: BatchMatchRequestDto): Promise<MatchOutcome[]> {
    if (!dto || !Array.isArray(dto.pairs) || dto.pairs.length === 0) {
      throw new InvalidInputError('"pairs" must be a non-empty array');
    }

    const seen = new Set<string>();
    for (const pair of dto.pairs) {
      if (!pair || typeof pair.id !== 'string' || !pair.id.trim()) {
        throw new InvalidInputError('Every pair needs a non-empty string "id"');
      }
      if (seen.has(pair.id)) {
        throw new InvalidInputError(`Duplicate pair id "${pair.id}"`);
      }
      seen.add(pair.id);
    }

    const config = resolveMatchingConfig(dto.config ?? {}, this.baseConfig);

    const outcomes = await Promise.all(dto.pairs.map(async (pair): Promise<MatchOutcome> => {
      try {
        const prepared = await this.preparePair(pair);
        const record = await this.evaluate(prepared.resume, prepared.jd, config);
        return { id: pair.id, status: 'ok', record };
      } catch (error) {
        const described = describeError(error);
        logger.warn('Batch pair failed', { pairId: pair.id, ...described });
        return { id: pair.id, status: 'failed', error: described };
      }
    }));

    logger.info('Completed batch match', {
      pairs: outcomes.length,
      failed: outcomes.filter(outcome => outcome.status === 'failed').length
    });

    return outcomes;
  }

  async registerJob(dto: CreateJobDto): Promise<JobProfile> {
    if (!dto || typeof dto.jobKey !== 'string' || !dto.jobKey.trim()) {
      throw new InvalidInputError('"jobKey" is required');
    }
    if (dto.title != null && typeof dto.title !== 'string') {
      throw new InvalidInputError('"title" must be a string');
    }

    const jobKey = dto.jobKey.trim();
    const skills = await this.prepareSkills(dto, 'job_description', 'Job description');
    if (skills.length === 0) {
      throw new EmptyInputError('Job description has no recognizable skills');
    }

    const names = skillNames(skills);
    const title = dto.title?.trim() || null;
    const aggregate = await this.deps.embeddingClient.embed(names.join(' '));

    // Indexed before stored: a job in the store is always retrievable by rankJobs.
    try {
      await this.deps.jobIndex.upsert([{ id: jobKey, vector: aggregate, metadata: { title } }]);
    } catch (error) {
      throw toRetrievalError(error, names);
    }

    const job = await this.deps.jobStore.upsert({ jobKey, title, skills: names });

    logger.info('Registered job', { jobKey, skillCount: names.length });
    return job;
  }

  async getJob(jobKey: string): Promise<JobProfile> {
    const job = await this.deps.jobStore.findByKey(jobKey);
    if (!job) {
      throw new AppError('Job not found', 404);
    }
    return job;
  }

  /**
   * Retrieves the nearest registered jobs by skill-set embedding, then scores each
   * one fully. Results are ordered by match score, not by retrieval distance.
   */
  async rankJobs(dto: RankJobsDto): Promise<RankedJob[]> {
    if (!dto || typeof dto !== 'object') {
      throw new InvalidInputError('Request body must be an object');
    }

    const limit = dto.limit ?? DEFAULT_RANK_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RANK_LIMIT) {
      throw new InvalidInputError(`"limit" must be an integer between 1 and ${MAX_RANK_LIMIT}`);
    }

    const config = resolveMatchingConfig(dto.config ?? {}, this.baseConfig);
    const resume = await this.prepareSkills(dto.resume, 'resume', 'Resume');
    if (resume.length === 0) {
      throw new EmptyInputError('Resume has no skills to rank jobs against');
    }

    const names = skillNames(resume);
    const aggregate = await this.deps.embeddingClient.embed(names.join(' '));

    let hits: VectorQueryResult[];
    try {
      hits = await this.deps.jobIndex.query(aggregate, limit);
    } catch (error) {
      throw toRetrievalError(error, names);
    }

    const jobs = await this.deps.jobStore.findByKeys(hits.map(hit => hit.id));
    const jobsByKey = new Map(jobs.map(job => [job.jobKey, job]));

    const ranked: RankedJob[] = [];
    for (const hit of hits) {
      const job = jobsByKey.get(hit.id);
      if (!job) {
        logger.warn('Job data not found for indexed job', { jobKey: hit.id });
        continue;
      }

      const jd = this.normalizeSkills(job.skills);
      const match = await this.evaluate(resume, jd, config);
      ranked.push({
        jobKey: job.jobKey,
        title: job.title,
        retrievalScore: Math.round(hit.score * 10000) / 10000,
        match
      });
    }

    ranked.sort((a, b) => b.match.match_score - a.match.match_score || compareSkillNames(a.jobKey, b.jobKey));
    logger.info('Ranked jobs for resume', { candidates: hits.length, ranked: ranked.length });
    return ranked;
  }

  async getMatchRecord(matchId: string): Promise<StoredMatchRecord> {
    const record = await this.deps.matchStore.findById(matchId);
    if (!record) {
      throw new AppError('Match record not found', 404);
    }
    return record;
  }

  private async evaluate(resume: SkillSet, jd: SkillSet, config: MatchingConfig): Promise<MatchResult> {
    const vectors = await this.resolver.resolve(embeddingsRequiredFor(resume, jd));
    return evaluateMatch(resume, jd, name => vectors.get(name), config, this.deps.catalog.importance);
  }

  private async preparePair(input: PairInput): Promise<PreparedPair> {
    if (input.jobDescription !== undefined && input.jobKey !== undefined) {
      throw new InvalidInputError('Provide either "jobDescription" or "jobKey", not both');
    }

    let job: JobProfile | null = null;
    let jdPromise: Promise<SkillSet>;
    if (input.jobKey !== undefined) {
      if (typeof input.jobKey !== 'string') {
        throw new InvalidInputError('"jobKey" must be a string');
      }
      job = await this.getJob(input.jobKey);
      jdPromise = Promise.resolve(this.normalizeSkills(job.skills));
    } else {
      jdPromise = this.prepareSkills(input.jobDescription, 'job_description', 'Job description');
    }

    const [resume, jd] = await Promise.all([
      this.prepareSkills(input.resume, 'resume', 'Resume'),
      jdPromise
    ]);

    return { resume, jd, job };
  }

  private async prepareSkills(
    input: DocumentInput | undefined,
    documentType: DocumentType,
    label: string
  ): Promise<SkillSet> {
    if (!input || typeof input !== 'object') {
      throw new InvalidInputError(`${label} is required`);
    }

    if (input.skills !== undefined) {
      return this.normalizeSkills(input.skills);
    }

    if (typeof input.text === 'string') {
      const extracted = await this.deps.extractor.extract(input.text, documentType);
      logger.debug('Extracted skills from text', { documentType, count: extracted.length });
      return this.normalizeSkills(extracted);
    }

    throw new InvalidInputError(`${label} must provide "skills" or "text"`);
  }

  private normalizeSkills(rawSkills: unknown): SkillSet {
    return normalize(rawSkills, this.deps.catalog.canonicalMap, {
      categories: this.deps.catalog.categories
    });
  }
}

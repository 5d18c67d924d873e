import { MatchResult } from './MatchResult';

export interface JobProfile {
  id: string;
  jobKey: string;
  title: string | null;
  skills: string[];
  createdAt: Date;
}

export interface NewJobProfile {
  jobKey: string;
  title: string | null;
  skills: string[];
}

export interface JobStore {
  /** Creates the job or replaces the title and skills of an existing key. */
  upsert(job: NewJobProfile): Promise<JobProfile>;
  findByKey(jobKey: string): Promise<JobProfile | null>;
  findByKeys(jobKeys: string[]): Promise<JobProfile[]>;
}

export interface NewMatchRecord {
  jobId: string | null;
  resumeSkills: string[];
  jdSkills: string[];
  result: MatchResult;
}

export interface StoredMatchRecord {
  id: string;
  jobKey: string | null;
  resumeSkills: string[];
  jdSkills: string[];
  result: MatchResult;
  createdAt: Date;
}

/** Match records are write-once: there is no update operation. */
export interface MatchRecordStore {
  save(record: NewMatchRecord): Promise<string>;
  findById(id: string): Promise<StoredMatchRecord | null>;
}

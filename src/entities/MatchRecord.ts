import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Job } from './Job';
import { MatchedSkillEntry, RoleFit } from '../interfaces/domain/MatchResult';

// pg returns NUMERIC columns as strings
const numericTransformer = {
  to: (value: number) => value,
  from: (value: string | null) => (value === null ? 0 : parseFloat(value))
};

@Entity({ name: 'match_records' })
export class MatchRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => Job, { nullable: true })
  @JoinColumn({ name: 'job_id' })
  job!: Job | null;

  @Column({ name: 'resume_skills', type: 'jsonb' })
  resumeSkills!: string[];

  @Column({ name: 'jd_skills', type: 'jsonb' })
  jdSkills!: string[];

  @Column({ name: 'matched_skills', type: 'jsonb' })
  matchedSkills!: MatchedSkillEntry[];

  @Column({ name: 'missing_skills', type: 'jsonb' })
  missingSkills!: string[];

  @Column({ name: 'match_score', type: 'int' })
  matchScore!: number;

  @Column({ name: 'relevance_score', type: 'numeric', precision: 5, scale: 2, transformer: numericTransformer })
  relevanceScore!: number;

  @Column({ name: 'completeness_score', type: 'numeric', precision: 5, scale: 2, transformer: numericTransformer })
  completenessScore!: number;

  @Column({ name: 'role_fit', type: 'varchar', length: 10 })
  roleFit!: RoleFit;

  @Column({ type: 'jsonb' })
  suggestions!: string[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}

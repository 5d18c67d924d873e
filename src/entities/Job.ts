import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity({ name: 'jobs' })
export class Job {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'job_key', type: 'varchar', unique: true })
  jobKey!: string;

  @Column({ type: 'varchar', nullable: true })
  title!: string | null;

  /** Normalized skill names in extraction order. */
  @Column({ type: 'jsonb' })
  skills!: string[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}

import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1700000000000 implements MigrationInterface {
  name = 'InitialSchema1700000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "vector"');

    await queryRunner.query(`
      CREATE TABLE jobs (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        job_key TEXT UNIQUE NOT NULL,
        title TEXT,
        skills JSONB NOT NULL DEFAULT '[]'::jsonb,
        created_at TIMESTAMPTZ DEFAULT now()
      )
    `);

    await queryRunner.query(`
      CREATE TABLE match_records (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        job_id UUID REFERENCES jobs(id) ON DELETE SET NULL,
        resume_skills JSONB NOT NULL,
        jd_skills JSONB NOT NULL,
        matched_skills JSONB NOT NULL,
        missing_skills JSONB NOT NULL,
        match_score INT NOT NULL CHECK (match_score BETWEEN 0 AND 100),
        relevance_score NUMERIC(5,2) NOT NULL,
        completeness_score NUMERIC(5,2) NOT NULL,
        role_fit VARCHAR(10) NOT NULL CHECK (role_fit IN ('Strong','Moderate','Weak')),
        suggestions JSONB NOT NULL,
        created_at TIMESTAMPTZ DEFAULT now()
      )
    `);

    // Dimension is left open so the embedding model can change without a migration.
    await queryRunner.query(`
      CREATE TABLE skill_embeddings (
        id TEXT PRIMARY KEY,
        embedding VECTOR NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        updated_at TIMESTAMPTZ DEFAULT now()
      )
    `);

    await queryRunner.query(`
      CREATE TABLE job_embeddings (
        id TEXT PRIMARY KEY,
        embedding VECTOR NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        updated_at TIMESTAMPTZ DEFAULT now()
      )
    `);

    await queryRunner.query('CREATE INDEX match_records_job_id_idx ON match_records(job_id)');
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE IF EXISTS job_embeddings');
    await queryRunner.query('DROP TABLE IF EXISTS skill_embeddings');
    await queryRunner.query('DROP TABLE IF EXISTS match_records');
    await queryRunner.query('DROP TABLE IF EXISTS jobs');
    await queryRunner.query('DROP EXTENSION IF EXISTS "vector"');
    await queryRunner.query('DROP EXTENSION IF EXISTS "uuid-ossp"');
  }
}

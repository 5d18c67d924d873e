import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { env } from './env';
import { Job } from '../entities/Job';
import { MatchRecord } from '../entities/MatchRecord';

const migrationsGlob = env.NODE_ENV === 'production'
  ? 'dist/migrations/*.js'
  : 'migrations/*.ts';

export const AppDataSource = new DataSource({
  type: 'postgres',
  url: env.DATABASE_URL,
  entities: [Job, MatchRecord],
  migrations: [migrationsGlob],
  synchronize: false,
  logging: env.NODE_ENV === 'development'
});

import 'reflect-metadata';
import { AppDataSource } from './config/data-source';
import { env } from './config/env';
import { resolveMatchingConfig } from './config/matching';
import { createApp } from './app';
import { MatchingService } from './models/shared/matching.service';
import { PgVectorIndex, TypeOrmJobStore, TypeOrmMatchRecordStore } from './models/shared/typeorm.stores';
import { OpenAIEmbeddingClient } from './utils/embedding';
import { logger } from './utils/logger';
import { loadSkillCatalog } from './utils/skillCatalog';
import { KeywordSkillExtractor, OpenAISkillExtractor, SkillExtractor } from './utils/skillExtractor';
import { SkillCatalog } from './interfaces/domain/Skill';

function buildExtractor(catalog: SkillCatalog): SkillExtractor {
  if (env.SKILL_EXTRACTOR === 'llm') {
    return new OpenAISkillExtractor({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_CHAT_MODEL,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS * 3
    }, catalog);
  }
  return new KeywordSkillExtractor(catalog);
}

function buildMatchingService(): MatchingService {
  const catalog = loadSkillCatalog(env.SKILLS_CONFIG_PATH);

  return new MatchingService({
    catalog,
    extractor: buildExtractor(catalog),
    embeddingClient: new OpenAIEmbeddingClient({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_EMBEDDING_MODEL,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS
    }),
    skillIndex: new PgVectorIndex(AppDataSource, 'skill_embeddings'),
    jobIndex: new PgVectorIndex(AppDataSource, 'job_embeddings'),
    jobStore: new TypeOrmJobStore(AppDataSource),
    matchStore: new TypeOrmMatchRecordStore(AppDataSource),
    config: resolveMatchingConfig(env.MATCHING)
  });
}

async function startServer() {
  try {
    logger.info('Initializing database connection...');
    await AppDataSource.initialize();
    logger.info('Database connected successfully');

    const app = createApp(buildMatchingService());

    app.listen(env.PORT, () => {
      logger.info(`Server running on port ${env.PORT}`);
      logger.info(`Environment: ${env.NODE_ENV}`);
      logger.info('=== Skill Match Engine Started ===');
    });
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

async function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
    }
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', error);
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

if (require.main === module) {
  void startServer();
}

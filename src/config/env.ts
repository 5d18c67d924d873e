import dotenv from 'dotenv';
import path from 'path';
import { MatchingConfigOverrides } from './matching';

dotenv.config();

export type SkillExtractorKind = 'keyword' | 'llm';

interface EnvConfig {
  PORT: number;
  DATABASE_URL: string;
  OPENAI_API_KEY: string;
  NODE_ENV: string;
  OPENAI_EMBEDDING_MODEL: string;
  OPENAI_CHAT_MODEL: string;
  EMBEDDING_TIMEOUT_MS: number;
  SKILL_EXTRACTOR: SkillExtractorKind;
  SKILLS_CONFIG_PATH: string;
  MATCHING: MatchingConfigOverrides;
}

function readRequired(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function readNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be numeric, got "${raw}"`);
  }
  return value;
}

function validateEnv(): EnvConfig {
  const extractor = process.env.SKILL_EXTRACTOR || 'keyword';
  if (extractor !== 'keyword' && extractor !== 'llm') {
    throw new Error(`SKILL_EXTRACTOR must be "keyword" or "llm", got "${extractor}"`);
  }

  return {
    PORT: parseInt(process.env.PORT || '3000', 10),
    DATABASE_URL: readRequired('DATABASE_URL'),
    OPENAI_API_KEY: readRequired('OPENAI_API_KEY'),
    NODE_ENV: process.env.NODE_ENV || 'development',
    OPENAI_EMBEDDING_MODEL: process.env.OPENAI_EMBEDDING_MODEL || 'text-embedding-3-small',
    OPENAI_CHAT_MODEL: process.env.OPENAI_CHAT_MODEL || 'gpt-3.5-turbo',
    EMBEDDING_TIMEOUT_MS: readNumber('EMBEDDING_TIMEOUT_MS') ?? 10000,
    SKILL_EXTRACTOR: extractor,
    SKILLS_CONFIG_PATH: path.resolve(process.env.SKILLS_CONFIG_PATH || path.join('config', 'skills.json')),
    MATCHING: {
      similarityThreshold: readNumber('MATCH_SIMILARITY_THRESHOLD'),
      weakMatchThreshold: readNumber('MATCH_WEAK_THRESHOLD'),
      relevanceWeight: readNumber('MATCH_RELEVANCE_WEIGHT'),
      completenessWeight: readNumber('MATCH_COMPLETENESS_WEIGHT'),
      strongMin: readNumber('MATCH_STRONG_MIN'),
      moderateMin: readNumber('MATCH_MODERATE_MIN'),
      suggestionCap: readNumber('MATCH_SUGGESTION_CAP')
    }
  };
}

export const env = validateEnv();

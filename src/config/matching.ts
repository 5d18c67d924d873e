import { InvalidInputError } from '../utils/errorHandler';

export interface MatchingConfig {
  /** Inclusive lower bound for a JD skill to count as matched. */
  similarityThreshold: number;
  /** Matched skills below this similarity get a "strengthen evidence" suggestion. */
  weakMatchThreshold: number;
  relevanceWeight: number;
  completenessWeight: number;
  strongMin: number;
  moderateMin: number;
  suggestionCap: number;
}

export type MatchingConfigOverrides = Partial<MatchingConfig>;

export const DEFAULT_MATCHING_CONFIG: Readonly<MatchingConfig> = Object.freeze({
  similarityThreshold: 0.75,
  weakMatchThreshold: 0.85,
  relevanceWeight: 0.7,
  completenessWeight: 0.3,
  strongMin: 75,
  moderateMin: 45,
  suggestionCap: 10
});

const CONFIG_KEYS: ReadonlyArray<keyof MatchingConfig> = [
  'similarityThreshold',
  'weakMatchThreshold',
  'relevanceWeight',
  'completenessWeight',
  'strongMin',
  'moderateMin',
  'suggestionCap'
];

function assertFiniteNumber(key: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(`Matching config "${key}" must be a finite number`);
  }
  return value;
}

/**
 * Merges overrides onto a base config and checks the cross-field rules.
 * Unknown keys in `overrides` are rejected so typos in request bodies surface.
 */
export function resolveMatchingConfig(
  overrides: unknown = {},
  base: Readonly<MatchingConfig> = DEFAULT_MATCHING_CONFIG
): MatchingConfig {
  if (overrides === null || typeof overrides !== 'object' || Array.isArray(overrides)) {
    throw new InvalidInputError('Matching config overrides must be an object');
  }

  const config: MatchingConfig = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const configKey = CONFIG_KEYS.find(candidate => candidate === key);
    if (!configKey) {
      throw new InvalidInputError(`Unknown matching config option "${key}"`);
    }
    if (value === undefined) {
      continue;
    }
    config[configKey] = assertFiniteNumber(key, value);
  }

  if (config.similarityThreshold < 0 || config.similarityThreshold > 1) {
    throw new InvalidInputError('similarityThreshold must be within [0, 1]');
  }
  if (config.weakMatchThreshold < config.similarityThreshold || config.weakMatchThreshold > 1) {
    throw new InvalidInputError('weakMatchThreshold must be within [similarityThreshold, 1]');
  }
  if (config.relevanceWeight < 0 || config.completenessWeight < 0) {
    throw new InvalidInputError('Score weights must not be negative');
  }
  if (config.relevanceWeight + config.completenessWeight <= 0) {
    throw new InvalidInputError('Score weights must not both be zero');
  }
  if (config.moderateMin > config.strongMin) {
    throw new InvalidInputError('moderateMin must not exceed strongMin');
  }
  if (!Number.isInteger(config.suggestionCap) || config.suggestionCap < 0) {
    throw new InvalidInputError('suggestionCap must be a non-negative integer');
  }

  return config;
}

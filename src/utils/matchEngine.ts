import { SkillSet } from '../interfaces/domain/Skill';
import { MatchResult } from '../interfaces/domain/MatchResult';
import { MatchingConfig } from '../config/matching';
import { EmptyInputError } from './errorHandler';
import { EmbeddingLookup, match, SkillMatch } from './matcher';
import { calculateMetrics } from './metrics';
import { generateGaps } from './gapGenerator';

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Freezes the array in place and returns it. */
function freezeList<T>(items: T[]): T[] {
  Object.freeze(items);
  return items;
}

export function emptyJobDescriptionResult(): MatchResult {
  const record: MatchResult = {
    matched_skills: freezeList([]),
    missing_skills: freezeList([]),
    match_score: 0,
    relevance_score: 0,
    completeness_score: 0,
    role_fit: 'Weak',
    suggestions: freezeList([])
  };
  return Object.freeze(record);
}

/**
 * Runs matcher, metrics and gap analysis for one resume/JD pair.
 * The returned record is frozen; an empty JD yields the zero-score fallback.
 */
export function evaluateMatch(
  resumeSkills: SkillSet,
  jdSkills: SkillSet,
  embeddingOf: EmbeddingLookup,
  config: MatchingConfig,
  importance?: ReadonlyMap<string, number>
): MatchResult {
  let result: SkillMatch;
  try {
    result = match(resumeSkills, jdSkills, config.similarityThreshold, embeddingOf);
  } catch (error) {
    if (error instanceof EmptyInputError) {
      return emptyJobDescriptionResult();
    }
    throw error;
  }

  const metrics = calculateMetrics(result.matched, resumeSkills.length, jdSkills.length, config);
  const { gaps, suggestions } = generateGaps(result.missing, result.matched, {
    weakMatchThreshold: config.weakMatchThreshold,
    suggestionCap: config.suggestionCap,
    importance
  });

  const record: MatchResult = {
    matched_skills: freezeList(result.matched.map(pair => Object.freeze({
      skill: pair.jdSkill.name,
      matched_with: pair.resumeSkill.name,
      similarity: round(pair.similarity, 4)
    }))),
    missing_skills: freezeList(gaps.map(gap => gap.skill.name)),
    match_score: metrics.score,
    relevance_score: round(metrics.relevance, 2),
    completeness_score: round(metrics.completeness, 2),
    role_fit: metrics.roleFit,
    suggestions: freezeList(suggestions)
  };
  return Object.freeze(record);
}

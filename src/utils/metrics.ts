import { RoleFit, SkillPair } from '../interfaces/domain/MatchResult';
import { MatchingConfig } from '../config/matching';

export interface MatchMetrics {
  relevance: number;
  completeness: number;
  score: number;
  roleFit: RoleFit;
}

/** Share of JD requirements covered, weighted by match similarity. Missing skills add 0. */
export function computeRelevance(matched: readonly SkillPair[], jdSkillCount: number): number {
  if (jdSkillCount === 0) {
    return 0;
  }
  const total = matched.reduce((sum, pair) => sum + pair.similarity, 0);
  return (total / jdSkillCount) * 100;
}

/** Share of resume skills that back at least one matched JD skill. */
export function computeCompleteness(matched: readonly SkillPair[], resumeSkillCount: number): number {
  if (resumeSkillCount === 0) {
    return 0;
  }
  const contributing = new Set(matched.map(pair => pair.resumeSkill.name));
  return (contributing.size / resumeSkillCount) * 100;
}

export function computeOverallScore(
  relevance: number,
  completeness: number,
  weights: Pick<MatchingConfig, 'relevanceWeight' | 'completenessWeight'>
): number {
  const totalWeight = weights.relevanceWeight + weights.completenessWeight;
  if (totalWeight <= 0) {
    return 0;
  }
  const weighted = (weights.relevanceWeight * relevance + weights.completenessWeight * completeness) / totalWeight;
  return Math.min(100, Math.max(0, Math.round(weighted)));
}

export function classifyRoleFit(
  score: number,
  boundaries: Pick<MatchingConfig, 'strongMin' | 'moderateMin'>
): RoleFit {
  if (score >= boundaries.strongMin) {
    return 'Strong';
  }
  if (score >= boundaries.moderateMin) {
    return 'Moderate';
  }
  return 'Weak';
}

export function calculateMetrics(
  matched: readonly SkillPair[],
  resumeSkillCount: number,
  jdSkillCount: number,
  config: MatchingConfig
): MatchMetrics {
  const relevance = computeRelevance(matched, jdSkillCount);
  const completeness = computeCompleteness(matched, resumeSkillCount);
  const score = computeOverallScore(relevance, completeness, config);

  return {
    relevance,
    completeness,
    score,
    roleFit: classifyRoleFit(score, config)
  };
}

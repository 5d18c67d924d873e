import { Skill } from '../interfaces/domain/Skill';
import { SkillGap, SkillPair } from '../interfaces/domain/MatchResult';
import { compareSkillNames } from './skillNormalizer';

export const NEUTRAL_IMPORTANCE = 1;

export interface GapOptions {
  weakMatchThreshold: number;
  suggestionCap: number;
  importance?: ReadonlyMap<string, number>;
}

export interface GapReport {
  gaps: SkillGap[];
  suggestions: string[];
}

function importanceOf(skill: Skill, importance?: ReadonlyMap<string, number>): number {
  return importance?.get(skill.name) ?? NEUTRAL_IMPORTANCE;
}

export function rankGaps(missing: readonly Skill[], importance?: ReadonlyMap<string, number>): SkillGap[] {
  return missing
    .map(skill => ({ skill, importance: importanceOf(skill, importance) }))
    .sort((a, b) => b.importance - a.importance || compareSkillNames(a.skill.name, b.skill.name));
}

/**
 * Gaps first (most important first), then matched skills whose similarity sits
 * below the weak-match threshold. The cap truncates from the tail.
 */
export function generateGaps(
  missing: readonly Skill[],
  matched: readonly SkillPair[],
  options: GapOptions
): GapReport {
  const gaps = rankGaps(missing, options.importance);

  const weakMatches = matched
    .filter(pair => pair.similarity < options.weakMatchThreshold)
    .map(pair => ({ pair, importance: importanceOf(pair.jdSkill, options.importance) }))
    .sort(
      (a, b) =>
        b.importance - a.importance ||
        a.pair.similarity - b.pair.similarity ||
        compareSkillNames(a.pair.jdSkill.name, b.pair.jdSkill.name)
    );

  const suggestions = [
    ...gaps.map(gap => `develop ${gap.skill.name}`),
    ...weakMatches.map(({ pair }) => `strengthen evidence for ${pair.jdSkill.name} in resume`)
  ].slice(0, Math.max(0, options.suggestionCap));

  return { gaps, suggestions };
}

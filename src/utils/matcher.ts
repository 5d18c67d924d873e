import { Embedding, Skill, SkillSet } from '../interfaces/domain/Skill';
import { BestMatch, SkillPair } from '../interfaces/domain/MatchResult';
import { EmbeddingError, EmptyInputError, InvalidInputError } from './errorHandler';
import { cosineSimilarity } from './similarity';
import { compareSkillNames } from './skillNormalizer';

export type EmbeddingLookup = (skillName: string) => Embedding | undefined;

export interface SkillMatch {
  matched: SkillPair[];
  missing: Skill[];
  /** One entry per JD skill, in JD order, whether matched or not. */
  bestMatches: BestMatch[];
}

export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidInputError(`Similarity threshold must be within [0, 1], got ${threshold}`);
  }
}

/**
 * Greedy best match per JD skill. A resume skill may be the best match of several
 * JD skills. Identical names short-circuit to 1.0 without touching embeddings.
 */
export function match(
  resumeSkills: SkillSet,
  jdSkills: SkillSet,
  threshold: number,
  embeddingOf: EmbeddingLookup
): SkillMatch {
  assertThreshold(threshold);
  if (jdSkills.length === 0) {
    throw new EmptyInputError('Job description has no skills to match against');
  }

  const vectorOf = (skill: Skill): Embedding => {
    const vector = embeddingOf(skill.name);
    if (!vector) {
      throw new EmbeddingError(`No embedding available for skill "${skill.name}"`, [skill.name]);
    }
    return vector;
  };

  const resumeByName = new Map(resumeSkills.map(skill => [skill.name, skill]));
  const matched: SkillPair[] = [];
  const missing: Skill[] = [];
  const bestMatches: BestMatch[] = [];

  for (const jdSkill of jdSkills) {
    let best: BestMatch = { jdSkill, resumeSkill: null, similarity: 0 };

    const exact = resumeByName.get(jdSkill.name);
    if (exact) {
      best = { jdSkill, resumeSkill: exact, similarity: 1 };
    } else if (resumeSkills.length > 0) {
      const jdVector = vectorOf(jdSkill);
      let bestSimilarity = -Infinity;
      let bestSkill: Skill | null = null;

      for (const resumeSkill of resumeSkills) {
        const similarity = cosineSimilarity(jdVector, vectorOf(resumeSkill));
        if (
          bestSkill === null ||
          similarity > bestSimilarity ||
          (similarity === bestSimilarity && compareSkillNames(resumeSkill.name, bestSkill.name) < 0)
        ) {
          bestSimilarity = similarity;
          bestSkill = resumeSkill;
        }
      }

      best = { jdSkill, resumeSkill: bestSkill, similarity: bestSimilarity };
    }

    bestMatches.push(best);
    if (best.resumeSkill && best.similarity >= threshold) {
      matched.push({ jdSkill, resumeSkill: best.resumeSkill, similarity: best.similarity });
    } else {
      missing.push(jdSkill);
    }
  }

  return { matched, missing, bestMatches };
}

/**
 * Skill names whose embeddings `match` will ask for. JD skills with an identical
 * resume skill need none; resume skills are needed only if some JD skill does.
 */
export function embeddingsRequiredFor(resumeSkills: SkillSet, jdSkills: SkillSet): string[] {
  if (resumeSkills.length === 0) {
    return [];
  }

  const resumeNames = new Set(resumeSkills.map(skill => skill.name));
  const jdNames = jdSkills.filter(skill => !resumeNames.has(skill.name)).map(skill => skill.name);
  if (jdNames.length === 0) {
    return [];
  }

  return [...jdNames, ...resumeSkills.map(skill => skill.name)];
}

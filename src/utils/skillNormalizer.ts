import { CanonicalMap, Skill, SkillCategory, SkillSet } from '../interfaces/domain/Skill';
import { InvalidInputError } from './errorHandler';
import { logger } from './logger';

export function cleanSkillName(rawName: string): string {
  return rawName
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}+.#/&()\s-]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\s([#+]+)$/, '$1');
}

export interface NormalizeOptions {
  categories?: ReadonlyMap<string, SkillCategory>;
}

/**
 * Maps raw skill strings onto the canonical vocabulary.
 *
 * A cleaned entry that already equals a canonical name is kept as-is, so feeding
 * the names of a normalized set back in yields the same set. Entries that resolve
 * nowhere keep their cleaned form and are flagged `canonical: false`.
 */
export function normalize(
  rawSkills: unknown,
  canonicalMap: CanonicalMap,
  options: NormalizeOptions = {}
): SkillSet {
  if (!Array.isArray(rawSkills)) {
    throw new InvalidInputError('Skills must be provided as an array of strings');
  }
  if (rawSkills.length === 0) {
    return Object.freeze([]);
  }

  const synonyms = new Map<string, string>();
  const canonicalNames = new Set<string>();
  for (const [synonym, target] of Object.entries(canonicalMap)) {
    const canonical = cleanSkillName(target);
    if (!canonical) {
      continue;
    }
    canonicalNames.add(canonical);
    synonyms.set(cleanSkillName(synonym), canonical);
  }
  for (const name of options.categories?.keys() ?? []) {
    canonicalNames.add(name);
  }

  const skills = new Map<string, Skill>();
  for (const entry of rawSkills) {
    if (typeof entry !== 'string') {
      logger.warn('Skipping non-string skill entry', { entry });
      continue;
    }

    const cleaned = cleanSkillName(entry);
    if (!cleaned) {
      continue;
    }

    let name = cleaned;
    let canonical = canonicalNames.has(cleaned);
    if (!canonical) {
      const resolved = synonyms.get(cleaned);
      if (resolved) {
        name = resolved;
        canonical = true;
      }
    }

    if (skills.has(name)) {
      continue;
    }

    const category = options.categories?.get(name);
    skills.set(name, Object.freeze(category ? { name, category, canonical } : { name, canonical }));
  }

  if (skills.size === 0) {
    throw new InvalidInputError('No usable skills remained after cleaning');
  }

  return Object.freeze(Array.from(skills.values()));
}

export function skillNames(skills: SkillSet): string[] {
  return skills.map(skill => skill.name);
}

/** Plain code-unit ordering, independent of locale. */
export function compareSkillNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

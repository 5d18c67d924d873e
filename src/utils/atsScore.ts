import { termPattern } from './skillExtractor';
import { logger } from './logger';

export const ATS_SECTIONS = ['skills', 'experience', 'education', 'certifications', 'publications', 'projects'] as const;

const OPTIMAL_WORD_COUNT = { min: 200, max: 1000 };
const MAX_HEADING_WORDS = 3;

const WEIGHTS = {
  keywordDensity: 0.5,
  sections: 0.3,
  formatting: 0.2
};

export interface AtsReport {
  ats_score: number;
  /** Share of JD skills that appear verbatim in the resume text, 0..1. */
  keyword_density: number;
  sections: string[];
  word_count: number;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Short lines naming a standard resume section, e.g. "Skills:" or "Work Experience".
 * Singular forms count too.
 */
export function detectSections(text: string): string[] {
  const found = new Set<string>();

  for (const line of text.split(/\r?\n/)) {
    const words = line
      .toLowerCase()
      .replace(/[^\p{L}\s]/gu, ' ')
      .split(/\s+/)
      .filter(Boolean);
    if (words.length === 0 || words.length > MAX_HEADING_WORDS) {
      continue;
    }

    for (const section of ATS_SECTIONS) {
      if (words.includes(section) || words.includes(section.replace(/s$/, ''))) {
        found.add(section);
      }
    }
  }

  return ATS_SECTIONS.filter(section => found.has(section));
}

export function keywordDensity(text: string, jdSkillNames: readonly string[]): number {
  if (jdSkillNames.length === 0) {
    return 0;
  }
  const haystack = text.toLowerCase();
  const present = jdSkillNames.filter(name => termPattern(name).test(haystack));
  return present.length / jdSkillNames.length;
}

/**
 * ATS compatibility of a plain-text resume: keyword density against the JD skills,
 * presence of standard sections, and a word count inside the usual one-to-two page range.
 */
export function computeAtsScore(text: string, jdSkillNames: readonly string[]): AtsReport {
  const wordCount = countWords(text);
  const density = keywordDensity(text, jdSkillNames);
  const sections = detectSections(text);
  const sectionShare = sections.length / ATS_SECTIONS.length;
  const formatting = wordCount >= OPTIMAL_WORD_COUNT.min && wordCount <= OPTIMAL_WORD_COUNT.max ? 1 : 0.5;

  const raw = density * WEIGHTS.keywordDensity + sectionShare * WEIGHTS.sections + formatting * WEIGHTS.formatting;
  const score = Math.round(raw * 100 * 100) / 100;

  logger.debug('ATS score components', { density, sectionShare, formatting });

  return {
    ats_score: score,
    keyword_density: Math.round(density * 10000) / 10000,
    sections,
    word_count: wordCount
  };
}

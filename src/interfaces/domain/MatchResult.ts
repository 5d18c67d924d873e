import { Skill } from './Skill';

export type RoleFit = 'Strong' | 'Moderate' | 'Weak';

export interface SkillPair {
  jdSkill: Skill;
  resumeSkill: Skill;
  similarity: number;
}

export interface BestMatch {
  jdSkill: Skill;
  resumeSkill: Skill | null;
  similarity: number;
}

export interface SkillGap {
  skill: Skill;
  importance: number;
}

export interface MatchedSkillEntry {
  skill: string;
  matched_with: string;
  similarity: number;
}

/**
 * Public result of comparing one resume with one job description.
 * Field names are consumed as-is by downstream persistence and API clients.
 */
export interface MatchResult {
  matched_skills: MatchedSkillEntry[];
  missing_skills: string[];
  match_score: number;
  relevance_score: number;
  completeness_score: number;
  role_fit: RoleFit;
  suggestions: string[];
}

export type MatchOutcome =
  | { id: string; status: 'ok'; record: MatchResult; matchId?: string }
  | { id: string; status: 'failed'; error: { type: string; message: string; skills?: string[] } };

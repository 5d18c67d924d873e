export type SkillCategory = 'technical' | 'soft';

export interface Skill {
  readonly name: string;
  readonly category?: SkillCategory;
  /** False when the name did not resolve to a catalog vocabulary term. */
  readonly canonical: boolean;
}

/** Ordered, duplicate-free skills of one document. */
export type SkillSet = readonly Skill[];

export type Embedding = readonly number[];

/** Synonym (cleaned) → canonical skill name. */
export type CanonicalMap = Readonly<Record<string, string>>;

export interface SkillCatalog {
  canonicalMap: CanonicalMap;
  categories: ReadonlyMap<string, SkillCategory>;
  importance: ReadonlyMap<string, number>;
}

import fs from 'fs';
import { SkillCatalog, SkillCategory } from '../interfaces/domain/Skill';
import { cleanSkillName } from './skillNormalizer';
import { logger } from './logger';

interface SkillCatalogFile {
  categories: Partial<Record<SkillCategory, string[]>>;
  synonyms: Record<string, string>;
  importance: Record<string, number>;
}

const CATEGORY_KEYS: readonly SkillCategory[] = ['technical', 'soft'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, label: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) {
    throw new Error(`Skill catalog "${label}" must be an array of strings`);
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function parseCatalogFile(raw: unknown): SkillCatalogFile {
  if (!isRecord(raw)) {
    throw new Error('Skill catalog must be a JSON object');
  }

  const parsed: SkillCatalogFile = { categories: {}, synonyms: {}, importance: {} };
  const { categories, synonyms, importance } = parsed;

  if (raw.categories !== undefined) {
    if (!isRecord(raw.categories)) {
      throw new Error('Skill catalog "categories" must be an object');
    }
    for (const category of CATEGORY_KEYS) {
      categories[category] = readStringList(raw.categories[category], `categories.${category}`);
    }
  }

  if (raw.synonyms !== undefined) {
    if (!isRecord(raw.synonyms)) {
      throw new Error('Skill catalog "synonyms" must be an object');
    }
    for (const [synonym, target] of Object.entries(raw.synonyms)) {
      if (typeof target !== 'string') {
        throw new Error(`Skill catalog synonym "${synonym}" must map to a string`);
      }
      synonyms[synonym] = target;
    }
  }

  if (raw.importance !== undefined) {
    if (!isRecord(raw.importance)) {
      throw new Error('Skill catalog "importance" must be an object');
    }
    for (const [skill, weight] of Object.entries(raw.importance)) {
      if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
        throw new Error(`Skill catalog importance for "${skill}" must be a non-negative number`);
      }
      importance[skill] = weight;
    }
  }

  return parsed;
}

export function buildSkillCatalog(raw: unknown): SkillCatalog {
  const file = parseCatalogFile(raw);

  const categories = new Map<string, SkillCategory>();
  for (const category of CATEGORY_KEYS) {
    for (const name of file.categories[category] ?? []) {
      const cleaned = cleanSkillName(name);
      if (cleaned && !categories.has(cleaned)) {
        categories.set(cleaned, category);
      }
    }
  }

  const canonicalMap: Record<string, string> = {};
  for (const [synonym, target] of Object.entries(file.synonyms)) {
    const cleanedSynonym = cleanSkillName(synonym);
    const cleanedTarget = cleanSkillName(target);
    if (!cleanedSynonym || !cleanedTarget) {
      continue;
    }
    if (categories.has(cleanedSynonym)) {
      logger.warn('Ignoring synonym that shadows a canonical skill', { synonym: cleanedSynonym });
      continue;
    }
    canonicalMap[cleanedSynonym] = cleanedTarget;
  }

  const importance = new Map<string, number>();
  for (const [name, weight] of Object.entries(file.importance)) {
    const cleaned = cleanSkillName(name);
    if (cleaned) {
      importance.set(cleaned, weight);
    }
  }

  return {
    canonicalMap: Object.freeze(canonicalMap),
    categories,
    importance
  };
}

export function loadSkillCatalog(filePath: string): SkillCatalog {
  const content = fs.readFileSync(filePath, 'utf-8');
  const catalog = buildSkillCatalog(JSON.parse(content));
  logger.info('Loaded skill catalog', {
    filePath,
    skills: catalog.categories.size,
    synonyms: Object.keys(catalog.canonicalMap).length
  });
  return catalog;
}

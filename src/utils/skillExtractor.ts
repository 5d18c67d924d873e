import OpenAI from 'openai';
import { SkillCatalog } from '../interfaces/domain/Skill';
import { cleanSkillName } from './skillNormalizer';
import { toRetrievalError } from './embedding';
import { AppError } from './errorHandler';
import { logger } from './logger';

export type DocumentType = 'job_description' | 'resume';

/** Pluggable text → raw skill strings step; normalization happens afterwards. */
export interface SkillExtractor {
  extract(text: string, documentType: DocumentType): Promise<string[]>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/** Matches a lowercase term as a whole word in lowercased text. */
export function termPattern(term: string): RegExp {
  return new RegExp(
    `(?<![\\p{L}\\p{N}.])${escapeRegExp(term).replace(/ /g, '\\s+')}(?![\\p{L}\\p{N}]|\\.[\\p{L}\\p{N}])`,
    'u'
  );
}

/**
 * Finds catalog vocabulary terms and synonyms in the text. A term only counts
 * when it is not glued to other letters or digits in any script, so "go" is not
 * found in "google" and neither "node" nor "js" is found in "node.js".
 */
export class KeywordSkillExtractor implements SkillExtractor {
  private patterns: Array<{ term: string; pattern: RegExp }>;

  constructor(catalog: SkillCatalog) {
    const terms = new Set<string>([
      ...catalog.categories.keys(),
      ...Object.keys(catalog.canonicalMap),
      ...Object.values(catalog.canonicalMap)
    ]);

    this.patterns = Array.from(terms).map(term => ({ term, pattern: termPattern(term) }));
  }

  async extract(text: string): Promise<string[]> {
    const haystack = (text || '').toLowerCase();
    if (!haystack.trim()) {
      return [];
    }

    const found: Array<{ term: string; position: number }> = [];
    for (const { term, pattern } of this.patterns) {
      const hit = pattern.exec(haystack);
      if (hit) {
        found.push({ term, position: hit.index });
      }
    }

    return found
      .sort((a, b) => a.position - b.position || b.term.length - a.term.length)
      .map(entry => entry.term);
  }
}

interface SkillExtractionModelSkill {
  name: string;
  normalized_name?: string;
}

const MAX_DOCUMENT_CHARS = 9000;
const MIN_TEXT_LENGTH = 80;
const MAX_SKILL_RESULTS = 30;
const MAX_MODEL_RETRIES = 1;
const MAX_VOCABULARY_HINT = 200;

const SYSTEM_PROMPT = `You are an Applicant Tracking System (ATS) focused on extracting skills from talent documents.
- You receive either a job description or a resume and must analyse it carefully.
- Identify concrete technical skills, tools, technologies, methodologies and soft skills that materially affect the job.
- Ignore personal traits, company names, locations, dates, compensation, or education details unless explicitly tied to a skill.
- Prefer the canonical skill names listed in the user prompt when a skill is a synonym of one of them.
- Return STRICT JSON using the schema shared in the user prompt.
- Be concise and avoid inventing skills that are not clearly supported by the document.`;

function buildUserPrompt(documentType: DocumentType, text: string, vocabulary: string[], attempt: number): string {
  const retryNotice = attempt > 0
    ? `IMPORTANT: Your previous response was invalid JSON. This time you MUST respond with valid JSON only, no commentary. Keep the response concise.`
    : '';

  return `${retryNotice ? retryNotice + '\n\n' : ''}Document type: ${documentType}

Canonical skill names: ${vocabulary.join(', ')}

Read the document text and output ONLY valid JSON with the following schema:
{
  "document_type": "job_description" | "resume",
  "skills": [
    {
      "name": string,                 // skill as mentioned
      "normalized_name": string,      // canonical name when one applies, else lowercase name
      "category": "technical" | "soft"
    }
  ]
}
Rules:
- The skills list must be empty if no skills are clearly present.
- Do not repeat the same skill with different casing.
- Return at most ${MAX_SKILL_RESULTS} skills.

Document text:
"""
${text}
"""`;
}

function truncateForPrompt(text: string): string {
  if (text.length <= MAX_DOCUMENT_CHARS) {
    return text;
  }
  return text.slice(0, MAX_DOCUMENT_CHARS);
}

function stripCodeFence(content: string): string {
  return content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/```$/, '')
    .trim();
}

function isModelSkill(value: unknown): value is SkillExtractionModelSkill {
  if (typeof value !== 'object' || value === null || !('name' in value) || typeof value.name !== 'string') {
    return false;
  }
  if ('normalized_name' in value && value.normalized_name !== undefined && typeof value.normalized_name !== 'string') {
    return false;
  }
  return true;
}

function readModelSkills(parsed: unknown): SkillExtractionModelSkill[] {
  if (typeof parsed !== 'object' || parsed === null || !('skills' in parsed) || !Array.isArray(parsed.skills)) {
    throw new SyntaxError('Skill extraction response has no "skills" array');
  }
  const skills: unknown[] = parsed.skills;
  return skills.filter(isModelSkill);
}

export interface OpenAISkillExtractorOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface ExtractionPrompt {
  system: string;
  user: string;
}

/** One chat completion; resolves with the message content, if any. */
export type CompletionRequest = (prompt: ExtractionPrompt) => Promise<string | null | undefined>;

function openAICompletion(options: OpenAISkillExtractorOptions): CompletionRequest {
  const openai = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });

  return async prompt => {
    const completion = await openai.chat.completions.create({
      model: options.model,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user }
      ],
      temperature: 0,
      max_tokens: 1200
    });
    return completion.choices[0]?.message?.content;
  };
}

export class OpenAISkillExtractor implements SkillExtractor {
  private complete: CompletionRequest;
  private vocabulary: string[];

  constructor(options: OpenAISkillExtractorOptions, catalog: SkillCatalog, complete?: CompletionRequest) {
    this.complete = complete ?? openAICompletion(options);
    this.vocabulary = Array.from(catalog.categories.keys()).slice(0, MAX_VOCABULARY_HINT);
  }

  async extract(text: string, documentType: DocumentType): Promise<string[]> {
    const trimmed = (text || '').trim();
    if (trimmed.length < MIN_TEXT_LENGTH) {
      return [];
    }

    const skills = await this.callModel(documentType, truncateForPrompt(trimmed), 0);
    const names: string[] = [];
    const seen = new Set<string>();

    for (const skill of skills.slice(0, MAX_SKILL_RESULTS)) {
      const name = (skill.normalized_name || skill.name).trim();
      const key = cleanSkillName(name);
      if (!key || seen.has(key)) {
        continue;
      }
      seen.add(key);
      names.push(name);
    }

    return names;
  }

  private async callModel(
    documentType: DocumentType,
    text: string,
    attempt: number
  ): Promise<SkillExtractionModelSkill[]> {
    let content: string | null | undefined;
    try {
      content = await this.complete({
        system: SYSTEM_PROMPT,
        user: buildUserPrompt(documentType, text, this.vocabulary, attempt)
      });
    } catch (error) {
      throw toRetrievalError(error, [], 'Skill extraction service');
    }

    if (!content) {
      throw new AppError('Skill extraction model returned empty response', 502);
    }

    try {
      return readModelSkills(JSON.parse(stripCodeFence(content)));
    } catch (error) {
      logger.error('Failed to parse skill extraction response', { error, attempt });
      if (attempt < MAX_MODEL_RETRIES) {
        return this.callModel(documentType, text, attempt + 1);
      }
      throw new AppError('Unable to parse skill extraction response', 502);
    }
  }
}

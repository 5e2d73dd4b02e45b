import { z } from 'zod';
import vocabularyData from '../data/skill-vocabulary.json' with { type: 'json' };
import type { JobDescription } from './types.js';

const SkillEntrySchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  synonyms: z.array(z.string().min(1)).min(1),
});

export type SkillEntry = z.infer<typeof SkillEntrySchema>;

const DEFAULT_VOCABULARY: readonly SkillEntry[] = z.array(SkillEntrySchema).parse(vocabularyData);

const TITLE_LABEL = /^(?:job\s+title|title|position|role)\s*:\s*(.+)$/i;
const COMPANY_LABEL = /^(?:company(?:\s+name)?|employer|organization)\s*:\s*(.+)$/i;
const AT_COMPANY = /\s+at\s+([A-Z][\w&.'-]*(?:\s+[A-Z][\w&.'-]*)*)\s*$/;
const MAX_TITLE_CHARS = 80;
const MAX_TITLE_WORDS = 10;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

interface CompiledSkill {
  name: string;
  patterns: RegExp[];
}

function compile(vocabulary: readonly SkillEntry[]): CompiledSkill[] {
  return vocabulary.map((entry) => ({
    name: entry.name,
    // Alphanumeric lookarounds instead of \b so "c++" and "c#" still match
    patterns: entry.synonyms.map(
      (syn) => new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(syn)}(?![A-Za-z0-9])`, 'i'),
    ),
  }));
}

const DEFAULT_COMPILED = compile(DEFAULT_VOCABULARY);

/** Canonical names of every vocabulary skill mentioned in `text`, sorted. */
export function extractSkills(text: string, vocabulary?: readonly SkillEntry[]): string[] {
  const compiled = vocabulary ? compile(vocabulary) : DEFAULT_COMPILED;
  const found = new Set<string>();
  for (const skill of compiled) {
    if (skill.patterns.some((pattern) => pattern.test(text))) found.add(skill.name);
  }
  return [...found].sort((a, b) => a.localeCompare(b));
}

function splitTitleLine(line: string): { title: string; company?: string } {
  const at = AT_COMPANY.exec(line);
  if (!at) return { title: line };
  return { title: line.slice(0, at.index).trim(), company: at[1] };
}

/**
 * Derive title, company and required skills from job-description text.
 * Fields the caller already supplied are kept as they are.
 */
export function analyzeJobDescription(
  text: string,
  known: { title?: string; company?: string } = {},
  vocabulary?: readonly SkillEntry[],
): JobDescription {
  const lines = text.replace(/\r\n?/g, '\n').split('\n').map((l) => l.trim()).filter(Boolean);

  let title: string | undefined;
  let company: string | undefined;

  for (const line of lines) {
    const titleMatch = TITLE_LABEL.exec(line);
    if (titleMatch && !title) title = titleMatch[1].trim();
    const companyMatch = COMPANY_LABEL.exec(line);
    if (companyMatch && !company) company = companyMatch[1].trim();
  }

  const first = lines[0];
  if (
    !title
    && first
    && !COMPANY_LABEL.test(first)
    && first.length <= MAX_TITLE_CHARS
    && first.split(/\s+/).length <= MAX_TITLE_WORDS
    && !/[.:]$/.test(first)
  ) {
    const split = splitTitleLine(first);
    title = split.title;
    company ??= split.company;
  } else if (title && !company) {
    const split = splitTitleLine(title);
    title = split.title;
    company = split.company;
  }

  return {
    text,
    title: known.title?.trim() || title || undefined,
    company: known.company?.trim() || company || undefined,
    requiredSkills: extractSkills(text, vocabulary),
  };
}

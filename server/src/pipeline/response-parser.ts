/**
 * Response Parser: the single place where raw model text becomes a
 * TailoredResult. Anything incomplete is rejected with a ParseError; nothing
 * is filled in or cut down to make it fit.
 */

import type { z } from 'zod';
import { cleanModelText } from '../lib/clean-text.js';
import type { ParserPolicy } from '../lib/config.js';
import { ParseError, type ParseFailureReason } from '../lib/errors.js';
import { deepFreeze } from '../lib/freeze.js';
import { repairJSON } from '../lib/json-repair.js';
import {
  AnswersOutputSchema,
  CoverLetterOutputSchema,
  TailoredResumeOutputSchema,
} from './schemas.js';
import {
  isEntryEmpty,
  type CoverLetter,
  type ModelResponse,
  type QuestionAnswers,
  type Resume,
  type ResumeEntry,
  type ResumeSection,
  type TailoredResult,
  type TailoredResume,
} from './types.js';

export type SuccessfulModelResponse = Extract<ModelResponse, { ok: true }>;

/** What the parser checks the output against, per task. */
export type ParseExpectation =
  | { taskKind: 'TAILOR_RESUME'; resume: Resume }
  | { taskKind: 'COVER_LETTER' }
  | { taskKind: 'ANSWER_QUESTIONS'; questions: readonly string[] };

export type ParseOutcome =
  | { ok: true; result: TailoredResult }
  | { ok: false; error: ParseError };

class Rejection {
  constructor(readonly reason: ParseFailureReason, readonly detail: string) {}
}

function reject(reason: ParseFailureReason, detail: string): never {
  throw new Rejection(reason, detail);
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    reject('schema_mismatch', `${path}: ${issue.message}`);
  }
  return parsed.data;
}

function cleanOptional(value: string | null | undefined): string | undefined {
  const cleaned = cleanModelText(value ?? '');
  return cleaned || undefined;
}

function requiredText(value: string | null | undefined, field: string): string {
  const cleaned = cleanModelText(value ?? '');
  if (!cleaned) reject('missing_field', `"${field}" is missing or empty`);
  return cleaned;
}

// ─── TAILOR_RESUME ───────────────────────────────────────────────────

function parseTailoredResume(value: unknown, resume: Resume, policy: ParserPolicy): TailoredResume {
  const output = validate(TailoredResumeOutputSchema, value);

  const byId = new Map<string, (typeof output.sections)[number]>();
  for (const section of output.sections) {
    const id = section.id.trim();
    if (byId.has(id)) reject('duplicate_sections', `section "${id}" appears more than once`);
    byId.set(id, section);
  }

  const inputIds = new Set(resume.sections.map((s) => s.id));
  const missing = resume.sections.map((s) => s.id).filter((id) => !byId.has(id));
  if (missing.length > 0) reject('missing_sections', `missing section ids: ${missing.join(', ')}`);

  const extra = [...byId.keys()].filter((id) => !inputIds.has(id));
  if (extra.length > 0 && !policy.allowExtraSections) {
    reject('unexpected_sections', `unknown section ids: ${extra.join(', ')}`);
  }

  const buildSection = (id: string, title: string): ResumeSection => {
    const source = byId.get(id);
    const rawEntries = source?.entries ?? [];
    if (rawEntries.length === 0) reject('empty_section', `section "${id}" has no entries`);

    const entries = rawEntries.map((raw, index): ResumeEntry => {
      const entry: ResumeEntry = {
        title: cleanOptional(raw.title),
        organization: cleanOptional(raw.organization),
        period: cleanOptional(raw.period),
        summary: cleanOptional(raw.summary),
        highlights: (raw.highlights ?? []).map((h) => cleanModelText(h)).filter(Boolean),
      };
      if (isEntryEmpty(entry)) reject('empty_entry', `section "${id}" entry ${index + 1} is empty`);
      return entry;
    });
    return { id, title, entries };
  };

  const sections = resume.sections.map((s) => buildSection(s.id, s.title));
  for (const id of extra) {
    sections.push(buildSection(id, cleanModelText(byId.get(id)?.title ?? '') || id));
  }

  return { kind: 'TAILOR_RESUME', contact: resume.contact, sections };
}

// ─── COVER_LETTER ────────────────────────────────────────────────────

function parseCoverLetter(value: unknown, policy: ParserPolicy): CoverLetter {
  const output = validate(CoverLetterOutputSchema, value);

  const greeting = requiredText(output.greeting, 'greeting');
  const paragraphs = (output.paragraphs ?? [])
    .flatMap((p) => cleanModelText(p).split(/\n{2,}/))
    .map((p) => p.trim())
    .filter(Boolean);
  if (paragraphs.length === 0) reject('missing_field', '"paragraphs" is missing or empty');
  const closing = requiredText(output.closing, 'closing');
  const signature = requiredText(output.signature, 'signature');

  const bodyChars = paragraphs.reduce((sum, p) => sum + p.length, 0);
  if (paragraphs.length < policy.coverLetterMinParagraphs) {
    reject('body_too_short', `${paragraphs.length} paragraph(s), need at least ${policy.coverLetterMinParagraphs}`);
  }
  if (bodyChars < policy.coverLetterMinBodyChars) {
    reject('body_too_short', `${bodyChars} body characters, need at least ${policy.coverLetterMinBodyChars}`);
  }

  return { kind: 'COVER_LETTER', greeting, paragraphs, closing, signature };
}

// ─── ANSWER_QUESTIONS ────────────────────────────────────────────────

function parseAnswers(value: unknown, questions: readonly string[], policy: ParserPolicy): QuestionAnswers {
  const output = validate(AnswersOutputSchema, value);

  if (output.answers.length !== questions.length) {
    reject('answer_count_mismatch', `expected ${questions.length} answers, got ${output.answers.length}`);
  }

  const answers = output.answers.map((raw, index) => {
    const answer = cleanModelText(typeof raw === 'string' ? raw : raw.answer ?? '');
    if (answer.length < policy.minAnswerChars) reject('empty_answer', `answer ${index + 1} is empty or too short`);
    return { question: questions[index].trim(), answer };
  });

  return { kind: 'ANSWER_QUESTIONS', answers };
}

// ─── Entry point ─────────────────────────────────────────────────────

function decode(value: unknown, expectation: ParseExpectation, policy: ParserPolicy): TailoredResult {
  switch (expectation.taskKind) {
    case 'TAILOR_RESUME':
      return parseTailoredResume(value, expectation.resume, policy);
    case 'COVER_LETTER':
      return parseCoverLetter(value, policy);
    case 'ANSWER_QUESTIONS':
      return parseAnswers(value, expectation.questions, policy);
  }
}

export function parseModelResponse(
  response: SuccessfulModelResponse,
  expectation: ParseExpectation,
  policy: ParserPolicy,
): ParseOutcome {
  const raw = response.text;
  try {
    if (response.truncated) reject('truncated', 'model output stopped at the token limit');

    const value = repairJSON(raw);
    if (value === null) reject('invalid_json', 'no parseable JSON object in model output');
    if (typeof value !== 'object' || Array.isArray(value)) {
      reject('schema_mismatch', '(root): expected a JSON object');
    }

    const result = decode(value, expectation, policy);
    return { ok: true, result: deepFreeze(result) };
  } catch (err) {
    if (err instanceof Rejection) {
      return { ok: false, error: new ParseError(err.reason, err.detail, raw) };
    }
    throw err;
  }
}

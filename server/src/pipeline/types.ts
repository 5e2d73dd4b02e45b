/**
 * Document model for the tailoring pipeline.
 *
 * Everything here is plain data. Values handed between stages are frozen
 * and never mutated after creation.
 */

// ─── Task and format enumerations ────────────────────────────────────

export const TASK_KINDS = ['TAILOR_RESUME', 'COVER_LETTER', 'ANSWER_QUESTIONS'] as const;
export type TaskKind = (typeof TASK_KINDS)[number];

export const OUTPUT_FORMATS = ['STRUCTURED', 'TEXT', 'DOCUMENT'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

// ─── Resume ──────────────────────────────────────────────────────────

export interface Contact {
  name: string;
  email?: string;
  phone?: string;
  location?: string;
  links: string[];
}

export interface ResumeEntry {
  title?: string;
  organization?: string;
  period?: string;
  summary?: string;
  highlights: string[];
}

/** Section ids are plain identifiers; they reach the prompt verbatim. */
export const SECTION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface ResumeSection {
  /** Stable slug, unique within a resume (e.g. `experience`). */
  id: string;
  title: string;
  entries: ResumeEntry[];
}

export interface Resume {
  contact: Contact;
  sections: ResumeSection[];
}

// ─── Job description ─────────────────────────────────────────────────

export interface JobDescription {
  text: string;
  title?: string;
  company?: string;
  /** De-duplicated and sorted. */
  requiredSkills: string[];
}

// ─── Model request / response ────────────────────────────────────────

export interface GenerationOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface ModelRequest {
  taskKind: TaskKind;
  system: string;
  prompt: string;
  params: {
    maxTokens: number;
    temperature: number;
  };
}

export type ModelFailureKind = 'transient' | 'permanent' | 'deadline_exceeded' | 'cancelled';

export interface ModelFailure {
  kind: ModelFailureKind;
  reason: string;
  attempts: number;
  status?: number;
}

export type ModelResponse =
  | { ok: true; text: string; truncated: boolean; attempts: number }
  | { ok: false; failure: ModelFailure };

// ─── Tailored results ────────────────────────────────────────────────

export interface TailoredResume {
  kind: 'TAILOR_RESUME';
  contact: Contact;
  sections: ResumeSection[];
}

export interface CoverLetter {
  kind: 'COVER_LETTER';
  greeting: string;
  paragraphs: string[];
  closing: string;
  signature: string;
}

export interface QuestionAnswer {
  question: string;
  answer: string;
}

export interface QuestionAnswers {
  kind: 'ANSWER_QUESTIONS';
  answers: QuestionAnswer[];
}

export type TailoredResult = TailoredResume | CoverLetter | QuestionAnswers;

// ─── Rendered output ─────────────────────────────────────────────────

export const CONTENT_TYPES: Record<OutputFormat, string> = {
  STRUCTURED: 'application/json',
  TEXT: 'text/plain; charset=utf-8',
  DOCUMENT: 'application/pdf',
};

export interface RenderedOutput {
  format: OutputFormat;
  contentType: string;
  body: Uint8Array;
}

// ─── Normalized pipeline input ───────────────────────────────────────

export interface GenerationInput {
  taskKind: TaskKind;
  format: OutputFormat;
  resume: Resume;
  jobDescription: JobDescription;
  /** Only meaningful for ANSWER_QUESTIONS. */
  questions: string[];
  options: GenerationOptions;
}

export function isEntryEmpty(entry: ResumeEntry): boolean {
  return (
    !entry.title?.trim()
    && !entry.organization?.trim()
    && !entry.period?.trim()
    && !entry.summary?.trim()
    && entry.highlights.every((h) => !h.trim())
  );
}


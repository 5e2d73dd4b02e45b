/**
 * Zod schemas for inbound generation requests and for model output.
 *
 * Model-output schemas only pin down the JSON shape. Field presence and
 * emptiness are checked by the response parser, which reports the specific
 * failure reason.
 */

import { z } from 'zod';
import { OUTPUT_FORMATS, SECTION_ID_PATTERN, TASK_KINDS } from './types.js';

const MAX_TEXT_CHARS = 100_000;
const MAX_QUESTIONS = 25;

// ─── Inbound request ─────────────────────────────────────────────────

const upperCased = z.string().transform((v) => v.trim().toUpperCase());

export const TaskKindSchema = upperCased.pipe(z.enum(TASK_KINDS));
export const OutputFormatSchema = upperCased.pipe(z.enum(OUTPUT_FORMATS));

export const ContactSchema = z.object({
  name: z.string().trim().min(1, 'contact name is required'),
  email: z.string().trim().optional(),
  phone: z.string().trim().optional(),
  location: z.string().trim().optional(),
  links: z.array(z.string().trim()).optional().default([]),
});

export const ResumeEntrySchema = z.object({
  title: z.string().optional(),
  organization: z.string().optional(),
  period: z.string().optional(),
  summary: z.string().optional(),
  highlights: z.array(z.string()).optional().default([]),
});

export const ResumeSectionSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1, 'section id is required')
    .regex(SECTION_ID_PATTERN, 'section id must be letters, digits, ".", "_" or "-"'),
  title: z.string().trim().min(1, 'section title is required'),
  entries: z.array(ResumeEntrySchema),
});

export const ResumeSchema = z.object({
  contact: ContactSchema,
  sections: z.array(ResumeSectionSchema),
});

export const JobDescriptionInputSchema = z.union([
  z.string().max(MAX_TEXT_CHARS),
  z.object({
    text: z.string().max(MAX_TEXT_CHARS),
    title: z.string().optional(),
    company: z.string().optional(),
  }),
]);

/** Longest deadline a request may ask for. */
export const MAX_DEADLINE_MS = 600_000;

export const GenerationOptionsSchema = z.object({
  max_tokens: z.number().int().positive().max(64_000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  deadline_ms: z.number().int().positive().max(MAX_DEADLINE_MS).optional(),
});

export const GenerationRequestSchema = z.object({
  task: TaskKindSchema,
  format: OutputFormatSchema.optional().default('STRUCTURED'),
  resume: z.union([z.string().max(MAX_TEXT_CHARS), ResumeSchema]),
  job_description: JobDescriptionInputSchema,
  questions: z.array(z.string().max(2_000)).max(MAX_QUESTIONS).optional().default([]),
  options: GenerationOptionsSchema.optional().default({}),
});

export type GenerationRequestBody = z.input<typeof GenerationRequestSchema>;
export type GenerationRequest = z.output<typeof GenerationRequestSchema>;

// ─── Model output ────────────────────────────────────────────────────

const modelText = z.string().nullish();

export const TailoredEntryOutputSchema = z.object({
  title: modelText,
  organization: modelText,
  period: modelText,
  summary: modelText,
  highlights: z.array(z.string()).nullish(),
}).passthrough();

export const TailoredResumeOutputSchema = z.object({
  sections: z.array(z.object({
    id: z.string(),
    title: modelText,
    entries: z.array(TailoredEntryOutputSchema).nullish(),
  }).passthrough()),
}).passthrough();

export type TailoredResumeOutput = z.infer<typeof TailoredResumeOutputSchema>;

export const CoverLetterOutputSchema = z.object({
  greeting: modelText,
  paragraphs: z.array(z.string()).nullish(),
  closing: modelText,
  signature: modelText,
}).passthrough();

export type CoverLetterOutput = z.infer<typeof CoverLetterOutputSchema>;

export const AnswersOutputSchema = z.object({
  answers: z.array(z.union([
    z.string(),
    z.object({ question: modelText, answer: modelText }).passthrough(),
  ])),
}).passthrough();

export type AnswersOutput = z.infer<typeof AnswersOutputSchema>;

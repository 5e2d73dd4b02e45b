import { createHash } from 'node:crypto';
import type { GenerationInput, Resume } from './types.js';

function normalizeResume(resume: Resume) {
  return {
    contact: {
      name: resume.contact.name,
      email: resume.contact.email ?? '',
      phone: resume.contact.phone ?? '',
      location: resume.contact.location ?? '',
      links: [...resume.contact.links],
    },
    // Section and entry order feed the prompt, so they stay as given
    sections: resume.sections.map((section) => ({
      id: section.id,
      title: section.title,
      entries: section.entries.map((entry) => ({
        title: entry.title ?? '',
        organization: entry.organization ?? '',
        period: entry.period ?? '',
        summary: entry.summary ?? '',
        highlights: [...entry.highlights],
      })),
    })),
  };
}

/**
 * SHA-256 over the fields that define a generation request.
 * Key order is fixed by construction, so two requests differing only in
 * JSON key order or absent-versus-empty optional fields hash identically.
 * Per-caller settings such as the deadline are not part of it.
 */
export function computeFingerprint(input: GenerationInput): string {
  const payload = JSON.stringify([
    input.taskKind,
    input.format,
    normalizeResume(input.resume),
    {
      text: input.jobDescription.text,
      title: input.jobDescription.title ?? '',
      company: input.jobDescription.company ?? '',
      requiredSkills: [...input.jobDescription.requiredSkills],
    },
    input.taskKind === 'ANSWER_QUESTIONS' ? [...input.questions] : [],
    {
      maxTokens: input.options.maxTokens ?? null,
      temperature: input.options.temperature ?? null,
    },
  ]);

  return createHash('sha256').update(payload).digest('hex');
}

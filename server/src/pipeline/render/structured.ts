import type { Contact, ResumeEntry, TailoredResult } from '../types.js';

// Objects are built field by field so key order never depends on input order.

function contactJson(contact: Contact) {
  return {
    name: contact.name,
    email: contact.email ?? null,
    phone: contact.phone ?? null,
    location: contact.location ?? null,
    links: [...contact.links],
  };
}

function entryJson(entry: ResumeEntry) {
  return {
    title: entry.title ?? null,
    organization: entry.organization ?? null,
    period: entry.period ?? null,
    summary: entry.summary ?? null,
    highlights: [...entry.highlights],
  };
}

export function toStructuredJson(result: TailoredResult): Record<string, unknown> {
  switch (result.kind) {
    case 'TAILOR_RESUME':
      return {
        kind: 'tailor_resume',
        contact: contactJson(result.contact),
        sections: result.sections.map((section) => ({
          id: section.id,
          title: section.title,
          entries: section.entries.map(entryJson),
        })),
      };
    case 'COVER_LETTER':
      return {
        kind: 'cover_letter',
        greeting: result.greeting,
        paragraphs: [...result.paragraphs],
        closing: result.closing,
        signature: result.signature,
      };
    case 'ANSWER_QUESTIONS':
      return {
        kind: 'answer_questions',
        answers: result.answers.map((a) => ({ question: a.question, answer: a.answer })),
      };
  }
}

/** UTF-8 JSON, two-space indent, trailing newline. */
export function renderStructured(result: TailoredResult): string {
  return `${JSON.stringify(toStructuredJson(result), null, 2)}\n`;
}

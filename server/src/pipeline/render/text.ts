import type { CoverLetter, QuestionAnswers, ResumeEntry, TailoredResult, TailoredResume } from '../types.js';

function entryLines(entry: ResumeEntry): string[] {
  const lines: string[] = [];
  const heading = [entry.title, entry.organization].filter((part): part is string => Boolean(part?.trim()));
  if (heading.length > 0) lines.push(heading.join(' | '));
  if (entry.period?.trim()) lines.push(entry.period);
  if (entry.summary?.trim()) lines.push(entry.summary);
  for (const highlight of entry.highlights) {
    if (highlight.trim()) lines.push(`• ${highlight}`);
  }
  return lines;
}

function resumeText(resume: TailoredResume): string[] {
  const { contact } = resume;
  const lines = [contact.name.toUpperCase()];
  const contactParts = [contact.email, contact.phone, contact.location, ...contact.links]
    .filter((part): part is string => Boolean(part?.trim()));
  if (contactParts.length > 0) lines.push(contactParts.join(' | '));

  for (const section of resume.sections) {
    lines.push('', section.title.toUpperCase());
    section.entries.forEach((entry, index) => {
      if (index > 0) lines.push('');
      lines.push(...entryLines(entry));
    });
  }
  return lines;
}

function coverLetterText(letter: CoverLetter): string[] {
  return [letter.greeting, ...letter.paragraphs, letter.closing, letter.signature]
    .flatMap((block, index) => (index === 0 ? [block] : ['', block]));
}

function answersText(result: QuestionAnswers): string[] {
  return result.answers.flatMap((item, index) => [
    ...(index > 0 ? [''] : []),
    `Q${index + 1}. ${item.question}`,
    item.answer,
  ]);
}

function textLines(result: TailoredResult): string[] {
  switch (result.kind) {
    case 'TAILOR_RESUME':
      return resumeText(result);
    case 'COVER_LETTER':
      return coverLetterText(result);
    case 'ANSWER_QUESTIONS':
      return answersText(result);
  }
}

/** Flatten a result into plain text with a fixed block order. */
export function renderText(result: TailoredResult): string {
  return `${textLines(result).join('\n')}\n`;
}

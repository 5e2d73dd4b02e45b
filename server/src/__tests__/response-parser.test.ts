import { describe, it, expect } from 'vitest';
import { parseModelResponse, type ParseExpectation } from '../pipeline/response-parser.js';
import type { TailoredResult } from '../pipeline/types.js';
import {
  answersJson,
  coverLetterJson,
  parserPolicy,
  sampleResume,
  tailoredResumeJson,
} from './helpers/fixtures.js';

const resumeExpectation: ParseExpectation = { taskKind: 'TAILOR_RESUME', resume: sampleResume() };
const letterExpectation: ParseExpectation = { taskKind: 'COVER_LETTER' };
const questions = ['Why this role? ', 'Describe a challenge.'];
const answersExpectation: ParseExpectation = { taskKind: 'ANSWER_QUESTIONS', questions };

function respond(text: string, truncated = false) {
  return { ok: true as const, text, truncated, attempts: 1 };
}

function parsed(text: string, expectation: ParseExpectation, policy = parserPolicy): TailoredResult {
  const outcome = parseModelResponse(respond(text), expectation, policy);
  if (!outcome.ok) throw outcome.error;
  return outcome.result;
}

function failure(text: string, expectation: ParseExpectation, policy = parserPolicy, truncated = false) {
  const outcome = parseModelResponse(respond(text, truncated), expectation, policy);
  if (outcome.ok) throw new Error('expected a parse failure');
  return outcome.error;
}

function resumeOutput(sections: unknown[]): string {
  return JSON.stringify({ sections });
}

const summarySection = { id: 'summary', entries: [{ summary: 'Engineer.' }] };
const experienceSection = { id: 'experience', entries: [{ title: 'Senior Engineer', organization: 'Acme Corp' }] };
const educationSection = { id: 'education', entries: [{ title: 'B.S. Computer Science' }] };

describe('parseModelResponse: common failures', () => {
  it('rejects output that stopped at the token limit', () => {
    const error = failure(tailoredResumeJson(), resumeExpectation, parserPolicy, true);
    expect(error.reason).toBe('truncated');
    expect(error.message).toBe('truncated: model output stopped at the token limit');
  });

  it('rejects text with no JSON in it', () => {
    const error = failure('Sorry, I cannot help with that.', resumeExpectation);
    expect(error.reason).toBe('invalid_json');
    expect(error.rawSnippet).toBe('Sorry, I cannot help with that.');
  });

  it('rejects a non-object root', () => {
    expect(failure('["a"]', letterExpectation).message).toBe('schema_mismatch: (root): expected a JSON object');
  });

  it('reports the path of a shape mismatch', () => {
    expect(failure('{"sections": "none"}', resumeExpectation).message)
      .toBe('schema_mismatch: sections: Expected array, received string');
  });

  it('keeps only the first 300 characters of the raw output', () => {
    const raw = `{"answers": ["${'x'.repeat(400)}"]}`;
    expect(failure(raw, answersExpectation).rawSnippet).toBe(raw.slice(0, 300));
  });
});

describe('parseModelResponse: TAILOR_RESUME', () => {
  it('builds the tailored resume in input order with input titles and contact', () => {
    const result = parsed(tailoredResumeJson(), resumeExpectation);
    expect(result).toEqual({
      kind: 'TAILOR_RESUME',
      contact: sampleResume().contact,
      sections: [
        { id: 'summary', title: 'Summary', entries: [{ summary: 'Backend engineer focused on Python services.', highlights: [] }] },
        {
          id: 'experience',
          title: 'Experience',
          entries: [{
            title: 'Senior Engineer',
            organization: 'Acme Corp',
            period: '2019 - Present',
            highlights: ['Built the billing pipeline in Python on PostgreSQL'],
          }],
        },
        {
          id: 'education',
          title: 'Education',
          entries: [{ title: 'B.S. Computer Science', organization: 'State University', period: '2011 - 2015', highlights: [] }],
        },
      ],
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('accepts sections returned out of order', () => {
    const result = parsed(resumeOutput([educationSection, summarySection, experienceSection]), resumeExpectation);
    if (result.kind !== 'TAILOR_RESUME') throw new Error('wrong kind');
    expect(result.sections.map((s) => s.id)).toEqual(['summary', 'experience', 'education']);
  });

  it('rejects missing sections', () => {
    expect(failure(resumeOutput([summarySection, experienceSection]), resumeExpectation).message)
      .toBe('missing_sections: missing section ids: education');
  });

  it('rejects unknown sections unless allowed', () => {
    const output = resumeOutput([
      summarySection,
      experienceSection,
      educationSection,
      { id: 'awards', title: 'Awards', entries: [{ title: 'Hackathon winner' }] },
    ]);
    expect(failure(output, resumeExpectation).message).toBe('unexpected_sections: unknown section ids: awards');

    const result = parsed(output, resumeExpectation, { ...parserPolicy, allowExtraSections: true });
    if (result.kind !== 'TAILOR_RESUME') throw new Error('wrong kind');
    expect(result.sections[3]).toEqual({ id: 'awards', title: 'Awards', entries: [{ title: 'Hackathon winner', highlights: [] }] });
  });

  it('rejects duplicate sections', () => {
    expect(failure(resumeOutput([summarySection, summarySection, experienceSection, educationSection]), resumeExpectation).message)
      .toBe('duplicate_sections: section "summary" appears more than once');
  });

  it('rejects a section without entries', () => {
    expect(failure(resumeOutput([summarySection, experienceSection, { id: 'education', entries: [] }]), resumeExpectation).message)
      .toBe('empty_section: section "education" has no entries');
  });

  it('rejects an entry that is empty after cleaning', () => {
    const blank = { id: 'education', entries: [{ title: '  ', highlights: [''] }] };
    expect(failure(resumeOutput([summarySection, experienceSection, blank]), resumeExpectation).message)
      .toBe('empty_entry: section "education" entry 1 is empty');
  });
});

describe('parseModelResponse: COVER_LETTER', () => {
  it('returns the cleaned letter', () => {
    expect(parsed(coverLetterJson(), letterExpectation)).toEqual({
      kind: 'COVER_LETTER',
      greeting: 'Dear Hiring Manager,',
      paragraphs: [
        'I am applying for the Senior Backend Engineer role.',
        'At Acme Corp I built the billing pipeline in Python.',
      ],
      closing: 'Sincerely,',
      signature: 'Jordan Lee',
    });
  });

  it('splits paragraphs on blank lines', () => {
    const text = JSON.stringify({
      greeting: 'Hello,',
      paragraphs: ['First para.\n\nSecond para here.'],
      closing: 'Best,',
      signature: 'Jordan',
    });
    const result = parsed(text, letterExpectation, { ...parserPolicy, coverLetterMinBodyChars: 0 });
    if (result.kind !== 'COVER_LETTER') throw new Error('wrong kind');
    expect(result.paragraphs).toEqual(['First para.', 'Second para here.']);
  });

  it('rejects a missing closing', () => {
    const text = JSON.stringify({ ...JSON.parse(coverLetterJson()), closing: null });
    expect(failure(text, letterExpectation).message).toBe('missing_field: "closing" is missing or empty');
  });

  it('rejects too few paragraphs', () => {
    const text = JSON.stringify({ ...JSON.parse(coverLetterJson()), paragraphs: ['x'.repeat(80)] });
    expect(failure(text, letterExpectation).message).toBe('body_too_short: 1 paragraph(s), need at least 2');
  });

  it('rejects a body below the character minimum', () => {
    const text = JSON.stringify({ ...JSON.parse(coverLetterJson()), paragraphs: ['Hi.', 'Bye.'] });
    expect(failure(text, letterExpectation).message).toBe('body_too_short: 7 body characters, need at least 40');
  });
});

describe('parseModelResponse: ANSWER_QUESTIONS', () => {
  it('pairs answers with the input questions', () => {
    const text = JSON.stringify({ answers: ['Because of the **mission**.', { question: 'ignored', answer: 'A migration.' }] });
    expect(parsed(text, answersExpectation)).toEqual({
      kind: 'ANSWER_QUESTIONS',
      answers: [
        { question: 'Why this role?', answer: 'Because of the mission.' },
        { question: 'Describe a challenge.', answer: 'A migration.' },
      ],
    });
  });

  it('rejects a different number of answers', () => {
    const expectation: ParseExpectation = { taskKind: 'ANSWER_QUESTIONS', questions: ['a', 'b', 'c'] };
    expect(failure(answersJson(['one', 'two']), expectation).message)
      .toBe('answer_count_mismatch: expected 3 answers, got 2');
  });

  it('rejects an empty answer', () => {
    expect(failure(answersJson(['Fine.', '  ']), answersExpectation).message)
      .toBe('empty_answer: answer 2 is empty or too short');
  });
});

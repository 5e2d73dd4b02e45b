import { vi } from 'vitest';
import { loadConfig, type AppConfig, type ParserPolicy } from '../../lib/config.js';
import type { GenerateInput, GenerateOutput, GenerativeModel } from '../../lib/llm-provider.js';
import type { JobDescription, Resume } from '../../pipeline/types.js';

export function sampleResume(): Resume {
  return {
    contact: {
      name: 'Jordan Lee',
      email: 'jordan@example.com',
      phone: '555-0100',
      location: 'Denver, CO',
      links: ['https://github.com/jlee'],
    },
    sections: [
      {
        id: 'summary',
        title: 'Summary',
        entries: [{ summary: 'Backend engineer with eight years of experience.', highlights: [] }],
      },
      {
        id: 'experience',
        title: 'Experience',
        entries: [
          {
            title: 'Senior Engineer',
            organization: 'Acme Corp',
            period: '2019 - Present',
            highlights: ['Built the billing pipeline in Python', 'Cut p95 latency by 40%'],
          },
        ],
      },
      {
        id: 'education',
        title: 'Education',
        entries: [{ title: 'B.S. Computer Science', organization: 'State University', period: '2011 - 2015', highlights: [] }],
      },
    ],
  };
}

export function sampleJob(): JobDescription {
  return {
    text: 'Senior Backend Engineer at Example Co\nWe need Python, PostgreSQL and Kubernetes experience.',
    title: 'Senior Backend Engineer',
    company: 'Example Co',
    requiredSkills: ['Kubernetes', 'PostgreSQL', 'Python'],
  };
}

export const parserPolicy: ParserPolicy = {
  coverLetterMinBodyChars: 40,
  coverLetterMinParagraphs: 2,
  minAnswerChars: 1,
  allowExtraSections: false,
};

/** Fast retries, short deadline, small parser minimums. */
export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    ANTHROPIC_API_KEY: 'test-secret',
    RETRY_MAX_ATTEMPTS: '3',
    RETRY_BASE_DELAY_MS: '1',
    RETRY_MAX_DELAY_MS: '5',
    REQUEST_DEADLINE_MS: '5000',
    COVER_LETTER_MIN_BODY_CHARS: '40',
    ...env,
  });
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function modelOutput(text: string, truncated = false): GenerateOutput {
  return { text, truncated, usage: { input_tokens: 10, output_tokens: 20 } };
}

export function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

/**
 * A model that plays back `steps` in order, one per call. An Error step is
 * thrown; the last step repeats once the script runs out.
 */
export function scriptedModel(steps: Array<GenerateOutput | Error>) {
  let index = 0;
  const generate = vi.fn(async (_input: GenerateInput, _signal: AbortSignal): Promise<GenerateOutput> => {
    const step = steps[Math.min(index, steps.length - 1)];
    index += 1;
    if (step instanceof Error) throw step;
    return step;
  });
  const model: GenerativeModel = { name: 'scripted', generate };
  return { model, generate };
}

/** A model that answers with `output` after `delayMs`, or rejects once its signal aborts. */
export function slowModel(output: GenerateOutput, delayMs: number) {
  const generate = vi.fn((_input: GenerateInput, signal: AbortSignal) =>
    new Promise<GenerateOutput>((resolve, reject) => {
      const timer = setTimeout(() => resolve(output), delayMs);
      signal.addEventListener('abort', () => {
        clearTimeout(timer);
        reject(signal.reason);
      }, { once: true });
    }));
  const model: GenerativeModel = { name: 'slow', generate };
  return { model, generate };
}

/** A model that never answers until its signal aborts. */
export function hangingModel() {
  const generate = vi.fn((_input: GenerateInput, signal: AbortSignal) =>
    new Promise<GenerateOutput>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    }));
  const model: GenerativeModel = { name: 'hanging', generate };
  return { model, generate };
}

export function tailoredResumeJson(): string {
  return JSON.stringify({
    sections: [
      { id: 'summary', entries: [{ summary: 'Backend engineer focused on **Python** services.' }] },
      {
        id: 'experience',
        entries: [{
          title: 'Senior Engineer',
          organization: 'Acme Corp',
          period: '2019 - Present',
          highlights: ['Built the billing pipeline in Python on PostgreSQL'],
        }],
      },
      {
        id: 'education',
        entries: [{ title: 'B.S. Computer Science', organization: 'State University', period: '2011 - 2015' }],
      },
    ],
  });
}

export function coverLetterJson(): string {
  return JSON.stringify({
    greeting: 'Dear Hiring Manager,',
    paragraphs: [
      'I am applying for the Senior Backend Engineer role.',
      'At Acme Corp I built the billing pipeline in Python.',
    ],
    closing: 'Sincerely,',
    signature: 'Jordan Lee',
  });
}

export function answersJson(answers: string[]): string {
  return JSON.stringify({ answers: answers.map((answer, i) => ({ question: `Q${i + 1}`, answer })) });
}

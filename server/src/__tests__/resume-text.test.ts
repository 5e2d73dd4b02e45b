import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '../lib/errors.js';
import { parseResumeText, slugify } from '../pipeline/resume-text.js';

const RESUME = `Jordan Lee
jordan@example.com | 555-010-0199 | Denver, CO
https://github.com/jlee

SUMMARY
Backend engineer with eight years
of experience.

EXPERIENCE
Senior Engineer | Acme Corp | 2019 - Present
- Built the billing pipeline
- Cut latency by 40%

Engineer at Initech
2015 - 2019
Maintained reporting jobs.

## Education
B.S. Computer Science | State University | 2011 - 2015
`;

describe('parseResumeText', () => {
  it('reads name, contact details and sections', () => {
    const resume = parseResumeText(RESUME);

    expect(resume.contact).toEqual({
      name: 'Jordan Lee',
      email: 'jordan@example.com',
      phone: '555-010-0199',
      location: 'Denver, CO',
      links: ['https://github.com/jlee'],
    });
    expect(resume.sections.map((s) => [s.id, s.title])).toEqual([
      ['summary', 'SUMMARY'],
      ['experience', 'EXPERIENCE'],
      ['education', 'Education'],
    ]);
  });

  it('joins prose section lines into one summary', () => {
    const [summary] = parseResumeText(RESUME).sections;
    expect(summary.entries).toEqual([
      { highlights: [], summary: 'Backend engineer with eight years of experience.' },
    ]);
  });

  it('splits entries on blank lines and reads header, period and bullets', () => {
    const experience = parseResumeText(RESUME).sections[1];
    expect(experience.entries).toEqual([
      {
        title: 'Senior Engineer',
        organization: 'Acme Corp',
        period: '2019 - Present',
        highlights: ['Built the billing pipeline', 'Cut latency by 40%'],
      },
      {
        title: 'Engineer',
        organization: 'Initech',
        period: '2015 - 2019',
        summary: 'Maintained reporting jobs.',
        highlights: [],
      },
    ]);
  });

  it('puts text before the first heading in a Summary section and de-duplicates ids', () => {
    const resume = parseResumeText('Alex Kim\nSeattle\n\nExperienced data analyst.\n\nPROJECTS\nDashboard rebuild\n1. Shipped v2\n\nPROJECTS\nChurn model');

    expect(resume.contact).toEqual({ name: 'Alex Kim', location: 'Seattle', links: [] });
    expect(resume.sections).toEqual([
      { id: 'summary', title: 'Summary', entries: [{ highlights: [], summary: 'Experienced data analyst.' }] },
      { id: 'projects', title: 'PROJECTS', entries: [{ title: 'Dashboard rebuild', highlights: ['Shipped v2'] }] },
      { id: 'projects-2', title: 'PROJECTS', entries: [{ title: 'Churn model', highlights: [] }] },
    ]);
  });

  it('rejects blank text', () => {
    expect(() => parseResumeText(' \n\n ')).toThrow(InvalidInputError);
  });
});

describe('slugify', () => {
  it('lower-cases and hyphenates', () => {
    expect(slugify('Work Experience & Projects')).toBe('work-experience-projects');
    expect(slugify('***')).toBe('section');
  });
});

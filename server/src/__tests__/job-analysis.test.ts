import { describe, it, expect } from 'vitest';
import { analyzeJobDescription, extractSkills } from '../pipeline/job-analysis.js';

describe('extractSkills', () => {
  it('maps synonyms to canonical names, de-duplicated and sorted', () => {
    expect(extractSkills('Python3 and python, Postgres, K8S and Kubernetes')).toEqual([
      'Kubernetes',
      'PostgreSQL',
      'Python',
    ]);
  });

  it('matches whole tokens only', () => {
    expect(extractSkills('Strong JavaScript skills')).toEqual(['JavaScript']);
    expect(extractSkills('Experience with PostgreSQL')).toEqual(['PostgreSQL']);
  });

  it('matches skills that end in symbols', () => {
    expect(extractSkills('Must know C++ and k8s.')).toEqual(['C++', 'Kubernetes']);
  });

  it('accepts a custom vocabulary', () => {
    const vocabulary = [{ name: 'Go', category: 'language', synonyms: ['golang', 'go'] }];
    expect(extractSkills('We write Go services', vocabulary)).toEqual(['Go']);
    expect(extractSkills('Python only', vocabulary)).toEqual([]);
  });
});

describe('analyzeJobDescription', () => {
  it('reads title and company from a leading "Title at Company" line', () => {
    const text = 'Senior Backend Engineer at Example Co\nWe need Python, PostgreSQL and Kubernetes experience.';
    expect(analyzeJobDescription(text)).toEqual({
      text,
      title: 'Senior Backend Engineer',
      company: 'Example Co',
      requiredSkills: ['Kubernetes', 'PostgreSQL', 'Python'],
    });
  });

  it('prefers labelled lines', () => {
    const result = analyzeJobDescription('We are hiring!\nJob Title: Staff Engineer\nCompany: Globex\nRust required.');
    expect(result.title).toBe('Staff Engineer');
    expect(result.company).toBe('Globex');
    expect(result.requiredSkills).toEqual(['Rust']);
  });

  it('keeps fields the caller supplied', () => {
    const result = analyzeJobDescription('Title: Engineer\nCompany: Globex', { title: ' Platform Lead ', company: 'Initech' });
    expect(result.title).toBe('Platform Lead');
    expect(result.company).toBe('Initech');
  });

  it('does not treat a sentence as a title', () => {
    const result = analyzeJobDescription('We are looking for someone who loves building reliable services.');
    expect(result.title).toBeUndefined();
    expect(result.company).toBeUndefined();
    expect(result.requiredSkills).toEqual([]);
  });

  it('only splits off capitalized company names', () => {
    expect(analyzeJobDescription('Engineer at a startup\nDetails follow').title).toBe('Engineer at a startup');
  });
});

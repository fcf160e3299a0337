import { describe, expect, it } from 'vitest';
import { parseCompletion } from './resultExtractor.js';

describe('parseCompletion', () => {
  it('splits the labelled header from the letter body', () => {
    const raw = 'Company: Acme Corp\nRole: Backend Engineer\nJob ID: 42\n---\nDear Hiring Manager, ...';

    expect(parseCompletion(raw)).toEqual({
      companyName: 'Acme Corp',
      roleApplied: 'Backend Engineer',
      jobId: '42',
      coverLetter: 'Dear Hiring Manager, ...',
    });
  });

  it('returns empty fields for an empty completion', () => {
    expect(parseCompletion('')).toEqual({ coverLetter: '', companyName: '', roleApplied: '', jobId: '' });
  });

  it('keeps unlabelled text unchanged as the letter', () => {
    const raw = 'Dear team,\n\nI would love to join you.\n\nBest,\nJane\n';

    expect(parseCompletion(raw)).toEqual({ coverLetter: raw, companyName: '', roleApplied: '', jobId: '' });
  });

  it('tolerates case, spacing, emphasis and punctuation around labels', () => {
    const raw = '  company name :  Acme Corp\n**ROLE:** Staff Engineer\njob-id.: REQ-7\n---\n\nHello there';

    expect(parseCompletion(raw)).toEqual({
      companyName: 'Acme Corp',
      roleApplied: 'Staff Engineer',
      jobId: 'REQ-7',
      coverLetter: 'Hello there',
    });
  });

  it('blanks placeholder values', () => {
    const result = parseCompletion('Company: Acme\nRole: Analyst\nJob ID: N/A\n---\nLetter');

    expect(result.jobId).toBe('');
    expect(result.companyName).toBe('Acme');
  });

  it('strips label lines when there is no separator', () => {
    const result = parseCompletion('Company: Acme\nRole: Analyst\n\nDear Hiring Manager,\nThanks');

    expect(result).toEqual({
      companyName: 'Acme',
      roleApplied: 'Analyst',
      jobId: '',
      coverLetter: 'Dear Hiring Manager,\nThanks',
    });
  });

  it('uses the first occurrence of a repeated label', () => {
    const result = parseCompletion('Role: Dev\nHello\nRole: Lead');

    expect(result.roleApplied).toBe('Dev');
    expect(result.coverLetter).toBe('Hello\nRole: Lead');
  });

  it('falls back to the whole input when only labels are present', () => {
    const raw = 'Company: Acme\nRole: Analyst';

    expect(parseCompletion(raw)).toEqual({
      companyName: 'Acme',
      roleApplied: 'Analyst',
      jobId: '',
      coverLetter: raw,
    });
  });

  it('ignores a separator inside an unlabelled letter', () => {
    const raw = 'Dear Sam,\n---\nRegards';

    expect(parseCompletion(raw).coverLetter).toBe(raw);
  });

  it('handles CRLF line endings', () => {
    const result = parseCompletion('Company: Acme\r\nRole: Dev\r\n---\r\nHi there\r\n');

    expect(result).toEqual({ companyName: 'Acme', roleApplied: 'Dev', jobId: '', coverLetter: 'Hi there' });
  });

  it('does not treat ordinary colon lines as labels', () => {
    const raw = 'Note: this is a letter\nDear Hiring Manager: hello';

    expect(parseCompletion(raw)).toEqual({ coverLetter: raw, companyName: '', roleApplied: '', jobId: '' });
  });
});

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobDescriptionError } from './errors.js';
import {
  cleanScrapedMarkdown,
  loadJobDescription,
  readPastedJobDescription,
  scrapeJobPosting,
} from './jobDescription.js';

const scrapeUrl = vi.fn();
const scraper = { scrapeUrl };

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

describe('cleanScrapedMarkdown', () => {
  it('drops images and collapses blank lines', () => {
    expect(cleanScrapedMarkdown('# Title\n\n![logo](https://example.com/logo.png)\n\n\n\nBody\n')).toBe(
      '# Title\n\nBody'
    );
  });
});

describe('scrapeJobPosting', () => {
  it('returns the cleaned markdown of the page', async () => {
    scrapeUrl.mockResolvedValue({ success: true, markdown: '# Backend Engineer\n\n\n\nAcme Corp ![x](y.png)' });

    await expect(scrapeJobPosting('https://jobs.example.com/42', scraper)).resolves.toBe(
      '# Backend Engineer\n\nAcme Corp'
    );
    expect(scrapeUrl).toHaveBeenCalledWith('https://jobs.example.com/42', { formats: ['markdown'] });
  });

  it('rejects malformed and non-http URLs before scraping', async () => {
    await expect(scrapeJobPosting('not a url', scraper)).rejects.toMatchObject({
      code: 'JOB_DESCRIPTION_UNAVAILABLE',
      origin: 'url',
      detail: 'invalid URL "not a url"',
    });
    await expect(scrapeJobPosting('file:///etc/hosts', scraper)).rejects.toBeInstanceOf(JobDescriptionError);
    expect(scrapeUrl).not.toHaveBeenCalled();
  });

  it('reports an unsuccessful scrape', async () => {
    scrapeUrl.mockResolvedValue({ success: false, error: 'Page blocked' });

    await expect(scrapeJobPosting('https://jobs.example.com/42', scraper)).rejects.toMatchObject({
      detail: 'Page blocked',
    });
  });

  it('wraps a failing scraper', async () => {
    const failure = new Error('Request failed with status code 402');
    scrapeUrl.mockRejectedValue(failure);

    await expect(scrapeJobPosting('https://jobs.example.com/42', scraper)).rejects.toMatchObject({
      detail: 'Request failed with status code 402',
      cause: failure,
    });
  });

  it('rejects a page with nothing left after cleanup', async () => {
    scrapeUrl.mockResolvedValue({ success: true, markdown: '![banner](b.png)\n' });

    await expect(scrapeJobPosting('https://jobs.example.com/42', scraper)).rejects.toMatchObject({
      detail: 'the page has no text content',
    });
  });
});

describe('readPastedJobDescription', () => {
  it('stops at two blank lines', async () => {
    const input = Readable.from(['Backend Engineer\n\nAcme Corp\n\n\nnot part of it\n']);

    await expect(readPastedJobDescription(input)).resolves.toBe('Backend Engineer\nAcme Corp');
  });

  it('stops at end of input', async () => {
    await expect(readPastedJobDescription(Readable.from(['Backend Engineer\nRemote\n']))).resolves.toBe(
      'Backend Engineer\nRemote'
    );
  });
});

describe('loadJobDescription', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jd-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prefers a URL and keeps it as the link', async () => {
    scrapeUrl.mockResolvedValue({ success: true, markdown: 'Backend Engineer at Acme Corp' });

    await expect(
      loadJobDescription({ url: 'https://jobs.example.com/42', inline: 'ignored' }, { scraper })
    ).resolves.toEqual({ text: 'Backend Engineer at Acme Corp', origin: 'url', url: 'https://jobs.example.com/42' });
  });

  it('uses inline text before a file', async () => {
    await expect(loadJobDescription({ inline: ' Backend Engineer ', file: join(dir, 'missing.txt') })).resolves.toEqual({
      text: 'Backend Engineer',
      origin: 'inline',
    });
  });

  it('reads a file', async () => {
    const file = join(dir, 'jd.txt');
    await writeFile(file, 'Backend Engineer at Acme Corp\n');

    await expect(loadJobDescription({ inline: '', file })).resolves.toEqual({
      text: 'Backend Engineer at Acme Corp',
      origin: 'file',
    });
  });

  it('reports a missing file as a typed error', async () => {
    await expect(loadJobDescription({ file: join(dir, 'missing.txt') })).rejects.toMatchObject({
      code: 'JOB_DESCRIPTION_UNAVAILABLE',
      origin: 'file',
    });
  });

  it('falls back to pasted input', async () => {
    await expect(loadJobDescription({}, { stdin: Readable.from(['Backend Engineer\n']) })).resolves.toEqual({
      text: 'Backend Engineer',
      origin: 'stdin',
    });
  });
});

import { readFile } from 'fs/promises';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import FirecrawlApp from '@mendable/firecrawl-js';
import { config } from './config.js';
import { JobDescriptionError, describeError, type JobDescriptionOrigin } from './errors.js';

export interface JobDescription {
  text: string;
  origin: JobDescriptionOrigin;
  /** Posting the text was scraped from; becomes the ledger link */
  url?: string;
}

/**
 * Where a job description may come from. The first one set wins, in the
 * order url, inline, file; with none set it is read from stdin.
 */
export interface JobDescriptionInput {
  url?: string;
  inline?: string;
  file?: string;
}

export type PageScraper = Pick<FirecrawlApp, 'scrapeUrl'>;

export interface LoadOptions {
  scraper?: PageScraper;
  stdin?: Readable;
}

export function cleanScrapedMarkdown(markdown: string): string {
  return markdown
    .replace(/!\[[^\]]*\]\([^)]*\)/g, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function defaultScraper(): PageScraper {
  if (!config.FIRECRAWL_API_KEY) {
    throw new JobDescriptionError('url', 'FIRECRAWL_API_KEY is not configured');
  }
  return new FirecrawlApp({ apiKey: config.FIRECRAWL_API_KEY });
}

/**
 * Scrape a job posting to markdown
 */
export async function scrapeJobPosting(url: string, scraper?: PageScraper): Promise<string> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new JobDescriptionError('url', `invalid URL "${url}"`, { cause: error });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new JobDescriptionError('url', `only http and https URLs can be scraped, got "${url}"`);
  }

  const client = scraper ?? defaultScraper();
  console.log(`[job] Scraping ${parsed.host}...`);

  const response = await client.scrapeUrl(url, { formats: ['markdown'] }).catch((error: unknown) => {
    throw new JobDescriptionError('url', describeError(error), { cause: error });
  });
  if (!response.success) {
    throw new JobDescriptionError('url', response.error || 'scrape was not successful');
  }

  const markdown = cleanScrapedMarkdown(response.markdown ?? '');
  if (!markdown) {
    throw new JobDescriptionError('url', 'the page has no text content');
  }

  console.log(`[job] Scraped ${markdown.length} characters from ${parsed.host}`);
  return markdown;
}

/**
 * Read a pasted job description; input ends at two consecutive blank lines
 * or at end of stream.
 */
export function readPastedJobDescription(input: Readable = process.stdin): Promise<string> {
  const rl = createInterface({ input, terminal: false });
  console.log('Paste the job description, then press Enter on two empty lines:');

  return new Promise((resolve) => {
    const lines: string[] = [];
    let blankRun = 0;
    let finished = false;

    rl.on('line', (line) => {
      if (finished) {
        return;
      }
      if (line.trim()) {
        blankRun = 0;
        lines.push(line);
        return;
      }
      blankRun++;
      if (blankRun === 2) {
        finished = true;
        rl.close();
      }
    });
    rl.on('close', () => resolve(lines.join('\n').trim()));
  });
}

/**
 * Resolve the job description from the first configured source
 */
export async function loadJobDescription(
  input: JobDescriptionInput,
  options: LoadOptions = {}
): Promise<JobDescription> {
  if (input.url) {
    return { text: await scrapeJobPosting(input.url, options.scraper), origin: 'url', url: input.url };
  }

  if (input.inline?.trim()) {
    return { text: input.inline.trim(), origin: 'inline' };
  }

  if (input.file) {
    let text: string;
    try {
      text = await readFile(input.file, 'utf-8');
    } catch (error) {
      throw new JobDescriptionError('file', `cannot read ${input.file}: ${describeError(error)}`, { cause: error });
    }
    return { text: text.trim(), origin: 'file' };
  }

  return { text: await readPastedJobDescription(options.stdin), origin: 'stdin' };
}

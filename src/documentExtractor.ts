import { readFile } from 'fs/promises';
import { PDFParse } from 'pdf-parse';
import { UnreadableDocumentError, describeError } from './errors.js';

const PDF_MAGIC = '%PDF-';

/**
 * Collapse layout whitespace left behind by PDF text extraction
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v\u00a0]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function isPasswordError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === 'PasswordException' || /password/i.test(error.message);
}

/**
 * Extract plain text from a resume PDF, pages in order.
 * Read-only: the caller owns the file and its cleanup.
 */
export async function extractResumeText(path: string): Promise<string> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (error) {
    throw new UnreadableDocumentError(path, 'unreadable', { cause: error });
  }

  if (data.subarray(0, 1024).toString('latin1').indexOf(PDF_MAGIC) === -1) {
    throw new UnreadableDocumentError(path, 'unreadable');
  }

  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    const pages = [...result.pages].sort((a, b) => a.num - b.num);
    const text = normalizeWhitespace(pages.map((page) => normalizeWhitespace(page.text)).join('\n\n'));

    if (!text) {
      throw new UnreadableDocumentError(path, 'no-text');
    }
    return text;
  } catch (error) {
    if (error instanceof UnreadableDocumentError) {
      throw error;
    }
    throw new UnreadableDocumentError(path, isPasswordError(error) ? 'encrypted' : 'unreadable', { cause: error });
  } finally {
    await parser.destroy().catch((error: unknown) => {
      console.warn(`[resume] Failed to release PDF parser for ${path}: ${describeError(error)}`);
    });
  }
}

import { randomUUID } from 'crypto';
import { rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { extractResumeText } from './documentExtractor.js';
import { EmptyInputError, InvalidUploadError, UploadSpoolError } from './errors.js';
import { composePrompt } from './promptComposer.js';
import { createProvider, resolveProviderId, type CompletionProvider } from './providers.js';
import { parseCompletion } from './resultExtractor.js';
import type { GenerationRequest, GenerationResult, ProviderId } from './types.js';

/**
 * Seams of the pipeline that callers (and tests) may replace
 */
export interface GenerationDeps {
  extractText: (path: string) => Promise<string>;
  provider: (providerId: ProviderId) => CompletionProvider;
}

const defaultDeps: GenerationDeps = {
  extractText: extractResumeText,
  provider: (providerId) => createProvider(providerId),
};

/**
 * Generate a tailored cover letter from a resume PDF and a job description.
 *
 * Writes nothing to the ledger; recording the application is up to the caller.
 */
export async function generateCoverLetter(
  request: GenerationRequest,
  deps: Partial<GenerationDeps> = {}
): Promise<GenerationResult> {
  const { extractText, provider } = { ...defaultDeps, ...deps };

  const providerId = resolveProviderId(request.model);
  const resumeText = await extractText(request.resumePath);

  if (!request.jobDescription.trim()) {
    throw new EmptyInputError('jobDescription');
  }
  if (!resumeText.trim()) {
    throw new EmptyInputError('resumeText');
  }

  const prompt = composePrompt(resumeText, request.jobDescription);
  const completion = await provider(providerId).generateCompletion(prompt);
  const result = parseCompletion(completion);

  if (!result.companyName || !result.roleApplied) {
    console.warn('[cover-letter] Completion did not include every metadata field; leaving the missing ones blank');
  }

  return result;
}

export interface ResumeUpload {
  bytes: Uint8Array;
  contentType: string;
  jobDescription: string;
  model: string;
}

const ACCEPTED_CONTENT_TYPES = new Set(['application/pdf', 'application/octet-stream']);

/**
 * Entry point for uploaded bytes: checks the content type, spools the
 * upload to a temporary file for the duration of the generation and
 * removes it afterwards, whether or not generation succeeded.
 */
export async function generateFromUpload(
  upload: ResumeUpload,
  deps: Partial<GenerationDeps> = {}
): Promise<GenerationResult> {
  const contentType = upload.contentType.split(';')[0].trim().toLowerCase();
  if (!ACCEPTED_CONTENT_TYPES.has(contentType)) {
    throw new InvalidUploadError(upload.contentType);
  }

  const resumePath = join(tmpdir(), `resume-${randomUUID()}.pdf`);
  try {
    try {
      await writeFile(resumePath, upload.bytes);
    } catch (error) {
      throw new UploadSpoolError({ cause: error });
    }
    return await generateCoverLetter(
      { resumePath, jobDescription: upload.jobDescription, model: upload.model },
      deps
    );
  } finally {
    await rm(resumePath, { force: true });
  }
}

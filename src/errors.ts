import type { ApplicationStatus, Vendor } from './types.js';

export type CoverLetterErrorCode =
  | 'UNREADABLE_DOCUMENT'
  | 'UNSUPPORTED_PROVIDER'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_ERROR'
  | 'EMPTY_INPUT'
  | 'INVALID_UPLOAD'
  | 'UPLOAD_SPOOL_FAILURE'
  | 'JOB_DESCRIPTION_UNAVAILABLE'
  | 'RECORD_NOT_FOUND'
  | 'INVALID_STATUS_TRANSITION'
  | 'LEDGER_READ_FAILURE'
  | 'LEDGER_WRITE_FAILURE';

/**
 * Base class for every failure the generation pipeline and the ledger
 * surface to callers. `code` is stable; messages are meant for people.
 */
export abstract class CoverLetterError extends Error {
  abstract readonly code: CoverLetterErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type UnreadableReason = 'unreadable' | 'encrypted' | 'no-text';

export class UnreadableDocumentError extends CoverLetterError {
  readonly code = 'UNREADABLE_DOCUMENT';

  constructor(
    readonly path: string,
    readonly reason: UnreadableReason,
    options?: { cause?: unknown }
  ) {
    super(`Resume could not be read (${reason}): ${path}`, options);
  }
}

export class UnsupportedProviderError extends CoverLetterError {
  readonly code = 'UNSUPPORTED_PROVIDER';

  constructor(readonly providerId: string, supported: readonly string[]) {
    super(`Unsupported model "${providerId}". Choose one of: ${supported.join(', ')}`);
  }
}

export class ProviderTimeoutError extends CoverLetterError {
  readonly code = 'PROVIDER_TIMEOUT';

  constructor(readonly vendor: Vendor, readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`${vendor} did not respond within ${timeoutMs}ms`, options);
  }
}

export class ProviderError extends CoverLetterError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly vendor: Vendor,
    readonly httpStatus: number | null,
    readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(
      httpStatus === null ? `${vendor} API error: ${detail}` : `${vendor} API error ${httpStatus}: ${detail}`,
      options
    );
  }
}

export class EmptyInputError extends CoverLetterError {
  readonly code = 'EMPTY_INPUT';

  constructor(readonly field: 'jobDescription' | 'resumeText') {
    super(field === 'jobDescription' ? 'Job description is empty' : 'Resume text is empty');
  }
}

export class InvalidUploadError extends CoverLetterError {
  readonly code = 'INVALID_UPLOAD';

  constructor(readonly contentType: string) {
    super(`Resume must be a PDF (got ${contentType || 'no content type'})`);
  }
}

export class UploadSpoolError extends CoverLetterError {
  readonly code = 'UPLOAD_SPOOL_FAILURE';

  constructor(options?: { cause?: unknown }) {
    super('Could not store the uploaded resume for processing', options);
  }
}

export type JobDescriptionOrigin = 'inline' | 'file' | 'url' | 'stdin';

export class JobDescriptionError extends CoverLetterError {
  readonly code = 'JOB_DESCRIPTION_UNAVAILABLE';

  constructor(readonly origin: JobDescriptionOrigin, readonly detail: string, options?: { cause?: unknown }) {
    super(`Job description unavailable (${origin}): ${detail}`, options);
  }
}

export class RecordNotFoundError extends CoverLetterError {
  readonly code = 'RECORD_NOT_FOUND';

  constructor(readonly rowNumber: number, rowCount: number) {
    super(
      rowCount === 0
        ? `Application #${rowNumber} not found: the ledger is empty`
        : `Application #${rowNumber} not found (rows 1-${rowCount} exist)`
    );
  }
}

export class InvalidStatusTransitionError extends CoverLetterError {
  readonly code = 'INVALID_STATUS_TRANSITION';

  constructor(readonly rowNumber: number, readonly from: ApplicationStatus, readonly to: ApplicationStatus) {
    super(`Application #${rowNumber} is already ${from} and cannot be marked ${to}`);
  }
}

export class LedgerReadError extends CoverLetterError {
  readonly code = 'LEDGER_READ_FAILURE';

  constructor(readonly filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Could not read application ledger ${filePath}: ${detail}`, options);
  }
}

export class LedgerWriteError extends CoverLetterError {
  readonly code = 'LEDGER_WRITE_FAILURE';

  constructor(readonly filePath: string, options?: { cause?: unknown }) {
    super(`Could not write application ledger ${filePath}`, options);
  }
}

/**
 * Message of anything thrown, for log lines
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

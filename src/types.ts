/**
 * Model identifiers a caller may pick. Each one maps to exactly one vendor.
 */
export const PROVIDER_IDS = ['claude-sonnet-4-0', 'gpt-5.2', 'gemini-3-flash-preview'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export type Vendor = 'anthropic' | 'openai' | 'google';

/**
 * One cover letter request, created per user action and never persisted
 */
export interface GenerationRequest {
  resumePath: string;
  jobDescription: string;
  model: string;
}

/**
 * Structured output of a generation. Metadata fields are empty strings
 * when the completion did not carry them.
 */
export interface GenerationResult {
  coverLetter: string;
  companyName: string;
  roleApplied: string;
  jobId: string;
}

export const APPLICATION_STATUSES = ['Applied', 'Accepted', 'Rejected'] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

/**
 * What a caller hands to the ledger; row number, status and timestamp are
 * assigned on append.
 */
export interface NewApplication {
  companyName: string;
  roleApplied: string;
  jobId: string;
  link: string;
}

/**
 * A persisted ledger row
 */
export interface ApplicationRecord extends NewApplication {
  rowNumber: number;
  status: ApplicationStatus;
  timestamp: string;
}

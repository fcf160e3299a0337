/**
 * The completion layout the prompt asks for and the parser reads back.
 * promptComposer.ts and resultExtractor.ts both build on these constants;
 * bump the version whenever either side changes.
 */
export const COVER_LETTER_FORMAT_VERSION = 1;

export type MetadataField = 'companyName' | 'roleApplied' | 'jobId';

export interface MetadataLabel {
  field: MetadataField;
  /** Label written in the prompt */
  label: string;
  /** Spellings accepted when parsing, lowercase with single spaces */
  aliases: readonly string[];
}

export const METADATA_LABELS: readonly MetadataLabel[] = [
  { field: 'companyName', label: 'Company', aliases: ['company', 'company name'] },
  { field: 'roleApplied', label: 'Role', aliases: ['role', 'role applied', 'position'] },
  { field: 'jobId', label: 'Job ID', aliases: ['job id', 'jobid', 'job-id', 'job number'] },
];

export const SECTION_SEPARATOR = '---';

/**
 * Values the model writes when it could not find a field
 */
export const PLACEHOLDER_VALUES: readonly string[] = [
  'n/a',
  'na',
  'none',
  'unknown',
  'not specified',
  'not provided',
  'not available',
  '-',
];

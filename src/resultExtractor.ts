import {
  METADATA_LABELS,
  PLACEHOLDER_VALUES,
  type MetadataField,
} from './coverLetterFormat.js';
import type { GenerationResult } from './types.js';

// Leading bullets/emphasis, the label itself, stray punctuation, colon, value
const LABEL_LINE = /^[\s>#*_-]*([a-z][a-z -]*?)[\s*_.]*:\s*(.*)$/i;
const SEPARATOR_LINE = /^\s*-{3,}\s*$/;

type Metadata = Record<MetadataField, string>;

interface LabelMatch {
  field: MetadataField;
  value: string;
}

const ALIAS_TO_FIELD = new Map<string, MetadataField>(
  METADATA_LABELS.flatMap(({ field, aliases }) => aliases.map((alias) => [alias, field] as const))
);

function matchLabel(line: string): LabelMatch | null {
  const match = line.match(LABEL_LINE);
  if (!match) {
    return null;
  }

  const label = match[1].toLowerCase().replace(/\s+/g, ' ').trim();
  const field = ALIAS_TO_FIELD.get(label);
  if (!field) {
    return null;
  }

  return { field, value: cleanValue(match[2]) };
}

function cleanValue(raw: string): string {
  const value = raw
    .trim()
    .replace(/^[*_]+/, '')
    .replace(/[*_]+$/, '')
    .replace(/[,;]+$/, '')
    .trim();

  return PLACEHOLDER_VALUES.includes(value.toLowerCase()) ? '' : value;
}

/**
 * Pull labelled fields out of `lines`. Returns the fields found (first
 * occurrence wins) and the lines that were not label lines.
 */
function collectLabels(lines: string[]): { found: Partial<Metadata>; rest: string[] } {
  const found: Partial<Metadata> = {};
  const rest: string[] = [];

  for (const line of lines) {
    const label = matchLabel(line);
    if (label && found[label.field] === undefined) {
      found[label.field] = label.value;
    } else {
      rest.push(line);
    }
  }

  return { found, rest };
}

function toResult(coverLetter: string, found: Partial<Metadata>): GenerationResult {
  return {
    coverLetter,
    companyName: found.companyName ?? '',
    roleApplied: found.roleApplied ?? '',
    jobId: found.jobId ?? '',
  };
}

/**
 * Split a raw completion into letter body and metadata.
 *
 * Never throws. When no label can be found the whole input is the letter;
 * when labels are found but nothing is left for the body, the whole input
 * is returned as the letter as well.
 */
export function parseCompletion(rawText: string): GenerationResult {
  const lines = rawText.replace(/\r\n?/g, '\n').split('\n');

  const separatorIndex = lines.findIndex((line) => SEPARATOR_LINE.test(line));
  if (separatorIndex !== -1) {
    const header = collectLabels(lines.slice(0, separatorIndex));
    if (Object.keys(header.found).length > 0) {
      const body = lines.slice(separatorIndex + 1).join('\n').trim();
      return toResult(body || rawText, header.found);
    }
  }

  const { found, rest } = collectLabels(lines);
  if (Object.keys(found).length === 0) {
    return toResult(rawText, found);
  }

  const body = rest.join('\n').trim();
  return toResult(body || rawText, found);
}

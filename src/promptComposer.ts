import { METADATA_LABELS, SECTION_SEPARATOR, type MetadataField } from './coverLetterFormat.js';

const FIELD_HINTS: Record<MetadataField, string> = {
  companyName: 'company name',
  roleApplied: 'role title',
  jobId: 'job ID, or blank',
};

/**
 * Build the cover letter prompt. Both inputs are embedded verbatim.
 */
export function composePrompt(resumeText: string, jobDescription: string): string {
  const headerLines = METADATA_LABELS.map(({ label, field }) => `${label}: <${FIELD_HINTS[field]}>`).join('\n');

  return `You are an expert career coach who writes concise, specific cover letters.

## JOB DESCRIPTION:
${jobDescription}

## CANDIDATE RESUME:
${resumeText}

## YOUR TASK:
1. Identify the company, the role title and the job ID (requisition or posting number) from the job description
2. Write a cover letter for this role using only facts from the resume
3. Connect the candidate's most relevant experience to the top requirements of the job description

## RULES:
- Do not invent employers, titles, dates, numbers or skills that are not in the resume
- Keep the letter under 400 words
- Address it to the hiring manager unless the job description names someone
- If the job description has no job ID, leave that line blank after the colon
- Do not add any text before the first line or after the letter

## OUTPUT FORMAT (follow exactly):
${headerLines}
${SECTION_SEPARATOR}
<the full cover letter>`;
}

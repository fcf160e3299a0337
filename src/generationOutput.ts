import { saveCoverLetter } from './coverLetterFile.js';
import { describeError } from './errors.js';
import type { ApplicationLedger } from './ledger.js';
import type { GenerationResult } from './types.js';

export interface OutputOptions {
  link: string;
  save: boolean;
  log: boolean;
  directory: string;
  ledger: Pick<ApplicationLedger, 'append'>;
  now?: Date;
}

export interface OutputSummary {
  savedTo: string | null;
  rowNumber: number | null;
}

/**
 * Save a generated letter and log the application. The two steps are
 * independent: a failure in one is reported and the other still runs.
 */
export async function storeGeneration(result: GenerationResult, options: OutputOptions): Promise<OutputSummary> {
  const summary: OutputSummary = { savedTo: null, rowNumber: null };

  if (options.save) {
    try {
      summary.savedTo = await saveCoverLetter(result.coverLetter, result.companyName, {
        directory: options.directory,
        now: options.now,
      });
      if (summary.savedTo) {
        console.log(`Saved to ${summary.savedTo}`);
      }
    } catch (error) {
      console.error(`[cover-letter] Failed to save letter: ${describeError(error)}`);
    }
  }

  if (options.log) {
    try {
      summary.rowNumber = await options.ledger.append({
        companyName: result.companyName,
        roleApplied: result.roleApplied,
        jobId: result.jobId,
        link: options.link,
      });
      console.log(`Logged as application #${summary.rowNumber}`);
    } catch (error) {
      console.error(`[cover-letter] Failed to log application: ${describeError(error)}`);
    }
  }

  return summary;
}

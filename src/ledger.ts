import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import {
  InvalidStatusTransitionError,
  LedgerReadError,
  LedgerWriteError,
  RecordNotFoundError,
  describeError,
} from './errors.js';
import {
  APPLICATION_STATUSES,
  type ApplicationRecord,
  type ApplicationStatus,
  type NewApplication,
} from './types.js';

export const SHEET_NAME = 'Applications';
export const LEDGER_HEADER = ['#', 'Company', 'Role', 'Job ID', 'Link', 'Status', 'Applied At'] as const;

// Files written before timestamps were recorded stop after Status
const REQUIRED_COLUMNS = 6;

/**
 * Allowed status changes. Re-applying the current status is always a no-op.
 */
const TRANSITIONS: Record<ApplicationStatus, readonly ApplicationStatus[]> = {
  Applied: ['Accepted', 'Rejected'],
  Accepted: [],
  Rejected: [],
};

const StatusSchema = z.enum(APPLICATION_STATUSES);

export interface LedgerOptions {
  filePath: string;
  now?: () => Date;
}

export interface LedgerListing {
  records: ApplicationRecord[];
  choices: string[];
}

// One write queue per file, shared by every ledger instance in the process
const writeQueues = new Map<string, Promise<void>>();

function serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
  const previous = writeQueues.get(key) ?? Promise.resolve();
  const run = previous.then(task);
  writeQueues.set(
    key,
    run.then(
      () => undefined,
      () => undefined
    )
  );
  return run;
}

function cellText(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return String(value).trim();
}

/**
 * Selectable label for a record, e.g. "3. Acme Corp — Backend Engineer"
 */
export function choiceLabel(record: ApplicationRecord): string {
  return `${record.rowNumber}. ${record.companyName || 'Unknown company'} — ${record.roleApplied || 'Unknown role'}`;
}

/**
 * Row number behind a label produced by choiceLabel
 */
export function parseChoice(label: string): number | null {
  const match = label.match(/^\s*(\d+)\./);
  return match ? Number(match[1]) : null;
}

/**
 * Spreadsheet-backed, append-ordered application ledger.
 *
 * The row number of a record is its 1-based position below the header and
 * is also written in the first column; reads reject a file where the two
 * disagree. Every mutation runs in the file's write queue and replaces the
 * file through a temporary sibling and a rename.
 */
export class ApplicationLedger {
  readonly filePath: string;
  private readonly now: () => Date;

  constructor(options: LedgerOptions) {
    this.filePath = resolve(options.filePath);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Record a new application with status Applied and return its row number
   */
  append(entry: NewApplication): Promise<number> {
    return serialize(this.filePath, async () => {
      const records = await this.read();
      const rowNumber = records.length + 1;
      records.push({
        rowNumber,
        companyName: entry.companyName.trim(),
        roleApplied: entry.roleApplied.trim(),
        jobId: entry.jobId.trim(),
        link: entry.link.trim(),
        status: 'Applied',
        timestamp: this.now().toISOString(),
      });

      await this.write(records);
      console.log(`[ledger] Logged application #${rowNumber}: ${choiceLabel(records[rowNumber - 1])}`);
      return rowNumber;
    });
  }

  /**
   * All records in append order. A missing file is an empty ledger.
   */
  async list(): Promise<ApplicationRecord[]> {
    return this.read();
  }

  async listWithChoices(): Promise<LedgerListing> {
    const records = await this.read();
    return { records, choices: records.map(choiceLabel) };
  }

  /**
   * Set the status of one record and return a confirmation message
   */
  updateStatus(rowNumber: number, status: ApplicationStatus): Promise<string> {
    return serialize(this.filePath, async () => {
      const records = await this.read();
      const record = Number.isInteger(rowNumber) ? records[rowNumber - 1] : undefined;
      if (!record) {
        throw new RecordNotFoundError(rowNumber, records.length);
      }

      if (record.status === status) {
        return `Row ${rowNumber} is already marked as ${status}.`;
      }
      if (!TRANSITIONS[record.status].includes(status)) {
        throw new InvalidStatusTransitionError(rowNumber, record.status, status);
      }

      record.status = status;
      await this.write(records);
      console.log(`[ledger] Application #${rowNumber} marked as ${status}`);
      return `Row ${rowNumber} (${record.companyName || 'Unknown company'} — ${record.roleApplied || 'Unknown role'}) marked as ${status}.`;
    });
  }

  private async read(): Promise<ApplicationRecord[]> {
    let buffer: Buffer;
    try {
      buffer = await readFile(this.filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new LedgerReadError(this.filePath, describeError(error), { cause: error });
    }

    let rows: unknown[][];
    try {
      const workbook = XLSX.read(buffer, { type: 'buffer' });
      const sheet = workbook.Sheets[SHEET_NAME] ?? workbook.Sheets[workbook.SheetNames[0]];
      if (!sheet) {
        throw new Error('workbook has no sheets');
      }
      rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: '', blankrows: false });
    } catch (error) {
      throw new LedgerReadError(this.filePath, describeError(error), { cause: error });
    }

    if (rows.length === 0) {
      return [];
    }
    this.checkHeader(rows[0]);

    return rows.slice(1).map((row, index) => this.toRecord(row, index + 1));
  }

  private checkHeader(row: unknown[]): void {
    const header = row.map(cellText);
    for (let i = 0; i < REQUIRED_COLUMNS; i++) {
      if (header[i] !== LEDGER_HEADER[i]) {
        throw new LedgerReadError(this.filePath, `unexpected header "${header.join(', ')}"`);
      }
    }
  }

  private toRecord(row: unknown[], ordinal: number): ApplicationRecord {
    const cells = row.map(cellText);
    const rowNumber = Number(cells[0]);
    if (rowNumber !== ordinal) {
      throw new LedgerReadError(this.filePath, `row ${ordinal} is numbered "${cells[0] ?? ''}"`);
    }

    const status = StatusSchema.safeParse(cells[5]);
    if (!status.success) {
      throw new LedgerReadError(this.filePath, `row ${ordinal} has unknown status "${cells[5] ?? ''}"`);
    }

    return {
      rowNumber,
      companyName: cells[1] ?? '',
      roleApplied: cells[2] ?? '',
      jobId: cells[3] ?? '',
      link: cells[4] ?? '',
      status: status.data,
      timestamp: cells[6] ?? '',
    };
  }

  private async write(records: ApplicationRecord[]): Promise<void> {
    const rows: Array<Array<string | number>> = [
      [...LEDGER_HEADER],
      ...records.map((record) => [
        record.rowNumber,
        record.companyName,
        record.roleApplied,
        record.jobId,
        record.link,
        record.status,
        record.timestamp,
      ]),
    ];

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), SHEET_NAME);
    const directory = dirname(this.filePath);
    const tempPath = join(directory, `.${basename(this.filePath)}.${randomUUID()}.tmp`);

    try {
      const contents: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
      await mkdir(directory, { recursive: true });
      await writeFile(tempPath, contents);
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`[ledger] Could not remove ${tempPath}: ${describeError(cleanupError)}`);
      });
      throw new LedgerWriteError(this.filePath, { cause: error });
    }
  }
}

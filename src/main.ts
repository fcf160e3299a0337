#!/usr/bin/env node
import { flagValue, flagWords } from './cliArgs.js';
import { config } from './config.js';
import { generateCoverLetter } from './coverLetter.js';
import { describeError } from './errors.js';
import { storeGeneration } from './generationOutput.js';
import { loadJobDescription } from './jobDescription.js';
import { ApplicationLedger, choiceLabel } from './ledger.js';
import { APPLICATION_STATUSES, PROVIDER_IDS, type ApplicationStatus } from './types.js';

function openLedger(): ApplicationLedger {
  return new ApplicationLedger({ filePath: config.LEDGER_PATH });
}

/**
 * Generate a cover letter, save it and log the application
 */
async function handleGenerate(): Promise<void> {
  const args = process.argv.slice(3);
  const resumePath = flagValue(args, '--resume');
  const model = flagValue(args, '--model');

  if (!resumePath || !model) {
    console.error('Usage: npm start -- generate --resume resume.pdf --model <model> --jd "job description"');
    console.error(`Models: ${PROVIDER_IDS.join(', ')}`);
    process.exit(1);
  }

  const jobDescription = await loadJobDescription({
    url: flagValue(args, '--jd-url'),
    inline: flagWords(args, '--jd').join(' '),
    file: flagValue(args, '--jd-file'),
  });
  const link = flagValue(args, '--link') ?? jobDescription.url ?? '';

  console.log(`\nCalling ${model} API...`);
  const result = await generateCoverLetter({ resumePath, jobDescription: jobDescription.text, model });

  console.log('\n' + '='.repeat(60));
  console.log(`Company: ${result.companyName || '(not found)'}`);
  console.log(`Role:    ${result.roleApplied || '(not found)'}`);
  console.log(`Job ID:  ${result.jobId || '(not found)'}`);
  console.log('='.repeat(60) + '\n');
  console.log(result.coverLetter);
  console.log('\n' + '-'.repeat(60));

  await storeGeneration(result, {
    link,
    save: !args.includes('--no-save'),
    log: !args.includes('--no-log'),
    directory: config.COVER_LETTER_DIR,
    ledger: openLedger(),
  });
}

/**
 * Print the application ledger
 */
async function handleList(): Promise<void> {
  const records = await openLedger().list();
  if (records.length === 0) {
    console.log('No applications logged yet.');
    return;
  }

  console.log(`\n${records.length} application(s):\n`);
  for (const record of records) {
    const parts = [choiceLabel(record), record.jobId || '-', record.status];
    if (record.link) {
      parts.push(record.link);
    }
    console.log(parts.join(' | '));
  }
}

function parseStatus(value: string | undefined): ApplicationStatus | null {
  const match = APPLICATION_STATUSES.find((status) => status.toLowerCase() === (value ?? '').toLowerCase());
  return match ?? null;
}

/**
 * Mark an application Accepted or Rejected
 */
async function handleMark(): Promise<void> {
  const [rowArg, statusArg] = process.argv.slice(3);
  const rowNumber = Number(rowArg);
  const status = parseStatus(statusArg);

  if (!Number.isInteger(rowNumber) || rowNumber < 1 || !status || status === 'Applied') {
    console.error('Usage: npm start mark <row#> <Accepted|Rejected>');
    process.exit(1);
  }

  const message = await openLedger().updateStatus(rowNumber, status);
  console.log(message);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const mode = process.argv[2];

  try {
    switch (mode) {
      case 'generate':
        await handleGenerate();
        break;
      case 'list':
        await handleList();
        break;
      case 'mark':
        await handleMark();
        break;
      default:
        console.log('Usage:');
        console.log('  npm start -- generate --resume resume.pdf --model <model> --jd "job description text" [--link URL]');
        console.log('  npm start -- generate --resume resume.pdf --model <model> --jd-file path/to/jd.txt');
        console.log('  npm start -- generate --resume resume.pdf --model <model> --jd-url "https://jobs.company.com/position"');
        console.log('      [--no-save] [--no-log]');
        console.log('  npm start list');
        console.log('  npm start mark <row#> <Accepted|Rejected>');
        console.log('');
        console.log(`Models: ${PROVIDER_IDS.join(', ')}`);
        console.log('Note: Use -- after npm start to pass arguments correctly');
        process.exit(1);
    }
  } catch (error) {
    console.error('Error:', describeError(error));
    process.exit(1);
  }
}

void main();

/**
 * Pipeline Module
 *
 * Fixed stage order:
 * ingest -> (trim) -> detect slots -> explode -> (drop missing Email)
 *   -> (filter valid emails) -> classify by policy -> (dedupe by Email)
 *
 * Each stage that runs is recorded as { stage, rowsBefore, rowsAfter }.
 * Only option validation and ingestion can fail the run; everything else
 * degrades to missing values and keeps going.
 *
 * Usage:
 * const { cleanContacts } = await import('dealmachine-contact-cleaner/pipeline');
 * const result = cleanContacts(bytes, { policy: 'keep_renters' });
 */

import { EMAIL_COLUMN } from '../types/index.js';
import type {
  CleanerOutput,
  CleanerWarning,
  Logger,
  ModuleResult,
  Row,
  StageDiagnostic,
  StageName,
  Table,
} from '../types/index.js';
import { createLogger } from '../logger/index.js';
import { normalizeOptions } from '../normalizer/index.js';
import { readCsv, trimTable } from '../ingestor/index.js';
import { detectContactSlots } from '../slot-detector/index.js';
import { explodeByContacts } from '../exploder/index.js';
import { checkEmail } from '../validator/index.js';
import { removeByPolicy } from '../classifier/index.js';

const defaultLogger: Logger = createLogger('pipeline');

function hasEmail(row: Row): boolean {
  const email = row[EMAIL_COLUMN];
  return typeof email === 'string' && email.length > 0;
}

function withRows(table: Table, rows: Row[]): Table {
  return { columns: [...table.columns], rows };
}

/**
 * Remove rows whose Email is missing or blank
 */
export function dropMissingEmails(table: Table): Table {
  return withRows(table, table.rows.filter(hasEmail));
}

/**
 * Keep only rows whose Email passes the validator.
 * Rows without an Email cannot pass and are removed as well.
 */
export function filterValidEmails(table: Table, logger: Logger = defaultLogger): Table {
  const rejections: Record<string, number> = {};
  const rows = table.rows.filter((row) => {
    const check = checkEmail(row[EMAIL_COLUMN]);
    if (!check.valid && check.reason) {
      rejections[check.reason] = (rejections[check.reason] ?? 0) + 1;
    }
    return check.valid;
  });

  if (rows.length < table.rows.length) {
    logger.debug('Rejected emails by rule', rejections);
  }
  return withRows(table, rows);
}

/**
 * Keep the first row for each Email value. Missing counts as one value:
 * only the first row without an Email survives.
 */
export function dedupeByEmail(table: Table): Table {
  const seen = new Set<string>();
  let seenMissing = false;
  const rows = table.rows.filter((row) => {
    const email = row[EMAIL_COLUMN];
    if (email === null || email === undefined) {
      if (seenMissing) {
        return false;
      }
      seenMissing = true;
      return true;
    }
    if (seen.has(email)) {
      return false;
    }
    seen.add(email);
    return true;
  });
  return withRows(table, rows);
}

/**
 * Run the whole cleaner over raw CSV bytes
 *
 * @param bytes - Uploaded file content
 * @param rawOptions - Partial options record; missing fields take defaults
 * @param logger - Logger for stage diagnostics
 * @returns ModuleResult containing the cleaned table and its report
 */
export function cleanContacts(
  bytes: Uint8Array,
  rawOptions: unknown = {},
  logger: Logger = defaultLogger
): ModuleResult<CleanerOutput> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const optionsResult = normalizeOptions(rawOptions);
  if (!optionsResult.success || !optionsResult.data) {
    logger.error('Invalid cleaner options', { details: optionsResult.error?.details });
    return {
      success: false,
      error: optionsResult.error,
      metadata: { module: 'pipeline', timestamp, duration: Date.now() - startTime },
    };
  }
  const options = optionsResult.data;

  const ingested = readCsv(bytes, { logger });
  if (!ingested.success || !ingested.data) {
    return {
      success: false,
      error: ingested.error,
      metadata: { module: 'pipeline', timestamp, duration: Date.now() - startTime },
    };
  }

  const { encoding } = ingested.data;
  const inputRows = ingested.data.table.rows.length;
  const stages: StageDiagnostic[] = [];
  const warnings: CleanerWarning[] = [];

  const runStage = (stage: StageName, input: Table, transform: (table: Table) => Table): Table => {
    const output = transform(input);
    const diagnostic = { stage, rowsBefore: input.rows.length, rowsAfter: output.rows.length };
    stages.push(diagnostic);
    logger.info('Stage complete', { ...diagnostic });
    return output;
  };

  let work = ingested.data.table;
  logger.info('CSV loaded', { encoding, rows: inputRows, columns: work.columns.length });

  if (options.trim) {
    work = runStage('trim', work, trimTable);
  }

  const slots = detectContactSlots(work.columns);
  if (slots.length === 0) {
    const warning: CleanerWarning = {
      code: 'SCHEMA_MISMATCH',
      message: 'No contact_N_email columns found. This cleaner is tailored to the DealMachine per-contact export.',
    };
    warnings.push(warning);
    logger.warn(warning.message, { columns: work.columns });
  } else {
    logger.info('Detected contact slots', { slots });
  }

  work = runStage('explode', work, (table) => explodeByContacts(table, slots));

  if (options.dropMissingEmail) {
    work = runStage('drop_missing_email', work, dropMissingEmails);
  }

  if (options.filterValidEmails) {
    work = runStage('filter_valid_emails', work, (table) => filterValidEmails(table, logger));
  }

  work = runStage('classify', work, (table) => removeByPolicy(table, options.policy).table);

  if (options.dedupeByEmail) {
    work = runStage('dedupe', work, dedupeByEmail);
  }

  logger.info('Cleaning complete', { outputRows: work.rows.length, duration: Date.now() - startTime });

  return {
    success: true,
    data: {
      table: work,
      report: {
        encoding,
        slots,
        inputRows,
        outputRows: work.rows.length,
        stages,
        warnings,
        options,
      },
    },
    metadata: {
      module: 'pipeline',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

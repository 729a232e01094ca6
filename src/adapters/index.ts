/**
 * Adapters Module
 *
 * Thin outer layer around the pipeline:
 * - loadOptionsFromEnv(): options record from CLEANER_* variables
 * - cleanCsvFile(): read bytes from disk, clean, write the CSV download
 * - summarizeCsvFile(): read and clean, keep a preview, write nothing
 *
 * The pipeline itself never touches the file system or the environment.
 */

import { readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { CleanerOutput, Logger, ModuleResult, Table } from '../types/index.js';
import type { RawOptions } from '../normalizer/index.js';
import { parseBooleanFlag, trimString } from '../normalizer/index.js';
import { cleanContacts } from '../pipeline/index.js';
import { createLogger } from '../logger/index.js';
import { DEFAULT_OUTPUT_FILENAME, DEFAULT_PREVIEW_ROWS, renderCsv, renderPreview } from '../renderers/index.js';

const defaultLogger: Logger = createLogger('adapters');

export interface CleanFileOptions {
  /** Destination path; defaults to DEFAULT_OUTPUT_FILENAME beside the input */
  outputPath?: string;
  options?: Record<string, unknown>;
  logger?: Logger;
}

export interface CleanFileOutput extends CleanerOutput {
  outputPath: string;
}

export interface SummarizeFileOptions {
  options?: Record<string, unknown>;
  /** Rows kept in the preview table */
  previewRows?: number;
  logger?: Logger;
}

export interface SummarizeFileOutput extends CleanerOutput {
  preview: Table;
}

/**
 * Build an options record from environment configuration.
 * Unset or unrecognized booleans are left out so defaults apply;
 * the policy string is passed through for the schema to validate.
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const options: Record<string, unknown> = {};

  const booleans: Array<[keyof RawOptions, string]> = [
    ['trim', 'CLEANER_TRIM'],
    ['dropMissingEmail', 'CLEANER_DROP_MISSING_EMAIL'],
    ['filterValidEmails', 'CLEANER_FILTER_VALID_EMAILS'],
    ['dedupeByEmail', 'CLEANER_DEDUPE_BY_EMAIL'],
  ];

  for (const [key, variable] of booleans) {
    const value = parseBooleanFlag(env[variable]);
    if (value !== undefined) {
      options[key] = value;
    }
  }

  const policy = trimString(env['CLEANER_POLICY']);
  if (policy) {
    options['policy'] = policy.toLowerCase();
  }

  return options;
}

/**
 * Read the input file and run the pipeline over its bytes.
 * A file that cannot be read fails the same way as bytes that cannot be parsed.
 */
async function loadAndClean(
  inputPath: string,
  rawOptions: Record<string, unknown>,
  logger: Logger
): Promise<ModuleResult<CleanerOutput>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  let bytes: Uint8Array;
  try {
    bytes = await readFile(inputPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Failed to read input file', { inputPath, error: message });
    return {
      success: false,
      error: {
        code: 'UNREADABLE_FILE',
        message: `Could not read ${inputPath}`,
        details: [message],
      },
      metadata: { module: 'adapters', timestamp, duration: Date.now() - startTime },
    };
  }

  return cleanContacts(bytes, rawOptions, logger);
}

/**
 * Clean a CSV file on disk and write the result
 *
 * @param inputPath - Path to the DealMachine export
 * @param config - Output path, options and logger
 * @returns ModuleResult containing the cleaned output and where it was written
 */
export async function cleanCsvFile(
  inputPath: string,
  config: CleanFileOptions = {}
): Promise<ModuleResult<CleanFileOutput>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const logger = config.logger ?? defaultLogger;
  const outputPath = config.outputPath ?? join(dirname(inputPath), DEFAULT_OUTPUT_FILENAME);

  const result = await loadAndClean(inputPath, config.options ?? {}, logger);

  if (!result.success || !result.data) {
    return {
      success: false,
      error: result.error,
      metadata: { module: 'adapters', timestamp, duration: Date.now() - startTime },
    };
  }

  try {
    await writeFile(outputPath, renderCsv(result.data.table), 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Failed to write cleaned CSV', { outputPath, error: message });
    return {
      success: false,
      error: {
        code: 'OUTPUT_WRITE_FAILED',
        message: `Could not write ${outputPath}: ${message}`,
      },
      metadata: { module: 'adapters', timestamp, duration: Date.now() - startTime },
    };
  }

  logger.info('Cleaned CSV written', { inputPath, outputPath, rows: result.data.table.rows.length });

  return {
    success: true,
    data: { ...result.data, outputPath },
    metadata: { module: 'adapters', timestamp, duration: Date.now() - startTime },
  };
}

/**
 * Clean a CSV file on disk without writing anything
 */
export async function summarizeCsvFile(
  inputPath: string,
  config: SummarizeFileOptions = {}
): Promise<ModuleResult<SummarizeFileOutput>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const logger = config.logger ?? defaultLogger;

  const result = await loadAndClean(inputPath, config.options ?? {}, logger);

  if (!result.success || !result.data) {
    return {
      success: false,
      error: result.error,
      metadata: { module: 'adapters', timestamp, duration: Date.now() - startTime },
    };
  }

  return {
    success: true,
    data: {
      ...result.data,
      preview: renderPreview(result.data.table, config.previewRows ?? DEFAULT_PREVIEW_ROWS),
    },
    metadata: { module: 'adapters', timestamp, duration: Date.now() - startTime },
  };
}

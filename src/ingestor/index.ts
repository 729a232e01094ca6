/**
 * Ingestor Module
 *
 * Responsibilities:
 * - Decode raw upload bytes, trying each candidate encoding in order
 * - Parse the decoded text as a headed CSV table
 * - Optional whitespace trim over every text cell
 *
 * The first encoding that both decodes and parses wins. When all of them
 * fail the run is over: the caller gets UNREADABLE_FILE and no partial table.
 */

import { TextDecoder } from 'node:util';
import { parse } from 'csv-parse/sync';
import type { CellValue, Logger, ModuleResult, Row, SourceEncoding, Table } from '../types/index.js';
import { silentLogger } from '../logger/index.js';

export interface IngestedTable {
  table: Table;
  encoding: SourceEncoding;
}

export interface IngestorConfig {
  /** Override the candidate order (mainly for tests) */
  encodings?: readonly SourceEncoding[];
  logger?: Logger;
}

export interface DecodeAttempt {
  encoding: SourceEncoding;
  message: string;
}

export const DEFAULT_ENCODINGS: readonly SourceEncoding[] = ['utf-8', 'utf-8-sig', 'latin1'];

const BOM = '\uFEFF';

/**
 * Cell texts read as missing values. Matched exactly, before any trim.
 */
export const MISSING_VALUE_MARKERS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

/**
 * Decode bytes with one candidate encoding. Throws when the bytes are not valid
 * for that encoding.
 */
export function decodeBytes(bytes: Uint8Array, encoding: SourceEncoding): string {
  switch (encoding) {
    case 'utf-8': {
      const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
      if (text.startsWith(BOM)) {
        throw new Error('Byte-order mark present');
      }
      return text;
    }
    case 'utf-8-sig':
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(bytes);
    case 'latin1':
      return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
  }
}

/**
 * Make header names unique and non-empty.
 * Blank names become "Unnamed: <position>", repeats get ".1", ".2", ...
 */
export function normalizeHeader(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set<string>();

  return header.map((raw, position) => {
    const base = raw.trim() === '' ? `Unnamed: ${position}` : raw;
    let name = base;
    let count = seen.get(base) ?? 0;
    while (taken.has(name)) {
      count += 1;
      name = `${base}.${count}`;
    }
    seen.set(base, count);
    taken.add(name);
    return name;
  });
}

/**
 * Parse decoded CSV text into a table.
 * Short records are padded with missing values; long records are rejected.
 * Empty cells and the usual spreadsheet placeholders (N/A, NULL, #N/A...) are missing.
 */
export function parseCsvText(text: string): Table {
  const records: string[][] = parse(text, {
    columns: false,
    skip_empty_lines: true,
    relax_quotes: true,
    relax_column_count_less: true,
  });

  const [header, ...body] = records;
  if (!header || header.every((cell) => cell.trim() === '')) {
    throw new Error('No header row found');
  }

  const columns = normalizeHeader(header);
  const rows: Row[] = body.map((record) =>
    Object.fromEntries(
      columns.map((column, index): [string, CellValue] => {
        const cell = record[index];
        return [column, cell === undefined || MISSING_VALUE_MARKERS.has(cell) ? null : cell];
      })
    )
  );

  return { columns, rows };
}

/**
 * Decode and parse raw CSV bytes
 *
 * @param bytes - Raw file content
 * @param config - Optional encoding order and logger
 * @returns ModuleResult containing the table and the encoding that worked
 */
export function readCsv(bytes: Uint8Array, config: IngestorConfig = {}): ModuleResult<IngestedTable> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const logger = config.logger ?? silentLogger;
  const encodings = config.encodings ?? DEFAULT_ENCODINGS;
  const attempts: DecodeAttempt[] = [];

  for (const encoding of encodings) {
    try {
      const table = parseCsvText(decodeBytes(bytes, encoding));
      logger.debug('Parsed CSV', { encoding, rows: table.rows.length, columns: table.columns.length });
      return {
        success: true,
        data: { table, encoding },
        metadata: {
          module: 'ingestor',
          timestamp,
          duration: Date.now() - startTime,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug('Encoding attempt failed', { encoding, error: message });
      attempts.push({ encoding, message });
    }
  }

  logger.error('Could not read CSV with any candidate encoding', { attempts });

  return {
    success: false,
    error: {
      code: 'UNREADABLE_FILE',
      message: 'Could not read CSV. Try re-exporting or saving with UTF-8 encoding.',
      details: attempts,
    },
    metadata: {
      module: 'ingestor',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

/**
 * Strip leading/trailing whitespace from every text cell.
 * Missing cells stay missing; the input table is left untouched.
 */
export function trimTable(table: Table): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) =>
      Object.fromEntries(
        table.columns.map((column): [string, CellValue] => {
          const value = row[column] ?? null;
          return [column, value === null ? null : value.trim()];
        })
      )
    ),
  };
}

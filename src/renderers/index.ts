/**
 * Renderers Module
 *
 * The cleaned table is the only canonical artifact. Everything here is a view
 * derived from it or from the run report:
 * - CSV download (UTF-8, header row, minimal quoting)
 * - Plain-text run summary, one line per stage
 * - Preview of the first rows
 */

import { stringify } from 'csv-stringify/sync';
import type { CleanerReport, StageDiagnostic, Table } from '../types/index.js';

export const DEFAULT_OUTPUT_FILENAME = 'dealmachine_cleaned_emails.csv';

export const DEFAULT_PREVIEW_ROWS = 50;

function formatCount(count: number): string {
  return count.toLocaleString('en-US');
}

/**
 * Serialize a table as CSV text.
 * Missing values become empty fields; fields containing the delimiter,
 * a quote or a line break are quoted.
 */
export function renderCsv(table: Table): string {
  const records = table.rows.map((row) => table.columns.map((column) => row[column] ?? ''));
  return stringify(records, {
    header: true,
    columns: [...table.columns],
    record_delimiter: 'unix',
  });
}

/**
 * First rows of the table, same schema
 */
export function renderPreview(table: Table, limit: number = DEFAULT_PREVIEW_ROWS): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.slice(0, Math.max(0, limit)),
  };
}

function describeStage(diagnostic: StageDiagnostic, report: CleanerReport): string {
  const removed = formatCount(diagnostic.rowsBefore - diagnostic.rowsAfter);

  switch (diagnostic.stage) {
    case 'trim':
      return `Trimmed spaces in text fields → ${formatCount(diagnostic.rowsAfter)} rows`;
    case 'explode':
      return `Exploded by contacts → rows: ${formatCount(diagnostic.rowsBefore)} → ${formatCount(diagnostic.rowsAfter)}`;
    case 'drop_missing_email':
      return `Dropped rows without Email → ${formatCount(diagnostic.rowsAfter)} rows remain`;
    case 'filter_valid_emails':
      return `Filtered invalid-looking emails → removed ${removed} rows`;
    case 'classify':
      return report.options.policy === 'keep_owners'
        ? `Removed ${removed} renter rows based on Flags.`
        : `Removed ${removed} 'Likely Owner…' rows. Renters kept.`;
    case 'dedupe':
      return `De-duplicated by Email → removed ${removed} rows`;
  }
}

/**
 * Human-readable run summary
 */
export function renderSummary(report: CleanerReport): string {
  const lines: string[] = [];

  lines.push(`Read ${formatCount(report.inputRows)} rows (${report.encoding})`);
  for (const warning of report.warnings) {
    lines.push(`Warning: ${warning.message}`);
  }
  if (report.slots.length > 0) {
    lines.push(`Detected contact slots: [${report.slots.join(', ')}]`);
  }
  for (const diagnostic of report.stages) {
    lines.push(describeStage(diagnostic, report));
  }
  lines.push(`Done. ${formatCount(report.outputRows)} rows ready for verification.`);

  return lines.join('\n');
}

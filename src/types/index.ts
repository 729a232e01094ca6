/**
 * Core type definitions for the DealMachine contact cleaner
 *
 * This module exports all shared types used across the system.
 */

// ============================================================================
// Tabular Data Model
// ============================================================================

/**
 * A single cell. `null` means the value is missing (empty in the source CSV).
 */
export type CellValue = string | null;

/**
 * A row keyed by column name
 */
export type Row = Readonly<Record<string, CellValue>>;

/**
 * An ordered table. `columns` fixes the column order used for output;
 * every row carries a value (possibly null) for each column.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/**
 * Added to every derived row by the exploder
 */
export const EMAIL_COLUMN = 'Email';
export const FLAGS_COLUMN = 'Flags';

// ============================================================================
// Run Configuration
// ============================================================================

/**
 * Which flagged category is removed from the output.
 * - keep_owners: rows whose flags read as renters are removed
 * - keep_renters: rows whose flags read as likely owners are removed
 */
export type Policy = 'keep_owners' | 'keep_renters';

export interface CleanerOptions {
  trim: boolean;
  dropMissingEmail: boolean;
  filterValidEmails: boolean;
  dedupeByEmail: boolean;
  policy: Policy;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type StageName =
  | 'trim'
  | 'explode'
  | 'drop_missing_email'
  | 'filter_valid_emails'
  | 'classify'
  | 'dedupe';

export interface StageDiagnostic {
  stage: StageName;
  rowsBefore: number;
  rowsAfter: number;
}

export interface CleanerWarning {
  code: 'SCHEMA_MISMATCH';
  message: string;
}

/**
 * Encodings tried by the ingestor, in order
 */
export type SourceEncoding = 'utf-8' | 'utf-8-sig' | 'latin1';

export interface CleanerReport {
  encoding: SourceEncoding;
  slots: number[];
  inputRows: number;
  outputRows: number;
  stages: StageDiagnostic[];
  warnings: CleanerWarning[];
  options: CleanerOptions;
}

export interface CleanerOutput {
  table: Table;
  report: CleanerReport;
}

// ============================================================================
// Module Plumbing
// ============================================================================

export type ErrorCode = 'UNREADABLE_FILE' | 'VALIDATION_ERROR' | 'OUTPUT_WRITE_FAILED';

/**
 * Module result wrapper returned by every entry point that can fail
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
  metadata: {
    module: string;
    timestamp: string;
    duration?: number;
  };
}

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

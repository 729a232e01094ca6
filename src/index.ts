/**
 * DealMachine Contact Cleaner - Main Entry Point
 *
 * Turns a DealMachine contact export (one row per property, contact_N_email /
 * contact_N_flags slots) into a one-email-per-row CSV for outreach campaigns.
 *
 * Architecture:
 * - Every stage is a pure function from table to table
 * - The pipeline module runs them in a fixed order and records row counts
 * - Adapters and the CLI are the only code that touches disk or environment
 */

// Core Types
export * from './types/index.js';

// Logger Module
export { createLogger, resolveLogLevel, silentLogger, type LogLevel } from './logger/index.js';

// Normalizer Module - Options canonicalization and cell normalization
export {
  normalizeOptions,
  normalizeEmail,
  normalizeFlags,
  parseBooleanFlag,
  trimString,
  DEFAULT_OPTIONS,
  POLICIES,
  type RawOptions,
} from './normalizer/index.js';

// Ingestor Module - Bytes to table
export {
  readCsv,
  trimTable,
  decodeBytes,
  parseCsvText,
  normalizeHeader,
  DEFAULT_ENCODINGS,
  MISSING_VALUE_MARKERS,
  type IngestedTable,
  type IngestorConfig,
  type DecodeAttempt,
} from './ingestor/index.js';

// Slot Detector Module
export {
  detectContactSlots,
  resolveSlotColumns,
  slotColumnNames,
  type SlotColumns,
} from './slot-detector/index.js';

// Email Extractor / Validator Modules
export { extractEmails, EMAIL_PATTERN_SOURCE } from './extractor/index.js';
export { checkEmail, looksValidEmail, type EmailCheck, type EmailRejection } from './validator/index.js';

// Exploder Module
export { explodeByContacts, explodedColumns, ensureContactColumns } from './exploder/index.js';

// Flag Classifier Module
export {
  flagsMatch,
  phrasesForPolicy,
  removeByPolicy,
  RENTER_PHRASES,
  OWNER_PHRASES,
  type ClassificationResult,
} from './classifier/index.js';

// Pipeline Module
export { cleanContacts, dropMissingEmails, filterValidEmails, dedupeByEmail } from './pipeline/index.js';

// Renderers Module
export {
  renderCsv,
  renderSummary,
  renderPreview,
  DEFAULT_OUTPUT_FILENAME,
  DEFAULT_PREVIEW_ROWS,
} from './renderers/index.js';

// Adapters Module
export {
  cleanCsvFile,
  summarizeCsvFile,
  loadOptionsFromEnv,
  type CleanFileOptions,
  type CleanFileOutput,
  type SummarizeFileOptions,
  type SummarizeFileOutput,
} from './adapters/index.js';
